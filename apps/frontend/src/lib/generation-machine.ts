import { needsColor } from "../constants/assetCatalog";
import { composePrompt, MAX_PROMPT_LENGTH } from "./prompt-composer";
import type { GeneratedImage, GenerationSession } from "../types/models";

export const createSession = (): GenerationSession => ({
  step: "assetTypeSelection",
  assetType: null,
  assetSubtype: null,
  colorCount: null,
  colors: [],
  prompt: "",
  image: null,
  error: null
});

export const requiresColor = (session: GenerationSession) => needsColor(session.assetType, session.assetSubtype);

const resizeColors = (colors: string[], count: number) =>
  Array.from({ length: count }, (_, index) => colors[index] ?? "");

// Upstream picks clear everything downstream of them; the prompt text is the user's own and survives.
// Nothing may leave `generating` except the outcome of the call in flight.
export const selectAssetType = (session: GenerationSession, assetType: string): GenerationSession => {
  if (session.step === "generating") return session;
  return {
    ...createSession(),
    prompt: session.prompt,
    assetType,
    step: "assetSubtypeSelection"
  };
};

export const selectSubtype = (session: GenerationSession, assetSubtype: string): GenerationSession => {
  if (session.step !== "assetSubtypeSelection") return session;
  return {
    ...session,
    assetSubtype,
    colorCount: null,
    colors: [],
    error: null
  };
};

export const selectColorCount = (session: GenerationSession, colorCount: number): GenerationSession => {
  if (session.step !== "assetSubtypeSelection" || !requiresColor(session)) return session;
  return {
    ...session,
    colorCount,
    colors: resizeColors(session.colors, colorCount)
  };
};

export const canLeaveSubtypeSelection = (session: GenerationSession) =>
  session.step === "assetSubtypeSelection" &&
  session.assetSubtype !== null &&
  (!requiresColor(session) || session.colorCount !== null);

export const continueFromSubtype = (session: GenerationSession): GenerationSession => {
  if (!canLeaveSubtypeSelection(session)) return session;
  return { ...session, step: requiresColor(session) ? "colorInput" : "promptInput" };
};

export const setColor = (session: GenerationSession, index: number, value: string): GenerationSession => {
  if (session.step !== "colorInput" || index < 0 || index >= session.colors.length) return session;
  return {
    ...session,
    colors: session.colors.map((color, slot) => (slot === index ? value : color))
  };
};

export const allColorsSelected = (session: GenerationSession) =>
  session.colorCount !== null &&
  session.colors.length === session.colorCount &&
  session.colors.every((color) => color.trim().length > 0);

export const continueFromColors = (session: GenerationSession): GenerationSession => {
  if (session.step !== "colorInput" || !allColorsSelected(session)) return session;
  return { ...session, step: "promptInput" };
};

export const setPrompt = (session: GenerationSession, prompt: string): GenerationSession => {
  if (session.step === "generating") return session;
  return { ...session, prompt, error: session.step === "promptInput" ? null : session.error };
};

export const goBack = (session: GenerationSession): GenerationSession => {
  switch (session.step) {
    case "assetSubtypeSelection":
      return { ...session, step: "assetTypeSelection", error: null };
    case "colorInput":
      return { ...session, step: "assetSubtypeSelection", error: null };
    case "promptInput":
      return { ...session, step: requiresColor(session) ? "colorInput" : "assetSubtypeSelection", error: null };
    default:
      return session;
  }
};

export type SubmitContext = {
  aiAvailable: boolean;
  balance: number | null;
};

export const composeSessionPrompt = (session: GenerationSession) =>
  composePrompt({
    assetType: session.assetType,
    assetSubtype: session.assetSubtype,
    colors: session.colors,
    colorCount: session.colorCount,
    userText: session.prompt
  });

export const promptTooLong = (session: GenerationSession) => composeSessionPrompt(session).length > MAX_PROMPT_LENGTH;

export type SubmitBlocker =
  | "not_ready"
  | "empty_prompt"
  | "prompt_too_long"
  | "ai_unavailable"
  | "insufficient_gemstones";

/** `null` balance means it has not loaded yet; the debit itself re-checks it. */
export const submitBlocker = (session: GenerationSession, context: SubmitContext): SubmitBlocker | null => {
  if (session.step !== "promptInput") return "not_ready";
  if (session.prompt.trim().length === 0) return "empty_prompt";
  if (promptTooLong(session)) return "prompt_too_long";
  if (!context.aiAvailable) return "ai_unavailable";
  if (context.balance !== null && context.balance <= 0) return "insufficient_gemstones";
  return null;
};

export const withError = (session: GenerationSession, error: string): GenerationSession => ({ ...session, error });

export const beginGeneration = (session: GenerationSession): GenerationSession => {
  if (session.step !== "promptInput") return session;
  return { ...session, step: "generating", image: null, error: null };
};

export const completeGeneration = (session: GenerationSession, image: GeneratedImage): GenerationSession => {
  if (session.step !== "generating") return session;
  return { ...session, step: "preview", image, error: null };
};

export const failGeneration = (session: GenerationSession, error: string): GenerationSession => {
  if (session.step !== "generating") return session;
  return { ...session, step: "promptInput", image: null, error };
};

export const generateAnother = (session: GenerationSession): GenerationSession => {
  if (session.step !== "preview") return session;
  return { ...session, step: "promptInput", image: null, error: null };
};

export const startOver = (session: GenerationSession): GenerationSession =>
  session.step === "preview" ? createSession() : session;
