import { createStore } from "zustand/vanilla";
import { apiErrorMessage } from "../api/http";
import type { GemstoneLedger } from "../lib/gemstone-ledger";
import {
  beginGeneration,
  completeGeneration,
  composeSessionPrompt,
  continueFromColors,
  continueFromSubtype,
  createSession,
  failGeneration,
  generateAnother,
  goBack,
  selectAssetType,
  selectColorCount,
  selectSubtype,
  setColor,
  setPrompt,
  startOver,
  submitBlocker,
  withError,
  type SubmitBlocker
} from "../lib/generation-machine";
import { validateImagePayload, type PayloadValidation } from "../lib/image-payload";
import { logger } from "../lib/logger";
import { MAX_PROMPT_LENGTH } from "../lib/prompt-composer";
import { createTaskScope } from "../lib/task-scope";
import type { DebitReceipt, GemstoneSource, GenerateImageRequest, GenerationSession } from "../types/models";

export const GENERATION_COST = 1;

export type GeneratedPayload = {
  bytes: Uint8Array;
  mimeType: string;
};

export type GenerationDeps = {
  ledger: GemstoneLedger;
  generateImage: (request: GenerateImageRequest, signal: AbortSignal) => Promise<GeneratedPayload | null>;
  validatePayload?: (bytes: Uint8Array) => Promise<PayloadValidation>;
  isAiAvailable: () => boolean;
  getBalance: () => number | null;
  onBalanceChange?: (balance: number, source: GemstoneSource) => void;
};

export type GenerationState = {
  session: GenerationSession;
  selectAssetType: (assetType: string) => void;
  selectSubtype: (assetSubtype: string) => void;
  selectColorCount: (colorCount: number) => void;
  continueFromSubtype: () => void;
  setColor: (index: number, value: string) => void;
  continueFromColors: () => void;
  setPrompt: (prompt: string) => void;
  goBack: () => void;
  submit: () => Promise<void>;
  generateAnother: () => void;
  startOver: () => void;
  dispose: () => void;
};

export const blockerMessages: Record<SubmitBlocker, string> = {
  not_ready: "Finish the previous steps first.",
  empty_prompt: "Describe the asset you want to generate.",
  prompt_too_long: `Shorten your description. The full prompt must fit in ${MAX_PROMPT_LENGTH} characters.`,
  ai_unavailable: "Image generation is currently unavailable. Try again later.",
  insufficient_gemstones: "You need at least 1 gemstone to generate an asset."
};

type AttemptResult =
  | { ok: true; payload: GeneratedPayload; validation: Exclude<PayloadValidation, { status: "invalid" }> }
  | { ok: false; message: string };

/**
 * One store per generator screen. The screen creates it on mount and calls
 * `dispose` on unmount; after that, late completions never touch the session.
 */
export const createGenerationStore = (deps: GenerationDeps) => {
  const scope = createTaskScope();
  const validate = deps.validatePayload ?? ((bytes: Uint8Array) => validateImagePayload(bytes));
  let submitting = false;

  const refund = async (receipt: DebitReceipt, reason: string) => {
    try {
      const balance = await deps.ledger.refund(receipt);
      deps.onBalanceChange?.(balance, receipt.source);
      logger.info("generation_refunded", { reason, source: receipt.source, balance });
    } catch (error) {
      logger.error("generation_refund_failed", { reason, source: receipt.source, amount: receipt.amount, error });
    }
  };

  return createStore<GenerationState>()((set, get) => {
    const update = (transition: (session: GenerationSession) => GenerationSession) => {
      if (scope.disposed) return;
      set((state) => ({ session: transition(state.session) }));
    };

    const attempt = async (session: GenerationSession, prompt: string, signal: AbortSignal): Promise<AttemptResult> => {
      const payload = await deps.generateImage(
        {
          prompt,
          assetType: session.assetType ?? undefined,
          assetSubtype: session.assetSubtype ?? undefined
        },
        signal
      );
      if (!payload) {
        return { ok: false, message: "The generator did not return an image. Please try again." };
      }

      const validation = await validate(payload.bytes);
      if (validation.status === "invalid") {
        return { ok: false, message: "The generated image could not be displayed. Please try again." };
      }
      return { ok: true, payload, validation };
    };

    return {
      session: createSession(),
      selectAssetType: (assetType) => update((session) => selectAssetType(session, assetType)),
      selectSubtype: (assetSubtype) => update((session) => selectSubtype(session, assetSubtype)),
      selectColorCount: (colorCount) => update((session) => selectColorCount(session, colorCount)),
      continueFromSubtype: () => update(continueFromSubtype),
      setColor: (index, value) => update((session) => setColor(session, index, value)),
      continueFromColors: () => update(continueFromColors),
      setPrompt: (prompt) => update((session) => setPrompt(session, prompt)),
      goBack: () => update(goBack),
      generateAnother: () => update(generateAnother),
      startOver: () => update(startOver),
      submit: async () => {
        const session = get().session;
        if (submitting || scope.disposed || session.step !== "promptInput") return;

        const blocker = submitBlocker(session, {
          aiAvailable: deps.isAiAvailable(),
          balance: deps.getBalance()
        });
        if (blocker) {
          update((current) => withError(current, blockerMessages[blocker]));
          return;
        }

        submitting = true;
        try {
          update(beginGeneration);

          const debit = await scope.run(() => deps.ledger.debit(GENERATION_COST));
          if (debit.status === "discarded") {
            if (debit.value) await refund(debit.value, "discarded");
            return;
          }
          if (debit.status === "failed") {
            logger.error("generation_debit_failed", { error: debit.error });
            update((current) => failGeneration(current, apiErrorMessage(debit.error, "Could not reserve a gemstone.")));
            return;
          }
          if (!debit.value) {
            update((current) => failGeneration(current, blockerMessages.insufficient_gemstones));
            return;
          }

          const receipt = debit.value;
          deps.onBalanceChange?.(receipt.balance, receipt.source);

          const prompt = composeSessionPrompt(session);
          const outcome = await scope.run((signal) => attempt(session, prompt, signal));
          if (outcome.status === "discarded") {
            await refund(receipt, "discarded");
            return;
          }
          if (outcome.status === "failed") {
            logger.warn("generation_failed", { error: outcome.error });
            update((current) => failGeneration(current, apiErrorMessage(outcome.error, "Image generation failed.")));
            await refund(receipt, "request_failed");
            return;
          }

          const result = outcome.value;
          if (!result.ok) {
            update((current) => failGeneration(current, result.message));
            await refund(receipt, "invalid_payload");
            return;
          }

          update((current) =>
            completeGeneration(current, {
              bytes: result.payload.bytes,
              mimeType: result.validation.mimeType,
              status: result.validation.status,
              prompt
            })
          );
          if (result.validation.status === "placeholder") {
            await refund(receipt, "placeholder");
          }
        } finally {
          submitting = false;
        }
      },
      dispose: () => {
        scope.dispose();
      }
    };
  });
};

export type GenerationStore = ReturnType<typeof createGenerationStore>;
