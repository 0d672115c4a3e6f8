import type OpenAI from "openai";
import { env } from "../config/env.js";
import { logger } from "../observability/logger.js";
import { upstreamRejected } from "../utils/errors.js";
import { mapOpenAiError } from "./image-generation.service.js";

export type PaletteEntry = {
  hex?: string;
  rgb?: string;
  cmyk?: string;
  name?: string;
};

export type TextModel = {
  complete: (prompt: string, options: { temperature: number; maxTokens: number }) => Promise<string>;
};

export const createOpenAiTextModel = (client: () => OpenAI, model = env.OPENAI_TEXT_MODEL): TextModel => ({
  complete: async (prompt, { temperature, maxTokens }) => {
    try {
      const completion = await client().chat.completions.create({
        model,
        temperature,
        max_tokens: maxTokens,
        messages: [{ role: "user", content: prompt }]
      });
      return completion.choices[0]?.message.content?.trim() ?? "";
    } catch (error) {
      throw mapOpenAiError(error);
    }
  }
});

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const extractJsonArray = (text: string): unknown[] | null => {
  const match = text.match(/\[[\s\S]*\]/);
  if (!match) return null;
  try {
    const parsed: unknown = JSON.parse(match[0]);
    return Array.isArray(parsed) ? parsed : null;
  } catch {
    return null;
  }
};

const cleanListLine = (line: string) =>
  line
    .trim()
    .replace(/^(?:\d+[.)]|[-*"]|\s)+/, "")
    .replace(/",?$/, "")
    .trim();

export const parseSuggestionList = (text: string, count: number): string[] => {
  const fromJson = extractJsonArray(text);
  const candidates = fromJson
    ? fromJson.filter((item): item is string => typeof item === "string").map((item) => item.trim())
    : text
        .split("\n")
        .map((line) => line.trim())
        .filter((line) => line.length > 0 && !line.startsWith("[") && !line.startsWith("]"))
        .map(cleanListLine);

  return candidates.filter((item) => item.length > 5).slice(0, count);
};

const paletteFields = ["hex", "rgb", "cmyk", "name"] as const;

export const parsePalette = (text: string, count: number): PaletteEntry[] => {
  const items = extractJsonArray(text) ?? [];
  const entries: PaletteEntry[] = [];

  for (const item of items) {
    if (!isRecord(item)) continue;
    const entry: PaletteEntry = {};
    for (const field of paletteFields) {
      const value = item[field];
      if (typeof value === "string" && value.trim()) {
        entry[field] = value.trim();
      }
    }
    if (Object.keys(entry).length > 0) {
      entries.push(entry);
    }
  }

  return entries.slice(0, count);
};

const suggestionsPrompt = ({
  category,
  style,
  theme,
  count
}: {
  category: string;
  style?: string;
  theme?: string;
  count: number;
}) => `You help users write prompts for AI image generation.

Generate ${count} creative and detailed prompt suggestions for creating ${category} assets.

Context:
- Asset type: ${category}
- Style preference: ${style || "any style"}
- Theme/color: ${theme || "any theme"}

Each suggestion must be a complete prompt between 10 and 30 words with visual details such as colors, lighting, composition and artistic style.

Return exactly ${count} suggestions as a JSON array of strings.`;

const enhancePrompt = ({
  prompt,
  assetType,
  assetSubtype
}: {
  prompt: string;
  assetType?: string;
  assetSubtype?: string;
}) => {
  const subject = [assetSubtype, assetType].filter(Boolean).join(" ");
  return [
    "You are an expert prompt engineer for AI image generation. Enhance the prompt below with specific visual details such as colors, lighting, textures, composition and artistic style, keeping its original concept.",
    subject ? `The image is a ${subject} asset.` : "",
    "Keep the enhanced prompt under 120 words and reply with the prompt text only.",
    `Original prompt: "${prompt}"`,
    "Enhanced prompt:"
  ]
    .filter(Boolean)
    .join("\n\n");
};

/** Strips the label and wrapping quotes chat models tend to echo back. */
export const cleanEnhancedPrompt = (text: string) =>
  text
    .trim()
    .replace(/^enhanced prompt:\s*/i, "")
    .replace(/^["'“]+|["'”]+$/g, "")
    .replace(/\s+/g, " ")
    .trim();

const palettePrompt = (context: string, count: number) => `Suggest ${count} colors for a design described as: "${context}".

Return a JSON array of objects with the keys "name", "hex" (like "#1A2B3C"), "rgb" (like "rgb(26, 43, 60)") and "cmyk" (like "cmyk(57%, 28%, 0%, 76%)").`;

export const createSuggestionService = ({ textModel }: { textModel: TextModel }) => ({
  suggestions: async (input: { category: string; style?: string; theme?: string; count: number }) => {
    const text = await textModel.complete(suggestionsPrompt(input), { temperature: 0.8, maxTokens: 512 });
    const suggestions = parseSuggestionList(text, input.count);

    if (suggestions.length === 0) {
      logger.warn("suggestions_unparseable", { category: input.category, responseLength: text.length });
      throw upstreamRejected("Failed to generate valid suggestions");
    }

    return suggestions;
  },
  enhance: async (input: { prompt: string; assetType?: string; assetSubtype?: string }) => {
    const text = await textModel.complete(enhancePrompt(input), { temperature: 0.7, maxTokens: 400 });
    const enhanced = cleanEnhancedPrompt(text);

    if (enhanced.length < 3) {
      logger.warn("prompt_enhancement_empty", { promptLength: input.prompt.length, responseLength: text.length });
      throw upstreamRejected("Failed to enhance the prompt");
    }

    return enhanced;
  },
  palette: async (input: { context: string; count: number }) => {
    const text = await textModel.complete(palettePrompt(input.context, input.count), {
      temperature: 0.7,
      maxTokens: 400
    });
    const palette = parsePalette(text, input.count);

    if (palette.length === 0) {
      logger.warn("palette_unparseable", { responseLength: text.length });
      throw upstreamRejected("Failed to generate a color palette");
    }

    return palette;
  }
});

export type SuggestionService = ReturnType<typeof createSuggestionService>;
