import fallbacks from "../constants/suggestion-fallbacks.json";
import { logger } from "./logger";
import type { PaletteEntry } from "../types/models";

type SuggestionFallbacks = {
  categories: Partial<Record<string, string[]>>;
  subtypes: Partial<Record<string, string[]>>;
  default: string[];
  palettes: PaletteEntry[][];
};

const table: SuggestionFallbacks = fallbacks;

export type RandomSource = () => number;

const pick = <T>(items: readonly T[], random: RandomSource) =>
  items[Math.min(items.length - 1, Math.floor(random() * items.length))];

export const fallbackSuggestions = (category: string, subtype?: string | null) =>
  (subtype ? table.subtypes[subtype] : undefined) ??
  table.categories[category.trim().toLowerCase()] ??
  table.default;

export const randomFallbackPrompt = (category: string, subtype?: string | null, random: RandomSource = Math.random) =>
  pick(fallbackSuggestions(category, subtype), random);

export const fallbackPalettes = (): readonly PaletteEntry[][] => table.palettes;

export const randomFallbackPalette = (random: RandomSource = Math.random) => pick(table.palettes, random);

export type Sourced<T> = {
  source: "remote" | "fallback";
  items: T[];
};

export const loadSuggestions = async (
  fetchSuggestions: () => Promise<string[]>,
  category: string,
  subtype?: string | null
): Promise<Sourced<string>> => {
  try {
    const items = await fetchSuggestions();
    if (items.length > 0) return { source: "remote", items };
    logger.info("suggestions_empty", { category });
  } catch (error) {
    logger.warn("suggestions_unavailable", { category, error });
  }
  return { source: "fallback", items: fallbackSuggestions(category, subtype) };
};

export const loadPalette = async (
  fetchPalette: () => Promise<PaletteEntry[]>,
  random: RandomSource = Math.random
): Promise<Sourced<PaletteEntry>> => {
  try {
    const items = await fetchPalette();
    if (items.length > 0) return { source: "remote", items };
    logger.info("palette_empty");
  } catch (error) {
    logger.warn("palette_unavailable", { error });
  }
  return { source: "fallback", items: randomFallbackPalette(random) };
};

/** The user's own text is kept when the model is unreachable or has nothing to add. */
export const loadEnhancedPrompt = async (
  fetchEnhanced: () => Promise<string>,
  original: string
): Promise<{ source: "remote" | "fallback"; prompt: string }> => {
  try {
    const prompt = (await fetchEnhanced()).trim();
    if (prompt.length > 0) return { source: "remote", prompt };
    logger.info("prompt_enhancement_empty");
  } catch (error) {
    logger.warn("prompt_enhancement_unavailable", { error });
  }
  return { source: "fallback", prompt: original };
};
