import { z } from "zod";

const label = z.string().trim().min(1).max(60);

export const generateImageSchema = z.object({
  prompt: z.string().trim().min(3, "Prompt must be at least 3 characters long").max(1000),
  assetType: label.optional(),
  assetSubtype: label.optional()
});

export const enhancePromptSchema = z.object({
  prompt: z.string().trim().min(3, "Prompt must be at least 3 characters long").max(1000),
  assetType: label.optional(),
  assetSubtype: label.optional()
});

export const suggestionsSchema = z.object({
  category: label,
  style: z.string().trim().max(60).optional(),
  theme: z.string().trim().max(120).optional(),
  count: z.number().int().min(1).max(10).default(5)
});

export const paletteSchema = z.object({
  context: z.string().trim().min(1).max(300),
  count: z.number().int().min(1).max(8).default(4)
});

export type GenerateImageBody = z.infer<typeof generateImageSchema>;
export type EnhancePromptBody = z.infer<typeof enhancePromptSchema>;
export type SuggestionsBody = z.infer<typeof suggestionsSchema>;
export type PaletteBody = z.infer<typeof paletteSchema>;
