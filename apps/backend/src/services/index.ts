import { s3ImageStore } from "../lib/s3.js";
import { getOpenAi, isAiConfigured } from "../lib/openai.js";
import { supabase } from "../lib/supabase.js";
import type { ApiServices } from "../routes/index.js";
import { createAssetService, createSupabaseAssetRepository } from "./asset.service.js";
import { createGemstoneService, createSupabaseGemstoneRepository } from "./gemstone.service.js";
import { createSupabaseHistoryRepository } from "./history.repository.js";
import { createImageGenerationService, createOpenAiImageModel } from "./image-generation.service.js";
import { createOpenAiTextModel, createSuggestionService } from "./suggestion.service.js";

export const createProductionServices = (): ApiServices => ({
  imageGeneration: createImageGenerationService({
    imageModel: createOpenAiImageModel(getOpenAi),
    history: createSupabaseHistoryRepository(supabase)
  }),
  suggestions: createSuggestionService({
    textModel: createOpenAiTextModel(getOpenAi)
  }),
  gemstones: createGemstoneService(createSupabaseGemstoneRepository(supabase)),
  assets: createAssetService({
    repository: createSupabaseAssetRepository(supabase),
    images: s3ImageStore
  }),
  isAiAvailable: isAiConfigured
});
