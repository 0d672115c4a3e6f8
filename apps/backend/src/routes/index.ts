import { Router } from "express";
import { requireAuth } from "../middleware/auth.js";
import type { AssetService } from "../services/asset.service.js";
import type { GemstoneService } from "../services/gemstone.service.js";
import type { ImageGenerationService } from "../services/image-generation.service.js";
import type { SuggestionService } from "../services/suggestion.service.js";
import { createAssetsRouter } from "./assets.routes.js";
import { createGemstonesRouter } from "./gemstones.routes.js";
import { createGenerateRouter } from "./generate.routes.js";

export type ApiServices = {
  imageGeneration: ImageGenerationService;
  suggestions: SuggestionService;
  gemstones: GemstoneService;
  assets: AssetService;
  isAiAvailable: () => boolean;
};

export const createApiRouter = (services: ApiServices) => {
  const apiRouter = Router();

  apiRouter.get("/status", requireAuth, (_req, res) => {
    const available = services.isAiAvailable();
    res.json({
      imageGeneration: available,
      suggestions: available
    });
  });

  apiRouter.use("/generate", createGenerateRouter(services));
  apiRouter.use("/gemstones", createGemstonesRouter(services));
  apiRouter.use("/assets", createAssetsRouter(services));

  return apiRouter;
};
