import { Router } from "express";
import { authenticatedUserId, requireAuth } from "../middleware/auth.js";
import { generationRateLimit } from "../middleware/rate-limit.js";
import type { ImageGenerationService } from "../services/image-generation.service.js";
import type { SuggestionService } from "../services/suggestion.service.js";
import { enhancePromptSchema, generateImageSchema, paletteSchema, suggestionsSchema } from "./generate.schemas.js";

export const createGenerateRouter = ({
  imageGeneration,
  suggestions
}: {
  imageGeneration: ImageGenerationService;
  suggestions: SuggestionService;
}) => {
  const generateRouter = Router();

  generateRouter.use(requireAuth);
  generateRouter.use(generationRateLimit);

  generateRouter.post("/image", async (req, res) => {
    const body = generateImageSchema.parse(req.body ?? {});
    const generated = await imageGeneration.generate({
      userId: authenticatedUserId(req),
      prompt: body.prompt,
      assetType: body.assetType,
      assetSubtype: body.assetSubtype
    });

    if (!generated) {
      res.status(204).end();
      return;
    }

    res.status(201).json(generated);
  });

  generateRouter.post("/suggestions", async (req, res) => {
    const body = suggestionsSchema.parse(req.body ?? {});
    res.json({
      suggestions: await suggestions.suggestions(body)
    });
  });

  generateRouter.post("/enhance-prompt", async (req, res) => {
    const body = enhancePromptSchema.parse(req.body ?? {});
    res.json({
      prompt: await suggestions.enhance(body),
      original: body.prompt
    });
  });

  generateRouter.post("/palette", async (req, res) => {
    const body = paletteSchema.parse(req.body ?? {});
    res.json({
      palette: await suggestions.palette(body)
    });
  });

  return generateRouter;
};
