import { Router } from "express";
import { authenticatedUserId, requireAuth } from "../middleware/auth.js";
import type { AssetService } from "../services/asset.service.js";
import { assetParamsSchema, favoriteSchema, saveAssetSchema } from "./asset.schemas.js";

export const createAssetsRouter = ({ assets }: { assets: AssetService }) => {
  const assetsRouter = Router();

  assetsRouter.use(requireAuth);

  assetsRouter.get("/", async (req, res) => {
    res.json({
      assets: await assets.list(authenticatedUserId(req))
    });
  });

  assetsRouter.post("/", async (req, res) => {
    const body = saveAssetSchema.parse(req.body ?? {});
    const asset = await assets.save({
      userId: authenticatedUserId(req),
      prompt: body.prompt,
      image: Buffer.from(body.image, "base64"),
      assetType: body.assetType,
      assetSubtype: body.assetSubtype,
      tags: body.tags
    });
    res.status(201).json({ asset });
  });

  assetsRouter.patch("/:id/favorite", async (req, res) => {
    const { id } = assetParamsSchema.parse(req.params);
    const { isFavorite } = favoriteSchema.parse(req.body ?? {});
    res.json({
      asset: await assets.setFavorite(authenticatedUserId(req), id, isFavorite)
    });
  });

  assetsRouter.delete("/:id", async (req, res) => {
    const { id } = assetParamsSchema.parse(req.params);
    await assets.remove(authenticatedUserId(req), id);
    res.json({ success: true });
  });

  return assetsRouter;
};
