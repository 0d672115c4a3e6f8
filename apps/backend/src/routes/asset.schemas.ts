import { z } from "zod";

const MAX_IMAGE_BASE64_LENGTH = 14 * 1024 * 1024;

export const saveAssetSchema = z.object({
  prompt: z.string().trim().min(1).max(1000),
  image: z.string().min(1).max(MAX_IMAGE_BASE64_LENGTH),
  assetType: z.string().trim().min(1).max(60).optional(),
  assetSubtype: z.string().trim().min(1).max(60).optional(),
  tags: z.array(z.string().trim().min(1).max(40)).max(20).default([])
});

export const assetParamsSchema = z.object({
  id: z.string().uuid()
});

export const favoriteSchema = z.object({
  isFavorite: z.boolean()
});
