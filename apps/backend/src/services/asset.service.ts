import { randomUUID } from "crypto";
import type { SupabaseClient } from "@supabase/supabase-js";
import { z } from "zod";
import type { ImageStore } from "../lib/s3.js";
import { logger } from "../observability/logger.js";
import { notFound, storeUnavailable } from "../utils/errors.js";
import { inspectImageBuffer } from "./image-generation.service.js";

export type AssetRow = {
  id: string;
  userId: string;
  prompt: string;
  imagePath: string;
  mimeType: string;
  assetType: string | null;
  assetSubtype: string | null;
  status: "ready";
  isFavorite: boolean;
  tags: string[];
  createdAt: string;
};

export type NewAssetRow = Omit<AssetRow, "id" | "createdAt" | "status" | "isFavorite">;

export type AssetRepository = {
  insert: (row: NewAssetRow) => Promise<AssetRow>;
  listForUser: (userId: string) => Promise<AssetRow[]>;
  findForUser: (id: string, userId: string) => Promise<AssetRow | null>;
  setFavorite: (id: string, userId: string, isFavorite: boolean) => Promise<AssetRow | null>;
  remove: (id: string, userId: string) => Promise<void>;
};

export type AssetResponse = Omit<AssetRow, "imagePath" | "mimeType"> & {
  imageUrl: string;
};

const assetRowSchema = z.object({
  id: z.string(),
  user_id: z.string(),
  prompt: z.string(),
  image_path: z.string(),
  mime_type: z.string(),
  asset_type: z.string().nullable(),
  asset_subtype: z.string().nullable(),
  is_favorite: z.boolean(),
  tags: z.array(z.string()).nullable(),
  created_at: z.string()
});

const toAssetRow = (value: unknown): AssetRow => {
  const row = assetRowSchema.parse(value);
  return {
    id: row.id,
    userId: row.user_id,
    prompt: row.prompt,
    imagePath: row.image_path,
    mimeType: row.mime_type,
    assetType: row.asset_type,
    assetSubtype: row.asset_subtype,
    status: "ready",
    isFavorite: row.is_favorite,
    tags: row.tags ?? [],
    createdAt: row.created_at
  };
};

const storageFailure = (operation: string, error: { message: string; code?: string }) => {
  logger.error("asset_query_failed", { operation, message: error.message, code: error.code ?? null });
  return storeUnavailable("Asset library");
};

export const createSupabaseAssetRepository = (client: SupabaseClient): AssetRepository => ({
  insert: async (row) => {
    const { data, error } = await client
      .from("user_assets")
      .insert({
        user_id: row.userId,
        prompt: row.prompt,
        image_path: row.imagePath,
        mime_type: row.mimeType,
        asset_type: row.assetType,
        asset_subtype: row.assetSubtype,
        tags: row.tags
      })
      .select()
      .single();
    if (error) throw storageFailure("insert", error);
    return toAssetRow(data);
  },
  listForUser: async (userId) => {
    const { data, error } = await client
      .from("user_assets")
      .select()
      .eq("user_id", userId)
      .order("created_at", { ascending: false });
    if (error) throw storageFailure("list", error);
    return z.array(z.unknown()).parse(data).map(toAssetRow);
  },
  findForUser: async (id, userId) => {
    const { data, error } = await client.from("user_assets").select().eq("id", id).eq("user_id", userId).maybeSingle();
    if (error) throw storageFailure("find", error);
    return data ? toAssetRow(data) : null;
  },
  setFavorite: async (id, userId, isFavorite) => {
    const { data, error } = await client
      .from("user_assets")
      .update({ is_favorite: isFavorite, updated_at: new Date().toISOString() })
      .eq("id", id)
      .eq("user_id", userId)
      .select()
      .maybeSingle();
    if (error) throw storageFailure("set_favorite", error);
    return data ? toAssetRow(data) : null;
  },
  remove: async (id, userId) => {
    const { error } = await client.from("user_assets").delete().eq("id", id).eq("user_id", userId);
    if (error) throw storageFailure("remove", error);
  }
});

export const createInMemoryAssetRepository = (): AssetRepository => {
  const rows = new Map<string, AssetRow>();
  let clock = 0;

  return {
    insert: async (row) => {
      clock += 1;
      const saved: AssetRow = {
        ...row,
        id: randomUUID(),
        status: "ready",
        isFavorite: false,
        createdAt: new Date(Date.UTC(2024, 0, 1, 0, 0, clock)).toISOString()
      };
      rows.set(saved.id, saved);
      return saved;
    },
    listForUser: async (userId) =>
      [...rows.values()].filter((row) => row.userId === userId).sort((a, b) => b.createdAt.localeCompare(a.createdAt)),
    findForUser: async (id, userId) => {
      const row = rows.get(id);
      return row && row.userId === userId ? row : null;
    },
    setFavorite: async (id, userId, isFavorite) => {
      const row = rows.get(id);
      if (!row || row.userId !== userId) return null;
      const updated = { ...row, isFavorite };
      rows.set(id, updated);
      return updated;
    },
    remove: async (id, userId) => {
      const row = rows.get(id);
      if (row && row.userId === userId) rows.delete(id);
    }
  };
};

export const deriveAssetTags = (assetType: string | undefined, assetSubtype: string | undefined, extra: string[] = []) => {
  const tags = [assetType, assetSubtype, ...extra]
    .map((tag) => tag?.trim().toLowerCase() ?? "")
    .filter((tag) => tag.length > 0);
  return [...new Set(tags)];
};

const extensionFor = (mimeType: string) => (mimeType === "image/jpeg" ? "jpg" : mimeType.replace("image/", ""));

export type SaveAssetInput = {
  userId: string;
  prompt: string;
  image: Buffer;
  assetType?: string;
  assetSubtype?: string;
  tags?: string[];
};

export const createAssetService = ({ repository, images }: { repository: AssetRepository; images: ImageStore }) => {
  const toResponse = async (row: AssetRow): Promise<AssetResponse> => ({
    id: row.id,
    userId: row.userId,
    prompt: row.prompt,
    assetType: row.assetType,
    assetSubtype: row.assetSubtype,
    status: row.status,
    isFavorite: row.isFavorite,
    tags: row.tags,
    createdAt: row.createdAt,
    imageUrl: await images.url(row.imagePath)
  });

  const insertOrDiscard = async (row: NewAssetRow) => {
    try {
      return await repository.insert(row);
    } catch (error) {
      // The object was written first, so it has no row pointing at it yet.
      try {
        await images.remove(row.imagePath);
      } catch (cleanupError) {
        logger.error("asset_object_cleanup_failed", {
          userId: row.userId,
          imagePath: row.imagePath,
          error: cleanupError
        });
      }
      throw error;
    }
  };

  return {
    save: async (input: SaveAssetInput) => {
      const inspected = await inspectImageBuffer(input.image, 400);
      const imagePath = `assets/${input.userId}/${randomUUID()}.${extensionFor(inspected.mimeType)}`;
      await images.put(imagePath, input.image, inspected.mimeType);

      const row = await insertOrDiscard({
        userId: input.userId,
        prompt: input.prompt,
        imagePath,
        mimeType: inspected.mimeType,
        assetType: input.assetType ?? null,
        assetSubtype: input.assetSubtype ?? null,
        tags: deriveAssetTags(input.assetType, input.assetSubtype, input.tags)
      });

      logger.info("asset_saved", { userId: input.userId, assetId: row.id, imagePath });
      return toResponse(row);
    },
    list: async (userId: string) => {
      const rows = await repository.listForUser(userId);
      return Promise.all(rows.map(toResponse));
    },
    setFavorite: async (userId: string, id: string, isFavorite: boolean) => {
      const row = await repository.setFavorite(id, userId, isFavorite);
      if (!row) {
        throw notFound("Asset");
      }
      return toResponse(row);
    },
    remove: async (userId: string, id: string) => {
      const row = await repository.findForUser(id, userId);
      if (!row) {
        throw notFound("Asset");
      }
      await repository.remove(id, userId);
      try {
        await images.remove(row.imagePath);
      } catch (error) {
        logger.warn("asset_object_delete_failed", { userId, assetId: id, imagePath: row.imagePath, error });
      }
      logger.info("asset_deleted", { userId, assetId: id });
    }
  };
};

export type AssetService = ReturnType<typeof createAssetService>;
