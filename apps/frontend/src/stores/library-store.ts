import { create } from "zustand";
import { assetsApi } from "../api/assets";
import { apiErrorMessage } from "../api/http";
import { encodeBase64 } from "../lib/image-payload";
import type { AssetRecord, GeneratedImage } from "../types/models";

type SaveInput = {
  image: GeneratedImage;
  assetType: string | null;
  assetSubtype: string | null;
};

type LibraryState = {
  assets: AssetRecord[];
  loading: boolean;
  error: string | null;
  fetchAssets: () => Promise<void>;
  saveAsset: (input: SaveInput) => Promise<AssetRecord>;
  toggleFavorite: (assetId: string) => Promise<void>;
  deleteAsset: (assetId: string) => Promise<void>;
};

const replace = (assets: AssetRecord[], asset: AssetRecord) =>
  assets.map((item) => (item.id === asset.id ? asset : item));

export const useLibraryStore = create<LibraryState>((set, get) => ({
  assets: [],
  loading: false,
  error: null,
  fetchAssets: async () => {
    set({ loading: true, error: null });
    try {
      set({ assets: await assetsApi.list(), loading: false });
    } catch (error) {
      set({ loading: false, error: apiErrorMessage(error, "Could not load your library.") });
    }
  },
  saveAsset: async ({ image, assetType, assetSubtype }) => {
    if (image.status !== "valid") {
      throw new Error("Placeholder images cannot be saved to the library.");
    }
    const asset = await assetsApi.save({
      prompt: image.prompt,
      image: encodeBase64(image.bytes),
      assetType: assetType ?? undefined,
      assetSubtype: assetSubtype ?? undefined
    });
    set((state) => ({ assets: [asset, ...state.assets.filter((item) => item.id !== asset.id)] }));
    return asset;
  },
  toggleFavorite: async (assetId) => {
    const current = get().assets.find((item) => item.id === assetId);
    if (!current) return;
    try {
      const asset = await assetsApi.setFavorite(assetId, !current.isFavorite);
      set((state) => ({ assets: replace(state.assets, asset) }));
    } catch (error) {
      set({ error: apiErrorMessage(error, "Could not update the favorite.") });
    }
  },
  deleteAsset: async (assetId) => {
    try {
      await assetsApi.remove(assetId);
      set((state) => ({ assets: state.assets.filter((item) => item.id !== assetId) }));
    } catch (error) {
      set({ error: apiErrorMessage(error, "Could not delete the asset.") });
    }
  }
}));
