import { apiClient } from "./http";
import type { AssetRecord, SaveAssetRequest } from "../types/models";

export const assetsApi = {
  list: async () => {
    const { data } = await apiClient.get<{ assets: AssetRecord[] }>("/assets");
    return data.assets;
  },
  save: async (payload: SaveAssetRequest) => {
    const { data } = await apiClient.post<{ asset: AssetRecord }>("/assets", payload);
    return data.asset;
  },
  setFavorite: async (assetId: string, isFavorite: boolean) => {
    const { data } = await apiClient.patch<{ asset: AssetRecord }>(`/assets/${assetId}/favorite`, { isFavorite });
    return data.asset;
  },
  remove: async (assetId: string) => {
    await apiClient.delete(`/assets/${assetId}`);
  }
};
