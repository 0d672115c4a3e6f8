import { apiClient } from "./http";
import type { AiStatus, GenerateImageRequest, GenerateImageResponse, PaletteEntry } from "../types/models";

export const generationApi = {
  getStatus: async () => {
    const { data } = await apiClient.get<AiStatus>("/status");
    return data;
  },
  /** `null` when the model answered without an image (HTTP 204). */
  generateImage: async (payload: GenerateImageRequest, signal?: AbortSignal) => {
    const response = await apiClient.post<GenerateImageResponse | "">("/generate/image", payload, { signal });
    return response.status === 204 || !response.data ? null : response.data;
  },
  getSuggestions: async (payload: { category: string; style?: string; theme?: string; count?: number }) => {
    const { data } = await apiClient.post<{ suggestions: string[] }>("/generate/suggestions", payload);
    return data.suggestions;
  },
  enhancePrompt: async (payload: { prompt: string; assetType?: string; assetSubtype?: string }) => {
    const { data } = await apiClient.post<{ prompt: string; original: string }>("/generate/enhance-prompt", payload);
    return data.prompt;
  },
  generatePalette: async (payload: { context: string; count?: number }) => {
    const { data } = await apiClient.post<{ palette: PaletteEntry[] }>("/generate/palette", payload);
    return data.palette;
  }
};
