import type { SupabaseClient } from "@supabase/supabase-js";
import { ApiError } from "../utils/errors.js";

export type GenerationHistoryEntry = {
  userId: string;
  prompt: string;
  assetType: string | null;
  assetSubtype: string | null;
  durationMs: number;
  model: string;
};

export type GenerationHistoryRepository = {
  record: (entry: GenerationHistoryEntry) => Promise<void>;
};

export const createSupabaseHistoryRepository = (client: SupabaseClient): GenerationHistoryRepository => ({
  record: async (entry) => {
    const { error } = await client.from("generation_history").insert({
      user_id: entry.userId,
      prompt: entry.prompt,
      asset_type: entry.assetType,
      asset_subtype: entry.assetSubtype,
      generation_time_ms: entry.durationMs,
      model: entry.model,
      cost_in_gemstones: 1
    });

    if (error) {
      throw new ApiError(500, "Failed to record generation history", { code: error.code });
    }
  }
});

export const createInMemoryHistoryRepository = () => {
  const entries: GenerationHistoryEntry[] = [];
  const repository: GenerationHistoryRepository = {
    record: async (entry) => {
      entries.push(entry);
    }
  };
  return { repository, entries };
};
