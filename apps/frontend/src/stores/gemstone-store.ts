import { create } from "zustand";
import { gemstonesApi } from "../api/gemstones";
import { isServerUnreachable } from "../api/http";
import { createFallbackLedger, createLocalLedger, createRemoteLedger } from "../lib/gemstone-ledger";
import { logger } from "../lib/logger";
import type { GemstoneSource } from "../types/models";

export const gemstoneLedger = createFallbackLedger({
  remote: createRemoteLedger(gemstonesApi),
  local: createLocalLedger(),
  canFallBack: isServerUnreachable
});

type GemstoneState = {
  balance: number | null;
  source: GemstoneSource | null;
  refresh: () => Promise<void>;
  setBalance: (balance: number, source: GemstoneSource) => void;
};

export const useGemstoneStore = create<GemstoneState>((set) => ({
  balance: null,
  source: null,
  refresh: async () => {
    try {
      const { balance, source } = await gemstoneLedger.readBalance();
      set({ balance, source });
    } catch (error) {
      logger.error("gemstone_balance_failed", { error });
    }
  },
  setBalance: (balance, source) => {
    set({ balance, source });
  }
}));
