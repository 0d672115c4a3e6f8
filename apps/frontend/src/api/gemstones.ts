import { apiClient, isHttpStatus } from "./http";
import type { RemoteGemstoneApi } from "../lib/gemstone-ledger";

export const gemstonesApi: RemoteGemstoneApi = {
  getBalance: async () => {
    const { data } = await apiClient.get<{ balance: number }>("/gemstones");
    return data.balance;
  },
  debit: async (amount) => {
    try {
      const { data } = await apiClient.post<{ transactionId: string; balance: number }>("/gemstones/debit", { amount });
      return data;
    } catch (error) {
      if (isHttpStatus(error, 402)) return null;
      throw error;
    }
  },
  refund: async (transactionId) => {
    const { data } = await apiClient.post<{ balance: number; refunded: boolean }>("/gemstones/refund", {
      transactionId
    });
    return data;
  }
};
