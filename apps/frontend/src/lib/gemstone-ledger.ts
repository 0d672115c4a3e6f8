import { logger } from "./logger";
import type { DebitReceipt, GemstoneSource } from "../types/models";

export const DAILY_FREE_GEMSTONES = 5;

export type GemstoneLedger = {
  getBalance: () => Promise<number>;
  /** `null` when the balance cannot cover `amount`; nothing is deducted then. */
  debit: (amount: number) => Promise<DebitReceipt | null>;
  /** Reverses a debit in the source that issued the receipt and returns the new balance. */
  refund: (receipt: DebitReceipt) => Promise<number>;
};

const assertAmount = (amount: number) => {
  if (!Number.isInteger(amount) || amount <= 0) {
    throw new RangeError(`Gemstone amount must be a positive integer, got ${amount}`);
  }
};

// Local ledger: purchased balance plus a daily allowance that is spent first.

export type LedgerStorage = {
  getItem: (key: string) => string | null;
  setItem: (key: string, value: string) => void;
};

export const createMemoryStorage = (): LedgerStorage => {
  const values = new Map<string, string>();
  return {
    getItem: (key) => values.get(key) ?? null,
    setItem: (key, value) => {
      values.set(key, value);
    }
  };
};

const defaultStorage = (): LedgerStorage =>
  typeof localStorage === "undefined" ? createMemoryStorage() : localStorage;

type LocalState = {
  purchased: number;
  dailyUsed: number;
  day: string;
};

const isLocalState = (value: unknown): value is LocalState =>
  typeof value === "object" &&
  value !== null &&
  "purchased" in value &&
  "dailyUsed" in value &&
  "day" in value &&
  typeof value.purchased === "number" &&
  typeof value.dailyUsed === "number" &&
  typeof value.day === "string";

const dayOf = (date: Date) => date.toISOString().slice(0, 10);

const balanceOf = (state: LocalState) => state.purchased + DAILY_FREE_GEMSTONES - state.dailyUsed;

export type LocalLedgerOptions = {
  storage?: LedgerStorage;
  now?: () => Date;
  storageKey?: string;
  initialPurchased?: number;
};

export type LocalGemstoneLedger = GemstoneLedger & {
  credit: (amount: number) => Promise<number>;
};

export const createLocalLedger = ({
  storage = defaultStorage(),
  now = () => new Date(),
  storageKey = "assetcraft-gemstones",
  initialPurchased = 0
}: LocalLedgerOptions = {}): LocalGemstoneLedger => {
  const read = (): LocalState => {
    const today = dayOf(now());
    const raw = storage.getItem(storageKey);
    let stored: unknown = null;
    if (raw) {
      try {
        stored = JSON.parse(raw);
      } catch (error) {
        logger.warn("local_gemstones_corrupt", { error });
      }
    }

    if (!isLocalState(stored)) {
      return { purchased: initialPurchased, dailyUsed: 0, day: today };
    }
    return stored.day === today ? stored : { ...stored, dailyUsed: 0, day: today };
  };

  const write = (state: LocalState) => {
    storage.setItem(storageKey, JSON.stringify(state));
    return balanceOf(state);
  };

  const credit = async (amount: number) => {
    assertAmount(amount);
    const state = read();
    const toDaily = Math.min(amount, state.dailyUsed);
    return write({
      ...state,
      dailyUsed: state.dailyUsed - toDaily,
      purchased: state.purchased + amount - toDaily
    });
  };

  return {
    getBalance: async () => balanceOf(read()),
    debit: async (amount) => {
      assertAmount(amount);
      const state = read();
      if (balanceOf(state) < amount) return null;

      const fromDaily = Math.min(amount, DAILY_FREE_GEMSTONES - state.dailyUsed);
      const balance = write({
        ...state,
        dailyUsed: state.dailyUsed + fromDaily,
        purchased: state.purchased - (amount - fromDaily)
      });
      return { source: "local", amount, balance };
    },
    refund: (receipt) => credit(receipt.amount),
    credit
  };
};

// Remote ledger over the API.

export type RemoteGemstoneApi = {
  getBalance: () => Promise<number>;
  debit: (amount: number) => Promise<{ transactionId: string; balance: number } | null>;
  refund: (transactionId: string) => Promise<{ balance: number; refunded: boolean }>;
};

export const createRemoteLedger = (api: RemoteGemstoneApi): GemstoneLedger => ({
  getBalance: () => api.getBalance(),
  debit: async (amount) => {
    assertAmount(amount);
    const result = await api.debit(amount);
    return result ? { source: "remote", amount, balance: result.balance, transactionId: result.transactionId } : null;
  },
  refund: async (receipt) => {
    if (receipt.source !== "remote") {
      throw new Error("Local receipts cannot be refunded by the remote ledger");
    }
    const { balance } = await api.refund(receipt.transactionId);
    return balance;
  }
});

// Remote first, local when the remote cannot be reached. The source that
// answered an operation owns it; refunds follow the receipt. Errors that
// `canFallBack` rejects are the remote's answer and propagate.

export type FallbackGemstoneLedger = GemstoneLedger & {
  readBalance: () => Promise<{ balance: number; source: GemstoneSource }>;
};

export const createFallbackLedger = ({
  remote,
  local,
  canFallBack
}: {
  remote: GemstoneLedger;
  local: GemstoneLedger;
  canFallBack: (error: unknown) => boolean;
}): FallbackGemstoneLedger => {
  let tail: Promise<void> = Promise.resolve();

  // One ledger operation at a time; each caller still gets its own result or error.
  const exclusive = <T>(operation: () => Promise<T>) => {
    const result = tail.then(operation);
    tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  };

  const readBalance = async () => {
    try {
      return { balance: await remote.getBalance(), source: "remote" as const };
    } catch (error) {
      if (!canFallBack(error)) throw error;
      logger.warn("gemstone_remote_unavailable", { operation: "balance", error });
      return { balance: await local.getBalance(), source: "local" as const };
    }
  };

  return {
    readBalance,
    getBalance: async () => (await readBalance()).balance,
    debit: (amount) =>
      exclusive(async () => {
        try {
          return await remote.debit(amount);
        } catch (error) {
          if (!canFallBack(error)) throw error;
          logger.warn("gemstone_remote_unavailable", { operation: "debit", amount, error });
          return local.debit(amount);
        }
      }),
    refund: (receipt) => exclusive(() => (receipt.source === "remote" ? remote.refund(receipt) : local.refund(receipt)))
  };
};
