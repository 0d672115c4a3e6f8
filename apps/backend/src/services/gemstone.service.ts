import { randomUUID } from "crypto";
import type { SupabaseClient } from "@supabase/supabase-js";
import { z } from "zod";
import { logger } from "../observability/logger.js";
import { insufficientGemstones, notFound, storeUnavailable } from "../utils/errors.js";

export const STARTING_GEMSTONES = 10;
export const DAILY_FREE_GEMSTONES = 5;
export const FREE_GRANT_INTERVAL_MS = 24 * 60 * 60 * 1000;

export type DebitResult = {
  transactionId: string;
  balance: number;
};

export type RefundResult = {
  balance: number;
  refunded: boolean;
};

export type GemstoneRepository = {
  getBalance: (userId: string) => Promise<number>;
  /** Check-and-decrement as one step; `null` when the balance is short. */
  debit: (userId: string, amount: number) => Promise<DebitResult | null>;
  /** `null` when the transaction does not exist for this user. */
  refund: (userId: string, transactionId: string) => Promise<RefundResult | null>;
};

const balanceRowSchema = z.array(z.object({ balance: z.number().int() })).min(1);
const debitRowSchema = z.array(z.object({ transaction_id: z.string().nullable(), balance: z.number().int() })).min(1);
const refundRowSchema = z.array(z.object({ balance: z.number().int().nullable(), refunded: z.boolean() })).min(1);

const rpcFailure = (operation: string, error: { message: string; code?: string }) => {
  logger.error("gemstone_rpc_failed", { operation, message: error.message, code: error.code ?? null });
  return storeUnavailable("Gemstone ledger");
};

export const createSupabaseGemstoneRepository = (client: SupabaseClient): GemstoneRepository => ({
  getBalance: async (userId) => {
    const { data, error } = await client.rpc("get_gemstone_balance", { p_user_id: userId });
    if (error) throw rpcFailure("get_balance", error);
    return balanceRowSchema.parse(data)[0].balance;
  },
  debit: async (userId, amount) => {
    const { data, error } = await client.rpc("debit_gemstones", { p_user_id: userId, p_amount: amount });
    if (error) throw rpcFailure("debit", error);
    const [row] = debitRowSchema.parse(data);
    return row.transaction_id ? { transactionId: row.transaction_id, balance: row.balance } : null;
  },
  refund: async (userId, transactionId) => {
    const { data, error } = await client.rpc("refund_gemstones", {
      p_user_id: userId,
      p_transaction_id: transactionId
    });
    if (error) throw rpcFailure("refund", error);
    const [row] = refundRowSchema.parse(data);
    return row.balance === null ? null : { balance: row.balance, refunded: row.refunded };
  }
});

type Transaction = {
  userId: string;
  amount: number;
  refunded: boolean;
};

type Account = {
  balance: number;
  lastFreeGrant: number;
};

/**
 * Mirrors the SQL functions: an account opens with the starting balance and its grant clock set,
 * and every read or debit first tops it up by the daily free gemstones once the interval has passed.
 */
export const createInMemoryGemstoneRepository = (
  initial: Record<string, number> = {},
  options: { now?: () => number } = {}
): GemstoneRepository => {
  const now = options.now ?? Date.now;
  const opened = now();
  const accounts = new Map<string, Account>(
    Object.entries(initial).map(([userId, balance]) => [userId, { balance, lastFreeGrant: opened }])
  );
  const transactions = new Map<string, Transaction>();

  const accountOf = (userId: string) => {
    let account = accounts.get(userId);
    if (!account) {
      account = { balance: STARTING_GEMSTONES, lastFreeGrant: now() };
      accounts.set(userId, account);
    }
    return account;
  };

  const grantDue = (userId: string) => {
    const account = accountOf(userId);
    const at = now();
    if (at - account.lastFreeGrant >= FREE_GRANT_INTERVAL_MS) {
      account.balance += DAILY_FREE_GEMSTONES;
      account.lastFreeGrant = at;
      logger.info("gemstone_daily_grant", { userId, amount: DAILY_FREE_GEMSTONES, balance: account.balance });
    }
    return account;
  };

  return {
    getBalance: async (userId) => grantDue(userId).balance,
    debit: async (userId, amount) => {
      const account = grantDue(userId);
      if (account.balance < amount) return null;
      const transactionId = randomUUID();
      account.balance -= amount;
      transactions.set(transactionId, { userId, amount, refunded: false });
      return { transactionId, balance: account.balance };
    },
    refund: async (userId, transactionId) => {
      const transaction = transactions.get(transactionId);
      if (!transaction || transaction.userId !== userId) return null;
      const account = accountOf(userId);
      if (transaction.refunded) return { balance: account.balance, refunded: false };
      transaction.refunded = true;
      account.balance += transaction.amount;
      return { balance: account.balance, refunded: true };
    }
  };
};

export const createGemstoneService = (repository: GemstoneRepository) => ({
  getBalance: (userId: string) => repository.getBalance(userId),
  debit: async (userId: string, amount: number) => {
    const result = await repository.debit(userId, amount);
    if (!result) {
      const balance = await repository.getBalance(userId);
      logger.info("gemstone_debit_declined", { userId, amount, balance });
      throw insufficientGemstones(amount, balance);
    }
    logger.info("gemstone_debited", { userId, amount, transactionId: result.transactionId, balance: result.balance });
    return result;
  },
  refund: async (userId: string, transactionId: string) => {
    const result = await repository.refund(userId, transactionId);
    if (!result) {
      throw notFound("Gemstone transaction");
    }
    if (result.refunded) {
      logger.info("gemstone_refunded", { userId, transactionId, balance: result.balance });
    } else {
      logger.warn("gemstone_refund_repeated", { userId, transactionId });
    }
    return result;
  }
});

export type GemstoneService = ReturnType<typeof createGemstoneService>;
