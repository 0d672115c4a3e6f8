import { z } from "zod";

export const debitSchema = z.object({
  amount: z.number().int().min(1).max(100).default(1)
});

export const refundSchema = z.object({
  transactionId: z.string().uuid()
});
