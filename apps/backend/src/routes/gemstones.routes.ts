import { Router } from "express";
import { authenticatedUserId, requireAuth } from "../middleware/auth.js";
import type { GemstoneService } from "../services/gemstone.service.js";
import { debitSchema, refundSchema } from "./gemstone.schemas.js";

export const createGemstonesRouter = ({ gemstones }: { gemstones: GemstoneService }) => {
  const gemstonesRouter = Router();

  gemstonesRouter.use(requireAuth);

  gemstonesRouter.get("/", async (req, res) => {
    res.json({
      balance: await gemstones.getBalance(authenticatedUserId(req))
    });
  });

  gemstonesRouter.post("/debit", async (req, res) => {
    const { amount } = debitSchema.parse(req.body ?? {});
    const result = await gemstones.debit(authenticatedUserId(req), amount);
    res.status(201).json(result);
  });

  gemstonesRouter.post("/refund", async (req, res) => {
    const { transactionId } = refundSchema.parse(req.body ?? {});
    res.json(await gemstones.refund(authenticatedUserId(req), transactionId));
  });

  return gemstonesRouter;
};
