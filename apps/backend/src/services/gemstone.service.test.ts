import { randomUUID } from "crypto";
import { describe, expect, it } from "vitest";
import { ApiError } from "../utils/errors.js";
import {
  DAILY_FREE_GEMSTONES,
  FREE_GRANT_INTERVAL_MS,
  STARTING_GEMSTONES,
  createGemstoneService,
  createInMemoryGemstoneRepository
} from "./gemstone.service.js";

describe("gemstone service", () => {
  it("starts unknown users at the default balance", async () => {
    const service = createGemstoneService(createInMemoryGemstoneRepository());
    expect(await service.getBalance("new-user")).toBe(STARTING_GEMSTONES);
  });

  it("debits and reports the remaining balance", async () => {
    const service = createGemstoneService(createInMemoryGemstoneRepository({ "user-1": 2 }));

    const result = await service.debit("user-1", 1);

    expect(result.balance).toBe(1);
    expect(result.transactionId).toMatch(/^[0-9a-f-]{36}$/);
    expect(await service.getBalance("user-1")).toBe(1);
  });

  it("rejects a debit larger than the balance without changing it", async () => {
    const service = createGemstoneService(createInMemoryGemstoneRepository({ "user-1": 1 }));

    const attempt = service.debit("user-1", 2);

    await expect(attempt).rejects.toBeInstanceOf(ApiError);
    await expect(attempt).rejects.toMatchObject({
      statusCode: 402,
      message: "Insufficient gemstones",
      details: { required: 2, balance: 1 }
    });
    expect(await service.getBalance("user-1")).toBe(1);
  });

  it("refunds a transaction exactly once", async () => {
    const service = createGemstoneService(createInMemoryGemstoneRepository({ "user-1": 3 }));
    const { transactionId } = await service.debit("user-1", 2);

    expect(await service.refund("user-1", transactionId)).toEqual({ balance: 3, refunded: true });
    expect(await service.refund("user-1", transactionId)).toEqual({ balance: 3, refunded: false });
    expect(await service.getBalance("user-1")).toBe(3);
  });

  it("does not refund another user's transaction", async () => {
    const service = createGemstoneService(createInMemoryGemstoneRepository({ "user-1": 3, "user-2": 3 }));
    const { transactionId } = await service.debit("user-1", 1);

    await expect(service.refund("user-2", transactionId)).rejects.toMatchObject({ statusCode: 404 });
    expect(await service.getBalance("user-2")).toBe(3);
  });

  it("returns 404 for unknown transactions", async () => {
    const service = createGemstoneService(createInMemoryGemstoneRepository());

    await expect(service.refund("user-1", randomUUID())).rejects.toMatchObject({
      statusCode: 404,
      message: "Gemstone transaction not found"
    });
  });

  describe("daily free gemstones", () => {
    const clock = (start: number) => {
      let at = start;
      return {
        now: () => at,
        advance: (ms: number) => {
          at += ms;
        }
      };
    };

    it("waits a full interval after the account opens", async () => {
      const time = clock(1_000_000);
      const service = createGemstoneService(createInMemoryGemstoneRepository({}, { now: time.now }));

      expect(await service.getBalance("user-1")).toBe(STARTING_GEMSTONES);
      time.advance(FREE_GRANT_INTERVAL_MS - 1);
      expect(await service.getBalance("user-1")).toBe(STARTING_GEMSTONES);
      time.advance(1);
      expect(await service.getBalance("user-1")).toBe(STARTING_GEMSTONES + DAILY_FREE_GEMSTONES);
    });

    it("grants once per interval however often the balance is read", async () => {
      const time = clock(0);
      const service = createGemstoneService(createInMemoryGemstoneRepository({ "user-1": 2 }, { now: time.now }));

      time.advance(FREE_GRANT_INTERVAL_MS);
      expect(await service.getBalance("user-1")).toBe(7);
      expect(await service.getBalance("user-1")).toBe(7);
      time.advance(FREE_GRANT_INTERVAL_MS / 2);
      expect(await service.getBalance("user-1")).toBe(7);
      time.advance(FREE_GRANT_INTERVAL_MS / 2);
      expect(await service.getBalance("user-1")).toBe(12);
    });

    it("applies a due grant before checking a debit", async () => {
      const time = clock(0);
      const service = createGemstoneService(createInMemoryGemstoneRepository({ "user-1": 0 }, { now: time.now }));

      await expect(service.debit("user-1", 1)).rejects.toMatchObject({ statusCode: 402 });
      time.advance(FREE_GRANT_INTERVAL_MS);

      const result = await service.debit("user-1", 1);

      expect(result.balance).toBe(DAILY_FREE_GEMSTONES - 1);
    });
  });
});
