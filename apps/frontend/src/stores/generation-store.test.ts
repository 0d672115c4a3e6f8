import { afterEach, describe, expect, it, vi } from "vitest";
import { createLocalLedger, createMemoryStorage, type GemstoneLedger } from "../lib/gemstone-ledger";
import { validateImagePayload } from "../lib/image-payload";
import { logger } from "../lib/logger";
import {
  blockerMessages,
  createGenerationStore,
  type GeneratedPayload,
  type GenerationDeps,
  type GenerationStore
} from "./generation-store";

const PNG_HEAD = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];

const pngBytes = (length = 256) => {
  const bytes = new Uint8Array(length);
  bytes.set(PNG_HEAD);
  return bytes;
};

const deferred = <T>() => {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((settle) => {
    resolve = settle;
  });
  return { promise, resolve: (value: T) => resolve(value) };
};

const COMPOSED = "Character, (Hero style), A brave knight, high quality, professional design, clean and modern";

const setup = (overrides: Partial<GenerationDeps> = {}) => {
  const ledger = createLocalLedger({ storage: createMemoryStorage(), now: () => new Date("2024-05-01T12:00:00Z") });
  const balances: string[] = [];
  const generateImage = vi.fn<GenerationDeps["generateImage"]>(async () => ({
    bytes: pngBytes(),
    mimeType: "image/png"
  }));
  const deps: GenerationDeps = {
    ledger,
    generateImage,
    validatePayload: (bytes) => validateImagePayload(bytes, async () => true),
    isAiAvailable: () => true,
    getBalance: () => null,
    onBalanceChange: (balance, source) => {
      balances.push(`${balance} ${source}`);
    },
    ...overrides
  };
  return { store: createGenerationStore(deps), ledger, balances, generateImage };
};

const toPrompt = (store: GenerationStore, prompt = "A brave knight") => {
  const actions = store.getState();
  actions.selectAssetType("Character");
  actions.selectSubtype("Hero");
  actions.continueFromSubtype();
  actions.setPrompt(prompt);
};

afterEach(() => {
  vi.restoreAllMocks();
});

describe("generation store", () => {
  it("debits once and shows the validated image", async () => {
    const { store, ledger, balances, generateImage } = setup();
    toPrompt(store);

    await store.getState().submit();

    const { session } = store.getState();
    expect(session.step).toBe("preview");
    expect(session.error).toBeNull();
    expect(session.image).toMatchObject({ status: "valid", mimeType: "image/png", prompt: COMPOSED });
    expect(generateImage).toHaveBeenCalledWith(
      { prompt: COMPOSED, assetType: "Character", assetSubtype: "Hero" },
      expect.any(AbortSignal)
    );
    expect(await ledger.getBalance()).toBe(4);
    expect(balances).toEqual(["4 local"]);
  });

  it("refunds and returns to the prompt when the generator returns nothing", async () => {
    const { store, ledger, balances } = setup({ generateImage: async () => null });
    toPrompt(store);

    await store.getState().submit();

    expect(store.getState().session).toMatchObject({
      step: "promptInput",
      error: "The generator did not return an image. Please try again.",
      image: null,
      prompt: "A brave knight"
    });
    expect(await ledger.getBalance()).toBe(5);
    expect(balances).toEqual(["4 local", "5 local"]);
  });

  it("reports which ledger answered with each balance change", async () => {
    const remote: GemstoneLedger = {
      getBalance: async () => 10,
      debit: async (amount) => ({ source: "remote", amount, balance: 9, transactionId: "tx-1" }),
      refund: async () => 10
    };
    const { store, balances } = setup({ ledger: remote, generateImage: async () => null });
    toPrompt(store);

    await store.getState().submit();

    expect(balances).toEqual(["9 remote", "10 remote"]);
  });

  it("refunds and shows the error when the generator throws", async () => {
    const { store, ledger } = setup({
      generateImage: async () => {
        throw new Error("model offline");
      }
    });
    toPrompt(store);

    await store.getState().submit();

    expect(store.getState().session).toMatchObject({ step: "promptInput", error: "model offline" });
    expect(await ledger.getBalance()).toBe(5);
  });

  it("refunds when the bytes are not an image", async () => {
    const { store, ledger } = setup({
      generateImage: async () => ({ bytes: new Uint8Array(300), mimeType: "image/png" })
    });
    toPrompt(store);

    await store.getState().submit();

    expect(store.getState().session).toMatchObject({
      step: "promptInput",
      error: "The generated image could not be displayed. Please try again."
    });
    expect(await ledger.getBalance()).toBe(5);
  });

  it("refunds when the bytes do not decode", async () => {
    const { store, ledger } = setup({
      validatePayload: (bytes) => validateImagePayload(bytes, async () => false)
    });
    toPrompt(store);

    await store.getState().submit();

    expect(store.getState().session.error).toBe("The generated image could not be displayed. Please try again.");
    expect(await ledger.getBalance()).toBe(5);
  });

  it("previews a placeholder but gives the gemstone back", async () => {
    const { store, ledger, balances } = setup({
      generateImage: async () => ({ bytes: pngBytes(20), mimeType: "image/png" })
    });
    toPrompt(store);

    await store.getState().submit();

    expect(store.getState().session).toMatchObject({ step: "preview", image: { status: "placeholder" } });
    expect(await ledger.getBalance()).toBe(5);
    expect(balances).toEqual(["4 local", "5 local"]);
  });

  it("ignores a second submit while generating", async () => {
    const gate = deferred<GeneratedPayload | null>();
    const { store, ledger, generateImage } = setup();
    generateImage.mockImplementation(() => gate.promise);
    const debit = vi.spyOn(ledger, "debit");
    toPrompt(store);

    const first = store.getState().submit();
    expect(store.getState().session.step).toBe("generating");
    await store.getState().submit();

    await vi.waitFor(() => expect(generateImage).toHaveBeenCalledTimes(1));
    gate.resolve({ bytes: pngBytes(), mimeType: "image/png" });
    await first;

    expect(debit).toHaveBeenCalledTimes(1);
    expect(generateImage).toHaveBeenCalledTimes(1);
    expect(await ledger.getBalance()).toBe(4);
    expect(store.getState().session.step).toBe("preview");
  });

  it("logs a failed refund and keeps the generation error", async () => {
    const local = createLocalLedger({ storage: createMemoryStorage() });
    const ledger: GemstoneLedger = {
      getBalance: local.getBalance,
      debit: local.debit,
      refund: async () => {
        throw new Error("refund offline");
      }
    };
    const errorLog = vi.spyOn(logger, "error").mockImplementation(() => undefined);
    const { store } = setup({
      ledger,
      generateImage: async () => {
        throw new Error("model offline");
      }
    });
    toPrompt(store);

    await store.getState().submit();

    expect(store.getState().session).toMatchObject({ step: "promptInput", error: "model offline" });
    expect(errorLog).toHaveBeenCalledWith(
      "generation_refund_failed",
      expect.objectContaining({ reason: "request_failed", source: "local", amount: 1 })
    );
  });

  it("stops at the balance check when the debit is refused", async () => {
    const refund = vi.fn(async () => 0);
    const { store, generateImage } = setup({
      ledger: { getBalance: async () => 0, debit: async () => null, refund }
    });
    toPrompt(store);

    await store.getState().submit();

    expect(store.getState().session).toMatchObject({
      step: "promptInput",
      error: blockerMessages.insufficient_gemstones
    });
    expect(generateImage).not.toHaveBeenCalled();
    expect(refund).not.toHaveBeenCalled();
  });

  it("blocks submission before any debit", async () => {
    const cases: Array<[Partial<GenerationDeps>, string, string]> = [
      [{}, "   ", blockerMessages.empty_prompt],
      [{}, "x".repeat(990), blockerMessages.prompt_too_long],
      [{ isAiAvailable: () => false }, "A brave knight", blockerMessages.ai_unavailable],
      [{ getBalance: () => 0 }, "A brave knight", blockerMessages.insufficient_gemstones]
    ];

    for (const [overrides, prompt, message] of cases) {
      const { store, ledger, generateImage } = setup(overrides);
      toPrompt(store, prompt);

      await store.getState().submit();

      expect(store.getState().session).toMatchObject({ step: "promptInput", error: message });
      expect(await ledger.getBalance()).toBe(5);
      expect(generateImage).not.toHaveBeenCalled();
    }
  });

  it("refunds a generation that finishes after the screen is gone", async () => {
    const gate = deferred<GeneratedPayload | null>();
    const { store, ledger, generateImage } = setup();
    generateImage.mockImplementation(() => gate.promise);
    toPrompt(store);

    const pending = store.getState().submit();
    await vi.waitFor(() => expect(generateImage).toHaveBeenCalledTimes(1));
    store.getState().dispose();
    gate.resolve({ bytes: pngBytes(), mimeType: "image/png" });
    await pending;

    expect(generateImage.mock.calls[0]?.[1].aborted).toBe(true);
    expect(store.getState().session.step).toBe("generating");
    expect(await ledger.getBalance()).toBe(5);
  });

  it("ignores actions after dispose", () => {
    const { store } = setup();
    store.getState().dispose();

    store.getState().selectAssetType("Logo");

    expect(store.getState().session.step).toBe("assetTypeSelection");
  });

  it("keeps selections when generating another", async () => {
    const { store } = setup();
    toPrompt(store);
    await store.getState().submit();

    store.getState().generateAnother();
    expect(store.getState().session).toMatchObject({
      step: "promptInput",
      image: null,
      assetType: "Character",
      assetSubtype: "Hero"
    });
  });

  it("clears every selection on start over from the preview", async () => {
    const { store } = setup();
    toPrompt(store);
    await store.getState().submit();

    store.getState().startOver();
    expect(store.getState().session).toMatchObject({ step: "assetTypeSelection", assetType: null, prompt: "" });
  });

  it.each([
    ["picking another asset type", (store: GenerationStore) => store.getState().selectAssetType("Logo")],
    ["starting over", (store: GenerationStore) => store.getState().startOver()]
  ])("keeps the image and the debit when %s while generating", async (_label, interrupt) => {
    const gate = deferred<GeneratedPayload | null>();
    const { store, ledger, generateImage } = setup();
    generateImage.mockImplementation(() => gate.promise);
    toPrompt(store);

    const pending = store.getState().submit();
    await vi.waitFor(() => expect(generateImage).toHaveBeenCalledTimes(1));
    interrupt(store);
    expect(store.getState().session.step).toBe("generating");

    gate.resolve({ bytes: pngBytes(), mimeType: "image/png" });
    await pending;

    expect(store.getState().session).toMatchObject({ step: "preview", assetType: "Character", image: { status: "valid" } });
    expect(await ledger.getBalance()).toBe(4);
  });
});
