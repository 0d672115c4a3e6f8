import { describe, expect, it } from "vitest";
import { ASSET_CATALOG } from "../constants/assetCatalog";
import {
  allColorsSelected,
  beginGeneration,
  canLeaveSubtypeSelection,
  completeGeneration,
  continueFromColors,
  continueFromSubtype,
  createSession,
  failGeneration,
  generateAnother,
  goBack,
  selectAssetType,
  selectColorCount,
  selectSubtype,
  setColor,
  setPrompt,
  startOver,
  submitBlocker
} from "./generation-machine";
import type { GeneratedImage, GenerationSession } from "../types/models";

const image: GeneratedImage = {
  bytes: new Uint8Array([1, 2, 3]),
  mimeType: "image/png",
  status: "valid",
  prompt: "a knight"
};

const logoWithColors = (count: number) =>
  continueFromSubtype(selectColorCount(selectSubtype(selectAssetType(createSession(), "Logo"), "Logo only"), count));

const heroAtPrompt = (prompt = "a knight") =>
  setPrompt(continueFromSubtype(selectSubtype(selectAssetType(createSession(), "Character"), "Hero")), prompt);

describe("generation machine", () => {
  it("starts at asset type selection with nothing chosen", () => {
    expect(createSession()).toEqual({
      step: "assetTypeSelection",
      assetType: null,
      assetSubtype: null,
      colorCount: null,
      colors: [],
      prompt: "",
      image: null,
      error: null
    });
  });

  it("routes every catalog subtype to color input only when it needs color", () => {
    for (const descriptor of ASSET_CATALOG) {
      for (const entry of descriptor.subtypes) {
        let session = selectSubtype(selectAssetType(createSession(), descriptor.label), entry.label);

        if (entry.needsColor) {
          expect(canLeaveSubtypeSelection(session)).toBe(false);
          session = selectColorCount(session, 2);
          expect(continueFromSubtype(session).step).toBe("colorInput");
        } else {
          expect(continueFromSubtype(session).step).toBe("promptInput");
        }
      }
    }
  });

  it("ignores a color count for subtypes without color", () => {
    const session = selectSubtype(selectAssetType(createSession(), "Character"), "Hero");
    expect(selectColorCount(session, 3)).toBe(session);
  });

  it("leaves color input only when every slot has a non-blank value", () => {
    let session = logoWithColors(3);
    expect(session.colors).toEqual(["", "", ""]);

    session = setColor(setColor(session, 0, "Red"), 2, "Blue");
    expect(allColorsSelected(session)).toBe(false);
    expect(continueFromColors(session).step).toBe("colorInput");

    session = setColor(session, 1, "   ");
    expect(allColorsSelected(session)).toBe(false);

    session = setColor(session, 1, "Green");
    expect(allColorsSelected(session)).toBe(true);
    expect(continueFromColors(session)).toMatchObject({ step: "promptInput", colors: ["Red", "Green", "Blue"] });
  });

  it("ignores color slots that do not exist", () => {
    const session = logoWithColors(2);
    expect(setColor(session, 2, "Red")).toBe(session);
    expect(setColor(session, -1, "Red")).toBe(session);
  });

  it("clears downstream choices when the asset type changes but keeps the prompt", () => {
    const atPrompt = setPrompt(continueFromColors(setColor(logoWithColors(1), 0, "Gold")), "a crown");

    expect(selectAssetType(atPrompt, "Icon")).toEqual({
      ...createSession(),
      step: "assetSubtypeSelection",
      assetType: "Icon",
      prompt: "a crown"
    });
  });

  it("keeps the asset type when the subtype changes", () => {
    const session = selectColorCount(selectSubtype(selectAssetType(createSession(), "Logo"), "Logo only"), 2);
    expect(selectSubtype(session, "Name only")).toMatchObject({
      assetType: "Logo",
      assetSubtype: "Name only",
      colorCount: null,
      colors: []
    });
  });

  it("steps back through the wizard", () => {
    const colorPrompt = continueFromColors(setColor(logoWithColors(1), 0, "Gold"));
    expect(goBack(colorPrompt).step).toBe("colorInput");
    expect(goBack(heroAtPrompt()).step).toBe("assetSubtypeSelection");
    expect(goBack(goBack(heroAtPrompt())).step).toBe("assetTypeSelection");
    expect(goBack(logoWithColors(1)).step).toBe("assetSubtypeSelection");

    const generating = beginGeneration(heroAtPrompt());
    expect(goBack(generating)).toBe(generating);
  });

  describe("submitBlocker", () => {
    const ready = { aiAvailable: true, balance: 3 };

    it("allows a filled prompt with service and balance", () => {
      expect(submitBlocker(heroAtPrompt(), ready)).toBeNull();
    });

    it("reports the first failing guard", () => {
      expect(submitBlocker(createSession(), ready)).toBe("not_ready");
      expect(submitBlocker(heroAtPrompt("   "), ready)).toBe("empty_prompt");
      expect(submitBlocker(heroAtPrompt(), { aiAvailable: false, balance: 3 })).toBe("ai_unavailable");
      expect(submitBlocker(heroAtPrompt(), { aiAvailable: true, balance: 0 })).toBe("insufficient_gemstones");
    });

    it("blocks composed prompts longer than the generator accepts", () => {
      expect(submitBlocker(heroAtPrompt("x".repeat(922)), ready)).toBeNull();
      expect(submitBlocker(heroAtPrompt("x".repeat(923)), ready)).toBe("prompt_too_long");
    });

    it("defers to the debit when the balance is unknown", () => {
      expect(submitBlocker(heroAtPrompt(), { aiAvailable: true, balance: null })).toBeNull();
    });
  });

  it("returns to the prompt with an error when generation fails", () => {
    const failed = failGeneration(beginGeneration(heroAtPrompt()), "boom");
    expect(failed).toMatchObject({ step: "promptInput", error: "boom", image: null, prompt: "a knight" });
  });

  it("generates another from the preview without losing selections", () => {
    const preview = completeGeneration(beginGeneration(heroAtPrompt()), image);
    expect(preview).toMatchObject({ step: "preview", image });

    const again: GenerationSession = generateAnother(preview);
    expect(again).toMatchObject({
      step: "promptInput",
      image: null,
      error: null,
      assetType: "Character",
      assetSubtype: "Hero",
      prompt: "a knight"
    });
  });

  it("starts over from the preview with an empty session", () => {
    const preview = completeGeneration(beginGeneration(heroAtPrompt()), image);
    expect(startOver(preview)).toEqual(createSession());
  });

  it("only starts over from the preview", () => {
    const atPrompt = heroAtPrompt();
    expect(startOver(atPrompt)).toBe(atPrompt);
  });

  it("holds the generating step against type picks and start over", () => {
    const generating = beginGeneration(heroAtPrompt());
    expect(selectAssetType(generating, "Logo")).toBe(generating);
    expect(startOver(generating)).toBe(generating);
  });

  it("ignores outcomes that arrive outside generating", () => {
    const session = heroAtPrompt();
    expect(completeGeneration(session, image)).toBe(session);
    expect(failGeneration(session, "late")).toBe(session);
  });
});
