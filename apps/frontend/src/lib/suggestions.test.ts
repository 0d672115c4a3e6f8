import { describe, expect, it, vi } from "vitest";
import {
  fallbackPalettes,
  fallbackSuggestions,
  loadEnhancedPrompt,
  loadPalette,
  loadSuggestions,
  randomFallbackPalette,
  randomFallbackPrompt
} from "./suggestions";

describe("fallback suggestions", () => {
  it("prefers the subtype list over the category list", () => {
    expect(fallbackSuggestions("Logo", "Logo only")).toEqual([
      "A minimalist mountain peak emblem",
      "An abstract interlocking circles symbol",
      "A geometric fox head mark"
    ]);
  });

  it("matches categories case-insensitively", () => {
    expect(fallbackSuggestions("Logo")).toHaveLength(5);
    expect(fallbackSuggestions(" UI Element ")[0]).toBe("A sleek modern button with gradient");
  });

  it("uses the default list for unknown categories", () => {
    expect(fallbackSuggestions("Spaceship", "Cruiser")[0]).toBe("A creative and unique design");
  });

  it("picks uniformly from the list", () => {
    expect(randomFallbackPrompt("Logo", "Logo only", () => 0)).toBe("A minimalist mountain peak emblem");
    expect(randomFallbackPrompt("Logo", "Logo only", () => 0.5)).toBe("An abstract interlocking circles symbol");
    expect(randomFallbackPrompt("Logo", "Logo only", () => 1)).toBe("A geometric fox head mark");
  });

  it("ships ten palettes of fully described colors", () => {
    const palettes = fallbackPalettes();
    expect(palettes).toHaveLength(10);
    for (const palette of palettes) {
      expect(palette.length).toBeGreaterThan(0);
      for (const entry of palette) {
        expect(Object.keys(entry).sort()).toEqual(["cmyk", "hex", "name", "rgb"]);
      }
    }
    expect(randomFallbackPalette(() => 0)[0]).toEqual({
      name: "Midnight Navy",
      hex: "#1B2A49",
      rgb: "rgb(27, 42, 73)",
      cmyk: "cmyk(63%, 42%, 0%, 71%)"
    });
  });
});

describe("loadSuggestions", () => {
  it("returns remote suggestions when there are any", async () => {
    expect(await loadSuggestions(async () => ["A glowing rune circle"], "Icon")).toEqual({
      source: "remote",
      items: ["A glowing rune circle"]
    });
  });

  it("falls back when the call throws or comes back empty", async () => {
    const failing = vi.fn(async (): Promise<string[]> => {
      throw new Error("offline");
    });

    expect(await loadSuggestions(failing, "Logo", "Logo only")).toMatchObject({
      source: "fallback",
      items: ["A minimalist mountain peak emblem", "An abstract interlocking circles symbol", "A geometric fox head mark"]
    });
    expect((await loadSuggestions(async () => [], "Icon")).items[0]).toBe("A simple flat icon with bold colors");
  });
});

describe("loadPalette", () => {
  it("returns the remote palette when there is one", async () => {
    const palette = [{ name: "Ember", hex: "#FF5500" }];
    expect(await loadPalette(async () => palette)).toEqual({ source: "remote", items: palette });
  });

  it("falls back to a curated palette", async () => {
    const result = await loadPalette(async () => {
      throw new Error("offline");
    }, () => 0);

    expect(result.source).toBe("fallback");
    expect(result.items.map((entry) => entry.name)).toEqual(["Midnight Navy", "Coral Glow", "Soft Sand"]);
  });
});

describe("loadEnhancedPrompt", () => {
  it("uses the enhanced text when there is one", async () => {
    expect(await loadEnhancedPrompt(async () => "  A knight at dawn  ", "a knight")).toEqual({
      source: "remote",
      prompt: "A knight at dawn"
    });
  });

  it("keeps the original when enhancement fails or is blank", async () => {
    const failing = async (): Promise<string> => {
      throw new Error("offline");
    };

    expect(await loadEnhancedPrompt(failing, "a knight")).toEqual({ source: "fallback", prompt: "a knight" });
    expect(await loadEnhancedPrompt(async () => "   ", "a knight")).toEqual({ source: "fallback", prompt: "a knight" });
  });
});
