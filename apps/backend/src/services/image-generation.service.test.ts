import sharp from "sharp";
import { describe, expect, it } from "vitest";
import { createInMemoryHistoryRepository, type GenerationHistoryRepository } from "./history.repository.js";
import { createImageGenerationService, inspectImageBuffer, mapOpenAiError, type ImageModel } from "./image-generation.service.js";

const solidImage = (width: number, height: number) =>
  sharp({ create: { width, height, channels: 3, background: { r: 200, g: 40, b: 90 } } });

const modelReturning = (buffer: Buffer | null): ImageModel => ({
  generate: async () => (buffer ? { buffer, model: "test-image-model" } : null)
});

describe("inspectImageBuffer", () => {
  it("reports format and dimensions of a PNG", async () => {
    const png = await solidImage(4, 3).png().toBuffer();

    expect(await inspectImageBuffer(png)).toEqual({ format: "png", mimeType: "image/png", width: 4, height: 3 });
  });

  it("maps JPEG to its mime type", async () => {
    const jpeg = await solidImage(2, 2).jpeg().toBuffer();

    expect(await inspectImageBuffer(jpeg)).toMatchObject({ format: "jpeg", mimeType: "image/jpeg" });
  });

  it("rejects bytes that are not an image", async () => {
    await expect(inspectImageBuffer(Buffer.from("definitely not an image"))).rejects.toMatchObject({
      statusCode: 502,
      message: "Invalid image payload"
    });
  });

  it("uses the caller's status for invalid uploads", async () => {
    await expect(inspectImageBuffer(Buffer.from("nope"), 400)).rejects.toMatchObject({ statusCode: 400 });
  });

  it("rejects decodable formats outside png, jpeg and webp", async () => {
    const gif = await solidImage(2, 2).gif().toBuffer();

    await expect(inspectImageBuffer(gif)).rejects.toMatchObject({
      statusCode: 502,
      message: "Unsupported image format",
      details: { format: "gif" }
    });
  });
});

describe("mapOpenAiError", () => {
  it("maps provider rate limits to 429", () => {
    const error = Object.assign(new Error("Rate limit exceeded"), { status: 429 });
    expect(mapOpenAiError(error).statusCode).toBe(429);
  });

  it("maps safety rejections to 422", () => {
    const error = Object.assign(new Error("Request was rejected by the safety system"), { status: 400 });
    expect(mapOpenAiError(error).statusCode).toBe(422);
  });

  it("wraps anything else as a 502", () => {
    const mapped = mapOpenAiError(new Error("socket hang up"));
    expect(mapped.statusCode).toBe(502);
    expect(mapped.message).toBe("AI provider request failed: socket hang up");
  });
});

describe("image generation service", () => {
  it("returns the base64 image and records history", async () => {
    const png = await solidImage(8, 8).png().toBuffer();
    const { repository, entries } = createInMemoryHistoryRepository();
    const service = createImageGenerationService({ imageModel: modelReturning(png), history: repository });

    const result = await service.generate({
      userId: "user-1",
      prompt: "A brave knight",
      assetType: "Character",
      assetSubtype: "Hero"
    });

    expect(result).toEqual({
      format: "png",
      mimeType: "image/png",
      width: 8,
      height: 8,
      image: png.toString("base64"),
      model: "test-image-model"
    });
    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({
      userId: "user-1",
      prompt: "A brave knight",
      assetType: "Character",
      assetSubtype: "Hero",
      model: "test-image-model"
    });
  });

  it("returns null when the model yields no payload", async () => {
    const { repository, entries } = createInMemoryHistoryRepository();
    const service = createImageGenerationService({ imageModel: modelReturning(null), history: repository });

    expect(await service.generate({ userId: "user-1", prompt: "Empty" })).toBeNull();
    expect(entries).toHaveLength(0);
  });

  it("still returns the image when history cannot be written", async () => {
    const png = await solidImage(2, 2).png().toBuffer();
    const history: GenerationHistoryRepository = {
      record: async () => {
        throw new Error("history offline");
      }
    };
    const service = createImageGenerationService({ imageModel: modelReturning(png), history });

    const result = await service.generate({ userId: "user-1", prompt: "Offline history" });

    expect(result?.image).toBe(png.toString("base64"));
  });

  it("rejects corrupt model output with 502", async () => {
    const { repository } = createInMemoryHistoryRepository();
    const service = createImageGenerationService({
      imageModel: modelReturning(Buffer.from("corrupt")),
      history: repository
    });

    await expect(service.generate({ userId: "user-1", prompt: "Corrupt" })).rejects.toMatchObject({ statusCode: 502 });
  });
});
