import type OpenAI from "openai";
import sharp, { type Metadata } from "sharp";
import { env } from "../config/env.js";
import { logger } from "../observability/logger.js";
import { ApiError, upstreamRejected } from "../utils/errors.js";
import type { GenerationHistoryRepository } from "./history.repository.js";

export type ImageFormat = "png" | "jpeg" | "webp";

export type RawImage = {
  buffer: Buffer;
  model: string;
};

export type ImageModel = {
  generate: (input: { prompt: string; userId: string }) => Promise<RawImage | null>;
};

export type InspectedImage = {
  format: ImageFormat;
  mimeType: string;
  width: number;
  height: number;
};

export type GeneratedImageResponse = InspectedImage & {
  image: string;
  model: string;
};

const mimeTypes: Record<ImageFormat, string> = {
  png: "image/png",
  jpeg: "image/jpeg",
  webp: "image/webp"
};

const isImageFormat = (value: unknown): value is ImageFormat =>
  value === "png" || value === "jpeg" || value === "webp";

const extractOpenAiError = (error: unknown) => {
  const message = error instanceof Error ? error.message : "OpenAI request failed";
  const normalized = message.toLowerCase();
  const status =
    typeof error === "object" && error !== null && "status" in error && typeof error.status === "number"
      ? error.status
      : 0;
  return { message, normalized, status };
};

export const mapOpenAiError = (error: unknown): ApiError => {
  if (error instanceof ApiError) {
    return error;
  }

  const { message, normalized, status } = extractOpenAiError(error);

  if (normalized.includes("billing hard limit") || normalized.includes("insufficient_quota")) {
    return new ApiError(503, "AI provider billing limit reached. Please retry later.");
  }

  if (status === 400 && normalized.includes("safety")) {
    return new ApiError(422, "The prompt was rejected by the content safety filter.");
  }

  if (status === 401) {
    return new ApiError(502, "AI provider authentication failed. Check OPENAI_API_KEY.");
  }

  if (status === 429) {
    return new ApiError(429, "AI provider rate limit reached. Please retry shortly.");
  }

  return new ApiError(502, `AI provider request failed: ${message}`);
};

export const createOpenAiImageModel = (client: () => OpenAI, model = env.OPENAI_IMAGE_MODEL): ImageModel => ({
  generate: async ({ prompt, userId }) => {
    let response;
    try {
      response = await client().images.generate({
        model,
        prompt,
        n: 1,
        size: env.IMAGE_SIZE,
        user: userId
      });
    } catch (error) {
      throw mapOpenAiError(error);
    }

    const first = response.data?.[0];
    if (first?.b64_json) {
      return { buffer: Buffer.from(first.b64_json, "base64"), model };
    }

    if (!first?.url) {
      return null;
    }

    const fetched = await fetch(first.url);
    if (!fetched.ok) {
      throw upstreamRejected("Failed to download generated image");
    }
    return { buffer: Buffer.from(await fetched.arrayBuffer()), model };
  }
});

/**
 * Reads the container header and forces a full decode, so truncated or corrupt
 * payloads are rejected here instead of in the browser. `invalidStatus` is 502
 * for model output and 400 for client uploads.
 */
export const inspectImageBuffer = async (buffer: Buffer, invalidStatus = 502): Promise<InspectedImage> => {
  let metadata: Metadata;
  try {
    metadata = await sharp(buffer).metadata();
    await sharp(buffer).stats();
  } catch (error) {
    throw new ApiError(invalidStatus, "Invalid image payload", {
      reason: error instanceof Error ? error.message : "decode failed",
      byteLength: buffer.length
    });
  }

  if (!isImageFormat(metadata.format) || !metadata.width || !metadata.height) {
    throw new ApiError(invalidStatus, "Unsupported image format", {
      format: metadata.format ?? null,
      byteLength: buffer.length
    });
  }

  return {
    format: metadata.format,
    mimeType: mimeTypes[metadata.format],
    width: metadata.width,
    height: metadata.height
  };
};

export type GenerateImageInput = {
  userId: string;
  prompt: string;
  assetType?: string;
  assetSubtype?: string;
};

export const createImageGenerationService = ({
  imageModel,
  history
}: {
  imageModel: ImageModel;
  history: GenerationHistoryRepository;
}) => ({
  generate: async ({ userId, prompt, assetType, assetSubtype }: GenerateImageInput): Promise<GeneratedImageResponse | null> => {
    const startedAt = Date.now();
    logger.info("generation_started", { userId, assetType: assetType ?? null, promptLength: prompt.length });

    const raw = await imageModel.generate({ prompt, userId });
    if (!raw) {
      logger.warn("generation_empty_payload", { userId });
      return null;
    }

    const inspected = await inspectImageBuffer(raw.buffer);
    const durationMs = Date.now() - startedAt;

    try {
      await history.record({
        userId,
        prompt,
        assetType: assetType ?? null,
        assetSubtype: assetSubtype ?? null,
        durationMs,
        model: raw.model
      });
    } catch (error) {
      logger.error("generation_history_write_failed", { userId, error });
    }

    logger.info("generation_completed", {
      userId,
      durationMs,
      format: inspected.format,
      byteLength: raw.buffer.length
    });

    return {
      ...inspected,
      image: raw.buffer.toString("base64"),
      model: raw.model
    };
  }
});

export type ImageGenerationService = ReturnType<typeof createImageGenerationService>;
