import { logger } from "./logger";
import type { ImageFormat } from "../types/models";

/** Payloads this small are stub output from test or mock generators, not real images. */
export const PLACEHOLDER_THRESHOLD_BYTES = 100;

const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];
const JPEG_SIGNATURE = [0xff, 0xd8, 0xff];
const RIFF = [0x52, 0x49, 0x46, 0x46];
const WEBP = [0x57, 0x45, 0x42, 0x50];

export const MIME_TYPES: Record<ImageFormat, string> = {
  png: "image/png",
  jpeg: "image/jpeg",
  webp: "image/webp"
};

const startsWith = (bytes: Uint8Array, signature: number[], offset = 0) =>
  bytes.length >= offset + signature.length && signature.every((value, index) => bytes[offset + index] === value);

export const toHex = (bytes: Uint8Array) =>
  Array.from(bytes, (value) => value.toString(16).padStart(2, "0")).join(" ");

export type PayloadDiagnostics = {
  byteLength: number;
  head: string;
  tail: string;
};

export const describeBytes = (bytes: Uint8Array): PayloadDiagnostics => ({
  byteLength: bytes.length,
  head: toHex(bytes.subarray(0, 16)),
  tail: toHex(bytes.subarray(Math.max(0, bytes.length - 16)))
});

/** Container sniffing only; each format needs just its own signature length. */
export const detectImageFormat = (bytes: Uint8Array): ImageFormat | null => {
  if (startsWith(bytes, PNG_SIGNATURE)) return "png";
  if (startsWith(bytes, JPEG_SIGNATURE)) return "jpeg";
  if (startsWith(bytes, RIFF) && startsWith(bytes, WEBP, 8)) return "webp";
  return null;
};

export type SignatureCheck =
  | { ok: true; format: ImageFormat }
  | { ok: false; reason: "too small" | "unrecognized signature"; diagnostics: PayloadDiagnostics };

export const checkImageSignature = (bytes: Uint8Array): SignatureCheck => {
  if (bytes.length < 8) {
    return { ok: false, reason: "too small", diagnostics: describeBytes(bytes) };
  }

  const format = detectImageFormat(bytes);
  if (!format) {
    return { ok: false, reason: "unrecognized signature", diagnostics: describeBytes(bytes) };
  }

  return { ok: true, format };
};

export type DecodeCheck = (bytes: Uint8Array, mimeType: string) => Promise<boolean>;

export const browserDecodeCheck: DecodeCheck = async (bytes, mimeType) => {
  if (typeof createImageBitmap !== "function") {
    logger.warn("image_decode_check_unavailable");
    return false;
  }

  try {
    const bitmap = await createImageBitmap(new Blob([bytes.slice()], { type: mimeType }));
    bitmap.close();
    return true;
  } catch (error) {
    logger.debug("image_decode_check_failed", { mimeType, error });
    return false;
  }
};

export type PayloadValidation =
  | { status: "valid"; format: ImageFormat; mimeType: string }
  | { status: "placeholder"; format: ImageFormat; mimeType: string }
  | { status: "invalid"; reason: string; diagnostics: PayloadDiagnostics };

export const validateImagePayload = async (
  bytes: Uint8Array,
  canDecode: DecodeCheck = browserDecodeCheck
): Promise<PayloadValidation> => {
  const signature = checkImageSignature(bytes);
  if (!signature.ok) {
    logger.warn("image_payload_rejected", { reason: signature.reason, ...signature.diagnostics });
    return { status: "invalid", reason: signature.reason, diagnostics: signature.diagnostics };
  }

  const mimeType = MIME_TYPES[signature.format];
  if (bytes.length < PLACEHOLDER_THRESHOLD_BYTES) {
    return { status: "placeholder", format: signature.format, mimeType };
  }

  if (!(await canDecode(bytes, mimeType))) {
    const diagnostics = describeBytes(bytes);
    logger.warn("image_payload_rejected", { reason: "decode failed", format: signature.format, ...diagnostics });
    return { status: "invalid", reason: "decode failed", diagnostics };
  }

  return { status: "valid", format: signature.format, mimeType };
};

export const decodeBase64 = (value: string) => Uint8Array.from(atob(value), (char) => char.charCodeAt(0));

export const encodeBase64 = (bytes: Uint8Array) => {
  let binary = "";
  for (let offset = 0; offset < bytes.length; offset += 0x8000) {
    binary += String.fromCharCode(...bytes.subarray(offset, offset + 0x8000));
  }
  return btoa(binary);
};
