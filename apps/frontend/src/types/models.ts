export type User = {
  id: string;
  email: string | null;
};

export type GenerationStep =
  | "assetTypeSelection"
  | "assetSubtypeSelection"
  | "colorInput"
  | "promptInput"
  | "generating"
  | "preview";

export type ImageFormat = "png" | "jpeg" | "webp";

export type GeneratedImage = {
  bytes: Uint8Array;
  mimeType: string;
  status: "valid" | "placeholder";
  prompt: string;
};

export type GenerationSession = {
  step: GenerationStep;
  assetType: string | null;
  assetSubtype: string | null;
  colorCount: number | null;
  colors: string[];
  prompt: string;
  image: GeneratedImage | null;
  error: string | null;
};

export type PaletteEntry = {
  hex?: string;
  rgb?: string;
  cmyk?: string;
  name?: string;
};

export type AiStatus = {
  imageGeneration: boolean;
  suggestions: boolean;
};

export type GenerateImageRequest = {
  prompt: string;
  assetType?: string;
  assetSubtype?: string;
};

export type GenerateImageResponse = {
  format: ImageFormat;
  mimeType: string;
  width: number;
  height: number;
  image: string;
  model: string;
};

export type AssetRecord = {
  id: string;
  userId: string;
  prompt: string;
  imageUrl: string;
  assetType: string | null;
  assetSubtype: string | null;
  status: "ready";
  isFavorite: boolean;
  tags: string[];
  createdAt: string;
};

export type SaveAssetRequest = {
  prompt: string;
  image: string;
  assetType?: string;
  assetSubtype?: string;
  tags?: string[];
};

export type GemstoneSource = "remote" | "local";

export type DebitReceipt =
  | { source: "remote"; amount: number; balance: number; transactionId: string }
  | { source: "local"; amount: number; balance: number };
