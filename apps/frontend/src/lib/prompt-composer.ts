export const QUALITY_MODIFIERS = "high quality, professional design, clean and modern";

/** Longest composed prompt the generate endpoint accepts. */
export const MAX_PROMPT_LENGTH = 1000;

export type PromptParts = {
  assetType?: string | null;
  assetSubtype?: string | null;
  colors?: readonly string[];
  colorCount?: number | null;
  userText: string;
};

const colorClause = (colors: readonly string[], colorCount: number | null | undefined) => {
  const named = colors.map((color) => color.trim()).filter((color) => color.length > 0);
  if (named.length === 1) return `using ${named[0]} color`;
  if (named.length > 1) return `using colors: ${named.join(", ")}`;
  if (colorCount && colorCount > 0) return `using ${colorCount} colors`;
  return "";
};

export const composePrompt = ({ assetType, assetSubtype, colors = [], colorCount, userText }: PromptParts) => {
  const type = assetType?.trim() ?? "";
  const subtype = assetSubtype?.trim() ?? "";

  return [
    type,
    subtype && subtype !== type ? `(${subtype} style)` : "",
    userText.trim(),
    colorClause(colors, colorCount),
    QUALITY_MODIFIERS
  ]
    .filter((part) => part.length > 0)
    .join(", ");
};
