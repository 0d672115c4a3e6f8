export type AssetIcon = "person" | "landscape" | "widgets" | "category" | "texture" | "star" | "wallpaper" | "inventory";

export type AssetSubtypeDescriptor = {
  label: string;
  needsColor: boolean;
};

export type AssetTypeDescriptor = {
  key: string;
  label: string;
  description: string;
  icon: AssetIcon;
  subtypes: readonly AssetSubtypeDescriptor[];
};

const subtype = (label: string, needsColor = false): AssetSubtypeDescriptor => ({ label, needsColor });

export const ASSET_CATALOG: readonly AssetTypeDescriptor[] = [
  {
    key: "character",
    label: "Character",
    description: "Create NPCs, heroes, and creatures",
    icon: "person",
    subtypes: [subtype("Hero"), subtype("Villain"), subtype("NPC"), subtype("Creature"), subtype("Mascot", true)]
  },
  {
    key: "environment",
    label: "Environment",
    description: "Build worlds and landscapes",
    icon: "landscape",
    subtypes: [subtype("Landscape"), subtype("Interior"), subtype("Cityscape"), subtype("Dungeon")]
  },
  {
    key: "ui_element",
    label: "UI Element",
    description: "Design interface components",
    icon: "widgets",
    subtypes: [subtype("Button", true), subtype("Panel", true), subtype("Health Bar", true), subtype("Menu")]
  },
  {
    key: "icon",
    label: "Icon",
    description: "Craft symbols and indicators",
    icon: "category",
    subtypes: [subtype("App Icon", true), subtype("Item Icon"), subtype("Skill Icon"), subtype("Badge", true)]
  },
  {
    key: "texture",
    label: "Texture",
    description: "Generate materials and patterns",
    icon: "texture",
    subtypes: [subtype("Seamless Tile"), subtype("Material"), subtype("Pattern", true)]
  },
  {
    key: "logo",
    label: "Logo",
    description: "Design brand identities",
    icon: "star",
    subtypes: [subtype("Logo only", true), subtype("Logo + Name", true), subtype("Name only", true)]
  },
  {
    key: "background",
    label: "Background",
    description: "Set the scene behind your content",
    icon: "wallpaper",
    subtypes: [subtype("Gradient", true), subtype("Scenic"), subtype("Abstract", true)]
  },
  {
    key: "object",
    label: "Object",
    description: "Model props, items, and gear",
    icon: "inventory",
    subtypes: [subtype("Weapon"), subtype("Furniture"), subtype("Vehicle"), subtype("Treasure")]
  }
];

export const COLOR_COUNT_OPTIONS = [1, 2, 3, 4] as const;

export const findAssetType = (label: string | null) =>
  ASSET_CATALOG.find((descriptor) => descriptor.label === label) ?? null;

export const subtypesFor = (assetType: string | null) => findAssetType(assetType)?.subtypes ?? [];

export const needsColor = (assetType: string | null, assetSubtype: string | null) =>
  subtypesFor(assetType).some((entry) => entry.label === assetSubtype && entry.needsColor);
