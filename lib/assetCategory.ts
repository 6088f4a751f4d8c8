export const ASSET_CATEGORIES = ["character", "environment", "ui", "prop"] as const;

export type AssetCategory = (typeof ASSET_CATEGORIES)[number];
