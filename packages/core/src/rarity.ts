/** Item rarity tiers in ascending order, by canonical lowercase name. */
export const RARITIES = [
  "common", "uncommon", "rare", "heroic", "epic", "legendary",
] as const;
export type Rarity = (typeof RARITIES)[number];

export interface RarityInfo {
  displayName: string;
  color: string;   // hex, e.g. "#0070DD"
  rank: number;    // 1 (common) .. 6 (legendary)
}

export const RARITY_INFO: Readonly<Record<Rarity, RarityInfo>> = {
  common:    { displayName: "Common",    color: "#FFFFFF", rank: 1 },
  uncommon:  { displayName: "Uncommon",  color: "#1EFF00", rank: 2 },
  rare:      { displayName: "Rare",      color: "#0070DD", rank: 3 },
  heroic:    { displayName: "Heroic",    color: "#A335EE", rank: 4 },
  epic:      { displayName: "Epic",      color: "#FF8000", rank: 5 },
  legendary: { displayName: "Legendary", color: "#E6CC80", rank: 6 },
};

/**
 * Recipe ingredient kinds.
 * `quality` ingredients must match the rarity being crafted; `basic`
 * ingredients (vendor staples) are always bought at their own base rarity.
 */
export const COMPONENT_TYPES = ["quality", "basic"] as const;
export type ComponentType = (typeof COMPONENT_TYPES)[number];

export function isRarity(value: string): value is Rarity {
  return RARITIES.some((r) => r === value);
}

/**
 * Parse a rarity name, case-insensitively.
 * Empty, missing or unknown names fall back to `"common"`.
 */
export function parseRarity(text: string | null | undefined): Rarity {
  if (!text) return "common";
  const name = text.trim().toLowerCase();
  return isRarity(name) ? name : "common";
}

export function rarityRank(rarity: Rarity): number {
  return RARITY_INFO[rarity].rank;
}

/** Inverse of `rarityRank`. Returns undefined outside 1–6. */
export function rarityFromRank(rank: number): Rarity | undefined {
  return RARITIES.find((r) => RARITY_INFO[r].rank === rank);
}

/** Sort comparator: negative when `a` is the lower tier. */
export function compareRarity(a: Rarity, b: Rarity): number {
  return rarityRank(a) - rarityRank(b);
}

export function displayName(rarity: Rarity): string {
  return RARITY_INFO[rarity].displayName;
}

export function colorOf(rarity: Rarity): string {
  return RARITY_INFO[rarity].color;
}

/** All rarities, lowest first. Returns a fresh array on every call. */
export function allRarities(): Rarity[] {
  return [...RARITIES];
}

/** e.g. "Epic Iron Ingot", or "3x Epic Iron Ingot" with a quantity. */
export function formatWithRarity(name: string, rarity: Rarity, quantity?: number): string {
  const label = `${displayName(rarity)} ${name}`;
  return quantity === undefined ? label : `${quantity}x ${label}`;
}

/**
 * Whether a set of quality components can produce `target`.
 * Every component must be at least the target tier.
 * `qualityRating` is accepted for a future substitution rule and ignored.
 */
export function canCraftRarity(
  componentRarities: readonly Rarity[],
  target: Rarity,
  _qualityRating = 0,
): boolean {
  if (componentRarities.length === 0) return false;
  return componentRarities.every((r) => compareRarity(r, target) >= 0);
}

/**
 * Rarity of a crafted item: the lowest of its quality components.
 * `qualityRating` is accepted and ignored, as in `canCraftRarity`.
 */
export function craftingResultRarity(
  qualityRarities: readonly Rarity[],
  _qualityRating = 0,
): Rarity {
  let result: Rarity | undefined;
  for (const r of qualityRarities) {
    if (result === undefined || compareRarity(r, result) < 0) result = r;
  }
  return result ?? "common";
}

const BASIC_TYPE_MARKERS = ["paper", "ink", "thread", "flux", "solvent"];

/**
 * Guess a component type from raw item data that doesn't carry one.
 * Profession items are quality; consumable staples (paper, ink, …) are basic.
 */
export function componentTypeFromItem(item: { profession?: string | null; type?: string }): ComponentType {
  if (item.profession) return "quality";
  const type = (item.type ?? "").toLowerCase();
  if (BASIC_TYPE_MARKERS.some((marker) => type.includes(marker))) return "basic";
  return "quality";
}
