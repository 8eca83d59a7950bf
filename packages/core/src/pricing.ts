import { encodeItemKey } from "./item-key.js";
import type { Rarity } from "./rarity.js";
import type { MarketPrice, PriceOverrides } from "./types.js";

/** Where a unit price came from: an override, a market record, or nowhere. */
export type PriceSource = "custom" | `market_${string}` | "no_data";

export interface ResolvedPrice {
  unitPrice: number;
  source: PriceSource;
}

/**
 * Pick the unit price for one component variant.
 *
 * 1. An override for the (item, rarity) key wins outright.
 * 2. Otherwise the first (most recent) market record of that rarity.
 * 3. Otherwise `0` tagged `"no_data"`. A zero here means "unknown", not "free".
 */
export function resolvePrice(
  componentItemId: number,
  requiredRarity: Rarity,
  overrides: PriceOverrides,
  recentMarketPrices: readonly MarketPrice[],
): ResolvedPrice {
  const key = encodeItemKey(componentItemId, requiredRarity);
  const custom = overrides[key];
  if (custom !== undefined) {
    return { unitPrice: custom, source: "custom" };
  }

  const latest = recentMarketPrices.find((p) => p.rarity === requiredRarity);
  if (latest) {
    return { unitPrice: latest.price, source: `market_${latest.source}` };
  }

  return { unitPrice: 0, source: "no_data" };
}
