import { rarityFromRank, rarityRank } from "./rarity.js";
import type { Rarity } from "./rarity.js";

/**
 * Serialized (item id, rarity) pair: `"<itemId>_<rank>"`, e.g. `"123_5"`
 * for an epic item 123. Rarity variants of one item are priced and stocked
 * separately, so every price or inventory lookup goes through a key.
 */
export type ItemKey = string;

export interface DecodedItemKey {
  itemId: number;
  rarity: Rarity;
}

const ITEM_KEY_RE = /^(\d+)_(\d+)$/;

/** Fallback returned by `decodeItemKey` for malformed keys. */
export const INVALID_ITEM_KEY: Readonly<DecodedItemKey> = { itemId: 0, rarity: "common" };

export function encodeItemKey(itemId: number, rarity: Rarity): ItemKey {
  return `${itemId}_${rarityRank(rarity)}`;
}

function tryDecode(key: string): DecodedItemKey | undefined {
  const m = ITEM_KEY_RE.exec(key);
  if (!m) return undefined;
  const itemId = Number(m[1]);
  const rarity = rarityFromRank(Number(m[2]));
  if (!Number.isSafeInteger(itemId) || rarity === undefined) return undefined;
  return { itemId, rarity };
}

/**
 * Decode a key produced by `encodeItemKey`.
 *
 * Malformed keys do NOT throw: they decode to `INVALID_ITEM_KEY`
 * (item 0, common). Existing override tables depend on this lenient
 * behaviour, but it hides typos; use `isItemKey` at input boundaries to
 * catch them.
 */
export function decodeItemKey(key: string): DecodedItemKey {
  return tryDecode(key) ?? { ...INVALID_ITEM_KEY };
}

export function isItemKey(key: string): boolean {
  return tryDecode(key) !== undefined;
}
