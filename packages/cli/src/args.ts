/**
 * Argument parsers for commander options and arguments.
 * They throw commander's InvalidArgumentError so commander reports the
 * offending option itself.
 */
import { InvalidArgumentError } from "commander";
import { RARITIES, decodeItemKey, encodeItemKey, isItemKey, isRarity } from "@craftcalc/core";
import type { BatchEntry, ItemKey, Rarity } from "@craftcalc/core";

export function parseItemId(value: string): number {
  if (!/^\d+$/.test(value)) throw new InvalidArgumentError("Not an item id.");
  return Number(value);
}

export function parseInteger(value: string): number {
  if (!/^-?\d+$/.test(value)) throw new InvalidArgumentError("Not an integer.");
  return Number(value);
}

export function parseNumber(value: string): number {
  const n = Number(value);
  if (value.trim() === "" || !Number.isFinite(n)) throw new InvalidArgumentError("Not a number.");
  return n;
}

export interface ParsedOverrides {
  overrides: Record<ItemKey, number>;
  /** Keys that didn't decode and were applied to item 0 (common). */
  malformedKeys: string[];
}

/**
 * Parse `<itemId>_<rank>=<price>` pairs.
 * A malformed key is kept but re-keyed to the decoder's fallback (item 0,
 * common) and reported in `malformedKeys`.
 */
export function parseOverrides(pairs: readonly string[]): ParsedOverrides {
  const overrides: Record<ItemKey, number> = {};
  const malformedKeys: string[] = [];
  for (const pair of pairs) {
    const sep = pair.lastIndexOf("=");
    if (sep < 0) throw new InvalidArgumentError(`Expected <itemId>_<rank>=<price>, got "${pair}".`);
    const rawKey = pair.slice(0, sep).trim();
    const price = parseNumber(pair.slice(sep + 1));
    if (!isItemKey(rawKey)) malformedKeys.push(rawKey);
    const { itemId, rarity } = decodeItemKey(rawKey);
    overrides[encodeItemKey(itemId, rarity)] = price;
  }
  return { overrides, malformedKeys };
}

/** Parse `<itemId>[:<rarity>[:<quantity>]]`, e.g. `1201:epic:5`. */
export function parseBatchEntry(value: string, defaultRarity: Rarity = "common"): BatchEntry {
  const [id, rarity, quantity, ...rest] = value.split(":");
  if (rest.length > 0) throw new InvalidArgumentError(`Too many fields in "${value}".`);
  return {
    outputItemId: parseItemId(id),
    targetRarity: rarity ? parseRarityArg(rarity) : defaultRarity,
    quantity: quantity === undefined ? 1 : parseInteger(quantity),
  };
}

/** Strict rarity option: unlike `parseRarity`, unknown names are an error here. */
export function parseRarityArg(value: string): Rarity {
  const name = value.trim().toLowerCase();
  if (!isRarity(name)) throw new InvalidArgumentError(`Expected one of: ${RARITIES.join(", ")}.`);
  return name;
}

/** Location filter: a blank name means every location. */
export function parseLocationFilter(value: string): string | undefined {
  const name = value.trim();
  return name === "" ? undefined : name;
}
