import { stockOnHand } from "./availability.js";
import { calculateCraftingCost } from "./cost.js";
import type { CostBreakdown, CostOptions } from "./cost.js";
import type { ItemKey } from "./item-key.js";
import type { PriceSource } from "./pricing.js";
import type { Rarity } from "./rarity.js";
import type { Catalog, InventoryLookup, PriceLookup } from "./types.js";

/** One line of a batch: craft `quantity` of an item at a rarity. */
export interface BatchEntry {
  outputItemId: number;
  targetRarity: Rarity;
  quantity: number;
}

/** Shared settings for every entry; per-entry rarity and quantity come from the entry. */
export type BatchOptions = Omit<CostOptions, "targetRarity" | "quantity"> & {
  locationFilter?: string;
};

/** A component variant's demand summed over the whole batch. */
export interface BatchMaterial {
  itemKey: ItemKey;
  itemId: number;
  name: string;
  rarity: Rarity;
  totalNeeded: number;
  available: number;
  missing: number;
  unitPrice: number;
  priceSource: PriceSource;
  sources: string[];        // locations holding any stock
}

export interface ShoppingListLine {
  itemKey: ItemKey;
  name: string;
  rarity: Rarity;
  quantity: number;
  unitPrice: number;
  cost: number;
}

export interface BatchPlan {
  entries: { entry: BatchEntry; breakdown: CostBreakdown }[];
  materials: BatchMaterial[];
  materialCost: number;
  totalCost: number;
  totalItems: number;
  totalRecipes: number;
  missingCount: number;
  feasible: boolean;
  shoppingList: ShoppingListLine[];
  shoppingCost: number;
}

/**
 * Cost every entry, merge their materials by item key (first-seen order) and
 * check the merged demand against inventory.
 * Errors from any entry (unknown recipe, bad options) abort the whole plan.
 */
export function planBatch(
  entries: readonly BatchEntry[],
  catalog: Catalog,
  getRecentPrices: PriceLookup,
  getInventory: InventoryLookup,
  options: BatchOptions = {},
): BatchPlan {
  const { locationFilter, ...costOptions } = options;
  const costed = entries.map((entry) => ({
    entry,
    breakdown: calculateCraftingCost(
      catalog,
      entry.outputItemId,
      { ...costOptions, targetRarity: entry.targetRarity, quantity: entry.quantity },
      getRecentPrices,
    ),
  }));

  const byKey = new Map<ItemKey, BatchMaterial>();
  for (const { breakdown } of costed) {
    for (const c of breakdown.components) {
      const existing = byKey.get(c.itemKey);
      if (existing) {
        existing.totalNeeded += c.quantityNeeded;
        continue;
      }
      byKey.set(c.itemKey, {
        itemKey: c.itemKey,
        itemId: c.itemId,
        name: c.name,
        rarity: c.requiredRarity,
        totalNeeded: c.quantityNeeded,
        available: 0,
        missing: 0,
        unitPrice: c.unitPrice,
        priceSource: c.priceSource,
        sources: [],
      });
    }
  }

  const materials = [...byKey.values()];
  for (const m of materials) {
    const stock = getInventory(m.itemId, m.rarity);
    m.available = stockOnHand(stock, locationFilter);
    m.missing = Math.max(0, m.totalNeeded - m.available);
    m.sources = [
      ...new Set(
        stock
          .filter((s) => s.quantity > 0 && (locationFilter === undefined || s.location === locationFilter))
          .map((s) => s.location),
      ),
    ];
  }

  const shoppingList: ShoppingListLine[] = materials
    .filter((m) => m.missing > 0)
    .map((m) => ({
      itemKey: m.itemKey,
      name: m.name,
      rarity: m.rarity,
      quantity: m.missing,
      unitPrice: m.unitPrice,
      cost: m.missing * m.unitPrice,
    }));

  return {
    entries: costed,
    materials,
    materialCost: costed.reduce((sum, c) => sum + c.breakdown.materialCost, 0),
    totalCost: costed.reduce((sum, c) => sum + c.breakdown.totalCost, 0),
    totalItems: entries.reduce((sum, e) => sum + e.quantity, 0),
    totalRecipes: entries.length,
    missingCount: shoppingList.length,
    feasible: shoppingList.length === 0,
    shoppingList,
    shoppingCost: shoppingList.reduce((sum, line) => sum + line.cost, 0),
  };
}

/** Plain-text shopping list for the items a batch is short of. */
export function formatShoppingList(plan: BatchPlan): string {
  if (plan.shoppingList.length === 0) return "No missing materials - batch is ready!";
  const lines = plan.shoppingList.map(
    (l) => `- ${l.name} (${l.rarity}): ${l.quantity} @ ${l.unitPrice.toFixed(2)} = ${l.cost.toFixed(2)} gold`,
  );
  return ["Shopping List:", "", ...lines, "", `Total Cost: ${plan.shoppingCost.toFixed(2)} gold`].join("\n");
}
