/**
 * Fixture builders and an in-memory world (catalog + price history +
 * inventory) standing in for the data store.
 */
import { encodeItemKey } from "../../index.js";
import type {
  Catalog,
  CostSources,
  InventoryEntry,
  InventoryLookup,
  Item,
  ItemKey,
  MarketPrice,
  PriceLookup,
  Rarity,
  Recipe,
  RecipeComponent,
} from "../../index.js";

export function makeItem(overrides?: Partial<Item>): Item {
  return {
    id: 1,
    name: "Iron Ore",
    type: "ore",
    rarity: "common",
    level: 0,
    profession: null,
    ...overrides,
  };
}

export function makeComponent(overrides?: Partial<RecipeComponent>): RecipeComponent {
  return {
    itemId: 1,
    quantity: 1,
    componentType: "quality",
    isOptional: false,
    ...overrides,
  };
}

export function makeRecipe(overrides?: Partial<Recipe>): Recipe {
  return {
    outputItemId: 100,
    profession: "Blacksmith",
    levelRequired: 0,
    baseCraftingFee: 0,
    components: [],
    ...overrides,
  };
}

export function makePrice(price: number, overrides?: Partial<MarketPrice>): MarketPrice {
  return {
    price,
    source: "market",
    rarity: "common",
    recordedAt: "2026-01-01T00:00:00.000Z",
    ...overrides,
  };
}

export interface WorldData {
  items?: Item[];
  recipes?: Recipe[];
  /** Price history per item key, most recent first. */
  prices?: Record<ItemKey, MarketPrice[]>;
  inventory?: Record<ItemKey, InventoryEntry[]>;
}

export interface World {
  catalog: Catalog;
  sources: CostSources;
  getRecentPrices: PriceLookup;
  getInventory: InventoryLookup;
  /** Every (itemId, rarity, lookbackDays) the engine asked prices for. */
  priceQueries: [number, Rarity, number][];
}

export function makeWorld(data: WorldData): World {
  const items = new Map((data.items ?? []).map((i) => [i.id, i]));
  const recipes = new Map((data.recipes ?? []).map((r) => [r.outputItemId, r]));
  const priceQueries: [number, Rarity, number][] = [];

  const catalog: Catalog = {
    getRecipe: (id) => recipes.get(id),
    getItem: (id) => items.get(id),
  };
  const getRecentPrices: PriceLookup = (itemId, rarity, lookbackDays) => {
    priceQueries.push([itemId, rarity, lookbackDays]);
    return data.prices?.[encodeItemKey(itemId, rarity)] ?? [];
  };
  const getInventory: InventoryLookup = (itemId, rarity) =>
    data.inventory?.[encodeItemKey(itemId, rarity)] ?? [];

  return {
    catalog,
    sources: { getItem: catalog.getItem, getRecentPrices },
    getRecentPrices,
    getInventory,
    priceQueries,
  };
}
