import { existsSync, readFileSync, writeFileSync } from "node:fs";
import {
  DataFileSchema,
  ItemNotFoundError,
  compareRarity,
  StoredInventoryEntrySchema,
  StoredMarketPriceSchema,
} from "@craftcalc/core";
import type {
  Catalog,
  DataFile,
  InventoryEntry,
  InventoryLookup,
  Item,
  MarketPrice,
  PriceLookup,
  Rarity,
  Recipe,
  StoredInventoryEntry,
  StoredMarketPrice,
} from "@craftcalc/core";

const DAY_MS = 24 * 60 * 60 * 1000;

export interface PriceRecord {
  itemId: number;
  rarity: Rarity;
  price: number;
  source: string;
  location?: string;
  notes?: string;
}

export interface StockRecord {
  itemId: number;
  rarity: Rarity;
  location: string;
  quantity: number;
  averageCost?: number;
}

export interface CraftedRecord {
  itemId: number;
  rarity: Rarity;
  location: string;
  quantity: number;
  totalCost: number;
}

export interface InventoryFilter {
  itemId?: number;
  rarity?: Rarity;
  location?: string;
}

/** One stack of an item variant at a location, with its item's name. */
export interface InventoryLine {
  itemId: number;
  name: string;
  rarity: Rarity;
  location: string;
  quantity: number;
  averageCost: number;
}

/**
 * The local data file (items, recipes, market prices, stock) held in memory.
 * Serves the engine's catalog, price and inventory lookups.
 */
export class DataStore implements Catalog {
  private readonly items = new Map<number, Item>();
  private readonly recipes = new Map<number, Recipe>();

  private constructor(
    private readonly data: DataFile,
    private readonly now: () => Date,
  ) {
    for (const item of data.items) this.items.set(item.id, item);
    // First recipe wins when several professions make the same item.
    for (const recipe of data.recipes) {
      if (!this.recipes.has(recipe.outputItemId)) this.recipes.set(recipe.outputItemId, recipe);
    }
  }

  static empty(now: () => Date = () => new Date()): DataStore {
    return new DataStore(DataFileSchema.parse({}), now);
  }

  /** Parse a data file's JSON (a UTF-8 BOM is tolerated). Throws a ZodError on bad data. */
  static fromJson(json: string, now: () => Date = () => new Date()): DataStore {
    const cleaned = json.charCodeAt(0) === 0xfeff ? json.slice(1) : json;
    const raw: unknown = JSON.parse(cleaned);
    return new DataStore(DataFileSchema.parse(raw), now);
  }

  /** Load `filePath`, or start empty when it doesn't exist yet. */
  static load(filePath: string, now: () => Date = () => new Date()): DataStore {
    if (!existsSync(filePath)) return DataStore.empty(now);
    return DataStore.fromJson(readFileSync(filePath, "utf-8"), now);
  }

  toJson(): string {
    return JSON.stringify(this.data, null, 2) + "\n";
  }

  save(filePath: string): void {
    writeFileSync(filePath, this.toJson());
  }

  getRecipe(outputItemId: number): Recipe | undefined {
    return this.recipes.get(outputItemId);
  }

  getItem(itemId: number): Item | undefined {
    return this.items.get(itemId);
  }

  /** Display name for an item id, falling back to "Item <id>". */
  itemName(itemId: number): string {
    return this.items.get(itemId)?.name ?? `Item ${itemId}`;
  }

  /**
   * Items whose name contains `term`, ignoring case, sorted by name.
   * `profession` narrows to one profession's items (also ignoring case).
   */
  searchItems(term: string, profession?: string): Item[] {
    const needle = term.trim().toLowerCase();
    const trade = profession?.trim().toLowerCase();
    return this.data.items
      .filter((item) => item.name.toLowerCase().includes(needle))
      .filter((item) => !trade || item.profession?.toLowerCase() === trade)
      .sort((a, b) => a.name.localeCompare(b.name) || a.id - b.id);
  }

  /** Prices of one item variant recorded in the last `lookbackDays`, most recent first. */
  readonly getRecentPrices: PriceLookup = (itemId, rarity, lookbackDays) => {
    const since = this.now().getTime() - lookbackDays * DAY_MS;
    return this.data.marketPrices
      .filter((p) => p.itemId === itemId && p.rarity === rarity && Date.parse(p.recordedAt) >= since)
      .sort((a, b) => Date.parse(b.recordedAt) - Date.parse(a.recordedAt))
      .map((p): MarketPrice => ({ price: p.price, source: p.source, rarity: p.rarity, recordedAt: p.recordedAt }));
  };

  /** Locations holding an item variant, with their (positive) quantities. */
  readonly getInventory: InventoryLookup = (itemId, rarity) =>
    this.data.inventory
      .filter((e) => e.itemId === itemId && e.rarity === rarity && e.quantity > 0)
      .map((e): InventoryEntry => ({ location: e.location, quantity: e.quantity }));

  /** Non-empty stacks matching `filter`, by item name, then rarity, then location. */
  inventoryOverview(filter: InventoryFilter = {}): InventoryLine[] {
    return this.data.inventory
      .filter(
        (e) =>
          e.quantity > 0 &&
          (filter.itemId === undefined || e.itemId === filter.itemId) &&
          (filter.rarity === undefined || e.rarity === filter.rarity) &&
          (filter.location === undefined || e.location === filter.location),
      )
      .map((e): InventoryLine => ({
        itemId: e.itemId,
        name: this.itemName(e.itemId),
        rarity: e.rarity,
        location: e.location,
        quantity: e.quantity,
        averageCost: e.averageCost,
      }))
      .sort(
        (a, b) =>
          a.name.localeCompare(b.name) || compareRarity(a.rarity, b.rarity) || a.location.localeCompare(b.location),
      );
  }

  /** Rarities an item is held at anywhere, lowest tier first. */
  stockedRarities(itemId: number): Rarity[] {
    const held = new Set(this.data.inventory.filter((e) => e.itemId === itemId && e.quantity > 0).map((e) => e.rarity));
    return [...held].sort(compareRarity);
  }

  /** Append a market observation stamped with the current time. */
  recordPrice(record: PriceRecord): StoredMarketPrice {
    this.requireItem(record.itemId);
    const entry = StoredMarketPriceSchema.parse({ ...record, recordedAt: this.now().toISOString() });
    this.data.marketPrices.push(entry);
    return entry;
  }

  /** Set the quantity of an item variant at a location, creating the entry if needed. */
  setStock(record: StockRecord): StoredInventoryEntry {
    this.requireItem(record.itemId);
    const index = this.data.inventory.findIndex(
      (e) => e.itemId === record.itemId && e.rarity === record.rarity && e.location === record.location,
    );
    // An update without a cost keeps the recorded average.
    const averageCost = record.averageCost ?? (index >= 0 ? this.data.inventory[index].averageCost : undefined);
    const entry = StoredInventoryEntrySchema.parse({ ...record, averageCost, updatedAt: this.now().toISOString() });
    if (index >= 0) this.data.inventory[index] = entry;
    else this.data.inventory.push(entry);
    return entry;
  }

  /**
   * Add freshly crafted items to a location's stock. The stack's average cost
   * becomes the quantity-weighted mean of what was there and the craft's
   * per-item cost.
   */
  addCraftedStock(record: CraftedRecord): StoredInventoryEntry {
    this.requireItem(record.itemId);
    const existing = this.data.inventory.find(
      (e) => e.itemId === record.itemId && e.rarity === record.rarity && e.location === record.location,
    );
    const heldQuantity = existing?.quantity ?? 0;
    const heldValue = heldQuantity * (existing?.averageCost ?? 0);
    const quantity = heldQuantity + record.quantity;
    return this.setStock({
      itemId: record.itemId,
      rarity: record.rarity,
      location: record.location,
      quantity,
      averageCost: quantity > 0 ? (heldValue + record.totalCost) / quantity : 0,
    });
  }

  private requireItem(itemId: number): Item {
    const item = this.items.get(itemId);
    if (!item) throw new ItemNotFoundError(itemId);
    return item;
  }
}
