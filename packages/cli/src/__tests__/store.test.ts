import { describe, it, expect } from "vitest";
import { readFileSync } from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { ZodError } from "zod";
import { ItemNotFoundError } from "@craftcalc/core";
import { DataStore } from "../store.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const FIXTURE_JSON = readFileSync(path.join(__dirname, "fixtures", "data.json"), "utf-8");
const NOW = new Date("2026-03-10T12:00:00.000Z");

function fixtureStore(): DataStore {
  return DataStore.fromJson(FIXTURE_JSON, () => NOW);
}

describe("DataStore", () => {
  it("loads a data file with a byte order mark", () => {
    const store = DataStore.fromJson("\uFEFF" + FIXTURE_JSON, () => NOW);
    expect(store.getItem(1)?.name).toBe("Iron Ore");
  });

  it("defaults missing sections to empty", () => {
    const store = DataStore.fromJson("{}");
    expect(store.getRecipe(100)).toBeUndefined();
    expect(JSON.parse(store.toJson())).toEqual({ items: [], recipes: [], marketPrices: [], inventory: [] });
  });

  it("rejects data that doesn't match the schema", () => {
    expect(() => DataStore.fromJson(JSON.stringify({ recipes: [{ outputItemId: 1 }] }))).toThrow(ZodError);
  });

  it("keeps the first recipe for an item", () => {
    const recipe = { profession: "Smith", levelRequired: 1, baseCraftingFee: 1, components: [{ itemId: 1, quantity: 1 }] };
    const store = DataStore.fromJson(JSON.stringify({
      recipes: [
        { ...recipe, outputItemId: 5, profession: "Armorer" },
        { ...recipe, outputItemId: 5 },
      ],
    }));
    expect(store.getRecipe(5)?.profession).toBe("Armorer");
  });

  it("names unknown items by id", () => {
    expect(fixtureStore().itemName(42)).toBe("Item 42");
  });

  it("returns recent prices of one rarity, newest first", () => {
    const store = fixtureStore();
    expect(store.getRecentPrices(1, "rare", 7).map((p) => p.price)).toEqual([12, 10]);
    expect(store.getRecentPrices(1, "rare", 60).map((p) => p.price)).toEqual([12, 10, 50]);
    expect(store.getRecentPrices(1, "epic", 60)).toEqual([]);
  });

  it("leaves out empty stock", () => {
    const store = fixtureStore();
    store.setStock({ itemId: 2, rarity: "common", location: "Bank", quantity: 0 });
    expect(store.getInventory(2, "common")).toEqual([]);
  });

  it("adds stock at a new location", () => {
    const store = fixtureStore();
    const entry = store.setStock({ itemId: 3, rarity: "rare", location: "Guild Hall", quantity: 4, averageCost: 2 });
    expect(entry).toEqual({
      itemId: 3,
      rarity: "rare",
      location: "Guild Hall",
      quantity: 4,
      averageCost: 2,
      updatedAt: NOW.toISOString(),
    });
    expect(store.getInventory(3, "rare")).toEqual([{ location: "Guild Hall", quantity: 4 }]);
  });

  it("refuses to record data for unknown items", () => {
    const store = fixtureStore();
    expect(() => store.recordPrice({ itemId: 99, rarity: "common", price: 1, source: "market" })).toThrow(
      ItemNotFoundError,
    );
    expect(() => store.setStock({ itemId: 99, rarity: "common", location: "Bank", quantity: 1 })).toThrow(
      ItemNotFoundError,
    );
  });

  it("rejects non-positive prices", () => {
    expect(() => fixtureStore().recordPrice({ itemId: 1, rarity: "common", price: 0, source: "market" })).toThrow(
      ZodError,
    );
  });

  describe("searchItems", () => {
    it("matches part of the name, ignoring case, sorted by name", () => {
      const store = fixtureStore();
      expect(store.searchItems("iron").map((i) => i.id)).toEqual([1, 100]);
      expect(store.searchItems("STRIP").map((i) => i.name)).toEqual(["Leather Strip"]);
      expect(store.searchItems("zzz")).toEqual([]);
    });

    it("narrows to a profession", () => {
      expect(fixtureStore().searchItems("iron", "blacksmith").map((i) => i.id)).toEqual([100]);
    });
  });

  describe("inventoryOverview", () => {
    it("lists stacks by name, rarity and location", () => {
      const store = fixtureStore();
      store.setStock({ itemId: 1, rarity: "common", location: "Bank", quantity: 3 });
      expect(store.inventoryOverview().map((l) => `${l.name}/${l.rarity}/${l.location}/${l.quantity}`)).toEqual([
        "Flux/common/Bank/1",
        "Iron Ore/common/Bank/3",
        "Iron Ore/rare/Bag/2",
        "Iron Ore/rare/Bank/4",
      ]);
    });

    it("filters by item, rarity and location", () => {
      expect(fixtureStore().inventoryOverview({ itemId: 1, rarity: "rare", location: "Bank" })).toEqual([
        { itemId: 1, name: "Iron Ore", rarity: "rare", location: "Bank", quantity: 4, averageCost: 11 },
      ]);
    });
  });

  describe("stockedRarities", () => {
    it("lists held rarities lowest first", () => {
      const store = fixtureStore();
      store.setStock({ itemId: 1, rarity: "common", location: "Bag", quantity: 3 });
      store.setStock({ itemId: 1, rarity: "epic", location: "Bag", quantity: 0 });
      expect(store.stockedRarities(1)).toEqual(["common", "rare"]);
      expect(store.stockedRarities(3)).toEqual([]);
    });
  });

  describe("addCraftedStock", () => {
    it("adds to an existing stack at the weighted average cost", () => {
      const store = fixtureStore();
      const entry = store.addCraftedStock({ itemId: 1, rarity: "rare", location: "Bank", quantity: 2, totalCost: 28 });
      expect(entry).toMatchObject({ quantity: 6, averageCost: 12 });
      expect(store.getInventory(1, "rare")).toEqual([
        { location: "Bank", quantity: 6 },
        { location: "Bag", quantity: 2 },
      ]);
    });

    it("starts a new stack at the per-item cost", () => {
      const store = fixtureStore();
      const entry = store.addCraftedStock({ itemId: 100, rarity: "rare", location: "Workshop", quantity: 2, totalCost: 117 });
      expect(entry).toEqual({
        itemId: 100,
        rarity: "rare",
        location: "Workshop",
        quantity: 2,
        averageCost: 58.5,
        updatedAt: NOW.toISOString(),
      });
    });

    it("refuses unknown items", () => {
      expect(() =>
        fixtureStore().addCraftedStock({ itemId: 99, rarity: "common", location: "Bank", quantity: 1, totalCost: 1 }),
      ).toThrow(ItemNotFoundError);
    });
  });
});
