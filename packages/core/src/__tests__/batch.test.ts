import { describe, it, expect } from "vitest";
import { formatShoppingList, planBatch } from "../batch.js";
import { RecipeNotFoundError } from "../errors.js";
import { makeComponent, makeItem, makePrice, makeRecipe, makeWorld } from "./helpers/fixtures.js";

/**
 * Two scribe recipes sharing Parchment (basic, common):
 *   Scroll (100): 2× Parchment + 1× Ink (quality), fee 1
 *   Tome   (101): 3× Parchment + 2× Thread (quality), fee 4
 */
function scribeWorld() {
  return makeWorld({
    items: [
      makeItem({ id: 1, name: "Parchment", type: "paper" }),
      makeItem({ id: 2, name: "Ink" }),
      makeItem({ id: 3, name: "Thread" }),
    ],
    recipes: [
      makeRecipe({
        outputItemId: 100,
        baseCraftingFee: 1,
        components: [
          makeComponent({ itemId: 1, quantity: 2, componentType: "basic" }),
          makeComponent({ itemId: 2, quantity: 1 }),
        ],
      }),
      makeRecipe({
        outputItemId: 101,
        baseCraftingFee: 4,
        components: [
          makeComponent({ itemId: 1, quantity: 3, componentType: "basic" }),
          makeComponent({ itemId: 3, quantity: 2 }),
        ],
      }),
    ],
    prices: {
      "1_1": [makePrice(2)],
      "2_3": [makePrice(10, { rarity: "rare" })],
      "3_1": [makePrice(5)],
    },
    inventory: {
      "1_1": [
        { location: "Lionhold", quantity: 10 },
        { location: "Winstead", quantity: 5 },
      ],
      "2_3": [{ location: "Lionhold", quantity: 4 }],
      "3_1": [{ location: "Winstead", quantity: 0 }],
    },
  });
}

const entries = [
  { outputItemId: 100, targetRarity: "rare" as const, quantity: 5 },
  { outputItemId: 101, targetRarity: "common" as const, quantity: 2 },
];

describe("planBatch", () => {
  it("merges shared materials by item key", () => {
    const w = scribeWorld();
    const plan = planBatch(entries, w.catalog, w.getRecentPrices, w.getInventory);

    expect(plan.materials.map((m) => [m.itemKey, m.name, m.totalNeeded, m.available, m.missing])).toEqual([
      ["1_1", "Parchment", 16, 15, 1],   // 2×5 + 3×2
      ["2_3", "Ink", 5, 4, 1],
      ["3_1", "Thread", 4, 0, 4],
    ]);
  });

  it("lists locations that hold stock", () => {
    const w = scribeWorld();
    const plan = planBatch(entries, w.catalog, w.getRecentPrices, w.getInventory);
    expect(plan.materials.map((m) => m.sources)).toEqual([["Lionhold", "Winstead"], ["Lionhold"], []]);
  });

  it("totals the batch", () => {
    const w = scribeWorld();
    const plan = planBatch(entries, w.catalog, w.getRecentPrices, w.getInventory, { taxRate: 0.5 });

    // Scroll ×5: materials 2×2×5 + 10×5 = 70, fee 5, tax 2.5
    // Tome ×2:   materials 2×3×2 + 5×2×2 = 32, fee 8, tax 4
    expect(plan.materialCost).toBe(102);
    expect(plan.totalCost).toBe(77.5 + 44);
    expect(plan.totalItems).toBe(7);
    expect(plan.totalRecipes).toBe(2);
    expect(plan.entries.map((e) => e.breakdown.totalCost)).toEqual([77.5, 44]);
  });

  it("builds a shopping list for the shortfall", () => {
    const w = scribeWorld();
    const plan = planBatch(entries, w.catalog, w.getRecentPrices, w.getInventory);

    expect(plan.feasible).toBe(false);
    expect(plan.missingCount).toBe(3);
    expect(plan.shoppingList.map((l) => [l.name, l.quantity, l.cost])).toEqual([
      ["Parchment", 1, 2],
      ["Ink", 1, 10],
      ["Thread", 4, 20],
    ]);
    expect(plan.shoppingCost).toBe(32);
  });

  it("restricts stock to one location", () => {
    const w = scribeWorld();
    const plan = planBatch(entries, w.catalog, w.getRecentPrices, w.getInventory, { locationFilter: "Winstead" });
    expect(plan.materials.map((m) => [m.available, m.missing, m.sources])).toEqual([
      [5, 11, ["Winstead"]],
      [0, 5, []],
      [0, 4, []],
    ]);
  });

  it("is feasible when everything is in stock", () => {
    const w = scribeWorld();
    const plan = planBatch(
      [{ outputItemId: 100, targetRarity: "rare", quantity: 2 }],
      w.catalog,
      w.getRecentPrices,
      w.getInventory,
    );
    expect(plan.feasible).toBe(true);
    expect(plan.shoppingList).toEqual([]);
    expect(plan.shoppingCost).toBe(0);
  });

  it("accepts an empty batch", () => {
    const w = scribeWorld();
    const plan = planBatch([], w.catalog, w.getRecentPrices, w.getInventory);
    expect(plan).toMatchObject({
      materials: [],
      totalCost: 0,
      totalItems: 0,
      totalRecipes: 0,
      feasible: true,
    });
  });

  it("fails the whole plan on an unknown recipe", () => {
    const w = scribeWorld();
    expect(() =>
      planBatch([...entries, { outputItemId: 404, targetRarity: "common", quantity: 1 }], w.catalog, w.getRecentPrices, w.getInventory),
    ).toThrow(RecipeNotFoundError);
  });
});

describe("formatShoppingList", () => {
  it("renders one line per missing material and a total", () => {
    const w = scribeWorld();
    const plan = planBatch(entries, w.catalog, w.getRecentPrices, w.getInventory);
    expect(formatShoppingList(plan)).toBe(
      [
        "Shopping List:",
        "",
        "- Parchment (common): 1 @ 2.00 = 2.00 gold",
        "- Ink (rare): 1 @ 10.00 = 10.00 gold",
        "- Thread (common): 4 @ 5.00 = 20.00 gold",
        "",
        "Total Cost: 32.00 gold",
      ].join("\n"),
    );
  });

  it("says so when nothing is missing", () => {
    const w = scribeWorld();
    const plan = planBatch([], w.catalog, w.getRecentPrices, w.getInventory);
    expect(formatShoppingList(plan)).toBe("No missing materials - batch is ready!");
  });
});
