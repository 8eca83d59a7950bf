import { z } from "zod";
import { InvalidInputError, ItemNotFoundError, RecipeNotFoundError } from "./errors.js";
import { encodeItemKey } from "./item-key.js";
import { resolvePrice } from "./pricing.js";
import { RARITIES } from "./rarity.js";
import type { ComponentType, Rarity } from "./rarity.js";
import type { ItemKey } from "./item-key.js";
import type { PriceSource } from "./pricing.js";
import type { Catalog, Item, PriceLookup, PriceOverrides, Recipe } from "./types.js";

export const DEFAULT_LOOKBACK_DAYS = 7;

export const CostOptionsSchema = z.object({
  targetRarity: z.enum(RARITIES).default("common"),
  quantity: z.number().int().min(1).default(1),
  taxRate: z.number().min(0).max(1).default(0),
  overrides: z.record(z.number().finite().nonnegative()).default({}),
  /** Reserved for quality-based rarity substitution; currently has no effect. */
  qualityRating: z.number().int().nonnegative().default(0),
  lookbackDays: z.number().int().min(1).default(DEFAULT_LOOKBACK_DAYS),
});

export type CostOptions = z.input<typeof CostOptionsSchema>;

export interface CostSources {
  getItem(itemId: number): Item | undefined;
  getRecentPrices: PriceLookup;
}

/** One line of a cost breakdown. */
export interface ComponentCost {
  itemId: number;
  name: string;
  requiredRarity: Rarity;
  componentType: ComponentType;
  isOptional: boolean;
  quantityNeeded: number;   // per-craft quantity × crafts
  unitPrice: number;
  priceSource: PriceSource;
  totalCost: number;
  itemKey: ItemKey;
}

export interface CostBreakdown {
  itemId: number;
  targetRarity: Rarity;
  quantity: number;
  taxRate: number;
  qualityRating: number;
  components: readonly ComponentCost[];
  materialCost: number;
  baseFee: number;          // base crafting fee × quantity
  taxAmount: number;
  totalCost: number;
  costPerUnit: number;
}

/** Cost of one unit. Zero quantity yields 0 rather than a division error. */
export function costPerUnit(totalCost: number, quantity: number): number {
  return quantity > 0 ? totalCost / quantity : 0;
}

/** The rarity a component must be bought at when crafting `targetRarity`. */
export function requiredRarity(componentType: ComponentType, baseRarity: Rarity, targetRarity: Rarity): Rarity {
  return componentType === "basic" ? baseRarity : targetRarity;
}

function parseOptions(options: CostOptions): z.output<typeof CostOptionsSchema> {
  const result = CostOptionsSchema.safeParse(options);
  if (!result.success) throw InvalidInputError.fromZod(result.error);
  return result.data;
}

/**
 * Cost out `quantity` crafts of `recipe` at `targetRarity`.
 *
 * Throws `RecipeNotFoundError` when there's no recipe or it has no components,
 * `ItemNotFoundError` when a component isn't in the catalog, and
 * `InvalidInputError` for out-of-range options. Components without any price
 * are kept in the breakdown at a unit price of 0 (source `"no_data"`).
 */
export function computeCost(
  recipe: Recipe | undefined,
  options: CostOptions,
  sources: CostSources,
  outputItemId = recipe?.outputItemId ?? 0,
): CostBreakdown {
  if (!recipe || recipe.components.length === 0) {
    throw new RecipeNotFoundError(outputItemId);
  }
  const opts = parseOptions(options);
  const overrides: PriceOverrides = opts.overrides;

  const components: ComponentCost[] = [];
  let materialCost = 0;

  for (const component of recipe.components) {
    const item = sources.getItem(component.itemId);
    if (!item) throw new ItemNotFoundError(component.itemId);

    const rarity = requiredRarity(component.componentType, item.rarity, opts.targetRarity);
    const history = sources.getRecentPrices(component.itemId, rarity, opts.lookbackDays);
    const { unitPrice, source } = resolvePrice(component.itemId, rarity, overrides, history);

    const quantityNeeded = component.quantity * opts.quantity;
    const totalCost = unitPrice * quantityNeeded;
    materialCost += totalCost;

    components.push({
      itemId: component.itemId,
      name: item.name,
      requiredRarity: rarity,
      componentType: component.componentType,
      isOptional: component.isOptional,
      quantityNeeded,
      unitPrice,
      priceSource: source,
      totalCost,
      itemKey: encodeItemKey(component.itemId, rarity),
    });
  }

  const baseFee = recipe.baseCraftingFee * opts.quantity;
  const taxAmount = baseFee * opts.taxRate;
  const totalCost = materialCost + baseFee + taxAmount;

  return {
    itemId: recipe.outputItemId,
    targetRarity: opts.targetRarity,
    quantity: opts.quantity,
    taxRate: opts.taxRate,
    qualityRating: opts.qualityRating,
    components,
    materialCost,
    baseFee,
    taxAmount,
    totalCost,
    costPerUnit: costPerUnit(totalCost, opts.quantity),
  };
}

/** Look up the recipe producing `outputItemId` and cost it. */
export function calculateCraftingCost(
  catalog: Catalog,
  outputItemId: number,
  options: CostOptions,
  getRecentPrices: PriceLookup,
): CostBreakdown {
  const recipe = catalog.getRecipe(outputItemId);
  return computeCost(recipe, options, { getItem: (id) => catalog.getItem(id), getRecentPrices }, outputItemId);
}

/** Components whose price is unknown and show up as zero-cost lines. */
export function componentsWithoutPrice(breakdown: CostBreakdown): ComponentCost[] {
  return breakdown.components.filter((c) => c.priceSource === "no_data");
}
