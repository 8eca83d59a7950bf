import { z } from "zod";
import { COMPONENT_TYPES, parseRarity } from "./rarity.js";
import type { Rarity } from "./rarity.js";
import type { ItemKey } from "./item-key.js";

/**
 * Zod schemas for catalog, market and inventory records as stored in the
 * local data file. Rarity fields are parsed leniently (unknown → common),
 * matching how the item API reports them.
 */

export const RaritySchema = z
  .string()
  .optional()
  .transform((value): Rarity => parseRarity(value));

const ItemIdSchema = z.number().int().nonnegative();

export const ItemSchema = z
  .object({
    id: ItemIdSchema,
    name: z.string(),
    type: z.string().default(""),
    rarity: RaritySchema,
    level: z.number().int().nonnegative().default(0),
    profession: z.string().nullish(),
  })
  .passthrough();

export type Item = z.infer<typeof ItemSchema>;

export const RecipeComponentSchema = z.object({
  itemId: ItemIdSchema,
  quantity: z.number().int().positive(),
  componentType: z.enum(COMPONENT_TYPES).default("quality"),
  isOptional: z.boolean().default(false),
});

export type RecipeComponent = z.infer<typeof RecipeComponentSchema>;

export const RecipeSchema = z
  .object({
    outputItemId: ItemIdSchema,
    profession: z.string(),
    levelRequired: z.number().int().nonnegative().default(0),
    baseCraftingFee: z.number().nonnegative().default(0),
    stationType: z.string().optional(),
    craftingTime: z.number().int().nonnegative().optional(), // seconds
    components: z.array(RecipeComponentSchema),
  })
  .superRefine((recipe, ctx) => {
    const seen = new Set<number>();
    recipe.components.forEach((c, i) => {
      if (seen.has(c.itemId)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["components", i, "itemId"],
          message: `Duplicate component item ${c.itemId}`,
        });
      }
      seen.add(c.itemId);
    });
  });

export type Recipe = z.infer<typeof RecipeSchema>;

/** One observed market price, as handed to the price resolver. */
export const MarketPriceSchema = z.object({
  price: z.number().positive(),
  source: z.string().min(1),   // "market", "guildie", "harvested", …
  rarity: RaritySchema,
  recordedAt: z.string().datetime({ offset: true }),
});

export type MarketPrice = z.infer<typeof MarketPriceSchema>;

export const StoredMarketPriceSchema = MarketPriceSchema.extend({
  itemId: ItemIdSchema,
  location: z.string().optional(),
  notes: z.string().optional(),
});

export type StoredMarketPrice = z.infer<typeof StoredMarketPriceSchema>;

/** Stock of one item variant at one storage location. */
export interface InventoryEntry {
  location: string;
  quantity: number;
}

export const StoredInventoryEntrySchema = z.object({
  itemId: ItemIdSchema,
  rarity: RaritySchema,
  location: z.string().min(1),
  quantity: z.number().int().nonnegative(),
  averageCost: z.number().nonnegative().default(0),
  updatedAt: z.string().datetime({ offset: true }).optional(),
});

export type StoredInventoryEntry = z.infer<typeof StoredInventoryEntrySchema>;

export const DataFileSchema = z.object({
  items: z.array(ItemSchema).default([]),
  recipes: z.array(RecipeSchema).default([]),
  marketPrices: z.array(StoredMarketPriceSchema).default([]),
  inventory: z.array(StoredInventoryEntrySchema).default([]),
});

export type DataFile = z.infer<typeof DataFileSchema>;

// ---------------------------------------------------------------------------
// Collaborators the engine reads from. Implementations live outside core.
// ---------------------------------------------------------------------------

export interface Catalog {
  getRecipe(outputItemId: number): Recipe | undefined;
  getItem(itemId: number): Item | undefined;
}

/** Prices recorded within `lookbackDays`, most recent first. */
export type PriceLookup = (itemId: number, rarity: Rarity, lookbackDays: number) => readonly MarketPrice[];

export type InventoryLookup = (itemId: number, rarity: Rarity) => readonly InventoryEntry[];

/** Caller-managed unit prices keyed by `encodeItemKey(itemId, rarity)`. */
export type PriceOverrides = Readonly<Record<ItemKey, number>>;
