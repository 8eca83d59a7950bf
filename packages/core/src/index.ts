export {
  RARITIES,
  RARITY_INFO,
  COMPONENT_TYPES,
  isRarity,
  parseRarity,
  rarityRank,
  rarityFromRank,
  compareRarity,
  displayName,
  colorOf,
  allRarities,
  formatWithRarity,
  canCraftRarity,
  craftingResultRarity,
  componentTypeFromItem,
} from "./rarity.js";
export type { Rarity, RarityInfo, ComponentType } from "./rarity.js";
export { encodeItemKey, decodeItemKey, isItemKey, INVALID_ITEM_KEY } from "./item-key.js";
export type { ItemKey, DecodedItemKey } from "./item-key.js";
export {
  RaritySchema,
  ItemSchema,
  RecipeComponentSchema,
  RecipeSchema,
  MarketPriceSchema,
  StoredMarketPriceSchema,
  StoredInventoryEntrySchema,
  DataFileSchema,
} from "./types.js";
export type {
  Item,
  RecipeComponent,
  Recipe,
  MarketPrice,
  StoredMarketPrice,
  InventoryEntry,
  StoredInventoryEntry,
  DataFile,
  Catalog,
  PriceLookup,
  InventoryLookup,
  PriceOverrides,
} from "./types.js";
export {
  CraftingError,
  NotFoundError,
  RecipeNotFoundError,
  ItemNotFoundError,
  InvalidInputError,
} from "./errors.js";
export type { CraftingErrorCode } from "./errors.js";
export { resolvePrice } from "./pricing.js";
export type { PriceSource, ResolvedPrice } from "./pricing.js";
export {
  DEFAULT_LOOKBACK_DAYS,
  CostOptionsSchema,
  computeCost,
  calculateCraftingCost,
  costPerUnit,
  requiredRarity,
  componentsWithoutPrice,
} from "./cost.js";
export type { CostOptions, CostSources, ComponentCost, CostBreakdown } from "./cost.js";
export { checkAvailability, stockOnHand } from "./availability.js";
export type { ComponentAvailability, AvailabilityReport } from "./availability.js";
export {
  analyzeMarket,
  recommend,
  MIN_TREND_POINTS,
  MIN_RECOMMENDATION_POINTS,
  TREND_THRESHOLD,
} from "./market.js";
export type { MarketAnalysis, PriceTrend } from "./market.js";
export { planBatch, formatShoppingList } from "./batch.js";
export type { BatchEntry, BatchOptions, BatchMaterial, ShoppingListLine, BatchPlan } from "./batch.js";
