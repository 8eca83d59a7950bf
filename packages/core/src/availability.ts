import type { Rarity } from "./rarity.js";
import type { CostBreakdown } from "./cost.js";
import type { InventoryEntry, InventoryLookup } from "./types.js";

export interface ComponentAvailability {
  itemId: number;
  name: string;
  requiredRarity: Rarity;
  neededQuantity: number;
  availableQuantity: number;
  isSufficient: boolean;
}

export interface AvailabilityReport {
  canCraft: boolean;
  available: ComponentAvailability[];
  missing: ComponentAvailability[];
  totalComponents: number;
}

/**
 * Quantity on hand across `entries`, or at `location` only when given.
 * Several entries for the same location are added together.
 */
export function stockOnHand(entries: readonly InventoryEntry[], location?: string): number {
  let total = 0;
  for (const entry of entries) {
    if (location === undefined || entry.location === location) total += entry.quantity;
  }
  return total;
}

/**
 * Compare what a breakdown needs with what's in storage.
 * Both result lists keep the breakdown's component order.
 */
export function checkAvailability(
  breakdown: CostBreakdown,
  getInventory: InventoryLookup,
  locationFilter?: string,
): AvailabilityReport {
  const available: ComponentAvailability[] = [];
  const missing: ComponentAvailability[] = [];

  for (const component of breakdown.components) {
    const onHand = stockOnHand(getInventory(component.itemId, component.requiredRarity), locationFilter);
    const line: ComponentAvailability = {
      itemId: component.itemId,
      name: component.name,
      requiredRarity: component.requiredRarity,
      neededQuantity: component.quantityNeeded,
      availableQuantity: onHand,
      isSufficient: onHand >= component.quantityNeeded,
    };
    (line.isSufficient ? available : missing).push(line);
  }

  return {
    canCraft: missing.length === 0,
    available,
    missing,
    totalComponents: breakdown.components.length,
  };
}
