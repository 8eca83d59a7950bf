/**
 * Plain-text rendering of engine results for the terminal.
 */
import { allRarities, colorOf, displayName, formatShoppingList, formatWithRarity } from "@craftcalc/core";
import type { AvailabilityReport, BatchPlan, CostBreakdown, Item, MarketAnalysis, Rarity } from "@craftcalc/core";
import type { InventoryLine } from "./store.js";

export function gold(amount: number): string {
  return `${amount.toFixed(2)} gold`;
}

/** 0.15 → "15%", 0.125 → "12.5%". */
export function percent(rate: number): string {
  return `${Number((rate * 100).toFixed(2))}%`;
}

export function formatBreakdown(b: CostBreakdown, itemName: string): string {
  const lines = [`Cost of ${formatWithRarity(itemName, b.targetRarity, b.quantity)}`];
  for (const c of b.components) {
    const optional = c.isOptional ? ", optional" : "";
    const unknown = c.priceSource === "no_data" ? "  (no price data)" : "";
    lines.push(
      `  ${c.name} (${c.requiredRarity}, ${c.componentType}${optional}): ` +
      `${c.quantityNeeded} @ ${c.unitPrice.toFixed(2)} = ${c.totalCost.toFixed(2)} [${c.priceSource}]${unknown}`,
    );
  }
  lines.push(
    `Materials: ${gold(b.materialCost)}`,
    `Base fee: ${gold(b.baseFee)}`,
    `Tax (${percent(b.taxRate)}): ${gold(b.taxAmount)}`,
    `Total: ${gold(b.totalCost)} (${gold(b.costPerUnit)} each)`,
  );
  return lines.join("\n");
}

export function formatAvailability(report: AvailabilityReport, location?: string): string {
  const where = location ? ` at ${location}` : "";
  const lines = [`Can craft${where}: ${report.canCraft ? "yes" : "no"}`];
  for (const line of [...report.available, ...report.missing]) {
    const tag = line.isSufficient ? "[ok]     " : "[missing]";
    lines.push(`  ${tag} ${line.name} (${line.requiredRarity}): ${line.availableQuantity}/${line.neededQuantity}`);
  }
  return lines.join("\n");
}

export function formatAnalysis(a: MarketAnalysis, itemName: string, days: number, advice: string): string {
  const label = a.rarity ? formatWithRarity(itemName, a.rarity) : itemName;
  return [
    `Market for ${label}, last ${days} days`,
    `Data points: ${a.dataPoints}`,
    `Average: ${gold(a.averagePrice)}  Min: ${a.minPrice.toFixed(2)}  Max: ${a.maxPrice.toFixed(2)}`,
    `Trend: ${a.trend}`,
    advice,
  ].join("\n");
}

export function formatBatch(plan: BatchPlan): string {
  const lines = [`Batch: ${plan.totalRecipes} recipes, ${plan.totalItems} items`, "Materials:"];
  for (const m of plan.materials) {
    const where = m.sources.length > 0 ? ` [${m.sources.join(", ")}]` : "";
    lines.push(
      `  ${m.name} (${m.rarity}): need ${m.totalNeeded}, have ${m.available}, ` +
      `missing ${m.missing} @ ${m.unitPrice.toFixed(2)}${where}`,
    );
  }
  lines.push(
    `Material cost: ${gold(plan.materialCost)}`,
    `Total cost: ${gold(plan.totalCost)}`,
    `Feasible: ${plan.feasible ? "yes" : "no"}`,
    "",
    formatShoppingList(plan),
  );
  return lines.join("\n");
}

export function formatRarities(): string {
  return allRarities()
    .map((r, i) => `${i + 1}  ${r.padEnd(10)} ${displayName(r).padEnd(10)} ${colorOf(r)}`)
    .join("\n");
}

export function formatSearch(items: readonly Item[], term: string): string {
  if (items.length === 0) return `No items match "${term}".`;
  return items
    .map((item) => `${String(item.id).padStart(6)}  ${item.name}${item.profession ? `  [${item.profession}]` : ""}`)
    .join("\n");
}

/** Stock lines plus a total; `rarities` (for a single item) goes first when given. */
export function formatInventory(lines: readonly InventoryLine[], rarities?: readonly Rarity[]): string {
  const out: string[] = [];
  if (rarities) out.push(`In stock as: ${rarities.length > 0 ? rarities.join(", ") : "none"}`);
  if (lines.length === 0) {
    out.push("No stock.");
    return out.join("\n");
  }
  let total = 0;
  for (const l of lines) {
    total += l.quantity;
    out.push(`  ${l.name} (${l.rarity}) @ ${l.location}: ${l.quantity}  avg ${l.averageCost.toFixed(2)}`);
  }
  out.push(`Total: ${total} items in ${lines.length} ${lines.length === 1 ? "stack" : "stacks"}`);
  return out.join("\n");
}
