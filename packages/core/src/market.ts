import type { Rarity } from "./rarity.js";
import type { MarketPrice } from "./types.js";

export type PriceTrend = "no_data" | "insufficient_data" | "rising" | "falling" | "stable";

export interface MarketAnalysis {
  averagePrice: number;
  minPrice: number;
  maxPrice: number;
  dataPoints: number;
  trend: PriceTrend;
  rarity?: Rarity;
}

/** Points needed before a trend is reported (3 recent vs 3 oldest). */
export const MIN_TREND_POINTS = 6;

/** Points needed before `recommend` gives advice. */
export const MIN_RECOMMENDATION_POINTS = 3;

/** Relative move between the recent and older averages that counts as a trend. */
export const TREND_THRESHOLD = 0.1;

function mean(values: readonly number[]): number {
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/**
 * Summarize a price history given most recent first.
 * The trend compares the 3 most recent prices with the 3 oldest.
 */
export function analyzeMarket(prices: readonly MarketPrice[], rarity?: Rarity): MarketAnalysis {
  if (prices.length === 0) {
    return { averagePrice: 0, minPrice: 0, maxPrice: 0, dataPoints: 0, trend: "no_data", rarity };
  }

  const values = prices.map((p) => p.price);
  let trend: PriceTrend = "insufficient_data";
  if (values.length >= MIN_TREND_POINTS) {
    const recent = mean(values.slice(0, 3));
    const older = mean(values.slice(-3));
    if (recent > older * (1 + TREND_THRESHOLD)) trend = "rising";
    else if (recent < older * (1 - TREND_THRESHOLD)) trend = "falling";
    else trend = "stable";
  }

  return {
    averagePrice: mean(values),
    minPrice: Math.min(...values),
    maxPrice: Math.max(...values),
    dataPoints: values.length,
    trend,
    rarity,
  };
}

function gold(amount: number): string {
  return `${amount.toFixed(2)} gold`;
}

/** One-line buy/sell advice for an analysis. */
export function recommend(analysis: MarketAnalysis): string {
  if (analysis.dataPoints < MIN_RECOMMENDATION_POINTS) {
    return "Insufficient data for recommendations. Record more prices.";
  }
  const avg = gold(analysis.averagePrice);
  switch (analysis.trend) {
    case "rising":
      return `Prices are rising. Consider buying now if below ${avg}. Good time to sell if you have stock.`;
    case "falling":
      return `Prices are falling. Wait to buy until prices stabilize. Consider selling soon if above ${avg}.`;
    case "stable":
      return `Prices are stable around ${avg}. Safe to buy/sell at market rates.`;
    default:
      return `Current average: ${avg}. Range: ${analysis.minPrice.toFixed(2)} - ${gold(analysis.maxPrice)}.`;
  }
}
