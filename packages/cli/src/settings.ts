/**
 * CLI settings: defaults plus an optional JSON config file.
 * The file is shallow-merged over the defaults, so older files keep working
 * when new settings are added.
 */
import { existsSync, readFileSync } from "node:fs";
import { z } from "zod";
import { RARITIES } from "@craftcalc/core";
import type { Rarity } from "@craftcalc/core";

export interface Settings {
  defaultTaxPercent: number;   // node tax on the base fee, 0–100
  priceLookbackDays: number;   // market prices older than this are ignored when costing
  analysisDays: number;        // window for `market`
  defaultRarity: Rarity;
  craftedLocation: string;     // where `crafted` puts new items
  dataFile: string;
}

export const DEFAULT_SETTINGS: Settings = {
  defaultTaxPercent: 15,
  priceLookbackDays: 7,
  analysisDays: 30,
  defaultRarity: "common",
  craftedLocation: "Workshop",
  dataFile: "craftcalc.data.json",
};

export const DEFAULT_CONFIG_FILE = "craftcalc.config.json";

export const SettingsFileSchema = z
  .object({
    defaultTaxPercent: z.number().min(0).max(100),
    priceLookbackDays: z.number().int().min(1),
    analysisDays: z.number().int().min(1),
    defaultRarity: z.enum(RARITIES),
    craftedLocation: z.string().trim().min(1),
    dataFile: z.string().min(1),
  })
  .partial();

/**
 * Read settings from `filePath`. A missing file gives the defaults; an
 * unreadable or invalid one gives the defaults and a warning.
 */
export function loadSettings(filePath: string, warn: (message: string) => void = () => {}): Settings {
  if (!existsSync(filePath)) return { ...DEFAULT_SETTINGS };

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, "utf-8"));
  } catch (err) {
    warn(`ignoring ${filePath}: ${err instanceof Error ? err.message : String(err)}`);
    return { ...DEFAULT_SETTINGS };
  }

  const parsed = SettingsFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    warn(`ignoring ${filePath}: ${issues}`);
    return { ...DEFAULT_SETTINGS };
  }
  return { ...DEFAULT_SETTINGS, ...parsed.data };
}
