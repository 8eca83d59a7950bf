import { Command, InvalidArgumentError } from "commander";
import { ZodError } from "zod";
import {
  CraftingError,
  ItemNotFoundError,
  analyzeMarket,
  calculateCraftingCost,
  checkAvailability,
  formatWithRarity,
  planBatch,
  recommend,
} from "@craftcalc/core";
import type { Rarity } from "@craftcalc/core";
import {
  parseBatchEntry,
  parseInteger,
  parseItemId,
  parseLocationFilter,
  parseNumber,
  parseOverrides,
  parseRarityArg,
} from "./args.js";
import {
  formatAnalysis,
  formatAvailability,
  formatBatch,
  formatBreakdown,
  formatInventory,
  formatRarities,
  formatSearch,
} from "./format.js";
import { DEFAULT_CONFIG_FILE, loadSettings } from "./settings.js";
import type { Settings } from "./settings.js";
import { DataStore } from "./store.js";

/** Where the CLI prints. Defaults to the console. */
export interface CliOutput {
  log(line: string): void;
  warn(line: string): void;
  error(line: string): void;
}

export interface ProgramOptions {
  output?: CliOutput;
  now?: () => Date;
  /** Throw CommanderError instead of exiting the process. */
  exitOverride?: boolean;
}

type GlobalOptions = {
  data?: string;
  config: string;
};

interface CostCommandOptions {
  rarity?: Rarity;
  quantity: number;
  tax?: number;
  quality: number;
  price?: string[];
  json?: boolean;
}

interface CheckCommandOptions {
  rarity?: Rarity;
  quantity: number;
  location?: string;
  json?: boolean;
}

interface MarketCommandOptions {
  rarity?: Rarity;
  days?: number;
  json?: boolean;
}

interface BatchCommandOptions {
  tax?: number;
  location?: string;
  price?: string[];
  json?: boolean;
}

interface PriceCommandOptions {
  rarity?: Rarity;
  source: string;
  location?: string;
  notes?: string;
}

interface StockCommandOptions {
  rarity?: Rarity;
  cost?: number;
}

interface CraftedCommandOptions {
  rarity?: Rarity;
  quantity: number;
  tax?: number;
  price?: string[];
  location?: string;
  json?: boolean;
}

interface SearchCommandOptions {
  profession?: string;
  json?: boolean;
}

interface InventoryCommandOptions {
  item?: number;
  rarity?: Rarity;
  location?: string;
  json?: boolean;
}

interface Context {
  settings: Settings;
  dataFile: string;
  store: DataStore;
}

const consoleOutput: CliOutput = {
  log: (line) => console.log(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
};

function describeError(err: CraftingError | ZodError | SyntaxError | InvalidArgumentError): string {
  if (err instanceof ZodError) {
    return err.issues.map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message)).join("; ");
  }
  return err.message;
}

export function createProgram(options: ProgramOptions = {}): Command {
  const output = options.output ?? consoleOutput;
  const now = options.now ?? (() => new Date());

  const program = new Command();

  // Settings set before the subcommands are added are inherited by them.
  program.configureOutput({
    writeOut: (str) => output.log(str.trimEnd()),
    writeErr: (str) => output.error(str.trimEnd()),
  });
  if (options.exitOverride) program.exitOverride();

  program
    .name("craftcalc")
    .description("Crafting cost calculator: material costs, stock checks and market trends")
    .version("0.1.0")
    .option("--data <file>", "data file (items, recipes, prices, stock)")
    .option("--config <file>", "settings file", DEFAULT_CONFIG_FILE);

  const load = (cmd: Command): Context => {
    const globals = cmd.optsWithGlobals<GlobalOptions>();
    const settings = loadSettings(globals.config, (message) => output.warn(`warning: ${message}`));
    const dataFile = globals.data ?? settings.dataFile;
    return { settings, dataFile, store: DataStore.load(dataFile, now) };
  };

  const print = (text: string) => output.log(text);
  const printJson = (value: unknown) => output.log(JSON.stringify(value, null, 2));

  const overridesFrom = (pairs: readonly string[] = []) => {
    const { overrides, malformedKeys } = parseOverrides(pairs);
    for (const key of malformedKeys) {
      output.warn(`warning: "${key}" is not <itemId>_<rank>; the price applies to item 0 (common)`);
    }
    return overrides;
  };

  // Engine and data-file errors become a one-line message and exit code 1.
  const run = <A extends unknown[]>(action: (...args: A) => void) =>
    (...args: A): void => {
      try {
        action(...args);
      } catch (err) {
        if (
          err instanceof CraftingError ||
          err instanceof ZodError ||
          err instanceof SyntaxError ||
          err instanceof InvalidArgumentError
        ) {
          program.error(`error: ${describeError(err)}`, { exitCode: 1, code: "craftcalc.error" });
        }
        throw err;
      }
    };

  program
    .command("cost")
    .description("Cost out crafting an item at a target rarity")
    .argument("<itemId>", "item to craft", parseItemId)
    .option("-r, --rarity <rarity>", "target rarity", parseRarityArg)
    .option("-q, --quantity <n>", "number of crafts", parseInteger, 1)
    .option("-t, --tax <percent>", "tax on the base fee, in percent", parseNumber)
    .option("--quality <rating>", "crafter quality rating", parseInteger, 0)
    .option("-p, --price <itemId_rank=price...>", "price overrides, e.g. 1201_3=7.5")
    .option("--json", "print JSON")
    .action(run((itemId: number, opts: CostCommandOptions, cmd: Command) => {
      const { settings, store } = load(cmd);
      const breakdown = calculateCraftingCost(
        store,
        itemId,
        {
          targetRarity: opts.rarity ?? settings.defaultRarity,
          quantity: opts.quantity,
          taxRate: (opts.tax ?? settings.defaultTaxPercent) / 100,
          overrides: overridesFrom(opts.price),
          qualityRating: opts.quality,
          lookbackDays: settings.priceLookbackDays,
        },
        store.getRecentPrices,
      );
      if (opts.json) printJson(breakdown);
      else print(formatBreakdown(breakdown, store.itemName(itemId)));
    }));

  program
    .command("check")
    .description("Check whether stock covers a craft")
    .argument("<itemId>", "item to craft", parseItemId)
    .option("-r, --rarity <rarity>", "target rarity", parseRarityArg)
    .option("-q, --quantity <n>", "number of crafts", parseInteger, 1)
    .option("-l, --location <location>", "only count stock at this location", parseLocationFilter)
    .option("--json", "print JSON")
    .action(run((itemId: number, opts: CheckCommandOptions, cmd: Command) => {
      const { settings, store } = load(cmd);
      const breakdown = calculateCraftingCost(
        store,
        itemId,
        {
          targetRarity: opts.rarity ?? settings.defaultRarity,
          quantity: opts.quantity,
          lookbackDays: settings.priceLookbackDays,
        },
        store.getRecentPrices,
      );
      const report = checkAvailability(breakdown, store.getInventory, opts.location);
      if (opts.json) printJson(report);
      else print(formatAvailability(report, opts.location));
    }));

  program
    .command("market")
    .description("Summarize recent market prices for an item")
    .argument("<itemId>", "item to analyze", parseItemId)
    .option("-r, --rarity <rarity>", "rarity", parseRarityArg)
    .option("-d, --days <n>", "days of history", parseInteger)
    .option("--json", "print JSON")
    .action(run((itemId: number, opts: MarketCommandOptions, cmd: Command) => {
      const { settings, store } = load(cmd);
      if (!store.getItem(itemId)) throw new ItemNotFoundError(itemId);
      const rarity = opts.rarity ?? settings.defaultRarity;
      const days = opts.days ?? settings.analysisDays;
      const analysis = analyzeMarket(store.getRecentPrices(itemId, rarity, days), rarity);
      const advice = recommend(analysis);
      if (opts.json) printJson({ ...analysis, recommendation: advice });
      else print(formatAnalysis(analysis, store.itemName(itemId), days, advice));
    }));

  program
    .command("batch")
    .description("Plan several crafts and list what to buy")
    .argument("<entries...>", "crafts as <itemId>[:<rarity>[:<quantity>]]")
    .option("-t, --tax <percent>", "tax on the base fee, in percent", parseNumber)
    .option("-l, --location <location>", "only count stock at this location", parseLocationFilter)
    .option("-p, --price <itemId_rank=price...>", "price overrides, e.g. 1201_3=7.5")
    .option("--json", "print JSON")
    .action(run((values: string[], opts: BatchCommandOptions, cmd: Command) => {
      const { settings, store } = load(cmd);
      const entries = values.map((v) => parseBatchEntry(v, settings.defaultRarity));
      const plan = planBatch(entries, store, store.getRecentPrices, store.getInventory, {
        taxRate: (opts.tax ?? settings.defaultTaxPercent) / 100,
        overrides: overridesFrom(opts.price),
        lookbackDays: settings.priceLookbackDays,
        locationFilter: opts.location,
      });
      if (opts.json) printJson(plan);
      else print(formatBatch(plan));
    }));

  program
    .command("price")
    .description("Record a market price")
    .argument("<itemId>", "item", parseItemId)
    .argument("<price>", "unit price in gold", parseNumber)
    .option("-r, --rarity <rarity>", "rarity", parseRarityArg)
    .option("-s, --source <source>", "where the price was seen", "market")
    .option("-l, --location <location>", "market location")
    .option("--notes <text>", "free-form notes")
    .action(run((itemId: number, price: number, opts: PriceCommandOptions, cmd: Command) => {
      const { settings, dataFile, store } = load(cmd);
      const rarity = opts.rarity ?? settings.defaultRarity;
      store.recordPrice({ itemId, rarity, price, source: opts.source, location: opts.location, notes: opts.notes });
      store.save(dataFile);
      print(`Recorded ${price.toFixed(2)} gold for ${formatWithRarity(store.itemName(itemId), rarity)} (${opts.source})`);
    }));

  program
    .command("stock")
    .description("Set how many of an item are held at a location")
    .argument("<itemId>", "item", parseItemId)
    .argument("<location>", "storage location")
    .argument("<quantity>", "quantity held", parseInteger)
    .option("-r, --rarity <rarity>", "rarity", parseRarityArg)
    .option("-c, --cost <gold>", "average cost per unit", parseNumber)
    .action(run((itemId: number, location: string, quantity: number, opts: StockCommandOptions, cmd: Command) => {
      const { settings, dataFile, store } = load(cmd);
      const rarity = opts.rarity ?? settings.defaultRarity;
      store.setStock({ itemId, rarity, location, quantity, averageCost: opts.cost });
      store.save(dataFile);
      print(`${location}: ${formatWithRarity(store.itemName(itemId), rarity, quantity)}`);
    }));

  program
    .command("crafted")
    .description("Cost a finished craft and add the items to stock")
    .argument("<itemId>", "item crafted", parseItemId)
    .option("-r, --rarity <rarity>", "rarity crafted", parseRarityArg)
    .option("-q, --quantity <n>", "number crafted", parseInteger, 1)
    .option("-t, --tax <percent>", "tax on the base fee, in percent", parseNumber)
    .option("-p, --price <itemId_rank=price...>", "price overrides, e.g. 1201_3=7.5")
    .option("-l, --location <location>", "where the items go (default from settings)", parseLocationFilter)
    .option("--json", "print JSON")
    .action(run((itemId: number, opts: CraftedCommandOptions, cmd: Command) => {
      const { settings, dataFile, store } = load(cmd);
      const breakdown = calculateCraftingCost(
        store,
        itemId,
        {
          targetRarity: opts.rarity ?? settings.defaultRarity,
          quantity: opts.quantity,
          taxRate: (opts.tax ?? settings.defaultTaxPercent) / 100,
          overrides: overridesFrom(opts.price),
          lookbackDays: settings.priceLookbackDays,
        },
        store.getRecentPrices,
      );
      const location = opts.location ?? settings.craftedLocation;
      const entry = store.addCraftedStock({
        itemId,
        rarity: breakdown.targetRarity,
        location,
        quantity: breakdown.quantity,
        totalCost: breakdown.totalCost,
      });
      store.save(dataFile);
      if (opts.json) {
        printJson({ breakdown, stock: entry });
        return;
      }
      const made = formatWithRarity(store.itemName(itemId), breakdown.targetRarity, breakdown.quantity);
      print(
        `Added ${made} to ${location} at ${breakdown.costPerUnit.toFixed(2)} gold each ` +
        `(now ${entry.quantity}, avg ${entry.averageCost.toFixed(2)} gold)`,
      );
    }));

  program
    .command("search")
    .description("Find items by name")
    .argument("<term>", "part of the item name")
    .option("--profession <name>", "only items of this profession")
    .option("--json", "print JSON")
    .action(run((term: string, opts: SearchCommandOptions, cmd: Command) => {
      const { store } = load(cmd);
      const items = store.searchItems(term, opts.profession);
      if (opts.json) printJson(items);
      else print(formatSearch(items, term));
    }));

  program
    .command("inventory")
    .description("List stock by item, rarity and location")
    .option("-i, --item <itemId>", "only this item", parseItemId)
    .option("-r, --rarity <rarity>", "only this rarity", parseRarityArg)
    .option("-l, --location <location>", "only this location", parseLocationFilter)
    .option("--json", "print JSON")
    .action(run((opts: InventoryCommandOptions, cmd: Command) => {
      const { store } = load(cmd);
      const stock = store.inventoryOverview({ itemId: opts.item, rarity: opts.rarity, location: opts.location });
      const rarities = opts.item === undefined ? undefined : store.stockedRarities(opts.item);
      if (opts.json) printJson(rarities === undefined ? { stock } : { stock, rarities });
      else print(formatInventory(stock, rarities));
    }));

  program
    .command("rarities")
    .description("List rarity tiers")
    .action(() => print(formatRarities()));

  program
    .command("config")
    .description("Print the effective settings")
    .action(run((_opts: Record<string, never>, cmd: Command) => printJson(load(cmd).settings)));

  return program;
}
