#!/usr/bin/env node
/**
 * Backtest Ledger MCP: Command-Line Entry Point
 *
 * Path-based access to the pipeline without an MCP client:
 *   backtest-ledger grid --type coarse --output grids/coarse_grid.csv
 *   backtest-ledger batches --grid grids/coarse_grid.csv
 *   backtest-ledger record --batch 1 --results results/batch_001.xlsx
 *   backtest-ledger parse --file results/batch_001.xlsx
 *   backtest-ledger consolidate
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import * as path from "path";
import { realpathSync } from "fs";
import { fileURLToPath } from "url";
import { DEFAULT_CONFIG } from "./run-manager.js";
import { createToolError, isToolError, resolveFrom, writeJson, ensureDir } from "./utils.js";
import { generateGrid, summarizeGrid, toAllocationTable, writeAllocationCsv } from "./tools/grid.js";
import { MANIFEST_FILE, planBatches, upsertManifestEntry, writeBatchFiles } from "./tools/batches.js";
import { readAllocationCsv, validateWeights } from "./tools/allocations.js";
import { parseWorkbookTables } from "./tools/tables.js";
import {
  consolidateBatches,
  MAPPING_FILE,
  rankPortfolios,
  writeConsolidatedOutputs,
} from "./tools/consolidate.js";
import { loadRegistry } from "./tools/registry.js";
import type { GridType } from "./types.js";

const USAGE = `Usage: backtest-ledger <command> [options]

Commands:
  grid         --type coarse|fine|random|treasury [--n N] [--seed S] [--min F] [--output CSV]
  batches      --grid CSV [--out-dir DIR] [--batch-size N] [--start-batch N] [--end-batch N]
  record       --batch N --results XLSX [--manifest CSV]
  parse        --file XLSX [--sheet NAME] [--output JSON]
  consolidate  [--manifest CSV] [--batch-dir DIR] [--output-dir DIR] [--metric NAME] [--top N]`;

const GRID_TYPES: readonly GridType[] = ["coarse", "fine", "random", "treasury"];

export function parseArgs(args: readonly string[]): Record<string, string> {
  const out: Record<string, string> = {};
  for (let i = 0; i < args.length; i++) {
    const a = args[i];
    if (a.startsWith("--")) {
      const key = a.replace(/^--/, "");
      const next = args[i + 1];
      if (next !== undefined && !next.startsWith("--")) {
        out[key] = next;
        i++;
      } else {
        out[key] = "true";
      }
    }
  }
  return out;
}

function intFlag(flags: Record<string, string>, name: string): number | undefined {
  const raw = flags[name];
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw createToolError("INVALID_INPUT", `--${name} expects an integer, got "${raw}"`);
  }
  return value;
}

function requiredFlag(flags: Record<string, string>, name: string): string {
  const value = flags[name];
  if (value === undefined || value === "true") {
    throw createToolError("INVALID_INPUT", `--${name} is required`, { suggestion: USAGE });
  }
  return value;
}

function isGridType(value: string): value is GridType {
  return GRID_TYPES.some(type => type === value);
}

// ============================================================================
// Commands
// ============================================================================

async function gridCommand(flags: Record<string, string>, cwd: string): Promise<void> {
  const type = flags.type ?? "coarse";
  if (!isGridType(type)) {
    throw createToolError("INVALID_INPUT", `Unknown grid type "${type}"`, {
      suggestion: `Use one of: ${GRID_TYPES.join(", ")}`,
    });
  }

  const defaults = DEFAULT_CONFIG.defaults.grid;
  const minFlag = flags.min === undefined ? undefined : Number(flags.min);
  const grid = generateGrid(type, {
    count: intFlag(flags, "n") ?? defaults.random_count,
    seed: intFlag(flags, "seed") ?? defaults.random_seed,
    min_allocation: minFlag !== undefined && Number.isFinite(minFlag) ? minFlag : defaults.min_allocation,
  });

  const output = resolveFrom(cwd, flags.output ?? path.join("grids", `${type}_grid.csv`));
  await writeAllocationCsv(output, toAllocationTable(grid));

  const summary = summarizeGrid(grid);
  grid.warnings.forEach(warning => console.error(`⚠️  ${warning}`));
  console.log(`✓ Saved ${summary.portfolio_count} ${type} portfolios to: ${output}`);
  for (const asset of summary.assets) {
    console.log(
      `  ${asset.asset.padEnd(58)} ${asset.min.toFixed(1)}% - ${asset.max.toFixed(1)}% (mean ${asset.mean.toFixed(1)}%)`
    );
  }
  console.log(`  Total equity: ${summary.total_equity.min.toFixed(1)}% - ${summary.total_equity.max.toFixed(1)}%`);
  console.log(
    `  Total fixed income: ${summary.total_fixed_income.min.toFixed(1)}% - ${summary.total_fixed_income.max.toFixed(1)}%`
  );
}

async function batchesCommand(flags: Record<string, string>, cwd: string): Promise<void> {
  const gridPath = resolveFrom(cwd, requiredFlag(flags, "grid"));
  const outDir = resolveFrom(cwd, flags["out-dir"] ?? "batches");

  const grid = await readAllocationCsv(gridPath, DEFAULT_CONFIG.defaults.consolidation.portfolio_prefixes);
  const batches = planBatches(grid, {
    batch_size: intFlag(flags, "batch-size") ?? DEFAULT_CONFIG.defaults.batching.batch_size,
    start_batch: intFlag(flags, "start-batch"),
    end_batch: intFlag(flags, "end-batch"),
  });

  validateWeights(grid, DEFAULT_CONFIG.defaults.batching.weight_tolerance)
    .warnings.forEach(warning => console.error(`⚠️  ${warning}`));

  const written = await writeBatchFiles(outDir, batches);
  console.log(`✓ Wrote ${written.length} batch files for ${grid.portfolio_columns.length} portfolios to: ${outDir}`);
}

async function recordCommand(flags: Record<string, string>, cwd: string): Promise<void> {
  const batchNum = intFlag(flags, "batch");
  if (batchNum === undefined || batchNum < 1) {
    throw createToolError("INVALID_INPUT", "--batch must be a positive integer", { suggestion: USAGE });
  }
  const results = requiredFlag(flags, "results");
  const manifestPath = resolveFrom(cwd, flags.manifest ?? path.join("batches", MANIFEST_FILE));

  const entries = await upsertManifestEntry(
    manifestPath,
    { batch_num: batchNum, results_file: results },
    resolveFrom(cwd, results)
  );
  console.log(`✓ Recorded batch ${batchNum} (${entries.length} batches in ${manifestPath})`);
}

async function parseCommand(flags: Record<string, string>, cwd: string): Promise<void> {
  const file = resolveFrom(cwd, requiredFlag(flags, "file"));
  const sheet = flags.sheet ?? DEFAULT_CONFIG.defaults.workbook.sheet_name;

  const { workbook, warnings } = await parseWorkbookTables(file, sheet);
  warnings.forEach(warning => console.error(`⚠️  ${warning}`));

  console.log(`Found ${workbook.blocks.length} tables in ${path.basename(file)}`);
  for (const block of workbook.blocks) {
    console.log(
      `  ${block.table_name} [${block.table_type}] rows ${block.start_row}-${block.end_row}: ${block.parsed_as} (${block.row_count})`
    );
  }

  if (flags.output) {
    const output = resolveFrom(cwd, flags.output);
    await ensureDir(path.dirname(output));
    await writeJson(output, workbook);
    console.log(`✓ Saved parsed tables: ${output}`);
  }
}

async function consolidateCommand(flags: Record<string, string>, cwd: string): Promise<void> {
  const settings = DEFAULT_CONFIG.defaults.consolidation;
  const outputDir = resolveFrom(cwd, flags["output-dir"] ?? "consolidated");
  const registry = await loadRegistry(path.join(outputDir, MAPPING_FILE));

  const result = await consolidateBatches({
    manifestPath: resolveFrom(cwd, flags.manifest ?? path.join("batches", MANIFEST_FILE)),
    batchDir: resolveFrom(cwd, flags["batch-dir"] ?? "batches"),
    baseDir: cwd,
    registry,
    sheetName: flags.sheet ?? DEFAULT_CONFIG.defaults.workbook.sheet_name,
    settings,
  });
  result.warnings.forEach(warning => console.error(`⚠️  ${warning}`));

  const paths = await writeConsolidatedOutputs(outputDir, result, registry);
  console.log(`✓ Consolidated ${result.batches.length} batches (${registry.size} portfolios)`);
  console.log(`  Metadata: ${paths.metadata} (${result.metadata.length} rows)`);
  console.log(`  Metrics: ${paths.metrics} (${result.metrics.length} rows)`);
  console.log(`  Mapping: ${paths.mapping}`);

  const metric = flags.metric ?? settings.ranking_metric;
  const top = rankPortfolios(result.metrics, metric, intFlag(flags, "top") ?? settings.top_n);
  if (top.length > 0) {
    console.log(`\nTop ${top.length} portfolios by ${metric}:`);
    for (const entry of top) {
      console.log(`${String(entry.rank).padStart(2)}. ${entry.portfolio_name.padEnd(15)}: ${entry.metric_value.toFixed(6)}`);
    }
  }
}

const COMMANDS: Record<string, (flags: Record<string, string>, cwd: string) => Promise<void>> = {
  grid: gridCommand,
  batches: batchesCommand,
  record: recordCommand,
  parse: parseCommand,
  consolidate: consolidateCommand,
};

/**
 * Run one command; resolves to the process exit code
 */
export async function runCli(argv: readonly string[], cwd: string = process.cwd()): Promise<number> {
  const [command, ...rest] = argv;
  const handler = command !== undefined && Object.hasOwn(COMMANDS, command) ? COMMANDS[command] : undefined;

  if (handler === undefined) {
    console.error(USAGE);
    return 1;
  }

  try {
    await handler(parseArgs(rest), cwd);
    return 0;
  } catch (error) {
    if (!isToolError(error)) throw error;
    console.error(`Error: ${error.code}: ${error.message}`);
    if (error.suggestion) console.error(error.suggestion);
    return 1;
  }
}

const invokedPath = process.argv[1];
if (invokedPath !== undefined && realpathSync(invokedPath) === fileURLToPath(import.meta.url)) {
  runCli(process.argv.slice(2))
    .then(code => {
      process.exitCode = code;
    })
    .catch(err => {
      console.error(err);
      process.exit(1);
    });
}
