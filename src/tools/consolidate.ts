/**
 * 🧮 Batch Consolidation - Backtest Ledger MCP
 *
 * Joins every batch's allocation CSV with its parsed results workbook and
 * produces three long-format tables:
 * - portfolio_metadata.csv: one row per (portfolio, asset) with a fractional weight
 * - portfolio_performance_metrics.csv: one row per (portfolio, metric, source table)
 * - portfolio_uuid_mapping.csv: portfolio name to stable identifier
 *
 * Result columns are matched to allocation columns by their names
 * ("Sample Portfolio" is the first, "Portfolio N" the Nth).
 *
 * @module tools/consolidate
 * @see tests/consolidation.test.ts for the test contract
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import * as path from 'path';
import { glob } from 'glob';
import { getRunManager } from '../run-manager.js';
import {
  createToolError,
  hashFile,
  isToolError,
  now,
  padNumber,
  parseNumber,
  readCsvFile,
  resolveFrom,
  writeCsvFile,
} from '../utils.js';
import { readAllocationCsv } from './allocations.js';
import { loadRegistry, PortfolioRegistry, saveRegistry } from './registry.js';
import { parseWorkbookTables } from './tables.js';
import type { ConsolidateInput } from '../schemas.js';
import type {
  AllocationTable,
  BacktestLedgerConfig,
  BatchManifestEntry,
  Cell,
  MetricRecord,
  MetricTableGroup,
  ParsedWorkbook,
  PortfolioRecord,
  TabularTable,
  ToolError,
} from '../types.js';

export const METADATA_FILE = 'portfolio_metadata.csv';
export const METRICS_FILE = 'portfolio_performance_metrics.csv';
export const MAPPING_FILE = 'portfolio_uuid_mapping.csv';

const METADATA_COLUMNS = ['portfolio_uuid', 'portfolio_name', 'asset_name', 'portfolio_weight'];
const METRIC_COLUMNS = ['portfolio_uuid', 'portfolio_name', 'metric_name', 'metric_value', 'table_source'];

type ConsolidationDefaults = BacktestLedgerConfig['defaults']['consolidation'];

// ============================================================================
// Metadata
// ============================================================================

/**
 * One record per strictly positive weight, portfolio by portfolio, assets in file order.
 * Weights are stored as fractions (percent / 100).
 */
export function extractPortfolioMetadata(
  allocations: AllocationTable,
  registry: PortfolioRegistry
): PortfolioRecord[] {
  const records: PortfolioRecord[] = [];

  for (const portfolio of allocations.portfolio_columns) {
    const portfolioUuid = registry.resolveOrCreate(portfolio);

    for (const row of allocations.rows) {
      const weight = row.weights[portfolio];
      if (weight === null || weight === undefined || weight <= 0) continue;

      records.push({
        portfolio_uuid: portfolioUuid,
        portfolio_name: portfolio,
        asset_name: row.asset_description,
        portfolio_weight: weight / 100,
      });
    }
  }

  return records;
}

// ============================================================================
// Metrics
// ============================================================================

/**
 * Zero-based portfolio position named by a results column, or null when the
 * column names none.
 */
export function portfolioHint(column: string): number | null {
  const lowered = column.toLowerCase();
  if (lowered.includes('sample')) return 0;

  const match = /portfolio\s*(\d+)/.exec(lowered);
  if (match) return Number(match[1]) - 1;

  return null;
}

export interface ColumnMapping {
  /** Index into the table's columns */
  column_index: number;
  column: string;
  portfolio: string;
}

/**
 * Map the value columns of a results table (every column after the first) to
 * the batch's allocation columns.
 */
export function mapResultColumns(
  columns: readonly string[],
  portfolioColumns: readonly string[],
  tableName: string
): { mappings: ColumnMapping[]; warnings: string[] } {
  const mappings: ColumnMapping[] = [];
  const warnings: string[] = [];

  columns.forEach((column, columnIndex) => {
    if (columnIndex === 0) return;
    const position = columnIndex - 1;
    const hint = portfolioHint(column);

    if (hint === null) {
      warnings.push(`${tableName}: column "${column}" names no portfolio; skipped`);
      return;
    }

    const portfolio = portfolioColumns[hint];
    if (hint < 0 || portfolio === undefined) {
      warnings.push(
        `${tableName}: column "${column}" points at portfolio ${hint + 1} but the batch has ${portfolioColumns.length}; skipped`
      );
      return;
    }

    if (hint !== position) {
      warnings.push(`${tableName}: column "${column}" sits at position ${position + 1}; mapped to ${portfolio} by name`);
    }

    mappings.push({ column_index: columnIndex, column, portfolio });
  });

  return { mappings, warnings };
}

/**
 * Numbers pass through; numeric text (thousands separators allowed) is parsed;
 * anything else is not a metric value.
 */
export function coerceMetricValue(cell: Cell): number | null {
  if (typeof cell === 'number') return Number.isFinite(cell) ? cell : null;
  if (typeof cell === 'string') return parseNumber(cell);
  return null;
}

/**
 * Pick the table for each metric group: the first variant whose leading
 * characters appear in a table name wins. A table serves at most one group.
 */
export function findMetricTables(
  workbook: ParsedWorkbook,
  groups: readonly MetricTableGroup[],
  prefixChars: number
): { tables: Array<{ group: MetricTableGroup; table_name: string }>; warnings: string[] } {
  const tableNames = Object.keys(workbook.tables);
  const used = new Set<string>();
  const tables: Array<{ group: MetricTableGroup; table_name: string }> = [];
  const warnings: string[] = [];

  for (const group of groups) {
    let found: string | undefined;
    for (const variant of group.names) {
      const needle = variant.slice(0, prefixChars);
      found = tableNames.find(name => !used.has(name) && name.includes(needle));
      if (found !== undefined) break;
    }

    if (found === undefined) {
      warnings.push(`No "${group.label}" table found in ${path.basename(workbook.source_file)}`);
      continue;
    }

    used.add(found);
    tables.push({ group, table_name: found });
  }

  return { tables, warnings };
}

function metricRowsFromTable(
  table: TabularTable,
  mappings: readonly ColumnMapping[],
  registry: PortfolioRegistry
): MetricRecord[] {
  const records: MetricRecord[] = [];

  for (const mapping of mappings) {
    const portfolioUuid = registry.resolveOrCreate(mapping.portfolio);

    for (const row of table.rows) {
      const nameCell = row[0];
      if (nameCell === null || nameCell === undefined) continue;
      const metricName = String(nameCell).trim();
      if (metricName === '') continue;

      const value = coerceMetricValue(row[mapping.column_index] ?? null);
      if (value === null) continue;

      records.push({
        portfolio_uuid: portfolioUuid,
        portfolio_name: mapping.portfolio,
        metric_name: metricName,
        metric_value: value,
        table_source: table.name,
      });
    }
  }

  return records;
}

/**
 * Metric records for one batch, in group order then column order then row order
 */
export function extractBatchMetrics(
  workbook: ParsedWorkbook,
  portfolioColumns: readonly string[],
  registry: PortfolioRegistry,
  options: Pick<ConsolidationDefaults, 'metric_tables' | 'match_prefix_chars'>
): { records: MetricRecord[]; warnings: string[] } {
  const found = findMetricTables(workbook, options.metric_tables, options.match_prefix_chars);
  const warnings = [...found.warnings];
  const records: MetricRecord[] = [];

  for (const { table_name } of found.tables) {
    const table = workbook.tables[table_name];
    if (table === undefined || table.kind !== 'tabular') {
      warnings.push(`${table_name}: parsed as key-value pairs, not a metrics table; skipped`);
      continue;
    }

    const mapped = mapResultColumns(table.columns, portfolioColumns, table_name);
    warnings.push(...mapped.warnings);
    records.push(...metricRowsFromTable(table, mapped.mappings, registry));
  }

  return { records, warnings };
}

// ============================================================================
// Manifest and Batch Files
// ============================================================================

/**
 * Read batch_manifest.csv. A missing file or a malformed row is fatal.
 */
export async function readBatchManifest(manifestPath: string): Promise<BatchManifestEntry[]> {
  const csv = await readCsvFile(manifestPath);

  return csv.records.map((record, index) => {
    const batchNum = parseNumber(record.batch_num);
    const resultsFile = record.results_file ?? '';

    if (batchNum === null || !Number.isInteger(batchNum) || batchNum < 1 || resultsFile === '') {
      throw createToolError('INVALID_INPUT', `Malformed manifest row ${index + 1} in ${manifestPath}`, {
        details: { row: record },
        suggestion: 'Each row needs a positive integer batch_num and a results_file path',
      });
    }

    return { batch_num: batchNum, results_file: resultsFile };
  });
}

/**
 * Locate batch_<NNN>_*.csv; the lexicographically first match wins
 */
export async function findBatchFile(batchDir: string, batchNum: number): Promise<string> {
  const matches = await glob(`batch_${padNumber(batchNum)}_*.csv`, { cwd: batchDir, nodir: true });

  if (matches.length === 0) {
    throw createToolError('BATCH_FILE_NOT_FOUND', `No allocation CSV for batch ${batchNum} in ${batchDir}`, {
      details: { batch_dir: batchDir, batch_num: batchNum },
      suggestion: 'Plan batches first so that batch_<NNN>_*.csv files exist',
    });
  }

  matches.sort();
  return path.join(batchDir, matches[0]);
}

// ============================================================================
// Consolidation
// ============================================================================

export interface BatchSummary {
  batch_num: number;
  batch_file: string;
  results_file: string;
  portfolios: string[];
  metadata_rows: number;
  metric_rows: number;
}

export interface ConsolidationResult {
  metadata: PortfolioRecord[];
  metrics: MetricRecord[];
  batches: BatchSummary[];
  warnings: string[];
}

export interface ConsolidateOptions {
  manifestPath: string;
  batchDir: string;
  /** Relative results_file paths resolve against this directory */
  baseDir: string;
  registry: PortfolioRegistry;
  sheetName: string;
  settings: Pick<ConsolidationDefaults, 'portfolio_prefixes' | 'metric_tables' | 'match_prefix_chars'>;
}

/**
 * Process every manifest row in order. Rows already emitted in this call are
 * not emitted again.
 */
export async function consolidateBatches(options: ConsolidateOptions): Promise<ConsolidationResult> {
  const entries = await readBatchManifest(options.manifestPath);
  const metadata: PortfolioRecord[] = [];
  const metrics: MetricRecord[] = [];
  const batches: BatchSummary[] = [];
  const warnings: string[] = [];
  const seenMetadata = new Set<string>();
  const seenMetrics = new Set<string>();

  for (const entry of entries) {
    const batchFile = await findBatchFile(options.batchDir, entry.batch_num);
    const resultsFile = resolveFrom(options.baseDir, entry.results_file);

    const allocations = await readAllocationCsv(batchFile, options.settings.portfolio_prefixes);
    if (allocations.portfolio_columns.length === 0) {
      warnings.push(`Batch ${entry.batch_num}: ${path.basename(batchFile)} has no portfolio columns`);
    }

    const parsed = await parseWorkbookTables(resultsFile, options.sheetName);
    warnings.push(...parsed.warnings);

    let metadataRows = 0;
    for (const record of extractPortfolioMetadata(allocations, options.registry)) {
      const key = `${record.portfolio_uuid}\u0000${record.asset_name}`;
      if (seenMetadata.has(key)) continue;
      seenMetadata.add(key);
      metadata.push(record);
      metadataRows++;
    }

    const extracted = extractBatchMetrics(
      parsed.workbook,
      allocations.portfolio_columns,
      options.registry,
      options.settings
    );
    warnings.push(...extracted.warnings.map(warning => `Batch ${entry.batch_num}: ${warning}`));

    let metricRows = 0;
    for (const record of extracted.records) {
      const key = `${record.portfolio_uuid}\u0000${record.metric_name}\u0000${record.table_source}`;
      if (seenMetrics.has(key)) continue;
      seenMetrics.add(key);
      metrics.push(record);
      metricRows++;
    }

    batches.push({
      batch_num: entry.batch_num,
      batch_file: batchFile,
      results_file: resultsFile,
      portfolios: allocations.portfolio_columns,
      metadata_rows: metadataRows,
      metric_rows: metricRows,
    });
  }

  return { metadata, metrics, batches, warnings };
}

export interface ConsolidatedPaths {
  metadata: string;
  metrics: string;
  mapping: string;
}

export async function writeConsolidatedOutputs(
  outputDir: string,
  result: Pick<ConsolidationResult, 'metadata' | 'metrics'>,
  registry: PortfolioRegistry
): Promise<ConsolidatedPaths> {
  const paths: ConsolidatedPaths = {
    metadata: path.join(outputDir, METADATA_FILE),
    metrics: path.join(outputDir, METRICS_FILE),
    mapping: path.join(outputDir, MAPPING_FILE),
  };

  await writeCsvFile(
    paths.metadata,
    METADATA_COLUMNS,
    result.metadata.map(r => [r.portfolio_uuid, r.portfolio_name, r.asset_name, r.portfolio_weight])
  );
  await writeCsvFile(
    paths.metrics,
    METRIC_COLUMNS,
    result.metrics.map(r => [r.portfolio_uuid, r.portfolio_name, r.metric_name, r.metric_value, r.table_source])
  );
  await saveRegistry(paths.mapping, registry);

  return paths;
}

// ============================================================================
// Ranking
// ============================================================================

export interface RankedPortfolio {
  rank: number;
  portfolio_name: string;
  portfolio_uuid: string;
  metric_value: number;
  table_source: string;
}

/**
 * Top portfolios by one metric, highest first. A portfolio reporting the
 * metric in several tables is ranked on its first occurrence.
 */
export function rankPortfolios(
  metrics: readonly MetricRecord[],
  metricName: string = 'Sharpe Ratio',
  topN: number = 10
): RankedPortfolio[] {
  const firstByPortfolio = new Map<string, MetricRecord>();
  for (const record of metrics) {
    if (record.metric_name !== metricName) continue;
    if (!firstByPortfolio.has(record.portfolio_uuid)) {
      firstByPortfolio.set(record.portfolio_uuid, record);
    }
  }

  return Array.from(firstByPortfolio.values())
    .sort((a, b) => b.metric_value - a.metric_value)
    .slice(0, topN)
    .map((record, index) => ({
      rank: index + 1,
      portfolio_name: record.portfolio_name,
      portfolio_uuid: record.portfolio_uuid,
      metric_value: record.metric_value,
      table_source: record.table_source,
    }));
}

// ============================================================================
// Tool: backtest_consolidate
// ============================================================================

export interface ConsolidateRunResult {
  success: true;
  outputs: ConsolidatedPaths;
  batches: BatchSummary[];
  totals: {
    portfolios: number;
    identifiers_minted: number;
    metadata_rows: number;
    metric_rows: number;
  };
  ranking: {
    metric: string;
    top: RankedPortfolio[];
  };
  warnings: string[];
}

/**
 * Consolidate every batch listed in the run's manifest into consolidated/*.csv
 */
export async function consolidateRun(input: ConsolidateInput): Promise<ConsolidateRunResult | ToolError> {
  const manager = getRunManager();
  const { runDir } = await manager.ensureRun(input.run_id);
  const { logger } = await manager.getRun(input.run_id);
  const defaults = manager.getDefaults();

  const outputDir = manager.getConsolidatedDir(input.run_id);
  const manifestPath = resolveFrom(runDir, input.manifest_path);
  const registry = await loadRegistry(path.join(outputDir, MAPPING_FILE));

  await manager.startPhase(input.run_id, 'consolidate');

  let result: ConsolidationResult;
  try {
    result = await consolidateBatches({
      manifestPath,
      batchDir: resolveFrom(runDir, input.batch_dir),
      baseDir: runDir,
      registry,
      sheetName: defaults.workbook.sheet_name,
      settings: defaults.consolidation,
    });
  } catch (error) {
    if (!isToolError(error)) throw error;
    await logger.error('consolidate', 'backtest_consolidate', error.message, error.details);
    await manager.completePhase(input.run_id, 'consolidate', {
      errors: [{ timestamp: now(), code: error.code, message: error.message, details: error.details, recoverable: error.recoverable }],
    });
    await manager.addTotals(input.run_id, { errors_encountered: 1 });
    await manager.completeRun(input.run_id, 'failed');
    return error;
  }

  const outputs = await writeConsolidatedOutputs(outputDir, result, registry);

  const metric = input.ranking_metric ?? defaults.consolidation.ranking_metric;
  const top = rankPortfolios(result.metrics, metric, input.top_n ?? defaults.consolidation.top_n);

  await logger.warnAll('consolidate', 'backtest_consolidate', result.warnings);
  await logger.info('consolidate', 'backtest_consolidate', `Consolidated ${result.batches.length} batches`, {
    portfolios: registry.size,
    minted: registry.mintedCount,
    metadata_rows: result.metadata.length,
    metric_rows: result.metrics.length,
  });

  await manager.completePhase(input.run_id, 'consolidate', {
    inputs: { count: result.batches.length + 1, hashes: [await hashFile(manifestPath)] },
    outputs: {
      count: 3,
      hashes: [await hashFile(outputs.metadata), await hashFile(outputs.metrics), await hashFile(outputs.mapping)],
    },
    warnings: result.warnings,
  });
  await manager.updateManifest(input.run_id, {
    totals: { metadata_rows: result.metadata.length, metric_rows: result.metrics.length },
  });
  await manager.completeRun(input.run_id, result.warnings.length > 0 ? 'partial' : 'completed');

  return {
    success: true,
    outputs,
    batches: result.batches,
    totals: {
      portfolios: registry.size,
      identifiers_minted: registry.mintedCount,
      metadata_rows: result.metadata.length,
      metric_rows: result.metrics.length,
    },
    ranking: { metric, top },
    warnings: result.warnings,
  };
}
