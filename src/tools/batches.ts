/**
 * Batch Planning - Backtest Ledger MCP
 *
 * Splits an allocation grid into the small batches the backtesting site
 * accepts and keeps batch_manifest.csv, the record of which results workbook
 * belongs to which batch.
 *
 * @module tools/batches
 * @see tests/batch-planning.test.ts for the test contract
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import * as path from 'path';
import { getRunManager } from '../run-manager.js';
import {
  createToolError,
  hashFile,
  isToolError,
  now,
  padNumber,
  pathExists,
  resolveFrom,
  writeCsvFile,
} from '../utils.js';
import { readAllocationCsv, validateWeights } from './allocations.js';
import { readBatchManifest } from './consolidate.js';
import { writeAllocationCsv } from './grid.js';
import type { PlanBatchesInput, RecordResultInput } from '../schemas.js';
import type { AllocationTable, BatchManifestEntry, ToolError } from '../types.js';

export const MAX_BATCH_SIZE = 3;
export const MANIFEST_FILE = 'batch_manifest.csv';

// ============================================================================
// Planning
// ============================================================================

export interface PlannedBatch {
  batch_num: number;
  portfolios: string[];
  file_name: string;
  allocations: AllocationTable;
}

export interface BatchPlanOptions {
  batch_size?: number;
  start_batch?: number;
  end_batch?: number;
}

export function batchFileName(batchNum: number, portfolios: readonly string[]): string {
  const first = portfolios[0] ?? 'empty';
  const last = portfolios[portfolios.length - 1] ?? first;
  return `batch_${padNumber(batchNum)}_${first}_to_${last}.csv`;
}

/**
 * Split portfolio columns into consecutive batches. Batch numbers are 1-based
 * and stay the same whatever range is selected.
 *
 * @example
 * planBatches(grid, { batch_size: 3, start_batch: 2, end_batch: 2 })
 * // [{ batch_num: 2, portfolios: ['Grid_004', 'Grid_005', 'Grid_006'], ... }]
 */
export function planBatches(allocations: AllocationTable, options: BatchPlanOptions = {}): PlannedBatch[] {
  const size = options.batch_size ?? MAX_BATCH_SIZE;
  if (!Number.isInteger(size) || size < 1 || size > MAX_BATCH_SIZE) {
    throw createToolError('INVALID_INPUT', `Batch size must be between 1 and ${MAX_BATCH_SIZE}, got ${size}`);
  }

  const columns = allocations.portfolio_columns;
  const batchCount = Math.ceil(columns.length / size);
  const start = Math.max(options.start_batch ?? 1, 1);
  const end = Math.min(options.end_batch ?? batchCount, batchCount);

  const batches: PlannedBatch[] = [];
  for (let batchNum = start; batchNum <= end; batchNum++) {
    const portfolios = columns.slice((batchNum - 1) * size, batchNum * size);
    batches.push({
      batch_num: batchNum,
      portfolios,
      file_name: batchFileName(batchNum, portfolios),
      allocations: {
        portfolio_columns: portfolios,
        rows: allocations.rows.map(row => {
          const weights: Record<string, number | null> = {};
          for (const portfolio of portfolios) {
            weights[portfolio] = row.weights[portfolio] ?? null;
          }
          return { asset_number: row.asset_number, asset_description: row.asset_description, weights };
        }),
      },
    });
  }

  return batches;
}

/**
 * Write each planned batch into `batchDir`, returning the written paths
 */
export async function writeBatchFiles(batchDir: string, batches: readonly PlannedBatch[]): Promise<string[]> {
  const written: string[] = [];
  for (const batch of batches) {
    const filePath = path.join(batchDir, batch.file_name);
    await writeAllocationCsv(filePath, batch.allocations);
    written.push(filePath);
  }
  return written;
}

// ============================================================================
// Manifest
// ============================================================================

/**
 * Add or replace the manifest row for a batch; the new row goes last.
 * The results workbook must exist.
 */
export async function upsertManifestEntry(
  manifestPath: string,
  entry: BatchManifestEntry,
  resultsPath: string = entry.results_file
): Promise<BatchManifestEntry[]> {
  if (!await pathExists(resultsPath)) {
    throw createToolError('FILE_NOT_FOUND', `Results workbook not found: ${resultsPath}`, {
      details: { batch_num: entry.batch_num, results_file: entry.results_file },
      suggestion: 'Download the batch results before recording them',
    });
  }

  const existing = await pathExists(manifestPath) ? await readBatchManifest(manifestPath) : [];
  const entries = [...existing.filter(e => e.batch_num !== entry.batch_num), entry];

  await writeCsvFile(
    manifestPath,
    ['batch_num', 'results_file'],
    entries.map(e => [e.batch_num, e.results_file])
  );

  return entries;
}

// ============================================================================
// Tools: backtest_plan_batches / backtest_record_result
// ============================================================================

export interface PlanBatchesResult {
  success: true;
  batch_dir: string;
  total_portfolios: number;
  batches: Array<{ batch_num: number; file: string; portfolios: string[] }>;
  warnings: string[];
}

export async function planBatchesTool(input: PlanBatchesInput): Promise<PlanBatchesResult | ToolError> {
  const manager = getRunManager();
  const { runDir } = await manager.ensureRun(input.run_id);
  const { logger } = await manager.getRun(input.run_id);
  const defaults = manager.getDefaults();
  const gridPath = resolveFrom(runDir, input.grid_path);
  const batchDir = manager.getBatchesDir(input.run_id);
  const batchSize = input.batch_size ?? defaults.batching.batch_size;

  await manager.startPhase(input.run_id, 'batch');

  let grid: AllocationTable;
  let batches: PlannedBatch[];
  try {
    grid = await readAllocationCsv(gridPath, defaults.consolidation.portfolio_prefixes);
    batches = planBatches(grid, {
      batch_size: batchSize,
      start_batch: input.start_batch,
      end_batch: input.end_batch,
    });
  } catch (error) {
    if (!isToolError(error)) throw error;
    await logger.error('batch', 'backtest_plan_batches', error.message, error.details);
    await manager.completePhase(input.run_id, 'batch', {
      errors: [{ timestamp: now(), code: error.code, message: error.message, recoverable: error.recoverable }],
    });
    await manager.addTotals(input.run_id, { errors_encountered: 1 });
    return error;
  }

  const { warnings } = validateWeights(grid, defaults.batching.weight_tolerance);
  const written = await writeBatchFiles(batchDir, batches);

  await logger.warnAll('batch', 'backtest_plan_batches', warnings);
  await logger.info('batch', 'backtest_plan_batches', `Planned ${batches.length} batches`, {
    grid: gridPath,
    batch_size: batchSize,
  });

  const outputHashes: string[] = [];
  for (const file of written) {
    outputHashes.push(await hashFile(file));
  }

  await manager.completePhase(input.run_id, 'batch', {
    inputs: { count: 1, hashes: [await hashFile(gridPath)] },
    outputs: { count: written.length, hashes: outputHashes },
    warnings,
  });
  await manager.addTotals(input.run_id, { batches_planned: batches.length });

  return {
    success: true,
    batch_dir: batchDir,
    total_portfolios: grid.portfolio_columns.length,
    batches: batches.map((batch, i) => ({
      batch_num: batch.batch_num,
      file: written[i],
      portfolios: batch.portfolios,
    })),
    warnings,
  };
}

export interface RecordResultResult {
  success: true;
  manifest_path: string;
  entries: BatchManifestEntry[];
}

export async function recordResult(input: RecordResultInput): Promise<RecordResultResult | ToolError> {
  const manager = getRunManager();
  const { runDir } = await manager.ensureRun(input.run_id);
  const { logger } = await manager.getRun(input.run_id);
  const manifestPath = path.join(manager.getBatchesDir(input.run_id), MANIFEST_FILE);

  try {
    const entries = await upsertManifestEntry(
      manifestPath,
      { batch_num: input.batch_num, results_file: input.results_file },
      resolveFrom(runDir, input.results_file)
    );
    await logger.info('batch', 'backtest_record_result', `Recorded results for batch ${input.batch_num}`, {
      results_file: input.results_file,
    });
    return { success: true, manifest_path: manifestPath, entries };
  } catch (error) {
    if (!isToolError(error)) throw error;
    await logger.error('batch', 'backtest_record_result', error.message, error.details);
    return error;
  }
}
