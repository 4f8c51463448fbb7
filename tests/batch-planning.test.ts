/**
 * Batch Planning Tests
 *
 * Contract for splitting grids into site-sized batches:
 * - At most 3 portfolios per batch; batch numbers are 1-based and stable
 * - Batch files are named batch_<NNN>_<first>_to_<last>.csv
 * - The manifest holds one row per batch; re-recording replaces it
 * - Weight totals off 100% are warnings
 *
 * The implementation lives in: src/tools/batches.ts, src/tools/allocations.ts
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as path from 'path';
import { mkdtemp, rm, mkdir, writeFile, readFile } from 'fs/promises';
import { tmpdir } from 'os';

import {
  batchFileName,
  planBatches,
  planBatchesTool,
  recordResult,
  upsertManifestEntry,
  writeBatchFiles,
} from '../src/tools/batches.js';
import { readAllocationCsv, validateWeights, detectPortfolioColumns } from '../src/tools/allocations.js';
import { readBatchManifest } from '../src/tools/consolidate.js';
import { generateGridTool } from '../src/tools/grid.js';
import { DEFAULT_CONFIG, getRunManager, initRunManager } from '../src/run-manager.js';
import { generateRunId, isToolError } from '../src/utils.js';
import { PlanBatchesInputSchema } from '../src/schemas.js';
import type { AllocationTable } from '../src/types.js';

// ============================================================================
// Test Helpers
// ============================================================================

const PREFIXES = DEFAULT_CONFIG.defaults.consolidation.portfolio_prefixes;

/**
 * Two-asset grid with `count` portfolios named Grid_001.. at 60/40
 */
function createGrid(count: number): AllocationTable {
  const columns = Array.from({ length: count }, (_, i) => `Grid_${String(i + 1).padStart(3, '0')}`);
  const weightsOf = (value: number) => Object.fromEntries(columns.map(c => [c, value]));
  return {
    portfolio_columns: columns,
    rows: [
      { asset_number: 1, asset_description: 'US Equities - US Stock Market', weights: weightsOf(60) },
      { asset_number: 2, asset_description: 'TIPS - Inflation-Protected Bonds', weights: weightsOf(40) },
    ],
  };
}

function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

// ============================================================================
// Planning
// ============================================================================

describe('planBatches', () => {
  it('splits portfolios into batches of three', () => {
    const batches = planBatches(createGrid(7));

    expect(batches.map(b => [b.batch_num, b.portfolios, b.file_name])).toEqual([
      [1, ['Grid_001', 'Grid_002', 'Grid_003'], 'batch_001_Grid_001_to_Grid_003.csv'],
      [2, ['Grid_004', 'Grid_005', 'Grid_006'], 'batch_002_Grid_004_to_Grid_006.csv'],
      [3, ['Grid_007'], 'batch_003_Grid_007_to_Grid_007.csv'],
    ]);
    expect(batches[2].allocations.rows[0].weights).toEqual({ Grid_007: 60 });
  });

  it('keeps batch numbers when a range is selected', () => {
    const batches = planBatches(createGrid(7), { start_batch: 2, end_batch: 2 });

    expect(batches).toHaveLength(1);
    expect(batches[0].batch_num).toBe(2);
    expect(batches[0].allocations.portfolio_columns).toEqual(['Grid_004', 'Grid_005', 'Grid_006']);
  });

  it('clamps the range to the available batches', () => {
    const batches = planBatches(createGrid(4), { batch_size: 2, start_batch: 0, end_batch: 9 });
    expect(batches.map(b => b.batch_num)).toEqual([1, 2]);
  });

  it('rejects batch sizes above three', () => {
    expect(catchError(() => planBatches(createGrid(4), { batch_size: 4 }))).toMatchObject({
      code: 'INVALID_INPUT',
    });
  });

  it('names a single-portfolio batch after that portfolio twice', () => {
    expect(batchFileName(12, ['Random_034'])).toBe('batch_012_Random_034_to_Random_034.csv');
  });
});

describe('allocation checks', () => {
  it('detects portfolio columns by prefix', () => {
    expect(
      detectPortfolioColumns(['Asset_Number', 'Asset_Description', 'Grid_001', 'Notes', 'TreasuryGrid_002'], PREFIXES)
    ).toEqual(['Grid_001', 'TreasuryGrid_002']);
  });

  it('warns about totals outside the tolerance', () => {
    const table: AllocationTable = {
      portfolio_columns: ['Grid_001', 'Grid_002'],
      rows: [
        { asset_number: 1, asset_description: 'A', weights: { Grid_001: 50, Grid_002: 60.005 } },
        { asset_number: 2, asset_description: 'B', weights: { Grid_001: 49, Grid_002: 40 } },
      ],
    };

    const { checks, warnings } = validateWeights(table, 0.01);

    expect(checks.map(c => c.valid)).toEqual([false, true]);
    expect(warnings).toEqual(['Portfolio Grid_001 totals 99%, not 100%']);
  });
});

// ============================================================================
// Files and Manifest
// ============================================================================

describe('batch files and manifest', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(path.join(tmpdir(), 'batch-planning-'));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('writes one allocation CSV per batch', async () => {
    const written = await writeBatchFiles(tempDir, planBatches(createGrid(4)));

    expect(written).toEqual([
      path.join(tempDir, 'batch_001_Grid_001_to_Grid_003.csv'),
      path.join(tempDir, 'batch_002_Grid_004_to_Grid_004.csv'),
    ]);
    expect(await readFile(written[1], 'utf-8')).toBe(
      'Asset_Number,Asset_Description,Grid_004\n' +
        '1,US Equities - US Stock Market,60\n' +
        '2,TIPS - Inflation-Protected Bonds,40\n'
    );

    const table = await readAllocationCsv(written[0], PREFIXES);
    expect(table.portfolio_columns).toEqual(['Grid_001', 'Grid_002', 'Grid_003']);
  });

  it('replaces a re-recorded batch and moves it last', async () => {
    const manifestPath = path.join(tempDir, 'batches', 'batch_manifest.csv');
    await mkdir(path.join(tempDir, 'results'), { recursive: true });
    for (const name of ['b1.xlsx', 'b2.xlsx', 'b1-retry.xlsx']) {
      await writeFile(path.join(tempDir, 'results', name), 'placeholder');
    }

    await upsertManifestEntry(manifestPath, { batch_num: 1, results_file: path.join(tempDir, 'results', 'b1.xlsx') });
    await upsertManifestEntry(manifestPath, { batch_num: 2, results_file: path.join(tempDir, 'results', 'b2.xlsx') });
    const entries = await upsertManifestEntry(manifestPath, {
      batch_num: 1,
      results_file: path.join(tempDir, 'results', 'b1-retry.xlsx'),
    });

    const expected = [
      { batch_num: 2, results_file: path.join(tempDir, 'results', 'b2.xlsx') },
      { batch_num: 1, results_file: path.join(tempDir, 'results', 'b1-retry.xlsx') },
    ];
    expect(entries).toEqual(expected);
    expect(await readBatchManifest(manifestPath)).toEqual(expected);
  });

  it('refuses to record a results file that does not exist', async () => {
    const manifestPath = path.join(tempDir, 'batch_manifest.csv');

    await expect(
      upsertManifestEntry(manifestPath, { batch_num: 1, results_file: path.join(tempDir, 'missing.xlsx') })
    ).rejects.toMatchObject({ code: 'FILE_NOT_FOUND' });
  });
});

// ============================================================================
// Tools: backtest_plan_batches / backtest_record_result
// ============================================================================

describe('batch tools', () => {
  let tempDir: string;
  let runId: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(path.join(tmpdir(), 'batch-tools-'));
    initRunManager(tempDir, { storage: { runs_dir: 'runs' } });
    runId = generateRunId();
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('plans batches from a generated grid', async () => {
    await generateGridTool({ run_id: runId, grid_type: 'treasury', force: false });

    const result = await planBatchesTool({ run_id: runId, grid_path: 'grids/treasury_grid.csv', batch_size: 3 });
    if (isToolError(result)) throw new Error(result.message);

    expect(result.total_portfolios).toBe(56);
    expect(result.batches).toHaveLength(19);
    expect(result.batches[18]).toEqual({
      batch_num: 19,
      file: path.join(tempDir, 'runs', runId, 'batches', 'batch_019_TreasuryGrid_055_to_TreasuryGrid_056.csv'),
      portfolios: ['TreasuryGrid_055', 'TreasuryGrid_056'],
    });
    expect(result.warnings).toEqual([]);

    const { manifest } = await getRunManager().getRun(runId);
    expect(manifest.totals.batches_planned).toBe(19);
  });

  it('uses the configured batch size when the input leaves it out', async () => {
    initRunManager(tempDir, { storage: { runs_dir: 'runs' }, defaults: { batching: { batch_size: 2 } } });
    await generateGridTool({ run_id: runId, grid_type: 'treasury', force: false });

    const result = await planBatchesTool(
      PlanBatchesInputSchema.parse({ run_id: runId, grid_path: 'grids/treasury_grid.csv' })
    );
    if (isToolError(result)) throw new Error(result.message);

    expect(result.batches).toHaveLength(28);
    expect(result.batches[0].portfolios).toEqual(['TreasuryGrid_001', 'TreasuryGrid_002']);
  });

  it('validates tool input', () => {
    const parsed = PlanBatchesInputSchema.parse({ run_id: runId, grid_path: 'grids/coarse_grid.csv' });
    expect(parsed.batch_size).toBeUndefined();

    expect(PlanBatchesInputSchema.safeParse({ run_id: runId, grid_path: 'g.csv', batch_size: 4 }).success).toBe(false);
    expect(PlanBatchesInputSchema.safeParse({ run_id: 'not-a-uuid', grid_path: 'g.csv' }).success).toBe(false);
  });

  it('returns FILE_NOT_FOUND for a missing grid', async () => {
    const result = await planBatchesTool({ run_id: runId, grid_path: 'grids/absent.csv', batch_size: 3 });

    expect(isToolError(result) && result.code).toBe('FILE_NOT_FOUND');
    const { manifest } = await getRunManager().getRun(runId);
    expect(manifest.totals.errors_encountered).toBe(1);
  });

  it('records results paths relative to the run', async () => {
    const { runDir } = await getRunManager().ensureRun(runId);
    await writeFile(path.join(runDir, 'results', 'batch_001.xlsx'), 'placeholder');

    const result = await recordResult({ run_id: runId, batch_num: 1, results_file: 'results/batch_001.xlsx' });
    if (isToolError(result)) throw new Error(result.message);

    expect(result.manifest_path).toBe(path.join(runDir, 'batches', 'batch_manifest.csv'));
    expect(result.entries).toEqual([{ batch_num: 1, results_file: 'results/batch_001.xlsx' }]);
  });

  it('returns FILE_NOT_FOUND when the results workbook is missing', async () => {
    const result = await recordResult({ run_id: runId, batch_num: 1, results_file: 'results/batch_001.xlsx' });
    expect(isToolError(result) && result.code).toBe('FILE_NOT_FOUND');
  });
});
