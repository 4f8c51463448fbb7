/**
 * Workbook Table Parsing Tests
 *
 * Contract for splitting a results sheet into logical tables:
 * - Blocks are runs of non-empty rows; empty rows separate them
 * - The header is the first row with 2+ cells containing a header keyword
 * - Narrow untyped blocks parse as key-value pairs, everything else as a grid
 * - Empty columns and rows are dropped from tabular output
 * - Missing sheets and unreadable files are fatal
 *
 * The implementation lives in: src/tools/tables.ts
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as path from 'path';
import { mkdtemp, rm, writeFile, readFile } from 'fs/promises';
import { tmpdir } from 'os';

import {
  classifyTableStructure,
  detectTableBoundaries,
  extractTableContent,
  isEmptyCell,
  parseSheetGrid,
  parseWorkbook,
  parseWorkbookTables,
  type TableTypeRule,
} from '../src/tools/tables.js';
import { getRunManager, initRunManager } from '../src/run-manager.js';
import { generateRunId, isToolError } from '../src/utils.js';
import type { Cell, ParsedWorkbook } from '../src/types.js';
import { RESULTS_SHEET, writeResultsWorkbook, writeWorkbook } from './helpers/workbooks.js';

// ============================================================================
// Test Helpers
// ============================================================================

function parseRows(rows: Cell[][]) {
  return extractTableContent(rows, classifyTableStructure(rows), 'Test');
}

// ============================================================================
// Boundary Detection
// ============================================================================

describe('detectTableBoundaries', () => {
  it('splits on empty rows and names blocks by their first cell', () => {
    const blocks = detectTableBoundaries([
      ['A', 1],
      [null, null],
      ['B', 2],
      ['x', 3],
    ]);

    expect(blocks).toEqual([
      { start_row: 0, end_row: 0, name: 'A' },
      { start_row: 2, end_row: 3, name: 'B' },
    ]);
  });

  it('treats whitespace-only rows as empty and collapses runs of them', () => {
    const blocks = detectTableBoundaries([
      ['A', null],
      [null, null],
      [null, '   '],
      ['B', 1],
      ['C', 2],
      [null, null],
    ]);

    expect(blocks).toEqual([
      { start_row: 0, end_row: 0, name: 'A' },
      { start_row: 3, end_row: 4, name: 'B' },
    ]);
  });

  it('names a block by the first non-empty cell even when column 0 is blank', () => {
    const blocks = detectTableBoundaries([[null, '  Title  ', 'x']]);
    expect(blocks).toEqual([{ start_row: 0, end_row: 0, name: 'Title' }]);
  });

  it('returns ordered, disjoint blocks that cover every non-empty row', () => {
    const grid: Cell[][] = [
      [null, null],
      ['Title', null],
      ['a', 1],
      [null, null],
      [null, null],
      ['b', 2],
      [null, null],
      ['c', 3],
      ['d', 4],
    ];
    const blocks = detectTableBoundaries(grid);

    blocks.forEach((block, i) => {
      expect(block.start_row).toBeLessThanOrEqual(block.end_row);
      if (i > 0) expect(block.start_row).toBeGreaterThan(blocks[i - 1].end_row + 1);
    });
    const covered = blocks.reduce((sum, b) => sum + b.end_row - b.start_row + 1, 0);
    const emptyRows = grid.filter(row => row.every(cell => cell === null)).length;
    expect(covered + emptyRows).toBe(grid.length);
  });

  it('gives a lone non-empty row a block of length one', () => {
    expect(detectTableBoundaries([[null], ['only'], [null]])).toEqual([{ start_row: 1, end_row: 1, name: 'only' }]);
  });

  it('returns nothing for an empty grid', () => {
    expect(detectTableBoundaries([])).toEqual([]);
    expect(detectTableBoundaries([[null], ['']])).toEqual([]);
  });

  it('keeps zero and false as content', () => {
    expect(isEmptyCell(0)).toBe(false);
    expect(isEmptyCell(false)).toBe(false);
    expect(isEmptyCell(' ')).toBe(true);
  });
});

// ============================================================================
// Structure Classification
// ============================================================================

describe('classifyTableStructure', () => {
  it('skips title rows to find the keyword header', () => {
    const structure = classifyTableStructure([
      ['Portfolio Allocations'],
      ['Asset Allocation', 'Portfolio 1', 'Portfolio 2'],
      ['US Stock Market', 40, 50],
    ]);

    expect(structure).toEqual({
      header_row: 1,
      data_start_row: 2,
      column_count: 3,
      table_type: 'allocation',
    });
  });

  it('tags types in rule order', () => {
    expect(classifyTableStructure([['Metric', 'Annual Return']]).table_type).toBe('metrics');
    expect(classifyTableStructure([['Year', 'Return']]).table_type).toBe('returns');
    expect(classifyTableStructure([['Asset', 'Correlation']]).table_type).toBe('correlation');
    expect(classifyTableStructure([['Name', 'Value']]).table_type).toBe('unknown');
  });

  it('tags an allocation header as allocation whatever else it names', () => {
    const structure = classifyTableStructure([['Allocation', 'Metric', 'Annual Return', 'Correlation']]);
    expect(structure.table_type).toBe('allocation');
  });

  it('falls back to the first row when no row looks like a header', () => {
    const structure = classifyTableStructure([
      ['Foo', 'Bar'],
      ['1', '2'],
    ]);

    expect(structure).toEqual({
      header_row: 0,
      data_start_row: 1,
      column_count: 2,
      table_type: 'unknown',
    });
  });

  it('returns null positions for an empty block', () => {
    expect(classifyTableStructure([])).toEqual({
      header_row: null,
      data_start_row: null,
      column_count: 0,
      table_type: 'unknown',
    });
  });

  it('accepts custom type rules', () => {
    const rules: TableTypeRule[] = [{ tag: 'correlation', matches: text => text.includes('foo') }];
    expect(classifyTableStructure([['Foo', 'Bar']], rules).table_type).toBe('correlation');
  });
});

// ============================================================================
// Content Extraction
// ============================================================================

describe('extractTableContent', () => {
  it('parses narrow untyped blocks as key-value pairs', () => {
    const table = parseRows([
      ['Start Date', 'Jan 2003'],
      ['Note'],
      ['a', 'b', 'c'],
    ]);

    expect(table).toEqual({
      kind: 'key_value',
      name: 'Test',
      table_type: 'unknown',
      entries: [
        { key: 'Start Date', value: 'Jan 2003' },
        { key: 'Note', value: null },
        { key: 'a', value: 'b' },
      ],
    });
  });

  it('parses wider blocks as rows under the header', () => {
    const table = parseRows([
      ['A', 'B', 'C'],
      [1, 2, 3],
      [4, 5, 6],
    ]);

    expect(table).toEqual({
      kind: 'tabular',
      name: 'Test',
      table_type: 'unknown',
      columns: ['A', 'B', 'C'],
      rows: [
        [1, 2, 3],
        [4, 5, 6],
      ],
    });
  });

  it('names blank header cells and drops all-empty columns', () => {
    const table = parseRows([
      ['Metric', null, 'Portfolio 2', 'Extra'],
      ['CAGR', 5, 6, null],
      ['Vol', '  ', 7, null],
    ]);

    expect(table).toEqual({
      kind: 'tabular',
      name: 'Test',
      table_type: 'metrics',
      columns: ['Metric', 'Column_1', 'Portfolio 2'],
      rows: [
        ['CAGR', 5, 6],
        ['Vol', null, 7],
      ],
    });
  });

  it('returns null when a tabular block has no data rows', () => {
    expect(parseRows([['Metric', 'Value']])).toBeNull();
  });
});

// ============================================================================
// Sheet Parsing
// ============================================================================

describe('parseSheetGrid', () => {
  it('suffixes repeated table names with the block ordinal', () => {
    const { workbook } = parseSheetGrid(
      [
        ['Notes', 'x'],
        [null, null],
        ['Notes', 'y'],
      ],
      { source_file: 'inline.xlsx', sheet_name: 'Sheet1' }
    );

    expect(Object.keys(workbook.tables)).toEqual(['Notes', 'Notes_2']);
    expect(workbook.tables['Notes_2']).toEqual({
      kind: 'key_value',
      name: 'Notes_2',
      table_type: 'unknown',
      entries: [{ key: 'Notes', value: 'y' }],
    });
  });

  it('keeps the plain name when the earlier namesake was skipped', () => {
    const { workbook } = parseSheetGrid(
      [
        ['Metric', 'Value'],
        [null, null],
        ['Metric', 'A'],
        ['x', 1],
      ],
      { source_file: 'inline.xlsx', sheet_name: 'Sheet1' }
    );

    expect(Object.keys(workbook.tables)).toEqual(['Metric']);
    expect(workbook.blocks.map(b => [b.table_name, b.parsed_as])).toEqual([
      ['Metric', 'skipped'],
      ['Metric', 'tabular'],
    ]);
  });

  it('reports blocks without data as skipped', () => {
    const { workbook, warnings } = parseSheetGrid(
      [
        ['Metric', 'Value'],
        [null, null],
        ['Start Date', 'Jan 2003'],
      ],
      { source_file: 'inline.xlsx', sheet_name: 'Sheet1' }
    );

    expect(Object.keys(workbook.tables)).toEqual(['Start Date']);
    expect(workbook.blocks[0]).toMatchObject({
      table_name: 'Metric',
      parsed_as: 'skipped',
      reason: 'no data rows',
    });
    expect(warnings).toEqual([]);
  });
});

// ============================================================================
// Workbook Files
// ============================================================================

describe('parseWorkbookTables', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(path.join(tmpdir(), 'table-parsing-'));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('parses every logical table of a results sheet in order', async () => {
    const file = await writeResultsWorkbook(path.join(tempDir, 'batch_001.xlsx'));
    const { workbook, warnings } = await parseWorkbookTables(file, RESULTS_SHEET);

    expect(warnings).toEqual([]);
    expect(Object.keys(workbook.tables)).toEqual([
      'Start Date',
      'Portfolio Allocations',
      'Portfolio Performance (Jan 2003 - Nov 2025)',
      'Risk and Return Metrics (Jan 2003 - Nov 2025)',
    ]);
    expect(workbook.blocks.map(b => [b.start_row, b.end_row, b.parsed_as])).toEqual([
      [0, 1, 'key_value'],
      [3, 5, 'tabular'],
      [7, 10, 'tabular'],
      [12, 14, 'tabular'],
    ]);

    expect(workbook.tables['Start Date']).toEqual({
      kind: 'key_value',
      name: 'Start Date',
      table_type: 'unknown',
      entries: [
        { key: 'Start Date', value: 'Jan 2003' },
        { key: 'End Date', value: 'Nov 2025' },
      ],
    });

    expect(workbook.tables['Portfolio Performance (Jan 2003 - Nov 2025)']).toEqual({
      kind: 'tabular',
      name: 'Portfolio Performance (Jan 2003 - Nov 2025)',
      table_type: 'metrics',
      columns: ['Metric', 'Sample Portfolio', 'Portfolio 2', 'Portfolio 3'],
      rows: [
        ['CAGR', 8.12, 8.5, 'N/A'],
        ['Sharpe Ratio', 0.61, 0.58, 0.66],
      ],
    });
  });

  it('fails with SHEET_NOT_FOUND for a missing sheet', async () => {
    const file = await writeWorkbook(path.join(tempDir, 'other.xlsx'), { Summary: [['a', 1]] });

    await expect(parseWorkbookTables(file, RESULTS_SHEET)).rejects.toMatchObject({
      code: 'SHEET_NOT_FOUND',
      details: { available: ['Summary'] },
    });
  });

  it('fails with READ_FAILED for a missing file', async () => {
    await expect(parseWorkbookTables(path.join(tempDir, 'absent.xlsx'), RESULTS_SHEET)).rejects.toMatchObject({
      code: 'READ_FAILED',
    });
  });
});

// ============================================================================
// Tool: backtest_parse_workbook
// ============================================================================

describe('parseWorkbook tool', () => {
  let tempDir: string;
  let runId: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(path.join(tmpdir(), 'parse-tool-'));
    initRunManager(tempDir, { storage: { runs_dir: 'runs' } });
    runId = generateRunId();
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('writes parsed tables and updates run totals', async () => {
    const file = await writeResultsWorkbook(path.join(tempDir, 'batch_001.xlsx'));

    const result = await parseWorkbook({ run_id: runId, file, force: false });
    if (isToolError(result)) throw new Error(result.message);

    expect(result.skipped).toBe(false);
    expect(result.output_path).toBe(path.join(tempDir, 'runs', runId, 'parsed', 'batch_001.tables.json'));
    expect(result.table_names).toHaveLength(4);

    const saved: ParsedWorkbook = JSON.parse(await readFile(result.output_path, 'utf-8'));
    expect(saved.sheet_name).toBe(RESULTS_SHEET);
    expect(saved.blocks).toHaveLength(4);

    const { manifest } = await getRunManager().getRun(runId);
    expect(manifest.totals.workbooks_parsed).toBe(1);
    expect(manifest.totals.tables_parsed).toBe(4);
    expect(manifest.phases.parse?.status).toBe('completed');
  });

  it('skips a workbook parsed before unless forced', async () => {
    const file = await writeResultsWorkbook(path.join(tempDir, 'batch_001.xlsx'));

    await parseWorkbook({ run_id: runId, file, force: false });
    const second = await parseWorkbook({ run_id: runId, file, force: false });
    if (isToolError(second)) throw new Error(second.message);

    expect(second.skipped).toBe(true);
    const { manifest } = await getRunManager().getRun(runId);
    expect(manifest.totals.workbooks_parsed).toBe(1);
  });

  it('returns the error and counts it when the file is not a workbook', async () => {
    const file = path.join(tempDir, 'notes.txt');
    await writeFile(file, 'not a workbook');

    const result = await parseWorkbook({ run_id: runId, file, force: false, sheet_name: RESULTS_SHEET });

    expect(result.success).toBe(false);
    const { manifest } = await getRunManager().getRun(runId);
    expect(manifest.totals.errors_encountered).toBe(1);
    expect(manifest.phases.parse?.errors).toHaveLength(1);
  });
});
