/**
 * 📊 Workbook Table Parsing - Backtest Ledger MCP
 *
 * Splits a backtest results sheet into its logical tables and parses each one
 * as key-value pairs or a tabular grid.
 *
 * Pipeline per sheet:
 * - Load the sheet as a raw grid (xlsx, raw values, blanks as null)
 * - Detect table boundaries (runs of non-empty rows)
 * - Classify each block's header row and table type
 * - Extract key-value entries or tabular rows
 *
 * @module tools/tables
 * @see tests/table-parsing.test.ts for the test contract
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import * as XLSX from 'xlsx';
import { getRunManager } from '../run-manager.js';
import {
  createToolError,
  hashFile,
  isToolError,
  now,
  pathExists,
  readJson,
  resolveFrom,
  writeJson,
} from '../utils.js';
import type { ParseWorkbookInput } from '../schemas.js';
import type {
  BlockReport,
  Cell,
  CellScalar,
  ParsedTable,
  ParsedWorkbook,
  RawGrid,
  TableBlock,
  TableStructure,
  TableType,
  ToolError,
} from '../types.js';

// ============================================================================
// Heuristics
// ============================================================================

/**
 * Words that mark a row as a table header when it has at least two cells
 */
export const HEADER_KEYWORDS: readonly string[] = [
  'metric',
  'name',
  'portfolio',
  'asset',
  'year',
  'allocation',
  'month',
];

/**
 * A table type rule: `matches` receives the header row's non-empty cells,
 * lowercased and joined with single spaces.
 */
export interface TableTypeRule {
  tag: Exclude<TableType, 'unknown'>;
  matches: (headerText: string) => boolean;
}

/**
 * Ordered, first match wins. Anything unmatched is "unknown".
 */
export const TABLE_TYPE_RULES: readonly TableTypeRule[] = [
  { tag: 'allocation', matches: text => text.includes('allocation') },
  { tag: 'metrics', matches: text => text.includes('metric') || text.includes('performance') },
  { tag: 'returns', matches: text => text.includes('return') || text.includes('year') },
  { tag: 'correlation', matches: text => text.includes('correlation') },
];

// ============================================================================
// Cell Helpers
// ============================================================================

export function isEmptyCell(cell: Cell | undefined): boolean {
  return cell === null || cell === undefined || (typeof cell === 'string' && cell.trim() === '');
}

export function isEmptyRow(row: readonly Cell[]): boolean {
  return row.every(cell => isEmptyCell(cell));
}

function nonEmptyCells(row: readonly Cell[]): CellScalar[] {
  const cells: CellScalar[] = [];
  for (const cell of row) {
    if (cell !== null && !isEmptyCell(cell)) cells.push(cell);
  }
  return cells;
}

function joinLowered(cells: readonly CellScalar[]): string {
  return cells.map(cell => String(cell).toLowerCase()).join(' ');
}

/**
 * Narrow a value produced by the sheet reader to a grid cell
 */
function toCell(value: unknown): Cell {
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  return null;
}

// ============================================================================
// Boundary Detection
// ============================================================================

/**
 * Split a grid into blocks of consecutive non-empty rows.
 *
 * @example
 * detectTableBoundaries([["A", 1], [null, null], ["B", 2], ["x", 3]])
 * // [{ start_row: 0, end_row: 0, name: "A" }, { start_row: 2, end_row: 3, name: "B" }]
 */
export function detectTableBoundaries(grid: RawGrid): TableBlock[] {
  const blocks: TableBlock[] = [];
  let start: number | null = null;
  let name = '';

  for (let r = 0; r < grid.length; r++) {
    const row = grid[r];

    if (!isEmptyRow(row)) {
      if (start === null) {
        start = r;
        const first = nonEmptyCells(row)[0];
        name = first === undefined ? `Table_${blocks.length + 1}` : String(first).trim();
      }
    } else if (start !== null) {
      blocks.push({ start_row: start, end_row: r - 1, name });
      start = null;
    }
  }

  if (start !== null) {
    blocks.push({ start_row: start, end_row: grid.length - 1, name });
  }

  return blocks;
}

// ============================================================================
// Structure Classification
// ============================================================================

/**
 * Locate the header row of a block and tag the table type.
 *
 * The header is the first row with two or more non-empty cells whose text
 * contains a header keyword; otherwise row 0.
 */
export function classifyTableStructure(
  rows: readonly (readonly Cell[])[],
  rules: readonly TableTypeRule[] = TABLE_TYPE_RULES
): TableStructure {
  if (rows.length === 0) {
    return { header_row: null, data_start_row: null, column_count: 0, table_type: 'unknown' };
  }

  let headerRow = 0;
  for (let r = 0; r < rows.length; r++) {
    const cells = nonEmptyCells(rows[r]);
    if (cells.length < 2) continue;

    const text = joinLowered(cells);
    if (HEADER_KEYWORDS.some(keyword => text.includes(keyword))) {
      headerRow = r;
      break;
    }
  }

  const headerCells = nonEmptyCells(rows[headerRow]);
  const headerText = joinLowered(headerCells);
  const rule = rules.find(candidate => candidate.matches(headerText));

  return {
    header_row: headerRow,
    data_start_row: headerRow + 1,
    column_count: headerCells.length,
    table_type: rule ? rule.tag : 'unknown',
  };
}

// ============================================================================
// Content Extraction
// ============================================================================

/**
 * Parse one block. Returns null when the block yields no entries or rows.
 */
export function extractTableContent(
  rows: readonly (readonly Cell[])[],
  structure: TableStructure,
  name: string
): ParsedTable | null {
  if (structure.column_count <= 2 && structure.table_type === 'unknown') {
    const entries = rows.flatMap(row => {
      const [key, value] = nonEmptyCells(row);
      if (key === undefined) return [];
      return [{ key, value: value ?? null }];
    });

    if (entries.length === 0) return null;
    return { kind: 'key_value', name, table_type: structure.table_type, entries };
  }

  if (structure.header_row === null || structure.data_start_row === null) {
    return null;
  }

  const header = rows[structure.header_row];
  const columns = header.map((cell, i) => (isEmptyCell(cell) ? `Column_${i}` : String(cell).trim()));

  const dataRows: Cell[][] = [];
  for (let r = structure.data_start_row; r < rows.length; r++) {
    const row = rows[r];
    if (isEmptyRow(row)) continue;

    const fitted: Cell[] = [];
    for (let c = 0; c < columns.length; c++) {
      const cell = row[c];
      fitted.push(cell === undefined || isEmptyCell(cell) ? null : cell);
    }
    dataRows.push(fitted);
  }

  const keptColumns = columns
    .map((_, c) => c)
    .filter(c => dataRows.some(row => row[c] !== null));

  const keptRows = dataRows
    .map(row => keptColumns.map(c => row[c]))
    .filter(row => row.some(cell => cell !== null));

  if (keptRows.length === 0) return null;

  return {
    kind: 'tabular',
    name,
    table_type: structure.table_type,
    columns: keptColumns.map(c => columns[c]),
    rows: keptRows,
  };
}

// ============================================================================
// Sheet Parsing
// ============================================================================

export interface SheetParseResult {
  workbook: ParsedWorkbook;
  warnings: string[];
}

/**
 * Run boundary detection, classification and extraction over a loaded grid.
 * A block that fails to parse is reported as skipped; the rest still parse.
 */
export function parseSheetGrid(
  grid: RawGrid,
  meta: { source_file: string; sheet_name: string },
  rules: readonly TableTypeRule[] = TABLE_TYPE_RULES
): SheetParseResult {
  const tables: Record<string, ParsedTable> = {};
  const blocks: BlockReport[] = [];
  const warnings: string[] = [];
  const parsedNames = new Set<string>();

  detectTableBoundaries(grid).forEach((block, index) => {
    const ordinal = index + 1;
    const rows = grid.slice(block.start_row, block.end_row + 1);
    const tableName = parsedNames.has(block.name) ? `${block.name}_${ordinal}` : block.name;

    const report: BlockReport = {
      table_name: tableName,
      start_row: block.start_row,
      end_row: block.end_row,
      table_type: 'unknown',
      column_count: 0,
      parsed_as: 'skipped',
      row_count: 0,
    };

    try {
      const structure = classifyTableStructure(rows, rules);
      report.table_type = structure.table_type;
      report.column_count = structure.column_count;

      const table = extractTableContent(rows, structure, tableName);
      if (table === null) {
        report.reason = 'no data rows';
      } else {
        tables[tableName] = table;
        parsedNames.add(tableName);
        report.parsed_as = table.kind;
        report.row_count = table.kind === 'key_value' ? table.entries.length : table.rows.length;
      }
    } catch (error) {
      report.reason = error instanceof Error ? error.message : String(error);
      warnings.push(`Block "${tableName}" (rows ${block.start_row}-${block.end_row}) skipped: ${report.reason}`);
    }

    blocks.push(report);
  });

  return {
    workbook: { source_file: meta.source_file, sheet_name: meta.sheet_name, tables, blocks },
    warnings,
  };
}

/**
 * Load one sheet as a rectangular grid of raw cell values.
 * Throws READ_FAILED for an unreadable file and SHEET_NOT_FOUND for a missing sheet.
 */
export async function loadSheetGrid(filePath: string, sheetName: string): Promise<RawGrid> {
  let buffer: Buffer;
  try {
    buffer = await fs.readFile(filePath);
  } catch (error) {
    throw createToolError('READ_FAILED', `Failed to read workbook: ${filePath}`, {
      details: { path: filePath, error: String(error) },
      recoverable: false,
      suggestion: 'Verify the results file path is correct and the file exists',
    });
  }

  let book: XLSX.WorkBook;
  try {
    book = XLSX.read(buffer, { type: 'buffer' });
  } catch (error) {
    throw createToolError('READ_FAILED', `Failed to open workbook: ${filePath}`, {
      details: { path: filePath, error: String(error) },
      recoverable: false,
      suggestion: 'Check that the file is an .xlsx workbook',
    });
  }

  const sheet = book.Sheets[sheetName];
  if (!book.SheetNames.includes(sheetName) || sheet === undefined) {
    throw createToolError('SHEET_NOT_FOUND', `Sheet "${sheetName}" not found in ${path.basename(filePath)}`, {
      details: { path: filePath, sheet_name: sheetName, available: book.SheetNames },
      recoverable: false,
      suggestion: `Pass one of: ${book.SheetNames.join(', ')}`,
    });
  }

  const raw = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    raw: true,
    defval: null,
    blankrows: true,
  });

  const width = raw.reduce((max, row) => Math.max(max, row.length), 0);
  return raw.map(row => {
    const cells: Cell[] = [];
    for (let c = 0; c < width; c++) {
      cells.push(toCell(row[c]));
    }
    return cells;
  });
}

/**
 * Parse every logical table of a workbook sheet
 *
 * @example
 * const { workbook } = await parseWorkbookTables('results/batch_001.xlsx', 'Asset Allocation Report');
 * Object.keys(workbook.tables);
 * // ['Portfolio Allocations', 'Portfolio Performance (Jan 2003 - Nov 2025)', ...]
 */
export async function parseWorkbookTables(
  filePath: string,
  sheetName: string,
  rules?: readonly TableTypeRule[]
): Promise<SheetParseResult> {
  const grid = await loadSheetGrid(filePath, sheetName);
  return parseSheetGrid(grid, { source_file: filePath, sheet_name: sheetName }, rules);
}

// ============================================================================
// Tool: backtest_parse_workbook
// ============================================================================

export interface ParseWorkbookResult {
  success: true;
  output_path: string;
  skipped: boolean;
  table_names: string[];
  blocks: BlockReport[];
  warnings: string[];
}

/**
 * Parse a results workbook and write parsed/<stem>.tables.json
 */
export async function parseWorkbook(input: ParseWorkbookInput): Promise<ParseWorkbookResult | ToolError> {
  const manager = getRunManager();
  const { runDir } = await manager.ensureRun(input.run_id);
  const { logger } = await manager.getRun(input.run_id);

  const filePath = resolveFrom(runDir, input.file);
  const sheetName = input.sheet_name ?? manager.getDefaults().workbook.sheet_name;
  const stem = path.basename(filePath, path.extname(filePath));
  const outputPath = path.join(manager.getParsedDir(input.run_id), `${stem}.tables.json`);

  if (!input.force && await pathExists(outputPath)) {
    const existing = await readJson<ParsedWorkbook>(outputPath);
    return {
      success: true,
      output_path: outputPath,
      skipped: true,
      table_names: Object.keys(existing.tables),
      blocks: existing.blocks,
      warnings: [],
    };
  }

  await manager.startPhase(input.run_id, 'parse');

  let parsed: SheetParseResult;
  try {
    parsed = await parseWorkbookTables(filePath, sheetName);
  } catch (error) {
    if (!isToolError(error)) throw error;
    await logger.error('parse', 'backtest_parse_workbook', error.message, error.details);
    await manager.completePhase(input.run_id, 'parse', {
      errors: [{ timestamp: now(), code: error.code, message: error.message, recoverable: error.recoverable }],
    });
    await manager.addTotals(input.run_id, { errors_encountered: 1 });
    return error;
  }

  const { workbook, warnings } = parsed;
  await writeJson(outputPath, workbook);

  await logger.warnAll('parse', 'backtest_parse_workbook', warnings);
  await logger.info('parse', 'backtest_parse_workbook', `Parsed ${Object.keys(workbook.tables).length} tables`, {
    file: filePath,
    sheet: sheetName,
    blocks: workbook.blocks.length,
  });

  await manager.completePhase(input.run_id, 'parse', {
    inputs: { count: 1, hashes: [await hashFile(filePath)] },
    outputs: { count: 1, hashes: [await hashFile(outputPath)] },
    warnings,
  });
  await manager.addTotals(input.run_id, {
    workbooks_parsed: 1,
    tables_parsed: Object.keys(workbook.tables).length,
  });

  return {
    success: true,
    output_path: outputPath,
    skipped: false,
    table_names: Object.keys(workbook.tables),
    blocks: workbook.blocks,
    warnings,
  };
}
