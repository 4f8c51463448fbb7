/**
 * Workbook fixtures shared by the parsing and consolidation tests
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import * as XLSX from 'xlsx';
import type { Cell } from '../../src/types.js';

export const RESULTS_SHEET = 'Asset Allocation Report';

/**
 * A results sheet shaped like a backtest download: a settings block, the
 * allocations, then the two metric tables.
 */
export function resultsSheetRows(): Cell[][] {
  const header = ['Sample Portfolio', 'Portfolio 2', 'Portfolio 3'];
  return [
    ['Start Date', 'Jan 2003', null, null],
    ['End Date', 'Nov 2025', null, null],
    [null, null, null, null],
    ['Portfolio Allocations', null, null, null],
    ['Asset Class', ...header],
    ['US Stock Market', 31.5, 40, 35],
    [null, null, null, null],
    ['Portfolio Performance (Jan 2003 - Nov 2025)', null, null, null],
    ['Metric', ...header],
    ['CAGR', 8.12, 8.5, 'N/A'],
    ['Sharpe Ratio', 0.61, 0.58, 0.66],
    [null, null, null, null],
    ['Risk and Return Metrics (Jan 2003 - Nov 2025)', null, null, null],
    ['Metric', ...header],
    ['Sortino Ratio', '1,234.5', 0.9, 1.1],
  ];
}

/**
 * Write an .xlsx file with one sheet per entry
 */
export async function writeWorkbook(filePath: string, sheets: Record<string, Cell[][]>): Promise<string> {
  const book = XLSX.utils.book_new();
  for (const [name, rows] of Object.entries(sheets)) {
    XLSX.utils.book_append_sheet(book, XLSX.utils.aoa_to_sheet(rows), name);
  }

  const buffer: Buffer = XLSX.write(book, { type: 'buffer', bookType: 'xlsx' });
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, buffer);
  return filePath;
}

export async function writeResultsWorkbook(filePath: string): Promise<string> {
  return writeWorkbook(filePath, { [RESULTS_SHEET]: resultsSheetRows() });
}

/**
 * Batch allocation CSV for Grid_001..Grid_003 (percent weights, one blank cell)
 */
export const BATCH_CSV = [
  'Asset_Number,Asset_Description,Grid_001,Grid_002,Grid_003',
  '1,US Equities - US Stock Market,50,60,0',
  '2,TIPS - Inflation-Protected Bonds,30,40,70',
  '3,Corporate Bonds - Investment Grade Corporate Bonds,20,,30',
  '',
].join('\n');
