/**
 * Allocation CSV Handling - Backtest Ledger MCP
 *
 * Reads grid and batch allocation CSVs (Asset_Number, Asset_Description,
 * one percent-weight column per portfolio) and checks their totals.
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import { createToolError, parseNumber, readCsvFile } from '../utils.js';
import type { AllocationRow, AllocationTable } from '../types.js';

export const ASSET_NUMBER_COLUMN = 'Asset_Number';
export const ASSET_DESCRIPTION_COLUMN = 'Asset_Description';

/**
 * Columns whose name starts with one of the portfolio prefixes, in file order
 */
export function detectPortfolioColumns(header: readonly string[], prefixes: readonly string[]): string[] {
  return header.filter(column => prefixes.some(prefix => column.startsWith(prefix)));
}

/**
 * Read an allocation CSV.
 * Throws FILE_NOT_FOUND for a missing file and INVALID_INPUT when the
 * Asset_Description column is absent.
 */
export async function readAllocationCsv(
  filePath: string,
  prefixes: readonly string[]
): Promise<AllocationTable> {
  const csv = await readCsvFile(filePath);

  if (!csv.header.includes(ASSET_DESCRIPTION_COLUMN)) {
    throw createToolError('INVALID_INPUT', `Allocation CSV has no ${ASSET_DESCRIPTION_COLUMN} column: ${filePath}`, {
      details: { path: filePath, header: csv.header },
      suggestion: `Expected columns ${ASSET_NUMBER_COLUMN}, ${ASSET_DESCRIPTION_COLUMN}, then one column per portfolio`,
    });
  }

  const portfolioColumns = detectPortfolioColumns(csv.header, prefixes);

  const rows: AllocationRow[] = csv.records.map((record, index) => {
    const weights: Record<string, number | null> = {};
    for (const column of portfolioColumns) {
      weights[column] = parseNumber(record[column]);
    }
    return {
      asset_number: parseNumber(record[ASSET_NUMBER_COLUMN]) ?? index + 1,
      asset_description: record[ASSET_DESCRIPTION_COLUMN] ?? '',
      weights,
    };
  });

  return { source_file: filePath, portfolio_columns: portfolioColumns, rows };
}

export interface WeightCheck {
  portfolio: string;
  total: number;
  valid: boolean;
}

/**
 * Check that each portfolio's percent weights sum to 100 within `tolerance`.
 * Failures come back as warnings, never as errors.
 */
export function validateWeights(
  table: AllocationTable,
  tolerance: number = 0.01
): { checks: WeightCheck[]; warnings: string[] } {
  const warnings: string[] = [];

  const checks = table.portfolio_columns.map(portfolio => {
    const total = table.rows.reduce((sum, row) => sum + (row.weights[portfolio] ?? 0), 0);
    const valid = Math.abs(total - 100) <= tolerance;
    if (!valid) {
      warnings.push(`Portfolio ${portfolio} totals ${Number(total.toFixed(6))}%, not 100%`);
    }
    return { portfolio, total, valid };
  });

  return { checks, warnings };
}
