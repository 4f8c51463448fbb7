/**
 * Portfolio Grid Generation - Backtest Ledger MCP
 *
 * Builds candidate allocations for grid search:
 * - coarse / fine: enumerate equity split, regional ratios, fixed-income ratios and REIT level
 * - random: seeded draws with Dirichlet-distributed splits
 * - treasury: a fixed base allocation with its treasury sleeve spread over maturities
 *
 * Grids are written as allocation CSVs (percent weights, one column per portfolio).
 *
 * @module tools/grid
 * @see tests/grid-generation.test.ts for the test contract
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import * as path from 'path';
import { getRunManager } from '../run-manager.js';
import { createSeededRandom, hashFile, padNumber, pathExists, writeCsvFile } from '../utils.js';
import { ASSET_DESCRIPTION_COLUMN, ASSET_NUMBER_COLUMN, readAllocationCsv, validateWeights } from './allocations.js';
import type { GenerateGridInput } from '../schemas.js';
import type { AllocationTable, GridType, ToolError } from '../types.js';

// ============================================================================
// Asset Catalog
// ============================================================================

export interface AssetClass {
  key: string;
  description: string;
  group: 'equity' | 'fixed_income';
}

/** Asset rows of coarse, fine and random grids, in CSV order */
export const CORE_ASSETS: readonly AssetClass[] = [
  { key: 'us_equities', description: 'US Equities - US Stock Market', group: 'equity' },
  { key: 'intl_developed', description: 'Foreign Developed Equities - Intl Developed ex-US Market', group: 'equity' },
  { key: 'emerging', description: 'Emerging Market Equities - Emerging Markets', group: 'equity' },
  { key: 'treasuries', description: 'US Treasuries - Intermediate Term Treasury', group: 'fixed_income' },
  { key: 'tips', description: 'TIPS - Inflation-Protected Bonds', group: 'fixed_income' },
  { key: 'corporate', description: 'Corporate Bonds - Investment Grade Corporate Bonds', group: 'fixed_income' },
  { key: 'reit', description: 'Real Estate/REITs - US REIT', group: 'equity' },
];

/** Asset rows of the treasury-term grid, in CSV order */
export const TREASURY_ASSETS: readonly AssetClass[] = [
  { key: 'us_equities', description: 'US Equities - US Stock Market', group: 'equity' },
  { key: 'intl_developed', description: 'Foreign Developed Equities - Intl Developed ex-US Market', group: 'equity' },
  { key: 'emerging', description: 'Emerging Market Equities - Emerging Markets', group: 'equity' },
  { key: 'short_treasury', description: 'US Treasuries - Short Term Treasury', group: 'fixed_income' },
  { key: 'intermediate_treasury', description: 'US Treasuries - Intermediate Term Treasury', group: 'fixed_income' },
  { key: 'ten_year_treasury', description: 'US Treasuries - 10-year Treasury', group: 'fixed_income' },
  { key: 'long_treasury', description: 'US Treasuries - Long Term Treasury', group: 'fixed_income' },
  { key: 'tips', description: 'TIPS - Inflation-Protected Bonds', group: 'fixed_income' },
  { key: 'corporate', description: 'Corporate Bonds - Investment Grade Corporate Bonds', group: 'fixed_income' },
  { key: 'reit', description: 'Real Estate/REITs - US REIT', group: 'equity' },
];

// ============================================================================
// Types
// ============================================================================

export interface GridPortfolio {
  id: string;
  /** Fractions aligned with the grid's assets; they sum to 1 */
  weights: number[];
}

export interface PortfolioGrid {
  type: GridType;
  assets: readonly AssetClass[];
  portfolios: GridPortfolio[];
  warnings: string[];
}

export interface GridOptions {
  min_allocation?: number;
  count?: number;
  seed?: number;
}

interface EnumerationParams {
  prefix: string;
  equity_splits: number[];
  us_ratios: number[];
  intl_ratios: number[];
  treasury_ratios: number[];
  tips_ratios: number[];
  reit_levels: number[];
  /** Combinations with less non-REIT equity are skipped */
  min_non_reit_equity: number;
}

const COARSE_PARAMS: EnumerationParams = {
  prefix: 'Grid_',
  equity_splits: [0.50, 0.675, 0.70],
  us_ratios: [0.70, 0.55, 0.50],
  intl_ratios: [0.20, 0.22, 0.35],
  treasury_ratios: [0.31, 0.40, 0.50],
  tips_ratios: [0.46, 0.40, 0.30],
  reit_levels: [0.05, 0.075, 0.10],
  min_non_reit_equity: 0,
};

const FINE_PARAMS: EnumerationParams = {
  prefix: 'FineGrid_',
  equity_splits: [0.40, 0.50, 0.60, 0.675, 0.70, 0.80],
  us_ratios: [0.70, 0.60, 0.55, 0.50, 0.40],
  intl_ratios: [0.20, 0.22, 0.30, 0.35, 0.40],
  treasury_ratios: [0.20, 0.31, 0.40, 0.50],
  tips_ratios: [0.30, 0.40, 0.46, 0.50],
  reit_levels: [0.05, 0.075, 0.10, 0.15, 0.20],
  min_non_reit_equity: 0.20,
};

const DEFAULT_MIN_ALLOCATION = 0.03;

// ============================================================================
// Enumerated Grids
// ============================================================================

/**
 * Weights in CORE_ASSETS order for one parameter combination
 */
function splitAllocation(
  equity: number,
  usRatio: number,
  intlRatio: number,
  treasuryRatio: number,
  tipsRatio: number,
  reit: number
): number[] {
  const nonReitEquity = equity - reit;
  const fixedIncome = 1 - equity;
  return [
    nonReitEquity * usRatio,
    nonReitEquity * intlRatio,
    nonReitEquity * (1 - usRatio - intlRatio),
    fixedIncome * treasuryRatio,
    fixedIncome * tipsRatio,
    fixedIncome * (1 - treasuryRatio - tipsRatio),
    reit,
  ];
}

function normalize(weights: number[]): number[] {
  const total = weights.reduce((sum, w) => sum + w, 0);
  return weights.map(w => w / total);
}

function enumerateGrid(type: GridType, params: EnumerationParams, minAllocation: number): PortfolioGrid {
  const portfolios: GridPortfolio[] = [];

  for (const equity of params.equity_splits) {
    for (const usRatio of params.us_ratios) {
      for (const intlRatio of params.intl_ratios) {
        for (const treasuryRatio of params.treasury_ratios) {
          for (const tipsRatio of params.tips_ratios) {
            for (const reit of params.reit_levels) {
              if (equity - reit < params.min_non_reit_equity) continue;

              const weights = splitAllocation(equity, usRatio, intlRatio, treasuryRatio, tipsRatio, reit);
              if (weights.some(w => w < minAllocation)) continue;

              const total = weights.reduce((sum, w) => sum + w, 0);
              if (Math.abs(total - 1) >= 0.001) continue;

              portfolios.push({
                id: `${params.prefix}${padNumber(portfolios.length + 1)}`,
                weights: normalize(weights),
              });
            }
          }
        }
      }
    }
  }

  return { type, assets: CORE_ASSETS, portfolios, warnings: [] };
}

export function generateCoarseGrid(minAllocation: number = DEFAULT_MIN_ALLOCATION): PortfolioGrid {
  return enumerateGrid('coarse', COARSE_PARAMS, minAllocation);
}

export function generateFineGrid(minAllocation: number = DEFAULT_MIN_ALLOCATION): PortfolioGrid {
  return enumerateGrid('fine', FINE_PARAMS, minAllocation);
}

// ============================================================================
// Random Grid
// ============================================================================

/** Standard normal draw (Box-Muller) */
function normalDraw(random: () => number): number {
  const u1 = 1 - random();
  const u2 = random();
  return Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
}

/** Gamma(shape, 1) draw (Marsaglia-Tsang) */
function gammaDraw(random: () => number, shape: number): number {
  if (shape < 1) {
    return gammaDraw(random, shape + 1) * Math.pow(1 - random(), 1 / shape);
  }

  const d = shape - 1 / 3;
  const c = 1 / Math.sqrt(9 * d);
  for (;;) {
    let x: number;
    let v: number;
    do {
      x = normalDraw(random);
      v = 1 + c * x;
    } while (v <= 0);

    v = v * v * v;
    const u = 1 - random();
    if (Math.log(u) < 0.5 * x * x + d - d * v + d * Math.log(v)) {
      return d * v;
    }
  }
}

export function dirichletDraw(random: () => number, alphas: readonly number[]): number[] {
  const draws = alphas.map(alpha => gammaDraw(random, alpha));
  const total = draws.reduce((sum, g) => sum + g, 0);
  return draws.map(g => g / total);
}

/**
 * Draw `count` portfolios; combinations below the floor are redrawn, up to
 * ten attempts per requested portfolio.
 */
export function generateRandomGrid(
  count: number = 100,
  seed: number = 42,
  minAllocation: number = DEFAULT_MIN_ALLOCATION
): PortfolioGrid {
  const random = createSeededRandom(seed);
  const uniform = (low: number, high: number): number => low + (high - low) * random();
  const portfolios: GridPortfolio[] = [];
  const maxAttempts = count * 10;
  let attempts = 0;

  while (portfolios.length < count && attempts < maxAttempts) {
    attempts++;

    const equity = uniform(0.40, 0.80);
    const reit = uniform(minAllocation, 0.20);
    const nonReitEquity = equity - reit;

    const [usShare, intlShare, emergingShare] = dirichletDraw(random, [2, 1.5, 1]);
    const equityWeights = [usShare, intlShare, emergingShare].map(share => nonReitEquity * share);
    if (equityWeights.some(w => w < minAllocation)) continue;

    const fixedIncome = 1 - equity;
    const [treasuryShare, tipsShare, corporateShare] = dirichletDraw(random, [1.5, 1.5, 1]);
    const fixedIncomeWeights = [treasuryShare, tipsShare, corporateShare].map(share => fixedIncome * share);
    if (fixedIncomeWeights.some(w => w < minAllocation)) continue;

    const weights = normalize([...equityWeights, ...fixedIncomeWeights, reit]);
    if (weights.some(w => w < minAllocation)) continue;

    portfolios.push({ id: `Random_${padNumber(portfolios.length + 1)}`, weights });
  }

  const warnings = portfolios.length < count
    ? [`Only generated ${portfolios.length} valid portfolios out of ${count} requested`]
    : [];

  return { type: 'random', assets: CORE_ASSETS, portfolios, warnings };
}

// ============================================================================
// Treasury-Term Grid
// ============================================================================

const TREASURY_BASE = {
  us_equities: 31.5,
  intl_developed: 9.0,
  emerging: 4.5,
  tips: 20.0,
  corporate: 5.0,
  reit: 5.0,
};

const TREASURY_SLEEVE = 25;
const TREASURY_STEP = 5;

/**
 * Every split of the treasury sleeve over short, intermediate, 10-year and
 * long maturities in 5 percent steps. The minimum floor does not apply.
 */
export function generateTreasuryGrid(): PortfolioGrid {
  const steps: number[] = [];
  for (let value = 0; value <= TREASURY_SLEEVE; value += TREASURY_STEP) steps.push(value);

  const portfolios: GridPortfolio[] = [];
  for (const short of steps) {
    for (const intermediate of steps) {
      for (const tenYear of steps) {
        for (const long of steps) {
          if (short + intermediate + tenYear + long !== TREASURY_SLEEVE) continue;

          const percents = [
            TREASURY_BASE.us_equities,
            TREASURY_BASE.intl_developed,
            TREASURY_BASE.emerging,
            short,
            intermediate,
            tenYear,
            long,
            TREASURY_BASE.tips,
            TREASURY_BASE.corporate,
            TREASURY_BASE.reit,
          ];
          portfolios.push({
            id: `TreasuryGrid_${padNumber(portfolios.length + 1)}`,
            weights: percents.map(p => p / 100),
          });
        }
      }
    }
  }

  return { type: 'treasury', assets: TREASURY_ASSETS, portfolios, warnings: [] };
}

/**
 * @example
 * generateGrid('random', { count: 20, seed: 7 }).portfolios.length // 20
 */
export function generateGrid(type: GridType, options: GridOptions = {}): PortfolioGrid {
  const minAllocation = options.min_allocation ?? DEFAULT_MIN_ALLOCATION;
  switch (type) {
    case 'coarse':
      return generateCoarseGrid(minAllocation);
    case 'fine':
      return generateFineGrid(minAllocation);
    case 'random':
      return generateRandomGrid(options.count, options.seed, minAllocation);
    case 'treasury':
      return generateTreasuryGrid();
  }
}

// ============================================================================
// Output
// ============================================================================

/** Percent weight as written to CSV */
export function toPercent(weight: number): number {
  return Number((weight * 100).toFixed(6));
}

export function toAllocationTable(grid: PortfolioGrid): AllocationTable {
  return {
    portfolio_columns: grid.portfolios.map(p => p.id),
    rows: grid.assets.map((asset, assetIndex) => {
      const weights: Record<string, number | null> = {};
      for (const portfolio of grid.portfolios) {
        weights[portfolio.id] = toPercent(portfolio.weights[assetIndex]);
      }
      return { asset_number: assetIndex + 1, asset_description: asset.description, weights };
    }),
  };
}

/**
 * Write Asset_Number, Asset_Description and one percent column per portfolio
 */
export async function writeAllocationCsv(filePath: string, table: AllocationTable): Promise<void> {
  await writeCsvFile(
    filePath,
    [ASSET_NUMBER_COLUMN, ASSET_DESCRIPTION_COLUMN, ...table.portfolio_columns],
    table.rows.map(row => [
      row.asset_number,
      row.asset_description,
      ...table.portfolio_columns.map(column => row.weights[column] ?? null),
    ])
  );
}

export interface Range {
  min: number;
  max: number;
}

export interface GridSummary {
  portfolio_count: number;
  /** Percent statistics per asset */
  assets: Array<{ asset: string } & Range & { mean: number }>;
  total_equity: Range;
  total_fixed_income: Range;
}

function rangeOf(values: readonly number[]): Range {
  if (values.length === 0) return { min: 0, max: 0 };
  return { min: Math.min(...values), max: Math.max(...values) };
}

export function summarizeGrid(grid: PortfolioGrid): GridSummary {
  const groupTotals = (group: AssetClass['group']): number[] =>
    grid.portfolios.map(portfolio =>
      toPercent(grid.assets.reduce((sum, asset, i) => (asset.group === group ? sum + portfolio.weights[i] : sum), 0))
    );

  return {
    portfolio_count: grid.portfolios.length,
    assets: grid.assets.map((asset, i) => {
      const values = grid.portfolios.map(portfolio => toPercent(portfolio.weights[i]));
      const mean = values.length === 0 ? 0 : values.reduce((sum, v) => sum + v, 0) / values.length;
      return { asset: asset.description, ...rangeOf(values), mean: Number(mean.toFixed(6)) };
    }),
    total_equity: rangeOf(groupTotals('equity')),
    total_fixed_income: rangeOf(groupTotals('fixed_income')),
  };
}

// ============================================================================
// Tool: backtest_generate_grid
// ============================================================================

export interface GenerateGridResult {
  success: true;
  output_path: string;
  skipped: boolean;
  grid_type: GridType;
  portfolio_count: number;
  summary?: GridSummary;
  warnings: string[];
}

export async function generateGridTool(input: GenerateGridInput): Promise<GenerateGridResult | ToolError> {
  const manager = getRunManager();
  await manager.ensureRun(input.run_id);
  const { logger } = await manager.getRun(input.run_id);
  const defaults = manager.getDefaults();

  const outputPath = path.join(manager.getGridsDir(input.run_id), input.output_name ?? `${input.grid_type}_grid.csv`);

  if (!input.force && await pathExists(outputPath)) {
    const existing = await readAllocationCsv(outputPath, defaults.consolidation.portfolio_prefixes);
    return {
      success: true,
      output_path: outputPath,
      skipped: true,
      grid_type: input.grid_type,
      portfolio_count: existing.portfolio_columns.length,
      warnings: [],
    };
  }

  await manager.startPhase(input.run_id, 'grid');

  const grid = generateGrid(input.grid_type, {
    min_allocation: input.min_allocation ?? defaults.grid.min_allocation,
    count: input.count ?? defaults.grid.random_count,
    seed: input.seed ?? defaults.grid.random_seed,
  });

  const table = toAllocationTable(grid);
  const check = validateWeights(table, defaults.batching.weight_tolerance);
  const warnings = [...grid.warnings, ...check.warnings];

  await writeAllocationCsv(outputPath, table);
  const summary = summarizeGrid(grid);

  await logger.warnAll('grid', 'backtest_generate_grid', warnings);
  await logger.info('grid', 'backtest_generate_grid', `Generated ${grid.portfolios.length} ${grid.type} portfolios`, {
    output: outputPath,
  });

  await manager.completePhase(input.run_id, 'grid', {
    outputs: { count: 1, hashes: [await hashFile(outputPath)] },
    warnings,
  });
  await manager.addTotals(input.run_id, { portfolios_generated: grid.portfolios.length });

  return {
    success: true,
    output_path: outputPath,
    skipped: false,
    grid_type: grid.type,
    portfolio_count: grid.portfolios.length,
    summary,
    warnings,
  };
}
