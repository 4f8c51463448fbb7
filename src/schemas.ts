/**
 * Backtest Ledger MCP: Zod Schemas for Tool Input Validation
 *
 * Every tool has a strict schema that enforces type safety and provides
 * clear error messages for invalid inputs.
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import { z } from "zod";

// ============================================================================
// Common Schemas
// ============================================================================

export const RunIdSchema = z.string().uuid().describe("Run directory identifier");
export const ForceSchema = z.boolean().default(false).describe("Re-run even if output exists");
export const GridTypeSchema = z.enum(["coarse", "fine", "random", "treasury"]);

// ============================================================================
// Grid Schemas
// ============================================================================

export const GenerateGridInputSchema = z.object({
  run_id: RunIdSchema,
  grid_type: GridTypeSchema.default("coarse")
    .describe("coarse/fine enumerate fixed parameter sets, random samples, treasury varies maturities"),
  count: z.number().int().min(1).max(10000).optional()
    .describe("Number of portfolios to draw (random grids only)"),
  seed: z.number().int().optional()
    .describe("Random seed (random grids only)"),
  min_allocation: z.number().min(0).max(0.2).optional()
    .describe("Reject combinations with any asset below this fraction"),
  output_name: z.string().regex(/^[\w.-]+$/).optional()
    .describe("File name under grids/ (default: <grid_type>_grid.csv)"),
  force: ForceSchema
}).strict();

// ============================================================================
// Batch Schemas
// ============================================================================

export const PlanBatchesInputSchema = z.object({
  run_id: RunIdSchema,
  grid_path: z.string()
    .describe("Allocation CSV to split (relative to run dir, e.g. grids/coarse_grid.csv)"),
  batch_size: z.number().int().min(1).max(3).optional()
    .describe("Portfolios per batch (the backtesting site accepts at most 3; defaults to the configured batch size)"),
  start_batch: z.number().int().min(1).optional()
    .describe("First batch number to write (1-based, inclusive)"),
  end_batch: z.number().int().min(1).optional()
    .describe("Last batch number to write (1-based, inclusive)"),
}).strict();

export const RecordResultInputSchema = z.object({
  run_id: RunIdSchema,
  batch_num: z.number().int().min(1).describe("Batch number the workbook belongs to"),
  results_file: z.string()
    .describe("Results workbook path (relative to run dir, or absolute)"),
}).strict();

// ============================================================================
// Parse Schemas
// ============================================================================

export const ParseWorkbookInputSchema = z.object({
  run_id: RunIdSchema,
  file: z.string().describe("Results workbook path (relative to run dir, or absolute)"),
  sheet_name: z.string().optional()
    .describe("Sheet to parse (default: Asset Allocation Report)"),
  force: ForceSchema
}).strict();

// ============================================================================
// Consolidate Schemas
// ============================================================================

export const ConsolidateInputSchema = z.object({
  run_id: RunIdSchema,
  manifest_path: z.string().default("batches/batch_manifest.csv")
    .describe("Batch manifest CSV (relative to run dir)"),
  batch_dir: z.string().default("batches")
    .describe("Directory holding batch_<NNN>_*.csv files (relative to run dir)"),
  top_n: z.number().int().min(1).max(100).optional()
    .describe("Number of portfolios in the ranking summary"),
  ranking_metric: z.string().optional()
    .describe("Metric to rank by (default: Sharpe Ratio)"),
}).strict();

// ============================================================================
// Utility Schemas
// ============================================================================

export const RunStatusInputSchema = z.object({
  run_id: RunIdSchema
}).strict();

export const RunListInputSchema = z.object({
  status: z.enum(["all", "completed", "running", "failed", "partial"]).default("all"),
  limit: z.number().int().min(1).max(100).default(20),
  before: z.string().datetime().optional(),
  after: z.string().datetime().optional()
}).strict();

export const RunCleanupInputSchema = z.object({
  older_than_days: z.number().int().min(1).default(30),
  keep_manifests: z.boolean().default(true)
    .describe("Keep manifest.json for audit trail"),
  dry_run: z.boolean().default(true)
    .describe("Preview what would be deleted")
}).strict();

// ============================================================================
// Type Exports
// ============================================================================

export type GenerateGridInput = z.infer<typeof GenerateGridInputSchema>;
export type PlanBatchesInput = z.infer<typeof PlanBatchesInputSchema>;
export type RecordResultInput = z.infer<typeof RecordResultInputSchema>;
export type ParseWorkbookInput = z.infer<typeof ParseWorkbookInputSchema>;
export type ConsolidateInput = z.infer<typeof ConsolidateInputSchema>;
export type RunStatusInput = z.infer<typeof RunStatusInputSchema>;
export type RunListInput = z.infer<typeof RunListInputSchema>;
export type RunCleanupInput = z.infer<typeof RunCleanupInputSchema>;
