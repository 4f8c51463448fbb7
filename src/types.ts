/**
 * Backtest Ledger MCP: Canonical Data Types
 *
 * These types define the core data structures used throughout the pipeline:
 * raw workbook grids, logical tables, consolidated records and run manifests.
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

// ============================================================================
// Workbook Grid - The unmodified load of one spreadsheet sheet
// ============================================================================

export type CellScalar = string | number | boolean;
export type Cell = CellScalar | null;

/** rows[r][c], padded to a uniform width */
export type RawGrid = Cell[][];

// ============================================================================
// Logical Tables - Blocks of non-empty rows and their parsed content
// ============================================================================

export interface TableBlock {
  start_row: number;           // Inclusive, grid row index
  end_row: number;             // Inclusive
  name: string;                // First non-empty cell of start_row, or Table_<n>
}

export type TableType = "allocation" | "metrics" | "returns" | "correlation" | "unknown";

export interface TableStructure {
  header_row: number | null;   // Relative to the block; null only for an empty block
  data_start_row: number | null;
  column_count: number;        // Non-empty cells in the header row
  table_type: TableType;
}

export interface KeyValueEntry {
  key: CellScalar;
  value: Cell;
}

export interface KeyValueTable {
  kind: "key_value";
  name: string;
  table_type: TableType;
  entries: KeyValueEntry[];
}

export interface TabularTable {
  kind: "tabular";
  name: string;
  table_type: TableType;
  columns: string[];
  rows: Cell[][];
}

export type ParsedTable = KeyValueTable | TabularTable;

export interface BlockReport {
  table_name: string;
  start_row: number;
  end_row: number;
  table_type: TableType;
  column_count: number;
  parsed_as: "key_value" | "tabular" | "skipped";
  row_count: number;
  reason?: string;
}

export interface ParsedWorkbook {
  source_file: string;
  sheet_name: string;
  /** Insertion order follows block order */
  tables: Record<string, ParsedTable>;
  blocks: BlockReport[];
}

// ============================================================================
// Allocations - Batch and grid allocation CSVs
// ============================================================================

export interface AllocationRow {
  asset_number: number;
  asset_description: string;
  /** Percent weights keyed by portfolio column; null when the cell is blank */
  weights: Record<string, number | null>;
}

export interface AllocationTable {
  source_file?: string;
  portfolio_columns: string[];
  rows: AllocationRow[];
}

// ============================================================================
// Consolidated Records - Long-format outputs
// ============================================================================

export interface PortfolioRecord {
  portfolio_uuid: string;
  portfolio_name: string;
  asset_name: string;
  portfolio_weight: number;    // Fraction in [0, 1]
}

export interface MetricRecord {
  portfolio_uuid: string;
  portfolio_name: string;
  metric_name: string;
  metric_value: number;
  table_source: string;
}

export interface PortfolioMapping {
  portfolio_name: string;
  portfolio_uuid: string;
}

export interface BatchManifestEntry {
  batch_num: number;
  results_file: string;
}

// ============================================================================
// RunManifest - Audit record for pipeline runs
// ============================================================================

export type PhaseName = "grid" | "batch" | "parse" | "consolidate";

export interface RunManifest {
  run_id: string;              // UUID v7 (time-ordered)
  created_at: string;          // ISO8601
  completed_at?: string;
  status: "running" | "completed" | "failed" | "partial";

  config_hash: string;         // SHA256 of config.json

  phases: Partial<Record<PhaseName, PhaseManifest>>;

  totals: {
    portfolios_generated: number;
    batches_planned: number;
    workbooks_parsed: number;
    tables_parsed: number;
    metadata_rows: number;
    metric_rows: number;
    errors_encountered: number;
  };

  timing: {
    total_duration_ms: number;
    phase_durations: Record<string, number>;
  };
}

export interface PhaseManifest {
  started_at: string;
  completed_at?: string;
  status: "pending" | "running" | "completed" | "failed";

  inputs: {
    count: number;
    hashes: string[];          // SHA256 of each input
  };

  outputs: {
    count: number;
    hashes: string[];
  };

  tool_version: string;
  warnings: string[];
  errors: ErrorRecord[];
}

export interface ErrorRecord {
  timestamp: string;
  code: string;
  message: string;
  details?: unknown;
  recoverable: boolean;
}

// ============================================================================
// Configuration Types
// ============================================================================

export type GridType = "coarse" | "fine" | "random" | "treasury";

export interface MetricTableGroup {
  label: string;
  /** Expected table names, tried in order; the first that matches is used */
  names: string[];
}

export interface BacktestLedgerConfig {
  version: string;

  storage: {
    runs_dir: string;
  };

  defaults: {
    workbook: {
      sheet_name: string;
    };
    grid: {
      min_allocation: number;
      random_count: number;
      random_seed: number;
    };
    batching: {
      batch_size: number;
      weight_tolerance: number;
    };
    consolidation: {
      portfolio_prefixes: string[];
      metric_tables: MetricTableGroup[];
      match_prefix_chars: number;
      ranking_metric: string;
      top_n: number;
    };
  };
}

// ============================================================================
// Error Types
// ============================================================================

export type ErrorCode =
  | "READ_FAILED"
  | "WRITE_FAILED"
  | "FILE_NOT_FOUND"
  | "SHEET_NOT_FOUND"
  | "BATCH_FILE_NOT_FOUND"
  | "RUN_NOT_FOUND"
  | "INVALID_INPUT";

export interface ToolError {
  success: false;
  isError: true;
  code: ErrorCode;
  message: string;
  details?: unknown;
  recoverable: boolean;
  suggestion?: string;
}

// ============================================================================
// Event Types (for logging)
// ============================================================================

export interface EventLogEntry {
  timestamp: string;
  level: "info" | "warn" | "error" | "debug";
  phase: string;
  tool: string;
  message: string;
  data?: unknown;
}
