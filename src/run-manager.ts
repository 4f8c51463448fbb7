/**
 * Backtest Ledger MCP: Run Manager
 *
 * Manages run directories, manifests, and phase coordination.
 * Each run owns its grids, batch files, result workbooks and consolidated outputs.
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import * as path from "path";
import * as fs from "fs/promises";
import type {
  BacktestLedgerConfig,
  PhaseManifest,
  PhaseName,
  RunManifest,
} from "./types.js";
import {
  createToolError,
  ensureDir,
  generateRunId,
  hashConfig,
  now,
  pathExists,
  readJson,
  RunLogger,
  writeJson,
} from "./utils.js";

// ============================================================================
// Default Configuration
// ============================================================================

export const DEFAULT_CONFIG: BacktestLedgerConfig = {
  version: "1.0.0",

  storage: {
    runs_dir: "./runs",
  },

  defaults: {
    workbook: {
      sheet_name: "Asset Allocation Report",
    },
    grid: {
      min_allocation: 0.03,
      random_count: 100,
      random_seed: 42,
    },
    batching: {
      batch_size: 3,
      weight_tolerance: 0.01,
    },
    consolidation: {
      portfolio_prefixes: ["Grid_", "Portfolio_", "TreasuryGrid_", "FineGrid_", "Random_"],
      metric_tables: [
        {
          label: "Portfolio Performance",
          names: [
            "Portfolio Performance (Jan 2003 - Nov 2025)",
            "Portfolio Performance (Jan 1998 - Dec 2025)",
          ],
        },
        {
          label: "Risk and Return Metrics",
          names: [
            "Risk and Return Metrics (Jan 2003 - Nov 2025)",
            "Risk and Return Metrics (Jan 1998 - Dec 2025)",
          ],
        },
      ],
      match_prefix_chars: 30,
      ranking_metric: "Sharpe Ratio",
      top_n: 10,
    },
  },
};

export interface ConfigOverrides {
  version?: string;
  storage?: Partial<BacktestLedgerConfig["storage"]>;
  defaults?: {
    [K in keyof BacktestLedgerConfig["defaults"]]?: Partial<BacktestLedgerConfig["defaults"][K]>;
  };
}

/**
 * Merge overrides into the defaults one section at a time
 */
export function mergeConfig(overrides?: ConfigOverrides): BacktestLedgerConfig {
  const base = DEFAULT_CONFIG;
  const defaults = overrides?.defaults;
  return {
    version: overrides?.version ?? base.version,
    storage: { ...base.storage, ...overrides?.storage },
    defaults: {
      workbook: { ...base.defaults.workbook, ...defaults?.workbook },
      grid: { ...base.defaults.grid, ...defaults?.grid },
      batching: { ...base.defaults.batching, ...defaults?.batching },
      consolidation: { ...base.defaults.consolidation, ...defaults?.consolidation },
    },
  };
}

const RUN_SUBDIRS = ["grids", "batches", "results", "parsed", "consolidated", "logs"] as const;

const TOTAL_KEYS = [
  "portfolios_generated",
  "batches_planned",
  "workbooks_parsed",
  "tables_parsed",
  "metadata_rows",
  "metric_rows",
  "errors_encountered",
] as const satisfies ReadonlyArray<keyof RunManifest["totals"]>;

export interface RunSummary {
  run_id: string;
  status: RunManifest["status"];
  created_at: string;
}

// ============================================================================
// Run Manager Class
// ============================================================================

export class RunManager {
  private baseDir: string;
  private config: BacktestLedgerConfig;

  constructor(baseDir: string, config?: ConfigOverrides) {
    this.baseDir = baseDir;
    this.config = mergeConfig(config);
  }

  // --------------------------------------------------------------------------
  // Run Lifecycle
  // --------------------------------------------------------------------------

  /**
   * Create a new run directory with all subdirectories
   */
  async createRun(runId?: string): Promise<{ runId: string; runDir: string; logger: RunLogger }> {
    const id = runId || generateRunId();
    const runDir = this.getRunDir(id);

    for (const subdir of RUN_SUBDIRS) {
      await ensureDir(path.join(runDir, subdir));
    }

    const manifest: RunManifest = {
      run_id: id,
      created_at: now(),
      status: "running",
      config_hash: hashConfig(this.config),
      phases: {},
      totals: {
        portfolios_generated: 0,
        batches_planned: 0,
        workbooks_parsed: 0,
        tables_parsed: 0,
        metadata_rows: 0,
        metric_rows: 0,
        errors_encountered: 0,
      },
      timing: {
        total_duration_ms: 0,
        phase_durations: {},
      },
    };

    await writeJson(path.join(runDir, "manifest.json"), manifest);
    await writeJson(path.join(runDir, "config.json"), this.config);

    const logger = new RunLogger(runDir);
    await logger.init();

    return { runId: id, runDir, logger };
  }

  /**
   * Ensure a run exists, creating it if necessary.
   * Tools call this before touching any run directory.
   */
  async ensureRun(runId: string): Promise<{ runId: string; runDir: string; isNew: boolean }> {
    const runDir = this.getRunDir(runId);

    if (await pathExists(path.join(runDir, "manifest.json"))) {
      return { runId, runDir, isNew: false };
    }

    await this.createRun(runId);
    return { runId, runDir, isNew: true };
  }

  /**
   * Get an existing run's context
   */
  async getRun(runId: string): Promise<{ runDir: string; manifest: RunManifest; logger: RunLogger }> {
    const runDir = this.getRunDir(runId);
    const manifestPath = path.join(runDir, "manifest.json");

    if (!await pathExists(manifestPath)) {
      throw createToolError("RUN_NOT_FOUND", `Run not found: ${runId}`, {
        details: { run_id: runId },
        suggestion: "Create the run by calling any backtest_* tool with this run_id",
      });
    }

    const manifest = await readJson<RunManifest>(manifestPath);
    const logger = new RunLogger(runDir);
    await logger.init();

    return { runDir, manifest, logger };
  }

  /**
   * Update run manifest
   */
  async updateManifest(
    runId: string,
    updates: Omit<Partial<RunManifest>, "totals"> & { totals?: Partial<RunManifest["totals"]> }
  ): Promise<RunManifest> {
    const manifestPath = path.join(this.getRunDir(runId), "manifest.json");
    const manifest = await readJson<RunManifest>(manifestPath);

    const updated: RunManifest = {
      ...manifest,
      ...updates,
      totals: { ...manifest.totals, ...updates.totals },
      timing: { ...manifest.timing, ...updates.timing },
      phases: { ...manifest.phases, ...updates.phases },
    };

    await writeJson(manifestPath, updated);
    return updated;
  }

  /**
   * Add to the running totals of a run
   */
  async addTotals(runId: string, increments: Partial<RunManifest["totals"]>): Promise<RunManifest> {
    const { manifest } = await this.getRun(runId);
    const totals = { ...manifest.totals };
    for (const key of TOTAL_KEYS) {
      totals[key] += increments[key] ?? 0;
    }
    return this.updateManifest(runId, { totals });
  }

  /**
   * Mark a phase as started
   */
  async startPhase(runId: string, phaseName: PhaseName): Promise<PhaseManifest> {
    const phase: PhaseManifest = {
      started_at: now(),
      status: "running",
      inputs: { count: 0, hashes: [] },
      outputs: { count: 0, hashes: [] },
      tool_version: this.config.version,
      warnings: [],
      errors: [],
    };

    await this.updateManifest(runId, {
      status: "running",
      phases: { [phaseName]: phase },
    });

    return phase;
  }

  /**
   * Mark a phase as completed
   */
  async completePhase(
    runId: string,
    phaseName: PhaseName,
    result: Partial<PhaseManifest>
  ): Promise<void> {
    const { manifest } = await this.getRun(runId);
    const phase = manifest.phases[phaseName] ?? (await this.startPhase(runId, phaseName));

    const completedAt = now();
    const completed: PhaseManifest = {
      ...phase,
      ...result,
      completed_at: completedAt,
      status: result.errors?.length ? "failed" : "completed",
    };

    const duration = new Date(completedAt).getTime() - new Date(phase.started_at).getTime();

    await this.updateManifest(runId, {
      phases: { [phaseName]: completed },
      timing: {
        total_duration_ms: manifest.timing.total_duration_ms,
        phase_durations: {
          ...manifest.timing.phase_durations,
          [phaseName]: duration,
        },
      },
    });
  }

  /**
   * Complete the entire run
   */
  async completeRun(runId: string, status: RunManifest["status"]): Promise<RunManifest> {
    const { manifest } = await this.getRun(runId);

    const completedAt = now();
    const totalDuration = new Date(completedAt).getTime() - new Date(manifest.created_at).getTime();

    return this.updateManifest(runId, {
      completed_at: completedAt,
      status,
      timing: {
        ...manifest.timing,
        total_duration_ms: totalDuration,
      },
    });
  }

  // --------------------------------------------------------------------------
  // Path Helpers
  // --------------------------------------------------------------------------

  getBaseDir(): string {
    return this.baseDir;
  }

  getRunsDir(): string {
    return path.resolve(this.baseDir, this.config.storage.runs_dir);
  }

  getRunDir(runId: string): string {
    return path.join(this.getRunsDir(), runId);
  }

  getGridsDir(runId: string): string {
    return path.join(this.getRunDir(runId), "grids");
  }

  getBatchesDir(runId: string): string {
    return path.join(this.getRunDir(runId), "batches");
  }

  getParsedDir(runId: string): string {
    return path.join(this.getRunDir(runId), "parsed");
  }

  getConsolidatedDir(runId: string): string {
    return path.join(this.getRunDir(runId), "consolidated");
  }

  // --------------------------------------------------------------------------
  // Run Queries
  // --------------------------------------------------------------------------

  /**
   * List all runs, newest first
   */
  async listRuns(options?: {
    status?: "all" | RunManifest["status"];
    limit?: number;
    before?: string;
    after?: string;
  }): Promise<RunSummary[]> {
    const runsDir = this.getRunsDir();

    if (!await pathExists(runsDir)) {
      return [];
    }

    const entries = await fs.readdir(runsDir, { withFileTypes: true });
    const runs: RunSummary[] = [];

    for (const entry of entries) {
      if (!entry.isDirectory()) continue;

      const manifestPath = path.join(runsDir, entry.name, "manifest.json");
      if (!await pathExists(manifestPath)) continue;

      let manifest: RunManifest;
      try {
        manifest = await readJson<RunManifest>(manifestPath);
      } catch (error) {
        console.error(`[backtest-ledger] Skipping unreadable manifest ${manifestPath}: ${String(error)}`);
        continue;
      }

      if (options?.status && options.status !== "all" && manifest.status !== options.status) {
        continue;
      }
      if (options?.before && manifest.created_at >= options.before) {
        continue;
      }
      if (options?.after && manifest.created_at <= options.after) {
        continue;
      }

      runs.push({
        run_id: manifest.run_id,
        status: manifest.status,
        created_at: manifest.created_at,
      });
    }

    runs.sort((a, b) => b.created_at.localeCompare(a.created_at));

    if (options?.limit) {
      return runs.slice(0, options.limit);
    }

    return runs;
  }

  /**
   * Cleanup old runs
   */
  async cleanup(options: {
    older_than_days: number;
    keep_manifests?: boolean;
    dry_run?: boolean;
  }): Promise<{ deleted: string[]; errors: string[] }> {
    const cutoff = new Date();
    cutoff.setDate(cutoff.getDate() - options.older_than_days);

    const runs = await this.listRuns({ before: cutoff.toISOString() });
    const deleted: string[] = [];
    const errors: string[] = [];

    for (const run of runs) {
      const runDir = this.getRunDir(run.run_id);

      if (options.dry_run) {
        deleted.push(run.run_id);
        continue;
      }

      try {
        if (options.keep_manifests) {
          const entries = await fs.readdir(runDir, { withFileTypes: true });
          for (const entry of entries) {
            if (entry.name === "manifest.json") continue;
            await fs.rm(path.join(runDir, entry.name), { recursive: true });
          }
        } else {
          await fs.rm(runDir, { recursive: true });
        }
        deleted.push(run.run_id);
      } catch (e) {
        errors.push(`Failed to delete ${run.run_id}: ${String(e)}`);
      }
    }

    return { deleted, errors };
  }

  // --------------------------------------------------------------------------
  // Configuration Access
  // --------------------------------------------------------------------------

  getConfig(): BacktestLedgerConfig {
    return this.config;
  }

  getDefaults(): BacktestLedgerConfig["defaults"] {
    return this.config.defaults;
  }
}

// ============================================================================
// Singleton Instance
// ============================================================================

let globalManager: RunManager | null = null;

export function initRunManager(baseDir: string, config?: ConfigOverrides): RunManager {
  globalManager = new RunManager(baseDir, config);
  return globalManager;
}

export function getRunManager(): RunManager {
  if (!globalManager) {
    throw new Error("RunManager not initialized. Call initRunManager first.");
  }
  return globalManager;
}
