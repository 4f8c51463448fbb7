/**
 * Backtest Ledger MCP: Utility Tools
 *
 * Run management utilities: status, list, cleanup.
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import type { RunManifest, ToolError } from "../types.js";
import type { RunStatusInput, RunListInput, RunCleanupInput } from "../schemas.js";
import { createToolError, isToolError } from "../utils.js";
import { getRunManager } from "../run-manager.js";

// ============================================================================
// Run Status
// ============================================================================

export interface RunStatusResult {
  run_id: string;
  status: RunManifest["status"];
  created_at: string;
  completed_at?: string;
  phases: {
    [key: string]: {
      status: string;
      duration_ms?: number;
      inputs?: number;
      outputs?: number;
      warnings?: number;
      errors?: number;
    };
  };
  totals: RunManifest["totals"];
  timing: RunManifest["timing"];
}

export async function runStatus(input: RunStatusInput): Promise<RunStatusResult | ToolError> {
  const manager = getRunManager();

  try {
    const { manifest } = await manager.getRun(input.run_id);

    const phases: RunStatusResult["phases"] = {};

    for (const [phaseName, phaseData] of Object.entries(manifest.phases)) {
      if (phaseData) {
        const startTime = new Date(phaseData.started_at).getTime();
        const endTime = phaseData.completed_at
          ? new Date(phaseData.completed_at).getTime()
          : Date.now();

        phases[phaseName] = {
          status: phaseData.status,
          duration_ms: endTime - startTime,
          inputs: phaseData.inputs.count,
          outputs: phaseData.outputs.count,
          warnings: phaseData.warnings.length,
          errors: phaseData.errors.length,
        };
      }
    }

    return {
      run_id: manifest.run_id,
      status: manifest.status,
      created_at: manifest.created_at,
      completed_at: manifest.completed_at,
      phases,
      totals: manifest.totals,
      timing: manifest.timing,
    };
  } catch (err) {
    if (isToolError(err)) return err;
    throw err;
  }
}

// ============================================================================
// Run List
// ============================================================================

export interface RunListResult {
  runs: Array<{
    run_id: string;
    status: string;
    created_at: string;
    portfolios?: number;
    metric_rows?: number;
  }>;
  total: number;
}

export async function runList(input: RunListInput): Promise<RunListResult | ToolError> {
  const manager = getRunManager();

  try {
    const runs = await manager.listRuns({
      status: input.status,
      limit: input.limit,
      before: input.before,
      after: input.after,
    });

    const enriched = [];
    for (const run of runs) {
      const { manifest } = await manager.getRun(run.run_id);
      enriched.push({
        run_id: run.run_id,
        status: run.status,
        created_at: run.created_at,
        portfolios: manifest.totals.portfolios_generated,
        metric_rows: manifest.totals.metric_rows,
      });
    }

    return { runs: enriched, total: enriched.length };
  } catch (err) {
    if (isToolError(err)) return err;
    return createToolError("READ_FAILED", `Failed to list runs: ${String(err)}`, {
      recoverable: true,
    });
  }
}

// ============================================================================
// Run Cleanup
// ============================================================================

export interface RunCleanupResult {
  dry_run: boolean;
  runs_checked: number;
  runs_deleted: string[];
  errors: string[];
}

export async function runCleanup(input: RunCleanupInput): Promise<RunCleanupResult | ToolError> {
  const manager = getRunManager();

  try {
    const result = await manager.cleanup({
      older_than_days: input.older_than_days,
      keep_manifests: input.keep_manifests,
      dry_run: input.dry_run,
    });

    return {
      dry_run: input.dry_run,
      runs_checked: result.deleted.length + result.errors.length,
      runs_deleted: result.deleted,
      errors: result.errors,
    };
  } catch (err) {
    return createToolError("WRITE_FAILED", `Failed to cleanup runs: ${String(err)}`, {
      recoverable: true,
    });
  }
}
