#!/usr/bin/env node
/**
 * Backtest Ledger MCP: Main Server Entry Point
 *
 * Portfolio grid search bookkeeping for an external backtesting site.
 * Pipeline: Grid → Batches → Results → Parse → Consolidate
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 *
 * This source code is the property of vario.automation and is protected
 * by trade secret and copyright law. Unauthorized copying, modification,
 * distribution, or use of this software is strictly prohibited.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { z } from "zod";
import { fileURLToPath } from "url";
import * as path from "path";

// Tool implementations
import { generateGridTool } from "./tools/grid.js";
import { planBatchesTool, recordResult } from "./tools/batches.js";
import { parseWorkbook } from "./tools/tables.js";
import { consolidateRun } from "./tools/consolidate.js";
import { runStatus, runList, runCleanup } from "./tools/utilities.js";

// Schemas
import {
  GenerateGridInputSchema,
  PlanBatchesInputSchema,
  RecordResultInputSchema,
  ParseWorkbookInputSchema,
  ConsolidateInputSchema,
  RunStatusInputSchema,
  RunListInputSchema,
  RunCleanupInputSchema,
} from "./schemas.js";

import { initRunManager } from "./run-manager.js";
import { formatErrorResponse, isToolError } from "./utils.js";

// Installation directory, unless overridden
const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);
const SERVER_BASE_DIR = process.env.BACKTEST_LEDGER_HOME
  ? path.resolve(process.env.BACKTEST_LEDGER_HOME)
  : path.resolve(__dirname, "..");

const server = new McpServer({
  name: "backtest-ledger-mcp",
  version: "0.1.0",
});

type TextResponse = { isError?: true; content: Array<{ type: "text"; text: string }> };

function toResponse(result: object): TextResponse {
  if (isToolError(result)) {
    return formatErrorResponse(result);
  }
  return {
    content: [{ type: "text", text: JSON.stringify(result, null, 2) }],
  };
}

// ============================================================================
// GRID & BATCH TOOLS
// ============================================================================

server.tool(
  "backtest_generate_grid",
  `Generate a portfolio allocation grid and write it to grids/<name>.csv.

GRID TYPES:
- coarse: fixed parameter sets (Grid_NNN)
- fine: denser parameter sets (FineGrid_NNN)
- random: seeded draws, count and seed apply (Random_NNN)
- treasury: treasury sleeve spread over maturities (TreasuryGrid_NNN)

RETURNS: output path, portfolio count, per-asset ranges`,
  GenerateGridInputSchema.shape,
  async (args) => toResponse(await generateGridTool(args))
);

server.tool(
  "backtest_plan_batches",
  "Split an allocation grid into batch_<NNN>_<first>_to_<last>.csv files of at most 3 portfolios. Weight totals off 100% are reported as warnings.",
  PlanBatchesInputSchema.shape,
  async (args) => toResponse(await planBatchesTool(args))
);

server.tool(
  "backtest_record_result",
  "Record which downloaded results workbook belongs to a batch in batches/batch_manifest.csv. Re-recording a batch replaces its row.",
  RecordResultInputSchema.shape,
  async (args) => toResponse(await recordResult(args))
);

// ============================================================================
// PARSE & CONSOLIDATE TOOLS
// ============================================================================

server.tool(
  "backtest_parse_workbook",
  "Split a results workbook sheet into its logical tables (key-value or tabular) and write parsed/<stem>.tables.json.",
  ParseWorkbookInputSchema.shape,
  async (args) => toResponse(await parseWorkbook(args))
);

server.tool(
  "backtest_consolidate",
  `Consolidate every batch in the manifest into long-format tables.

OUTPUTS (consolidated/):
- portfolio_metadata.csv: portfolio_uuid, portfolio_name, asset_name, portfolio_weight
- portfolio_performance_metrics.csv: portfolio_uuid, portfolio_name, metric_name, metric_value, table_source
- portfolio_uuid_mapping.csv: portfolio_name, portfolio_uuid

Identifiers from an existing mapping file are reused.
RETURNS: row counts and the top portfolios by the ranking metric`,
  ConsolidateInputSchema.shape,
  async (args) => toResponse(await consolidateRun(args))
);

// ============================================================================
// UTILITY TOOLS
// ============================================================================

server.tool(
  "backtest_run_status",
  "Get detailed status of a run including phase completion, timing, and totals.",
  RunStatusInputSchema.shape,
  async (args) => toResponse(await runStatus(args))
);

server.tool(
  "backtest_run_list",
  "List all runs with optional filtering by status and date range.",
  RunListInputSchema.shape,
  async (args) => toResponse(await runList(args))
);

server.tool(
  "backtest_run_cleanup",
  "Delete old runs. Dry run by default; keeps manifest.json unless told otherwise.",
  RunCleanupInputSchema.shape,
  async (args) => toResponse(await runCleanup(args))
);

server.tool(
  "backtest_get_server_info",
  `Get Backtest Ledger installation information.

WHAT THIS RETURNS:
- server_base_dir: Where the server keeps its data
- runs_dir: Where run artifacts (grids, batches, results, consolidated tables) are stored

Set BACKTEST_LEDGER_HOME to move the base directory.`,
  z.object({}).shape,
  async () => toResponse({
    success: true,
    server_base_dir: SERVER_BASE_DIR,
    runs_dir: path.join(SERVER_BASE_DIR, "runs"),
  })
);

// ============================================================================
// SERVER STARTUP
// ============================================================================

async function main() {
  initRunManager(SERVER_BASE_DIR, {
    storage: { runs_dir: "runs" },
  });

  const transport = new StdioServerTransport();
  await server.connect(transport);

  console.error("Backtest Ledger MCP server started");
  console.error(`  Runs directory: ${SERVER_BASE_DIR}/runs`);
}

main().catch((error) => {
  console.error("Fatal error:", error);
  process.exit(1);
});
