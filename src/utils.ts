/**
 * Backtest Ledger MCP: Core Utilities
 *
 * Deterministic utilities for hashing, file operations, CSV I/O and ID generation.
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import { createHash } from "crypto";
import { v7 as uuidv7 } from "uuid";
import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";
import { z } from "zod";
import * as fs from "fs/promises";
import * as path from "path";
import type { EventLogEntry, ErrorCode, ToolError } from "./types.js";

// ============================================================================
// Hashing Utilities (Deterministic)
// ============================================================================

/**
 * Generate SHA256 hash of content
 */
export function sha256(content: string | Buffer): string {
  return createHash("sha256").update(content).digest("hex");
}

/**
 * Generate SHA256 hash of a file
 */
export async function hashFile(filePath: string): Promise<string> {
  const content = await fs.readFile(filePath);
  return sha256(content);
}

/**
 * Generate config hash for manifest
 */
export function hashConfig(config: object): string {
  // Stable JSON stringify (sorted top-level keys)
  const stable = JSON.stringify(config, Object.keys(config).sort());
  return sha256(stable);
}

// ============================================================================
// ID Generation
// ============================================================================

/**
 * Generate time-ordered UUID v7 for run IDs
 */
export function generateRunId(): string {
  return uuidv7();
}

/**
 * Zero-pad a batch or grid ordinal: padNumber(7) === "007"
 */
export function padNumber(value: number, width: number = 3): string {
  return String(value).padStart(width, "0");
}

// ============================================================================
// File Operations
// ============================================================================

/**
 * Ensure a directory exists
 */
export async function ensureDir(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true });
}

/**
 * Check if a path exists
 */
export async function pathExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Resolve a tool path argument against a base directory (absolute paths pass through)
 */
export function resolveFrom(baseDir: string, filePath: string): string {
  return path.isAbsolute(filePath) ? filePath : path.join(baseDir, filePath);
}

/**
 * Write JSONL file (append mode)
 */
export async function appendJsonl(filePath: string, records: unknown[]): Promise<void> {
  const lines = records.map(r => JSON.stringify(r)).join("\n") + "\n";
  await fs.appendFile(filePath, lines, "utf-8");
}

/**
 * Write JSON file
 */
export async function writeJson(filePath: string, data: unknown): Promise<void> {
  await fs.writeFile(filePath, JSON.stringify(data, null, 2), "utf-8");
}

/**
 * Read JSON file
 */
export async function readJson<T>(filePath: string): Promise<T> {
  const content = await fs.readFile(filePath, "utf-8");
  return JSON.parse(content) as T;
}

// ============================================================================
// CSV Utilities
// ============================================================================

export interface CsvTable {
  header: string[];
  /** One object per data row, keyed by header; missing trailing cells are "" */
  records: Array<Record<string, string>>;
}

const CsvRowsSchema = z.array(z.array(z.string()));

/**
 * Parse CSV text into a header and keyed records.
 *
 * @example
 * parseCsvText("a,b\n1,2\n")
 * // returns { header: ["a", "b"], records: [{ a: "1", b: "2" }] }
 */
export function parseCsvText(content: string): CsvTable {
  const rows = CsvRowsSchema.parse(
    parse(content, {
      bom: true,
      skip_empty_lines: true,
      relax_column_count: true,
      trim: true,
    })
  );

  if (rows.length === 0) {
    return { header: [], records: [] };
  }

  const [header, ...body] = rows;
  const records = body.map(row => {
    const record: Record<string, string> = {};
    header.forEach((column, i) => {
      record[column] = row[i] ?? "";
    });
    return record;
  });

  return { header, records };
}

/**
 * Read a CSV file. A missing file is fatal for the calling step.
 */
export async function readCsvFile(filePath: string): Promise<CsvTable> {
  let content: string;
  try {
    content = await fs.readFile(filePath, "utf-8");
  } catch (error) {
    throw createToolError("FILE_NOT_FOUND", `Failed to read CSV file: ${filePath}`, {
      details: { path: filePath, error: String(error) },
      recoverable: false,
      suggestion: "Verify the path is correct and the file exists",
    });
  }
  return parseCsvText(content);
}

export type CsvValue = string | number | null;

/**
 * Write rows under a header; null cells are written empty
 */
export async function writeCsvFile(
  filePath: string,
  columns: string[],
  rows: CsvValue[][]
): Promise<void> {
  await ensureDir(path.dirname(filePath));
  const content = stringify([columns, ...rows]);
  await fs.writeFile(filePath, content, "utf-8");
}

const NUMERIC_TEXT = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

/**
 * Parse numeric text, allowing thousands separators; anything else yields null
 *
 * @example
 * parseNumber("1,234.5") // 1234.5
 * parseNumber("N/A")     // null
 */
export function parseNumber(raw: string | undefined): number | null {
  if (raw === undefined) return null;
  const text = raw.trim().replace(/,/g, "");
  if (!NUMERIC_TEXT.test(text)) return null;
  const value = Number(text);
  return Number.isFinite(value) ? value : null;
}

// ============================================================================
// Error Handling
// ============================================================================

/**
 * Create a standardized tool error
 */
export function createToolError(
  code: ErrorCode,
  message: string,
  options?: {
    details?: unknown;
    recoverable?: boolean;
    suggestion?: string;
  }
): ToolError {
  return {
    success: false,
    isError: true,
    code,
    message,
    details: options?.details,
    recoverable: options?.recoverable ?? false,
    suggestion: options?.suggestion,
  };
}

/**
 * Narrow an unknown value (a tool result or a thrown value) to a ToolError
 */
export function isToolError(value: unknown): value is ToolError {
  return (
    typeof value === "object" &&
    value !== null &&
    "isError" in value &&
    value.isError === true &&
    "code" in value &&
    "message" in value
  );
}

/**
 * Format error for MCP response
 */
export function formatErrorResponse(error: ToolError): { isError: true; content: Array<{ type: "text"; text: string }> } {
  const text = [
    `Error: ${error.code}`,
    error.message,
    error.suggestion ? `Suggestion: ${error.suggestion}` : "",
    error.details ? `Details: ${JSON.stringify(error.details)}` : "",
  ].filter(Boolean).join("\n");

  return {
    isError: true,
    content: [{ type: "text", text }],
  };
}

// ============================================================================
// Logging
// ============================================================================

/**
 * Create an event log entry
 */
export function createLogEntry(
  level: EventLogEntry["level"],
  phase: string,
  tool: string,
  message: string,
  data?: unknown
): EventLogEntry {
  return {
    timestamp: new Date().toISOString(),
    level,
    phase,
    tool,
    message,
    data,
  };
}

/**
 * Logger class for run operations
 */
export class RunLogger {
  private logsDir: string;

  constructor(runDir: string) {
    this.logsDir = path.join(runDir, "logs");
  }

  async init(): Promise<void> {
    await ensureDir(this.logsDir);
  }

  async log(entry: EventLogEntry): Promise<void> {
    const file = entry.level === "error" ? "errors.ndjson" : "events.ndjson";
    await appendJsonl(path.join(this.logsDir, file), [entry]);
  }

  async info(phase: string, tool: string, message: string, data?: unknown): Promise<void> {
    await this.log(createLogEntry("info", phase, tool, message, data));
  }

  async warn(phase: string, tool: string, message: string, data?: unknown): Promise<void> {
    await this.log(createLogEntry("warn", phase, tool, message, data));
  }

  async error(phase: string, tool: string, message: string, data?: unknown): Promise<void> {
    await this.log(createLogEntry("error", phase, tool, message, data));
  }

  /**
   * Write each warning collected by a pure step as its own entry
   */
  async warnAll(phase: string, tool: string, warnings: string[]): Promise<void> {
    for (const warning of warnings) {
      await this.warn(phase, tool, warning);
    }
  }
}

// ============================================================================
// Time Utilities
// ============================================================================

/**
 * Get current ISO8601 timestamp
 */
export function now(): string {
  return new Date().toISOString();
}

// ============================================================================
// Seeded Random Numbers
// ============================================================================

/**
 * Deterministic pseudo-random source in [0, 1) (mulberry32).
 *
 * @example
 * const next = createSeededRandom(42);
 * next(); // same sequence for the same seed
 */
export function createSeededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}
