/**
 * Portfolio Identifier Registry - Backtest Ledger MCP
 *
 * Issues one stable UUID per portfolio name. The registry is passed through
 * consolidation explicitly and can be seeded from a previous mapping file.
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import { v4 as uuidv4 } from 'uuid';
import { pathExists, readCsvFile, writeCsvFile } from '../utils.js';
import type { PortfolioMapping } from '../types.js';

export const MAPPING_COLUMNS = ['portfolio_name', 'portfolio_uuid'];

export class PortfolioRegistry {
  private readonly ids = new Map<string, string>();
  private readonly createId: () => string;
  private minted = 0;

  constructor(seed: readonly PortfolioMapping[] = [], createId: () => string = () => uuidv4()) {
    this.createId = createId;
    for (const mapping of seed) {
      if (!this.ids.has(mapping.portfolio_name)) {
        this.ids.set(mapping.portfolio_name, mapping.portfolio_uuid);
      }
    }
  }

  /**
   * Return the identifier for `name`, minting one on first sight
   */
  resolveOrCreate(name: string): string {
    const existing = this.ids.get(name);
    if (existing !== undefined) return existing;

    const id = this.createId();
    this.ids.set(name, id);
    this.minted++;
    return id;
  }

  /** Identifiers minted since construction */
  get mintedCount(): number {
    return this.minted;
  }

  get size(): number {
    return this.ids.size;
  }

  /** Mappings in first-seen order */
  entries(): PortfolioMapping[] {
    return Array.from(this.ids, ([portfolio_name, portfolio_uuid]) => ({ portfolio_name, portfolio_uuid }));
  }
}

/**
 * Seed a registry from portfolio_uuid_mapping.csv; a missing file gives an empty registry
 */
export async function loadRegistry(mappingPath: string, createId?: () => string): Promise<PortfolioRegistry> {
  if (!await pathExists(mappingPath)) {
    return new PortfolioRegistry([], createId);
  }

  const csv = await readCsvFile(mappingPath);
  const seed: PortfolioMapping[] = csv.records
    .filter(record => record.portfolio_name && record.portfolio_uuid)
    .map(record => ({ portfolio_name: record.portfolio_name, portfolio_uuid: record.portfolio_uuid }));

  return new PortfolioRegistry(seed, createId);
}

export async function saveRegistry(mappingPath: string, registry: PortfolioRegistry): Promise<void> {
  await writeCsvFile(
    mappingPath,
    MAPPING_COLUMNS,
    registry.entries().map(entry => [entry.portfolio_name, entry.portfolio_uuid])
  );
}
