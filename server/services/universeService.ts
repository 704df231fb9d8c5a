import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { SYMBOLS_FILE } from '../config.js';
import type { ClearAllCounts, ScanStore } from '../data/scanStoreTypes.js';
import type { ScanState } from '../lib/ScanState.js';

export class SymbolsFileNotFoundError extends Error {
  readonly filePath: string;

  constructor(filePath: string) {
    super(`symbols file not found at ${filePath}`);
    this.name = 'SymbolsFileNotFoundError';
    this.filePath = filePath;
  }
}

/** One symbol per line; blank lines and `#` comments are ignored. */
export function parseSymbolsText(text: string): string[] {
  const symbols: string[] = [];
  for (const raw of text.split(/\r?\n/)) {
    const line = raw.trim();
    if (!line || line.startsWith('#')) continue;
    symbols.push(line.toUpperCase());
  }
  return symbols;
}

export async function readSymbolsFile(filePath: string = SYMBOLS_FILE): Promise<string[]> {
  const resolved = path.resolve(filePath);
  let text: string;
  try {
    text = await readFile(resolved, 'utf8');
  } catch (err: unknown) {
    if (err instanceof Error && Reflect.get(err, 'code') === 'ENOENT') {
      throw new SymbolsFileNotFoundError(resolved);
    }
    throw err;
  }
  return parseSymbolsText(text);
}

export interface ReloadResult {
  count_added: number;
  count_total: number;
}

export interface ClearAllResult extends ClearAllCounts {
  symbols_reloaded: number;
  symbols_total: number;
}

export type ClearAllOutcome = { status: 'ok'; deleted: ClearAllResult } | { status: 'running' };

export interface UniverseServiceDeps {
  store: ScanStore;
  state: ScanState;
  symbolsFile?: string;
}

export class UniverseService {
  private readonly store: ScanStore;
  private readonly state: ScanState;
  private readonly symbolsFile: string;

  constructor(deps: UniverseServiceDeps) {
    this.store = deps.store;
    this.state = deps.state;
    this.symbolsFile = deps.symbolsFile ?? SYMBOLS_FILE;
  }

  /** Inserts symbols from the universe file that are not stored yet. */
  async reloadSymbols(): Promise<ReloadResult> {
    const symbols = await readSymbolsFile(this.symbolsFile);
    console.log(`[universe] parsed ${symbols.length} symbols from ${this.symbolsFile}`);
    const { added, total } = await this.store.insertMissingSymbols(symbols);
    console.log(`[universe] reload complete: ${added} added, ${total} total`);
    return { count_added: added, count_total: total };
  }

  /**
   * Wipes every table, then repopulates symbols from the universe file so the
   * next scan has something to do. A missing file leaves the universe empty.
   * Holds the scan run slot for the whole wipe, so no scan can start midway.
   */
  async clearAll(): Promise<ClearAllOutcome> {
    if (!this.state.tryBegin()) {
      return { status: 'running' };
    }
    try {
      this.state.clearProgress();
      const deleted = await this.store.clearAll();
      console.warn(
        `[universe] cleared all records: ${deleted.scans} scans, ${deleted.symbols} symbols, ${deleted.scan_logs} logs`,
      );

      let reloaded: ReloadResult = { count_added: 0, count_total: 0 };
      try {
        reloaded = await this.reloadSymbols();
      } catch (err: unknown) {
        if (!(err instanceof SymbolsFileNotFoundError)) throw err;
        console.warn(`[universe] ${err.message}; symbols table left empty after clear-all`);
      }

      return {
        status: 'ok',
        deleted: { ...deleted, symbols_reloaded: reloaded.count_added, symbols_total: reloaded.count_total },
      };
    } finally {
      this.state.release();
    }
  }
}
