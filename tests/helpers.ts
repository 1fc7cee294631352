/* tests/helpers.ts */
import { Row, type Cell, type Logger, type RelationConfigInput } from '@docbridge/core';
import { ConnectionManager } from '@docbridge/mongo';
import { MemoryStore } from './memory-store.js';

export const DB = 'shop';
export const COLL = 'orders';

export function relationConfig(overrides: Partial<RelationConfigInput> = {}): RelationConfigInput {
  return {
    hosts: ['db-1:27017'],
    database: DB,
    collection: COLL,
    retry: { attempts: 3, backoffMs: 10 },
    ...overrides
  };
}

export interface LogEntry {
  level: 'debug' | 'info' | 'warn' | 'error';
  msg: string;
  obj: Record<string, unknown>;
}

/** Logger that keeps every entry for assertions. */
export function recordingLogger(): Logger & { entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const at = (level: LogEntry['level']) => (obj: Record<string, unknown>, msg: string) => {
    entries.push({ level, msg, obj });
  };
  return { entries, debug: at('debug'), info: at('info'), warn: at('warn'), error: at('error') };
}

export function memorySetup(): { store: MemoryStore; connections: ConnectionManager } {
  const store = new MemoryStore();
  return { store, connections: new ConnectionManager({ connector: store.connector }) };
}

export async function collect<T>(it: AsyncIterable<T>): Promise<T[]> {
  const out: T[] = [];
  for await (const x of it) out.push(x);
  return out;
}

const isList = (cell: Cell): cell is readonly Cell[] => Array.isArray(cell);

/** Rows (nested ones included) as plain arrays, for toEqual. */
export function plain(cell: Cell): unknown {
  if (cell instanceof Row) return cell.values.map(plain);
  if (isList(cell)) return cell.map(plain);
  return cell;
}

export function plainRows(rows: Row[]): unknown[] {
  return rows.map(plain);
}

export const noSleep = async (_ms: number): Promise<void> => {};
