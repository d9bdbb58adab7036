import { DataType, newDb, type IMemoryDb } from 'pg-mem';
import { readSchemaSql } from './bootstrap.js';
import { __setPoolForTests } from './client.js';

export function createMemDatabase(): IMemoryDb {
  const mem = newDb({ autoCreateForeignKeyIndices: true, noAstCoverageCheck: true });
  mem.public.registerFunction({
    name: 'now',
    returns: DataType.timestamptz,
    implementation: () => new Date()
  });
  return mem;
}

export interface WiredMemDatabase {
  mem: IMemoryDb;
  restore(): void;
}

/** Fresh in-process database with the schema applied, wired into the shared db client. */
export function wireMemDatabase(): WiredMemDatabase {
  const mem = createMemDatabase();
  mem.public.none(readSchemaSql());
  const { Pool } = mem.adapters.createPg();
  const restore = __setPoolForTests(new Pool());
  return { mem, restore };
}
