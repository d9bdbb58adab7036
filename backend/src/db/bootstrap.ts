import { existsSync, readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import db from './client.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('Bootstrap');

// Beside the source when run from src/, back in the source tree when run from dist/.
const SCHEMA_CANDIDATES = [
  new URL('./schema.sql', import.meta.url),
  new URL('../../../../backend/src/db/schema.sql', import.meta.url)
];

export function readSchemaSql(): string {
  for (const candidate of SCHEMA_CANDIDATES) {
    const path = fileURLToPath(candidate);
    if (existsSync(path)) {
      return readFileSync(path, 'utf8');
    }
  }
  throw new Error('schema.sql not found next to the database bootstrap');
}

export async function bootstrapDatabase(): Promise<void> {
  log.info('Applying schema');
  await db.query(readSchemaSql());
  log.info('Schema ready');
}
