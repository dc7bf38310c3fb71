import { dirname, join, resolve } from 'path';
import { existsSync } from 'fs';

/**
 * Find the project root by looking for the directory that carries schema/schema.sql
 */
function findProjectRoot(): string {
  let current = __dirname;

  // Walk up the directory tree; works from src/utils and from dist/src/utils
  while (current !== dirname(current)) {
    if (
      existsSync(join(current, 'package.json')) &&
      existsSync(join(current, 'schema', 'schema.sql'))
    ) {
      return current;
    }
    current = dirname(current);
  }

  // Fallback: assume we're in src/utils
  return resolve(__dirname, '..', '..');
}

const PROJECT_ROOT = findProjectRoot();

export const paths = {
  schemaFile: join(PROJECT_ROOT, 'schema', 'schema.sql'),
};

/**
 * Sibling files SQLite may leave next to a database file
 */
export function storeFiles(dbPath: string): string[] {
  return [dbPath, `${dbPath}-journal`, `${dbPath}-wal`, `${dbPath}-shm`];
}
