import { join } from 'path';
import { paths } from './paths.js';

/**
 * CLI and library configuration
 *
 * Every value reads its environment variable first and falls back to a default.
 */
export const config = {
  /**
   * Database file used when a command is not given one
   */
  get dbPath(): string {
    return process.env.OMSTORE_DB_PATH || join(process.cwd(), 'measurement_data.db');
  },

  /**
   * Declarative schema applied by init/import
   */
  get schemaFile(): string {
    return process.env.OMSTORE_SCHEMA_FILE || paths.schemaFile;
  },

  /**
   * Session attributes recorded by batch import
   */
  get operator(): string {
    return process.env.OMSTORE_OPERATOR || 'T&P';
  },

  get systemVersion(): string {
    return process.env.OMSTORE_SYSTEM_VERSION || 'CM300v1.0';
  },

  /**
   * DOE used when a filename carries none
   */
  get defaultDoe(): string {
    return process.env.OMSTORE_DEFAULT_DOE || 'DOE0';
  },

  /**
   * Workbook written by `export` without --output
   */
  get exportFile(): string {
    return process.env.OMSTORE_EXPORT_FILE || join(process.cwd(), 'database_export.xlsx');
  },

  /**
   * Extensions picked up by folder ingestion
   */
  measurementExtensions: ['.csv'] as const,
};
