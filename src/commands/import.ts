import { existsSync } from 'fs';
import { resolve } from 'path';
import { Command } from 'commander';
import * as output from '../utils/output.js';
import { config } from '../utils/config.js';
import { importMeasurementFolder, type ImportResult } from '../lib/ingest.js';
import { withStore } from '../lib/measurement-store.js';
import { printStats } from './database.js';

export interface ImportCommandOptions {
  operator?: string;
  systemVersion?: string;
  notes?: string;
  verbose?: boolean;
}

/**
 * Import every measurement file of a folder into the database
 */
export async function importFolder(
  folderPath: string,
  dbPath: string = config.dbPath,
  options: ImportCommandOptions = {}
): Promise<ImportResult> {
  const absolutePath = resolve(folderPath);

  if (!existsSync(absolutePath)) {
    throw new Error(`Folder does not exist: ${absolutePath}`);
  }

  output.info(`Importing ${absolutePath}`);
  output.dim(`Database: ${resolve(dbPath)}`);

  const result = await withStore(
    dbPath,
    (store) =>
      importMeasurementFolder(store, absolutePath, {
        operator: options.operator,
        systemVersion: options.systemVersion,
        notes: options.notes,
        onProgress: (message) => {
          if (options.verbose) {
            output.dim(`  ${message}`);
          }
        },
      }),
    { createSchema: config.schemaFile }
  );

  output.header('Import Results');
  output.blank();
  output.success(`Imported: ${result.imported} file(s)`);

  if (result.skipped.length > 0) {
    output.warn(`Skipped: ${result.skipped.length} file(s)`);
    for (const entry of result.skipped) {
      output.dim(`  ${entry.file}: ${entry.reason}`);
    }
  }

  printStats(result.stats);
  return result;
}

/**
 * Register import command with Commander
 */
export function registerImportCommands(program: Command): void {
  program
    .command('import')
    .description('Import measurement files of a folder')
    .argument('<folder>', 'Folder containing measurement files')
    .argument('[db]', 'Database file', config.dbPath)
    .option('--operator <name>', 'Operator recorded on new sessions')
    .option('--system-version <version>', 'Measurement system version')
    .option('--notes <text>', 'Notes recorded on new sessions')
    .option('--verbose', 'Show per-file progress')
    .action(async (folder: string, db: string, options: ImportCommandOptions) => {
      try {
        await importFolder(folder, db, options);
      } catch (error) {
        output.error(output.describeError(error));
        process.exit(1);
      }
    });
}
