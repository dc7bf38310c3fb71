import { Command } from 'commander';
import * as output from '../utils/output.js';
import { config } from '../utils/config.js';
import { requireDatabase } from './database.js';
import { exportWorkbook } from '../lib/export.js';
import { withStore } from '../lib/measurement-store.js';

interface ExportOptions {
  output?: string;
}

/**
 * Export every entity to an .xlsx workbook
 */
export async function exportDatabase(
  dbPath: string = config.dbPath,
  options: ExportOptions = {}
): Promise<string> {
  requireDatabase(dbPath);

  const outputPath = await withStore(dbPath, (store) =>
    exportWorkbook(store, options.output ?? config.exportFile)
  );

  output.success(`Workbook written to ${outputPath}`);
  return outputPath;
}

/**
 * Register export command with Commander
 */
export function registerExportCommands(program: Command): void {
  program
    .command('export')
    .description('Export all entities to an .xlsx workbook, one sheet per entity')
    .argument('[db]', 'Database file', config.dbPath)
    .option('-o, --output <file>', 'Workbook path')
    .action(async (db: string, options: ExportOptions) => {
      try {
        await exportDatabase(db, options);
      } catch (error) {
        output.error(output.describeError(error));
        process.exit(1);
      }
    });
}
