import { resolve } from 'path';
import { Command } from 'commander';
import inquirer from 'inquirer';
import * as output from '../utils/output.js';
import { config } from '../utils/config.js';
import { databaseExists, withDatabase } from '../lib/database.js';
import type { EntityName } from '../lib/entities.js';
import { withStore } from '../lib/measurement-store.js';

/**
 * Fail unless a database file exists at `dbPath`
 */
export function requireDatabase(dbPath: string): void {
  if (!databaseExists(dbPath)) {
    throw new Error(`No database found at ${resolve(dbPath)}. Run: omstore init`);
  }
}

/**
 * Print row counts per entity
 */
export function printStats(stats: Record<EntityName, number>): void {
  output.blank();
  output.table(['Entity', 'Rows'], Object.entries(stats));
}

/**
 * Create the database (or bring an existing one up to the schema)
 */
export async function initDatabase(dbPath: string = config.dbPath): Promise<void> {
  await withDatabase(dbPath, (db) => db.createDatabase(config.schemaFile));
  output.success(`Database initialized at ${resolve(dbPath)}`);
}

interface ResetOptions {
  force?: boolean;
}

/**
 * Destroy and recreate the database
 */
export async function resetDatabase(
  dbPath: string = config.dbPath,
  options: ResetOptions = {}
): Promise<boolean> {
  if (!options.force) {
    const { confirm } = await inquirer.prompt<{ confirm: boolean }>([
      {
        type: 'confirm',
        name: 'confirm',
        message: `This will delete every row in ${resolve(dbPath)}. Continue?`,
        default: false,
      },
    ]);

    if (!confirm) {
      output.info('Reset cancelled');
      return false;
    }
  }

  await withDatabase(dbPath, (db) => db.resetDatabase(config.schemaFile));
  output.success('Database reset');
  return true;
}

/**
 * Show row counts for every entity
 */
export async function showStats(dbPath: string = config.dbPath): Promise<Record<EntityName, number>> {
  requireDatabase(dbPath);
  const stats = await withStore(dbPath, (store) => store.getDatabaseStats());

  output.header('Measurement Database');
  output.keyValue('File', resolve(dbPath));
  printStats(stats);
  return stats;
}

/**
 * Delete sessions measured before a date, with everything below them
 */
export async function pruneSessions(before: string, dbPath: string = config.dbPath): Promise<number> {
  const cutoff = new Date(before);
  if (Number.isNaN(cutoff.getTime())) {
    throw new Error(`Invalid date: ${before}`);
  }
  requireDatabase(dbPath);

  const deleted = await withStore(dbPath, (store) => store.deleteSessionsBefore(cutoff));
  output.success(`Deleted ${deleted} session(s) measured before ${cutoff.toISOString()}`);
  return deleted;
}

/**
 * Register database commands with Commander
 */
export function registerDatabaseCommands(program: Command): void {
  program
    .command('init')
    .description('Create the measurement database')
    .argument('[db]', 'Database file', config.dbPath)
    .action(async (db: string) => {
      try {
        await initDatabase(db);
      } catch (error) {
        output.error(output.describeError(error));
        process.exit(1);
      }
    });

  program
    .command('reset')
    .description('Delete all data and recreate the schema')
    .argument('[db]', 'Database file', config.dbPath)
    .option('-f, --force', 'Skip confirmation')
    .action(async (db: string, options: ResetOptions) => {
      try {
        await resetDatabase(db, options);
      } catch (error) {
        output.error(output.describeError(error));
        process.exit(1);
      }
    });

  program
    .command('stats')
    .description('Show row counts per entity')
    .argument('[db]', 'Database file', config.dbPath)
    .action(async (db: string) => {
      try {
        await showStats(db);
      } catch (error) {
        output.error(output.describeError(error));
        process.exit(1);
      }
    });

  program
    .command('prune')
    .description('Delete sessions measured before a date (cascades)')
    .argument('<before>', 'Cutoff date, e.g. 2026-01-01')
    .argument('[db]', 'Database file', config.dbPath)
    .action(async (before: string, db: string) => {
      try {
        await pruneSessions(before, db);
      } catch (error) {
        output.error(output.describeError(error));
        process.exit(1);
      }
    });
}
