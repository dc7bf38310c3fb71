#!/usr/bin/env node

import { Command } from 'commander';
import { registerImportCommands } from './commands/import.js';
import { registerDatabaseCommands } from './commands/database.js';
import { registerExportCommands } from './commands/export.js';
import { registerSessionCommands } from './commands/session.js';
import * as output from './utils/output.js';

const program = new Command();

program
  .name('omstore')
  .description('Optical measurement metadata store')
  .version('1.0.0');

// Register all command groups
registerDatabaseCommands(program);
registerImportCommands(program);
registerExportCommands(program);
registerSessionCommands(program);

// Add help examples
program.addHelpText(
  'after',
  `
Examples:
  Database:
    $ omstore init                       # Create measurement_data.db
    $ omstore stats                      # Row counts per entity
    $ omstore reset --force              # Recreate an empty database

  Import:
    $ omstore import ./20260202          # Import a measurement folder
    $ omstore import ./20260202 lab.db   # ... into a specific database
    $ omstore import ./20260202 --verbose

  Reporting:
    $ omstore export -o export.xlsx      # One sheet per entity
    $ omstore session 12                 # Full session as JSON
    $ omstore prune 2025-01-01           # Delete older sessions
`
);

program.parseAsync().catch((error: unknown) => {
  output.error(output.describeError(error));
  process.exit(1);
});
