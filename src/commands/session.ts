import { Command } from 'commander';
import * as output from '../utils/output.js';
import { config } from '../utils/config.js';
import { requireDatabase } from './database.js';
import { withStore } from '../lib/measurement-store.js';
import type { SessionFullInfo } from '../lib/types.js';

/**
 * Print one session with everything recorded under it, as JSON
 */
export async function showSession(
  sessionId: string,
  dbPath: string = config.dbPath
): Promise<SessionFullInfo | undefined> {
  const id = Number(sessionId);
  if (!Number.isInteger(id) || id <= 0) {
    throw new Error(`Invalid session id: ${sessionId}`);
  }
  requireDatabase(dbPath);

  const session = await withStore(dbPath, (store) => store.getSessionFullInfo(id));

  if (!session) {
    output.warn(`Session ${id} not found`);
    return undefined;
  }

  output.json(session);
  return session;
}

/**
 * Register session command with Commander
 */
export function registerSessionCommands(program: Command): void {
  program
    .command('session')
    .description('Show a session with its DUT, conditions, data and analyses')
    .argument('<id>', 'Session id')
    .argument('[db]', 'Database file', config.dbPath)
    .action(async (id: string, db: string) => {
      try {
        await showSession(id, db);
      } catch (error) {
        output.error(output.describeError(error));
        process.exit(1);
      }
    });
}
