import { describe, expect, it, jest, beforeEach, afterEach } from '@jest/globals';
import { existsSync, mkdtempSync, rmSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';

jest.mock('../../src/utils/output.js', () => ({
  header: jest.fn(),
  blank: jest.fn(),
  success: jest.fn(),
  error: jest.fn(),
  warn: jest.fn(),
  info: jest.fn(),
  dim: jest.fn(),
  json: jest.fn(),
  keyValue: jest.fn(),
  table: jest.fn(),
}));

import * as output from '../../src/utils/output.js';
import { exportDatabase } from '../../src/commands/export.js';
import { showSession } from '../../src/commands/session.js';
import { withStore } from '../../src/lib/measurement-store.js';

describe('reporting commands', () => {
  let tempDir: string;
  let dbPath: string;
  let sessionId: number;

  beforeEach(async () => {
    jest.clearAllMocks();
    tempDir = mkdtempSync(join(tmpdir(), 'omstore-report-'));
    dbPath = join(tempDir, 'measurement_data.db');
    sessionId = await withStore(
      dbPath,
      (store) => {
        const dutId = store.insertDut({ wafer: 'W01', doe: 'DOE1', die: 1, cage: 'C1', device: 'D1' });
        return store.insertSession({ dutId, sessionName: 'nightly' });
      },
      { createSchema: true }
    );
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  describe('exportDatabase', () => {
    it('should write the workbook to the requested path', async () => {
      const target = join(tempDir, 'export.xlsx');

      await expect(exportDatabase(dbPath, { output: target })).resolves.toBe(target);

      expect(existsSync(target)).toBe(true);
      expect(output.success).toHaveBeenCalledWith(`Workbook written to ${target}`);
    });

    it('should fail when no database exists', async () => {
      const missing = join(tempDir, 'none.db');
      await expect(exportDatabase(missing)).rejects.toThrow(
        `No database found at ${missing}. Run: omstore init`
      );
    });
  });

  describe('showSession', () => {
    it('should print the full session as JSON', async () => {
      const session = await showSession(String(sessionId), dbPath);

      expect(session?.sessionName).toBe('nightly');
      expect(session?.dut?.wafer).toBe('W01');
      expect(output.json).toHaveBeenCalledWith(session);
    });

    it('should warn for an unknown session', async () => {
      await expect(showSession('999', dbPath)).resolves.toBeUndefined();
      expect(output.warn).toHaveBeenCalledWith('Session 999 not found');
    });

    it('should reject a non-numeric id', async () => {
      await expect(showSession('abc', dbPath)).rejects.toThrow('Invalid session id: abc');
    });
  });
});
