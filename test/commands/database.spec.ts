import { describe, expect, it, jest, beforeEach, afterEach } from '@jest/globals';
import { existsSync, mkdtempSync, rmSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';

const mockPrompt = jest.fn<() => Promise<{ confirm: boolean }>>();

jest.mock('inquirer', () => ({
  __esModule: true,
  default: { prompt: mockPrompt },
}));

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
import {
  initDatabase,
  pruneSessions,
  resetDatabase,
  showStats,
} from '../../src/commands/database.js';
import { withStore } from '../../src/lib/measurement-store.js';

describe('database commands', () => {
  let tempDir: string;
  let dbPath: string;

  beforeEach(() => {
    jest.clearAllMocks();
    tempDir = mkdtempSync(join(tmpdir(), 'omstore-cmd-'));
    dbPath = join(tempDir, 'measurement_data.db');
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  describe('initDatabase', () => {
    it('should create the database file', async () => {
      await initDatabase(dbPath);

      expect(existsSync(dbPath)).toBe(true);
      expect(output.success).toHaveBeenCalledWith(`Database initialized at ${dbPath}`);
    });
  });

  describe('showStats', () => {
    it('should fail when no database exists', async () => {
      await expect(showStats(dbPath)).rejects.toThrow(
        `No database found at ${dbPath}. Run: omstore init`
      );
    });

    it('should print a row per entity', async () => {
      await initDatabase(dbPath);

      const stats = await showStats(dbPath);

      expect(stats.DUT).toBe(0);
      expect(output.table).toHaveBeenCalledWith(['Entity', 'Rows'], [
        ['DUT', 0],
        ['MeasurementSessions', 0],
        ['ExperimentalConditions', 0],
        ['MeasurementData', 0],
        ['DataInfo', 0],
        ['AnalysisRuns', 0],
        ['AnalysisInputs', 0],
        ['AnalysisFeatures', 0],
        ['FeatureValues', 0],
      ]);
    });
  });

  describe('resetDatabase', () => {
    beforeEach(async () => {
      await initDatabase(dbPath);
      await withStore(dbPath, (store) =>
        store.insertDut({ wafer: 'W01', doe: 'DOE1', die: 1, cage: 'C1', device: 'D1' })
      );
    });

    it('should keep the data when the prompt is declined', async () => {
      mockPrompt.mockResolvedValue({ confirm: false });

      await expect(resetDatabase(dbPath)).resolves.toBe(false);

      expect(output.info).toHaveBeenCalledWith('Reset cancelled');
      expect(await withStore(dbPath, (store) => store.getTableCount('DUT'))).toBe(1);
    });

    it('should skip the prompt with force', async () => {
      await expect(resetDatabase(dbPath, { force: true })).resolves.toBe(true);

      expect(mockPrompt).not.toHaveBeenCalled();
      expect(await withStore(dbPath, (store) => store.getTableCount('DUT'))).toBe(0);
    });
  });

  describe('pruneSessions', () => {
    it('should reject an unparseable date', async () => {
      await expect(pruneSessions('someday', dbPath)).rejects.toThrow('Invalid date: someday');
    });

    it('should delete older sessions', async () => {
      await initDatabase(dbPath);
      await withStore(dbPath, (store) => {
        const dutId = store.insertDut({ wafer: 'W01', doe: 'DOE1', die: 1, cage: 'C1', device: 'D1' });
        store.insertSession({
          dutId,
          sessionName: 'old',
          measurementDatetime: new Date('2025-03-01T00:00:00Z'),
        });
      });

      await expect(pruneSessions('2026-01-01', dbPath)).resolves.toBe(1);
      expect(output.success).toHaveBeenCalledWith(
        'Deleted 1 session(s) measured before 2026-01-01T00:00:00.000Z'
      );
    });
  });
});
