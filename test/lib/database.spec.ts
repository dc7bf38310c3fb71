import { describe, expect, it, beforeEach, afterEach } from '@jest/globals';
import { mkdtempSync, rmSync, existsSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';

import {
  MeasurementDatabase,
  databaseExists,
  withDatabase,
} from '../../src/lib/database.js';
import { ConfigurationError, ValidationError } from '../../src/lib/errors.js';
import { MeasurementStore } from '../../src/lib/measurement-store.js';

const TABLES = [
  'AnalysisFeatures',
  'AnalysisInputs',
  'AnalysisRuns',
  'DUT',
  'DataInfo',
  'ExperimentalConditions',
  'FeatureValues',
  'MeasurementData',
  'MeasurementSessions',
];

function tableNames(db: MeasurementDatabase): string[] {
  const rows = db.connection
    .prepare("SELECT name FROM sqlite_master WHERE type = 'table' ORDER BY name")
    .all() as Array<{ name: string }>;
  return rows.map((row) => row.name);
}

describe('MeasurementDatabase', () => {
  let tempDir: string;
  let dbPath: string;
  let db: MeasurementDatabase;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'omstore-db-'));
    dbPath = join(tempDir, 'nested', 'measurement_data.db');
    db = MeasurementDatabase.open(dbPath);
  });

  afterEach(() => {
    db.close();
    if (existsSync(tempDir)) {
      rmSync(tempDir, { recursive: true, force: true });
    }
  });

  describe('open', () => {
    it('should create the file and its parent directory', () => {
      expect(existsSync(dbPath)).toBe(true);
      expect(databaseExists(dbPath)).toBe(true);
    });

    it('should enforce foreign keys', () => {
      expect(db.connection.pragma('foreign_keys', { simple: true })).toBe(1);
    });

    it('should raise ConfigurationError when the path cannot be opened', () => {
      const blocker = join(tempDir, 'not-a-dir');
      writeFileSync(blocker, 'x');

      expect(() => MeasurementDatabase.open(join(blocker, 'store.db'))).toThrow(
        ConfigurationError
      );
    });

    it('should accept an in-memory store', () => {
      const memory = MeasurementDatabase.open(':memory:');
      expect(memory.inMemory).toBe(true);
      memory.close();
    });
  });

  describe('createDatabase', () => {
    it('should create all nine tables', () => {
      db.createDatabase();
      expect(tableNames(db)).toEqual(TABLES);
    });

    it('should be idempotent and keep existing rows', () => {
      db.createDatabase();
      const store = new MeasurementStore(db);
      store.insertDut({ wafer: 'W1', doe: 'DOE1', die: 3, cage: 'C1', device: 'D1' });

      db.createDatabase();

      expect(tableNames(db)).toEqual(TABLES);
      expect(store.getTableCount('DUT')).toBe(1);
    });

    it('should raise ConfigurationError for a missing schema file', () => {
      expect(() => db.createDatabase(join(tempDir, 'missing.sql'))).toThrow(
        `Schema file not found: ${join(tempDir, 'missing.sql')}`
      );
    });
  });

  describe('resetDatabase', () => {
    it('should leave an empty store with the schema applied', () => {
      db.createDatabase();
      const store = new MeasurementStore(db);
      store.insertDut({ wafer: 'W1', doe: 'DOE1', die: 3, cage: 'C1', device: 'D1' });

      db.resetDatabase();

      expect(tableNames(db)).toEqual(TABLES);
      expect(new MeasurementStore(db).getTableCount('DUT')).toBe(0);
    });

    it('should reset an in-memory store', () => {
      const memory = MeasurementDatabase.open(':memory:');
      memory.createDatabase();
      new MeasurementStore(memory).insertDut({
        wafer: 'W1',
        doe: 'DOE1',
        die: 3,
        cage: 'C1',
        device: 'D1',
      });

      memory.resetDatabase();

      expect(new MeasurementStore(memory).getTableCount('DUT')).toBe(0);
      memory.close();
    });
  });

  describe('addColumn', () => {
    beforeEach(() => {
      db.createDatabase();
    });

    it('should add a column with its default to existing rows', () => {
      const store = new MeasurementStore(db);
      store.insertDut({ wafer: 'W1', doe: 'DOE1', die: 3, cage: 'C1', device: 'D1' });

      expect(db.addColumn('DUT', 'fab', 'TEXT', 'fab-a')).toBe(true);

      const columns = db.getColumns('DUT').map((column) => column.name);
      expect(columns).toEqual(['DUT_id', 'wafer', 'DOE', 'die', 'cage', 'device', 'fab']);
      expect(store.query('SELECT fab FROM DUT')).toEqual([{ fab: 'fab-a' }]);
    });

    it('should return false when the column already exists', () => {
      expect(db.addColumn('DUT', 'wafer', 'TEXT')).toBe(false);
    });

    it('should reject an unknown entity', () => {
      expect(() => db.addColumn('Wafers', 'fab', 'TEXT')).toThrow(ValidationError);
    });

    it('should reject a column name that is not an identifier', () => {
      expect(() => db.addColumn('DUT', 'fab; DROP TABLE DUT', 'TEXT')).toThrow(
        'Invalid column name: fab; DROP TABLE DUT'
      );
    });
  });

  describe('close', () => {
    it('should be safe to call twice', () => {
      db.close();
      db.close();
      expect(db.isOpen).toBe(false);
    });

    it('should refuse use after close', () => {
      db.close();
      expect(() => db.connection).toThrow(ConfigurationError);
    });
  });
});

describe('withDatabase', () => {
  it('should close the handle when the callback throws', async () => {
    let captured: MeasurementDatabase | undefined;

    await expect(
      withDatabase(':memory:', (db) => {
        captured = db;
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    expect(captured?.isOpen).toBe(false);
  });

  it('should apply the schema when asked', async () => {
    const count = await withDatabase(
      ':memory:',
      (db) => new MeasurementStore(db).getTableCount('FeatureValues'),
      { createSchema: true }
    );
    expect(count).toBe(0);
  });
});
