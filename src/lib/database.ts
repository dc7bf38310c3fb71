import Database from 'better-sqlite3';
import { existsSync, mkdirSync, readFileSync, rmSync } from 'fs';
import { dirname, resolve } from 'path';
import { config } from '../utils/config.js';
import { logger } from '../utils/logger.js';
import { storeFiles } from '../utils/paths.js';
import {
  COLUMN_TYPES,
  ENTITY_NAMES,
  isEntityName,
  isIdentifier,
  type ColumnType,
  type EntityName,
} from './entities.js';
import { ConfigurationError, ValidationError } from './errors.js';

const MEMORY_PATH = ':memory:';

export type ColumnDefault = string | number | null;

export interface ColumnInfo {
  cid: number;
  name: string;
  type: string;
  notnull: number;
  dflt_value: string | null;
  pk: number;
}

/**
 * Open a SQLite handle with foreign keys enforced.
 * Integrity enforcement that does not read back as on is fatal.
 */
function connect(path: string): Database.Database {
  let db: Database.Database;
  try {
    if (path !== MEMORY_PATH) {
      mkdirSync(dirname(path), { recursive: true });
    }
    db = new Database(path);
  } catch (error) {
    throw new ConfigurationError(`Unable to open database at ${path}`, { cause: error });
  }

  try {
    db.pragma('foreign_keys = ON');
    const enabled = db.pragma('foreign_keys', { simple: true });
    if (enabled !== 1) {
      throw new ConfigurationError(`Foreign key enforcement could not be enabled for ${path}`);
    }
    if (path !== MEMORY_PATH) {
      db.pragma('journal_mode = WAL');
    }
  } catch (error) {
    db.close();
    if (error instanceof ConfigurationError) {
      throw error;
    }
    throw new ConfigurationError(`Unable to configure database at ${path}`, { cause: error });
  }

  return db;
}

function sqlLiteral(value: ColumnDefault): string {
  if (value === null) {
    return 'NULL';
  }
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw new ValidationError(`Column default must be a finite number, got ${value}`);
    }
    return String(value);
  }
  return `'${value.replace(/'/g, "''")}'`;
}

/**
 * MeasurementDatabase - owns one SQLite handle for a unit of work
 */
export class MeasurementDatabase {
  private db: Database.Database | null;
  readonly path: string;

  private constructor(path: string, db: Database.Database) {
    this.path = path;
    this.db = db;
  }

  /**
   * Open (creating if absent) the store at `path`; `:memory:` is accepted
   */
  static open(path: string): MeasurementDatabase {
    const target = path === MEMORY_PATH ? path : resolve(path);
    return new MeasurementDatabase(target, connect(target));
  }

  get inMemory(): boolean {
    return this.path === MEMORY_PATH;
  }

  get isOpen(): boolean {
    return this.db !== null;
  }

  get inTransaction(): boolean {
    return this.db?.inTransaction ?? false;
  }

  /**
   * The underlying better-sqlite3 handle
   */
  get connection(): Database.Database {
    if (!this.db) {
      throw new ConfigurationError(`Database ${this.path} is closed`);
    }
    return this.db;
  }

  /**
   * Apply the declarative schema. Safe to run against an initialized store.
   */
  createDatabase(schemaFile: string = config.schemaFile): void {
    if (!existsSync(schemaFile)) {
      throw new ConfigurationError(`Schema file not found: ${schemaFile}`);
    }
    const schemaSql = readFileSync(schemaFile, 'utf-8');
    this.connection.exec(schemaSql);
    logger.info({ path: this.path, schemaFile }, 'Database schema applied');
  }

  /**
   * Destroy the store and recreate it from the schema
   */
  resetDatabase(schemaFile: string = config.schemaFile): void {
    if (this.inMemory) {
      const db = this.connection;
      for (const entity of [...ENTITY_NAMES].reverse()) {
        db.exec(`DROP TABLE IF EXISTS ${entity}`);
      }
    } else {
      this.close();
      for (const file of storeFiles(this.path)) {
        rmSync(file, { force: true });
      }
      this.db = connect(this.path);
    }
    logger.info({ path: this.path }, 'Database reset');
    this.createDatabase(schemaFile);
  }

  /**
   * Column metadata for an entity, in declaration order
   */
  getColumns(entity: EntityName): ColumnInfo[] {
    return this.connection.prepare(`PRAGMA table_info(${entity})`).all() as ColumnInfo[];
  }

  /**
   * Add a column with a default value. Returns false when it already exists.
   */
  addColumn(
    entity: string,
    column: string,
    type: ColumnType,
    defaultValue: ColumnDefault = null
  ): boolean {
    if (!isEntityName(entity)) {
      throw new ValidationError(`Unknown entity: ${entity}`, [
        { path: 'entity', message: `must be one of ${ENTITY_NAMES.join(', ')}` },
      ]);
    }
    if (!isIdentifier(column)) {
      throw new ValidationError(`Invalid column name: ${column}`, [
        { path: 'column', message: 'must be a plain identifier' },
      ]);
    }
    if (!(COLUMN_TYPES as readonly string[]).includes(type)) {
      throw new ValidationError(`Unsupported column type: ${type}`, [
        { path: 'type', message: `must be one of ${COLUMN_TYPES.join(', ')}` },
      ]);
    }

    const exists = this.getColumns(entity).some(
      (info) => info.name.toLowerCase() === column.toLowerCase()
    );
    if (exists) {
      return false;
    }

    this.connection.exec(
      `ALTER TABLE ${entity} ADD COLUMN ${column} ${type} DEFAULT ${sqlLiteral(defaultValue)}`
    );
    logger.info({ entity, column, type }, 'Column added');
    return true;
  }

  /**
   * Run operations in a transaction; nested calls become savepoints
   */
  transaction<T>(fn: () => T): T {
    return this.connection.transaction(fn)();
  }

  /**
   * Close the handle, rolling back anything left uncommitted
   */
  close(): void {
    if (!this.db) {
      return;
    }
    if (this.db.inTransaction) {
      this.db.exec('ROLLBACK');
    }
    this.db.close();
    this.db = null;
  }
}

/**
 * Check if a database file exists at `path`
 */
export function databaseExists(path: string): boolean {
  return path === MEMORY_PATH || existsSync(resolve(path));
}

export interface WithDatabaseOptions {
  /** Apply the schema after opening; a string names the schema file */
  createSchema?: boolean | string;
}

/**
 * Scoped acquisition: the handle is closed on every exit path
 */
export async function withDatabase<T>(
  path: string,
  fn: (db: MeasurementDatabase) => T | Promise<T>,
  options: WithDatabaseOptions = {}
): Promise<T> {
  const db = MeasurementDatabase.open(path);
  try {
    if (options.createSchema) {
      db.createDatabase(
        typeof options.createSchema === 'string' ? options.createSchema : config.schemaFile
      );
    }
    return await fn(db);
  } finally {
    db.close();
  }
}
