import type Database from 'better-sqlite3';
import { logger } from '../utils/logger.js';
import {
  MeasurementDatabase,
  withDatabase,
  type ColumnInfo,
  type WithDatabaseOptions,
} from './database.js';
import { toSqlDatetime, nowSqlDatetime } from './datetime.js';
import { ENTITIES, ENTITY_NAMES, isEntityName, type EntityName } from './entities.js';
import { translateSqliteError, ValidationError } from './errors.js';
import type {
  AnalysisFeature,
  AnalysisFeatureInput,
  AnalysisInput,
  AnalysisRun,
  AnalysisRunDetail,
  AnalysisRunInput,
  DataInfo,
  DataInfoValue,
  Dut,
  DutFilter,
  DutInput,
  ExperimentalCondition,
  FeatureValue,
  FeatureValueSearch,
  KeyValueBatch,
  KeyValueEntry,
  KeyValueMap,
  MeasurementData,
  MeasurementDataInput,
  MeasurementSession,
  RawRow,
  SessionFullInfo,
  SessionInput,
  SqlParameter,
} from './types.js';
import {
  analysisFeatureSchema,
  analysisInputSchema,
  analysisRunSchema,
  dataInfoValueSchema,
  dutSchema,
  featureSearchSchema,
  measurementDataSchema,
  normalizeKeyValues,
  numericValueSchema,
  parseInput,
  rowIdSchema,
  sessionSchema,
  unitOf,
} from './validation.js';

// ============================================================================
// Row shapes as stored
// ============================================================================

interface IdRow {
  id: number;
}

interface DutRow {
  DUT_id: number;
  wafer: string;
  DOE: string;
  die: number;
  cage: string;
  device: string;
}

interface SessionRow {
  session_id: number;
  DUT_id: number;
  session_name: string;
  measurement_datetime: string | null;
  operator: string | null;
  system_version: string | null;
  notes: string | null;
}

interface ConditionRow {
  condition_id: number;
  session_id: number;
  key: string;
  value: number;
  unit: string | null;
}

interface DataRow {
  data_id: number;
  session_id: number;
  data_type: string;
  file_path: string;
  created_time: string | null;
}

interface DataInfoRow {
  info_id: number;
  data_id: number;
  key: string;
  value: string;
  unit: string | null;
}

interface RunRow {
  analysis_id: number;
  session_id: number;
  analysis_type: string;
  analysis_index: number;
  created_time: string | null;
}

interface InputRow {
  analysis_id: number;
  data_id: number;
}

interface FeatureRow {
  feature_id: number;
  analysis_id: number;
  feature_type: string;
  feature_index: number;
}

interface FeatureValueRow {
  value_id: number;
  feature_id: number;
  key: string;
  value: number;
  unit: string | null;
}

function mapDut(row: DutRow): Dut {
  return {
    dutId: row.DUT_id,
    wafer: row.wafer,
    doe: row.DOE,
    die: row.die,
    cage: row.cage,
    device: row.device,
  };
}

function mapSession(row: SessionRow): MeasurementSession {
  return {
    sessionId: row.session_id,
    dutId: row.DUT_id,
    sessionName: row.session_name,
    measurementDatetime: row.measurement_datetime,
    operator: row.operator,
    systemVersion: row.system_version,
    notes: row.notes,
  };
}

function mapCondition(row: ConditionRow): ExperimentalCondition {
  return {
    conditionId: row.condition_id,
    sessionId: row.session_id,
    key: row.key,
    value: row.value,
    unit: row.unit,
  };
}

function mapData(row: DataRow): MeasurementData {
  return {
    dataId: row.data_id,
    sessionId: row.session_id,
    dataType: row.data_type,
    filePath: row.file_path,
    createdTime: row.created_time,
  };
}

function mapDataInfo(row: DataInfoRow): DataInfo {
  return {
    infoId: row.info_id,
    dataId: row.data_id,
    key: row.key,
    value: row.value,
    unit: row.unit,
  };
}

function mapRun(row: RunRow): AnalysisRun {
  return {
    analysisId: row.analysis_id,
    sessionId: row.session_id,
    analysisType: row.analysis_type,
    analysisIndex: row.analysis_index,
    createdTime: row.created_time,
  };
}

function mapFeature(row: FeatureRow): AnalysisFeature {
  return {
    featureId: row.feature_id,
    analysisId: row.analysis_id,
    featureType: row.feature_type,
    featureIndex: row.feature_index,
  };
}

function mapFeatureValue(row: FeatureValueRow): FeatureValue {
  return {
    valueId: row.value_id,
    featureId: row.feature_id,
    key: row.key,
    value: row.value,
    unit: row.unit,
  };
}

function toKeyValueMap<V>(rows: Array<{ key: string; value: V; unit: string | null }>): KeyValueMap<V> {
  const map: KeyValueMap<V> = new Map();
  for (const row of rows) {
    const entries = map.get(row.key) ?? [];
    entries.push({ value: row.value, unit: row.unit });
    map.set(row.key, entries);
  }
  return map;
}

interface Statement {
  sql: string;
  params: SqlParameter[];
}

interface KeyValueTable {
  table: 'ExperimentalConditions' | 'DataInfo' | 'FeatureValues';
  parentColumn: string;
  idColumn: string;
}

const CONDITIONS: KeyValueTable = {
  table: 'ExperimentalConditions',
  parentColumn: 'session_id',
  idColumn: 'condition_id',
};
const DATA_INFO: KeyValueTable = { table: 'DataInfo', parentColumn: 'data_id', idColumn: 'info_id' };
const FEATURE_VALUES: KeyValueTable = {
  table: 'FeatureValues',
  parentColumn: 'feature_id',
  idColumn: 'value_id',
};

/**
 * MeasurementStore - typed insert/query/delete operations over one database handle
 *
 * Every insert is insert-or-get-existing: the entity's uniqueness key decides
 * whether a row is created, and the resolved surrogate key is returned either
 * way. Deletes rely on ON DELETE CASCADE for descendants.
 */
export class MeasurementStore {
  constructor(private readonly database: MeasurementDatabase) {}

  private get db(): Database.Database {
    return this.database.connection;
  }

  /**
   * Run operations in one transaction
   */
  transaction<T>(fn: () => T): T {
    return this.database.transaction(fn);
  }

  // ==========================================================================
  // Inserts
  // ==========================================================================

  private insertOrGet(context: string, insert: Statement, existing: Statement): number {
    try {
      const inserted = this.db.prepare(insert.sql).get(...insert.params) as IdRow | undefined;
      if (inserted) {
        return inserted.id;
      }
      const found = this.db.prepare(existing.sql).get(...existing.params) as IdRow | undefined;
      if (!found) {
        throw new Error(`${context}: insert was ignored but no existing row matches`);
      }
      return found.id;
    } catch (error) {
      throw translateSqliteError(error, context);
    }
  }

  private insertKeyValues<V>(
    target: KeyValueTable,
    parentId: number,
    entries: KeyValueEntry<V>[],
    toParam: (value: V) => SqlParameter
  ): number[] {
    const { table, parentColumn, idColumn } = target;
    const context = `Insert ${table}`;
    return this.transaction(() =>
      entries.map((entry) =>
        this.insertOrGet(
          context,
          {
            sql: `INSERT INTO ${table} (${parentColumn}, key, value, unit) VALUES (?, ?, ?, ?)
                  ON CONFLICT DO NOTHING RETURNING ${idColumn} AS id`,
            params: [parentId, entry.key, toParam(entry.value), unitOf(entry)],
          },
          {
            sql: `SELECT ${idColumn} AS id FROM ${table}
                  WHERE ${parentColumn} = ? AND key = ? AND IFNULL(unit, '') = IFNULL(?, '')`,
            params: [parentId, entry.key, unitOf(entry)],
          }
        )
      )
    );
  }

  private parentId(id: unknown, label: string): number {
    return parseInput(rowIdSchema, id, label);
  }

  /**
   * Insert a DUT, or return the id of the identical one
   */
  insertDut(input: DutInput): number {
    const dut = parseInput(dutSchema, input, 'DUT');
    const key = [dut.wafer, dut.doe, dut.die, dut.cage, dut.device];
    return this.insertOrGet(
      'Insert DUT',
      {
        sql: `INSERT INTO DUT (wafer, DOE, die, cage, device) VALUES (?, ?, ?, ?, ?)
              ON CONFLICT DO NOTHING RETURNING DUT_id AS id`,
        params: key,
      },
      {
        sql: `SELECT DUT_id AS id FROM DUT
              WHERE wafer = ? AND DOE = ? AND die = ? AND cage = ? AND device = ?`,
        params: key,
      }
    );
  }

  /**
   * Insert a measurement session; (DUT, session name) identifies it
   */
  insertSession(input: SessionInput): number {
    const session = parseInput(sessionSchema, input, 'measurement session');
    return this.insertOrGet(
      'Insert MeasurementSessions',
      {
        sql: `INSERT INTO MeasurementSessions
                (DUT_id, session_name, measurement_datetime, operator, system_version, notes)
              VALUES (?, ?, ?, ?, ?, ?)
              ON CONFLICT DO NOTHING RETURNING session_id AS id`,
        params: [
          session.dutId,
          session.sessionName,
          session.measurementDatetime ? toSqlDatetime(session.measurementDatetime) : nowSqlDatetime(),
          session.operator ?? null,
          session.systemVersion ?? null,
          session.notes ?? null,
        ],
      },
      {
        sql: 'SELECT session_id AS id FROM MeasurementSessions WHERE DUT_id = ? AND session_name = ?',
        params: [session.dutId, session.sessionName],
      }
    );
  }

  /**
   * Insert experimental conditions: `{ temperature: [25, 'C'], voltage: 3.3 }`
   */
  insertExperimentalConditions(sessionId: number, conditions: KeyValueBatch<number>): number[] {
    const parentId = this.parentId(sessionId, 'sessionId');
    const entries = normalizeKeyValues(conditions, numericValueSchema, 'experimental conditions');
    return this.insertKeyValues(CONDITIONS, parentId, entries, (value) => value);
  }

  /**
   * Insert a raw-data reference; (session, file path) identifies it
   */
  insertMeasurementData(input: MeasurementDataInput): number {
    const data = parseInput(measurementDataSchema, input, 'measurement data');
    return this.insertOrGet(
      'Insert MeasurementData',
      {
        sql: `INSERT INTO MeasurementData (session_id, data_type, file_path, created_time)
              VALUES (?, ?, ?, ?)
              ON CONFLICT DO NOTHING RETURNING data_id AS id`,
        params: [
          data.sessionId,
          data.dataType,
          data.filePath,
          data.createdTime ? toSqlDatetime(data.createdTime) : nowSqlDatetime(),
        ],
      },
      {
        sql: 'SELECT data_id AS id FROM MeasurementData WHERE session_id = ? AND file_path = ?',
        params: [data.sessionId, data.filePath],
      }
    );
  }

  /**
   * Insert data info; numbers are stored as their decimal text
   */
  insertDataInfo(dataId: number, info: KeyValueBatch<DataInfoValue>): number[] {
    const parentId = this.parentId(dataId, 'dataId');
    const entries = normalizeKeyValues(info, dataInfoValueSchema, 'data info');
    return this.insertKeyValues(DATA_INFO, parentId, entries, (value) => String(value));
  }

  /**
   * Insert an analysis run; the caller chooses a non-colliding analysis index
   */
  insertAnalysisRun(input: AnalysisRunInput): number {
    const run = parseInput(analysisRunSchema, input, 'analysis run');
    return this.insertOrGet(
      'Insert AnalysisRuns',
      {
        sql: `INSERT INTO AnalysisRuns (session_id, analysis_type, analysis_index, created_time)
              VALUES (?, ?, ?, ?)
              ON CONFLICT DO NOTHING RETURNING analysis_id AS id`,
        params: [
          run.sessionId,
          run.analysisType,
          run.analysisIndex,
          run.createdTime ? toSqlDatetime(run.createdTime) : nowSqlDatetime(),
        ],
      },
      {
        sql: `SELECT analysis_id AS id FROM AnalysisRuns
              WHERE session_id = ? AND analysis_type = ? AND analysis_index = ?`,
        params: [run.sessionId, run.analysisType, run.analysisIndex],
      }
    );
  }

  /**
   * Link one data artifact to a run. Returns 1 for a new edge, 0 if it existed.
   */
  insertAnalysisInput(analysisId: number, dataId: number): number {
    return this.insertAnalysisInputs(analysisId, [dataId]);
  }

  /**
   * Link data artifacts to a run. Returns the number of new edges.
   */
  insertAnalysisInputs(analysisId: number, dataIds: number[]): number {
    const input = parseInput(analysisInputSchema, { analysisId, dataIds }, 'analysis inputs');
    const stmt = this.db.prepare(
      'INSERT INTO AnalysisInputs (analysis_id, data_id) VALUES (?, ?) ON CONFLICT DO NOTHING'
    );
    return this.transaction(() => {
      let added = 0;
      for (const dataId of input.dataIds) {
        try {
          added += stmt.run(input.analysisId, dataId).changes;
        } catch (error) {
          throw translateSqliteError(error, 'Insert AnalysisInputs');
        }
      }
      return added;
    });
  }

  /**
   * Insert a detected feature; (run, type, index) identifies it
   */
  insertAnalysisFeature(input: AnalysisFeatureInput): number {
    const feature = parseInput(analysisFeatureSchema, input, 'analysis feature');
    const key = [feature.analysisId, feature.featureType, feature.featureIndex];
    return this.insertOrGet(
      'Insert AnalysisFeatures',
      {
        sql: `INSERT INTO AnalysisFeatures (analysis_id, feature_type, feature_index)
              VALUES (?, ?, ?)
              ON CONFLICT DO NOTHING RETURNING feature_id AS id`,
        params: key,
      },
      {
        sql: `SELECT feature_id AS id FROM AnalysisFeatures
              WHERE analysis_id = ? AND feature_type = ? AND feature_index = ?`,
        params: key,
      }
    );
  }

  /**
   * Insert feature values: `{ wavelength: [1550.2, 'nm'], fwhm: 0.4 }`
   */
  insertFeatureValues(featureId: number, values: KeyValueBatch<number>): number[] {
    const parentId = this.parentId(featureId, 'featureId');
    const entries = normalizeKeyValues(values, numericValueSchema, 'feature values');
    return this.insertKeyValues(FEATURE_VALUES, parentId, entries, (value) => value);
  }

  // ==========================================================================
  // Queries
  // ==========================================================================

  /**
   * Run an ad hoc statement. Statements that return no rows yield [].
   */
  query(sql: string, params: SqlParameter[] = []): RawRow[] {
    try {
      const stmt = this.db.prepare(sql);
      if (!stmt.reader) {
        stmt.run(...params);
        return [];
      }
      return stmt.all(...params) as RawRow[];
    } catch (error) {
      throw translateSqliteError(error, 'Query');
    }
  }

  getDutById(dutId: number): Dut | undefined {
    const row = this.db.prepare('SELECT * FROM DUT WHERE DUT_id = ?').get(dutId) as
      | DutRow
      | undefined;
    return row ? mapDut(row) : undefined;
  }

  getDuts(filter: DutFilter = {}): Dut[] {
    let sql = 'SELECT * FROM DUT WHERE 1 = 1';
    const params: SqlParameter[] = [];

    if (filter.wafer) {
      sql += ' AND wafer = ?';
      params.push(filter.wafer);
    }
    if (filter.die !== undefined) {
      sql += ' AND die = ?';
      params.push(filter.die);
    }

    const rows = this.db.prepare(`${sql} ORDER BY DUT_id`).all(...params) as DutRow[];
    return rows.map(mapDut);
  }

  getSessionById(sessionId: number): MeasurementSession | undefined {
    const row = this.db
      .prepare('SELECT * FROM MeasurementSessions WHERE session_id = ?')
      .get(sessionId) as SessionRow | undefined;
    return row ? mapSession(row) : undefined;
  }

  /**
   * Sessions of a DUT, newest first
   */
  getSessionsByDut(dutId: number): MeasurementSession[] {
    const rows = this.db
      .prepare(
        `SELECT * FROM MeasurementSessions WHERE DUT_id = ?
         ORDER BY measurement_datetime DESC, session_id DESC`
      )
      .all(dutId) as SessionRow[];
    return rows.map(mapSession);
  }

  /**
   * Sessions measured within [start, end], newest first
   */
  getSessionsByDateRange(start: Date, end: Date): MeasurementSession[] {
    const rows = this.db
      .prepare(
        `SELECT * FROM MeasurementSessions
         WHERE measurement_datetime BETWEEN ? AND ?
         ORDER BY measurement_datetime DESC, session_id DESC`
      )
      .all(toSqlDatetime(start), toSqlDatetime(end)) as SessionRow[];
    return rows.map(mapSession);
  }

  getConditionsBySession(sessionId: number): ExperimentalCondition[] {
    const rows = this.db
      .prepare('SELECT * FROM ExperimentalConditions WHERE session_id = ? ORDER BY condition_id')
      .all(sessionId) as ConditionRow[];
    return rows.map(mapCondition);
  }

  getConditionsMap(sessionId: number): KeyValueMap<number> {
    return toKeyValueMap(this.getConditionsBySession(sessionId));
  }

  getMeasurementDataById(dataId: number): MeasurementData | undefined {
    const row = this.db.prepare('SELECT * FROM MeasurementData WHERE data_id = ?').get(dataId) as
      | DataRow
      | undefined;
    return row ? mapData(row) : undefined;
  }

  getMeasurementDataBySession(sessionId: number, dataType?: string): MeasurementData[] {
    const rows = (
      dataType
        ? this.db
            .prepare(
              'SELECT * FROM MeasurementData WHERE session_id = ? AND data_type = ? ORDER BY data_id'
            )
            .all(sessionId, dataType)
        : this.db
            .prepare('SELECT * FROM MeasurementData WHERE session_id = ? ORDER BY data_id')
            .all(sessionId)
    ) as DataRow[];
    return rows.map(mapData);
  }

  getDataInfoByData(dataId: number): DataInfo[] {
    const rows = this.db
      .prepare('SELECT * FROM DataInfo WHERE data_id = ? ORDER BY info_id')
      .all(dataId) as DataInfoRow[];
    return rows.map(mapDataInfo);
  }

  getDataInfoMap(dataId: number): KeyValueMap<string> {
    return toKeyValueMap(this.getDataInfoByData(dataId));
  }

  getAnalysisRunById(analysisId: number): AnalysisRun | undefined {
    const row = this.db
      .prepare('SELECT * FROM AnalysisRuns WHERE analysis_id = ?')
      .get(analysisId) as RunRow | undefined;
    return row ? mapRun(row) : undefined;
  }

  getAnalysisRunsBySession(sessionId: number, analysisType?: string): AnalysisRun[] {
    const rows = (
      analysisType
        ? this.db
            .prepare(
              `SELECT * FROM AnalysisRuns WHERE session_id = ? AND analysis_type = ?
               ORDER BY analysis_id`
            )
            .all(sessionId, analysisType)
        : this.db
            .prepare('SELECT * FROM AnalysisRuns WHERE session_id = ? ORDER BY analysis_id')
            .all(sessionId)
    ) as RunRow[];
    return rows.map(mapRun);
  }

  /**
   * Lineage edges of a run
   */
  getAnalysisInputs(analysisId: number): AnalysisInput[] {
    const rows = this.db
      .prepare('SELECT * FROM AnalysisInputs WHERE analysis_id = ? ORDER BY data_id')
      .all(analysisId) as InputRow[];
    return rows.map((row) => ({ analysisId: row.analysis_id, dataId: row.data_id }));
  }

  /**
   * Data artifacts that fed a run
   */
  getAnalysisInputData(analysisId: number): MeasurementData[] {
    const rows = this.db
      .prepare(
        `SELECT md.* FROM AnalysisInputs ai
         JOIN MeasurementData md ON ai.data_id = md.data_id
         WHERE ai.analysis_id = ?
         ORDER BY md.data_id`
      )
      .all(analysisId) as DataRow[];
    return rows.map(mapData);
  }

  /**
   * Runs that consumed a data artifact
   */
  getAnalysesByData(dataId: number): AnalysisRun[] {
    const rows = this.db
      .prepare(
        `SELECT ar.* FROM AnalysisInputs ai
         JOIN AnalysisRuns ar ON ai.analysis_id = ar.analysis_id
         WHERE ai.data_id = ?
         ORDER BY ar.analysis_id`
      )
      .all(dataId) as RunRow[];
    return rows.map(mapRun);
  }

  getFeatureById(featureId: number): AnalysisFeature | undefined {
    const row = this.db
      .prepare('SELECT * FROM AnalysisFeatures WHERE feature_id = ?')
      .get(featureId) as FeatureRow | undefined;
    return row ? mapFeature(row) : undefined;
  }

  getFeaturesByAnalysis(analysisId: number, featureType?: string): AnalysisFeature[] {
    const rows = (
      featureType
        ? this.db
            .prepare(
              `SELECT * FROM AnalysisFeatures WHERE analysis_id = ? AND feature_type = ?
               ORDER BY feature_index, feature_id`
            )
            .all(analysisId, featureType)
        : this.db
            .prepare(
              'SELECT * FROM AnalysisFeatures WHERE analysis_id = ? ORDER BY feature_index, feature_id'
            )
            .all(analysisId)
    ) as FeatureRow[];
    return rows.map(mapFeature);
  }

  getFeatureValues(featureId: number): FeatureValue[] {
    const rows = this.db
      .prepare('SELECT * FROM FeatureValues WHERE feature_id = ? ORDER BY value_id')
      .all(featureId) as FeatureValueRow[];
    return rows.map(mapFeatureValue);
  }

  getFeatureValuesMap(featureId: number): KeyValueMap<number> {
    return toKeyValueMap(this.getFeatureValues(featureId));
  }

  /**
   * Feature values of `key` within [minValue, maxValue] across all runs
   */
  searchFeaturesByValue(search: FeatureValueSearch): FeatureValue[] {
    const { key, minValue, maxValue, unit } = parseInput(
      featureSearchSchema,
      search,
      'feature search'
    );
    let sql = 'SELECT * FROM FeatureValues WHERE key = ?';
    const params: SqlParameter[] = [key];

    if (unit !== undefined) {
      sql += ' AND unit = ?';
      params.push(unit);
    }
    if (minValue !== undefined) {
      sql += ' AND value >= ?';
      params.push(minValue);
    }
    if (maxValue !== undefined) {
      sql += ' AND value <= ?';
      params.push(maxValue);
    }

    const rows = this.db.prepare(`${sql} ORDER BY value, value_id`).all(...params) as FeatureValueRow[];
    return rows.map(mapFeatureValue);
  }

  /**
   * One session with its DUT, conditions, data (with info) and analysis runs
   * (with inputs, features and values)
   */
  getSessionFullInfo(sessionId: number): SessionFullInfo | undefined {
    const session = this.getSessionById(sessionId);
    if (!session) {
      return undefined;
    }

    const measurementData = this.getMeasurementDataBySession(sessionId).map((data) => ({
      ...data,
      info: this.getDataInfoByData(data.dataId),
    }));

    const analysisRuns: AnalysisRunDetail[] = this.getAnalysisRunsBySession(sessionId).map(
      (run) => ({
        ...run,
        inputs: this.getAnalysisInputData(run.analysisId),
        features: this.getFeaturesByAnalysis(run.analysisId).map((feature) => ({
          ...feature,
          values: this.getFeatureValues(feature.featureId),
        })),
      })
    );

    return {
      ...session,
      dut: this.getDutById(session.dutId),
      conditions: this.getConditionsBySession(sessionId),
      measurementData,
      analysisRuns,
    };
  }

  /**
   * Every stored row of an entity, as stored, in key order
   */
  listRows(entity: EntityName): RawRow[] {
    const definition = ENTITIES[entity];
    const order = definition.primaryKey ?? 'analysis_id, data_id';
    return this.db.prepare(`SELECT * FROM ${entity} ORDER BY ${order}`).all() as RawRow[];
  }

  getColumns(entity: EntityName): ColumnInfo[] {
    return this.database.getColumns(entity);
  }

  // ==========================================================================
  // Deletes
  // ==========================================================================

  private deleteWhere(table: EntityName, where: string, params: SqlParameter[]): number {
    const { changes } = this.db.prepare(`DELETE FROM ${table} WHERE ${where}`).run(...params);
    logger.debug({ table, where, params, changes }, 'Rows deleted');
    return changes;
  }

  /** Cascades to sessions and everything below them */
  deleteDut(dutId: number): number {
    return this.deleteWhere('DUT', 'DUT_id = ?', [dutId]);
  }

  /** Cascades to conditions, data, data info, runs, inputs, features and values */
  deleteSession(sessionId: number): number {
    return this.deleteWhere('MeasurementSessions', 'session_id = ?', [sessionId]);
  }

  deleteExperimentalCondition(conditionId: number): number {
    return this.deleteWhere('ExperimentalConditions', 'condition_id = ?', [conditionId]);
  }

  /** Cascades to its data info and lineage edges */
  deleteMeasurementData(dataId: number): number {
    return this.deleteWhere('MeasurementData', 'data_id = ?', [dataId]);
  }

  deleteDataInfo(infoId: number): number {
    return this.deleteWhere('DataInfo', 'info_id = ?', [infoId]);
  }

  /** Cascades to inputs, features and values */
  deleteAnalysisRun(analysisId: number): number {
    return this.deleteWhere('AnalysisRuns', 'analysis_id = ?', [analysisId]);
  }

  deleteAnalysisInput(analysisId: number, dataId: number): number {
    return this.deleteWhere('AnalysisInputs', 'analysis_id = ? AND data_id = ?', [
      analysisId,
      dataId,
    ]);
  }

  /** Cascades to its values */
  deleteAnalysisFeature(featureId: number): number {
    return this.deleteWhere('AnalysisFeatures', 'feature_id = ?', [featureId]);
  }

  deleteFeatureValue(valueId: number): number {
    return this.deleteWhere('FeatureValues', 'value_id = ?', [valueId]);
  }

  deleteSessionsByDut(dutId: number): number {
    return this.deleteWhere('MeasurementSessions', 'DUT_id = ?', [dutId]);
  }

  /**
   * Delete every session measured before `cutoff`. Sessions without a
   * measurement datetime are kept.
   */
  deleteSessionsBefore(cutoff: Date): number {
    return this.deleteWhere('MeasurementSessions', 'measurement_datetime < ?', [
      toSqlDatetime(cutoff),
    ]);
  }

  // ==========================================================================
  // Stats
  // ==========================================================================

  getTableCount(entity: string): number {
    if (!isEntityName(entity)) {
      throw new ValidationError(`Unknown entity: ${entity}`, [
        { path: 'entity', message: `must be one of ${ENTITY_NAMES.join(', ')}` },
      ]);
    }
    const row = this.db.prepare(`SELECT COUNT(*) AS count FROM ${entity}`).get() as {
      count: number;
    };
    return row.count;
  }

  /**
   * Row count per entity
   */
  getDatabaseStats(): Record<EntityName, number> {
    return {
      DUT: this.getTableCount('DUT'),
      MeasurementSessions: this.getTableCount('MeasurementSessions'),
      ExperimentalConditions: this.getTableCount('ExperimentalConditions'),
      MeasurementData: this.getTableCount('MeasurementData'),
      DataInfo: this.getTableCount('DataInfo'),
      AnalysisRuns: this.getTableCount('AnalysisRuns'),
      AnalysisInputs: this.getTableCount('AnalysisInputs'),
      AnalysisFeatures: this.getTableCount('AnalysisFeatures'),
      FeatureValues: this.getTableCount('FeatureValues'),
    };
  }
}

/**
 * Scoped acquisition of a store: the database is closed on every exit path
 */
export function withStore<T>(
  path: string,
  fn: (store: MeasurementStore, db: MeasurementDatabase) => T | Promise<T>,
  options: WithDatabaseOptions = {}
): Promise<T> {
  return withDatabase(path, (db) => fn(new MeasurementStore(db), db), options);
}
