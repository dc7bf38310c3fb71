/**
 * Entity registry
 *
 * The nine tables of schema/schema.sql in parent-before-child order, with the
 * column that identifies a row. Stats, export and schema evolution all go
 * through this list; table names are never taken from caller input directly.
 */

export const ENTITY_NAMES = [
  'DUT',
  'MeasurementSessions',
  'ExperimentalConditions',
  'MeasurementData',
  'DataInfo',
  'AnalysisRuns',
  'AnalysisInputs',
  'AnalysisFeatures',
  'FeatureValues',
] as const;

export type EntityName = (typeof ENTITY_NAMES)[number];

export interface EntityDefinition {
  name: EntityName;
  /** Surrogate key; AnalysisInputs has none */
  primaryKey: string | null;
}

export const ENTITIES: Record<EntityName, EntityDefinition> = {
  DUT: { name: 'DUT', primaryKey: 'DUT_id' },
  MeasurementSessions: { name: 'MeasurementSessions', primaryKey: 'session_id' },
  ExperimentalConditions: { name: 'ExperimentalConditions', primaryKey: 'condition_id' },
  MeasurementData: { name: 'MeasurementData', primaryKey: 'data_id' },
  DataInfo: { name: 'DataInfo', primaryKey: 'info_id' },
  AnalysisRuns: { name: 'AnalysisRuns', primaryKey: 'analysis_id' },
  AnalysisInputs: { name: 'AnalysisInputs', primaryKey: null },
  AnalysisFeatures: { name: 'AnalysisFeatures', primaryKey: 'feature_id' },
  FeatureValues: { name: 'FeatureValues', primaryKey: 'value_id' },
};

export function isEntityName(name: string): name is EntityName {
  return (ENTITY_NAMES as readonly string[]).includes(name);
}

/** Column types accepted by schema evolution */
export const COLUMN_TYPES = ['TEXT', 'INTEGER', 'REAL', 'NUMERIC', 'BLOB', 'DATETIME'] as const;

export type ColumnType = (typeof COLUMN_TYPES)[number];

const IDENTIFIER_RE = /^[A-Za-z_][A-Za-z0-9_]*$/;

export function isIdentifier(name: string): boolean {
  return IDENTIFIER_RE.test(name);
}
