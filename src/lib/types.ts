/**
 * Row and input types for the measurement store
 */

// ============================================================================
// Rows
// ============================================================================

export interface Dut {
  dutId: number;
  wafer: string;
  doe: string;
  die: number;
  cage: string;
  device: string;
}

export interface MeasurementSession {
  sessionId: number;
  dutId: number;
  sessionName: string;
  measurementDatetime: string | null;
  operator: string | null;
  systemVersion: string | null;
  notes: string | null;
}

export interface ExperimentalCondition {
  conditionId: number;
  sessionId: number;
  key: string;
  value: number;
  unit: string | null;
}

export interface MeasurementData {
  dataId: number;
  sessionId: number;
  dataType: string;
  filePath: string;
  createdTime: string | null;
}

export interface DataInfo {
  infoId: number;
  dataId: number;
  key: string;
  value: string;
  unit: string | null;
}

export interface AnalysisRun {
  analysisId: number;
  sessionId: number;
  analysisType: string;
  analysisIndex: number;
  createdTime: string | null;
}

export interface AnalysisInput {
  analysisId: number;
  dataId: number;
}

export interface AnalysisFeature {
  featureId: number;
  analysisId: number;
  featureType: string;
  featureIndex: number;
}

export interface FeatureValue {
  valueId: number;
  featureId: number;
  key: string;
  value: number;
  unit: string | null;
}

// ============================================================================
// Key/value entries
// ============================================================================

/**
 * One entry of a key/value batch after normalization
 */
export type KeyValueEntry<V> =
  | { kind: 'value'; key: string; value: V }
  | { kind: 'valueWithUnit'; key: string; value: V; unit: string };

/**
 * What callers pass per key: a bare value or a [value, unit] pair
 */
export type KeyValueInput<V> = V | readonly [V, string];

export type KeyValueBatch<V> = Record<string, KeyValueInput<V>>;

export interface ValueWithUnit<V> {
  value: V;
  unit: string | null;
}

/** The same key may recur under different units */
export type KeyValueMap<V> = Map<string, ValueWithUnit<V>[]>;

export type DataInfoValue = string | number;

// ============================================================================
// Inputs
// ============================================================================

export interface DutInput {
  wafer: string;
  doe: string;
  die: number;
  cage: string;
  device: string;
}

export interface SessionInput {
  dutId: number;
  sessionName: string;
  measurementDatetime?: Date;
  operator?: string | null;
  systemVersion?: string | null;
  notes?: string | null;
}

export interface MeasurementDataInput {
  sessionId: number;
  dataType: string;
  filePath: string;
  createdTime?: Date;
}

export interface AnalysisRunInput {
  sessionId: number;
  analysisType: string;
  analysisIndex: number;
  createdTime?: Date;
}

export interface AnalysisFeatureInput {
  analysisId: number;
  featureType: string;
  featureIndex: number;
}

export interface DutFilter {
  wafer?: string;
  die?: number;
}

export interface FeatureValueSearch {
  key: string;
  minValue?: number;
  maxValue?: number;
  unit?: string;
}

// ============================================================================
// Aggregates
// ============================================================================

export interface FeatureWithValues extends AnalysisFeature {
  values: FeatureValue[];
}

export interface AnalysisRunDetail extends AnalysisRun {
  inputs: MeasurementData[];
  features: FeatureWithValues[];
}

export interface MeasurementDataDetail extends MeasurementData {
  info: DataInfo[];
}

export interface SessionFullInfo extends MeasurementSession {
  dut: Dut | undefined;
  conditions: ExperimentalCondition[];
  measurementData: MeasurementDataDetail[];
  analysisRuns: AnalysisRunDetail[];
}

export type SqlParameter = string | number | bigint | Buffer | null;

export type RawRow = Record<string, unknown>;
