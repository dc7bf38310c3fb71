import type { MeasurementStore } from './measurement-store.js';
import type { KeyValueBatch } from './types.js';

/**
 * One (wavelength, intensity) sample produced by the spectral-file parser
 */
export interface SpectrumSample {
  wavelength: number;
  intensity: number;
}

/**
 * A peak or valley reported by a feature detector, with its computed metrics
 */
export interface DetectedFeature {
  /** 'peak', 'valley' */
  featureType: string;
  featureIndex: number;
  values: KeyValueBatch<number>;
}

/**
 * Contract of the external peak/valley detection algorithm
 */
export interface FeatureDetector {
  detect(spectrum: SpectrumSample[]): DetectedFeature[];
}

export interface AnalysisRecord {
  sessionId: number;
  analysisType: string;
  analysisIndex: number;
  inputDataIds: number[];
  features: DetectedFeature[];
  createdTime?: Date;
}

export interface RecordedAnalysis {
  analysisId: number;
  featureIds: number[];
}

/**
 * Persist a run, its lineage edges, and every detected feature with its
 * values, all or nothing.
 */
export function recordAnalysis(store: MeasurementStore, record: AnalysisRecord): RecordedAnalysis {
  return store.transaction(() => {
    const analysisId = store.insertAnalysisRun({
      sessionId: record.sessionId,
      analysisType: record.analysisType,
      analysisIndex: record.analysisIndex,
      createdTime: record.createdTime,
    });

    store.insertAnalysisInputs(analysisId, record.inputDataIds);

    const featureIds = record.features.map((feature) => {
      const featureId = store.insertAnalysisFeature({
        analysisId,
        featureType: feature.featureType,
        featureIndex: feature.featureIndex,
      });
      store.insertFeatureValues(featureId, feature.values);
      return featureId;
    });

    return { analysisId, featureIds };
  });
}

/**
 * One past the highest stored index for this session and analysis type
 */
export function nextAnalysisIndex(
  store: MeasurementStore,
  sessionId: number,
  analysisType: string
): number {
  const runs = store.getAnalysisRunsBySession(sessionId, analysisType);
  return runs.reduce((next, run) => Math.max(next, run.analysisIndex + 1), 0);
}
