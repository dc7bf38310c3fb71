import { describe, expect, it, beforeEach, afterEach } from '@jest/globals';
import { mkdtempSync, mkdirSync, rmSync, statSync, writeFileSync } from 'fs';
import { basename, join } from 'path';
import { tmpdir } from 'os';

import { MeasurementDatabase } from '../../src/lib/database.js';
import { toSqlDatetime } from '../../src/lib/datetime.js';
import { ConfigurationError } from '../../src/lib/errors.js';
import {
  importMeasurementFolder,
  scanMeasurementFolder,
  type SpectrumHeaderReader,
} from '../../src/lib/ingest.js';
import { MeasurementStore } from '../../src/lib/measurement-store.js';

const GOOD_A = 'spectrum_W01_die7_C3_MRR1_25C_ch_1_2_-10dBm_pn_500mV_heat_0_mV.csv';
const GOOD_B = 'spectrum_W01_doe5_die8_C3_MRR1_40C_ch_1_2_-10dBm_pn_500mV_heat_2_mV.csv';
const BAD = 'calibration.csv';

describe('measurement folder ingestion', () => {
  let tempDir: string;
  let folder: string;
  let db: MeasurementDatabase;
  let store: MeasurementStore;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'omstore-ingest-'));
    folder = join(tempDir, '20260202');
    mkdirSync(folder);
    for (const name of [GOOD_A, GOOD_B, BAD]) {
      writeFileSync(join(folder, name), 'wavelength,intensity\n1550,-20\n');
    }
    writeFileSync(join(folder, 'readme.txt'), 'ignored');

    db = MeasurementDatabase.open(':memory:');
    db.createDatabase();
    store = new MeasurementStore(db);
  });

  afterEach(() => {
    db.close();
    rmSync(tempDir, { recursive: true, force: true });
  });

  describe('scanMeasurementFolder', () => {
    it('should split csv files into parsed and unparseable', () => {
      const scan = scanMeasurementFolder(folder);

      expect(scan.valid.map((file) => file.info.fileName)).toEqual([GOOD_A, GOOD_B]);
      expect(scan.invalid).toEqual([
        {
          file: BAD,
          reason: `Filename does not match the measurement convention: ${BAD}`,
        },
      ]);
    });

    it('should raise ConfigurationError for a missing folder', () => {
      expect(() => scanMeasurementFolder(join(tempDir, 'nope'))).toThrow(ConfigurationError);
    });
  });

  describe('importMeasurementFolder', () => {
    it('should import parsed files and skip the rest', () => {
      const progress: string[] = [];

      const result = importMeasurementFolder(store, folder, {
        defaultDoe: 'DOE0',
        onProgress: (message) => progress.push(message),
      });

      expect(result.imported).toBe(2);
      expect(result.skipped.map((entry) => entry.file)).toEqual([BAD]);
      expect(progress).toEqual([
        `Skipped ${BAD}: Filename does not match the measurement convention: ${BAD}`,
        `Imported ${GOOD_A}`,
        `Imported ${GOOD_B}`,
      ]);
      expect(result.stats).toEqual({
        DUT: 2,
        MeasurementSessions: 2,
        ExperimentalConditions: 8,
        MeasurementData: 2,
        DataInfo: 4,
        AnalysisRuns: 0,
        AnalysisInputs: 0,
        AnalysisFeatures: 0,
        FeatureValues: 0,
      });
    });

    it('should map filename attributes onto rows', () => {
      importMeasurementFolder(store, folder, { defaultDoe: 'DOE0', operator: 'tester' });

      const duts = store.getDuts({ wafer: 'W01' });
      expect(duts.map((dut) => [dut.doe, dut.die])).toEqual([
        ['DOE0', 7],
        ['doe5', 8],
      ]);

      const [session] = store.getSessionsByDut(duts[0]?.dutId ?? 0);
      expect(session?.sessionName).toBe('20260202_25C_ch_1_2_-10dBm_pn_500mV_heat_0_mV');
      expect(session?.operator).toBe('tester');
      expect(session?.measurementDatetime).toBe(toSqlDatetime(statSync(folder).mtime));

      const sessionId = session?.sessionId ?? 0;
      expect(
        store.getConditionsBySession(sessionId).map(({ key, value, unit }) => [key, value, unit])
      ).toEqual([
        ['temperature', 25, '°C'],
        ['power', -10, 'dBm'],
        ['drive_voltage', 500, 'mV'],
        ['heater_voltage', 0, 'mV'],
      ]);

      const [data] = store.getMeasurementDataBySession(sessionId);
      expect(data?.dataType).toBe('spectrum');
      expect(data?.filePath).toBe(join(folder, GOOD_A));
      expect(data?.createdTime).toBe(toSqlDatetime(statSync(join(folder, GOOD_A)).mtime));
      expect(store.getDataInfoByData(data?.dataId ?? 0).map(({ key, value }) => [key, value])).toEqual(
        [
          ['channel_in', '1'],
          ['channel_out', '2'],
        ]
      );
    });

    it('should leave every count unchanged on a rerun', () => {
      const first = importMeasurementFolder(store, folder);
      const second = importMeasurementFolder(store, folder);

      expect(second.imported).toBe(2);
      expect(second.stats).toEqual(first.stats);
    });

    it('should keep each file of a heater sweep under its own conditions', () => {
      const sweep = join(tempDir, 'sweep');
      mkdirSync(sweep);
      const heat0 = 'spectrum_W01_die7_C3_MRR1_25C_ch_1_2_-10dBm_pn_500mV_heat_0_mV.csv';
      const heat200 = 'spectrum_W01_die7_C3_MRR1_25C_ch_1_2_-10dBm_pn_500mV_heat_200_mV.csv';
      for (const name of [heat0, heat200]) {
        writeFileSync(join(sweep, name), 'wavelength,intensity\n');
      }

      const first = importMeasurementFolder(store, sweep);
      const second = importMeasurementFolder(store, sweep);

      expect(first.imported).toBe(2);
      expect(first.stats.DUT).toBe(1);
      expect(first.stats.MeasurementSessions).toBe(2);
      expect(first.stats.ExperimentalConditions).toBe(8);
      expect(second.stats).toEqual(first.stats);

      const dutId = store.getDuts()[0]?.dutId ?? 0;
      const sessions = store.getSessionsByDut(dutId).map((session) => [
        session.sessionName,
        store.getConditionsMap(session.sessionId).get('heater_voltage'),
        store.getMeasurementDataBySession(session.sessionId).map((data) => basename(data.filePath)),
      ]);
      expect(sessions).toEqual([
        [
          'sweep_25C_ch_1_2_-10dBm_pn_500mV_heat_200_mV',
          [{ value: 200, unit: 'mV' }],
          [heat200],
        ],
        ['sweep_25C_ch_1_2_-10dBm_pn_500mV_heat_0_mV', [{ value: 0, unit: 'mV' }], [heat0]],
      ]);
    });

    it('should store header metadata and skip files whose header fails', () => {
      const reader: SpectrumHeaderReader = {
        readHeader: (_filePath, info) => {
          if (info.die === 8) {
            throw new Error('truncated header');
          }
          return { points: 1001, instrument: 'OSA-1' };
        },
      };

      const result = importMeasurementFolder(store, folder, { headerReader: reader });

      expect(result.imported).toBe(1);
      expect(result.skipped).toEqual([
        {
          file: BAD,
          reason: `Filename does not match the measurement convention: ${BAD}`,
        },
        { file: GOOD_B, reason: `Unable to read ${GOOD_B}: truncated header` },
      ]);
      expect(result.stats.DataInfo).toBe(4);
      expect(result.stats.DUT).toBe(1);
    });
  });
});
