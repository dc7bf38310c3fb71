import { existsSync, readdirSync, statSync } from 'fs';
import { basename, extname, join, resolve } from 'path';
import { config } from '../utils/config.js';
import { logger } from '../utils/logger.js';
import type { EntityName } from './entities.js';
import { ConfigurationError, ParseError, ValidationError } from './errors.js';
import {
  FILENAME_UNITS,
  parseMeasurementFilename,
  type MeasurementFileInfo,
} from './filename-parser.js';
import type { MeasurementStore } from './measurement-store.js';
import type { DataInfoValue, KeyValueBatch } from './types.js';

/**
 * Contract of the external spectral-file parser: extra metadata read from
 * the file content, stored as DataInfo of the file's MeasurementData row
 */
export interface SpectrumHeaderReader {
  readHeader(filePath: string, info: MeasurementFileInfo): KeyValueBatch<DataInfoValue>;
}

export interface ImportOptions {
  /** Prefix of every session name; defaults to the folder name */
  sessionPrefix?: string;
  operator?: string;
  systemVersion?: string;
  notes?: string;
  defaultDoe?: string;
  headerReader?: SpectrumHeaderReader;
  onProgress?: (message: string) => void;
}

export interface SkippedFile {
  file: string;
  reason: string;
}

export interface ParsedFile {
  filePath: string;
  info: MeasurementFileInfo;
}

export interface FolderScan {
  valid: ParsedFile[];
  invalid: SkippedFile[];
}

export interface ImportResult {
  imported: number;
  skipped: SkippedFile[];
  stats: Record<EntityName, number>;
}

/**
 * List measurement files directly inside `folder` and parse their names
 */
export function scanMeasurementFolder(folder: string): FolderScan {
  const absolutePath = resolve(folder);

  if (!existsSync(absolutePath) || !statSync(absolutePath).isDirectory()) {
    throw new ConfigurationError(`Folder does not exist: ${absolutePath}`);
  }

  const extensions: readonly string[] = config.measurementExtensions;
  const fileNames = readdirSync(absolutePath, { withFileTypes: true })
    .filter((entry) => entry.isFile() && extensions.includes(extname(entry.name).toLowerCase()))
    .map((entry) => entry.name)
    .sort();

  const scan: FolderScan = { valid: [], invalid: [] };
  for (const fileName of fileNames) {
    try {
      scan.valid.push({
        filePath: join(absolutePath, fileName),
        info: parseMeasurementFilename(fileName),
      });
    } catch (error) {
      if (!(error instanceof ParseError)) {
        throw error;
      }
      scan.invalid.push({ file: fileName, reason: error.message });
    }
  }

  return scan;
}

interface SessionContext {
  sessionPrefix: string;
  measuredAt: Date;
  operator: string;
  systemVersion: string;
  notes: string;
  defaultDoe: string;
}

/**
 * One session per DUT and measurement setting. Files of a sweep that differ
 * only in power, bias or heater voltage land in separate sessions.
 */
export function sessionNameFor(prefix: string, info: MeasurementFileInfo): string {
  return `${prefix}_${info.conditions}`;
}

// fs.Stats dates belong to Node's own realm; rebuild them from epoch millis
function modifiedAt(path: string): Date {
  return new Date(statSync(path).mtimeMs);
}

function importFile(
  store: MeasurementStore,
  file: ParsedFile,
  context: SessionContext,
  extraInfo: KeyValueBatch<DataInfoValue>
): void {
  const { info } = file;

  store.transaction(() => {
    const dutId = store.insertDut({
      wafer: info.wafer,
      doe: info.doe ?? context.defaultDoe,
      die: info.die,
      cage: info.cage,
      device: info.device,
    });

    const sessionId = store.insertSession({
      dutId,
      sessionName: sessionNameFor(context.sessionPrefix, info),
      measurementDatetime: context.measuredAt,
      operator: context.operator,
      systemVersion: context.systemVersion,
      notes: context.notes,
    });

    store.insertExperimentalConditions(sessionId, {
      temperature: [info.temperature, FILENAME_UNITS.temperature],
      power: [info.power, FILENAME_UNITS.power],
      drive_voltage: [info.driveVoltage, FILENAME_UNITS.driveVoltage],
      heater_voltage: [info.heaterVoltage, FILENAME_UNITS.heaterVoltage],
    });

    const dataId = store.insertMeasurementData({
      sessionId,
      dataType: info.dataType,
      filePath: file.filePath,
      createdTime: modifiedAt(file.filePath),
    });

    store.insertDataInfo(dataId, {
      channel_in: info.channelIn,
      channel_out: info.channelOut,
      ...extraInfo,
    });
  });
}

function readExtraInfo(
  reader: SpectrumHeaderReader | undefined,
  file: ParsedFile
): KeyValueBatch<DataInfoValue> {
  if (!reader) {
    return {};
  }
  try {
    return reader.readHeader(file.filePath, file.info);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ParseError(`Unable to read ${file.info.fileName}: ${message}`, file.info.fileName, {
      cause: error,
    });
  }
}

/**
 * Import every measurement file of a folder. Files whose name or content
 * does not parse are skipped and reported; rerunning the same folder adds
 * no rows.
 */
export function importMeasurementFolder(
  store: MeasurementStore,
  folder: string,
  options: ImportOptions = {}
): ImportResult {
  const absolutePath = resolve(folder);
  const scan = scanMeasurementFolder(absolutePath);

  const context: SessionContext = {
    sessionPrefix: options.sessionPrefix ?? basename(absolutePath),
    measuredAt: modifiedAt(absolutePath),
    operator: options.operator ?? config.operator,
    systemVersion: options.systemVersion ?? config.systemVersion,
    notes: options.notes ?? '',
    defaultDoe: options.defaultDoe ?? config.defaultDoe,
  };

  const skipped: SkippedFile[] = [];
  const skip = (entry: SkippedFile): void => {
    skipped.push(entry);
    logger.warn({ file: entry.file, reason: entry.reason }, 'Skipped measurement file');
    options.onProgress?.(`Skipped ${entry.file}: ${entry.reason}`);
  };

  scan.invalid.forEach(skip);

  let imported = 0;
  for (const file of scan.valid) {
    try {
      importFile(store, file, context, readExtraInfo(options.headerReader, file));
      imported++;
      options.onProgress?.(`Imported ${file.info.fileName}`);
    } catch (error) {
      if (error instanceof ParseError || error instanceof ValidationError) {
        skip({ file: file.info.fileName, reason: error.message });
        continue;
      }
      throw error;
    }
  }

  const stats = store.getDatabaseStats();
  logger.info(
    { folder: absolutePath, imported, skipped: skipped.length, stats },
    'Measurement folder imported'
  );

  return { imported, skipped, stats };
}
