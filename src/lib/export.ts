import { mkdirSync } from 'fs';
import { dirname, resolve } from 'path';
import * as XLSX from 'xlsx';
import { logger } from '../utils/logger.js';
import { ENTITY_NAMES } from './entities.js';
import type { MeasurementStore } from './measurement-store.js';

type CellValue = string | number | boolean | null;

// Excel caps sheet names at 31 characters
const MAX_SHEET_NAME = 31;

function toCell(value: unknown): CellValue {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (Buffer.isBuffer(value)) {
    return value.toString('base64');
  }
  return String(value);
}

/**
 * One sheet per entity, named after it; header row in column declaration order
 */
export function buildWorkbook(store: MeasurementStore): XLSX.WorkBook {
  const workbook = XLSX.utils.book_new();

  for (const entity of ENTITY_NAMES) {
    const columns = store.getColumns(entity).map((column) => column.name);
    const rows = store.listRows(entity).map((row) => columns.map((column) => toCell(row[column])));
    const sheet = XLSX.utils.aoa_to_sheet([columns, ...rows]);
    XLSX.utils.book_append_sheet(workbook, sheet, entity.slice(0, MAX_SHEET_NAME));
  }

  return workbook;
}

/**
 * Write every entity to an .xlsx workbook. Returns the absolute output path.
 */
export function exportWorkbook(store: MeasurementStore, outputPath: string): string {
  const absolutePath = resolve(outputPath);
  mkdirSync(dirname(absolutePath), { recursive: true });
  XLSX.writeFile(buildWorkbook(store), absolutePath);
  logger.info({ outputPath: absolutePath }, 'Workbook exported');
  return absolutePath;
}
