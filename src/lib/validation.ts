import { z } from 'zod';
import { ValidationError } from './errors.js';
import type { KeyValueEntry } from './types.js';

const requiredText = z.string().min(1);
const rowId = z.number().int().positive();
const optionalText = z.string().nullable().optional();

export const dutSchema = z.object({
  wafer: requiredText,
  doe: requiredText,
  die: z.number().int(),
  cage: requiredText,
  device: requiredText,
});

export const sessionSchema = z.object({
  dutId: rowId,
  sessionName: requiredText,
  measurementDatetime: z.date().optional(),
  operator: optionalText,
  systemVersion: optionalText,
  notes: optionalText,
});

export const measurementDataSchema = z.object({
  sessionId: rowId,
  dataType: requiredText,
  filePath: requiredText,
  createdTime: z.date().optional(),
});

export const analysisRunSchema = z.object({
  sessionId: rowId,
  analysisType: requiredText,
  analysisIndex: z.number().int().nonnegative(),
  createdTime: z.date().optional(),
});

export const analysisFeatureSchema = z.object({
  analysisId: rowId,
  featureType: requiredText,
  featureIndex: z.number().int().nonnegative(),
});

export const analysisInputSchema = z.object({
  analysisId: rowId,
  dataIds: z.array(rowId),
});

export const numericValueSchema = z.number().finite();
export const dataInfoValueSchema = z.union([z.string(), z.number().finite()]);

export const featureSearchSchema = z.object({
  key: requiredText,
  minValue: z.number().finite().optional(),
  maxValue: z.number().finite().optional(),
  unit: z.string().optional(),
});

export { rowId as rowIdSchema };

/**
 * Parse `input` or throw a ValidationError listing every failing field
 */
export function parseInput<S extends z.ZodTypeAny>(
  schema: S,
  input: unknown,
  label: string
): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      path: issue.path.join('.') || label,
      message: issue.message,
    }));
    throw new ValidationError(
      `Invalid ${label}: ${issues.map((i) => `${i.path} ${i.message}`).join('; ')}`,
      issues
    );
  }
  return result.data;
}

/**
 * Normalize a `{ key: value | [value, unit] }` batch into tagged entries
 */
export function normalizeKeyValues<V>(
  batch: unknown,
  valueSchema: z.ZodType<V>,
  label: string
): KeyValueEntry<V>[] {
  const entrySchema = z.union([valueSchema, z.tuple([valueSchema, z.string()])]);
  const parsed = parseInput(z.record(requiredText, entrySchema), batch, label);

  return Object.entries(parsed).map(([key, entry]): KeyValueEntry<V> => {
    if (Array.isArray(entry)) {
      const [value, unit] = entry;
      return { kind: 'valueWithUnit', key, value, unit };
    }
    return { kind: 'value', key, value: entry };
  });
}

export function unitOf<V>(entry: KeyValueEntry<V>): string | null {
  return entry.kind === 'valueWithUnit' ? entry.unit : null;
}
