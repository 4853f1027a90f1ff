/**
 * Tabular layouts — one strict schema per sheet.
 *
 * Cells arrive as strings. Required columns must be present and well-formed;
 * optional columns may be missing entirely or left blank. A row that fails is
 * reported as a ValidationError by the reader and skipped.
 */
import { z } from 'zod';
import { ValidationError } from '../errors.js';
import type { TabularRow } from './collaborators.js';

// ---------------------------------------------------------------------------
// Headers — writers always emit exactly these, in this order
// ---------------------------------------------------------------------------

export const REGISTRY_HEADER = ['DriveName', 'DriveID', 'IsFull', 'LastUpdated'] as const;

export const OVERSIZED_HEADER = [
  'UserEmail',
  'FileCount',
  'EstimatedCopyTimeMin',
  'RotationTime',
  'SuspendedSince',
  'Classification',
] as const;

export const ELIGIBLE_HEADER = [...OVERSIZED_HEADER, 'Deferred'] as const;

// ---------------------------------------------------------------------------
// Cell schemas
// ---------------------------------------------------------------------------

const blankToUndefined = (value: unknown): unknown =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const textCell = z.string().trim().min(1, 'must not be empty');

const emailCell = z
  .string()
  .trim()
  .toLowerCase()
  .regex(/^[^@\s]+@[^@\s]+$/, 'must be an email address');

const countCell = z
  .string()
  .trim()
  .regex(/^\d+$/, 'must be a non-negative integer')
  .transform((s) => Number(s));

const booleanCell = z.preprocess(
  (value) => (typeof value === 'string' ? value.trim().toUpperCase() : value),
  z.enum(['TRUE', 'FALSE']).transform((s) => s === 'TRUE'),
);

const dateCell = z
  .string()
  .trim()
  .min(1, 'must not be empty')
  .transform((s, ctx) => {
    const date = new Date(s);
    if (Number.isNaN(date.getTime())) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `"${s}" is not a date` });
      return z.NEVER;
    }
    return date;
  });

const classificationCell = z.preprocess(
  (value) => (typeof value === 'string' ? value.trim().toLowerCase() : value),
  z.enum(['deferred', 'manual']),
);

function optional<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess(blankToUndefined, schema.optional());
}

// ---------------------------------------------------------------------------
// Row schemas
// ---------------------------------------------------------------------------

export const RegistryRowSchema = z.object({
  DriveName: textCell,
  DriveID: textCell,
  IsFull: booleanCell,
  LastUpdated: optional(dateCell),
});

export const CandidateRowSchema = z.object({
  UserEmail: emailCell,
  FileCount: countCell,
  SuspendedSince: dateCell,
});

export const OversizedRowSchema = z.object({
  UserEmail: emailCell,
  FileCount: countCell,
  EstimatedCopyTimeMin: countCell,
  RotationTime: optional(dateCell),
  SuspendedSince: optional(dateCell),
  Classification: optional(classificationCell),
});

export const EligibleRowSchema = OversizedRowSchema.extend({
  Deferred: booleanCell,
});

export type RegistryRow = z.infer<typeof RegistryRowSchema>;
export type CandidateRow = z.infer<typeof CandidateRowSchema>;
export type OversizedRow = z.infer<typeof OversizedRowSchema>;
export type EligibleRow = z.infer<typeof EligibleRowSchema>;

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

/**
 * Parse one row against a layout schema.
 * @throws ValidationError naming the first failing column
 */
export function parseRow<S extends z.ZodTypeAny>(
  schema: S,
  row: TabularRow,
  location: { sheet: string; index: number },
): z.infer<S> {
  const result = schema.safeParse(row);
  if (result.success) return result.data;

  const issue = result.error.issues[0];
  const field = issue?.path.join('.') || 'row';
  const reason = issue?.message ?? 'invalid row';
  throw new ValidationError(
    `${location.sheet} row ${location.index + 1}: ${field} ${reason}`,
    field,
    { sheet: location.sheet, row: location.index + 1 },
  );
}

export function formatBoolean(value: boolean): string {
  return value ? 'TRUE' : 'FALSE';
}

export function formatTimestamp(value: Date): string {
  return value.toISOString();
}
