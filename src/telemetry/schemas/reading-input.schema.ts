import { z } from 'zod';
import { TelemetryValidationError } from '../../common/errors/monitor-errors';
import { ReadingInput } from '../models/reading.model';

const DECIMAL_PATTERN = /^[-+]?(\d+\.?\d*|\.\d+)(e[-+]?\d+)?$/i;

const blankToUndefined = (value: unknown): unknown =>
  value === null || (typeof value === 'string' && value.trim() === '') ? undefined : value;

/**
 * Turns decimal strings into numbers; anything else is left for the number schema to reject
 */
const decimalStringToNumber = (value: unknown): unknown => {
  const blankChecked = blankToUndefined(value);
  if (typeof blankChecked !== 'string') {
    return blankChecked;
  }
  const trimmed = blankChecked.trim();
  return DECIMAL_PATTERN.test(trimmed) ? Number(trimmed) : blankChecked;
};

/**
 * A single numeric measurement; accepts numbers and decimal strings (CSV cells, prompt answers)
 */
export const measurementSchema = z.preprocess(decimalStringToNumber, z.number().finite());

export const readingCountSchema = z.preprocess(decimalStringToNumber, z.number().int().nonnegative());

export const readingInputSchema = z.object({
  timestamp: z.preprocess(blankToUndefined, z.coerce.date().optional()),
  powerProduced: measurementSchema,
  powerConsumed: measurementSchema,
  batterySoc: measurementSchema,
  irradiance: measurementSchema,
  temperature: measurementSchema,
  panelVoltage: measurementSchema,
  panelCurrent: measurementSchema
});

/**
 * Validates a raw telemetry record
 * @param {unknown} raw - Parsed JSON object, CSV row or collected prompt answers
 * @param {string} label - Position of the record, used in the error message
 * @throws {TelemetryValidationError} When any measurement is missing or not a finite number
 */
export function parseReadingInput(raw: unknown, label: string): ReadingInput {
  const result = readingInputSchema.safeParse(raw);
  if (!result.success) {
    throw new TelemetryValidationError(
      `Invalid telemetry ${label}`,
      result.error.issues.map(issue => `${issue.path.join('.') || 'record'}: ${issue.message}`)
    );
  }
  return result.data;
}
