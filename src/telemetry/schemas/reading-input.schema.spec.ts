import { measurementSchema, parseReadingInput, readingCountSchema } from './reading-input.schema';
import { TelemetryValidationError } from '../../common/errors/monitor-errors';

const validRecord = {
  powerProduced: '210',
  powerConsumed: 120,
  batterySoc: '80',
  irradiance: 1000,
  temperature: '25.5',
  panelVoltage: 30,
  panelCurrent: '7',
};

describe('reading input schema', () => {
  describe('measurementSchema', () => {
    it('should accept numbers and numeric strings', () => {
      expect(measurementSchema.parse(12.5)).toBe(12.5);
      expect(measurementSchema.parse(' -3 ')).toBe(-3);
    });

    it.each(['', '   ', 'abc', null, 'Infinity', '1e999'])('should reject %p', value => {
      expect(measurementSchema.safeParse(value).success).toBe(false);
    });

    it.each([true, false, [], [75], '0x3E8', {}])('should reject the non-numeric value %p', value => {
      expect(measurementSchema.safeParse(value).success).toBe(false);
    });

    it('should accept decimal strings with an exponent', () => {
      expect(measurementSchema.parse('1.5e3')).toBe(1500);
      expect(measurementSchema.parse('.5')).toBe(0.5);
    });
  });

  describe('readingCountSchema', () => {
    it('should accept whole non-negative counts', () => {
      expect(readingCountSchema.parse('3')).toBe(3);
      expect(readingCountSchema.parse(0)).toBe(0);
    });

    it.each(['-1', '2.5', 'two', ''])('should reject %p', value => {
      expect(readingCountSchema.safeParse(value).success).toBe(false);
    });
  });

  describe('parseReadingInput', () => {
    it('should coerce every measurement and leave the timestamp out when absent', () => {
      expect(parseReadingInput(validRecord, 'record #1')).toEqual({
        powerProduced: 210,
        powerConsumed: 120,
        batterySoc: 80,
        irradiance: 1000,
        temperature: 25.5,
        panelVoltage: 30,
        panelCurrent: 7,
      });
    });

    it('should parse an ISO timestamp', () => {
      const input = parseReadingInput({ ...validRecord, timestamp: '2026-03-01T12:00:00.000Z' }, 'record #1');

      expect(input.timestamp).toEqual(new Date('2026-03-01T12:00:00.000Z'));
    });

    it('should treat a blank timestamp as absent', () => {
      expect(parseReadingInput({ ...validRecord, timestamp: '' }, 'record #1').timestamp).toBeUndefined();
    });

    it('should list every invalid field in the error', () => {
      const attempt = () =>
        parseReadingInput({ ...validRecord, irradiance: 'bright', temperature: '1e999' }, 'record #2 in day.csv');

      expect(attempt).toThrow(TelemetryValidationError);
      expect(attempt).toThrow(
        'Invalid telemetry record #2 in day.csv: irradiance: Expected number, received string; temperature: Number must be finite',
      );
    });

    it('should reject JSON values that only convert to numbers', () => {
      const attempt = () =>
        parseReadingInput(
          { ...validRecord, powerProduced: [], powerConsumed: true, batterySoc: false, irradiance: '0x3E8', temperature: [75] },
          'record #1 in day.json',
        );

      expect(attempt).toThrow(
        new TelemetryValidationError('Invalid telemetry record #1 in day.json', [
          'powerProduced: Expected number, received array',
          'powerConsumed: Expected number, received boolean',
          'batterySoc: Expected number, received boolean',
          'irradiance: Expected number, received string',
          'temperature: Expected number, received array',
        ]),
      );
    });

    it('should report a missing field by name', () => {
      const incomplete: Record<string, unknown> = { ...validRecord };
      delete incomplete.panelCurrent;

      expect(() => parseReadingInput(incomplete, 'reading #1')).toThrow(
        new TelemetryValidationError('Invalid telemetry reading #1', ['panelCurrent: Required']),
      );
    });
  });
});
