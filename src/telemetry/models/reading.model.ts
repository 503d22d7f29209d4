/**
 * Interface for a single telemetry sample of the solar array
 * Immutable once created
 */
export interface Reading {
  readonly timestamp: Date;
  readonly powerProduced: number; // W
  readonly powerConsumed: number; // W
  readonly batterySoc: number; // %
  readonly irradiance: number; // W/m²
  readonly temperature: number; // °C
  readonly panelVoltage: number; // V
  readonly panelCurrent: number; // A
}

export type ReadingMeasurement = Exclude<keyof Reading, 'timestamp'>;

/**
 * Reading values as supplied by a source; the timestamp is optional
 */
export type ReadingInput = Omit<Reading, 'timestamp'> & { timestamp?: Date };

/**
 * Measurement fields in entry order, with the labels shown to the operator
 */
export const READING_FIELDS: ReadonlyArray<{ key: ReadingMeasurement; label: string }> = [
  { key: 'powerProduced', label: 'Power Produced (W)' },
  { key: 'powerConsumed', label: 'Power Consumed (W)' },
  { key: 'batterySoc', label: 'Battery SOC (%)' },
  { key: 'irradiance', label: 'Irradiance (W/m^2)' },
  { key: 'temperature', label: 'Temperature (°C)' },
  { key: 'panelVoltage', label: 'Panel Voltage (V)' },
  { key: 'panelCurrent', label: 'Panel Current (A)' }
];

/**
 * Builds an immutable reading, stamping it with `now` when the input has no timestamp
 */
export function createReading(input: ReadingInput, now: Date = new Date()): Reading {
  return Object.freeze({
    timestamp: new Date((input.timestamp ?? now).getTime()),
    powerProduced: input.powerProduced,
    powerConsumed: input.powerConsumed,
    batterySoc: input.batterySoc,
    irradiance: input.irradiance,
    temperature: input.temperature,
    panelVoltage: input.panelVoltage,
    panelCurrent: input.panelCurrent
  });
}
