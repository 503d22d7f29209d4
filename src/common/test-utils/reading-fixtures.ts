import { Reading, ReadingInput, createReading } from '../../telemetry/models/reading.model';

export const BASE_TIME = new Date('2026-03-01T00:00:00.000Z');

export const HOUR_MS = 60 * 60 * 1000;
export const DAY_MS = 24 * HOUR_MS;

/**
 * Time offset from BASE_TIME
 */
export const hoursAfterBase = (hours: number): Date => new Date(BASE_TIME.getTime() + hours * HOUR_MS);

/**
 * Reading at full irradiance producing 210 W (efficiency 0.7 on a 300 W panel)
 */
export const makeReading = (overrides: Partial<ReadingInput> = {}): Reading =>
  createReading({
    timestamp: BASE_TIME,
    powerProduced: 210,
    powerConsumed: 120,
    batterySoc: 80,
    irradiance: 1000,
    temperature: 25,
    panelVoltage: 30,
    panelCurrent: 7,
    ...overrides,
  });

/**
 * 29 hourly readings at efficiency 0.7 followed by one at 0.5
 */
export const degradationScenario = (): Reading[] => [
  ...Array.from({ length: 29 }, (_, i) => makeReading({ timestamp: hoursAfterBase(i) })),
  makeReading({ timestamp: hoursAfterBase(29), powerProduced: 150 }),
];

export async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of iterable) {
    items.push(item);
  }
  return items;
}
