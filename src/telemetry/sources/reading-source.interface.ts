import { Reading } from '../models/reading.model';

/**
 * Producer of telemetry readings, consumed one reading at a time
 */
export interface IReadingSource {
  /**
   * Human-readable description used in logs
   */
  readonly description: string;

  readings(): AsyncIterable<Reading>;
}
