/**
 * Interface for telemetry reading storage
 * Provides database-agnostic methods for the append-only reading log
 */

import { Reading } from '../../../telemetry/models/reading.model';

export interface IReadingDatabase {
  /**
   * Appends a reading; no deduplication and no plausibility checks
   * @param {Reading} reading - Reading to append
   */
  saveReading(reading: Reading): Promise<void>;

  /**
   * Retrieves every reading with startDate <= timestamp <= endDate, in insertion order
   * @param {Date} startDate - Inclusive lower bound
   * @param {Date} endDate - Inclusive upper bound
   * @returns {Promise<Reading[]>} Matching readings
   */
  getReadingsByDateRange(startDate: Date, endDate: Date): Promise<Reading[]>;
}
