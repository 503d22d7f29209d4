/**
 * In-memory implementation of the reading log
 * Non-durable; contents live as long as the process
 * Readings are copied on the way in and out, so callers never hold a stored timestamp
 */

import { Injectable } from '@nestjs/common';
import { Reading, createReading } from '../../../telemetry/models/reading.model';
import { IReadingDatabase } from '../interfaces/reading-database.interface';

@Injectable()
export class ReadingMemoryService implements IReadingDatabase {
  private readonly readings: Reading[] = [];

  public async saveReading(reading: Reading): Promise<void> {
    this.readings.push(createReading(reading));
  }

  public async getReadingsByDateRange(startDate: Date, endDate: Date): Promise<Reading[]> {
    const start = startDate.getTime();
    const end = endDate.getTime();
    return this.readings
      .filter(reading => {
        const time = reading.timestamp.getTime();
        return time >= start && time <= end;
      })
      .map(reading => createReading(reading));
  }
}
