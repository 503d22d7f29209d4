import { Inject, Injectable } from '@nestjs/common';
import dayjs from 'dayjs';
import { Reading } from './models/reading.model';
import { IReadingDatabase } from '../common/database/interfaces/reading-database.interface';
import { DATABASE_TOKENS } from '../common/database/database.constants';
import { LoggingService } from '../common/logging.service';

/**
 * Append-only log of telemetry readings (database-agnostic)
 *
 * Stores every reading as given: no deduplication and no plausibility checks.
 * Range queries return readings in insertion order, which is only timestamp
 * order when readings arrive in order.
 */
@Injectable()
export class ReadingStoreService {
  private readonly context = ReadingStoreService.name;

  constructor(
    @Inject(DATABASE_TOKENS.READING_DATABASE) private readonly database: IReadingDatabase,
    @Inject(LoggingService) private readonly logger: LoggingService
  ) {}

  /**
   * Appends a reading to the log
   * @param {Reading} reading - Reading to store
   */
  public async store(reading: Reading): Promise<void> {
    await this.database.saveReading(reading);
    this.logger.log(`Stored reading at ${dayjs(reading.timestamp).format('YYYY-MM-DD HH:mm:ss')}`, this.context);
  }

  /**
   * Retrieves readings with start <= timestamp <= end
   * @param {Date} start - Inclusive lower bound
   * @param {Date} end - Inclusive upper bound
   * @returns {Promise<Reading[]>} Matching readings in insertion order
   */
  public async query(start: Date, end: Date): Promise<Reading[]> {
    return await this.database.getReadingsByDateRange(start, end);
  }
}
