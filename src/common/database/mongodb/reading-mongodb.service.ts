/**
 * MongoDB implementation for the telemetry reading log
 */

import { Inject, Injectable } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { Model } from 'mongoose';
import { ReadingRecord, ReadingRecordDocument } from '../../../telemetry/schemas/reading.schema';
import { Reading, createReading } from '../../../telemetry/models/reading.model';
import { IReadingDatabase } from '../interfaces/reading-database.interface';
import { LoggingService } from '../../logging.service';

@Injectable()
export class ReadingMongoDBService implements IReadingDatabase {
  private readonly context = ReadingMongoDBService.name;

  constructor(
    @InjectModel(ReadingRecord.name)
    private readonly readingModel: Model<ReadingRecordDocument>,
    @Inject(LoggingService) private readonly logger: LoggingService
  ) {}

  /**
   * Saves a reading to MongoDB
   * @param {Reading} reading - Reading to append
   */
  public async saveReading(reading: Reading): Promise<void> {
    try {
      await this.readingModel.create({
        timestamp: reading.timestamp,
        powerProduced: reading.powerProduced,
        powerConsumed: reading.powerConsumed,
        batterySoc: reading.batterySoc,
        irradiance: reading.irradiance,
        temperature: reading.temperature,
        panelVoltage: reading.panelVoltage,
        panelCurrent: reading.panelCurrent
      });
    } catch (error) {
      this.logger.error('Failed to save reading', error, this.context);
      throw error;
    }
  }

  /**
   * Retrieves readings within an inclusive time range, in insertion order
   * @param {Date} startDate - Inclusive lower bound
   * @param {Date} endDate - Inclusive upper bound
   * @returns {Promise<Reading[]>} Matching readings
   */
  public async getReadingsByDateRange(startDate: Date, endDate: Date): Promise<Reading[]> {
    try {
      const records = await this.readingModel
        .find({
          timestamp: {
            $gte: startDate,
            $lte: endDate
          }
        })
        .sort({ _id: 1 })
        .lean<ReadingRecord[]>()
        .exec();

      return records.map(record => createReading(record));
    } catch (error) {
      this.logger.error('Failed to retrieve readings by date range', error, this.context);
      throw error;
    }
  }
}
