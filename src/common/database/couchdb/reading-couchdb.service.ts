/**
 * CouchDB implementation for the telemetry reading log
 * Insertion order is kept through a monotonically increasing `sequence` field
 */

import { Inject, Injectable, OnModuleInit } from '@nestjs/common';
import Nano from 'nano';
import { Reading, createReading } from '../../../telemetry/models/reading.model';
import { IReadingDatabase } from '../interfaces/reading-database.interface';
import { DATABASE_TOKENS } from '../database.constants';
import { LoggingService } from '../../logging.service';

interface ReadingDocument {
  _id?: string;
  _rev?: string;
  type: 'solar-reading';
  sequence: number;
  timestamp: string;
  powerProduced: number;
  powerConsumed: number;
  batterySoc: number;
  irradiance: number;
  temperature: number;
  panelVoltage: number;
  panelCurrent: number;
}

const PAGE_SIZE = 500;

@Injectable()
export class ReadingCouchDBService implements IReadingDatabase, OnModuleInit {
  private readonly context = ReadingCouchDBService.name;
  private readonly db: Nano.DocumentScope<ReadingDocument>;
  private sequence = Date.now() * 1000;

  constructor(
    @Inject(LoggingService) private readonly logger: LoggingService,
    @Inject(DATABASE_TOKENS.COUCHDB_CONNECTION) private readonly nano: Nano.ServerScope
  ) {
    this.db = this.nano.use<ReadingDocument>('solar_readings');
  }

  /**
   * Ensures the index used to sort range queries by insertion order
   */
  public async onModuleInit(): Promise<void> {
    try {
      await this.db.createIndex({
        index: { fields: ['type', 'sequence'] },
        name: 'reading-sequence'
      });
    } catch (error) {
      this.logger.error('Failed to create reading index', error, this.context);
      throw error;
    }
  }

  /**
   * Saves a reading to CouchDB
   * @param {Reading} reading - Reading to append
   */
  public async saveReading(reading: Reading): Promise<void> {
    const sequence = this.sequence++;
    const doc: ReadingDocument = {
      _id: `reading-${sequence}`,
      type: 'solar-reading',
      sequence,
      timestamp: reading.timestamp.toISOString(),
      powerProduced: reading.powerProduced,
      powerConsumed: reading.powerConsumed,
      batterySoc: reading.batterySoc,
      irradiance: reading.irradiance,
      temperature: reading.temperature,
      panelVoltage: reading.panelVoltage,
      panelCurrent: reading.panelCurrent
    };

    try {
      const response = await this.db.insert(doc);
      this.logger.debug(`Saved reading: ${response.id}`, this.context);
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
    const selector = {
      type: 'solar-reading',
      timestamp: {
        $gte: startDate.toISOString(),
        $lte: endDate.toISOString()
      }
    };

    try {
      const readings: Reading[] = [];
      let bookmark: string | undefined;

      for (;;) {
        const response = await this.db.find({
          selector,
          sort: [{ type: 'asc' }, { sequence: 'asc' }],
          limit: PAGE_SIZE,
          bookmark
        });

        readings.push(...response.docs.map(doc => createReading({ ...doc, timestamp: new Date(doc.timestamp) })));

        if (response.docs.length < PAGE_SIZE) {
          return readings;
        }
        bookmark = response.bookmark;
      }
    } catch (error) {
      this.logger.error('Failed to retrieve readings by date range', error, this.context);
      throw error;
    }
  }
}
