import * as fs from 'fs';
import * as path from 'path';
import { Readable } from 'stream';
import csvParser from 'csv-parser';
import { TelemetryValidationError } from '../../common/errors/monitor-errors';
import { Reading, createReading } from '../models/reading.model';
import { parseReadingInput } from '../schemas/reading-input.schema';
import { IReadingSource } from './reading-source.interface';

/**
 * Reads a batch of readings from a JSON array or a CSV file with a header row
 *
 * Column / property names match the reading fields (powerProduced, irradiance, ...);
 * `timestamp` is optional. The first malformed record aborts the run.
 */
export class FileReadingSource implements IReadingSource {
  public readonly description: string;

  constructor(
    private readonly filePath: string,
    private readonly clock: () => Date = () => new Date()
  ) {
    this.description = `file ${filePath}`;
  }

  public async *readings(): AsyncGenerator<Reading> {
    const extension = path.extname(this.filePath).toLowerCase();
    const records = extension === '.csv' ? this.readCsvRows() : this.readJsonRecords();

    let index = 0;
    for await (const record of records) {
      index++;
      yield createReading(parseReadingInput(record, `record #${index} in ${this.filePath}`), this.clock());
    }
  }

  private async *readJsonRecords(): AsyncGenerator<unknown> {
    const content = await fs.promises.readFile(this.filePath, 'utf8');
    const parsed: unknown = JSON.parse(content);
    if (!Array.isArray(parsed)) {
      throw new TelemetryValidationError(`Expected a JSON array of readings in ${this.filePath}`);
    }
    yield* parsed;
  }

  private async *readCsvRows(): AsyncGenerator<unknown> {
    const content = await fs.promises.readFile(this.filePath);
    const stream = Readable.from(content).pipe(csvParser({ mapHeaders: ({ header }) => header.trim() }));
    for await (const row of stream) {
      yield row;
    }
  }
}
