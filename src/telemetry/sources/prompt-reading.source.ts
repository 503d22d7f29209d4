import * as readline from 'readline';
import { TelemetryValidationError } from '../../common/errors/monitor-errors';
import { READING_FIELDS, Reading, ReadingMeasurement, createReading } from '../models/reading.model';
import { measurementSchema, parseReadingInput, readingCountSchema } from '../schemas/reading-input.schema';
import { IReadingSource } from './reading-source.interface';

/**
 * Interactive operator entry of readings
 *
 * Asks for the number of readings (unless given), then for each measurement
 * of every reading. An answer that is not a number is rejected and the same
 * question is asked again. Running out of input before every reading is
 * complete raises a TelemetryValidationError.
 */
export class PromptReadingSource implements IReadingSource {
  public readonly description = 'interactive prompt';

  constructor(
    private readonly input: NodeJS.ReadableStream,
    private readonly output: NodeJS.WritableStream,
    private readonly readingCount?: number,
    private readonly clock: () => Date = () => new Date()
  ) {}

  public async *readings(): AsyncGenerator<Reading> {
    const rl = readline.createInterface({ input: this.input, terminal: false });
    const lines = rl[Symbol.asyncIterator]();

    try {
      const count = this.readingCount ?? (await this.askCount(lines));

      for (let i = 0; i < count; i++) {
        this.output.write(`\nEnter data for Reading #${i + 1}:\n`);

        const answers: Partial<Record<ReadingMeasurement, number>> = {};
        for (const field of READING_FIELDS) {
          answers[field.key] = await this.askNumber(lines, `${field.label}: `);
        }

        yield createReading(parseReadingInput(answers, `reading #${i + 1}`), this.clock());
      }
    } finally {
      rl.close();
    }
  }

  private async askCount(lines: AsyncIterator<string>): Promise<number> {
    for (;;) {
      const answer = await this.ask(lines, 'Enter the number of solar readings: ');
      const result = readingCountSchema.safeParse(answer);
      if (result.success) {
        return result.data;
      }
      this.output.write(`Invalid count "${answer.trim()}", enter a whole number.\n`);
    }
  }

  private async askNumber(lines: AsyncIterator<string>, prompt: string): Promise<number> {
    for (;;) {
      const answer = await this.ask(lines, prompt);
      const result = measurementSchema.safeParse(answer);
      if (result.success) {
        return result.data;
      }
      this.output.write(`Invalid number "${answer.trim()}", please try again.\n`);
    }
  }

  private async ask(lines: AsyncIterator<string>, prompt: string): Promise<string> {
    this.output.write(prompt);
    const next = await lines.next();
    if (next.done) {
      throw new TelemetryValidationError('Telemetry input ended before all readings were entered');
    }
    return next.value;
  }
}
