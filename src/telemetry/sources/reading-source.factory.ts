import { Constants } from '../../constants';
import { TelemetryValidationError } from '../../common/errors/monitor-errors';
import { IReadingSource } from './reading-source.interface';
import { FileReadingSource } from './file-reading.source';
import { PromptReadingSource } from './prompt-reading.source';

/**
 * Selects the reading source for a run
 * @param {string} filePath - File given on the command line; takes precedence over READING_SOURCE
 * @returns {IReadingSource} File source or interactive prompt on stdin/stdout
 */
export function createReadingSource(filePath?: string): IReadingSource {
  if (filePath) {
    return new FileReadingSource(filePath);
  }

  if (Constants.INPUT.SOURCE === 'file') {
    if (!Constants.INPUT.FILE) {
      throw new TelemetryValidationError('READING_SOURCE is "file" but READING_FILE is not set');
    }
    return new FileReadingSource(Constants.INPUT.FILE);
  }

  return new PromptReadingSource(process.stdin, process.stdout, Constants.INPUT.READING_COUNT);
}
