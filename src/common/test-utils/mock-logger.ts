import { LoggingService } from '../logging.service';

/**
 * LoggingService stand-in that records calls instead of writing log files
 */
export const createMockLogger = (): jest.Mocked<LoggingService> =>
  ({
    debug: jest.fn(),
    log: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    verbose: jest.fn(),
    cleanOldLogFiles: jest.fn().mockReturnValue(0),
  }) as unknown as jest.Mocked<LoggingService>;
