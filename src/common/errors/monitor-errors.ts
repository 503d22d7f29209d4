/**
 * Raised when a telemetry record cannot be turned into a reading
 */
export class TelemetryValidationError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'TelemetryValidationError';
  }
}

/**
 * Raised when a report artifact cannot be written to disk
 */
export class ReportWriteError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
    cause?: unknown
  ) {
    super(`${message}: ${filePath}`, { cause });
    this.name = 'ReportWriteError';
  }
}
