/**
 * Injection token for the stream the text reports are written to
 */
export const REPORT_OUTPUT = 'REPORT_OUTPUT';

export interface ReportOutput {
  write(chunk: string): unknown;
}
