import { Injectable } from '@nestjs/common';
import { Cron, CronExpression } from '@nestjs/schedule';
import * as fs from 'fs';
import * as path from 'path';
import dayjs from 'dayjs';
import { Constants } from '../constants';

type LogLevel = 'debug' | 'verbose' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  verbose: 1,
  info: 2,
  warn: 3,
  error: 4
};

/**
 * Centralized logging service for the entire application
 *
 * Writes every entry to a daily log file so that standard output stays
 * reserved for the interactive prompts and the reports. Errors are echoed
 * to stderr as well.
 *
 * Configuration:
 * - LOG_DIR: Directory for log files (default: 'logs')
 * - APP_NAME: Application name for log file naming (default: 'solar-monitor')
 * - LOG_LEVEL: Lowest level written (DEBUG, VERBOSE, INFO, WARN, ERROR; default: INFO)
 *
 * Output Files:
 * - {APP_NAME}-YYYY-MM-DD.log
 */
@Injectable()
export class LoggingService {
  private readonly logDir: string;
  private readonly appName: string;
  private readonly minLevel: number;

  constructor() {
    this.logDir = Constants.LOGGING.LOG_DIR;
    this.appName = Constants.LOGGING.APP_NAME;
    this.minLevel = LoggingService.resolveLevel(Constants.LOGGING.LOG_LEVEL);

    // Ensure log directory exists
    if (!fs.existsSync(this.logDir)) {
      fs.mkdirSync(this.logDir, { recursive: true });
    }

    this.cleanOldLogFiles();
  }

  private static resolveLevel(level: string): number {
    const key = level.toLowerCase();
    if (key === 'log') {
      return LEVEL_ORDER.info;
    }
    return LoggingService.isLogLevel(key) ? LEVEL_ORDER[key] : LEVEL_ORDER.info;
  }

  private static isLogLevel(level: string): level is LogLevel {
    return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, level);
  }

  private writeToFile(level: LogLevel, message: string, context?: string): void {
    if (LEVEL_ORDER[level] < this.minLevel) {
      return;
    }

    const timestamp = dayjs().format('YYYY-MM-DD HH:mm:ss.SSS');
    const contextString = context ? `[${context}] ` : '';
    const logMessage = `${timestamp} [${level.toUpperCase()}] ${contextString}${message}\n`;

    const dateStr = dayjs().format('YYYY-MM-DD');
    const logFile = path.join(this.logDir, `${this.appName}-${dateStr}.log`);

    try {
      fs.appendFileSync(logFile, logMessage);
    } catch (error) {
      console.error('Failed to write to log file:', error);
    }
  }

  /**
   * Log debug message
   */
  public debug(message: string, context?: string): void {
    this.writeToFile('debug', message, context);
  }

  /**
   * Log info message
   */
  public log(message: string, context?: string): void {
    this.writeToFile('info', message, context);
  }

  /**
   * Log warning message
   */
  public warn(message: string, context?: string): void {
    this.writeToFile('warn', message, context);
  }

  /**
   * Log error message, echoed to stderr
   */
  public error(message: string, error?: unknown, context?: string): void {
    let fullMessage = message;
    if (error instanceof Error) {
      fullMessage = `${message}: ${error.message}\n${error.stack}`;
    } else if (typeof error === 'string') {
      fullMessage = `${message}: ${error}`;
    } else if (error !== undefined) {
      fullMessage = `${message}: ${String(error)}`;
    }

    console.error(`[ERROR] ${context ? `[${context}] ` : ''}${fullMessage}`);
    this.writeToFile('error', fullMessage, context);
  }

  /**
   * Log verbose message
   */
  public verbose(message: string, context?: string): void {
    this.writeToFile('verbose', message, context);
  }

  /**
   * Clean log files older than 5 days
   * Called on service startup and daily via cron
   */
  @Cron(CronExpression.EVERY_DAY_AT_2AM)
  public cleanOldLogFiles(): number {
    let deleted = 0;
    try {
      if (!fs.existsSync(this.logDir)) {
        return deleted;
      }

      const files = fs.readdirSync(this.logDir);
      const now = Date.now();
      const maxAge = 5 * 24 * 60 * 60 * 1000;

      files.forEach(file => {
        // Only process log files from this application
        if (!file.startsWith(this.appName) || !file.endsWith('.log')) {
          return;
        }

        const filePath = path.join(this.logDir, file);
        const fileAge = now - fs.statSync(filePath).mtime.getTime();

        if (fileAge > maxAge) {
          fs.unlinkSync(filePath);
          deleted++;
          const ageInDays = Math.round(fileAge / (24 * 60 * 60 * 1000));
          this.writeToFile('info', `Deleted old log file: ${file} (${ageInDays} days old)`, 'LogCleanup');
        }
      });
    } catch (error) {
      console.error('Failed to clean old log files:', error);
    }
    return deleted;
  }
}
