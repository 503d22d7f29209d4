#!/usr/bin/env node
import 'reflect-metadata';
// Load environment variables before anything else
import * as dotenv from 'dotenv';
dotenv.config();

import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { AppService } from './app.service';
import { LoggingService } from './common/logging.service';
import { createReadingSource } from './telemetry/sources/reading-source.factory';

async function bootstrap(): Promise<void> {
  // Standard output carries the prompts and reports; Nest's own logger only reports problems
  const app = await NestFactory.createApplicationContext(AppModule, { logger: ['error', 'warn'] });
  const logger = app.get(LoggingService);

  try {
    const source = createReadingSource(process.argv[2]);
    await app.get(AppService).run(source);
  } catch (error) {
    logger.error('Monitoring run failed', error, 'Bootstrap');
    process.exitCode = 1;
  } finally {
    await app.close();
  }
}

bootstrap().catch(error => {
  console.error(error);
  process.exitCode = 1;
});
