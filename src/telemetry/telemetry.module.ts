import { Module } from '@nestjs/common';
import { ReadingStoreService } from './reading-store.service';
import { LoggingService } from '../common/logging.service';

/**
 * TelemetryModule owns the reading log on top of the configured database
 */
@Module({
  imports: [],
  providers: [ReadingStoreService, LoggingService],
  exports: [ReadingStoreService],
})
export class TelemetryModule {}
