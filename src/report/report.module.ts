import { Module } from '@nestjs/common';
import { LoggingService } from '../common/logging.service';
import { ImpactChartService } from './impact-chart.service';
import { REPORT_OUTPUT } from './report.constants';
import { ReportService } from './report.service';

/**
 * Report module providing text reports on stdout and the HTML visualization
 */
@Module({
  providers: [
    ReportService,
    ImpactChartService,
    LoggingService,
    { provide: REPORT_OUTPUT, useValue: process.stdout }
  ],
  exports: [ReportService, ImpactChartService]
})
export class ReportModule {}
