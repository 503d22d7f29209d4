import { Inject, Injectable, OnModuleInit } from '@nestjs/common';
import { Constants } from './constants';
import { LoggingService } from './common/logging.service';
import { SolarMonitorService } from './monitoring/solar-monitor.service';
import { AlertEngineService } from './maintenance/alert-engine.service';
import { ImpactAccumulatorService } from './impact/impact-accumulator.service';
import { ReportService } from './report/report.service';
import { ImpactChartService } from './report/impact-chart.service';
import { IReadingSource } from './telemetry/sources/reading-source.interface';

/**
 * Runs one monitoring session: ingest every reading from a source, then report
 */
@Injectable()
export class AppService implements OnModuleInit {
  private readonly context = AppService.name;

  constructor(
    @Inject(SolarMonitorService) private readonly monitor: SolarMonitorService,
    @Inject(AlertEngineService) private readonly alertEngine: AlertEngineService,
    @Inject(ImpactAccumulatorService) private readonly impact: ImpactAccumulatorService,
    @Inject(ReportService) private readonly reportService: ReportService,
    @Inject(ImpactChartService) private readonly chartService: ImpactChartService,
    @Inject(LoggingService) private readonly logger: LoggingService
  ) {}

  public onModuleInit(): void {
    this.logger.log(`Database type: ${Constants.DATABASE.TYPE}`, this.context);
  }

  /**
   * @param {IReadingSource} source - Where readings come from
   * @param {string} htmlFile - Visualization document path
   * @returns {Promise<number>} Number of readings processed
   */
  public async run(source: IReadingSource, htmlFile: string = Constants.REPORT.HTML_FILE): Promise<number> {
    this.logger.log(`Reading telemetry from ${source.description}`, this.context);

    let processed = 0;
    for await (const reading of source.readings()) {
      await this.monitor.ingest(reading);
      processed++;
    }
    this.logger.log(`Processed ${processed} reading(s)`, this.context);

    this.reportService.printMaintenanceAlerts(this.alertEngine.getActiveAlerts());

    const summary = this.impact.getSummary();
    this.reportService.printImpactSummary(summary);

    const documentPath = await this.chartService.writeDocument(summary, htmlFile);
    this.reportService.printVisualizationNotice(documentPath);

    return processed;
  }
}
