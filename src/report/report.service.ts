import { Inject, Injectable } from '@nestjs/common';
import dayjs from 'dayjs';
import _ from 'lodash';
import { MaintenanceAlert } from '../maintenance/models/maintenance.model';
import { ImpactSummary } from '../impact/models/impact.model';
import { REPORT_OUTPUT, ReportOutput } from './report.constants';

const TIME_FORMAT = 'YYYY-MM-DD HH:mm:ss';

/**
 * Renders the maintenance alerts and the impact summary as plain text
 */
@Injectable()
export class ReportService {
  constructor(@Inject(REPORT_OUTPUT) private readonly output: ReportOutput) {}

  public formatAlert(alert: MaintenanceAlert): string {
    const severityPercent = (alert.severity * 100).toFixed(0);
    return `[ALERT] ${alert.message} | Severity: ${severityPercent}% | Time: ${dayjs(alert.timestamp).format(TIME_FORMAT)}`;
  }

  /**
   * Prints active alerts in the order they were raised
   */
  public printMaintenanceAlerts(alerts: readonly MaintenanceAlert[]): void {
    if (alerts.length === 0) {
      this.output.write('No active maintenance alerts\n');
      return;
    }

    this.output.write('\n=== MAINTENANCE ALERTS ===\n');
    alerts.forEach(alert => this.output.write(`${this.formatAlert(alert)}\n`));
  }

  public formatImpactSummary(summary: ImpactSummary): string[] {
    return [
      `Tracking since: ${dayjs(summary.trackingSince).format(TIME_FORMAT)}`,
      `Total solar energy produced: ${_.round(summary.energyKWh, 3)} kWh`,
      `CO2 emissions avoided: ${_.round(summary.co2AvoidedKg, 3)} kg`,
      `Equivalent to planting ${_.round(summary.treeEquivalents, 3)} trees`
    ];
  }

  public printImpactSummary(summary: ImpactSummary): void {
    this.output.write('\n=== ENVIRONMENTAL IMPACT REPORT ===\n');
    this.formatImpactSummary(summary).forEach(line => this.output.write(`${line}\n`));
  }

  public printVisualizationNotice(filePath: string): void {
    this.output.write(`\nGenerated visualization: ${filePath}\n`);
  }
}
