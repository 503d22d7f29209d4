import { Inject, Injectable } from '@nestjs/common';
import { Constants } from '../constants';
import { LoggingService } from '../common/logging.service';
import { Reading } from '../telemetry/models/reading.model';
import { MAINTENANCE_RULES } from './maintenance.constants';
import { MaintenanceAlert, MaintenanceRule } from './models/maintenance.model';

const MS_PER_DAY = 24 * 60 * 60 * 1000;

// Alerts handed to callers get their own Date so the stored timestamps cannot move
const copyAlert = (alert: MaintenanceAlert): MaintenanceAlert =>
  Object.freeze({ ...alert, timestamp: new Date(alert.timestamp.getTime()) });

/**
 * Stateful evaluator that owns the active maintenance alerts
 *
 * Lifecycle of an alert: absent -> active -> expired (removed). Each pass
 * first drops alerts older than the retention window relative to `now`, then
 * runs every rule in order. A rule that fires always appends a fresh alert,
 * even when an alert of the same type is already active.
 */
@Injectable()
export class AlertEngineService {
  private readonly context = AlertEngineService.name;
  private readonly retentionMs = Constants.MAINTENANCE.ALERT_RETENTION_DAYS * MS_PER_DAY;
  private activeAlerts: MaintenanceAlert[] = [];

  constructor(
    @Inject(MAINTENANCE_RULES) private readonly rules: MaintenanceRule[],
    @Inject(LoggingService) private readonly logger: LoggingService
  ) {}

  /**
   * Runs one evaluation pass for a reading
   * @param {Reading} reading - Incoming reading
   * @param {Date} now - Evaluation time, used for pruning and as the timestamp of new alerts
   * @returns {MaintenanceAlert[]} Alerts raised by this pass
   */
  public evaluate(reading: Reading, now: Date = new Date()): MaintenanceAlert[] {
    this.prune(now);

    const raised: MaintenanceAlert[] = [];
    for (const rule of this.rules) {
      const finding = rule.evaluate(reading);
      if (!finding) {
        continue;
      }

      const alert: MaintenanceAlert = Object.freeze({
        type: rule.type,
        message: finding.message,
        timestamp: new Date(now.getTime()),
        severity: finding.severity
      });
      this.activeAlerts.push(alert);
      raised.push(copyAlert(alert));
      this.logger.warn(`Alert raised [${alert.type}]: ${alert.message} (severity ${alert.severity.toFixed(2)})`, this.context);
    }

    return raised;
  }

  /**
   * Removes alerts whose timestamp is before now - retention window
   * @returns {number} Number of removed alerts
   */
  public prune(now: Date = new Date()): number {
    const cutoff = now.getTime() - this.retentionMs;
    const before = this.activeAlerts.length;
    this.activeAlerts = this.activeAlerts.filter(alert => alert.timestamp.getTime() >= cutoff);

    const removed = before - this.activeAlerts.length;
    if (removed > 0) {
      this.logger.debug(`Pruned ${removed} expired alert(s)`, this.context);
    }
    return removed;
  }

  /**
   * Active alerts in the order they were raised
   */
  public getActiveAlerts(): MaintenanceAlert[] {
    return this.activeAlerts.map(copyAlert);
  }
}
