import { Constants } from '../../constants';
import { Reading } from '../../telemetry/models/reading.model';
import { EfficiencyTrackerService } from '../efficiency-tracker.service';
import { AlertType, MaintenanceRule, RuleFinding } from '../models/maintenance.model';

/**
 * Fires when current efficiency falls more than the threshold below the rolling average
 *
 * Records the reading's efficiency into the tracker before comparing, so the
 * average includes the current sample. Severity is degradation / threshold
 * and is not capped.
 */
export class PanelDegradationRule implements MaintenanceRule {
  public readonly type = AlertType.PANEL_DEGRADATION;

  constructor(
    private readonly tracker: EfficiencyTrackerService,
    private readonly threshold: number = Constants.MAINTENANCE.DEGRADATION_THRESHOLD
  ) {}

  public evaluate(reading: Reading): RuleFinding | null {
    const currentEfficiency = this.tracker.efficiency(reading.irradiance, reading.powerProduced);
    this.tracker.record(reading.timestamp, currentEfficiency);

    const averageEfficiency = this.tracker.rollingAverage(reading.timestamp);
    if (averageEfficiency === undefined) {
      return null;
    }

    const degradation = 1.0 - currentEfficiency / averageEfficiency;
    if (!(degradation > this.threshold)) {
      return null;
    }

    return {
      message: `Panel degradation detected: ${Math.floor(degradation * 100)}% performance loss`,
      severity: degradation / this.threshold
    };
  }
}
