import { Constants } from '../../constants';
import { Reading } from '../../telemetry/models/reading.model';
import { AlertType, MaintenanceRule, RuleFinding } from '../models/maintenance.model';

/**
 * Fires when panel temperature is strictly above the threshold
 * Severity grows linearly over the severity span and is capped at 1
 */
export class HighTemperatureRule implements MaintenanceRule {
  public readonly type = AlertType.HIGH_TEMPERATURE;

  constructor(
    private readonly threshold: number = Constants.MAINTENANCE.TEMPERATURE_THRESHOLD,
    private readonly severitySpan: number = Constants.MAINTENANCE.TEMPERATURE_SEVERITY_SPAN
  ) {}

  public evaluate(reading: Reading): RuleFinding | null {
    if (!(reading.temperature > this.threshold)) {
      return null;
    }

    return {
      message: `High panel temperature: ${Math.trunc(reading.temperature)}°C`,
      severity: Math.min((reading.temperature - this.threshold) / this.severitySpan, 1.0)
    };
  }
}
