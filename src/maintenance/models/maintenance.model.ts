import { Reading } from '../../telemetry/models/reading.model';

/**
 * Maintenance alert taxonomy
 */
export enum AlertType {
  PANEL_DEGRADATION = 'panel_degradation',
  HIGH_TEMPERATURE = 'high_temperature',
  LOW_EFFICIENCY = 'low_efficiency',
  INVERTER_ISSUE = 'inverter_issue',
  BATTERY_DEGRADATION = 'battery_degradation',
}

/**
 * Alert raised by a rule; removed once older than the retention window
 */
export interface MaintenanceAlert {
  readonly type: AlertType;
  readonly message: string;
  readonly timestamp: Date;
  /**
   * Nominally 0-1; panel degradation severity is not capped
   */
  readonly severity: number;
}

/**
 * Outcome of a rule that fired
 */
export interface RuleFinding {
  message: string;
  severity: number;
}

/**
 * A single maintenance check run against every incoming reading
 */
export interface MaintenanceRule {
  readonly type: AlertType;
  evaluate(reading: Reading): RuleFinding | null;
}
