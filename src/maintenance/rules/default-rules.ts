import { EfficiencyTrackerService } from '../efficiency-tracker.service';
import { AlertType, MaintenanceRule } from '../models/maintenance.model';
import { HighTemperatureRule } from './high-temperature.rule';
import { InactiveRule } from './inactive.rule';
import { PanelDegradationRule } from './panel-degradation.rule';

/**
 * Rules in evaluation order
 */
export function createDefaultRules(tracker: EfficiencyTrackerService): MaintenanceRule[] {
  return [
    new PanelDegradationRule(tracker),
    new HighTemperatureRule(),
    new InactiveRule(AlertType.LOW_EFFICIENCY),
    new InactiveRule(AlertType.INVERTER_ISSUE),
    new InactiveRule(AlertType.BATTERY_DEGRADATION)
  ];
}
