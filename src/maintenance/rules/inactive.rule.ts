import { AlertType, MaintenanceRule, RuleFinding } from '../models/maintenance.model';

/**
 * Placeholder for an alert type that has no detection logic yet; never fires
 */
export class InactiveRule implements MaintenanceRule {
  constructor(public readonly type: AlertType) {}

  public evaluate(): RuleFinding | null {
    return null;
  }
}
