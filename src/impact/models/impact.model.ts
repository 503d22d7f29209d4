/**
 * Snapshot of the cumulative environmental impact
 */
export interface ImpactSummary {
  trackingSince: Date;
  energyKWh: number;
  gridEnergyDisplacedKWh: number;
  co2AvoidedKg: number;
  treeEquivalents: number;
}
