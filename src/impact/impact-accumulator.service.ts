import { Injectable } from '@nestjs/common';
import { Constants } from '../constants';
import { ImpactSummary } from './models/impact.model';

/**
 * Running total of produced solar energy and the figures derived from it
 *
 * Only the cumulative energy is stored; CO2 avoided, tree equivalents and
 * displaced grid energy are linear functions of it.
 */
@Injectable()
export class ImpactAccumulatorService {
  private readonly co2KgPerKWh = Constants.IMPACT.CO2_KG_PER_KWH;
  private readonly treesPerKWh = Constants.IMPACT.TREES_PER_KWH;
  private readonly gridDisplacementRatio = Constants.IMPACT.GRID_DISPLACEMENT_RATIO;
  private readonly startDate: Date;
  private totalEnergyKWh = 0;

  constructor() {
    this.startDate = new Date();
  }

  /**
   * Adds production over a period
   * @param {number} powerWatts - Average power in W
   * @param {number} durationHours - Period length in hours
   */
  public addEnergy(powerWatts: number, durationHours: number): void {
    this.totalEnergyKWh += (powerWatts * durationHours) / 1000.0;
  }

  public get cumulativeEnergyKWh(): number {
    return this.totalEnergyKWh;
  }

  /**
   * @returns {number} kg of CO2
   */
  public co2Avoided(): number {
    return this.totalEnergyKWh * this.co2KgPerKWh;
  }

  public treeEquivalents(): number {
    return this.totalEnergyKWh * this.treesPerKWh;
  }

  public gridEnergyDisplaced(): number {
    return this.totalEnergyKWh * this.gridDisplacementRatio;
  }

  public getSummary(): ImpactSummary {
    return {
      trackingSince: new Date(this.startDate.getTime()),
      energyKWh: this.totalEnergyKWh,
      gridEnergyDisplacedKWh: this.gridEnergyDisplaced(),
      co2AvoidedKg: this.co2Avoided(),
      treeEquivalents: this.treeEquivalents()
    };
  }
}
