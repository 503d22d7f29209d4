import { Injectable } from '@nestjs/common';
import _ from 'lodash';
import { Constants } from '../constants';

const SECONDS_PER_DAY = 24 * 60 * 60;

/**
 * Keeps the panel efficiency history and computes rolling averages over it
 *
 * Efficiency is produced power divided by the power a panel of the rated
 * wattage would deliver at the measured irradiance. The history is an
 * ordered timestamp -> efficiency mapping (one entry per timestamp, later
 * records overwrite) and is never pruned.
 */
@Injectable()
export class EfficiencyTrackerService {
  private readonly ratedWattage = Constants.SOLAR_PANEL.RATED_WATTAGE;
  private readonly minSamples = Constants.MAINTENANCE.MIN_EFFICIENCY_SAMPLES;

  // Parallel arrays sorted by timestamp (epoch ms)
  private readonly timestamps: number[] = [];
  private readonly efficiencies: number[] = [];

  /**
   * Power expected from the panel at the given irradiance
   * @param {number} irradiance - W/m²
   * @returns {number} Expected power in W
   */
  public expectedPower(irradiance: number): number {
    return (irradiance / 1000.0) * this.ratedWattage;
  }

  /**
   * Ratio of produced to expected power; 0 when there is no irradiance
   */
  public efficiency(irradiance: number, producedPower: number): number {
    if (irradiance <= 0) {
      return 0.0;
    }
    return producedPower / this.expectedPower(irradiance);
  }

  public record(timestamp: Date, efficiency: number): void {
    const key = timestamp.getTime();
    const existing = _.sortedIndexOf(this.timestamps, key);
    if (existing !== -1) {
      this.efficiencies[existing] = efficiency;
      return;
    }

    const index = _.sortedIndex(this.timestamps, key);
    this.timestamps.splice(index, 0, key);
    this.efficiencies.splice(index, 0, efficiency);
  }

  public get sampleCount(): number {
    return this.timestamps.length;
  }

  /**
   * Mean efficiency over [reference - window, reference]
   * @param {Date} referenceTimestamp - End of the window
   * @param {number} windowSeconds - Window length (default 30 days)
   * @returns {number | undefined} Undefined while fewer than the minimum samples are recorded or the window is empty
   */
  public rollingAverage(
    referenceTimestamp: Date,
    windowSeconds: number = Constants.MAINTENANCE.ROLLING_WINDOW_DAYS * SECONDS_PER_DAY
  ): number | undefined {
    if (this.timestamps.length < this.minSamples) {
      return undefined;
    }

    const end = referenceTimestamp.getTime();
    const start = end - windowSeconds * 1000;
    const from = _.sortedIndex(this.timestamps, start);
    const to = _.sortedLastIndex(this.timestamps, end);

    if (to <= from) {
      return undefined;
    }
    return _.mean(this.efficiencies.slice(from, to));
  }
}
