import { Inject, Injectable } from '@nestjs/common';
import { Constants } from '../constants';
import { ReadingStoreService } from '../telemetry/reading-store.service';
import { Reading } from '../telemetry/models/reading.model';
import { ImpactAccumulatorService } from '../impact/impact-accumulator.service';
import { AlertEngineService } from '../maintenance/alert-engine.service';
import { MaintenanceAlert } from '../maintenance/models/maintenance.model';

/**
 * Ingestion pipeline for a single reading
 *
 * Each reading is stored, counted into the impact totals (one reading
 * interval of production) and evaluated by the alert engine, in that order.
 * Callers await one reading before handing over the next.
 */
@Injectable()
export class SolarMonitorService {
  private readonly readingIntervalHours = Constants.IMPACT.READING_INTERVAL_HOURS;

  constructor(
    @Inject(ReadingStoreService) private readonly readingStore: ReadingStoreService,
    @Inject(ImpactAccumulatorService) private readonly impact: ImpactAccumulatorService,
    @Inject(AlertEngineService) private readonly alertEngine: AlertEngineService
  ) {}

  /**
   * @param {Reading} reading - Incoming reading
   * @param {Date} now - Evaluation time for alert pruning and new alert timestamps
   * @returns {Promise<MaintenanceAlert[]>} Alerts raised by this reading
   */
  public async ingest(reading: Reading, now: Date = new Date()): Promise<MaintenanceAlert[]> {
    await this.readingStore.store(reading);
    this.impact.addEnergy(reading.powerProduced, this.readingIntervalHours);
    return this.alertEngine.evaluate(reading, now);
  }
}
