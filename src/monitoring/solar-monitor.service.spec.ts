import { Test, TestingModule } from '@nestjs/testing';
import { SolarMonitorService } from './solar-monitor.service';
import { MonitoringModule } from './monitoring.module';
import { DatabaseModule } from '../common/database/database.module';
import { DatabaseType } from '../common/database/database.constants';
import { LoggingService } from '../common/logging.service';
import { ReadingStoreService } from '../telemetry/reading-store.service';
import { ImpactAccumulatorService } from '../impact/impact-accumulator.service';
import { AlertEngineService } from '../maintenance/alert-engine.service';
import { AlertType, MaintenanceAlert } from '../maintenance/models/maintenance.model';
import { createMockLogger } from '../common/test-utils/mock-logger';
import { BASE_TIME, degradationScenario, hoursAfterBase, makeReading } from '../common/test-utils/reading-fixtures';

describe('SolarMonitorService', () => {
  let module: TestingModule;
  let monitor: SolarMonitorService;
  let store: ReadingStoreService;
  let impact: ImpactAccumulatorService;
  let alertEngine: AlertEngineService;

  beforeEach(async () => {
    module = await Test.createTestingModule({
      imports: [DatabaseModule.forRoot(DatabaseType.MEMORY), MonitoringModule],
    })
      .overrideProvider(LoggingService)
      .useValue(createMockLogger())
      .compile();

    monitor = module.get<SolarMonitorService>(SolarMonitorService);
    store = module.get<ReadingStoreService>(ReadingStoreService);
    impact = module.get<ImpactAccumulatorService>(ImpactAccumulatorService);
    alertEngine = module.get<AlertEngineService>(AlertEngineService);
  });

  afterEach(async () => {
    await module.close();
  });

  it('should store the reading and count one interval of production', async () => {
    const reading = makeReading({ powerProduced: 300 });

    const alerts = await monitor.ingest(reading, BASE_TIME);

    expect(alerts).toEqual([]);
    expect(await store.query(BASE_TIME, BASE_TIME)).toEqual([reading]);
    expect(impact.cumulativeEnergyKWh).toBeCloseTo(0.3, 10);
  });

  it('should return the alerts raised by the reading', async () => {
    const alerts = await monitor.ingest(makeReading({ temperature: 75 }), BASE_TIME);

    expect(alerts).toEqual([
      {
        type: AlertType.HIGH_TEMPERATURE,
        message: 'High panel temperature: 75°C',
        timestamp: BASE_TIME,
        severity: 0.5,
      },
    ]);
    expect(alertEngine.getActiveAlerts()).toEqual(alerts);
  });

  it('should detect degradation once enough history is stored', async () => {
    const scenario = degradationScenario();
    const raised: MaintenanceAlert[] = [];
    for (const reading of scenario) {
      raised.push(...(await monitor.ingest(reading, reading.timestamp)));
    }

    expect(raised).toHaveLength(1);
    expect(raised[0].type).toBe(AlertType.PANEL_DEGRADATION);
    expect(raised[0].message).toBe('Panel degradation detected: 27% performance loss');
    expect(await store.query(BASE_TIME, hoursAfterBase(29))).toHaveLength(30);
    expect(impact.cumulativeEnergyKWh).toBeCloseTo((29 * 210 + 150) / 1000, 10);
  });
});
