import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { Test, TestingModule } from '@nestjs/testing';
import { AppService } from './app.service';
import { LoggingService } from './common/logging.service';
import { DatabaseModule } from './common/database/database.module';
import { DatabaseType } from './common/database/database.constants';
import { ReportWriteError, TelemetryValidationError } from './common/errors/monitor-errors';
import { MonitoringModule } from './monitoring/monitoring.module';
import { ReportModule } from './report/report.module';
import { REPORT_OUTPUT } from './report/report.constants';
import { ReadingStoreService } from './telemetry/reading-store.service';
import { Reading } from './telemetry/models/reading.model';
import { IReadingSource } from './telemetry/sources/reading-source.interface';
import { createMockLogger } from './common/test-utils/mock-logger';
import { BASE_TIME, hoursAfterBase, makeReading } from './common/test-utils/reading-fixtures';

const sourceOf = (readings: Reading[]): IReadingSource => ({
  description: 'test readings',
  async *readings() {
    yield* readings;
  },
});

describe('AppService', () => {
  let module: TestingModule;
  let service: AppService;
  let logger: jest.Mocked<LoggingService>;
  let written: string[];
  let tmpDir: string;

  beforeEach(async () => {
    logger = createMockLogger();
    written = [];
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'solar-app-'));

    module = await Test.createTestingModule({
      imports: [DatabaseModule.forRoot(DatabaseType.MEMORY), MonitoringModule, ReportModule],
      providers: [AppService, LoggingService],
    })
      .overrideProvider(LoggingService)
      .useValue(logger)
      .overrideProvider(REPORT_OUTPUT)
      .useValue({ write: (chunk: string) => written.push(chunk) })
      .compile();

    service = module.get<AppService>(AppService);
  });

  afterEach(async () => {
    await module.close();
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('should ingest every reading and print the reports', async () => {
    const htmlFile = path.join(tmpDir, 'impact.html');
    const readings = [
      makeReading({ timestamp: BASE_TIME, powerProduced: 150, temperature: 75 }),
      makeReading({ timestamp: hoursAfterBase(1), powerProduced: 150 }),
    ];

    const processed = await service.run(sourceOf(readings), htmlFile);

    expect(processed).toBe(2);
    expect(written[0]).toBe('\n=== MAINTENANCE ALERTS ===\n');
    expect(written[1]).toMatch(
      /^\[ALERT\] High panel temperature: 75°C \| Severity: 50% \| Time: \d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}\n$/,
    );
    expect(written[2]).toBe('\n=== ENVIRONMENTAL IMPACT REPORT ===\n');
    expect(written.slice(4, 7)).toEqual([
      'Total solar energy produced: 0.3 kWh\n',
      'CO2 emissions avoided: 0.12 kg\n',
      'Equivalent to planting 0.003 trees\n',
    ]);
    expect(written[7]).toBe(`\nGenerated visualization: ${path.resolve(htmlFile)}\n`);
    expect(fs.existsSync(htmlFile)).toBe(true);

    const stored = await module.get(ReadingStoreService).query(BASE_TIME, hoursAfterBase(1));
    expect(stored).toEqual(readings);
  });

  it('should report no alerts and zero impact for an empty source', async () => {
    const processed = await service.run(sourceOf([]), path.join(tmpDir, 'impact.html'));

    expect(processed).toBe(0);
    expect(written[0]).toBe('No active maintenance alerts\n');
    expect(written.slice(3, 6)).toEqual([
      'Total solar energy produced: 0 kWh\n',
      'CO2 emissions avoided: 0 kg\n',
      'Equivalent to planting 0 trees\n',
    ]);
  });

  it('should stop without reporting when the source fails', async () => {
    const failing: IReadingSource = {
      description: 'broken source',
      async *readings() {
        yield makeReading();
        throw new TelemetryValidationError('Invalid telemetry record #2', ['irradiance: Expected number, received string']);
      },
    };

    await expect(service.run(failing, path.join(tmpDir, 'impact.html'))).rejects.toBeInstanceOf(
      TelemetryValidationError,
    );
    expect(written).toEqual([]);
  });

  it('should surface a failed visualization write', async () => {
    await expect(service.run(sourceOf([makeReading()]), path.join(tmpDir, 'missing', 'impact.html'))).rejects.toBeInstanceOf(
      ReportWriteError,
    );
  });
});
