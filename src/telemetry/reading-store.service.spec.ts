import { Test, TestingModule } from '@nestjs/testing';
import { ReadingStoreService } from './reading-store.service';
import { TelemetryModule } from './telemetry.module';
import { DatabaseModule } from '../common/database/database.module';
import { DatabaseType } from '../common/database/database.constants';
import { LoggingService } from '../common/logging.service';
import { createMockLogger } from '../common/test-utils/mock-logger';
import { BASE_TIME, hoursAfterBase, makeReading } from '../common/test-utils/reading-fixtures';

describe('ReadingStoreService', () => {
  let module: TestingModule;
  let store: ReadingStoreService;
  let logger: jest.Mocked<LoggingService>;

  beforeEach(async () => {
    logger = createMockLogger();

    module = await Test.createTestingModule({
      imports: [DatabaseModule.forRoot(DatabaseType.MEMORY), TelemetryModule],
    })
      .overrideProvider(LoggingService)
      .useValue(logger)
      .compile();

    store = module.get<ReadingStoreService>(ReadingStoreService);
  });

  afterEach(async () => {
    await module.close();
  });

  it('should return stored readings in insertion order', async () => {
    const later = makeReading({ timestamp: hoursAfterBase(2), powerProduced: 100 });
    const earlier = makeReading({ timestamp: hoursAfterBase(1), powerProduced: 200 });
    await store.store(later);
    await store.store(earlier);

    const result = await store.query(BASE_TIME, hoursAfterBase(3));

    expect(result).toEqual([later, earlier]);
  });

  it('should include readings on both range bounds', async () => {
    const readings = [0, 1, 2, 3].map(hour => makeReading({ timestamp: hoursAfterBase(hour) }));
    for (const reading of readings) {
      await store.store(reading);
    }

    const result = await store.query(hoursAfterBase(1), hoursAfterBase(2));

    expect(result.map(reading => reading.timestamp)).toEqual([hoursAfterBase(1), hoursAfterBase(2)]);
  });

  it('should return nothing for a range that ends before it starts', async () => {
    await store.store(makeReading());

    expect(await store.query(hoursAfterBase(1), BASE_TIME)).toEqual([]);
  });

  it('should keep readings that share a timestamp', async () => {
    await store.store(makeReading({ powerProduced: 100 }));
    await store.store(makeReading({ powerProduced: 110 }));

    const result = await store.query(BASE_TIME, BASE_TIME);

    expect(result.map(reading => reading.powerProduced)).toEqual([100, 110]);
  });

  it('should not let callers move a stored timestamp', async () => {
    const reading = makeReading({ timestamp: hoursAfterBase(1) });
    await store.store(reading);
    reading.timestamp.setTime(0);
    const [first] = await store.query(BASE_TIME, hoursAfterBase(2));
    first.timestamp.setTime(0);

    const result = await store.query(BASE_TIME, hoursAfterBase(2));

    expect(result.map(stored => stored.timestamp)).toEqual([hoursAfterBase(1)]);
  });

  it('should log every stored reading', async () => {
    const timestamp = new Date(2026, 2, 1, 8, 30, 0);
    await store.store(makeReading({ timestamp }));

    expect(logger.log).toHaveBeenCalledWith('Stored reading at 2026-03-01 08:30:00', 'ReadingStoreService');
  });
});
