/**
 * Database module that provides the storage abstraction for the reading log
 * Allows switching between memory, MongoDB and CouchDB based on configuration
 */

import { Module, Global, DynamicModule, Provider } from '@nestjs/common';
import { MongooseModule } from '@nestjs/mongoose';
import Nano from 'nano';

import { DATABASE_TOKENS, DatabaseType } from './database.constants';
import { ReadingMemoryService } from './memory/reading-memory.service';
import { ReadingMongoDBService } from './mongodb/reading-mongodb.service';
import { ReadingCouchDBService } from './couchdb/reading-couchdb.service';
import { ReadingRecord, ReadingRecordSchema } from '../../telemetry/schemas/reading.schema';
import { LoggingService } from '../logging.service';

export interface DatabaseModuleOptions {
  url?: string;
}

@Global()
@Module({})
export class DatabaseModule {
  /**
   * Creates a dynamic module based on the selected database type
   * @param {DatabaseType} databaseType - Type of database to use
   * @param {DatabaseModuleOptions} options - Database connection options
   * @returns {DynamicModule} Configured database module
   */
  public static forRoot(databaseType: DatabaseType, options?: DatabaseModuleOptions): DynamicModule {
    const providers: Provider[] = [];
    const imports: DynamicModule[] = [];

    if (databaseType === DatabaseType.MONGODB) {
      imports.push(MongooseModule.forFeature([{ name: ReadingRecord.name, schema: ReadingRecordSchema }]));

      providers.push({
        provide: DATABASE_TOKENS.READING_DATABASE,
        useClass: ReadingMongoDBService
      });
    } else if (databaseType === DatabaseType.COUCHDB) {
      const couchdbUrl = options?.url || 'http://localhost:5984';

      providers.push(
        {
          provide: DATABASE_TOKENS.COUCHDB_CONNECTION,
          useValue: Nano(couchdbUrl)
        },
        {
          provide: DATABASE_TOKENS.READING_DATABASE,
          useClass: ReadingCouchDBService
        }
      );
    } else {
      providers.push({
        provide: DATABASE_TOKENS.READING_DATABASE,
        useClass: ReadingMemoryService
      });
    }

    return {
      module: DatabaseModule,
      imports,
      providers: [...providers, LoggingService],
      exports: [DATABASE_TOKENS.READING_DATABASE]
    };
  }
}
