import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ScheduleModule } from '@nestjs/schedule';
import { MongooseModule } from '@nestjs/mongoose';
import { Constants } from './constants';
import { AppService } from './app.service';
import { LoggingService } from './common/logging.service';
import { DatabaseModule } from './common/database/database.module';
import { DatabaseType, resolveDatabaseType } from './common/database/database.constants';
import { MonitoringModule } from './monitoring/monitoring.module';
import { ReportModule } from './report/report.module';

const databaseType = resolveDatabaseType(Constants.DATABASE.TYPE);

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true
    }),
    // MongoDB connection (only when DATABASE_TYPE=mongodb)
    ...(databaseType === DatabaseType.MONGODB ? [MongooseModule.forRoot(Constants.DATABASE.MONGODB_URI)] : []),
    DatabaseModule.forRoot(
      databaseType,
      databaseType === DatabaseType.COUCHDB ? { url: Constants.DATABASE.COUCHDB_URL } : undefined
    ),
    ScheduleModule.forRoot(),
    MonitoringModule,
    ReportModule
  ],
  providers: [AppService, LoggingService]
})
export class AppModule {}
