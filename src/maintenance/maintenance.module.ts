import { Module } from '@nestjs/common';
import { LoggingService } from '../common/logging.service';
import { AlertEngineService } from './alert-engine.service';
import { EfficiencyTrackerService } from './efficiency-tracker.service';
import { MAINTENANCE_RULES } from './maintenance.constants';
import { createDefaultRules } from './rules/default-rules';

/**
 * MaintenanceModule handles rule-based degradation and anomaly detection
 *
 * Features:
 * - Panel efficiency history with 30-day rolling average
 * - Panel degradation and high temperature rules
 * - Alert retention window with pruning on every evaluation pass
 */
@Module({
  imports: [],
  providers: [
    EfficiencyTrackerService,
    LoggingService,
    {
      provide: MAINTENANCE_RULES,
      useFactory: (tracker: EfficiencyTrackerService) => createDefaultRules(tracker),
      inject: [EfficiencyTrackerService]
    },
    AlertEngineService
  ],
  exports: [AlertEngineService, EfficiencyTrackerService],
})
export class MaintenanceModule {}
