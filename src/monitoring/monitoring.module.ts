import { Module } from '@nestjs/common';
import { TelemetryModule } from '../telemetry/telemetry.module';
import { MaintenanceModule } from '../maintenance/maintenance.module';
import { ImpactModule } from '../impact/impact.module';
import { SolarMonitorService } from './solar-monitor.service';

@Module({
  imports: [TelemetryModule, MaintenanceModule, ImpactModule],
  providers: [SolarMonitorService],
  exports: [SolarMonitorService, TelemetryModule, MaintenanceModule, ImpactModule],
})
export class MonitoringModule {}
