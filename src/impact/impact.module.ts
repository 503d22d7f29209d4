import { Module } from '@nestjs/common';
import { ImpactAccumulatorService } from './impact-accumulator.service';

/**
 * ImpactModule keeps the cumulative energy and environmental impact totals
 */
@Module({
  providers: [ImpactAccumulatorService],
  exports: [ImpactAccumulatorService],
})
export class ImpactModule {}
