import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { Document } from 'mongoose';

export type ReadingRecordDocument = ReadingRecord & Document;

/**
 * MongoDB schema for the telemetry reading log
 * Documents are appended only; `_id` order is insertion order
 */
@Schema({ timestamps: true, collection: 'readings' })
export class ReadingRecord {
  @Prop({ required: true, index: true })
  public timestamp!: Date;

  @Prop({ required: true })
  public powerProduced!: number;

  @Prop({ required: true })
  public powerConsumed!: number;

  @Prop({ required: true })
  public batterySoc!: number;

  @Prop({ required: true })
  public irradiance!: number;

  @Prop({ required: true })
  public temperature!: number;

  @Prop({ required: true })
  public panelVoltage!: number;

  @Prop({ required: true })
  public panelCurrent!: number;
}

export const ReadingRecordSchema = SchemaFactory.createForClass(ReadingRecord);
