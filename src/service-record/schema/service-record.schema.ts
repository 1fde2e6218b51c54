import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { Document, Types } from 'mongoose';

export type ServiceRecordDocument = ServiceRecord & Document;

@Schema({
  collection: 'servicerecords',
  timestamps: { createdAt: 'created_at', updatedAt: 'updated_at' },
})
export class ServiceRecord {
  @Prop({ type: Types.ObjectId, ref: 'Vehicle', required: true, index: true })
  vehicle_id!: Types.ObjectId;

  @Prop({ required: true, trim: true })
  service_type!: string;

  @Prop({ required: true, min: 0 })
  mileage!: number;

  @Prop({ type: Number, default: null })
  next_service_mileage!: number | null;

  @Prop({ type: Number, default: null })
  reminder_interval_months!: number | null;

  @Prop({ type: Date, default: null, index: true })
  next_reminder_date!: Date | null;

  @Prop({ type: String, default: null })
  notes!: string | null;

  // flips to true once, after a reminder text is accepted
  @Prop({ default: false })
  reminder_sent!: boolean;
}

export const ServiceRecordSchema = SchemaFactory.createForClass(ServiceRecord);
