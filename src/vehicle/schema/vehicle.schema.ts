import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { Document } from 'mongoose';

export type VehicleDocument = Vehicle & Document;

export enum VehicleStatus {
  CHECKED_IN = 'checked_in',
  INSPECTION = 'inspection',
  WAITING_PARTS = 'waiting_parts',
  IN_PROGRESS = 'in_progress',
  AWAITING_WARRANTY = 'awaiting_warranty',
  QUALITY_CHECK = 'quality_check',
  READY = 'ready',
}

@Schema({
  collection: 'vehicles',
  timestamps: { createdAt: 'created_at', updatedAt: 'updated_at' },
})
export class Vehicle {
  @Prop({ required: true, trim: true, index: true })
  shop_id!: string;

  @Prop({ required: true, trim: true })
  customer_name!: string;

  @Prop({ required: true, trim: true })
  customer_phone!: string;

  @Prop({ type: String, default: null })
  customer_email!: string | null;

  @Prop({ type: String, default: null })
  make!: string | null;

  @Prop({ type: String, default: null })
  model!: string | null;

  @Prop({ type: Number, default: null })
  year!: number | null;

  @Prop({ type: String, default: null })
  vin!: string | null;

  @Prop({ type: String, default: null })
  license_plate!: string | null;

  // tracking token handed to the customer; never reassigned
  @Prop({ required: true, unique: true, immutable: true })
  unique_link!: string;

  // free-form: values outside VehicleStatus are stored as given
  @Prop({ required: true, default: VehicleStatus.CHECKED_IN })
  status!: string;

  @Prop({ type: Date, default: null })
  estimated_completion!: Date | null;

  @Prop({ default: false })
  awaiting_warranty!: boolean;

  @Prop({ type: Date, default: Date.now })
  checked_in_at!: Date;

  @Prop({ type: Date, default: null })
  completed_at!: Date | null;
}

export const VehicleSchema = SchemaFactory.createForClass(Vehicle);
