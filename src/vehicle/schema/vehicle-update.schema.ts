import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { Document, Types } from 'mongoose';

export type VehicleUpdateDocument = VehicleUpdate & Document;

/** One status transition, written after the vehicle row changes. */
@Schema({ collection: 'updates' })
export class VehicleUpdate {
  @Prop({ type: Types.ObjectId, ref: 'Vehicle', required: true, index: true })
  vehicle_id!: Types.ObjectId;

  @Prop({ type: String, default: null })
  user_id!: string | null;

  @Prop({ type: String, default: null })
  old_status!: string | null;

  @Prop({ type: String, required: true })
  new_status!: string;

  @Prop({ type: String, default: null })
  message!: string | null;

  @Prop({ type: Date, default: Date.now })
  timestamp!: Date;
}

export const VehicleUpdateSchema = SchemaFactory.createForClass(VehicleUpdate);
