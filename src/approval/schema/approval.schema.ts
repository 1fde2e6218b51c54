import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { Document, Types } from 'mongoose';

export type ApprovalDocument = Approval & Document;

@Schema({
  collection: 'approvals',
  timestamps: { createdAt: 'created_at', updatedAt: false },
})
export class Approval {
  @Prop({ type: Types.ObjectId, ref: 'Vehicle', required: true, index: true })
  vehicle_id!: Types.ObjectId;

  @Prop({ required: true, trim: true })
  description!: string;

  @Prop({ required: true, min: 0 })
  cost!: number;

  // null while the customer has not answered
  @Prop({ type: Boolean, default: null })
  approved!: boolean | null;

  @Prop({ type: Date, default: null })
  approved_at!: Date | null;
}

export const ApprovalSchema = SchemaFactory.createForClass(Approval);
