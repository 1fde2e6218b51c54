import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { Document, Types } from 'mongoose';

export type MessageDocument = Message & Document;

export enum SenderType {
  CUSTOMER = 'customer',
  ADVISOR = 'advisor',
}

@Schema({ collection: 'messages' })
export class Message {
  @Prop({ type: Types.ObjectId, ref: 'Vehicle', required: true, index: true })
  vehicle_id!: Types.ObjectId;

  @Prop({ type: String, required: true, enum: SenderType })
  sender_type!: SenderType;

  @Prop({ required: true })
  message_text!: string;

  @Prop({ default: false })
  read!: boolean;

  @Prop({ type: Date, default: Date.now })
  sent_at!: Date;
}

export const MessageSchema = SchemaFactory.createForClass(Message);
