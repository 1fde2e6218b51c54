import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { Document, Types } from 'mongoose';

export type MediaDocument = Media & Document;

export enum MediaType {
  PHOTO = 'photo',
  VIDEO = 'video',
}

@Schema({ collection: 'media' })
export class Media {
  @Prop({ type: Types.ObjectId, ref: 'Vehicle', required: true, index: true })
  vehicle_id!: Types.ObjectId;

  @Prop({ type: String, default: null })
  user_id!: string | null;

  @Prop({ type: String, required: true, enum: MediaType })
  media_type!: MediaType;

  @Prop({ required: true })
  media_url!: string;

  @Prop({ type: String, default: null })
  caption!: string | null;

  @Prop({ type: Date, default: Date.now })
  uploaded_at!: Date;
}

export const MediaSchema = SchemaFactory.createForClass(Media);
