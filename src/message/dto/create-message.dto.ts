import { IsEnum, IsNotEmpty, IsString, MaxLength } from 'class-validator';
import { SenderType } from '../schema/message.schema';

export class CreateMessageDto {
  @IsEnum(SenderType)
  sender_type!: SenderType;

  @IsString()
  @IsNotEmpty()
  @MaxLength(2000)
  message_text!: string;
}
