import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Patch,
  Post,
} from '@nestjs/common';
import { MessageService } from './message.service';
import { CreateMessageDto } from './dto/create-message.dto';
import { ApiResponse } from '../common/api-response';
import { unwrapResult } from '../common/http-result';

@Controller()
export class MessageController {
  constructor(private readonly messageService: MessageService) {}

  @Post('vehicles/:vehicleId/messages')
  @HttpCode(HttpStatus.CREATED)
  async create(
    @Param('vehicleId') vehicleId: string,
    @Body() createMessageDto: CreateMessageDto,
  ): Promise<ApiResponse> {
    const message = unwrapResult(
      await this.messageService.create(vehicleId, createMessageDto),
    );
    return ApiResponse.success(
      message,
      'Message sent successfully',
      HttpStatus.CREATED,
    );
  }

  @Get('vehicles/:vehicleId/messages')
  async findByVehicle(
    @Param('vehicleId') vehicleId: string,
  ): Promise<ApiResponse> {
    const messages = unwrapResult(
      await this.messageService.findByVehicle(vehicleId),
    );
    return ApiResponse.success(messages, 'Messages retrieved successfully');
  }

  @Patch('messages/:messageId/read')
  async markRead(@Param('messageId') messageId: string): Promise<ApiResponse> {
    const message = unwrapResult(await this.messageService.markRead(messageId));
    return ApiResponse.success(message, 'Message marked as read');
  }
}
