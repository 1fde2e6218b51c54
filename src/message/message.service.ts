import { Injectable, Logger } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { Model, Types } from 'mongoose';
import { CreateMessageDto } from './dto/create-message.dto';
import { Message, MessageDocument } from './schema/message.schema';
import { Vehicle, VehicleDocument } from '../vehicle/schema/vehicle.schema';
import {
  describeError,
  notFoundError,
  ok,
  persistenceError,
  ServiceResult,
} from '../common/service-result';

@Injectable()
export class MessageService {
  private readonly logger = new Logger(MessageService.name);

  constructor(
    @InjectModel(Message.name) private messageModel: Model<MessageDocument>,
    @InjectModel(Vehicle.name) private vehicleModel: Model<VehicleDocument>,
  ) {}

  async create(
    vehicleId: string,
    createMessageDto: CreateMessageDto,
  ): Promise<ServiceResult<MessageDocument>> {
    try {
      const vehicle = Types.ObjectId.isValid(vehicleId)
        ? await this.vehicleModel.findById(vehicleId).exec()
        : null;
      if (!vehicle) {
        return notFoundError(`Vehicle with ID ${vehicleId} not found`);
      }

      const message = await new this.messageModel({
        vehicle_id: vehicleId,
        sender_type: createMessageDto.sender_type,
        message_text: createMessageDto.message_text,
        read: false,
        sent_at: new Date(),
      }).save();

      this.logger.log(
        `Message from ${message.sender_type} saved for vehicle ${vehicleId}`,
      );
      return ok(message);
    } catch (error) {
      const { message, stack } = describeError(error);
      this.logger.error(`Failed to save message: ${message}`, stack);
      return persistenceError('Failed to save message', error);
    }
  }

  async findByVehicle(
    vehicleId: string,
  ): Promise<ServiceResult<MessageDocument[]>> {
    if (!Types.ObjectId.isValid(vehicleId)) {
      return ok([]);
    }

    try {
      const messages = await this.messageModel
        .find({ vehicle_id: vehicleId })
        .sort({ sent_at: 1 })
        .exec();
      return ok(messages);
    } catch (error) {
      const { message, stack } = describeError(error);
      this.logger.error(`Failed to fetch messages: ${message}`, stack);
      return persistenceError('Failed to fetch messages', error);
    }
  }

  async markRead(messageId: string): Promise<ServiceResult<MessageDocument>> {
    if (!Types.ObjectId.isValid(messageId)) {
      return notFoundError(`Message with ID ${messageId} not found`);
    }

    try {
      const message = await this.messageModel
        .findByIdAndUpdate(messageId, { read: true }, { new: true })
        .exec();
      if (!message) {
        return notFoundError(`Message with ID ${messageId} not found`);
      }
      return ok(message);
    } catch (error) {
      const { message, stack } = describeError(error);
      this.logger.error(`Failed to mark message read: ${message}`, stack);
      return persistenceError('Failed to update message', error);
    }
  }

  async removeForVehicle(vehicleId: string): Promise<ServiceResult<number>> {
    try {
      const result = await this.messageModel
        .deleteMany({ vehicle_id: vehicleId })
        .exec();
      return ok(result.deletedCount);
    } catch (error) {
      const { message, stack } = describeError(error);
      this.logger.error(
        `Failed to delete messages for vehicle ${vehicleId}: ${message}`,
        stack,
      );
      return persistenceError('Failed to delete messages', error);
    }
  }
}
