import { Injectable, Logger } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { Model, Types } from 'mongoose';
import { Approval, ApprovalDocument } from './schema/approval.schema';
import { CreateApprovalDto } from './dto/create-approval.dto';
import { Vehicle, VehicleDocument } from '../vehicle/schema/vehicle.schema';
import {
  describeError,
  notFoundError,
  ok,
  persistenceError,
  ServiceResult,
  validationError,
} from '../common/service-result';

@Injectable()
export class ApprovalService {
  private readonly logger = new Logger(ApprovalService.name);

  constructor(
    @InjectModel(Approval.name) private approvalModel: Model<ApprovalDocument>,
    @InjectModel(Vehicle.name) private vehicleModel: Model<VehicleDocument>,
  ) {}

  async create(
    vehicleId: string,
    createApprovalDto: CreateApprovalDto,
  ): Promise<ServiceResult<ApprovalDocument>> {
    try {
      const vehicle = Types.ObjectId.isValid(vehicleId)
        ? await this.vehicleModel.findById(vehicleId).exec()
        : null;
      if (!vehicle) {
        return notFoundError(`Vehicle with ID ${vehicleId} not found`);
      }

      const approval = await new this.approvalModel({
        vehicle_id: vehicleId,
        description: createApprovalDto.description,
        cost: createApprovalDto.cost,
        approved: null,
        approved_at: null,
      }).save();

      this.logger.log(
        `Approval requested for vehicle ${vehicleId}: ${approval.description} (${approval.cost})`,
      );
      return ok(approval);
    } catch (error) {
      const { message, stack } = describeError(error);
      this.logger.error(`Failed to create approval: ${message}`, stack);
      return persistenceError('Failed to create approval', error);
    }
  }

  /**
   * Records the customer's answer. An approval is answered once; later
   * answers are rejected rather than overwriting the first.
   */
  async respond(
    approvalId: string,
    approved: boolean,
  ): Promise<ServiceResult<ApprovalDocument>> {
    if (!Types.ObjectId.isValid(approvalId)) {
      return notFoundError(`Approval with ID ${approvalId} not found`);
    }

    try {
      const updated = await this.approvalModel
        .findOneAndUpdate(
          { _id: approvalId, approved: null },
          { approved, approved_at: new Date() },
          { new: true },
        )
        .exec();

      if (updated) {
        this.logger.log(
          `Approval ${approvalId} ${approved ? 'approved' : 'declined'}`,
        );
        return ok(updated);
      }

      const existing = await this.approvalModel.findById(approvalId).exec();
      if (!existing) {
        return notFoundError(`Approval with ID ${approvalId} not found`);
      }
      return validationError(`Approval ${approvalId} has already been answered`);
    } catch (error) {
      const { message, stack } = describeError(error);
      this.logger.error(`Failed to record approval response: ${message}`, stack);
      return persistenceError('Failed to record approval response', error);
    }
  }

  async findByVehicle(
    vehicleId: string,
  ): Promise<ServiceResult<ApprovalDocument[]>> {
    if (!Types.ObjectId.isValid(vehicleId)) {
      return ok([]);
    }

    try {
      const approvals = await this.approvalModel
        .find({ vehicle_id: vehicleId })
        .sort({ created_at: 1 })
        .exec();
      return ok(approvals);
    } catch (error) {
      const { message, stack } = describeError(error);
      this.logger.error(`Failed to fetch approvals: ${message}`, stack);
      return persistenceError('Failed to fetch approvals', error);
    }
  }

  async removeForVehicle(vehicleId: string): Promise<ServiceResult<number>> {
    try {
      const result = await this.approvalModel
        .deleteMany({ vehicle_id: vehicleId })
        .exec();
      return ok(result.deletedCount);
    } catch (error) {
      const { message, stack } = describeError(error);
      this.logger.error(
        `Failed to delete approvals for vehicle ${vehicleId}: ${message}`,
        stack,
      );
      return persistenceError('Failed to delete approvals', error);
    }
  }
}
