import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectModel } from '@nestjs/mongoose';
import { Model, Types } from 'mongoose';
import {
  ServiceRecord,
  ServiceRecordDocument,
} from './schema/service-record.schema';
import { CreateServiceRecordDto } from './dto/create-service-record.dto';
import { Vehicle, VehicleDocument } from '../vehicle/schema/vehicle.schema';
import { SmsService } from '../notification/sms.service';
import {
  buildServiceConfirmationMessage,
  computeNextReminderDate,
} from '../notification/notification-templates';
import { AppConfig } from '../config/configuration';
import { ActivityLogService } from '../common/logging/activity-log.service';
import {
  describeError,
  internalError,
  notFoundError,
  ok,
  persistenceError,
  ServiceResult,
  validationError,
} from '../common/service-result';

@Injectable()
export class ServiceRecordService {
  private readonly logger = new Logger(ServiceRecordService.name);

  constructor(
    @InjectModel(ServiceRecord.name)
    private serviceRecordModel: Model<ServiceRecordDocument>,
    @InjectModel(Vehicle.name) private vehicleModel: Model<VehicleDocument>,
    private readonly smsService: SmsService,
    private readonly activityLog: ActivityLogService,
    private readonly configService: ConfigService<AppConfig, true>,
  ) {}

  /**
   * Saves a completed service and texts the customer a summary. The next
   * reminder date is only set when an interval is given.
   */
  async record(
    vehicleId: string,
    createServiceRecordDto: CreateServiceRecordDto,
  ): Promise<ServiceResult<ServiceRecordDocument>> {
    const {
      service_type,
      mileage,
      next_service_mileage,
      reminder_interval_months,
      notes,
    } = createServiceRecordDto;

    if (!service_type?.trim()) {
      return validationError('service_type is required');
    }
    if (!Number.isFinite(mileage) || mileage < 0) {
      return validationError('mileage must be a non-negative number');
    }

    let vehicle: VehicleDocument | null;
    try {
      vehicle = Types.ObjectId.isValid(vehicleId)
        ? await this.vehicleModel.findById(vehicleId).exec()
        : null;
    } catch (error) {
      return persistenceError('Failed to look up vehicle', error);
    }
    if (!vehicle) {
      return notFoundError(`Vehicle with ID ${vehicleId} not found`);
    }

    const now = new Date();
    const nextReminderDate = reminder_interval_months
      ? computeNextReminderDate(now, reminder_interval_months)
      : null;

    let serviceRecord: ServiceRecordDocument;
    try {
      serviceRecord = await new this.serviceRecordModel({
        vehicle_id: vehicleId,
        service_type,
        mileage,
        next_service_mileage: next_service_mileage ?? null,
        reminder_interval_months: reminder_interval_months ?? null,
        next_reminder_date: nextReminderDate,
        notes: notes ?? null,
        reminder_sent: false,
      }).save();
    } catch (error) {
      const { message, stack } = describeError(error);
      this.logger.error(`Failed to save service record: ${message}`, stack);
      return persistenceError('Failed to save service record', error);
    }

    try {
      if (vehicle.customer_phone) {
        const { shopName } = this.configService.get('portal', { infer: true });
        const body = buildServiceConfirmationMessage(
          { customerName: vehicle.customer_name, shopName },
          vehicle,
          {
            serviceType: service_type,
            mileage,
            nextServiceMileage: next_service_mileage,
            nextReminderDate,
          },
        );
        const delivered = await this.smsService.send(
          vehicle.customer_phone,
          body,
        );
        if (!delivered) {
          this.logger.warn(
            `Service confirmation for vehicle ${vehicleId} was not delivered`,
          );
        }
      } else {
        this.logger.warn(`No customer phone number for vehicle ${vehicleId}`);
      }
    } catch (error) {
      const { message, stack } = describeError(error);
      this.logger.error(
        `Service confirmation failed for vehicle ${vehicleId}: ${message}`,
        stack,
      );
      return internalError('Failed to send service confirmation', error);
    }

    await this.activityLog.record({
      operation: 'CREATE',
      resource: 'SERVICE_RECORD',
      message: `Service recorded: ${service_type} at ${mileage} miles`,
      metadata: {
        vehicleId,
        serviceRecordId: String(serviceRecord._id),
        nextReminderDate,
      },
    });

    return ok(serviceRecord);
  }

  async findByVehicle(
    vehicleId: string,
  ): Promise<ServiceResult<ServiceRecordDocument[]>> {
    if (!Types.ObjectId.isValid(vehicleId)) {
      return ok([]);
    }

    try {
      const records = await this.serviceRecordModel
        .find({ vehicle_id: vehicleId })
        .sort({ created_at: -1 })
        .exec();
      return ok(records);
    } catch (error) {
      const { message, stack } = describeError(error);
      this.logger.error(`Failed to fetch service records: ${message}`, stack);
      return persistenceError('Failed to fetch service records', error);
    }
  }

  async removeForVehicle(vehicleId: string): Promise<ServiceResult<number>> {
    try {
      const result = await this.serviceRecordModel
        .deleteMany({ vehicle_id: vehicleId })
        .exec();
      return ok(result.deletedCount);
    } catch (error) {
      const { message, stack } = describeError(error);
      this.logger.error(
        `Failed to delete service records for vehicle ${vehicleId}: ${message}`,
        stack,
      );
      return persistenceError('Failed to delete service records', error);
    }
  }
}
