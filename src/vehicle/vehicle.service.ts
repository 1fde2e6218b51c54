import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectModel } from '@nestjs/mongoose';
import { Model, Types } from 'mongoose';
import { randomUUID } from 'node:crypto';
import { CreateVehicleDto } from './dto/create-vehicle.dto';
import { UpdateStatusDto } from './dto/update-status.dto';
import {
  Vehicle,
  VehicleDocument,
  VehicleStatus,
} from './schema/vehicle.schema';
import {
  VehicleUpdate,
  VehicleUpdateDocument,
} from './schema/vehicle-update.schema';
import { CarImageService } from './car-image.service';
import { SmsService } from '../notification/sms.service';
import {
  buildCheckInMessage,
  buildPortalUrl,
  buildStatusMessage,
  buildWarrantyMessage,
} from '../notification/notification-templates';
import { MessageService } from '../message/message.service';
import { MediaService } from '../media/media.service';
import { ApprovalService } from '../approval/approval.service';
import { ServiceRecordService } from '../service-record/service-record.service';
import { ActivityLogService } from '../common/logging/activity-log.service';
import { AppConfig, AuditLogPolicy } from '../config/configuration';
import {
  describeError,
  notFoundError,
  ok,
  persistenceError,
  ServiceResult,
  validationError,
} from '../common/service-result';

export interface WarrantyToggleResult {
  awaiting_warranty: boolean;
  new_status: VehicleStatus;
}

export const generateTrackingToken = (): string => randomUUID();

@Injectable()
export class VehicleService {
  private readonly logger = new Logger(VehicleService.name);

  constructor(
    @InjectModel(Vehicle.name) private vehicleModel: Model<VehicleDocument>,
    @InjectModel(VehicleUpdate.name)
    private vehicleUpdateModel: Model<VehicleUpdateDocument>,
    private readonly smsService: SmsService,
    private readonly carImageService: CarImageService,
    private readonly messageService: MessageService,
    private readonly mediaService: MediaService,
    private readonly approvalService: ApprovalService,
    private readonly serviceRecordService: ServiceRecordService,
    private readonly activityLog: ActivityLogService,
    private readonly configService: ConfigService<AppConfig, true>,
  ) {}

  async create(
    shopId: string,
    createVehicleDto: CreateVehicleDto,
  ): Promise<ServiceResult<VehicleDocument>> {
    if (!shopId?.trim()) {
      return validationError('shop_id is required');
    }
    if (
      !createVehicleDto.customer_name?.trim() ||
      !createVehicleDto.customer_phone?.trim()
    ) {
      return validationError('customer_name and customer_phone are required');
    }

    this.logger.log(
      `Checking in vehicle for ${createVehicleDto.customer_name} at shop ${shopId}`,
    );

    let vehicle: VehicleDocument;
    try {
      vehicle = await new this.vehicleModel({
        shop_id: shopId,
        customer_name: createVehicleDto.customer_name,
        customer_phone: createVehicleDto.customer_phone,
        customer_email: createVehicleDto.customer_email ?? null,
        make: createVehicleDto.make ?? null,
        model: createVehicleDto.model ?? null,
        year: createVehicleDto.year ?? null,
        vin: createVehicleDto.vin ?? null,
        license_plate: createVehicleDto.license_plate ?? null,
        unique_link: generateTrackingToken(),
        status: VehicleStatus.CHECKED_IN,
        estimated_completion: createVehicleDto.estimated_completion
          ? new Date(createVehicleDto.estimated_completion)
          : null,
        awaiting_warranty: false,
        checked_in_at: new Date(),
      }).save();
    } catch (error) {
      const { message, stack } = describeError(error);
      this.logger.error(`Failed to create vehicle: ${message}`, stack);
      await this.activityLog.record({
        operation: 'CREATE',
        resource: 'VEHICLE',
        message: `Vehicle creation failed: ${message}`,
        metadata: { shopId },
        isError: true,
        errorMessage: message,
      });
      return persistenceError('Failed to create vehicle', error);
    }

    const { baseUrl, shopName } = this.configService.get('portal', {
      infer: true,
    });
    const portalUrl = buildPortalUrl(baseUrl, vehicle.unique_link);
    await this.notify(
      vehicle.customer_phone,
      buildCheckInMessage(
        { customerName: vehicle.customer_name, shopName },
        portalUrl,
      ),
    );

    await this.activityLog.record({
      operation: 'CREATE',
      resource: 'VEHICLE',
      message: `Vehicle checked in: ${vehicle._id}`,
      metadata: { shopId, vehicleId: String(vehicle._id) },
    });

    this.logger.log(`Vehicle created successfully with ID: ${vehicle._id}`);
    return ok(vehicle);
  }

  async findByTrackingToken(
    uniqueLink: string,
  ): Promise<ServiceResult<VehicleDocument>> {
    try {
      const vehicle = await this.vehicleModel
        .findOne({ unique_link: uniqueLink })
        .exec();
      if (!vehicle) {
        this.logger.warn(`No vehicle for tracking link ${uniqueLink}`);
        return notFoundError('Vehicle not found');
      }
      return ok(vehicle);
    } catch (error) {
      const { message, stack } = describeError(error);
      this.logger.error(`Failed to fetch vehicle by link: ${message}`, stack);
      return persistenceError('Failed to fetch vehicle', error);
    }
  }

  async findByShop(shopId: string): Promise<ServiceResult<VehicleDocument[]>> {
    try {
      const vehicles = await this.vehicleModel
        .find({ shop_id: shopId })
        .sort({ checked_in_at: -1 })
        .exec();
      this.logger.log(`Retrieved ${vehicles.length} vehicles for shop ${shopId}`);
      return ok(vehicles);
    } catch (error) {
      const { message, stack } = describeError(error);
      this.logger.error(`Failed to fetch shop vehicles: ${message}`, stack);
      return persistenceError('Failed to fetch vehicles', error);
    }
  }

  /**
   * Moves a vehicle to a new status, records the transition and, when status
   * texts are enabled, tells the customer.
   *
   * The audit append follows `AUDIT_LOG_POLICY`: `best_effort` logs a failed
   * append and still succeeds, `strict` fails the call. The status write is
   * kept either way.
   */
  async updateStatus(
    vehicleId: string,
    updateStatusDto: UpdateStatusDto,
    userId?: string,
  ): Promise<ServiceResult<void>> {
    const newStatus = updateStatusDto.new_status?.trim();
    if (!newStatus) {
      return validationError('new_status is required');
    }

    const found = await this.loadVehicle(vehicleId);
    if (!found.ok) {
      return found;
    }
    const vehicle = found.value;
    const oldStatus = vehicle.status;

    try {
      const updated = await this.vehicleModel
        .findByIdAndUpdate(vehicleId, {
          status: newStatus,
          ...(newStatus === VehicleStatus.READY
            ? { completed_at: new Date() }
            : {}),
        })
        .exec();
      if (!updated) {
        this.logger.warn(`Vehicle ${vehicleId} was deleted before its status changed`);
        return notFoundError(`Vehicle with ID ${vehicleId} not found`);
      }
    } catch (error) {
      const { message, stack } = describeError(error);
      this.logger.error(`Failed to update vehicle status: ${message}`, stack);
      return persistenceError('Failed to update vehicle status', error);
    }

    try {
      await new this.vehicleUpdateModel({
        vehicle_id: vehicleId,
        user_id: userId ?? null,
        old_status: oldStatus,
        new_status: newStatus,
        message: updateStatusDto.message ?? null,
        timestamp: new Date(),
      }).save();
    } catch (error) {
      const { message, stack } = describeError(error);
      if (this.auditPolicy === AuditLogPolicy.STRICT) {
        this.logger.error(
          `Status update record failed for vehicle ${vehicleId}: ${message}`,
          stack,
        );
        return persistenceError('Failed to record status update', error);
      }
      this.logger.warn(
        `Non-critical: status update record failed for vehicle ${vehicleId}: ${message}`,
      );
    }

    if (this.configService.get('sms', { infer: true }).statusUpdatesEnabled) {
      if (vehicle.customer_phone) {
        const { shopName } = this.configService.get('portal', { infer: true });
        await this.notify(
          vehicle.customer_phone,
          buildStatusMessage(
            newStatus,
            { customerName: vehicle.customer_name || 'Customer', shopName },
            updateStatusDto.message,
          ),
        );
      } else {
        this.logger.warn(`No customer phone number for vehicle ${vehicleId}`);
      }
    }

    await this.activityLog.record({
      operation: 'UPDATE_STATUS',
      resource: 'VEHICLE',
      message: `Vehicle ${vehicleId}: ${oldStatus} -> ${newStatus}`,
      userId,
      metadata: { vehicleId, oldStatus, newStatus },
    });

    this.logger.log(`Vehicle ${vehicleId} moved from ${oldStatus} to ${newStatus}`);
    return ok(undefined);
  }

  /**
   * Flips the warranty hold. Holding forces `awaiting_warranty`; releasing
   * forces `in_progress`, whatever the status was before the hold.
   */
  async toggleWarranty(
    vehicleId: string,
  ): Promise<ServiceResult<WarrantyToggleResult>> {
    const found = await this.loadVehicle(vehicleId);
    if (!found.ok) {
      return found;
    }
    const vehicle = found.value;

    const awaitingWarranty = !vehicle.awaiting_warranty;
    const newStatus = awaitingWarranty
      ? VehicleStatus.AWAITING_WARRANTY
      : VehicleStatus.IN_PROGRESS;

    try {
      const updated = await this.vehicleModel
        .findByIdAndUpdate(vehicleId, {
          awaiting_warranty: awaitingWarranty,
          status: newStatus,
        })
        .exec();
      if (!updated) {
        this.logger.warn(`Vehicle ${vehicleId} was deleted before its warranty hold changed`);
        return notFoundError(`Vehicle with ID ${vehicleId} not found`);
      }
    } catch (error) {
      const { message, stack } = describeError(error);
      this.logger.error(`Failed to toggle warranty status: ${message}`, stack);
      return persistenceError('Failed to toggle warranty status', error);
    }

    if (vehicle.customer_phone) {
      await this.notify(
        vehicle.customer_phone,
        buildWarrantyMessage(awaitingWarranty),
      );
    }

    this.logger.log(
      `Vehicle ${vehicleId} warranty hold ${awaitingWarranty ? 'on' : 'off'}`,
    );
    return ok({ awaiting_warranty: awaitingWarranty, new_status: newStatus });
  }

  async findUpdates(
    vehicleId: string,
  ): Promise<ServiceResult<VehicleUpdateDocument[]>> {
    if (!Types.ObjectId.isValid(vehicleId)) {
      return ok([]);
    }

    try {
      const updates = await this.vehicleUpdateModel
        .find({ vehicle_id: vehicleId })
        .sort({ timestamp: 1 })
        .exec();
      return ok(updates);
    } catch (error) {
      const { message, stack } = describeError(error);
      this.logger.error(`Failed to fetch status history: ${message}`, stack);
      return persistenceError('Failed to fetch status history', error);
    }
  }

  async findImage(vehicleId: string): Promise<ServiceResult<string | null>> {
    const found = await this.loadVehicle(vehicleId);
    if (!found.ok) {
      return found;
    }
    return ok(await this.carImageService.findImageUrl(found.value));
  }

  /**
   * Deletes the vehicle's children one collection at a time, then the vehicle.
   * Every child delete is attempted; if any fails the vehicle row is kept so
   * the call can be repeated. Completed deletes are not undone.
   */
  async remove(vehicleId: string): Promise<ServiceResult<void>> {
    const found = await this.loadVehicle(vehicleId);
    if (!found.ok) {
      return found;
    }

    const children: Array<[string, () => Promise<ServiceResult<number>>]> = [
      ['messages', () => this.messageService.removeForVehicle(vehicleId)],
      ['media', () => this.mediaService.removeForVehicle(vehicleId)],
      ['approvals', () => this.approvalService.removeForVehicle(vehicleId)],
      [
        'service records',
        () => this.serviceRecordService.removeForVehicle(vehicleId),
      ],
      ['status updates', () => this.removeUpdates(vehicleId)],
    ];

    const failed: string[] = [];
    for (const [collection, removeChildren] of children) {
      const result = await removeChildren();
      if (result.ok) {
        this.logger.log(
          `Deleted ${result.value} ${collection} for vehicle ${vehicleId}`,
        );
      } else {
        failed.push(collection);
      }
    }

    if (failed.length > 0) {
      return persistenceError(
        `Failed to delete ${failed.join(', ')} for vehicle ${vehicleId}`,
      );
    }

    try {
      await this.vehicleModel.findByIdAndDelete(vehicleId).exec();
    } catch (error) {
      const { message, stack } = describeError(error);
      this.logger.error(`Failed to delete vehicle: ${message}`, stack);
      return persistenceError('Failed to delete vehicle', error);
    }

    await this.activityLog.record({
      operation: 'DELETE',
      resource: 'VEHICLE',
      message: `Vehicle deleted: ${vehicleId}`,
      metadata: { vehicleId },
    });

    this.logger.log(`Vehicle deleted successfully with ID: ${vehicleId}`);
    return ok(undefined);
  }

  private get auditPolicy(): AuditLogPolicy {
    return this.configService.get('audit', { infer: true }).policy;
  }

  private async loadVehicle(
    vehicleId: string,
  ): Promise<ServiceResult<VehicleDocument>> {
    if (!Types.ObjectId.isValid(vehicleId)) {
      return notFoundError(`Vehicle with ID ${vehicleId} not found`);
    }

    try {
      const vehicle = await this.vehicleModel.findById(vehicleId).exec();
      if (!vehicle) {
        this.logger.warn(`Vehicle not found with ID: ${vehicleId}`);
        return notFoundError(`Vehicle with ID ${vehicleId} not found`);
      }
      return ok(vehicle);
    } catch (error) {
      const { message, stack } = describeError(error);
      this.logger.error(`Failed to fetch vehicle: ${message}`, stack);
      return persistenceError('Failed to fetch vehicle', error);
    }
  }

  private async removeUpdates(
    vehicleId: string,
  ): Promise<ServiceResult<number>> {
    try {
      const result = await this.vehicleUpdateModel
        .deleteMany({ vehicle_id: vehicleId })
        .exec();
      return ok(result.deletedCount);
    } catch (error) {
      const { message, stack } = describeError(error);
      this.logger.error(
        `Failed to delete status updates for vehicle ${vehicleId}: ${message}`,
        stack,
      );
      return persistenceError('Failed to delete status updates', error);
    }
  }

  // a failed text never changes the result
  private async notify(to: string, body: string): Promise<void> {
    try {
      const delivered = await this.smsService.send(to, body);
      if (!delivered) {
        this.logger.warn(`SMS to ${to} was not delivered. Message: ${body}`);
      }
    } catch (error) {
      const { message, stack } = describeError(error);
      this.logger.error(
        `SMS to ${to} failed: ${message}. Message: ${body}`,
        stack,
      );
    }
  }
}
