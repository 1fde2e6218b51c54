import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectModel } from '@nestjs/mongoose';
import { Model } from 'mongoose';
import {
  ServiceRecord,
  ServiceRecordDocument,
} from './schema/service-record.schema';
import { Vehicle, VehicleDocument } from '../vehicle/schema/vehicle.schema';
import { SmsService } from '../notification/sms.service';
import { buildServiceReminderMessage } from '../notification/notification-templates';
import { AppConfig } from '../config/configuration';
import { ActivityLogService } from '../common/logging/activity-log.service';
import {
  describeError,
  ok,
  persistenceError,
  ServiceResult,
} from '../common/service-result';

export interface DueReminder {
  record: ServiceRecordDocument;
  vehicle: VehicleDocument | null;
}

export interface ReminderDispatchSummary {
  due: number;
  sent: number;
  skipped: number;
  failed: number;
}

/**
 * Finds service records whose reminder date has passed and texts the
 * customer. Invoked by an external scheduler; a failed send stays due and is
 * picked up again by the next run.
 */
@Injectable()
export class ServiceReminderService {
  private readonly logger = new Logger(ServiceReminderService.name);

  constructor(
    @InjectModel(ServiceRecord.name)
    private serviceRecordModel: Model<ServiceRecordDocument>,
    @InjectModel(Vehicle.name) private vehicleModel: Model<VehicleDocument>,
    private readonly smsService: SmsService,
    private readonly activityLog: ActivityLogService,
    private readonly configService: ConfigService<AppConfig, true>,
  ) {}

  async findDue(now: Date = new Date()): Promise<ServiceResult<DueReminder[]>> {
    try {
      const records = await this.serviceRecordModel
        .find({ next_reminder_date: { $lte: now }, reminder_sent: false })
        .sort({ next_reminder_date: 1 })
        .exec();

      const vehicleIds = [
        ...new Set(records.map((record) => String(record.vehicle_id))),
      ];
      const vehicles = vehicleIds.length
        ? await this.vehicleModel.find({ _id: { $in: vehicleIds } }).exec()
        : [];
      const vehiclesById = new Map<string, VehicleDocument>(
        vehicles.map((vehicle) => [String(vehicle._id), vehicle]),
      );

      return ok(
        records.map((record) => ({
          record,
          vehicle: vehiclesById.get(String(record.vehicle_id)) ?? null,
        })),
      );
    } catch (error) {
      const { message, stack } = describeError(error);
      this.logger.error(`Failed to query due reminders: ${message}`, stack);
      return persistenceError('Failed to query due reminders', error);
    }
  }

  async dispatchDue(
    now: Date = new Date(),
  ): Promise<ServiceResult<ReminderDispatchSummary>> {
    const due = await this.findDue(now);
    if (!due.ok) {
      return due;
    }

    const { shopName } = this.configService.get('portal', { infer: true });
    const summary: ReminderDispatchSummary = {
      due: due.value.length,
      sent: 0,
      skipped: 0,
      failed: 0,
    };

    for (const { record, vehicle } of due.value) {
      const recordId = String(record._id);

      if (!vehicle || !vehicle.customer_phone) {
        summary.skipped += 1;
        this.logger.warn(
          `Skipping reminder ${recordId}: no vehicle or phone number on file`,
        );
        continue;
      }

      const body = buildServiceReminderMessage(
        { customerName: vehicle.customer_name, shopName },
        vehicle,
        {
          serviceType: record.service_type,
          mileage: record.mileage,
          nextServiceMileage: record.next_service_mileage,
        },
      );

      const delivered = await this.smsService.send(vehicle.customer_phone, body);
      if (!delivered) {
        summary.failed += 1;
        this.logger.warn(
          `Reminder ${recordId} was not delivered; it stays due for the next run`,
        );
        continue;
      }

      summary.sent += 1;
      try {
        await this.serviceRecordModel
          .updateOne(
            { _id: record._id, reminder_sent: false },
            { $set: { reminder_sent: true } },
          )
          .exec();
      } catch (error) {
        const { message, stack } = describeError(error);
        this.logger.error(
          `Reminder ${recordId} was sent but could not be marked sent: ${message}`,
          stack,
        );
      }
    }

    this.logger.log(
      `Reminder run finished: ${summary.sent} sent, ${summary.failed} failed, ${summary.skipped} skipped of ${summary.due} due`,
    );
    await this.activityLog.record({
      operation: 'DISPATCH',
      resource: 'SERVICE_REMINDER',
      message: `Sent ${summary.sent} of ${summary.due} due reminders`,
      metadata: { ...summary },
      isError: summary.failed > 0,
    });

    return ok(summary);
  }
}
