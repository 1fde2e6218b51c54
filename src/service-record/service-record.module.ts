import { Module } from '@nestjs/common';
import { MongooseModule } from '@nestjs/mongoose';
import {
  ServiceRecord,
  ServiceRecordSchema,
} from './schema/service-record.schema';
import { Vehicle, VehicleSchema } from '../vehicle/schema/vehicle.schema';
import { NotificationModule } from '../notification/notification.module';
import { ServiceRecordController } from './service-record.controller';
import { ServiceReminderController } from './service-reminder.controller';
import { ServiceRecordService } from './service-record.service';
import { ServiceReminderService } from './service-reminder.service';

@Module({
  imports: [
    MongooseModule.forFeature([
      { name: ServiceRecord.name, schema: ServiceRecordSchema },
      { name: Vehicle.name, schema: VehicleSchema },
    ]),
    NotificationModule,
  ],
  controllers: [ServiceRecordController, ServiceReminderController],
  providers: [ServiceRecordService, ServiceReminderService],
  exports: [ServiceRecordService],
})
export class ServiceRecordModule {}
