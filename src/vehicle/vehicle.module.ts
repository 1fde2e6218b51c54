import { Module } from '@nestjs/common';
import { MongooseModule } from '@nestjs/mongoose';
import { Vehicle, VehicleSchema } from './schema/vehicle.schema';
import {
  VehicleUpdate,
  VehicleUpdateSchema,
} from './schema/vehicle-update.schema';
import { VehicleController } from './vehicle.controller';
import { ShopVehicleController } from './shop-vehicle.controller';
import { VehicleService } from './vehicle.service';
import { CarImageService } from './car-image.service';
import { NotificationModule } from '../notification/notification.module';
import { MessageModule } from '../message/message.module';
import { MediaModule } from '../media/media.module';
import { ApprovalModule } from '../approval/approval.module';
import { ServiceRecordModule } from '../service-record/service-record.module';

@Module({
  imports: [
    MongooseModule.forFeature([
      { name: Vehicle.name, schema: VehicleSchema },
      { name: VehicleUpdate.name, schema: VehicleUpdateSchema },
    ]),
    NotificationModule,
    MessageModule,
    MediaModule,
    ApprovalModule,
    ServiceRecordModule,
  ],
  controllers: [VehicleController, ShopVehicleController],
  providers: [VehicleService, CarImageService],
  exports: [VehicleService],
})
export class VehicleModule {}
