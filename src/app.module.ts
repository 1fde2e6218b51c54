import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { MongooseModule } from '@nestjs/mongoose';
import configuration, { AppConfig } from './config/configuration';
import { validateEnv } from './config/env.validation';
import { ActivityLogModule } from './common/logging/activity-log.module';
import { AppController } from './app.controller';
import { VehicleModule } from './vehicle/vehicle.module';
import { MessageModule } from './message/message.module';
import { MediaModule } from './media/media.module';
import { ApprovalModule } from './approval/approval.module';
import { ServiceRecordModule } from './service-record/service-record.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
      load: [configuration],
      validate: validateEnv,
    }),
    MongooseModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService<AppConfig, true>) => ({
        uri: configService.get('database', { infer: true }).url,
      }),
    }),
    ActivityLogModule,
    VehicleModule,
    MessageModule,
    MediaModule,
    ApprovalModule,
    ServiceRecordModule,
  ],
  controllers: [AppController],
})
export class AppModule {}
