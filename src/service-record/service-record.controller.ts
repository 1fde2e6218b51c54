import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Post,
} from '@nestjs/common';
import { ServiceRecordService } from './service-record.service';
import { CreateServiceRecordDto } from './dto/create-service-record.dto';
import { ApiResponse } from '../common/api-response';
import { unwrapResult } from '../common/http-result';

@Controller('vehicles/:vehicleId/service')
export class ServiceRecordController {
  constructor(private readonly serviceRecordService: ServiceRecordService) {}

  @Post()
  @HttpCode(HttpStatus.CREATED)
  async create(
    @Param('vehicleId') vehicleId: string,
    @Body() createServiceRecordDto: CreateServiceRecordDto,
  ): Promise<ApiResponse> {
    const serviceRecord = unwrapResult(
      await this.serviceRecordService.record(vehicleId, createServiceRecordDto),
    );
    return ApiResponse.success(
      serviceRecord,
      'Service record created successfully',
      HttpStatus.CREATED,
    );
  }

  @Get()
  async findByVehicle(
    @Param('vehicleId') vehicleId: string,
  ): Promise<ApiResponse> {
    const records = unwrapResult(
      await this.serviceRecordService.findByVehicle(vehicleId),
    );
    return ApiResponse.success(
      records,
      'Service records retrieved successfully',
    );
  }
}
