import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Patch,
  Post,
  Query,
} from '@nestjs/common';
import { VehicleService } from './vehicle.service';
import { CreateVehicleDto } from './dto/create-vehicle.dto';
import { UpdateStatusDto } from './dto/update-status.dto';
import { ApiResponse } from '../common/api-response';
import { unwrapResult } from '../common/http-result';

@Controller('vehicles')
export class VehicleController {
  constructor(private readonly vehicleService: VehicleService) {}

  @Post()
  @HttpCode(HttpStatus.CREATED)
  async create(
    @Query('shop_id') shopId: string,
    @Body() createVehicleDto: CreateVehicleDto,
  ): Promise<ApiResponse> {
    const vehicle = unwrapResult(
      await this.vehicleService.create(shopId, createVehicleDto),
    );
    return ApiResponse.success(
      vehicle,
      'Vehicle created successfully',
      HttpStatus.CREATED,
    );
  }

  // public: the tracking token is the only credential
  @Get(':uniqueLink')
  async findByTrackingToken(
    @Param('uniqueLink') uniqueLink: string,
  ): Promise<ApiResponse> {
    const vehicle = unwrapResult(
      await this.vehicleService.findByTrackingToken(uniqueLink),
    );
    return ApiResponse.success(vehicle, 'Vehicle retrieved successfully');
  }

  @Patch(':vehicleId/status')
  async updateStatus(
    @Param('vehicleId') vehicleId: string,
    @Query('user_id') userId: string | undefined,
    @Body() updateStatusDto: UpdateStatusDto,
  ): Promise<ApiResponse> {
    unwrapResult(
      await this.vehicleService.updateStatus(vehicleId, updateStatusDto, userId),
    );
    return ApiResponse.success(null, 'Status updated successfully');
  }

  @Patch(':vehicleId/toggle-warranty')
  async toggleWarranty(
    @Param('vehicleId') vehicleId: string,
  ): Promise<ApiResponse> {
    const result = unwrapResult(
      await this.vehicleService.toggleWarranty(vehicleId),
    );
    return ApiResponse.success(result, 'Warranty status updated successfully');
  }

  @Get(':vehicleId/updates')
  async findUpdates(
    @Param('vehicleId') vehicleId: string,
  ): Promise<ApiResponse> {
    const updates = unwrapResult(
      await this.vehicleService.findUpdates(vehicleId),
    );
    return ApiResponse.success(updates, 'Status history retrieved successfully');
  }

  @Get(':vehicleId/image')
  async findImage(@Param('vehicleId') vehicleId: string): Promise<ApiResponse> {
    const imageUrl = unwrapResult(await this.vehicleService.findImage(vehicleId));
    return ApiResponse.success(
      { image_url: imageUrl },
      imageUrl ? 'Vehicle image found' : 'No vehicle image available',
    );
  }

  @Delete(':vehicleId')
  @HttpCode(HttpStatus.OK)
  async remove(@Param('vehicleId') vehicleId: string): Promise<ApiResponse> {
    unwrapResult(await this.vehicleService.remove(vehicleId));
    return ApiResponse.success(null, 'Vehicle deleted successfully');
  }
}
