import { Controller, Get, Param } from '@nestjs/common';
import { VehicleService } from './vehicle.service';
import { ApiResponse } from '../common/api-response';
import { unwrapResult } from '../common/http-result';

/** Advisor dashboard listing. */
@Controller('shop')
export class ShopVehicleController {
  constructor(private readonly vehicleService: VehicleService) {}

  @Get(':shopId/vehicles')
  async findByShop(@Param('shopId') shopId: string): Promise<ApiResponse> {
    const vehicles = unwrapResult(await this.vehicleService.findByShop(shopId));
    return ApiResponse.success(vehicles, 'Vehicles retrieved successfully');
  }
}
