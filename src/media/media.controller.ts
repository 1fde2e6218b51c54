import {
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Post,
  Query,
  UploadedFile,
  UseInterceptors,
} from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import { MediaService } from './media.service';
import { UploadedMediaFile, UploadMediaDto } from './dto/upload-media.dto';
import { ApiResponse } from '../common/api-response';
import { unwrapResult } from '../common/http-result';

const MAX_UPLOAD_BYTES = 50 * 1024 * 1024;

@Controller('vehicles/:vehicleId/media')
export class MediaController {
  constructor(private readonly mediaService: MediaService) {}

  @Post()
  @HttpCode(HttpStatus.CREATED)
  @UseInterceptors(
    FileInterceptor('file', { limits: { fileSize: MAX_UPLOAD_BYTES } }),
  )
  async upload(
    @Param('vehicleId') vehicleId: string,
    @UploadedFile() file: UploadedMediaFile | undefined,
    @Query() uploadMediaDto: UploadMediaDto,
  ): Promise<ApiResponse> {
    const media = unwrapResult(
      await this.mediaService.upload(vehicleId, file, uploadMediaDto),
    );
    return ApiResponse.success(
      media,
      'Media uploaded successfully',
      HttpStatus.CREATED,
    );
  }

  @Get()
  async findByVehicle(
    @Param('vehicleId') vehicleId: string,
  ): Promise<ApiResponse> {
    const media = unwrapResult(await this.mediaService.findByVehicle(vehicleId));
    return ApiResponse.success(media, 'Media retrieved successfully');
  }
}
