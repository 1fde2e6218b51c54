import { Injectable, Logger } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { Model, Types } from 'mongoose';
import { randomUUID } from 'node:crypto';
import { Media, MediaDocument, MediaType } from './schema/media.schema';
import { UploadedMediaFile, UploadMediaDto } from './dto/upload-media.dto';
import { MediaStorageService } from './media-storage.service';
import { Vehicle, VehicleDocument } from '../vehicle/schema/vehicle.schema';
import {
  describeError,
  notFoundError,
  ok,
  persistenceError,
  ServiceResult,
  validationError,
} from '../common/service-result';

export const mediaTypeFor = (contentType: string | undefined): MediaType =>
  contentType?.startsWith('image') ? MediaType.PHOTO : MediaType.VIDEO;

export function buildObjectName(vehicleId: string, filename: string): string {
  const dot = filename.lastIndexOf('.');
  const extension = dot >= 0 && dot < filename.length - 1
    ? filename.slice(dot + 1)
    : 'jpg';
  return `${vehicleId}_${randomUUID()}.${extension}`;
}

@Injectable()
export class MediaService {
  private readonly logger = new Logger(MediaService.name);

  constructor(
    @InjectModel(Media.name) private mediaModel: Model<MediaDocument>,
    @InjectModel(Vehicle.name) private vehicleModel: Model<VehicleDocument>,
    private readonly storage: MediaStorageService,
  ) {}

  async upload(
    vehicleId: string,
    file: UploadedMediaFile | undefined,
    uploadMediaDto: UploadMediaDto,
  ): Promise<ServiceResult<MediaDocument>> {
    if (!file || file.size === 0) {
      return validationError('A non-empty file is required');
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

    const contentType = file.mimetype || 'image/jpeg';
    const objectName = buildObjectName(vehicleId, file.originalname);

    let publicUrl: string;
    try {
      publicUrl = await this.storage.upload(objectName, file.buffer, contentType);
    } catch (error) {
      const { message, stack } = describeError(error);
      this.logger.error(`Failed to upload ${objectName}: ${message}`, stack);
      return persistenceError('Failed to upload media', error);
    }

    try {
      const media = await new this.mediaModel({
        vehicle_id: vehicleId,
        user_id: uploadMediaDto.user_id ?? null,
        media_type: mediaTypeFor(file.mimetype),
        media_url: publicUrl,
        caption: uploadMediaDto.caption ?? null,
        uploaded_at: new Date(),
      }).save();

      this.logger.log(`Media uploaded successfully: ${publicUrl}`);
      return ok(media);
    } catch (error) {
      const { message, stack } = describeError(error);
      this.logger.error(`Failed to save media record: ${message}`, stack);
      return persistenceError('Failed to save media record', error);
    }
  }

  async findByVehicle(
    vehicleId: string,
  ): Promise<ServiceResult<MediaDocument[]>> {
    if (!Types.ObjectId.isValid(vehicleId)) {
      return ok([]);
    }

    try {
      const media = await this.mediaModel
        .find({ vehicle_id: vehicleId })
        .sort({ uploaded_at: -1 })
        .exec();
      return ok(media);
    } catch (error) {
      const { message, stack } = describeError(error);
      this.logger.error(`Failed to fetch media: ${message}`, stack);
      return persistenceError('Failed to fetch media', error);
    }
  }

  // stored blobs are left in the bucket
  async removeForVehicle(vehicleId: string): Promise<ServiceResult<number>> {
    try {
      const result = await this.mediaModel
        .deleteMany({ vehicle_id: vehicleId })
        .exec();
      return ok(result.deletedCount);
    } catch (error) {
      const { message, stack } = describeError(error);
      this.logger.error(
        `Failed to delete media for vehicle ${vehicleId}: ${message}`,
        stack,
      );
      return persistenceError('Failed to delete media', error);
    }
  }
}
