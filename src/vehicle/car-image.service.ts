import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import axios from 'axios';
import { AppConfig } from '../config/configuration';
import { describeError } from '../common/service-result';
import { describeVehicle, VehicleDescriptor } from '../notification/notification-templates';

const UNSPLASH_SEARCH_URL = 'https://api.unsplash.com/search/photos';

interface UnsplashSearchResponse {
  results?: Array<{ urls?: { regular?: string } }>;
}

/** Stock photo lookup for the customer portal header. */
@Injectable()
export class CarImageService {
  private readonly logger = new Logger(CarImageService.name);

  constructor(private readonly configService: ConfigService<AppConfig, true>) {}

  async findImageUrl(vehicle: VehicleDescriptor): Promise<string | null> {
    const { unsplashAccessKey } = this.configService.get('imageSearch', {
      infer: true,
    });
    if (!unsplashAccessKey) {
      return null;
    }

    try {
      const response = await axios.get<UnsplashSearchResponse>(
        UNSPLASH_SEARCH_URL,
        {
          params: {
            query: `${describeVehicle(vehicle)} car`,
            per_page: 1,
            orientation: 'landscape',
          },
          headers: { Authorization: `Client-ID ${unsplashAccessKey}` },
          timeout: 5000,
        },
      );
      return response.data.results?.[0]?.urls?.regular ?? null;
    } catch (error) {
      this.logger.warn(
        `Error fetching car image: ${describeError(error).message}`,
      );
      return null;
    }
  }
}
