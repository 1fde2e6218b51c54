import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import axios from 'axios';
import { AppConfig } from '../../config/configuration';
import { describeError } from '../service-result';

export interface ActivityLogEntry {
  operation: string;
  resource: string;
  message: string;
  userId?: string;
  metadata?: Record<string, unknown>;
  isError?: boolean;
  errorMessage?: string;
}

/**
 * Ships activity events to the logs collector when `LOGS_SERVICE_URL` is set.
 */
@Injectable()
export class ActivityLogService {
  private readonly logger = new Logger(ActivityLogService.name);

  constructor(private readonly configService: ConfigService<AppConfig, true>) {}

  async record(entry: ActivityLogEntry): Promise<void> {
    const { serviceUrl } = this.configService.get('logs', { infer: true });
    if (!serviceUrl) {
      return;
    }

    try {
      await axios.post(
        serviceUrl,
        {
          ...entry,
          timestamp: new Date(),
          ipAddress: 'internal',
          userAgent: 'shop-tracker-api',
        },
        {
          timeout: 5000,
          headers: { 'Content-Type': 'application/json' },
        },
      );
    } catch (error) {
      this.logger.warn(
        `Failed to send log to logs service: ${describeError(error).message}`,
      );
    }
  }
}
