import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createClient, SupabaseClient } from '@supabase/supabase-js';
import { AppConfig } from '../config/configuration';

/**
 * Blob sink for vehicle photos and videos, backed by a Supabase Storage bucket.
 */
@Injectable()
export class MediaStorageService {
  private readonly logger = new Logger(MediaStorageService.name);
  private readonly client: SupabaseClient | null;
  private readonly bucket: string;

  constructor(configService: ConfigService<AppConfig, true>) {
    const { supabaseUrl, supabaseKey, bucket } = configService.get('storage', {
      infer: true,
    });
    this.bucket = bucket;
    this.client =
      supabaseUrl && supabaseKey
        ? createClient(supabaseUrl, supabaseKey, {
            auth: { persistSession: false, autoRefreshToken: false },
          })
        : null;

    if (!this.client) {
      this.logger.warn('Media storage is not configured; uploads will fail');
    }
  }

  /** Uploads the object and returns its public URL. */
  async upload(
    objectName: string,
    content: Buffer,
    contentType: string,
  ): Promise<string> {
    if (!this.client) {
      throw new Error('Media storage is not configured');
    }

    const { error } = await this.client.storage
      .from(this.bucket)
      .upload(objectName, content, { contentType, upsert: false });

    if (error) {
      throw new Error(`Storage upload failed: ${error.message}`);
    }

    const { data } = this.client.storage
      .from(this.bucket)
      .getPublicUrl(objectName);

    return data.publicUrl;
  }
}
