import 'reflect-metadata';
import { plainToInstance, Type } from 'class-transformer';
import {
  IsBooleanString,
  IsEnum,
  IsInt,
  IsOptional,
  IsString,
  IsUrl,
  Max,
  Min,
  validateSync,
} from 'class-validator';
import { AuditLogPolicy } from './configuration';

class EnvironmentVariables {
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(65535)
  PORT?: number;

  @IsOptional()
  @IsString()
  DB_URL?: string;

  @IsOptional()
  @IsString()
  TWILIO_ACCOUNT_SID?: string;

  @IsOptional()
  @IsString()
  TWILIO_AUTH_TOKEN?: string;

  @IsOptional()
  @IsString()
  TWILIO_PHONE_NUMBER?: string;

  @IsOptional()
  @IsBooleanString()
  ENABLE_STATUS_SMS?: string;

  @IsOptional()
  @IsUrl({ require_tld: false })
  PORTAL_BASE_URL?: string;

  @IsOptional()
  @IsEnum(AuditLogPolicy)
  AUDIT_LOG_POLICY?: AuditLogPolicy;

  @IsOptional()
  @IsString()
  MEDIA_BUCKET?: string;
}

/**
 * Rejects malformed environment values at startup. Blank and unknown
 * variables pass through untouched; defaults are applied later by
 * `configuration()`.
 */
export function validateEnv(
  config: Record<string, unknown>,
): Record<string, unknown> {
  const present = Object.fromEntries(
    Object.entries(config).filter(([, value]) => value !== ''),
  );
  const validated = plainToInstance(EnvironmentVariables, present);
  const errors = validateSync(validated);

  if (errors.length > 0) {
    const details = errors
      .map((error) => Object.values(error.constraints ?? {}).join(', '))
      .join('; ');
    throw new Error(`Invalid environment configuration: ${details}`);
  }

  return config;
}
