import { Type } from 'class-transformer';
import {
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Max,
  MaxLength,
  Min,
} from 'class-validator';

export class CreateServiceRecordDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(100)
  service_type!: string;

  @Type(() => Number)
  @IsInt()
  @Min(0)
  mileage!: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(0)
  next_service_mileage?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(120)
  reminder_interval_months?: number;

  @IsOptional()
  @IsString()
  @MaxLength(2000)
  notes?: string;
}
