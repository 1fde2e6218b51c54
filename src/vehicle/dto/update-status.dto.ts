import { IsNotEmpty, IsOptional, IsString, MaxLength } from 'class-validator';

export class UpdateStatusDto {
  // known values are listed in VehicleStatus; others are stored as given
  @IsString()
  @IsNotEmpty()
  @MaxLength(50)
  new_status!: string;

  @IsOptional()
  @IsString()
  @MaxLength(500)
  message?: string;
}
