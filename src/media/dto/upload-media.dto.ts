import { IsOptional, IsString, MaxLength } from 'class-validator';

export class UploadMediaDto {
  @IsOptional()
  @IsString()
  user_id?: string;

  @IsOptional()
  @IsString()
  @MaxLength(500)
  caption?: string;
}

/** The parts of a multer file the upload flow reads. */
export interface UploadedMediaFile {
  originalname: string;
  mimetype: string;
  buffer: Buffer;
  size: number;
}
