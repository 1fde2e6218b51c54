import { IsBoolean } from 'class-validator';

export class RespondApprovalDto {
  @IsBoolean()
  approved!: boolean;
}
