import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Patch,
  Post,
} from '@nestjs/common';
import { ApprovalService } from './approval.service';
import { CreateApprovalDto } from './dto/create-approval.dto';
import { RespondApprovalDto } from './dto/respond-approval.dto';
import { ApiResponse } from '../common/api-response';
import { unwrapResult } from '../common/http-result';

@Controller()
export class ApprovalController {
  constructor(private readonly approvalService: ApprovalService) {}

  @Post('vehicles/:vehicleId/approvals')
  @HttpCode(HttpStatus.CREATED)
  async create(
    @Param('vehicleId') vehicleId: string,
    @Body() createApprovalDto: CreateApprovalDto,
  ): Promise<ApiResponse> {
    const approval = unwrapResult(
      await this.approvalService.create(vehicleId, createApprovalDto),
    );
    return ApiResponse.success(
      approval,
      'Approval requested successfully',
      HttpStatus.CREATED,
    );
  }

  @Patch('approvals/:approvalId')
  async respond(
    @Param('approvalId') approvalId: string,
    @Body() respondApprovalDto: RespondApprovalDto,
  ): Promise<ApiResponse> {
    const approval = unwrapResult(
      await this.approvalService.respond(
        approvalId,
        respondApprovalDto.approved,
      ),
    );
    return ApiResponse.success(
      { approved: approval.approved, approved_at: approval.approved_at },
      'Approval response recorded',
    );
  }

  @Get('vehicles/:vehicleId/approvals')
  async findByVehicle(
    @Param('vehicleId') vehicleId: string,
  ): Promise<ApiResponse> {
    const approvals = unwrapResult(
      await this.approvalService.findByVehicle(vehicleId),
    );
    return ApiResponse.success(approvals, 'Approvals retrieved successfully');
  }
}
