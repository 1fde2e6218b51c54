import { Controller, Get, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { ServiceReminderService } from './service-reminder.service';
import { ApiResponse } from '../common/api-response';
import { unwrapResult } from '../common/http-result';

@Controller('service-reminders')
export class ServiceReminderController {
  constructor(private readonly serviceReminderService: ServiceReminderService) {}

  @Get('due')
  async findDue(): Promise<ApiResponse> {
    const due = unwrapResult(await this.serviceReminderService.findDue());
    return ApiResponse.success(due, `${due.length} reminders due`);
  }

  @Post('send')
  @HttpCode(HttpStatus.OK)
  async send(): Promise<ApiResponse> {
    const summary = unwrapResult(
      await this.serviceReminderService.dispatchDue(),
    );
    return ApiResponse.success(summary, `Sent ${summary.sent} reminders`);
  }
}
