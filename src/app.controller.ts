import { Controller, Get } from '@nestjs/common';

const API_VERSION = '1.0.0';

@Controller()
export class AppController {
  @Get()
  root(): { message: string; version: string } {
    return { message: 'Shop Tracker API is running', version: API_VERSION };
  }

  @Get('health')
  health(): { status: string; timestamp: string } {
    return { status: 'ok', timestamp: new Date().toISOString() };
  }
}
