import { Controller, Get } from '@nestjs/common';
import { AppService, ServiceStatus } from './app.service';

@Controller()
export class AppController {
  constructor(private readonly appService: AppService) {}

  @Get('health')
  getHealth(): { status: string; timestamp: string } {
    return this.appService.getHealth();
  }

  @Get('status')
  getStatus(): ServiceStatus {
    return this.appService.getStatus();
  }
}
