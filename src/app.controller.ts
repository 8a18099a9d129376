// src/app.controller.ts
import { Controller, Get } from '@nestjs/common';

/**
 * 根路径存活检查
 */
@Controller()
export class AppController {
  @Get()
  getStatus(): { service: string; status: string } {
    return { service: 'activities', status: 'ok' };
  }
}
