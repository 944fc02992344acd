import { Controller, Get } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { AppConfigService, type Environment } from './config/app-config.service.js';

export const SERVICE_NAME = 'datagotchi-api';

export interface HealthResponse {
  status: 'ok';
  environment: Environment;
  supabase_url: string | null;
  timestamp: string;
}

@ApiTags('Health')
@Controller()
export class AppController {
  constructor(private readonly configService: AppConfigService) {}

  @Get()
  root(): { service: string; status: 'running' } {
    return { service: SERVICE_NAME, status: 'running' };
  }

  @Get('health')
  health(): HealthResponse {
    const config = this.configService.get();
    return {
      status: 'ok',
      environment: config.environment,
      supabase_url: config.supabaseUrl || null,
      timestamp: new Date().toISOString(),
    };
  }
}
