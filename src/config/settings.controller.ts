import { Controller, Get } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { AppConfigService } from './app-config.service.js';

@ApiTags('Settings')
@Controller('api/v1/settings')
export class SettingsController {
  constructor(private readonly configService: AppConfigService) {}

  /** Active configuration with secrets masked */
  @Get()
  getSettings() {
    return this.configService.getPublic();
  }
}
