import { Global, Module } from '@nestjs/common';
import { AppConfigService } from './app-config.service.js';
import { SettingsController } from './settings.controller.js';

@Global()
@Module({
  controllers: [SettingsController],
  providers: [AppConfigService],
  exports: [AppConfigService],
})
export class ConfigModule {}
