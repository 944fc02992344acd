import { Module } from '@nestjs/common';
import { APP_FILTER } from '@nestjs/core';
import { AppController } from './app.controller.js';
import { ConfigModule } from './config/config.module.js';
import { DrizzleModule } from './db/drizzle.module.js';
import { ApiExceptionFilter } from './common/filters/api-exception.filter.js';
import { ContentModule } from './content/content.module.js';
import { OpenAiModule } from './openai/openai.module.js';
import { AuthModule } from './auth/auth.module.js';
import { ProfilesModule } from './profiles/profiles.module.js';
import { AchievementsModule } from './achievements/achievements.module.js';
import { PetsModule } from './pets/pets.module.js';
import { ScraperModule } from './scraper/scraper.module.js';
import { StorageModule } from './storage/storage.module.js';
import { UsersModule } from './users/users.module.js';
import { GamesModule } from './games/games.module.js';

@Module({
  imports: [
    ConfigModule,
    DrizzleModule,
    ContentModule,
    OpenAiModule,
    AuthModule,
    ProfilesModule,
    AchievementsModule,
    PetsModule,
    ScraperModule,
    StorageModule,
    UsersModule,
    GamesModule,
  ],
  controllers: [AppController],
  providers: [
    {
      provide: APP_FILTER,
      useClass: ApiExceptionFilter,
    },
  ],
})
export class AppModule {}
