import { Module } from '@nestjs/common';
import { AchievementsModule } from '../achievements/achievements.module.js';
import { PetsModule } from '../pets/pets.module.js';
import { ProfilesModule } from '../profiles/profiles.module.js';
import { GamesController, RewardsController } from './games.controller.js';
import { RewardsService } from './rewards.service.js';
import { SkillEventsRepository } from './skill-events.repository.js';

@Module({
  imports: [ProfilesModule, PetsModule, AchievementsModule],
  controllers: [GamesController, RewardsController],
  providers: [RewardsService, SkillEventsRepository],
})
export class GamesModule {}
