import { Module } from '@nestjs/common';
import { RngService } from '../common/rng/rng.service.js';
import { AchievementsModule } from '../achievements/achievements.module.js';
import { ProfilesModule } from '../profiles/profiles.module.js';
import { PetsController } from './pets.controller.js';
import { PetsRepository } from './pets.repository.js';
import { PetsService } from './pets.service.js';

@Module({
  imports: [ProfilesModule, AchievementsModule],
  controllers: [PetsController],
  providers: [PetsRepository, PetsService, RngService],
  exports: [PetsRepository, PetsService],
})
export class PetsModule {}
