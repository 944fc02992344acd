import { Controller, Get } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { presentAchievement, type AchievementResponse } from '../common/presenters.js';
import { AchievementsService } from './achievements.service.js';

@ApiTags('Achievements')
@Controller('api/v1/achievements')
export class AchievementsController {
  constructor(private readonly achievementsService: AchievementsService) {}

  @Get()
  async list(): Promise<AchievementResponse[]> {
    const rows = await this.achievementsService.listCatalog();
    return rows.map(presentAchievement);
  }
}
