import { Module } from '@nestjs/common';
import { AchievementsModule } from '../achievements/achievements.module.js';
import { PetsModule } from '../pets/pets.module.js';
import { ScraperModule } from '../scraper/scraper.module.js';
import { KnowledgeIngestionService } from './knowledge-ingestion.service.js';
import { SearchController } from './search.controller.js';
import { SearchService } from './search.service.js';
import { StorageController } from './storage.controller.js';
import { StorageRepository } from './storage.repository.js';
import { StorageService } from './storage.service.js';

@Module({
  imports: [PetsModule, AchievementsModule, ScraperModule],
  controllers: [StorageController, SearchController],
  providers: [StorageRepository, StorageService, KnowledgeIngestionService, SearchService],
  exports: [StorageRepository, SearchService],
})
export class StorageModule {}
