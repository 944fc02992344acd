// Pet data store: data instances with their knowledge and images

import { Injectable, Logger } from '@nestjs/common';
import { NotFoundError } from '../common/errors/api-errors.js';
import { isUuid } from '../common/text-utils.js';
import { TransactionService } from '../db/transaction.service.js';
import type {
  DataInstanceRow,
  ImageRow,
  KnowledgeRecord,
  PetRow,
} from '../db/types/index.js';
import { AchievementsService } from '../achievements/achievements.service.js';
import type { PetAchievementRecord } from '../achievements/achievements.repository.js';
import { PetsRepository } from '../pets/pets.repository.js';
import { PetsService } from '../pets/pets.service.js';
import { KnowledgeIngestionService } from './knowledge-ingestion.service.js';
import { StorageRepository } from './storage.repository.js';
import type { CreateInstanceBody } from './dto/create-instance.dto.js';
import type { ImageCreate } from './dto/image-create.dto.js';
import type { KnowledgeCreate } from './dto/knowledge-create.dto.js';

export interface InstanceWithContent {
  instance: DataInstanceRow;
  knowledge: KnowledgeRecord[];
  images: ImageRow[];
}

export interface PetExport {
  pet: PetRow;
  instances: InstanceWithContent[];
  achievements: PetAchievementRecord[];
  exportedAt: Date;
}

function groupBy<T>(rows: T[], key: (row: T) => string): Map<string, T[]> {
  const groups = new Map<string, T[]>();
  for (const row of rows) {
    const k = key(row);
    const list = groups.get(k);
    if (list) list.push(row);
    else groups.set(k, [row]);
  }
  return groups;
}

@Injectable()
export class StorageService {
  private readonly logger = new Logger(StorageService.name);

  constructor(
    private readonly storageRepo: StorageRepository,
    private readonly petsRepo: PetsRepository,
    private readonly petsService: PetsService,
    private readonly ingestion: KnowledgeIngestionService,
    private readonly achievementsService: AchievementsService,
    private readonly tx: TransactionService,
  ) {}

  async createInstance(petId: string, body: CreateInstanceBody): Promise<InstanceWithContent> {
    this.ingestion.validate(body.knowledge_list);
    const pet = await this.petsService.getPet(petId);
    const prepared = await this.ingestion.prepare(body.knowledge_list);

    const created = await this.tx.run(async (tx) => {
      const instance = await this.storageRepo.insertInstance(
        {
          petId: pet.id,
          content: body.content,
          contentType: body.content_type,
          metadata: body.metadata,
          category: body.category,
          tags: body.tags,
        },
        tx,
      );
      const knowledge = await this.storageRepo.insertKnowledge(
        prepared.map((k) => ({ ...k, dataInstanceId: instance.id })),
        tx,
      );
      const images = await this.storageRepo.insertImages(
        body.image_urls.map((imageUrl) => ({ dataInstanceId: instance.id, imageUrl })),
        tx,
      );
      return { instance, knowledge, images };
    });

    this.logger.log(
      `Instance ${created.instance.id} stored for pet ${pet.id} (${created.knowledge.length} knowledge, ${created.images.length} images)`,
    );
    if (created.knowledge.length > 0) {
      await this.achievementsService.awardAutomatic(pet, ['first_knowledge']);
    }
    return created;
  }

  async listInstances(petId: string, limit: number, offset: number): Promise<DataInstanceRow[]> {
    if (!isUuid(petId)) return [];
    return this.storageRepo.listInstances(petId, limit, offset);
  }

  async listPetKnowledge(petId: string, limit: number): Promise<KnowledgeRecord[]> {
    if (!isUuid(petId)) return [];
    return this.storageRepo.listKnowledgeForPet(petId, limit);
  }

  async getInstance(instanceId: string): Promise<InstanceWithContent> {
    const instance = await this.requireInstance(instanceId);
    const [knowledge, images] = await Promise.all([
      this.storageRepo.listKnowledgeForInstances([instance.id]),
      this.storageRepo.listImagesForInstances([instance.id]),
    ]);
    return { instance, knowledge, images };
  }

  async listInstanceKnowledge(instanceId: string): Promise<KnowledgeRecord[]> {
    if (!isUuid(instanceId)) return [];
    return this.storageRepo.listKnowledgeForInstances([instanceId]);
  }

  async listInstanceImages(instanceId: string): Promise<ImageRow[]> {
    if (!isUuid(instanceId)) return [];
    return this.storageRepo.listImagesForInstances([instanceId]);
  }

  async addKnowledge(instanceId: string, items: KnowledgeCreate[]): Promise<KnowledgeRecord[]> {
    this.ingestion.validate(items);
    const instance = await this.requireInstance(instanceId);
    const prepared = await this.ingestion.prepare(items);

    const rows = await this.storageRepo.insertKnowledge(
      prepared.map((k) => ({ ...k, dataInstanceId: instance.id })),
    );
    this.logger.log(`Added ${rows.length} knowledge rows to instance ${instance.id}`);

    if (rows.length > 0) {
      const pet = await this.petsRepo.findById(instance.petId);
      if (pet) await this.achievementsService.awardAutomatic(pet, ['first_knowledge']);
    }
    return rows;
  }

  async addImages(instanceId: string, items: ImageCreate[]): Promise<ImageRow[]> {
    const instance = await this.requireInstance(instanceId);
    return this.storageRepo.insertImages(
      items.map((img) => ({
        dataInstanceId: instance.id,
        imageUrl: img.image_url,
        altText: img.alt_text ?? null,
        metadata: img.metadata,
      })),
    );
  }

  /** Everything stored for a pet, oldest instance first */
  async exportPet(petId: string): Promise<PetExport> {
    const pet = await this.petsService.getPet(petId);
    const instances = await this.storageRepo.listAllInstances(pet.id);
    const ids = instances.map((i) => i.id);
    const [knowledge, images, achievements] = await Promise.all([
      this.storageRepo.listKnowledgeForInstances(ids),
      this.storageRepo.listImagesForInstances(ids),
      this.achievementsService.listForPet(pet.id),
    ]);

    const knowledgeByInstance = groupBy(knowledge, (k) => k.dataInstanceId);
    const imagesByInstance = groupBy(images, (i) => i.dataInstanceId);

    return {
      pet,
      instances: instances.map((instance) => ({
        instance,
        knowledge: knowledgeByInstance.get(instance.id) ?? [],
        images: imagesByInstance.get(instance.id) ?? [],
      })),
      achievements,
      exportedAt: new Date(),
    };
  }

  private async requireInstance(instanceId: string): Promise<DataInstanceRow> {
    const instance = isUuid(instanceId)
      ? await this.storageRepo.findInstance(instanceId)
      : undefined;
    if (!instance) throw new NotFoundError('DataInstance not found');
    return instance;
  }
}
