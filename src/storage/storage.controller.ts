import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Post,
  Query,
} from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { ZodValidationPipe } from '../common/pipes/zod-validation.pipe.js';
import {
  presentImage,
  presentInstance,
  presentInstanceWithContent,
  presentKnowledge,
  presentPet,
  presentPetAchievement,
  type DataInstanceResponse,
  type DataInstanceSummary,
  type ImageResponse,
  type KnowledgeResponse,
  type PetAchievementResponse,
  type PetResponse,
} from '../common/presenters.js';
import { PetsService } from '../pets/pets.service.js';
import { StorageService, type InstanceWithContent } from './storage.service.js';
import {
  CreateInstanceBodySchema,
  type CreateInstanceBody,
} from './dto/create-instance.dto.js';
import {
  ImageCreateListSchema,
  type ImageCreate,
} from './dto/image-create.dto.js';
import {
  KnowledgeCreateListSchema,
  type KnowledgeCreate,
} from './dto/knowledge-create.dto.js';
import {
  ListInstancesQuerySchema,
  ListKnowledgeQuerySchema,
  type ListInstancesQuery,
  type ListKnowledgeQuery,
} from './dto/list-query.dto.js';

export interface PetExportResponse {
  pet: PetResponse;
  instances: DataInstanceResponse[];
  achievements: PetAchievementResponse[];
  totals: { instances: number; knowledge: number; images: number };
  exported_at: string;
}

function presentWithContent(data: InstanceWithContent): DataInstanceResponse {
  return presentInstanceWithContent(data.instance, data.knowledge, data.images);
}

@ApiTags('Storage')
@Controller('api/v1/storage')
export class StorageController {
  constructor(
    private readonly storageService: StorageService,
    private readonly petsService: PetsService,
  ) {}

  // --- pets ---

  @Get('pets/:petId')
  async getPet(@Param('petId') petId: string): Promise<PetResponse> {
    return presentPet(await this.petsService.getPet(petId));
  }

  @Get('pets/:petId/export')
  async exportPet(@Param('petId') petId: string): Promise<PetExportResponse> {
    const data = await this.storageService.exportPet(petId);
    const instances = data.instances.map(presentWithContent);
    return {
      pet: presentPet(data.pet),
      instances,
      achievements: data.achievements.map(presentPetAchievement),
      totals: {
        instances: instances.length,
        knowledge: instances.reduce((sum, i) => sum + i.knowledge.length, 0),
        images: instances.reduce((sum, i) => sum + i.images.length, 0),
      },
      exported_at: data.exportedAt.toISOString(),
    };
  }

  @Post('pets/:petId/instances')
  @HttpCode(HttpStatus.CREATED)
  async createInstance(
    @Param('petId') petId: string,
    @Body(new ZodValidationPipe(CreateInstanceBodySchema)) body: CreateInstanceBody,
  ): Promise<DataInstanceResponse> {
    return presentWithContent(await this.storageService.createInstance(petId, body));
  }

  @Get('pets/:petId/instances')
  async listInstances(
    @Param('petId') petId: string,
    @Query(new ZodValidationPipe(ListInstancesQuerySchema)) query: ListInstancesQuery,
  ): Promise<DataInstanceSummary[]> {
    const rows = await this.storageService.listInstances(petId, query.limit, query.offset);
    return rows.map(presentInstance);
  }

  @Get('pets/:petId/knowledge')
  async listPetKnowledge(
    @Param('petId') petId: string,
    @Query(new ZodValidationPipe(ListKnowledgeQuerySchema)) query: ListKnowledgeQuery,
  ): Promise<KnowledgeResponse[]> {
    const rows = await this.storageService.listPetKnowledge(petId, query.limit);
    return rows.map(presentKnowledge);
  }

  // --- data instances ---

  @Get('datainstances/:id')
  async getInstance(@Param('id') id: string): Promise<DataInstanceResponse> {
    return presentWithContent(await this.storageService.getInstance(id));
  }

  @Get('datainstances/:id/knowledge')
  async listInstanceKnowledge(@Param('id') id: string): Promise<KnowledgeResponse[]> {
    const rows = await this.storageService.listInstanceKnowledge(id);
    return rows.map(presentKnowledge);
  }

  @Get('datainstances/:id/images')
  async listInstanceImages(@Param('id') id: string): Promise<ImageResponse[]> {
    const rows = await this.storageService.listInstanceImages(id);
    return rows.map(presentImage);
  }

  @Post('datainstances/:id/knowledge')
  @HttpCode(HttpStatus.OK)
  async addKnowledge(
    @Param('id') id: string,
    @Body(new ZodValidationPipe(KnowledgeCreateListSchema)) body: KnowledgeCreate[],
  ): Promise<KnowledgeResponse[]> {
    const rows = await this.storageService.addKnowledge(id, body);
    return rows.map(presentKnowledge);
  }

  @Post('datainstances/:id/images')
  @HttpCode(HttpStatus.OK)
  async addImages(
    @Param('id') id: string,
    @Body(new ZodValidationPipe(ImageCreateListSchema)) body: ImageCreate[],
  ): Promise<ImageResponse[]> {
    const rows = await this.storageService.addImages(id, body);
    return rows.map(presentImage);
  }
}
