import { Inject, Injectable } from '@nestjs/common';
import {
  and,
  asc,
  cosineDistance,
  count,
  desc,
  eq,
  gte,
  ilike,
  inArray,
  isNotNull,
  isNull,
  or,
  sql,
  type SQL,
} from 'drizzle-orm';
import { DB, type DbExecutor, type DrizzleDB } from '../db/drizzle.module.js';
import { dataInstances, images, knowledge, pets } from '../db/schema/index.js';
import type {
  DataCategory,
  DataInstanceRow,
  ImageRow,
  KnowledgeRecord,
  NewDataInstanceRow,
  NewImageRow,
  NewKnowledgeRow,
} from '../db/types/index.js';
import { escapeLike } from '../common/text-utils.js';

/** Which pets a search covers */
export type SearchScope =
  | { kind: 'all' }
  | { kind: 'pet'; petId: string }
  | { kind: 'wallet'; wallet: string };

export interface SemanticMatch extends KnowledgeRecord {
  petId: string;
  similarity: number;
}

export interface PetInstanceCount {
  id: string;
  name: string;
  instanceCount: number;
}

export interface WalletTotals {
  instances: number;
  knowledge: number;
  images: number;
  instancesByCategory: Partial<Record<DataCategory, number>>;
  pets: PetInstanceCount[];
}

const knowledgeColumns = {
  id: knowledge.id,
  dataInstanceId: knowledge.dataInstanceId,
  url: knowledge.url,
  title: knowledge.title,
  content: knowledge.content,
  metadata: knowledge.metadata,
  category: knowledge.category,
  tags: knowledge.tags,
  createdAt: knowledge.createdAt,
};

function scopeCondition(scope: SearchScope): SQL | undefined {
  switch (scope.kind) {
    case 'all':
      return undefined;
    case 'pet':
      return eq(dataInstances.petId, scope.petId);
    case 'wallet':
      return eq(pets.ownerWallet, scope.wallet);
  }
}

@Injectable()
export class StorageRepository {
  constructor(@Inject(DB) private readonly db: DrizzleDB) {}

  // --- data instances ---

  async insertInstance(
    values: NewDataInstanceRow,
    executor: DbExecutor = this.db,
  ): Promise<DataInstanceRow> {
    const [row] = await executor.insert(dataInstances).values(values).returning();
    return row;
  }

  async findInstance(instanceId: string): Promise<DataInstanceRow | undefined> {
    const [row] = await this.db
      .select()
      .from(dataInstances)
      .where(eq(dataInstances.id, instanceId))
      .limit(1);
    return row;
  }

  async listInstances(
    petId: string,
    limit: number,
    offset: number,
  ): Promise<DataInstanceRow[]> {
    return this.db
      .select()
      .from(dataInstances)
      .where(eq(dataInstances.petId, petId))
      .orderBy(desc(dataInstances.createdAt))
      .limit(limit)
      .offset(offset);
  }

  async listAllInstances(petId: string): Promise<DataInstanceRow[]> {
    return this.db
      .select()
      .from(dataInstances)
      .where(eq(dataInstances.petId, petId))
      .orderBy(asc(dataInstances.createdAt));
  }

  // --- knowledge ---

  async insertKnowledge(
    rows: NewKnowledgeRow[],
    executor: DbExecutor = this.db,
  ): Promise<KnowledgeRecord[]> {
    if (rows.length === 0) return [];
    return executor.insert(knowledge).values(rows).returning(knowledgeColumns);
  }

  async listKnowledgeForInstances(
    instanceIds: string[],
  ): Promise<KnowledgeRecord[]> {
    if (instanceIds.length === 0) return [];
    return this.db
      .select(knowledgeColumns)
      .from(knowledge)
      .where(inArray(knowledge.dataInstanceId, instanceIds))
      .orderBy(asc(knowledge.createdAt));
  }

  async listKnowledgeForPet(
    petId: string,
    limit: number,
  ): Promise<KnowledgeRecord[]> {
    return this.db
      .select(knowledgeColumns)
      .from(knowledge)
      .innerJoin(dataInstances, eq(knowledge.dataInstanceId, dataInstances.id))
      .where(eq(dataInstances.petId, petId))
      .orderBy(desc(knowledge.createdAt))
      .limit(limit);
  }

  async listUnembeddedKnowledge(
    wallet: string,
    limit: number,
  ): Promise<KnowledgeRecord[]> {
    return this.db
      .select(knowledgeColumns)
      .from(knowledge)
      .innerJoin(dataInstances, eq(knowledge.dataInstanceId, dataInstances.id))
      .innerJoin(pets, eq(dataInstances.petId, pets.id))
      .where(and(eq(pets.ownerWallet, wallet), isNull(knowledge.embedding)))
      .orderBy(asc(knowledge.createdAt))
      .limit(limit);
  }

  async setEmbedding(knowledgeId: string, embedding: number[]): Promise<void> {
    await this.db
      .update(knowledge)
      .set({ embedding })
      .where(eq(knowledge.id, knowledgeId));
  }

  // --- images ---

  async insertImages(
    rows: NewImageRow[],
    executor: DbExecutor = this.db,
  ): Promise<ImageRow[]> {
    if (rows.length === 0) return [];
    return executor.insert(images).values(rows).returning();
  }

  async listImagesForInstances(instanceIds: string[]): Promise<ImageRow[]> {
    if (instanceIds.length === 0) return [];
    return this.db
      .select()
      .from(images)
      .where(inArray(images.dataInstanceId, instanceIds))
      .orderBy(asc(images.createdAt));
  }

  // --- keyword search ---

  async searchInstances(
    scope: SearchScope,
    query: string,
    limit: number,
  ): Promise<DataInstanceRow[]> {
    const pattern = `%${escapeLike(query)}%`;
    const rows = await this.db
      .select({ instance: dataInstances })
      .from(dataInstances)
      .innerJoin(pets, eq(dataInstances.petId, pets.id))
      .where(and(scopeCondition(scope), ilike(dataInstances.content, pattern)))
      .orderBy(desc(dataInstances.createdAt))
      .limit(limit);
    return rows.map((r) => r.instance);
  }

  async searchKnowledge(
    scope: SearchScope,
    query: string,
    limit: number,
  ): Promise<KnowledgeRecord[]> {
    const pattern = `%${escapeLike(query)}%`;
    return this.db
      .select(knowledgeColumns)
      .from(knowledge)
      .innerJoin(dataInstances, eq(knowledge.dataInstanceId, dataInstances.id))
      .innerJoin(pets, eq(dataInstances.petId, pets.id))
      .where(
        and(
          scopeCondition(scope),
          or(ilike(knowledge.title, pattern), ilike(knowledge.content, pattern)),
        ),
      )
      .orderBy(desc(knowledge.createdAt))
      .limit(limit);
  }

  // --- semantic search ---

  /** similarity = 1 - cosine distance; rows without an embedding never match */
  async semanticSearch(
    scope: SearchScope,
    queryEmbedding: number[],
    threshold: number,
    limit: number,
  ): Promise<SemanticMatch[]> {
    const distance = cosineDistance(knowledge.embedding, queryEmbedding);
    const similarity = sql<number>`1 - (${distance})`.mapWith(Number);

    return this.db
      .select({
        ...knowledgeColumns,
        petId: dataInstances.petId,
        similarity,
      })
      .from(knowledge)
      .innerJoin(dataInstances, eq(knowledge.dataInstanceId, dataInstances.id))
      .innerJoin(pets, eq(dataInstances.petId, pets.id))
      .where(
        and(
          scopeCondition(scope),
          isNotNull(knowledge.embedding),
          gte(similarity, threshold),
        ),
      )
      .orderBy(asc(distance))
      .limit(limit);
  }

  // --- statistics ---

  async walletTotals(wallet: string): Promise<WalletTotals> {
    const petCounts = await this.db
      .select({
        id: pets.id,
        name: pets.name,
        instanceCount: count(dataInstances.id),
      })
      .from(pets)
      .leftJoin(dataInstances, eq(dataInstances.petId, pets.id))
      .where(eq(pets.ownerWallet, wallet))
      .groupBy(pets.id, pets.name, pets.createdAt)
      .orderBy(desc(pets.createdAt));

    const byCategory = await this.db
      .select({ category: dataInstances.category, total: count() })
      .from(dataInstances)
      .innerJoin(pets, eq(dataInstances.petId, pets.id))
      .where(eq(pets.ownerWallet, wallet))
      .groupBy(dataInstances.category);

    const [knowledgeTotal] = await this.db
      .select({ total: count() })
      .from(knowledge)
      .innerJoin(dataInstances, eq(knowledge.dataInstanceId, dataInstances.id))
      .innerJoin(pets, eq(dataInstances.petId, pets.id))
      .where(eq(pets.ownerWallet, wallet));

    const [imageTotal] = await this.db
      .select({ total: count() })
      .from(images)
      .innerJoin(dataInstances, eq(images.dataInstanceId, dataInstances.id))
      .innerJoin(pets, eq(dataInstances.petId, pets.id))
      .where(eq(pets.ownerWallet, wallet));

    const instancesByCategory: Partial<Record<DataCategory, number>> = {};
    for (const row of byCategory) {
      instancesByCategory[row.category] = row.total;
    }

    return {
      instances: petCounts.reduce((sum, p) => sum + p.instanceCount, 0),
      knowledge: knowledgeTotal?.total ?? 0,
      images: imageTotal?.total ?? 0,
      instancesByCategory,
      pets: petCounts,
    };
  }
}
