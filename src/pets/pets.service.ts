// Pet lifecycle: adoption with a rarity roll, rename, release, ownership checks

import { Injectable, Logger } from '@nestjs/common';
import { ForbiddenError, NotFoundError } from '../common/errors/api-errors.js';
import { isUuid, normalizeWallet } from '../common/text-utils.js';
import { RngService, type Rng, type WeightedOption } from '../common/rng/rng.service.js';
import type { PetRow, Rarity } from '../db/types/index.js';
import { AchievementsService } from '../achievements/achievements.service.js';
import { ProfilesService } from '../profiles/profiles.service.js';
import { PetsRepository } from './pets.repository.js';

export const DEFAULT_PET_NAME = 'Gotchi';

export const RARITY_WEIGHTS: readonly WeightedOption<Rarity>[] = [
  { value: 'common', weight: 60 },
  { value: 'rare', weight: 25 },
  { value: 'epic', weight: 12 },
  { value: 'legendary', weight: 3 },
];

export interface CreatePetInput {
  name?: string;
  rarity?: Rarity;
}

@Injectable()
export class PetsService {
  private readonly logger = new Logger(PetsService.name);

  constructor(
    private readonly petsRepo: PetsRepository,
    private readonly profilesService: ProfilesService,
    private readonly achievementsService: AchievementsService,
    private readonly rngService: RngService,
  ) {}

  async getPet(petId: string): Promise<PetRow> {
    const pet = isUuid(petId) ? await this.petsRepo.findById(petId) : undefined;
    if (!pet) throw new NotFoundError('Pet not found');
    return pet;
  }

  /** The pet, when `walletAddress` owns it; 404 or 403 otherwise */
  async getOwnedPet(walletAddress: string, petId: string): Promise<PetRow> {
    const pet = await this.getPet(petId);
    if (pet.ownerWallet !== normalizeWallet(walletAddress)) {
      throw new ForbiddenError('You do not own this pet');
    }
    return pet;
  }

  async listForWallet(walletAddress: string): Promise<PetRow[]> {
    return this.petsRepo.listByOwner(normalizeWallet(walletAddress));
  }

  rollRarity(rng: Rng = this.rngService.create()): Rarity {
    return rng.pickWeighted(RARITY_WEIGHTS);
  }

  async createPet(walletAddress: string, input: CreatePetInput): Promise<PetRow> {
    const profile = await this.profilesService.ensureProfile(walletAddress);
    const pet = await this.petsRepo.create({
      ownerWallet: profile.walletAddress,
      name: input.name ?? DEFAULT_PET_NAME,
      rarity: input.rarity ?? this.rollRarity(),
    });
    this.logger.log(`Pet ${pet.id} adopted by ${pet.ownerWallet} (${pet.rarity})`);

    const owned = await this.petsRepo.listByOwner(profile.walletAddress);
    const codes: string[] = [];
    if (owned.length === 1) codes.push('first_pet');
    if (pet.rarity === 'legendary') codes.push('legendary_pet');
    await this.achievementsService.awardAutomatic(pet, codes);

    return pet;
  }

  async renamePet(walletAddress: string, petId: string, name: string): Promise<PetRow> {
    const pet = await this.getOwnedPet(walletAddress, petId);
    const renamed = await this.petsRepo.rename(pet.id, name);
    if (!renamed) throw new NotFoundError('Pet not found');
    return renamed;
  }

  async deletePet(walletAddress: string, petId: string): Promise<void> {
    const pet = await this.getOwnedPet(walletAddress, petId);
    await this.petsRepo.delete(pet.id);
    this.logger.log(`Pet ${pet.id} released by ${pet.ownerWallet}`);
  }
}
