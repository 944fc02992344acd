import { Test } from '@nestjs/testing';
import { ForbiddenError, NotFoundError } from '../common/errors/api-errors.js';
import { Rng, RngService } from '../common/rng/rng.service.js';
import type { PetRow, Rarity } from '../db/types/index.js';
import { AchievementsService } from '../achievements/achievements.service.js';
import { ProfilesService } from '../profiles/profiles.service.js';
import { PetsRepository } from './pets.repository.js';
import { PetsService } from './pets.service.js';

const PET_ID = '0b6f4c1e-8d2a-4c3b-9e1f-2a3b4c5d6e7f';

function makePet(overrides: Partial<PetRow> = {}): PetRow {
  return {
    id: PET_ID,
    ownerWallet: '0xowner',
    name: 'Gotchi',
    rarity: 'common',
    social: 0,
    trivia: 0,
    science: 0,
    code: 0,
    trenches: 0,
    streak: 0,
    lastPlayedAt: null,
    createdAt: new Date('2025-01-01T00:00:00Z'),
    ...overrides,
  };
}

describe('PetsService', () => {
  let service: PetsService;
  const petsRepo = {
    findById: jest.fn(),
    listByOwner: jest.fn(),
    create: jest.fn(),
    rename: jest.fn(),
    delete: jest.fn(),
  };
  const profilesService = { ensureProfile: jest.fn() };
  const achievementsService = { awardAutomatic: jest.fn() };

  beforeEach(async () => {
    jest.resetAllMocks();
    profilesService.ensureProfile.mockResolvedValue({ walletAddress: '0xowner' });
    achievementsService.awardAutomatic.mockResolvedValue([]);
    petsRepo.create.mockImplementation((values: Partial<PetRow>) =>
      Promise.resolve(makePet(values)),
    );

    const moduleRef = await Test.createTestingModule({
      providers: [
        PetsService,
        RngService,
        { provide: PetsRepository, useValue: petsRepo },
        { provide: ProfilesService, useValue: profilesService },
        { provide: AchievementsService, useValue: achievementsService },
      ],
    }).compile();
    service = moduleRef.get(PetsService);
  });

  describe('getPet', () => {
    it('treats a malformed id as not found without querying', async () => {
      await expect(service.getPet('not-a-uuid')).rejects.toThrow(new NotFoundError('Pet not found'));
      expect(petsRepo.findById).not.toHaveBeenCalled();
    });

    it('404s an unknown id', async () => {
      petsRepo.findById.mockResolvedValue(undefined);
      await expect(service.getPet(PET_ID)).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  it('getOwnedPet rejects another wallet with 403', async () => {
    petsRepo.findById.mockResolvedValue(makePet());
    await expect(service.getOwnedPet('0xSomeoneElse', PET_ID)).rejects.toBeInstanceOf(ForbiddenError);
  });

  it('getOwnedPet compares wallets case-insensitively', async () => {
    petsRepo.findById.mockResolvedValue(makePet());
    await expect(service.getOwnedPet('0xOWNER', PET_ID)).resolves.toMatchObject({ id: PET_ID });
  });

  describe('createPet', () => {
    it('uses the default name and the requested rarity', async () => {
      petsRepo.listByOwner.mockResolvedValue([makePet()]);

      const pet = await service.createPet('0xOwner', { rarity: 'epic' });

      expect(petsRepo.create).toHaveBeenCalledWith({
        ownerWallet: '0xowner',
        name: 'Gotchi',
        rarity: 'epic',
      });
      expect(pet.rarity).toBe('epic');
      expect(achievementsService.awardAutomatic).toHaveBeenCalledWith(pet, ['first_pet']);
    });

    it('awards legendary_pet but not first_pet for a later legendary', async () => {
      petsRepo.listByOwner.mockResolvedValue([makePet(), makePet({ id: 'other' })]);

      const pet = await service.createPet('0xowner', { name: 'Zap', rarity: 'legendary' });

      expect(pet.name).toBe('Zap');
      expect(achievementsService.awardAutomatic).toHaveBeenCalledWith(pet, ['legendary_pet']);
    });

    it('rolls a rarity when none is given', async () => {
      petsRepo.listByOwner.mockResolvedValue([makePet()]);
      const pet = await service.createPet('0xowner', {});
      expect(['common', 'rare', 'epic', 'legendary']).toContain(pet.rarity);
    });
  });

  it('rollRarity follows the 60/25/12/3 weights', () => {
    const rng = new Rng('rarity-distribution');
    const counts: Record<Rarity, number> = { common: 0, rare: 0, epic: 0, legendary: 0 };
    const draws = 20000;
    for (let i = 0; i < draws; i++) counts[service.rollRarity(rng)]++;

    expect(counts.common / draws).toBeGreaterThan(0.57);
    expect(counts.common / draws).toBeLessThan(0.63);
    expect(counts.rare / draws).toBeGreaterThan(0.22);
    expect(counts.rare / draws).toBeLessThan(0.28);
    expect(counts.epic / draws).toBeGreaterThan(0.1);
    expect(counts.epic / draws).toBeLessThan(0.14);
    expect(counts.legendary / draws).toBeGreaterThan(0.02);
    expect(counts.legendary / draws).toBeLessThan(0.04);
  });

  it('renamePet is owner-only', async () => {
    petsRepo.findById.mockResolvedValue(makePet());
    await expect(service.renamePet('0xintruder', PET_ID, 'Nope')).rejects.toBeInstanceOf(ForbiddenError);
    expect(petsRepo.rename).not.toHaveBeenCalled();
  });

  it('deletePet removes an owned pet', async () => {
    petsRepo.findById.mockResolvedValue(makePet());
    petsRepo.delete.mockResolvedValue(true);
    await service.deletePet('0xowner', PET_ID);
    expect(petsRepo.delete).toHaveBeenCalledWith(PET_ID);
  });
});
