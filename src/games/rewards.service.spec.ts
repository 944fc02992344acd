import { Test } from '@nestjs/testing';
import {
  InsufficientPointsError,
  NotFoundError,
} from '../common/errors/api-errors.js';
import { AppConfigService } from '../config/app-config.service.js';
import { ContentLoaderService } from '../content/content-loader.service.js';
import type { GameDefinition } from '../content/content.types.js';
import { TransactionService } from '../db/transaction.service.js';
import type { PetRow, ProfileRow } from '../db/types/index.js';
import { AchievementsService } from '../achievements/achievements.service.js';
import { PetsRepository } from '../pets/pets.repository.js';
import { PetsService } from '../pets/pets.service.js';
import { ProfilesRepository } from '../profiles/profiles.repository.js';
import { RewardsService } from './rewards.service.js';
import { SkillEventsRepository } from './skill-events.repository.js';

const PET_ID = '0b6f4c1e-8d2a-4c3b-9e1f-2a3b4c5d6e7f';

const GAME: GameDefinition = {
  id: 'image-quality',
  title: 'Image Quality',
  description: 'Pick the sharpest image in each round.',
  rounds: 3,
  rewards: { points: 50, skill: 'science', skillValue: 5 },
};

function makePet(overrides: Partial<PetRow> = {}): PetRow {
  return {
    id: PET_ID,
    ownerWallet: '0xowner',
    name: 'Gotchi',
    rarity: 'common',
    social: 0,
    trivia: 0,
    science: 10,
    code: 0,
    trenches: 0,
    streak: 2,
    lastPlayedAt: new Date('2025-03-09T18:00:00Z'),
    createdAt: new Date('2025-01-01T00:00:00Z'),
    ...overrides,
  };
}

function makeProfile(overrides: Partial<ProfileRow> = {}): ProfileRow {
  return {
    walletAddress: '0xowner',
    username: 'gotchi_owner',
    points: 0,
    studioUnlocked: false,
    createdAt: new Date('2025-01-01T00:00:00Z'),
    ...overrides,
  };
}

/** Profile table of one row with the same conditional update the SQL runs */
class ProfileStore {
  constructor(public profile: ProfileRow) {}

  findByWallet = jest.fn((wallet: string) =>
    Promise.resolve(wallet === this.profile.walletAddress ? { ...this.profile } : undefined),
  );

  addPoints = jest.fn((wallet: string, points: number) => {
    if (wallet !== this.profile.walletAddress) return Promise.resolve(undefined);
    this.profile = { ...this.profile, points: this.profile.points + points };
    return Promise.resolve({ ...this.profile });
  });

  unlockStudio = jest.fn((wallet: string, cost: number) => {
    const p = this.profile;
    if (wallet !== p.walletAddress || p.studioUnlocked || p.points < cost) {
      return Promise.resolve(undefined);
    }
    this.profile = { ...p, points: p.points - cost, studioUnlocked: true };
    return Promise.resolve({ ...this.profile });
  });
}

describe('RewardsService', () => {
  let service: RewardsService;
  let profiles: ProfileStore;
  const content = { getGame: jest.fn(), getGames: jest.fn() };
  const petsService = { getOwnedPet: jest.fn() };
  const petsRepo = { applySkillGain: jest.fn() };
  const skillEventsRepo = { insert: jest.fn(), listForPet: jest.fn() };
  const achievementsService = { awardAutomatic: jest.fn() };
  const tx = { run: jest.fn() };

  beforeEach(async () => {
    jest.resetAllMocks();
    profiles = new ProfileStore(makeProfile({ points: 200 }));
    content.getGame.mockImplementation((id: string) => (id === GAME.id ? GAME : undefined));
    petsService.getOwnedPet.mockResolvedValue(makePet());
    petsRepo.applySkillGain.mockImplementation(
      (_id: string, gain: { delta: number; streak: number; playedAt: Date }) =>
        Promise.resolve(makePet({ science: 10 + gain.delta, streak: gain.streak, lastPlayedAt: gain.playedAt })),
    );
    achievementsService.awardAutomatic.mockResolvedValue([]);
    tx.run.mockImplementation((work: (t: string) => Promise<unknown>) => work('tx'));

    const config = new AppConfigService();
    config.update({ studioUnlockCost: 150 });

    const moduleRef = await Test.createTestingModule({
      providers: [
        RewardsService,
        { provide: AppConfigService, useValue: config },
        { provide: ContentLoaderService, useValue: content },
        { provide: TransactionService, useValue: tx },
        { provide: PetsService, useValue: petsService },
        { provide: PetsRepository, useValue: petsRepo },
        { provide: ProfilesRepository, useValue: profiles },
        { provide: SkillEventsRepository, useValue: skillEventsRepo },
        { provide: AchievementsService, useValue: achievementsService },
      ],
    }).compile();
    service = moduleRef.get(RewardsService);
  });

  describe('completeGame', () => {
    const now = new Date('2025-03-10T09:00:00Z');

    it('credits points, skill and streak in one transaction', async () => {
      const result = await service.completeGame('0xowner', GAME.id, PET_ID, 7, now);

      expect(tx.run).toHaveBeenCalledTimes(1);
      expect(profiles.addPoints).toHaveBeenCalledWith('0xowner', 50, 'tx');
      expect(petsRepo.applySkillGain).toHaveBeenCalledWith(
        PET_ID,
        { skill: 'science', delta: 5, streak: 3, playedAt: now },
        'tx',
      );
      expect(skillEventsRepo.insert).toHaveBeenCalledWith(
        {
          petId: PET_ID,
          source: 'game:image-quality',
          skill: 'science',
          delta: 5,
          points: 50,
          rawData: { score: 7, rounds: 3, streak: 3 },
          comment: 'Completed Image Quality',
        },
        'tx',
      );
      expect(result).toMatchObject({
        pointsAwarded: 50,
        totalPoints: 250,
        skill: 'science',
        skillValue: 5,
        achievementsAwarded: [],
      });
      expect(result.pet.science).toBe(15);
      expect(result.pet.streak).toBe(3);
    });

    it('adds automatic achievement points to the total', async () => {
      achievementsService.awardAutomatic.mockResolvedValue([
        { achievement: { code: 'streak_3' }, awarded: true, pointsAwarded: 25 },
      ]);

      const result = await service.completeGame('0xowner', GAME.id, PET_ID, undefined, now);

      expect(result.totalPoints).toBe(275);
      expect(result.achievementsAwarded).toEqual(['streak_3']);
      expect(achievementsService.awardAutomatic).toHaveBeenCalledWith(
        result.pet,
        ['first_game', 'streak_3'],
      );
    });

    it('404s an unknown game before touching the pet', async () => {
      await expect(
        service.completeGame('0xowner', 'no-such-game', PET_ID, undefined, now),
      ).rejects.toBeInstanceOf(NotFoundError);
      expect(petsService.getOwnedPet).not.toHaveBeenCalled();
    });
  });

  describe('unlockStudio', () => {
    it('charges the cost exactly once', async () => {
      await expect(service.unlockStudio('0xowner')).resolves.toEqual({
        unlocked: true,
        charged: 150,
        points: 50,
      });
      await expect(service.unlockStudio('0xowner')).resolves.toEqual({
        unlocked: true,
        charged: 0,
        points: 50,
      });
      expect(profiles.unlockStudio).toHaveBeenCalledTimes(1);
    });

    it('refuses when points are short', async () => {
      profiles.profile = makeProfile({ points: 40 });

      let caught: unknown;
      try {
        await service.unlockStudio('0xowner');
      } catch (err) {
        caught = err;
      }

      expect(caught).toBeInstanceOf(InsufficientPointsError);
      if (!(caught instanceof InsufficientPointsError)) return;
      expect(caught.details).toEqual({ required: 150, available: 40 });
      expect(profiles.unlockStudio).not.toHaveBeenCalled();
    });

    it('reports an unlock that won a concurrent race without charging', async () => {
      profiles.unlockStudio.mockImplementationOnce(() => {
        profiles.profile = { ...profiles.profile, points: 50, studioUnlocked: true };
        return Promise.resolve(undefined);
      });

      await expect(service.unlockStudio('0xowner')).resolves.toEqual({
        unlocked: true,
        charged: 0,
        points: 50,
      });
    });

    it('404s an unknown wallet', async () => {
      await expect(service.unlockStudio('0xnobody')).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  it('lists no skill events for a malformed pet id', async () => {
    await expect(service.listSkillEvents('nope', 10)).resolves.toEqual([]);
    expect(skillEventsRepo.listForPet).not.toHaveBeenCalled();
  });
});
