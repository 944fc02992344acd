import { Injectable, Logger } from '@nestjs/common';
import {
  ConflictError,
  NotFoundError,
} from '../common/errors/api-errors.js';
import { normalizeWallet } from '../common/text-utils.js';
import { isUniqueViolation } from '../db/pg-errors.js';
import type { ProfileRow } from '../db/types/index.js';
import { ProfilesRepository } from './profiles.repository.js';

/** gotchi_ + the last six characters of the wallet */
export function defaultUsername(walletAddress: string): string {
  return `gotchi_${normalizeWallet(walletAddress).slice(-6)}`;
}

@Injectable()
export class ProfilesService {
  private readonly logger = new Logger(ProfilesService.name);

  constructor(private readonly profilesRepo: ProfilesRepository) {}

  async getByWallet(walletAddress: string): Promise<ProfileRow> {
    const profile = await this.profilesRepo.findByWallet(
      normalizeWallet(walletAddress),
    );
    if (!profile) throw new NotFoundError('Profile not found');
    return profile;
  }

  /** Returns the existing profile, or creates one with the given or default username. */
  async ensureProfile(
    walletAddress: string,
    username?: string,
  ): Promise<ProfileRow> {
    const wallet = normalizeWallet(walletAddress);
    const existing = await this.profilesRepo.findByWallet(wallet);
    if (existing) return existing;

    const name = username ?? defaultUsername(wallet);
    await this.assertUsernameFree(name, wallet);
    try {
      const profile = await this.profilesRepo.createIfAbsent(wallet, name);
      this.logger.log(`Profile created: ${wallet} (${profile.username})`);
      return profile;
    } catch (err) {
      if (isUniqueViolation(err)) throw this.usernameTaken(name);
      throw err;
    }
  }

  async rename(walletAddress: string, username: string): Promise<ProfileRow> {
    const wallet = normalizeWallet(walletAddress);
    await this.assertUsernameFree(username, wallet);
    let updated: ProfileRow | undefined;
    try {
      updated = await this.profilesRepo.updateUsername(wallet, username);
    } catch (err) {
      if (isUniqueViolation(err)) throw this.usernameTaken(username);
      throw err;
    }
    if (!updated) throw new NotFoundError('Profile not found');
    return updated;
  }

  async delete(walletAddress: string): Promise<void> {
    const wallet = normalizeWallet(walletAddress);
    const deleted = await this.profilesRepo.delete(wallet);
    if (!deleted) throw new NotFoundError('Profile not found');
    this.logger.log(`Profile deleted: ${wallet}`);
  }

  private async assertUsernameFree(username: string, wallet: string): Promise<void> {
    const holder = await this.profilesRepo.findByUsername(username);
    if (holder && holder.walletAddress !== wallet) {
      throw this.usernameTaken(username);
    }
  }

  private usernameTaken(username: string): ConflictError {
    return new ConflictError('Username already taken', { username });
  }
}
