import { Injectable } from '@nestjs/common';
import { normalizeWallet } from '../common/text-utils.js';
import type { DataCategory } from '../db/types/index.js';
import { StorageRepository } from '../storage/storage.repository.js';

export interface WalletStatistics {
  wallet_address: string;
  total_pets: number;
  total_instances: number;
  total_knowledge: number;
  total_images: number;
  instances_by_category: Partial<Record<DataCategory, number>>;
  pets: { id: string; name: string; instance_count: number }[];
}

@Injectable()
export class UsersService {
  constructor(private readonly storageRepo: StorageRepository) {}

  /** Unknown wallets get all-zero totals */
  async statistics(walletAddress: string): Promise<WalletStatistics> {
    const wallet = normalizeWallet(walletAddress);
    const totals = await this.storageRepo.walletTotals(wallet);
    return {
      wallet_address: wallet,
      total_pets: totals.pets.length,
      total_instances: totals.instances,
      total_knowledge: totals.knowledge,
      total_images: totals.images,
      instances_by_category: totals.instancesByCategory,
      pets: totals.pets.map((p) => ({
        id: p.id,
        name: p.name,
        instance_count: p.instanceCount,
      })),
    };
  }
}
