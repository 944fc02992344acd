import { Test } from '@nestjs/testing';
import { BadRequestError } from '../common/errors/api-errors.js';
import type { KnowledgeRecord } from '../db/types/index.js';
import { EmbeddingService } from '../openai/embedding.service.js';
import { SearchService, petScope, walletScope } from './search.service.js';
import { StorageRepository } from './storage.repository.js';

const PET_ID = '5d1c2b3a-4e5f-4a6b-8c7d-9e0f1a2b3c4d';

function makeKnowledge(overrides: Partial<KnowledgeRecord>): KnowledgeRecord {
  return {
    id: 'k-1',
    dataInstanceId: 'i-1',
    url: null,
    title: null,
    content: null,
    metadata: {},
    category: 'general',
    tags: [],
    createdAt: new Date('2025-02-01T00:00:00Z'),
    ...overrides,
  };
}

describe('SearchService', () => {
  let service: SearchService;
  const embeddings = { isEnabled: jest.fn(), embed: jest.fn() };
  const repo = {
    searchInstances: jest.fn(),
    searchKnowledge: jest.fn(),
    semanticSearch: jest.fn(),
    listUnembeddedKnowledge: jest.fn(),
    setEmbedding: jest.fn(),
  };

  beforeEach(async () => {
    jest.resetAllMocks();
    embeddings.isEnabled.mockReturnValue(true);
    embeddings.embed.mockResolvedValue([0.1, 0.2]);
    repo.searchInstances.mockResolvedValue([]);
    repo.searchKnowledge.mockResolvedValue([]);
    repo.semanticSearch.mockResolvedValue([]);

    const moduleRef = await Test.createTestingModule({
      providers: [
        SearchService,
        { provide: StorageRepository, useValue: repo },
        { provide: EmbeddingService, useValue: embeddings },
      ],
    }).compile();
    service = moduleRef.get(SearchService);
  });

  it('normalizes wallet scopes', () => {
    expect(walletScope('  0xABC ')).toEqual({ kind: 'wallet', wallet: '0xabc' });
    expect(petScope(PET_ID)).toEqual({ kind: 'pet', petId: PET_ID });
  });

  describe('keyword', () => {
    it('queries instances and knowledge with the same scope', async () => {
      await service.keyword(petScope(PET_ID), 'cats', 20);

      expect(repo.searchInstances).toHaveBeenCalledWith(petScope(PET_ID), 'cats', 20);
      expect(repo.searchKnowledge).toHaveBeenCalledWith(petScope(PET_ID), 'cats', 20);
    });

    it('returns nothing for a malformed pet id', async () => {
      await expect(service.keyword(petScope('pet-1'), 'cats', 20)).resolves.toEqual({
        instances: [],
        knowledge: [],
      });
      expect(repo.searchInstances).not.toHaveBeenCalled();
    });
  });

  describe('semantic', () => {
    it('rejects when embeddings are not configured', async () => {
      embeddings.isEnabled.mockReturnValue(false);

      await expect(
        service.semantic({ kind: 'all' }, 'cats', 0.7, 20),
      ).rejects.toBeInstanceOf(BadRequestError);
      expect(embeddings.embed).not.toHaveBeenCalled();
    });

    it('embeds the query and searches with threshold and limit', async () => {
      await service.semantic(walletScope('0xOwner'), 'cats', 0.5, 10);

      expect(embeddings.embed).toHaveBeenCalledWith('cats');
      expect(repo.semanticSearch).toHaveBeenCalledWith(
        { kind: 'wallet', wallet: '0xowner' },
        [0.1, 0.2],
        0.5,
        10,
      );
    });

    it('skips the embedding call for a malformed pet id', async () => {
      await expect(service.semantic(petScope('nope'), 'cats', 0.7, 20)).resolves.toEqual([]);
      expect(embeddings.embed).not.toHaveBeenCalled();
    });
  });

  describe('reindex', () => {
    it('counts embedded and failed rows', async () => {
      repo.listUnembeddedKnowledge.mockResolvedValue([
        makeKnowledge({ id: 'k-1', title: 'Cats', content: 'Cats nap.' }),
        makeKnowledge({ id: 'k-2', title: ' ', content: null }),
        makeKnowledge({ id: 'k-3', content: 'Dogs fetch.' }),
      ]);
      embeddings.embed
        .mockResolvedValueOnce([1, 0])
        .mockRejectedValueOnce(new Error('rate limited'));

      await expect(service.reindex('0xOwner', 100)).resolves.toEqual({
        processed: 1,
        failed: 2,
      });
      expect(repo.listUnembeddedKnowledge).toHaveBeenCalledWith('0xowner', 100);
      expect(embeddings.embed).toHaveBeenNthCalledWith(1, 'Cats\n\nCats nap.');
      expect(embeddings.embed).toHaveBeenNthCalledWith(2, 'Dogs fetch.');
      expect(repo.setEmbedding).toHaveBeenCalledTimes(1);
      expect(repo.setEmbedding).toHaveBeenCalledWith('k-1', [1, 0]);
    });
  });
});
