import { pets, profiles } from '../db/schema/index.js';
import type { DataInstanceRow, PetRow } from '../db/types/index.js';
import {
  createTestDatabase,
  embeddingOf,
  type TestDatabase,
} from '../db/testing/test-database.js';
import { StorageRepository } from './storage.repository.js';

describe('StorageRepository (PGlite)', () => {
  let database: TestDatabase;
  let repo: StorageRepository;
  let byte: PetRow;
  let nibble: PetRow;
  let rex: PetRow;
  let shirt: DataInstanceRow;
  let naming: DataInstanceRow;

  beforeAll(async () => {
    database = await createTestDatabase();
    repo = new StorageRepository(database.db);
  }, 60000);

  afterAll(async () => {
    await database.close();
  });

  beforeEach(async () => {
    await database.reset();
    const { db } = database;

    await db.insert(profiles).values([
      { walletAddress: '0xalice', username: 'alice' },
      { walletAddress: '0xbob', username: 'bob' },
    ]);
    [byte, nibble, rex] = await db
      .insert(pets)
      .values([
        { ownerWallet: '0xalice', name: 'Byte', createdAt: new Date('2024-01-01T00:00:00Z') },
        { ownerWallet: '0xalice', name: 'Nibble', createdAt: new Date('2024-02-01T00:00:00Z') },
        { ownerWallet: '0xbob', name: 'Rex', createdAt: new Date('2024-03-01T00:00:00Z') },
      ])
      .returning();

    shirt = await repo.insertInstance({
      petId: byte.id,
      content: '100% cotton shirt',
      contentType: 'text/plain',
      category: 'social',
    });
    naming = await repo.insertInstance({
      petId: byte.id,
      content: 'snake_case naming',
      contentType: 'text/plain',
      category: 'code',
    });
    await repo.insertInstance({
      petId: nibble.id,
      content: '1000 cottons',
      contentType: 'text/plain',
      category: 'code',
    });
    await repo.insertInstance({ petId: nibble.id, content: 'three cats', contentType: 'text/plain' });
    const socks = await repo.insertInstance({
      petId: rex.id,
      content: '100% cotton socks',
      contentType: 'text/plain',
    });

    await repo.insertKnowledge([
      { dataInstanceId: shirt.id, title: 'Exact', content: 'cats', embedding: embeddingOf(1, 0) },
      { dataInstanceId: shirt.id, title: 'Close', content: 'kittens', embedding: embeddingOf(0.6, 0.8) },
      { dataInstanceId: naming.id, title: 'Orthogonal', content: 'dogs', embedding: embeddingOf(0, 1) },
      { dataInstanceId: naming.id, title: 'Unembedded', url: 'https://example.test/later' },
      { dataInstanceId: socks.id, title: 'Bob exact', content: 'cats', embedding: embeddingOf(1, 0) },
    ]);
    await repo.insertImages([
      { dataInstanceId: shirt.id, imageUrl: 'https://img.example.test/shirt.png' },
      { dataInstanceId: socks.id, imageUrl: 'https://img.example.test/socks-1.png' },
      { dataInstanceId: socks.id, imageUrl: 'https://img.example.test/socks-2.png' },
    ]);
  });

  describe('semanticSearch', () => {
    const query = embeddingOf(1, 0);

    it('returns matches above the threshold, best first', async () => {
      const matches = await repo.semanticSearch(
        { kind: 'wallet', wallet: '0xalice' },
        query,
        0.5,
        10,
      );

      expect(matches.map((m) => m.title)).toEqual(['Exact', 'Close']);
      expect(matches[0].similarity).toBeCloseTo(1, 5);
      expect(matches[1].similarity).toBeCloseTo(0.6, 5);
      expect(matches[0].petId).toBe(byte.id);
    });

    it('never matches rows without an embedding', async () => {
      const matches = await repo.semanticSearch({ kind: 'wallet', wallet: '0xalice' }, query, 0, 10);
      expect(matches.map((m) => m.title)).toEqual(['Exact', 'Close', 'Orthogonal']);
    });

    it('honours the limit', async () => {
      const matches = await repo.semanticSearch({ kind: 'pet', petId: byte.id }, query, 0, 1);
      expect(matches.map((m) => m.title)).toEqual(['Exact']);
    });

    it('covers every pet in the all scope', async () => {
      const matches = await repo.semanticSearch({ kind: 'all' }, query, 0.5, 10);
      expect(matches.map((m) => m.title).sort()).toEqual(['Bob exact', 'Close', 'Exact']);
      expect(matches[2].title).toBe('Close');
    });

    it('is empty for a pet without knowledge', async () => {
      await expect(
        repo.semanticSearch({ kind: 'pet', petId: nibble.id }, query, 0, 10),
      ).resolves.toEqual([]);
    });
  });

  describe('keyword search', () => {
    it('treats % in the query literally', async () => {
      const rows = await repo.searchInstances({ kind: 'wallet', wallet: '0xalice' }, '0% c', 10);
      expect(rows.map((r) => r.content)).toEqual(['100% cotton shirt']);
    });

    it('treats _ in the query literally', async () => {
      const rows = await repo.searchInstances({ kind: 'wallet', wallet: '0xalice' }, 'e_c', 10);
      expect(rows.map((r) => r.content)).toEqual(['snake_case naming']);
    });

    it('limits instances to the scope', async () => {
      const all = await repo.searchInstances({ kind: 'all' }, 'COTTON', 10);
      expect(all.map((r) => r.content).sort()).toEqual([
        '100% cotton shirt',
        '100% cotton socks',
        '1000 cottons',
      ]);

      const pet = await repo.searchInstances({ kind: 'pet', petId: nibble.id }, 'cotton', 10);
      expect(pet.map((r) => r.content)).toEqual(['1000 cottons']);
    });

    it('matches knowledge titles and content case-insensitively', async () => {
      const alice = await repo.searchKnowledge({ kind: 'wallet', wallet: '0xalice' }, 'EXACT', 10);
      expect(alice.map((k) => k.title)).toEqual(['Exact']);

      const all = await repo.searchKnowledge({ kind: 'all' }, 'cats', 10);
      expect(all.map((k) => k.title).sort()).toEqual(['Bob exact', 'Exact']);
    });
  });

  describe('walletTotals', () => {
    it('counts rows across the wallet\'s pets', async () => {
      const totals = await repo.walletTotals('0xalice');

      expect(totals).toEqual({
        instances: 4,
        knowledge: 4,
        images: 1,
        instancesByCategory: { social: 1, code: 2, general: 1 },
        pets: [
          { id: nibble.id, name: 'Nibble', instanceCount: 2 },
          { id: byte.id, name: 'Byte', instanceCount: 2 },
        ],
      });
    });

    it('is all zeros for an unknown wallet', async () => {
      await expect(repo.walletTotals('0xnobody')).resolves.toEqual({
        instances: 0,
        knowledge: 0,
        images: 0,
        instancesByCategory: {},
        pets: [],
      });
    });
  });

  it('lists and fills in unembedded knowledge', async () => {
    const [pending] = await repo.listUnembeddedKnowledge('0xalice', 10);
    expect(pending.title).toBe('Unembedded');

    await repo.setEmbedding(pending.id, embeddingOf(0, 0, 1));
    await expect(repo.listUnembeddedKnowledge('0xalice', 10)).resolves.toEqual([]);
  });
});
