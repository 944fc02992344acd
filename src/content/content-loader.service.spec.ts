import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { ContentLoaderService } from './content-loader.service.js';

const CONTENT_DIR = join(__dirname, '..', '..', 'content');

describe('ContentLoaderService', () => {
  it('loads the bundled game and achievement catalogs', async () => {
    const loader = new ContentLoaderService(CONTENT_DIR);
    await loader.ensureLoaded();

    expect(loader.getGames()).toHaveLength(8);
    expect(loader.getGame('image-quality')).toEqual({
      id: 'image-quality',
      title: 'Image Quality',
      description: 'Pick the sharpest image in each round.',
      rounds: 3,
      rewards: { points: 50, skill: 'science', skillValue: 5 },
    });
    expect(loader.getGame('missing')).toBeUndefined();
    expect(loader.getAchievements().map((a) => a.code)).toContain('streak_7');
  });

  it('loads only once', async () => {
    const loader = new ContentLoaderService(CONTENT_DIR);
    const first = loader.ensureLoaded();
    expect(loader.ensureLoaded()).toBe(first);
    await first;
  });

  describe('with an invalid catalog', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), 'content-'));
      await writeFile(
        join(dir, 'games.json'),
        JSON.stringify([{ id: 'broken', title: 'Broken', description: '', rounds: 0 }]),
      );
      await writeFile(join(dir, 'achievements.json'), '[]');
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('rejects with the file name', async () => {
      const loader = new ContentLoaderService(dir);
      await expect(loader.loadAll()).rejects.toThrow('Invalid games.json');
    });
  });
});
