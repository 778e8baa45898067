import { PhotoCache } from '../../src/services/photoCache';
import { CachedPhotoSource, DirectPhotoSource } from '../../src/services/photoSource';
import { NetworkError } from '../../src/utils/errors';
import { ScriptedProvider, makeRecord } from '../helpers/fixtures';

describe('Photo Sources', () => {
  describe('DirectPhotoSource', () => {
    it('should fetch on every call', async () => {
      const provider = new ScriptedProvider([makeRecord('Paris'), makeRecord('Rome')]);
      const source = new DirectPhotoSource(provider);

      expect((await source.next()).location).toBe('Paris');
      expect((await source.next()).location).toBe('Rome');
      expect(provider.calls).toBe(2);
    });

    it('should pass fetch errors through to the caller', async () => {
      const source = new DirectPhotoSource(new ScriptedProvider([new NetworkError('offline')]));

      await expect(source.next()).rejects.toBeInstanceOf(NetworkError);
    });
  });

  describe('CachedPhotoSource', () => {
    it('should serve cached records before fetching', async () => {
      const cache = new PhotoCache(2);
      cache.append(makeRecord('Paris'));
      const provider = new ScriptedProvider([makeRecord('Fetched')]);
      const source = new CachedPhotoSource(cache, provider);

      expect((await source.next()).location).toBe('Paris');
      expect(provider.calls).toBe(0);
      expect(cache.size).toBe(0);
    });

    it('should fall back to a direct fetch once 15 cached photos are used up', async () => {
      const cache = new PhotoCache(15);
      for (let i = 1; i <= 15; i++) {
        cache.append(makeRecord(`Cached ${i}`));
      }
      const provider = new ScriptedProvider([makeRecord('Fetched')]);
      const source = new CachedPhotoSource(cache, provider);

      const served: string[] = [];
      for (let i = 0; i < 15; i++) {
        served.push((await source.next()).location);
      }

      expect(served[0]).toBe('Cached 1');
      expect(served[14]).toBe('Cached 15');
      expect(provider.calls).toBe(0);

      expect((await source.next()).location).toBe('Fetched');
      expect(provider.calls).toBe(1);
    });

    it('should surface the fetch error when the cache is empty and the fetch fails', async () => {
      const source = new CachedPhotoSource(new PhotoCache(2), new ScriptedProvider([new NetworkError('offline')]));

      await expect(source.next()).rejects.toThrow('offline');
    });
  });
});
