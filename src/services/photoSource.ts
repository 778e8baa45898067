import type { PhotoRecord } from '../types/photo';
import type { PhotoCache } from './photoCache';
import { createLogger } from '../utils/logger';

const log = createLogger('source');

/** Anything that can produce one fresh photo per call (the fetcher, or a test double). */
export interface PhotoProvider {
  fetch(): Promise<PhotoRecord>;
}

/** Where the scheduler gets its next photo from. */
export interface PhotoSource {
  next(): Promise<PhotoRecord>;
}

/**
 * Fetch on every tick.
 */
export class DirectPhotoSource implements PhotoSource {
  constructor(private readonly provider: PhotoProvider) {}

  next(): Promise<PhotoRecord> {
    return this.provider.fetch();
  }
}

/**
 * Take from the cache, fetching directly only when it is empty.
 */
export class CachedPhotoSource implements PhotoSource {
  constructor(
    private readonly cache: PhotoCache,
    private readonly provider: PhotoProvider
  ) {}

  async next(): Promise<PhotoRecord> {
    const cached = this.cache.tryTake();
    if (cached) {
      log.debug(`Retrieved cached photo. Queue size: ${this.cache.size}`);
      return cached;
    }

    log.info('Cache empty, fetching photo immediately');
    return this.provider.fetch();
  }
}
