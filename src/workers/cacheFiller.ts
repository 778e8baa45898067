import type { PhotoCache } from '../services/photoCache';
import type { PhotoProvider } from '../services/photoSource';
import { cancellableDelay, type CancellableDelay } from '../utils/delay';
import { errorMessage } from '../utils/errors';
import { createLogger } from '../utils/logger';

const log = createLogger('cache');

export interface CacheFillerOptions {
  /** Wait after a failed fetch. */
  retryDelayMs?: number;
  /** Wait between checks while the cache is full. */
  fullPollMs?: number;
}

export interface CacheFillerStats {
  fetched: number;
  failed: number;
  running: boolean;
}

/**
 * Background producer that keeps the photo cache topped up.
 * Fetch errors are logged and retried after a backoff, never rethrown.
 */
export class CacheFiller {
  private readonly retryDelayMs: number;
  private readonly fullPollMs: number;

  private running = false;
  /** Bumped on every start and stop; a loop exits once its generation is stale. */
  private generation = 0;
  private readonly loops = new Set<Promise<void>>();
  private pendingWait: CancellableDelay | null = null;
  private fetched = 0;
  private failed = 0;

  constructor(
    private readonly cache: PhotoCache,
    private readonly provider: PhotoProvider,
    opts: CacheFillerOptions = {}
  ) {
    this.retryDelayMs = opts.retryDelayMs ?? 5000;
    this.fullPollMs = opts.fullPollMs ?? 30000;
  }

  get isRunning(): boolean {
    return this.running;
  }

  /** Start the background loop. No-op if already running. */
  start(): void {
    if (this.running) return;
    this.running = true;
    const generation = ++this.generation;
    const loop = this.run(generation).finally(() => {
      this.loops.delete(loop);
    });
    this.loops.add(loop);
    log.info(`✓ Background fetching started (capacity ${this.cache.capacity})`);
  }

  /**
   * Stop the loop and wait for it to exit. A fetch in flight finishes
   * and its result is discarded, even if the filler is started again meanwhile.
   */
  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;
    this.generation++;
    this.pendingWait?.cancel();

    await Promise.all([...this.loops]);
  }

  stats(): CacheFillerStats {
    return { fetched: this.fetched, failed: this.failed, running: this.running };
  }

  /**
   * One pass of the loop: fetch into the cache if there is room.
   * Returns how long to wait before the next pass.
   */
  async fillOnce(generation: number = this.generation): Promise<number> {
    if (this.cache.isFull) return this.fullPollMs;

    try {
      const record = await this.provider.fetch();
      if (generation !== this.generation) return 0;

      if (this.cache.append(record)) {
        this.fetched++;
        log.info(`Cached photo. Queue size: ${this.cache.size}`);
      }
      return 0;
    } catch (error) {
      this.failed++;
      log.warn(`Failed to fetch photo for cache: ${errorMessage(error)}`);
      return this.retryDelayMs;
    }
  }

  private async run(generation: number): Promise<void> {
    while (generation === this.generation) {
      const waitMs = await this.fillOnce(generation);
      if (generation !== this.generation) break;

      if (waitMs > 0) {
        const wait = cancellableDelay(waitMs);
        this.pendingWait = wait;
        await wait.promise;
        if (this.pendingWait === wait) this.pendingWait = null;
      } else {
        // let the scheduler run between back-to-back fetches
        await new Promise<void>((resolve) => setImmediate(resolve));
      }
    }
  }
}
