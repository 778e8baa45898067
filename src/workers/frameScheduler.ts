import type { DisplayBackend } from '../display/types';
import type { Renderer } from '../services/frameRenderer';
import type { PhotoSource } from '../services/photoSource';
import type { PhotoRecord } from '../types/photo';
import { errorMessage, isFetchError } from '../utils/errors';
import { createLogger } from '../utils/logger';

const log = createLogger('scheduler');

export type SchedulerState = 'running' | 'stopped';

export interface FrameSchedulerOptions {
  source: PhotoSource;
  renderer: Renderer;
  display: DisplayBackend;
  intervalMs: number;
  /** Quiet period after a resize before re-rendering. */
  resizeDebounceMs?: number;
}

export interface SchedulerStatus {
  state: SchedulerState;
  nextTickAt: string | null;
  ticks: number;
  failures: number;
  location: string | null;
}

/**
 * Fixed-interval loop: next photo -> render -> show.
 *
 * The next tick is armed only after the current one settles, so ticks never
 * overlap. A failed fetch leaves the previous photo on screen.
 */
export class FrameScheduler {
  private readonly source: PhotoSource;
  private readonly renderer: Renderer;
  private readonly display: DisplayBackend;
  private readonly intervalMs: number;
  private readonly resizeDebounceMs: number;

  private state: SchedulerState = 'stopped';
  /** Bumped on every start and stop; work from a stale generation is dropped. */
  private generation = 0;
  private current: PhotoRecord | null = null;
  private timer: NodeJS.Timeout | null = null;
  private resizeTimer: NodeJS.Timeout | null = null;
  private readonly inFlight = new Set<Promise<void>>();
  private refreshing: Promise<void> | null = null;
  private nextTickAt: Date | null = null;
  private ticks = 0;
  private failures = 0;

  constructor(opts: FrameSchedulerOptions) {
    this.source = opts.source;
    this.renderer = opts.renderer;
    this.display = opts.display;
    this.intervalMs = opts.intervalMs;
    this.resizeDebounceMs = opts.resizeDebounceMs ?? 100;

    this.display.onResize(() => this.scheduleRefresh());
  }

  get isRunning(): boolean {
    return this.state === 'running';
  }

  /** Photo currently on screen. */
  get currentPhoto(): PhotoRecord | null {
    return this.current;
  }

  start(): void {
    if (this.state === 'running') return;
    this.state = 'running';
    const generation = ++this.generation;
    log.info(`✓ Scheduler started, interval ${this.intervalMs}ms`);
    this.runTick(generation);
  }

  /**
   * Stop ticking. A tick already in flight finishes, but its photo is not shown.
   */
  async stop(): Promise<void> {
    if (this.state === 'stopped') return;
    this.state = 'stopped';
    this.generation++;
    this.nextTickAt = null;

    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.resizeTimer) {
      clearTimeout(this.resizeTimer);
      this.resizeTimer = null;
    }

    await Promise.all([...this.inFlight, this.refreshing]);
    log.info('Scheduler stopped');
  }

  /**
   * Obtain the next photo and show it. Resolves true when a new photo went up.
   */
  async tick(generation: number = this.generation): Promise<boolean> {
    this.ticks++;

    let record: PhotoRecord;
    try {
      record = await this.source.next();
    } catch (error) {
      this.failures++;
      if (isFetchError(error)) {
        log.error(`Failed to get photo from cache or API: ${error.message}`);
      } else {
        log.error(`Unexpected error getting photo: ${errorMessage(error)}`);
      }
      return false;
    }

    if (generation !== this.generation) return false;

    this.current = record;
    log.info(`Using photo with location: ${record.location}`);
    return this.present(record, generation);
  }

  /**
   * Re-render the current photo at the current display size, without fetching.
   */
  async refresh(generation: number = this.generation): Promise<boolean> {
    if (!this.current) return false;
    return this.present(this.current, generation);
  }

  status(): SchedulerStatus {
    return {
      state: this.state,
      nextTickAt: this.nextTickAt ? this.nextTickAt.toISOString() : null,
      ticks: this.ticks,
      failures: this.failures,
      location: this.current ? this.current.location : null,
    };
  }

  private async present(record: PhotoRecord, generation: number): Promise<boolean> {
    try {
      const frame = await this.renderer.render(record, this.display.size);
      if (generation !== this.generation) return false;
      this.display.show(frame);
      return true;
    } catch (error) {
      log.error(`Error displaying image: ${errorMessage(error)}`);
      return false;
    }
  }

  private runTick(generation: number): void {
    this.timer = null;
    this.nextTickAt = null;

    const pending: Promise<void> = this.tick(generation)
      .then(() => undefined)
      .catch((error: unknown) => {
        log.error(`Unexpected tick failure: ${errorMessage(error)}`);
      })
      .finally(() => {
        this.inFlight.delete(pending);
        this.scheduleNext(generation);
      });
    this.inFlight.add(pending);
  }

  private scheduleNext(generation: number): void {
    if (this.state !== 'running' || generation !== this.generation) return;
    this.nextTickAt = new Date(Date.now() + this.intervalMs);
    this.timer = setTimeout(() => this.runTick(generation), this.intervalMs);
  }

  private scheduleRefresh(): void {
    if (this.state !== 'running') return;
    if (this.resizeTimer) clearTimeout(this.resizeTimer);

    this.resizeTimer = setTimeout(() => {
      this.resizeTimer = null;
      this.refreshing = this.refresh(this.generation)
        .then(() => undefined)
        .finally(() => {
          this.refreshing = null;
        });
    }, this.resizeDebounceMs);
  }
}
