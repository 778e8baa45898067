import { config as defaultConfig, type AppConfig } from './config/index';
import { watchExitKeys } from './display/keypress';
import { KioskDisplay } from './display/kioskDisplay';
import { FrameRenderer } from './services/frameRenderer';
import { PhotoCache } from './services/photoCache';
import { PhotoFetcher } from './services/photoFetcher';
import { CachedPhotoSource, DirectPhotoSource, type PhotoSource } from './services/photoSource';
import { CacheFiller } from './workers/cacheFiller';
import { FrameScheduler } from './workers/frameScheduler';
import { DisplayError, errorMessage } from './utils/errors';
import { createLogger, setLogLevel } from './utils/logger';

const log = createLogger('app');

export interface PhotoFrameApp {
  display: KioskDisplay;
  scheduler: FrameScheduler;
  cache: PhotoCache | null;
  filler: CacheFiller | null;
  shutdown(): Promise<void>;
}

/**
 * Wire the frame together and start it. Rejects with DisplayError when
 * the display cannot be opened.
 */
export async function startPhotoFrame(appConfig: AppConfig = defaultConfig): Promise<PhotoFrameApp> {
  setLogLevel(appConfig.logging.level);

  const display = new KioskDisplay(appConfig.display);
  await display.open();

  const fetcher = new PhotoFetcher({
    endpoint: appConfig.photoApi.endpoint,
    timeoutMs: appConfig.photoApi.timeoutMs,
    maxDimension: appConfig.photoApi.decodeMaxDimension,
  });

  let cache: PhotoCache | null = null;
  let filler: CacheFiller | null = null;
  let source: PhotoSource;

  if (appConfig.cache.enabled) {
    cache = new PhotoCache(appConfig.cache.size);
    filler = new CacheFiller(cache, fetcher, {
      retryDelayMs: appConfig.cache.retryDelayMs,
      fullPollMs: appConfig.cache.fullPollMs,
    });
    source = new CachedPhotoSource(cache, fetcher);
  } else {
    source = new DirectPhotoSource(fetcher);
  }

  const scheduler = new FrameScheduler({
    source,
    renderer: new FrameRenderer(appConfig.overlay.fontFamily),
    display,
    intervalMs: appConfig.scheduler.intervalMs,
  });

  display.setStatusProvider(() => ({
    scheduler: scheduler.status(),
    cache: cache ? { size: cache.size, capacity: cache.capacity, ...filler?.stats() } : null,
  }));

  let closing: Promise<void> | null = null;
  const shutdown = (): Promise<void> => {
    if (!closing) {
      closing = (async () => {
        log.info('Shutting down...');
        await scheduler.stop();
        if (filler) await filler.stop();
        await display.close();
      })();
    }
    return closing;
  };

  filler?.start();
  scheduler.start();

  return { display, scheduler, cache, filler, shutdown };
}

async function main(): Promise<void> {
  let app: PhotoFrameApp;
  try {
    app = await startPhotoFrame();
  } catch (error) {
    if (error instanceof DisplayError) {
      log.error(`Failed to open display: ${error.message}`);
    } else {
      log.error(`Failed to start photo frame: ${errorMessage(error)}`);
    }
    process.exit(1);
  }

  const exit = (): void => {
    app
      .shutdown()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        log.error(`Error during shutdown: ${errorMessage(error)}`);
        process.exit(1);
      });
  };

  app.display.onExit(exit);
  watchExitKeys(process.stdin, exit);
  process.once('SIGINT', exit);
  process.once('SIGTERM', exit);
}

if (require.main === module) {
  main().catch((error: unknown) => {
    log.error(`Fatal: ${errorMessage(error)}`);
    process.exit(1);
  });
}
