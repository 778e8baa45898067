import { EventEmitter } from 'node:events';
import type { Server } from 'node:http';
import { createKioskApp } from '../api/server';
import type { KioskControls } from '../api/routes/frame';
import type { FrameSize, RenderedFrame } from '../types/photo';
import { DisplayError, errorMessage } from '../utils/errors';
import { createLogger } from '../utils/logger';
import type { DisplayBackend, StatusProvider } from './types';

const log = createLogger('kiosk');

export interface KioskDisplayOptions {
  host: string;
  /** 0 picks a free port. */
  port: number;
  width: number;
  height: number;
  status?: StatusProvider;
}

/**
 * Display backend served over HTTP to a full-screen browser.
 * The browser page shows /frame.jpg, reports its viewport and posts /exit on Escape.
 */
export class KioskDisplay implements DisplayBackend {
  private readonly events = new EventEmitter();
  private server: Server | null = null;
  private frame: RenderedFrame | null = null;
  private viewport: FrameSize;
  private statusProvider?: StatusProvider;

  constructor(private readonly opts: KioskDisplayOptions) {
    this.viewport = { width: opts.width, height: opts.height };
    this.statusProvider = opts.status;
  }

  get size(): FrameSize {
    return { ...this.viewport };
  }

  get currentFrame(): RenderedFrame | null {
    return this.frame;
  }

  /** Port actually bound, once open. */
  get port(): number | undefined {
    const address = this.server?.address();
    return address && typeof address === 'object' ? address.port : undefined;
  }

  /** Underlying HTTP server while open. */
  get httpServer(): Server | null {
    return this.server;
  }

  setStatusProvider(provider: StatusProvider): void {
    this.statusProvider = provider;
  }

  async open(): Promise<void> {
    if (this.server) return;

    const controls: KioskControls = {
      currentFrame: () => this.frame,
      setViewport: (size) => this.setViewport(size),
      requestExit: () => this.events.emit('exit'),
    };
    const app = createKioskApp(controls, () => (this.statusProvider ? this.statusProvider() : {}));

    this.server = await new Promise<Server>((resolve, reject) => {
      const server = app.listen(this.opts.port, this.opts.host);
      const onListenError = (err: Error): void => {
        reject(new DisplayError(`Display surface unavailable: ${errorMessage(err)}`, { cause: err }));
      };
      server.once('error', onListenError);
      server.once('listening', () => {
        server.off('error', onListenError);
        // later failures (e.g. accept errors) must not crash the frame
        server.on('error', (err) => log.error(`Kiosk server error: ${errorMessage(err)}`));
        resolve(server);
      });
    });

    log.info(`✓ Kiosk display on http://${this.opts.host}:${this.port} (${this.viewport.width}x${this.viewport.height})`);
  }

  show(frame: RenderedFrame): void {
    this.frame = frame;
    log.debug(`Showing ${frame.location} (${frame.width}x${frame.height})`);
  }

  onExit(listener: () => void): void {
    this.events.on('exit', listener);
  }

  onResize(listener: (size: FrameSize) => void): void {
    this.events.on('resize', listener);
  }

  /** Exit from outside the page, e.g. a terminal keypress. */
  requestExit(): void {
    this.events.emit('exit');
  }

  setViewport(size: FrameSize): boolean {
    if (size.width === this.viewport.width && size.height === this.viewport.height) {
      return false;
    }
    this.viewport = { width: size.width, height: size.height };
    log.info(`Viewport resized to ${size.width}x${size.height}`);
    this.events.emit('resize', this.size);
    return true;
  }

  async close(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = null;

    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
      server.closeAllConnections();
    });
    this.events.removeAllListeners();
  }
}
