import type { Server } from 'node:http';
import type { Express } from 'express';
import sharp from 'sharp';
import type { PhotoProvider } from '../../src/services/photoSource';
import { createPhotoRecord, type PhotoRecord } from '../../src/types/photo';

export interface Rgb {
  r: number;
  g: number;
  b: number;
}

export const WHITE: Rgb = { r: 255, g: 255, b: 255 };

/**
 * A solid-colour RGBA record, no decoding involved
 */
export function makeRecord(location: string, width = 40, height = 30, color: Rgb = WHITE): PhotoRecord {
  const data = Buffer.alloc(width * height * 4);
  for (let i = 0; i < width * height; i++) {
    data[i * 4] = color.r;
    data[i * 4 + 1] = color.g;
    data[i * 4 + 2] = color.b;
    data[i * 4 + 3] = 255;
  }
  return createPhotoRecord({ data, width, height, channels: 4 }, location);
}

export function makeJpeg(width: number, height: number, color: Rgb = WHITE): Promise<Buffer> {
  return sharp({
    create: { width, height, channels: 3, background: color },
  })
    .jpeg()
    .toBuffer();
}

/**
 * Read one pixel back out of an encoded image
 */
export async function pixelAt(image: Buffer, x: number, y: number): Promise<Rgb> {
  const { data, info } = await sharp(image).removeAlpha().raw().toBuffer({ resolveWithObject: true });
  const offset = (y * info.width + x) * info.channels;
  return { r: data[offset], g: data[offset + 1], b: data[offset + 2] };
}

export interface TestServer {
  baseUrl: string;
  close(): Promise<void>;
}

/**
 * Serve an express app on an ephemeral localhost port
 */
export async function startTestServer(app: Express): Promise<TestServer> {
  const server = await new Promise<Server>((resolve) => {
    const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
  });

  const address = server.address();
  if (!address || typeof address === 'string') {
    throw new Error('Test server has no TCP address');
  }

  return {
    baseUrl: `http://127.0.0.1:${address.port}`,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
        server.closeAllConnections();
      }),
  };
}

export function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void; reject: (reason: unknown) => void } {
  let resolve: (value: T) => void = () => undefined;
  let reject: (reason: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/**
 * Provider that replays a script of results, then makes up "Photo N" records
 */
export class ScriptedProvider implements PhotoProvider {
  calls = 0;

  constructor(private readonly script: Array<PhotoRecord | Error> = []) {}

  async fetch(): Promise<PhotoRecord> {
    const step = this.script[this.calls];
    this.calls++;
    if (step instanceof Error) throw step;
    return step ?? makeRecord(`Photo ${this.calls}`);
  }
}

export async function waitFor(condition: () => boolean, timeoutMs = 2000): Promise<void> {
  const started = Date.now();
  while (!condition()) {
    if (Date.now() - started > timeoutMs) {
      throw new Error('Timed out waiting for condition');
    }
    await new Promise((resolve) => setTimeout(resolve, 5));
  }
}
