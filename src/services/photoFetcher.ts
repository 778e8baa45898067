import axios, { type AxiosInstance } from 'axios';
import sharp from 'sharp';
import { config } from '../config/index';
import { createPhotoRecord, type DecodedImage, type PhotoRecord, type RandomPhotoPayload } from '../types/photo';
import { DecodeError, NetworkError, ProtocolError, errorMessage } from '../utils/errors';
import { createLogger } from '../utils/logger';

const log = createLogger('fetcher');

export const UNKNOWN_LOCATION = 'Unknown Location';

export interface PhotoFetcherOptions {
  endpoint?: string;
  timeoutMs?: number;
  /** Longest edge kept after decoding; larger photos are scaled down. */
  maxDimension?: number;
  http?: AxiosInstance;
}

export interface RandomPhotoInfo {
  imageUrl: string;
  location: string;
}

/**
 * Format a raw place slug for display: "new_york-city" -> "New York City"
 */
export function formatLocation(raw: string): string {
  return raw
    .replace(/[_-]/g, ' ')
    .replace(/\s+/g, ' ')
    .trim()
    .toLowerCase()
    .replace(/(^|[^\p{L}])(\p{L})/gu, (_match, before: string, letter: string) => before + letter.toUpperCase());
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const nonEmptyString = (value: unknown): string | undefined =>
  typeof value === 'string' && value.trim() !== '' ? value.trim() : undefined;

/**
 * Parse the JSON body of the random-photo endpoint.
 * Throws ProtocolError when the body is not an object or carries no image URL.
 */
export function parsePhotoPayload(body: string, endpoint: string): RandomPhotoInfo {
  let data: unknown;
  try {
    data = JSON.parse(body);
  } catch (error) {
    throw new ProtocolError('Photo API returned malformed JSON', { cause: error });
  }

  if (!isRecord(data)) {
    throw new ProtocolError('Photo API returned an unexpected payload');
  }

  const payload: RandomPhotoPayload = {
    image_url: nonEmptyString(data.image_url),
    location_name: nonEmptyString(data.location_name),
    fullUrl: nonEmptyString(data.fullUrl),
    place: nonEmptyString(data.place),
  };

  const rawUrl = payload.image_url ?? payload.fullUrl;
  if (!rawUrl) {
    throw new ProtocolError('Invalid API response format: missing image URL');
  }

  let imageUrl: string;
  try {
    imageUrl = new URL(rawUrl, endpoint).toString();
  } catch (error) {
    throw new ProtocolError(`Invalid image URL: ${rawUrl}`, { cause: error });
  }

  const place = payload.location_name ?? payload.place;
  const location = place ? formatLocation(place) : '';

  return { imageUrl, location: location || UNKNOWN_LOCATION };
}

/**
 * Decode image bytes into raw RGBA pixels, applying EXIF orientation.
 * Neither edge of the result exceeds `maxDimension`; smaller photos keep their size.
 */
export async function decodeImage(
  bytes: Buffer,
  maxDimension: number = config.photoApi.decodeMaxDimension
): Promise<DecodedImage> {
  try {
    const { data, info } = await sharp(bytes)
      .rotate()
      .resize(maxDimension, maxDimension, { fit: 'inside', withoutEnlargement: true })
      .ensureAlpha()
      .raw()
      .toBuffer({ resolveWithObject: true });

    return {
      data,
      width: info.width,
      height: info.height,
      channels: info.channels,
    };
  } catch (error) {
    throw new DecodeError(`Could not decode image: ${errorMessage(error)}`, { cause: error });
  }
}

/**
 * Translate an axios failure into NetworkError (no response) or ProtocolError (bad status)
 */
function toFetchError(error: unknown, what: string): NetworkError | ProtocolError {
  if (axios.isAxiosError(error) && error.response) {
    const { status, statusText } = error.response;
    return new ProtocolError(`${what} failed with status ${status} ${statusText}`.trim(), {
      cause: error,
      status,
    });
  }

  const code = axios.isAxiosError(error) && error.code ? ` (${error.code})` : '';
  return new NetworkError(`${what} failed${code}: ${errorMessage(error)}`, { cause: error });
}

export class PhotoFetcher {
  private readonly endpoint: string;
  private readonly maxDimension: number;
  private readonly http: AxiosInstance;

  constructor(options: PhotoFetcherOptions = {}) {
    this.endpoint = options.endpoint ?? config.photoApi.endpoint;
    this.maxDimension = options.maxDimension ?? config.photoApi.decodeMaxDimension;
    this.http =
      options.http ??
      axios.create({
        timeout: options.timeoutMs ?? config.photoApi.timeoutMs,
      });
  }

  /**
   * Ask the endpoint for a random photo's metadata
   */
  async fetchInfo(): Promise<RandomPhotoInfo> {
    let body: string;
    try {
      const response = await this.http.get<string>(this.endpoint, { responseType: 'text' });
      body = response.data;
    } catch (error) {
      throw toFetchError(error, 'Photo API request');
    }

    return parsePhotoPayload(body, this.endpoint);
  }

  /**
   * Download the raw image bytes
   */
  async fetchImage(imageUrl: string): Promise<Buffer> {
    try {
      const response = await this.http.get<ArrayBuffer>(imageUrl, { responseType: 'arraybuffer' });
      return Buffer.from(response.data);
    } catch (error) {
      throw toFetchError(error, 'Image download');
    }
  }

  /**
   * Fetch, download and decode one random photo. No retries.
   */
  async fetch(): Promise<PhotoRecord> {
    log.debug('Fetching random photo from API...');

    const info = await this.fetchInfo();
    const bytes = await this.fetchImage(info.imageUrl);
    const bitmap = await decodeImage(bytes, this.maxDimension);

    log.info(`Fetched photo - Location: ${info.location} (${bitmap.width}x${bitmap.height})`);
    return createPhotoRecord(bitmap, info.location);
  }
}
