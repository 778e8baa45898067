export interface DecodedImage {
  /** Raw pixels, row-major, `channels` bytes per pixel. */
  data: Buffer;
  width: number;
  height: number;
  channels: 1 | 2 | 3 | 4;
}

export interface PhotoRecord {
  readonly bitmap: DecodedImage;
  readonly location: string;
}

/**
 * Payload of the random-photo endpoint. Older deployments send
 * `fullUrl`/`place`, newer ones `image_url`/`location_name`.
 */
export interface RandomPhotoPayload {
  image_url?: string;
  location_name?: string;
  fullUrl?: string;
  place?: string;
}

export interface FrameSize {
  width: number;
  height: number;
}

export interface RenderedFrame extends FrameSize {
  /** JPEG bytes. */
  image: Buffer;
  location: string;
  renderedAt: Date;
}

export function createPhotoRecord(bitmap: DecodedImage, location: string): PhotoRecord {
  return Object.freeze({ bitmap, location });
}
