import sharp from 'sharp';
import { config } from '../config/index';
import type { FrameSize, PhotoRecord, RenderedFrame } from '../types/photo';
import { DisplayError, errorMessage } from '../utils/errors';
import { createLogger } from '../utils/logger';

const log = createLogger('renderer');

const TEXT_PADDING = 10;
const BOX_PADDING = 5;
const JPEG_QUALITY = 90;

export interface Renderer {
  render(record: PhotoRecord, size: FrameSize): Promise<RenderedFrame>;
}

export interface OverlayLayout {
  fontSize: number;
  /** Top-left of the background box. */
  left: number;
  top: number;
  boxWidth: number;
  boxHeight: number;
}

/**
 * Font size scales with frame width, clamped to 12..24px
 */
export function overlayFontSize(frameWidth: number): number {
  return Math.max(12, Math.min(24, Math.floor(frameWidth / 40)));
}

/**
 * Place the location box in the bottom-right corner, kept inside the frame
 */
export function layoutOverlay(size: FrameSize, text: string): OverlayLayout {
  const fontSize = overlayFontSize(size.width);
  // no font metrics without a text engine; average glyph is ~0.6em wide
  const textWidth = Math.ceil(text.length * fontSize * 0.6);
  const textHeight = Math.ceil(fontSize * 1.2);

  const x = size.width - textWidth - TEXT_PADDING;
  const y = size.height - textHeight - TEXT_PADDING;

  const left = Math.max(0, x - BOX_PADDING);
  const top = Math.max(0, y - BOX_PADDING);

  return {
    fontSize,
    left,
    top,
    boxWidth: Math.min(textWidth + BOX_PADDING * 2, size.width - left),
    boxHeight: Math.min(textHeight + BOX_PADDING * 2, size.height - top),
  };
}

export function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

/**
 * SVG for the semi-transparent box with white text
 */
export function buildOverlaySvg(layout: OverlayLayout, text: string, fontFamily: string): string {
  return [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${layout.boxWidth}" height="${layout.boxHeight}">`,
    `<rect x="0" y="0" width="${layout.boxWidth}" height="${layout.boxHeight}" fill="rgb(0,0,0)" fill-opacity="0.5"/>`,
    `<text x="${BOX_PADDING}" y="${BOX_PADDING + layout.fontSize}" font-family="${escapeXml(fontFamily)}"`,
    ` font-size="${layout.fontSize}" font-weight="bold" fill="#ffffff">${escapeXml(text)}</text>`,
    '</svg>',
  ].join('');
}

/**
 * Composites a photo to fill the display and stamps its location in the corner.
 */
export class FrameRenderer implements Renderer {
  constructor(private readonly fontFamily: string = config.overlay.fontFamily) {}

  async render(record: PhotoRecord, size: FrameSize): Promise<RenderedFrame> {
    const overlays: sharp.OverlayOptions[] = [];
    if (record.location) {
      const layout = layoutOverlay(size, record.location);
      overlays.push({
        input: Buffer.from(buildOverlaySvg(layout, record.location, this.fontFamily)),
        left: layout.left,
        top: layout.top,
      });
    }

    let image: Buffer;
    try {
      image = await this.compose(record, size, overlays);
    } catch (error) {
      if (overlays.length === 0) {
        throw new DisplayError(`Failed to render frame: ${errorMessage(error)}`, { cause: error });
      }
      log.warn(`Error adding location text, rendering without it: ${errorMessage(error)}`);
      try {
        image = await this.compose(record, size, []);
      } catch (retryError) {
        throw new DisplayError(`Failed to render frame: ${errorMessage(retryError)}`, { cause: retryError });
      }
    }

    return {
      image,
      width: size.width,
      height: size.height,
      location: record.location,
      renderedAt: new Date(),
    };
  }

  private compose(record: PhotoRecord, size: FrameSize, overlays: sharp.OverlayOptions[]): Promise<Buffer> {
    const { data, width, height, channels } = record.bitmap;

    const pipeline = sharp(data, { raw: { width, height, channels } })
      .resize(size.width, size.height, { fit: 'cover', position: 'centre', kernel: 'lanczos3' })
      .flatten({ background: '#000000' });

    if (overlays.length > 0) {
      pipeline.composite(overlays);
    }

    return pipeline.jpeg({ quality: JPEG_QUALITY }).toBuffer();
  }
}
