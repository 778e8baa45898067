import { Router, type Request, type Response } from 'express';
import { matchedData } from 'express-validator';
import type { FrameSize, RenderedFrame } from '../../types/photo';
import { validateViewport } from '../middlewares/validation';

export interface KioskControls {
  currentFrame(): RenderedFrame | null;
  /** Returns true when the size actually changed. */
  setViewport(size: FrameSize): boolean;
  requestExit(): void;
}

export function createFrameRouter(controls: KioskControls): Router {
  const router = Router();

  /**
   * GET /frame.jpg
   * Current frame image
   */
  router.get('/frame.jpg', (_req: Request, res: Response): void => {
    const frame = controls.currentFrame();
    if (!frame) {
      res.status(404).json({ error: 'No frame rendered yet' });
      return;
    }

    res.set('Cache-Control', 'no-store');
    res.type('image/jpeg').send(frame.image);
  });

  /**
   * GET /frame/meta
   * Location and timestamp of the current frame
   */
  router.get('/frame/meta', (_req: Request, res: Response): void => {
    const frame = controls.currentFrame();
    if (!frame) {
      res.status(404).json({ error: 'No frame rendered yet' });
      return;
    }

    res.json({
      success: true,
      data: {
        location: frame.location,
        width: frame.width,
        height: frame.height,
        renderedAt: frame.renderedAt.toISOString(),
      },
    });
  });

  /**
   * POST /viewport
   * Kiosk page reports its size
   */
  router.post('/viewport', validateViewport, (req: Request, res: Response): void => {
    const { width, height } = matchedData<FrameSize>(req);
    const changed = controls.setViewport({ width, height });

    res.json({
      success: true,
      changed,
      data: { width, height },
    });
  });

  /**
   * POST /exit
   * Escape pressed on the kiosk page
   */
  router.post('/exit', (_req: Request, res: Response): void => {
    res.json({ success: true });
    controls.requestExit();
  });

  return router;
}
