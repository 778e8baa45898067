import type { FrameSize, RenderedFrame } from '../types/photo';

/**
 * A render surface plus its exit control. The scheduler only talks to this,
 * so it runs the same against the kiosk server or a test double.
 */
export interface DisplayBackend {
  readonly size: FrameSize;
  /** Acquire the surface. Rejects with DisplayError when it is unavailable. */
  open(): Promise<void>;
  show(frame: RenderedFrame): void;
  onExit(listener: () => void): void;
  onResize(listener: (size: FrameSize) => void): void;
  close(): Promise<void>;
}

export type StatusProvider = () => Record<string, unknown>;
