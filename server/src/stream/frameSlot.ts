export interface Frame {
  readonly payload: Buffer;
  readonly version: number;
  readonly publishedAt: number;
}

export const EMPTY_FRAME: Frame = Object.freeze({
  payload: Buffer.alloc(0),
  version: 0,
  publishedAt: 0,
});

export type FrameListener = (frame: Frame) => void;

/**
 * Single-slot store of the most recently published frame.
 *
 * Each publish swaps in a new frozen {@link Frame}, so a reader holding the
 * result of {@link FrameSlot.read} keeps a consistent payload/version pair
 * even after later publications.
 */
export class FrameSlot {
  private current: Frame = EMPTY_FRAME;
  private listeners = new Set<FrameListener>();

  publish(payload: Uint8Array, now: number = Date.now()): Frame {
    const frame: Frame = Object.freeze({
      payload: Buffer.from(payload),
      version: this.current.version + 1,
      publishedAt: now,
    });
    this.current = frame;

    for (const listener of Array.from(this.listeners)) {
      listener(frame);
    }
    return frame;
  }

  read(): Frame {
    return this.current;
  }

  get version(): number {
    return this.current.version;
  }

  get hasFrame(): boolean {
    return this.current !== EMPTY_FRAME;
  }

  subscribe(listener: FrameListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}

export function isEmptyFrame(frame: Frame): boolean {
  return frame.version === 0;
}
