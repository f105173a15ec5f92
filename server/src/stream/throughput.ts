export interface ThroughputSnapshot {
  totalFrames: number;
  totalBytes: number;
  framesPerSecond: number;
  bytesPerSecond: number;
}

const WINDOW_MS = 1000;

// Rates are recomputed at most once per window and held in between.
export class ThroughputMeter {
  private totalFrames = 0;
  private totalBytes = 0;
  private windowStart: number;
  private windowFrames = 0;
  private windowBytes = 0;
  private framesPerSecond = 0;
  private bytesPerSecond = 0;

  constructor(now: number = Date.now()) {
    this.windowStart = now;
  }

  record(bytes: number, now: number = Date.now()): void {
    this.roll(now);
    this.totalFrames += 1;
    this.totalBytes += bytes;
    this.windowFrames += 1;
    this.windowBytes += bytes;
  }

  snapshot(now: number = Date.now()): ThroughputSnapshot {
    this.roll(now);
    return {
      totalFrames: this.totalFrames,
      totalBytes: this.totalBytes,
      framesPerSecond: round(this.framesPerSecond),
      bytesPerSecond: round(this.bytesPerSecond),
    };
  }

  private roll(now: number): void {
    const elapsed = now - this.windowStart;
    if (elapsed < WINDOW_MS) return;
    this.framesPerSecond = (this.windowFrames * 1000) / elapsed;
    this.bytesPerSecond = (this.windowBytes * 1000) / elapsed;
    this.windowStart = now;
    this.windowFrames = 0;
    this.windowBytes = 0;
  }
}

function round(value: number): number {
  return Math.round(value * 10) / 10;
}
