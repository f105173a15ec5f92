/**
 * Splits a raw video byte stream into fixed-size frames, keeping only the
 * newest complete one.
 */
export class RawFrameReader {
  private pending: Buffer[] = [];
  private pendingBytes = 0;
  private newest?: Buffer;
  private completed = 0;

  constructor(readonly frameSize: number) {
    if (!Number.isInteger(frameSize) || frameSize < 1) {
      throw new RangeError(`Frame size must be a positive integer, got ${frameSize}`);
    }
  }

  /** Returns how many frames the chunk completed. */
  push(chunk: Buffer): number {
    this.pending.push(chunk);
    this.pendingBytes += chunk.byteLength;
    if (this.pendingBytes < this.frameSize) return 0;

    const buffer = Buffer.concat(this.pending, this.pendingBytes);
    const count = Math.floor(buffer.byteLength / this.frameSize);
    const lastStart = (count - 1) * this.frameSize;
    this.newest = Buffer.from(buffer.subarray(lastStart, lastStart + this.frameSize));

    const rest = buffer.subarray(count * this.frameSize);
    this.pending = rest.byteLength > 0 ? [Buffer.from(rest)] : [];
    this.pendingBytes = rest.byteLength;
    this.completed += count;
    return count;
  }

  /** Hands out the newest frame once; later calls return undefined until another completes. */
  take(): Buffer | undefined {
    const frame = this.newest;
    this.newest = undefined;
    return frame;
  }

  get hasFrame(): boolean {
    return this.newest !== undefined;
  }

  get framesCompleted(): number {
    return this.completed;
  }

  get bufferedBytes(): number {
    return this.pendingBytes;
  }
}
