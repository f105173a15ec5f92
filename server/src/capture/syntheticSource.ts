import type { CaptureSource, RawImage } from './types.js';

export interface SyntheticSourceOptions {
  width: number;
  height: number;
}

/** Moving RGBA test pattern; needs no capture hardware. */
export class SyntheticCaptureSource implements CaptureSource {
  readonly name = 'synthetic';
  private tick = 0;
  private isOpen = false;

  constructor(private readonly options: SyntheticSourceOptions) {}

  async open(): Promise<void> {
    this.tick = 0;
    this.isOpen = true;
  }

  async acquire(): Promise<RawImage> {
    if (!this.isOpen) {
      throw new Error('Synthetic source is not open');
    }
    const { width, height } = this.options;
    const data = Buffer.alloc(width * height * 4);
    const barX = this.tick % width;

    for (let y = 0; y < height; y += 1) {
      for (let x = 0; x < width; x += 1) {
        const offset = (y * width + x) * 4;
        const onBar = Math.abs(x - barX) < 4;
        data[offset] = onBar ? 255 : Math.floor((x / width) * 255);
        data[offset + 1] = onBar ? 255 : Math.floor((y / height) * 255);
        data[offset + 2] = onBar ? 255 : (this.tick * 3) % 256;
        data[offset + 3] = 255;
      }
    }

    this.tick += 1;
    return { data, width, height, channels: 4 };
  }

  async close(): Promise<void> {
    this.isOpen = false;
  }
}
