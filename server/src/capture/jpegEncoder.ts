import jpeg from 'jpeg-js';
import type { Encoder, RawImage } from './types.js';

export const JPEG_SOI = Buffer.from([0xff, 0xd8]);
export const JPEG_EOI = Buffer.from([0xff, 0xd9]);

export class JpegEncoder implements Encoder {
  readonly mime = 'image/jpeg';

  async encode(image: RawImage, quality: number): Promise<Buffer> {
    const expected = image.width * image.height * image.channels;
    if (image.data.byteLength !== expected) {
      throw new Error(
        `Raw image is ${image.data.byteLength} bytes, expected ${expected} for ${image.width}x${image.height}x${image.channels}`,
      );
    }
    const clamped = Math.min(100, Math.max(1, Math.round(quality)));
    const rgba = image.channels === 4 ? image.data : toRgba(image.data);
    return jpeg.encode({ data: rgba, width: image.width, height: image.height }, clamped).data;
  }
}

export function isJpeg(payload: Uint8Array): boolean {
  return payload.byteLength >= 2 && payload[0] === 0xff && payload[1] === 0xd8;
}

function toRgba(rgb: Buffer): Buffer {
  const pixels = rgb.byteLength / 3;
  const rgba = Buffer.alloc(pixels * 4);
  for (let i = 0; i < pixels; i += 1) {
    rgba[i * 4] = rgb[i * 3];
    rgba[i * 4 + 1] = rgb[i * 3 + 1];
    rgba[i * 4 + 2] = rgb[i * 3 + 2];
    rgba[i * 4 + 3] = 255;
  }
  return rgba;
}
