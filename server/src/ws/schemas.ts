import type { RawData } from 'ws';
import { z } from 'zod';
import { isJpeg } from '../capture/jpegEncoder.js';

export const envelopeSchema = z.object({
  type: z.string(),
  payload: z.unknown(),
  ref: z.string().optional(),
});

export const heartbeatPayloadSchema = z.object({
  fps: z.number().nonnegative().optional(),
  latency: z.number().nonnegative().optional(),
});

export function ingestFrameSchema(maxBytes: number) {
  return z
    .instanceof(Buffer)
    .refine((frame) => frame.byteLength > 0, { message: 'EMPTY_FRAME' })
    .refine((frame) => frame.byteLength <= maxBytes, { message: 'FRAME_TOO_LARGE' })
    .refine((frame) => isJpeg(frame), { message: 'NOT_JPEG' });
}

export function toBuffer(raw: RawData): Buffer {
  if (Buffer.isBuffer(raw)) return raw;
  if (Array.isArray(raw)) return Buffer.concat(raw);
  return Buffer.from(raw);
}
