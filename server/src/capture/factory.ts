import type { Logger } from '../lib/logger.js';
import { FfmpegCaptureSource } from './ffmpegSource.js';
import { SyntheticCaptureSource } from './syntheticSource.js';
import type { CaptureSource } from './types.js';

export type CaptureKind = 'synthetic' | 'camera' | 'screen';

export interface CaptureSettings {
  device?: string;
  fps: number;
  width: number;
  height: number;
}

export function createCaptureSource(
  kind: CaptureKind,
  settings: CaptureSettings,
  logger?: Logger,
): CaptureSource {
  if (kind === 'synthetic') {
    return new SyntheticCaptureSource({ width: settings.width, height: settings.height });
  }
  return new FfmpegCaptureSource({ kind, ...settings, logger });
}
