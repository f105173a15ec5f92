export interface RawImage {
  data: Buffer;
  width: number;
  height: number;
  /** 3 for packed RGB, 4 for RGBA. */
  channels: 3 | 4;
}

export interface CaptureSource {
  readonly name: string;
  /** Throws when the device cannot be opened at all. */
  open(): Promise<void>;
  acquire(): Promise<RawImage>;
  close(): Promise<void>;
}

export interface Encoder {
  readonly mime: string;
  encode(image: RawImage, quality: number): Promise<Buffer>;
}
