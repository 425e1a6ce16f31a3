import jpeg from 'jpeg-js';
import loggerModule, { type Logger } from '../logger.js';
import { toError } from '../errors.js';
import type { RgbaFrame } from '../types.js';
import type { CameraSource } from './source.js';
import {
  absDiff,
  contourArea,
  decodePng,
  findContours,
  threshold,
  toGrayscale,
  type BinaryMask,
  type Contour,
  type GrayscaleFrame
} from './utils.js';

export type EncodeResult = { ok: true; data: Buffer } | { ok: false; error: Error };

export interface FrameEncoder {
  encodeJpeg(frame: Readonly<RgbaFrame>, quality: number): EncodeResult;
}

export interface VisionBackend extends FrameEncoder {
  captureFrame(): Promise<RgbaFrame | null>;
  toGrayscale(frame: RgbaFrame): GrayscaleFrame;
  absDiff(previous: GrayscaleFrame, current: GrayscaleFrame): GrayscaleFrame;
  threshold(frame: GrayscaleFrame, cutoff: number): BinaryMask;
  findContours(mask: BinaryMask): Contour[];
  contourArea(contour: Contour): number;
  release(): Promise<void>;
}

export function encodeJpeg(frame: Readonly<RgbaFrame>, quality: number): EncodeResult {
  try {
    const encoded = jpeg.encode(
      { width: frame.width, height: frame.height, data: frame.data },
      quality
    );
    return { ok: true, data: encoded.data };
  } catch (error) {
    return { ok: false, error: toError(error) };
  }
}

export const jpegEncoder: FrameEncoder = { encodeJpeg };

/** Image primitives over frames pulled from a {@link CameraSource}. */
export class CameraVision implements VisionBackend {
  constructor(
    private readonly source: CameraSource,
    private readonly logger: Logger = loggerModule
  ) {}

  async captureFrame(): Promise<RgbaFrame | null> {
    const png = await this.source.captureFrame();
    if (!png) {
      return null;
    }
    try {
      return decodePng(png);
    } catch (error) {
      this.logger.warn({ err: error }, 'Discarding undecodable frame');
      return null;
    }
  }

  toGrayscale(frame: RgbaFrame): GrayscaleFrame {
    return toGrayscale(frame);
  }

  absDiff(previous: GrayscaleFrame, current: GrayscaleFrame): GrayscaleFrame {
    return absDiff(previous, current);
  }

  threshold(frame: GrayscaleFrame, cutoff: number): BinaryMask {
    return threshold(frame, cutoff);
  }

  findContours(mask: BinaryMask): Contour[] {
    return findContours(mask);
  }

  contourArea(contour: Contour): number {
    return contourArea(contour);
  }

  encodeJpeg(frame: Readonly<RgbaFrame>, quality: number): EncodeResult {
    return encodeJpeg(frame, quality);
  }

  release(): Promise<void> {
    return this.source.close();
  }
}
