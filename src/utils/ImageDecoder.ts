/**
 * Identifies image data by signature and converts embedded pictures to PNG.
 */

import * as path from 'path';
import type Sharp from 'sharp';
import type { ILogger } from './Logger.js';
import { createLogger } from './Logger.js';
import { errorMessage } from './errors.js';

export type ImageFormat = 'png' | 'jpeg' | 'gif' | 'bmp' | 'tiff' | 'webp' | 'unknown';

export interface ImageDecoderConfig {
  logger?: ILogger;
}

/**
 * File extensions treated as a single picture rather than a directory of candidates.
 */
export const IMAGE_EXTENSIONS: readonly string[] = [
  '.bmp', '.jpg', '.jpeg', '.pgm', '.png', '.ppm', '.tif', '.tiff', '.webp',
];

/**
 * Whether a catalog picture path names one image file.
 */
export function isImagePath(filePath: string): boolean {
  return IMAGE_EXTENSIONS.includes(path.extname(filePath).toLowerCase());
}

interface FormatInfo {
  format: Exclude<ImageFormat, 'unknown'>;
  /** Leading bytes; `null` matches any byte. */
  signature: ReadonlyArray<number | null>;
  mimeType: string;
  extension: string;
}

const FORMATS: readonly FormatInfo[] = [
  { format: 'png', signature: [0x89, 0x50, 0x4e, 0x47], mimeType: 'image/png', extension: 'png' },
  { format: 'jpeg', signature: [0xff, 0xd8, 0xff], mimeType: 'image/jpeg', extension: 'jpeg' },
  { format: 'gif', signature: [0x47, 0x49, 0x46], mimeType: 'image/gif', extension: 'gif' },
  { format: 'bmp', signature: [0x42, 0x4d], mimeType: 'image/bmp', extension: 'bmp' },
  { format: 'tiff', signature: [0x49, 0x49, 0x2a, 0x00], mimeType: 'image/tiff', extension: 'tiff' },
  { format: 'tiff', signature: [0x4d, 0x4d, 0x00, 0x2a], mimeType: 'image/tiff', extension: 'tiff' },
  // RIFF container with a WEBP form type
  {
    format: 'webp',
    signature: [0x52, 0x49, 0x46, 0x46, null, null, null, null, 0x57, 0x45, 0x42, 0x50],
    mimeType: 'image/webp',
    extension: 'webp',
  },
];

function formatInfo(format: ImageFormat): FormatInfo | undefined {
  return FORMATS.find((info) => info.format === format);
}

type SharpModule = typeof Sharp;

export class ImageDecoder {
  private readonly logger: ILogger;
  private sharp: SharpModule | null = null;

  constructor(config: ImageDecoderConfig = {}) {
    this.logger = config.logger ?? createLogger('warn', 'ImageDecoder');
  }

  detectFormat(buffer: Buffer): ImageFormat {
    const match = FORMATS.find(
      ({ signature }) =>
        buffer.length >= signature.length && signature.every((byte, i) => byte === null || buffer[i] === byte)
    );
    return match?.format ?? 'unknown';
  }

  getMimeType(format: ImageFormat): string {
    return formatInfo(format)?.mimeType ?? 'application/octet-stream';
  }

  /**
   * Media part extension, without the dot.
   */
  getExtension(format: ImageFormat): string {
    return formatInfo(format)?.extension ?? 'bin';
  }

  /**
   * PNG passes through untouched; other formats go through sharp.
   */
  async toPng(buffer: Buffer): Promise<Buffer> {
    const format = this.detectFormat(buffer);
    if (format === 'png') {
      return buffer;
    }

    const sharp = await this.loadSharp();
    try {
      const png = await sharp(buffer).png().toBuffer();
      this.logger.debug('Converted image to PNG', { format, inputSize: buffer.length, outputSize: png.length });
      return png;
    } catch (error) {
      const message = errorMessage(error);
      this.logger.error('Failed to convert image', { format, size: buffer.length, error: message });
      throw new Error(`Failed to convert image to PNG: ${message}`);
    }
  }

  private async loadSharp(): Promise<SharpModule> {
    if (!this.sharp) {
      const sharpModule = await import('sharp');
      this.sharp = sharpModule.default;
    }
    return this.sharp;
  }
}
