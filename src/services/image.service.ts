import { promises as fs } from 'fs';
import path from 'path';
import sharp from 'sharp';
import { ResourceError } from '../models/errors';
import { RgbaImage } from '../models/geometry.types';
import { PostProcessing } from './style.service';

export type OutputFormat = 'png' | 'jpeg' | 'webp' | 'tiff' | 'avif' | 'gif';

export type FlipDirection = 'horizontal' | 'vertical' | 'both';

const EXTENSION_FORMATS: Readonly<Record<string, OutputFormat>> = {
  '.png': 'png',
  '.jpg': 'jpeg',
  '.jpeg': 'jpeg',
  '.webp': 'webp',
  '.tif': 'tiff',
  '.tiff': 'tiff',
  '.avif': 'avif',
  '.gif': 'gif',
};

export const CONTENT_TYPES: Readonly<Record<OutputFormat, string>> = {
  png: 'image/png',
  jpeg: 'image/jpeg',
  webp: 'image/webp',
  tiff: 'image/tiff',
  avif: 'image/avif',
  gif: 'image/gif',
};

const TRANSPARENT = { r: 0, g: 0, b: 0, alpha: 0 };

export function isOutputFormat(value: string): value is OutputFormat {
  return Object.prototype.hasOwnProperty.call(CONTENT_TYPES, value);
}

/**
 * Raster transforms and file I/O on top of sharp.
 *
 * Every transform runs as its own sharp pipeline and comes back as raw
 * RGBA, so chained operations apply in exactly the order they are called.
 */
export class ImageService {
  /**
   * Resample to the target size with a lanczos3 filter
   */
  async downsample(image: RgbaImage, width: number, height: number): Promise<RgbaImage> {
    if (image.width === width && image.height === height) {
      return image;
    }

    return this.toRgba(
      this.pipeline(image).resize(width, height, { kernel: sharp.kernel.lanczos3, fit: 'fill' })
    );
  }

  /**
   * Horizontal flip, then rotation, then transpose
   */
  async applyPostProcessing(image: RgbaImage, options: PostProcessing): Promise<RgbaImage> {
    let result = image;

    if (options.flip_horizontal) {
      result = await this.flipImage(result, 'horizontal');
    }
    if (options.rotate % 360 !== 0) {
      result = await this.rotateImage(result, options.rotate);
    }
    if (options.transpose) {
      result = await this.transposeImage(result);
    }

    return result;
  }

  async flipImage(image: RgbaImage, direction: FlipDirection): Promise<RgbaImage> {
    let pipeline = this.pipeline(image);
    if (direction === 'horizontal' || direction === 'both') {
      pipeline = pipeline.flop();
    }
    if (direction === 'vertical' || direction === 'both') {
      pipeline = pipeline.flip();
    }
    return this.toRgba(pipeline);
  }

  /**
   * Rotate clockwise; the canvas grows to hold the rotated bounds and the
   * uncovered corners stay transparent
   */
  async rotateImage(image: RgbaImage, degrees: number): Promise<RgbaImage> {
    if (degrees % 360 === 0) {
      return image;
    }
    return this.toRgba(this.pipeline(image).rotate(degrees, { background: TRANSPARENT }));
  }

  /**
   * Swap the x and y axes
   */
  async transposeImage(image: RgbaImage): Promise<RgbaImage> {
    // rotate(90) then mirror, as two pipelines since sharp mirrors before rotating
    const rotated = await this.toRgba(this.pipeline(image).rotate(90));
    return this.toRgba(this.pipeline(rotated).flop());
  }

  /**
   * Load an image file resized to cover width x height, optionally masked
   * to the inscribed circle
   */
  async loadImage(filePath: string, width: number, height: number, circleMask: boolean = false): Promise<RgbaImage> {
    await this.assertReadable(filePath, 'Background image not found');

    const image = await this.toRgba(
      sharp(filePath).resize(Math.max(1, Math.round(width)), Math.max(1, Math.round(height)), { fit: 'cover' })
    );

    return circleMask ? this.maskToCircle(image) : image;
  }

  /**
   * Clear every pixel whose center falls outside the inscribed circle
   */
  maskToCircle(image: RgbaImage): RgbaImage {
    const data = new Uint8Array(image.data);
    const cx = image.width / 2;
    const cy = image.height / 2;
    const radius = Math.min(image.width, image.height) / 2;

    for (let y = 0; y < image.height; y++) {
      for (let x = 0; x < image.width; x++) {
        const dx = x + 0.5 - cx;
        const dy = y + 0.5 - cy;
        if (dx * dx + dy * dy > radius * radius) {
          data[(y * image.width + x) * 4 + 3] = 0;
        }
      }
    }

    return { width: image.width, height: image.height, data };
  }

  async encode(image: RgbaImage, format: OutputFormat = 'png'): Promise<Buffer> {
    const pipeline = this.pipeline(image);

    switch (format) {
      case 'png':
        return pipeline.png().toBuffer();
      case 'jpeg':
        // No alpha in JPEG
        return pipeline.flatten({ background: '#ffffff' }).jpeg({ quality: 95 }).toBuffer();
      case 'webp':
        return pipeline.webp().toBuffer();
      case 'tiff':
        return pipeline.tiff().toBuffer();
      case 'avif':
        return pipeline.avif().toBuffer();
      case 'gif':
        return pipeline.gif().toBuffer();
    }
  }

  /**
   * Output format implied by a file extension; PNG when unrecognized
   */
  formatFromPath(filePath: string): OutputFormat {
    return EXTENSION_FORMATS[path.extname(filePath).toLowerCase()] ?? 'png';
  }

  async save(image: RgbaImage, filePath: string, format?: OutputFormat): Promise<void> {
    const buffer = await this.encode(image, format ?? this.formatFromPath(filePath));
    await fs.writeFile(filePath, buffer);
  }

  /**
   * Decode an encoded image back to raw RGBA
   */
  async decode(buffer: Buffer): Promise<RgbaImage> {
    return this.toRgba(sharp(buffer));
  }

  async assertReadable(filePath: string, message: string): Promise<void> {
    try {
      await fs.access(filePath);
    } catch {
      throw new ResourceError(message, filePath);
    }
  }

  private pipeline(image: RgbaImage): sharp.Sharp {
    return sharp(image.data, { raw: { width: image.width, height: image.height, channels: 4 } });
  }

  private async toRgba(pipeline: sharp.Sharp): Promise<RgbaImage> {
    const { data, info } = await pipeline.ensureAlpha().raw().toBuffer({ resolveWithObject: true });
    return { width: info.width, height: info.height, data: new Uint8Array(data) };
  }
}
