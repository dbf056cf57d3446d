import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import sharp from 'sharp';
import { ResourceError } from '../models/errors';
import { ImageService } from '../services/image.service';
import { imageFromPixels, pixelAt } from './helpers/recording-surface.helper';

const A = [255, 0, 0, 255];
const B = [0, 255, 0, 255];
const C = [0, 0, 255, 255];
const D = [255, 255, 0, 255];

describe('ImageService', () => {
  let service: ImageService;
  let tmpDir: string;

  beforeAll(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'dial-image-'));
  });

  afterAll(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  beforeEach(() => {
    service = new ImageService();
  });

  // [[A, B], [C, D]]
  const quad = () => imageFromPixels(2, 2, [A, B, C, D]);

  describe('downsample', () => {
    it('should resample to the target size', async () => {
      const solid = imageFromPixels(4, 4, new Array(16).fill(A));

      const result = await service.downsample(solid, 2, 2);

      expect(result.width).toBe(2);
      expect(result.height).toBe(2);
      pixelAt(result, 1, 1).forEach((channel, i) => {
        expect(Math.abs(channel - A[i])).toBeLessThanOrEqual(1);
      });
    });

    it('should return the image untouched at the same size', async () => {
      const image = quad();

      expect(await service.downsample(image, 2, 2)).toBe(image);
    });
  });

  describe('transforms', () => {
    it('should mirror horizontally', async () => {
      const result = await service.flipImage(quad(), 'horizontal');

      expect(pixelAt(result, 0, 0)).toEqual(B);
      expect(pixelAt(result, 1, 0)).toEqual(A);
      expect(pixelAt(result, 0, 1)).toEqual(D);
    });

    it('should mirror vertically', async () => {
      const result = await service.flipImage(quad(), 'vertical');

      expect(pixelAt(result, 0, 0)).toEqual(C);
      expect(pixelAt(result, 1, 1)).toEqual(B);
    });

    it('should rotate clockwise', async () => {
      const result = await service.rotateImage(imageFromPixels(2, 1, [A, B]), 90);

      expect(result.width).toBe(1);
      expect(result.height).toBe(2);
      expect(pixelAt(result, 0, 0)).toEqual(A);
      expect(pixelAt(result, 0, 1)).toEqual(B);
    });

    it('should expand the canvas for arbitrary angles with transparent corners', async () => {
      const square = imageFromPixels(10, 10, new Array(100).fill(A));

      const result = await service.rotateImage(square, 45);

      expect(result.width).toBeGreaterThan(10);
      expect(result.height).toBeGreaterThan(10);
      expect(pixelAt(result, 0, 0)[3]).toBe(0);
    });

    it('should swap axes on transpose', async () => {
      const result = await service.transposeImage(quad());

      expect(pixelAt(result, 0, 0)).toEqual(A);
      expect(pixelAt(result, 1, 0)).toEqual(C);
      expect(pixelAt(result, 0, 1)).toEqual(B);
      expect(pixelAt(result, 1, 1)).toEqual(D);
    });

    it('should flip before rotating', async () => {
      const result = await service.applyPostProcessing(quad(), {
        flip_horizontal: true,
        rotate: 90,
        transpose: false,
      });

      // flip: [[B, A], [D, C]], then a clockwise quarter turn
      expect(pixelAt(result, 0, 0)).toEqual(D);
      expect(pixelAt(result, 1, 0)).toEqual(B);
      expect(pixelAt(result, 0, 1)).toEqual(C);
      expect(pixelAt(result, 1, 1)).toEqual(A);
    });

    it('should leave the image alone without post-processing', async () => {
      const image = quad();

      expect(await service.applyPostProcessing(image, { flip_horizontal: false, rotate: 0, transpose: false })).toBe(
        image
      );
    });
  });

  describe('loadImage', () => {
    it('should raise a ResourceError for missing files', async () => {
      const missing = path.join(tmpDir, 'missing.png');

      await expect(service.loadImage(missing, 10, 10)).rejects.toThrow(ResourceError);
      await expect(service.loadImage(missing, 10, 10)).rejects.toMatchObject({ path: missing });
    });

    it('should resize to cover and mask to a circle', async () => {
      const file = path.join(tmpDir, 'face.png');
      await sharp({
        create: { width: 40, height: 20, channels: 4, background: { r: 0, g: 0, b: 255, alpha: 1 } },
      })
        .png()
        .toFile(file);

      const result = await service.loadImage(file, 10, 10, true);

      expect(result.width).toBe(10);
      expect(result.height).toBe(10);
      expect(pixelAt(result, 5, 5)).toEqual([0, 0, 255, 255]);
      expect(pixelAt(result, 0, 0)[3]).toBe(0);
    });
  });

  describe('encoding', () => {
    it('should pick the format from the extension', () => {
      expect(service.formatFromPath('out/clock.PNG')).toBe('png');
      expect(service.formatFromPath('clock.jpg')).toBe('jpeg');
      expect(service.formatFromPath('clock.jpeg')).toBe('jpeg');
      expect(service.formatFromPath('clock.tif')).toBe('tiff');
      expect(service.formatFromPath('clock.webp')).toBe('webp');
      expect(service.formatFromPath('clock.bmp')).toBe('png');
      expect(service.formatFromPath('clock')).toBe('png');
    });

    it('should encode PNG losslessly', async () => {
      const decoded = await service.decode(await service.encode(quad(), 'png'));

      expect(pixelAt(decoded, 1, 1)).toEqual(D);
    });

    it('should flatten transparency onto white for JPEG', async () => {
      const clear = imageFromPixels(8, 8, new Array(64).fill([0, 0, 0, 0]));
      const buffer = await service.encode(clear, 'jpeg');

      const metadata = await sharp(buffer).metadata();
      expect(metadata.format).toBe('jpeg');
      const decoded = await service.decode(buffer);
      expect(pixelAt(decoded, 4, 4)[0]).toBeGreaterThan(250);
    });

    it('should save with the inferred format', async () => {
      const file = path.join(tmpDir, 'saved.webp');

      await service.save(quad(), file);

      const metadata = await sharp(file).metadata();
      expect(metadata.format).toBe('webp');
      expect(metadata.width).toBe(2);
    });
  });
});
