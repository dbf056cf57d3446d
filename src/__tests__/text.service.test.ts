import path from 'path';
import { ResourceError } from '../models/errors';
import { Rgba } from '../models/geometry.types';
import { TextService } from '../services/text.service';
import { pixelAt } from './helpers/recording-surface.helper';

const RED: Rgba = [255, 0, 0, 255];
const CLEAR = [0, 0, 0, 0];

describe('TextService', () => {
  let service: TextService;

  beforeEach(() => {
    service = new TextService();
  });

  describe('bitmap font', () => {
    it('should measure 5x7 cells plus one column of spacing', () => {
      expect(service.measureBitmap('12', 8)).toEqual({ width: 11, height: 7 });
      expect(service.measureBitmap('12', 12)).toEqual({ width: 17, height: 11 });
    });

    it('should draw glyph cells in the text color', () => {
      const image = service.rasterizeBitmap('L', 8, RED);

      expect(image.width).toBe(5);
      expect(image.height).toBe(7);
      expect(pixelAt(image, 0, 0)).toEqual(RED);
      expect(pixelAt(image, 4, 0)).toEqual(CLEAR);
      expect(pixelAt(image, 4, 6)).toEqual(RED);
    });

    it('should scale cells with the font size', () => {
      const image = service.rasterizeBitmap('1', 16, RED);

      expect(image.width).toBe(10);
      expect(image.height).toBe(14);
      expect(pixelAt(image, 4, 0)).toEqual(RED);
      expect(pixelAt(image, 5, 1)).toEqual(RED);
      expect(pixelAt(image, 3, 0)).toEqual(CLEAR);
    });

    it('should treat lowercase as uppercase', () => {
      expect(service.rasterizeBitmap('a', 8, RED)).toEqual(service.rasterizeBitmap('A', 8, RED));
    });

    it('should draw unknown characters with the fallback glyph', () => {
      expect(service.rasterizeBitmap('~', 8, RED)).toEqual(service.rasterizeBitmap('?', 8, RED));
    });
  });

  describe('rasterize', () => {
    it('should return an empty image for empty text', async () => {
      const image = await service.rasterize('', { fontSize: 12, color: RED });

      expect(image.width).toBe(0);
      expect(image.height).toBe(0);
    });

    it('should refuse a missing font file instead of substituting', async () => {
      const fontPath = path.join(__dirname, 'no-such-font.ttf');

      await expect(service.rasterize('12', { fontSize: 12, color: RED, fontPath })).rejects.toThrow(
        new ResourceError('Font file not found', fontPath)
      );
    });
  });

  describe('render', () => {
    it('should mirror the glyphs', async () => {
      const image = await service.render('L', { fontSize: 8, color: RED }, { flip: 'horizontal' });

      expect(pixelAt(image, 4, 0)).toEqual(RED);
      expect(pixelAt(image, 0, 0)).toEqual(CLEAR);
    });

    it('should rotate after mirroring', async () => {
      const image = await service.render('L', { fontSize: 8, color: RED }, { flip: 'horizontal', rotation: 90 });

      expect(image.width).toBe(7);
      expect(image.height).toBe(5);
      // Mirrored L has its stem on the right; a quarter turn puts it at the bottom
      expect(pixelAt(image, 0, 4)).toEqual(RED);
      expect(pixelAt(image, 6, 4)).toEqual(RED);
      expect(pixelAt(image, 6, 0)).toEqual(CLEAR);
    });
  });
});
