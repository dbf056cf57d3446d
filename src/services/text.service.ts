import sharp from 'sharp';
import bitmapFont from '../assets/bitmap-font.json';
import { Rgba, RgbaImage } from '../models/geometry.types';
import { ColorService } from './color.service';
import { FlipDirection, ImageService } from './image.service';

export interface TextStyle {
  /** Cap height is roughly 7/8 of this, in working pixels */
  fontSize: number;
  color: Rgba;
  /** TrueType/OpenType file rendered through sharp */
  fontPath?: string;
  /** Family name (inside fontPath, or an installed font) */
  fontFamily?: string;
}

export interface TextTransform {
  flip?: FlipDirection | 'none';
  /** Clockwise degrees, applied after the flip */
  rotation?: number;
}

interface BitmapFont {
  cellWidth: number;
  cellHeight: number;
  spacing: number;
  /** Font size at which one glyph cell is one pixel */
  baseSize: number;
  fallback: string;
  glyphs: Record<string, string[]>;
}

const FONT: Readonly<BitmapFont> = bitmapFont;

const EMPTY_IMAGE: RgbaImage = { width: 0, height: 0, data: new Uint8Array(0) };

function escapeMarkup(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

/**
 * Turns label strings into RGBA images.
 *
 * Without a font file or family the built-in 5x7 bitmap font is used,
 * scaled continuously with the font size so labels keep their proportions
 * at any supersampling factor.
 */
export class TextService {
  private readonly imageService = new ImageService();
  private readonly colorService = new ColorService();

  async rasterize(text: string, style: TextStyle): Promise<RgbaImage> {
    if (text.length === 0) {
      return EMPTY_IMAGE;
    }
    if (style.fontPath !== undefined || style.fontFamily !== undefined) {
      return this.rasterizeWithFont(text, style);
    }
    return this.rasterizeBitmap(text, style.fontSize, style.color);
  }

  /**
   * Rasterize, mirror, then rotate
   */
  async render(text: string, style: TextStyle, transform: TextTransform = {}): Promise<RgbaImage> {
    let image = await this.rasterize(text, style);
    if (image.width === 0 || image.height === 0) {
      return image;
    }

    if (transform.flip !== undefined && transform.flip !== 'none') {
      image = await this.imageService.flipImage(image, transform.flip);
    }
    if (transform.rotation !== undefined) {
      image = await this.imageService.rotateImage(image, transform.rotation);
    }
    return image;
  }

  /**
   * Size the bitmap font would produce, without drawing
   */
  measureBitmap(text: string, fontSize: number): { width: number; height: number } {
    const scale = fontSize / FONT.baseSize;
    const columns = text.length * (FONT.cellWidth + FONT.spacing) - FONT.spacing;
    return {
      width: Math.max(0, Math.ceil(columns * scale)),
      height: Math.ceil(FONT.cellHeight * scale),
    };
  }

  rasterizeBitmap(text: string, fontSize: number, color: Rgba): RgbaImage {
    const { width, height } = this.measureBitmap(text, fontSize);
    const data = new Uint8Array(width * height * 4);
    const scale = fontSize / FONT.baseSize;
    const advance = FONT.cellWidth + FONT.spacing;
    const glyphs = [...text].map(ch => this.glyphFor(ch));

    for (let y = 0; y < height; y++) {
      const cellRow = Math.floor((y + 0.5) / scale);
      if (cellRow >= FONT.cellHeight) continue;

      for (let x = 0; x < width; x++) {
        const cellCol = Math.floor((x + 0.5) / scale);
        const glyph = glyphs[Math.floor(cellCol / advance)];
        const glyphCol = cellCol % advance;
        if (glyph === undefined || glyphCol >= FONT.cellWidth) continue;

        if (glyph[cellRow][glyphCol] === '1') {
          data.set(color, (y * width + x) * 4);
        }
      }
    }

    return { width, height, data };
  }

  private glyphFor(ch: string): string[] {
    return FONT.glyphs[ch.toUpperCase()] ?? FONT.glyphs[FONT.fallback];
  }

  private async rasterizeWithFont(text: string, style: TextStyle): Promise<RgbaImage> {
    if (style.fontPath !== undefined) {
      await this.imageService.assertReadable(style.fontPath, 'Font file not found');
    }

    const hex = this.colorService.toHex([style.color[0], style.color[1], style.color[2], 255]);
    const rendered = await sharp({
      text: {
        text: `<span foreground="${hex}">${escapeMarkup(text)}</span>`,
        font: `${style.fontFamily ?? 'sans'} ${style.fontSize}`,
        fontfile: style.fontPath,
        dpi: 72,
        rgba: true,
      },
    })
      .ensureAlpha()
      .raw()
      .toBuffer({ resolveWithObject: true });

    const data = new Uint8Array(rendered.data);
    const alpha = style.color[3] / 255;
    if (alpha < 1) {
      for (let i = 3; i < data.length; i += 4) {
        data[i] = Math.round(data[i] * alpha);
      }
    }

    return { width: rendered.info.width, height: rendered.info.height, data };
  }
}
