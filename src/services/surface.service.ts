import { Point, Rgba, RgbaImage } from '../models/geometry.types';
import { Fill } from './color.service';
import { GeometryService, StrokeOptions } from './geometry.service';

/**
 * What an element may do to the working canvas. Coordinates are working
 * (supersampled) pixels; a pixel is covered when its center is inside the
 * shape.
 */
export interface DrawingSurface {
  readonly width: number;
  readonly height: number;

  /** Overwrite every pixel, no blending */
  paint(fill: Fill): void;

  /** Fill one or more contours with the even-odd rule */
  fillPath(contours: Point[][], fill: Fill): void;

  fillCircle(center: Point, radius: number, fill: Fill): void;

  strokePath(points: Point[], width: number, fill: Fill, options?: StrokeOptions): void;

  /** Composite an image with its top-left corner at (x, y) */
  drawImage(image: RgbaImage, x: number, y: number): void;
}

/**
 * In-memory straight-alpha RGBA canvas with source-over compositing
 */
export class RasterSurface implements DrawingSurface {
  private readonly data: Uint8Array;
  private readonly geometry = new GeometryService();

  constructor(
    readonly width: number,
    readonly height: number
  ) {
    this.data = new Uint8Array(width * height * 4);
  }

  paint(fill: Fill): void {
    for (let y = 0; y < this.height; y++) {
      for (let x = 0; x < this.width; x++) {
        this.data.set(fill.colorAt(x + 0.5, y + 0.5), (y * this.width + x) * 4);
      }
    }
  }

  fillPath(contours: Point[][], fill: Fill): void {
    const rings = contours.filter(ring => ring.length >= 3);
    if (rings.length === 0) return;

    let minY = Number.POSITIVE_INFINITY;
    let maxY = Number.NEGATIVE_INFINITY;
    for (const ring of rings) {
      for (const p of ring) {
        minY = Math.min(minY, p.y);
        maxY = Math.max(maxY, p.y);
      }
    }

    const firstRow = Math.max(0, Math.floor(minY));
    const lastRow = Math.min(this.height - 1, Math.ceil(maxY));

    for (let row = firstRow; row <= lastRow; row++) {
      const scanY = row + 0.5;
      const crossings: number[] = [];

      for (const ring of rings) {
        for (let i = 0; i < ring.length; i++) {
          const p1 = ring[i];
          const p2 = ring[(i + 1) % ring.length];
          if ((p1.y <= scanY && p2.y > scanY) || (p2.y <= scanY && p1.y > scanY)) {
            crossings.push(p1.x + ((scanY - p1.y) / (p2.y - p1.y)) * (p2.x - p1.x));
          }
        }
      }

      crossings.sort((a, b) => a - b);

      // Even-odd: fill between alternate crossings
      for (let i = 0; i + 1 < crossings.length; i += 2) {
        const startX = Math.max(0, Math.ceil(crossings[i] - 0.5));
        const endX = Math.min(this.width - 1, Math.ceil(crossings[i + 1] - 0.5) - 1);
        for (let x = startX; x <= endX; x++) {
          this.blend(x, row, fill.colorAt(x + 0.5, scanY));
        }
      }
    }
  }

  fillCircle(center: Point, radius: number, fill: Fill): void {
    if (radius <= 0) return;

    const r2 = radius * radius;
    const firstRow = Math.max(0, Math.floor(center.y - radius));
    const lastRow = Math.min(this.height - 1, Math.ceil(center.y + radius));
    const firstCol = Math.max(0, Math.floor(center.x - radius));
    const lastCol = Math.min(this.width - 1, Math.ceil(center.x + radius));

    for (let y = firstRow; y <= lastRow; y++) {
      const dy = y + 0.5 - center.y;
      for (let x = firstCol; x <= lastCol; x++) {
        const dx = x + 0.5 - center.x;
        if (dx * dx + dy * dy <= r2) {
          this.blend(x, y, fill.colorAt(x + 0.5, y + 0.5));
        }
      }
    }
  }

  strokePath(points: Point[], width: number, fill: Fill, options: StrokeOptions = {}): void {
    this.fillPath(this.geometry.strokePolyline(points, width, options), fill);
  }

  drawImage(image: RgbaImage, x: number, y: number): void {
    const offsetX = Math.round(x);
    const offsetY = Math.round(y);

    for (let row = 0; row < image.height; row++) {
      const targetY = row + offsetY;
      if (targetY < 0 || targetY >= this.height) continue;

      for (let col = 0; col < image.width; col++) {
        const targetX = col + offsetX;
        if (targetX < 0 || targetX >= this.width) continue;

        const idx = (row * image.width + col) * 4;
        this.blend(targetX, targetY, [
          image.data[idx],
          image.data[idx + 1],
          image.data[idx + 2],
          image.data[idx + 3],
        ]);
      }
    }
  }

  getPixel(x: number, y: number): Rgba {
    const idx = (y * this.width + x) * 4;
    return [this.data[idx], this.data[idx + 1], this.data[idx + 2], this.data[idx + 3]];
  }

  /**
   * Copy of the canvas contents
   */
  toImage(): RgbaImage {
    return { width: this.width, height: this.height, data: new Uint8Array(this.data) };
  }

  /**
   * Source-over on straight alpha
   */
  private blend(x: number, y: number, color: Rgba): void {
    const [r, g, b, a] = color;
    if (a === 0) return;

    const idx = (y * this.width + x) * 4;
    if (a === 255) {
      this.data[idx] = r;
      this.data[idx + 1] = g;
      this.data[idx + 2] = b;
      this.data[idx + 3] = 255;
      return;
    }

    const srcA = a / 255;
    const dstA = this.data[idx + 3] / 255;
    const outA = srcA + dstA * (1 - srcA);

    for (let c = 0; c < 3; c++) {
      const src = color[c];
      const dst = this.data[idx + c];
      this.data[idx + c] = Math.round((src * srcA + dst * dstA * (1 - srcA)) / outA);
    }
    this.data[idx + 3] = Math.round(outA * 255);
  }
}
