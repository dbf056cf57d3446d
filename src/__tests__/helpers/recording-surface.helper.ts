/**
 * DrawingSurface test double that records every call instead of painting
 */

import { Point, RgbaImage } from '../../models/geometry.types';
import { Fill } from '../../services/color.service';
import { StrokeOptions } from '../../services/geometry.service';
import { DrawingSurface } from '../../services/surface.service';

export type RecordedOp =
  | { op: 'paint'; fill: Fill }
  | { op: 'fillPath'; contours: Point[][]; fill: Fill }
  | { op: 'fillCircle'; center: Point; radius: number; fill: Fill }
  | { op: 'strokePath'; points: Point[]; width: number; fill: Fill; options: StrokeOptions }
  | { op: 'drawImage'; x: number; y: number; width: number; height: number };

export class RecordingSurface implements DrawingSurface {
  readonly ops: RecordedOp[] = [];

  constructor(
    readonly width: number,
    readonly height: number
  ) {}

  paint(fill: Fill): void {
    this.ops.push({ op: 'paint', fill });
  }

  fillPath(contours: Point[][], fill: Fill): void {
    this.ops.push({ op: 'fillPath', contours, fill });
  }

  fillCircle(center: Point, radius: number, fill: Fill): void {
    this.ops.push({ op: 'fillCircle', center, radius, fill });
  }

  strokePath(points: Point[], width: number, fill: Fill, options: StrokeOptions = {}): void {
    this.ops.push({ op: 'strokePath', points, width, fill, options });
  }

  drawImage(image: RgbaImage, x: number, y: number): void {
    this.ops.push({ op: 'drawImage', x, y, width: image.width, height: image.height });
  }

  ofKind<K extends RecordedOp['op']>(op: K): Array<Extract<RecordedOp, { op: K }>> {
    return this.ops.filter((entry): entry is Extract<RecordedOp, { op: K }> => entry.op === op);
  }
}

/**
 * Solid 1x1-per-entry test image from a list of RGBA pixels, row-major
 */
export function imageFromPixels(width: number, height: number, pixels: number[][]): RgbaImage {
  const data = new Uint8Array(width * height * 4);
  pixels.forEach((pixel, i) => data.set(pixel, i * 4));
  return { width, height, data };
}

export function pixelAt(image: RgbaImage, x: number, y: number): number[] {
  const idx = (y * image.width + x) * 4;
  return Array.from(image.data.slice(idx, idx + 4));
}
