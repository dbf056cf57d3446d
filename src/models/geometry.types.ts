/**
 * Basic geometry and raster types
 */

export interface Point {
  x: number;
  y: number;
}

export interface BoundingBox {
  x: number;
  y: number;
  width: number;
  height: number;
}

/**
 * Shape a fill is resolved against. Gradient stop positions are measured
 * relative to this shape, not to the whole canvas.
 */
export type BoundingShape =
  | ({ kind: 'rect' } & BoundingBox)
  | { kind: 'circle'; cx: number; cy: number; radius: number };

/** Straight-alpha RGBA color, channels 0-255 */
export type Rgba = [number, number, number, number];

/** Straight-alpha RGBA raster, row-major, 4 bytes per pixel */
export interface RgbaImage {
  width: number;
  height: number;
  data: Uint8Array;
}

/**
 * Dial placement handed to every element at draw time, already scaled to
 * the working (supersampled) resolution.
 */
export interface DialFrame {
  center: Point;
  radius: number;
  /** Supersampling factor between target and working resolution */
  scale: number;
  width: number;
  height: number;
}
