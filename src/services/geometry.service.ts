import * as ClipperLib from 'clipper-lib';
import { BoundingBox, Point } from '../models/geometry.types';

export type StrokeCap = 'butt' | 'round';

export interface StrokeOptions {
  /** Treat the points as a closed ring (borders, outlines) */
  closed?: boolean;
  cap?: StrokeCap;
}

/**
 * Dial geometry. Angles are degrees measured clockwise from 12 o'clock
 * (the negative Y axis, since raster Y grows downward).
 */
export class GeometryService {
  private readonly CLIPPER_SCALE = 1000;

  /**
   * Point on a circle at the given clock angle
   */
  pointOnCircle(center: Point, radius: number, angleDegrees: number): Point {
    const radians = (angleDegrees * Math.PI) / 180;
    return {
      x: center.x + radius * Math.sin(radians),
      y: center.y - radius * Math.cos(radians),
    };
  }

  /**
   * Angle of division `index` when the circle is cut into `divisions` equal parts
   */
  divisionAngle(index: number, divisions: number, rotation: number = 0): number {
    return this.fractionToAngle(index / divisions) + rotation;
  }

  /**
   * Angle of a fraction of a full turn, e.g. 37/60 for minute 37
   */
  fractionToAngle(fraction: number): number {
    return fraction * 360;
  }

  /**
   * Map vertices from a hand's local frame into world space.
   *
   * Local frame: pivot at the origin, +x toward the tip, +y toward the
   * clockwise side, one unit = `scale` pixels.
   */
  transformLocalPolygon(vertices: Point[], pivot: Point, angleDegrees: number, scale: number): Point[] {
    // Local +x must end up pointing at the clock angle, i.e. straight up at 0
    const radians = ((angleDegrees - 90) * Math.PI) / 180;
    const cos = Math.cos(radians);
    const sin = Math.sin(radians);

    return vertices.map(v => {
      const x = v.x * scale;
      const y = v.y * scale;
      return {
        x: pivot.x + x * cos - y * sin,
        y: pivot.y + x * sin + y * cos,
      };
    });
  }

  /**
   * Approximate a circle with a closed polygon
   */
  circlePolygon(center: Point, radius: number, segments?: number): Point[] {
    const count = segments ?? Math.max(32, Math.ceil((2 * Math.PI * radius) / 1.5));
    const points: Point[] = [];
    for (let i = 0; i < count; i++) {
      points.push(this.pointOnCircle(center, radius, (i * 360) / count));
    }
    return points;
  }

  rectPolygon(rect: BoundingBox): Point[] {
    return [
      { x: rect.x, y: rect.y },
      { x: rect.x + rect.width, y: rect.y },
      { x: rect.x + rect.width, y: rect.y + rect.height },
      { x: rect.x, y: rect.y + rect.height },
    ];
  }

  /**
   * Rectangle with circular-arc corners; the radius is clamped to half the
   * shorter side
   */
  roundedRectPolygon(rect: BoundingBox, cornerRadius: number): Point[] {
    const r = Math.min(Math.max(cornerRadius, 0), rect.width / 2, rect.height / 2);
    if (r === 0) return this.rectPolygon(rect);

    const steps = Math.max(4, Math.ceil(r / 2));
    const corners: Array<{ center: Point; start: number }> = [
      { center: { x: rect.x + rect.width - r, y: rect.y + r }, start: 0 },
      { center: { x: rect.x + rect.width - r, y: rect.y + rect.height - r }, start: 90 },
      { center: { x: rect.x + r, y: rect.y + rect.height - r }, start: 180 },
      { center: { x: rect.x + r, y: rect.y + r }, start: 270 },
    ];

    const points: Point[] = [];
    for (const corner of corners) {
      for (let i = 0; i <= steps; i++) {
        points.push(this.pointOnCircle(corner.center, r, corner.start + (90 * i) / steps));
      }
    }
    return points;
  }

  /**
   * Outline of a stroked path, as polygons to be filled with the even-odd
   * rule (a closed stroke yields an outer ring and a hole)
   */
  strokePolyline(points: Point[], width: number, options: StrokeOptions = {}): Point[][] {
    if (points.length < 2 || width <= 0) return [];

    const scaledPath: ClipperLib.Path = points.map(p => ({
      X: Math.round(p.x * this.CLIPPER_SCALE),
      Y: Math.round(p.y * this.CLIPPER_SCALE),
    }));

    let endType: ClipperLib.EndType;
    if (options.closed) {
      endType = ClipperLib.EndType.etClosedLine;
    } else if (options.cap === 'round') {
      endType = ClipperLib.EndType.etOpenRound;
    } else {
      endType = ClipperLib.EndType.etOpenButt;
    }

    const co = new ClipperLib.ClipperOffset(2, 0.25 * this.CLIPPER_SCALE);
    co.AddPath(scaledPath, ClipperLib.JoinType.jtMiter, endType);

    const solution: ClipperLib.Paths = [];
    co.Execute(solution, (width / 2) * this.CLIPPER_SCALE);

    return solution.map(path =>
      path.map(p => ({
        x: p.X / this.CLIPPER_SCALE,
        y: p.Y / this.CLIPPER_SCALE,
      }))
    );
  }

  /**
   * Get bounding box of points
   */
  getBoundingBox(points: Point[]): BoundingBox {
    if (points.length === 0) {
      return { x: 0, y: 0, width: 0, height: 0 };
    }

    const xs = points.map(p => p.x);
    const ys = points.map(p => p.y);
    const minX = Math.min(...xs);
    const minY = Math.min(...ys);

    return {
      x: minX,
      y: minY,
      width: Math.max(...xs) - minX,
      height: Math.max(...ys) - minY,
    };
  }
}
