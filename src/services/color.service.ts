import namedColors from '../assets/css-colors.json';
import { ConfigError } from '../models/errors';
import { BoundingShape, Point, Rgba } from '../models/geometry.types';

export interface ColorStop {
  /** 0-1 along the ramp */
  position: number;
  color: Rgba;
}

export type ParsedColorSpec =
  | { kind: 'solid'; color: Rgba }
  | { kind: 'linear'; stops: ColorStop[]; angle: number }
  | { kind: 'radial'; stops: ColorStop[]; center: Point };

/**
 * A fill resolved against one bounding shape, sampled per pixel
 */
export interface Fill {
  colorAt(x: number, y: number): Rgba;
}

const NAMED_COLORS: Readonly<Record<string, string>> = namedColors;
const GRADIENT_TYPES = ['linear', 'linear_gradient', 'radial', 'radial_gradient'];
const RAMP_SIZE = 256;

export class SolidFill implements Fill {
  constructor(readonly color: Rgba) {}

  colorAt(): Rgba {
    return this.color;
  }
}

/**
 * Gradient fill backed by a precomputed 1-D ramp; subclasses map a pixel
 * to a ramp position t in [0, 1]
 */
abstract class RampFill implements Fill {
  constructor(protected readonly ramp: Uint8ClampedArray) {}

  protected abstract positionAt(x: number, y: number): number;

  colorAt(x: number, y: number): Rgba {
    const t = Math.min(1, Math.max(0, this.positionAt(x, y)));
    const idx = Math.round(t * (this.ramp.length / 4 - 1)) * 4;
    return [this.ramp[idx], this.ramp[idx + 1], this.ramp[idx + 2], this.ramp[idx + 3]];
  }
}

export class LinearGradientFill extends RampFill {
  private readonly center: Point;
  private readonly direction: Point;
  private readonly halfExtent: number;

  constructor(ramp: Uint8ClampedArray, angle: number, bounds: BoundingShape) {
    super(ramp);
    const radians = (angle * Math.PI) / 180;
    // Angle 0 runs bottom to top, 90 left to right
    this.direction = { x: Math.sin(radians), y: -Math.cos(radians) };

    if (bounds.kind === 'circle') {
      this.center = { x: bounds.cx, y: bounds.cy };
      this.halfExtent = bounds.radius;
    } else {
      this.center = { x: bounds.x + bounds.width / 2, y: bounds.y + bounds.height / 2 };
      this.halfExtent =
        (Math.abs(this.direction.x) * bounds.width) / 2 + (Math.abs(this.direction.y) * bounds.height) / 2;
    }
  }

  protected positionAt(x: number, y: number): number {
    if (this.halfExtent === 0) return 0;
    const projected = (x - this.center.x) * this.direction.x + (y - this.center.y) * this.direction.y;
    return 0.5 + projected / (2 * this.halfExtent);
  }
}

export class RadialGradientFill extends RampFill {
  private readonly origin: Point;

  constructor(ramp: Uint8ClampedArray, center: Point, private readonly bounds: BoundingShape) {
    super(ramp);
    if (bounds.kind === 'circle') {
      this.origin = {
        x: bounds.cx - bounds.radius + center.x * 2 * bounds.radius,
        y: bounds.cy - bounds.radius + center.y * 2 * bounds.radius,
      };
    } else {
      this.origin = {
        x: bounds.x + center.x * bounds.width,
        y: bounds.y + center.y * bounds.height,
      };
    }
  }

  protected positionAt(x: number, y: number): number {
    const dx = x - this.origin.x;
    const dy = y - this.origin.y;
    const distance = Math.hypot(dx, dy);
    if (distance === 0) return 0;

    const edge = this.edgeDistance(dx / distance, dy / distance);
    return edge > 0 ? distance / edge : 1;
  }

  /**
   * Distance from the gradient origin to the bounding shape's edge along a
   * unit direction
   */
  private edgeDistance(ux: number, uy: number): number {
    const b = this.bounds;
    if (b.kind === 'circle') {
      const ox = this.origin.x - b.cx;
      const oy = this.origin.y - b.cy;
      const along = ux * ox + uy * oy;
      const discriminant = along * along - (ox * ox + oy * oy - b.radius * b.radius);
      if (discriminant < 0) return 0;
      return -along + Math.sqrt(discriminant);
    }

    let edge = Number.POSITIVE_INFINITY;
    if (ux > 0) edge = Math.min(edge, (b.x + b.width - this.origin.x) / ux);
    if (ux < 0) edge = Math.min(edge, (b.x - this.origin.x) / ux);
    if (uy > 0) edge = Math.min(edge, (b.y + b.height - this.origin.y) / uy);
    if (uy < 0) edge = Math.min(edge, (b.y - this.origin.y) / uy);
    return Number.isFinite(edge) ? edge : 0;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function clampChannel(value: number): number {
  return Math.min(255, Math.max(0, Math.round(value)));
}

export class ColorService {
  /**
   * Parse a solid color token: CSS name, hex, rgb()/rgba() or an
   * [r, g, b(, a)] tuple with 0-255 channels
   */
  parseColor(value: unknown): Rgba {
    if (Array.isArray(value)) {
      return this.parseTuple(value);
    }
    if (typeof value !== 'string') {
      throw new ConfigError(`Color must be a string or [r, g, b(, a)] tuple, got ${JSON.stringify(value)}`);
    }

    const token = value.trim().toLowerCase();
    const named = Object.prototype.hasOwnProperty.call(NAMED_COLORS, token) ? NAMED_COLORS[token] : undefined;
    if (named !== undefined) {
      return this.parseHex(named, value);
    }
    if (token.startsWith('#')) {
      return this.parseHex(token, value);
    }

    const fn = /^rgba?\(([^)]*)\)$/.exec(token);
    if (fn) {
      const parts = fn[1].split(',').map(part => part.trim());
      if ((parts.length === 3 || parts.length === 4) && parts.every(part => part !== '' && !isNaN(Number(part)))) {
        const [r, g, b] = parts.slice(0, 3).map(Number);
        const alpha = parts.length === 4 ? Number(parts[3]) : 1;
        if ([r, g, b].every(c => c >= 0 && c <= 255) && alpha >= 0 && alpha <= 1) {
          return [clampChannel(r), clampChannel(g), clampChannel(b), clampChannel(alpha * 255)];
        }
      }
    }

    throw new ConfigError(`Invalid color specification: ${value}`);
  }

  /**
   * Parse a solid color or a gradient descriptor
   */
  parseColorSpec(value: unknown): ParsedColorSpec {
    if (!isRecord(value)) {
      return { kind: 'solid', color: this.parseColor(value) };
    }

    const type = value.type;
    if (typeof type !== 'string') {
      throw new ConfigError("Gradient specification must include 'type' field");
    }
    if (!GRADIENT_TYPES.includes(type)) {
      throw new ConfigError(`Unsupported gradient type: ${type}`);
    }

    const stops = this.parseStops(value.colors);

    if (type.startsWith('linear')) {
      const angle = value.angle ?? 0;
      if (typeof angle !== 'number' || !Number.isFinite(angle)) {
        throw new ConfigError('Gradient angle must be a number');
      }
      return { kind: 'linear', stops, angle };
    }

    const center = value.center ?? [0.5, 0.5];
    if (
      !Array.isArray(center) ||
      center.length !== 2 ||
      !center.every(c => typeof c === 'number' && Number.isFinite(c))
    ) {
      throw new ConfigError('Gradient center must be an [x, y] pair of numbers');
    }
    return { kind: 'radial', stops, center: { x: center[0], y: center[1] } };
  }

  /**
   * Sample the stops into a ramp of `size` RGBA entries, entry i sitting at
   * t = i / (size - 1); channels are interpolated linearly between
   * adjacent stops
   */
  buildRamp(stops: ColorStop[], size: number = RAMP_SIZE): Uint8ClampedArray {
    const ramp = new Uint8ClampedArray(size * 4);
    const last = stops[stops.length - 1];

    for (let i = 0; i < size; i++) {
      const t = size === 1 ? 0 : i / (size - 1);
      let color: Rgba = last.color;

      if (t <= stops[0].position) {
        color = stops[0].color;
      } else {
        for (let s = 0; s < stops.length - 1; s++) {
          const lower = stops[s];
          const upper = stops[s + 1];
          if (t >= lower.position && t <= upper.position) {
            const span = upper.position - lower.position;
            const local = span === 0 ? 1 : (t - lower.position) / span;
            const mix = (c: number): number => lower.color[c] + (upper.color[c] - lower.color[c]) * local;
            color = [mix(0), mix(1), mix(2), mix(3)];
            break;
          }
        }
      }

      ramp.set(color, i * 4);
    }

    return ramp;
  }

  /**
   * Turn a parsed spec into a fill valid over `bounds`
   */
  resolve(spec: ParsedColorSpec, bounds: BoundingShape): Fill {
    switch (spec.kind) {
      case 'solid':
        return new SolidFill(spec.color);
      case 'linear':
        return new LinearGradientFill(this.buildRamp(spec.stops), spec.angle, bounds);
      case 'radial':
        return new RadialGradientFill(this.buildRamp(spec.stops), spec.center, bounds);
    }
  }

  toHex(color: Rgba): string {
    const hex = color.map(c => c.toString(16).padStart(2, '0')).join('');
    return `#${color[3] === 255 ? hex.slice(0, 6) : hex}`;
  }

  private parseStops(colors: unknown): ColorStop[] {
    if (!Array.isArray(colors) || colors.length < 2) {
      throw new ConfigError('Gradient must have at least 2 colors');
    }

    const count = colors.length;
    const stops = colors.map((entry: unknown, index): ColorStop => {
      const evenly = index / (count - 1);
      if (isRecord(entry)) {
        const position = entry.position ?? evenly;
        if (typeof position !== 'number' || !Number.isFinite(position)) {
          throw new ConfigError('Gradient stop position must be a number');
        }
        return { position: Math.min(1, Math.max(0, position)), color: this.parseStopColor(entry.color) };
      }
      return { position: evenly, color: this.parseStopColor(entry) };
    });

    for (let i = 1; i < stops.length; i++) {
      if (stops[i].position < stops[i - 1].position) {
        throw new ConfigError('Gradient stop positions must be non-decreasing');
      }
    }

    return stops;
  }

  private parseStopColor(value: unknown): Rgba {
    try {
      return this.parseColor(value);
    } catch (error) {
      if (error instanceof ConfigError) {
        throw new ConfigError(`Invalid color in gradient: ${JSON.stringify(value)}`);
      }
      throw error;
    }
  }

  private parseHex(hex: string, original: string): Rgba {
    const digits = hex.slice(1);
    if (!/^[0-9a-f]+$/.test(digits)) {
      throw new ConfigError(`Invalid color specification: ${original}`);
    }

    if (digits.length === 3 || digits.length === 4) {
      const channels = digits.split('').map(d => parseInt(d + d, 16));
      return [channels[0], channels[1], channels[2], channels[3] ?? 255];
    }
    if (digits.length === 6 || digits.length === 8) {
      const channels = [0, 2, 4, 6].map(i => (i < digits.length ? parseInt(digits.slice(i, i + 2), 16) : 255));
      return [channels[0], channels[1], channels[2], channels[3]];
    }

    throw new ConfigError(`Invalid color specification: ${original}`);
  }

  private parseTuple(value: unknown[]): Rgba {
    const channels = value.filter(
      (c): c is number => typeof c === 'number' && Number.isInteger(c) && c >= 0 && c <= 255
    );
    if (channels.length === value.length && (channels.length === 3 || channels.length === 4)) {
      return [channels[0], channels[1], channels[2], channels.length === 4 ? channels[3] : 255];
    }
    throw new ConfigError(`Invalid color specification: ${JSON.stringify(value)}`);
  }
}
