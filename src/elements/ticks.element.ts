import { ElementProperties } from '../models/clock-config.types';
import { DialFrame, Point } from '../models/geometry.types';
import { Fill } from '../services/color.service';
import { TicksProperties, TickStyle } from '../services/style.service';
import { DrawingSurface } from '../services/surface.service';
import { BaseElement } from './element';

interface TickPlacement {
  index: number;
  style: TickStyle;
}

/**
 * Tick marks around the dial rim
 */
export class TicksElement extends BaseElement<TicksProperties> {
  readonly type = 'Ticks';

  constructor(properties: ElementProperties = {}) {
    const hasSpec =
      properties.hour_spec !== undefined ||
      properties.minute_spec !== undefined ||
      properties.tick_spec !== undefined;
    // A bare Ticks element draws default hour ticks
    super(properties, BaseElement.styles.resolveTicks(hasSpec ? properties : { ...properties, hour_spec: {} }));
  }

  get hours(): number {
    return this.resolved.mode === '24h' ? 24 : 12;
  }

  get divisions(): number {
    const { divisions, minute_spec } = this.resolved;
    return divisions ?? (minute_spec !== undefined ? this.hours * 5 : this.hours);
  }

  /**
   * Whether division `index` falls on an hour mark
   */
  isHourBoundary(index: number): boolean {
    return (index * this.hours) % this.divisions === 0;
  }

  /**
   * Which style, if any, each division index is drawn with
   */
  placements(): TickPlacement[] {
    return this.resolved.tick_spec !== undefined ? this.flexiblePlacements() : this.namedPlacements();
  }

  async draw(surface: DrawingSurface, frame: DialFrame): Promise<void> {
    const props = this.resolved;
    const center = this.centerIn(frame, props);
    const radius = this.radiusIn(frame, props);
    const bounds = { kind: 'circle' as const, cx: center.x, cy: center.y, radius };

    for (const { index, style } of this.placements()) {
      const angle = this.geometry.divisionAngle(index, this.divisions, props.rotation);
      this.drawTick(surface, center, radius, angle, style, frame.scale, this.fillFor(style.color, bounds));
    }
  }

  private namedPlacements(): TickPlacement[] {
    const { hour_spec, minute_spec, visible, visible_hours } = this.resolved;
    const result: TickPlacement[] = [];

    for (let index = 0; index < this.divisions; index++) {
      if (visible !== undefined && !visible.includes(index)) continue;

      let style = minute_spec;
      if (this.isHourBoundary(index) && hour_spec !== undefined) {
        const hour = (index * this.hours) / this.divisions || this.hours;
        // A hidden hour mark falls back to the minute style
        if (visible_hours === undefined || visible_hours.includes(hour)) {
          style = hour_spec;
        }
      }

      if (style !== undefined) {
        result.push({ index, style });
      }
    }

    return result;
  }

  private flexiblePlacements(): TickPlacement[] {
    const specs = this.resolved.tick_spec ?? [];
    const claimed = new Set<number>();
    const result: TickPlacement[] = [];
    const all = Array.from({ length: this.divisions }, (_, i) => i);

    for (const spec of specs) {
      if (spec.indices === 'all_others') continue;
      const indices = spec.indices === 'all' ? all : spec.indices.filter(i => i < this.divisions);
      for (const index of indices) {
        claimed.add(index);
        result.push({ index, style: spec });
      }
    }

    // "all_others" covers whatever the explicit specs left over
    for (const spec of specs) {
      if (spec.indices !== 'all_others') continue;
      for (const index of all) {
        if (!claimed.has(index)) {
          result.push({ index, style: spec });
        }
      }
    }

    return result;
  }

  private drawTick(
    surface: DrawingSurface,
    center: Point,
    radius: number,
    angle: number,
    style: TickStyle,
    scale: number,
    fill: Fill
  ): void {
    const outer = radius * (1 - this.resolved.inset);
    const length = style.length * radius;
    const width = style.width * scale;

    if (style.shape === 'line') {
      const inner = this.geometry.pointOnCircle(center, outer - length, angle);
      const tip = this.geometry.pointOnCircle(center, outer, angle);
      surface.strokePath([inner, tip], width, fill, { cap: 'butt' });
      return;
    }

    // Circle ticks: `length` is the diameter, filled when the stroke would close it
    const tickCenter = this.geometry.pointOnCircle(center, outer - length / 2, angle);
    if (width >= length) {
      surface.fillCircle(tickCenter, length / 2, fill);
    } else {
      const ring = this.geometry.circlePolygon(tickCenter, length / 2 - width / 2);
      surface.strokePath(ring, width, fill, { closed: true });
    }
  }
}
