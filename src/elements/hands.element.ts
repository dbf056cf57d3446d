import { ElementProperties } from '../models/clock-config.types';
import { DialFrame, Point } from '../models/geometry.types';
import { HandAngles, TimeService } from '../services/time.service';
import { HandsProperties, HandStyle } from '../services/style.service';
import { DrawingSurface } from '../services/surface.service';
import { BaseElement } from './element';

export type HandKind = 'hour' | 'minute' | 'second';

export interface HandPlacement {
  kind: HandKind;
  style: HandStyle;
  /** Degrees clockwise from 12 o'clock */
  angle: number;
}

/**
 * Hour, minute and second hands plus the pivot cap
 */
export class HandsElement extends BaseElement<HandsProperties> {
  readonly type = 'Hands';

  private readonly timeService = new TimeService();

  constructor(properties: ElementProperties = {}) {
    const hasSpec =
      properties.hour_spec !== undefined ||
      properties.minute_spec !== undefined ||
      properties.second_spec !== undefined ||
      properties.hands !== undefined;
    // Without any hand spec all three hands are drawn with their defaults
    const effective = hasSpec ? properties : { ...properties, hour_spec: {}, minute_spec: {}, second_spec: {} };
    super(properties, BaseElement.styles.resolveHands(effective));
  }

  angles(): HandAngles {
    return this.timeService.timeToAngles(this.resolved.time, this.resolved.mode);
  }

  /**
   * Hands in draw order: a `hands` list draws in list order, the named
   * specs draw hour, then minute, then second
   */
  placements(): HandPlacement[] {
    const props = this.resolved;
    const angles = this.angles();

    const specs: Array<{ kind: HandKind; style: HandStyle }> =
      props.hands !== undefined
        ? props.hands.map(hand => ({ kind: hand.type, style: hand }))
        : [
            { kind: 'hour' as const, style: props.hour_spec },
            { kind: 'minute' as const, style: props.minute_spec },
            { kind: 'second' as const, style: props.second_spec },
          ].flatMap(entry => (entry.style === undefined ? [] : [{ kind: entry.kind, style: entry.style }]));

    return specs.map(({ kind, style }) => ({ kind, style, angle: angles[kind] }));
  }

  async draw(surface: DrawingSurface, frame: DialFrame): Promise<void> {
    const props = this.resolved;
    const pivot = this.centerIn(frame, props);
    const radius = this.radiusIn(frame, props);

    for (const hand of this.placements()) {
      this.drawHand(surface, pivot, radius, hand, frame.scale);
    }

    if (props.pivot_spec !== undefined) {
      const capRadius = props.pivot_spec.radius * frame.scale;
      surface.fillCircle(
        pivot,
        capRadius,
        this.fillFor(props.pivot_spec.color, { kind: 'circle', cx: pivot.x, cy: pivot.y, radius: capRadius })
      );
    }
  }

  /**
   * Hand outline in working pixels
   */
  outline(pivot: Point, radius: number, hand: HandPlacement, scale: number): Point[][] {
    const length = hand.style.length * radius;
    const width = hand.style.width * scale;

    switch (hand.style.shape) {
      case 'line': {
        const tip = this.geometry.pointOnCircle(pivot, length, hand.angle);
        return this.geometry.strokePolyline([pivot, tip], width, { cap: 'butt' });
      }
      case 'triangle': {
        // Base spans the hand width at the pivot, apex at the tip
        const halfBase = width / 2 / length;
        const local = [
          { x: 0, y: -halfBase },
          { x: 1, y: 0 },
          { x: 0, y: halfBase },
        ];
        return [this.geometry.transformLocalPolygon(local, pivot, hand.angle, length)];
      }
      case 'custom_polygon':
        return [this.geometry.transformLocalPolygon(hand.style.custom_polygon ?? [], pivot, hand.angle, length)];
    }
  }

  private drawHand(surface: DrawingSurface, pivot: Point, radius: number, hand: HandPlacement, scale: number): void {
    const contours = this.outline(pivot, radius, hand, scale);
    if (contours.length === 0) return;

    const box = this.geometry.getBoundingBox(contours.flat());
    surface.fillPath(contours, this.fillFor(hand.style.color, { kind: 'rect', ...box }));
  }
}
