import { ElementConfig, ElementProperties, ElementType, Z_ORDER } from '../models/clock-config.types';
import { BoundingShape, DialFrame, Point } from '../models/geometry.types';
import { ColorService, Fill, ParsedColorSpec } from '../services/color.service';
import { GeometryService } from '../services/geometry.service';
import { StyleService } from '../services/style.service';
import { DrawingSurface } from '../services/surface.service';

/**
 * Center/radius overrides every dial element may carry, in target pixels
 */
export interface Placement {
  center?: Point;
  radius?: number;
}

/**
 * Shared base for the drawable layers of a clock.
 *
 * Properties are validated once, in the constructor; `properties` keeps
 * the raw input as given so the element serializes back unchanged.
 */
export abstract class BaseElement<TResolved> {
  abstract readonly type: ElementType;

  readonly properties: Readonly<ElementProperties>;
  readonly resolved: TResolved;

  protected readonly geometry = new GeometryService();
  protected readonly colors = new ColorService();
  protected static readonly styles = new StyleService();

  protected constructor(properties: ElementProperties, resolved: TResolved) {
    this.properties = Object.freeze(structuredClone(properties));
    this.resolved = resolved;
  }

  get zOrder(): number {
    return Z_ORDER[this.type];
  }

  abstract draw(surface: DrawingSurface, frame: DialFrame): Promise<void>;

  toConfig(): ElementConfig {
    return { type: this.type, properties: structuredClone(this.properties) };
  }

  /**
   * Element center in working pixels: the override scaled, else the dial's
   */
  protected centerIn(frame: DialFrame, placement: Placement): Point {
    if (placement.center === undefined) return frame.center;
    return { x: placement.center.x * frame.scale, y: placement.center.y * frame.scale };
  }

  protected radiusIn(frame: DialFrame, placement: Placement): number {
    return placement.radius === undefined ? frame.radius : placement.radius * frame.scale;
  }

  protected fillFor(spec: ParsedColorSpec, bounds: BoundingShape): Fill {
    return this.colors.resolve(spec, bounds);
  }
}
