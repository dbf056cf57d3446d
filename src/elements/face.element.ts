import { ElementProperties } from '../models/clock-config.types';
import { BoundingShape, DialFrame, Point } from '../models/geometry.types';
import { ParsedColorSpec } from '../services/color.service';
import { ImageService } from '../services/image.service';
import { FaceProperties } from '../services/style.service';
import { DrawingSurface } from '../services/surface.service';
import { BaseElement } from './element';

const WHITE: ParsedColorSpec = { kind: 'solid', color: [255, 255, 255, 255] };

/**
 * Dial background: a filled circle, square or full-canvas rectangle with
 * an optional border and background image
 */
export class FaceElement extends BaseElement<FaceProperties> {
  readonly type = 'Face';

  private readonly imageService = new ImageService();

  constructor(properties: ElementProperties = {}) {
    super(properties, BaseElement.styles.resolveFace(properties));
  }

  async draw(surface: DrawingSurface, frame: DialFrame): Promise<void> {
    const props = this.resolved;
    const center = this.centerIn(frame, props);
    const radius = this.radiusIn(frame, props);
    const bounds = this.shapeBounds(frame, center, radius);
    const box = this.boxOf(bounds);

    if (props.image_path !== undefined) {
      const image = await this.imageService.loadImage(
        props.image_path,
        box.width,
        box.height,
        props.shape === 'circle'
      );
      surface.drawImage(image, box.x, box.y);
    }

    // With an image, only an explicit color is painted over it
    const color = props.color ?? (props.image_path === undefined ? WHITE : undefined);
    if (color !== undefined) {
      this.fillShape(surface, bounds, color);
    }

    if (props.border_width > 0) {
      this.drawBorder(surface, bounds, props.border_width * frame.scale, props.border_color);
    }
  }

  private shapeBounds(frame: DialFrame, center: Point, radius: number): BoundingShape {
    switch (this.resolved.shape) {
      case 'circle':
        return { kind: 'circle', cx: center.x, cy: center.y, radius };
      case 'square':
        return { kind: 'rect', x: center.x - radius, y: center.y - radius, width: 2 * radius, height: 2 * radius };
      case 'rectangle':
        return { kind: 'rect', x: 0, y: 0, width: frame.width, height: frame.height };
    }
  }

  private boxOf(bounds: BoundingShape): { x: number; y: number; width: number; height: number } {
    if (bounds.kind === 'rect') return bounds;
    return {
      x: bounds.cx - bounds.radius,
      y: bounds.cy - bounds.radius,
      width: 2 * bounds.radius,
      height: 2 * bounds.radius,
    };
  }

  private fillShape(surface: DrawingSurface, bounds: BoundingShape, color: ParsedColorSpec): void {
    const fill = this.fillFor(color, bounds);
    if (bounds.kind === 'circle') {
      surface.fillCircle({ x: bounds.cx, y: bounds.cy }, bounds.radius, fill);
    } else {
      surface.fillPath([this.geometry.rectPolygon(bounds)], fill);
    }
  }

  /**
   * Border stroke sits entirely inside the shape's edge
   */
  private drawBorder(surface: DrawingSurface, bounds: BoundingShape, width: number, color: ParsedColorSpec): void {
    const fill = this.fillFor(color, bounds);
    const half = width / 2;

    if (bounds.kind === 'circle') {
      const ring = this.geometry.circlePolygon({ x: bounds.cx, y: bounds.cy }, Math.max(0, bounds.radius - half));
      surface.strokePath(ring, width, fill, { closed: true });
      return;
    }

    const inset = this.geometry.rectPolygon({
      x: bounds.x + half,
      y: bounds.y + half,
      width: Math.max(0, bounds.width - width),
      height: Math.max(0, bounds.height - width),
    });
    surface.strokePath(inset, width, fill, { closed: true });
  }
}
