import { ElementProperties } from '../models/clock-config.types';
import { BoundingBox, DialFrame, Point } from '../models/geometry.types';
import { OverlayProperties } from '../services/style.service';
import { DrawingSurface } from '../services/surface.service';
import { TextService } from '../services/text.service';
import { TimeService } from '../services/time.service';
import { BaseElement } from './element';

/** Date windows default to the 3 o'clock side, this far out from the center */
const DATE_WINDOW_OFFSET = 0.55;

/**
 * Boxed label: a date window or free text
 */
export class OverlayElement extends BaseElement<OverlayProperties> {
  readonly type = 'Overlay';

  private readonly textService = new TextService();
  private readonly timeService = new TimeService();

  constructor(properties: ElementProperties = {}) {
    super(properties, BaseElement.styles.resolveOverlay(properties));
  }

  /**
   * The string shown in the box
   */
  label(): string {
    const props = this.resolved;
    if (props.type === 'text') {
      return props.text ?? '';
    }
    return this.timeService.formatDate(props.date ?? this.timeService.today(), props.date_format);
  }

  async draw(surface: DrawingSurface, frame: DialFrame): Promise<void> {
    const props = this.resolved;
    const anchor = this.anchorIn(frame);
    const image = await this.textService.render(this.label(), {
      fontSize: props.font_size * frame.scale,
      color: props.text_color,
      fontPath: props.font_path,
      fontFamily: props.font_family,
    });

    const padding = props.padding * frame.scale;
    const box: BoundingBox = {
      x: anchor.x - image.width / 2 - padding,
      y: anchor.y - image.height / 2 - padding,
      width: image.width + 2 * padding,
      height: image.height + 2 * padding,
    };
    const cornerRadius = props.corner_radius * frame.scale;

    if (props.background_color !== undefined) {
      surface.fillPath(
        [this.geometry.roundedRectPolygon(box, cornerRadius)],
        this.fillFor(props.background_color, { kind: 'rect', ...box })
      );
    }

    const borderWidth = props.border_width * frame.scale;
    if (props.border_color !== undefined && borderWidth > 0) {
      const half = borderWidth / 2;
      const inset: BoundingBox = {
        x: box.x + half,
        y: box.y + half,
        width: Math.max(0, box.width - borderWidth),
        height: Math.max(0, box.height - borderWidth),
      };
      surface.strokePath(
        this.geometry.roundedRectPolygon(inset, Math.max(0, cornerRadius - half)),
        borderWidth,
        this.fillFor(props.border_color, { kind: 'rect', ...box }),
        { closed: true }
      );
    }

    if (image.width > 0 && image.height > 0) {
      surface.drawImage(image, anchor.x - image.width / 2, anchor.y - image.height / 2);
    }
  }

  private anchorIn(frame: DialFrame): Point {
    const { position, type } = this.resolved;
    if (position !== undefined) {
      return { x: position.x * frame.scale, y: position.y * frame.scale };
    }
    if (type === 'date_window') {
      return this.geometry.pointOnCircle(frame.center, frame.radius * DATE_WINDOW_OFFSET, 90);
    }
    return frame.center;
  }
}
