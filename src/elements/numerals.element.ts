import { ElementProperties } from '../models/clock-config.types';
import { DialFrame } from '../models/geometry.types';
import { NumeralsProperties } from '../services/style.service';
import { DrawingSurface } from '../services/surface.service';
import { TextService } from '../services/text.service';
import { BaseElement } from './element';

const ROMAN_DIGITS: Array<[number, string]> = [
  [1000, 'M'],
  [900, 'CM'],
  [500, 'D'],
  [400, 'CD'],
  [100, 'C'],
  [90, 'XC'],
  [50, 'L'],
  [40, 'XL'],
  [10, 'X'],
  [9, 'IX'],
  [5, 'V'],
  [4, 'IV'],
  [1, 'I'],
];

/**
 * Subtractive roman numeral for 1..3999; anything else stays arabic
 */
export function toRoman(value: number): string {
  if (!Number.isInteger(value) || value < 1 || value > 3999) {
    return String(value);
  }

  let remaining = value;
  let result = '';
  for (const [amount, digits] of ROMAN_DIGITS) {
    while (remaining >= amount) {
      result += digits;
      remaining -= amount;
    }
  }
  return result;
}

export interface NumeralLabel {
  value: number;
  text: string;
  /** Clock angle of the label anchor, rotation included */
  angle: number;
}

/**
 * Hour labels placed on a ring inside the dial
 */
export class NumeralsElement extends BaseElement<NumeralsProperties> {
  readonly type = 'Numerals';

  private readonly textService = new TextService();

  constructor(properties: ElementProperties = {}) {
    super(properties, BaseElement.styles.resolveNumerals(properties));
  }

  /**
   * Labels to draw, after `visible` filtering
   */
  labels(): NumeralLabel[] {
    const props = this.resolved;
    if (props.system === 'none') return [];

    const hours = props.mode === '24h' ? 24 : 12;
    const divisions = props.divisions ?? hours;
    const values = props.values ?? Array.from({ length: hours }, (_, i) => i + 1);
    const labels: NumeralLabel[] = [];

    values.forEach((value, index) => {
      if (props.visible !== undefined && !props.visible.includes(value)) return;

      const slot = ((value % divisions) + divisions) % divisions;
      const base = props.positions?.[index] ?? this.geometry.divisionAngle(slot, divisions);
      labels.push({
        value,
        text: props.custom_map?.[String(value)] ?? this.labelFor(value, index),
        angle: base + props.rotation,
      });
    });

    return labels;
  }

  async draw(surface: DrawingSurface, frame: DialFrame): Promise<void> {
    const props = this.resolved;
    const center = this.centerIn(frame, props);
    const ring = this.radiusIn(frame, props) * (0.8 + props.radius_offset);

    for (const label of this.labels()) {
      const anchor = this.geometry.pointOnCircle(center, ring, label.angle);
      const image = await this.textService.render(
        label.text,
        {
          fontSize: props.font_size * frame.scale,
          color: props.color,
          fontPath: props.font_path,
          fontFamily: props.font_family,
        },
        { flip: props.flip, rotation: this.glyphRotation(label.angle) }
      );

      if (image.width > 0 && image.height > 0) {
        surface.drawImage(image, anchor.x - image.width / 2, anchor.y - image.height / 2);
      }
    }
  }

  private labelFor(value: number, index: number): string {
    switch (this.resolved.system) {
      case 'roman':
        return toRoman(value);
      case 'custom':
        return this.resolved.custom_list?.[index] ?? String(value);
      default:
        return String(value);
    }
  }

  private glyphRotation(angle: number): number | undefined {
    switch (this.resolved.orientation) {
      case 'upright':
        return undefined;
      case 'radial':
        return angle;
      case 'tangent':
        return angle + 90;
    }
  }
}
