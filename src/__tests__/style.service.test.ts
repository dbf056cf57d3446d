import { ConfigError } from '../models/errors';
import { StyleService } from '../services/style.service';

describe('StyleService', () => {
  let service: StyleService;

  beforeEach(() => {
    service = new StyleService();
  });

  describe('resolve', () => {
    it('should reject unknown element types', () => {
      expect(() => service.resolve('Sparkle', {})).toThrow(new ConfigError('Unknown element type: Sparkle'));
    });

    it('should tag the resolved properties with their type', () => {
      const resolved = service.resolve('Face', { shape: 'square' });

      expect(resolved.type).toBe('Face');
      expect(resolved.properties).toMatchObject({ shape: 'square', border_width: 0 });
    });
  });

  describe('Face', () => {
    it('should fill in defaults', () => {
      const face = service.resolveFace({});

      expect(face.shape).toBe('circle');
      expect(face.color).toBeUndefined();
      expect(face.border_color).toEqual({ kind: 'solid', color: [0, 0, 0, 255] });
      expect(face.border_width).toBe(0);
    });

    it('should name the property with an unrecognized enumerated value', () => {
      expect(() => service.resolveFace({ shape: 'hexagon' })).toThrow(/^Invalid Face properties: shape: /);
    });

    it('should report malformed colors at their path', () => {
      expect(() => service.resolveFace({ color: 'nope' })).toThrow(
        'Invalid Face properties: color: Invalid color specification: nope'
      );
    });

    it('should ignore unknown keys', () => {
      expect(() => service.resolveFace({ sparkle: true })).not.toThrow();
    });

    it('should reject negative border widths', () => {
      expect(() => service.resolveFace({ border_width: -2 })).toThrow(ConfigError);
    });
  });

  describe('Ticks', () => {
    it('should give hour and minute specs their own defaults', () => {
      const ticks = service.resolveTicks({ hour_spec: {}, minute_spec: {} });

      expect(ticks.hour_spec).toMatchObject({ shape: 'line', length: 0.1, width: 2 });
      expect(ticks.minute_spec).toMatchObject({ shape: 'line', length: 0.05, width: 1 });
      expect(ticks.inset).toBe(0.05);
      expect(ticks.mode).toBe('12h');
    });

    it('should accept flexible tick specs', () => {
      const ticks = service.resolveTicks({ tick_spec: [{ indices: 'all' }, { indices: [0, 6], shape: 'circle' }] });

      expect(ticks.tick_spec?.map(spec => spec.indices)).toEqual(['all', [0, 6]]);
    });

    it('should reject zero divisions and non-positive lengths', () => {
      expect(() => service.resolveTicks({ divisions: 0 })).toThrow(/divisions/);
      expect(() => service.resolveTicks({ hour_spec: { length: 0 } })).toThrow(/hour_spec\.length/);
    });
  });

  describe('Numerals', () => {
    it('should require custom_list for the custom system', () => {
      expect(() => service.resolveNumerals({ system: 'custom' })).toThrow(
        "Invalid Numerals properties: custom_list: required when system is 'custom'"
      );
    });

    it('should only accept solid colors', () => {
      expect(() =>
        service.resolveNumerals({ color: { type: 'linear', colors: ['red', 'blue'] } })
      ).toThrow(ConfigError);
    });

    it('should reject unknown orientations and flips', () => {
      expect(() => service.resolveNumerals({ orientation: 'sideways' })).toThrow(/orientation/);
      expect(() => service.resolveNumerals({ flip: 'diagonal' })).toThrow(/flip/);
    });

    it('should reject non-positive font sizes', () => {
      expect(() => service.resolveNumerals({ font_size: 0 })).toThrow(/font_size/);
    });
  });

  describe('Overlay', () => {
    it('should default to a day-of-month date window', () => {
      const overlay = service.resolveOverlay({});

      expect(overlay.type).toBe('date_window');
      expect(overlay.date_format).toBe('day');
      expect(overlay.padding).toBe(4);
      expect(overlay.border_width).toBe(1);
    });

    it('should parse the date', () => {
      expect(service.resolveOverlay({ date: '2024-03-05' }).date?.toISOString()).toBe('2024-03-05T00:00:00.000Z');
      expect(() => service.resolveOverlay({ date: '2024-02-30' })).toThrow(/date: Invalid date/);
    });

    it('should require text for text overlays', () => {
      expect(() => service.resolveOverlay({ type: 'text' })).toThrow(/text: required/);
    });
  });

  describe('Hands', () => {
    it('should parse the time and default to noon', () => {
      expect(service.resolveHands({ time: '3:15:30' }).time).toEqual({ hours: 3, minutes: 15, seconds: 30 });
      expect(service.resolveHands({}).time).toEqual({ hours: 12, minutes: 0, seconds: 0 });
    });

    it('should reject malformed times', () => {
      expect(() => service.resolveHands({ time: '25:00:00' })).toThrow(/^Invalid Hands properties: time: /);
      expect(() => service.resolveHands({ time: 315 })).toThrow(ConfigError);
    });

    it('should apply per-hand defaults', () => {
      const hands = service.resolveHands({ hour_spec: {}, minute_spec: {}, second_spec: {} });

      expect(hands.hour_spec).toMatchObject({ length: 0.5, width: 6 });
      expect(hands.minute_spec).toMatchObject({ length: 0.8, width: 4 });
      expect(hands.second_spec).toMatchObject({ length: 0.9, width: 2 });
    });

    it('should reject lengths over 1 and non-positive widths', () => {
      expect(() => service.resolveHands({ hour_spec: { length: 1.2 } })).toThrow(/hour_spec\.length/);
      expect(() => service.resolveHands({ minute_spec: { width: -1 } })).toThrow(/minute_spec\.width/);
    });

    it('should require a polygon for custom_polygon hands', () => {
      expect(() => service.resolveHands({ hour_spec: { shape: 'custom_polygon' } })).toThrow(
        "Invalid Hands properties: hour_spec.custom_polygon: required when shape is 'custom_polygon'"
      );
      expect(() =>
        service.resolveHands({ hands: [{ type: 'minute', shape: 'custom_polygon' }] })
      ).toThrow(/hands\.0\.custom_polygon/);
    });

    it('should reject unknown hand types in the hands list', () => {
      expect(() => service.resolveHands({ hands: [{ type: 'decade' }] })).toThrow(ConfigError);
    });
  });

  describe('resolveCanvas', () => {
    it('should apply canvas defaults', () => {
      const canvas = service.resolveCanvas({ width: 100, height: 50 });

      expect(canvas).toEqual({
        width: 100,
        height: 50,
        antialias: true,
        scale_factor: 2,
        background_color: { kind: 'solid', color: [255, 255, 255, 255] },
        post_processing: { flip_horizontal: false, rotate: 0, transpose: false },
      });
    });

    it('should reject invalid sizes and scale factors', () => {
      expect(() => service.resolveCanvas({ width: 0, height: 50 })).toThrow(ConfigError);
      expect(() => service.resolveCanvas({ width: 10.5, height: 50 })).toThrow(ConfigError);
      expect(() => service.resolveCanvas({ width: 10, height: 10, scale_factor: 0 })).toThrow(/scale_factor/);
    });
  });

  describe('presets', () => {
    it('should list every preset', () => {
      expect(service.listPresets().map(preset => preset.name)).toEqual([
        'classic',
        'modern',
        'minimal',
        'roman',
        'midnight',
      ]);
    });

    it('should reject unknown styles with the available names', () => {
      expect(() => service.getPreset('baroque')).toThrow(
        "Style 'baroque' not recognized. Available styles: classic, modern, minimal, roman, midnight"
      );
    });

    it.each(['constructor', '__proto__', 'hasOwnProperty'])('should not resolve %s as a style', name => {
      expect(() => service.getPreset(name)).toThrow(
        `Style '${name}' not recognized. Available styles: classic, modern, minimal, roman, midnight`
      );
    });

    it('should keep preset data frozen', () => {
      const preset = service.getPreset('classic');

      expect(Object.isFrozen(preset)).toBe(true);
      expect(Object.isFrozen(preset.elements[0].properties)).toBe(true);
    });
  });
});
