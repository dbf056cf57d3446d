import { z } from 'zod';
import presetData from '../assets/presets.json';
import { ConfigError } from '../models/errors';
import { ElementProperties, ElementType, isElementType } from '../models/clock-config.types';
import { ColorService } from './color.service';
import { TimeService } from './time.service';

const colorService = new ColorService();
const timeService = new TimeService();

/**
 * Wrap a throwing parser so its ConfigError becomes a zod issue at the
 * property's path
 */
function parsed<T>(parse: (value: unknown) => T) {
  return z.unknown().transform((value, ctx): T => {
    try {
      return parse(value);
    } catch (error) {
      if (error instanceof ConfigError) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: error.message });
        return z.NEVER;
      }
      throw error;
    }
  });
}

const colorSpec = parsed(value => colorService.parseColorSpec(value));
const solidColor = parsed(value => colorService.parseColor(value));

const point = z.tuple([z.number(), z.number()]).transform(([x, y]) => ({ x, y }));
const dialMode = z.enum(['12h', '24h']);

/** Center/radius overrides in target pixels, for sub-dials */
const placement = {
  center: point.optional(),
  radius: z.number().positive().optional(),
};

// ---------------------------------------------------------------------------
// Face

const faceSchema = z.object({
  ...placement,
  shape: z.enum(['circle', 'square', 'rectangle']).default('circle'),
  color: colorSpec.optional(),
  border_color: colorSpec.default('black'),
  border_width: z.number().nonnegative().default(0),
  image_path: z.string().min(1).optional(),
});

// ---------------------------------------------------------------------------
// Ticks

function tickStyle(length: number, width: number) {
  return z.object({
    shape: z.enum(['line', 'circle']).default('line'),
    color: colorSpec.default('black'),
    length: z.number().positive().max(1).default(length),
    width: z.number().positive().default(width),
  });
}

const tickIndices = z.union([
  z.literal('all'),
  z.literal('all_others'),
  z.array(z.number().int().nonnegative()),
]);

const ticksSchema = z.object({
  ...placement,
  mode: dialMode.default('12h'),
  divisions: z.number().int().positive().optional(),
  rotation: z.number().default(0),
  visible: z.array(z.number().int()).optional(),
  visible_hours: z.array(z.number().int()).optional(),
  hour_spec: tickStyle(0.1, 2).optional(),
  minute_spec: tickStyle(0.05, 1).optional(),
  tick_spec: z.array(tickStyle(0.1, 2).extend({ indices: tickIndices.default([]) })).optional(),
  inset: z.number().min(0).max(1).default(0.05),
});

// ---------------------------------------------------------------------------
// Numerals

const numeralsSchema = z
  .object({
    ...placement,
    system: z.enum(['arabic', 'roman', 'custom', 'none']).default('arabic'),
    custom_list: z.array(z.string()).optional(),
    mode: dialMode.default('12h'),
    values: z.array(z.number().int()).optional(),
    visible: z.array(z.number().int()).optional(),
    custom_map: z.record(z.string()).optional(),
    positions: z.array(z.number()).optional(),
    divisions: z.number().int().positive().optional(),
    rotation: z.number().default(0),
    radius_offset: z.number().default(0),
    font_size: z.number().positive().default(12),
    font_path: z.string().min(1).optional(),
    font_family: z.string().min(1).optional(),
    color: solidColor.default('black'),
    orientation: z.enum(['upright', 'radial', 'tangent']).default('upright'),
    flip: z.enum(['none', 'horizontal', 'vertical', 'both']).default('none'),
  })
  .superRefine((value, ctx) => {
    if (value.system === 'custom' && value.custom_list === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['custom_list'],
        message: "required when system is 'custom'",
      });
    }
  });

// ---------------------------------------------------------------------------
// Overlay

const overlaySchema = z
  .object({
    type: z.enum(['date_window', 'text']).default('date_window'),
    date: parsed(value => {
      if (typeof value !== 'string') throw new ConfigError('date must be a YYYY-MM-DD string');
      return timeService.parseDate(value);
    }).optional(),
    date_format: z.enum(['day', 'weekday', 'month_day', 'iso']).default('day'),
    text: z.string().optional(),
    position: point.optional(),
    font_size: z.number().positive().default(14),
    font_path: z.string().min(1).optional(),
    font_family: z.string().min(1).optional(),
    text_color: solidColor.default('black'),
    background_color: colorSpec.optional(),
    border_color: colorSpec.optional(),
    border_width: z.number().nonnegative().default(1),
    padding: z.number().nonnegative().default(4),
    corner_radius: z.number().nonnegative().default(0),
  })
  .superRefine((value, ctx) => {
    if (value.type === 'text' && value.text === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['text'], message: "required when type is 'text'" });
    }
  });

// ---------------------------------------------------------------------------
// Hands

function handStyle(length: number, width: number) {
  return z.object({
    shape: z.enum(['line', 'triangle', 'custom_polygon']).default('line'),
    color: colorSpec.default('black'),
    length: z.number().positive().max(1).default(length),
    width: z.number().positive().default(width),
    custom_polygon: z
      .array(point)
      .min(3)
      .optional(),
  });
}

const HAND_DEFAULTS = {
  hour: { length: 0.5, width: 6 },
  minute: { length: 0.8, width: 4 },
  second: { length: 0.9, width: 2 },
} as const;

/** Entries of the `hands` list; an entry without a `type` is an hour hand */
const handEntry = z.preprocess(
  value =>
    typeof value === 'object' && value !== null && !Array.isArray(value) && !('type' in value)
      ? { ...value, type: 'hour' }
      : value,
  z.discriminatedUnion('type', [
    handStyle(HAND_DEFAULTS.hour.length, HAND_DEFAULTS.hour.width).extend({ type: z.literal('hour') }),
    handStyle(HAND_DEFAULTS.minute.length, HAND_DEFAULTS.minute.width).extend({ type: z.literal('minute') }),
    handStyle(HAND_DEFAULTS.second.length, HAND_DEFAULTS.second.width).extend({ type: z.literal('second') }),
  ])
);

const handsSchema = z
  .object({
    ...placement,
    time: parsed(value => {
      if (typeof value !== 'string') throw new ConfigError('time must be an H:MM:SS string');
      return timeService.parseTime(value);
    }).default('12:00:00'),
    mode: dialMode.default('12h'),
    hour_spec: handStyle(HAND_DEFAULTS.hour.length, HAND_DEFAULTS.hour.width).optional(),
    minute_spec: handStyle(HAND_DEFAULTS.minute.length, HAND_DEFAULTS.minute.width).optional(),
    second_spec: handStyle(HAND_DEFAULTS.second.length, HAND_DEFAULTS.second.width).optional(),
    pivot_spec: z
      .object({
        shape: z.literal('circle').default('circle'),
        color: colorSpec.default('black'),
        radius: z.number().positive().default(5),
      })
      .optional(),
    hands: z.array(handEntry).optional(),
  })
  .superRefine((value, ctx) => {
    const specs: Array<[Array<string | number>, { shape: string; custom_polygon?: unknown } | undefined]> = [
      [['hour_spec'], value.hour_spec],
      [['minute_spec'], value.minute_spec],
      [['second_spec'], value.second_spec],
      ...(value.hands ?? []).map((hand, i): [Array<string | number>, typeof hand] => [['hands', i], hand]),
    ];
    for (const [path, spec] of specs) {
      if (spec?.shape === 'custom_polygon' && spec.custom_polygon === undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [...path, 'custom_polygon'],
          message: "required when shape is 'custom_polygon'",
        });
      }
    }
  });

// ---------------------------------------------------------------------------
// Canvas and configuration shape

const postProcessingSchema = z.object({
  flip_horizontal: z.boolean().default(false),
  rotate: z.number().default(0),
  transpose: z.boolean().default(false),
});

const canvasSchema = z.object({
  width: z.number().int().positive(),
  height: z.number().int().positive(),
  antialias: z.boolean().default(true),
  scale_factor: z.number().int().min(1).default(2),
  background_color: colorSpec.default('white'),
  post_processing: postProcessingSchema.default({}),
});

export const elementConfigSchema = z.object({
  type: z.string(),
  properties: z.record(z.unknown()).default({}),
});

export const clockConfigSchema = z.object({
  width: z.number().int().positive(),
  height: z.number().int().positive(),
  antialias: z.boolean().optional(),
  scale_factor: z.number().int().min(1).optional(),
  background_color: z.unknown().optional(),
  elements: z.array(elementConfigSchema).optional(),
  post_processing: z
    .object({
      flip_horizontal: z.boolean().optional(),
      rotate: z.number().optional(),
      transpose: z.boolean().optional(),
    })
    .optional(),
});

const presetSchema = z.object({
  description: z.string(),
  elements: z.array(elementConfigSchema),
});

export type FaceProperties = z.output<typeof faceSchema>;
export type TickStyle = z.output<ReturnType<typeof tickStyle>>;
export type TicksProperties = z.output<typeof ticksSchema>;
export type NumeralsProperties = z.output<typeof numeralsSchema>;
export type OverlayProperties = z.output<typeof overlaySchema>;
export type HandStyle = z.output<ReturnType<typeof handStyle>>;
export type HandsProperties = z.output<typeof handsSchema>;
export type CanvasSpec = z.output<typeof canvasSchema>;
export type PostProcessing = z.output<typeof postProcessingSchema>;
export type Preset = z.output<typeof presetSchema>;

export type ResolvedElement =
  | { type: 'Face'; properties: FaceProperties }
  | { type: 'Ticks'; properties: TicksProperties }
  | { type: 'Numerals'; properties: NumeralsProperties }
  | { type: 'Overlay'; properties: OverlayProperties }
  | { type: 'Hands'; properties: HandsProperties };

/**
 * Render a zod failure as one line: "path: message; path: message"
 */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

const PRESETS: Readonly<Record<string, Preset>> = deepFreeze(z.record(presetSchema).parse(presetData));

/**
 * Validates element properties and canvas specs, filling in defaults.
 *
 * Properties are checked once when an element is built; drawing only ever
 * sees the resolved, typed view.
 */
export class StyleService {
  resolve(type: string, properties: ElementProperties = {}): ResolvedElement {
    if (!isElementType(type)) {
      throw new ConfigError(`Unknown element type: ${type}`);
    }
    return this.resolveTyped(type, properties);
  }

  resolveFace(properties: ElementProperties = {}): FaceProperties {
    return this.validate(faceSchema, properties, 'Face properties');
  }

  resolveTicks(properties: ElementProperties = {}): TicksProperties {
    return this.validate(ticksSchema, properties, 'Ticks properties');
  }

  resolveNumerals(properties: ElementProperties = {}): NumeralsProperties {
    return this.validate(numeralsSchema, properties, 'Numerals properties');
  }

  resolveOverlay(properties: ElementProperties = {}): OverlayProperties {
    return this.validate(overlaySchema, properties, 'Overlay properties');
  }

  resolveHands(properties: ElementProperties = {}): HandsProperties {
    return this.validate(handsSchema, properties, 'Hands properties');
  }

  /**
   * Validate canvas fields and post-processing, with defaults applied
   */
  resolveCanvas(config: unknown): CanvasSpec {
    return this.validate(canvasSchema, config, 'canvas');
  }

  getPreset(name: string): Preset {
    const preset = Object.prototype.hasOwnProperty.call(PRESETS, name) ? PRESETS[name] : undefined;
    if (preset === undefined) {
      throw new ConfigError(`Style '${name}' not recognized. Available styles: ${Object.keys(PRESETS).join(', ')}`);
    }
    return preset;
  }

  listPresets(): Array<{ name: string; description: string }> {
    return Object.entries(PRESETS).map(([name, preset]) => ({ name, description: preset.description }));
  }

  validate<S extends z.ZodTypeAny>(schema: S, value: unknown, label: string): z.output<S> {
    const result = schema.safeParse(value);
    if (!result.success) {
      throw new ConfigError(`Invalid ${label}: ${formatIssues(result.error)}`);
    }
    return result.data;
  }

  private resolveTyped(type: ElementType, properties: ElementProperties): ResolvedElement {
    switch (type) {
      case 'Face':
        return { type, properties: this.resolveFace(properties) };
      case 'Ticks':
        return { type, properties: this.resolveTicks(properties) };
      case 'Numerals':
        return { type, properties: this.resolveNumerals(properties) };
      case 'Overlay':
        return { type, properties: this.resolveOverlay(properties) };
      case 'Hands':
        return { type, properties: this.resolveHands(properties) };
    }
  }
}
