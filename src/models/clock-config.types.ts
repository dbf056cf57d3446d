/**
 * Declarative configuration shapes, as accepted from JSON
 */

export const ELEMENT_TYPES = ['Face', 'Ticks', 'Numerals', 'Overlay', 'Hands'] as const;

export type ElementType = (typeof ELEMENT_TYPES)[number];

/** Draw-order key per element type; lower draws first */
export const Z_ORDER: Readonly<Record<ElementType, number>> = {
  Face: 0,
  Ticks: 1,
  Numerals: 2,
  Overlay: 3,
  Hands: 4,
};

export type ElementProperties = Record<string, unknown>;

export interface ElementConfig {
  type: string;
  properties?: ElementProperties;
}

export interface PostProcessingConfig {
  flip_horizontal?: boolean;
  /** Degrees, positive is clockwise */
  rotate?: number;
  transpose?: boolean;
}

export interface ClockConfig {
  width: number;
  height: number;
  antialias?: boolean;
  scale_factor?: number;
  background_color?: unknown;
  elements?: ElementConfig[];
  post_processing?: PostProcessingConfig;
}

export function isElementType(value: string): value is ElementType {
  return (ELEMENT_TYPES as readonly string[]).includes(value);
}
