import { ElementProperties } from '../models/clock-config.types';
import { ConfigError } from '../models/errors';
import { FaceElement } from './face.element';
import { HandsElement } from './hands.element';
import { NumeralsElement } from './numerals.element';
import { OverlayElement } from './overlay.element';
import { TicksElement } from './ticks.element';

export { BaseElement, Placement } from './element';
export { FaceElement } from './face.element';
export { HandsElement, HandKind, HandPlacement } from './hands.element';
export { NumeralsElement, NumeralLabel, toRoman } from './numerals.element';
export { OverlayElement } from './overlay.element';
export { TicksElement } from './ticks.element';

export type ClockElement = FaceElement | TicksElement | NumeralsElement | OverlayElement | HandsElement;

const ELEMENT_CONSTRUCTORS: Readonly<Record<string, new (properties: ElementProperties) => ClockElement>> = {
  Face: FaceElement,
  Ticks: TicksElement,
  Numerals: NumeralsElement,
  Overlay: OverlayElement,
  Hands: HandsElement,
};

/**
 * Build an element from its type tag
 */
export function createElement(type: string, properties: ElementProperties = {}): ClockElement {
  const ElementClass = Object.prototype.hasOwnProperty.call(ELEMENT_CONSTRUCTORS, type)
    ? ELEMENT_CONSTRUCTORS[type]
    : undefined;
  if (ElementClass === undefined) {
    throw new ConfigError(`Unknown element type: ${type}. Expected one of: ${Object.keys(ELEMENT_CONSTRUCTORS).join(', ')}`);
  }
  return new ElementClass(properties);
}
