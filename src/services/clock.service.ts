import { ClockElement, createElement } from '../elements';
import { ClockConfig, PostProcessingConfig } from '../models/clock-config.types';
import { DialFrame, Point, RgbaImage } from '../models/geometry.types';
import { ColorService } from './color.service';
import { ImageService, OutputFormat } from './image.service';
import { CanvasSpec, StyleService } from './style.service';
import { DrawingSurface, RasterSurface } from './surface.service';

export interface ClockOptions {
  width?: number;
  height?: number;
  antialias?: boolean;
  scale_factor?: number;
  background_color?: unknown;
  post_processing?: PostProcessingConfig;
}

export interface CreateOptions {
  width?: number;
  height?: number;
  antialias?: boolean;
  scale_factor?: number;
}

/** Final image of one render; each call gets its own pixel buffer */
export type RenderedImage = Readonly<RgbaImage>;

const DEFAULT_SIZE = 400;
const CANVAS_KEYS = ['width', 'height', 'antialias', 'scale_factor', 'background_color', 'post_processing'] as const;

const styleService = new StyleService();

/**
 * A clock face: canvas settings plus an ordered list of elements.
 *
 * Rendering draws every element, lowest z-order first, onto one canvas at
 * `scale_factor` times the target size, downsamples, then applies
 * post-processing. The result is cached until the element list changes.
 */
export class Clock {
  readonly canvas: CanvasSpec;

  private readonly options: ClockOptions;
  private elements: ClockElement[] = [];
  private cached?: RgbaImage;

  private readonly imageService = new ImageService();
  private readonly colorService = new ColorService();

  constructor(options: ClockOptions = {}) {
    this.options = structuredClone(options);
    this.canvas = styleService.resolveCanvas({ width: DEFAULT_SIZE, height: DEFAULT_SIZE, ...options });
  }

  /**
   * Build a clock from a declarative configuration
   */
  static fromConfig(config: ClockConfig): Clock {
    const options: ClockOptions = {};
    for (const key of CANVAS_KEYS) {
      if (config[key] !== undefined) {
        Object.assign(options, { [key]: config[key] });
      }
    }

    const clock = new Clock(options);
    for (const element of config.elements ?? []) {
      clock.addElement(createElement(element.type, element.properties ?? {}));
    }
    return clock;
  }

  /**
   * Build a clock from a named preset showing `time`
   */
  static create(time: string, style: string = 'classic', overrides: CreateOptions = {}): Clock {
    const preset = styleService.getPreset(style);
    const clock = new Clock(overrides);

    for (const element of preset.elements) {
      const properties = element.type === 'Hands' ? { ...element.properties, time } : element.properties;
      clock.addElement(createElement(element.type, properties));
    }
    return clock;
  }

  get width(): number {
    return this.canvas.width;
  }

  get height(): number {
    return this.canvas.height;
  }

  /**
   * Supersampling factor actually used: 1 when antialiasing is off
   */
  get scaleFactor(): number {
    return this.canvas.antialias ? this.canvas.scale_factor : 1;
  }

  /** Dial center in target pixels */
  get center(): Point {
    return { x: this.width / 2, y: this.height / 2 };
  }

  /** Dial radius in target pixels */
  get radius(): number {
    return Math.min(this.width, this.height) / 2;
  }

  addElement(element: ClockElement): this {
    this.elements.push(element);
    this.invalidate();
    return this;
  }

  replaceElement(index: number, element: ClockElement): this {
    this.assertIndex(index);
    this.elements[index] = element;
    this.invalidate();
    return this;
  }

  removeElement(index: number): ClockElement {
    this.assertIndex(index);
    const [removed] = this.elements.splice(index, 1);
    this.invalidate();
    return removed;
  }

  clearElements(): void {
    this.elements = [];
    this.invalidate();
  }

  /**
   * Elements in insertion order
   */
  getElements(): ClockElement[] {
    return [...this.elements];
  }

  /**
   * Elements sorted by z-order; equal z-order keeps insertion order
   */
  getDrawOrder(): ClockElement[] {
    return this.elements
      .map((element, position) => ({ element, position }))
      .sort((a, b) => a.element.zOrder - b.element.zOrder || a.position - b.position)
      .map(({ element }) => element);
  }

  /**
   * Dial placement at a given supersampling factor
   */
  frameAt(factor: number): DialFrame {
    return {
      center: { x: this.center.x * factor, y: this.center.y * factor },
      radius: this.radius * factor,
      scale: factor,
      width: this.width * factor,
      height: this.height * factor,
    };
  }

  /**
   * Paint the background and every element, in draw order, onto `surface`
   */
  async compose(surface: DrawingSurface, factor: number = this.scaleFactor): Promise<void> {
    surface.paint(
      this.colorService.resolve(this.canvas.background_color, {
        kind: 'rect',
        x: 0,
        y: 0,
        width: surface.width,
        height: surface.height,
      })
    );

    const frame = this.frameAt(factor);
    for (const element of this.getDrawOrder()) {
      await element.draw(surface, frame);
    }
  }

  async render(): Promise<RenderedImage> {
    if (this.cached === undefined) {
      this.cached = await this.renderImage();
    }
    return { width: this.cached.width, height: this.cached.height, data: new Uint8Array(this.cached.data) };
  }

  private async renderImage(): Promise<RgbaImage> {
    const factor = this.scaleFactor;
    const surface = new RasterSurface(this.width * factor, this.height * factor);
    await this.compose(surface, factor);

    let image = surface.toImage();
    if (factor > 1) {
      image = await this.imageService.downsample(image, this.width, this.height);
    }
    return this.imageService.applyPostProcessing(image, this.canvas.post_processing);
  }

  async encode(format: OutputFormat = 'png'): Promise<Buffer> {
    return this.imageService.encode(await this.render(), format);
  }

  /**
   * Render (or reuse the last render) and write it; the format follows the
   * extension unless given
   */
  async save(filePath: string, format?: OutputFormat): Promise<void> {
    await this.imageService.save(await this.render(), filePath, format);
  }

  /**
   * The canvas fields this clock was given, plus every element's raw
   * properties
   */
  toConfig(): ClockConfig {
    return {
      ...structuredClone(this.options),
      width: this.width,
      height: this.height,
      elements: this.elements.map(element => element.toConfig()),
    };
  }

  private invalidate(): void {
    this.cached = undefined;
  }

  private assertIndex(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.elements.length) {
      throw new RangeError(`Element index ${index} out of range (0-${this.elements.length - 1})`);
    }
  }
}
