/**
 * Library entry point
 */
export { Clock, ClockOptions, CreateOptions, RenderedImage } from './services/clock.service';
export { ConfigLoaderService } from './services/config-loader.service';
export {
  BaseElement,
  ClockElement,
  createElement,
  FaceElement,
  HandsElement,
  NumeralsElement,
  OverlayElement,
  TicksElement,
  toRoman,
} from './elements';
export { ColorService, Fill, ParsedColorSpec } from './services/color.service';
export { GeometryService } from './services/geometry.service';
export { ImageService, OutputFormat } from './services/image.service';
export { StyleService, CanvasSpec, Preset } from './services/style.service';
export { DrawingSurface, RasterSurface } from './services/surface.service';
export { TextService } from './services/text.service';
export { TimeService, HandAngles, TimeValue } from './services/time.service';
export { ConfigError, DialError, ResourceError } from './models/errors';
export { ClockConfig, ElementConfig, ElementType, PostProcessingConfig } from './models/clock-config.types';
export { BoundingShape, DialFrame, Point, Rgba, RgbaImage } from './models/geometry.types';
