import { NextFunction, Request, Response, Router } from 'express';
import { z } from 'zod';
import { ServerConfig } from '../config/server.config';
import { ConfigError } from '../models/errors';
import { Clock } from '../services/clock.service';
import { ConfigLoaderService } from '../services/config-loader.service';
import { CONTENT_TYPES, isOutputFormat, OutputFormat } from '../services/image.service';
import { StyleService } from '../services/style.service';

/** Upper bound on the supersampling factor accepted over HTTP */
const MAX_SCALE_FACTOR = 8;

const createBodySchema = z.object({
  time: z.string(),
  style: z.string().default('classic'),
  width: z.number().int().positive().optional(),
  height: z.number().int().positive().optional(),
  scale_factor: z.number().int().min(1).optional(),
  antialias: z.boolean().optional(),
});

const styleService = new StyleService();
const configLoader = new ConfigLoaderService();

function parseFormat(value: unknown): OutputFormat {
  if (value === undefined) return 'png';
  if (typeof value !== 'string' || !isOutputFormat(value)) {
    throw new ConfigError(`Unsupported output format: ${String(value)}`);
  }
  return value;
}

export function createClockRouter(config: Pick<ServerConfig, 'maxCanvasSize'>): Router {
  const router = Router();

  const assertCanvasLimits = (width: number, height: number, scaleFactor: number | undefined): void => {
    if (width > config.maxCanvasSize || height > config.maxCanvasSize) {
      throw new ConfigError(
        `Canvas ${width}x${height} exceeds the maximum of ${config.maxCanvasSize}x${config.maxCanvasSize}`
      );
    }
    if (scaleFactor !== undefined && scaleFactor > MAX_SCALE_FACTOR) {
      throw new ConfigError(`scale_factor ${scaleFactor} exceeds the maximum of ${MAX_SCALE_FACTOR}`);
    }
  };

  /**
   * Available preset styles
   */
  router.get('/styles', (req: Request, res: Response) => {
    res.json({ styles: styleService.listPresets() });
  });

  /**
   * Render a full configuration; ?format=png|jpeg|webp|tiff|avif|gif
   */
  router.post('/render', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const format = parseFormat(req.query.format);
      const clockConfig = configLoader.parseConfig(req.body);
      assertCanvasLimits(clockConfig.width, clockConfig.height, clockConfig.scale_factor);

      const clock = Clock.fromConfig(clockConfig);
      const buffer = await clock.encode(format);

      console.log(
        `[ClockRoutes] Rendered ${clock.width}x${clock.height} ${format} (${clock.getElements().length} elements)`
      );
      res.type(CONTENT_TYPES[format]).send(buffer);
    } catch (error) {
      next(error);
    }
  });

  /**
   * Render a preset style at a given time, as PNG
   */
  router.post('/create', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = styleService.validate(createBodySchema, req.body, 'request');
      const { time, style, ...overrides } = body;
      assertCanvasLimits(overrides.width ?? 0, overrides.height ?? 0, overrides.scale_factor);

      const clock = Clock.create(time, style, overrides);
      const buffer = await clock.encode('png');

      console.log(`[ClockRoutes] Rendered '${style}' at ${time} (${clock.width}x${clock.height})`);
      res.type(CONTENT_TYPES.png).send(buffer);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
