/**
 * HTTP server settings, read from the environment once at startup
 */
export interface ServerConfig {
  port: number;
  nodeEnv: string;
  /** express.json body limit, e.g. "1mb" */
  jsonLimit: string;
  /** Largest accepted canvas width or height, in pixels */
  maxCanvasSize: number;
  /** Allowed CORS origins; empty means any origin */
  corsOrigins: string[];
}

function readInt(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`Expected a positive integer, got '${value}'`);
  }
  return parsed;
}

export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  return {
    port: readInt(env.PORT, 3001),
    nodeEnv: env.NODE_ENV || 'development',
    jsonLimit: env.JSON_LIMIT || '1mb',
    maxCanvasSize: readInt(env.MAX_CANVAS_SIZE, 4096),
    corsOrigins: (env.CORS_ORIGINS || '')
      .split(',')
      .map(origin => origin.trim())
      .filter(origin => origin.length > 0),
  };
}
