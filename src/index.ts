import express, { Express, Request, Response } from 'express';
import cors from 'cors';
import { loadServerConfig, ServerConfig } from './config/server.config';
import { errorHandler } from './middleware/error-handler';
import { createClockRouter } from './routes/clock.routes';

/**
 * Build the Express app without binding a port
 */
export function createApp(config: ServerConfig): Express {
  const app = express();

  // Middleware
  app.use(cors(config.corsOrigins.length > 0 ? { origin: config.corsOrigins } : undefined));
  app.use(express.json({ limit: config.jsonLimit }));

  // Routes
  app.use('/api/clock', createClockRouter(config));

  // Health check
  app.get('/api/health', (req: Request, res: Response) => {
    res.json({ status: 'ok', message: 'Clock renderer is running' });
  });

  // Error handling middleware
  app.use(errorHandler);

  return app;
}

if (require.main === module) {
  const config = loadServerConfig();
  const app = createApp(config);

  const server = app.listen(config.port, () => {
    console.log(`[Server] Running on port ${config.port} (${config.nodeEnv})`);
    console.log(`[Server] API ready at http://localhost:${config.port}/api`);
  });

  const shutdown = (signal: string) => {
    console.log(`[Server] ${signal} received, closing server...`);
    server.close(() => process.exit(0));
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}
