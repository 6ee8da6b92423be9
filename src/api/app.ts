import cors, { type CorsOptions } from 'cors';
import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import { ZodError } from 'zod';
import { API_PREFIX } from '../constants.ts';
import { errorMessage, HttpError } from '../lib/errors.ts';
import type { RuntimeDeps } from '../types.ts';
import { createLocationRouter, type LocationDeps } from './routes/location.ts';
import { createSpreadsheetRouter } from './routes/spreadsheet.ts';

export interface ErrorResponse {
  status: number;
  body: Record<string, unknown>;
}

/**
 * Map anything a route throws to a status and JSON body.
 */
export function toErrorResponse(error: unknown): ErrorResponse {
  if (error instanceof ZodError) {
    return { status: 422, body: { detail: error.issues.map((issue) => ({ loc: issue.path, msg: issue.message, type: issue.code })) } };
  }
  if (error instanceof HttpError) {
    return { status: error.status, body: { detail: error.message } };
  }
  return {
    status: 500,
    body: {
      error: errorMessage(error),
      type: error instanceof Error ? error.name : typeof error,
      detail: 'See server logs for more information',
    },
  };
}

export function corsOptions(origins: string[]): CorsOptions {
  if (origins.includes('*')) return { origin: '*' };
  return { origin: origins, credentials: true };
}

export function createApp(deps: RuntimeDeps, options: Pick<LocationDeps, 'now'> = {}): Express {
  const { config, logger, createSheets } = deps;
  const app = express();

  app.use(cors(corsOptions(config.corsOrigins)));
  app.use(express.json({ limit: '1mb' }));

  if (config.logLevel === 'debug') {
    app.use((req: Request, res: Response, next: NextFunction) => {
      logger.debug({ method: req.method, url: req.originalUrl, body: req.body }, 'Request');
      res.on('finish', () => logger.debug({ status: res.statusCode }, 'Response'));
      next();
    });
  }

  app.get('/', (_req: Request, res: Response) => {
    res.json({ status: 'ok', message: `${config.name} is running` });
  });

  app.use(`${API_PREFIX}/location`, createLocationRouter({ createSheets, ipHashSalt: config.ipHashSalt, logger, ...options }));

  if (config.enableSpreadsheetApi) {
    app.use(`${API_PREFIX}/spreadsheet`, createSpreadsheetRouter({ createSheets }));
    logger.info('Mounted spreadsheet API');
  }

  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    const { status, body } = toErrorResponse(error);
    if (status >= 500) logger.error({ method: req.method, url: req.originalUrl, status, err: error }, 'Request failed');
    else logger.warn({ method: req.method, url: req.originalUrl, status }, 'Request rejected');
    res.status(status).json(body);
  });

  return app;
}
