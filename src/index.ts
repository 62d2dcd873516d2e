import express, { Express, Request, Response } from 'express';
import bodyParser from 'body-parser';
import 'dotenv/config';
import { getCountries, getCountry } from './api/countries/countries';
import { getCountryResults } from './api/countries/results';
import { calculatePension } from './api/countries/calculate';
import { getPanorama } from './api/panorama/panorama';
import { ApiError } from './api/errors';
import { ConfigurationError } from './utils/calculate-pension/errors';
import { UnknownCountryError } from './utils/panorama/runner';
import { err, log } from './utils/logger';

/**
 * HTTP status for an error thrown by a handler
 */
export function errorStatus(error: unknown): number {
  if (error instanceof ApiError) {
    return error.statusCode;
  }
  if (error instanceof UnknownCountryError) {
    return 404;
  }
  if (error instanceof ConfigurationError) {
    return 422;
  }
  return 500;
}

function sendError(res: Response, error: unknown) {
  const statusCode = errorStatus(error);
  if (statusCode >= 500) {
    err('Request failed', { error: error instanceof Error ? error.stack ?? error.message : String(error) });
  }
  res.status(statusCode).json({ error: error instanceof Error ? error.message : 'Unknown error' });
}

export function createApp(): Express {
  const app: Express = express();

  // Middleware
  app.use(express.json());
  app.use(bodyParser.urlencoded({ extended: true }));

  // Country routes
  app.get('/api/countries', (req: Request, res: Response) => {
    try {
      res.json(getCountries(req));
    } catch (error) {
      sendError(res, error);
    }
  });

  app.get('/api/countries/:code', (req: Request, res: Response) => {
    try {
      res.json(getCountry(req));
    } catch (error) {
      sendError(res, error);
    }
  });

  app.get('/api/countries/:code/results', (req: Request, res: Response) => {
    try {
      res.json(getCountryResults(req));
    } catch (error) {
      sendError(res, error);
    }
  });

  app.post('/api/countries/:code/calculate', (req: Request, res: Response) => {
    try {
      res.json(calculatePension(req));
    } catch (error) {
      sendError(res, error);
    }
  });

  // Panorama routes
  app.get('/api/panorama', (req: Request, res: Response) => {
    try {
      res.json(getPanorama(req));
    } catch (error) {
      sendError(res, error);
    }
  });

  return app;
}

if (require.main === module) {
  const port = process.env.PORT || 5002;
  createApp().listen(port, () => {
    log(`Server is running on port ${port}`);
  });
}
