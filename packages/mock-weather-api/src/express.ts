import express from 'express';
import type { NextFunction, Request as ExpressRequest, Response as ExpressResponse } from 'express';
import type { Server } from 'http';
import { handleRequest } from './core/api-handlers.js';
import type { MockApiConfig } from './core/types.js';

export type { MockApiConfig } from './core/types.js';

/** Convert an Express request into a Fetch API `Request`. */
export function toWebRequest(req: ExpressRequest): Request {
  const headers = new Headers();
  for (const [name, value] of Object.entries(req.headers)) {
    if (Array.isArray(value)) {
      for (const item of value) headers.append(name, item);
    } else if (value !== undefined) {
      headers.set(name, value);
    }
  }
  const host = req.get('host') ?? 'localhost';
  return new Request(`${req.protocol}://${host}${req.originalUrl}`, {
    method: req.method,
    headers,
  });
}

/** Copy status, headers and body of a Fetch API `Response` onto Express. */
export async function sendWebResponse(
  response: Response,
  res: ExpressResponse,
): Promise<void> {
  res.status(response.status);
  response.headers.forEach((value, name) => {
    res.setHeader(name, value);
  });
  res.send(await response.text());
}

/**
 * Create an Express app serving the mock weather API.
 *
 * Usage:
 * ```ts
 * import { createApp } from 'mock-weather-api/express'
 *
 * const app = createApp({
 *   keyManager: ApiKeyManager.fromFile('./api_keys_config.json'),
 *   cities: loadCities(),
 * })
 * app.listen(5000)
 * ```
 */
export function createApp(config: MockApiConfig): express.Express {
  const app = express();
  app.disable('x-powered-by');
  app.use((req: ExpressRequest, res: ExpressResponse, next: NextFunction) => {
    handleRequest(toWebRequest(req), config)
      .then((response) => sendWebResponse(response, res))
      .catch(next);
  });
  return app;
}

/** Start listening; resolves once the port is bound. */
export function serve(config: MockApiConfig, port: number): Promise<Server> {
  const app = createApp(config);
  return new Promise((resolve, reject) => {
    const server = app.listen(port, '0.0.0.0', () => resolve(server));
    server.once('error', reject);
  });
}
