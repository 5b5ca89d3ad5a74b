import type { ErrorResponse, Logger, MockApiConfig } from './types.js';
import { generateWeatherData } from './weather.js';

function json(data: unknown, status = 200): Response {
  return new Response(JSON.stringify(data), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

const unauthorized: ErrorResponse = {
  success: false,
  error: {
    code: 401,
    type: 'unauthorized',
    info: 'Invalid or missing API key. Please provide a valid API key in the X-API-Key header.',
  },
};

const forbidden: ErrorResponse = {
  success: false,
  error: { code: 403, type: 'forbidden', info: 'API key not authorized' },
};

/**
 * Returns an error response when the request may not proceed, or null.
 */
function authorize(
  request: Request,
  config: MockApiConfig,
  path: string,
  logger: Logger,
): Response | null {
  const apiKey = request.headers.get('X-API-Key');
  if (!apiKey) {
    logger.warn(`Request without API key: ${path}`);
    return json(unauthorized, 401);
  }
  const now = config.now?.() ?? new Date();
  if (!config.keyManager.isValid(apiKey, now)) {
    const name = config.keyManager.getKeyInfo(apiKey)?.name ?? 'unknown';
    logger.warn(`Invalid API key attempt (key: ${name})`);
    return json(forbidden, 403);
  }
  logger.info(
    `API request authorized (key: ${config.keyManager.getKeyInfo(apiKey)?.name ?? 'unknown'}, path: ${path})`,
  );
  return null;
}

function describeApi(config: MockApiConfig) {
  return {
    message: 'Weather Data API',
    authentication: 'API key required - use the X-API-Key header',
    endpoints: {
      'GET /weather': {
        description: 'Get weather data by query parameters',
        authentication: 'Required',
        parameters: {
          city: 'City name (required)',
          country: 'Country name (optional)',
          unit: "Unit system: 'm' or 'f' (default: 'm')",
        },
        example: '/weather?city=New York&country=United States of America',
      },
      'GET /weather/<city_name>': {
        description: 'Get weather data by path parameter',
        authentication: 'Required',
        parameters: {
          country: 'Country name (optional)',
          unit: "Unit system: 'm' or 'f' (default: 'm')",
        },
        example: '/weather/London?unit=m',
      },
      'GET /health': {
        description: 'Health check endpoint',
        authentication: 'Not required',
      },
    },
    available_cities: Object.keys(config.cities),
  };
}

/**
 * Handle an incoming request and return a Response.
 * This is the framework-agnostic core of the mock API.
 */
export async function handleRequest(
  request: Request,
  config: MockApiConfig,
): Promise<Response> {
  const { logger = console } = config;
  const method = request.method.toUpperCase();
  const url = new URL(request.url);
  const segments = url.pathname.split('/').filter(Boolean);

  try {
    if (method === 'GET') {
      // GET / - API description
      if (segments.length === 0) {
        return json(describeApi(config));
      }

      // GET /health - no authentication
      if (segments[0] === 'health' && segments.length === 1) {
        const now = config.now?.() ?? new Date();
        return json({ status: 'healthy', timestamp: now.toISOString() });
      }

      // GET /weather?city=... and GET /weather/:city
      if (segments[0] === 'weather' && segments.length <= 2) {
        const denied = authorize(request, config, url.pathname, logger);
        if (denied) return denied;

        const city =
          segments.length === 2
            ? decodeURIComponent(segments[1])
            : url.searchParams.get('city');
        if (!city) {
          return json({ error: 'City parameter is required' }, 400);
        }
        return json(
          generateWeatherData(
            config.cities,
            city,
            {
              country: url.searchParams.get('country') ?? undefined,
              unit: url.searchParams.get('unit') ?? undefined,
            },
            config,
          ),
        );
      }
    }

    return json({ error: 'Not found' }, 404);
  } catch (err) {
    logger.error('[mock-weather-api] Error:', err);
    const message = err instanceof Error ? err.message : '';
    return json({ error: message || 'Internal server error' }, 500);
  }
}
