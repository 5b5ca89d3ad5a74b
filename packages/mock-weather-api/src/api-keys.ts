import fs from 'fs';
import { z } from 'zod';
import type { ApiKeyInfo, Logger } from './core/types.js';

export const DEFAULT_API_KEYS_PATH = 'api_keys_config.json';

const ApiKeysFileSchema = z.record(
  z
    .object({
      name: z.string().optional(),
      active: z.boolean().optional(),
      expires_at: z.string().optional(),
    })
    .passthrough(),
);

/**
 * Whitelist of API keys. A key is accepted when it is listed, marked
 * `active` and not past its `expires_at`.
 */
export class ApiKeyManager {
  constructor(
    private keys: Record<string, ApiKeyInfo>,
    private logger: Logger = console,
  ) {}

  /**
   * Read the whitelist from a JSON file. A missing or unreadable file gives
   * an empty whitelist, so every request is refused.
   */
  static fromFile(
    path: string = process.env.API_KEYS_CONFIG ?? DEFAULT_API_KEYS_PATH,
    logger: Logger = console,
  ): ApiKeyManager {
    if (!fs.existsSync(path)) {
      logger.warn(`API keys config not found at ${path}`);
      return new ApiKeyManager({}, logger);
    }
    try {
      const parsed = ApiKeysFileSchema.parse(
        JSON.parse(fs.readFileSync(path, 'utf8')),
      );
      logger.info(`Loaded ${Object.keys(parsed).length} API keys from ${path}`);
      return new ApiKeyManager(parsed, logger);
    } catch (error) {
      logger.error('Failed to load API keys config:', error);
      return new ApiKeyManager({}, logger);
    }
  }

  get size(): number {
    return Object.keys(this.keys).length;
  }

  isValid(apiKey: string, now: Date = new Date()): boolean {
    const info = this.getKeyInfo(apiKey);
    if (!info) {
      this.logger.warn('API key not found in whitelist');
      return false;
    }
    if (!info.active) {
      this.logger.warn(`Inactive API key attempted: ${info.name ?? 'unknown'}`);
      return false;
    }
    if (info.expires_at !== undefined) {
      const expiry = parseExpiry(info.expires_at);
      if (Number.isNaN(expiry.getTime())) {
        this.logger.error(
          `Invalid expiry date format for key: ${info.name ?? 'unknown'}`,
        );
        return false;
      }
      if (now > expiry) {
        this.logger.warn(`Expired API key attempted: ${info.name ?? 'unknown'}`);
        return false;
      }
    }
    return true;
  }

  getKeyInfo(apiKey: string): ApiKeyInfo | undefined {
    return Object.prototype.hasOwnProperty.call(this.keys, apiKey)
      ? this.keys[apiKey]
      : undefined;
  }
}

/** Date-only values mean local midnight, like the date-times without an offset. */
function parseExpiry(value: string): Date {
  const dateOnly = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value);
  if (dateOnly) {
    return new Date(
      Number(dateOnly[1]),
      Number(dateOnly[2]) - 1,
      Number(dateOnly[3]),
    );
  }
  return new Date(value);
}
