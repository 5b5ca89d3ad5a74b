import { describe, it, expect, vi } from 'vitest';
import type { Server } from 'http';
import path from 'path';
import os from 'os';
import { startServer, DEFAULT_PORT } from './cli.js';
import { DEFAULT_CAPITALS_PATH } from './cities.js';
import type { MockApiConfig } from './core/types.js';

function makeDeps(env: Record<string, string | undefined> = {}) {
  const server = { close: vi.fn() } as unknown as Server;
  return {
    server,
    deps: {
      env: {
        API_KEYS_CONFIG: path.join(os.tmpdir(), 'mock-weather-api-no-keys.json'),
        ...env,
      },
      logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn() },
      serveImpl: vi.fn(async (_config: MockApiConfig, _port: number) => server),
    },
  };
}

describe('startServer', () => {
  it('serves the bundled capitals on the default port', async () => {
    // Setup
    const { deps, server } = makeDeps();

    // Act
    const started = await startServer(deps);

    // Assert
    expect(started).toBe(server);
    expect(deps.serveImpl).toHaveBeenCalledOnce();
    const [config, port] = deps.serveImpl.mock.calls[0];
    expect(port).toBe(DEFAULT_PORT);
    expect(Object.keys(config.cities)).toContain('London');
    expect(config.keyManager.size).toBe(0);
    expect(config.logger).toBe(deps.logger);
    expect(deps.logger.info).toHaveBeenLastCalledWith(
      expect.stringMatching(/^Weather API listening on port 5000 \(0 keys, \d+ cities\)$/),
    );
  });

  it('reads PORT and CAPITALS_JSON_PATH from the environment', async () => {
    // Setup
    const { deps } = makeDeps({ PORT: '8080', CAPITALS_JSON_PATH: DEFAULT_CAPITALS_PATH });

    // Act
    await startServer(deps);

    // Assert
    expect(deps.serveImpl.mock.calls[0][1]).toBe(8080);
  });

  it('refuses an invalid port', async () => {
    const { deps } = makeDeps({ PORT: 'eighty' });
    await expect(startServer(deps)).rejects.toThrow(/^Invalid configuration: PORT/);
    expect(deps.serveImpl).not.toHaveBeenCalled();
  });

  it('refuses to start without a cities file', async () => {
    const { deps } = makeDeps({
      CAPITALS_JSON_PATH: path.join(os.tmpdir(), 'mock-weather-api-no-cities.json'),
    });
    await expect(startServer(deps)).rejects.toThrow(/^Cities file not found/);
  });
});
