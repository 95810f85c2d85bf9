import path from 'node:path';
import { describe, expect, it } from 'vitest';

import { loadServiceConfig, ServiceConfigError } from './config.js';

describe('loadServiceConfig', () => {
  it('applies defaults for an empty environment', () => {
    const config = loadServiceConfig({});

    expect(config).toEqual({
      port: 4000,
      dataFile: path.resolve('./data/lifeboard.json'),
      blockIntervalMs: 1000,
      genesisMs: 0,
      logBoards: false,
      metricsPrefix: 'lifeboard_',
    });
  });

  it('reads and coerces explicit values', () => {
    const config = loadServiceConfig({
      PORT: '8080',
      LIFEBOARD_DATA_FILE: '/var/lib/lifeboard/boards.json',
      LIFEBOARD_BLOCK_INTERVAL_MS: '250',
      LIFEBOARD_GENESIS_MS: '1700000000000',
      LIFEBOARD_LOG_BOARDS: '1',
      LIFEBOARD_METRICS_PREFIX: 'boards_',
    });

    expect(config).toEqual({
      port: 8080,
      dataFile: '/var/lib/lifeboard/boards.json',
      blockIntervalMs: 250,
      genesisMs: 1_700_000_000_000,
      logBoards: true,
      metricsPrefix: 'boards_',
    });
  });

  it('reports every invalid variable', () => {
    let caught: unknown;
    try {
      loadServiceConfig({
        PORT: 'eighty',
        LIFEBOARD_BLOCK_INTERVAL_MS: '0',
        LIFEBOARD_LOG_BOARDS: 'yes',
      });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ServiceConfigError);
    if (caught instanceof ServiceConfigError) {
      expect(caught.code).toBe('InvalidServiceConfig');
      expect(caught.issues).toHaveLength(3);
      expect(caught.issues.map((issue) => issue.split(':')[0])).toEqual([
        'PORT',
        'LIFEBOARD_BLOCK_INTERVAL_MS',
        'LIFEBOARD_LOG_BOARDS',
      ]);
    }
  });
});
