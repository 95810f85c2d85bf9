import path from 'node:path';
import { z } from 'zod';

const booleanFlagSchema = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65_535).default(4000),
  LIFEBOARD_DATA_FILE: z.string().min(1).default('./data/lifeboard.json'),
  LIFEBOARD_BLOCK_INTERVAL_MS: z.coerce.number().positive().default(1000),
  LIFEBOARD_GENESIS_MS: z.coerce.number().int().nonnegative().default(0),
  LIFEBOARD_LOG_BOARDS: booleanFlagSchema.default('false'),
  LIFEBOARD_METRICS_PREFIX: z
    .string()
    .regex(/^[A-Za-z_][A-Za-z0-9_]*$/)
    .default('lifeboard_'),
});

export interface ServiceConfig {
  readonly port: number;
  /**
   * Absolute path of the registry snapshot file.
   */
  readonly dataFile: string;
  readonly blockIntervalMs: number;
  readonly genesisMs: number;
  /**
   * Dump board rows to stdout on every read and write.
   */
  readonly logBoards: boolean;
  readonly metricsPrefix: string;
}

export class ServiceConfigError extends Error {
  readonly code = 'InvalidServiceConfig';

  constructor(readonly issues: readonly string[]) {
    super(`Invalid service configuration: ${issues.join('; ')}`);
    this.name = 'ServiceConfigError';
  }
}

export function loadServiceConfig(
  env: Readonly<Record<string, string | undefined>> = process.env,
): ServiceConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ServiceConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }

  const data = parsed.data;
  return Object.freeze({
    port: data.PORT,
    dataFile: path.resolve(data.LIFEBOARD_DATA_FILE),
    blockIntervalMs: data.LIFEBOARD_BLOCK_INTERVAL_MS,
    genesisMs: data.LIFEBOARD_GENESIS_MS,
    logBoards: data.LIFEBOARD_LOG_BOARDS,
    metricsPrefix: data.LIFEBOARD_METRICS_PREFIX,
  });
}
