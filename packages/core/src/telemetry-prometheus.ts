/* eslint-disable no-console */

import { Counter, Gauge, Registry, collectDefaultMetrics } from 'prom-client';

import type { TelemetryEventData, TelemetryFacade } from './telemetry.js';

export interface PrometheusTelemetryOptions {
  readonly registry?: Registry;
  readonly prefix?: string;
  readonly collectDefaultMetrics?: boolean;
}

interface BoardCounters {
  readonly created: Counter<string>;
  readonly advanced: Counter<string>;
  readonly lookupsMissed: Counter<string>;
  readonly stored: Gauge<string>;
}

const DEFAULT_PREFIX = 'lifeboard_';

export interface PrometheusTelemetryFacade extends TelemetryFacade {
  readonly registry: Registry;
}

export function createPrometheusTelemetry(
  options: PrometheusTelemetryOptions = {},
): PrometheusTelemetryFacade {
  const registry = options.registry ?? new Registry();
  const prefix = options.prefix ?? DEFAULT_PREFIX;

  if (options.collectDefaultMetrics ?? true) {
    collectDefaultMetrics({ register: registry, prefix });
  }

  const errors = new Counter({
    name: `${prefix}telemetry_errors_total`,
    help: 'Total number of telemetry errors emitted by the board registry.',
    registers: [registry],
    labelNames: ['event'],
  });

  const warnings = new Counter({
    name: `${prefix}telemetry_warnings_total`,
    help: 'Total number of telemetry warnings emitted by the board registry.',
    registers: [registry],
    labelNames: ['event'],
  });

  const boards: BoardCounters = {
    created: new Counter({
      name: `${prefix}boards_created_total`,
      help: 'Total number of boards appended to the registry.',
      registers: [registry],
    }),
    advanced: new Counter({
      name: `${prefix}boards_advanced_total`,
      help: 'Total number of single-generation steps applied to stored boards.',
      registers: [registry],
    }),
    lookupsMissed: new Counter({
      name: `${prefix}board_lookups_missed_total`,
      help: 'Total number of operations that referenced an unassigned board index.',
      registers: [registry],
    }),
    stored: new Gauge({
      name: `${prefix}boards_stored`,
      help: 'Number of boards currently held by the registry.',
      registers: [registry],
    }),
  };

  const logError = createConsoleLogger('error');
  const logWarning = createConsoleLogger('warn');

  const facade: PrometheusTelemetryFacade = {
    recordError(event: string, data?: TelemetryEventData) {
      errors.inc({ event });
      logError(`[telemetry:error] ${event}`, data);
    },
    recordWarning(event: string, data?: TelemetryEventData) {
      warnings.inc({ event });
      if (event === 'BoardNotFound') {
        boards.lookupsMissed.inc();
      }
      logWarning(`[telemetry:warning] ${event}`, data);
    },
    recordProgress(event: string, data?: TelemetryEventData) {
      if (event === 'BoardCreated') {
        boards.created.inc();
        const index = data?.index;
        if (typeof index === 'number' && Number.isFinite(index)) {
          boards.stored.set(index + 1);
        }
      } else if (event === 'BoardAdvanced') {
        boards.advanced.inc();
      } else if (event === 'RegistryInitialized' || event === 'RegistryRestored') {
        const boardCount = data?.boardCount;
        if (typeof boardCount === 'number' && Number.isFinite(boardCount)) {
          boards.stored.set(boardCount);
        }
      }
    },
    registry,
  };

  return facade;
}

type ConsoleMethod = (message?: unknown, ...optionalParams: unknown[]) => void;

function createConsoleLogger<
  TMethod extends 'error' | 'warn',
>(method: TMethod): ConsoleMethod {
  if (typeof console?.[method] === 'function') {
    return console[method].bind(console);
  }
  return () => {};
}
