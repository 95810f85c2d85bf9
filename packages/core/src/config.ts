export interface LifeboardConfig {
  readonly render: {
    /**
     * Single character printed for a live cell.
     *
     * @defaultValue `'X'`
     */
    readonly aliveGlyph: string;
    /**
     * Single character printed for a dead cell. Must differ from
     * `aliveGlyph`.
     *
     * @defaultValue `'.'`
     */
    readonly deadGlyph: string;
  };
  readonly diagnostics: {
    /**
     * Dump board rows to the diagnostic sink when a board is read.
     *
     * @defaultValue `true`
     */
    readonly logReads: boolean;
    /**
     * Dump board rows to the diagnostic sink when a board is created or
     * stepped.
     *
     * @defaultValue `true`
     */
    readonly logWrites: boolean;
  };
}

export type LifeboardConfigOverrides = Readonly<{
  readonly render?: Partial<LifeboardConfig['render']>;
  readonly diagnostics?: Partial<LifeboardConfig['diagnostics']>;
}>;

export const DEFAULT_LIFEBOARD_CONFIG: LifeboardConfig = Object.freeze({
  render: Object.freeze({
    aliveGlyph: 'X',
    deadGlyph: '.',
  }),
  diagnostics: Object.freeze({
    logReads: true,
    logWrites: true,
  }),
});

function toGlyph(value: unknown): string | undefined {
  return typeof value === 'string' && [...value].length === 1 ? value : undefined;
}

function toBoolean(value: unknown): boolean | undefined {
  return typeof value === 'boolean' ? value : undefined;
}

function resolveRenderConfig(
  overrides: LifeboardConfigOverrides['render'] | undefined,
): LifeboardConfig['render'] {
  const source = overrides ?? {};
  const defaults = DEFAULT_LIFEBOARD_CONFIG.render;

  const aliveGlyph = toGlyph(source.aliveGlyph) ?? defaults.aliveGlyph;
  const deadGlyph = toGlyph(source.deadGlyph) ?? defaults.deadGlyph;

  if (aliveGlyph === deadGlyph) {
    return defaults;
  }
  return { aliveGlyph, deadGlyph };
}

function resolveDiagnosticsConfig(
  overrides: LifeboardConfigOverrides['diagnostics'] | undefined,
): LifeboardConfig['diagnostics'] {
  const source = overrides ?? {};
  const defaults = DEFAULT_LIFEBOARD_CONFIG.diagnostics;

  return {
    logReads: toBoolean(source.logReads) ?? defaults.logReads,
    logWrites: toBoolean(source.logWrites) ?? defaults.logWrites,
  };
}

export function resolveLifeboardConfig(
  overrides?: LifeboardConfigOverrides,
): LifeboardConfig {
  return Object.freeze({
    render: Object.freeze(resolveRenderConfig(overrides?.render)),
    diagnostics: Object.freeze(resolveDiagnosticsConfig(overrides?.diagnostics)),
  });
}
