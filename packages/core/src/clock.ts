/**
 * External height source sampled when a generation is produced. Readings are
 * non-negative integers that never decrease.
 */
export interface BlockClock {
  now(): number;
}

export interface ManualClock extends BlockClock {
  advance(by?: number): number;
  set(height: number): void;
}

function assertHeight(value: number, label: string): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new RangeError(`${label} must be a non-negative integer (received ${value})`);
  }
}

/**
 * Clock driven explicitly by the caller. Used by tests and the simulator CLI.
 */
export function createManualClock(start = 0): ManualClock {
  assertHeight(start, 'Clock start height');
  let height = start;

  return {
    now() {
      return height;
    },
    advance(by = 1) {
      assertHeight(by, 'Clock advance');
      height += by;
      return height;
    },
    set(next) {
      assertHeight(next, 'Clock height');
      if (next < height) {
        throw new RangeError(
          `Clock height cannot move backwards (current ${height}, requested ${next})`,
        );
      }
      height = next;
    },
  };
}

export interface IntervalClockOptions {
  /**
   * Wall-clock time (ms since epoch) that corresponds to height 0.
   */
  readonly genesisMs: number;
  /**
   * Milliseconds between consecutive heights.
   */
  readonly intervalMs: number;
  readonly now?: () => number;
}

export interface IntervalClock extends BlockClock {
  /**
   * Never report a height below `height` from now on. Used after restoring
   * boards stamped by a clock with a different genesis or interval.
   */
  raiseFloor(height: number): void;
}

/**
 * Derives a block height from wall time. Readings are clamped so that a wall
 * clock stepping backwards never lowers the reported height.
 */
export function createIntervalClock(options: IntervalClockOptions): IntervalClock {
  const { genesisMs, intervalMs } = options;
  if (!Number.isFinite(genesisMs)) {
    throw new RangeError('genesisMs must be a finite number');
  }
  if (!Number.isFinite(intervalMs) || intervalMs <= 0) {
    throw new RangeError('intervalMs must be a positive number');
  }
  const readWallClock = options.now ?? Date.now;
  let lastHeight = 0;

  return {
    now() {
      const elapsed = readWallClock() - genesisMs;
      const height = elapsed > 0 ? Math.floor(elapsed / intervalMs) : 0;
      lastHeight = Math.max(lastHeight, height);
      return lastHeight;
    },
    raiseFloor(height) {
      assertHeight(height, 'Clock floor');
      lastHeight = Math.max(lastHeight, height);
    },
  };
}
