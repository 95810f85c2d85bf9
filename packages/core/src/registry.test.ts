import { afterEach, describe, expect, it, vi } from 'vitest';

import { BitBoard } from './bit-board.js';
import { createManualClock } from './clock.js';
import { IndexNotFoundError } from './errors.js';
import { BoardRegistry } from './registry.js';
import { resetTelemetry, setTelemetry, type TelemetryFacade } from './telemetry.js';

function blinker(): BitBoard {
  const board = BitBoard.empty();
  board.setBit(5, 4, true);
  board.setBit(5, 5, true);
  board.setBit(5, 6, true);
  return board;
}

describe('BoardRegistry', () => {
  afterEach(() => {
    resetTelemetry();
  });

  it('assigns dense sequential indices starting at 0', () => {
    const registry = new BoardRegistry(createManualClock());

    expect(registry.create(BitBoard.empty())).toBe(0);
    expect(registry.create(BitBoard.empty())).toBe(1);
    expect(registry.create(BitBoard.empty())).toBe(2);
    expect(registry.size).toBe(3);
  });

  it('stamps created generations with the clock height', () => {
    const clock = createManualClock(40);
    const registry = new BoardRegistry(clock);

    const index = registry.create(blinker());

    expect(registry.get(index)).toMatchObject({
      currentHeight: 40,
      previousHeight: 0,
    });
  });

  it('returns undefined for indices that were never assigned', () => {
    const registry = new BoardRegistry(createManualClock());
    registry.create(BitBoard.empty());

    expect(registry.get(1)).toBeUndefined();
    expect(registry.get(-1)).toBeUndefined();
    expect(registry.get(0.5)).toBeUndefined();
  });

  it('fails require and advance on unknown indices without mutating', () => {
    const registry = new BoardRegistry(createManualClock());
    registry.create(blinker());
    const before = registry.get(0);

    expect(() => registry.require(1)).toThrow(IndexNotFoundError);
    expect(() => registry.advance(5)).toThrow(IndexNotFoundError);
    expect(registry.size).toBe(1);
    expect(registry.get(0)).toBe(before);
  });

  it('replaces the stored generation in place when advancing', () => {
    const clock = createManualClock(1);
    const registry = new BoardRegistry(clock);
    registry.create(BitBoard.empty());
    const index = registry.create(blinker());

    clock.advance();
    const successor = registry.advance(index);

    expect(registry.get(index)).toBe(successor);
    expect(registry.size).toBe(2);
    expect(successor).toMatchObject({ currentHeight: 2, previousHeight: 1 });
    expect(successor.board.isSet(4, 5)).toBe(true);
    expect(successor.board.isSet(5, 5)).toBe(true);
    expect(successor.board.isSet(6, 5)).toBe(true);
    expect(successor.board.liveCellCount()).toBe(3);
  });

  it('iterates generations in index order', () => {
    const registry = new BoardRegistry(createManualClock());
    registry.create(BitBoard.empty());
    registry.create(blinker());

    const counts = Array.from(registry.entries(), (generation) =>
      generation.board.liveCellCount(),
    );
    expect(counts).toEqual([0, 3]);
  });

  it('reports creation, advancement and misses to telemetry', () => {
    const facade: TelemetryFacade = {
      recordError: vi.fn(),
      recordWarning: vi.fn(),
      recordProgress: vi.fn(),
    };
    setTelemetry(facade);
    const clock = createManualClock(3);
    const registry = new BoardRegistry(clock);

    registry.create(blinker());
    registry.advance(0);
    expect(() => registry.advance(9)).toThrow(IndexNotFoundError);

    expect(facade.recordProgress).toHaveBeenNthCalledWith(1, 'BoardCreated', {
      index: 0,
      currentHeight: 3,
    });
    expect(facade.recordProgress).toHaveBeenNthCalledWith(2, 'BoardAdvanced', {
      index: 0,
      currentHeight: 3,
      previousHeight: 0,
    });
    expect(facade.recordWarning).toHaveBeenCalledWith('BoardNotFound', { index: 9 });
  });
});
