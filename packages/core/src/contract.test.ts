import { afterEach, describe, expect, it } from 'vitest';

import { FIELD_LEN } from './bit-board.js';
import { createIntervalClock, createManualClock } from './clock.js';
import { BoardContract } from './contract.js';
import { createBufferedDiagnosticSink } from './diagnostics.js';
import {
  IndexNotFoundError,
  InvalidBufferLengthError,
  InvalidSnapshotError,
  RegistryNotInitializedError,
} from './errors.js';
import { resetTelemetry } from './telemetry.js';

const EMPTY_ROW = '.'.repeat(16);

function fieldWithFirstByte(value: number): Uint8Array {
  const field = new Uint8Array(FIELD_LEN);
  field[0] = value;
  return field;
}

describe('BoardContract', () => {
  afterEach(() => {
    resetTelemetry();
  });

  it('rejects every operation before initialization', () => {
    const contract = new BoardContract({ clock: createManualClock() });

    expect(contract.isInitialized).toBe(false);
    expect(() => contract.createBoard(new Uint8Array(FIELD_LEN))).toThrow(
      RegistryNotInitializedError,
    );
    expect(() => contract.getBoard(0)).toThrow(RegistryNotInitializedError);
    expect(() => contract.stepBoard(0)).toThrow(RegistryNotInitializedError);
    expect(() => contract.snapshot()).toThrow(RegistryNotInitializedError);
  });

  it('initializes once and keeps existing boards on repeat calls', () => {
    const contract = new BoardContract({ clock: createManualClock() });

    expect(contract.initialize()).toBe(true);
    contract.createBoard(new Uint8Array(FIELD_LEN));
    expect(contract.initialize()).toBe(false);
    expect(contract.boardCount).toBe(1);
  });

  it('creates and reads back a board unchanged', () => {
    const contract = new BoardContract({ clock: createManualClock(1) });
    contract.initialize();
    const field = fieldWithFirstByte(24);

    const index = contract.createBoard(field);
    const generation = contract.getBoard(0);

    expect(index).toBe(0);
    expect(generation?.board.toBytes()).toEqual(field);
    expect(generation?.currentHeight).toBe(1);
    expect(generation?.previousHeight).toBe(0);
  });

  it('creates nothing when the field has the wrong length', () => {
    const contract = new BoardContract({ clock: createManualClock() });
    contract.initialize();

    expect(() => contract.createBoard(new Uint8Array(33))).toThrow(
      InvalidBufferLengthError,
    );
    expect(contract.boardCount).toBe(0);
  });

  it('returns undefined for unknown boards and fails loudly when stepping them', () => {
    const contract = new BoardContract({ clock: createManualClock() });
    contract.initialize();

    expect(contract.getBoard(0)).toBeUndefined();
    expect(() => contract.stepBoard(0)).toThrow(IndexNotFoundError);
  });

  it('logs board rows on create, read and step', () => {
    const sink = createBufferedDiagnosticSink();
    const clock = createManualClock();
    const contract = new BoardContract({ clock, diagnostics: sink });
    contract.initialize();

    contract.createBoard(fieldWithFirstByte(24));
    expect(sink.lines).toHaveLength(16);
    expect(sink.lines[0]).toBe('...XX...........');

    sink.clear();
    contract.getBoard(0);
    expect(sink.lines).toHaveLength(16);

    sink.clear();
    contract.stepBoard(0);
    expect(sink.lines).toHaveLength(34);
    expect(sink.lines[0]).toBe('Old board');
    expect(sink.lines[1]).toBe('...XX...........');
    expect(sink.lines[17]).toBe('New board');
    expect(sink.lines[18]).toBe(EMPTY_ROW);
  });

  it('honours glyph and logging configuration', () => {
    const sink = createBufferedDiagnosticSink();
    const contract = new BoardContract({
      clock: createManualClock(),
      diagnostics: sink,
      config: {
        render: { aliveGlyph: '#', deadGlyph: '-' },
        diagnostics: { logReads: false },
      },
    });
    contract.initialize();

    contract.createBoard(fieldWithFirstByte(1));
    expect(sink.lines[0]).toBe(`#${'-'.repeat(15)}`);

    sink.clear();
    const generation = contract.getBoard(0);
    expect(sink.lines).toEqual([]);
    expect(generation && contract.renderRows(generation)[0]).toBe(`#${'-'.repeat(15)}`);
  });

  it('keeps working when the diagnostic sink throws', () => {
    const contract = new BoardContract({
      clock: createManualClock(),
      diagnostics: {
        writeLine() {
          throw new Error('sink offline');
        },
      },
    });
    contract.initialize();

    expect(contract.createBoard(fieldWithFirstByte(7))).toBe(0);
    expect(contract.stepBoard(0).board.liveCellCount()).toBe(2);
  });

  it('round-trips its registry through a snapshot', () => {
    const clock = createManualClock(3);
    const contract = new BoardContract({ clock });
    contract.initialize();
    contract.createBoard(fieldWithFirstByte(7));
    clock.advance();
    contract.stepBoard(0);

    const restored = new BoardContract({ clock });
    restored.restore(JSON.parse(JSON.stringify(contract.snapshot(0))));

    expect(restored.isInitialized).toBe(true);
    expect(restored.getBoard(0)).toMatchObject({ currentHeight: 4, previousHeight: 3 });
    expect(restored.getBoard(0)?.board.toBytes()).toEqual(
      contract.getBoard(0)?.board.toBytes(),
    );
  });

  it('hands out stored boards that cannot be written through', () => {
    const contract = new BoardContract({ clock: createManualClock() });
    contract.initialize();
    contract.createBoard(fieldWithFirstByte(24));

    const board = contract.getBoard(0)?.board;
    expect(board).toBeDefined();
    expect(Object.isFrozen(board)).toBe(true);
    expect(board !== undefined && 'setBit' in board).toBe(false);

    const bytes = board?.toBytes();
    if (bytes) {
      bytes[0] = 0xff;
    }
    expect(contract.getBoard(0)?.board.isSet(0, 0)).toBe(false);
    expect(contract.getBoard(0)?.board.toBytes()[0]).toBe(24);
  });

  it('keeps stepped snapshots loadable when the wall clock reads behind restored heights', () => {
    const clock = createIntervalClock({ genesisMs: 0, intervalMs: 1_000, now: () => 5_000 });
    const contract = new BoardContract({ clock });
    contract.restore({
      version: 1,
      savedAt: 0,
      boards: [{ field: `${'A'.repeat(43)}=`, currentHeight: 100, previousHeight: 90 }],
    });

    expect(contract.highestHeight).toBe(100);
    clock.raiseFloor(contract.highestHeight);
    const stepped = contract.stepBoard(0);
    expect(stepped).toMatchObject({ currentHeight: 100, previousHeight: 90 });

    const reloaded = new BoardContract({ clock: createManualClock() });
    reloaded.restore(JSON.parse(JSON.stringify(contract.snapshot(1))));
    expect(reloaded.getBoard(0)).toMatchObject({ currentHeight: 100, previousHeight: 90 });
  });

  it('leaves state untouched when a snapshot is invalid', () => {
    const contract = new BoardContract({ clock: createManualClock() });

    expect(() => contract.restore({ version: 1, boards: [null] })).toThrow(
      InvalidSnapshotError,
    );
    expect(contract.isInitialized).toBe(false);
  });
});
