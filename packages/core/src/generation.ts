import {
  BitBoard,
  BOARD_HEIGHT,
  BOARD_WIDTH,
  type ReadonlyBitBoard,
} from './bit-board.js';
import type { BlockClock } from './clock.js';

/**
 * A board snapshot plus the clock heights describing when it was produced.
 */
export interface Generation {
  readonly board: ReadonlyBitBoard;
  /**
   * Clock height at which this generation was produced.
   */
  readonly currentHeight: number;
  /**
   * Height of the previous distinct production event, or 0 if none. Repeated
   * steps at the same height carry this value over unchanged.
   */
  readonly previousHeight: number;
}

export function createGeneration(board: ReadonlyBitBoard, clock: BlockClock): Generation {
  return {
    board: BitBoard.from(board.toBytes()).toReadonly(),
    currentHeight: clock.now(),
    previousHeight: 0,
  };
}

/**
 * Counts live cells in the 3×3 block around (x, y), excluding the centre.
 * Off-board neighbours count as dead; there is no wraparound.
 *
 * The scan runs over offsets 0..2 on a grid shifted by one, so bounds are
 * `[1, BOARD_WIDTH] × [1, BOARD_HEIGHT]` before shifting back.
 */
export function countLiveNeighbors(board: ReadonlyBitBoard, x: number, y: number): number {
  let count = 0;
  for (let offY = 0; offY <= 2; offY += 1) {
    const shiftedY = y + offY;
    for (let offX = 0; offX <= 2; offX += 1) {
      if (offX === 1 && offY === 1) {
        continue;
      }
      const shiftedX = x + offX;
      if (
        shiftedY >= 1 &&
        shiftedX >= 1 &&
        shiftedY <= BOARD_HEIGHT &&
        shiftedX <= BOARD_WIDTH &&
        board.isSet(shiftedX - 1, shiftedY - 1)
      ) {
        count += 1;
      }
    }
  }
  return count;
}

export function nextCellState(alive: boolean, liveNeighbors: number): boolean {
  // Kept in this exact form for bit-for-bit parity with stored histories.
  return (alive && liveNeighbors === 2) || liveNeighbors === 3;
}

export function computeNextBoard(board: ReadonlyBitBoard): BitBoard {
  const next = BitBoard.empty();
  for (let y = 0; y < BOARD_HEIGHT; y += 1) {
    for (let x = 0; x < BOARD_WIDTH; x += 1) {
      if (nextCellState(board.isSet(x, y), countLiveNeighbors(board, x, y))) {
        next.setBit(x, y, true);
      }
    }
  }
  return next;
}

/**
 * Produces the successor generation without mutating `parent`.
 */
export function stepGeneration(parent: Generation, clock: BlockClock): Generation {
  const board = computeNextBoard(parent.board).toReadonly();
  const height = clock.now();
  const previousHeight =
    height === parent.currentHeight ? parent.previousHeight : parent.currentHeight;

  return {
    board,
    currentHeight: height,
    previousHeight,
  };
}
