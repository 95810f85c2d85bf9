import { InvalidBufferLengthError } from './errors.js';

export const BOARD_WIDTH = 16;
export const BOARD_HEIGHT = 16;

/**
 * Byte length of a packed board: one bit per cell, row-major, least
 * significant bit first within each byte.
 */
export const FIELD_LEN = (BOARD_WIDTH / 8) * BOARD_HEIGHT;

export interface BoardGlyphs {
  readonly alive: string;
  readonly dead: string;
}

export const DEFAULT_BOARD_GLYPHS: BoardGlyphs = Object.freeze({
  alive: 'X',
  dead: '.',
});

function locate(x: number, y: number): { byteIndex: number; mask: number } {
  const index = y * BOARD_WIDTH + x;
  return {
    byteIndex: index >> 3,
    mask: 1 << (index & 7),
  };
}

/**
 * Read access to a board. Stored generations only ever expose this view.
 */
export interface ReadonlyBitBoard {
  isSet(x: number, y: number): boolean;
  renderRows(glyphs?: BoardGlyphs): string[];
  liveCellCount(): number;
  equals(other: ReadonlyBitBoard): boolean;
  toBytes(): Uint8Array;
}

/**
 * Fixed-size bit-packed Game of Life grid.
 *
 * Coordinates are not bounds-checked: callers keep `0 <= x < BOARD_WIDTH` and
 * `0 <= y < BOARD_HEIGHT`.
 */
export class BitBoard implements ReadonlyBitBoard {
  private readonly field: Uint8Array;

  private constructor(field: Uint8Array) {
    this.field = field;
  }

  static empty(): BitBoard {
    return new BitBoard(new Uint8Array(FIELD_LEN));
  }

  /**
   * Wraps a copy of the bytes in `bytes`. Rejects anything other than exactly
   * {@link FIELD_LEN} bytes.
   */
  static from(bytes: Uint8Array): BitBoard {
    if (bytes.length !== FIELD_LEN) {
      throw new InvalidBufferLengthError(FIELD_LEN, bytes.length);
    }
    return new BitBoard(Uint8Array.from(bytes));
  }

  isSet(x: number, y: number): boolean {
    const { byteIndex, mask } = locate(x, y);
    return ((this.field[byteIndex] ?? 0) & mask) !== 0;
  }

  setBit(x: number, y: number, value: boolean): void {
    const { byteIndex, mask } = locate(x, y);
    const current = this.field[byteIndex] ?? 0;
    this.field[byteIndex] = value ? current | mask : current & ~mask;
  }

  renderRows(glyphs: BoardGlyphs = DEFAULT_BOARD_GLYPHS): string[] {
    const rows: string[] = [];
    for (let y = 0; y < BOARD_HEIGHT; y += 1) {
      let row = '';
      for (let x = 0; x < BOARD_WIDTH; x += 1) {
        row += this.isSet(x, y) ? glyphs.alive : glyphs.dead;
      }
      rows.push(row);
    }
    return rows;
  }

  liveCellCount(): number {
    let count = 0;
    for (const byte of this.field) {
      let remaining = byte;
      while (remaining !== 0) {
        remaining &= remaining - 1;
        count += 1;
      }
    }
    return count;
  }

  equals(other: ReadonlyBitBoard): boolean {
    const otherField = other instanceof BitBoard ? other.field : other.toBytes();
    for (let index = 0; index < FIELD_LEN; index += 1) {
      if (this.field[index] !== otherField[index]) {
        return false;
      }
    }
    return true;
  }

  toBytes(): Uint8Array {
    return Uint8Array.from(this.field);
  }

  /**
   * Frozen read-only view over a private copy of this board. Later writes to
   * this board do not reach the view.
   */
  toReadonly(): ReadonlyBitBoard {
    const snapshot = new BitBoard(Uint8Array.from(this.field));
    return Object.freeze({
      isSet: (x: number, y: number) => snapshot.isSet(x, y),
      renderRows: (glyphs?: BoardGlyphs) => snapshot.renderRows(glyphs),
      liveCellCount: () => snapshot.liveCellCount(),
      equals: (other: ReadonlyBitBoard) => snapshot.equals(other),
      toBytes: () => snapshot.toBytes(),
    });
  }
}
