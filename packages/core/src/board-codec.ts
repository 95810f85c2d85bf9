import { BitBoard, FIELD_LEN, type ReadonlyBitBoard } from './bit-board.js';
import { InvalidBufferLengthError, InvalidFieldEncodingError } from './errors.js';
import type { Generation } from './generation.js';

const BASE64_PATTERN =
  /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

/**
 * Wire representation of a stored generation.
 */
export interface SerializedGeneration {
  readonly field: string;
  readonly currentHeight: number;
  readonly previousHeight: number;
}

export function encodeField(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString(
    'base64',
  );
}

/**
 * Decodes base64 text into exactly {@link FIELD_LEN} bytes.
 */
export function decodeField(text: string): Uint8Array {
  if (!BASE64_PATTERN.test(text)) {
    throw new InvalidFieldEncodingError();
  }
  const decoded = Buffer.from(text, 'base64');
  if (decoded.byteLength !== FIELD_LEN) {
    throw new InvalidBufferLengthError(FIELD_LEN, decoded.byteLength);
  }
  return new Uint8Array(decoded.buffer, decoded.byteOffset, decoded.byteLength);
}

export function decodeBoard(text: string): BitBoard {
  return BitBoard.from(decodeField(text));
}

export function encodeBoard(board: ReadonlyBitBoard): string {
  return encodeField(board.toBytes());
}

export function serializeGeneration(generation: Generation): SerializedGeneration {
  return {
    field: encodeBoard(generation.board),
    currentHeight: generation.currentHeight,
    previousHeight: generation.previousHeight,
  };
}
