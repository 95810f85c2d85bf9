export class InvalidBufferLengthError extends Error {
  readonly code = 'InvalidBufferLength';

  constructor(
    readonly expectedLength: number,
    readonly actualLength: number,
  ) {
    super(
      `Board field must be exactly ${expectedLength} bytes (received ${actualLength})`,
    );
    this.name = 'InvalidBufferLengthError';
  }
}

export class InvalidFieldEncodingError extends Error {
  readonly code = 'InvalidFieldEncoding';

  constructor(message = 'Board field is not valid base64 text') {
    super(message);
    this.name = 'InvalidFieldEncodingError';
  }
}

export class IndexNotFoundError extends Error {
  readonly code = 'IndexNotFound';

  constructor(readonly index: number) {
    super(`No board is stored at index ${index}`);
    this.name = 'IndexNotFoundError';
  }
}

export class RegistryNotInitializedError extends Error {
  readonly code = 'RegistryNotInitialized';

  constructor() {
    super('Board registry has not been initialized');
    this.name = 'RegistryNotInitializedError';
  }
}

export class InvalidSnapshotError extends Error {
  readonly code = 'InvalidSnapshot';

  constructor(message: string) {
    super(message);
    this.name = 'InvalidSnapshotError';
  }
}

export type LifeboardError =
  | InvalidBufferLengthError
  | InvalidFieldEncodingError
  | IndexNotFoundError
  | RegistryNotInitializedError
  | InvalidSnapshotError;

export type LifeboardErrorCode = LifeboardError['code'];

export function isLifeboardError(error: unknown): error is LifeboardError {
  return (
    error instanceof InvalidBufferLengthError ||
    error instanceof InvalidFieldEncodingError ||
    error instanceof IndexNotFoundError ||
    error instanceof RegistryNotInitializedError ||
    error instanceof InvalidSnapshotError
  );
}
