import { decodeBoard, serializeGeneration, type SerializedGeneration } from './board-codec.js';
import type { BlockClock } from './clock.js';
import { InvalidSnapshotError } from './errors.js';
import type { Generation } from './generation.js';
import { BoardRegistry } from './registry.js';
import { isNonEmptyString, isNonNegativeInteger, isRecord } from './validation/primitives.js';
import { REGISTRY_SNAPSHOT_SCHEMA_VERSION } from './version.js';

export type RegistrySnapshotV1 = Readonly<{
  readonly version: 1;
  readonly savedAt: number;
  readonly boards: readonly SerializedGeneration[];
}>;

export type RegistrySnapshot = RegistrySnapshotV1;

export function serializeRegistry(
  registry: BoardRegistry,
  savedAt: number = Date.now(),
): RegistrySnapshot {
  const boards: SerializedGeneration[] = [];
  for (const generation of registry.entries()) {
    boards.push(serializeGeneration(generation));
  }
  return {
    version: REGISTRY_SNAPSHOT_SCHEMA_VERSION,
    savedAt,
    boards,
  };
}

function hydrateGeneration(value: unknown, position: number): Generation {
  if (!isRecord(value)) {
    throw new InvalidSnapshotError(`Snapshot board ${position} is not an object`);
  }
  const { field, currentHeight, previousHeight } = value;
  if (!isNonEmptyString(field)) {
    throw new InvalidSnapshotError(`Snapshot board ${position} is missing its field`);
  }
  if (!isNonNegativeInteger(currentHeight) || !isNonNegativeInteger(previousHeight)) {
    throw new InvalidSnapshotError(
      `Snapshot board ${position} has invalid heights`,
    );
  }
  if (previousHeight > currentHeight) {
    throw new InvalidSnapshotError(
      `Snapshot board ${position} has previousHeight ${previousHeight} after currentHeight ${currentHeight}`,
    );
  }

  try {
    return { board: decodeBoard(field).toReadonly(), currentHeight, previousHeight };
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new InvalidSnapshotError(`Snapshot board ${position} is unreadable: ${reason}`);
  }
}

/**
 * Rebuilds a registry from a persisted snapshot. Either every board is
 * restored or an {@link InvalidSnapshotError} is thrown.
 */
export function hydrateRegistry(value: unknown, clock: BlockClock): BoardRegistry {
  if (!isRecord(value)) {
    throw new InvalidSnapshotError('Snapshot must be an object');
  }
  if (value.version !== REGISTRY_SNAPSHOT_SCHEMA_VERSION) {
    throw new InvalidSnapshotError(
      `Unsupported snapshot version: ${String(value.version)}`,
    );
  }
  if (!Array.isArray(value.boards)) {
    throw new InvalidSnapshotError('Snapshot boards must be an array');
  }

  const generations = value.boards.map((entry: unknown, position: number) =>
    hydrateGeneration(entry, position),
  );
  return new BoardRegistry(clock, generations);
}
