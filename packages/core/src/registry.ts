import type { ReadonlyBitBoard } from './bit-board.js';
import type { BlockClock } from './clock.js';
import { IndexNotFoundError } from './errors.js';
import { createGeneration, stepGeneration, type Generation } from './generation.js';
import { telemetry } from './telemetry.js';
import { isNonNegativeInteger } from './validation/primitives.js';

/**
 * Dense, append-only sequence of generations. Indices are assigned at
 * creation, never reused or reordered; entries are only ever replaced in
 * place by {@link BoardRegistry.advance}.
 */
export class BoardRegistry {
  private readonly generations: Generation[];

  constructor(
    private readonly clock: BlockClock,
    initial: readonly Generation[] = [],
  ) {
    this.generations = [...initial];
  }

  get size(): number {
    return this.generations.length;
  }

  create(board: ReadonlyBitBoard): number {
    const generation = createGeneration(board, this.clock);
    const index = this.generations.length;
    this.generations.push(generation);
    telemetry.recordProgress('BoardCreated', {
      index,
      currentHeight: generation.currentHeight,
    });
    return index;
  }

  get(index: number): Generation | undefined {
    if (!this.has(index)) {
      return undefined;
    }
    return this.generations[index];
  }

  require(index: number): Generation {
    const generation = this.get(index);
    if (!generation) {
      telemetry.recordWarning('BoardNotFound', { index });
      throw new IndexNotFoundError(index);
    }
    return generation;
  }

  advance(index: number): Generation {
    const parent = this.require(index);
    const successor = stepGeneration(parent, this.clock);
    this.generations[index] = successor;
    telemetry.recordProgress('BoardAdvanced', {
      index,
      currentHeight: successor.currentHeight,
      previousHeight: successor.previousHeight,
    });
    return successor;
  }

  has(index: number): boolean {
    return isNonNegativeInteger(index) && index < this.generations.length;
  }

  entries(): IterableIterator<Generation> {
    return this.generations.values();
  }
}
