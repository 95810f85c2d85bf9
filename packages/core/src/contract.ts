import { BitBoard, type BoardGlyphs, type ReadonlyBitBoard } from './bit-board.js';
import type { BlockClock } from './clock.js';
import {
  resolveLifeboardConfig,
  type LifeboardConfig,
  type LifeboardConfigOverrides,
} from './config.js';
import {
  guardDiagnosticSink,
  silentDiagnosticSink,
  writeLines,
  type DiagnosticSink,
} from './diagnostics.js';
import { RegistryNotInitializedError } from './errors.js';
import { telemetry } from './telemetry.js';
import type { Generation } from './generation.js';
import { BoardRegistry } from './registry.js';
import {
  hydrateRegistry,
  serializeRegistry,
  type RegistrySnapshot,
} from './registry-save.js';

export interface BoardContractOptions {
  readonly clock: BlockClock;
  readonly diagnostics?: DiagnosticSink;
  readonly config?: LifeboardConfigOverrides;
}

/**
 * The externally callable surface: explicit initialization followed by
 * create, read and single-step operations against one registry.
 *
 * Every operation runs synchronously to completion; hosts serialize calls.
 */
export class BoardContract {
  private registry: BoardRegistry | undefined;
  private readonly clock: BlockClock;
  private readonly diagnostics: DiagnosticSink;
  private readonly glyphs: BoardGlyphs;
  readonly config: LifeboardConfig;

  constructor(options: BoardContractOptions) {
    this.clock = options.clock;
    this.diagnostics = guardDiagnosticSink(
      options.diagnostics ?? silentDiagnosticSink,
    );
    this.config = resolveLifeboardConfig(options.config);
    this.glyphs = {
      alive: this.config.render.aliveGlyph,
      dead: this.config.render.deadGlyph,
    };
  }

  get isInitialized(): boolean {
    return this.registry !== undefined;
  }

  /**
   * Sets up an empty registry. Returns `false` and changes nothing when the
   * contract is already initialized.
   */
  initialize(): boolean {
    if (this.registry) {
      return false;
    }
    this.registry = new BoardRegistry(this.clock);
    telemetry.recordProgress('RegistryInitialized', { boardCount: 0 });
    return true;
  }

  /**
   * Replaces any current state with the boards from a persisted snapshot.
   */
  restore(snapshot: unknown): void {
    const registry = hydrateRegistry(snapshot, this.clock);
    this.registry = registry;
    telemetry.recordProgress('RegistryRestored', { boardCount: registry.size });
  }

  createBoard(field: Uint8Array): number {
    const registry = this.requireRegistry();
    const board = BitBoard.from(field);
    if (this.config.diagnostics.logWrites) {
      this.logBoard(board);
    }
    return registry.create(board);
  }

  getBoard(index: number): Generation | undefined {
    const generation = this.requireRegistry().get(index);
    if (generation && this.config.diagnostics.logReads) {
      this.logBoard(generation.board);
    }
    return generation;
  }

  stepBoard(index: number): Generation {
    const registry = this.requireRegistry();
    const logWrites = this.config.diagnostics.logWrites;
    const parent = registry.require(index);
    if (logWrites) {
      this.diagnostics.writeLine('Old board');
      this.logBoard(parent.board);
    }
    const successor = registry.advance(index);
    if (logWrites) {
      this.diagnostics.writeLine('New board');
      this.logBoard(successor.board);
    }
    return successor;
  }

  get boardCount(): number {
    return this.requireRegistry().size;
  }

  /**
   * Largest `currentHeight` among stored boards, or 0 when there are none.
   */
  get highestHeight(): number {
    let highest = 0;
    for (const generation of this.requireRegistry().entries()) {
      highest = Math.max(highest, generation.currentHeight);
    }
    return highest;
  }

  renderRows(generation: Generation): string[] {
    return generation.board.renderRows(this.glyphs);
  }

  snapshot(savedAt?: number): RegistrySnapshot {
    return serializeRegistry(this.requireRegistry(), savedAt);
  }

  private logBoard(board: ReadonlyBitBoard): void {
    writeLines(this.diagnostics, board.renderRows(this.glyphs));
  }

  private requireRegistry(): BoardRegistry {
    if (!this.registry) {
      throw new RegistryNotInitializedError();
    }
    return this.registry;
  }
}
