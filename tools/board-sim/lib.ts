import {
  BitBoard,
  BOARD_HEIGHT,
  BOARD_WIDTH,
  BoardContract,
  createManualClock,
  decodeField,
  type Generation,
} from '@lifeboard/core';

export type Cell = readonly [x: number, y: number];

export const GLIDER_FRAGMENT: readonly Cell[] = [
  [4, 4],
  [5, 4],
  [6, 4],
  [6, 3],
  [6, 2],
];

export interface CliArgs {
  steps: number;
  cells?: Cell[];
  field?: string;
  holdHeight: boolean;
  help: boolean;
}

export class CliUsageError extends Error {
  readonly code = 'CliUsage' as const;

  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

function requireValue(argv: readonly string[], index: number, flag: string): string {
  const value = argv[index];
  if (value === undefined || value.startsWith('--')) {
    throw new CliUsageError(`${flag} requires a value`);
  }
  return value;
}

export function parseArgs(argv: readonly string[]): CliArgs {
  const args: CliArgs = {
    steps: Number.NaN,
    holdHeight: false,
    help: false,
  };

  for (let i = 0; i < argv.length; i += 1) {
    const a = argv[i];
    if (a === '--steps') {
      const raw = requireValue(argv, ++i, a);
      args.steps = /^\d+$/.test(raw) ? Number(raw) : Number.NaN;
    } else if (a === '--cells') {
      args.cells = parseCells(requireValue(argv, ++i, a));
    } else if (a === '--field') {
      args.field = requireValue(argv, ++i, a);
    } else if (a === '--hold-height') {
      args.holdHeight = true;
    } else if (a === '--help' || a === '-h') {
      args.help = true;
      return args;
    } else {
      throw new CliUsageError(`Unknown argument: ${a ?? ''}`);
    }
  }

  if (!Number.isSafeInteger(args.steps) || args.steps <= 0) {
    throw new CliUsageError('--steps <n> must be a positive integer');
  }
  if (args.cells && args.field !== undefined) {
    throw new CliUsageError('--cells and --field cannot be combined');
  }

  return args;
}

/**
 * Parses `x,y;x,y` into board coordinates. Empty segments are ignored.
 */
export function parseCells(text: string): Cell[] {
  const cells: Cell[] = [];
  for (const segment of text.split(';')) {
    const trimmed = segment.trim();
    if (trimmed === '') {
      continue;
    }
    const match = /^(\d+)\s*,\s*(\d+)$/.exec(trimmed);
    const x = match ? Number(match[1]) : Number.NaN;
    const y = match ? Number(match[2]) : Number.NaN;
    if (!(x < BOARD_WIDTH && y < BOARD_HEIGHT)) {
      throw new CliUsageError(
        `Invalid cell "${trimmed}": expected x,y with 0 <= x < ${BOARD_WIDTH} and 0 <= y < ${BOARD_HEIGHT}`,
      );
    }
    cells.push([x, y]);
  }
  return cells;
}

export function seedBoard(args: Pick<CliArgs, 'cells' | 'field'>): BitBoard {
  if (args.field !== undefined) {
    return BitBoard.from(decodeField(args.field));
  }
  const board = BitBoard.empty();
  for (const [x, y] of args.cells ?? GLIDER_FRAGMENT) {
    board.setBit(x, y, true);
  }
  return board;
}

export interface SimulationFrame {
  step: number;
  currentHeight: number;
  previousHeight: number;
  liveCells: number;
  rows: string[];
}

export interface SimulationOptions {
  seed: BitBoard;
  steps: number;
  holdHeight?: boolean;
}

/**
 * Registers `seed` on a fresh contract and advances it `steps` times. Frame 0
 * is the seeded board; frame k is the board after k steps.
 */
export function runSimulation(options: SimulationOptions): SimulationFrame[] {
  const clock = createManualClock();
  const contract = new BoardContract({ clock });
  contract.initialize();
  const index = contract.createBoard(options.seed.toBytes());

  const toFrame = (step: number, generation: Generation): SimulationFrame => ({
    step,
    currentHeight: generation.currentHeight,
    previousHeight: generation.previousHeight,
    liveCells: generation.board.liveCellCount(),
    rows: contract.renderRows(generation),
  });

  const seeded = contract.getBoard(index);
  if (!seeded) {
    throw new Error(`Seeded board ${index} is missing from the registry`);
  }

  const frames = [toFrame(0, seeded)];
  for (let step = 1; step <= options.steps; step += 1) {
    if (!options.holdHeight) {
      clock.advance();
    }
    frames.push(toFrame(step, contract.stepBoard(index)));
  }
  return frames;
}

export function formatFrame(frame: SimulationFrame): string {
  const header =
    `Step #${frame.step} height=${frame.currentHeight} ` +
    `prev=${frame.previousHeight} live=${frame.liveCells}`;
  return [header, ...frame.rows].join('\n');
}
