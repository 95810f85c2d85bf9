import { Router, type Request, type Response } from 'express';
import { z } from 'zod';

import {
  decodeField,
  IndexNotFoundError,
  InvalidBufferLengthError,
  InvalidFieldEncodingError,
  RegistryNotInitializedError,
  serializeGeneration,
  telemetry,
  type BoardContract,
  type Generation,
  type RegistrySnapshot,
} from '@lifeboard/core';

const createBoardSchema = z.object({
  field: z.string().min(1),
});

const boardIndexSchema = z
  .string()
  .regex(/^(0|[1-9]\d*)$/)
  .transform(Number)
  .pipe(z.number().int().max(Number.MAX_SAFE_INTEGER));

export interface BoardsRouterOptions {
  /**
   * Called with a fresh snapshot after every state change. The response is
   * sent once the returned promise settles.
   */
  readonly persist?: (snapshot: RegistrySnapshot) => Promise<void>;
}

function mapGenerationToResponse(
  contract: BoardContract,
  index: number,
  generation: Generation,
) {
  return {
    index,
    board: serializeGeneration(generation),
    rows: contract.renderRows(generation),
  };
}

function parseBoardIndex(req: Request, res: Response): number | undefined {
  const parsed = boardIndexSchema.safeParse(req.params.index);
  if (!parsed.success) {
    res.status(400).json({
      error: 'InvalidIndex',
      message: `Board index must be a non-negative integer (received ${String(req.params.index)})`,
    });
    return undefined;
  }
  return parsed.data;
}

function sendBoardError(res: Response, error: unknown): void {
  if (error instanceof RegistryNotInitializedError) {
    res.status(409).json({ error: error.code, message: error.message });
    return;
  }
  if (error instanceof IndexNotFoundError) {
    res.status(404).json({
      error: error.code,
      message: error.message,
      index: error.index,
    });
    return;
  }
  if (error instanceof InvalidBufferLengthError) {
    res.status(400).json({
      error: error.code,
      message: error.message,
      expectedLength: error.expectedLength,
      actualLength: error.actualLength,
    });
    return;
  }
  if (error instanceof InvalidFieldEncodingError) {
    res.status(400).json({ error: error.code, message: error.message });
    return;
  }

  console.error('[boards] request failed', error);
  res.status(500).json({ error: 'internal_error' });
}

export function createBoardsRouter(
  contract: BoardContract,
  options: BoardsRouterOptions = {},
): Router {
  const boardsRouter: ReturnType<typeof Router> = Router();
  const persist = options.persist ?? (async () => {});

  boardsRouter.post('/initialize', async (_req: Request, res: Response) => {
    try {
      const created = contract.initialize();
      if (!created) {
        return res.status(200).json({ status: 'exists', boardCount: contract.boardCount });
      }
      await persist(contract.snapshot());
      res.status(201).json({ status: 'initialized', boardCount: 0 });
    } catch (error) {
      sendBoardError(res, error);
    }
  });

  boardsRouter.post('/', async (req: Request, res: Response) => {
    const parsed = createBoardSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({
        error: 'InvalidPayload',
        details: parsed.error.flatten(),
      });
    }

    try {
      const index = contract.createBoard(decodeField(parsed.data.field));
      await persist(contract.snapshot());
      res.status(201).json({ index });
    } catch (error) {
      sendBoardError(res, error);
    }
  });

  boardsRouter.get('/:index', (req: Request, res: Response) => {
    const index = parseBoardIndex(req, res);
    if (index === undefined) {
      return;
    }

    try {
      const generation = contract.getBoard(index);
      if (!generation) {
        telemetry.recordWarning('BoardNotFound', { index });
        sendBoardError(res, new IndexNotFoundError(index));
        return;
      }
      res.json(mapGenerationToResponse(contract, index, generation));
    } catch (error) {
      sendBoardError(res, error);
    }
  });

  boardsRouter.post('/:index/step', async (req: Request, res: Response) => {
    const index = parseBoardIndex(req, res);
    if (index === undefined) {
      return;
    }

    try {
      const generation = contract.stepBoard(index);
      await persist(contract.snapshot());
      res.json(mapGenerationToResponse(contract, index, generation));
    } catch (error) {
      sendBoardError(res, error);
    }
  });

  return boardsRouter;
}
