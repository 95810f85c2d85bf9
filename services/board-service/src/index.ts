import express from 'express';
import helmet from 'helmet';
import morgan from 'morgan';

import {
  BoardContract,
  createConsoleDiagnosticSink,
  createIntervalClock,
  setTelemetry,
  silentDiagnosticSink,
} from '@lifeboard/core';
import { createPrometheusTelemetry } from '@lifeboard/core/prometheus';

import { loadServiceConfig } from './config.js';
import { createJsonErrorHandler } from './middleware/error-handler.js';
import { createFileSnapshotStore } from './persistence/file-snapshot-store.js';
import { createBoardsRouter } from './routes/boards.js';
import { createMetricsRouter } from './routes/metrics.js';

async function main(): Promise<void> {
  const config = loadServiceConfig();

  const promTelemetry = createPrometheusTelemetry({ prefix: config.metricsPrefix });
  setTelemetry(promTelemetry);

  const clock = createIntervalClock({
    genesisMs: config.genesisMs,
    intervalMs: config.blockIntervalMs,
  });
  const contract = new BoardContract({
    clock,
    diagnostics: config.logBoards ? createConsoleDiagnosticSink() : silentDiagnosticSink,
  });

  const store = createFileSnapshotStore(config.dataFile);
  await store.cleanupStaleTempFiles();
  const saved = await store.read();
  if (saved !== undefined) {
    contract.restore(saved);
    clock.raiseFloor(contract.highestHeight);
    console.log(`Restored ${contract.boardCount} boards from ${store.filePath}`);
  } else {
    console.log('No snapshot found; waiting for POST /boards/initialize');
  }

  const app = express();

  app.use(helmet());
  app.use(express.json());
  app.use(morgan('combined'));

  app.use('/boards', createBoardsRouter(contract, { persist: store.write }));
  app.use('/metrics', createMetricsRouter(promTelemetry.registry));

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  app.use(createJsonErrorHandler());

  app.listen(config.port, () => {
    console.log(`Board service listening on port ${config.port}`);
  });
}

main().catch((error) => {
  console.error('board-service failed to start:', error instanceof Error ? error.message : String(error));
  process.exit(1);
});
