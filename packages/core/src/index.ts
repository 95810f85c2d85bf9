export {
  BitBoard,
  BOARD_HEIGHT,
  BOARD_WIDTH,
  DEFAULT_BOARD_GLYPHS,
  FIELD_LEN,
  type BoardGlyphs,
  type ReadonlyBitBoard,
} from './bit-board.js';
export {
  decodeBoard,
  decodeField,
  encodeBoard,
  encodeField,
  serializeGeneration,
  type SerializedGeneration,
} from './board-codec.js';
export {
  createIntervalClock,
  createManualClock,
  type BlockClock,
  type IntervalClock,
  type IntervalClockOptions,
  type ManualClock,
} from './clock.js';
export {
  DEFAULT_LIFEBOARD_CONFIG,
  resolveLifeboardConfig,
  type LifeboardConfig,
  type LifeboardConfigOverrides,
} from './config.js';
export { BoardContract, type BoardContractOptions } from './contract.js';
export {
  createBufferedDiagnosticSink,
  createConsoleDiagnosticSink,
  guardDiagnosticSink,
  silentDiagnosticSink,
  type BufferedDiagnosticSink,
  type DiagnosticSink,
} from './diagnostics.js';
export {
  IndexNotFoundError,
  InvalidBufferLengthError,
  InvalidFieldEncodingError,
  InvalidSnapshotError,
  isLifeboardError,
  RegistryNotInitializedError,
  type LifeboardError,
  type LifeboardErrorCode,
} from './errors.js';
export {
  computeNextBoard,
  countLiveNeighbors,
  createGeneration,
  nextCellState,
  stepGeneration,
  type Generation,
} from './generation.js';
export { BoardRegistry } from './registry.js';
export {
  hydrateRegistry,
  serializeRegistry,
  type RegistrySnapshot,
  type RegistrySnapshotV1,
} from './registry-save.js';
export {
  createConsoleTelemetry,
  resetTelemetry,
  setTelemetry,
  silentTelemetry,
  telemetry,
  type TelemetryEventData,
  type TelemetryFacade,
} from './telemetry.js';
export { CORE_VERSION, REGISTRY_SNAPSHOT_SCHEMA_VERSION } from './version.js';
