export { CircleContext } from './circle-context.js';
export { CaptureMemory } from './capture.js';
export type { CaptureDeps, CaptureSettings } from './capture.js';
export { RecallMemory } from './recall.js';
export type { RecallDeps, RecallRequest, RecallSettings } from './recall.js';
export { PurgeMemory } from './purge.js';
export { TtlSweeper } from './ttl-sweeper.js';
export type { TtlSweeperOptions } from './ttl-sweeper.js';
export { attachTraySurface } from './tray.js';
export { HashingEmbeddingProvider, tokenize } from './hashing-embedder.js';
export type { HashingEmbeddingOptions } from './hashing-embedder.js';
export { MemoryRuntime } from './runtime.js';
export type { RuntimeCollaborators, RuntimeOptions } from './runtime.js';
export { withTimeout } from './timeout.js';
export { embedText } from './embedding.js';
export type {
  EmbeddingProvider,
  ClipboardProvider,
  KeystrokeProvider,
  Picker,
  PickerRequest,
  PurgeNotice,
  TextRead,
  TraySurface,
} from './collaborators.js';
export type {
  CaptureOutcome,
  CaptureSource,
  RecallOutcome,
  PurgeOutcome,
  ReferenceSource,
  ReferenceText,
} from './types.js';
