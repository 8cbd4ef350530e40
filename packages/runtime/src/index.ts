// @logitrace/runtime
// Infers logistics events from host world notifications

// Session (the entry point)
export {
  LogisticsSession,
  type LogisticsSessionOptions,
} from './session/session.js';
export {
  ActorStateStore,
  EntitySnapshotStore,
  entityKeyOf,
  type ActorObservationState,
  type OpenContainer,
  type TrackedContainer,
} from './session/state.js';

// Error types
export {
  RuntimeError,
  ValidationError,
  MalformedNotificationError,
  FeedIdentifierError,
  ConfigurationError,
} from './errors.js';

// Configuration
export {
  DEFAULT_SCAN_INTERVAL_TICKS,
  DEFAULT_QUIESCENCE_WINDOW_TICKS,
  resolveConfig,
  loadConfigFromEnv,
  type TrackerConfig,
  type TrackerConfigInput,
} from './config.js';

// Logging
export {
  consoleLogger,
  silentLogger,
  createCapturingLogger,
  errorMessage,
  type Logger,
  type LogEntry,
} from './logging.js';

// Item keys
export { encodeItemKey, decodeItemKey, normalizeQuality, itemKeyFromStack } from './items/codec.js';

// Snapshots and deltas
export {
  EMPTY_SNAPSHOT,
  snapshotInventory,
  snapshotEntity,
  listEntityContainers,
  mergeSnapshots,
  snapshotTotal,
  type EntityContainer,
} from './inventory/snapshot.js';
export { diffSnapshots, diffComposite, negateDelta, isEmptyDelta, entriesWithSign } from './inventory/delta.js';
export {
  DEFAULT_SLOT_SPEC,
  FALLBACK_SLOT_NAME,
  type SlotSpec,
  type SlotSpecEntry,
} from './inventory/slots.js';

// Inference
export {
  resolveInventoryChange,
  type ExpectedSign,
  type ResolvedChange,
} from './inference/resolver.js';
export { LogisticsEventEmitter, type EventEmitterOptions } from './events/emitter.js';
export {
  composeNotification,
  WORLD_LOCATION,
  LOGISTIC_NETWORK_LOCATION,
  UNIDENTIFIED_ROBOT,
  playerActor,
  robotActor,
  playerInventoryLocation,
  groundLocation,
  craftingLocation,
  entityLocation,
  type ComposerContext,
  type NotificationHandler,
} from './composer/index.js';

// Monitoring
export {
  Watchlist,
  type WatchEntry,
  type WatchlistOptions,
  type WatchlistTiming,
  type ScanResult,
} from './monitoring/watchlist.js';

// Ingestion
export {
  parseNotification,
  isEntityHandle,
  isInventoryHandle,
  isItemStackHandle,
  isPlayerHandle,
  isRobotHandle,
} from './ingestion/index.js';

// Feed
export { createFeedApi, ServiceDirectory, publishFeed, connectToFeed } from './feed/index.js';

// Archive
export {
  createArchiveForwarder,
  type ArchiveForwarder,
  type ArchiveForwarderOptions,
} from './archive/index.js';
