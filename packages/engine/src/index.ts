/**
 * @recipe-mesh/engine - replicated recipe store over a gossip mesh
 *
 * @module @recipe-mesh/engine
 */

// Errors
export * from './errors/index.js';

// Logging
export {
  LOG_LEVELS,
  MeshLogger,
  createLogger,
  noopLogger,
  type LogEntry,
  type LogLevel,
  type Logger,
  type MeshLoggerConfig,
} from './observability/logger.js';

// Data model
export {
  MAX_INGREDIENTS_LENGTH,
  MAX_INSTRUCTIONS_LENGTH,
  MAX_NAME_LENGTH,
  MAX_PUBLISHER_ID_LENGTH,
  isOwnedBy,
  recipeDraftSchema,
  recipeSchema,
  recordKey,
  toFieldErrors,
  type Recipe,
  type RecipeDraft,
} from './types/recipe.js';
export {
  ALL_PEERS,
  describeTarget,
  meshMessageSchema,
  peerTarget,
  peerTargetSchema,
  targetsNode,
  type MeshMessage,
  type MeshMessageType,
  type PeerTarget,
  type QueryRequest,
  type RecordsAnnounce,
} from './types/message.js';

// Wire codec
export {
  DEFAULT_MAX_PAYLOAD_BYTES,
  decodeMessage,
  encodeAnnounce,
  encodeMessage,
  type DecodeOptions,
} from './protocol/codec.js';

// Store
export { RecordStore, type RecordStoreOptions } from './store/record-store.js';
export type { RecordPersistence } from './store/persistence.js';
export { FilePersistence, createFilePersistence } from './store/file-persistence.js';
export { MemoryPersistence, createMemoryPersistence } from './store/memory-persistence.js';

// Gossip
export type { GossipChannel, GossipDelivery } from './gossip/types.js';
export {
  MemoryGossipChannel,
  MemoryGossipNetwork,
  createMemoryGossipNetwork,
} from './gossip/memory-gossip.js';

// Engine
export {
  fail,
  succeed,
  type CommandOutcome,
  type CommandResult,
  type PublishSelector,
  type SyncCommand,
  type SyncCommandType,
} from './engine/commands.js';
export { EventMux } from './engine/event-mux.js';
export { PeerDirectory } from './engine/peer-directory.js';
export {
  SyncEngine,
  createSyncEngine,
  type EngineEvent,
  type EngineState,
  type SyncEngineOptions,
  type SyncStats,
} from './engine/sync-engine.js';

// Configuration
export {
  DEFAULT_HOST,
  DEFAULT_PORT,
  DEFAULT_STORAGE_PATH,
  isLogLevel,
  nodeConfigSchema,
  parseNodeConfig,
  peerAddressSchema,
  type NodeConfig,
  type NodeConfigInput,
} from './config/node-config.js';
