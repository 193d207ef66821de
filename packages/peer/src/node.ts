import {
  RecordStore,
  createFilePersistence,
  createLogger,
  createSyncEngine,
  type GossipChannel,
  type MeshLogger,
  type NodeConfig,
  type SyncEngine,
} from '@recipe-mesh/engine';
import { WebSocketGossipChannel } from './transport/websocket-gossip.js';

export type ChannelFactory = (config: NodeConfig, logger: MeshLogger) => Promise<GossipChannel>;

export interface StartNodeOptions {
  logger?: MeshLogger;
  /** Transport to join the mesh with (default: WebSocket flood gossip) */
  createChannel?: ChannelFactory;
}

/**
 * A node that has joined the mesh
 */
export interface RunningNode {
  readonly config: NodeConfig;
  readonly store: RecordStore;
  readonly channel: GossipChannel;
  readonly engine: SyncEngine;
  /** Stop the engine (flushing the store), then leave the mesh. Idempotent. */
  stop(): Promise<void>;
}

/**
 * Start a WebSocket gossip channel listening on the configured address.
 */
export const createWebSocketChannel: ChannelFactory = async (config, logger) => {
  const channel = new WebSocketGossipChannel({
    localId: config.nodeId,
    host: config.host,
    port: config.port,
    bootstrapPeers: config.bootstrapPeers,
    maxPayloadBytes: config.maxPayloadBytes,
    logger,
  });
  await channel.start();
  return channel;
};

/**
 * Open the node's store, join the mesh and start the sync engine.
 *
 * @example
 * ```typescript
 * const node = await startNode(parseNodeConfig({ nodeId: 'peer-a', storagePath: './a.json' }));
 * await node.engine.execute({ type: 'request-from', target: ALL_PEERS });
 * await node.stop();
 * ```
 */
export async function startNode(config: NodeConfig, options: StartNodeOptions = {}): Promise<RunningNode> {
  const logger = options.logger ?? createLogger({ level: config.logLevel, module: 'node' });
  const createChannel = options.createChannel ?? createWebSocketChannel;

  const storeLogger = logger.child('store');
  const store = await RecordStore.open({
    localId: config.nodeId,
    persistence: createFilePersistence(config.storagePath, storeLogger),
    logger: storeLogger,
  });

  const channel = await createChannel(config, logger.child('gossip'));
  const engine = createSyncEngine({
    store,
    channel,
    maxPayloadBytes: config.maxPayloadBytes,
    logger: logger.child('engine'),
  });

  let stopping: Promise<void> | null = null;
  const stop = (): Promise<void> => {
    stopping ??= (async () => {
      await engine.shutdown();
      await channel.close();
      logger.info('Node stopped', { nodeId: config.nodeId });
    })();
    return stopping;
  };

  logger.info('Node started', { nodeId: config.nodeId, records: store.size });
  return { config, store, channel, engine, stop };
}
