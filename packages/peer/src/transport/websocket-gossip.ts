import { randomBytes } from 'node:crypto';
import type { IncomingMessage } from 'node:http';
import {
  ChannelError,
  DEFAULT_MAX_PAYLOAD_BYTES,
  ensureMeshError,
  noopLogger,
  type GossipChannel,
  type GossipDelivery,
  type Logger,
} from '@recipe-mesh/engine';
import { BehaviorSubject, Subject, type Observable } from 'rxjs';
import { WebSocket, WebSocketServer } from 'ws';
import { wrapWebSocket, type FrameSocket } from './frame-socket.js';
import { maxFrameBytes, parseFrame, serializeFrame, type Frame, type GossipFrame } from './frames.js';
import { SeenCache } from './seen-cache.js';

/**
 * WebSocket gossip configuration
 */
export interface WebSocketGossipConfig {
  /** Identity announced to peers */
  localId: string;
  /** Interface to listen on (default: '0.0.0.0') */
  host?: string;
  /** Port to listen on, 0 for any free port (default: 4001) */
  port?: number;
  /** `host:port` addresses dialed at start */
  bootstrapPeers?: readonly string[];
  /** Payload bound; larger frames are refused by the socket */
  maxPayloadBytes?: number;
  /** Message ids remembered for deduplication (default: 4096) */
  seenCacheSize?: number;
  /** Base redial delay in ms, doubled per attempt (default: 1000) */
  reconnectDelay?: number;
  /** Redial attempts per bootstrap peer (default: 5) */
  maxReconnectAttempts?: number;
  logger?: Logger;
}

interface Connection {
  readonly socket: FrameSocket;
  readonly label: string;
  peerId: string | null;
}

const MAX_REDIAL_DELAY = 30000;

/**
 * Flood-gossip channel over WebSockets.
 *
 * Every node listens for connections and dials its bootstrap peers. Both ends
 * open with a `hello` frame naming their node id; the connected ids are the
 * peer set. A published payload is sent to every neighbour, and each node
 * forwards a frame it has not seen before to every neighbour except the one it
 * came from, so a payload reaches every node of a connected overlay once.
 *
 * @example
 * ```typescript
 * const channel = new WebSocketGossipChannel({
 *   localId: 'peer-a',
 *   port: 4001,
 *   bootstrapPeers: ['10.0.0.2:4001'],
 * });
 * await channel.start();
 *
 * channel.messages$.subscribe(({ from, payload }) => handle(from, payload));
 * await channel.publish(encodeMessage({ type: 'query-request', target: ALL_PEERS }));
 * ```
 */
export class WebSocketGossipChannel implements GossipChannel {
  readonly localId: string;

  private readonly config: Required<Omit<WebSocketGossipConfig, 'logger' | 'localId'>>;
  private readonly logger: Logger;
  private readonly frameLimit: number;
  private readonly seen: SeenCache;

  private server: WebSocketServer | null = null;
  private readonly sockets = new Set<Connection>();
  private readonly connections = new Map<string, Connection>();
  private readonly inbound$ = new Subject<GossipDelivery>();
  private readonly peerSet$ = new BehaviorSubject<ReadonlySet<string>>(new Set());
  private readonly timers = new Set<ReturnType<typeof setTimeout>>();
  private sequence = 0;
  private closed = false;

  constructor(config: WebSocketGossipConfig) {
    this.localId = config.localId;
    this.config = {
      host: config.host ?? '0.0.0.0',
      port: config.port ?? 4001,
      bootstrapPeers: config.bootstrapPeers ?? [],
      maxPayloadBytes: config.maxPayloadBytes ?? DEFAULT_MAX_PAYLOAD_BYTES,
      seenCacheSize: config.seenCacheSize ?? 4096,
      reconnectDelay: config.reconnectDelay ?? 1000,
      maxReconnectAttempts: config.maxReconnectAttempts ?? 5,
    };
    this.logger = config.logger ?? noopLogger;
    this.frameLimit = maxFrameBytes(this.config.maxPayloadBytes);
    this.seen = new SeenCache(this.config.seenCacheSize);
  }

  get messages$(): Observable<GossipDelivery> {
    return this.inbound$.asObservable();
  }

  get peers$(): Observable<ReadonlySet<string>> {
    return this.peerSet$.asObservable();
  }

  peers(): ReadonlySet<string> {
    return this.peerSet$.getValue();
  }

  /**
   * Address the server listens on, once started
   */
  address(): { host: string; port: number } | null {
    const address = this.server?.address();
    if (!address || typeof address === 'string') return null;
    return { host: address.address, port: address.port };
  }

  /**
   * Listen for peers and dial the bootstrap addresses.
   */
  async start(): Promise<void> {
    if (this.server) {
      throw new Error('Gossip channel already started');
    }
    if (this.closed) {
      throw new ChannelError('Gossip channel is closed', { localId: this.localId });
    }

    const server = new WebSocketServer({
      host: this.config.host,
      port: this.config.port,
      maxPayload: this.frameLimit,
    });
    this.server = server;

    await new Promise<void>((resolve, reject) => {
      server.once('listening', () => resolve());
      server.once('error', reject);
    });

    server.on('connection', (socket: WebSocket, request: IncomingMessage) => {
      this.attach(wrapWebSocket(socket), request.socket.remoteAddress ?? 'inbound');
    });
    server.on('error', (error: Error) => {
      this.logger.error('Gossip server error', error);
    });

    this.logger.info('Gossip channel listening', {
      host: this.config.host,
      port: this.address()?.port ?? this.config.port,
    });

    for (const address of this.config.bootstrapPeers) {
      this.dial(address, 0);
    }
  }

  /**
   * Take over a connected socket. Dialed, accepted and test sockets all go
   * through here.
   *
   * @param onDetached called when the socket closes, with whether it had
   * completed the hello exchange
   */
  attach(socket: FrameSocket, label: string, onDetached?: (registered: boolean) => void): void {
    if (this.closed) {
      socket.close();
      return;
    }

    const connection: Connection = { socket, label, peerId: null };
    this.sockets.add(connection);

    socket.onFrame((text) => this.handleFrame(connection, text));
    socket.onError((error) => {
      this.logger.debug('Socket error', { peer: connection.peerId ?? label, reason: error.message });
    });
    socket.onClose(() => {
      this.detach(connection);
      onDetached?.(connection.peerId !== null);
    });

    socket.send(serializeFrame({ kind: 'hello', nodeId: this.localId }));
  }

  async publish(payload: Uint8Array): Promise<void> {
    if (this.closed) {
      throw new ChannelError('Gossip channel is closed', { localId: this.localId });
    }
    if (payload.byteLength > this.config.maxPayloadBytes) {
      throw new ChannelError(
        `Payload of ${payload.byteLength} bytes exceeds the ${this.config.maxPayloadBytes} byte limit`,
        { size: payload.byteLength, maxPayloadBytes: this.config.maxPayloadBytes }
      );
    }

    const frame: GossipFrame = {
      kind: 'gossip',
      id: this.nextMessageId(),
      origin: this.localId,
      payload: Buffer.from(payload).toString('base64'),
    };
    this.seen.add(`${frame.origin}/${frame.id}`);

    const text = serializeFrame(frame);
    for (const connection of this.connections.values()) {
      connection.socket.send(text);
    }
    this.logger.debug('Published gossip', { id: frame.id, bytes: payload.byteLength, peers: this.connections.size });
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    for (const timer of this.timers) clearTimeout(timer);
    this.timers.clear();

    for (const connection of this.sockets) {
      connection.socket.close();
    }
    this.sockets.clear();
    this.connections.clear();
    this.peerSet$.next(new Set());
    this.inbound$.complete();

    const server = this.server;
    this.server = null;
    if (server) {
      await new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
      });
    }
    this.logger.info('Gossip channel closed');
  }

  // ── Frames ─────────────────────────────────────────────

  private handleFrame(connection: Connection, text: string): void {
    if (this.closed) return;

    const result = parseFrame(text);
    if (!result.ok) {
      this.logger.warn('Dropping malformed frame', {
        peer: connection.peerId ?? connection.label,
        reason: result.reason,
      });
      return;
    }

    const frame: Frame = result.frame;
    switch (frame.kind) {
      case 'hello':
        this.handleHello(connection, frame.nodeId);
        return;
      case 'gossip':
        this.handleGossip(connection, frame);
        return;
    }
  }

  private handleHello(connection: Connection, nodeId: string): void {
    if (connection.peerId !== null) return;

    if (nodeId === this.localId) {
      this.logger.debug('Closing connection to self', { peer: connection.label });
      connection.socket.close();
      return;
    }
    if (this.connections.has(nodeId)) {
      this.logger.debug('Closing duplicate connection', { peer: nodeId });
      connection.socket.close();
      return;
    }

    connection.peerId = nodeId;
    this.connections.set(nodeId, connection);
    this.publishPeers();
    this.logger.info('Peer connected', { peer: nodeId, via: connection.label });
  }

  private handleGossip(connection: Connection, frame: GossipFrame): void {
    const from = connection.peerId;
    if (from === null) {
      this.logger.debug('Ignoring gossip before hello', { peer: connection.label });
      return;
    }
    if (!this.seen.add(`${frame.origin}/${frame.id}`)) return;

    const text = serializeFrame(frame);
    for (const [peerId, neighbour] of this.connections) {
      if (peerId !== from && peerId !== frame.origin) {
        neighbour.socket.send(text);
      }
    }

    if (frame.origin === this.localId) return;
    this.inbound$.next({
      from: frame.origin,
      payload: new Uint8Array(Buffer.from(frame.payload, 'base64')),
    });
  }

  // ── Connections ────────────────────────────────────────

  private detach(connection: Connection): void {
    this.sockets.delete(connection);
    const peerId = connection.peerId;
    if (peerId !== null && this.connections.get(peerId) === connection) {
      this.connections.delete(peerId);
      if (!this.closed) {
        this.publishPeers();
        this.logger.info('Peer disconnected', { peer: peerId });
      }
    }
  }

  private dial(address: string, attempt: number): void {
    if (this.closed) return;

    const socket = new WebSocket(`ws://${address}`, { maxPayload: this.frameLimit });
    let opened = false;

    socket.once('open', () => {
      opened = true;
      this.attach(wrapWebSocket(socket), address, (registered) => {
        if (registered) this.scheduleRedial(address, 1);
      });
    });
    socket.on('error', (error: Error) => {
      if (!opened) {
        this.logger.debug('Dial failed', { address, attempt, reason: error.message });
      }
    });
    socket.once('close', () => {
      if (!opened) this.scheduleRedial(address, attempt + 1);
    });
  }

  private scheduleRedial(address: string, attempt: number): void {
    if (this.closed) return;
    if (attempt > this.config.maxReconnectAttempts) {
      this.logger.warn('Giving up on bootstrap peer', { address, attempts: attempt - 1 });
      return;
    }

    const delay = Math.min(this.config.reconnectDelay * Math.pow(2, attempt - 1), MAX_REDIAL_DELAY);
    const timer = setTimeout(() => {
      this.timers.delete(timer);
      try {
        this.dial(address, attempt);
      } catch (error) {
        this.logger.error('Could not dial bootstrap peer', ensureMeshError(error), { address });
      }
    }, delay);
    this.timers.add(timer);
  }

  private publishPeers(): void {
    this.peerSet$.next(new Set(this.connections.keys()));
  }

  private nextMessageId(): string {
    this.sequence += 1;
    return `${Date.now().toString(36)}-${this.sequence.toString(36)}-${randomBytes(4).toString('hex')}`;
  }
}
