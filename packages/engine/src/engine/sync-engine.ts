import { BehaviorSubject, Subject, type Observable, type Subscription } from 'rxjs';
import {
  ChannelClosedError,
  ChannelError,
  ConfigError,
  DecodeError,
  EngineStoppedError,
  MeshError,
  PersistenceError,
  ensureMeshError,
} from '../errors/mesh-error.js';
import type { GossipChannel, GossipDelivery } from '../gossip/types.js';
import { noopLogger, type Logger } from '../observability/logger.js';
import { DEFAULT_MAX_PAYLOAD_BYTES, decodeMessage, encodeAnnounce, encodeMessage } from '../protocol/codec.js';
import type { RecordStore } from '../store/record-store.js';
import {
  ALL_PEERS,
  describeTarget,
  peerTarget,
  targetsNode,
  type MeshMessage,
  type PeerTarget,
  type QueryRequest,
  type RecordsAnnounce,
} from '../types/message.js';
import type { Recipe } from '../types/recipe.js';
import { fail, succeed, type CommandResult, type PublishSelector, type SyncCommand } from './commands.js';
import { EventMux } from './event-mux.js';
import { PeerDirectory } from './peer-directory.js';

/**
 * Engine lifecycle state
 */
export type EngineState = 'running' | 'shutting-down' | 'stopped';

/**
 * Notable things the engine did, for observers and tests
 */
export type EngineEvent =
  | { readonly type: 'records-merged'; readonly from: string; readonly received: number; readonly added: number }
  | { readonly type: 'announce-ignored'; readonly from: string; readonly target: PeerTarget }
  | { readonly type: 'query-answered'; readonly to: string; readonly records: number }
  | { readonly type: 'query-ignored'; readonly from: string; readonly target: PeerTarget }
  | { readonly type: 'decode-failed'; readonly from: string; readonly error: DecodeError }
  | { readonly type: 'persistence-failed'; readonly error: PersistenceError }
  | { readonly type: 'channel-closed'; readonly error: ChannelClosedError }
  | { readonly type: 'published'; readonly records: number }
  | { readonly type: 'requested'; readonly target: PeerTarget };

/**
 * Sync statistics
 */
export interface SyncStats {
  messagesReceived: number;
  decodeFailures: number;
  recordsMerged: number;
  queriesAnswered: number;
  publishes: number;
  persistenceFailures: number;
  /** Set once a persistence failure was observed */
  degraded: boolean;
}

/**
 * Sync engine options
 */
export interface SyncEngineOptions {
  /** The node's store; its `localId` is the node identity */
  store: RecordStore;
  /** Broadcast channel the node is subscribed to */
  channel: GossipChannel;
  /** Peer view for `list-peers` (default: built from `channel.peers$`) */
  peerDirectory?: PeerDirectory;
  /** Inbound payload bound (default: DEFAULT_MAX_PAYLOAD_BYTES) */
  maxPayloadBytes?: number;
  logger?: Logger;
}

type EventSource = 'gossip' | 'commands' | 'responses' | 'control';

type LoopEvent =
  | { readonly kind: 'gossip'; readonly delivery: GossipDelivery }
  | { readonly kind: 'command'; readonly command: SyncCommand; readonly resolve: (result: CommandResult) => void }
  | { readonly kind: 'response'; readonly to: string; readonly records: readonly Recipe[] }
  | { readonly kind: 'shutdown'; readonly reason: string };

const SOURCES: readonly EventSource[] = ['gossip', 'commands', 'responses', 'control'];

/**
 * Coordinates one node's participation in the mesh.
 *
 * A single loop serializes inbound gossip, local commands and the responses the
 * node owes its peers against one RecordStore. Every iteration handles one
 * event to completion, so there is at most one store mutation in flight, and a
 * publish only happens after that mutation was persisted.
 *
 * @example
 * ```typescript
 * const engine = createSyncEngine({ store, channel, logger });
 *
 * const result = await engine.execute({
 *   type: 'create-record',
 *   fields: { name: 'Soup', ingredients: 'water|salt', instructions: 'boil' },
 * });
 * if (result.ok && result.kind === 'created') {
 *   await engine.execute({ type: 'publish-owned', selector: { kind: 'one', id: result.record.id } });
 * }
 *
 * await engine.shutdown();
 * ```
 */
export class SyncEngine {
  readonly localId: string;

  private readonly store: RecordStore;
  private readonly channel: GossipChannel;
  private readonly peerDirectory: PeerDirectory;
  private readonly ownsPeerDirectory: boolean;
  private readonly maxPayloadBytes: number;
  private readonly logger: Logger;

  private readonly mux = new EventMux<EventSource, LoopEvent>(SOURCES);
  private readonly stateSubject = new BehaviorSubject<EngineState>('running');
  private readonly eventsSubject = new Subject<EngineEvent>();
  private stats: SyncStats = {
    messagesReceived: 0,
    decodeFailures: 0,
    recordsMerged: 0,
    queriesAnswered: 0,
    publishes: 0,
    persistenceFailures: 0,
    degraded: false,
  };

  private readonly subscriptions: Subscription[] = [];
  private idleWaiters: (() => void)[] = [];
  private stopRequested = false;
  private busy = false;
  private readonly loop: Promise<void>;

  constructor(options: SyncEngineOptions) {
    if (options.channel.localId !== options.store.localId) {
      throw new ConfigError([
        {
          path: 'channel.localId',
          message: `must match the store identity "${options.store.localId}"`,
        },
      ]);
    }

    this.localId = options.store.localId;
    this.store = options.store;
    this.channel = options.channel;
    this.ownsPeerDirectory = options.peerDirectory === undefined;
    this.peerDirectory = options.peerDirectory ?? new PeerDirectory(options.channel.peers$);
    this.maxPayloadBytes = options.maxPayloadBytes ?? DEFAULT_MAX_PAYLOAD_BYTES;
    this.logger = options.logger ?? noopLogger;

    this.logger.info('Sync engine started', {
      localId: this.localId,
      maxPayloadBytes: this.maxPayloadBytes,
    });
    this.loop = this.run();

    this.subscriptions.push(
      this.channel.messages$.subscribe({
        next: (delivery) => this.mux.push('gossip', { kind: 'gossip', delivery }),
        error: (error: unknown) => this.onChannelClosed(ensureMeshError(error)),
        complete: () => this.onChannelClosed(),
      })
    );
  }

  /** Current lifecycle state */
  get state(): EngineState {
    return this.stateSubject.getValue();
  }

  /** Lifecycle state; completes after `stopped` */
  get state$(): Observable<EngineState> {
    return this.stateSubject.asObservable();
  }

  /** Engine events; completes when the engine stops */
  get events$(): Observable<EngineEvent> {
    return this.eventsSubject.asObservable();
  }

  /**
   * Current counters
   */
  getStats(): SyncStats {
    return { ...this.stats };
  }

  /**
   * Submit a command. Resolves with the outcome once the loop handled it; a
   * failure is returned as `{ ok: false, error }`.
   */
  execute(command: SyncCommand): Promise<CommandResult> {
    if (this.stopRequested || this.state !== 'running') {
      return Promise.resolve(fail(new EngineStoppedError(this.stopRequested ? 'shutting-down' : this.state)));
    }
    return new Promise<CommandResult>((resolve) => {
      this.mux.push('commands', { kind: 'command', command, resolve });
    });
  }

  /**
   * Ask the loop to stop after the event it is handling. Resolves once the
   * store was flushed and the engine is stopped.
   */
  shutdown(reason = 'requested'): Promise<void> {
    if (!this.stopRequested && this.state === 'running') {
      this.stopRequested = true;
      this.mux.push('control', { kind: 'shutdown', reason });
    }
    return this.loop;
  }

  /** Whether nothing is queued or being handled */
  isIdle(): boolean {
    return this.state === 'stopped' || (!this.busy && this.mux.size === 0);
  }

  /**
   * Resolve once the loop has nothing queued and nothing in flight.
   */
  whenIdle(): Promise<void> {
    if (this.isIdle()) return Promise.resolve();
    return new Promise<void>((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  private async run(): Promise<void> {
    while (!this.stopRequested) {
      const event = this.mux.take();
      if (!event) {
        this.notifyIdle();
        await this.mux.waitForEvent();
        continue;
      }

      this.busy = true;
      try {
        await this.handle(event);
      } catch (error) {
        this.logger.error('Unhandled error in sync loop', ensureMeshError(error));
      } finally {
        this.busy = false;
      }
    }

    await this.stop();
  }

  private async handle(event: LoopEvent): Promise<void> {
    switch (event.kind) {
      case 'gossip':
        await this.handleDelivery(event.delivery);
        return;
      case 'command':
        event.resolve(await this.runCommand(event.command));
        return;
      case 'response':
        await this.sendResponse(event.to, event.records);
        return;
      case 'shutdown':
        // The loop condition observes stopRequested
        return;
    }
  }

  // ── Inbound gossip ─────────────────────────────────────

  private async handleDelivery(delivery: GossipDelivery): Promise<void> {
    this.updateStats({ messagesReceived: this.stats.messagesReceived + 1 });

    if (delivery.from === this.localId) {
      this.logger.debug('Ignoring own message echoed by the channel');
      return;
    }

    let message: MeshMessage;
    try {
      message = decodeMessage(delivery.payload, { maxPayloadBytes: this.maxPayloadBytes });
    } catch (error) {
      if (!(error instanceof DecodeError)) throw error;
      this.logger.warn('Dropping undecodable message', {
        from: delivery.from,
        code: error.code,
        reason: error.message,
      });
      this.updateStats({ decodeFailures: this.stats.decodeFailures + 1 });
      this.eventsSubject.next({ type: 'decode-failed', from: delivery.from, error });
      return;
    }

    switch (message.type) {
      case 'records-announce':
        await this.handleAnnounce(delivery.from, message);
        return;
      case 'query-request':
        this.handleQuery(delivery.from, message);
        return;
    }
  }

  private async handleAnnounce(from: string, message: RecordsAnnounce): Promise<void> {
    if (!targetsNode(message.target, this.localId)) {
      this.logger.debug('Ignoring announce addressed elsewhere', {
        from,
        target: describeTarget(message.target),
      });
      this.eventsSubject.next({ type: 'announce-ignored', from, target: message.target });
      return;
    }

    let added: number;
    try {
      added = await this.store.mergeReceived(message.records);
    } catch (error) {
      if (!(error instanceof PersistenceError)) throw error;
      this.reportPersistenceFailure(error);
      return;
    }

    if (added > 0) {
      this.logger.info('Merged received records', { from, received: message.records.length, added });
    } else {
      this.logger.debug('Announce held no new records', { from, received: message.records.length });
    }
    this.updateStats({ recordsMerged: this.stats.recordsMerged + added });
    this.eventsSubject.next({ type: 'records-merged', from, received: message.records.length, added });
  }

  private handleQuery(from: string, message: QueryRequest): void {
    if (!targetsNode(message.target, this.localId)) {
      this.logger.debug('Ignoring query addressed elsewhere', {
        from,
        target: describeTarget(message.target),
      });
      this.eventsSubject.next({ type: 'query-ignored', from, target: message.target });
      return;
    }

    const records = Array.from(this.store.listLocal());
    this.logger.debug('Queueing query response', { to: from, records: records.length });
    this.mux.push('responses', { kind: 'response', to: from, records });
  }

  private async sendResponse(to: string, records: readonly Recipe[]): Promise<void> {
    try {
      await this.publish({ type: 'records-announce', target: peerTarget(to), records });
    } catch (error) {
      this.logger.error('Failed to send query response', ensureMeshError(error), { to });
      return;
    }
    this.updateStats({ queriesAnswered: this.stats.queriesAnswered + 1 });
    this.eventsSubject.next({ type: 'query-answered', to, records: records.length });
  }

  // ── Commands ───────────────────────────────────────────

  private async runCommand(command: SyncCommand): Promise<CommandResult> {
    try {
      return await this.dispatch(command);
    } catch (error) {
      if (error instanceof PersistenceError) {
        this.reportPersistenceFailure(error);
      }
      const meshError = ensureMeshError(error);
      this.logger.debug('Command failed', { command: command.type, code: meshError.code });
      return fail(meshError);
    }
  }

  private async dispatch(command: SyncCommand): Promise<CommandResult> {
    switch (command.type) {
      case 'create-record': {
        const record = await this.store.create(command.fields);
        this.logger.info('Record created', { id: record.id, name: record.name });
        return succeed({ kind: 'created', record });
      }
      case 'list-local':
        return succeed({ kind: 'records', scope: 'local', records: Array.from(this.store.listLocal()) });
      case 'list-all':
        return succeed({ kind: 'records', scope: 'all', records: [...this.store.listAll()] });
      case 'list-peers':
        return succeed({ kind: 'peers', peers: this.peerDirectory.list() });
      case 'publish-owned':
        return succeed({ kind: 'published', records: await this.publishOwned(command.selector) });
      case 'request-from':
        await this.publish({ type: 'query-request', target: command.target });
        this.logger.info('Requested records', { target: describeTarget(command.target) });
        this.eventsSubject.next({ type: 'requested', target: command.target });
        return succeed({ kind: 'requested', target: command.target });
    }
  }

  private async publishOwned(selector: PublishSelector): Promise<Recipe[]> {
    const selected =
      selector.kind === 'one' ? [this.store.getOwned(selector.id)] : Array.from(this.store.listLocal());

    if (selected.length === 0) {
      this.logger.debug('No owned records to publish');
      return [];
    }

    // A record that cannot fit is rejected before anything is flagged
    const payloads = encodeAnnounce(
      ALL_PEERS,
      selected.map((record) => ({ ...record, published: true })),
      this.maxPayloadBytes
    );
    const records = await this.store.markPublished(selected.map((record) => record.id));
    await this.publishPayloads('records-announce', ALL_PEERS, payloads);
    this.logger.info('Published records', { count: records.length, payloads: payloads.length });
    this.eventsSubject.next({ type: 'published', records: records.length });
    return records;
  }

  private async publish(message: MeshMessage): Promise<void> {
    const payloads =
      message.type === 'records-announce'
        ? encodeAnnounce(message.target, message.records, this.maxPayloadBytes)
        : [encodeMessage(message)];
    await this.publishPayloads(message.type, message.target, payloads);
  }

  private async publishPayloads(
    type: MeshMessage['type'],
    target: PeerTarget,
    payloads: readonly Uint8Array[]
  ): Promise<void> {
    for (const payload of payloads) {
      try {
        await this.channel.publish(payload);
      } catch (error) {
        if (error instanceof MeshError) throw error;
        throw new ChannelError(
          `Failed to publish ${type}`,
          { target: describeTarget(target) },
          error instanceof Error ? error : undefined
        );
      }
      this.updateStats({ publishes: this.stats.publishes + 1 });
    }
  }

  // ── Failure handling ───────────────────────────────────

  private reportPersistenceFailure(error: PersistenceError): void {
    const stats = this.stats;
    this.logger.error('Persistence failed, continuing in degraded state', error);
    this.updateStats({ persistenceFailures: stats.persistenceFailures + 1, degraded: true });
    this.eventsSubject.next({ type: 'persistence-failed', error });
  }

  private onChannelClosed(cause?: MeshError): void {
    if (this.stopRequested || this.state !== 'running') return;
    const error = new ChannelClosedError(
      cause ? `Gossip channel failed: ${cause.message}` : undefined,
      cause
    );
    this.logger.error('Gossip channel closed, shutting down', error);
    this.eventsSubject.next({ type: 'channel-closed', error });
    void this.shutdown('channel closed').catch((shutdownError: unknown) => {
      this.logger.error('Shutdown after channel close failed', ensureMeshError(shutdownError));
    });
  }

  // ── Shutdown ───────────────────────────────────────────

  private async stop(): Promise<void> {
    this.stateSubject.next('shutting-down');
    this.logger.info('Sync engine shutting down');

    for (const subscription of this.subscriptions) {
      subscription.unsubscribe();
    }
    this.subscriptions.length = 0;

    const stopped = new EngineStoppedError('shutting-down');
    for (const pending of this.mux.drain('commands')) {
      if (pending.kind === 'command') {
        pending.resolve(fail(stopped));
      }
    }
    const dropped = this.mux.drain('gossip').length + this.mux.drain('responses').length;
    this.mux.drain('control');
    if (dropped > 0) {
      this.logger.debug('Dropped queued events at shutdown', { dropped });
    }

    try {
      await this.store.flush();
    } catch (error) {
      const failure =
        error instanceof PersistenceError
          ? error
          : new PersistenceError('MESH_S300', 'Failed to flush at shutdown', undefined, ensureMeshError(error));
      this.reportPersistenceFailure(failure);
    }

    if (this.ownsPeerDirectory) {
      this.peerDirectory.dispose();
    }

    this.stateSubject.next('stopped');
    this.logger.info('Sync engine stopped', { records: this.store.size });
    this.eventsSubject.complete();
    this.stateSubject.complete();
    this.notifyIdle();
  }

  private notifyIdle(): void {
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }

  private updateStats(update: Partial<SyncStats>): void {
    this.stats = { ...this.stats, ...update };
  }
}

/**
 * Create a running sync engine
 */
export function createSyncEngine(options: SyncEngineOptions): SyncEngine {
  return new SyncEngine(options);
}
