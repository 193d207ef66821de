/**
 * In-process gossip network.
 *
 * Every channel joined to the same network is subscribed to one topic; a
 * publish is delivered to all other joined channels. Used by tests and by
 * single-process demos, where running a socket transport would only add noise.
 */

import { BehaviorSubject, Subject, type Observable } from 'rxjs';
import type { GossipChannel, GossipDelivery } from './types.js';

/**
 * One member's view of a MemoryGossipNetwork.
 */
export class MemoryGossipChannel implements GossipChannel {
  readonly localId: string;

  private readonly network: MemoryGossipNetwork;
  private readonly inbound$ = new Subject<GossipDelivery>();
  private readonly knownPeers$ = new BehaviorSubject<ReadonlySet<string>>(new Set());
  private readonly published: Uint8Array[] = [];
  private closed = false;
  private failure: Error | null = null;

  constructor(network: MemoryGossipNetwork, localId: string) {
    this.network = network;
    this.localId = localId;
  }

  get messages$(): Observable<GossipDelivery> {
    return this.inbound$.asObservable();
  }

  get peers$(): Observable<ReadonlySet<string>> {
    return this.knownPeers$.asObservable();
  }

  peers(): ReadonlySet<string> {
    return this.knownPeers$.getValue();
  }

  get isClosed(): boolean {
    return this.closed;
  }

  async publish(payload: Uint8Array): Promise<void> {
    if (this.closed) {
      throw new Error(`Channel ${this.localId} is closed`);
    }
    if (this.failure) {
      const error = this.failure;
      this.failure = null;
      throw error;
    }
    const copy = payload.slice();
    this.published.push(copy);
    this.network.broadcast(this.localId, copy);
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.network.leave(this.localId);
  }

  /** Make the next publish fail */
  failNextPublish(error: Error = new Error('simulated publish failure')): void {
    this.failure = error;
  }

  /** Payloads this channel published, oldest first */
  getPublished(): readonly Uint8Array[] {
    return this.published;
  }

  /** Inject a delivery as if a peer had published it */
  inject(from: string, payload: Uint8Array): void {
    this.deliver({ from, payload });
  }

  /** End the inbound stream with an error, as a broken transport would */
  fail(error: Error): void {
    if (this.closed) return;
    this.closed = true;
    this.inbound$.error(error);
    this.network.leave(this.localId);
  }

  /** @internal */
  deliver(delivery: GossipDelivery): void {
    if (this.closed) return;
    this.inbound$.next(delivery);
  }

  /** @internal */
  setPeers(peers: ReadonlySet<string>): void {
    if (this.closed) return;
    this.knownPeers$.next(peers);
  }

  /** @internal */
  shutdown(): void {
    if (this.closed) return;
    this.closed = true;
    this.inbound$.complete();
    this.knownPeers$.next(new Set());
  }
}

/**
 * A shared topic joined by MemoryGossipChannels.
 *
 * Delivery is synchronous: when `publish` resolves, every other member has
 * already received the payload.
 *
 * @example
 * ```typescript
 * const network = new MemoryGossipNetwork();
 * const a = network.join('peer-a');
 * const b = network.join('peer-b');
 *
 * b.messages$.subscribe(({ from }) => console.log(`got a payload from ${from}`));
 * await a.publish(encodeMessage({ type: 'query-request', target: ALL_PEERS }));
 * ```
 */
export class MemoryGossipNetwork {
  private readonly members = new Map<string, MemoryGossipChannel>();

  /**
   * Join the topic under an identity.
   * @throws Error when the identity is already a member
   */
  join(localId: string): MemoryGossipChannel {
    if (this.members.has(localId)) {
      throw new Error(`Peer ${localId} already joined`);
    }
    const channel = new MemoryGossipChannel(this, localId);
    this.members.set(localId, channel);
    this.refreshPeers();
    return channel;
  }

  /** Remove a member and complete its inbound stream */
  leave(localId: string): void {
    const channel = this.members.get(localId);
    if (!channel) return;
    this.members.delete(localId);
    channel.shutdown();
    this.refreshPeers();
  }

  /** Identities currently joined */
  memberIds(): string[] {
    return Array.from(this.members.keys());
  }

  /** @internal */
  broadcast(from: string, payload: Uint8Array): void {
    for (const [id, member] of this.members) {
      if (id !== from) {
        member.deliver({ from, payload: payload.slice() });
      }
    }
  }

  private refreshPeers(): void {
    for (const [id, member] of this.members) {
      member.setPeers(new Set([...this.members.keys()].filter((peer) => peer !== id)));
    }
  }
}

/**
 * Create an in-process gossip network.
 */
export function createMemoryGossipNetwork(): MemoryGossipNetwork {
  return new MemoryGossipNetwork();
}
