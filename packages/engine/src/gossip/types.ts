import type { Observable } from 'rxjs';

/**
 * A payload received from the gossip channel.
 */
export interface GossipDelivery {
  /** Identity of the peer that published the payload */
  from: string;
  payload: Uint8Array;
}

/**
 * Publish/subscribe primitive the sync engine runs on.
 *
 * One logical topic: `publish` fans the payload out to every currently
 * subscribed peer. Discovery, connection management and transport security
 * belong to the implementation.
 */
export interface GossipChannel {
  /** Identity this channel publishes under */
  readonly localId: string;

  /**
   * Deliver a payload to all current subscribers.
   * @throws Error when the transport cannot accept it
   */
  publish(payload: Uint8Array): Promise<void>;

  /**
   * Inbound deliveries, in arrival order. Completes (or errors) when the
   * channel can no longer deliver.
   */
  readonly messages$: Observable<GossipDelivery>;

  /** Currently known peer identities, updated by discovery */
  readonly peers$: Observable<ReadonlySet<string>>;

  /** Snapshot of the currently known peer identities */
  peers(): ReadonlySet<string>;

  /** Leave the topic; completes `messages$` */
  close(): Promise<void>;
}
