import { z } from 'zod';
import { recipeSchema, type Recipe } from './recipe.js';

/**
 * Addressing of a query or announce: every subscriber, or one named peer.
 */
export type PeerTarget = { readonly kind: 'all' } | { readonly kind: 'peer'; readonly peerId: string };

export const ALL_PEERS: PeerTarget = { kind: 'all' };

export function peerTarget(peerId: string): PeerTarget {
  return { kind: 'peer', peerId };
}

/**
 * Whether a target selects the node with the given identity.
 */
export function targetsNode(target: PeerTarget, nodeId: string): boolean {
  switch (target.kind) {
    case 'all':
      return true;
    case 'peer':
      return target.peerId === nodeId;
  }
}

export function describeTarget(target: PeerTarget): string {
  return target.kind === 'all' ? 'all peers' : target.peerId;
}

/**
 * Zero or more records, broadcast unsolicited or sent back to a requester.
 */
export interface RecordsAnnounce {
  readonly type: 'records-announce';
  readonly target: PeerTarget;
  readonly records: readonly Recipe[];
}

/**
 * Request for the owned records of one peer or of every peer.
 */
export interface QueryRequest {
  readonly type: 'query-request';
  readonly target: PeerTarget;
}

/**
 * Union of all wire messages.
 */
export type MeshMessage = RecordsAnnounce | QueryRequest;

export type MeshMessageType = MeshMessage['type'];

// ── Wire schemas ─────────────────────────────────────────

export const peerTargetSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('all') }),
  z.object({ kind: z.literal('peer'), peerId: z.string().min(1) }),
]);

export const meshMessageSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('records-announce'),
    target: peerTargetSchema,
    records: z.array(recipeSchema),
  }),
  z.object({
    type: z.literal('query-request'),
    target: peerTargetSchema,
  }),
]);
