import type { MeshError } from '../errors/mesh-error.js';
import type { PeerTarget } from '../types/message.js';
import type { Recipe, RecipeDraft } from '../types/recipe.js';

/**
 * Which owned records to broadcast.
 */
export type PublishSelector = { readonly kind: 'one'; readonly id: number } | { readonly kind: 'all' };

/**
 * Typed intents accepted by the sync engine.
 */
export type SyncCommand =
  | { readonly type: 'create-record'; readonly fields: RecipeDraft }
  | { readonly type: 'list-local' }
  | { readonly type: 'list-all' }
  | { readonly type: 'list-peers' }
  | { readonly type: 'publish-owned'; readonly selector: PublishSelector }
  | { readonly type: 'request-from'; readonly target: PeerTarget };

export type SyncCommandType = SyncCommand['type'];

/**
 * What a successful command produced.
 */
export type CommandOutcome =
  | { readonly kind: 'created'; readonly record: Recipe }
  | { readonly kind: 'records'; readonly scope: 'local' | 'all'; readonly records: readonly Recipe[] }
  | { readonly kind: 'peers'; readonly peers: readonly string[] }
  | { readonly kind: 'published'; readonly records: readonly Recipe[] }
  | { readonly kind: 'requested'; readonly target: PeerTarget };

/**
 * Result of `SyncEngine.execute`. Failures are values, never rejections.
 */
export type CommandResult =
  | ({ readonly ok: true } & CommandOutcome)
  | { readonly ok: false; readonly error: MeshError };

export function succeed(outcome: CommandOutcome): CommandResult {
  return { ok: true, ...outcome };
}

export function fail(error: MeshError): CommandResult {
  return { ok: false, error };
}
