/**
 * Wire codec for mesh messages.
 *
 * Messages travel as UTF-8 JSON. Encoding writes keys in a fixed order so the
 * same message always produces the same bytes; decoding enforces the payload
 * bound before touching the content and validates the structure with zod.
 */

import { ChannelError, DecodeError } from '../errors/mesh-error.js';
import type { Recipe } from '../types/recipe.js';
import { toFieldErrors } from '../types/recipe.js';
import { meshMessageSchema, type MeshMessage, type PeerTarget } from '../types/message.js';

/** Default upper bound for an inbound payload (1 MiB) */
export const DEFAULT_MAX_PAYLOAD_BYTES = 1024 * 1024;

export interface DecodeOptions {
  /** Payloads larger than this are rejected without being parsed */
  maxPayloadBytes?: number;
}

const encoder = new TextEncoder();

function canonicalTarget(target: PeerTarget): PeerTarget {
  return target.kind === 'all' ? { kind: 'all' } : { kind: 'peer', peerId: target.peerId };
}

function canonicalRecipe(recipe: Recipe): Recipe {
  return {
    id: recipe.id,
    name: recipe.name,
    ingredients: recipe.ingredients,
    instructions: recipe.instructions,
    publisherId: recipe.publisherId,
    published: recipe.published,
  };
}

function canonicalMessage(message: MeshMessage): MeshMessage {
  switch (message.type) {
    case 'records-announce':
      return {
        type: message.type,
        target: canonicalTarget(message.target),
        records: message.records.map(canonicalRecipe),
      };
    case 'query-request':
      return {
        type: message.type,
        target: canonicalTarget(message.target),
      };
  }
}

/**
 * Serialize a message for the gossip channel.
 */
export function encodeMessage(message: MeshMessage): Uint8Array {
  return encoder.encode(JSON.stringify(canonicalMessage(message)));
}

/**
 * Serialize an announce as one or more payloads, each within `maxPayloadBytes`.
 *
 * Records keep their order and are packed greedily. An empty record list still
 * yields one (empty) announce.
 *
 * @throws ChannelError `MESH_C503` when a single record cannot fit in a payload
 */
export function encodeAnnounce(
  target: PeerTarget,
  records: readonly Recipe[],
  maxPayloadBytes: number = DEFAULT_MAX_PAYLOAD_BYTES
): Uint8Array[] {
  const empty = encodeMessage({ type: 'records-announce', target, records: [] });
  if (records.length === 0) return [empty];

  const payloads: Uint8Array[] = [];
  let batch: Recipe[] = [];
  let size = empty.byteLength;

  for (const record of records) {
    // Each array element adds its own bytes plus a comma after the first
    const recordBytes = encodeMessage({ type: 'records-announce', target, records: [record] }).byteLength - empty.byteLength;
    if (empty.byteLength + recordBytes > maxPayloadBytes) {
      throw new ChannelError(
        `Record #${record.id} does not fit in a ${maxPayloadBytes} byte payload`,
        { id: record.id, size: empty.byteLength + recordBytes, maxPayloadBytes }
      );
    }

    const separator = batch.length > 0 ? 1 : 0;
    if (size + separator + recordBytes > maxPayloadBytes) {
      payloads.push(encodeMessage({ type: 'records-announce', target, records: batch }));
      batch = [record];
      size = empty.byteLength + recordBytes;
    } else {
      batch.push(record);
      size += separator + recordBytes;
    }
  }

  payloads.push(encodeMessage({ type: 'records-announce', target, records: batch }));
  return payloads;
}

/**
 * Parse a payload received from the gossip channel.
 *
 * @throws DecodeError `MESH_C501` when the payload exceeds the bound,
 * `MESH_C500` when it is not valid UTF-8, not JSON, or not a mesh message
 */
export function decodeMessage(payload: Uint8Array, options: DecodeOptions = {}): MeshMessage {
  const maxPayloadBytes = options.maxPayloadBytes ?? DEFAULT_MAX_PAYLOAD_BYTES;

  if (payload.byteLength > maxPayloadBytes) {
    throw new DecodeError(
      'MESH_C501',
      `Payload of ${payload.byteLength} bytes exceeds the ${maxPayloadBytes} byte limit`,
      { size: payload.byteLength, maxPayloadBytes }
    );
  }

  let text: string;
  try {
    text = new TextDecoder('utf-8', { fatal: true }).decode(payload);
  } catch (error) {
    throw new DecodeError('MESH_C500', 'Payload is not valid UTF-8', undefined, asError(error));
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new DecodeError('MESH_C500', 'Payload is not valid JSON', undefined, asError(error));
  }

  const parsed = meshMessageSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = toFieldErrors(parsed.error);
    throw new DecodeError(
      'MESH_C500',
      `Payload is not a mesh message: ${issues.map((i) => `${i.path}: ${i.message}`).join('; ')}`,
      { issues }
    );
  }

  return parsed.data;
}

function asError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
