import { z } from 'zod';

/**
 * First frame on every connection: who is on the other end.
 */
export const helloFrameSchema = z.object({
  kind: z.literal('hello'),
  nodeId: z.string().min(1).max(256),
});

/**
 * A published payload, flooded hop by hop. `id` is unique per `origin`.
 */
export const gossipFrameSchema = z.object({
  kind: z.literal('gossip'),
  id: z.string().min(1).max(128),
  origin: z.string().min(1).max(256),
  /** base64 */
  payload: z.string(),
});

export const frameSchema = z.discriminatedUnion('kind', [helloFrameSchema, gossipFrameSchema]);

export type HelloFrame = z.infer<typeof helloFrameSchema>;
export type GossipFrame = z.infer<typeof gossipFrameSchema>;
export type Frame = z.infer<typeof frameSchema>;

/** Bytes a frame adds around its base64 payload, at most */
export const FRAME_OVERHEAD_BYTES = 1024;

export type FrameParseResult = { ok: true; frame: Frame } | { ok: false; reason: string };

export function parseFrame(text: string): FrameParseResult {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    return { ok: false, reason: 'not JSON' };
  }
  const parsed = frameSchema.safeParse(raw);
  if (!parsed.success) {
    return { ok: false, reason: parsed.error.issues.map((issue) => issue.message).join('; ') };
  }
  return { ok: true, frame: parsed.data };
}

export function serializeFrame(frame: Frame): string {
  return JSON.stringify(frame);
}

/**
 * Largest frame a socket accepts for a given payload bound.
 */
export function maxFrameBytes(maxPayloadBytes: number): number {
  return Math.ceil(maxPayloadBytes / 3) * 4 + FRAME_OVERHEAD_BYTES;
}
