import { z } from 'zod';
import { ConfigError } from '../errors/mesh-error.js';
import { LOG_LEVELS, type LogLevel } from '../observability/logger.js';
import { DEFAULT_MAX_PAYLOAD_BYTES } from '../protocol/codec.js';
import { toFieldErrors } from '../types/recipe.js';

export const DEFAULT_PORT = 4001;
export const DEFAULT_HOST = '0.0.0.0';
export const DEFAULT_STORAGE_PATH = './recipes.json';

const HOST_PORT = /^[^\s:]+:(\d{1,5})$/;

const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error']) satisfies z.ZodType<LogLevel>;

/**
 * A bootstrap address, `host:port`
 */
export const peerAddressSchema = z
  .string()
  .trim()
  .regex(HOST_PORT, 'must be host:port')
  .refine((value) => {
    const port = Number(value.slice(value.lastIndexOf(':') + 1));
    return port >= 1 && port <= 65535;
  }, 'port must be between 1 and 65535');

/**
 * Validated node configuration with defaults applied
 */
export const nodeConfigSchema = z.object({
  nodeId: z
    .string()
    .trim()
    .min(1, 'must not be empty')
    .max(256, 'must be at most 256 characters')
    .regex(/^[^\s]+$/, 'must not contain whitespace'),
  port: z.coerce.number().int().min(0).max(65535).default(DEFAULT_PORT),
  host: z.string().trim().min(1).default(DEFAULT_HOST),
  storagePath: z.string().trim().min(1).default(DEFAULT_STORAGE_PATH),
  bootstrapPeers: z.array(peerAddressSchema).default([]),
  maxPayloadBytes: z.coerce.number().int().min(1024).default(DEFAULT_MAX_PAYLOAD_BYTES),
  logLevel: logLevelSchema.default('info'),
});

export type NodeConfig = z.output<typeof nodeConfigSchema>;
export type NodeConfigInput = z.input<typeof nodeConfigSchema>;

/**
 * Validate raw configuration.
 *
 * @throws ConfigError listing every invalid setting
 */
export function parseNodeConfig(input: unknown): NodeConfig {
  const parsed = nodeConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError(toFieldErrors(parsed.error));
  }
  return parsed.data;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}
