/**
 * Node configuration from the command line and the environment.
 *
 * Precedence: flags, then environment variables, then the schema defaults.
 *
 * @module config/loader
 */

import { randomBytes } from 'node:crypto';
import { ConfigError, parseNodeConfig, type FieldValidationError, type NodeConfig } from '@recipe-mesh/engine';

export type ParsedArgs = Record<string, string | boolean>;

/**
 * What the process was asked to do
 */
export type CliRequest =
  | { readonly kind: 'help' }
  | { readonly kind: 'version' }
  | { readonly kind: 'run'; readonly config: NodeConfig; readonly generatedNodeId: boolean };

/** Environment variables read by the loader */
export const ENV_VARS = {
  port: 'P2P_PORT',
  host: 'P2P_HOST',
  storagePath: 'STORAGE_FILE_PATH',
  bootstrapPeers: 'BOOTSTRAP_PEERS',
  nodeId: 'NODE_ID',
  maxPayloadBytes: 'MAX_PAYLOAD_BYTES',
  logLevel: 'LOG_LEVEL',
} as const;

const FLAG_ALIASES: Record<string, string> = {
  p: 'port',
  s: 'storage',
  h: 'help',
  v: 'version',
};

const VALUE_FLAGS = new Set(['port', 'host', 'storage', 'peers', 'node-id', 'max-payload']);
const SWITCH_FLAGS = new Set(['debug', 'help', 'version']);

/**
 * Split `--flag value`, `--flag=value`, `-p value` and bare switches.
 */
export function parseArgs(args: readonly string[]): ParsedArgs {
  const result: ParsedArgs = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined || !arg.startsWith('-')) continue;

    const stripped = arg.startsWith('--') ? arg.slice(2) : arg.slice(1);
    const eq = stripped.indexOf('=');
    const rawKey = eq >= 0 ? stripped.slice(0, eq) : stripped;
    const key = FLAG_ALIASES[rawKey] ?? rawKey;

    if (eq >= 0) {
      result[key] = stripped.slice(eq + 1);
      continue;
    }

    const next = args[i + 1];
    if (!SWITCH_FLAGS.has(key) && next !== undefined && !next.startsWith('-')) {
      result[key] = next;
      i++;
    } else {
      result[key] = true;
    }
  }

  return result;
}

function splitList(value: string): string[] {
  return value
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

export function generateNodeId(): string {
  return `peer-${randomBytes(8).toString('hex')}`;
}

/**
 * Resolve the CLI request from argv and environment.
 *
 * @throws ConfigError for unknown flags, flags missing their value, or any
 * setting the node configuration schema rejects
 */
export function loadCliRequest(
  argv: readonly string[],
  env: Readonly<Record<string, string | undefined>> = process.env
): CliRequest {
  const args = parseArgs(argv);
  if (args['help'] === true) return { kind: 'help' };
  if (args['version'] === true) return { kind: 'version' };

  const issues: FieldValidationError[] = [];
  for (const [key, value] of Object.entries(args)) {
    if (!VALUE_FLAGS.has(key) && !SWITCH_FLAGS.has(key)) {
      issues.push({ path: `--${key}`, message: 'unknown option' });
    } else if (VALUE_FLAGS.has(key) && value === true) {
      issues.push({ path: `--${key}`, message: 'requires a value' });
    }
  }
  if (issues.length > 0) {
    throw new ConfigError(issues);
  }

  const flag = (name: string): string | undefined => {
    const value = args[name];
    return typeof value === 'string' ? value : undefined;
  };

  const configuredId = flag('node-id') ?? env[ENV_VARS.nodeId];
  const peers = flag('peers') ?? env[ENV_VARS.bootstrapPeers];

  const config = parseNodeConfig({
    nodeId: configuredId ?? generateNodeId(),
    port: flag('port') ?? env[ENV_VARS.port],
    host: flag('host') ?? env[ENV_VARS.host],
    storagePath: flag('storage') ?? env[ENV_VARS.storagePath],
    bootstrapPeers: peers === undefined ? undefined : splitList(peers),
    maxPayloadBytes: flag('max-payload') ?? env[ENV_VARS.maxPayloadBytes],
    logLevel: args['debug'] === true ? 'debug' : env[ENV_VARS.logLevel],
  });

  return { kind: 'run', config, generatedNodeId: configuredId === undefined };
}
