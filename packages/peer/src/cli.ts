#!/usr/bin/env node
/**
 * CLI for a recipe mesh node
 */

import { ConfigError, createLogger, MeshError } from '@recipe-mesh/engine';
import { loadCliRequest, type CliRequest } from './config/loader.js';
import { formatLogEntry } from './log-format.js';
import { startNode, type RunningNode } from './node.js';
import { runRepl } from './repl.js';

const VERSION = '0.1.0';

function printHelp(): void {
  console.log(`
recipe-mesh - share recipes with peers, no server needed

Usage: recipe-mesh [options]

Options:
  -p, --port <port>        Port to listen on (default: 4001)
  --host <host>            Host to bind to (default: 0.0.0.0)
  -s, --storage <path>     Recipe store file (default: ./recipes.json)
  --peers <list>           Comma-separated host:port peers to dial
  --node-id <id>           Node identity (default: generated)
  --max-payload <bytes>    Largest accepted message (default: 1048576)
  --debug                  Enable debug logging
  -h, --help               Show this help message
  -v, --version            Show version

Environment Variables:
  P2P_PORT                 Port number
  P2P_HOST                 Host address
  STORAGE_FILE_PATH        Recipe store file
  BOOTSTRAP_PEERS          Comma-separated host:port peers
  NODE_ID                  Node identity
  MAX_PAYLOAD_BYTES        Largest accepted message
  LOG_LEVEL                debug, info, warn or error

Type "help" once running for the list of commands.
`);
}

function describeFailure(error: unknown): string {
  return MeshError.isMeshError(error) ? error.format() : String(error);
}

async function main(): Promise<number> {
  let request: CliRequest;
  try {
    request = loadCliRequest(process.argv.slice(2));
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(error.format());
      return 2;
    }
    throw error;
  }

  if (request.kind === 'help') {
    printHelp();
    return 0;
  }
  if (request.kind === 'version') {
    console.log(`recipe-mesh v${VERSION}`);
    return 0;
  }

  const { config } = request;
  const logger = createLogger({
    level: config.logLevel,
    module: 'node',
    handler: (entry) => console.error(formatLogEntry(entry)),
  });
  if (request.generatedNodeId) {
    logger.info('No node id configured, generated one', { nodeId: config.nodeId });
  }

  let node: RunningNode;
  try {
    node = await startNode(config, { logger });
  } catch (error) {
    console.error(`Failed to start node: ${describeFailure(error)}`);
    return 1;
  }

  const shutdown = (signal: string): void => {
    logger.info('Shutting down', { signal });
    node.stop().catch((error: unknown) => {
      console.error(`Shutdown failed: ${describeFailure(error)}`);
    });
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  console.log(`Node ${config.nodeId} listening on ${config.host}:${config.port}. Type "help" for commands.`);

  const interactive = process.stdin.isTTY === true;
  const exit = await runRepl({
    engine: node.engine,
    input: process.stdin,
    output: process.stdout,
    prompt: interactive ? '> ' : '',
    terminal: interactive,
  });
  logger.debug('Command loop ended', { reason: exit });

  await node.stop();
  return 0;
}

main().then(
  (code) => process.exit(code),
  (error: unknown) => {
    console.error(`Fatal: ${describeFailure(error)}`);
    process.exit(1);
  }
);
