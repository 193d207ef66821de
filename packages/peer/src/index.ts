/**
 * @recipe-mesh/peer - runnable recipe mesh node
 *
 * @module @recipe-mesh/peer
 */

export { parseCommand, USAGE, type ParsedLine } from './commands/parse-command.js';
export { HELP_TEXT, formatError, formatRecipe, formatResult } from './commands/format.js';
export {
  ENV_VARS,
  generateNodeId,
  loadCliRequest,
  parseArgs,
  type CliRequest,
  type ParsedArgs,
} from './config/loader.js';
export { type FrameSocket, wrapWebSocket } from './transport/frame-socket.js';
export {
  FRAME_OVERHEAD_BYTES,
  frameSchema,
  maxFrameBytes,
  parseFrame,
  serializeFrame,
  type Frame,
  type GossipFrame,
  type HelloFrame,
} from './transport/frames.js';
export { SeenCache } from './transport/seen-cache.js';
export {
  WebSocketGossipChannel,
  type WebSocketGossipConfig,
} from './transport/websocket-gossip.js';
export { formatLogEntry } from './log-format.js';
export {
  createWebSocketChannel,
  startNode,
  type ChannelFactory,
  type RunningNode,
  type StartNodeOptions,
} from './node.js';
export { runRepl, type ReplExit, type ReplOptions } from './repl.js';
