import { WebSocket, type RawData } from 'ws';

/**
 * Text-frame connection the gossip channel talks through.
 */
export interface FrameSocket {
  send(frame: string): void;
  close(): void;
  onFrame(handler: (frame: string) => void): void;
  onClose(handler: () => void): void;
  onError(handler: (error: Error) => void): void;
}

function rawDataToString(data: RawData): string {
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  return Buffer.from(data).toString('utf8');
}

/**
 * Adapt a `ws` socket.
 */
export function wrapWebSocket(socket: WebSocket): FrameSocket {
  return {
    send(frame) {
      if (socket.readyState === WebSocket.OPEN) {
        socket.send(frame);
      }
    },
    close() {
      socket.close(1001, 'Channel closed');
    },
    onFrame(handler) {
      socket.on('message', (data: RawData) => handler(rawDataToString(data)));
    },
    onClose(handler) {
      socket.on('close', () => handler());
    },
    onError(handler) {
      socket.on('error', handler);
    },
  };
}
