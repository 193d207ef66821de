import type { FrameSocket } from '../transport/frame-socket.js';

/**
 * One end of an in-process socket pair. Frames are delivered on a later
 * microtask and buffered until the receiving side registers a handler.
 */
export class FakeSocket implements FrameSocket {
  readonly sent: string[] = [];
  remote: FakeSocket | null = null;
  closed = false;

  private readonly frameHandlers: ((frame: string) => void)[] = [];
  private readonly closeHandlers: (() => void)[] = [];
  private readonly errorHandlers: ((error: Error) => void)[] = [];
  private readonly buffered: string[] = [];

  send(frame: string): void {
    if (this.closed) return;
    this.sent.push(frame);
    const remote = this.remote;
    queueMicrotask(() => remote?.receive(frame));
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    queueMicrotask(() => this.closeHandlers.forEach((handler) => handler()));
    this.remote?.close();
  }

  onFrame(handler: (frame: string) => void): void {
    this.frameHandlers.push(handler);
    for (const frame of this.buffered.splice(0)) handler(frame);
  }

  onClose(handler: () => void): void {
    this.closeHandlers.push(handler);
  }

  onError(handler: (error: Error) => void): void {
    this.errorHandlers.push(handler);
  }

  /** Simulate a transport error */
  emitError(error: Error): void {
    this.errorHandlers.forEach((handler) => handler(error));
  }

  private receive(frame: string): void {
    if (this.closed) return;
    if (this.frameHandlers.length === 0) {
      this.buffered.push(frame);
      return;
    }
    this.frameHandlers.forEach((handler) => handler(frame));
  }
}

export function createSocketPair(): [FakeSocket, FakeSocket] {
  const left = new FakeSocket();
  const right = new FakeSocket();
  left.remote = right;
  right.remote = left;
  return [left, right];
}

/** Let queued frame deliveries run */
export function flushFrames(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
