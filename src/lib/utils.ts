import type { Socket } from 'node:net';
import type { TrackerRequest } from '../tracker/messages.js';

/**
 * Writes one newline-terminated request. Returns false without writing when
 * the socket can no longer take data.
 */
export function send(socket: Socket, message: TrackerRequest): boolean {
  if (socket.destroyed || !socket.writable) return false;
  socket.write(`${JSON.stringify(message)}\n`);
  return true;
}

/** Resolves true when `promise` settles within `ms`, false otherwise. */
export function settlesWithin(promise: Promise<unknown>, ms: number): Promise<boolean> {
  return new Promise<boolean>((resolve) => {
    const timer = setTimeout(() => resolve(false), ms);
    const done = () => {
      clearTimeout(timer);
      resolve(true);
    };
    promise.then(done, done);
  });
}
