// src/lib/ipc/client.ts
import net from 'node:net';
import { errorCode } from '../errors.js';
import { readLines } from './lines.js';
import { encode, parseResponse, type Command, type Response } from './protocol.js';

export class ClientError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ClientError';
  }
}

/** Sends one command over the daemon socket and waits for its single response line. */
export function sendCommand(socketPath: string, command: Command, timeoutMs = 5000): Promise<Response> {
  return new Promise<Response>((resolve, reject) => {
    const socket = net.createConnection(socketPath);
    let settled = false;
    const finish = (fn: () => void) => {
      if (settled) return;
      settled = true;
      socket.destroy();
      fn();
    };

    socket.setTimeout(timeoutMs);
    socket.once('connect', () => socket.write(encode(command)));
    readLines(socket, {
      line: line => {
        const parsed = parseResponse(line);
        finish(() =>
          parsed.ok ? resolve(parsed.value) : reject(new ClientError(`Invalid response: ${parsed.error}`)),
        );
      },
    });
    socket.on('error', err => {
      const code = errorCode(err);
      const message =
        code === 'ENOENT'
          ? `Socket not found at ${socketPath}. Is deskbar running?`
          : `Failed to connect to deskbar: ${err.message}. Is deskbar running?`;
      finish(() => reject(new ClientError(message, { cause: err })));
    });
    socket.on('timeout', () => finish(() => reject(new ClientError(`No response from deskbar after ${timeoutMs}ms`))));
    // A reply cut short by the close is still parsed first.
    socket.on('close', () =>
      setImmediate(() => finish(() => reject(new ClientError('Connection closed before a response arrived')))),
    );
  });
}
