// src/broker/relay/socket-relay.ts
import * as net from 'node:net';
import { BrokerError } from '../ipc/errors.ts';
import { encodeEnvelope } from '../ipc/protocol.ts';
import type { BrokerRequest } from '../ipc/types.ts';
import type { BrokerRelay } from './types.ts';

export const DEFAULT_RELAY_TIMEOUT_MS = 10_000;
export const DEFAULT_CHUNK_SIZE = 1024;

export interface SocketRelayOptions {
  socketPath: string;
  timeoutMs?: number;
  chunkSize?: number;
}

/**
 * Forwards each request over a fresh connection to the broker socket.
 *
 * The response carries no length: a read that fills whole chunks means more
 * follows, a short one ends the message. A response whose length is an exact
 * multiple of the chunk size therefore waits for end-of-stream or times out.
 */
export class SocketRelay implements BrokerRelay {
  private readonly socketPath: string;
  private readonly timeoutMs: number;
  private readonly chunkSize: number;

  constructor(options: SocketRelayOptions) {
    this.socketPath = options.socketPath;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_RELAY_TIMEOUT_MS;
    this.chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
    if (!Number.isInteger(this.chunkSize) || this.chunkSize <= 0) {
      throw new Error(`chunk size must be a positive integer, got ${this.chunkSize}`);
    }
  }

  async forward(request: BrokerRequest): Promise<string> {
    const socket = net.createConnection(this.socketPath);
    try {
      return await this.exchange(socket, encodeEnvelope(request));
    } finally {
      socket.destroy();
    }
  }

  private exchange(socket: net.Socket, payload: Buffer): Promise<string> {
    return new Promise((resolve, reject) => {
      const chunks: Buffer[] = [];
      let received = 0;

      const finish = (err?: BrokerError): void => {
        clearTimeout(timer);
        socket.off('connect', onConnect);
        socket.off('data', onData);
        socket.off('end', onEnd);
        socket.off('error', onError);
        // late errors after settling must not become unhandled
        socket.on('error', () => {});
        if (err) reject(err);
        else resolve(Buffer.concat(chunks, received).toString('utf8'));
      };

      const timer = setTimeout(() => {
        console.warn(`[relay] no complete response from ${this.socketPath} within ${this.timeoutMs} ms`);
        finish(BrokerError.failed(`broker did not respond within ${this.timeoutMs} ms`));
      }, this.timeoutMs);

      const onConnect = (): void => {
        socket.write(payload, (err?: Error | null) => {
          if (err) finish(BrokerError.failed(`failed to send request: ${err.message}`));
        });
      };
      const onData = (chunk: Buffer): void => {
        chunks.push(chunk);
        received += chunk.length;
        if (chunk.length % this.chunkSize !== 0) finish();
      };
      const onEnd = (): void => {
        if (received > 0) finish();
        else finish(BrokerError.failed('broker closed the connection without a response'));
      };
      const onError = (err: Error): void => {
        finish(BrokerError.failed(`broker socket ${this.socketPath}: ${err.message}`));
      };

      socket.once('connect', onConnect);
      socket.on('data', onData);
      socket.once('end', onEnd);
      socket.once('error', onError);
    });
  }
}
