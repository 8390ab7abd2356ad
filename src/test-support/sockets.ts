// src/test-support/sockets.ts
import * as net from 'node:net';

export function connect(socketPath: string): Promise<net.Socket> {
  return new Promise((resolve, reject) => {
    const client = net.createConnection(socketPath);
    client.once('connect', () => {
      client.off('error', reject);
      resolve(client);
    });
    client.once('error', reject);
  });
}

/** Writes `payload` and resolves with the first chunk the server sends back. */
export function roundTrip(client: net.Socket, payload: string, timeoutMs = 3000): Promise<string> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(() => {
      cleanup();
      reject(new Error('timeout waiting for response'));
    }, timeoutMs);
    const onData = (chunk: Buffer): void => {
      cleanup();
      resolve(chunk.toString('utf8'));
    };
    const onClose = (): void => {
      cleanup();
      reject(new Error('connection closed before response'));
    };
    const cleanup = (): void => {
      clearTimeout(timer);
      client.off('data', onData);
      client.off('close', onClose);
    };
    client.on('data', onData);
    client.once('close', onClose);
    client.write(payload);
  });
}

/** Resolves with everything received once the server closes the connection. */
export function readUntilClose(client: net.Socket): Promise<string> {
  return new Promise((resolve) => {
    const chunks: Buffer[] = [];
    client.on('data', (chunk: Buffer) => chunks.push(chunk));
    client.on('error', () => {});
    client.once('close', () => resolve(Buffer.concat(chunks).toString('utf8')));
  });
}

export function envelope(operation: string, protocolVersion: string, correlationId: string, requestJson: string): string {
  return JSON.stringify({ [operation]: [protocolVersion, correlationId, requestJson] });
}
