// src/broker/ipc/transport.ts
import * as fs from 'node:fs';
import * as net from 'node:net';
import * as path from 'node:path';
import type { BrokerDispatcher } from './dispatcher.ts';
import { SocketBindError } from './errors.ts';
import { PeerCredentialResolver } from './peer.ts';
import { EnvelopeDecoder, encodeResponse } from './protocol.ts';
import type { CallerContext, CredentialResolver } from './types.ts';

export interface BrokerSocketServerOptions {
  socketPath: string;
  dispatcher: BrokerDispatcher;
  /** Defaults to SO_PEERCRED through the native addon. */
  credentials?: CredentialResolver<net.Socket>;
}

/**
 * Runs `fn` with the process umask set to `mask`, restoring it afterwards.
 * The umask is process-wide: calls must not overlap, so keep `fn` synchronous.
 */
export function withUmask<T>(mask: number, fn: () => T): T {
  const previous = process.umask(mask);
  try {
    return fn();
  } finally {
    process.umask(previous);
  }
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function toBuffer(chunk: unknown): Buffer {
  if (Buffer.isBuffer(chunk)) return chunk;
  return Buffer.from(String(chunk), 'utf8');
}

function writeAll(socket: net.Socket, data: Buffer): Promise<void> {
  return new Promise((resolve, reject) => {
    socket.write(data, err => (err ? reject(err) : resolve()));
  });
}

/**
 * Privileged broker endpoint on a filesystem Unix socket.
 *
 * The socket is connectable by every local user; authorization comes from the
 * peer uid the kernel reports for each connection, resolved once on accept.
 * Each connection runs its own read/dispatch/write loop, so a slow caller
 * never holds up another.
 */
export class BrokerSocketServer {
  private readonly socketPath: string;
  private readonly dispatcher: BrokerDispatcher;
  private readonly credentials: CredentialResolver<net.Socket>;
  private readonly server: net.Server;
  private readonly connections = new Set<net.Socket>();
  private accepting = false;
  private closedPromise: Promise<void> | undefined;

  constructor(opts: BrokerSocketServerOptions) {
    this.socketPath = opts.socketPath;
    this.dispatcher = opts.dispatcher;
    this.credentials = opts.credentials ?? new PeerCredentialResolver();
    this.server = net.createServer(sock => this.handleConnection(sock));
  }

  get path(): string {
    return this.socketPath;
  }

  get connectionCount(): number {
    return this.connections.size;
  }

  /**
   * Binds the socket and starts accepting. When `shutdown` aborts, the
   * listener stops accepting; handlers already running are left to finish.
   */
  async listen(shutdown?: AbortSignal): Promise<void> {
    this.prepareSocketPath();
    await this.prepareStaleSocket();

    await new Promise<void>((resolve, reject) => {
      const onError = (err: Error): void => {
        this.server.off('listening', onListening);
        reject(new SocketBindError(this.socketPath, err.message));
      };
      const onListening = (): void => {
        this.server.off('error', onError);
        resolve();
      };
      this.server.once('error', onError);
      this.server.once('listening', onListening);
      // bind() runs synchronously inside listen(); umask 0 leaves the socket file 0777.
      withUmask(0, () => this.server.listen(this.socketPath));
    });

    this.accepting = true;
    this.server.on('error', err => console.error(`[ipc] accept error: ${err.message}`));

    if (shutdown) {
      if (shutdown.aborted) {
        this.stopAccepting();
      } else {
        shutdown.addEventListener('abort', () => this.stopAccepting(), { once: true });
      }
    }
  }

  /**
   * Stops accepting new connections. The returned promise settles once the
   * last live connection has ended.
   */
  stopAccepting(): Promise<void> {
    if (!this.closedPromise) {
      this.accepting = false;
      this.closedPromise = new Promise<void>(resolve => {
        this.server.close(() => resolve());
      });
      console.log(`[ipc] stopped accepting on ${this.socketPath}`);
    }
    return this.closedPromise;
  }

  /** Stops accepting and destroys live connections. */
  async close(): Promise<void> {
    const closing = this.stopAccepting();
    for (const conn of this.connections) conn.destroy();
    this.connections.clear();
    await closing;
    if (fs.existsSync(this.socketPath)) {
      fs.unlinkSync(this.socketPath);
    }
  }

  private handleConnection(socket: net.Socket): void {
    if (!this.accepting) {
      socket.destroy();
      return;
    }
    this.connections.add(socket);
    socket.once('close', () => this.connections.delete(socket));
    // Attached before anything is awaited: an unhandled 'error' would take the daemon down.
    socket.on('error', (err: Error) => {
      console.error(`[ipc] connection error: ${err.message}`);
    });

    this.serveConnection(socket).catch((err: unknown) => {
      console.error(`[ipc] connection handler error: ${describeError(err)}`);
      socket.destroy();
    });
  }

  private async serveConnection(socket: net.Socket): Promise<void> {
    let uid: number;
    try {
      uid = await this.credentials.resolveUid(socket);
    } catch (err: unknown) {
      const reason = describeError(err);
      console.error(`[ipc] rejected connection: ${reason}`);
      this.dispatcher.recordRefusal('connect', 'socket', 'unknown', reason);
      socket.destroy();
      return;
    }

    const caller: CallerContext = { uid, transport: 'socket' };
    const decoder = new EnvelopeDecoder();

    // Reading -> Dispatching -> Writing -> Reading; the iterator pauses the
    // socket while a request is being served, so requests never overlap.
    for await (const chunk of socket) {
      const request = decoder.push(toBuffer(chunk));
      if (!request) continue;

      let result: string;
      try {
        result = await this.dispatcher.dispatch(request, caller);
      } catch (err: unknown) {
        console.error(
          `[ipc] ${request.operation} (${request.correlationId}) failed for uid ${uid}: ${describeError(err)}`,
        );
        socket.end();
        return;
      }

      await writeAll(socket, encodeResponse(result));
    }

    if (decoder.pendingBytes > 0) {
      console.warn(`[ipc] discarding ${decoder.pendingBytes} bytes of incomplete request from uid ${uid}`);
    }
  }

  private prepareSocketPath(): void {
    const parentDir = path.dirname(this.socketPath);
    // Every local user must be able to reach the socket.
    const created = fs.mkdirSync(parentDir, { recursive: true, mode: 0o755 });
    if (created !== undefined) fs.chmodSync(parentDir, 0o755);

    if (!fs.existsSync(this.socketPath)) return;

    const stat = fs.lstatSync(this.socketPath);
    if (!stat.isSocket()) {
      throw new SocketBindError(this.socketPath, 'refusing to replace a non-socket path');
    }
  }

  private async prepareStaleSocket(): Promise<void> {
    if (!fs.existsSync(this.socketPath)) return;

    const inUse = await this.isSocketActive();
    if (inUse) {
      throw new SocketBindError(this.socketPath, 'socket path already in use');
    }

    fs.unlinkSync(this.socketPath);
  }

  private async isSocketActive(): Promise<boolean> {
    return new Promise((resolve) => {
      const client = net.createConnection(this.socketPath);
      let settled = false;

      const settle = (value: boolean): void => {
        if (settled) return;
        settled = true;
        client.destroy();
        resolve(value);
      };

      const timer = setTimeout(() => settle(true), 200);
      timer.unref();

      client.on('connect', () => {
        clearTimeout(timer);
        settle(true);
      });

      client.on('error', (err: NodeJS.ErrnoException) => {
        clearTimeout(timer);
        if (err.code === 'ECONNREFUSED' || err.code === 'ENOENT') {
          settle(false);
          return;
        }
        settle(true);
      });
    });
  }
}
