// src/test-support/memory-bus.ts
import { BusNameTakenError, DBUS_ERROR_UNKNOWN_METHOD } from '../broker/ipc/errors.ts';
import {
  BusCallError,
  DBUS_DAEMON,
  DBUS_ERROR_NAME_HAS_NO_OWNER,
  DBUS_ERROR_NO_REPLY,
  DBUS_ERROR_SERVICE_UNKNOWN,
  type BusCallOptions,
  type BusConnection,
  type BusMethodHandler,
  type BusReply,
} from '../broker/bus/types.ts';

/**
 * In-process message bus: routes calls between MemoryBusConnections by
 * unique or well-known name and answers GetConnectionUnixUser from the uid
 * each connection was opened with.
 */
export class MemoryBus {
  private nextId = 1;
  private readonly connections = new Map<string, MemoryBusConnection>();
  private readonly owners = new Map<string, MemoryBusConnection>();
  /** Every connection ever opened, disconnected ones included. */
  readonly opened: MemoryBusConnection[] = [];

  connect(uid = 1000): MemoryBusConnection {
    const connection = new MemoryBusConnection(this, `:1.${this.nextId++}`, uid);
    this.connections.set(connection.uniqueName, connection);
    this.opened.push(connection);
    return connection;
  }

  claim(name: string, connection: MemoryBusConnection): void {
    const owner = this.owners.get(name);
    if (owner && owner !== connection) throw new BusNameTakenError(name);
    this.owners.set(name, connection);
  }

  release(connection: MemoryBusConnection): void {
    this.connections.delete(connection.uniqueName);
    for (const [name, owner] of this.owners) {
      if (owner === connection) this.owners.delete(name);
    }
  }

  ownerOf(name: string): MemoryBusConnection | undefined {
    return this.connections.get(name) ?? this.owners.get(name);
  }

  async deliver(sender: MemoryBusConnection, options: BusCallOptions): Promise<BusReply> {
    if (options.destination === DBUS_DAEMON.name) return this.answerDaemon(options);
    const target = this.ownerOf(options.destination);
    if (!target) {
      return { kind: 'error', name: DBUS_ERROR_SERVICE_UNKNOWN, message: `The name ${options.destination} was not provided` };
    }
    const handler = target.handlerFor(options.path);
    if (!handler) {
      return { kind: 'error', name: DBUS_ERROR_UNKNOWN_METHOD, message: `No such object path '${options.path}'` };
    }
    return handler({
      sender: sender.uniqueName,
      path: options.path,
      iface: options.iface,
      member: options.member,
      signature: options.signature,
      args: options.args,
    });
  }

  private answerDaemon(options: BusCallOptions): BusReply {
    if (options.member !== 'GetConnectionUnixUser') {
      return { kind: 'error', name: DBUS_ERROR_UNKNOWN_METHOD, message: `Unknown method ${options.member}` };
    }
    const name = options.args[0];
    const owner = typeof name === 'string' ? this.ownerOf(name) : undefined;
    if (!owner) {
      return { kind: 'error', name: DBUS_ERROR_NAME_HAS_NO_OWNER, message: `Could not get UID of name '${String(name)}'` };
    }
    return { kind: 'return', signature: 'u', body: [owner.uid] };
  }
}

export class MemoryBusConnection implements BusConnection {
  readonly uniqueName: string;
  readonly uid: number;
  disconnected = false;
  private readonly bus: MemoryBus;
  private readonly handlers = new Map<string, BusMethodHandler>();
  private readonly closeWaiters: Array<() => void> = [];

  constructor(bus: MemoryBus, uniqueName: string, uid: number) {
    this.bus = bus;
    this.uniqueName = uniqueName;
    this.uid = uid;
  }

  async requestName(name: string): Promise<void> {
    this.bus.claim(name, this);
  }

  export(path: string, handler: BusMethodHandler): void {
    this.handlers.set(path, handler);
  }

  handlerFor(path: string): BusMethodHandler | undefined {
    return this.handlers.get(path);
  }

  async call(options: BusCallOptions): Promise<unknown[]> {
    if (this.disconnected) throw new Error('connection is closed');
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(new BusCallError(DBUS_ERROR_NO_REPLY, `${options.destination} ${options.member} timed out after ${options.timeoutMs} ms`));
      }, options.timeoutMs);
    });
    try {
      const reply = await Promise.race([this.bus.deliver(this, options), timeout]);
      if (reply.kind === 'error') throw new BusCallError(reply.name, reply.message);
      return reply.body;
    } finally {
      clearTimeout(timer);
    }
  }

  waitUntilClosed(): Promise<void> {
    if (this.disconnected) return Promise.resolve();
    return new Promise(resolve => this.closeWaiters.push(resolve));
  }

  disconnect(): void {
    if (this.disconnected) return;
    this.disconnected = true;
    this.bus.release(this);
    for (const resolve of this.closeWaiters.splice(0)) resolve();
  }
}
