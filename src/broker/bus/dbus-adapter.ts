// src/broker/bus/dbus-adapter.ts
import dbus from 'dbus-next';
import type { Message } from 'dbus-next';
import { BusNameTakenError, DBUS_ERROR_FAILED } from '../ipc/errors.ts';
import {
  BusCallError,
  DBUS_ERROR_NO_REPLY,
  type BusCallOptions,
  type BusConnection,
  type BusMethodCall,
  type BusMethodHandler,
  type BusReply,
} from './types.ts';

export const NAME_REQUEST_TIMEOUT_MS = 5000;

/** The part of dbus-next's MessageBus the adapter drives. */
export interface MessageBusPort {
  requestName(name: string, flags: number): Promise<number>;
  call(message: Message): Promise<Message | null>;
  send(message: Message): void;
  addMethodHandler(handler: (message: Message) => boolean): void;
  disconnect(): void;
  on(event: 'error', listener: (err: Error) => void): unknown;
}

export interface DbusNextConnectionOptions {
  nameRequestTimeoutMs?: number;
}

type CloseWaiter = (err: Error | undefined) => void;

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * BusConnection over a dbus-next MessageBus, using its low-level message API.
 *
 * dbus-next reports a lost or unreachable bus only as an `error` event and
 * leaves pending calls unsettled, so every round trip here is bounded by
 * both a timer and the connection closing.
 */
export class DbusNextConnection implements BusConnection {
  private readonly bus: MessageBusPort;
  private readonly nameRequestTimeoutMs: number;
  private readonly closeWaiters = new Set<CloseWaiter>();
  private closedWith: { err: Error | undefined } | null = null;

  static system(): DbusNextConnection {
    return new DbusNextConnection(dbus.systemBus());
  }

  static session(): DbusNextConnection {
    return new DbusNextConnection(dbus.sessionBus());
  }

  constructor(bus: MessageBusPort, options: DbusNextConnectionOptions = {}) {
    this.bus = bus;
    this.nameRequestTimeoutMs = options.nameRequestTimeoutMs ?? NAME_REQUEST_TIMEOUT_MS;
    this.bus.on('error', (err: Error) => {
      console.error('[bus] connection error:', err.message);
      this.settleClosed(err);
    });
  }

  async requestName(name: string): Promise<void> {
    let reply: number;
    try {
      reply = await this.bounded(
        this.bus.requestName(name, dbus.NameFlag.DO_NOT_QUEUE),
        this.nameRequestTimeoutMs,
        `RequestName(${name})`,
      );
    } catch (err: unknown) {
      throw new BusNameTakenError(name, describe(err));
    }
    if (reply !== dbus.RequestNameReply.PRIMARY_OWNER && reply !== dbus.RequestNameReply.ALREADY_OWNER) {
      throw new BusNameTakenError(name);
    }
  }

  export(path: string, handler: BusMethodHandler): void {
    this.bus.addMethodHandler((msg: Message) => {
      if (msg.path !== path) return false;
      const call: BusMethodCall = {
        sender: msg.sender ? msg.sender : undefined,
        path: msg.path,
        iface: msg.interface ?? '',
        member: msg.member,
        signature: msg.signature ?? '',
        args: msg.body ?? [],
      };
      handler(call)
        .catch((err: unknown): BusReply => ({ kind: 'error', name: DBUS_ERROR_FAILED, message: describe(err) }))
        .then(reply => this.bus.send(toReplyMessage(msg, reply)))
        .catch((err: unknown) => {
          console.error('[bus] failed to send reply:', describe(err));
        });
      return true;
    });
  }

  async call(options: BusCallOptions): Promise<unknown[]> {
    const message = new dbus.Message({
      destination: options.destination,
      path: options.path,
      interface: options.iface,
      member: options.member,
      signature: options.signature,
      body: options.args,
    });

    try {
      const reply = await this.bounded(
        this.bus.call(message),
        options.timeoutMs,
        `${options.destination} ${options.member}`,
      );
      return reply ? reply.body : [];
    } catch (err: unknown) {
      if (err instanceof dbus.DBusError) throw new BusCallError(err.type, err.text);
      throw err;
    }
  }

  waitUntilClosed(): Promise<void> {
    return new Promise((resolve, reject) => {
      const waiter: CloseWaiter = err => (err ? reject(err) : resolve());
      if (this.closedWith) waiter(this.closedWith.err);
      else this.closeWaiters.add(waiter);
    });
  }

  disconnect(): void {
    this.bus.disconnect();
    this.settleClosed(undefined);
  }

  /** Races `work` against a timeout and against the connection going away. */
  private bounded<T>(work: Promise<T>, timeoutMs: number, what: string): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    let onClose: CloseWaiter | undefined;

    const interrupted = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(new BusCallError(DBUS_ERROR_NO_REPLY, `${what} timed out after ${timeoutMs} ms`));
      }, timeoutMs);
      onClose = err => reject(err ?? new Error(`bus connection closed during ${what}`));
      if (this.closedWith) onClose(this.closedWith.err);
      else this.closeWaiters.add(onClose);
    });

    return Promise.race([work, interrupted]).finally(() => {
      clearTimeout(timer);
      if (onClose) this.closeWaiters.delete(onClose);
    });
  }

  private settleClosed(err: Error | undefined): void {
    if (this.closedWith) return;
    this.closedWith = { err };
    const waiters = [...this.closeWaiters];
    this.closeWaiters.clear();
    for (const waiter of waiters) waiter(err);
  }
}

function toReplyMessage(call: Message, reply: BusReply): Message {
  if (reply.kind === 'return') {
    return dbus.Message.newMethodReturn(call, reply.signature, reply.body);
  }
  return dbus.Message.newError(call, reply.name, reply.message);
}
