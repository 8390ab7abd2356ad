// src/broker/bus/types.ts

/** A method call as delivered by the bus, sender included. */
export interface BusMethodCall {
  /** Unique connection name of the caller; absent when the bus did not supply one. */
  sender: string | undefined;
  path: string;
  iface: string;
  member: string;
  signature: string;
  args: unknown[];
}

export type BusReply =
  | { kind: 'return'; signature: string; body: unknown[] }
  | { kind: 'error'; name: string; message: string };

export type BusMethodHandler = (call: BusMethodCall) => Promise<BusReply>;

export interface BusCallOptions {
  destination: string;
  path: string;
  iface: string;
  member: string;
  signature: string;
  args: unknown[];
  timeoutMs: number;
}

/** Where a service lives on the bus. */
export interface BusEndpoint {
  name: string;
  path: string;
  iface: string;
}

/**
 * The slice of a bus connection the brokers need. Implemented over dbus-next
 * for real buses and in memory for tests.
 */
export interface BusConnection {
  /** Claims a well-known name without queueing; throws BusNameTakenError if owned. */
  requestName(name: string): Promise<void>;
  /** Routes every method call addressed to `path` to `handler`. */
  export(path: string, handler: BusMethodHandler): void;
  /** Calls a remote method; rejects with BusCallError on an error reply or timeout. */
  call(options: BusCallOptions): Promise<unknown[]>;
  /** Settles when the connection goes away: resolves on disconnect(), rejects on a bus error. */
  waitUntilClosed(): Promise<void>;
  disconnect(): void;
}

export type BusConnector = () => BusConnection;

export class BusCallError extends Error {
  readonly errorName: string;

  constructor(errorName: string, message: string) {
    super(message);
    this.name = 'BusCallError';
    this.errorName = errorName;
  }
}

export const DBUS_DAEMON: BusEndpoint = {
  name: 'org.freedesktop.DBus',
  path: '/org/freedesktop/DBus',
  iface: 'org.freedesktop.DBus',
};

export const DBUS_ERROR_NO_REPLY = 'org.freedesktop.DBus.Error.NoReply';
export const DBUS_ERROR_NAME_HAS_NO_OWNER = 'org.freedesktop.DBus.Error.NameHasNoOwner';
export const DBUS_ERROR_SERVICE_UNKNOWN = 'org.freedesktop.DBus.Error.ServiceUnknown';
export const INTROSPECTABLE_IFACE = 'org.freedesktop.DBus.Introspectable';

/** Compatibility names desktop clients already call on the session bus. */
export const SESSION_BROKER: BusEndpoint = {
  name: 'com.microsoft.identity.broker1',
  path: '/com/microsoft/identity/broker1',
  iface: 'com.microsoft.identity.Broker1',
};

export const DEVICE_BROKER: BusEndpoint = {
  name: 'com.microsoft.identity.DeviceBroker1',
  path: '/com/microsoft/identity/devicebroker1',
  iface: 'com.microsoft.identity.DeviceBroker1',
};

export const DEFAULT_SYSTEM_BROKER: BusEndpoint = {
  name: 'net.brokerrelay.Broker1',
  path: '/net/brokerrelay/Broker1',
  iface: 'net.brokerrelay.Broker1',
};
