// src/broker/ipc/errors.ts

/**
 * The single failure vocabulary every facade reports. `declined` means the
 * caller was refused (identity or authorization); `failed` covers everything
 * else, transport and implementation errors alike.
 */
export type BrokerErrorCode = 'declined' | 'failed';

export class BrokerError extends Error {
  readonly code: BrokerErrorCode;

  constructor(code: BrokerErrorCode, message: string) {
    super(message);
    this.name = 'BrokerError';
    this.code = code;
  }

  static declined(message: string): BrokerError {
    return new BrokerError('declined', message);
  }

  static failed(message: string): BrokerError {
    return new BrokerError('failed', message);
  }
}

export function toBrokerError(err: unknown): BrokerError {
  if (err instanceof BrokerError) return err;
  const message = err instanceof Error ? err.message : String(err);
  return BrokerError.failed(message);
}

/** Raised when the listening socket cannot be bound. Aborts startup. */
export class SocketBindError extends Error {
  constructor(socketPath: string, reason: string) {
    super(`Failed to bind UNIX socket at ${socketPath}: ${reason}`);
    this.name = 'SocketBindError';
  }
}

/** Raised when a well-known bus name is already owned. Aborts startup. */
export class BusNameTakenError extends Error {
  readonly busName: string;

  constructor(busName: string, detail = 'name is already owned by another connection') {
    super(`Cannot claim bus name ${busName}: ${detail}`);
    this.name = 'BusNameTakenError';
    this.busName = busName;
  }
}

export const DBUS_ERROR_ACCESS_DENIED = 'org.freedesktop.DBus.Error.AccessDenied';
export const DBUS_ERROR_FAILED = 'org.freedesktop.DBus.Error.Failed';
export const DBUS_ERROR_UNKNOWN_METHOD = 'org.freedesktop.DBus.Error.UnknownMethod';
export const DBUS_ERROR_INVALID_ARGS = 'org.freedesktop.DBus.Error.InvalidArgs';

export function toBusErrorName(err: BrokerError): string {
  return err.code === 'declined' ? DBUS_ERROR_ACCESS_DENIED : DBUS_ERROR_FAILED;
}

export function fromBusError(errorName: string, text: string): BrokerError {
  return errorName === DBUS_ERROR_ACCESS_DENIED
    ? BrokerError.declined(text)
    : BrokerError.failed(text || errorName);
}
