// src/broker/bus/credentials.ts
import { BrokerError } from '../ipc/errors.ts';
import type { CredentialResolver } from '../ipc/types.ts';
import { DBUS_DAEMON, type BusConnector } from './types.ts';

export const CREDENTIAL_LOOKUP_TIMEOUT_MS = 5000;

/**
 * Resolves a bus sender to its uid by asking the bus daemon. The daemon is
 * the only trusted source; a missing sender or a failed lookup declines.
 *
 * Each lookup runs on its own connection, disconnected afterwards, so a
 * lookup that times out leaves no pending reply behind on a long-lived one.
 */
export class BusCredentialResolver implements CredentialResolver<string | undefined> {
  private readonly connect: BusConnector;
  private readonly timeoutMs: number;

  constructor(connect: BusConnector, timeoutMs = CREDENTIAL_LOOKUP_TIMEOUT_MS) {
    this.connect = connect;
    this.timeoutMs = timeoutMs;
  }

  async resolveUid(sender: string | undefined): Promise<number> {
    if (!sender) throw BrokerError.declined('caller has no bus sender name');

    let body: unknown[];
    try {
      body = await this.lookup(sender);
    } catch (err: unknown) {
      const reason = err instanceof Error ? err.message : String(err);
      throw BrokerError.declined(`cannot resolve uid of ${sender}: ${reason}`);
    }

    const uid = body[0];
    if (typeof uid !== 'number' || !Number.isInteger(uid) || uid < 0) {
      throw BrokerError.declined(`bus returned no valid uid for ${sender}`);
    }
    return uid;
  }

  private async lookup(sender: string): Promise<unknown[]> {
    const connection = this.connect();
    try {
      return await connection.call({
        destination: DBUS_DAEMON.name,
        path: DBUS_DAEMON.path,
        iface: DBUS_DAEMON.iface,
        member: 'GetConnectionUnixUser',
        signature: 's',
        args: [sender],
        timeoutMs: this.timeoutMs,
      });
    } finally {
      connection.disconnect();
    }
  }
}
