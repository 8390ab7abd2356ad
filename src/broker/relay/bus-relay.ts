// src/broker/relay/bus-relay.ts
import { BrokerError, fromBusError } from '../ipc/errors.ts';
import type { BrokerRequest } from '../ipc/types.ts';
import { BusCallError, type BusConnection, type BusConnector, type BusEndpoint } from '../bus/types.ts';
import type { BrokerRelay } from './types.ts';

export const DEFAULT_BUS_CALL_TIMEOUT_MS = 5000;

export interface BusRelayOptions {
  connect: BusConnector;
  endpoint: BusEndpoint;
  timeoutMs?: number;
}

/** Forwards each request to the system broker over its own system-bus connection. */
export class BusRelay implements BrokerRelay {
  private readonly connect: BusConnector;
  private readonly endpoint: BusEndpoint;
  private readonly timeoutMs: number;

  constructor(options: BusRelayOptions) {
    this.connect = options.connect;
    this.endpoint = options.endpoint;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_BUS_CALL_TIMEOUT_MS;
  }

  async forward(request: BrokerRequest): Promise<string> {
    let connection: BusConnection;
    try {
      connection = this.connect();
    } catch (err: unknown) {
      throw BrokerError.failed(`cannot connect to the system bus: ${err instanceof Error ? err.message : String(err)}`);
    }

    try {
      const body = await connection.call({
        destination: this.endpoint.name,
        path: this.endpoint.path,
        iface: this.endpoint.iface,
        member: request.operation,
        signature: 'sss',
        args: [request.protocolVersion, request.correlationId, request.requestJson],
        timeoutMs: this.timeoutMs,
      });
      const result = body[0];
      if (typeof result !== 'string') {
        throw BrokerError.failed(`${request.operation} reply carried no string result`);
      }
      return result;
    } catch (err: unknown) {
      if (err instanceof BusCallError) {
        console.warn(`[relay] ${request.operation} via ${this.endpoint.name} failed: ${err.errorName}: ${err.message}`);
        throw fromBusError(err.errorName, err.message);
      }
      if (err instanceof BrokerError) throw err;
      throw BrokerError.failed(err instanceof Error ? err.message : String(err));
    } finally {
      connection.disconnect();
    }
  }
}
