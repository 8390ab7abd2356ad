// src/session/service.ts
import type { BrokerConfig } from '../broker/config.ts';
import { DbusNextConnection } from '../broker/bus/dbus-adapter.ts';
import { publishFacade } from '../broker/bus/facade.ts';
import { createSessionBrokerFacade } from '../broker/bus/session-broker.ts';
import { SESSION_BROKER, type BusConnection, type BusConnector } from '../broker/bus/types.ts';
import { BusRelay } from '../broker/relay/bus-relay.ts';
import { SocketRelay } from '../broker/relay/socket-relay.ts';
import type { BrokerRelay } from '../broker/relay/types.ts';

export interface SessionBrokerDeps {
  connectSessionBus?: BusConnector;
  connectSystemBus?: BusConnector;
}

export function createRelay(config: BrokerConfig, connectSystemBus: BusConnector = DbusNextConnection.system): BrokerRelay {
  if (config.relay.mode === 'bus') {
    return new BusRelay({
      connect: connectSystemBus,
      endpoint: config.systemBus.endpoint,
      timeoutMs: config.systemBus.callTimeoutMs,
    });
  }
  return new SocketRelay({
    socketPath: config.socketPath,
    timeoutMs: config.relay.timeoutMs,
    chunkSize: config.relay.chunkSize,
  });
}

/** Claims the session broker name and forwards every call to the system broker. */
export async function startSessionBroker(config: BrokerConfig, deps: SessionBrokerDeps = {}): Promise<BusConnection> {
  const relay = createRelay(config, deps.connectSystemBus);
  const bus = (deps.connectSessionBus ?? DbusNextConnection.session)();
  try {
    await publishFacade(bus, SESSION_BROKER, createSessionBrokerFacade(relay));
  } catch (err: unknown) {
    bus.disconnect();
    throw err;
  }
  console.log(`[session] forwarding ${SESSION_BROKER.name} via ${config.relay.mode}`);
  return bus;
}
