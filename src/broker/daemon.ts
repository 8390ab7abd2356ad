// src/broker/daemon.ts
import type * as net from 'node:net';
import { AuditJournal } from './audit/index.ts';
import type { AuditSink } from './audit/types.ts';
import { DbusNextConnection } from './bus/dbus-adapter.ts';
import { BusCredentialResolver } from './bus/credentials.ts';
import { createDeviceBrokerFacade } from './bus/device-broker.ts';
import { publishFacade } from './bus/facade.ts';
import { createSystemBrokerFacade } from './bus/system-broker.ts';
import { DEVICE_BROKER, type BusConnection, type BusConnector } from './bus/types.ts';
import type { BrokerConfig } from './config.ts';
import { importModule, loadBrokerImplementation, loadDeviceImplementation, type ModuleLoader } from './implementation.ts';
import { BrokerDispatcher, DeviceDispatcher } from './ipc/dispatcher.ts';
import { BrokerSocketServer } from './ipc/transport.ts';
import type { CredentialResolver } from './ipc/types.ts';

export interface BrokerDaemonDeps {
  connectSystemBus?: BusConnector;
  peerCredentials?: CredentialResolver<net.Socket>;
  loadModule?: ModuleLoader;
}

export interface BrokerDaemon {
  server: BrokerSocketServer;
  bus: BusConnection | undefined;
  /** Settles once shutdown has drained connections and released the bus and audit trail. */
  stopped: Promise<void>;
}

/**
 * Starts the privileged broker: loads the implementations, claims the bus
 * names and only then binds the socket, so a name conflict aborts startup
 * before any connection is accepted. Aborting `shutdown` stops accepting,
 * waits for live connections and releases everything.
 */
export async function startBrokerDaemon(
  config: BrokerConfig,
  shutdown: AbortSignal,
  deps: BrokerDaemonDeps = {},
): Promise<BrokerDaemon> {
  const load = deps.loadModule ?? importModule;
  if (!config.implementation) {
    throw new Error('No broker implementation configured (set "implementation" in the configuration)');
  }
  if (config.deviceBroker.enabled && !config.systemBus.enabled) {
    throw new Error('device_broker.enabled requires system_bus.enabled');
  }

  const implementation = await loadBrokerImplementation(config.implementation, load);
  const deviceImplementation = config.deviceBroker.enabled && config.deviceBroker.implementation
    ? await loadDeviceImplementation(config.deviceBroker.implementation, load)
    : undefined;

  let audit: AuditJournal | undefined;
  if (config.audit.path) {
    audit = new AuditJournal(config.audit.path, {
      flushIntervalMs: config.audit.flushIntervalMs,
      flushThreshold: config.audit.flushThreshold,
    });
  }
  const sink: AuditSink | undefined = audit;
  const dispatcher = new BrokerDispatcher(implementation, sink ? { audit: sink } : {});

  let bus: BusConnection | undefined;
  const server = new BrokerSocketServer(
    deps.peerCredentials
      ? { socketPath: config.socketPath, dispatcher, credentials: deps.peerCredentials }
      : { socketPath: config.socketPath, dispatcher },
  );

  const release = (): void => {
    bus?.disconnect();
    audit?.close();
  };

  try {
    if (config.systemBus.enabled) {
      const connectSystemBus = deps.connectSystemBus ?? DbusNextConnection.system;
      bus = connectSystemBus();
      await publishFacade(bus, config.systemBus.endpoint, createSystemBrokerFacade({
        iface: config.systemBus.endpoint.iface,
        dispatcher,
        credentials: new BusCredentialResolver(connectSystemBus),
      }));
      if (deviceImplementation) {
        const deviceDispatcher = new DeviceDispatcher(deviceImplementation, sink ? { audit: sink } : {});
        await publishFacade(bus, DEVICE_BROKER, createDeviceBrokerFacade(deviceDispatcher));
      }
    }
    await server.listen(shutdown);
  } catch (err: unknown) {
    release();
    throw err;
  }

  audit?.log({
    category: 'lifecycle',
    action: 'start',
    actor: `pid:${process.pid}`,
    detail: { socket_path: config.socketPath, system_bus: config.systemBus.enabled },
  });
  console.log(`[broker] listening on ${config.socketPath}`);

  const stopped = new Promise<void>((resolve, reject) => {
    const stop = (): void => {
      server.stopAccepting()
        .then(() => {
          audit?.log({ category: 'lifecycle', action: 'stop', actor: `pid:${process.pid}`, detail: {} });
          release();
          console.log('[broker] stopped');
          resolve();
        })
        .catch(reject);
    };
    if (shutdown.aborted) stop();
    else shutdown.addEventListener('abort', stop, { once: true });
  });

  return { server, bus, stopped };
}
