// src/broker/bus/system-broker.test.ts
import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { createSystemBrokerFacade } from './system-broker.ts';
import { BusCredentialResolver } from './credentials.ts';
import { publishFacade } from './facade.ts';
import { BusCallError, DEFAULT_SYSTEM_BROKER, type BusConnection } from './types.ts';
import { BrokerDispatcher } from '../ipc/dispatcher.ts';
import { BrokerError, DBUS_ERROR_ACCESS_DENIED } from '../ipc/errors.ts';
import { BROKER_OPERATIONS } from '../ipc/operations.ts';
import type { CredentialResolver } from '../ipc/types.ts';
import { MemoryAuditSink, makeBroker } from '../../test-support/brokers.ts';
import { MemoryBus } from '../../test-support/memory-bus.ts';

function callBroker(client: BusConnection, member: string, args: string[]): Promise<unknown[]> {
  return client.call({
    destination: DEFAULT_SYSTEM_BROKER.name,
    path: DEFAULT_SYSTEM_BROKER.path,
    iface: DEFAULT_SYSTEM_BROKER.iface,
    member,
    signature: 'sss',
    args,
    timeoutMs: 1000,
  });
}

describe('system broker facade', () => {
  it('serves every broker operation', () => {
    const facade = createSystemBrokerFacade({
      iface: DEFAULT_SYSTEM_BROKER.iface,
      dispatcher: new BrokerDispatcher(makeBroker()),
      credentials: { resolveUid: async () => 0 },
    });
    const xml = facade.introspect();
    for (const operation of BROKER_OPERATIONS) {
      assert.ok(xml.includes(`<method name="${operation}">`), operation);
    }
  });

  it('invokes the implementation with the uid the bus reports for the caller', async () => {
    const bus = new MemoryBus();
    const service = bus.connect(0);
    const broker = makeBroker();
    const audit = new MemoryAuditSink();
    const facade = createSystemBrokerFacade({
      iface: DEFAULT_SYSTEM_BROKER.iface,
      dispatcher: new BrokerDispatcher(broker, { audit }),
      credentials: new BusCredentialResolver(() => bus.connect(0)),
    });
    await publishFacade(service, DEFAULT_SYSTEM_BROKER, facade);

    const client = bus.connect(1000);
    const body = await callBroker(client, 'acquireTokenSilently', ['0.1', 'corr-123', '{"scope":"x"}']);

    assert.deepEqual(body, ['{"operation":"acquireTokenSilently","uid":1000}']);
    assert.deepEqual(broker.calls, [{
      operation: 'acquireTokenSilently',
      protocolVersion: '0.1',
      correlationId: 'corr-123',
      requestJson: '{"scope":"x"}',
      uid: 1000,
    }]);
    assert.deepEqual(audit.records, [{
      category: 'broker',
      action: 'acquireTokenSilently',
      actor: 'uid:1000',
      detail: {
        correlation_id: 'corr-123',
        protocol_version: '0.1',
        transport: 'system-bus',
        sender: client.uniqueName,
      },
      decision: 'allow',
    }]);
  });

  it('declines without reaching the implementation when the uid cannot be resolved', async () => {
    const bus = new MemoryBus();
    const service = bus.connect(0);
    const broker = makeBroker();
    const audit = new MemoryAuditSink();
    const refusing: CredentialResolver<string | undefined> = {
      resolveUid: async () => {
        throw BrokerError.declined('cannot resolve uid');
      },
    };
    const facade = createSystemBrokerFacade({
      iface: DEFAULT_SYSTEM_BROKER.iface,
      dispatcher: new BrokerDispatcher(broker, { audit }),
      credentials: refusing,
    });
    await publishFacade(service, DEFAULT_SYSTEM_BROKER, facade);

    const client = bus.connect(1000);
    await assert.rejects(
      () => callBroker(client, 'getAccounts', ['0.1', 'corr-1', '{}']),
      (err: unknown) => err instanceof BusCallError && err.errorName === DBUS_ERROR_ACCESS_DENIED && err.message === 'cannot resolve uid',
    );
    assert.deepEqual(broker.calls, []);
    assert.deepEqual(audit.records, [{
      category: 'authz',
      action: 'getAccounts',
      actor: `bus:${client.uniqueName}`,
      detail: { transport: 'system-bus', reason: 'cannot resolve uid' },
      decision: 'deny',
    }]);
  });

  it('reports implementation failures as Failed', async () => {
    const bus = new MemoryBus();
    const service = bus.connect(0);
    const facade = createSystemBrokerFacade({
      iface: DEFAULT_SYSTEM_BROKER.iface,
      dispatcher: new BrokerDispatcher(makeBroker({
        removeAccount: async () => {
          throw new Error('account store is read-only');
        },
      })),
      credentials: new BusCredentialResolver(() => bus.connect(0)),
    });
    await publishFacade(service, DEFAULT_SYSTEM_BROKER, facade);

    await assert.rejects(() => callBroker(bus.connect(1000), 'removeAccount', ['0.1', 'c', '{}']), {
      errorName: 'org.freedesktop.DBus.Error.Failed',
      message: 'account store is read-only',
    });
  });
});
