// src/broker/bus/facade.test.ts
import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { BusFacade, publishFacade } from './facade.ts';
import {
  BrokerError,
  BusNameTakenError,
  DBUS_ERROR_ACCESS_DENIED,
  DBUS_ERROR_FAILED,
  DBUS_ERROR_INVALID_ARGS,
  DBUS_ERROR_UNKNOWN_METHOD,
} from '../ipc/errors.ts';
import type { BusMethodCall } from './types.ts';
import { MemoryBus } from '../../test-support/memory-bus.ts';

const IFACE = 'net.example.Echo1';

const facade = new BusFacade(IFACE, [
  { name: 'echo', argNames: ['first', 'second'], invoke: async ([a = '', b = '']) => `${a}|${b}` },
  { name: 'whoami', argNames: [], invoke: async (_args, call) => call.sender ?? 'nobody' },
  {
    name: 'refuse',
    argNames: [],
    invoke: async () => {
      throw BrokerError.declined('not for you');
    },
  },
  {
    name: 'explode',
    argNames: [],
    invoke: async () => {
      throw new Error('backend crashed');
    },
  },
]);

function call(overrides: Partial<BusMethodCall>): BusMethodCall {
  return { sender: ':1.5', path: '/net/example/Echo1', iface: IFACE, member: 'echo', signature: 'ss', args: ['a', 'b'], ...overrides };
}

describe('BusFacade', () => {
  it('invokes the method and returns its string', async () => {
    assert.deepEqual(await facade.handle(call({})), { kind: 'return', signature: 's', body: ['a|b'] });
  });

  it('accepts calls that omit the interface', async () => {
    assert.deepEqual(await facade.handle(call({ iface: '' })), { kind: 'return', signature: 's', body: ['a|b'] });
  });

  it('passes the call through to the method', async () => {
    const reply = await facade.handle(call({ member: 'whoami', signature: '', args: [] }));
    assert.deepEqual(reply, { kind: 'return', signature: 's', body: [':1.5'] });
  });

  it('answers UnknownMethod for members it does not serve', async () => {
    assert.deepEqual(await facade.handle(call({ member: 'nope' })), {
      kind: 'error',
      name: DBUS_ERROR_UNKNOWN_METHOD,
      message: `No such method 'nope' in interface '${IFACE}'`,
    });
  });

  it('answers UnknownMethod for another interface', async () => {
    const reply = await facade.handle(call({ iface: 'net.example.Other' }));
    assert.equal(reply.kind === 'error' ? reply.name : reply.kind, DBUS_ERROR_UNKNOWN_METHOD);
  });

  it('rejects a wrong signature with InvalidArgs', async () => {
    assert.deepEqual(await facade.handle(call({ signature: 's', args: ['a'] })), {
      kind: 'error',
      name: DBUS_ERROR_INVALID_ARGS,
      message: "echo expects signature 'ss', got 's'",
    });
  });

  it('rejects non-string arguments with InvalidArgs', async () => {
    const reply = await facade.handle(call({ args: [1, 'b'] }));
    assert.equal(reply.kind === 'error' ? reply.name : reply.kind, DBUS_ERROR_INVALID_ARGS);
  });

  it('maps declined to AccessDenied and other failures to Failed', async () => {
    assert.deepEqual(await facade.handle(call({ member: 'refuse', signature: '', args: [] })), {
      kind: 'error',
      name: DBUS_ERROR_ACCESS_DENIED,
      message: 'not for you',
    });
    assert.deepEqual(await facade.handle(call({ member: 'explode', signature: '', args: [] })), {
      kind: 'error',
      name: DBUS_ERROR_FAILED,
      message: 'backend crashed',
    });
  });

  it('introspects its methods and arguments', async () => {
    const reply = await facade.handle(call({ iface: 'org.freedesktop.DBus.Introspectable', member: 'Introspect', signature: '', args: [] }));
    assert.equal(reply.kind, 'return');
    const xml = facade.introspect();
    assert.deepEqual(reply.kind === 'return' ? reply.body : [], [xml]);
    assert.ok(xml.includes(`  <interface name="${IFACE}">`));
    assert.ok(xml.includes([
      '    <method name="echo">',
      '      <arg name="first" type="s" direction="in"/>',
      '      <arg name="second" type="s" direction="in"/>',
      '      <arg name="response" type="s" direction="out"/>',
      '    </method>',
    ].join('\n')));
  });
});

describe('publishFacade', () => {
  const endpoint = { name: 'net.example.Echo1', path: '/net/example/Echo1', iface: IFACE };

  it('serves the facade under its well-known name', async () => {
    const bus = new MemoryBus();
    await publishFacade(bus.connect(0), endpoint, facade);
    const client = bus.connect(1000);
    const body = await client.call({
      destination: endpoint.name,
      path: endpoint.path,
      iface: IFACE,
      member: 'whoami',
      signature: '',
      args: [],
      timeoutMs: 1000,
    });
    assert.deepEqual(body, [client.uniqueName]);
  });

  it('fails when the name is already owned', async () => {
    const bus = new MemoryBus();
    await publishFacade(bus.connect(0), endpoint, facade);
    await assert.rejects(
      () => publishFacade(bus.connect(0), endpoint, facade),
      (err: unknown) => err instanceof BusNameTakenError && err.busName === endpoint.name,
    );
  });
});
