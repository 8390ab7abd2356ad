// src/broker/bus/facade.ts
import {
  DBUS_ERROR_INVALID_ARGS,
  DBUS_ERROR_UNKNOWN_METHOD,
  toBrokerError,
  toBusErrorName,
} from '../ipc/errors.ts';
import {
  INTROSPECTABLE_IFACE,
  type BusConnection,
  type BusEndpoint,
  type BusMethodCall,
  type BusReply,
} from './types.ts';

/** One bus method: string arguments in, one string out. */
export interface FacadeMethod {
  name: string;
  argNames: readonly string[];
  invoke(args: string[], call: BusMethodCall): Promise<string>;
}

function escapeXml(value: string): string {
  return value.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;').replace(/"/g, '&quot;');
}

/**
 * Exposes a table of string-in/string-out methods on one interface.
 * Broker failures become AccessDenied or Failed replies; wrong arity or
 * types are rejected with InvalidArgs before the method runs.
 */
export class BusFacade {
  readonly iface: string;
  private readonly methods: Map<string, FacadeMethod>;

  constructor(iface: string, methods: FacadeMethod[]) {
    this.iface = iface;
    this.methods = new Map(methods.map(method => [method.name, method]));
  }

  readonly handle = async (call: BusMethodCall): Promise<BusReply> => {
    if (call.iface === INTROSPECTABLE_IFACE) {
      if (call.member === 'Introspect') return { kind: 'return', signature: 's', body: [this.introspect()] };
      return unknownMethod(call);
    }
    if (call.iface !== '' && call.iface !== this.iface) return unknownMethod(call);

    const method = this.methods.get(call.member);
    if (!method) return unknownMethod(call);

    const expected = 's'.repeat(method.argNames.length);
    const args: string[] = [];
    for (const arg of call.args) {
      if (typeof arg === 'string') args.push(arg);
    }
    if (call.signature !== expected || args.length !== method.argNames.length) {
      return {
        kind: 'error',
        name: DBUS_ERROR_INVALID_ARGS,
        message: `${method.name} expects signature '${expected}', got '${call.signature}'`,
      };
    }

    try {
      const result = await method.invoke(args, call);
      return { kind: 'return', signature: 's', body: [result] };
    } catch (err: unknown) {
      const error = toBrokerError(err);
      return { kind: 'error', name: toBusErrorName(error), message: error.message };
    }
  };

  introspect(): string {
    const lines = [
      '<!DOCTYPE node PUBLIC "-//freedesktop//DTD D-BUS Object Introspection 1.0//EN"',
      ' "http://www.freedesktop.org/standards/dbus/1.0/introspect.dtd">',
      '<node>',
      `  <interface name="${INTROSPECTABLE_IFACE}">`,
      '    <method name="Introspect">',
      '      <arg name="xml_data" type="s" direction="out"/>',
      '    </method>',
      '  </interface>',
      `  <interface name="${escapeXml(this.iface)}">`,
    ];
    for (const method of this.methods.values()) {
      lines.push(`    <method name="${escapeXml(method.name)}">`);
      for (const arg of method.argNames) {
        lines.push(`      <arg name="${escapeXml(arg)}" type="s" direction="in"/>`);
      }
      lines.push('      <arg name="response" type="s" direction="out"/>');
      lines.push('    </method>');
    }
    lines.push('  </interface>', '</node>');
    return lines.join('\n');
  }
}

function unknownMethod(call: BusMethodCall): BusReply {
  return {
    kind: 'error',
    name: DBUS_ERROR_UNKNOWN_METHOD,
    message: `No such method '${call.member}' in interface '${call.iface}'`,
  };
}

/**
 * Claims the endpoint's name and exports the facade at its path. Name
 * acquisition failures propagate so startup can abort before serving.
 */
export async function publishFacade(bus: BusConnection, endpoint: BusEndpoint, facade: BusFacade): Promise<void> {
  bus.export(endpoint.path, facade.handle);
  await bus.requestName(endpoint.name);
  console.log(`[bus] serving ${endpoint.iface} as ${endpoint.name} at ${endpoint.path}`);
}
