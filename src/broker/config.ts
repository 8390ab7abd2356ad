// src/broker/config.ts
import * as fs from 'node:fs';
import { parse } from 'yaml';
import { DEFAULT_SYSTEM_BROKER, type BusEndpoint } from './bus/types.ts';
import { DEFAULT_BUS_CALL_TIMEOUT_MS } from './relay/bus-relay.ts';
import { DEFAULT_CHUNK_SIZE, DEFAULT_RELAY_TIMEOUT_MS } from './relay/socket-relay.ts';

export const DEFAULT_CONFIG_PATH = '/etc/broker-relay/broker.yaml';
export const DEFAULT_SOCKET_PATH = '/run/broker-relay/broker.sock';

export type RelayMode = 'bus' | 'socket';

export interface BrokerConfig {
  socketPath: string;
  /** Module path of the pluggable broker implementation. */
  implementation: string | undefined;
  systemBus: {
    enabled: boolean;
    endpoint: BusEndpoint;
    callTimeoutMs: number;
  };
  deviceBroker: {
    enabled: boolean;
    implementation: string | undefined;
  };
  relay: {
    mode: RelayMode;
    timeoutMs: number;
    chunkSize: number;
  };
  audit: {
    /** JSON-lines journal; auditing is off when unset. */
    path: string | undefined;
    flushIntervalMs: number;
    flushThreshold: number;
  };
}

export function defaultConfig(): BrokerConfig {
  return {
    socketPath: DEFAULT_SOCKET_PATH,
    implementation: undefined,
    systemBus: { enabled: true, endpoint: { ...DEFAULT_SYSTEM_BROKER }, callTimeoutMs: DEFAULT_BUS_CALL_TIMEOUT_MS },
    deviceBroker: { enabled: false, implementation: undefined },
    relay: { mode: 'socket', timeoutMs: DEFAULT_RELAY_TIMEOUT_MS, chunkSize: DEFAULT_CHUNK_SIZE },
    audit: { path: undefined, flushIntervalMs: 500, flushThreshold: 100 },
  };
}

type Section = Record<string, unknown>;

function isSection(value: unknown): value is Section {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(raw: Section, key: string): Section {
  const value = raw[key];
  if (value === undefined || value === null) return {};
  if (!isSection(value)) throw new Error(`${key} must be a mapping`);
  return value;
}

function optionalString(raw: Section, key: string, name: string): string | undefined {
  const value = raw[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string' || value === '') throw new Error(`${name} must be a non-empty string`);
  return value;
}

function optionalBoolean(raw: Section, key: string, name: string): boolean | undefined {
  const value = raw[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'boolean') throw new Error(`${name} must be true or false`);
  return value;
}

function optionalPositiveInt(raw: Section, key: string, name: string): number | undefined {
  const value = raw[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
    throw new Error(`${name} must be a positive integer`);
  }
  return value;
}

function parseRelayMode(value: unknown, name: string): RelayMode | undefined {
  if (value === undefined || value === null) return undefined;
  if (value === 'bus' || value === 'socket') return value;
  throw new Error(`${name} must be "bus" or "socket"`);
}

/** Applies a parsed YAML document on top of the defaults. */
export function resolveConfig(raw: unknown): BrokerConfig {
  const config = defaultConfig();
  if (raw === undefined || raw === null) return config;
  if (!isSection(raw)) throw new Error('configuration must be a mapping');

  config.socketPath = optionalString(raw, 'socket_path', 'socket_path') ?? config.socketPath;
  config.implementation = optionalString(raw, 'implementation', 'implementation');

  const bus = section(raw, 'system_bus');
  config.systemBus.enabled = optionalBoolean(bus, 'enabled', 'system_bus.enabled') ?? config.systemBus.enabled;
  config.systemBus.endpoint = {
    name: optionalString(bus, 'name', 'system_bus.name') ?? config.systemBus.endpoint.name,
    path: optionalString(bus, 'path', 'system_bus.path') ?? config.systemBus.endpoint.path,
    iface: optionalString(bus, 'interface', 'system_bus.interface') ?? config.systemBus.endpoint.iface,
  };
  if (!config.systemBus.endpoint.path.startsWith('/')) {
    throw new Error('system_bus.path must be an absolute object path');
  }
  config.systemBus.callTimeoutMs =
    optionalPositiveInt(bus, 'call_timeout_ms', 'system_bus.call_timeout_ms') ?? config.systemBus.callTimeoutMs;

  const device = section(raw, 'device_broker');
  config.deviceBroker.enabled = optionalBoolean(device, 'enabled', 'device_broker.enabled') ?? config.deviceBroker.enabled;
  config.deviceBroker.implementation = optionalString(device, 'implementation', 'device_broker.implementation');
  if (config.deviceBroker.enabled && !config.deviceBroker.implementation) {
    throw new Error('device_broker.implementation is required when device_broker.enabled is true');
  }

  const relay = section(raw, 'relay');
  config.relay.mode = parseRelayMode(relay['mode'], 'relay.mode') ?? config.relay.mode;
  config.relay.timeoutMs = optionalPositiveInt(relay, 'timeout_ms', 'relay.timeout_ms') ?? config.relay.timeoutMs;
  config.relay.chunkSize = optionalPositiveInt(relay, 'chunk_size', 'relay.chunk_size') ?? config.relay.chunkSize;

  const audit = section(raw, 'audit');
  config.audit.path = optionalString(audit, 'path', 'audit.path');
  config.audit.flushIntervalMs =
    optionalPositiveInt(audit, 'flush_interval_ms', 'audit.flush_interval_ms') ?? config.audit.flushIntervalMs;
  config.audit.flushThreshold =
    optionalPositiveInt(audit, 'flush_threshold', 'audit.flush_threshold') ?? config.audit.flushThreshold;

  return config;
}

/**
 * Reads the YAML configuration, falling back to defaults when the file does
 * not exist, then applies environment overrides.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, filePath?: string): BrokerConfig {
  const configPath = filePath ?? env['BROKER_RELAY_CONFIG'] ?? DEFAULT_CONFIG_PATH;

  let raw: unknown;
  try {
    raw = parse(fs.readFileSync(configPath, 'utf8'));
  } catch (err: unknown) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      console.warn(`[config] ${configPath} not found, using defaults`);
      raw = undefined;
    } else {
      const reason = err instanceof Error ? err.message : String(err);
      throw new Error(`Failed to read configuration ${configPath}: ${reason}`);
    }
  }

  let config: BrokerConfig;
  try {
    config = resolveConfig(raw);
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new Error(`Invalid configuration ${configPath}: ${reason}`);
  }

  const socketOverride = env['BROKER_RELAY_SOCKET'];
  if (socketOverride) config.socketPath = socketOverride;
  const modeOverride = env['BROKER_RELAY_MODE'];
  if (modeOverride) {
    config.relay.mode = parseRelayMode(modeOverride, 'BROKER_RELAY_MODE') ?? config.relay.mode;
  }
  return config;
}
