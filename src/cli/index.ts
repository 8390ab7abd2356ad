#!/usr/bin/env -S node --import tsx
import { randomUUID } from 'node:crypto';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { pathToFileURL } from 'node:url';
import { DEFAULT_SOCKET_PATH } from '../broker/config.ts';
import { BROKER_OPERATIONS, isBrokerOperation } from '../broker/ipc/operations.ts';
import type { BrokerRequest } from '../broker/ipc/types.ts';
import { DEFAULT_CHUNK_SIZE, DEFAULT_RELAY_TIMEOUT_MS, SocketRelay } from '../broker/relay/socket-relay.ts';

export const DEFAULT_SOCKET = process.env['BROKER_RELAY_SOCKET'] || DEFAULT_SOCKET_PATH;
export const DEFAULT_PROTOCOL_VERSION = '0.0';

export interface GlobalOptions {
  socketPath: string;
  timeoutMs: number;
  chunkSize: number;
  args: string[];
}

export type CliCommand = { kind: 'help' } | { kind: 'call'; request: BrokerRequest };

export function printHelp(): void {
  console.log(`Broker relay CLI

Usage:
  broker-cli [--socket <path>] [--timeout <ms>] [--chunk-size <bytes>] <operation> [requestJson]
             [--protocol <version>] [--correlation <id>]

Sends one request to the broker socket and prints the raw response.

Operations:
${BROKER_OPERATIONS.map(op => `  ${op}`).join('\n')}
`);
}

export function parseJson(raw: string, label: string): unknown {
  try {
    return JSON.parse(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`${label} must be valid JSON: ${message}`);
  }
}

function takeValue(argv: string[], i: number, flag: string, what: string): string {
  const value = argv[i + 1];
  if (!value || value.startsWith('-')) {
    throw new Error(`${flag} requires ${what}`);
  }
  return value;
}

function parsePositiveInt(raw: string, flag: string): number {
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`${flag} must be a positive integer`);
  }
  return value;
}

export function parseGlobalArgs(argv: string[]): GlobalOptions {
  const args: string[] = [];
  let socketPath = DEFAULT_SOCKET;
  let timeoutMs = DEFAULT_RELAY_TIMEOUT_MS;
  let chunkSize = DEFAULT_CHUNK_SIZE;
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (typeof arg !== 'string') continue;
    if (arg === '--socket') {
      socketPath = takeValue(argv, i, '--socket', 'a path value');
      i += 1;
      continue;
    }
    if (arg === '--timeout') {
      timeoutMs = parsePositiveInt(takeValue(argv, i, '--timeout', 'a value in milliseconds'), '--timeout');
      i += 1;
      continue;
    }
    if (arg === '--chunk-size') {
      chunkSize = parsePositiveInt(takeValue(argv, i, '--chunk-size', 'a value in bytes'), '--chunk-size');
      i += 1;
      continue;
    }
    args.push(arg);
  }
  return { socketPath, timeoutMs, chunkSize, args };
}

export function parseCommand(args: string[], newCorrelationId: () => string = randomUUID): CliCommand {
  const positional: string[] = [];
  let protocolVersion = DEFAULT_PROTOCOL_VERSION;
  let correlationId: string | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (typeof arg !== 'string') continue;
    if (arg === '--help' || arg === '-h') return { kind: 'help' };
    if (arg === '--protocol') {
      protocolVersion = takeValue(args, i, '--protocol', 'a version');
      i += 1;
      continue;
    }
    if (arg === '--correlation') {
      correlationId = takeValue(args, i, '--correlation', 'an id');
      i += 1;
      continue;
    }
    if (arg.startsWith('--')) throw new Error(`Unknown flag: ${arg}`);
    positional.push(arg);
  }

  const [operation, requestJson = '{}', extra] = positional;
  if (operation === undefined) return { kind: 'help' };
  if (!isBrokerOperation(operation)) {
    throw new Error(`Unknown operation: ${operation}`);
  }
  if (extra !== undefined) throw new Error(`Unexpected argument: ${extra}`);
  parseJson(requestJson, 'requestJson');

  return {
    kind: 'call',
    request: {
      operation,
      protocolVersion,
      correlationId: correlationId ?? newCorrelationId(),
      requestJson,
    },
  };
}

export function preflightSocketPath(socketPath: string, warn: (message: string) => void = console.error): void {
  const parentDir = path.dirname(socketPath);
  try {
    const parentStat = fs.statSync(parentDir);
    if ((parentStat.mode & 0o002) !== 0) {
      warn(`[security] Warning: socket parent directory is world-writable: ${parentDir}`);
    }
  } catch {
    // The connect attempt below reports a missing directory.
  }

  if (!fs.existsSync(socketPath)) {
    throw new Error(`Broker socket not found: ${socketPath}`);
  }

  const stat = fs.lstatSync(socketPath);
  if (!stat.isSocket()) {
    throw new Error(`Broker path is not a Unix socket: ${socketPath}`);
  }
}

export async function runCli(
  argv: string[] = process.argv.slice(2),
  print: (text: string) => void = text => process.stdout.write(text),
): Promise<void> {
  const { socketPath, timeoutMs, chunkSize, args } = parseGlobalArgs(argv);
  const command = parseCommand(args);
  if (command.kind === 'help') {
    printHelp();
    return;
  }
  preflightSocketPath(socketPath);
  const relay = new SocketRelay({ socketPath, timeoutMs, chunkSize });
  const result = await relay.forward(command.request);
  print(result);
}

function isDirectRun(): boolean {
  const argv1 = process.argv[1];
  if (!argv1) return false;
  return import.meta.url === pathToFileURL(argv1).href;
}

if (isDirectRun()) {
  runCli().catch((err) => {
    const message = err instanceof Error ? err.message : String(err);
    console.error(message);
    process.exit(1);
  });
}
