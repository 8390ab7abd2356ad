import { afterEach, describe, it } from 'node:test';
import assert from 'node:assert/strict';
import * as fs from 'node:fs';
import { mkdtempSync, rmSync } from 'node:fs';
import * as net from 'node:net';
import * as os from 'node:os';
import * as path from 'node:path';
import {
  DEFAULT_PROTOCOL_VERSION,
  parseCommand,
  parseGlobalArgs,
  parseJson,
  preflightSocketPath,
  runCli,
} from './index.ts';

const tempDirs: string[] = [];
const servers: net.Server[] = [];

function createTempDir(prefix = 'cli-test-'): string {
  const dir = mkdtempSync(path.join(os.tmpdir(), `${prefix}${process.pid}-`));
  tempDirs.push(dir);
  return dir;
}

async function listenServer(socketPath: string, onConn?: (socket: net.Socket) => void): Promise<net.Server> {
  const server = net.createServer((socket) => {
    socket.on('error', () => {});
    onConn?.(socket);
  });
  servers.push(server);
  await new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(socketPath, () => resolve());
  });
  return server;
}

afterEach(async () => {
  for (const server of servers.splice(0, servers.length)) {
    await new Promise<void>((resolve) => server.close(() => resolve()));
  }
  for (const dir of tempDirs.splice(0, tempDirs.length)) {
    rmSync(dir, { recursive: true, force: true });
  }
});

describe('cli/index', () => {
  it('parseGlobalArgs extracts --socket and --timeout and preserves remaining args', () => {
    const parsed = parseGlobalArgs(['--socket', '/tmp/s.sock', 'getAccounts', '--timeout', '250', '{}']);
    assert.equal(parsed.socketPath, '/tmp/s.sock');
    assert.equal(parsed.timeoutMs, 250);
    assert.equal(parsed.chunkSize, 1024);
    assert.deepEqual(parsed.args, ['getAccounts', '{}']);
  });

  it('parseGlobalArgs rejects a missing or invalid value', () => {
    assert.throws(() => parseGlobalArgs(['--socket']), { message: '--socket requires a path value' });
    assert.throws(() => parseGlobalArgs(['--timeout', 'soon']), { message: '--timeout must be a positive integer' });
  });

  it('parseCommand builds the request envelope fields', () => {
    const command = parseCommand(
      ['acquireTokenSilently', '{"scope":"x"}', '--protocol', '0.1', '--correlation', 'corr-123'],
    );
    assert.deepEqual(command, {
      kind: 'call',
      request: {
        operation: 'acquireTokenSilently',
        protocolVersion: '0.1',
        correlationId: 'corr-123',
        requestJson: '{"scope":"x"}',
      },
    });
  });

  it('parseCommand fills in defaults', () => {
    const command = parseCommand(['getLinuxBrokerVersion'], () => 'generated-id');
    assert.deepEqual(command, {
      kind: 'call',
      request: {
        operation: 'getLinuxBrokerVersion',
        protocolVersion: DEFAULT_PROTOCOL_VERSION,
        correlationId: 'generated-id',
        requestJson: '{}',
      },
    });
  });

  it('parseCommand returns help without an operation', () => {
    assert.deepEqual(parseCommand([]), { kind: 'help' });
    assert.deepEqual(parseCommand(['getAccounts', '--help']), { kind: 'help' });
  });

  it('parseCommand rejects unknown operations and bad payloads', () => {
    assert.throws(() => parseCommand(['mintCoins']), { message: 'Unknown operation: mintCoins' });
    assert.throws(() => parseCommand(['getAccounts', '{']), /requestJson must be valid JSON/);
    assert.throws(() => parseCommand(['getAccounts', '{}', 'extra']), { message: 'Unexpected argument: extra' });
  });

  it('parseJson throws a labeled error on invalid JSON', () => {
    assert.throws(() => parseJson('{', 'requestJson'), /requestJson must be valid JSON/i);
  });

  it('preflightSocketPath rejects missing and non-socket paths', () => {
    const dir = createTempDir();
    const filePath = path.join(dir, 'not-socket');
    assert.throws(() => preflightSocketPath(filePath), { message: `Broker socket not found: ${filePath}` });
    fs.writeFileSync(filePath, 'x');
    assert.throws(() => preflightSocketPath(filePath), /not a Unix socket/i);
  });

  it('preflightSocketPath warns for world-writable parent directories', async () => {
    const dir = createTempDir();
    fs.chmodSync(dir, 0o777);
    const socketPath = path.join(dir, 'broker.sock');
    await listenServer(socketPath);

    const warnings: string[] = [];
    preflightSocketPath(socketPath, (message) => warnings.push(message));
    assert.deepEqual(warnings, [`[security] Warning: socket parent directory is world-writable: ${dir}`]);
  });

  it('runCli sends the envelope and prints the raw response', async () => {
    const dir = createTempDir();
    const socketPath = path.join(dir, 'broker.sock');
    const received: string[] = [];
    await listenServer(socketPath, (socket) => {
      socket.once('data', (chunk: Buffer) => {
        received.push(chunk.toString('utf8'));
        socket.write('{"token":"abc"}');
      });
    });

    const output: string[] = [];
    await runCli(
      [
        '--socket', socketPath,
        'acquireTokenSilently', '{"scope":"x"}',
        '--protocol', '0.1', '--correlation', 'corr-123',
      ],
      (text) => output.push(text),
    );

    assert.deepEqual(received, ['{"acquireTokenSilently":["0.1","corr-123","{\\"scope\\":\\"x\\"}"]}']);
    assert.deepEqual(output, ['{"token":"abc"}']);
  });

  it('runCli adds nothing to a response that already ends in a newline', async () => {
    const dir = createTempDir();
    const socketPath = path.join(dir, 'broker.sock');
    await listenServer(socketPath, (socket) => {
      socket.once('data', () => {
        socket.end('{"accounts":[]}\n');
      });
    });

    const output: string[] = [];
    await runCli(['--socket', socketPath, 'getAccounts', '{}'], (text) => output.push(text));

    assert.deepEqual(output, ['{"accounts":[]}\n']);
  });
});
