import { mkdtempSync, readFileSync, rmSync, statSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { after, describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { setTimeout as sleep } from 'node:timers/promises';
import { AuditJournal, entryDigest, originDigest, readJournal, verifyJournal } from './journal.ts';
import type { AuditRecord } from './types.ts';

const TEST_DIR = mkdtempSync(join(tmpdir(), 'broker-audit-journal-'));
let counter = 0;

function journalPath(): string {
  return join(TEST_DIR, `case-${++counter}`, 'audit.jsonl');
}

const FIXED_NOW = (): Date => new Date('2026-01-02T03:04:05.000Z');

const allowed: AuditRecord = {
  category: 'broker',
  action: 'getAccounts',
  actor: 'uid:1000',
  detail: { correlation_id: 'c-1', transport: 'socket' },
  decision: 'allow',
};

const started: AuditRecord = {
  category: 'lifecycle',
  action: 'start',
  actor: 'pid:1',
  detail: {},
};

function writeEntries(filePath: string, records: AuditRecord[]): void {
  const journal = new AuditJournal(filePath, { now: FIXED_NOW });
  for (const record of records) journal.log(record);
  journal.close();
}

describe('audit/journal', () => {
  after(() => {
    rmSync(TEST_DIR, { recursive: true, force: true });
  });

  it('writes one chained JSON line per record', () => {
    const filePath = journalPath();
    writeEntries(filePath, [started, allowed]);

    const entries = readJournal(filePath);
    const first = {
      seq: 1,
      at: '2026-01-02T03:04:05.000Z',
      category: 'lifecycle' as const,
      action: 'start',
      actor: 'pid:1',
      detail: {},
      prev: originDigest(),
    };
    const second = {
      seq: 2,
      at: '2026-01-02T03:04:05.000Z',
      category: 'broker' as const,
      action: 'getAccounts',
      actor: 'uid:1000',
      detail: { correlation_id: 'c-1', transport: 'socket' },
      decision: 'allow' as const,
      prev: entryDigest(first),
    };
    assert.deepEqual(entries, [
      { ...first, digest: entryDigest(first) },
      { ...second, digest: entryDigest(second) },
    ]);
    assert.equal(readFileSync(filePath, 'utf8').split('\n').length, 3);
  });

  it('flushes immediately when the threshold is reached', () => {
    const filePath = journalPath();
    const journal = new AuditJournal(filePath, { flushIntervalMs: 10_000, flushThreshold: 2 });

    journal.log(allowed);
    assert.deepEqual(readJournal(filePath), []);
    journal.log({ ...allowed, category: 'authz', actor: 'bus::1.42', decision: 'deny' });
    assert.deepEqual(readJournal(filePath).map(e => e.decision), ['allow', 'deny']);

    journal.close();
  });

  it('flushes on the timer interval', async () => {
    const filePath = journalPath();
    const journal = new AuditJournal(filePath, { flushIntervalMs: 20, flushThreshold: 10 });

    journal.log(started);
    await sleep(80);
    assert.equal(readJournal(filePath).length, 1);

    journal.close();
  });

  it('continues the chain when a journal is reopened', () => {
    const filePath = journalPath();
    writeEntries(filePath, [started]);
    writeEntries(filePath, [allowed]);

    const entries = readJournal(filePath);
    assert.deepEqual(entries.map(e => e.seq), [1, 2]);
    assert.equal(entries[1]?.prev, entries[0]?.digest);
    assert.deepEqual(verifyJournal(entries), { valid: true });
  });

  it('creates the journal readable by its owner only', () => {
    const filePath = journalPath();
    writeEntries(filePath, [started]);
    assert.equal((statSync(filePath).mode & 0o777).toString(8), '600');
    assert.equal((statSync(join(filePath, '..')).mode & 0o777).toString(8), '700');
  });

  it('refuses records after close', () => {
    const journal = new AuditJournal(journalPath());
    journal.close();
    assert.throws(() => journal.log(started), { message: 'audit journal is closed' });
  });

  it('verifies its own chain', () => {
    const journal = new AuditJournal(journalPath());
    journal.log(started);
    journal.log(allowed);
    assert.deepEqual(journal.verify(), { valid: true });
    journal.close();
  });
});

describe('audit/journal verification', () => {
  it('detects an edited entry', () => {
    const filePath = journalPath();
    writeEntries(filePath, [allowed, allowed]);
    const content = readFileSync(filePath, 'utf8');
    writeFileSync(filePath, content.replace('"actor":"uid:1000"', '"actor":"uid:0"'));

    assert.deepEqual(verifyJournal(readJournal(filePath)), { valid: false, brokenAt: 1 });
  });

  it('detects a removed entry', () => {
    const filePath = journalPath();
    writeEntries(filePath, [started, allowed, allowed]);
    const lines = readFileSync(filePath, 'utf8').split('\n');
    writeFileSync(filePath, [lines[0], lines[2], ''].join('\n'));

    assert.deepEqual(verifyJournal(readJournal(filePath)), { valid: false, brokenAt: 3 });
  });

  it('checks a tail from the digest of the entry before it', () => {
    const filePath = journalPath();
    writeEntries(filePath, [started, allowed, allowed]);
    const entries = readJournal(filePath);

    assert.deepEqual(verifyJournal(entries.slice(1), entries[0]?.digest), { valid: true });
    assert.deepEqual(verifyJournal(entries.slice(1)), { valid: false, brokenAt: 2 });
  });

  it('treats a missing journal as empty', () => {
    assert.deepEqual(readJournal(join(TEST_DIR, 'absent.jsonl')), []);
    assert.deepEqual(verifyJournal([]), { valid: true });
  });

  it('names the file and line of an unreadable entry', () => {
    const filePath = journalPath();
    writeEntries(filePath, [started]);
    writeFileSync(filePath, `${readFileSync(filePath, 'utf8')}{"seq":2,\n`);

    assert.throws(() => readJournal(filePath), { message: `${filePath}:2: not valid JSON` });
  });
});
