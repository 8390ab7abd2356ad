// src/broker/audit/journal.ts
import { createHash } from 'node:crypto';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { AUDIT_CATEGORIES, AUDIT_DECISIONS } from './types.ts';
import type { AuditCategory, AuditDecision, AuditEntry, AuditRecord, AuditSink, JournalCheck } from './types.ts';

const ORIGIN_LABEL = 'broker-relay audit journal v1';

function sha256(text: string): string {
  return createHash('sha256').update(text).digest('hex');
}

/** The `prev` of the first entry in a journal. */
export function originDigest(): string {
  return sha256(ORIGIN_LABEL);
}

export function entryDigest(entry: Omit<AuditEntry, 'digest'>): string {
  const body = JSON.stringify([
    entry.seq,
    entry.at,
    entry.category,
    entry.action,
    entry.actor,
    entry.decision ?? null,
    entry.detail,
  ]);
  return sha256(`${entry.prev}\n${body}`);
}

function isCategory(value: unknown): value is AuditCategory {
  return AUDIT_CATEGORIES.some(c => c === value);
}

function isDecision(value: unknown): value is AuditDecision {
  return AUDIT_DECISIONS.some(d => d === value);
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringField(line: Record<string, unknown>, key: string): string {
  const value = line[key];
  if (typeof value !== 'string') throw new Error(`missing or invalid field "${key}"`);
  return value;
}

function parseEntry(text: string): AuditEntry {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    throw new Error('not valid JSON');
  }
  if (!isObject(parsed)) throw new Error('not a JSON object');

  const { seq, category, decision, detail } = parsed;
  if (typeof seq !== 'number' || !Number.isInteger(seq) || seq < 1) throw new Error('missing or invalid field "seq"');
  if (!isCategory(category)) throw new Error('missing or invalid field "category"');
  if (!isObject(detail)) throw new Error('missing or invalid field "detail"');
  if (decision !== undefined && !isDecision(decision)) throw new Error('missing or invalid field "decision"');

  const entry: AuditEntry = {
    seq,
    at: stringField(parsed, 'at'),
    category,
    action: stringField(parsed, 'action'),
    actor: stringField(parsed, 'actor'),
    detail,
    prev: stringField(parsed, 'prev'),
    digest: stringField(parsed, 'digest'),
  };
  if (decision !== undefined) entry.decision = decision;
  return entry;
}

/** Reads every entry; a missing journal is empty, an unreadable line is an error naming it. */
export function readJournal(filePath: string): AuditEntry[] {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf8');
  } catch (err: unknown) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return [];
    throw err;
  }

  const entries: AuditEntry[] = [];
  const lines = content.split('\n');
  for (const [index, line] of lines.entries()) {
    if (line === '' && index === lines.length - 1) break;
    try {
      entries.push(parseEntry(line));
    } catch (err: unknown) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new Error(`${filePath}:${index + 1}: ${reason}`);
    }
  }
  return entries;
}

/**
 * Walks `entries` in order. `startDigest` is the digest of the entry before
 * the first one, so a tail of the journal can be checked on its own.
 */
export function verifyJournal(entries: readonly AuditEntry[], startDigest: string = originDigest()): JournalCheck {
  let previous = startDigest;
  let expectedSeq: number | undefined;

  for (const entry of entries) {
    if (expectedSeq !== undefined && entry.seq !== expectedSeq) return { valid: false, brokenAt: entry.seq };
    if (entry.prev !== previous) return { valid: false, brokenAt: entry.seq };
    if (entry.digest !== entryDigest(entry)) return { valid: false, brokenAt: entry.seq };
    previous = entry.digest;
    expectedSeq = entry.seq + 1;
  }
  return { valid: true };
}

export interface AuditJournalOptions {
  flushIntervalMs?: number;
  flushThreshold?: number;
  now?: () => Date;
}

/**
 * Append-only audit trail: one JSON object per line, each carrying the
 * digest of the line before it. Records are buffered and appended when the
 * buffer reaches `flushThreshold`, on every `flushIntervalMs` tick, and on
 * close. Reopening a journal continues its chain.
 */
export class AuditJournal implements AuditSink {
  readonly path: string;
  private readonly flushThreshold: number;
  private readonly now: () => Date;
  private readonly timer: NodeJS.Timeout;
  private readonly buffer: AuditRecord[] = [];
  private closed = false;
  private nextSeq: number;
  private lastDigest: string;

  constructor(filePath: string, opts: AuditJournalOptions = {}) {
    this.path = filePath;
    this.flushThreshold = opts.flushThreshold ?? 100;
    this.now = opts.now ?? (() => new Date());

    fs.mkdirSync(path.dirname(filePath), { recursive: true, mode: 0o700 });
    const existing = readJournal(filePath);
    const last = existing[existing.length - 1];
    this.nextSeq = (last?.seq ?? 0) + 1;
    this.lastDigest = last?.digest ?? originDigest();

    const check = verifyJournal(existing);
    if (!check.valid) {
      console.warn(`[audit] journal ${filePath} fails verification at entry ${check.brokenAt}`);
    }

    this.timer = setInterval(() => {
      try {
        this.flush();
      } catch (err: unknown) {
        console.error('[audit] periodic flush failed:', err instanceof Error ? err.message : err);
      }
    }, opts.flushIntervalMs ?? 500);
    this.timer.unref();
  }

  log(record: AuditRecord): void {
    if (this.closed) throw new Error('audit journal is closed');
    const pending: AuditRecord = {
      category: record.category,
      action: record.action,
      actor: record.actor,
      detail: record.detail,
    };
    if (record.decision !== undefined) pending.decision = record.decision;
    this.buffer.push(pending);
    if (this.buffer.length >= this.flushThreshold) this.flush();
  }

  flush(): void {
    if (this.closed || this.buffer.length === 0) return;

    const pending = this.buffer.splice(0, this.buffer.length);
    let seq = this.nextSeq;
    let prev = this.lastDigest;
    const lines: string[] = [];
    for (const record of pending) {
      const unsealed: Omit<AuditEntry, 'digest'> = { seq, at: this.now().toISOString(), ...record, prev };
      const entry: AuditEntry = { ...unsealed, digest: entryDigest(unsealed) };
      lines.push(`${JSON.stringify(entry)}\n`);
      seq += 1;
      prev = entry.digest;
    }

    try {
      fs.appendFileSync(this.path, lines.join(''), { mode: 0o600 });
    } catch (err: unknown) {
      this.buffer.unshift(...pending);
      throw err;
    }
    this.nextSeq = seq;
    this.lastDigest = prev;
  }

  /** Flushes, then checks the whole chain on disk. */
  verify(): JournalCheck {
    this.flush();
    return verifyJournal(readJournal(this.path));
  }

  close(): void {
    if (this.closed) return;
    clearInterval(this.timer);
    try {
      this.flush();
    } finally {
      this.closed = true;
    }
  }
}
