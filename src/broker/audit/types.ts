export type AuditCategory = 'broker' | 'device' | 'authz' | 'lifecycle' | 'error';

export type AuditDecision = 'allow' | 'deny' | 'fail';

export const AUDIT_CATEGORIES: readonly AuditCategory[] = ['broker', 'device', 'authz', 'lifecycle', 'error'];
export const AUDIT_DECISIONS: readonly AuditDecision[] = ['allow', 'deny', 'fail'];

/** What callers hand to the journal; sequence numbers, times and digests are assigned on flush. */
export interface AuditRecord {
  category: AuditCategory;
  action: string;
  actor: string;
  detail: Record<string, unknown>;
  decision?: AuditDecision;
}

/** One line of the journal. `prev` is the digest of the line before it. */
export interface AuditEntry extends AuditRecord {
  seq: number;
  at: string;
  prev: string;
  digest: string;
}

export interface AuditSink {
  log(record: AuditRecord): void;
}

export type JournalCheck = { valid: true } | { valid: false; brokenAt: number };
