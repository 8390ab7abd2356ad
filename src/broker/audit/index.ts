export { AuditJournal, entryDigest, originDigest, readJournal, verifyJournal } from './journal.ts';
export type { AuditJournalOptions } from './journal.ts';
export type {
  AuditCategory,
  AuditDecision,
  AuditEntry,
  AuditRecord,
  AuditSink,
  JournalCheck,
} from './types.ts';
