// src/broker/ipc/types.ts
import type { BrokerOperation } from './operations.ts';

export interface PeerIdentity {
  pid: number;
  uid: number;
  gid: number;
}

/** One logical broker request; exactly one operation per envelope. */
export interface BrokerRequest {
  operation: BrokerOperation;
  protocolVersion: string;
  correlationId: string;
  requestJson: string;
}

export type Transport = 'socket' | 'system-bus';

/** Who is calling, as established by the transport before dispatch. */
export interface CallerContext {
  uid: number;
  transport: Transport;
  /** Unique bus name of the sender, for bus transports. */
  sender?: string;
}

/**
 * Maps a transport-level source (an accepted socket, a bus sender name) to
 * the OS user id behind it. Implementations reject rather than guess: an
 * unresolvable caller must never be treated as any particular uid.
 */
export interface CredentialResolver<TSource> {
  resolveUid(source: TSource): Promise<number>;
}
