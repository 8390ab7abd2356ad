// src/broker/ipc/protocol.ts
import { isBrokerOperation } from './operations.ts';
import type { BrokerRequest } from './types.ts';

/**
 * Parses a buffer holding exactly one envelope, `{"<operation>": [pv, cid, json]}`.
 * Anything else, including a document that is still arriving, yields null.
 */
export function decodeEnvelope(bytes: Buffer): BrokerRequest | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(bytes.toString('utf8'));
  } catch {
    return null;
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) return null;

  const entries = Object.entries(parsed);
  if (entries.length !== 1) return null;
  const [operation, args] = entries[0] ?? [];
  if (typeof operation !== 'string' || !isBrokerOperation(operation)) return null;
  if (!Array.isArray(args) || args.length !== 3) return null;

  const [protocolVersion, correlationId, requestJson] = args;
  if (
    typeof protocolVersion !== 'string'
    || typeof correlationId !== 'string'
    || typeof requestJson !== 'string'
  ) {
    return null;
  }
  return { operation, protocolVersion, correlationId, requestJson };
}

export function encodeEnvelope(request: BrokerRequest): Buffer {
  const payload = {
    [request.operation]: [request.protocolVersion, request.correlationId, request.requestJson],
  };
  return Buffer.from(JSON.stringify(payload), 'utf8');
}

/** Responses are the raw result bytes: no envelope, no terminator. */
export function encodeResponse(result: string): Buffer {
  return Buffer.from(result, 'utf8');
}

/**
 * Accumulates bytes for one connection and re-parses the whole buffer on
 * every arrival. There is no length prefix, so only one request may be in
 * flight per connection; pipelined requests never parse.
 *
 * A buffer that never becomes a valid envelope is kept until the peer
 * closes, so a malformed request stalls its own connection.
 */
export class EnvelopeDecoder {
  private buffer: Buffer = Buffer.alloc(0);

  get pendingBytes(): number {
    return this.buffer.length;
  }

  push(chunk: Buffer): BrokerRequest | null {
    this.buffer = this.buffer.length === 0 ? chunk : Buffer.concat([this.buffer, chunk]);
    const request = decodeEnvelope(this.buffer);
    if (request) {
      this.buffer = Buffer.alloc(0);
    }
    return request;
  }
}
