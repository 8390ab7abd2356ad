// src/broker/ipc/dispatcher.ts
import type { AuditDecision, AuditRecord, AuditSink } from '../audit/types.ts';
import { BrokerError, toBrokerError } from './errors.ts';
import type {
  BrokerImplementation,
  DeviceBrokerImplementation,
  DeviceOperation,
} from './operations.ts';
import type { BrokerRequest, CallerContext, Transport } from './types.ts';

interface DispatcherDeps {
  audit?: AuditSink;
}

function decisionFor(err: BrokerError): AuditDecision {
  return err.code === 'declined' ? 'deny' : 'fail';
}

function safeAudit(audit: AuditSink | undefined, record: AuditRecord): void {
  if (!audit) return;
  try {
    audit.log(record);
  } catch (err) {
    // audit logging must not break request handling
    console.error('[audit] failed to record entry:', err instanceof Error ? err.message : err);
  }
}

/**
 * Routes privileged broker requests to the pluggable implementation with the
 * caller's uid. Shared by the socket listener and the system-bus facade.
 */
export class BrokerDispatcher {
  private readonly implementation: BrokerImplementation;
  private readonly audit: AuditSink | undefined;

  constructor(implementation: BrokerImplementation, deps: DispatcherDeps = {}) {
    this.implementation = implementation;
    this.audit = deps.audit;
  }

  async dispatch(request: BrokerRequest, caller: CallerContext): Promise<string> {
    const detail: Record<string, unknown> = {
      correlation_id: request.correlationId,
      protocol_version: request.protocolVersion,
      transport: caller.transport,
    };
    if (caller.sender !== undefined) detail['sender'] = caller.sender;

    try {
      const result: unknown = await this.implementation[request.operation](
        request.protocolVersion,
        request.correlationId,
        request.requestJson,
        caller.uid,
      );
      if (typeof result !== 'string') {
        throw BrokerError.failed(`${request.operation} returned a non-string result`);
      }
      safeAudit(this.audit, {
        category: 'broker',
        action: request.operation,
        actor: `uid:${caller.uid}`,
        detail,
        decision: 'allow',
      });
      return result;
    } catch (err: unknown) {
      const error = toBrokerError(err);
      safeAudit(this.audit, {
        category: 'broker',
        action: request.operation,
        actor: `uid:${caller.uid}`,
        detail: { ...detail, error: error.message },
        decision: decisionFor(error),
      });
      throw error;
    }
  }

  /** Records a call refused before it reached the implementation. */
  recordRefusal(operation: string, transport: Transport, actor: string, reason: string): void {
    safeAudit(this.audit, {
      category: 'authz',
      action: operation,
      actor,
      detail: { transport, reason },
      decision: 'deny',
    });
  }
}

/**
 * Routes device capability calls. No uid is resolved here: the session id is
 * passed through and the backend decides what it may touch.
 */
export class DeviceDispatcher {
  private readonly implementation: DeviceBrokerImplementation;
  private readonly audit: AuditSink | undefined;

  constructor(implementation: DeviceBrokerImplementation, deps: DispatcherDeps = {}) {
    this.implementation = implementation;
    this.audit = deps.audit;
  }

  async dispatch(operation: DeviceOperation, sessionId: string, requestJson: string): Promise<string> {
    const actor = `session:${sessionId}`;
    try {
      const result: unknown = await this.implementation[operation](sessionId, requestJson);
      if (typeof result !== 'string') {
        throw BrokerError.failed(`${operation} returned a non-string result`);
      }
      safeAudit(this.audit, { category: 'device', action: operation, actor, detail: {}, decision: 'allow' });
      return result;
    } catch (err: unknown) {
      const error = toBrokerError(err);
      safeAudit(this.audit, {
        category: 'device',
        action: operation,
        actor,
        detail: { error: error.message },
        decision: decisionFor(error),
      });
      throw error;
    }
  }
}
