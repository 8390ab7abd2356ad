// src/broker/bus/session-broker.ts
import { BROKER_ARG_NAMES, BROKER_OPERATIONS } from '../ipc/operations.ts';
import type { BrokerRelay } from '../relay/types.ts';
import { SESSION_BROKER } from './types.ts';
import { BusFacade, type FacadeMethod } from './facade.ts';

/**
 * Unprivileged forwarder on the session bus. It holds no state and makes no
 * decisions: every call goes to the system broker through the relay.
 */
export function createSessionBrokerFacade(relay: BrokerRelay): BusFacade {
  const methods = BROKER_OPERATIONS.map((operation): FacadeMethod => ({
    name: operation,
    argNames: BROKER_ARG_NAMES,
    invoke: ([protocolVersion = '', correlationId = '', requestJson = '']) =>
      relay.forward({ operation, protocolVersion, correlationId, requestJson }),
  }));
  return new BusFacade(SESSION_BROKER.iface, methods);
}
