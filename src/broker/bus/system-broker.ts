// src/broker/bus/system-broker.ts
import { BrokerError } from '../ipc/errors.ts';
import type { BrokerDispatcher } from '../ipc/dispatcher.ts';
import { BROKER_ARG_NAMES, BROKER_OPERATIONS } from '../ipc/operations.ts';
import type { CredentialResolver } from '../ipc/types.ts';
import { BusFacade, type FacadeMethod } from './facade.ts';

export interface SystemBrokerFacadeOptions {
  iface: string;
  dispatcher: BrokerDispatcher;
  credentials: CredentialResolver<string | undefined>;
}

/**
 * The privileged broker on the system bus. Each call resolves the sender's
 * uid through the bus daemon before it reaches the implementation.
 */
export function createSystemBrokerFacade(options: SystemBrokerFacadeOptions): BusFacade {
  const { dispatcher, credentials } = options;

  const methods = BROKER_OPERATIONS.map((operation): FacadeMethod => ({
    name: operation,
    argNames: BROKER_ARG_NAMES,
    async invoke([protocolVersion = '', correlationId = '', requestJson = ''], call) {
      let uid: number;
      try {
        uid = await credentials.resolveUid(call.sender);
      } catch (err: unknown) {
        const reason = err instanceof Error ? err.message : String(err);
        console.warn(`[bus] refusing ${operation} from ${call.sender ?? 'unknown sender'}: ${reason}`);
        dispatcher.recordRefusal(operation, 'system-bus', `bus:${call.sender ?? 'unknown'}`, reason);
        throw BrokerError.declined(reason);
      }

      return dispatcher.dispatch(
        { operation, protocolVersion, correlationId, requestJson },
        call.sender === undefined
          ? { uid, transport: 'system-bus' }
          : { uid, transport: 'system-bus', sender: call.sender },
      );
    },
  }));

  return new BusFacade(options.iface, methods);
}
