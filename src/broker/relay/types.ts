// src/broker/relay/types.ts
import type { BrokerRequest } from '../ipc/types.ts';

/**
 * Carries a broker request from the unprivileged side to the system broker
 * and returns its response string. Failures surface as BrokerError.
 */
export interface BrokerRelay {
  forward(request: BrokerRequest): Promise<string>;
}
