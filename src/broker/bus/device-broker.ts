// src/broker/bus/device-broker.ts
import type { DeviceDispatcher } from '../ipc/dispatcher.ts';
import { DEVICE_ARG_NAMES, DEVICE_OPERATIONS } from '../ipc/operations.ts';
import { DEVICE_BROKER } from './types.ts';
import { BusFacade, type FacadeMethod } from './facade.ts';

/** Device capability broker: key and signing operations keyed by session id. */
export function createDeviceBrokerFacade(dispatcher: DeviceDispatcher): BusFacade {
  const methods = DEVICE_OPERATIONS.map((operation): FacadeMethod => ({
    name: operation,
    argNames: DEVICE_ARG_NAMES,
    invoke: ([sessionId = '', requestJson = '']) => dispatcher.dispatch(operation, sessionId, requestJson),
  }));
  return new BusFacade(DEVICE_BROKER.iface, methods);
}
