// src/broker/ipc/operations.ts

/** Operations exposed by the system and session brokers, in wire spelling. */
export const BROKER_OPERATIONS = [
  'acquireTokenInteractively',
  'acquireTokenSilently',
  'getAccounts',
  'removeAccount',
  'acquirePrtSsoCookie',
  'generateSignedHttpRequest',
  'cancelInteractiveFlow',
  'getLinuxBrokerVersion',
] as const;

export type BrokerOperation = (typeof BROKER_OPERATIONS)[number];

/** Operations exposed by the device capability broker on the system bus. */
export const DEVICE_OPERATIONS = [
  'sign',
  'generateKeyPair',
  'loadKeyPair',
  'persistKey',
  'generateDerivedKey',
  'deleteKey',
  'decrypt',
  'generatePKCS10CertSigningRequest',
  'asymmetricKeyExists',
  'asymmetricKeyWithThumbprintExists',
  'getAsymmetricKeyThumbprint',
  'generateAsymmetricKey',
  'getAsymmetricKeyCreationDate',
  'clearAsymmetricKey',
  'getRequestConfirmation',
  'mintSignedAccessToken',
  'mintSignedHttpRequest',
  'makeHttpRequestWithClientTls',
] as const;

export type DeviceOperation = (typeof DEVICE_OPERATIONS)[number];

export const BROKER_ARG_NAMES = ['protocol_version', 'correlation_id', 'request_json'] as const;
export const DEVICE_ARG_NAMES = ['session_id', 'request_json'] as const;

const brokerOperationSet: ReadonlySet<string> = new Set(BROKER_OPERATIONS);
const deviceOperationSet: ReadonlySet<string> = new Set(DEVICE_OPERATIONS);

export function isBrokerOperation(name: string): name is BrokerOperation {
  return brokerOperationSet.has(name);
}

export function isDeviceOperation(name: string): name is DeviceOperation {
  return deviceOperationSet.has(name);
}

/**
 * The pluggable identity broker. Token negotiation, signing and key storage
 * live behind this contract; the relay only routes calls to it.
 *
 * Instances are shared by every connection handler and bus call, so methods
 * may be invoked concurrently.
 */
export type BrokerImplementation = {
  [K in BrokerOperation]: (
    protocolVersion: string,
    correlationId: string,
    requestJson: string,
    uid: number,
  ) => Promise<string>;
};

/**
 * Key-management backend behind the device capability broker. `sessionId`
 * is opaque to the relay; authorization against it is the backend's job.
 */
export type DeviceBrokerImplementation = {
  [K in DeviceOperation]: (sessionId: string, requestJson: string) => Promise<string>;
};
