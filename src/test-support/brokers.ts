// src/test-support/brokers.ts
import type { AuditRecord, AuditSink } from '../broker/audit/types.ts';
import type {
  BrokerImplementation,
  BrokerOperation,
  DeviceBrokerImplementation,
  DeviceOperation,
} from '../broker/ipc/operations.ts';

export interface RecordedBrokerCall {
  operation: BrokerOperation;
  protocolVersion: string;
  correlationId: string;
  requestJson: string;
  uid: number;
}

export interface RecordedDeviceCall {
  operation: DeviceOperation;
  sessionId: string;
  requestJson: string;
}

export type RecordingBroker = BrokerImplementation & { calls: RecordedBrokerCall[] };
export type RecordingDeviceBroker = DeviceBrokerImplementation & { calls: RecordedDeviceCall[] };

/**
 * Broker whose operations record their arguments and answer
 * `{"operation":...,"uid":...}` unless overridden.
 */
export function makeBroker(overrides: Partial<BrokerImplementation> = {}): RecordingBroker {
  const calls: RecordedBrokerCall[] = [];
  const op = (operation: BrokerOperation) =>
    overrides[operation] ?? (async (protocolVersion: string, correlationId: string, requestJson: string, uid: number) => {
      calls.push({ operation, protocolVersion, correlationId, requestJson, uid });
      return JSON.stringify({ operation, uid });
    });

  return {
    calls,
    acquireTokenInteractively: op('acquireTokenInteractively'),
    acquireTokenSilently: op('acquireTokenSilently'),
    getAccounts: op('getAccounts'),
    removeAccount: op('removeAccount'),
    acquirePrtSsoCookie: op('acquirePrtSsoCookie'),
    generateSignedHttpRequest: op('generateSignedHttpRequest'),
    cancelInteractiveFlow: op('cancelInteractiveFlow'),
    getLinuxBrokerVersion: op('getLinuxBrokerVersion'),
  };
}

export function makeDeviceBroker(overrides: Partial<DeviceBrokerImplementation> = {}): RecordingDeviceBroker {
  const calls: RecordedDeviceCall[] = [];
  const op = (operation: DeviceOperation) =>
    overrides[operation] ?? (async (sessionId: string, requestJson: string) => {
      calls.push({ operation, sessionId, requestJson });
      return JSON.stringify({ operation, sessionId });
    });

  return {
    calls,
    sign: op('sign'),
    generateKeyPair: op('generateKeyPair'),
    loadKeyPair: op('loadKeyPair'),
    persistKey: op('persistKey'),
    generateDerivedKey: op('generateDerivedKey'),
    deleteKey: op('deleteKey'),
    decrypt: op('decrypt'),
    generatePKCS10CertSigningRequest: op('generatePKCS10CertSigningRequest'),
    asymmetricKeyExists: op('asymmetricKeyExists'),
    asymmetricKeyWithThumbprintExists: op('asymmetricKeyWithThumbprintExists'),
    getAsymmetricKeyThumbprint: op('getAsymmetricKeyThumbprint'),
    generateAsymmetricKey: op('generateAsymmetricKey'),
    getAsymmetricKeyCreationDate: op('getAsymmetricKeyCreationDate'),
    clearAsymmetricKey: op('clearAsymmetricKey'),
    getRequestConfirmation: op('getRequestConfirmation'),
    mintSignedAccessToken: op('mintSignedAccessToken'),
    mintSignedHttpRequest: op('mintSignedHttpRequest'),
    makeHttpRequestWithClientTls: op('makeHttpRequestWithClientTls'),
  };
}

/** Collects audit records in memory. */
export class MemoryAuditSink implements AuditSink {
  readonly records: AuditRecord[] = [];

  log(record: AuditRecord): void {
    this.records.push(record);
  }
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
}

export function deferred<T = void>(): Deferred<T> {
  let resolve: (value: T) => void = () => {};
  const promise = new Promise<T>(r => {
    resolve = r;
  });
  return { promise, resolve };
}
