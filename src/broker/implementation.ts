// src/broker/implementation.ts
import * as path from 'node:path';
import { pathToFileURL } from 'node:url';
import { BrokerError } from './ipc/errors.ts';
import {
  BROKER_OPERATIONS,
  DEVICE_OPERATIONS,
  type BrokerImplementation,
  type DeviceBrokerImplementation,
} from './ipc/operations.ts';

export type ModuleLoader = (specifier: string) => Promise<unknown>;

export const importModule: ModuleLoader = specifier => import(specifier);

function isRecord(value: unknown): value is Record<string, unknown> {
  return (typeof value === 'object' && value !== null) || typeof value === 'function';
}

function toSpecifier(modulePath: string): string {
  if (modulePath.startsWith('.') || path.isAbsolute(modulePath)) {
    return pathToFileURL(path.resolve(modulePath)).href;
  }
  return modulePath;
}

/**
 * Loads a module whose default export is the implementation object or a
 * (possibly async) factory returning it, and checks every operation in
 * `operations` is a function on it.
 */
async function loadCandidate(
  modulePath: string,
  operations: readonly string[],
  load: ModuleLoader,
): Promise<Record<string, unknown>> {
  let mod: unknown;
  try {
    mod = await load(toSpecifier(modulePath));
  } catch (err: unknown) {
    throw new Error(`Failed to load implementation ${modulePath}: ${err instanceof Error ? err.message : String(err)}`);
  }

  const exported: unknown = isRecord(mod) ? mod['default'] : undefined;
  const candidate: unknown = typeof exported === 'function' ? await Reflect.apply(exported, undefined, []) : exported;
  if (!isRecord(candidate)) {
    throw new Error(`Implementation ${modulePath} must default-export an object or a factory returning one`);
  }

  const missing = operations.filter(op => typeof candidate[op] !== 'function');
  if (missing.length > 0) {
    throw new Error(`Implementation ${modulePath} is missing operations: ${missing.join(', ')}`);
  }
  return candidate;
}

function operation(candidate: Record<string, unknown>, name: string) {
  const fn = candidate[name];
  return async (...args: Array<string | number>): Promise<string> => {
    if (typeof fn !== 'function') throw BrokerError.failed(`${name} is not implemented`);
    const result: unknown = await Reflect.apply(fn, candidate, args);
    if (typeof result !== 'string') throw BrokerError.failed(`${name} returned a non-string result`);
    return result;
  };
}

export async function loadBrokerImplementation(
  modulePath: string,
  load: ModuleLoader = importModule,
): Promise<BrokerImplementation> {
  const c = await loadCandidate(modulePath, BROKER_OPERATIONS, load);
  return {
    acquireTokenInteractively: operation(c, 'acquireTokenInteractively'),
    acquireTokenSilently: operation(c, 'acquireTokenSilently'),
    getAccounts: operation(c, 'getAccounts'),
    removeAccount: operation(c, 'removeAccount'),
    acquirePrtSsoCookie: operation(c, 'acquirePrtSsoCookie'),
    generateSignedHttpRequest: operation(c, 'generateSignedHttpRequest'),
    cancelInteractiveFlow: operation(c, 'cancelInteractiveFlow'),
    getLinuxBrokerVersion: operation(c, 'getLinuxBrokerVersion'),
  };
}

export async function loadDeviceImplementation(
  modulePath: string,
  load: ModuleLoader = importModule,
): Promise<DeviceBrokerImplementation> {
  const c = await loadCandidate(modulePath, DEVICE_OPERATIONS, load);
  return {
    sign: operation(c, 'sign'),
    generateKeyPair: operation(c, 'generateKeyPair'),
    loadKeyPair: operation(c, 'loadKeyPair'),
    persistKey: operation(c, 'persistKey'),
    generateDerivedKey: operation(c, 'generateDerivedKey'),
    deleteKey: operation(c, 'deleteKey'),
    decrypt: operation(c, 'decrypt'),
    generatePKCS10CertSigningRequest: operation(c, 'generatePKCS10CertSigningRequest'),
    asymmetricKeyExists: operation(c, 'asymmetricKeyExists'),
    asymmetricKeyWithThumbprintExists: operation(c, 'asymmetricKeyWithThumbprintExists'),
    getAsymmetricKeyThumbprint: operation(c, 'getAsymmetricKeyThumbprint'),
    generateAsymmetricKey: operation(c, 'generateAsymmetricKey'),
    getAsymmetricKeyCreationDate: operation(c, 'getAsymmetricKeyCreationDate'),
    clearAsymmetricKey: operation(c, 'clearAsymmetricKey'),
    getRequestConfirmation: operation(c, 'getRequestConfirmation'),
    mintSignedAccessToken: operation(c, 'mintSignedAccessToken'),
    mintSignedHttpRequest: operation(c, 'mintSignedHttpRequest'),
    makeHttpRequestWithClientTls: operation(c, 'makeHttpRequestWithClientTls'),
  };
}
