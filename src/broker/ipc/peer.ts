// src/broker/ipc/peer.ts
import type * as net from 'node:net';
import { getPeerCred } from '../../../native/index.ts';
import { BrokerError } from './errors.ts';
import type { CredentialResolver, PeerIdentity } from './types.ts';

function socketFd(socket: net.Socket): number {
  const handle: unknown = Reflect.get(socket, '_handle');
  if (typeof handle !== 'object' || handle === null) {
    throw new Error('Socket handle not available');
  }
  const fd: unknown = Reflect.get(handle, 'fd');
  if (typeof fd !== 'number' || fd < 0) throw new Error('Socket handle not available');
  return fd;
}

export function getPeerIdentity(
  socket: net.Socket,
  readCred: (fd: number) => PeerIdentity = getPeerCred,
): PeerIdentity {
  try {
    return readCred(socketFd(socket));
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new Error(`Peer identity verification failed: ${msg}`);
  }
}

/**
 * Resolves the uid of an accepted connection from kernel-supplied peer
 * credentials. Called once per connection; the uid is fixed afterwards.
 */
export class PeerCredentialResolver implements CredentialResolver<net.Socket> {
  private readonly readCred: (fd: number) => PeerIdentity;

  constructor(readCred: (fd: number) => PeerIdentity = getPeerCred) {
    this.readCred = readCred;
  }

  async resolveUid(socket: net.Socket): Promise<number> {
    let peer: PeerIdentity;
    try {
      peer = getPeerIdentity(socket, this.readCred);
    } catch (err: unknown) {
      throw BrokerError.declined(err instanceof Error ? err.message : String(err));
    }
    if (!Number.isInteger(peer.uid) || peer.uid < 0) {
      throw BrokerError.declined(`Peer identity verification failed: invalid uid ${String(peer.uid)}`);
    }
    return peer.uid;
  }
}
