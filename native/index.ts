// native/index.ts
import { createRequire } from 'node:module';
import type { PeerIdentity } from '../src/broker/ipc/types.ts';

interface PeerCredAddon {
  getPeerCred(fd: number): PeerIdentity;
}

const require = createRequire(import.meta.url);

let addon: PeerCredAddon | null | undefined;

function loadAddon(): PeerCredAddon | null {
  if (addon !== undefined) return addon;
  try {
    const loaded: unknown = require('./build/Release/peer_cred.node');
    addon = isPeerCredAddon(loaded) ? loaded : null;
  } catch {
    addon = null;
  }
  if (!addon) {
    console.error('[ipc] peer_cred native addon not built. Run: npm run build:native');
  }
  return addon;
}

function isPeerCredAddon(value: unknown): value is PeerCredAddon {
  return typeof value === 'object'
    && value !== null
    && typeof Reflect.get(value, 'getPeerCred') === 'function';
}

/** Kernel-supplied credentials (SO_PEERCRED) of the process on the other end of `fd`. */
export function getPeerCred(fd: number): PeerIdentity {
  const native = loadAddon();
  if (!native) throw new Error('peer_cred native addon not available');
  return native.getPeerCred(fd);
}
