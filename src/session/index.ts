// src/session/index.ts
import { loadConfig } from '../broker/config.ts';
import { startSessionBroker } from './service.ts';

async function main(): Promise<void> {
  const config = loadConfig();
  const bus = await startSessionBroker(config);

  const stop = (): void => bus.disconnect();
  process.once('SIGINT', stop);
  process.once('SIGTERM', stop);

  await bus.waitUntilClosed();
}

main().catch((err: unknown) => {
  console.error('[session] fatal:', err instanceof Error ? err.message : err);
  process.exit(1);
});
