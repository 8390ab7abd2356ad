// src/broker/index.ts
import { loadConfig } from './config.ts';
import { startBrokerDaemon } from './daemon.ts';

async function main(): Promise<void> {
  const config = loadConfig();
  const shutdown = new AbortController();
  const daemon = await startBrokerDaemon(config, shutdown.signal);

  let signalled = false;
  const onSignal = (signal: NodeJS.Signals): void => {
    if (!signalled) {
      signalled = true;
      console.log(`[broker] ${signal} received, draining connections`);
      shutdown.abort();
      return;
    }
    // second signal: stop waiting for live connections
    console.warn(`[broker] ${signal} received again, closing connections`);
    daemon.server.close().catch((err: unknown) => {
      console.error('[broker] forced close failed:', err instanceof Error ? err.message : err);
    });
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  await daemon.stopped;
}

main().catch((err: unknown) => {
  console.error('[broker] fatal:', err instanceof Error ? err.message : err);
  process.exit(1);
});
