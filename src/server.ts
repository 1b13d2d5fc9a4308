import dotenv from 'dotenv';
import { buildApp } from './app.js';
import { loadConfig } from './config/env.js';
import { openStores } from './db/stores.js';

dotenv.config();

async function main(): Promise<void> {
  const config = loadConfig();
  const stores = await openStores(config);

  const app = buildApp(config, {
    observations: stores.observations,
    predictions: stores.predictions,
  });

  app.addHook('onClose', async () => {
    await stores.close();
  });

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      app.log.info(`[BOOT] ${signal} received, shutting down`);
      app.close().then(
        () => process.exit(0),
        (err: unknown) => {
          console.error('[BOOT] Shutdown failed:', err);
          process.exit(1);
        },
      );
    });
  }

  await app.listen({ port: config.port, host: '0.0.0.0' });
  console.log(`[BOOT] Flare forecast API listening on :${config.port} (store: ${config.store.driver})`);
}

main().catch((err: unknown) => {
  console.error('[BOOT] Fatal:', err);
  process.exit(1);
});
