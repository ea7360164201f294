import 'dotenv/config';

import { getEnv } from './config/env.js';
import { createApp } from './app.js';
import { startTelemetry, stopTelemetry } from './telemetry/runtime.js';

async function main(): Promise<void> {
  const env = getEnv();
  await startTelemetry(env);

  const runtime = createApp();

  const server = runtime.app.listen(runtime.env.PORT, () => {
    console.log('server_listening', { port: runtime.env.PORT, url: `http://localhost:${runtime.env.PORT}` });
  });

  const shutdown = (): void => {
    server.close(() => {
      void runtime
        .close()
        .then(() => stopTelemetry())
        .then(() => {
          process.exit(0);
        })
        .catch((error: unknown) => {
          console.error('shutdown_failed', { error: error instanceof Error ? error.message : String(error) });
          process.exit(1);
        });
    });
  };

  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);
}

main().catch((error: unknown) => {
  console.error('startup_failed', { error: error instanceof Error ? error.message : String(error) });
  process.exit(1);
});
