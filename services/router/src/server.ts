import process from 'node:process';

import { loadConfig } from './config';
import { createApp } from './app';
import { EnvConfigError } from './envConfig';
import { describeConfig } from './logger';

const SHUTDOWN_TIMEOUT_MS = 10_000;

const main = async () => {
  const config = loadConfig();
  const { app } = await createApp(config);

  const shutdown = async (signal: NodeJS.Signals) => {
    app.log.info({ signal }, 'Stopping router; waiting for open sessions');
    // Streaming sessions can outlive a graceful close.
    setTimeout(() => {
      app.log.warn({ timeoutMs: SHUTDOWN_TIMEOUT_MS }, 'Router did not close in time; exiting');
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS).unref();
    await app.close();
  };

  const onSignal = (signal: NodeJS.Signals) => {
    shutdown(signal).catch((error) => {
      app.log.error({ err: error }, 'Router shutdown failed');
      process.exitCode = 1;
    });
  };
  process.once('SIGTERM', onSignal);
  process.once('SIGINT', onSignal);

  await app.listen({ port: config.port, host: config.host });
  app.log.info({ config: describeConfig(config) }, 'Router ready');
};

main().catch((error) => {
  if (error instanceof EnvConfigError) {
    console.error(error.message);
  } else {
    console.error(error instanceof Error ? error.stack ?? error.message : error);
  }
  process.exitCode = 1;
});
