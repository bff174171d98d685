import { bootRuntime } from './runtime.js';

export async function bootstrap(): Promise<void> {
  const runtime = await bootRuntime();
  runtime.start();

  let stopping = false;
  const stop = (signal: NodeJS.Signals): void => {
    if (stopping) {
      return;
    }
    stopping = true;

    runtime.logger.info({ signal }, 'shutting down');
    runtime
      .shutdown()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        runtime.logger.error({ err: error }, 'shutdown failed');
        process.exit(1);
      });
  };

  process.once('SIGINT', stop);
  process.once('SIGTERM', stop);
}

if (require.main === module) {
  bootstrap().catch((error: unknown) => {
    console.error('Failed to boot paper trading engine', error);
    process.exit(1);
  });
}
