import { config, validateConfig } from './config';
import { createManager } from './context';
import { startApi } from './api';
import { errorMessage, log } from './logger';

export { createManager } from './context';
export { createApp, startApi } from './api';
export { ProfileManager } from './manager';
export { ManagerEvents } from './events';
export * from './errors';
export * from './types';

async function main() {
  try {
    validateConfig();

    log.info('Starting wireproxy manager...');
    const manager = createManager();
    const { total, running } = manager.status();
    log.info(`Loaded ${total} profiles (${running} running)`);

    const server = config.restEnabled ? startApi(manager) : null;
    if (!server) {
      log.warn('REST API is disabled; set REST_ENABLED=true to serve it');
    }

    let stopping = false;
    const shutdown = (signal: string) => {
      if (stopping) return;
      stopping = true;
      log.info(`${signal} received, shutting down...`);
      server?.close();
      manager
        .shutdown()
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          log.error('Shutdown failed', { error: errorMessage(err) });
          process.exit(1);
        });
    };

    process.on('SIGINT', () => shutdown('SIGINT'));
    process.on('SIGTERM', () => shutdown('SIGTERM'));

    log.info('wireproxy manager is running', { restPort: config.restEnabled ? config.restPort : null });
  } catch (err) {
    log.error('Failed to start', { error: errorMessage(err) });
    process.exit(1);
  }
}

if (require.main === module) {
  void main();
}
