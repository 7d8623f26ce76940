import { env } from './env';
import { log } from './log';
import { closeRedisClient } from './redis/client';
import { closeCalendarPool } from './scheduling/calendarClient';
import { buildServer } from './server';

const { server, sessionManager } = buildServer();

server.listen(env.PORT, () => {
  log.info({ port: env.PORT }, 'server listening');
});

async function shutdown(signal: string): Promise<void> {
  log.info({ event: 'process_shutdown', signal, calls: sessionManager.size() }, 'shutting down');
  server.close();
  await sessionManager.shutdown();
  await closeCalendarPool();
  await closeRedisClient();
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    shutdown(signal)
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        log.error({ err: error, event: 'process_shutdown_failed' }, 'shutdown failed');
        process.exit(1);
      });
  });
}
