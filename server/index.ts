import dotenv from 'dotenv';
import { loadConfig } from './bootstrap/config';
import { checkHealth } from './bootstrap/health';
import { getLogger } from './bootstrap/logger';
import { createDbPool } from './db';
import { BrokerChannel } from './messaging/broker-channel';
import { collectDefaultMetrics } from './observability/metrics';
import { createPlayerSync } from './players';
import { errorMessage } from './utils/errors';

dotenv.config();

async function main(): Promise<void> {
  const cfg = loadConfig();
  const log = getLogger(cfg.logLevel, cfg.logPretty);
  collectDefaultMetrics();

  const pool = cfg.dbUrl ? createDbPool(cfg.dbUrl) : null;
  if (!pool) log.warn('[Config] DATABASE_URL not set, player data store unavailable');

  const broker = new BrokerChannel(
    {
      user: cfg.rabbitUser,
      password: cfg.rabbitPassword,
      host: cfg.rabbitHost,
      port: cfg.rabbitPort,
      heartbeatSec: cfg.rabbitHeartbeatSec
    },
    { logger: log, readyTimeoutMs: cfg.rabbitReadyTimeoutMs }
  );

  const sync = createPlayerSync(cfg, { pool, broker, logger: log });

  // readiness is awaited alongside open() so a hung connect still hits the timeout
  const ready = broker.awaitReady();
  await Promise.all([broker.open(), ready]);

  sync.events.on(event => {
    log.info({ playerId: event.player_id, origin: event.origin }, 'Player data updated');
  });
  await sync.events.listen();

  const health = await checkHealth(broker, pool);
  log.info({ health }, `[${cfg.serviceName}] started`);

  let stopping = false;
  const shutdown = async (signal: string) => {
    if (stopping) return;
    stopping = true;
    log.info({ signal }, 'Shutting down...');
    await broker.close();
    if (pool) await pool.end();
    log.info('Shutdown complete');
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal).catch(error => {
        log.error({ err: errorMessage(error) }, 'Shutdown failed');
        process.exitCode = 1;
      });
    });
  }
}

main().catch(error => {
  // startup failures (topology, broker readiness) are fatal
  getLogger('fatal', false).fatal({ err: errorMessage(error) }, 'Startup failed');
  process.exit(1);
});
