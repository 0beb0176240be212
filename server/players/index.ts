import type { Logger } from 'pino';
import type { AppConfig } from '../bootstrap/config';
import type { DbPool } from '../db';
import type { BrokerChannel } from '../messaging/broker-channel';
import { InMemoryAttributeCache, type AttributeCacheMirror } from './attribute-cache';
import { AttributeFetcher } from './attribute-fetcher';
import { AttributeUpdater } from './attribute-updater';
import { PlayerDataEvents } from './player-data-events';
import { PlayerDataStore } from './player-data-store';

export { AttributeType } from './attribute-types';
export { AttributeFetcher } from './attribute-fetcher';
export { AttributeUpdater, planUpdate, type UpdateIntent, type UpdateOutcome } from './attribute-updater';
export { InMemoryAttributeCache, type AttributeCacheMirror } from './attribute-cache';
export { PlayerDataEvents, type PlayerDataUpdatedMessage } from './player-data-events';
export { PlayerDataStore } from './player-data-store';
export * from './level-calculator';

export interface PlayerSync {
  fetcher: AttributeFetcher;
  updater: AttributeUpdater;
  events: PlayerDataEvents;
  cache: AttributeCacheMirror;
}

export interface PlayerSyncDeps {
  pool: DbPool | null;
  broker: BrokerChannel | null;
  cache?: AttributeCacheMirror;
  logger: Logger;
}

/** Wires fetcher, updater and change events around one store and broker. */
export function createPlayerSync(cfg: AppConfig, deps: PlayerSyncDeps): PlayerSync {
  const store = deps.pool
    ? new PlayerDataStore(deps.pool, deps.logger, {
        table: cfg.playerTable,
        retry: { attempts: cfg.storeRetryAttempts, baseDelayMs: cfg.storeRetryBaseMs },
      })
    : null;
  const cache = deps.cache ?? new InMemoryAttributeCache();
  const events = new PlayerDataEvents(deps.broker, cfg.serviceName, deps.logger);

  return {
    fetcher: new AttributeFetcher(store, deps.logger),
    updater: new AttributeUpdater(store, cache, events, deps.logger),
    events,
    cache,
  };
}
