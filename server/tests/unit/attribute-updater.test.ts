/**
 * Unit Tests: Attribute Updater
 * Store writes, cache write-through and change events, including the
 * failure paths where nothing may leak past a failed transaction.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import pino from 'pino';
import { AttributeUpdater } from '../../players/attribute-updater';
import { AttributeType } from '../../players/attribute-types';
import { InMemoryAttributeCache, type AttributeCacheMirror } from '../../players/attribute-cache';
import { PlayerDataStore } from '../../players/player-data-store';
import { AttributeUpdateError, IdentityAttributeError, InvalidAttributeValueError, StoreError } from '../../utils/errors';
import { FakePgError, FakePlayerDataPool } from '../fakes/fake-pg';

const log = pino({ level: 'silent' });
const PLAYER = '6f1c2a9e-3b4d-4e5f-8a7b-9c0d1e2f3a4b';

describe('AttributeUpdater', () => {
  let pool: FakePlayerDataPool;
  let cache: InMemoryAttributeCache;
  let events: { fire: ReturnType<typeof vi.fn> };
  let updater: AttributeUpdater;

  beforeEach(() => {
    pool = new FakePlayerDataPool();
    cache = new InMemoryAttributeCache();
    events = { fire: vi.fn() };
    const store = new PlayerDataStore(pool, log, { retry: { attempts: 3, baseDelayMs: 0 } });
    updater = new AttributeUpdater(store, cache, events, log);
  });

  it('does nothing when no store is configured', async () => {
    const offline = new AttributeUpdater(null, cache, events, log);

    await expect(offline.update(PLAYER, AttributeType.Kills, '3')).resolves.toEqual({ status: 'skipped' });
    expect(cache.size()).toBe(0);
    expect(events.fire).not.toHaveBeenCalled();
  });

  it('upserts the column inside a single transaction', async () => {
    await updater.update(PLAYER, AttributeType.Kills, '12');

    expect(pool.statements).toEqual([
      'BEGIN',
      'INSERT INTO player_data (uuid, kills) VALUES ($1, $2) ON CONFLICT (uuid) DO UPDATE SET kills = EXCLUDED.kills',
      'COMMIT',
    ]);
    expect(pool.column(PLAYER, 'kills')).toBe('12');
    expect(pool.releases).toBe(pool.connections);
  });

  it('mirrors experience and the derived level, then fires once', async () => {
    pool.seed(PLAYER, { xp: '0' });

    const outcome = await updater.update(PLAYER, AttributeType.Experience, '150');

    expect(outcome.status).toBe('committed');
    expect(pool.column(PLAYER, 'xp')).toBe('150');
    expect(pool.column(PLAYER, 'level')).toBeUndefined();
    expect(cache.get(PLAYER, AttributeType.Experience)).toBe('150');
    expect(cache.get(PLAYER, AttributeType.Level)).toBe('3');
    expect(events.fire).toHaveBeenCalledTimes(1);
    expect(events.fire).toHaveBeenCalledWith(PLAYER);
  });

  it('stores a level write as its experience threshold', async () => {
    await updater.update(PLAYER, AttributeType.Level, '3');

    expect(pool.column(PLAYER, 'xp')).toBe('120');
    expect(pool.statements.filter(s => s.startsWith('INSERT'))).toHaveLength(1);
    expect(cache.get(PLAYER, AttributeType.Level)).toBe('3');
    expect(cache.get(PLAYER, AttributeType.Experience)).toBe('120');
  });

  it('pushes the companion level to the cache before the persisted value', async () => {
    const order: string[] = [];
    const recording: AttributeCacheMirror = {
      update: async (_player, attribute, value) => {
        order.push(`${attribute}=${value}`);
      },
    };
    const store = new PlayerDataStore(pool, log);
    await new AttributeUpdater(store, recording, events, log).update(PLAYER, AttributeType.Level, '4');

    expect(order).toEqual(['level=4', 'xp=240']);
  });

  it('leaves cache and events untouched when COMMIT fails', async () => {
    pool.failOn(/^COMMIT$/, new FakePgError('could not commit', '23514'));

    const result = updater.update(PLAYER, AttributeType.Experience, '150');

    await expect(result).rejects.toBeInstanceOf(AttributeUpdateError);
    expect(pool.statements.slice(-2)).toEqual(['COMMIT', 'ROLLBACK']);
    expect(pool.column(PLAYER, 'xp')).toBeUndefined();
    expect(cache.size()).toBe(0);
    expect(events.fire).not.toHaveBeenCalled();
    expect(pool.releases).toBe(pool.connections);
  });

  it('keeps the store error, and the pg error behind it, as the cause', async () => {
    const failure = new FakePgError('value too long', '22001');
    pool.failOn(/^INSERT/, failure);

    const error = await updater.update(PLAYER, AttributeType.Gems, '5').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AttributeUpdateError);
    const cause = error instanceof AttributeUpdateError ? error.cause : undefined;
    expect(cause).toBeInstanceOf(StoreError);
    expect(cause instanceof StoreError && cause.transient).toBe(false);
    expect(cause instanceof StoreError && cause.cause).toBe(failure);
  });

  it('releases the client as broken when ROLLBACK also fails', async () => {
    pool.failOn(/^INSERT/, new FakePgError('disk full', '53100'));
    pool.failOn(/^ROLLBACK$/, new FakePgError('connection lost', '08006'));

    await expect(updater.update(PLAYER, AttributeType.Deaths, '1')).rejects.toBeInstanceOf(AttributeUpdateError);
    expect(pool.releases).toBe(1);
    expect(pool.brokenReleases).toBe(1);
  });

  it('retries the transaction on transient failures', async () => {
    pool.failOn(/^BEGIN$/, new FakePgError('terminating connection', '57P01'), 1);

    await updater.update(PLAYER, AttributeType.Rubies, '9');

    expect(pool.column(PLAYER, 'rubies')).toBe('9');
    expect(pool.connections).toBe(2);
    expect(pool.releases).toBe(2);
    expect(events.fire).toHaveBeenCalledTimes(1);
  });

  it('gives up after the configured attempts', async () => {
    pool.failOn(/^BEGIN$/, new FakePgError('serialization failure', '40001'));

    await expect(updater.update(PLAYER, AttributeType.Rubies, '9')).rejects.toBeInstanceOf(AttributeUpdateError);
    expect(pool.connections).toBe(3);
  });

  it('still fires the event when the cache mirror fails', async () => {
    const broken: AttributeCacheMirror = {
      update: async () => {
        throw new Error('cache down');
      },
    };
    const store = new PlayerDataStore(pool, log);
    await new AttributeUpdater(store, broken, events, log).update(PLAYER, AttributeType.Kills, '1');

    expect(pool.column(PLAYER, 'kills')).toBe('1');
    expect(events.fire).toHaveBeenCalledTimes(1);
  });

  it('rejects identity and invalid values before touching the store', async () => {
    await expect(updater.update(PLAYER, AttributeType.Identity, PLAYER)).rejects.toBeInstanceOf(IdentityAttributeError);
    await expect(updater.update(PLAYER, AttributeType.Experience, 'lots')).rejects.toBeInstanceOf(InvalidAttributeValueError);
    await expect(updater.update('not-a-uuid', AttributeType.Kills, '1')).rejects.toBeInstanceOf(InvalidAttributeValueError);
    expect(pool.connections).toBe(0);
  });

  it('logs background failures instead of throwing', async () => {
    const errorSpy = vi.fn();
    const spyLog = pino({ level: 'error' }, { write: errorSpy });
    pool.failOn(/^INSERT/, new FakePgError('check violation', '23514'));
    const store = new PlayerDataStore(pool, spyLog);

    new AttributeUpdater(store, cache, events, spyLog).updateInBackground(PLAYER, AttributeType.Kills, '1');

    await vi.waitFor(() => {
      expect(errorSpy.mock.calls.some(([line]) => String(line).includes('Background attribute update failed'))).toBe(true);
    });
    expect(events.fire).not.toHaveBeenCalled();
  });
});
