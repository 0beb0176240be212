/**
 * Attribute Updater
 *
 * Writes one attribute per call in its own transaction. Experience and level
 * are kept consistent: a level write is stored as the experience threshold of
 * that level, and both values reach the cache once the write has committed.
 */

import type { Logger } from 'pino';
import { logger as rootLogger } from '../bootstrap/logger';
import { attributeUpdatesTotal } from '../observability/metrics';
import {
  AttributeUpdateError,
  errorMessage,
  IdentityAttributeError,
  InvalidAttributeValueError,
} from '../utils/errors';
import type { AttributeCacheMirror } from './attribute-cache';
import { ATTRIBUTES, AttributeType, isPlayerId } from './attribute-types';
import { experienceToLevel, levelToExperienceThreshold, MAX_LEVEL, MIN_LEVEL } from './level-calculator';
import type { PlayerDataStore } from './player-data-store';
import type { ChangeEvents } from './player-data-events';

export interface AttributeValue {
  readonly attribute: AttributeType;
  readonly value: string;
}

/** What the caller asked for and what actually gets persisted. */
export interface UpdateIntent {
  readonly requested: AttributeValue;
  readonly persisted: AttributeValue;
  /** Derived value that is mirrored to the cache but never stored. */
  readonly companion?: AttributeValue;
}

export type UpdateOutcome =
  | { status: 'skipped' }
  | { status: 'committed'; intent: UpdateIntent };

export function planUpdate(attribute: AttributeType, value: string): UpdateIntent {
  if (attribute === AttributeType.Identity) {
    throw new IdentityAttributeError('update');
  }

  const parsed = ATTRIBUTES[attribute].schema.safeParse(value);
  if (!parsed.success) {
    throw new InvalidAttributeValueError(attribute, value, parsed.error.issues[0]?.message ?? 'invalid value');
  }
  const requested: AttributeValue = { attribute, value: parsed.data };

  if (attribute === AttributeType.Experience) {
    const level = experienceToLevel(Number(parsed.data));
    return Object.freeze({
      requested,
      persisted: requested,
      companion: { attribute: AttributeType.Level, value: String(level) },
    });
  }

  if (attribute === AttributeType.Level) {
    const level = Number(parsed.data);
    if (level < MIN_LEVEL) {
      throw new InvalidAttributeValueError(attribute, value, `levels start at ${MIN_LEVEL}`);
    }
    if (level > MAX_LEVEL) {
      throw new InvalidAttributeValueError(attribute, value, `levels stop at ${MAX_LEVEL}`);
    }
    return Object.freeze({
      requested,
      persisted: { attribute: AttributeType.Experience, value: String(levelToExperienceThreshold(level)) },
      companion: requested,
    });
  }

  return Object.freeze({ requested, persisted: requested });
}

export class AttributeUpdater {
  private readonly log: Logger;

  constructor(
    private readonly store: PlayerDataStore | null,
    private readonly cache: AttributeCacheMirror | null,
    private readonly events: ChangeEvents,
    logger: Logger = rootLogger
  ) {
    this.log = logger.child({ component: 'attribute-updater' });
  }

  /**
   * Rejects with AttributeUpdateError when the store write fails; the cache
   * and the change event are then left untouched.
   */
  async update(playerId: string, attribute: AttributeType, value: string): Promise<UpdateOutcome> {
    if (!this.store) return { status: 'skipped' };
    if (!isPlayerId(playerId)) {
      throw new InvalidAttributeValueError(AttributeType.Identity, playerId, 'player id must be a UUID');
    }

    const intent = planUpdate(attribute, value);

    try {
      await this.store.upsertAttribute(playerId, intent.persisted.attribute, intent.persisted.value);
    } catch (error) {
      attributeUpdatesTotal.inc({ attribute, outcome: 'failed' });
      throw new AttributeUpdateError(playerId, attribute, { cause: error });
    }

    if (intent.companion) {
      await this.mirror(playerId, intent.companion);
    }
    await this.mirror(playerId, intent.persisted);

    try {
      this.events.fire(playerId);
    } catch (error) {
      this.log.error({ playerId, err: errorMessage(error) }, 'Change event dispatch failed');
    }

    attributeUpdatesTotal.inc({ attribute, outcome: 'committed' });
    this.log.debug({ playerId, attribute, persisted: intent.persisted.attribute }, 'Attribute updated');
    return { status: 'committed', intent };
  }

  /** Runs update() off the caller's path; a failure is only logged. */
  updateInBackground(playerId: string, attribute: AttributeType, value: string): void {
    this.update(playerId, attribute, value).catch(error => {
      this.log.error({ playerId, attribute, err: errorMessage(error) }, 'Background attribute update failed');
    });
  }

  private async mirror(playerId: string, entry: AttributeValue): Promise<void> {
    if (!this.cache) return;
    try {
      await this.cache.update(playerId, entry.attribute, entry.value);
    } catch (error) {
      this.log.warn({ playerId, attribute: entry.attribute, err: errorMessage(error) }, 'Cache mirror update failed');
    }
  }
}
