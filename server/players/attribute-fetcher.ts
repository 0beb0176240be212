import type { Logger } from 'pino';
import { logger as rootLogger } from '../bootstrap/logger';
import {
  errorMessage,
  IdentityAttributeError,
  InvalidAttributeValueError,
  InvalidIdentityError,
} from '../utils/errors';
import { AttributeType, isPlayerId } from './attribute-types';
import { experienceToLevel } from './level-calculator';
import type { PlayerDataStore } from './player-data-store';

/**
 * Reads single player attributes. A missing store, a missing row and a store
 * that keeps failing all resolve to `null`.
 */
export class AttributeFetcher {
  private readonly log: Logger;

  constructor(private readonly store: PlayerDataStore | null, logger: Logger = rootLogger) {
    this.log = logger.child({ component: 'attribute-fetcher' });
  }

  /**
   * Level is never stored; it is derived from the player's experience.
   * Identity can't be fetched here, use {@link fetchIdentity}.
   */
  async fetch(playerId: string, attribute: AttributeType): Promise<string | null> {
    if (attribute === AttributeType.Identity) {
      throw new IdentityAttributeError('fetch');
    }
    if (!this.store) return null;
    if (!isPlayerId(playerId)) {
      throw new InvalidAttributeValueError(AttributeType.Identity, playerId, 'player id must be a UUID');
    }

    if (attribute === AttributeType.Level) {
      const experience = await this.fetch(playerId, AttributeType.Experience);
      return experience === null ? null : String(experienceToLevel(Number(experience)));
    }

    try {
      const value = await this.store.selectAttribute(playerId, attribute);
      return value === undefined || value === null ? null : String(value);
    } catch (error) {
      this.log.error({ playerId, attribute, err: errorMessage(error) }, 'Attribute fetch failed');
      return null;
    }
  }

  /** Resolves a player's id from their name. */
  async fetchIdentity(name: string): Promise<string | null> {
    if (!this.store) return null;

    let value: unknown;
    try {
      value = await this.store.selectIdentityByName(name);
    } catch (error) {
      this.log.error({ name, err: errorMessage(error) }, 'Identity fetch failed');
      return null;
    }
    if (value === undefined || value === null) return null;

    const identity = String(value);
    if (!isPlayerId(identity)) {
      throw new InvalidIdentityError(identity);
    }
    return identity.toLowerCase();
  }
}
