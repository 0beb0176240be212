/**
 * Player data change notifications
 *
 * fire() announces a committed attribute change on the broker; listen()
 * consumes those announcements (from this and every other process) and hands
 * them to in-process listeners.
 */

import { EventEmitter } from 'events';
import type { Logger } from 'pino';
import { ulid } from 'ulid';
import { z } from 'zod';
import { logger as rootLogger, withCorrelation } from '../bootstrap/logger';
import type { BrokerChannel, MessageBody } from '../messaging/broker-channel';
import { Exchanges, Queues } from '../messaging/topology';
import { BrokerConnectionError, errorMessage } from '../utils/errors';

export const playerDataUpdatedSchema = z.object({
  message_id: z.string().min(1),
  player_id: z.string().uuid(),
  occurred_at: z.string().datetime(),
  origin: z.string().min(1),
});

export type PlayerDataUpdatedMessage = z.infer<typeof playerDataUpdatedSchema>;

export type PlayerDataListener = (event: PlayerDataUpdatedMessage) => void | Promise<void>;

/** The change-event collaborator the updater talks to. */
export interface ChangeEvents {
  fire(playerId: string): void;
}

const UPDATE_EVENT = 'player.data.update';

// updates are only interesting while they are fresh
const MESSAGE_TTL_MS = 60000;

export class PlayerDataEvents implements ChangeEvents {
  private emitter = new EventEmitter();
  private readonly log: Logger;

  constructor(
    private readonly broker: BrokerChannel | null,
    private readonly origin: string,
    logger: Logger = rootLogger
  ) {
    this.log = logger.child({ component: 'player-data-events' });
  }

  /**
   * Announces that `playerId` changed. Without a broker the event is
   * delivered to local listeners directly.
   */
  fire(playerId: string): void {
    const message: PlayerDataUpdatedMessage = {
      message_id: ulid(),
      player_id: playerId,
      occurred_at: new Date().toISOString(),
      origin: this.origin,
    };

    if (!this.broker) {
      this.dispatch(message);
      return;
    }

    const body: MessageBody = { ...message };
    this.broker.publishAsync(Exchanges.PLAYER_DATA_UPDATE, {
      type: UPDATE_EVENT,
      messageId: message.message_id,
      expiration: String(MESSAGE_TTL_MS),
      timestamp: Date.parse(message.occurred_at),
    }, body);
  }

  on(listener: PlayerDataListener): () => void {
    const wrapped = (event: PlayerDataUpdatedMessage) => this.invoke(listener, event);
    this.emitter.on(UPDATE_EVENT, wrapped);
    return () => {
      this.emitter.off(UPDATE_EVENT, wrapped);
    };
  }

  listenerCount(): number {
    return this.emitter.listenerCount(UPDATE_EVENT);
  }

  /** Starts consuming update announcements. Resolves the consumer tag. */
  async listen(): Promise<string> {
    if (!this.broker) {
      throw new BrokerConnectionError('PlayerDataEvents.listen() requires a broker channel');
    }
    return this.broker.consume(Queues.PLAYER_DATA_UPDATE.name, body => {
      const parsed = playerDataUpdatedSchema.safeParse(body);
      if (!parsed.success) {
        this.log.warn({ issues: parsed.error.issues }, 'Ignoring malformed player data update');
        return;
      }
      this.dispatch(parsed.data);
    });
  }

  private dispatch(event: PlayerDataUpdatedMessage): void {
    this.emitter.emit(UPDATE_EVENT, event);
  }

  private invoke(listener: PlayerDataListener, event: PlayerDataUpdatedMessage): void {
    withCorrelation(event.message_id, async () => listener(event)).catch(error => {
      this.log.error({ playerId: event.player_id, err: errorMessage(error) }, 'Player data listener failed');
    });
  }
}
