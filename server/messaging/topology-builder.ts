/**
 * RabbitMQ Topology Builder
 * Declares exchanges, queues, and bindings once at startup
 */

import type { Channel } from 'amqplib';
import type { Logger } from 'pino';
import { errorMessage, TopologyError } from '../utils/errors';
import { validateTopology, type TopologyDefinition } from './topology';

export type TopologyChannel = Pick<Channel, 'assertExchange' | 'bindExchange' | 'assertQueue' | 'bindQueue'>;

export class TopologyBuilder {
  constructor(
    private readonly topology: TopologyDefinition,
    private readonly log: Logger
  ) {}

  /**
   * Applies the topology to `channel`. Declarations are idempotent for
   * identical definitions; any failure is fatal and nothing is rolled back.
   */
  async build(channel: TopologyChannel): Promise<void> {
    const validation = validateTopology(this.topology);
    if (!validation.isValid) {
      throw new TopologyError(`Invalid topology configuration: ${validation.errors.join(', ')}`);
    }

    this.log.info('[RabbitMQ] Applying topology...');

    for (const exchange of this.topology.exchanges) {
      await this.step(`declare exchange ${exchange.name}`, () =>
        channel.assertExchange(exchange.name, exchange.type, { durable: false, autoDelete: false }));
      this.log.debug(`[RabbitMQ] Exchange declared: ${exchange.name} (${exchange.type})`);

      for (const bound of exchange.boundExchanges) {
        await this.step(`bind exchange ${exchange.name} to ${bound}`, () =>
          channel.bindExchange(exchange.name, bound, exchange.routingKey));
        this.log.debug(`[RabbitMQ] Bound exchange ${exchange.name} to ${bound} with key ${exchange.routingKey}`);
      }
    }

    for (const queue of this.topology.queues) {
      await this.step(`declare queue ${queue.name}`, () =>
        channel.assertQueue(queue.name, { durable: false, exclusive: false, autoDelete: false }));
      this.log.debug(`[RabbitMQ] Queue declared: ${queue.name}`);

      for (const exchange of queue.exchanges) {
        await this.step(`bind queue ${queue.name} to ${exchange}`, () =>
          channel.bindQueue(queue.name, exchange, queue.routingKey));
        this.log.debug(`[RabbitMQ] Bound ${queue.name} to ${exchange} with key ${queue.routingKey}`);
      }
    }

    this.log.info(
      { exchanges: this.topology.exchanges.length, queues: this.topology.queues.length },
      '[RabbitMQ] Topology applied'
    );
  }

  private async step(description: string, fn: () => Promise<unknown>): Promise<void> {
    try {
      await fn();
    } catch (error) {
      this.log.error({ err: errorMessage(error) }, `[RabbitMQ] Failed to ${description}`);
      throw new TopologyError(`Failed to ${description}`, { cause: error });
    }
  }
}
