/**
 * Player messaging topology
 *
 * Exchanges are listed so that every exchange appears after the exchanges it
 * binds to; queues are declared after all exchanges.
 */

export type ExchangeType = 'direct' | 'topic' | 'fanout' | 'headers';

export interface ExchangeDefinition {
  name: string;
  type: ExchangeType;
  routingKey: string;
  /** Source exchanges this exchange is bound to, using its own routing key. */
  boundExchanges: string[];
}

export interface QueueDefinition {
  name: string;
  routingKey: string;
  exchanges: string[];
}

export interface TopologyDefinition {
  exchanges: ExchangeDefinition[];
  queues: QueueDefinition[];
}

export const Exchanges = {
  PLAYER_EVENTS: {
    name: 'player.events',
    type: 'topic',
    routingKey: '',
    boundExchanges: [],
  },
  PLAYER_DATA_UPDATE: {
    name: 'player.data.update',
    type: 'fanout',
    routingKey: 'player.data.update',
    boundExchanges: ['player.events'],
  },
} satisfies Record<string, ExchangeDefinition>;

export const Queues = {
  PLAYER_DATA_UPDATE: {
    name: 'player.data.update',
    routingKey: 'player.data.update',
    exchanges: ['player.data.update'],
  },
} satisfies Record<string, QueueDefinition>;

export const PLAYER_TOPOLOGY: TopologyDefinition = {
  exchanges: Object.values(Exchanges),
  queues: Object.values(Queues),
};

export interface TopologyValidation {
  isValid: boolean;
  errors: string[];
}

/**
 * Checks that every binding refers to an exchange declared before it. Since
 * an exchange may only bind to earlier ones, the exchange graph is acyclic.
 */
export function validateTopology(topology: TopologyDefinition): TopologyValidation {
  const errors: string[] = [];
  const declared = new Set<string>();

  for (const exchange of topology.exchanges) {
    if (declared.has(exchange.name)) {
      errors.push(`Duplicate exchange: ${exchange.name}`);
    }
    for (const bound of exchange.boundExchanges) {
      if (bound === exchange.name) {
        errors.push(`Exchange ${exchange.name} is bound to itself`);
      } else if (!declared.has(bound)) {
        errors.push(`Exchange ${exchange.name} is bound to ${bound}, which is not declared before it`);
      }
    }
    declared.add(exchange.name);
  }

  const queueNames = new Set<string>();
  for (const queue of topology.queues) {
    if (queueNames.has(queue.name)) {
      errors.push(`Duplicate queue: ${queue.name}`);
    }
    queueNames.add(queue.name);
    for (const exchange of queue.exchanges) {
      if (!declared.has(exchange)) {
        errors.push(`Queue ${queue.name} is bound to undeclared exchange ${exchange}`);
      }
    }
  }

  return { isValid: errors.length === 0, errors };
}
