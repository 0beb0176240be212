import { Counter, Registry, collectDefaultMetrics as collectProcessMetrics } from 'prom-client';

export const register = new Registry();

export const attributeUpdatesTotal = new Counter({
  name: 'player_attribute_updates_total',
  help: 'Player attribute updates by outcome',
  labelNames: ['attribute', 'outcome'],
  registers: [register],
});

export const mqPublishTotal = new Counter({
  name: 'mq_publish_total',
  help: 'Messages published',
  labelNames: ['exchange', 'routing_key'],
  registers: [register],
});

export const mqPublishFailuresTotal = new Counter({
  name: 'mq_publish_failures_total',
  help: 'Fire-and-forget publishes that were dropped',
  labelNames: ['exchange', 'reason'],
  registers: [register],
});

export const mqConsumeTotal = new Counter({
  name: 'mq_consume_total',
  help: 'Messages consumed',
  labelNames: ['queue'],
  registers: [register],
});

export function collectDefaultMetrics(): void {
  collectProcessMetrics({ register });
}
