/**
 * Broker Channel
 *
 * One RabbitMQ connection with one channel, shared by every publisher and
 * consumer in the process. The topology is applied when the channel opens;
 * publishing is only attempted once the channel is ready.
 */

import amqp, { type Channel, type ConsumeMessage, type Options } from 'amqplib';
import type { Logger } from 'pino';
import { z } from 'zod';
import { logger as rootLogger } from '../bootstrap/logger';
import { mqConsumeTotal, mqPublishFailuresTotal, mqPublishTotal } from '../observability/metrics';
import {
  BrokerConnectionError,
  ChannelClosedError,
  ChannelReadinessTimeoutError,
  errorMessage,
} from '../utils/errors';
import { PLAYER_TOPOLOGY, type ExchangeDefinition, type TopologyDefinition } from './topology';
import { TopologyBuilder, type TopologyChannel } from './topology-builder';

export type ChannelState = 'uninitialized' | 'ready' | 'closed';

export type AmqpChannel = TopologyChannel & Pick<Channel, 'publish' | 'consume' | 'close' | 'on'>;

export interface AmqpConnection {
  createChannel(): Promise<AmqpChannel>;
  close(): Promise<void>;
  on(event: 'error', listener: (err: Error) => void): unknown;
}

export type ConnectFn = (options: Options.Connect) => Promise<AmqpConnection>;

export interface BrokerCredentials {
  user: string;
  password: string;
  host: string;
  port: number;
  heartbeatSec?: number;
}

export interface BrokerChannelOptions {
  topology?: TopologyDefinition;
  logger?: Logger;
  /** How long awaitReady waits before giving up on the channel. */
  readyTimeoutMs?: number;
  connect?: ConnectFn;
}

export type MessageBody = Record<string, unknown>;

export type DeliveryHandler = (body: MessageBody, message: ConsumeMessage) => void | Promise<void>;

export const DEFAULT_READY_TIMEOUT_MS = 10000;

const messageBodySchema = z.record(z.unknown());

interface ReadyWaiter {
  resolve: () => void;
  reject: (error: Error) => void;
}

const defaultConnect: ConnectFn = options => amqp.connect(options);

export class BrokerChannel {
  private connection: AmqpConnection | null = null;
  private channel: AmqpChannel | null = null;
  private currentState: ChannelState = 'uninitialized';
  private waiters = new Set<ReadyWaiter>();

  private readonly topology: TopologyDefinition;
  private readonly log: Logger;
  private readonly readyTimeoutMs: number;
  private readonly connectFn: ConnectFn;

  constructor(private readonly credentials: BrokerCredentials, options: BrokerChannelOptions = {}) {
    this.topology = options.topology ?? PLAYER_TOPOLOGY;
    this.log = (options.logger ?? rootLogger).child({ component: 'broker' });
    this.readyTimeoutMs = options.readyTimeoutMs ?? DEFAULT_READY_TIMEOUT_MS;
    this.connectFn = options.connect ?? defaultConnect;
  }

  get state(): ChannelState {
    return this.currentState;
  }

  isReady(): boolean {
    return this.currentState === 'ready';
  }

  /**
   * Connects, creates the channel and applies the topology. Topology
   * failures are fatal: the connection is closed and the error rethrown.
   */
  async open(): Promise<void> {
    if (this.currentState !== 'uninitialized') {
      throw new BrokerConnectionError(`Cannot open a ${this.currentState} channel`);
    }
    const { user, password, host, port, heartbeatSec } = this.credentials;

    let channel: AmqpChannel;
    try {
      const connection = await this.connectFn({
        protocol: 'amqp',
        hostname: host,
        port,
        username: user,
        password,
        heartbeat: heartbeatSec ?? 30,
      });
      this.connection = connection;
      connection.on('error', err => this.log.error({ err: err.message }, '[RabbitMQ] Connection error'));
      channel = await connection.createChannel();
      this.channel = channel;
    } catch (error) {
      this.log.error({ host, port, err: errorMessage(error) }, '[RabbitMQ] Connection failed');
      await this.close();
      throw new BrokerConnectionError(`Failed to connect to RabbitMQ at ${host}:${port}`, { cause: error });
    }

    if (this.state === 'closed') {
      // close() ran while connecting
      await this.close();
      throw new ChannelClosedError();
    }

    channel.on('error', (err: Error) => this.log.error({ err: err.message }, '[RabbitMQ] Channel error'));
    channel.on('close', () => {
      if (this.currentState === 'ready') {
        this.log.warn('[RabbitMQ] Channel closed by broker');
        this.currentState = 'closed';
      }
    });

    try {
      await new TopologyBuilder(this.topology, this.log).build(channel);
    } catch (error) {
      await this.close();
      throw error;
    }

    if (this.state === 'closed') {
      // close() ran while the topology was being applied
      await this.close();
      throw new ChannelClosedError();
    }

    this.currentState = 'ready';
    this.log.info({ host, port }, '[RabbitMQ] Channel ready');
    const waiters = Array.from(this.waiters);
    this.waiters.clear();
    for (const waiter of waiters) waiter.resolve();
  }

  /**
   * Resolves once the channel is ready. When it already is, `callback` runs
   * synchronously. Otherwise the wait is bounded by the ready timeout, after
   * which the channel is considered permanently unusable.
   */
  awaitReady(callback?: () => void): Promise<void> {
    if (this.currentState === 'ready') {
      callback?.();
      return Promise.resolve();
    }
    if (this.currentState === 'closed') {
      return Promise.reject(new ChannelClosedError());
    }

    return new Promise<void>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.waiters.delete(waiter);
        const error = new ChannelReadinessTimeoutError(this.readyTimeoutMs);
        this.log.fatal({ timeoutMs: this.readyTimeoutMs }, '[RabbitMQ] Channel initialization timed out');
        reject(error);
      }, this.readyTimeoutMs);

      const waiter: ReadyWaiter = {
        resolve: () => {
          clearTimeout(timer);
          try {
            callback?.();
            resolve();
          } catch (error) {
            reject(error instanceof Error ? error : new Error(String(error)));
          }
        },
        reject: error => {
          clearTimeout(timer);
          reject(error);
        },
      };
      this.waiters.add(waiter);
    });
  }

  /**
   * Fire-and-forget publish of `body` as JSON to every exchange `exchange` is
   * bound to, with the exchange's routing key. An exchange without bindings
   * is published to directly. Failures are logged and counted, never thrown.
   */
  publish(exchange: ExchangeDefinition, properties: Options.Publish | undefined, body: MessageBody): void {
    const targets = exchange.boundExchanges.length > 0 ? exchange.boundExchanges : [exchange.name];

    if (this.currentState !== 'ready' || !this.channel) {
      for (const target of targets) this.recordPublishFailure(target, 'not_ready');
      this.log.warn({ exchange: exchange.name, state: this.currentState }, '[RabbitMQ] Publish skipped, channel not ready');
      return;
    }

    let content: Buffer;
    try {
      content = Buffer.from(JSON.stringify(body), 'utf8');
    } catch (error) {
      for (const target of targets) this.recordPublishFailure(target, 'serialization', error);
      return;
    }

    for (const target of targets) {
      try {
        const accepted = this.channel.publish(target, exchange.routingKey, content, {
          contentType: 'application/json',
          contentEncoding: 'utf-8',
          ...properties,
        });
        mqPublishTotal.inc({ exchange: target, routing_key: exchange.routingKey });
        if (!accepted) {
          this.log.warn({ exchange: target }, '[RabbitMQ] Write buffer full, message queued locally');
        }
      } catch (error) {
        this.recordPublishFailure(target, 'io_error', error);
      }
    }
  }

  /** Same as publish, run on a later turn of the event loop. */
  publishAsync(exchange: ExchangeDefinition, properties: Options.Publish | undefined, body: MessageBody): void {
    setImmediate(() => this.publish(exchange, properties, body));
  }

  /**
   * Registers `handler` for every message delivered on `queue`. Messages are
   * acknowledged on delivery, before the handler runs, so a failing handler
   * loses its message.
   */
  async consume(queue: string, handler: DeliveryHandler): Promise<string> {
    if (this.currentState !== 'ready' || !this.channel) {
      throw new BrokerConnectionError(`Cannot consume from ${queue}: channel is ${this.currentState}`);
    }

    try {
      const { consumerTag } = await this.channel.consume(queue, async (msg) => {
        if (!msg) {
          this.log.warn({ queue }, '[RabbitMQ] Consumer cancelled by broker');
          return;
        }
        mqConsumeTotal.inc({ queue });

        const parsed = parseBody(msg.content);
        if (!parsed.success) {
          this.log.error({ queue, rawMessage: msg.content.toString('utf8').substring(0, 500) }, '[RabbitMQ] Dropping unparseable message');
          return;
        }

        try {
          await handler(parsed.data, msg);
        } catch (error) {
          this.log.error({ queue, err: errorMessage(error) }, '[RabbitMQ] Message handler failed, message lost');
        }
      }, { noAck: true });

      this.log.info({ queue, consumerTag }, '[RabbitMQ] Consumer registered');
      return consumerTag;
    } catch (error) {
      throw new BrokerConnectionError(`Failed to consume from ${queue}`, { cause: error });
    }
  }

  /** Closes the channel, then the connection. Safe to call more than once. */
  async close(): Promise<void> {
    this.currentState = 'closed';

    const waiters = Array.from(this.waiters);
    this.waiters.clear();
    for (const waiter of waiters) waiter.reject(new ChannelClosedError());

    if (this.channel) {
      const channel = this.channel;
      this.channel = null;
      try {
        await channel.close();
        this.log.info('[RabbitMQ] Channel closed');
      } catch (error) {
        this.log.warn({ err: errorMessage(error) }, '[RabbitMQ] Channel close error (expected)');
      }
    }

    if (this.connection) {
      const connection = this.connection;
      this.connection = null;
      try {
        await connection.close();
        this.log.info('[RabbitMQ] Connection closed');
      } catch (error) {
        this.log.warn({ err: errorMessage(error) }, '[RabbitMQ] Connection close error (expected)');
      }
    }
  }

  private recordPublishFailure(exchange: string, reason: string, error?: unknown): void {
    mqPublishFailuresTotal.inc({ exchange, reason });
    if (error !== undefined) {
      this.log.error({ exchange, reason, err: errorMessage(error) }, '[RabbitMQ] Publish failed');
    }
  }
}

function parseBody(content: Buffer): { success: true; data: MessageBody } | { success: false } {
  try {
    return messageBodySchema.safeParse(JSON.parse(content.toString('utf8')));
  } catch {
    return { success: false };
  }
}
