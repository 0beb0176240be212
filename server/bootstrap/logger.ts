import pino, { type Logger } from 'pino';
import { AsyncLocalStorage } from 'node:async_hooks';

export type { Logger };

export const correlationStore = new AsyncLocalStorage<{ correlationId: string }>();

export function getLogger(level: string, pretty: boolean): Logger {
  return pino({
    level,
    transport: pretty ? { target: 'pino-pretty', options: { colorize: true } } : undefined,
    base: undefined, // do not inject pid and hostname automatically
    timestamp: pino.stdTimeFunctions.isoTime,
    mixin() {
      const correlationId = currentCorrelationId();
      return correlationId ? { correlationId } : {};
    }
  });
}

/** Process-wide logger used when a component is not handed one explicitly. */
export const logger = getLogger(process.env.LOG_LEVEL || 'info', process.env.LOG_PRETTY === 'true');

export function withCorrelation<T>(cid: string, fn: () => Promise<T>) {
  return correlationStore.run({ correlationId: cid }, fn);
}

export function currentCorrelationId(): string | undefined {
  return correlationStore.getStore()?.correlationId;
}
