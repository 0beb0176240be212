import Ajv from 'ajv';
import schema from '../../config/schema.json';

export type NodeEnv = 'local' | 'dev' | 'staging' | 'prod' | 'test';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

export interface AppConfig {
  nodeEnv: NodeEnv;
  serviceName: string;
  logLevel: LogLevel;
  logPretty: boolean;
  dbUrl?: string;
  playerTable: string;
  rabbitUser: string;
  rabbitPassword: string;
  rabbitHost: string;
  rabbitPort: number;
  rabbitHeartbeatSec: number;
  rabbitReadyTimeoutMs: number;
  storeRetryAttempts: number;
  storeRetryBaseMs: number;
}

const ajv = new Ajv({ allErrors: true, useDefaults: true });
const validate = ajv.compile(schema);

function isNodeEnv(value: string): value is NodeEnv {
  return ['local', 'dev', 'staging', 'prod', 'test'].includes(value);
}

function isLogLevel(value: string): value is LogLevel {
  return ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'].includes(value);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const nodeEnv = env.NODE_ENV || 'local';
  const logLevel = env.LOG_LEVEL || 'info';
  if (!isNodeEnv(nodeEnv)) throw new Error(`Invalid configuration: unknown NODE_ENV "${nodeEnv}"`);
  if (!isLogLevel(logLevel)) throw new Error(`Invalid configuration: unknown LOG_LEVEL "${logLevel}"`);

  const cfg: AppConfig = {
    nodeEnv,
    serviceName: env.SERVICE_NAME || 'player-sync',
    logLevel,
    logPretty: env.LOG_PRETTY === 'true',
    dbUrl: env.DATABASE_URL || env.DB_URL || undefined,
    playerTable: env.PLAYER_TABLE || 'player_data',
    rabbitUser: env.RABBIT_USER || 'guest',
    rabbitPassword: env.RABBIT_PASSWORD || 'guest',
    rabbitHost: env.RABBIT_HOST || 'localhost',
    rabbitPort: parseInt(env.RABBIT_PORT || '5672', 10),
    rabbitHeartbeatSec: parseInt(env.RABBIT_HEARTBEAT_SEC || '30', 10),
    rabbitReadyTimeoutMs: parseInt(env.RABBIT_READY_TIMEOUT_MS || '10000', 10),
    storeRetryAttempts: parseInt(env.STORE_RETRY_ATTEMPTS || '3', 10),
    storeRetryBaseMs: parseInt(env.STORE_RETRY_BASE_MS || '200', 10)
  };

  if (!validate(cfg)) {
    const msgs = (validate.errors || []).map(e => `${e.instancePath} ${e.message}`).join('; ');
    throw new Error(`Invalid configuration: ${msgs}`);
  }
  return cfg;
}
