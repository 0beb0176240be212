import { pingDb, type DbPool } from '../db';
import type { BrokerChannel } from '../messaging/broker-channel';

export interface HealthReport {
  status: 'healthy' | 'degraded' | 'unhealthy';
  checks: Record<string, { ok: boolean; detail?: string }>;
}

export async function checkHealth(broker: BrokerChannel | null, pool: DbPool | null): Promise<HealthReport> {
  const checks: HealthReport['checks'] = {};

  if (broker) {
    checks.rabbit = broker.isReady() ? { ok: true } : { ok: false, detail: `channel ${broker.state}` };
  }

  if (pool) {
    checks.database = (await pingDb(pool)) ? { ok: true } : { ok: false, detail: 'SELECT 1 failed' };
  }

  const results = Object.values(checks);
  const okCount = results.filter(c => c.ok).length;

  return {
    status: okCount === results.length ? 'healthy' : okCount === 0 ? 'unhealthy' : 'degraded',
    checks
  };
}
