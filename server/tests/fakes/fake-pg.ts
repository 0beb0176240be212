/**
 * In-process stand-in for a pg Pool holding the player_data table.
 * Understands exactly the statements PlayerDataStore issues; writes made
 * inside BEGIN are only applied on COMMIT.
 */

import type { DbClient, DbPool, QueryRows } from '../../db';

type Row = Record<string, unknown>;

export class FakePgError extends Error {
  constructor(message: string, public readonly code: string) {
    super(message);
    this.name = 'FakePgError';
  }
}

interface InjectedFailure {
  pattern: RegExp;
  error: Error;
  remaining: number;
}

const SELECT_COLUMN = /^SELECT (\w+) FROM (\w+) WHERE uuid = \$1$/;
const SELECT_BY_NAME = /^SELECT uuid FROM (\w+) WHERE name = \$1$/;
const UPSERT = /^INSERT INTO (\w+) \(uuid, (\w+)\) VALUES \(\$1, \$2\) ON CONFLICT \(uuid\) DO UPDATE SET (\w+) = EXCLUDED\.(\w+)$/;

export class FakePlayerDataPool implements DbPool {
  readonly rows = new Map<string, Row>();
  readonly statements: string[] = [];
  connections = 0;
  releases = 0;
  brokenReleases = 0;
  private failures: InjectedFailure[] = [];

  constructor(readonly tableName = 'player_data') {}

  seed(uuid: string, row: Row): void {
    this.rows.set(uuid, { uuid, ...row });
  }

  column(uuid: string, column: string): unknown {
    return this.rows.get(uuid)?.[column];
  }

  /** Makes the next `times` statements matching `pattern` throw `error`. */
  failOn(pattern: RegExp, error: Error, times = Number.POSITIVE_INFINITY): void {
    this.failures.push({ pattern, error, remaining: times });
  }

  async connect(): Promise<DbClient> {
    this.connections++;
    return new FakePlayerDataClient(this);
  }

  takeFailure(text: string): Error | undefined {
    const failure = this.failures.find(f => f.remaining > 0 && f.pattern.test(text));
    if (!failure) return undefined;
    failure.remaining--;
    return failure.error;
  }
}

class FakePlayerDataClient implements DbClient {
  private pending: Map<string, Row> | null = null;
  private released = false;

  constructor(private readonly pool: FakePlayerDataPool) {}

  async query(text: string, values: unknown[] = []): Promise<QueryRows> {
    if (this.released) throw new Error('query on a released client');
    this.pool.statements.push(text);

    const failure = this.pool.takeFailure(text);
    if (failure) throw failure;

    if (text === 'BEGIN') {
      this.pending = new Map();
      return empty();
    }
    if (text === 'COMMIT') {
      for (const [uuid, changes] of this.pending ?? []) {
        this.pool.rows.set(uuid, { ...this.pool.rows.get(uuid), ...changes });
      }
      this.pending = null;
      return empty();
    }
    if (text === 'ROLLBACK') {
      this.pending = null;
      return empty();
    }
    if (text === 'SELECT 1') {
      return { rows: [{ '?column?': 1 }], rowCount: 1 };
    }

    const select = SELECT_COLUMN.exec(text);
    if (select) {
      this.assertTable(select[2]);
      const row = this.pool.rows.get(String(values[0]));
      return row ? { rows: [{ [select[1]]: row[select[1]] ?? null }], rowCount: 1 } : empty();
    }

    const byName = SELECT_BY_NAME.exec(text);
    if (byName) {
      this.assertTable(byName[1]);
      const rows = Array.from(this.pool.rows.values())
        .filter(row => row.name === values[0])
        .map(row => ({ uuid: row.uuid }));
      return { rows, rowCount: rows.length };
    }

    const upsert = UPSERT.exec(text);
    if (upsert) {
      this.assertTable(upsert[1]);
      const uuid = String(values[0]);
      const change: Row = { uuid, [upsert[2]]: values[1] };
      if (this.pending) {
        this.pending.set(uuid, { ...this.pending.get(uuid), ...change });
      } else {
        this.pool.rows.set(uuid, { ...this.pool.rows.get(uuid), ...change });
      }
      return { rows: [], rowCount: 1 };
    }

    throw new FakePgError(`unexpected statement: ${text}`, '42601');
  }

  release(err?: Error | boolean): void {
    this.released = true;
    this.pool.releases++;
    if (err) this.pool.brokenReleases++;
  }

  private assertTable(table: string): void {
    if (table !== this.pool.tableName) {
      throw new FakePgError(`relation "${table}" does not exist`, '42P01');
    }
  }
}

function empty(): QueryRows {
  return { rows: [], rowCount: 0 };
}
