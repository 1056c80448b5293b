import {
  Kysely,
  PostgresAdapter,
  PostgresIntrospector,
  PostgresQueryCompiler,
  type CompiledQuery,
  type DatabaseConnection,
  type Driver,
  type QueryResult,
} from 'kysely';

import type { DB } from '../../src/shared/db/schema';

/**
 * WHY:
 * - Exercises the real Kysely query building + adapter code without a database.
 * - Each executed statement is recorded; each consumes the next scripted response.
 *
 * HOW TO USE:
 * - const { db, connection } = createScriptedDb()
 * - connection.respond({ rows: [row] }) / connection.fail(pgError)
 */

type ScriptedResponse =
  | { kind: 'result'; rows: Record<string, unknown>[]; numAffectedRows?: bigint }
  | { kind: 'error'; error: unknown };

export class ScriptedConnection implements DatabaseConnection {
  readonly queries: CompiledQuery[] = [];
  private readonly responses: ScriptedResponse[] = [];

  respond(result: { rows?: Record<string, unknown>[]; numAffectedRows?: bigint }): this {
    this.responses.push({
      kind: 'result',
      rows: result.rows ?? [],
      numAffectedRows: result.numAffectedRows,
    });
    return this;
  }

  fail(error: unknown): this {
    this.responses.push({ kind: 'error', error });
    return this;
  }

  async executeQuery<R>(compiledQuery: CompiledQuery): Promise<QueryResult<R>> {
    this.queries.push(compiledQuery);

    const next = this.responses.shift();
    if (!next) throw new Error(`No scripted response for: ${compiledQuery.sql}`);
    if (next.kind === 'error') throw next.error;

    return {
      rows: next.rows as R[],
      numAffectedRows: next.numAffectedRows,
    };
  }

  async *streamQuery<R>(): AsyncIterableIterator<QueryResult<R>> {
    throw new Error('streamQuery is not scripted');
  }
}

class ScriptedDriver implements Driver {
  constructor(private readonly connection: ScriptedConnection) {}

  async init(): Promise<void> {}

  async acquireConnection(): Promise<DatabaseConnection> {
    return this.connection;
  }

  async beginTransaction(): Promise<void> {}

  async commitTransaction(): Promise<void> {}

  async rollbackTransaction(): Promise<void> {}

  async releaseConnection(): Promise<void> {}

  async destroy(): Promise<void> {}
}

export function createScriptedDb() {
  const connection = new ScriptedConnection();

  const db = new Kysely<DB>({
    dialect: {
      createAdapter: () => new PostgresAdapter(),
      createDriver: () => new ScriptedDriver(connection),
      createIntrospector: (kysely) => new PostgresIntrospector(kysely),
      createQueryCompiler: () => new PostgresQueryCompiler(),
    },
  });

  return { db, connection };
}

/** pg's DatabaseError carries the SQLSTATE in `code`; tests only need that shape. */
export function pgError(code: string, constraint?: string): Error {
  return Object.assign(new Error(`pg error ${code}`), { code, constraint });
}
