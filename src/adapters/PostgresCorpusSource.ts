import pg from 'pg';
import type { CorpusSource, QuestionRecord } from '../ports/CorpusSource';
import { parseCorpus } from '../core/corpus';
import { type Logger, silentLogger } from '../logger';

/** The slice of `pg.Pool` the corpus source uses. */
export interface QueryClient {
  query(text: string): Promise<{ rows: unknown[] }>;
  end(): Promise<void>;
}

export interface PostgresCorpusSourceOptions {
  connectionString?: string;
  table?: string;
  client?: QueryClient;
  logger?: Logger;
}

const identifierPattern = /^[A-Za-z_][A-Za-z0-9_]*(\.[A-Za-z_][A-Za-z0-9_]*)?$/;

export class PostgresCorpusSource implements CorpusSource {
  private readonly client: QueryClient;
  private readonly table: string;
  private readonly logger: Logger;

  constructor(options: PostgresCorpusSourceOptions) {
    this.table = options.table ?? 'questions';
    this.logger = options.logger ?? silentLogger;

    if (!identifierPattern.test(this.table)) {
      throw new Error(`Invalid table name: ${this.table}`);
    }

    if (options.client) {
      this.client = options.client;
    } else if (options.connectionString) {
      this.client = new pg.Pool({
        connectionString: options.connectionString,
        max: 2,
        idleTimeoutMillis: 30000, // Close idle clients after 30 seconds
        connectionTimeoutMillis: 2000, // Return an error after 2 seconds if no connection is available
      });
    } else {
      throw new Error('DATABASE_URL is not set');
    }
  }

  get description(): string {
    return `postgres:${this.table}`;
  }

  async load(): Promise<readonly QuestionRecord[]> {
    const result = await this.client.query(`
      SELECT id, question, domain, subdomain
      FROM ${this.table}
      ORDER BY id
    `);

    const records = parseCorpus(result.rows, this.logger);
    this.logger.info(`📄 Loaded ${records.length} of ${result.rows.length} questions from ${this.table}`);
    return records;
  }

  async close(): Promise<void> {
    await this.client.end();
  }
}
