import {
  Inject,
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
  Optional,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Kysely, LogEvent, PostgresDialect, sql } from 'kysely';
import { Pool, PoolConfig } from 'pg';
import type { DatabaseConfig } from '../config/configuration';
import { DbRouter } from './db-router';
import type { DB } from './types';

export const DATABASE_OPTIONS = Symbol('DATABASE_OPTIONS');

export interface DatabaseOptions {
  /** Run a probe query on module init and fail boot when it errors. */
  probeOnInit: boolean;
}

@Injectable()
export class DatabaseService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(DatabaseService.name);

  public readonly db: DbRouter;

  private readonly primaryPool: Pool;
  private readonly replicaPools: Pool[];

  private readonly writeDb: Kysely<DB>;
  private readonly options: DatabaseOptions;

  constructor(
    configService: ConfigService,
    @Optional() @Inject(DATABASE_OPTIONS) options?: DatabaseOptions,
  ) {
    this.options = options ?? { probeOnInit: true };
    const config = configService.getOrThrow<DatabaseConfig>('database');

    const common: PoolConfig = {
      max: config.connectionLimit,
      idleTimeoutMillis: 30_000,
    };

    this.primaryPool = new Pool(
      config.url
        ? { ...common, connectionString: config.url }
        : {
            ...common,
            host: config.host,
            port: config.port,
            user: config.user,
            password: config.password,
            database: config.name,
          },
    );
    this.replicaPools = config.replicaUrls.map(
      (connectionString) => new Pool({ ...common, connectionString }),
    );

    for (const pool of [this.primaryPool, ...this.replicaPools]) {
      // An idle client erroring must not crash the process
      pool.on('error', (err) =>
        this.logger.error(`Idle database client error: ${err.message}`),
      );
    }

    this.writeDb = new Kysely<DB>({
      dialect: new PostgresDialect({ pool: this.primaryPool }),
      log: (event) => this.logQuery(event),
    });

    this.db = new DbRouter(this.writeDb, this.replicaPools);
  }

  async onModuleInit() {
    if (!this.options.probeOnInit) {
      return;
    }
    try {
      await sql`select 1`.execute(this.writeDb);
      this.logger.log(
        `Database initialized. Replicas connected: ${this.replicaPools.length}`,
      );
    } catch (error) {
      this.logger.error('Failed to connect to database', error);
      throw error;
    }
  }

  async onModuleDestroy() {
    // Kysely#destroy ends the primary pool it was handed
    await this.db.destroy();
    this.logger.log('Database connections closed');
  }

  private logQuery(event: LogEvent) {
    if (event.level === 'error') {
      this.logger.error(
        `Query failed after ${event.queryDurationMillis.toFixed(1)}ms: ${event.query.sql}`,
      );
      return;
    }
    this.logger.debug(
      `${event.query.sql} (${event.queryDurationMillis.toFixed(1)}ms)`,
    );
  }
}
