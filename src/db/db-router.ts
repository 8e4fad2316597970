import { Logger } from '@nestjs/common';
import { Kysely, PostgresDialect } from 'kysely';
import type { Pool } from 'pg';
import type { DB } from './types';

export class DbRouter {
  private readonly logger = new Logger(DbRouter.name);
  private readonly replicas: Kysely<DB>[];
  private currentReplicaIndex = 0;

  constructor(
    private readonly writeDb: Kysely<DB>, // Primary (write)
    readPools: Pool[], // Raw pools for replicas (read)
  ) {
    this.replicas = readPools.map(
      (pool) =>
        new Kysely<DB>({
          dialect: new PostgresDialect({ pool }),
        }),
    );
  }

  /**
   * Get the write connection (primary).
   */
  write(): Kysely<DB> {
    return this.writeDb;
  }

  /**
   * Get a read connection using round-robin over the replicas.
   */
  read(): Kysely<DB> {
    if (this.replicas.length === 0) {
      return this.writeDb;
    }

    const replica = this.replicas[this.currentReplicaIndex];
    this.currentReplicaIndex =
      (this.currentReplicaIndex + 1) % this.replicas.length;

    return replica;
  }

  /**
   * Executes a read operation, retrying once on the primary when a replica fails.
   */
  async executeRead<T>(operation: (db: Kysely<DB>) => Promise<T>): Promise<T> {
    const replica = this.read();
    if (replica === this.writeDb) {
      return operation(this.writeDb);
    }
    try {
      return await operation(replica);
    } catch (error) {
      this.logger.warn(
        `Replica read failed, falling back to primary: ${String(error)}`,
      );
      return operation(this.writeDb);
    }
  }

  async destroy(): Promise<void> {
    await Promise.all(
      [this.writeDb, ...this.replicas].map((db) => db.destroy()),
    );
  }
}
