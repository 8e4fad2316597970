import { Logger } from '@nestjs/common';
import { Kysely, Migration, MigrationResultSet, Migrator } from 'kysely';
import * as initial from './migrations/0001_initial';

// Registered in code so the compiled build needs no migrations folder on disk
const migrations: Record<string, Migration> = {
  '0001_initial': initial,
};

const logger = new Logger('Migrator');

function report(direction: 'up' | 'down', { error, results }: MigrationResultSet) {
  for (const result of results ?? []) {
    if (result.status === 'Success') {
      logger.log(`Migration ${result.migrationName} ${direction}: done`);
    } else if (result.status === 'Error') {
      logger.error(`Migration ${result.migrationName} ${direction}: failed`);
    }
  }
  if (error) {
    throw error instanceof Error ? error : new Error(String(error));
  }
  if (!results || results.length === 0) {
    logger.log('No migrations to run');
  }
}

function createMigrator<T>(db: Kysely<T>): Migrator {
  return new Migrator({
    db,
    provider: { getMigrations: async () => migrations },
  });
}

export async function migrateToLatest<T>(db: Kysely<T>): Promise<void> {
  report('up', await createMigrator(db).migrateToLatest());
}

export async function migrateDown<T>(db: Kysely<T>): Promise<void> {
  report('down', await createMigrator(db).migrateDown());
}
