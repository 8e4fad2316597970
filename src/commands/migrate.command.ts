import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { Command } from 'commander';
import { CliModule } from '../cli.module';
import { applyLogLevel } from '../config/logging';
import { DatabaseService } from '../db/database.service';
import { migrateDown, migrateToLatest } from '../db/migrator';

export function registerMigrateCommand(program: Command): void {
  const logger = new Logger('Cli');

  program
    .command('migrate')
    .description('Apply pending schema migrations')
    .option('--down', 'revert the most recent migration instead')
    .action(async (flags: { down?: boolean }) => {
      try {
        const app = await NestFactory.createApplicationContext(
          CliModule.forRoot(),
          { bufferLogs: true },
        );
        try {
          applyLogLevel(app);
          const db = app.get(DatabaseService).db.write();
          await (flags.down ? migrateDown(db) : migrateToLatest(db));
        } finally {
          await app.close();
        }
      } catch (error) {
        logger.error('Migration failed', error instanceof Error ? error.stack : error);
        process.exitCode = 1;
      }
    });
}
