#!/usr/bin/env node
import 'reflect-metadata';
import { Command } from 'commander';
import { registerCrawlCommands } from './commands/crawl.command';
import { registerMigrateCommand } from './commands/migrate.command';

const program = new Command();

program
  .name('idat-catalog')
  .description('Load methylation array metadata from GEO and ArrayExpress into PostgreSQL')
  .version('0.1.0');

registerMigrateCommand(program);
registerCrawlCommands(program);

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : error);
  process.exit(1);
});
