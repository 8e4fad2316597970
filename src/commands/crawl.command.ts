import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { Command } from 'commander';
import { CliModule } from '../cli.module';
import { applyLogLevel } from '../config/logging';
import type { CrawlOptions, CrawlReport } from '../ingestion/ingestion.types';
import { IngestionService } from '../ingestion/ingestion.service';
import { collectPlatform, parsePositiveInt } from './options';

export type CrawlTarget = 'geo' | 'arrayexpress' | 'all';

interface CrawlFlags {
  limit?: number;
  sampleLimit?: number;
  platform?: string[];
  dryRun?: boolean;
  upload?: boolean;
}

export function formatReport(report: CrawlReport): string[] {
  const lines = [
    `${report.repository}: ${report.studies} studies, ${report.samples} samples, ${report.files} files, ${report.uploaded} uploaded`,
  ];
  if (report.failures.length > 0) {
    lines.push(`  ${report.failures.length} failures:`);
    for (const failure of report.failures) {
      lines.push(`    ${failure.accession}: ${failure.reason}`);
    }
  }
  return lines;
}

/**
 * Boots an application context, crawls the target and prints the report.
 * Per-study failures end up in the report; anything thrown here is fatal.
 */
export async function runCrawl(
  target: CrawlTarget,
  options: CrawlOptions,
): Promise<CrawlReport[]> {
  const app = await NestFactory.createApplicationContext(
    CliModule.forRoot({ dryRun: options.dryRun }),
    { bufferLogs: true },
  );
  try {
    applyLogLevel(app);
    const ingestion = app.get(IngestionService);
    let reports: CrawlReport[];
    if (target === 'geo') {
      reports = [await ingestion.crawlGeo(options)];
    } else if (target === 'arrayexpress') {
      reports = [await ingestion.crawlArrayExpress(options)];
    } else {
      reports = await ingestion.crawlAll(options);
    }

    for (const report of reports) {
      for (const line of formatReport(report)) {
        console.log(line);
      }
    }
    return reports;
  } finally {
    await app.close();
  }
}

function toCrawlOptions(flags: CrawlFlags): CrawlOptions {
  return {
    limit: flags.limit,
    sampleLimit: flags.sampleLimit,
    platforms: flags.platform,
    dryRun: flags.dryRun ?? false,
    uploadFiles: flags.upload ?? false,
  };
}

function addCrawlOptions(command: Command, withPlatform: boolean): Command {
  command
    .option('--limit <n>', 'maximum number of studies', parsePositiveInt)
    .option('--sample-limit <n>', 'maximum number of samples per study', parsePositiveInt)
    .option('--dry-run', 'log what would be written without touching the database')
    .option('--upload', 'download IDAT files and push them to object storage');
  if (withPlatform) {
    command.option(
      '--platform <gpl>',
      'GEO platform to search (repeatable, defaults to the Illumina methylation arrays)',
      collectPlatform,
    );
  }
  return command;
}

export function registerCrawlCommands(program: Command): void {
  const logger = new Logger('Cli');
  const targets: Array<[CrawlTarget, string]> = [
    ['geo', 'Crawl GEO series with IDAT supplementary files'],
    ['arrayexpress', 'Crawl ArrayExpress methylation studies'],
    ['all', 'Crawl GEO, then ArrayExpress'],
  ];

  for (const [target, description] of targets) {
    const command = addCrawlOptions(
      program.command(target).description(description),
      target !== 'arrayexpress',
    );
    command.action(async (flags: CrawlFlags) => {
      try {
        await runCrawl(target, toCrawlOptions(flags));
      } catch (error) {
        logger.error(`${target} crawl failed`, error instanceof Error ? error.stack : error);
        process.exitCode = 1;
      }
    });
  }
}
