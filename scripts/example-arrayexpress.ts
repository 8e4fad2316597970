import 'reflect-metadata';
import { runCrawl } from '../src/commands/crawl.command';

// Loads a single ArrayExpress methylation study with all its samples.
async function main() {
  await runCrawl('arrayexpress', {
    limit: 1,
    dryRun: process.argv.includes('--dry-run'),
  });
}

main().catch((error: unknown) => {
  console.error('❌ ArrayExpress example failed:', error);
  process.exit(1);
});
