import 'reflect-metadata';
import { runCrawl } from '../src/commands/crawl.command';

// Loads the first ten GEO methylation series that ship IDAT files.
// Pass --dry-run to only log what would be written.
async function main() {
  await runCrawl('geo', {
    limit: 10,
    dryRun: process.argv.includes('--dry-run'),
  });
}

main().catch((error: unknown) => {
  console.error('❌ GEO example failed:', error);
  process.exit(1);
});
