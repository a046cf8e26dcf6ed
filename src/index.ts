import { parseCliArgs, printUsage } from './cli';
import { loadConfig, resolveSettings } from './config';
import { MultiCategoryScraper } from './multi-scraper';

async function main() {
  const options = parseCliArgs(process.argv.slice(2));

  if (options.help) {
    printUsage();
    return;
  }

  const config = options.configPath ? loadConfig(options.configPath) : undefined;
  const settings = resolveSettings(options, config);

  console.log('🛒 Aldi Storefront Scraper\n');

  const scraper = new MultiCategoryScraper({
    settings,
    onProgress: (progress) => {
      const pct = Math.round(((progress.completed + progress.failed) / progress.total) * 100);
      console.log(`📈 Progress: ${pct}% (${progress.completed} done, ${progress.failed} failed)`);
    },
  });

  const result = await scraper.run();

  if (result.total === 0) {
    console.log('\nNo categories discovered, nothing written.');
    return;
  }

  console.log('\n=== SCRAPE SUMMARY ===');
  console.log(`Total categories: ${result.total}`);
  console.log(`Completed: ${result.completed}`);
  console.log(`Failed: ${result.failed}`);

  const totalProducts = result.results.reduce((sum, r) => sum + r.productCount, 0);
  console.log(`Total products scraped: ${totalProducts}`);
  if (result.invalidRecords > 0) {
    console.log(`Dropped invalid records: ${result.invalidRecords}`);
  }
  console.log(`Rows appended to ${result.outputFile}: ${result.rowsWritten}`);

  if (result.failed > 0) {
    console.log('\n❌ Failed categories:');
    for (const r of result.results.filter((r) => !r.success)) {
      console.log(`  - ${r.url}: ${r.error}`);
    }
  }

  console.log('\n✅ Scraping complete!');
}

main().catch((error) => {
  console.error('❌ Fatal error:', error);
  process.exit(1);
});
