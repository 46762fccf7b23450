#!/usr/bin/env node
import { config } from "./config";
import { createCrawler } from "./crawlers/estateCrawler";
import { Logger } from "./lib/logger";
import { StorageUnavailableError } from "./lib/persistence";

export const EXIT_SUCCESS = 0;
export const EXIT_MISSING_RECORDS = 1;
export const EXIT_FATAL = 2;

async function main(): Promise<number> {
  const logger = new Logger("crawler", config.LOG_LEVEL);
  const categoryArgs = process.argv.slice(2).flatMap((arg) => arg.split(","));
  try {
    const crawler = createCrawler(config, logger);
    const categories = crawler.resolveCategories(categoryArgs.length > 0 ? categoryArgs : config.CATEGORIES);
    if (categories.length === 0) {
      logger.error("no_categories_selected", { requested: categoryArgs });
      return EXIT_FATAL;
    }
    const report = await crawler.run(categories);
    return report.success ? EXIT_SUCCESS : EXIT_MISSING_RECORDS;
  } catch (error) {
    logger.error("run_aborted", { fatal: error instanceof StorageUnavailableError, error });
    return EXIT_FATAL;
  }
}

void main().then((code) => {
  process.exitCode = code;
});
