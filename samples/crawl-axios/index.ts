/**
 * Axios Transport Example
 *
 * Replays a search request captured from the browser's network tab
 * ("Copy as cURL") and prints the collected records as JSON.
 *
 * Run: npm run sample:axios -- ./search.curl 25
 *
 * Settings come from CRAWL_* variables, the log level from LOG_LEVEL,
 * and an optional proxy from CRAWL_PROXY_URL.
 */

import { readFile } from "node:fs/promises";
import { CrawlPipeline, createLogger, loadSettingsFromEnv } from "@crawl-relay/core";
import AxiosTransport from "@crawl-relay/adapter-axios";

async function main(): Promise<number> {
  const [templatePath, count = "10", concurrency = "5"] = process.argv.slice(2);
  const logger = createLogger({ pretty: true });

  if (!templatePath) {
    logger.error("Usage: crawl-axios <template-file> [targetCount] [concurrencyLimit]");
    return 2;
  }

  const template = await readFile(templatePath, "utf8");
  const pipeline = new CrawlPipeline(new AxiosTransport(), {
    settings: loadSettingsFromEnv(),
    logger,
  })
    .withOutcomeHandler((outcome, stub) => {
      logger.info(
        { ordinal: outcome.ordinal, kind: outcome.kind, label: stub.label },
        "Record settled"
      );
    })
    .withErrorHandler((error) => {
      logger.error({ code: error.code, status: error.status }, error.message);
    });

  const result = await pipeline.run({
    template,
    targetCount: Number(count),
    concurrencyLimit: Number(concurrency),
    proxyUrl: process.env.CRAWL_PROXY_URL,
  });

  if (!result.ok) {
    return 1;
  }
  process.stdout.write(`${JSON.stringify(result.envelope, null, 2)}\n`);
  return 0;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  });
