import "dotenv/config";
import { TrendsClient } from "@viralscript/trends-client";
import { createApp } from "./app";
import { type Catalog, loadCatalog } from "./catalog";
import { loadConfig } from "./config";
import { createLogger } from "./logger";
import { TrendCache } from "./trendCache";

const config = loadConfig();
const logger = createLogger(config.logLevel);

let catalog: Catalog;
try {
  catalog = loadCatalog(config.catalogDir);
} catch (err) {
  logger.fatal({ err, dir: config.catalogDir }, "catalog.load_failed");
  process.exit(1);
}

const client = new TrendsClient({
  apiKey: config.trends.apiKey,
  baseUrl: config.trends.baseUrl,
  country: config.trends.country,
  timeoutMs: config.trends.timeoutMs,
  config: catalog.trends,
});
if (client.usesSampleFeed) {
  logger.warn("TRENDS_API_KEY not set; serving the sample trend feed");
}

const trends = new TrendCache(client, { ttlMs: config.trends.cacheTtlMs, logger });
const app = createApp({ catalog, trends, logger, corsOrigin: config.corsOrigin });

app.listen(config.port, () =>
  logger.info(
    { port: config.port, hooks: catalog.hookStyles().length, niches: catalog.niches().length },
    "API listening",
  ),
);
