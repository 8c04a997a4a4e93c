import { setTimeout } from 'node:timers/promises';

import { Actor, log } from 'apify';

import { ClassificationPipeline } from './classification.js';
import { parseInput } from './config.js';
import { MINUTE_MS } from './constants.js';
import { createNotifier } from './notifications.js';
import { buildMonitoringSettings, Orchestrator } from './orchestrator.js';
import { PlaywrightDriver } from './scrapers/browser.js';
import { ClosureScanner } from './scrapers/closure.js';
import { DetailEnricher } from './scrapers/detail.js';
import { AcquisitionClient, buildSearchQuery } from './scrapers/marketplace.js';
import { ListingStore } from './store.js';

await Actor.init();

const input = parseInput(await Actor.getInput());
const query = buildSearchQuery(input.product, input.search);

log.info('Starting listing monitor', {
    product: input.product,
    search: input.search,
    checkIntervalMinutes: input.monitoring.checkIntervalMinutes,
    quickScanIntervalMinutes: input.monitoring.quickScanIntervalMinutes,
    database: input.database.path,
    telegram: input.telegram.enabled,
});

const store = ListingStore.open(input.database.path);
log.info('Store statistics', { ...store.statistics() });
const [lastCycle] = store.recentCycles(1);
if (lastCycle) log.info('Last recorded cycle', { ...lastCycle });

const browser = new PlaywrightDriver(input.browser);
const client = new AcquisitionClient(browser, {
    sessionTtlMs: input.acquisition.sessionTtlMinutes * MINUTE_MS,
    maxAttempts: input.acquisition.maxAttempts,
    retryDelayMs: input.acquisition.retryDelayMs,
    requestTimeoutMs: input.acquisition.requestTimeoutMs,
});

const orchestrator = new Orchestrator({
    store,
    source: client,
    pipeline: new ClassificationPipeline(store, input.newListingCriteria),
    closureScanner: new ClosureScanner(browser, store),
    enricher: new DetailEnricher(browser, store),
    notifier: createNotifier(input.telegram),
    settings: buildMonitoringSettings(input, query),
});

const shutdown = (): void => orchestrator.stop();
process.once('SIGINT', shutdown);
process.once('SIGTERM', shutdown);

Actor.on('aborting', async () => {
    orchestrator.stop();
    // Give the in-flight listing a moment before the platform kills the run.
    await setTimeout(1000);
});

try {
    await orchestrator.run();
} finally {
    await browser.close();
    store.close();
}

log.info('Listing monitor stopped.');
await Actor.exit();
