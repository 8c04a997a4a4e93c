import { setTimeout } from 'node:timers/promises';

import { log } from 'apify';

import type { ClassificationPipeline } from './classification.js';
import type { Input } from './config.js';
import { DAY_MS, MINUTE_MS } from './constants.js';
import { toError } from './errors.js';
import type { Notifier } from './notifications.js';
import type { ClosureScanner } from './scrapers/closure.js';
import type { DetailEnricher } from './scrapers/detail.js';
import type { ListingPage, ListingSource, RawListingItem } from './scrapers/marketplace.js';
import type { ListingStore } from './store.js';
import type { CycleCounters, CycleStatus, CycleSummary, CycleType, DailyReport } from './types.js';

const LOG_PREFIX = '[orchestrator]';

export interface ScheduleEntry {
    cycle: CycleType;
    everyMs: number;
    runAtStart: boolean;
    /** Only due during this UTC hour. */
    atUtcHour?: number;
}

export interface MonitoringSettings {
    query: string;
    pageSize: number;
    regularScanPages: number;
    populationMinPages: number;
    populationMaxPages: number;
    populationCoverage: number;
    pageDelayMs: number;
    enrichmentSampleSize: number;
    notificationWindowMinutes: number;
    coupeOnly: boolean;
    batchAlertThreshold: number;
    closureMinAgeDays: number;
    closureBatchSize: number;
    detailDelayMs: number;
    retentionDays: number;
    monitoringLogRetentionDays: number;
    tickMs: number;
    schedule: ScheduleEntry[];
}

export interface OrchestratorDeps {
    store: ListingStore;
    source: ListingSource;
    pipeline: ClassificationPipeline;
    closureScanner: ClosureScanner;
    enricher: DetailEnricher;
    notifier: Notifier;
    settings: MonitoringSettings;
    clock?: () => Date;
}

interface CycleContext {
    type: CycleType;
    startedAt: Date;
    counters: CycleCounters;
}

const emptyCounters = (): CycleCounters => ({
    scanned: 0,
    new: 0,
    updated: 0,
    unchanged: 0,
    closed: 0,
    errors: 0,
    notified: 0,
    enriched: 0,
    deleted: 0,
});

// Population is folded into the regular entry: a regular cycle on an empty store seeds it instead.
export const buildSchedule = (monitoring: Input['monitoring']): ScheduleEntry[] => {
    const schedule: ScheduleEntry[] = [
        { cycle: 'regular', everyMs: monitoring.checkIntervalMinutes * MINUTE_MS, runAtStart: true },
        { cycle: 'quick', everyMs: monitoring.quickScanIntervalMinutes * MINUTE_MS, runAtStart: false },
        { cycle: 'closure', everyMs: monitoring.closureScanIntervalHours * 60 * MINUTE_MS, runAtStart: false },
        { cycle: 'cleanup', everyMs: monitoring.cleanupIntervalDays * DAY_MS, runAtStart: false },
    ];
    if (monitoring.dailySummaryHourUtc !== null) {
        // The hour gate makes it daily; the interval only stops a second run within that hour.
        schedule.push({
            cycle: 'daily',
            everyMs: DAY_MS / 2,
            runAtStart: false,
            atUtcHour: monitoring.dailySummaryHourUtc,
        });
    }
    return schedule;
};

export const buildMonitoringSettings = (input: Input, query: string): MonitoringSettings => ({
    query,
    pageSize: input.monitoring.pageSize,
    regularScanPages: input.monitoring.regularScanPages,
    populationMinPages: input.monitoring.populationMinPages,
    populationMaxPages: input.monitoring.populationMaxPages,
    populationCoverage: input.monitoring.populationCoverage,
    pageDelayMs: input.monitoring.pageDelayMs,
    enrichmentSampleSize: input.monitoring.enrichmentSampleSize,
    notificationWindowMinutes: input.monitoring.notificationWindowMinutes,
    coupeOnly: input.monitoring.coupeOnly,
    batchAlertThreshold: input.monitoring.batchAlertThreshold,
    closureMinAgeDays: input.closure.minAgeDays,
    closureBatchSize: input.closure.batchSize,
    detailDelayMs: input.closure.delayMs,
    retentionDays: input.retention.listingDays,
    monitoringLogRetentionDays: input.retention.monitoringLogDays,
    tickMs: input.monitoring.tickSeconds * 1000,
    schedule: buildSchedule(input.monitoring),
});

/** Pages to seed the store with: enough for the coverage target, clamped to bounds and to what exists. */
export const populationPageCount = (
    totalCount: number,
    settings: Pick<MonitoringSettings, 'pageSize' | 'populationMinPages' | 'populationMaxPages' | 'populationCoverage'>,
): number => {
    const available = Math.ceil(totalCount / settings.pageSize);
    const wanted = Math.ceil((totalCount * settings.populationCoverage) / settings.pageSize);
    return Math.min(available, settings.populationMaxPages, Math.max(settings.populationMinPages, wanted));
};

/**
 * Runs the monitoring cycles on one timeline. Cycles never overlap; a failing listing
 * only costs an error count, a failing cycle only ends that cycle, and every cycle
 * reports its counters whatever the outcome.
 */
export class Orchestrator {
    private readonly deps: OrchestratorDeps;

    private readonly settings: MonitoringSettings;

    private readonly clock: () => Date;

    private readonly lastRunAt = new Map<CycleType, number>();

    private readonly abort = new AbortController();

    constructor(deps: OrchestratorDeps) {
        this.deps = deps;
        this.settings = deps.settings;
        this.clock = deps.clock ?? (() => new Date());
    }

    get stopping(): boolean {
        return this.abort.signal.aborted;
    }

    /** Lets the current listing finish, then skips all remaining work. */
    stop(): void {
        if (this.stopping) return;
        log.info(`${LOG_PREFIX} Stop requested, finishing current listing`);
        this.abort.abort();
    }

    async run(): Promise<void> {
        const startedAt = this.clock().getTime();
        for (const entry of this.settings.schedule) {
            if (!entry.runAtStart && entry.atUtcHour === undefined) this.lastRunAt.set(entry.cycle, startedAt);
        }
        log.info(`${LOG_PREFIX} Monitoring started`, {
            schedule: this.settings.schedule.map(({ cycle, everyMs }) => `${cycle}/${Math.round(everyMs / MINUTE_MS)}m`),
        });

        while (!this.stopping) {
            await this.tick();
            if (this.stopping) break;
            try {
                await setTimeout(this.settings.tickMs, undefined, { signal: this.abort.signal });
            } catch (error) {
                if (!this.stopping) throw error;
            }
        }

        log.info(`${LOG_PREFIX} Monitoring stopped`);
    }

    /** Runs every cycle that is due, in schedule order. */
    async tick(): Promise<CycleSummary[]> {
        const now = this.clock().getTime();
        const summaries: CycleSummary[] = [];

        for (const { cycle, everyMs, atUtcHour } of this.settings.schedule) {
            if (this.stopping) break;
            if (atUtcHour !== undefined && new Date(now).getUTCHours() !== atUtcHour) continue;
            const lastRun = this.lastRunAt.get(cycle);
            if (lastRun !== undefined && now - lastRun < everyMs) continue;
            this.lastRunAt.set(cycle, now);
            summaries.push(await this.runCycle(cycle));
        }

        return summaries;
    }

    async runCycle(requested: CycleType): Promise<CycleSummary> {
        const cycle: CycleContext = { type: requested, startedAt: this.clock(), counters: emptyCounters() };
        let status: CycleStatus = 'completed';
        let failure: string | null = null;

        try {
            if (requested === 'regular' && this.deps.store.isEmpty()) cycle.type = 'population';
            log.info(`${LOG_PREFIX} Starting ${cycle.type} cycle`);
            await this.execute(cycle);
            if (this.stopping) status = 'aborted';
        } catch (error) {
            status = 'failed';
            failure = toError(error).message;
            log.error(`${LOG_PREFIX} ${cycle.type} cycle failed`, { error: failure, ...cycle.counters });
        }

        const summary = this.summarize(cycle, status, failure);
        log.info(`${LOG_PREFIX} Finished ${cycle.type} cycle`, { status, ...cycle.counters });
        this.recordCycle(summary);
        // A completed daily cycle has already sent its report.
        if (cycle.type !== 'daily' || status !== 'completed') {
            await this.notifySafely(() => this.deps.notifier.sendCycleSummary(summary));
        }
        return summary;
    }

    private async execute(cycle: CycleContext): Promise<void> {
        switch (cycle.type) {
            case 'population':
                return this.runPopulation(cycle);
            case 'regular':
                await this.scanPages(cycle, this.settings.regularScanPages, true);
                return this.notifyTrulyNew(cycle);
            case 'quick':
                await this.scanPages(cycle, 1, true);
                return this.notifyTrulyNew(cycle);
            case 'closure':
                return this.runClosure(cycle);
            case 'cleanup':
                return this.runCleanup(cycle);
            case 'daily':
                return this.runDaily(cycle);
        }
    }

    private async runPopulation(cycle: CycleContext): Promise<void> {
        const { query, pageSize } = this.settings;
        const first = await this.deps.source.fetchPage(query, 0, pageSize);
        const pages = populationPageCount(first.totalCount, this.settings);
        log.info(`${LOG_PREFIX} Seeding store from ${pages} pages`, { totalCount: first.totalCount });
        await this.scanPages(cycle, pages, false, first);
    }

    private async scanPages(
        cycle: CycleContext,
        pages: number,
        detectTrulyNew: boolean,
        first?: ListingPage,
    ): Promise<void> {
        const { query, pageSize, pageDelayMs } = this.settings;

        for (let page = 0; page < pages && !this.stopping; page++) {
            if (page > 0 && pageDelayMs > 0) await setTimeout(pageDelayMs);
            const result =
                page === 0 && first ? first : await this.deps.source.fetchPage(query, page * pageSize, pageSize);
            this.classifyAll(cycle, result.items, detectTrulyNew);
            if (result.items.length === 0 || (page + 1) * pageSize >= result.totalCount) break;
        }
    }

    private classifyAll(cycle: CycleContext, items: RawListingItem[], detectTrulyNew: boolean): void {
        for (const item of items) {
            if (this.stopping) break;
            cycle.counters.scanned++;
            try {
                const { label } = this.deps.pipeline.classify(item, { detectTrulyNew });
                cycle.counters[label]++;
            } catch (error) {
                cycle.counters.errors++;
                log.warning(`${LOG_PREFIX} Could not classify listing ${item.Id}`, { error: toError(error).message });
            }
        }
    }

    private async notifyTrulyNew(cycle: CycleContext): Promise<void> {
        const { notificationWindowMinutes, coupeOnly, batchAlertThreshold, enrichmentSampleSize } = this.settings;
        const since = new Date(this.clock().getTime() - notificationWindowMinutes * MINUTE_MS).toISOString();
        const listings = this.deps.store.consumeTrulyNew(since, coupeOnly);
        if (listings.length === 0) return;

        if (listings.length > batchAlertThreshold) {
            const snapshot = this.summarize(cycle, 'running', null);
            if (await this.notifySafely(() => this.deps.notifier.sendBatchAlert(listings, snapshot))) {
                cycle.counters.notified += listings.length;
            }
        } else {
            for (const listing of listings) {
                if (await this.notifySafely(() => this.deps.notifier.sendListingAlert(listing))) {
                    cycle.counters.notified++;
                }
            }
        }

        const sample = listings.slice(0, enrichmentSampleSize);
        if (sample.length === 0) return;
        const enriched = await this.deps.enricher.enrich(sample, {
            delayMs: this.settings.detailDelayMs,
            shouldStop: () => this.stopping,
        });
        cycle.counters.enriched += enriched.length;
    }

    private async runClosure(cycle: CycleContext): Promise<void> {
        const result = await this.deps.closureScanner.scan({
            minAgeDays: this.settings.closureMinAgeDays,
            limit: this.settings.closureBatchSize,
            delayMs: this.settings.detailDelayMs,
            shouldStop: () => this.stopping,
        });
        cycle.counters.scanned += result.scanned;
        cycle.counters.closed += result.closed;
        cycle.counters.errors += result.errors;
    }

    private async runCleanup(cycle: CycleContext): Promise<void> {
        const now = this.clock().getTime();
        const listingCutoff = new Date(now - this.settings.retentionDays * DAY_MS).toISOString();
        const logCutoff = new Date(now - this.settings.monitoringLogRetentionDays * DAY_MS).toISOString();

        cycle.counters.deleted = this.deps.store.deleteNotUpdatedSince(listingCutoff);
        const prunedCycles = this.deps.store.pruneCycleLog(logCutoff);
        log.info(`${LOG_PREFIX} Cleanup done`, {
            deletedListings: cycle.counters.deleted,
            prunedCycles,
            ...this.deps.store.statistics(),
        });
    }

    private async runDaily(cycle: CycleContext): Promise<void> {
        const until = this.clock();
        const since = new Date(until.getTime() - DAY_MS).toISOString();
        const report: DailyReport = {
            since,
            until: until.toISOString(),
            firstSeen: this.deps.store.countFirstSeenSince(since),
            ...this.deps.store.cycleActivity(since),
            statistics: this.deps.store.statistics(),
        };
        log.info(`${LOG_PREFIX} Daily summary`, { firstSeen: report.firstSeen, cycles: report.cycles });

        if (await this.notifySafely(() => this.deps.notifier.sendDailySummary(report))) {
            cycle.counters.notified++;
        }
    }

    private summarize(cycle: CycleContext, status: CycleStatus, failure: string | null): CycleSummary {
        return {
            type: cycle.type,
            status,
            startedAt: cycle.startedAt.toISOString(),
            finishedAt: status === 'running' ? null : this.clock().toISOString(),
            counters: { ...cycle.counters },
            failure,
        };
    }

    private recordCycle(summary: CycleSummary): void {
        try {
            this.deps.store.logCycle(summary);
        } catch (error) {
            log.warning(`${LOG_PREFIX} Could not record ${summary.type} cycle`, { error: toError(error).message });
        }
    }

    private async notifySafely(send: () => Promise<boolean>): Promise<boolean> {
        try {
            return await send();
        } catch (error) {
            log.warning(`${LOG_PREFIX} Notification failed`, { error: toError(error).message });
            return false;
        }
    }
}
