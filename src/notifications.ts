import { log } from 'apify';
import { gotScraping } from 'crawlee';

import { MINUTE_MS } from './constants.js';
import { toError } from './errors.js';
import { formatPrice } from './pricing.js';
import type { CycleSummary, DailyReport, Listing } from './types.js';
import { escapeHtml } from './utils.js';

const LOG_PREFIX = '[notify]';
const TELEGRAM_API = 'https://api.telegram.org';

/** Delivery is best effort: every method resolves to whether the message went out, and never throws. */
export interface Notifier {
    sendListingAlert(listing: Listing): Promise<boolean>;
    sendBatchAlert(listings: Listing[], summary: CycleSummary): Promise<boolean>;
    sendCycleSummary(summary: CycleSummary): Promise<boolean>;
    sendDailySummary(report: DailyReport): Promise<boolean>;
}

/** Counts events in a rolling window; a full window refuses instead of queueing. */
export class SlidingWindowLimiter {
    private readonly limit: number;

    private readonly windowMs: number;

    private readonly timestamps: number[] = [];

    constructor(limit: number, windowMs = MINUTE_MS) {
        this.limit = limit;
        this.windowMs = windowMs;
    }

    tryAcquire(now: number = Date.now()): boolean {
        while (this.timestamps.length > 0 && this.timestamps[0] <= now - this.windowMs) {
            this.timestamps.shift();
        }
        if (this.timestamps.length >= this.limit) return false;
        this.timestamps.push(now);
        return true;
    }
}

const formatNumber = (value: number): string => new Intl.NumberFormat('en-US').format(value);

export const formatListingAlert = (listing: Listing): string => {
    const lines = [`<b>New listing: ${escapeHtml(listing.title)}</b>`];
    const specs = [
        listing.year !== null ? String(listing.year) : null,
        listing.mileage !== null ? `${formatNumber(listing.mileage)} km` : null,
    ].filter((part): part is string => part !== null);
    if (specs.length > 0) lines.push(specs.join(' | '));

    lines.push(`Price: ${formatPrice(listing.listedPrice)}`);
    if (!listing.leaseVerified) {
        lines.push('Lease: unverified');
    } else if (listing.isLease) {
        lines.push(`Lease true cost: ${formatPrice(listing.trueCost)}`);
    }

    const registered = listing.registrationDate ? ` | registered ${listing.registrationDate}` : '';
    lines.push(`Views: ${listing.viewCount}${registered}`);
    lines.push(listing.url);
    return lines.join('\n');
};

const formatCounters = ({ counters }: CycleSummary): string =>
    [
        `scanned ${counters.scanned}`,
        `new ${counters.new}`,
        `updated ${counters.updated}`,
        `closed ${counters.closed}`,
        `errors ${counters.errors}`,
    ].join(', ');

export const formatBatchAlert = (listings: Listing[], summary: CycleSummary): string =>
    [
        `<b>${listings.length} new listings (${summary.type} scan)</b>`,
        ...listings.map((listing) => `- ${escapeHtml(listing.title)}: ${formatPrice(listing.listedPrice)} ${listing.url}`),
        formatCounters(summary),
    ].join('\n');

export const formatCycleSummary = (summary: CycleSummary): string => {
    const seconds =
        summary.finishedAt !== null
            ? Math.round((new Date(summary.finishedAt).getTime() - new Date(summary.startedAt).getTime()) / 1000)
            : null;
    const lines = [
        `<b>${summary.type} cycle ${summary.status}</b>${seconds !== null ? ` in ${seconds}s` : ''}`,
        formatCounters(summary),
    ];
    if (summary.counters.deleted > 0) lines.push(`deleted ${summary.counters.deleted}`);
    if (summary.failure) lines.push(`Failure: ${escapeHtml(summary.failure)}`);
    return lines.join('\n');
};

export const formatDailySummary = ({
    firstSeen,
    cycles,
    failedCycles,
    averageCycleSeconds,
    statistics,
}: DailyReport): string =>
    [
        '<b>Daily summary</b>',
        `new listings in 24h: ${firstSeen}`,
        `cycles ${cycles}, failed ${failedCycles}` +
            (averageCycleSeconds !== null ? `, average ${averageCycleSeconds}s` : ''),
        `store: ${statistics.total} listings, ${statistics.active} active, ${statistics.closed} closed, ` +
            `${statistics.leases} leases`,
    ].join('\n');

export type PostJson = (url: string, payload: Record<string, unknown>) => Promise<number>;

const gotPost: PostJson = async (url, payload) => {
    const { statusCode } = await gotScraping({
        url,
        method: 'POST',
        json: payload,
        responseType: 'text',
        throwHttpErrors: false,
        useHeaderGenerator: false,
        timeout: { request: 15_000 },
    });
    return statusCode;
};

export interface TelegramOptions {
    botToken: string;
    chatId: string;
    maxMessagesPerMinute: number;
}

export class TelegramNotifier implements Notifier {
    private readonly limiter: SlidingWindowLimiter;

    private readonly url: string;

    private readonly chatId: string;

    private readonly post: PostJson;

    private readonly clock: () => number;

    constructor(options: TelegramOptions, post: PostJson = gotPost, clock: () => number = Date.now) {
        this.limiter = new SlidingWindowLimiter(options.maxMessagesPerMinute);
        this.url = `${TELEGRAM_API}/bot${options.botToken}/sendMessage`;
        this.chatId = options.chatId;
        this.post = post;
        this.clock = clock;
    }

    async sendListingAlert(listing: Listing): Promise<boolean> {
        return this.send(formatListingAlert(listing));
    }

    async sendBatchAlert(listings: Listing[], summary: CycleSummary): Promise<boolean> {
        return this.send(formatBatchAlert(listings, summary));
    }

    async sendCycleSummary(summary: CycleSummary): Promise<boolean> {
        return this.send(formatCycleSummary(summary));
    }

    async sendDailySummary(report: DailyReport): Promise<boolean> {
        return this.send(formatDailySummary(report));
    }

    private async send(text: string): Promise<boolean> {
        if (!this.limiter.tryAcquire(this.clock())) {
            log.warning(`${LOG_PREFIX} Rate limit reached, dropping message`, { preview: text.slice(0, 80) });
            return false;
        }
        try {
            const statusCode = await this.post(this.url, {
                chat_id: this.chatId,
                text,
                parse_mode: 'HTML',
                disable_web_page_preview: true,
            });
            if (statusCode !== 200) {
                log.warning(`${LOG_PREFIX} Telegram answered ${statusCode}`);
                return false;
            }
            return true;
        } catch (error) {
            log.warning(`${LOG_PREFIX} Could not deliver message`, { error: toError(error).message });
            return false;
        }
    }
}

/** Used when no chat transport is configured: alerts end up in the run log only. */
export class LogNotifier implements Notifier {
    async sendListingAlert(listing: Listing): Promise<boolean> {
        log.info(`${LOG_PREFIX} ${formatListingAlert(listing)}`);
        return true;
    }

    async sendBatchAlert(listings: Listing[], summary: CycleSummary): Promise<boolean> {
        log.info(`${LOG_PREFIX} ${formatBatchAlert(listings, summary)}`);
        return true;
    }

    async sendCycleSummary(summary: CycleSummary): Promise<boolean> {
        log.info(`${LOG_PREFIX} ${formatCycleSummary(summary)}`);
        return true;
    }

    async sendDailySummary(report: DailyReport): Promise<boolean> {
        log.info(`${LOG_PREFIX} ${formatDailySummary(report)}`);
        return true;
    }
}

export const createNotifier = (options: TelegramOptions & { enabled: boolean }): Notifier =>
    options.enabled ? new TelegramNotifier(options) : new LogNotifier();
