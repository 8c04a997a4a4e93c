import { setTimeout } from 'node:timers/promises';

import { log } from 'apify';
import * as cheerio from 'cheerio';

import {
    CLOSURE_REGION_PHRASES,
    CLOSURE_REGION_SELECTOR,
    DAY_MS,
    ERROR_ELEMENT_MIN_TEXT,
    ERROR_ELEMENT_SELECTORS,
    ERROR_TITLE_MARKERS,
    ERROR_URL_PATTERN,
    WITHDRAWN_PHRASES,
} from '../constants.js';
import { ClosureScanError, toError } from '../errors.js';
import type { ListingStore } from '../store.js';
import type { ClosureReason } from '../types.js';
import { htmlToText } from '../utils.js';
import type { BrowserDriver, PageSnapshot } from './browser.js';

const LOG_PREFIX = '[closure]';

// Blocked or failing pages say nothing about the listing itself.
export const isInconclusiveStatus = (status: number | null): boolean =>
    status !== null && status >= 400 && status !== 404 && status !== 410;

/** Reads closure evidence off a rendered snapshot, strongest signal first. Null for a page that looks alive. */
export const detectClosure = (snapshot: PageSnapshot): ClosureReason | null => {
    if (snapshot.status === null) return 'no-response';
    if (snapshot.status === 404 || snapshot.status === 410) return 'http-404';

    const $ = cheerio.load(snapshot.html);

    const regionText = $(CLOSURE_REGION_SELECTOR).text();
    if (CLOSURE_REGION_PHRASES.some((phrase) => regionText.includes(phrase))) return 'no-data-region';

    const title = snapshot.title.toLowerCase();
    if (ERROR_TITLE_MARKERS.some((marker) => title.includes(marker))) return 'error-page';

    const text = htmlToText(snapshot.html);
    if (WITHDRAWN_PHRASES.some((phrase) => text.includes(phrase))) return 'confirmed-message';

    const errorElement = ERROR_ELEMENT_SELECTORS.some(
        (selector) => $(selector).first().text().trim().length > ERROR_ELEMENT_MIN_TEXT,
    );
    if (errorElement) return 'error-element';

    if (ERROR_URL_PATTERN.test(snapshot.url)) return 'redirect-error';

    return null;
};

export interface ClosureScanOptions {
    minAgeDays: number;
    limit: number;
    delayMs: number;
    shouldStop?: () => boolean;
}

export interface ClosureScanResult {
    scanned: number;
    closed: number;
    active: number;
    errors: number;
    reasons: Partial<Record<ClosureReason, number>>;
}

export class ClosureScanner {
    private readonly browser: BrowserDriver;

    private readonly store: ListingStore;

    private readonly clock: () => Date;

    constructor(browser: BrowserDriver, store: ListingStore, clock: () => Date = () => new Date()) {
        this.browser = browser;
        this.store = store;
        this.clock = clock;
    }

    /** Revisits active listings old enough to have plausibly been withdrawn. Closed listings are never picked up again. */
    async scan(options: ClosureScanOptions): Promise<ClosureScanResult> {
        const cutoff = new Date(this.clock().getTime() - options.minAgeDays * DAY_MS).toISOString();
        const candidates = this.store.activeListings(cutoff, options.limit);
        const result: ClosureScanResult = { scanned: 0, closed: 0, active: 0, errors: 0, reasons: {} };

        log.info(`${LOG_PREFIX} Checking ${candidates.length} active listings`, { cutoff });

        for (const [index, listing] of candidates.entries()) {
            if (options.shouldStop?.()) break;
            if (index > 0 && options.delayMs > 0) await setTimeout(options.delayMs);

            result.scanned++;
            const checkedAt = this.clock().toISOString();
            try {
                this.store.markChecked(listing.id, checkedAt);
                const reason = await this.check(listing.id, listing.url);
                if (reason) {
                    this.store.markClosed(listing.id, reason, checkedAt);
                    result.closed++;
                    result.reasons[reason] = (result.reasons[reason] ?? 0) + 1;
                    log.info(`${LOG_PREFIX} Listing ${listing.id} closed`, { reason, title: listing.title });
                } else {
                    result.active++;
                }
            } catch (error) {
                result.errors++;
                log.warning(`${LOG_PREFIX} Scan error for ${listing.id}`, { error: toError(error).message });
            }
        }

        log.info(`${LOG_PREFIX} Closure scan done`, { ...result });
        return result;
    }

    private async check(listingId: string, url: string): Promise<ClosureReason | null> {
        let snapshot: PageSnapshot;
        try {
            snapshot = await this.browser.visit(url);
        } catch (error) {
            throw new ClosureScanError(listingId, error);
        }
        if (isInconclusiveStatus(snapshot.status)) {
            throw new ClosureScanError(listingId, new Error(`listing page answered ${snapshot.status}`));
        }
        return detectClosure(snapshot);
    }
}
