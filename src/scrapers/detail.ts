import { setTimeout } from 'node:timers/promises';

import { log } from 'apify';
import * as cheerio from 'cheerio';

import { toError } from '../errors.js';
import { extractLeaseTerms, resolveTrueCost } from '../pricing.js';
import type { ListingStore } from '../store.js';
import type { Listing, ListingDetail } from '../types.js';
import { daysSinceRegistration, htmlToText, normalizeRegistrationDate } from '../utils.js';
import type { BrowserDriver } from './browser.js';

const LOG_PREFIX = '[detail]';

const VIEW_COUNT = /조회수[^\d]{0,20}([\d,]+)/;
const REGISTRATION = /최초\s*등록일\s*:?\s*(\d{4}[/.-]\d{1,2}[/.-]\d{1,2})/;

export const parseListingDetail = (html: string): ListingDetail => {
    const $ = cheerio.load(html);
    const text = htmlToText(html);

    // The summary list item holding "조회수" is the most reliable anchor; fall back to the whole page.
    const viewItem = $('li')
        .toArray()
        .map((element) => $(element).text().replace(/\s+/g, ' '))
        .find((itemText) => VIEW_COUNT.test(itemText));
    const views = (viewItem ?? text).match(VIEW_COUNT);

    return {
        viewCount: views ? Number(views[1].replace(/,/g, '')) : null,
        registrationDate: normalizeRegistrationDate(text.match(REGISTRATION)?.[1]),
        lease: extractLeaseTerms(text),
    };
};

/** Folds rendered-page detail into a stored listing. Detail the page did not show is kept as stored. */
export const mergeDetail = (listing: Listing, detail: ListingDetail, now: Date): Listing => {
    const registrationDate = detail.registrationDate ?? listing.registrationDate;
    return {
        ...listing,
        viewCount: detail.viewCount ?? listing.viewCount,
        registrationDate,
        daysSinceRegistration: daysSinceRegistration(registrationDate, now),
        isLease: detail.lease !== null,
        leaseVerified: true,
        lease: detail.lease,
        trueCost: resolveTrueCost(listing.listedPrice, detail.lease),
        lastUpdatedAt: now.toISOString(),
    };
};

export interface EnrichmentOptions {
    delayMs: number;
    shouldStop?: () => boolean;
}

export class DetailEnricher {
    private readonly browser: BrowserDriver;

    private readonly store: ListingStore;

    private readonly clock: () => Date;

    constructor(browser: BrowserDriver, store: ListingStore, clock: () => Date = () => new Date()) {
        this.browser = browser;
        this.store = store;
        this.clock = clock;
    }

    /** Renders each listing page in turn and re-persists what it shows. Failures are logged and skipped. */
    async enrich(listings: Listing[], options: EnrichmentOptions): Promise<Listing[]> {
        const enriched: Listing[] = [];

        for (const [index, listing] of listings.entries()) {
            if (options.shouldStop?.()) break;
            if (index > 0 && options.delayMs > 0) await setTimeout(options.delayMs);

            try {
                const snapshot = await this.browser.visit(listing.url, { expandDetails: true });
                const updated = mergeDetail(listing, parseListingDetail(snapshot.html), this.clock());
                this.store.update(updated);
                enriched.push(updated);
                log.info(`${LOG_PREFIX} Enriched ${listing.id}`, {
                    viewCount: updated.viewCount,
                    registrationDate: updated.registrationDate,
                    isLease: updated.isLease,
                    trueCost: updated.trueCost,
                });
            } catch (error) {
                log.warning(`${LOG_PREFIX} Could not enrich ${listing.id}`, { error: toError(error).message });
            }
        }

        return enriched;
    }
}
