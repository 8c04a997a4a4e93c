import { log } from 'apify';

import { LISTING_URL } from './constants.js';
import { ParseError } from './errors.js';
import { parsePrice, resolveTrueCost } from './pricing.js';
import type { RawListingItem } from './scrapers/marketplace.js';
import type { ListingStore } from './store.js';
import type {
    ClassificationLabel,
    Listing,
    ListingObservation,
    NewListingCriteria,
    TrulyNewRule,
} from './types.js';
import { daysSinceRegistration, isCoupe, normalizeRegistrationDate } from './utils.js';

const LOG_PREFIX = '[classification]';

export interface ClassificationResult {
    label: ClassificationLabel;
    listing: Listing;
    trulyNewRule: TrulyNewRule | null;
    previousPrice: number | null;
}

export interface ClassifyOptions {
    /** Off for population cycles: seeding the store must not trigger notifications. */
    detectTrulyNew: boolean;
}

// Year arrives as YYYYMM (202103); older payloads send the bare year.
const toCalendarYear = (value: number | undefined): number | null => {
    if (value === undefined || !Number.isFinite(value) || value <= 0) return null;
    return value >= 10_000 ? Math.floor(value / 100) : value;
};

/** Converts one list-endpoint item into the single listing shape used everywhere downstream. */
export const normalizeItem = (raw: RawListingItem, now: Date): ListingObservation => {
    const id = String(raw.Id).trim();
    if (!id) throw new ParseError(raw.Id, 'listing id');

    const model = raw.Model?.trim() ?? '';
    const badge = [raw.Badge, raw.BadgeDetail]
        .map((part) => part?.trim() ?? '')
        .filter(Boolean)
        .join(' ');
    const listedPrice = parsePrice(raw.Price);
    const registrationDate = normalizeRegistrationDate(raw.FirstRegistrationDate);

    return {
        id,
        title: [raw.Manufacturer?.trim(), model, badge].filter(Boolean).join(' '),
        model,
        badge,
        year: toCalendarYear(raw.Year),
        mileage: raw.Mileage ?? null,
        fuelType: raw.FuelType ?? null,
        url: `${LISTING_URL}/${id}`,
        listedPrice,
        // The list endpoint says nothing about leases; a rendered page corrects this later.
        trueCost: listedPrice,
        isLease: false,
        leaseVerified: false,
        lease: null,
        isCoupe: isCoupe(model, badge),
        viewCount: raw.ViewCount ?? 0,
        registrationDate,
        daysSinceRegistration: daysSinceRegistration(registrationDate, now),
    };
};

/**
 * Decides whether a listing absent from the store is fresh enough to alert on.
 * Returns the rule that fired, or null. Registration older than the max age always loses.
 */
export const evaluateTrulyNew = (
    observation: Pick<ListingObservation, 'viewCount' | 'daysSinceRegistration'>,
    criteria: NewListingCriteria,
): TrulyNewRule | null => {
    const { viewCount, daysSinceRegistration: days } = observation;

    if (days !== null && days > criteria.maxRegistrationAgeDays) return null;
    if (days !== null && days <= criteria.recentRegistrationDays && viewCount <= criteria.maxViewsForNew) {
        return 'recent-low-views';
    }
    if (days === null && viewCount <= criteria.immediateAlertMaxViews) return 'unregistered-immediate';
    if (days !== null) return 'within-max-age';
    return null;
};

/**
 * Merges a re-observation into the stored record. An observation without page detail
 * (no views, no registration date) keeps the detail captured earlier, and an unverified
 * lease flag never replaces a verified one.
 */
export const mergeObservation = (existing: Listing, observation: ListingObservation, now: Date): Listing => {
    const impoverished = observation.viewCount === 0 && observation.registrationDate === null;
    const hasDetail = existing.viewCount > 0 || existing.registrationDate !== null;
    const keepDetail = impoverished && hasDetail;
    const keepLease = existing.leaseVerified && !observation.leaseVerified;

    const registrationDate = keepDetail ? existing.registrationDate : observation.registrationDate;
    const lease = keepLease ? existing.lease : observation.lease;

    return {
        ...existing,
        ...observation,
        id: existing.id,
        viewCount: keepDetail ? existing.viewCount : observation.viewCount,
        registrationDate,
        daysSinceRegistration: keepDetail
            ? (daysSinceRegistration(registrationDate, now) ?? existing.daysSinceRegistration)
            : observation.daysSinceRegistration,
        isLease: keepLease ? existing.isLease : observation.isLease,
        leaseVerified: keepLease || observation.leaseVerified,
        lease,
        trueCost: resolveTrueCost(observation.listedPrice, lease),
        firstSeenAt: existing.firstSeenAt,
        lastUpdatedAt: now.toISOString(),
    };
};

const TRACKED_FIELDS = [
    'title',
    'mileage',
    'listedPrice',
    'trueCost',
    'isLease',
    'viewCount',
    'registrationDate',
] as const satisfies readonly (keyof Listing)[];

const hasChanged = (before: Listing, after: Listing): boolean =>
    TRACKED_FIELDS.some((field) => before[field] !== after[field]);

export class ClassificationPipeline {
    private readonly store: ListingStore;

    private readonly criteria: NewListingCriteria;

    private readonly clock: () => Date;

    constructor(store: ListingStore, criteria: NewListingCriteria, clock: () => Date = () => new Date()) {
        this.store = store;
        this.criteria = criteria;
        this.clock = clock;
    }

    classify(raw: RawListingItem, options: ClassifyOptions = { detectTrulyNew: true }): ClassificationResult {
        const now = this.clock();
        const observation = normalizeItem(raw, now);
        const existing = this.store.get(observation.id);

        if (!existing) {
            const trulyNewRule = options.detectTrulyNew ? evaluateTrulyNew(observation, this.criteria) : null;
            const listing: Listing = {
                ...observation,
                firstSeenAt: now.toISOString(),
                lastUpdatedAt: now.toISOString(),
                isTrulyNew: trulyNewRule !== null,
                isClosed: false,
                closureDetectedAt: null,
                closureReason: null,
            };
            this.store.insert(listing);
            if (trulyNewRule) {
                log.info(`${LOG_PREFIX} Truly new listing ${listing.id}`, { rule: trulyNewRule, title: listing.title });
            }
            return { label: 'new', listing, trulyNewRule, previousPrice: null };
        }

        const listing = mergeObservation(existing, observation, now);
        this.store.update(listing);

        const priceChanged = existing.listedPrice !== listing.listedPrice;
        if (priceChanged) {
            log.info(`${LOG_PREFIX} Price change for ${listing.id}`, {
                previousPrice: existing.listedPrice,
                listedPrice: listing.listedPrice,
            });
        }
        return {
            label: hasChanged(existing, listing) ? 'updated' : 'unchanged',
            listing,
            trulyNewRule: null,
            previousPrice: priceChanged ? existing.listedPrice : null,
        };
    }
}
