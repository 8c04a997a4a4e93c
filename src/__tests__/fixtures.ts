import Database from 'better-sqlite3';

import type { BrowserDriver, FetchedText, HarvestedSession, PageSnapshot } from '../scrapers/browser.js';
import type { RawListingItem } from '../scrapers/marketplace.js';
import { ListingStore } from '../store.js';
import type { Listing, NewListingCriteria } from '../types.js';

export const CRITERIA: NewListingCriteria = {
    recentRegistrationDays: 7,
    maxViewsForNew: 100,
    immediateAlertMaxViews: 10,
    maxRegistrationAgeDays: 30,
};

export const memoryStore = (): ListingStore => new ListingStore(new Database(':memory:'));

export const rawItem = (overrides: Partial<RawListingItem> = {}): RawListingItem => ({
    Id: 38_000_001,
    Manufacturer: '벤츠',
    Model: 'GLE-클래스 W167',
    Badge: 'GLE450 4MATIC',
    Year: 202_103,
    Mileage: 32_000,
    Price: 8900,
    FuelType: '가솔린',
    ...overrides,
});

export const listing = (overrides: Partial<Listing> = {}): Listing => ({
    id: '38000001',
    title: '벤츠 GLE-클래스 W167 GLE450 4MATIC 쿠페',
    model: 'GLE-클래스 W167',
    badge: 'GLE450 4MATIC 쿠페',
    year: 2021,
    mileage: 32_000,
    fuelType: '가솔린',
    url: 'https://fem.encar.com/cars/detail/38000001',
    listedPrice: 8900,
    trueCost: 8900,
    isLease: false,
    leaseVerified: false,
    lease: null,
    isCoupe: true,
    viewCount: 0,
    registrationDate: null,
    daysSinceRegistration: null,
    firstSeenAt: '2024-06-01T00:00:00.000Z',
    lastUpdatedAt: '2024-06-01T00:00:00.000Z',
    isTrulyNew: false,
    isClosed: false,
    closureDetectedAt: null,
    closureReason: null,
    ...overrides,
});

/** Scripted browser: each method answers from the handler given for it. */
export class FakeBrowser implements BrowserDriver {
    harvests = 0;

    visits: string[] = [];

    constructor(
        private readonly handlers: {
            harvest?: (count: number) => HarvestedSession;
            fetchText?: (url: string) => FetchedText;
            visit?: (url: string) => PageSnapshot;
        } = {},
    ) {}

    async harvestSession(): Promise<HarvestedSession> {
        this.harvests++;
        return this.handlers.harvest?.(this.harvests) ?? { cookies: { sid: `s${this.harvests}` }, userAgent: 'test-agent' };
    }

    async fetchText(url: string): Promise<FetchedText> {
        if (!this.handlers.fetchText) throw new Error('fetchText not scripted');
        return this.handlers.fetchText(url);
    }

    async visit(url: string): Promise<PageSnapshot> {
        this.visits.push(url);
        if (!this.handlers.visit) throw new Error('visit not scripted');
        return this.handlers.visit(url);
    }

    async close(): Promise<void> {}
}
