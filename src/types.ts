export type CycleType = 'population' | 'regular' | 'quick' | 'closure' | 'cleanup' | 'daily';
export type CycleStatus = 'running' | 'completed' | 'failed' | 'aborted';
export type ClassificationLabel = 'new' | 'updated' | 'unchanged';

export type ClosureReason =
    | 'no-data-region'
    | 'confirmed-message'
    | 'error-page'
    | 'error-element'
    | 'redirect-error'
    | 'http-404'
    | 'no-response';

export type TrulyNewRule = 'recent-low-views' | 'unregistered-immediate' | 'within-max-age';

/** All amounts in canonical units (만원). Fields the page did not state stay null. */
export interface LeaseTerms {
    deposit: number | null;
    monthlyPayment: number | null;
    termMonths: number | null;
    finalPayment: number | null;
    vehiclePrice: number | null;
}

/** A listing as seen by one acquisition, before it is merged with what the store knows. */
export interface ListingObservation {
    id: string;
    title: string;
    model: string;
    badge: string;
    year: number | null;
    mileage: number | null;
    fuelType: string | null;
    url: string;
    listedPrice: number;
    trueCost: number;
    isLease: boolean;
    leaseVerified: boolean; // true once isLease came from a rendered page
    lease: LeaseTerms | null;
    isCoupe: boolean;
    viewCount: number;
    registrationDate: string | null; // YYYY/MM/DD
    daysSinceRegistration: number | null;
}

export interface Listing extends ListingObservation {
    firstSeenAt: string; // ISO date, never rewritten
    lastUpdatedAt: string; // ISO date
    isTrulyNew: boolean;
    isClosed: boolean;
    closureDetectedAt: string | null;
    closureReason: ClosureReason | null;
}

export interface ListingDetail {
    viewCount: number | null;
    registrationDate: string | null;
    lease: LeaseTerms | null;
}

export interface NewListingCriteria {
    recentRegistrationDays: number;
    maxViewsForNew: number;
    immediateAlertMaxViews: number;
    maxRegistrationAgeDays: number;
}

export interface SearchConstraints {
    yearMin: number | null;
    yearMax: number | null;
    priceMin: number | null; // 만원
    priceMax: number | null; // 만원
    mileageMax: number | null; // km
}

export interface ProductIdentity {
    manufacturer: string;
    modelGroup: string;
}

export interface CycleCounters {
    scanned: number;
    new: number;
    updated: number;
    unchanged: number;
    closed: number;
    errors: number;
    notified: number;
    enriched: number;
    deleted: number;
}

export interface CycleSummary {
    type: CycleType;
    status: CycleStatus;
    startedAt: string;
    finishedAt: string | null;
    counters: CycleCounters;
    failure: string | null;
}

export interface StoreStatistics {
    total: number;
    active: number;
    closed: number;
    pendingTrulyNew: number;
    leases: number;
    closureReasons: Partial<Record<ClosureReason, number>>;
}

/** Activity over the last day, sent once a day alongside the store totals. */
export interface DailyReport {
    since: string;
    until: string;
    firstSeen: number;
    cycles: number;
    failedCycles: number;
    averageCycleSeconds: number | null;
    statistics: StoreStatistics;
}
