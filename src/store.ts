import { log } from 'apify';
import Database from 'better-sqlite3';

import { PersistenceError, toError } from './errors.js';
import type { ClosureReason, CycleSummary, DailyReport, Listing, StoreStatistics } from './types.js';

const LOG_PREFIX = '[store]';

type SqlValue = string | number | null;

const CLOSURE_REASONS: readonly ClosureReason[] = [
    'no-data-region',
    'confirmed-message',
    'error-page',
    'error-element',
    'redirect-error',
    'http-404',
    'no-response',
];

const CREATE_LISTINGS = `
    CREATE TABLE IF NOT EXISTS listings (
        id TEXT PRIMARY KEY,
        title TEXT NOT NULL,
        model TEXT NOT NULL DEFAULT '',
        year INTEGER,
        mileage INTEGER,
        url TEXT NOT NULL,
        listed_price REAL NOT NULL,
        true_cost REAL NOT NULL,
        is_lease INTEGER NOT NULL DEFAULT 0,
        view_count INTEGER NOT NULL DEFAULT 0,
        registration_date TEXT,
        days_since_registration INTEGER,
        first_seen_at TEXT NOT NULL,
        last_updated_at TEXT NOT NULL,
        is_truly_new INTEGER NOT NULL DEFAULT 0
    )`;

const CREATE_MONITORING_LOG = `
    CREATE TABLE IF NOT EXISTS monitoring_log (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        cycle_type TEXT NOT NULL,
        status TEXT NOT NULL,
        started_at TEXT NOT NULL,
        finished_at TEXT,
        scanned INTEGER NOT NULL DEFAULT 0,
        new_count INTEGER NOT NULL DEFAULT 0,
        updated_count INTEGER NOT NULL DEFAULT 0,
        closed_count INTEGER NOT NULL DEFAULT 0,
        error_count INTEGER NOT NULL DEFAULT 0,
        notified_count INTEGER NOT NULL DEFAULT 0,
        failure TEXT
    )`;

// Columns added after the first schema. Only ever appended, always nullable or defaulted.
const ADDED_COLUMNS: [name: string, definition: string][] = [
    ['badge', "TEXT DEFAULT ''"],
    ['fuel_type', 'TEXT'],
    ['is_coupe', 'INTEGER DEFAULT 0'],
    ['lease_verified', 'INTEGER DEFAULT 0'],
    ['lease_deposit', 'REAL'],
    ['lease_monthly_payment', 'REAL'],
    ['lease_term_months', 'INTEGER'],
    ['lease_final_payment', 'REAL'],
    ['lease_vehicle_price', 'REAL'],
    ['is_closed', 'INTEGER DEFAULT 0'],
    ['closure_detected_at', 'TEXT'],
    ['closure_reason', 'TEXT'],
    ['closure_checked_at', 'TEXT'],
];

interface ListingRow {
    id: string;
    title: string;
    model: string;
    badge: string | null;
    year: number | null;
    mileage: number | null;
    fuel_type: string | null;
    url: string;
    listed_price: number;
    true_cost: number;
    is_lease: number;
    lease_verified: number | null;
    lease_deposit: number | null;
    lease_monthly_payment: number | null;
    lease_term_months: number | null;
    lease_final_payment: number | null;
    lease_vehicle_price: number | null;
    is_coupe: number | null;
    view_count: number;
    registration_date: string | null;
    days_since_registration: number | null;
    first_seen_at: string;
    last_updated_at: string;
    is_truly_new: number;
    is_closed: number | null;
    closure_detected_at: string | null;
    closure_reason: string | null;
}

export interface MonitoringLogEntry {
    cycleType: string;
    status: string;
    startedAt: string;
    finishedAt: string | null;
    scanned: number;
    newCount: number;
    closedCount: number;
    errorCount: number;
    failure: string | null;
}

const fromRow = (row: ListingRow): Listing => {
    const isLease = row.is_lease === 1;
    return {
        id: row.id,
        title: row.title,
        model: row.model,
        badge: row.badge ?? '',
        year: row.year,
        mileage: row.mileage,
        fuelType: row.fuel_type,
        url: row.url,
        listedPrice: row.listed_price,
        trueCost: row.true_cost,
        isLease,
        leaseVerified: row.lease_verified === 1,
        lease: isLease
            ? {
                  deposit: row.lease_deposit,
                  monthlyPayment: row.lease_monthly_payment,
                  termMonths: row.lease_term_months,
                  finalPayment: row.lease_final_payment,
                  vehiclePrice: row.lease_vehicle_price,
              }
            : null,
        isCoupe: row.is_coupe === 1,
        viewCount: row.view_count,
        registrationDate: row.registration_date,
        daysSinceRegistration: row.days_since_registration,
        firstSeenAt: row.first_seen_at,
        lastUpdatedAt: row.last_updated_at,
        isTrulyNew: row.is_truly_new === 1,
        isClosed: row.is_closed === 1,
        closureDetectedAt: row.closure_detected_at,
        closureReason: CLOSURE_REASONS.find((reason) => reason === row.closure_reason) ?? null,
    };
};

// Everything a re-observation may rewrite. Identity, discovery time and lifecycle flags are excluded.
const observationValues = (listing: Listing): Record<string, SqlValue> => ({
    title: listing.title,
    model: listing.model,
    badge: listing.badge,
    year: listing.year,
    mileage: listing.mileage,
    fuel_type: listing.fuelType,
    url: listing.url,
    listed_price: listing.listedPrice,
    true_cost: listing.trueCost,
    is_lease: Number(listing.isLease),
    lease_verified: Number(listing.leaseVerified),
    lease_deposit: listing.lease?.deposit ?? null,
    lease_monthly_payment: listing.lease?.monthlyPayment ?? null,
    lease_term_months: listing.lease?.termMonths ?? null,
    lease_final_payment: listing.lease?.finalPayment ?? null,
    lease_vehicle_price: listing.lease?.vehiclePrice ?? null,
    is_coupe: Number(listing.isCoupe),
    view_count: listing.viewCount,
    registration_date: listing.registrationDate,
    days_since_registration: listing.daysSinceRegistration,
    last_updated_at: listing.lastUpdatedAt,
});

export class ListingStore {
    private readonly db: Database.Database;

    constructor(db: Database.Database) {
        this.db = db;
        this.migrate();
    }

    static open(path: string): ListingStore {
        const db = new Database(path);
        db.pragma('journal_mode = WAL');
        log.info(`${LOG_PREFIX} Opened listing database`, { path });
        return new ListingStore(db);
    }

    private migrate(): void {
        this.db.exec(CREATE_LISTINGS);
        this.db.exec(CREATE_MONITORING_LOG);

        const existing = new Set(
            this.db
                .prepare<[], { name: string }>('PRAGMA table_info(listings)')
                .all()
                .map((column) => column.name),
        );
        for (const [name, definition] of ADDED_COLUMNS) {
            if (existing.has(name)) continue;
            this.db.exec(`ALTER TABLE listings ADD COLUMN ${name} ${definition}`);
            log.info(`${LOG_PREFIX} Added column ${name}`);
        }

        this.db.exec('CREATE INDEX IF NOT EXISTS idx_listings_first_seen ON listings (first_seen_at)');
        this.db.exec('CREATE INDEX IF NOT EXISTS idx_listings_closed ON listings (is_closed)');
    }

    private write<T>(listingId: string | null, action: string, fn: () => T): T {
        try {
            return fn();
        } catch (error) {
            if (error instanceof PersistenceError) throw error;
            throw new PersistenceError('writeFailed', `Could not ${action}: ${toError(error).message}`, listingId, error);
        }
    }

    count(): number {
        return this.db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM listings').get()?.count ?? 0;
    }

    isEmpty(): boolean {
        return this.count() === 0;
    }

    get(id: string): Listing | null {
        const row = this.db.prepare<[string], ListingRow>('SELECT * FROM listings WHERE id = ?').get(id);
        return row ? fromRow(row) : null;
    }

    insert(listing: Listing): void {
        const values: Record<string, SqlValue> = {
            id: listing.id,
            ...observationValues(listing),
            first_seen_at: listing.firstSeenAt,
            is_truly_new: Number(listing.isTrulyNew),
            is_closed: Number(listing.isClosed),
            closure_detected_at: listing.closureDetectedAt,
            closure_reason: listing.closureReason,
        };
        const columns = Object.keys(values);
        this.write(listing.id, `insert listing ${listing.id}`, () =>
            this.db
                .prepare(
                    `INSERT INTO listings (${columns.join(', ')}) VALUES (${columns.map((c) => `@${c}`).join(', ')})`,
                )
                .run(values),
        );
    }

    /** Rewrites the observed attributes of an existing listing. firstSeenAt and lifecycle flags are untouched. */
    update(listing: Listing): void {
        const values = observationValues(listing);
        const assignments = Object.keys(values).map((c) => `${c} = @${c}`);
        const { changes } = this.write(listing.id, `update listing ${listing.id}`, () =>
            this.db
                .prepare(`UPDATE listings SET ${assignments.join(', ')} WHERE id = @id`)
                .run({ ...values, id: listing.id }),
        );
        if (changes === 0) {
            throw new PersistenceError('notFound', `Listing ${listing.id} does not exist`, listing.id);
        }
    }

    /**
     * Moves a listing to the closed state. Returns false when it was closed already;
     * a closed listing is never reopened.
     */
    markClosed(id: string, reason: ClosureReason, detectedAt: string): boolean {
        const { changes } = this.write(id, `close listing ${id}`, () =>
            this.db
                .prepare(
                    `UPDATE listings
                     SET is_closed = 1, closure_detected_at = ?, closure_reason = ?, closure_checked_at = ?
                     WHERE id = ? AND COALESCE(is_closed, 0) = 0`,
                )
                .run(detectedAt, reason, detectedAt, id),
        );
        if (changes > 0) return true;
        if (!this.get(id)) throw new PersistenceError('notFound', `Listing ${id} does not exist`, id);
        return false;
    }

    markChecked(id: string, checkedAt: string): void {
        this.write(id, `record closure check for ${id}`, () =>
            this.db.prepare('UPDATE listings SET closure_checked_at = ? WHERE id = ?').run(checkedAt, id),
        );
    }

    /** Active listings first seen at or before the cutoff, least recently checked first. */
    activeListings(firstSeenBefore: string, limit: number): Listing[] {
        return this.db
            .prepare<[string, number], ListingRow>(
                `SELECT * FROM listings
                 WHERE COALESCE(is_closed, 0) = 0 AND first_seen_at <= ?
                 ORDER BY closure_checked_at IS NOT NULL, closure_checked_at, first_seen_at
                 LIMIT ?`,
            )
            .all(firstSeenBefore, limit)
            .map(fromRow);
    }

    /**
     * Returns open truly-new listings first seen since `since` and clears their flag,
     * so each one is handed to notification once. Flags the hand-off can never reach
     * (older than the window, or held back by the coupe gate) are cleared as well.
     */
    consumeTrulyNew(since: string, coupeOnly: boolean): Listing[] {
        const rows = this.db
            .prepare<[string, number], ListingRow>(
                `SELECT * FROM listings
                 WHERE is_truly_new = 1 AND COALESCE(is_closed, 0) = 0 AND first_seen_at >= ?
                   AND (? = 0 OR is_coupe = 1)
                 ORDER BY first_seen_at`,
            )
            .all(since, Number(coupeOnly));

        const consumed = rows.map((row) => {
            this.write(row.id, `clear truly-new flag of ${row.id}`, () =>
                this.db.prepare('UPDATE listings SET is_truly_new = 0 WHERE id = ?').run(row.id),
            );
            return { ...fromRow(row), isTrulyNew: false };
        });

        this.write(null, 'clear unreachable truly-new flags', () =>
            this.db
                .prepare(
                    `UPDATE listings SET is_truly_new = 0
                     WHERE is_truly_new = 1 AND (first_seen_at < ? OR (? = 1 AND COALESCE(is_coupe, 0) = 0))`,
                )
                .run(since, Number(coupeOnly)),
        );

        return consumed;
    }

    deleteNotUpdatedSince(cutoff: string): number {
        return this.write(null, 'delete stale listings', () =>
            this.db.prepare('DELETE FROM listings WHERE last_updated_at < ?').run(cutoff),
        ).changes;
    }

    logCycle(summary: CycleSummary): void {
        const { counters } = summary;
        this.write(null, `record ${summary.type} cycle`, () =>
            this.db
                .prepare(
                    `INSERT INTO monitoring_log
                     (cycle_type, status, started_at, finished_at, scanned, new_count, updated_count,
                      closed_count, error_count, notified_count, failure)
                     VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
                )
                .run(
                    summary.type,
                    summary.status,
                    summary.startedAt,
                    summary.finishedAt,
                    counters.scanned,
                    counters.new,
                    counters.updated,
                    counters.closed,
                    counters.errors,
                    counters.notified,
                    summary.failure,
                ),
        );
    }

    recentCycles(limit: number): MonitoringLogEntry[] {
        return this.db
            .prepare<[number], MonitoringLogEntry>(
                `SELECT cycle_type AS cycleType, status, started_at AS startedAt, finished_at AS finishedAt,
                        scanned, new_count AS newCount, closed_count AS closedCount, error_count AS errorCount, failure
                 FROM monitoring_log ORDER BY id DESC LIMIT ?`,
            )
            .all(limit);
    }

    countFirstSeenSince(since: string): number {
        return (
            this.db
                .prepare<[string], { count: number }>('SELECT COUNT(*) AS count FROM listings WHERE first_seen_at >= ?')
                .get(since)?.count ?? 0
        );
    }

    /** Scan cycles started since `since`, daily summaries excluded. */
    cycleActivity(since: string): Pick<DailyReport, 'cycles' | 'failedCycles' | 'averageCycleSeconds'> {
        const rows = this.db
            .prepare<[string], { status: string; startedAt: string; finishedAt: string | null }>(
                `SELECT status, started_at AS startedAt, finished_at AS finishedAt FROM monitoring_log
                 WHERE started_at >= ? AND cycle_type != 'daily'`,
            )
            .all(since);

        const durations = rows.flatMap(({ startedAt, finishedAt }) =>
            finishedAt ? [(Date.parse(finishedAt) - Date.parse(startedAt)) / 1000] : [],
        );
        return {
            cycles: rows.length,
            failedCycles: rows.filter(({ status }) => status === 'failed').length,
            averageCycleSeconds:
                durations.length > 0
                    ? Math.round(durations.reduce((sum, seconds) => sum + seconds, 0) / durations.length)
                    : null,
        };
    }

    pruneCycleLog(cutoff: string): number {
        return this.write(null, 'prune monitoring log', () =>
            this.db.prepare('DELETE FROM monitoring_log WHERE started_at < ?').run(cutoff),
        ).changes;
    }

    statistics(): StoreStatistics {
        const totals = this.db
            .prepare<[], { total: number; closed: number | null; pending: number | null; leases: number | null }>(
                `SELECT COUNT(*) AS total,
                        SUM(CASE WHEN is_closed = 1 THEN 1 ELSE 0 END) AS closed,
                        SUM(CASE WHEN is_truly_new = 1 AND COALESCE(is_closed, 0) = 0 THEN 1 ELSE 0 END) AS pending,
                        SUM(CASE WHEN is_lease = 1 THEN 1 ELSE 0 END) AS leases
                 FROM listings`,
            )
            .get();
        const reasons = this.db
            .prepare<[], { reason: string | null; count: number }>(
                `SELECT closure_reason AS reason, COUNT(*) AS count FROM listings
                 WHERE is_closed = 1 GROUP BY closure_reason`,
            )
            .all();

        const closureReasons: Partial<Record<ClosureReason, number>> = {};
        for (const { reason, count } of reasons) {
            const known = CLOSURE_REASONS.find((candidate) => candidate === reason);
            if (known) closureReasons[known] = count;
        }

        const total = totals?.total ?? 0;
        const closed = totals?.closed ?? 0;
        return {
            total,
            active: total - closed,
            closed,
            pendingTrulyNew: totals?.pending ?? 0,
            leases: totals?.leases ?? 0,
            closureReasons,
        };
    }

    close(): void {
        this.db.close();
    }
}
