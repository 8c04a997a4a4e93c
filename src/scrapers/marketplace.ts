import { setTimeout } from 'node:timers/promises';

import { log } from 'apify';
import { gotScraping } from 'crawlee';
import { z } from 'zod';

import { FETCH_HEADERS, LIST_API, SESSION_URL } from '../constants.js';
import { AcquisitionError, toError } from '../errors.js';
import type { ProductIdentity, SearchConstraints } from '../types.js';
import type { BrowserDriver, FetchedText, HarvestedSession } from './browser.js';

const LOG_PREFIX = '[marketplace]';

const RawListingItemSchema = z
    .object({
        Id: z.union([z.string(), z.number()]),
        Manufacturer: z.string().optional(),
        Model: z.string().optional(),
        Badge: z.string().optional(),
        BadgeDetail: z.string().optional(),
        Year: z.number().optional(),
        Mileage: z.number().optional(),
        Price: z.union([z.number(), z.string()]),
        FuelType: z.string().optional(),
        Transmission: z.string().optional(),
        ModifiedDate: z.string().optional(),
        // Only present on some responses; page rendering fills them in otherwise.
        ViewCount: z.number().optional(),
        FirstRegistrationDate: z.string().optional(),
    })
    .passthrough();

const ListResponseSchema = z.object({
    Count: z.number().int().nonnegative(),
    SearchResults: z.array(RawListingItemSchema),
});

export type RawListingItem = z.infer<typeof RawListingItemSchema>;

export interface ListingPage {
    items: RawListingItem[];
    totalCount: number;
}

/** Anything that can return one page of the product query. */
export interface ListingSource {
    fetchPage(query: string, offset: number, limit: number): Promise<ListingPage>;
}

export interface AcquisitionSession {
    headers: Record<string, string>;
    expiresAt: number;
}

export type HttpGet = (url: string, headers: Record<string, string>, timeoutMs: number) => Promise<FetchedText>;

export const gotGet: HttpGet = async (url, headers, timeoutMs) => {
    const { statusCode, body } = await gotScraping({
        url,
        headers,
        responseType: 'text',
        throwHttpErrors: false,
        useHeaderGenerator: false,
        timeout: { request: timeoutMs },
    });
    return { statusCode, body };
};

export interface AcquisitionOptions {
    sessionTtlMs: number;
    maxAttempts: number;
    retryDelayMs: number;
    requestTimeoutMs: number;
}

/**
 * Builds the list endpoint's filter expression. Without constraints it is the bare
 * manufacturer/model filter; the product identity is never optional.
 */
export const buildSearchQuery = (product: ProductIdentity, constraints: Partial<SearchConstraints> = {}): string => {
    const manufacturer = product.manufacturer.trim();
    const modelGroup = product.modelGroup.trim();
    if (!manufacturer || !modelGroup) {
        throw new Error('Search query needs both a manufacturer and a model group');
    }

    const base = `(And.Hidden.N._.(C.CarType.N._.(C.Manufacturer.${manufacturer}._.ModelGroup.${modelGroup}.))`;
    const range = (min: string | number | null | undefined, max: string | number | null | undefined): string =>
        `${min ?? ''}..${max ?? ''}`;

    const parts: string[] = [];
    const { yearMin, yearMax, priceMin, priceMax, mileageMax } = constraints;
    if (yearMin != null || yearMax != null) {
        // Year filters take YYYYMM bounds.
        const from = yearMin != null ? `${yearMin}00` : null;
        const to = yearMax != null ? `${yearMax}99` : null;
        parts.push(`Year.range(${range(from, to)})`);
    }
    if (priceMin != null || priceMax != null) parts.push(`Price.range(${range(priceMin, priceMax)})`);
    if (mileageMax != null) parts.push(`Mileage.range(..${mileageMax})`);

    return parts.length === 0 ? `${base})` : `${base}_.${parts.join('._.')}.)`;
};

export const buildListUrl = (query: string, offset: number, limit: number): string => {
    const params = new URLSearchParams({ count: 'true', q: query, sr: `|ModifiedDate|${offset}|${limit}` });
    return `${LIST_API}?${params.toString()}`;
};

export const buildSessionHeaders = ({ cookies, userAgent }: HarvestedSession): Record<string, string> => {
    const headers: Record<string, string> = { ...FETCH_HEADERS, 'User-Agent': userAgent };
    const cookie = Object.entries(cookies)
        .map(([name, value]) => `${name}=${value}`)
        .join('; ');
    if (cookie) headers.Cookie = cookie;
    return headers;
};

/** A 200 carrying a challenge page instead of JSON is a rejection, not data. */
export const parseListResponse = (body: string): ListingPage => {
    let json: unknown;
    try {
        json = JSON.parse(body);
    } catch (error) {
        throw new AcquisitionError('rejected', 'List response is not JSON', { cause: error });
    }
    const result = ListResponseSchema.safeParse(json);
    if (!result.success) {
        throw new AcquisitionError('rejected', `Unexpected list response shape: ${result.error.issues[0]?.message}`);
    }
    return { items: result.data.SearchResults, totalCount: result.data.Count };
};

const isSuccess = (statusCode: number): boolean => statusCode >= 200 && statusCode < 300;

/**
 * List-endpoint client. Owns exactly one session, harvested from a rendered page and rebuilt
 * after expiry or rejection. Failed requests walk the escalation chain: direct request,
 * browser fallback on 407, session rebuild on 401/403, until the attempt budget runs out.
 */
export class AcquisitionClient implements ListingSource {
    private session: AcquisitionSession | null = null;

    private pendingSession: Promise<AcquisitionSession> | null = null;

    private readonly browser: BrowserDriver;

    private readonly options: AcquisitionOptions;

    private readonly http: HttpGet;

    private readonly clock: () => number;

    constructor(
        browser: BrowserDriver,
        options: AcquisitionOptions,
        http: HttpGet = gotGet,
        clock: () => number = Date.now,
    ) {
        this.browser = browser;
        this.options = options;
        this.http = http;
        this.clock = clock;
    }

    async fetchPage(query: string, offset: number, limit: number): Promise<ListingPage> {
        const url = buildListUrl(query, offset, limit);
        let lastFailure: AcquisitionError | null = null;

        for (let attempt = 1; attempt <= this.options.maxAttempts; attempt++) {
            if (attempt > 1 && this.options.retryDelayMs > 0) await setTimeout(this.options.retryDelayMs);
            try {
                const page = await this.attempt(url);
                log.debug(`${LOG_PREFIX} Fetched page`, { offset, items: page.items.length, total: page.totalCount });
                return page;
            } catch (error) {
                lastFailure =
                    error instanceof AcquisitionError
                        ? error
                        : new AcquisitionError('network', toError(error).message, { cause: error });
                log.warning(`${LOG_PREFIX} Attempt ${attempt}/${this.options.maxAttempts} failed`, {
                    offset,
                    kind: lastFailure.kind,
                    statusCode: lastFailure.statusCode,
                    error: lastFailure.message,
                });
                if (lastFailure.kind === 'rejected') this.invalidateSession();
            }
        }

        throw new AcquisitionError(
            'exhausted',
            `List request at offset ${offset} failed after ${this.options.maxAttempts} attempts`,
            { statusCode: lastFailure?.statusCode ?? null, cause: lastFailure },
        );
    }

    private async attempt(url: string): Promise<ListingPage> {
        const session = await this.ensureSession();
        const response = await this.http(url, session.headers, this.options.requestTimeoutMs);
        if (isSuccess(response.statusCode)) return parseListResponse(response.body);

        if (response.statusCode === 407) {
            log.warning(`${LOG_PREFIX} Proxy rejected direct request, retrying through the browser`);
            return this.fetchThroughBrowser(url, session);
        }
        if (response.statusCode === 401 || response.statusCode === 403) {
            throw new AcquisitionError('rejected', `List request refused with ${response.statusCode}`, {
                statusCode: response.statusCode,
            });
        }
        throw new AcquisitionError('network', `List request failed with ${response.statusCode}`, {
            statusCode: response.statusCode,
        });
    }

    private async fetchThroughBrowser(url: string, session: AcquisitionSession): Promise<ListingPage> {
        let fallback: FetchedText;
        try {
            fallback = await this.browser.fetchText(url, session.headers);
        } catch (error) {
            throw new AcquisitionError('rejected', `Browser fallback failed: ${toError(error).message}`, {
                statusCode: 407,
                cause: error,
            });
        }
        if (!isSuccess(fallback.statusCode)) {
            throw new AcquisitionError('rejected', `Browser fallback failed with ${fallback.statusCode}`, {
                statusCode: fallback.statusCode,
            });
        }
        return parseListResponse(fallback.body);
    }

    private async ensureSession(): Promise<AcquisitionSession> {
        if (this.session && this.session.expiresAt > this.clock()) return this.session;
        // Concurrent callers share one rebuild.
        const pending = (this.pendingSession ??= this.buildSession().finally(() => {
            this.pendingSession = null;
        }));
        return pending;
    }

    private async buildSession(): Promise<AcquisitionSession> {
        log.info(`${LOG_PREFIX} Building session from ${SESSION_URL}`);
        const harvested = await this.browser.harvestSession(SESSION_URL);
        const session = { headers: buildSessionHeaders(harvested), expiresAt: this.clock() + this.options.sessionTtlMs };
        this.session = session;
        return session;
    }

    private invalidateSession(): void {
        if (!this.session) return;
        log.info(`${LOG_PREFIX} Discarding session after rejection`);
        this.session = null;
    }
}
