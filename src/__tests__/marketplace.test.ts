import { log } from 'apify';
import { beforeEach, describe, expect, it, vi } from 'vitest';

import { AcquisitionError } from '../errors.js';
import type { FetchedText } from '../scrapers/browser.js';
import {
    AcquisitionClient,
    type AcquisitionOptions,
    buildListUrl,
    buildSearchQuery,
    buildSessionHeaders,
    type HttpGet,
    parseListResponse,
} from '../scrapers/marketplace.js';
import { FakeBrowser, rawItem } from './fixtures.js';

const OPTIONS: AcquisitionOptions = { sessionTtlMs: 60_000, maxAttempts: 3, retryDelayMs: 0, requestTimeoutMs: 1000 };

const PAGE_BODY = JSON.stringify({ Count: 41, SearchResults: [rawItem()] });

const CHALLENGE_BODY = '<html><body>Please verify you are human</body></html>';

/** Answers list requests from a queue; the last response repeats once the queue is drained. */
const scriptedHttp = (...responses: FetchedText[]) => {
    const calls: Record<string, string>[] = [];
    const http: HttpGet = async (_url, headers) => {
        calls.push(headers);
        const next = responses.length > 1 ? responses.shift() : responses[0];
        if (!next) throw new Error('no response scripted');
        return next;
    };
    return { http, calls };
};

describe('buildSearchQuery', () => {
    const product = { manufacturer: '벤츠', modelGroup: 'GLE-클래스' };

    it('should build the bare product filter without constraints', () => {
        expect(buildSearchQuery(product)).toBe(
            '(And.Hidden.N._.(C.CarType.N._.(C.Manufacturer.벤츠._.ModelGroup.GLE-클래스.)))',
        );
    });

    it('should append year and price ranges', () => {
        expect(buildSearchQuery(product, { yearMin: 2021, priceMax: 9000 })).toBe(
            '(And.Hidden.N._.(C.CarType.N._.(C.Manufacturer.벤츠._.ModelGroup.GLE-클래스.))'
                + '_.Year.range(202100..)._.Price.range(..9000).)',
        );
    });

    it('should append a mileage ceiling', () => {
        expect(buildSearchQuery(product, { mileageMax: 50_000 })).toBe(
            '(And.Hidden.N._.(C.CarType.N._.(C.Manufacturer.벤츠._.ModelGroup.GLE-클래스.))_.Mileage.range(..50000).)',
        );
    });

    it('should refuse an empty product identity', () => {
        expect(() => buildSearchQuery({ manufacturer: ' ', modelGroup: 'GLE-클래스' })).toThrow(
            'Search query needs both a manufacturer and a model group',
        );
    });
});

describe('buildListUrl', () => {
    it('should encode the query and the paging window', () => {
        expect(buildListUrl('q', 20, 20)).toBe(
            'https://api.encar.com/search/car/list/general?count=true&q=q&sr=%7CModifiedDate%7C20%7C20',
        );
    });
});

describe('buildSessionHeaders', () => {
    it('should send the harvested user agent and cookies', () => {
        const headers = buildSessionHeaders({ cookies: { a: 'b', c: 'd' }, userAgent: 'test-agent' });

        expect(headers['User-Agent']).toBe('test-agent');
        expect(headers.Cookie).toBe('a=b; c=d');
        expect(headers.Referer).toBe('https://www.encar.com/');
    });

    it('should omit the cookie header when none were harvested', () => {
        expect(buildSessionHeaders({ cookies: {}, userAgent: 'test-agent' })).not.toHaveProperty('Cookie');
    });
});

describe('parseListResponse', () => {
    it('should return items and the total count', () => {
        const page = parseListResponse(JSON.stringify({ Count: 1, SearchResults: [{ Id: 1, Price: 8900 }] }));

        expect(page).toEqual({ items: [{ Id: 1, Price: 8900 }], totalCount: 1 });
    });

    it('should reject a challenge page served with 200', () => {
        expect(() => parseListResponse(CHALLENGE_BODY)).toThrowError(expect.objectContaining({ kind: 'rejected' }));
    });

    it('should reject JSON of the wrong shape', () => {
        expect(() => parseListResponse('{"message":"blocked"}')).toThrow(AcquisitionError);
    });
});

describe('AcquisitionClient', () => {
    beforeEach(() => {
        vi.restoreAllMocks();
        vi.spyOn(log, 'info').mockReturnValue(undefined);
        vi.spyOn(log, 'warning').mockReturnValue(undefined);
    });

    it('should harvest one session and reuse it across pages', async () => {
        const browser = new FakeBrowser();
        const { http, calls } = scriptedHttp({ statusCode: 200, body: PAGE_BODY });
        const client = new AcquisitionClient(browser, OPTIONS, http);

        const first = await client.fetchPage('q', 0, 20);
        await client.fetchPage('q', 20, 20);

        expect(first.totalCount).toBe(41);
        expect(first.items).toHaveLength(1);
        expect(browser.harvests).toBe(1);
        expect(calls.map((headers) => headers.Cookie)).toEqual(['sid=s1', 'sid=s1']);
    });

    it('should fall back to the browser on 407 without rebuilding the session', async () => {
        const browser = new FakeBrowser({ fetchText: () => ({ statusCode: 200, body: PAGE_BODY }) });
        const { http, calls } = scriptedHttp({ statusCode: 407, body: '' });
        const client = new AcquisitionClient(browser, OPTIONS, http);

        const page = await client.fetchPage('q', 0, 20);

        expect(page.totalCount).toBe(41);
        expect(calls).toHaveLength(1);
        expect(browser.harvests).toBe(1);
    });

    it('should rebuild the session after a 403 and retry', async () => {
        const browser = new FakeBrowser();
        const { http, calls } = scriptedHttp({ statusCode: 403, body: '' }, { statusCode: 200, body: PAGE_BODY });
        const client = new AcquisitionClient(browser, OPTIONS, http);

        await client.fetchPage('q', 0, 20);

        expect(browser.harvests).toBe(2);
        expect(calls.map((headers) => headers.Cookie)).toEqual(['sid=s1', 'sid=s2']);
    });

    it('should rebuild the session when the browser fallback fails too', async () => {
        const browser = new FakeBrowser({ fetchText: () => ({ statusCode: 403, body: '' }) });
        const { http } = scriptedHttp({ statusCode: 407, body: '' }, { statusCode: 200, body: PAGE_BODY });
        const client = new AcquisitionClient(browser, OPTIONS, http);

        await client.fetchPage('q', 0, 20);

        expect(browser.harvests).toBe(2);
    });

    it('should give up with exhausted after the attempt budget', async () => {
        const browser = new FakeBrowser();
        const { http, calls } = scriptedHttp({ statusCode: 500, body: '' });
        const client = new AcquisitionClient(browser, OPTIONS, http);

        await expect(client.fetchPage('q', 40, 20)).rejects.toMatchObject({
            name: 'AcquisitionError',
            kind: 'exhausted',
            statusCode: 500,
        });
        expect(calls).toHaveLength(3);
        expect(browser.harvests).toBe(1);
    });

    it('should treat a 200 challenge page as a rejection on every attempt', async () => {
        const browser = new FakeBrowser();
        const { http } = scriptedHttp({ statusCode: 200, body: CHALLENGE_BODY });
        const client = new AcquisitionClient(browser, OPTIONS, http);

        await expect(client.fetchPage('q', 0, 20)).rejects.toMatchObject({ kind: 'exhausted' });
        expect(browser.harvests).toBe(3);
    });

    it('should wrap thrown transport errors as network failures', async () => {
        const browser = new FakeBrowser();
        const http: HttpGet = async () => {
            throw new Error('socket hang up');
        };
        const client = new AcquisitionClient(browser, OPTIONS, http);

        const failure = await client.fetchPage('q', 0, 20).catch((error: unknown) => error);

        expect(failure).toBeInstanceOf(AcquisitionError);
        expect(failure).toMatchObject({ kind: 'exhausted', statusCode: null });
        expect(failure).toHaveProperty('cause.kind', 'network');
    });

    it('should rebuild the session once its lifetime has passed', async () => {
        let now = 0;
        const browser = new FakeBrowser();
        const { http, calls } = scriptedHttp({ statusCode: 200, body: PAGE_BODY });
        const client = new AcquisitionClient(browser, { ...OPTIONS, sessionTtlMs: 1000 }, http, () => now);

        await client.fetchPage('q', 0, 20);
        now = 500;
        await client.fetchPage('q', 20, 20);
        now = 1000;
        await client.fetchPage('q', 40, 20);

        expect(browser.harvests).toBe(2);
        expect(calls.map((headers) => headers.Cookie)).toEqual(['sid=s1', 'sid=s1', 'sid=s2']);
    });

    it('should share one session build between concurrent requests', async () => {
        const browser = new FakeBrowser();
        const { http } = scriptedHttp({ statusCode: 200, body: PAGE_BODY });
        const client = new AcquisitionClient(browser, OPTIONS, http);

        await Promise.all([client.fetchPage('q', 0, 20), client.fetchPage('q', 20, 20)]);

        expect(browser.harvests).toBe(1);
    });
});
