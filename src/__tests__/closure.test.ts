import { log } from 'apify';
import { beforeEach, describe, expect, it, vi } from 'vitest';

import type { PageSnapshot } from '../scrapers/browser.js';
import { ClosureScanner, detectClosure, isInconclusiveStatus } from '../scrapers/closure.js';
import { FakeBrowser, listing, memoryStore } from './fixtures.js';

const NOW = new Date('2024-06-10T12:00:00.000Z');
const PAGE_URL = 'https://fem.encar.com/cars/detail/38000001';

const LIVE_PAGE = `<html><body>
<div class="car-info"><h1>GLE 450 4MATIC 쿠페</h1><ul><li>조회수 120</li></ul></div>
</body></html>`;

const snapshot = (overrides: Partial<PageSnapshot> = {}): PageSnapshot => ({
    status: 200,
    url: PAGE_URL,
    title: 'GLE 450 4MATIC 쿠페 | 엔카',
    html: LIVE_PAGE,
    ...overrides,
});

describe('detectClosure', () => {
    it('should read a live page as open', () => {
        expect(detectClosure(snapshot())).toBeNull();
    });

    it('should close on a missing response', () => {
        expect(detectClosure(snapshot({ status: null }))).toBe('no-response');
    });

    it('should close on 404 and 410', () => {
        expect(detectClosure(snapshot({ status: 404 }))).toBe('http-404');
        expect(detectClosure(snapshot({ status: 410 }))).toBe('http-404');
    });

    it('should close on the no-data region', () => {
        const html = '<html><body><div class="DetailNone_wrap">이 차량은 판매되었거나 삭제된 차량입니다</div></body></html>';

        expect(detectClosure(snapshot({ html }))).toBe('no-data-region');
    });

    it('should close on an error title', () => {
        expect(detectClosure(snapshot({ title: '페이지를 찾을 수 없습니다' }))).toBe('error-page');
    });

    it('should close on a withdrawn message anywhere in the body', () => {
        const html = '<html><body><section><p>차량정보가 존재하지 않습니다</p></section></body></html>';

        expect(detectClosure(snapshot({ html }))).toBe('confirmed-message');
    });

    it('should close on an error element with text', () => {
        const html = '<html><body><div class="error-box">서비스 이용에 불편을 드려 죄송합니다</div></body></html>';

        expect(detectClosure(snapshot({ html }))).toBe('error-element');
    });

    it('should ignore empty error elements', () => {
        const html = '<html><body><div class="error-box"></div><p>GLE 450</p></body></html>';

        expect(detectClosure(snapshot({ html }))).toBeNull();
    });

    it('should only read the first element each error selector matches', () => {
        const html = `<html><body><div class="error-box"></div>
<form><p class="input-error">휴대폰 번호를 정확히 입력해 주세요</p></form></body></html>`;

        expect(detectClosure(snapshot({ html }))).toBeNull();
    });

    it('should close on a redirect to an error url', () => {
        expect(detectClosure(snapshot({ url: 'https://fem.encar.com/error?code=1' }))).toBe('redirect-error');
    });
});

describe('isInconclusiveStatus', () => {
    it('should treat blocked and failing pages as inconclusive', () => {
        expect(isInconclusiveStatus(403)).toBe(true);
        expect(isInconclusiveStatus(503)).toBe(true);
    });

    it('should treat success, not found and no response as conclusive', () => {
        expect(isInconclusiveStatus(200)).toBe(false);
        expect(isInconclusiveStatus(404)).toBe(false);
        expect(isInconclusiveStatus(null)).toBe(false);
    });
});

describe('ClosureScanner', () => {
    beforeEach(() => {
        vi.restoreAllMocks();
        vi.spyOn(log, 'info').mockReturnValue(undefined);
        vi.spyOn(log, 'warning').mockReturnValue(undefined);
    });

    const options = { minAgeDays: 7, limit: 50, delayMs: 0 };

    it('should close a listing whose page is gone and never check it again', async () => {
        const store = memoryStore();
        store.insert(listing({ firstSeenAt: '2024-05-01T00:00:00.000Z' }));
        const browser = new FakeBrowser({ visit: () => snapshot({ status: 404 }) });
        const scanner = new ClosureScanner(browser, store, () => NOW);

        const first = await scanner.scan(options);
        const second = await scanner.scan(options);

        expect(first).toEqual({ scanned: 1, closed: 1, active: 0, errors: 0, reasons: { 'http-404': 1 } });
        expect(second.scanned).toBe(0);
        expect(store.get('38000001')).toMatchObject({
            isClosed: true,
            closureReason: 'http-404',
            closureDetectedAt: NOW.toISOString(),
        });
        expect(browser.visits).toEqual([PAGE_URL]);
    });

    it('should leave live listings active', async () => {
        const store = memoryStore();
        store.insert(listing({ firstSeenAt: '2024-05-01T00:00:00.000Z' }));
        const scanner = new ClosureScanner(new FakeBrowser({ visit: () => snapshot() }), store, () => NOW);

        const result = await scanner.scan(options);

        expect(result).toEqual({ scanned: 1, closed: 0, active: 1, errors: 0, reasons: {} });
        expect(store.get('38000001')?.isClosed).toBe(false);
    });

    it('should count navigation failures as errors without closing', async () => {
        const store = memoryStore();
        store.insert(listing({ firstSeenAt: '2024-05-01T00:00:00.000Z' }));
        const browser = new FakeBrowser({
            visit: () => {
                throw new Error('net::ERR_TIMED_OUT');
            },
        });
        const scanner = new ClosureScanner(browser, store, () => NOW);

        const result = await scanner.scan(options);

        expect(result.errors).toBe(1);
        expect(result.closed).toBe(0);
        expect(store.get('38000001')?.isClosed).toBe(false);
    });

    it('should not close a listing on a blocked page', async () => {
        const store = memoryStore();
        store.insert(listing({ firstSeenAt: '2024-05-01T00:00:00.000Z' }));
        const scanner = new ClosureScanner(
            new FakeBrowser({ visit: () => snapshot({ status: 403, title: 'Error' }) }),
            store,
            () => NOW,
        );

        const result = await scanner.scan(options);

        expect(result.errors).toBe(1);
        expect(store.get('38000001')?.isClosed).toBe(false);
    });

    it('should only consider listings older than the minimum age', async () => {
        const store = memoryStore();
        store.insert(listing({ id: 'young', firstSeenAt: '2024-06-08T00:00:00.000Z' }));
        const browser = new FakeBrowser({ visit: () => snapshot({ status: 404 }) });
        const scanner = new ClosureScanner(browser, store, () => NOW);

        const result = await scanner.scan(options);

        expect(result.scanned).toBe(0);
        expect(browser.visits).toEqual([]);
    });

    it('should stop between listings when asked to', async () => {
        const store = memoryStore();
        store.insert(listing({ firstSeenAt: '2024-05-01T00:00:00.000Z' }));
        const browser = new FakeBrowser({ visit: () => snapshot() });
        const scanner = new ClosureScanner(browser, store, () => NOW);

        const result = await scanner.scan({ ...options, shouldStop: () => true });

        expect(result.scanned).toBe(0);
        expect(browser.visits).toEqual([]);
    });
});
