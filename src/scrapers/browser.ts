import { setTimeout } from 'node:timers/promises';

import { log } from 'apify';
import { type BrowserContext, type BrowserContextOptions, chromium, type LaunchOptions } from 'playwright-core';

import { DETAIL_EXPANDERS } from '../constants.js';
import { toError } from '../errors.js';

const LOG_PREFIX = '[browser]';
const EXPANDER_TIMEOUT_MS = 3000;

export interface HarvestedSession {
    cookies: Record<string, string>;
    userAgent: string;
}

export interface FetchedText {
    statusCode: number;
    body: string;
}

/** What a rendered navigation left behind. `status` is null when no response arrived at all. */
export interface PageSnapshot {
    status: number | null;
    url: string;
    title: string;
    html: string;
}

export interface VisitOptions {
    /** Click the widgets that reveal view count and registration date before snapshotting. */
    expandDetails?: boolean;
}

export interface BrowserDriver {
    harvestSession(url: string): Promise<HarvestedSession>;
    fetchText(url: string, headers: Record<string, string>): Promise<FetchedText>;
    visit(url: string, options?: VisitOptions): Promise<PageSnapshot>;
    close(): Promise<void>;
}

export interface PlaywrightDriverOptions {
    headless: boolean;
    navigationTimeoutMs: number;
    settleMs: number;
    executablePath: string | null;
}

/** The part of a launched browser the driver uses. */
export interface LaunchedBrowser {
    newContext(options: BrowserContextOptions): Promise<BrowserContext>;
    close(): Promise<void>;
    once(event: 'disconnected', listener: () => void): unknown;
}

export interface BrowserLauncher {
    launch(options: LaunchOptions): Promise<LaunchedBrowser>;
}

// Headers the browser derives itself; forwarding them would contradict its own identity.
const BROWSER_OWNED_HEADERS = new Set(['user-agent', 'cookie']);

/**
 * Chromium via playwright-core. One browser process is launched lazily and shared;
 * every operation gets its own context, closed on every exit path.
 * A browser that crashes or disconnects is replaced on the next operation.
 */
export class PlaywrightDriver implements BrowserDriver {
    private browser: Promise<LaunchedBrowser> | null = null;

    private readonly options: PlaywrightDriverOptions;

    private readonly launcher: BrowserLauncher;

    constructor(options: PlaywrightDriverOptions, launcher: BrowserLauncher = chromium) {
        this.options = options;
        this.launcher = launcher;
    }

    private async launch(): Promise<LaunchedBrowser> {
        if (this.browser) return this.browser;

        const launched: Promise<LaunchedBrowser> = this.launcher
            .launch({
                headless: this.options.headless,
                executablePath: this.options.executablePath ?? undefined,
                args: ['--no-sandbox', '--disable-blink-features=AutomationControlled'],
            })
            .then(
                (browser) => {
                    browser.once('disconnected', () => {
                        if (this.browser !== launched) return;
                        log.warning(`${LOG_PREFIX} Browser disconnected, relaunching on next use`);
                        this.browser = null;
                    });
                    return browser;
                },
                (error: unknown) => {
                    this.browser = null;
                    throw error;
                },
            );
        this.browser = launched;
        return launched;
    }

    private async withContext<T>(fn: (context: BrowserContext) => Promise<T>): Promise<T> {
        const browser = await this.launch();
        const context = await browser.newContext({ locale: 'ko-KR', viewport: { width: 1366, height: 900 } });
        context.setDefaultTimeout(this.options.navigationTimeoutMs);
        context.setDefaultNavigationTimeout(this.options.navigationTimeoutMs);
        try {
            return await fn(context);
        } finally {
            await context.close();
        }
    }

    async harvestSession(url: string): Promise<HarvestedSession> {
        return this.withContext(async (context) => {
            const page = await context.newPage();
            await page.goto(url, { waitUntil: 'domcontentloaded' });
            await setTimeout(this.options.settleMs);

            const userAgent = await page.evaluate<string>('navigator.userAgent');
            const cookies = Object.fromEntries((await context.cookies()).map(({ name, value }) => [name, value]));
            log.info(`${LOG_PREFIX} Harvested session`, { cookies: Object.keys(cookies).length });
            return { cookies, userAgent };
        });
    }

    async fetchText(url: string, headers: Record<string, string>): Promise<FetchedText> {
        return this.withContext(async (context) => {
            await context.setExtraHTTPHeaders(
                Object.fromEntries(
                    Object.entries(headers).filter(([name]) => !BROWSER_OWNED_HEADERS.has(name.toLowerCase())),
                ),
            );
            const page = await context.newPage();
            const response = await page.goto(url, { waitUntil: 'domcontentloaded' });
            if (!response) return { statusCode: 0, body: '' };
            return { statusCode: response.status(), body: await response.text() };
        });
    }

    async visit(url: string, options: VisitOptions = {}): Promise<PageSnapshot> {
        return this.withContext(async (context) => {
            const page = await context.newPage();
            const response = await page.goto(url, { waitUntil: 'domcontentloaded' });
            await setTimeout(this.options.settleMs);

            if (options.expandDetails) {
                for (const selector of DETAIL_EXPANDERS) {
                    try {
                        await page.locator(selector).first().click({ timeout: EXPANDER_TIMEOUT_MS });
                        await setTimeout(500);
                    } catch (error) {
                        log.debug(`${LOG_PREFIX} Could not expand ${selector}`, { url, error: toError(error).message });
                    }
                }
            }

            return {
                status: response ? response.status() : null,
                url: page.url(),
                title: await page.title(),
                html: await page.content(),
            };
        });
    }

    async close(): Promise<void> {
        if (!this.browser) return;
        const browser = await this.browser;
        this.browser = null;
        await browser.close();
    }
}
