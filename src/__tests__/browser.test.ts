import { log } from 'apify';
import { beforeEach, describe, expect, it, vi } from 'vitest';

import { type BrowserLauncher, type LaunchedBrowser, PlaywrightDriver } from '../scrapers/browser.js';

const OPTIONS = { headless: true, navigationTimeoutMs: 1000, settleMs: 0, executablePath: null };

/** Hands out browsers that refuse to open pages, keeping their disconnect listeners. */
class FakeChromium implements BrowserLauncher {
    launches = 0;

    closed = 0;

    disconnectListeners: Array<() => void> = [];

    async launch(): Promise<LaunchedBrowser> {
        this.launches++;
        return {
            newContext: async () => {
                throw new Error('no pages in tests');
            },
            close: async () => {
                this.closed++;
            },
            once: (_event: 'disconnected', listener: () => void) => {
                this.disconnectListeners.push(listener);
            },
        };
    }

    disconnect(index: number): void {
        this.disconnectListeners[index]();
    }
}

describe('PlaywrightDriver', () => {
    beforeEach(() => {
        vi.restoreAllMocks();
        vi.spyOn(log, 'warning').mockReturnValue(undefined);
    });

    it('should share one browser between operations', async () => {
        const chromium = new FakeChromium();
        const driver = new PlaywrightDriver(OPTIONS, chromium);

        await expect(driver.visit('https://example.test/1')).rejects.toThrow('no pages in tests');
        await expect(driver.visit('https://example.test/2')).rejects.toThrow('no pages in tests');

        expect(chromium.launches).toBe(1);
    });

    it('should launch a new browser after the previous one disconnected', async () => {
        const chromium = new FakeChromium();
        const driver = new PlaywrightDriver(OPTIONS, chromium);
        await expect(driver.visit('https://example.test/1')).rejects.toThrow();

        chromium.disconnect(0);
        await expect(driver.visit('https://example.test/2')).rejects.toThrow();

        expect(chromium.launches).toBe(2);
        expect(log.warning).toHaveBeenCalledOnce();
    });

    it('should not warn about the disconnect caused by close', async () => {
        const chromium = new FakeChromium();
        const driver = new PlaywrightDriver(OPTIONS, chromium);
        await expect(driver.visit('https://example.test/1')).rejects.toThrow();

        await driver.close();
        chromium.disconnect(0);

        expect(chromium.closed).toBe(1);
        expect(log.warning).not.toHaveBeenCalled();
    });
});
