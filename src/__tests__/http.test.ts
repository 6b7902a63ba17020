import { afterEach, describe, it, expect, vi } from 'vitest';
import {
    extractChromeMajorVersion,
    isMobileUserAgent,
    detectSecChUaPlatform,
    buildBrowserHeaders,
    buildPageFetcher,
    BrowserPageFetcher,
    HttpPageFetcher,
} from '../http';
import { FetchError } from '../errors';
import { Logger } from '../logger';
import type { MonitorConfig, StoreCookie } from '../types';

const silentLogger = new Logger('test', 'error', []);

const cookie: StoreCookie = { name: 'storeSelected', value: '029', domain: '.shop.test' };

function fakeBrowser(opts: { status?: number; html?: string; gotoError?: Error; noResponse?: boolean } = {}) {
    const page = {
        setUserAgent: vi.fn(async (_userAgent: string) => {}),
        setExtraHTTPHeaders: vi.fn(async (_headers: Record<string, string>) => {}),
        evaluateOnNewDocument: vi.fn(async () => ({})),
        setCookie: vi.fn(async () => {}),
        goto: vi.fn(async () => {
            if (opts.gotoError) throw opts.gotoError;
            if (opts.noResponse) return null;
            return { status: () => opts.status ?? 200 };
        }),
        content: vi.fn(async () => opts.html ?? ''),
    };
    const browser = {
        newPage: vi.fn(async () => page),
        close: vi.fn(async () => {}),
    };
    return { page, browser };
}

function browserFetcher(browser: ReturnType<typeof fakeBrowser>['browser']): BrowserPageFetcher {
    return new BrowserPageFetcher({ timeoutMs: 5000, settleMs: 0 }, async () => browser, silentLogger);
}

describe('extractChromeMajorVersion', () => {
    it('should extract Chrome major version', () => {
        expect(extractChromeMajorVersion('Mozilla/5.0 Chrome/131.0.0.0 Safari/537.36')).toBe('131');
        expect(extractChromeMajorVersion('Chrome/120.1.2.3')).toBe('120');
    });

    it('should return null for non-Chrome UA', () => {
        expect(extractChromeMajorVersion('Mozilla/5.0 Firefox/120.0')).toBeNull();
        expect(extractChromeMajorVersion('Safari/537.36')).toBeNull();
    });
});

describe('isMobileUserAgent', () => {
    it('should detect mobile user agents', () => {
        expect(isMobileUserAgent('Mozilla/5.0 (iPhone; CPU iPhone OS 17_0)')).toBe(true);
        expect(isMobileUserAgent('Mozilla/5.0 (Linux; Android 14)')).toBe(true);
        expect(isMobileUserAgent('Mozilla/5.0 Mobile Safari')).toBe(true);
    });

    it('should detect desktop user agents', () => {
        expect(isMobileUserAgent('Mozilla/5.0 (Windows NT 10.0; Win64; x64)')).toBe(false);
        expect(isMobileUserAgent('Mozilla/5.0 (Macintosh; Intel Mac OS X)')).toBe(false);
    });
});

describe('detectSecChUaPlatform', () => {
    it('should detect common platforms', () => {
        expect(detectSecChUaPlatform('Mozilla/5.0 (Windows NT 10.0; Win64; x64)')).toBe('"Windows"');
        expect(detectSecChUaPlatform('Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7)')).toBe('"macOS"');
        expect(detectSecChUaPlatform('Mozilla/5.0 (Linux; Android 14)')).toBe('"Android"');
        expect(detectSecChUaPlatform('Mozilla/5.0 (iPad; CPU OS 17_0)')).toBe('"iOS"');
        expect(detectSecChUaPlatform('Mozilla/5.0 (X11; Linux x86_64)')).toBe('"Linux"');
    });

    it('should return default for unknown', () => {
        expect(detectSecChUaPlatform('Unknown UA')).toBe('"Windows"');
    });
});

describe('buildBrowserHeaders', () => {
    it('should use the built-in desktop Chrome UA by default', () => {
        const headers = buildBrowserHeaders();
        expect(headers.userAgent).toContain('Chrome/131');
        expect(headers.secChUa).toBe('"Google Chrome";v="131", "Chromium";v="131", "Not_A Brand";v="24"');
        expect(headers.secChUaMobile).toBe('?0');
        expect(headers.secChUaPlatform).toBe('"Windows"');
    });

    it('should derive client hints from an override UA', () => {
        const headers = buildBrowserHeaders('Mozilla/5.0 (Linux; Android 14) Chrome/126.0.0.0 Mobile Safari/537.36');
        expect(headers.secChUa).toBe('"Google Chrome";v="126", "Chromium";v="126", "Not_A Brand";v="24"');
        expect(headers.secChUaMobile).toBe('?1');
        expect(headers.secChUaPlatform).toBe('"Android"');
    });
});

describe('BrowserPageFetcher', () => {
    it('should set the store cookie before loading the page and return its content', async () => {
        const { page, browser } = fakeBrowser({ html: "<script>var x = {'inStock':'False'}</script>" });

        const html = await browserFetcher(browser).fetchPage('https://www.shop.test/product/1', cookie);

        expect(html).toBe("<script>var x = {'inStock':'False'}</script>");
        expect(page.setCookie).toHaveBeenCalledWith({
            name: 'storeSelected',
            value: '029',
            domain: '.shop.test',
            path: '/',
            secure: true,
            httpOnly: false,
        });
        expect(page.setCookie.mock.invocationCallOrder[0]).toBeLessThan(page.goto.mock.invocationCallOrder[0]);
        expect(page.goto).toHaveBeenCalledWith('https://www.shop.test/product/1', { waitUntil: 'domcontentloaded', timeout: 5000 });

        const expected = buildBrowserHeaders();
        expect(page.setUserAgent).toHaveBeenCalledWith(expected.userAgent);
        expect(page.setExtraHTTPHeaders).toHaveBeenCalledWith(expect.objectContaining({
            'Accept-Language': 'en-US,en;q=0.9',
            'Referer': 'https://www.shop.test/',
            'Sec-Ch-Ua': expected.secChUa,
            'Sec-Ch-Ua-Mobile': '?0',
            'Sec-Ch-Ua-Platform': expected.secChUaPlatform,
        }));
        expect(page.setExtraHTTPHeaders.mock.invocationCallOrder[0]).toBeLessThan(page.goto.mock.invocationCallOrder[0]);
        expect(browser.close).toHaveBeenCalledTimes(1);
    });

    it('should skip the cookie when none is configured', async () => {
        const { page, browser } = fakeBrowser({ html: 'ok' });
        await browserFetcher(browser).fetchPage('https://www.shop.test/product/1', null);
        expect(page.setCookie).not.toHaveBeenCalled();
    });

    it('should throw FetchError on non-2xx status and still close the browser', async () => {
        const { page, browser } = fakeBrowser({ status: 403 });

        const error = await browserFetcher(browser).fetchPage('https://www.shop.test/p', cookie).catch((e: unknown) => e);

        expect(error).toBeInstanceOf(FetchError);
        expect(error).toMatchObject({ status: 403, url: 'https://www.shop.test/p', message: 'HTTP 403 from https://www.shop.test/p' });
        expect(page.content).not.toHaveBeenCalled();
        expect(browser.close).toHaveBeenCalledTimes(1);
    });

    it('should treat a missing response as a failed navigation', async () => {
        const { browser } = fakeBrowser({ noResponse: true });
        await expect(browserFetcher(browser).fetchPage('https://www.shop.test/p', null))
            .rejects.toThrow('HTTP error from https://www.shop.test/p');
        expect(browser.close).toHaveBeenCalledTimes(1);
    });

    it('should wrap navigation errors in FetchError and close the browser', async () => {
        const { browser } = fakeBrowser({ gotoError: new Error('Navigation timeout of 5000 ms exceeded') });

        const error = await browserFetcher(browser).fetchPage('https://www.shop.test/p', cookie).catch((e: unknown) => e);

        expect(error).toBeInstanceOf(FetchError);
        expect(error).toMatchObject({ message: 'Browser navigation failed: Navigation timeout of 5000 ms exceeded' });
        expect(browser.close).toHaveBeenCalledTimes(1);
    });

    it('should report a launch failure as FetchError', async () => {
        const fetcher = new BrowserPageFetcher(
            { timeoutMs: 5000, settleMs: 0 },
            async () => { throw new Error('Could not find Chrome'); },
            silentLogger
        );
        await expect(fetcher.fetchPage('https://www.shop.test/p', null))
            .rejects.toThrow('Failed to launch browser: Could not find Chrome');
    });

    it('should not fail the fetch when closing the browser fails', async () => {
        const { browser } = fakeBrowser({ html: 'page' });
        browser.close.mockRejectedValueOnce(new Error('already closed'));
        await expect(browserFetcher(browser).fetchPage('https://www.shop.test/p', null)).resolves.toBe('page');
    });
});

describe('HttpPageFetcher', () => {
    afterEach(() => {
        vi.unstubAllGlobals();
    });

    it('should send the store cookie and return the body', async () => {
        const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => new Response('body text', { status: 200 }));
        vi.stubGlobal('fetch', fetchMock);

        const html = await new HttpPageFetcher({ timeoutMs: 1000 }).fetchPage('https://www.shop.test/p', cookie);

        expect(html).toBe('body text');
        expect(fetchMock).toHaveBeenCalledWith(
            'https://www.shop.test/p',
            expect.objectContaining({
                headers: expect.objectContaining({
                    'Cookie': 'storeSelected=029',
                    'Referer': 'https://www.shop.test/',
                }),
            })
        );
    });

    it('should throw FetchError with status on non-2xx', async () => {
        vi.stubGlobal('fetch', vi.fn(async () => new Response('nope', { status: 503 })));
        const error = await new HttpPageFetcher({ timeoutMs: 1000 }).fetchPage('https://www.shop.test/p', null).catch((e: unknown) => e);
        expect(error).toBeInstanceOf(FetchError);
        expect(error).toMatchObject({ status: 503 });
    });

    it('should wrap network errors in FetchError', async () => {
        vi.stubGlobal('fetch', vi.fn(async () => { throw new TypeError('fetch failed'); }));
        await expect(new HttpPageFetcher({ timeoutMs: 1000 }).fetchPage('https://www.shop.test/p', null))
            .rejects.toThrow('Request failed: fetch failed');
    });
});

describe('buildPageFetcher', () => {
    const base: MonitorConfig = {
        productUrl: 'https://www.shop.test/p',
        storeCookie: null,
        pollIntervalSec: 60,
        maxConsecutiveFailures: 3,
        heartbeatIntervalHours: 24,
        fetchMode: 'browser',
        fetchTimeoutSec: 30,
        pageSettleMs: 1000,
        userAgent: undefined,
        chromePath: undefined,
        serviceName: 'Stock Watchdog',
        logFile: undefined,
        logLevel: 'info',
    };

    it('should pick the fetcher from the fetch mode', () => {
        expect(buildPageFetcher(base, silentLogger)).toBeInstanceOf(BrowserPageFetcher);
        expect(buildPageFetcher({ ...base, fetchMode: 'http' }, silentLogger)).toBeInstanceOf(HttpPageFetcher);
    });
});
