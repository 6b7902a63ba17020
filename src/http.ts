/**
 * 页面抓取模块
 * 负责构建浏览器请求头，并通过 Headless Chrome 或普通 HTTP 获取商品页
 */

import puppeteer from 'puppeteer-core';
import { FetchError } from './errors';
import type { Logger } from './logger';
import type { MonitorConfig, StoreCookie } from './types';
import { delay, errorMessage } from './utils';

/**
 * 默认浏览器请求头（Chrome on Windows）
 */
const DEFAULT_UA = 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/131.0.0.0 Safari/537.36';
const DEFAULT_CHROME_MAJOR_VERSION = '131';
const DEFAULT_SEC_CH_UA = `"Google Chrome";v="${DEFAULT_CHROME_MAJOR_VERSION}", "Chromium";v="${DEFAULT_CHROME_MAJOR_VERSION}", "Not_A Brand";v="24"`;
const DEFAULT_SEC_CH_UA_PLATFORM = '"Windows"';

/**
 * 隐身脚本：隐藏 navigator.webdriver，防止被识别为 HeadlessChrome
 */
const STEALTH_SCRIPT = "Object.defineProperty(navigator, 'webdriver', { get: () => false });";

export function extractChromeMajorVersion(userAgent: string): string | null {
    const match = userAgent.match(/\bChrome\/(\d+)\b/i);
    return match ? match[1] : null;
}

export function isMobileUserAgent(userAgent: string): boolean {
    return /\bMobile\b/i.test(userAgent) || /\bAndroid\b/i.test(userAgent) || /\biPhone\b/i.test(userAgent) || /\biPad\b/i.test(userAgent);
}

export function detectSecChUaPlatform(userAgent: string): string {
    if (/\bWindows\b/i.test(userAgent)) return '"Windows"';
    if (/\bAndroid\b/i.test(userAgent)) return '"Android"';
    if (/\biPhone\b/i.test(userAgent) || /\biPad\b/i.test(userAgent) || /\biPod\b/i.test(userAgent)) return '"iOS"';
    if (/\bMacintosh\b/i.test(userAgent) || /\bMac OS X\b/i.test(userAgent)) return '"macOS"';
    if (/\bLinux\b/i.test(userAgent)) return '"Linux"';
    return DEFAULT_SEC_CH_UA_PLATFORM;
}

export type BrowserHeaders = {
    userAgent: string;
    secChUa: string;
    secChUaMobile: string;
    secChUaPlatform: string;
};

export function buildBrowserHeaders(userAgentOverride?: string): BrowserHeaders {
    const userAgent = userAgentOverride ?? DEFAULT_UA;
    const chromeMajorVersion = extractChromeMajorVersion(userAgent);

    const secChUa = chromeMajorVersion
        ? `"Google Chrome";v="${chromeMajorVersion}", "Chromium";v="${chromeMajorVersion}", "Not_A Brand";v="24"`
        : DEFAULT_SEC_CH_UA;

    return {
        userAgent,
        secChUa,
        secChUaMobile: isMobileUserAgent(userAgent) ? '?1' : '?0',
        secChUaPlatform: detectSecChUaPlatform(userAgent),
    };
}

/**
 * 页面抓取接口
 * 返回完整渲染后的页面文本，失败时抛出 FetchError
 */
export interface PageFetcher {
    fetchPage(url: string, cookie: StoreCookie | null): Promise<string>;
}

/** 浏览器页面中本模块用到的能力（puppeteer Page 的子集） */
export interface PageLike {
    setUserAgent(userAgent: string): Promise<void>;
    setExtraHTTPHeaders(headers: Record<string, string>): Promise<void>;
    evaluateOnNewDocument(script: string): Promise<unknown>;
    setCookie(cookie: {
        name: string;
        value: string;
        domain: string;
        path: string;
        secure: boolean;
        httpOnly: boolean;
    }): Promise<void>;
    goto(url: string, options: { waitUntil: 'domcontentloaded'; timeout: number }): Promise<{ status(): number } | null>;
    content(): Promise<string>;
}

/** puppeteer Browser 的子集 */
export interface BrowserLike {
    newPage(): Promise<PageLike>;
    close(): Promise<void>;
}

export type BrowserLauncher = () => Promise<BrowserLike>;

/**
 * 默认启动器：使用 CHROME_PATH 指定的可执行文件，否则使用系统安装的 Chrome
 */
export function defaultLauncher(chromePath: string | undefined): BrowserLauncher {
    return () =>
        puppeteer.launch({
            headless: true,
            ...(chromePath ? { executablePath: chromePath } : { channel: 'chrome' as const }),
            args: ['--no-sandbox', '--disable-gpu', '--disable-dev-shm-usage'],
        });
}

function referer(url: string): string {
    const urlObj = new URL(url);
    return `${urlObj.protocol}//${urlObj.host}/`;
}

function requestHeaders(url: string, browserHeaders: BrowserHeaders): Record<string, string> {
    return {
        'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,image/apng,*/*;q=0.8',
        'Accept-Language': 'en-US,en;q=0.9',
        'Cache-Control': 'no-cache',
        'Pragma': 'no-cache',
        'Referer': referer(url),
        'Sec-Ch-Ua': browserHeaders.secChUa,
        'Sec-Ch-Ua-Mobile': browserHeaders.secChUaMobile,
        'Sec-Ch-Ua-Platform': browserHeaders.secChUaPlatform,
        'Upgrade-Insecure-Requests': '1',
    };
}

/**
 * 使用 Headless Chrome 获取页面内容（包含客户端渲染的内容）
 * 每次抓取启动独立的浏览器实例，结束时无论成功失败都关闭
 */
export class BrowserPageFetcher implements PageFetcher {
    private readonly browserHeaders: BrowserHeaders;

    constructor(
        private readonly options: { timeoutMs: number; settleMs: number; userAgent?: string },
        private readonly launch: BrowserLauncher,
        private readonly logger: Logger
    ) {
        this.browserHeaders = buildBrowserHeaders(options.userAgent);
    }

    async fetchPage(url: string, cookie: StoreCookie | null): Promise<string> {
        this.logger.debug('Launching browser instance...');
        const browser = await this.launch().catch((error: unknown) => {
            throw new FetchError(`Failed to launch browser: ${errorMessage(error)}`, url, undefined, { cause: error });
        });

        try {
            const page = await browser.newPage();
            await page.evaluateOnNewDocument(STEALTH_SCRIPT);
            await page.setUserAgent(this.browserHeaders.userAgent);
            // UA 由 setUserAgent 设置，这里补充 Client Hints 等请求头
            await page.setExtraHTTPHeaders(requestHeaders(url, this.browserHeaders));

            // 门店 Cookie 必须在加载商品页之前设置
            if (cookie) {
                await page.setCookie({
                    name: cookie.name,
                    value: cookie.value,
                    domain: cookie.domain,
                    path: '/',
                    secure: true,
                    httpOnly: false,
                });
            }

            const response = await page.goto(url, {
                waitUntil: 'domcontentloaded',
                timeout: this.options.timeoutMs,
            });
            const status = response?.status() ?? 0;
            if (status < 200 || status >= 300) {
                throw new FetchError(`HTTP ${status || 'error'} from ${url}`, url, status);
            }

            // 等待客户端脚本渲染库存标记
            await delay(this.options.settleMs);
            return await page.content();
        } catch (error) {
            if (error instanceof FetchError) throw error;
            throw new FetchError(`Browser navigation failed: ${errorMessage(error)}`, url, undefined, { cause: error });
        } finally {
            this.logger.debug('Closing browser instance...');
            try {
                await browser.close();
            } catch (error) {
                this.logger.warn('Error closing browser', { error: errorMessage(error) });
            }
        }
    }
}

/**
 * 使用普通 HTTP 请求获取页面内容
 * 仅适用于库存标记由服务端渲染的页面
 */
export class HttpPageFetcher implements PageFetcher {
    private readonly browserHeaders: BrowserHeaders;

    constructor(private readonly options: { timeoutMs: number; userAgent?: string }) {
        this.browserHeaders = buildBrowserHeaders(options.userAgent);
    }

    async fetchPage(url: string, cookie: StoreCookie | null): Promise<string> {
        const headers: Record<string, string> = {
            'User-Agent': this.browserHeaders.userAgent,
            ...requestHeaders(url, this.browserHeaders),
        };
        if (cookie) {
            headers['Cookie'] = `${cookie.name}=${cookie.value}`;
        }

        const controller = new AbortController();
        const timeoutId = setTimeout(() => controller.abort(), this.options.timeoutMs);
        try {
            const response = await fetch(url, { headers, signal: controller.signal });
            if (!response.ok) {
                throw new FetchError(`HTTP ${response.status} from ${url}`, url, response.status);
            }
            return await response.text();
        } catch (error) {
            if (error instanceof FetchError) throw error;
            throw new FetchError(`Request failed: ${errorMessage(error)}`, url, undefined, { cause: error });
        } finally {
            clearTimeout(timeoutId);
        }
    }
}

/**
 * 根据 FETCH_MODE 构建抓取器
 */
export function buildPageFetcher(config: MonitorConfig, logger: Logger): PageFetcher {
    const timeoutMs = config.fetchTimeoutSec * 1000;
    if (config.fetchMode === 'http') {
        return new HttpPageFetcher({ timeoutMs, userAgent: config.userAgent });
    }
    return new BrowserPageFetcher(
        { timeoutMs, settleMs: config.pageSettleMs, userAgent: config.userAgent },
        defaultLauncher(config.chromePath),
        logger
    );
}
