/**
 * 配置模块
 * 负责加载 config.env / 环境变量，生成只读的监控配置和通知凭据
 */

import { existsSync, readFileSync } from 'node:fs';
import { config as loadDotenv, parse as parseDotenv } from 'dotenv';
import { ConfigError } from './errors';
import { parseLogLevel } from './logger';
import type { Credentials, EmailCredentials, Env, FetchMode, MonitorConfig, PushoverCredentials, StoreCookie } from './types';
import { clampInt, DEFAULTS, envInt, envList, envString } from './utils';

/**
 * 将 dotenv 文件加载进 process.env（已有的环境变量优先）
 * @returns 文件是否成功读取（文件不存在不是错误）
 */
export function loadEnvFile(path: string): boolean {
    const result = loadDotenv({ path });
    return result.error === undefined;
}

/**
 * 只解析 dotenv 文件，不修改 process.env；文件不存在时返回空对象
 */
export function readEnvFile(path: string): Env {
    if (!existsSync(path)) return {};
    return parseDotenv(readFileSync(path));
}

function parseProductUrl(value: string | undefined): URL {
    const raw = envString(value);
    if (!raw) {
        throw new ConfigError('PRODUCT_URL is required');
    }

    let url: URL;
    try {
        url = new URL(raw);
    } catch {
        throw new ConfigError(`PRODUCT_URL is not a valid URL: ${raw}`);
    }
    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
        throw new ConfigError(`PRODUCT_URL must use http or https: ${raw}`);
    }
    return url;
}

/**
 * 默认 Cookie 域：商品页主机名去掉 www. 前缀，并覆盖所有子域
 */
export function defaultCookieDomain(hostname: string): string {
    return `.${hostname.replace(/^www\./i, '')}`;
}

export function parseStoreCookie(env: Env, productUrl: URL): StoreCookie | null {
    const name = envString(env.STORE_COOKIE_NAME);
    const value = envString(env.STORE_COOKIE_VALUE);
    if (!name || !value) return null;

    const domain = envString(env.STORE_COOKIE_DOMAIN) ?? defaultCookieDomain(productUrl.hostname);
    return { name, value, domain };
}

function parseFetchMode(value: string | undefined): FetchMode {
    const mode = (envString(value) ?? 'browser').toLowerCase();
    if (mode === 'browser' || mode === 'http') return mode;
    throw new ConfigError(`FETCH_MODE must be "browser" or "http", got "${mode}"`);
}

/**
 * 生成监控配置
 * 缺少 PRODUCT_URL 等致命错误抛出 ConfigError
 */
export function loadConfig(env: Env): MonitorConfig {
    const productUrl = parseProductUrl(env.PRODUCT_URL);

    // LOG_FILE 显式设置为空字符串时禁用文件日志
    const logFile = env.LOG_FILE === undefined ? DEFAULTS.LOG_FILE : envString(env.LOG_FILE);

    return Object.freeze({
        productUrl: productUrl.toString(),
        storeCookie: parseStoreCookie(env, productUrl),
        pollIntervalSec: clampInt(envInt(env.POLL_INTERVAL, DEFAULTS.POLL_INTERVAL_SEC), 5, 86_400),
        maxConsecutiveFailures: clampInt(envInt(env.MAX_RETRIES, DEFAULTS.MAX_RETRIES), 1, 1000),
        heartbeatIntervalHours: clampInt(envInt(env.HEARTBEAT_HOURS, DEFAULTS.HEARTBEAT_HOURS), 1, 8760),
        fetchMode: parseFetchMode(env.FETCH_MODE),
        fetchTimeoutSec: clampInt(envInt(env.FETCH_TIMEOUT_SEC, DEFAULTS.FETCH_TIMEOUT_SEC), 1, 300),
        pageSettleMs: clampInt(envInt(env.PAGE_SETTLE_MS, DEFAULTS.PAGE_SETTLE_MS), 0, 60_000),
        userAgent: envString(env.USER_AGENT),
        chromePath: envString(env.CHROME_PATH),
        serviceName: envString(env.SERVICE_NAME) ?? DEFAULTS.SERVICE_NAME,
        logFile,
        logLevel: parseLogLevel(env.LOG_LEVEL),
    });
}

function parsePushover(env: Env): PushoverCredentials | null {
    const token = envString(env.PUSHOVER_TOKEN);
    const user = envString(env.PUSHOVER_USER);
    return token && user ? { token, user } : null;
}

function parseEmail(env: Env): EmailCredentials | null {
    const user = envString(env.EMAIL_USER);
    const password = envString(env.EMAIL_PASSWORD);
    const recipients = envList(env.EMAIL_RECIPIENTS);
    return user && password && recipients.length > 0 ? { user, password, recipients } : null;
}

/**
 * 解析通知凭据；未配置完整的渠道为 null
 */
export function loadCredentials(env: Env): Credentials {
    return {
        pushover: parsePushover(env),
        email: parseEmail(env),
    };
}

/**
 * 通知凭据的实时来源
 * 通知器在每次发送时读取 credentials()；reload() 重新读取配置来源（由 SIGHUP 触发）
 */
export class ConfigStore {
    private current: Credentials;

    constructor(private readonly source: () => Env, initial: Env = source()) {
        this.current = loadCredentials(initial);
    }

    credentials(): Credentials {
        return this.current;
    }

    reload(): Credentials {
        this.current = loadCredentials(this.source());
        return this.current;
    }
}

/**
 * reload 用的配置来源：每次重新解析 config.env，启动时的环境变量优先
 * startupEnv 必须在 loadEnvFile 之前快照，否则文件中已删除的键会残留
 */
export function fileBackedSource(path: string, startupEnv: Env): () => Env {
    return () => ({ ...readEnvFile(path), ...startupEnv });
}
