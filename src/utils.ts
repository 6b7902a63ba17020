/**
 * 工具函数模块
 * 提供通用的辅助函数和默认配置
 */

/**
 * 默认配置值
 */
export const DEFAULTS = {
    CONFIG_FILE: 'config.env',
    POLL_INTERVAL_SEC: 60,
    MAX_RETRIES: 3,
    HEARTBEAT_HOURS: 24,
    FETCH_TIMEOUT_SEC: 30,
    PAGE_SETTLE_MS: 1000,
    SERVICE_NAME: 'Stock Watchdog',
    LOG_FILE: 'stock-watchdog.log',
} as const;

/**
 * 解析环境变量为整数
 */
export function envInt(value: string | undefined, fallback: number): number {
    const parsed = Number.parseInt(value ?? '', 10);
    return Number.isFinite(parsed) ? parsed : fallback;
}

/**
 * 限制数值在指定范围内
 */
export function clampInt(value: number, min: number, max: number): number {
    return Math.min(Math.max(value, min), max);
}

/**
 * 解析环境变量为字符串（去除空白）
 */
export function envString(value: string | undefined): string | undefined {
    const trimmed = (value ?? '').trim();
    return trimmed ? trimmed : undefined;
}

/**
 * 解析逗号分隔列表，丢弃空项
 */
export function envList(value: string | undefined): string[] {
    return (value ?? '')
        .split(',')
        .map((item) => item.trim())
        .filter((item) => item.length > 0);
}

function pad2(n: number): string {
    return String(n).padStart(2, '0');
}

/**
 * 格式化为本地时间字符串
 * @returns 格式：YYYY-MM-DD HH:mm:ss
 */
export function formatTimestamp(date: Date = new Date()): string {
    const day = `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())}`;
    const time = `${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`;
    return `${day} ${time}`;
}

/**
 * 格式化运行时长
 * @returns 格式：N days, N hours
 */
export function formatUptime(ms: number): string {
    const totalHours = Math.floor(Math.max(ms, 0) / 3_600_000);
    const days = Math.floor(totalHours / 24);
    return `${days} days, ${totalHours % 24} hours`;
}

/**
 * 可中断的延迟函数
 * signal 触发 abort 时立即 resolve（不抛错）
 */
export function delay(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve) => {
        if (signal?.aborted) {
            resolve();
            return;
        }
        const onAbort = () => {
            clearTimeout(timeoutId);
            resolve();
        };
        const timeoutId = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, ms);
        signal?.addEventListener('abort', onAbort, { once: true });
    });
}

/**
 * 提取错误信息
 */
export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
