/**
 * 类型定义
 */

/**
 * 库存状态（页面标记解析结果）
 */
export type StockStatus = 'IN_STOCK' | 'OUT_OF_STOCK' | 'UNKNOWN';

/**
 * 单次检查结果
 * error 仅在抓取本身失败时存在，用于区分「解析为 UNKNOWN」与「抓取失败」
 */
export interface CheckResult {
    status: StockStatus;
    error?: string;
}

/**
 * 门店 Cookie（决定库存所在门店）
 */
export interface StoreCookie {
    name: string;
    value: string;
    domain: string;
}

export type FetchMode = 'browser' | 'http';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * 监控配置（进程启动时加载，之后只读）
 */
export interface MonitorConfig {
    productUrl: string;
    storeCookie: StoreCookie | null;
    pollIntervalSec: number;
    maxConsecutiveFailures: number;
    heartbeatIntervalHours: number;
    fetchMode: FetchMode;
    fetchTimeoutSec: number;
    pageSettleMs: number;
    userAgent: string | undefined;
    chromePath: string | undefined;
    serviceName: string;
    logFile: string | undefined;
    logLevel: LogLevel;
}

export interface PushoverCredentials {
    token: string;
    user: string;
}

export interface EmailCredentials {
    user: string;
    password: string;
    recipients: string[];
}

/**
 * 通知渠道凭据（发送时实时读取，可通过 reload 刷新）
 */
export interface Credentials {
    pushover: PushoverCredentials | null;
    email: EmailCredentials | null;
}

/**
 * 一条通知：推送与邮件使用不同的标题和正文
 */
export interface Notice {
    title: string;
    message: string;
    subject: string;
    body: string;
    url?: string;
}

export type MonitorPhase = 'idle' | 'checking' | 'notifying' | 'sleeping' | 'shutting_down';

/**
 * 运行状态（仅由 StockMonitor 持有和修改，不持久化）
 */
export interface RunState {
    running: boolean;
    phase: MonitorPhase;
    consecutiveFailures: number;
    startedAt: Date;
    lastHeartbeat: Date;
    stopNotified: boolean;
}

export type StopReason = 'in_stock' | 'shutdown';

/**
 * 环境变量接口
 */
export interface Env {
    CONFIG_FILE?: string;

    // 监控目标
    PRODUCT_URL?: string;
    STORE_COOKIE_NAME?: string;
    STORE_COOKIE_VALUE?: string;
    STORE_COOKIE_DOMAIN?: string;

    // 配置参数
    POLL_INTERVAL?: string;
    MAX_RETRIES?: string;
    HEARTBEAT_HOURS?: string;
    FETCH_MODE?: string;
    FETCH_TIMEOUT_SEC?: string;
    PAGE_SETTLE_MS?: string;
    SERVICE_NAME?: string;

    // 可选：覆盖抓取请求 User-Agent（默认内置 Chrome UA）
    USER_AGENT?: string;

    // 可选：Chromium/Chrome 可执行文件路径（默认使用系统安装的 Chrome）
    CHROME_PATH?: string;

    // Pushover
    PUSHOVER_TOKEN?: string;
    PUSHOVER_USER?: string;

    // 邮件
    EMAIL_USER?: string;
    EMAIL_PASSWORD?: string;
    EMAIL_RECIPIENTS?: string;

    // 日志
    LOG_FILE?: string;
    LOG_LEVEL?: string;
}
