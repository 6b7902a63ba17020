/**
 * 错误类型
 */

/**
 * 启动配置错误（致命，进入循环前退出）
 */
export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

/**
 * 页面抓取失败（浏览器/网络/HTTP 状态码）
 * 计入连续失败次数，不终止循环
 */
export class FetchError extends Error {
    constructor(
        message: string,
        readonly url: string,
        readonly status?: number,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = 'FetchError';
    }
}

/**
 * 通知发送失败（推送/邮件）
 * 始终在 notifyAll 中捕获并记录，不向上抛出
 */
export class NotificationError extends Error {
    constructor(
        message: string,
        readonly channel: string,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = 'NotificationError';
    }
}
