/**
 * 通知器模块
 * 支持 Pushover 推送和 SMTP 邮件
 */

import nodemailer from 'nodemailer';
import type SMTPTransport from 'nodemailer/lib/smtp-transport';
import type { ConfigStore } from './config';
import { NotificationError } from './errors';
import type { Logger } from './logger';
import type { Credentials, EmailCredentials, Notice, PushoverCredentials } from './types';
import { errorMessage } from './utils';

export const PUSHOVER_ENDPOINT = 'https://api.pushover.net/1/messages.json';
export const PUSHOVER_TIMEOUT_MS = 5_000;
export const SMTP_HOST = 'smtp.gmail.com';
export const SMTP_PORT = 587;
/** SMTP 连接、问候与空闲超时（毫秒） */
export const SMTP_TIMEOUTS = {
    connectionTimeout: 10_000,
    greetingTimeout: 10_000,
    socketTimeout: 30_000,
} as const;

async function fetchWithTimeout(url: string, init: RequestInit, timeoutMs: number): Promise<Response> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
    try {
        return await fetch(url, { ...init, signal: controller.signal });
    } finally {
        clearTimeout(timeoutId);
    }
}

async function throwIfNotOk(response: Response, channel: string): Promise<void> {
    if (response.ok) return;
    let detail = '';
    try {
        const text = await response.text();
        detail = text ? ` - ${text.slice(0, 500)}` : '';
    } catch {
        // 响应体不可读时只报告状态码
    }
    throw new NotificationError(`${channel} API error: ${response.status}${detail}`, channel);
}

export type SendOutcome = 'sent' | 'skipped';

/**
 * 通知器接口
 * 未配置凭据时返回 'skipped'；发送失败抛出 NotificationError
 */
export interface Notifier {
    readonly name: string;
    send(notice: Notice): Promise<SendOutcome>;
}

export interface NotifyResult {
    attempted: number;
    sent: number;
    skipped: number;
    failed: number;
    errors: string[];
}

/**
 * Pushover 通知器
 */
export class PushoverNotifier implements Notifier {
    readonly name = 'Pushover';

    constructor(
        private readonly credentials: () => PushoverCredentials | null,
        private readonly logger: Logger,
        private readonly timeoutMs: number = PUSHOVER_TIMEOUT_MS
    ) { }

    async send(notice: Notice): Promise<SendOutcome> {
        const creds = this.credentials();
        if (!creds) {
            this.logger.warn('Pushover credentials missing, skipping push');
            return 'skipped';
        }

        const payload = new URLSearchParams({
            token: creds.token,
            user: creds.user,
            message: notice.message,
            title: notice.title,
        });
        if (notice.url) {
            payload.set('url', notice.url);
            payload.set('url_title', 'View Product');
        }

        let response: Response;
        try {
            response = await fetchWithTimeout(PUSHOVER_ENDPOINT, { method: 'POST', body: payload }, this.timeoutMs);
        } catch (error) {
            throw new NotificationError(`Pushover request failed: ${errorMessage(error)}`, this.name, { cause: error });
        }
        await throwIfNotOk(response, this.name);

        this.logger.info('Pushover notification sent', { title: notice.title });
        return 'sent';
    }
}

/** SMTP 传输中本模块用到的能力（nodemailer Transporter 的子集） */
export interface MailTransport {
    sendMail(mail: { from: string; to: string; subject: string; text: string }): Promise<unknown>;
    close(): void;
}

export type TransportFactory = (options: SMTPTransport.Options) => MailTransport;

const nodemailerTransport: TransportFactory = (options) => nodemailer.createTransport(options);

/**
 * 邮件正文：附加商品链接
 */
export function buildEmailBody(notice: Notice): string {
    return notice.url ? `${notice.body}\n\nProduct URL: ${notice.url}` : notice.body;
}

/**
 * 邮件通知器（SMTP + STARTTLS）
 */
export class EmailNotifier implements Notifier {
    readonly name = 'Email';

    constructor(
        private readonly credentials: () => EmailCredentials | null,
        private readonly logger: Logger,
        private readonly createTransport: TransportFactory = nodemailerTransport
    ) { }

    async send(notice: Notice): Promise<SendOutcome> {
        const creds = this.credentials();
        if (!creds) {
            this.logger.warn('Email settings incomplete, skipping email');
            return 'skipped';
        }

        const transport = this.createTransport({
            host: SMTP_HOST,
            port: SMTP_PORT,
            secure: false,
            requireTLS: true,
            auth: { user: creds.user, pass: creds.password },
            ...SMTP_TIMEOUTS,
        });

        try {
            await transport.sendMail({
                from: creds.user,
                to: creds.recipients.join(', '),
                subject: notice.subject,
                text: buildEmailBody(notice),
            });
        } catch (error) {
            throw new NotificationError(`SMTP send failed: ${errorMessage(error)}`, this.name, { cause: error });
        } finally {
            transport.close();
        }

        this.logger.info('Email notification sent', { subject: notice.subject });
        return 'sent';
    }
}

/**
 * 构建通知器列表
 * 两个渠道始终存在，每次发送时从 ConfigStore 读取最新凭据决定是否启用
 */
export function buildNotifiers(store: ConfigStore, logger: Logger): Notifier[] {
    const current = (): Credentials => store.credentials();
    return [
        new PushoverNotifier(() => current().pushover, logger.child('pushover')),
        new EmailNotifier(() => current().email, logger.child('email')),
    ];
}

/**
 * 依次向所有通知器发送消息
 * 任何渠道的失败只记录日志，不向调用方抛出
 */
export async function notifyAll(
    notifiers: Notifier[],
    notice: Notice,
    logger: Logger
): Promise<NotifyResult> {
    const result: NotifyResult = { attempted: notifiers.length, sent: 0, skipped: 0, failed: 0, errors: [] };

    for (const notifier of notifiers) {
        try {
            const outcome = await notifier.send(notice);
            if (outcome === 'sent') result.sent += 1;
            else result.skipped += 1;
        } catch (error) {
            result.failed += 1;
            result.errors.push(`${notifier.name}: ${errorMessage(error)}`);
        }
    }

    if (result.errors.length > 0) {
        logger.error(`Notify errors: ${result.errors.join(', ')}`);
    }

    return result;
}
