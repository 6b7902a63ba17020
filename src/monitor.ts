/**
 * 监控逻辑模块
 * 负责抓取页面、判断库存状态、管理连续失败计数、心跳与启停通知
 */

import type { PageFetcher } from './http';
import type { Logger } from './logger';
import {
    fetchErrorNotice,
    heartbeatNotice,
    inStockNotice,
    startedNotice,
    stoppedNotice,
    stoppingNotice,
    unknownStatusNotice,
} from './messages';
import { notifyAll, type Notifier, type NotifyResult } from './notifiers';
import { parseStock } from './parser';
import { Scheduler } from './scheduler';
import type { CheckResult, MonitorConfig, MonitorPhase, Notice, RunState, StopReason } from './types';
import { errorMessage } from './utils';

export interface MonitorDeps {
    config: MonitorConfig;
    fetcher: PageFetcher;
    notifiers: Notifier[];
    logger: Logger;
    scheduler?: Scheduler;
    now?: () => Date;
}

export class StockMonitor {
    readonly state: RunState;

    private readonly config: MonitorConfig;
    private readonly fetcher: PageFetcher;
    private readonly notifiers: Notifier[];
    private readonly logger: Logger;
    private readonly scheduler: Scheduler;
    private readonly now: () => Date;
    /** 用于中断轮询等待 */
    private readonly controller = new AbortController();
    private stopRequested = false;

    constructor(deps: MonitorDeps) {
        this.config = deps.config;
        this.fetcher = deps.fetcher;
        this.notifiers = deps.notifiers;
        this.logger = deps.logger;
        this.scheduler = deps.scheduler ?? new Scheduler(deps.config.pollIntervalSec, deps.config.heartbeatIntervalHours);
        this.now = deps.now ?? (() => new Date());

        const now = this.now();
        this.state = {
            running: true,
            phase: 'idle',
            consecutiveFailures: 0,
            startedAt: now,
            lastHeartbeat: now,
            stopNotified: false,
        };
    }

    /**
     * 主循环
     * 启动通知 → 检查 → 心跳 → 等待 → ……，直到有货或收到停止请求
     * 无论以何种方式退出（包括未预期的异常），都保证恰好发送一次停止通知
     */
    async run(): Promise<StopReason> {
        const startedAt = this.now();
        this.state.startedAt = startedAt;
        this.state.lastHeartbeat = startedAt;

        this.logger.info('Starting stock monitor loop', { url: this.config.productUrl });
        await this.notify(startedNotice(this.config.serviceName, this.config.productUrl));

        let reason: StopReason = 'shutdown';
        try {
            while (this.state.running) {
                const result = await this.runCycle();
                if (result.status === 'IN_STOCK') {
                    reason = 'in_stock';
                    break;
                }
                if (!this.state.running) break;

                await this.sendHeartbeatIfDue();

                this.enter('sleeping');
                await this.scheduler.sleep(this.controller.signal);
            }
        } finally {
            this.state.running = false;
            this.state.phase = 'shutting_down';
            this.logger.info('Stock monitor stopped', { reason });
            if (!this.state.stopNotified) {
                this.state.stopNotified = true;
                await this.notify(stoppedNotice(this.config.serviceName, this.config.productUrl));
            }
        }

        return reason;
    }

    /**
     * 执行一次完整检查
     */
    async runCycle(): Promise<CheckResult> {
        this.enter('checking');
        const result = await this.check();

        switch (result.status) {
            case 'IN_STOCK':
                this.state.consecutiveFailures = 0;
                this.logger.info('Status: In Stock!');
                await this.notify(inStockNotice(this.config.productUrl));
                // 有货即终止：每次补货事件只通知一次
                this.state.running = false;
                break;
            case 'OUT_OF_STOCK':
                this.state.consecutiveFailures = 0;
                this.logger.info('Status: Out of Stock');
                break;
            case 'UNKNOWN':
                await this.recordFailure(result);
                break;
        }

        return result;
    }

    /**
     * 停止请求（SIGINT/SIGTERM）
     * 幂等：只有第一次调用会发送「正在停止」通知；正在进行的检查会执行完毕
     */
    async requestStop(signal?: string): Promise<void> {
        if (this.stopRequested || this.state.stopNotified) return;
        this.stopRequested = true;

        this.logger.info(`Received ${signal ?? 'stop request'}, initiating graceful shutdown...`);
        this.state.running = false;
        this.state.phase = 'shutting_down';
        // 先标记再发送，避免主循环在发送期间退出时重复发送停止通知
        this.state.stopNotified = true;
        this.controller.abort();

        await notifyAll(this.notifiers, stoppingNotice(this.config.serviceName, this.config.productUrl), this.logger);
    }

    private async check(): Promise<CheckResult> {
        try {
            const page = await this.fetcher.fetchPage(this.config.productUrl, this.config.storeCookie);
            return { status: parseStock(page) };
        } catch (error) {
            return { status: 'UNKNOWN', error: errorMessage(error) };
        }
    }

    /**
     * 记录一次失败（UNKNOWN 或抓取异常）
     * 达到阈值后不重置计数：之后每次失败都会再次通知
     */
    private async recordFailure(result: CheckResult): Promise<void> {
        this.state.consecutiveFailures += 1;
        const failures = this.state.consecutiveFailures;

        if (result.error !== undefined) {
            this.logger.error(`Checker exception: ${result.error} (Failure #${failures})`);
        } else {
            this.logger.warn(`Status: Unknown (Failure #${failures})`);
        }

        if (failures < this.config.maxConsecutiveFailures) return;

        const notice = result.error !== undefined
            ? fetchErrorNotice(failures, result.error, this.config.productUrl)
            : unknownStatusNotice(failures, this.config.productUrl);
        await this.notify(notice);
    }

    private async sendHeartbeatIfDue(): Promise<void> {
        const now = this.now();
        if (!this.scheduler.heartbeatDue(this.state.lastHeartbeat, now)) return;

        this.logger.info('Sending heartbeat');
        const uptimeMs = now.getTime() - this.state.startedAt.getTime();
        await this.notify(heartbeatNotice(this.config.serviceName, uptimeMs, now, this.config.productUrl));
        this.state.lastHeartbeat = now;
    }

    private async notify(notice: Notice): Promise<NotifyResult> {
        this.enter('notifying');
        return notifyAll(this.notifiers, notice, this.logger);
    }

    /** 停止流程开始后不再切换阶段 */
    private enter(phase: MonitorPhase): void {
        if (this.state.phase !== 'shutting_down') this.state.phase = phase;
    }
}
