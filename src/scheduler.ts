/**
 * 调度模块
 * 负责轮询间隔的可中断等待和心跳判定
 */

import { delay } from './utils';

export type SleepFn = (ms: number, signal: AbortSignal) => Promise<void>;

export class Scheduler {
    readonly pollIntervalMs: number;
    readonly heartbeatIntervalMs: number;

    constructor(
        pollIntervalSec: number,
        heartbeatIntervalHours: number,
        private readonly sleepFn: SleepFn = delay
    ) {
        this.pollIntervalMs = pollIntervalSec * 1000;
        this.heartbeatIntervalMs = heartbeatIntervalHours * 3_600_000;
    }

    /**
     * 距上次心跳超过心跳间隔（严格大于）时返回 true
     */
    heartbeatDue(lastHeartbeat: Date, now: Date): boolean {
        return now.getTime() - lastHeartbeat.getTime() > this.heartbeatIntervalMs;
    }

    /**
     * 等待一个轮询间隔；signal 触发时立即返回
     */
    async sleep(signal: AbortSignal): Promise<void> {
        if (signal.aborted) return;
        await this.sleepFn(this.pollIntervalMs, signal);
    }
}
