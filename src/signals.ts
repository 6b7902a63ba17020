/**
 * 停止信号处理
 * 第一次 SIGINT/SIGTERM 优雅停止；停止过程中再次收到信号则立即退出
 */

import type { Logger } from './logger';

export interface StopTarget {
    requestStop(signal?: string): Promise<void>;
}

export interface StopHandler {
    onStop(signal: NodeJS.Signals): void;
    /** 等待优雅停止完成；未收到信号时立即 resolve */
    settled(): Promise<void>;
}

export function createStopHandler(
    target: StopTarget,
    logger: Logger,
    forceExit: (code: number) => void = (code) => process.exit(code)
): StopHandler {
    let stopping: Promise<void> | null = null;

    return {
        onStop(signal) {
            if (stopping) {
                logger.warn(`Received ${signal} during shutdown, exiting immediately`);
                forceExit(1);
                return;
            }
            stopping = target.requestStop(signal);
        },
        settled() {
            return stopping ?? Promise.resolve();
        },
    };
}
