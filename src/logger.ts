/**
 * 日志模块
 * 同时输出到控制台和追加写入的日志文件
 *
 * 行格式：`2024-01-15 16:30:00 [INFO] [monitor] message {"meta":1}`
 */

import { createWriteStream, type WriteStream } from 'node:fs';
import type { LogLevel } from './types';
import { formatTimestamp } from './utils';

export type LogContext = Record<string, unknown>;

const LOG_LEVELS: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
};

/**
 * 解析 LOG_LEVEL（大小写不敏感，未知值回退为 info）
 */
export function parseLogLevel(value: string | undefined): LogLevel {
    switch ((value ?? '').trim().toLowerCase()) {
        case 'debug':
            return 'debug';
        case 'warn':
        case 'warning':
            return 'warn';
        case 'error':
            return 'error';
        default:
            return 'info';
    }
}

/**
 * 日志输出目标
 */
export interface LogSink {
    write(level: LogLevel, line: string): void;
    close?(): Promise<void>;
}

export const consoleSink: LogSink = {
    write(level, line) {
        switch (level) {
            case 'error':
                console.error(line);
                break;
            case 'warn':
                console.warn(line);
                break;
            default:
                console.log(line);
        }
    },
};

export function fileSink(path: string): LogSink {
    const stream: WriteStream = createWriteStream(path, { flags: 'a' });
    stream.on('error', (error) => {
        console.error(`Log file ${path} unavailable:`, error.message);
    });
    return {
        write(_level, line) {
            if (stream.writable) stream.write(`${line}\n`);
        },
        close() {
            return new Promise((resolve) => stream.end(resolve));
        },
    };
}

export function formatLine(
    level: LogLevel,
    component: string,
    message: string,
    meta?: LogContext,
    error?: unknown,
    date: Date = new Date()
): string {
    const metaStr = meta && Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    let line = `${formatTimestamp(date)} [${level.toUpperCase()}] [${component}] ${message}${metaStr}`;
    if (error !== undefined) {
        line += error instanceof Error ? `\n  ${error.stack ?? error.message}` : `\n  ${String(error)}`;
    }
    return line;
}

export class Logger {
    constructor(
        private readonly component: string,
        private readonly level: LogLevel,
        private readonly sinks: LogSink[]
    ) { }

    debug(message: string, meta?: LogContext): void {
        this.log('debug', message, meta);
    }

    info(message: string, meta?: LogContext): void {
        this.log('info', message, meta);
    }

    warn(message: string, meta?: LogContext): void {
        this.log('warn', message, meta);
    }

    error(message: string, meta?: LogContext, error?: unknown): void {
        this.log('error', message, meta, error);
    }

    /**
     * 创建子日志器（共享级别和输出目标）
     */
    child(component: string): Logger {
        return new Logger(`${this.component}:${component}`, this.level, this.sinks);
    }

    async close(): Promise<void> {
        await Promise.all(this.sinks.map((sink) => sink.close?.()));
    }

    private log(level: LogLevel, message: string, meta?: LogContext, error?: unknown): void {
        if (LOG_LEVELS[level] < LOG_LEVELS[this.level]) return;
        const line = formatLine(level, this.component, message, meta, error);
        for (const sink of this.sinks) sink.write(level, line);
    }
}

export interface LoggerOptions {
    component: string;
    level: LogLevel;
    file?: string;
}

/**
 * 创建日志器：控制台 + 可选日志文件
 */
export function createLogger(options: LoggerOptions): Logger {
    const sinks: LogSink[] = [consoleSink];
    if (options.file) sinks.push(fileSink(options.file));
    return new Logger(options.component, options.level, sinks);
}
