/**
 * 通知文案
 * 每条通知同时包含推送（title/message）与邮件（subject/body）两套文本
 */

import type { Notice } from './types';
import { formatTimestamp, formatUptime } from './utils';

export function startedNotice(serviceName: string, url: string): Notice {
    return {
        title: 'Service Started',
        message: `${serviceName} service has started successfully.\nClick to view the monitored product.`,
        subject: `${serviceName} Service Started`,
        body: `The ${serviceName} service has started successfully.\nMonitoring the following product:`,
        url,
    };
}

export function stoppingNotice(serviceName: string, url: string): Notice {
    return {
        title: 'Service Stopping',
        message: `${serviceName} service is shutting down gracefully.\nMonitoring will stop after current check completes.`,
        subject: `${serviceName} Service Stopping`,
        body: `The ${serviceName} service is being shut down gracefully.\nMonitoring will stop after the current check completes.`,
        url,
    };
}

export function stoppedNotice(serviceName: string, url: string): Notice {
    return {
        title: 'Service Stopped',
        message: `${serviceName} service has stopped.\nMonitoring is no longer active.`,
        subject: `${serviceName} Service Stopped`,
        body: `The ${serviceName} service has stopped.\nMonitoring is no longer active.`,
        url,
    };
}

export function inStockNotice(url: string): Notice {
    return {
        title: 'In Stock',
        message: 'Product is in stock! Click to view the product page.',
        subject: 'Product In Stock',
        body: 'Your product is now available! Click the link below to view the product page.',
        url,
    };
}

export function unknownStatusNotice(failures: number, url: string): Notice {
    return {
        title: 'Checker Error',
        message: `Stock check returned unknown status ${failures} times in a row.\nClick to verify manually.`,
        subject: 'Stock Checker Error',
        body: `Unknown stock status detected ${failures} times in a row.\nPlease verify manually using the link below.`,
        url,
    };
}

export function fetchErrorNotice(failures: number, error: string, url: string): Notice {
    return {
        title: 'Checker Exception',
        message: `Checker failed ${failures} times in a row: ${error}\nClick to check manually.`,
        subject: 'Stock Checker Exception',
        body: `The stock checker encountered ${failures} consecutive errors:\n${error}\n\nPlease check manually using the link below.`,
        url,
    };
}

export function heartbeatNotice(serviceName: string, uptimeMs: number, now: Date, url: string): Notice {
    const text = [
        `${serviceName} service is running normally.`,
        `Uptime: ${formatUptime(uptimeMs)}`,
        `Last check: ${formatTimestamp(now)}`,
    ].join('\n');
    return {
        title: 'Service Heartbeat',
        message: text,
        subject: `${serviceName} Service Heartbeat`,
        body: text,
        url,
    };
}

export function testNotice(serviceName: string, url: string): Notice {
    return {
        title: 'Test Notification',
        message: `This is a test notification from ${serviceName}!\n\nIf you received this, your Pushover notifications are working correctly.`,
        subject: `${serviceName} Test Notification`,
        body: `This is a test notification from ${serviceName}!\n\nIf you received this email, your email notifications are working correctly.\n\nWhen a product becomes available, you'll receive a notification like this one.`,
        url,
    };
}
