/**
 * 进程入口
 * 补货监控 - 单商品轮询，Pushover + 邮件通知
 *
 * 信号：
 *   SIGINT / SIGTERM - 优雅停止（发送「正在停止」通知，当前检查完成后退出）；停止期间再次收到则立即退出
 *   SIGHUP           - 重新读取 config.env 中的通知凭据
 */

import { ConfigStore, fileBackedSource, loadConfig, loadEnvFile } from './config';
import { ConfigError } from './errors';
import { buildPageFetcher } from './http';
import { createLogger } from './logger';
import { StockMonitor } from './monitor';
import { buildNotifiers } from './notifiers';
import { createStopHandler } from './signals';
import type { Env, MonitorConfig } from './types';
import { DEFAULTS, envString } from './utils';

async function main(): Promise<number> {
    const configFile = envString(process.env.CONFIG_FILE) ?? DEFAULTS.CONFIG_FILE;
    const startupEnv: Env = { ...process.env };
    const fileLoaded = loadEnvFile(configFile);

    let config: MonitorConfig;
    try {
        config = loadConfig(process.env);
    } catch (error) {
        if (error instanceof ConfigError) {
            console.error(`Configuration error: ${error.message}`);
            return 1;
        }
        throw error;
    }

    const logger = createLogger({ component: 'watchdog', level: config.logLevel, file: config.logFile });
    if (!fileLoaded) {
        logger.debug(`Config file ${configFile} not found, using process environment only`);
    }

    const store = new ConfigStore(fileBackedSource(configFile, startupEnv), process.env);
    const monitor = new StockMonitor({
        config,
        fetcher: buildPageFetcher(config, logger.child('fetch')),
        notifiers: buildNotifiers(store, logger.child('notify')),
        logger: logger.child('monitor'),
    });

    const stop = createStopHandler(monitor, logger);
    const onStop = (signal: NodeJS.Signals) => stop.onStop(signal);
    const onReload = () => {
        const credentials = store.reload();
        logger.info('Reloaded notification credentials', {
            pushover: credentials.pushover !== null,
            email: credentials.email !== null,
        });
    };

    process.on('SIGINT', onStop);
    process.on('SIGTERM', onStop);
    process.on('SIGHUP', onReload);

    try {
        const reason = await monitor.run();
        await stop.settled();
        logger.info(`Exiting (${reason})`);
        return 0;
    } catch (error) {
        await stop.settled();
        logger.error('Stock monitor crashed', undefined, error);
        return 1;
    } finally {
        process.off('SIGINT', onStop);
        process.off('SIGTERM', onStop);
        process.off('SIGHUP', onReload);
        await logger.close();
    }
}

main()
    .then((code) => process.exit(code))
    .catch((error) => {
        console.error('Fatal error:', error);
        process.exit(1);
    });
