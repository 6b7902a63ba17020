/**
 * 发送一条测试通知（推送 + 邮件），用于验证 config.env 中的凭据
 *
 * 用法：npm run notify:test
 */

import { ConfigStore, fileBackedSource, loadEnvFile } from './config';
import { createLogger, parseLogLevel } from './logger';
import { testNotice } from './messages';
import { buildNotifiers, notifyAll } from './notifiers';
import type { Env } from './types';
import { DEFAULTS, envString } from './utils';

async function main(): Promise<number> {
    const configFile = envString(process.env.CONFIG_FILE) ?? DEFAULTS.CONFIG_FILE;
    const startupEnv: Env = { ...process.env };
    loadEnvFile(configFile);

    const logger = createLogger({ component: 'notify-test', level: parseLogLevel(process.env.LOG_LEVEL) });
    const serviceName = envString(process.env.SERVICE_NAME) ?? DEFAULTS.SERVICE_NAME;
    const url = envString(process.env.PRODUCT_URL) ?? 'https://example.com/';

    const store = new ConfigStore(fileBackedSource(configFile, startupEnv), process.env);
    logger.info('Sending test notifications...');
    const result = await notifyAll(buildNotifiers(store, logger), testNotice(serviceName, url), logger);

    logger.info(`Test notifications done: sent=${result.sent} skipped=${result.skipped} failed=${result.failed}`);
    return result.failed > 0 ? 1 : 0;
}

main()
    .then((code) => process.exit(code))
    .catch((error) => {
        console.error('Fatal error:', error);
        process.exit(1);
    });
