/**
 * 库存标记解析
 */

import type { StockStatus } from './types';

/** 页面内嵌的有货标记 */
export const IN_STOCK_MARKER = "'inStock':'True'";

/** 页面内嵌的缺货标记 */
export const OUT_OF_STOCK_MARKER = "'inStock':'False'";

/**
 * 判断页面库存状态
 * 两个标记同时出现时以有货为准；都不存在时为 UNKNOWN
 */
export function parseStock(pageText: string): StockStatus {
    if (pageText.includes(IN_STOCK_MARKER)) return 'IN_STOCK';
    if (pageText.includes(OUT_OF_STOCK_MARKER)) return 'OUT_OF_STOCK';
    return 'UNKNOWN';
}
