import { describe, it, expect } from 'vitest';
import { parseStock, IN_STOCK_MARKER, OUT_OF_STOCK_MARKER } from '../parser';

const wrap = (inner: string) => `<html><head><script>dataLayer.push({${inner},'sku':'123'});</script></head><body>Widget</body></html>`;

describe('parseStock', () => {
    it('should detect in stock', () => {
        expect(parseStock(wrap(IN_STOCK_MARKER))).toBe('IN_STOCK');
    });

    it('should detect out of stock when only the out-of-stock marker is present', () => {
        expect(parseStock(wrap(OUT_OF_STOCK_MARKER))).toBe('OUT_OF_STOCK');
    });

    it('should prefer in stock when both markers are present', () => {
        expect(parseStock(wrap(`${OUT_OF_STOCK_MARKER},${IN_STOCK_MARKER}`))).toBe('IN_STOCK');
        expect(parseStock(wrap(`${IN_STOCK_MARKER},${OUT_OF_STOCK_MARKER}`))).toBe('IN_STOCK');
    });

    it('should return UNKNOWN when neither marker is present', () => {
        expect(parseStock(wrap("'price':'99.99'"))).toBe('UNKNOWN');
        expect(parseStock('')).toBe('UNKNOWN');
    });

    it('should match the markers literally', () => {
        expect(parseStock('"inStock":"True"')).toBe('UNKNOWN');
        expect(parseStock("'inStock':'true'")).toBe('UNKNOWN');
        expect(parseStock("'inStock': 'True'")).toBe('UNKNOWN');
    });
});
