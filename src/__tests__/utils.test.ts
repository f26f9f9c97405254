import { log } from 'apify';
import { beforeEach, describe, expect, it, vi } from 'vitest';

import {
    backoffDelay,
    currencyFractionDigits,
    escapeHtml,
    formatPrice,
    isRecord,
    mapWithConcurrency,
    minNullable,
    withRetry,
} from '../utils.js';

const POLICY = { maxAttempts: 3, initialDelayMs: 1, backoffMultiplier: 2, maxDelayMs: 3 };

describe('backoffDelay', () => {
    it('should grow exponentially up to the cap', () => {
        const policy = { maxAttempts: 5, initialDelayMs: 100, backoffMultiplier: 2, maxDelayMs: 300 };

        expect([1, 2, 3, 4].map((attempt) => backoffDelay(policy, attempt))).toEqual([100, 200, 300, 300]);
    });
});

describe('withRetry', () => {
    beforeEach(() => {
        vi.spyOn(log, 'warning').mockReturnValue(undefined);
    });

    it('should return the first successful result', async () => {
        const operation = vi.fn(async (attempt: number) => {
            if (attempt < 3) throw new Error(`attempt ${attempt}`);
            return 'ok';
        });

        await expect(withRetry(operation, POLICY, 'load')).resolves.toBe('ok');
        expect(operation).toHaveBeenCalledTimes(3);
        expect(log.warning).toHaveBeenCalledWith('load failed (attempt 1/3), retrying in 1ms', { error: 'attempt 1' });
        expect(log.warning).toHaveBeenCalledWith('load failed (attempt 2/3), retrying in 2ms', { error: 'attempt 2' });
    });

    it('should give up after the last attempt with the error as cause', async () => {
        const failure = new Error('still down');
        const operation = vi.fn(async () => Promise.reject(failure));

        const result = withRetry(operation, POLICY, 'save');

        await expect(result).rejects.toThrow('save failed after 3 attempts');
        await expect(result).rejects.toHaveProperty('cause', failure);
        expect(operation).toHaveBeenCalledTimes(3);
        expect(log.warning).toHaveBeenCalledTimes(2);
    });
});

describe('mapWithConcurrency', () => {
    it('should keep input order and respect the limit', async () => {
        let inFlight = 0;
        let peak = 0;

        const results = await mapWithConcurrency([30, 10, 20, 5], 2, async (value) => {
            inFlight++;
            peak = Math.max(peak, inFlight);
            await new Promise((resolve) => {
                setTimeout(resolve, value);
            });
            inFlight--;
            return value * 2;
        });

        expect(results).toEqual([60, 20, 40, 10]);
        expect(peak).toBe(2);
    });

    it('should handle an empty list', async () => {
        await expect(mapWithConcurrency([], 3, async () => 1)).resolves.toEqual([]);
    });
});

describe('escapeHtml', () => {
    it('should escape markup characters', () => {
        expect(escapeHtml('<a href="x">Tom & Jerry</a>')).toBe('&lt;a href=&quot;x&quot;&gt;Tom &amp; Jerry&lt;/a&gt;');
    });
});

describe('currency formatting', () => {
    it('should know the minor unit of a currency', () => {
        expect(currencyFractionDigits('JPY')).toBe(0);
        expect(currencyFractionDigits('USD')).toBe(2);
    });

    it('should format without trailing zeros', () => {
        expect(formatPrice(12000, 'JPY')).toBe('¥12,000');
        expect(formatPrice(12.5, 'USD')).toBe('$12.5');
        expect(formatPrice(12, 'USD')).toBe('$12');
    });
});

describe('minNullable', () => {
    it('should prefer a present value over an absent one', () => {
        expect(minNullable(null, 5)).toBe(5);
        expect(minNullable(5, null)).toBe(5);
        expect(minNullable(null, null)).toBeNull();
        expect(minNullable(7, 5)).toBe(5);
    });
});

describe('isRecord', () => {
    it('should accept plain objects only', () => {
        expect(isRecord({ a: 1 })).toBe(true);
        expect(isRecord([])).toBe(false);
        expect(isRecord(null)).toBe(false);
        expect(isRecord('x')).toBe(false);
    });
});
