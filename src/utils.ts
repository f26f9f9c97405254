import { setTimeout } from 'node:timers/promises';

import { log } from 'apify';

export interface RetryPolicy {
    maxAttempts: number;
    initialDelayMs: number;
    backoffMultiplier: number;
    maxDelayMs: number;
}

export const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));

export const toError = (error: unknown): Error => (error instanceof Error ? error : new Error(String(error)));

export const backoffDelay = (policy: RetryPolicy, attempt: number): number =>
    Math.min(policy.initialDelayMs * policy.backoffMultiplier ** (attempt - 1), policy.maxDelayMs);

/**
 * Runs `operation` until it resolves or `policy.maxAttempts` is used up, sleeping with
 * exponential backoff between attempts. The last error is attached as `cause`.
 */
export const withRetry = async <T>(
    operation: (attempt: number) => Promise<T>,
    policy: RetryPolicy,
    label: string,
): Promise<T> => {
    let lastError: unknown;

    for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
        try {
            return await operation(attempt);
        } catch (error) {
            lastError = error;
            if (attempt < policy.maxAttempts) {
                const delay = backoffDelay(policy, attempt);
                log.warning(`${label} failed (attempt ${attempt}/${policy.maxAttempts}), retrying in ${delay}ms`, {
                    error: errorMessage(error),
                });
                await setTimeout(delay);
            }
        }
    }

    throw new Error(`${label} failed after ${policy.maxAttempts} attempts`, { cause: lastError });
};

/** Maps `items` with at most `limit` calls of `fn` in flight. Results keep input order. */
export const mapWithConcurrency = async <T, R>(
    items: readonly T[],
    limit: number,
    fn: (item: T, index: number) => Promise<R>,
): Promise<R[]> => {
    const results = new Array<R>(items.length);
    let next = 0;

    const worker = async (): Promise<void> => {
        while (next < items.length) {
            const index = next++;
            results[index] = await fn(items[index], index);
        }
    };

    const workerCount = Math.max(1, Math.min(limit, items.length));
    await Promise.all(Array.from({ length: workerCount }, worker));

    return results;
};

export const escapeHtml = (text: string): string =>
    text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;').replace(/"/g, '&quot;');

export const currencyFractionDigits = (currency: string): number =>
    new Intl.NumberFormat('en-US', { style: 'currency', currency }).resolvedOptions().maximumFractionDigits ?? 2;

export const formatPrice = (amount: number, currency: string): string =>
    new Intl.NumberFormat('en-US', {
        style: 'currency',
        currency,
        minimumFractionDigits: 0,
        maximumFractionDigits: currencyFractionDigits(currency),
    }).format(amount);

/** Lower of two optional prices; an absent side never wins over a present one. */
export const minNullable = (existing: number | null, incoming: number | null): number | null => {
    if (existing === null) return incoming;
    if (incoming === null) return existing;
    return Math.min(existing, incoming);
};

/** True when `value` is a plain JSON object (not null, not an array). */
export const isRecord = (value: unknown): value is Record<string, unknown> =>
    typeof value === 'object' && value !== null && !Array.isArray(value);
