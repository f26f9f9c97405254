import { log } from 'apify';
import { gotScraping } from 'crawlee';

import { EXCHANGE_RATE_API, EXCHANGE_RATE_KEY, HTTP_TIMEOUT_MS } from './constants.js';
import type { KeyValueBackend } from './store.js';
import { errorMessage, isRecord } from './utils.js';

const LOG_PREFIX = '[exchange-rate]';
const EPSILON = 1e-9;

export interface CachedExchangeRate {
    pair: string;
    rate: number;
    updatedAt: string; // ISO date
}

export interface ExchangeRateOptions {
    sourceCurrency: string;
    targetCurrency: string;
    fixedRate: number | null;
    maxAgeHours: number;
    cache: Pick<KeyValueBackend, 'getValue' | 'setValue'>;
    fetchQuotes?: () => Promise<unknown>;
    now?: () => Date;
}

/** Rounds to the nearest integer, ties to the even neighbour. */
export const roundHalfEven = (value: number): number => {
    const floor = Math.floor(value);
    const diff = value - floor;
    if (Math.abs(diff - 0.5) < EPSILON) return floor % 2 === 0 ? floor : floor + 1;
    return Math.round(value);
};

export const convertPrice = (price: number, rate: number | null, fractionDigits: number): number | null => {
    if (rate === null) return null;
    const factor = 10 ** fractionDigits;
    return roundHalfEven(price * rate * factor) / factor;
};

export const currencyPair = (source: string, target: string): string => `${source}_${target}`;

/**
 * The rate API quotes every currency against USD (`USDJPY`, `USDTWD`, …), so the cross rate is
 * `USD<target> / USD<source>`.
 */
export const crossRateFromQuotes = (quotes: unknown, source: string, target: string): number | null => {
    if (!isRecord(quotes)) return null;

    const quote = (currency: string): number | null => {
        if (currency === 'USD') return 1;
        const entry = quotes[`USD${currency}`];
        if (!isRecord(entry)) return null;
        const rate = Number(entry.Exrate);
        return Number.isFinite(rate) && rate > 0 ? rate : null;
    };

    const sourceQuote = quote(source);
    const targetQuote = quote(target);
    if (sourceQuote === null || targetQuote === null) return null;

    return targetQuote / sourceQuote;
};

const fetchQuotesFromApi = async (): Promise<unknown> => {
    const { body } = (await gotScraping({
        url: EXCHANGE_RATE_API,
        responseType: 'json',
        timeout: { request: HTTP_TIMEOUT_MS },
    })) as { body: unknown };
    return body;
};

const isCachedExchangeRate = (value: unknown): value is CachedExchangeRate =>
    isRecord(value) &&
    typeof value.pair === 'string' &&
    typeof value.rate === 'number' &&
    value.rate > 0 &&
    typeof value.updatedAt === 'string';

/**
 * Looks the exchange rate up once: fixed rate, then a fresh cached rate, then the live API, then a
 * stale cached rate. Returns null when none of them is available.
 */
export const resolveExchangeRate = async (options: ExchangeRateOptions): Promise<number | null> => {
    const { sourceCurrency, targetCurrency, fixedRate, maxAgeHours, cache } = options;
    const fetchQuotes = options.fetchQuotes ?? fetchQuotesFromApi;
    const now = options.now ?? (() => new Date());
    const pair = currencyPair(sourceCurrency, targetCurrency);

    if (fixedRate !== null) {
        log.info(`${LOG_PREFIX} Using fixed rate 1 ${sourceCurrency} = ${fixedRate} ${targetCurrency}`);
        return fixedRate;
    }
    if (sourceCurrency === targetCurrency) return 1;

    let cached: CachedExchangeRate | null = null;
    try {
        const value = await cache.getValue(EXCHANGE_RATE_KEY);
        cached = isCachedExchangeRate(value) && value.pair === pair ? value : null;
    } catch (error) {
        log.warning(`${LOG_PREFIX} Failed to read cached rate`, { error: errorMessage(error) });
    }

    const ageMs = cached ? now().getTime() - new Date(cached.updatedAt).getTime() : Infinity;
    if (cached && ageMs <= maxAgeHours * 3_600_000) {
        log.info(`${LOG_PREFIX} Cached rate 1 ${sourceCurrency} = ${cached.rate} ${targetCurrency}`, {
            updatedAt: cached.updatedAt,
        });
        return cached.rate;
    }

    let fetched: number | null = null;
    try {
        fetched = crossRateFromQuotes(await fetchQuotes(), sourceCurrency, targetCurrency);
        if (fetched === null) log.warning(`${LOG_PREFIX} Rate API returned no quote for ${pair}`);
    } catch (error) {
        log.warning(`${LOG_PREFIX} Failed to fetch rate for ${pair}`, { error: errorMessage(error) });
    }

    if (fetched !== null) {
        log.info(`${LOG_PREFIX} Fetched rate 1 ${sourceCurrency} = ${fetched} ${targetCurrency}`);
        const fresh: CachedExchangeRate = { pair, rate: fetched, updatedAt: now().toISOString() };
        try {
            await cache.setValue(EXCHANGE_RATE_KEY, fresh);
        } catch (error) {
            log.warning(`${LOG_PREFIX} Failed to cache rate`, { error: errorMessage(error) });
        }
        return fetched;
    }

    if (cached) {
        log.warning(`${LOG_PREFIX} Falling back to stale rate from ${cached.updatedAt}`);
        return cached.rate;
    }

    log.warning(`${LOG_PREFIX} No exchange rate available, converted prices are omitted`);
    return null;
};
