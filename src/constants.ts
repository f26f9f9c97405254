export const PAGE_DELAY_MS = 500;

export const INPUT_DEFAULTS = {
    trackedQueries: [],
    sourceCurrency: 'JPY',
    targetCurrency: 'TWD',
    exchangeRate: null,
    exchangeRateMaxAgeHours: 24,
    productStoreName: 'PRODUCTS',
    stateStoreName: 'STATE',
    maxConcurrency: 2,
    maxPages: 3,
    processIgnoreCommands: true,
};

export const EXCHANGE_RATE_KEY = 'EXCHANGE_RATE';
export const IGNORED_PRODUCTS_KEY = 'IGNORED_PRODUCTS';
export const TELEGRAM_OFFSET_KEY = 'TELEGRAM_OFFSET';

export const EXCHANGE_RATE_API = 'https://tw.rter.info/capi.php';
export const TELEGRAM_API = 'https://api.telegram.org';

export const MERCARI_SEARCH_API = 'https://api.mercari.jp/v2/entities:search';
export const MERCARI_ORIGIN = 'https://jp.mercari.com';
export const MERCARI_PAGE_SIZE = 120;

export const STORE_RETRY = {
    maxAttempts: 4,
    initialDelayMs: 100,
    backoffMultiplier: 2,
    maxDelayMs: 2_000,
};

export const STORE_CONCURRENCY = 8;

export const HTTP_TIMEOUT_MS = 10_000;
