import { INPUT_DEFAULTS } from './constants.js';
import { listingSourceFor } from './sources.js';
import type { Input, TrackedQuery } from './types.js';
import { errorMessage, isRecord } from './utils.js';

export class ConfigError extends Error {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = 'ConfigError';
    }
}

const optionalString = (value: unknown, field: string): string | undefined => {
    if (value == null || value === '') return undefined;
    if (typeof value !== 'string') throw new ConfigError(`${field} must be a string`);
    return value;
};

const positiveNumber = (value: unknown, fallback: number, field: string): number => {
    if (value == null) return fallback;
    if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
        throw new ConfigError(`${field} must be a positive number`);
    }
    return value;
};

const positiveInt = (value: unknown, fallback: number, field: string): number => {
    const num = positiveNumber(value, fallback, field);
    if (!Number.isInteger(num)) throw new ConfigError(`${field} must be a whole number`);
    return num;
};

// Chat ids are numeric, but the input may carry them as strings
const chatId = (value: unknown): string | undefined =>
    typeof value === 'number' && Number.isInteger(value) ? String(value) : optionalString(value, 'telegramChatId');

const currencyCode = (value: unknown, fallback: string, field: string): string => {
    const code = optionalString(value, field) ?? fallback;
    try {
        new Intl.NumberFormat('en-US', { style: 'currency', currency: code });
    } catch (error) {
        throw new ConfigError(`${field} is not a currency code: ${code}`, { cause: error });
    }
    return code.toUpperCase();
};

export const parseTrackedQuery = (value: unknown, index: number): TrackedQuery => {
    const label = `trackedQueries[${index}]`;
    if (!isRecord(value)) throw new ConfigError(`${label} must be an object`);

    const name = typeof value.name === 'string' ? value.name.trim() : '';
    const url = typeof value.url === 'string' ? value.url.trim() : '';
    if (name === '') throw new ConfigError(`${label}.name is required`);
    if (url === '') throw new ConfigError(`${label}.url is required`);

    const query: TrackedQuery = { name, url, maxConverted: null };
    try {
        listingSourceFor(query);
    } catch (error) {
        throw new ConfigError(`${label}.url is not supported: ${errorMessage(error)}`, { cause: error });
    }

    if (value.maxConverted != null) {
        if (typeof value.maxConverted !== 'number' || !Number.isFinite(value.maxConverted) || value.maxConverted < 0) {
            throw new ConfigError(`${label}.maxConverted must be a non-negative number`);
        }
        query.maxConverted = value.maxConverted;
    }

    return query;
};

/**
 * Merges the actor input over `INPUT_DEFAULTS` and validates it. Telegram credentials fall back to
 * the TELEGRAM_BOT_TOKEN and TELEGRAM_CHAT_ID environment variables.
 */
export const resolveInput = (raw: unknown, env: NodeJS.ProcessEnv = process.env): Input => {
    if (!isRecord(raw)) throw new ConfigError('Input must be an object');

    if (!Array.isArray(raw.trackedQueries) || raw.trackedQueries.length === 0) {
        throw new ConfigError('trackedQueries must list at least one query');
    }
    const trackedQueries = raw.trackedQueries.map((value: unknown, index: number) => parseTrackedQuery(value, index));
    const names = new Set<string>();
    for (const { name } of trackedQueries) {
        if (names.has(name)) throw new ConfigError(`Duplicate tracked query name: ${name}`);
        names.add(name);
    }

    const exchangeRate =
        raw.exchangeRate == null ? INPUT_DEFAULTS.exchangeRate : positiveNumber(raw.exchangeRate, 0, 'exchangeRate');

    return {
        trackedQueries,
        sourceCurrency: currencyCode(raw.sourceCurrency, INPUT_DEFAULTS.sourceCurrency, 'sourceCurrency'),
        targetCurrency: currencyCode(raw.targetCurrency, INPUT_DEFAULTS.targetCurrency, 'targetCurrency'),
        exchangeRate,
        exchangeRateMaxAgeHours: positiveNumber(
            raw.exchangeRateMaxAgeHours,
            INPUT_DEFAULTS.exchangeRateMaxAgeHours,
            'exchangeRateMaxAgeHours',
        ),
        productStoreName: optionalString(raw.productStoreName, 'productStoreName') ?? INPUT_DEFAULTS.productStoreName,
        stateStoreName: optionalString(raw.stateStoreName, 'stateStoreName') ?? INPUT_DEFAULTS.stateStoreName,
        maxConcurrency: positiveInt(raw.maxConcurrency, INPUT_DEFAULTS.maxConcurrency, 'maxConcurrency'),
        maxPages: positiveInt(raw.maxPages, INPUT_DEFAULTS.maxPages, 'maxPages'),
        processIgnoreCommands:
            typeof raw.processIgnoreCommands === 'boolean'
                ? raw.processIgnoreCommands
                : INPUT_DEFAULTS.processIgnoreCommands,
        telegramBotToken:
            optionalString(raw.telegramBotToken, 'telegramBotToken') ?? optionalString(env.TELEGRAM_BOT_TOKEN, 'env'),
        telegramChatId: chatId(raw.telegramChatId) ?? optionalString(env.TELEGRAM_CHAT_ID, 'env'),
    };
};
