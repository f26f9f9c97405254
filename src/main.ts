import { setTimeout } from 'node:timers/promises';

import { Actor, log } from 'apify';

import { resolveInput } from './config.js';
import { resolveExchangeRate } from './currency.js';
import { LogTransport, TelegramTransport } from './notifier.js';
import { runAll } from './run.js';
import { fetchListings } from './sources.js';
import { openStores } from './store.js';
import { loadIgnoredProducts, processIgnoreCommands, TelegramClient } from './telegram.js';
import type { Input, NotificationTransport } from './types.js';
import { currencyFractionDigits, errorMessage } from './utils.js';

await Actor.init();

Actor.on('aborting', async () => {
    // Temporary workaround until SDK implements proper state persistence in the aborting event:
    // https://github.com/apify/apify-sdk-js/pull/561
    await setTimeout(1000);
    await Actor.exit();
});

let input: Input;
try {
    input = resolveInput(await Actor.getInputOrThrow());
} catch (error) {
    await Actor.fail(`Invalid input: ${errorMessage(error)}`);
    throw error;
}

log.info('Starting listing price watch', {
    trackedQueries: input.trackedQueries.map(({ name }) => name),
    sourceCurrency: input.sourceCurrency,
    targetCurrency: input.targetCurrency,
    maxConcurrency: input.maxConcurrency,
    maxPages: input.maxPages,
});

const { state: stateStore, products: store } = await openStores(input, async (name) => Actor.openKeyValueStore(name));

const exchangeRate = await resolveExchangeRate({
    sourceCurrency: input.sourceCurrency,
    targetCurrency: input.targetCurrency,
    fixedRate: input.exchangeRate,
    maxAgeHours: input.exchangeRateMaxAgeHours,
    cache: stateStore,
});

let transport: NotificationTransport = new LogTransport();
let botUsername: string | null = null;
let ignored = await loadIgnoredProducts(stateStore);

if (input.telegramBotToken && input.telegramChatId) {
    const telegram = new TelegramClient(input.telegramBotToken);
    transport = new TelegramTransport(telegram, input.telegramChatId);
    botUsername = await telegram.getBotUsername();

    if (input.processIgnoreCommands) {
        try {
            ignored = await processIgnoreCommands(telegram, input.telegramChatId, stateStore);
        } catch (error) {
            log.warning('Failed to process /ignore commands', { error: errorMessage(error) });
        }
    }
} else {
    log.warning('Telegram credentials are not set, notifications are only logged');
}

const reports = await runAll(
    input.trackedQueries,
    {
        fetchListings,
        store,
        transport,
        notification: {
            sourceCurrency: input.sourceCurrency,
            targetCurrency: input.targetCurrency,
            botUsername,
        },
        exchangeRate,
        targetFractionDigits: currencyFractionDigits(input.targetCurrency),
        maxPages: input.maxPages,
        ignored,
    },
    input.maxConcurrency,
);

await Actor.setValue('RUN_REPORT', reports);

const failed = reports.filter(({ state }) => state === 'FAILED');
for (const { query, failedAt, error } of failed) {
    log.error(`Tracked query ${query} failed while ${failedAt}: ${error}`);
}

log.info(`Done. ${reports.length - failed.length}/${reports.length} tracked queries succeeded.`);

if (failed.length === reports.length) {
    await Actor.fail('Every tracked query failed');
} else {
    await Actor.exit();
}
