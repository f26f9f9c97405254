import { log } from 'apify';

import type { TelegramApi } from './telegram.js';
import type {
    EmitSummary,
    NotificationPayload,
    NotificationTransport,
    PriceDropEvent,
    ProductObservation,
    ReconcileEvent,
} from './types.js';
import { errorMessage, escapeHtml, formatPrice } from './utils.js';

const LOG_PREFIX = '[notifier]';
const CAPTION_LIMIT = 1024;

export interface NotificationOptions {
    sourceCurrency: string;
    targetCurrency: string;
    maxConverted?: number | null;
    botUsername?: string | null;
}

export interface EmitOptions extends NotificationOptions {
    ignored?: ReadonlySet<string>;
}

export const TITLES = {
    NEW: 'New listing',
    NEW_WITHIN_BUDGET: 'New listing within budget',
    PRICE_DROP: 'Price dropped',
    PRICE_DROP_INTO_BUDGET: 'Price dropped into budget',
} as const;

const isWithinBudget = (price: number | null, budget: number | null | undefined): boolean =>
    budget != null && price !== null && price > 0 && price <= budget;

export const headlineFor = (event: ReconcileEvent, maxConverted?: number | null): string => {
    const { priceConverted } = event.observation;
    if (event.kind === 'NEW') {
        return isWithinBudget(priceConverted, maxConverted) ? TITLES.NEW_WITHIN_BUDGET : TITLES.NEW;
    }
    const wasOverBudget =
        maxConverted != null &&
        event.previousLowestConverted !== null &&
        event.previousLowestConverted > maxConverted;
    return wasOverBudget && isWithinBudget(priceConverted, maxConverted)
        ? TITLES.PRICE_DROP_INTO_BUDGET
        : TITLES.PRICE_DROP;
};

const convertedLine = (observation: ProductObservation, targetCurrency: string): string | null =>
    observation.priceConverted === null
        ? null
        : `${targetCurrency}: ${formatPrice(observation.priceConverted, targetCurrency)}`;

const dropLine = (event: PriceDropEvent, sourceCurrency: string): string => {
    const previous = formatPrice(event.previousLowest, sourceCurrency);
    const current = formatPrice(event.observation.priceSource, sourceCurrency);
    const delta = formatPrice(event.dropAmount, sourceCurrency);
    return `${sourceCurrency}: <s>${previous}</s> -> ${current}  -${delta} (${event.dropPercent.toFixed(1)}%)`;
};

export const buildIgnoreLink = (botUsername: string, productId: string): string => {
    const command = `/ignore ${productId}`;
    const href = `https://t.me/${botUsername}?text=${encodeURIComponent(command)}`;
    return `<a href="${escapeHtml(href)}">${escapeHtml(command)}</a>`;
};

export const buildNotification = (event: ReconcileEvent, options: NotificationOptions): NotificationPayload => {
    const { observation } = event;
    const { sourceCurrency, targetCurrency } = options;

    const priceLines =
        event.kind === 'PRICE_DROP'
            ? [dropLine(event, sourceCurrency)]
            : [`${sourceCurrency}: ${formatPrice(observation.priceSource, sourceCurrency)}`];
    const converted = convertedLine(observation, targetCurrency);
    if (converted) priceLines.push(converted);

    const lines = [
        `<b>${headlineFor(event, options.maxConverted)}</b>`,
        '',
        `<b>${escapeHtml(observation.title || observation.id)}</b>`,
        ...priceLines,
        `<a href="${escapeHtml(observation.pageRef)}">View item</a>`,
    ];
    if (options.botUsername) lines.push(buildIgnoreLink(options.botUsername, observation.id));

    return {
        kind: event.kind,
        productId: observation.id,
        text: lines.join('\n'),
        imageRef: observation.imageRef,
        pageRef: observation.pageRef,
    };
};

/**
 * Sends one notification per event, in order. Delivery is best effort: a failed event is logged
 * and counted, and the next one is still sent.
 *
 * With a budget (`maxConverted`) only events whose converted price is known and within it are sent.
 */
export const emitEvents = async (
    events: readonly ReconcileEvent[],
    transport: NotificationTransport,
    options: EmitOptions,
): Promise<EmitSummary> => {
    const summary: EmitSummary = { sent: 0, failed: 0, skipped: 0, overBudget: 0 };
    const { maxConverted } = options;

    for (const event of events) {
        const productId = event.observation.id;
        if (options.ignored?.has(productId)) {
            summary.skipped++;
            continue;
        }
        if (maxConverted != null && !isWithinBudget(event.observation.priceConverted, maxConverted)) {
            summary.overBudget++;
            continue;
        }

        try {
            const delivered = await transport.deliver(buildNotification(event, options));
            if (delivered) {
                summary.sent++;
            } else {
                summary.failed++;
                log.warning(`${LOG_PREFIX} ${event.kind} notification for ${productId} was not delivered`);
            }
        } catch (error) {
            summary.failed++;
            log.warning(`${LOG_PREFIX} ${event.kind} notification for ${productId} failed`, {
                error: errorMessage(error),
            });
        }
    }

    return summary;
};

export class TelegramTransport implements NotificationTransport {
    constructor(
        private readonly api: TelegramApi,
        private readonly chatId: string,
    ) {}

    async deliver(payload: NotificationPayload): Promise<boolean> {
        if (payload.imageRef && payload.text.length <= CAPTION_LIMIT) {
            await this.api.sendPhoto(this.chatId, payload.imageRef, payload.text);
        } else {
            await this.api.sendMessage(this.chatId, payload.text);
        }
        return true;
    }
}

/** Used when no Telegram credentials are configured: events are only logged. */
export class LogTransport implements NotificationTransport {
    async deliver(payload: NotificationPayload): Promise<boolean> {
        log.info(`${LOG_PREFIX} ${payload.kind} ${payload.productId}`, { pageRef: payload.pageRef });
        return true;
    }
}
