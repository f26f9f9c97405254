import { log } from 'apify';

import { convertPrice } from './currency.js';
import { emitEvents, type NotificationOptions } from './notifier.js';
import { normalizeListings } from './normalizer.js';
import { reconcile } from './reconcile.js';
import type { ListingSource } from './sources.js';
import type { ProductStore } from './store.js';
import type {
    CommitSummary,
    EmitSummary,
    NotificationTransport,
    ReconcileResult,
    RunReport,
    RunState,
    TrackedQuery,
} from './types.js';
import { errorMessage, mapWithConcurrency } from './utils.js';

export interface RunDependencies {
    fetchListings: ListingSource;
    store: Pick<ProductStore, 'getMany' | 'commit'>;
    transport: NotificationTransport;
    notification: Omit<NotificationOptions, 'maxConverted'>;
    exchangeRate: number | null;
    targetFractionDigits: number;
    maxPages: number;
    ignored?: ReadonlySet<string>;
    now?: () => Date;
}

const emptyEmitSummary = (): EmitSummary => ({ sent: 0, failed: 0, skipped: 0, overBudget: 0 });
const emptyCommitSummary = (): CommitSummary => ({ applied: 0, failed: 0 });

/**
 * Runs one tracked query: FETCHING → NORMALIZING → RECONCILING → NOTIFYING → COMMITTING → DONE.
 *
 * Any failure before notifying ends the run in FAILED with nothing sent and nothing written.
 * Once the mutations exist they are committed, whatever happened to the notifications.
 * Never throws; the outcome is in the returned report.
 */
export const runTrackedQuery = async (query: TrackedQuery, deps: RunDependencies): Promise<RunReport> => {
    const logPrefix = `[run:${query.name}]`;
    const now = deps.now ?? (() => new Date());
    const report: RunReport = {
        query: query.name,
        state: 'FETCHING',
        failedAt: null,
        scraped: 0,
        dropped: 0,
        unreadable: 0,
        newProducts: 0,
        priceDrops: 0,
        notifications: emptyEmitSummary(),
        commit: emptyCommitSummary(),
    };

    const enter = (state: RunState): void => {
        report.state = state;
        log.debug(`${logPrefix} ${state}`);
    };

    let result: ReconcileResult;
    try {
        enter('FETCHING');
        const items = await deps.fetchListings(query, { maxPages: deps.maxPages });
        report.scraped = items.length;

        enter('NORMALIZING');
        const { observations, dropped } = normalizeListings(items, {
            query: query.name,
            observedAt: now().toISOString(),
            convert: (price) => convertPrice(price, deps.exchangeRate, deps.targetFractionDigits),
        });
        report.dropped = dropped;

        enter('RECONCILING');
        const { records, unreadable } = await deps.store.getMany(observations.map(({ id }) => id));
        // Unreadable records are left out of this run rather than overwritten
        const readable = observations.filter(({ id }) => !unreadable.includes(id));
        report.unreadable = unreadable.length;
        result = reconcile(query.name, readable, records);
        report.newProducts = result.events.filter((event) => event.kind === 'NEW').length;
        report.priceDrops = result.events.length - report.newProducts;
        log.info(`${logPrefix} History stats`, {
            observed: readable.length,
            known: readable.length - report.newProducts,
            newProducts: report.newProducts,
            priceDrops: report.priceDrops,
            unreadable: report.unreadable,
        });
    } catch (error) {
        report.failedAt = report.state;
        report.state = 'FAILED';
        report.error = errorMessage(error);
        log.error(`${logPrefix} Failed while ${report.failedAt}: ${report.error}`);
        return report;
    }

    try {
        enter('NOTIFYING');
        report.notifications = await emitEvents(result.events, deps.transport, {
            ...deps.notification,
            maxConverted: query.maxConverted,
            ignored: deps.ignored,
        });
    } catch (error) {
        log.warning(`${logPrefix} Notifying stopped early, committing anyway`, { error: errorMessage(error) });
    }

    try {
        enter('COMMITTING');
        report.commit = await deps.store.commit(result.mutations);
    } catch (error) {
        report.failedAt = 'COMMITTING';
        report.state = 'FAILED';
        report.error = errorMessage(error);
        log.error(`${logPrefix} Failed while COMMITTING: ${report.error}`);
        return report;
    }

    enter('DONE');
    log.info(`${logPrefix} Done`, {
        scraped: report.scraped,
        dropped: report.dropped,
        unreadable: report.unreadable,
        newProducts: report.newProducts,
        priceDrops: report.priceDrops,
        notifications: report.notifications,
        commit: report.commit,
    });

    return report;
};

/** Runs every tracked query with at most `maxConcurrency` in flight. One failing query never stops the others. */
export const runAll = async (
    queries: readonly TrackedQuery[],
    deps: RunDependencies,
    maxConcurrency: number,
): Promise<RunReport[]> => mapWithConcurrency(queries, maxConcurrency, async (query) => runTrackedQuery(query, deps));
