import type {
    ProductObservation,
    ProductSnapshot,
    ReconcileEvent,
    ReconcileResult,
    RecordMutation,
    TrackedProductRecord,
} from './types.js';
import { minNullable } from './utils.js';

export const createRecord = (query: string, observation: ProductObservation): TrackedProductRecord => ({
    id: observation.id,
    title: observation.title,
    priceSourceLast: observation.priceSource,
    priceConvertedLast: observation.priceConverted,
    imageRef: observation.imageRef,
    pageRef: observation.pageRef,
    firstSeen: observation.observedAt,
    lastUpdated: observation.observedAt,
    priceSourceLowest: observation.priceSource,
    priceConvertedLowest: observation.priceConverted,
    queries: [query],
});

export const updateRecord = (
    query: string,
    prior: TrackedProductRecord,
    observation: ProductObservation,
): TrackedProductRecord => ({
    ...prior,
    title: observation.title,
    priceSourceLast: observation.priceSource,
    priceConvertedLast: observation.priceConverted,
    imageRef: observation.imageRef,
    pageRef: observation.pageRef,
    lastUpdated: observation.observedAt > prior.firstSeen ? observation.observedAt : prior.firstSeen,
    priceSourceLowest: Math.min(prior.priceSourceLowest, observation.priceSource),
    priceConvertedLowest: minNullable(prior.priceConvertedLowest, observation.priceConverted),
    queries: prior.queries.includes(query) ? prior.queries : [...prior.queries, query],
});

/**
 * Compares one tracked query's observations with the stored records of the same ids.
 *
 * A product is a price drop only when it is strictly below the lowest price ever stored for it,
 * never against the previous price. Ids that are stored but no longer observed are left alone.
 * Events keep the order of `observations`.
 */
export const reconcile = (
    query: string,
    observations: readonly ProductObservation[],
    snapshot: ProductSnapshot,
): ReconcileResult => {
    const events: ReconcileEvent[] = [];
    const mutations: RecordMutation[] = [];

    for (const observation of observations) {
        const prior = snapshot.get(observation.id);

        if (!prior) {
            events.push({ kind: 'NEW', query, observation });
            mutations.push({ kind: 'create', record: createRecord(query, observation) });
            continue;
        }

        if (observation.priceSource < prior.priceSourceLowest) {
            const dropAmount = prior.priceSourceLowest - observation.priceSource;
            events.push({
                kind: 'PRICE_DROP',
                query,
                observation,
                previousLowest: prior.priceSourceLowest,
                previousLowestConverted: prior.priceConvertedLowest,
                dropAmount,
                dropPercent: (dropAmount * 100) / prior.priceSourceLowest,
            });
        }

        mutations.push({ kind: 'update', record: updateRecord(query, prior, observation) });
    }

    return { events, mutations };
};
