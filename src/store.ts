import { log } from 'apify';

import { STORE_CONCURRENCY, STORE_RETRY } from './constants.js';
import type { CommitSummary, Input, RecordMutation, StoreSnapshot, TrackedProductRecord } from './types.js';
import { isRecord, mapWithConcurrency, minNullable, toError, type RetryPolicy, withRetry } from './utils.js';

const LOG_PREFIX = '[store]';
const RECORD_PREFIX = 'product_';
const ENCODED_RECORD_PREFIX = 'product.';
const SAFE_KEY_CHARS = /^[a-zA-Z0-9!\-_.'()]+$/;
const MAX_PLAIN_ID_LENGTH = 200;

/** The subset of an Apify key-value store the product store relies on. */
export interface KeyValueBackend {
    getValue(key: string): Promise<unknown>;
    setValue(key: string, value: unknown): Promise<void>;
    forEachKey(iteratee: (key: string, index: number) => Promise<void> | void): Promise<void>;
}

/**
 * Store keys only accept a small character set, so ids outside of it are base64url encoded
 * under a different prefix. The two prefixes never collide.
 */
export const recordKey = (id: string): string =>
    SAFE_KEY_CHARS.test(id) && id.length <= MAX_PLAIN_ID_LENGTH
        ? `${RECORD_PREFIX}${id}`
        : `${ENCODED_RECORD_PREFIX}${Buffer.from(id, 'utf8').toString('base64url')}`;

const isRecordKey = (key: string): boolean => key.startsWith(RECORD_PREFIX) || key.startsWith(ENCODED_RECORD_PREFIX);

const isNullableNumber = (value: unknown): value is number | null => value === null || typeof value === 'number';

export const isTrackedProductRecord = (value: unknown): value is TrackedProductRecord =>
    isRecord(value) &&
    typeof value.id === 'string' &&
    typeof value.title === 'string' &&
    typeof value.priceSourceLast === 'number' &&
    isNullableNumber(value.priceConvertedLast) &&
    (value.imageRef === null || typeof value.imageRef === 'string') &&
    typeof value.pageRef === 'string' &&
    typeof value.firstSeen === 'string' &&
    typeof value.lastUpdated === 'string' &&
    typeof value.priceSourceLowest === 'number' &&
    isNullableNumber(value.priceConvertedLowest) &&
    Array.isArray(value.queries);

/**
 * Merges an incoming record into the freshly read prior one. `firstSeen` is kept, last-* fields are
 * overwritten and lowest-* fields only ever go down.
 */
export const mergeRecord = (
    prior: TrackedProductRecord | null,
    incoming: TrackedProductRecord,
): TrackedProductRecord => {
    if (!prior) {
        return {
            ...incoming,
            priceSourceLowest: Math.min(incoming.priceSourceLowest, incoming.priceSourceLast),
            priceConvertedLowest: minNullable(incoming.priceConvertedLowest, incoming.priceConvertedLast),
            queries: [...new Set(incoming.queries)],
        };
    }

    const lastUpdated = incoming.lastUpdated > prior.firstSeen ? incoming.lastUpdated : prior.firstSeen;

    return {
        id: prior.id,
        title: incoming.title,
        priceSourceLast: incoming.priceSourceLast,
        priceConvertedLast: incoming.priceConvertedLast,
        imageRef: incoming.imageRef,
        pageRef: incoming.pageRef,
        firstSeen: prior.firstSeen,
        lastUpdated,
        priceSourceLowest: Math.min(prior.priceSourceLowest, incoming.priceSourceLast),
        priceConvertedLowest: minNullable(prior.priceConvertedLowest, incoming.priceConvertedLast),
        queries: [...new Set([...prior.queries, ...incoming.queries])],
    };
};

/** Serializes async work per key. Different keys run independently. */
export class KeyedLock {
    private readonly tails = new Map<string, Promise<void>>();

    async run<T>(key: string, task: () => Promise<T>): Promise<T> {
        const previous = this.tails.get(key) ?? Promise.resolve();
        let release: () => void = () => undefined;
        const current = new Promise<void>((resolve) => {
            release = resolve;
        });
        const tail = previous.then(() => current);
        this.tails.set(key, tail);

        try {
            await previous;
            return await task();
        } finally {
            release();
            if (this.tails.get(key) === tail) this.tails.delete(key);
        }
    }

    get size(): number {
        return this.tails.size;
    }
}

export class UnreadableRecordError extends Error {
    constructor(readonly productId: string) {
        super(`${LOG_PREFIX} Stored value for product ${productId} is not a product record`);
        this.name = 'UnreadableRecordError';
    }
}

export class ProductStore {
    private readonly lock = new KeyedLock();

    constructor(
        private readonly backend: KeyValueBackend,
        private readonly retryPolicy: RetryPolicy = STORE_RETRY,
        private readonly concurrency: number = STORE_CONCURRENCY,
    ) {}

    private async read(id: string): Promise<TrackedProductRecord | null> {
        const value = await this.backend.getValue(recordKey(id));
        if (value === null) return null;
        if (!isTrackedProductRecord(value)) {
            throw new UnreadableRecordError(id);
        }
        return value;
    }

    /** Every record tagged with the given tracked query. */
    async getAll(query: string): Promise<Map<string, TrackedProductRecord>> {
        const records = new Map<string, TrackedProductRecord>();

        await this.backend.forEachKey(async (key) => {
            if (!isRecordKey(key)) return;
            const value = await this.backend.getValue(key);
            if (isTrackedProductRecord(value) && value.queries.includes(query)) {
                records.set(value.id, value);
            }
        });

        return records;
    }

    /**
     * Fresh read of the given ids; ids without a record are absent from `records`. A stored value
     * that is not a product record is logged and its id listed in `unreadable`.
     */
    async getMany(ids: Iterable<string>): Promise<StoreSnapshot> {
        const unique = [...new Set(ids)];
        const unreadable: string[] = [];

        const found = await mapWithConcurrency(unique, this.concurrency, async (id) => {
            try {
                return await this.read(id);
            } catch (error) {
                if (!(error instanceof UnreadableRecordError)) throw error;
                log.warning(error.message);
                unreadable.push(id);
                return null;
            }
        });

        const records = new Map<string, TrackedProductRecord>();
        for (const record of found) {
            if (record) records.set(record.id, record);
        }
        return { records, unreadable: unique.filter((id) => unreadable.includes(id)) };
    }

    /**
     * Creates or updates one record. The prior value is re-read under the id's lock right before
     * the write, so the lowest price is never derived from a stale copy.
     */
    async upsert(incoming: TrackedProductRecord): Promise<TrackedProductRecord> {
        return this.lock.run(incoming.id, async () =>
            withRetry(
                async () => {
                    const prior = await this.read(incoming.id);
                    const merged = mergeRecord(prior, incoming);
                    await this.backend.setValue(recordKey(incoming.id), merged);
                    return merged;
                },
                this.retryPolicy,
                `${LOG_PREFIX} Upsert of product ${incoming.id}`,
            ),
        );
    }

    /**
     * Applies mutations record by record, a few ids at a time. A record that keeps failing is logged
     * and counted; the other records are still written.
     */
    async commit(mutations: readonly RecordMutation[]): Promise<CommitSummary> {
        const outcomes = await mapWithConcurrency(mutations, this.concurrency, async ({ kind, record }) => {
            try {
                await this.upsert(record);
                return true;
            } catch (error) {
                log.exception(toError(error), `${LOG_PREFIX} Failed to ${kind} product ${record.id}`);
                return false;
            }
        });

        const applied = outcomes.filter(Boolean).length;
        return { applied, failed: outcomes.length - applied };
    }
}

export type OpenKeyValueStore = (name: string) => Promise<KeyValueBackend>;

export interface ActorStores {
    state: KeyValueBackend;
    products: ProductStore;
}

/**
 * Opens the named state and product stores. State must not live in the default store: that one is
 * purged when the next run starts.
 */
export const openStores = async (
    names: Pick<Input, 'stateStoreName' | 'productStoreName'>,
    open: OpenKeyValueStore,
): Promise<ActorStores> => ({
    state: await open(names.stateStoreName),
    products: new ProductStore(await open(names.productStoreName)),
});
