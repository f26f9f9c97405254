export interface TrackedQuery {
    name: string; // reconciliation namespace, also used to tag stored records
    url: string; // marketplace search URL
    maxConverted?: number | null; // budget in the target currency, null = no budget
}

export interface Input {
    trackedQueries: TrackedQuery[];
    sourceCurrency: string;
    targetCurrency: string;
    exchangeRate: number | null; // null = look it up
    exchangeRateMaxAgeHours: number;
    productStoreName: string;
    stateStoreName: string; // named KV store for the rate cache, ignore list and Telegram offset
    maxConcurrency: number;
    maxPages: number;
    processIgnoreCommands: boolean;
    telegramBotToken?: string;
    telegramChatId?: string;
}

/** One item as the search API returns it. Every field is untrusted. */
export interface RawListingItem {
    id?: unknown;
    name?: unknown;
    price?: unknown;
    thumbnails?: unknown;
    photos?: unknown;
    [key: string]: unknown;
}

export interface ProductObservation {
    id: string;
    title: string;
    priceSource: number;
    priceConverted: number | null; // null when no exchange rate was available
    imageRef: string | null;
    pageRef: string;
    observedAt: string; // ISO date
}

export interface TrackedProductRecord {
    id: string;
    title: string;
    priceSourceLast: number;
    priceConvertedLast: number | null;
    imageRef: string | null;
    pageRef: string;
    firstSeen: string; // ISO date, never changes after creation
    lastUpdated: string; // ISO date
    priceSourceLowest: number;
    priceConvertedLowest: number | null;
    queries: string[]; // tracked queries that have observed this product
}

export type ProductSnapshot = ReadonlyMap<string, TrackedProductRecord>;

export interface StoreSnapshot {
    records: ProductSnapshot;
    unreadable: string[]; // ids whose stored value is not a product record
}

export type EventKind = 'NEW' | 'PRICE_DROP';

export interface NewProductEvent {
    kind: 'NEW';
    query: string;
    observation: ProductObservation;
}

export interface PriceDropEvent {
    kind: 'PRICE_DROP';
    query: string;
    observation: ProductObservation;
    previousLowest: number;
    previousLowestConverted: number | null;
    dropAmount: number;
    dropPercent: number;
}

export type ReconcileEvent = NewProductEvent | PriceDropEvent;

export interface RecordMutation {
    kind: 'create' | 'update';
    record: TrackedProductRecord;
}

export interface ReconcileResult {
    events: ReconcileEvent[];
    mutations: RecordMutation[];
}

export interface NotificationPayload {
    kind: EventKind;
    productId: string;
    text: string; // Telegram HTML
    imageRef: string | null;
    pageRef: string;
}

export interface NotificationTransport {
    deliver(payload: NotificationPayload): Promise<boolean>;
}

export type RunState = 'FETCHING' | 'NORMALIZING' | 'RECONCILING' | 'NOTIFYING' | 'COMMITTING' | 'DONE' | 'FAILED';

export interface EmitSummary {
    sent: number;
    failed: number;
    skipped: number; // ignored products
    overBudget: number;
}

export interface CommitSummary {
    applied: number;
    failed: number;
}

export interface RunReport {
    query: string;
    state: RunState;
    failedAt: RunState | null; // step that was running when the run failed
    scraped: number;
    dropped: number;
    unreadable: number; // observed ids skipped because their stored record is unreadable
    newProducts: number;
    priceDrops: number;
    notifications: EmitSummary;
    commit: CommitSummary;
    error?: string;
}
