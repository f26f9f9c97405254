import { log } from 'apify';

import { MERCARI_ORIGIN } from './constants.js';
import type { ProductObservation, RawListingItem } from './types.js';
import { isRecord } from './utils.js';

export interface NormalizeContext {
    query: string;
    observedAt: string;
    /** Applied to every accepted price; returns null when no rate is available. */
    convert: (priceSource: number) => number | null;
}

export interface NormalizeResult {
    observations: ProductObservation[];
    dropped: number;
}

export const parsePrice = (value: unknown): number | null => {
    if (typeof value === 'number') return Number.isFinite(value) && value > 0 ? value : null;
    if (typeof value !== 'string') return null;
    const trimmed = value.replace(/,/g, '').trim();
    if (trimmed === '') return null;
    const num = Number(trimmed);
    return Number.isFinite(num) && num > 0 ? num : null;
};

export const resolveImageRef = (item: RawListingItem): string | null => {
    const { thumbnails, photos } = item;
    if (Array.isArray(thumbnails) && typeof thumbnails[0] === 'string' && thumbnails[0] !== '') {
        return thumbnails[0];
    }
    if (Array.isArray(photos) && isRecord(photos[0])) {
        const { uri } = photos[0];
        if (typeof uri === 'string' && uri !== '') return uri;
    }
    return null;
};

// Shop products use a different page path than items listed by individuals ("m" prefix)
export const buildPageRef = (id: string): string =>
    id.startsWith('m') ? `${MERCARI_ORIGIN}/item/${id}` : `${MERCARI_ORIGIN}/products/${id}`;

export const normalizeItem = (item: RawListingItem, context: NormalizeContext): ProductObservation | null => {
    const id = typeof item.id === 'string' ? item.id.trim() : '';
    if (id === '') return null;

    const priceSource = parsePrice(item.price);
    if (priceSource === null) return null;

    return {
        id,
        title: typeof item.name === 'string' ? item.name.trim() : '',
        priceSource,
        priceConverted: context.convert(priceSource),
        imageRef: resolveImageRef(item),
        pageRef: buildPageRef(id),
        observedAt: context.observedAt,
    };
};

export const normalizeListings = (items: readonly RawListingItem[], context: NormalizeContext): NormalizeResult => {
    const observations: ProductObservation[] = [];
    const seen = new Set<string>();
    let dropped = 0;

    for (const item of items) {
        const observation = normalizeItem(item, context);
        if (!observation || seen.has(observation.id)) {
            dropped++;
            continue;
        }
        seen.add(observation.id);
        observations.push(observation);
    }

    if (dropped > 0) {
        log.debug(`[normalizer:${context.query}] Dropped ${dropped} of ${items.length} listing items`);
    }

    return { observations, dropped };
};
