import { log } from 'apify';

import { scrapeMercari } from './scrapers/mercari.js';
import type { RawListingItem, TrackedQuery } from './types.js';

export interface ListingSourceOptions {
    maxPages: number;
}

/** Produces the fully de-paginated listing items of one tracked query, in search order. */
export type ListingSource = (query: TrackedQuery, options: ListingSourceOptions) => Promise<RawListingItem[]>;

const LISTING_SOURCES: Record<string, ListingSource> = {
    'jp.mercari.com': scrapeMercari,
};

export const listingSourceFor = (query: TrackedQuery): ListingSource => {
    const { hostname } = new URL(query.url);
    const source = LISTING_SOURCES[hostname];
    if (!source) {
        throw new Error(`No listing source for ${hostname} (tracked query "${query.name}")`);
    }
    return source;
};

/** Routes each tracked query to the scraper of its site. */
export const fetchListings: ListingSource = async (query, options) => {
    const listings = await listingSourceFor(query)(query, options);
    log.info(`[sources] ${query.name}: scraped ${listings.length} listing items`);
    return listings;
};
