import { randomUUID } from 'node:crypto';
import { setTimeout } from 'node:timers/promises';

import { log } from 'apify';
import { gotScraping } from 'crawlee';
import { exportJWK, generateKeyPair, type GenerateKeyPairResult, type KeyLike, SignJWT } from 'jose';

import { HTTP_TIMEOUT_MS, MERCARI_PAGE_SIZE, MERCARI_SEARCH_API, PAGE_DELAY_MS } from '../constants.js';
import type { ListingSource } from '../sources.js';
import type { RawListingItem } from '../types.js';
import { isRecord } from '../utils.js';

// The search API is the one the jp.mercari.com web app calls. Every request carries a DPoP proof
// signed with a throwaway P-256 key; no account is involved.
const SOURCE = 'mercari' as const;
const LOG_PREFIX = `[${SOURCE}]`;

export interface SearchCondition {
    keyword: string;
    sort: string;
    order: string;
    status: string[];
    categoryId: number[];
    priceMin: number;
    priceMax: number;
}

export interface SearchPage {
    items: RawListingItem[];
    nextPageToken: string | null;
}

export type DpopKeyPair = GenerateKeyPairResult<KeyLike>;

const parseNonNegativeInt = (value: string | null): number => {
    if (value == null) return 0;
    const num = Number.parseInt(value, 10);
    return Number.isNaN(num) || num < 0 ? 0 : num;
};

/** Translates a jp.mercari.com search URL into the API's search condition, on-sale items only. */
export const buildSearchCondition = (searchUrl: string): SearchCondition => {
    const { searchParams } = new URL(searchUrl);
    const categoryId = (searchParams.get('category_id') ?? '')
        .split(',')
        .map((id) => Number.parseInt(id, 10))
        .filter((id) => !Number.isNaN(id));

    return {
        keyword: searchParams.get('keyword') ?? '',
        sort: `SORT_${(searchParams.get('sort') ?? 'created_time').toUpperCase()}`,
        order: `ORDER_${(searchParams.get('order') ?? 'desc').toUpperCase()}`,
        status: ['STATUS_ON_SALE'],
        categoryId,
        priceMin: parseNonNegativeInt(searchParams.get('price_min')),
        priceMax: parseNonNegativeInt(searchParams.get('price_max')),
    };
};

export const createDpopKeyPair = async (): Promise<DpopKeyPair> => generateKeyPair('ES256');

export const createDpopProof = async (
    url: string,
    method: string,
    keyPair: DpopKeyPair,
    now: Date = new Date(),
): Promise<string> => {
    const { kty, crv, x, y } = await exportJWK(keyPair.publicKey);

    return new SignJWT({ htu: url, htm: method, uuid: randomUUID() })
        .setProtectedHeader({ alg: 'ES256', typ: 'dpop+jwt', jwk: { kty, crv, x, y } })
        .setIssuedAt(Math.floor(now.getTime() / 1000))
        .setJti(randomUUID())
        .sign(keyPair.privateKey);
};

export const parseSearchResponse = (body: unknown): SearchPage => {
    if (!isRecord(body) || !Array.isArray(body.items)) {
        throw new Error(`${LOG_PREFIX} Unexpected search response shape`);
    }
    const nextPageToken = isRecord(body.meta) ? body.meta.nextPageToken : undefined;

    return {
        items: body.items.filter(isRecord),
        nextPageToken: typeof nextPageToken === 'string' && nextPageToken !== '' ? nextPageToken : null,
    };
};

const fetchSearchPage = async (
    condition: SearchCondition,
    pageToken: string,
    searchSessionId: string,
    keyPair: DpopKeyPair,
): Promise<SearchPage> => {
    const { body } = (await gotScraping({
        url: MERCARI_SEARCH_API,
        method: 'POST',
        headers: {
            DPoP: await createDpopProof(MERCARI_SEARCH_API, 'POST', keyPair),
            'X-Platform': 'web',
        },
        json: {
            userId: '',
            pageSize: MERCARI_PAGE_SIZE,
            pageToken,
            searchSessionId,
            indexRouting: 'INDEX_ROUTING_UNSPECIFIED',
            thumbnailTypes: [],
            searchCondition: condition,
            defaultDatasets: ['DATASET_TYPE_MERCARI', 'DATASET_TYPE_BEYOND'],
        },
        responseType: 'json',
        timeout: { request: HTTP_TIMEOUT_MS },
        retry: { limit: 2 },
    })) as { body: unknown };

    return parseSearchResponse(body);
};

export const scrapeMercari: ListingSource = async (query, { maxPages }) => {
    const condition = buildSearchCondition(query.url);
    const keyPair = await createDpopKeyPair();
    const searchSessionId = randomUUID().replace(/-/g, '');
    const results: RawListingItem[] = [];
    let pageToken = '';

    for (let page = 0; page < maxPages; page++) {
        log.info(`${LOG_PREFIX} Fetching page ${page} (${query.name})`, { keyword: condition.keyword });

        const { items, nextPageToken } = await fetchSearchPage(condition, pageToken, searchSessionId, keyPair);
        results.push(...items);

        if (!nextPageToken) break;
        pageToken = nextPageToken;
        await setTimeout(PAGE_DELAY_MS);
    }

    log.info(`${LOG_PREFIX} Done. Scraped ${results.length} items for ${query.name}.`);

    return results;
};
