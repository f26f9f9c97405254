import { exportJWK, jwtVerify } from 'jose';
import { describe, expect, it } from 'vitest';

import {
    buildSearchCondition,
    createDpopKeyPair,
    createDpopProof,
    parseSearchResponse,
} from '../scrapers/mercari.js';

describe('buildSearchCondition', () => {
    it('should translate the search url parameters', () => {
        const condition = buildSearchCondition(
            'https://jp.mercari.com/search?keyword=film%20camera&sort=price&order=asc' +
                '&category_id=7,8&price_min=1000&price_max=5000',
        );

        expect(condition).toEqual({
            keyword: 'film camera',
            sort: 'SORT_PRICE',
            order: 'ORDER_ASC',
            status: ['STATUS_ON_SALE'],
            categoryId: [7, 8],
            priceMin: 1000,
            priceMax: 5000,
        });
    });

    it('should default to the newest on-sale items without price bounds', () => {
        expect(buildSearchCondition('https://jp.mercari.com/search?keyword=lens&price_min=abc')).toEqual({
            keyword: 'lens',
            sort: 'SORT_CREATED_TIME',
            order: 'ORDER_DESC',
            status: ['STATUS_ON_SALE'],
            categoryId: [],
            priceMin: 0,
            priceMax: 0,
        });
    });
});

describe('createDpopProof', () => {
    it('should sign a proof bound to the url and method with the embedded key', async () => {
        const keyPair = await createDpopKeyPair();
        const now = new Date('2026-03-01T10:00:00.000Z');

        const proof = await createDpopProof('https://api.example.com/search', 'POST', keyPair, now);
        const { payload, protectedHeader } = await jwtVerify(proof, keyPair.publicKey, { typ: 'dpop+jwt' });

        expect(protectedHeader).toMatchObject({ alg: 'ES256', typ: 'dpop+jwt' });
        expect(protectedHeader.jwk).toEqual(await exportJWK(keyPair.publicKey));
        expect(payload).toMatchObject({ iat: 1772359200, htu: 'https://api.example.com/search', htm: 'POST' });
        expect(typeof payload.jti).toBe('string');
    });

    it('should use a fresh jti for every proof', async () => {
        const keyPair = await createDpopKeyPair();

        const proofs = await Promise.all([
            createDpopProof('https://api.example.com/search', 'POST', keyPair),
            createDpopProof('https://api.example.com/search', 'POST', keyPair),
        ]);
        const jtis = await Promise.all(
            proofs.map(async (proof) => (await jwtVerify(proof, keyPair.publicKey)).payload.jti),
        );

        expect(new Set(jtis).size).toBe(2);
    });
});

describe('parseSearchResponse', () => {
    it('should return the items and the next page token', () => {
        const page = parseSearchResponse({
            items: [{ id: 'm1', price: '1000' }, 'garbage', { id: 'm2', price: '2000' }],
            meta: { nextPageToken: 'v1:1' },
        });

        expect(page).toEqual({
            items: [
                { id: 'm1', price: '1000' },
                { id: 'm2', price: '2000' },
            ],
            nextPageToken: 'v1:1',
        });
    });

    it('should treat an empty token as the last page', () => {
        expect(parseSearchResponse({ items: [], meta: { nextPageToken: '' } }).nextPageToken).toBeNull();
        expect(parseSearchResponse({ items: [] }).nextPageToken).toBeNull();
    });

    it('should throw on an unexpected shape', () => {
        expect(() => parseSearchResponse({ error: 'blocked' })).toThrow('[mercari] Unexpected search response shape');
        expect(() => parseSearchResponse(null)).toThrow('[mercari] Unexpected search response shape');
    });
});
