import { log } from 'apify';
import { beforeEach, describe, expect, it, vi } from 'vitest';

import {
    buildIgnoreLink,
    buildNotification,
    emitEvents,
    headlineFor,
    TelegramTransport,
    TITLES,
} from '../notifier.js';
import type { NewProductEvent, PriceDropEvent } from '../types.js';
import { FakeTelegramApi, observation, RecordingTransport } from './fakes.js';

const OPTIONS = { sourceCurrency: 'JPY', targetCurrency: 'TWD' };

const newEvent = (overrides: Parameters<typeof observation>[0] = {}): NewProductEvent => ({
    kind: 'NEW',
    query: 'cameras',
    observation: observation(overrides),
});

const dropEvent = (overrides: Partial<PriceDropEvent> = {}): PriceDropEvent => ({
    kind: 'PRICE_DROP',
    query: 'cameras',
    observation: observation({ priceSource: 800, priceConverted: 168 }),
    previousLowest: 1000,
    previousLowestConverted: 210,
    dropAmount: 200,
    dropPercent: 20,
    ...overrides,
});

describe('buildNotification', () => {
    it('should format a new listing', () => {
        const payload = buildNotification(newEvent(), { ...OPTIONS, botUsername: 'watch_bot' });

        expect(payload).toEqual({
            kind: 'NEW',
            productId: 'p1',
            text: [
                '<b>New listing</b>',
                '',
                '<b>Test Camera</b>',
                'JPY: ¥1,000',
                'TWD: NT$210',
                '<a href="https://jp.mercari.com/products/p1">View item</a>',
                '<a href="https://t.me/watch_bot?text=%2Fignore%20p1">/ignore p1</a>',
            ].join('\n'),
            imageRef: 'https://static.example.com/p1.jpg',
            pageRef: 'https://jp.mercari.com/products/p1',
        });
    });

    it('should format a price drop with the old lowest struck through', () => {
        const payload = buildNotification(dropEvent(), OPTIONS);

        expect(payload.text).toBe(
            [
                '<b>Price dropped</b>',
                '',
                '<b>Test Camera</b>',
                'JPY: <s>¥1,000</s> -> ¥800  -¥200 (20.0%)',
                'TWD: NT$168',
                '<a href="https://jp.mercari.com/products/p1">View item</a>',
            ].join('\n'),
        );
    });

    it('should leave out the converted line when there is no converted price', () => {
        const payload = buildNotification(newEvent({ priceConverted: null }), OPTIONS);

        expect(payload.text.split('\n')).not.toContain('TWD: NT$210');
        expect(payload.text.split('\n')[3]).toBe('JPY: ¥1,000');
        expect(payload.text.split('\n')[4]).toBe('<a href="https://jp.mercari.com/products/p1">View item</a>');
    });

    it('should escape HTML in titles and fall back to the id for empty titles', () => {
        expect(buildNotification(newEvent({ title: 'Lens <50mm> & "hood"' }), OPTIONS).text.split('\n')[2]).toBe(
            '<b>Lens &lt;50mm&gt; &amp; &quot;hood&quot;</b>',
        );
        expect(buildNotification(newEvent({ title: '' }), OPTIONS).text.split('\n')[2]).toBe('<b>p1</b>');
    });
});

describe('headlineFor', () => {
    it('should mark a new listing within budget', () => {
        expect(headlineFor(newEvent({ priceConverted: 190 }), 200)).toBe(TITLES.NEW_WITHIN_BUDGET);
        expect(headlineFor(newEvent({ priceConverted: 210 }), 200)).toBe(TITLES.NEW);
        expect(headlineFor(newEvent({ priceConverted: null }), 200)).toBe(TITLES.NEW);
        expect(headlineFor(newEvent({ priceConverted: 190 }), null)).toBe(TITLES.NEW);
    });

    it('should mark a drop that crosses into the budget', () => {
        expect(headlineFor(dropEvent(), 200)).toBe(TITLES.PRICE_DROP_INTO_BUDGET);
        expect(headlineFor(dropEvent({ previousLowestConverted: 190 }), 200)).toBe(TITLES.PRICE_DROP);
        expect(headlineFor(dropEvent(), 100)).toBe(TITLES.PRICE_DROP);
        expect(headlineFor(dropEvent(), undefined)).toBe(TITLES.PRICE_DROP);
    });
});

describe('buildIgnoreLink', () => {
    it('should url-encode the command and escape the label', () => {
        expect(buildIgnoreLink('watch_bot', 'a&b')).toBe(
            '<a href="https://t.me/watch_bot?text=%2Fignore%20a%26b">/ignore a&amp;b</a>',
        );
    });
});

describe('emitEvents', () => {
    beforeEach(() => {
        vi.spyOn(log, 'warning').mockReturnValue(undefined);
    });

    it('should keep sending after a failed delivery', async () => {
        const transport = new RecordingTransport(new Set(['p2']));
        const events = [newEvent({ id: 'p1' }), newEvent({ id: 'p2' }), dropEvent()];

        const summary = await emitEvents(events, transport, OPTIONS);

        expect(summary).toEqual({ sent: 2, failed: 1, skipped: 0, overBudget: 0 });
        expect(transport.delivered.map(({ kind, productId }) => `${kind}:${productId}`)).toEqual([
            'NEW:p1',
            'PRICE_DROP:p1',
        ]);
        expect(log.warning).toHaveBeenCalledWith('[notifier] NEW notification for p2 failed', {
            error: 'delivery of p2 failed',
        });
    });

    it('should count an undelivered payload as failed', async () => {
        const transport = { deliver: vi.fn(async () => false) };

        await expect(emitEvents([newEvent()], transport, OPTIONS)).resolves.toEqual({
            sent: 0,
            failed: 1,
            skipped: 0,
            overBudget: 0,
        });
    });

    it('should skip ignored products', async () => {
        const transport = new RecordingTransport();

        const summary = await emitEvents([newEvent({ id: 'p1' }), newEvent({ id: 'p2' })], transport, {
            ...OPTIONS,
            ignored: new Set(['p1']),
        });

        expect(summary).toEqual({ sent: 1, failed: 0, skipped: 1, overBudget: 0 });
        expect(transport.delivered.map(({ productId }) => productId)).toEqual(['p2']);
    });

    it('should only send events within the budget', async () => {
        const transport = new RecordingTransport();
        const events = [
            newEvent({ id: 'p1', priceConverted: 99_999 }),
            newEvent({ id: 'p2', priceConverted: 190 }),
            newEvent({ id: 'p3', priceConverted: null }),
            dropEvent(),
            dropEvent({ observation: observation({ id: 'p4', priceSource: 1500, priceConverted: 315 }) }),
        ];

        const summary = await emitEvents(events, transport, { ...OPTIONS, maxConverted: 200 });

        expect(summary).toEqual({ sent: 2, failed: 0, skipped: 0, overBudget: 3 });
        expect(
            transport.delivered.map(({ kind, productId, text }) => `${kind}:${productId}:${text.split('\n')[0]}`),
        ).toEqual([
            'NEW:p2:<b>New listing within budget</b>',
            'PRICE_DROP:p1:<b>Price dropped into budget</b>',
        ]);
    });
});

describe('TelegramTransport', () => {
    it('should send a photo when the product has an image', async () => {
        const api = new FakeTelegramApi();
        const payload = buildNotification(newEvent(), OPTIONS);

        await expect(new TelegramTransport(api, '42').deliver(payload)).resolves.toBe(true);
        expect(api.photos).toEqual([
            { chatId: '42', photo: 'https://static.example.com/p1.jpg', caption: payload.text },
        ]);
        expect(api.messages).toHaveLength(0);
    });

    it('should send a text message when there is no image', async () => {
        const api = new FakeTelegramApi();
        const payload = buildNotification(newEvent({ imageRef: null }), OPTIONS);

        await new TelegramTransport(api, '42').deliver(payload);

        expect(api.messages).toEqual([{ chatId: '42', text: payload.text }]);
        expect(api.photos).toHaveLength(0);
    });

    it('should send a text message when the caption would be too long', async () => {
        const api = new FakeTelegramApi();
        const payload = buildNotification(newEvent({ title: 'x'.repeat(1100) }), OPTIONS);

        await new TelegramTransport(api, '42').deliver(payload);

        expect(api.messages).toHaveLength(1);
        expect(api.photos).toHaveLength(0);
    });
});
