import { log } from 'apify';
import { gotScraping } from 'crawlee';

import { HTTP_TIMEOUT_MS, IGNORED_PRODUCTS_KEY, TELEGRAM_API, TELEGRAM_OFFSET_KEY } from './constants.js';
import type { KeyValueBackend } from './store.js';
import { errorMessage, isRecord } from './utils.js';

const LOG_PREFIX = '[telegram]';
const IGNORE_COMMAND = '/ignore';

export interface TelegramUpdate {
    updateId: number;
    chatId: string | null;
    text: string;
}

export interface TelegramApi {
    getBotUsername(): Promise<string | null>;
    getUpdates(offset: number | null): Promise<TelegramUpdate[]>;
    sendMessage(chatId: string, text: string): Promise<void>;
    sendPhoto(chatId: string, photo: string, caption: string): Promise<void>;
}

type StateStore = Pick<KeyValueBackend, 'getValue' | 'setValue'>;

const parseUpdate = (update: unknown): TelegramUpdate | null => {
    if (!isRecord(update) || typeof update.update_id !== 'number') return null;
    let message: Record<string, unknown> | null = null;
    if (isRecord(update.message)) message = update.message;
    else if (isRecord(update.edited_message)) message = update.edited_message;
    const chat = message && isRecord(message.chat) ? message.chat : null;
    const chatId = chat && (typeof chat.id === 'number' || typeof chat.id === 'string') ? String(chat.id) : null;

    return {
        updateId: update.update_id,
        chatId,
        text: message && typeof message.text === 'string' ? message.text : '',
    };
};

export class TelegramClient implements TelegramApi {
    private botUsername: string | null | undefined;

    constructor(private readonly botToken: string) {}

    private async call(method: string, payload: Record<string, unknown>): Promise<unknown> {
        const { body } = (await gotScraping({
            url: `${TELEGRAM_API}/bot${this.botToken}/${method}`,
            method: 'POST',
            json: payload,
            responseType: 'json',
            timeout: { request: HTTP_TIMEOUT_MS },
        })) as { body: unknown };

        if (!isRecord(body) || body.ok !== true) {
            const description =
                isRecord(body) && typeof body.description === 'string' ? body.description : 'no description';
            throw new Error(`${LOG_PREFIX} ${method} failed: ${description}`);
        }
        return body.result;
    }

    async getBotUsername(): Promise<string | null> {
        if (this.botUsername !== undefined) return this.botUsername;
        try {
            const result = await this.call('getMe', {});
            this.botUsername = isRecord(result) && typeof result.username === 'string' ? result.username : null;
        } catch (error) {
            log.warning(`${LOG_PREFIX} Failed to get bot username`, { error: errorMessage(error) });
            this.botUsername = null;
        }
        return this.botUsername;
    }

    async getUpdates(offset: number | null): Promise<TelegramUpdate[]> {
        const result = await this.call('getUpdates', offset === null ? { timeout: 0 } : { timeout: 0, offset });
        if (!Array.isArray(result)) return [];
        return result.map(parseUpdate).filter((update): update is TelegramUpdate => update !== null);
    }

    async sendMessage(chatId: string, text: string): Promise<void> {
        await this.call('sendMessage', { chat_id: chatId, text, parse_mode: 'HTML' });
    }

    async sendPhoto(chatId: string, photo: string, caption: string): Promise<void> {
        await this.call('sendPhoto', { chat_id: chatId, photo, caption, parse_mode: 'HTML' });
    }
}

/** Product id of an `/ignore <id>` command, or null when the text is something else. */
export const parseIgnoreCommand = (text: string): string | null => {
    const trimmed = text.trim();
    const [command, ...rest] = trimmed.split(/\s+/);
    // Commands sent in groups carry the bot name: /ignore@some_bot
    if (command.toLowerCase().split('@')[0] !== IGNORE_COMMAND) return null;
    const productId = rest.join(' ').trim();
    return productId === '' ? null : productId;
};

export const loadIgnoredProducts = async (state: StateStore): Promise<Set<string>> => {
    const value = await state.getValue(IGNORED_PRODUCTS_KEY);
    if (!Array.isArray(value)) return new Set();
    return new Set(value.filter((id): id is string => typeof id === 'string'));
};

/**
 * Reads pending bot updates and adds the product ids of `/ignore <id>` messages from the
 * configured chat to the ignore list. Returns the full ignore list afterwards.
 */
export const processIgnoreCommands = async (
    api: TelegramApi,
    chatId: string,
    state: StateStore,
): Promise<Set<string>> => {
    const ignored = await loadIgnoredProducts(state);
    const storedOffset = await state.getValue(TELEGRAM_OFFSET_KEY);
    const offset = typeof storedOffset === 'number' ? storedOffset : null;

    const updates = await api.getUpdates(offset);
    if (updates.length === 0) return ignored;

    let added = 0;
    for (const update of updates) {
        if (update.chatId !== chatId) continue;
        const productId = parseIgnoreCommand(update.text);
        if (productId === null || ignored.has(productId)) continue;
        ignored.add(productId);
        added++;
        log.info(`${LOG_PREFIX} Ignoring product ${productId}`);
    }

    if (added > 0) await state.setValue(IGNORED_PRODUCTS_KEY, [...ignored]);
    const lastUpdateId = Math.max(...updates.map((update) => update.updateId));
    await state.setValue(TELEGRAM_OFFSET_KEY, lastUpdateId + 1);

    return ignored;
};
