import { Request, Response, NextFunction } from 'express';
import { isLanguage, Language, Modality, ReceiptItem, Utterance } from '../types';
import { detectLanguage } from '../utils/nlp/textNormalizer';

export const MAX_TEXT_LENGTH = 1000;
const MAX_ITEMS = 200;

export type Parsed<T> = { ok: true; value: T } | { ok: false; message: string };

const isRecord = (value: unknown): value is Record<string, unknown> =>
    typeof value === 'object' && value !== null && !Array.isArray(value);

const invalid = (message: string): { ok: false; message: string } => ({ ok: false, message });

export const parseTimestamp = (value: unknown, fallback: Date): Date | null => {
    if (value === undefined || value === null || value === '') return fallback;
    if (typeof value !== 'string' && typeof value !== 'number') return null;
    const date = new Date(value);
    return Number.isNaN(date.getTime()) ? null : date;
};

const parseText = (value: unknown): Parsed<string> => {
    if (typeof value !== 'string' || !value.trim()) return invalid('text is required');
    if (value.length > MAX_TEXT_LENGTH) return invalid(`text must be less than ${MAX_TEXT_LENGTH} characters`);
    return { ok: true, value };
};

const parseLanguage = (value: unknown, text: string): Parsed<Language> => {
    if (value === undefined || value === null || value === '') return { ok: true, value: detectLanguage(text) };
    if (!isLanguage(value)) return invalid('language must be one of ru, uz, en');
    return { ok: true, value };
};

const isModality = (value: unknown): value is Modality => value === 'voice' || value === 'text' || value === 'receipt';

export const parseUtteranceBody = (body: unknown, now: Date): Parsed<Utterance> => {
    if (!isRecord(body)) return invalid('JSON body is required');
    const text = parseText(body.text);
    if (!text.ok) return text;
    const language = parseLanguage(body.language, text.value);
    if (!language.ok) return language;
    const modality = body.modality ?? 'text';
    if (!isModality(modality)) return invalid('modality must be one of voice, text, receipt');
    const timestamp = parseTimestamp(body.timestamp, now);
    if (!timestamp) return invalid('timestamp must be an ISO date');
    return { ok: true, value: { text: text.value, language: language.value, modality, timestamp } };
};

export interface VoiceNoteBody {
    text: string;
    language: Language;
    timestamp: Date;
}

export const parseVoiceNoteBody = (body: unknown, now: Date): Parsed<VoiceNoteBody> => {
    if (!isRecord(body)) return invalid('JSON body is required');
    const text = parseText(body.text);
    if (!text.ok) return text;
    const language = parseLanguage(body.language, text.value);
    if (!language.ok) return language;
    const timestamp = parseTimestamp(body.timestamp, now);
    if (!timestamp) return invalid('timestamp must be an ISO date');
    return { ok: true, value: { text: text.value, language: language.value, timestamp } };
};

export interface ReceiptBody {
    shopName: string;
    total: number;
    items: ReceiptItem[];
    timestamp: Date;
}

const finiteOr = (value: unknown, fallback: number): number | null => {
    if (value === undefined || value === null) return fallback;
    return typeof value === 'number' && Number.isFinite(value) ? value : null;
};

const parseReceiptItem = (value: unknown): ReceiptItem | null => {
    if (!isRecord(value) || typeof value.name !== 'string' || !value.name.trim()) return null;
    const quantity = finiteOr(value.quantity, 1);
    const unitPrice = finiteOr(value.unitPrice, 0);
    if (quantity === null || unitPrice === null) return null;
    const total = finiteOr(value.total, unitPrice * quantity);
    if (total === null) return null;
    return { name: value.name, quantity, unitPrice, total };
};

export const parseReceiptBody = (body: unknown, now: Date): Parsed<ReceiptBody> => {
    if (!isRecord(body)) return invalid('JSON body is required');
    const shopName = typeof body.shopName === 'string' ? body.shopName.trim() : '';
    if (!shopName) return invalid('shopName is required');
    const rawItems = body.items ?? [];
    if (!Array.isArray(rawItems) || rawItems.length > MAX_ITEMS) return invalid(`items must be an array of at most ${MAX_ITEMS} entries`);
    const items: ReceiptItem[] = [];
    for (const raw of rawItems) {
        const item = parseReceiptItem(raw);
        if (!item) return invalid('each item needs a name and numeric unitPrice, quantity and total');
        items.push(item);
    }
    const total = finiteOr(body.total, items.reduce((sum, item) => sum + item.total, 0));
    if (total === null || total < 0) return invalid('total must be a non-negative number');
    const timestamp = parseTimestamp(body.timestamp, now);
    if (!timestamp) return invalid('timestamp must be an ISO date');
    return { ok: true, value: { shopName, total, items, timestamp } };
};

const attemptMap = new Map<string, { count: number; windowStart: number }>();
const windowMs = 60 * 1000;
const maxCommandsPerWindow = 60;

function keyFor(req: Request) {
    return req.user?.id || req.ip || 'unknown';
}

export const commandAttempts = {
    bump(req: Request, now = Date.now()) {
        const key = keyFor(req);
        const prev = attemptMap.get(key);
        if (prev && now - prev.windowStart <= windowMs) {
            attemptMap.set(key, { count: prev.count + 1, windowStart: prev.windowStart });
        } else {
            attemptMap.set(key, { count: 1, windowStart: now });
        }
    },
    isLimited(req: Request, now = Date.now()) {
        const key = keyFor(req);
        const prev = attemptMap.get(key);
        if (!prev) return false;
        if (now - prev.windowStart > windowMs) {
            attemptMap.delete(key);
            return false;
        }
        return prev.count >= maxCommandsPerWindow;
    },
    reset() {
        attemptMap.clear();
    }
};

export const rateLimitCommands = (req: Request, res: Response, next: NextFunction): void => {
    if (commandAttempts.isLimited(req)) {
        res.status(429).json({ message: 'Too many commands. Please try again later.' });
        return;
    }
    commandAttempts.bump(req);
    next();
};
