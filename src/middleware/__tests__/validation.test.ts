import { describe, expect, it } from 'vitest';
import { parseReceiptBody, parseTimestamp, parseUtteranceBody, parseVoiceNoteBody } from '../validation';

const now = new Date(2024, 4, 15, 12, 0);

describe('parseUtteranceBody', () => {
    it('fills language, modality and timestamp', () => {
        expect(parseUtteranceBody({ text: 'потратил 5000 на хлеб' }, now)).toEqual({
            ok: true,
            value: { text: 'потратил 5000 на хлеб', language: 'ru', modality: 'text', timestamp: now },
        });
        const uz = parseUtteranceBody({ text: "non uchun 5000 so'm" }, now);
        expect(uz.ok && uz.value.language).toBe('uz');
    });

    it('keeps declared values', () => {
        const parsed = parseUtteranceBody({ text: 'show balance', language: 'ru', modality: 'voice', timestamp: '2024-05-15T07:00:00.000Z' }, now);
        expect(parsed).toEqual({
            ok: true,
            value: { text: 'show balance', language: 'ru', modality: 'voice', timestamp: new Date('2024-05-15T07:00:00.000Z') },
        });
    });

    it('rejects bad input with a message', () => {
        expect(parseUtteranceBody(undefined, now)).toEqual({ ok: false, message: 'JSON body is required' });
        expect(parseUtteranceBody({ text: '  ' }, now)).toEqual({ ok: false, message: 'text is required' });
        expect(parseUtteranceBody({ text: 'x'.repeat(1001) }, now)).toEqual({ ok: false, message: 'text must be less than 1000 characters' });
        expect(parseUtteranceBody({ text: 'hi', language: 'de' }, now)).toEqual({ ok: false, message: 'language must be one of ru, uz, en' });
        expect(parseUtteranceBody({ text: 'hi', modality: 'video' }, now)).toEqual({ ok: false, message: 'modality must be one of voice, text, receipt' });
        expect(parseUtteranceBody({ text: 'hi', timestamp: 'soon' }, now)).toEqual({ ok: false, message: 'timestamp must be an ISO date' });
    });
});

describe('parseVoiceNoteBody', () => {
    it('needs text', () => {
        expect(parseVoiceNoteBody({}, now)).toEqual({ ok: false, message: 'text is required' });
        expect(parseVoiceNoteBody({ text: 'bought bread', timestamp: 0 }, now)).toEqual({
            ok: true,
            value: { text: 'bought bread', language: 'en', timestamp: new Date(0) },
        });
    });
});

describe('parseReceiptBody', () => {
    it('derives line and receipt totals', () => {
        expect(parseReceiptBody({ shopName: ' Korzinka ', items: [{ name: 'хлеб', unitPrice: 4500, quantity: 2 }] }, now)).toEqual({
            ok: true,
            value: {
                shopName: 'Korzinka',
                total: 9000,
                items: [{ name: 'хлеб', quantity: 2, unitPrice: 4500, total: 9000 }],
                timestamp: now,
            },
        });
    });

    it('keeps an explicit total', () => {
        const parsed = parseReceiptBody({ shopName: 'Makro', total: 60500 }, now);
        expect(parsed.ok && parsed.value.total).toBe(60500);
        expect(parsed.ok && parsed.value.items).toEqual([]);
    });

    it('rejects malformed receipts', () => {
        expect(parseReceiptBody({ shopName: '' }, now)).toEqual({ ok: false, message: 'shopName is required' });
        expect(parseReceiptBody({ shopName: 'Makro', items: 'bread' }, now)).toEqual({ ok: false, message: 'items must be an array of at most 200 entries' });
        expect(parseReceiptBody({ shopName: 'Makro', items: [{ name: 'хлеб', unitPrice: 'cheap' }] }, now)).toEqual({
            ok: false,
            message: 'each item needs a name and numeric unitPrice, quantity and total',
        });
        expect(parseReceiptBody({ shopName: 'Makro', total: -1 }, now)).toEqual({ ok: false, message: 'total must be a non-negative number' });
    });
});

describe('parseTimestamp', () => {
    it('falls back only when the value is absent', () => {
        expect(parseTimestamp(undefined, now)).toBe(now);
        expect(parseTimestamp('', now)).toBe(now);
        expect(parseTimestamp(true, now)).toBeNull();
    });
});
