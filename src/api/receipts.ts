import { Response } from 'express';
import { AssistantStore, AuthenticatedRequest } from '../types';
import { userIdOf } from '../middleware/auth';
import { parseReceiptBody, parseVoiceNoteBody } from '../middleware/validation';
import { matchVoiceNote } from '../utils/matchWorker';
import { CategoryDictionary, CategoryMatcher } from '../utils/nlp/categoryMatcher';
import { normalizeReceiptItems } from '../utils/nlp/receiptMatcher';
import { extractVoicePurchase } from '../utils/nlp/voiceItems';

export interface ReceiptHandlers {
    createReceipt(req: AuthenticatedRequest, res: Response): Promise<void>;
    createVoiceNote(req: AuthenticatedRequest, res: Response): Promise<void>;
    matchNow(req: AuthenticatedRequest, res: Response): Promise<void>;
    listMatches(req: AuthenticatedRequest, res: Response): Promise<void>;
}

export interface ReceiptHandlerOptions {
    windowMinutes: number;
    dictionary: CategoryDictionary;
    now?: () => Date;
}

export const createReceiptHandlers = (store: AssistantStore, options: ReceiptHandlerOptions): ReceiptHandlers => {
    const now = options.now ?? (() => new Date());

    return {
        async createReceipt(req, res) {
            try {
                const parsed = parseReceiptBody(req.body, now());
                if (!parsed.ok) {
                    res.status(400).json({ message: parsed.message });
                    return;
                }
                const userId = userIdOf(req);
                const items = normalizeReceiptItems(parsed.value.items);
                const receipt = await store.receipts.create({
                    userId,
                    shopName: parsed.value.shopName,
                    total: parsed.value.total,
                    items,
                    timestamp: parsed.value.timestamp,
                });
                const settings = await store.settings.get(userId);
                const matcher = new CategoryMatcher(options.dictionary, store.categories);
                const categories = await matcher.analyzeReceiptCategories(userId, items, receipt.shopName, settings.language);
                res.status(201).json({ message: 'Receipt stored', receipt, categories });
            } catch (error) {
                console.error('Error storing receipt:', error);
                res.status(500).json({ message: 'Internal Server Error' });
            }
        },

        // Stored as pending; the match worker picks it up on its next tick
        async createVoiceNote(req, res) {
            try {
                const parsed = parseVoiceNoteBody(req.body, now());
                if (!parsed.ok) {
                    res.status(400).json({ message: parsed.message });
                    return;
                }
                const userId = userIdOf(req);
                const settings = await store.settings.get(userId);
                const purchase = extractVoicePurchase(parsed.value.text, parsed.value.language, parsed.value.timestamp, settings.currency);
                const voiceNote = await store.voiceNotes.create({ userId, ...purchase });
                res.status(201).json({ message: 'Voice note stored', voiceNote });
            } catch (error) {
                console.error('Error storing voice note:', error);
                res.status(500).json({ message: 'Internal Server Error' });
            }
        },

        async matchNow(req, res) {
            try {
                const voice = await store.voiceNotes.get(userIdOf(req), req.params.id);
                if (!voice) {
                    res.status(404).json({ message: 'Voice note not found or access denied' });
                    return;
                }
                const matches = await matchVoiceNote({ store }, voice, options.windowMinutes);
                res.json({ voiceId: voice.id, best: matches.find(m => m.found) ?? null, matches });
            } catch (error) {
                console.error('Error matching voice note:', error);
                res.status(500).json({ message: 'Internal Server Error' });
            }
        },

        async listMatches(req, res) {
            try {
                const voice = await store.voiceNotes.get(userIdOf(req), req.params.id);
                if (!voice) {
                    res.status(404).json({ message: 'Voice note not found or access denied' });
                    return;
                }
                const matches = await store.matches.listForVoice(voice.id);
                res.json({ voiceId: voice.id, matches });
            } catch (error) {
                console.error('Error listing matches:', error);
                res.status(500).json({ message: 'Internal Server Error' });
            }
        },
    };
};
