import { Db, Filter, MongoServerError, ObjectId, WithId } from 'mongodb';
import {
    AssistantStore,
    CategoryRecord,
    CategoryStore,
    CurrencyCode,
    DebtRecord,
    DebtStore,
    GoalRecord,
    GoalStore,
    IncomeSourceRecord,
    ItemPair,
    Language,
    MatchResult,
    MatchStatus,
    MatchStore,
    NotificationTopic,
    ReceiptExtraction,
    ReceiptItem,
    ReceiptStore,
    ReminderRecord,
    ReminderStore,
    SettingsStore,
    SourceStore,
    TransactionRecord,
    TransactionStore,
    TransactionType,
    UserSettings,
    VoiceExtraction,
    VoiceItem,
    VoiceNoteStore,
} from '../types';
import { normalizeText } from '../utils/nlp/textNormalizer';

export const COLLECTIONS = {
    categories: 'categoryCustom',
    transactions: 'transaction',
    goals: 'goals',
    sources: 'incomeSources',
    settings: 'userSettings',
    reminders: 'reminders',
    debts: 'debts',
    receipts: 'receipts',
    voiceNotes: 'voiceNotes',
    matches: 'voiceReceiptMatches',
} as const;

interface CategoryDoc {
    userId: ObjectId;
    name: string;
    nameKey: string;
    keywords: string[];
    createdAt: Date;
    updatedAt: Date;
}

interface TransactionDoc {
    userId: ObjectId;
    type: TransactionType;
    amount: number;
    originalAmount: number;
    originalCurrency: CurrencyCode;
    categoryId: ObjectId | null;
    sourceId: ObjectId | null;
    description: string;
    createdAt: Date;
    updatedAt: Date;
}

interface GoalDoc {
    userId: ObjectId;
    name: string;
    targetAmount: number;
    currentAmount: number;
    currency: CurrencyCode;
    deadline: Date | null;
    status: GoalRecord['status'];
    createdAt: Date;
}

interface SourceDoc {
    userId: ObjectId;
    name: string;
    nameKey: string;
    active: boolean;
    createdAt: Date;
}

interface SettingsDoc {
    userId: ObjectId;
    currency: CurrencyCode;
    language: Language;
    notifications: Record<NotificationTopic, boolean>;
    updatedAt: Date;
}

interface ReminderDoc {
    userId: ObjectId;
    title: string;
    remindAt: Date;
    status: ReminderRecord['status'];
    createdAt: Date;
}

interface DebtDoc {
    userId: ObjectId;
    person: string;
    direction: DebtRecord['direction'];
    amount: number;
    remaining: number;
    currency: CurrencyCode;
    dueDate: Date | null;
    status: DebtRecord['status'];
    createdAt: Date;
}

interface ReceiptDoc {
    userId: ObjectId;
    shopName: string;
    total: number;
    items: ReceiptItem[];
    timestamp: Date;
    createdAt: Date;
}

type VoiceMatchStatus = 'pending' | 'processing' | 'done' | 'failed';

interface VoiceNoteDoc {
    userId: ObjectId;
    text: string;
    language: Language;
    items: VoiceItem[];
    spokenTotal: number | null;
    timestamp: Date;
    matchStatus: VoiceMatchStatus;
    matchAttempts: number;
    matchLockedAt?: Date;
    createdAt: Date;
}

interface MatchDoc {
    voiceId: string;
    receiptId: string;
    confidence: number;
    amountScore: number;
    itemConfidence: number;
    amountMatch: boolean;
    pairs: ItemPair[];
    timeDifferenceMinutes: number | null;
    status: MatchStatus;
    error?: string;
    createdAt: Date;
    updatedAt: Date;
}

export const toObjectId = (id: string): ObjectId | null => (ObjectId.isValid(id) ? new ObjectId(id) : null);

const requireObjectId = (id: string): ObjectId => {
    const oid = toObjectId(id);
    if (!oid) throw new Error(`Invalid id "${id}"`);
    return oid;
};

export const isDuplicateKey = (e: unknown): boolean => e instanceof MongoServerError && e.code === 11000;

export const nameKey = (name: string): string => normalizeText(name);

const toCategory = (doc: WithId<CategoryDoc>): CategoryRecord => ({
    id: doc._id.toHexString(),
    userId: doc.userId.toHexString(),
    name: doc.name,
    keywords: doc.keywords,
    createdAt: doc.createdAt,
});

const toTransaction = (doc: WithId<TransactionDoc>): TransactionRecord => ({
    id: doc._id.toHexString(),
    userId: doc.userId.toHexString(),
    type: doc.type,
    amount: doc.amount,
    originalAmount: doc.originalAmount,
    originalCurrency: doc.originalCurrency,
    categoryId: doc.categoryId ? doc.categoryId.toHexString() : null,
    sourceId: doc.sourceId ? doc.sourceId.toHexString() : null,
    description: doc.description,
    createdAt: doc.createdAt,
});

const toGoal = (doc: WithId<GoalDoc>): GoalRecord => ({
    id: doc._id.toHexString(),
    userId: doc.userId.toHexString(),
    name: doc.name,
    targetAmount: doc.targetAmount,
    currentAmount: doc.currentAmount,
    currency: doc.currency,
    deadline: doc.deadline,
    status: doc.status,
    createdAt: doc.createdAt,
});

const toSource = (doc: WithId<SourceDoc>): IncomeSourceRecord => ({
    id: doc._id.toHexString(),
    userId: doc.userId.toHexString(),
    name: doc.name,
    active: doc.active,
    createdAt: doc.createdAt,
});

const toReminder = (doc: WithId<ReminderDoc>): ReminderRecord => ({
    id: doc._id.toHexString(),
    userId: doc.userId.toHexString(),
    title: doc.title,
    remindAt: doc.remindAt,
    status: doc.status,
    createdAt: doc.createdAt,
});

const toDebt = (doc: WithId<DebtDoc>): DebtRecord => ({
    id: doc._id.toHexString(),
    userId: doc.userId.toHexString(),
    person: doc.person,
    direction: doc.direction,
    amount: doc.amount,
    remaining: doc.remaining,
    currency: doc.currency,
    dueDate: doc.dueDate,
    status: doc.status,
    createdAt: doc.createdAt,
});

const toReceipt = (doc: WithId<ReceiptDoc>): ReceiptExtraction => ({
    id: doc._id.toHexString(),
    userId: doc.userId.toHexString(),
    shopName: doc.shopName,
    total: doc.total,
    items: doc.items,
    timestamp: doc.timestamp,
});

const toVoiceNote = (doc: WithId<VoiceNoteDoc>): VoiceExtraction => ({
    id: doc._id.toHexString(),
    userId: doc.userId.toHexString(),
    text: doc.text,
    language: doc.language,
    items: doc.items,
    spokenTotal: doc.spokenTotal,
    timestamp: doc.timestamp,
});

const toMatch = (doc: WithId<MatchDoc>): MatchResult => ({
    voiceId: doc.voiceId,
    receiptId: doc.receiptId,
    confidence: doc.confidence,
    amountScore: doc.amountScore,
    itemConfidence: doc.itemConfidence,
    amountMatch: doc.amountMatch,
    pairs: doc.pairs,
    timeDifferenceMinutes: doc.timeDifferenceMinutes,
    status: doc.status,
    error: doc.error,
});

const categoryStore = (db: Db): CategoryStore => {
    const col = db.collection<CategoryDoc>(COLLECTIONS.categories);
    return {
        async listByUser(userId) {
            const userOid = toObjectId(userId);
            if (!userOid) return [];
            const docs = await col.find({ userId: userOid }).sort({ createdAt: 1 }).toArray();
            return docs.map(toCategory);
        },

        async create(userId, name, keywords = []) {
            const now = new Date();
            const doc: CategoryDoc = { userId: requireObjectId(userId), name: name.trim(), nameKey: nameKey(name), keywords, createdAt: now, updatedAt: now };
            try {
                const result = await col.insertOne(doc);
                return toCategory({ ...doc, _id: result.insertedId });
            } catch (e) {
                if (isDuplicateKey(e)) return null;
                throw e;
            }
        },

        // Upsert on the unique { userId, nameKey } index: concurrent callers converge on one document
        async findOrCreate(userId, name, keywords = []) {
            const userOid = requireObjectId(userId);
            const key = nameKey(name);
            const now = new Date();
            try {
                const result = await col.findOneAndUpdate(
                    { userId: userOid, nameKey: key },
                    { $setOnInsert: { userId: userOid, name: name.trim(), nameKey: key, keywords, createdAt: now, updatedAt: now } },
                    { upsert: true, returnDocument: 'after', includeResultMetadata: true }
                );
                if (result.value) {
                    return { category: toCategory(result.value), created: result.lastErrorObject?.updatedExisting !== true };
                }
            } catch (e) {
                if (!isDuplicateKey(e)) throw e;
            }
            const existing = await col.findOne({ userId: userOid, nameKey: key });
            if (!existing) throw new Error(`Category "${name}" vanished during upsert`);
            return { category: toCategory(existing), created: false };
        },

        async rename(userId, id, name) {
            const oid = toObjectId(id);
            const userOid = toObjectId(userId);
            if (!oid || !userOid) return false;
            try {
                const result = await col.updateOne(
                    { _id: oid, userId: userOid },
                    { $set: { name: name.trim(), nameKey: nameKey(name), updatedAt: new Date() } }
                );
                return result.matchedCount > 0;
            } catch (e) {
                if (isDuplicateKey(e)) return false;
                throw e;
            }
        },

        async remove(userId, id) {
            const oid = toObjectId(id);
            const userOid = toObjectId(userId);
            if (!oid || !userOid) return false;
            const result = await col.deleteOne({ _id: oid, userId: userOid });
            return result.deletedCount > 0;
        },
    };
};

const transactionStore = (db: Db): TransactionStore => {
    const col = db.collection<TransactionDoc>(COLLECTIONS.transactions);
    return {
        async create(input) {
            const doc: TransactionDoc = {
                userId: requireObjectId(input.userId),
                type: input.type,
                amount: input.amount,
                originalAmount: input.originalAmount,
                originalCurrency: input.originalCurrency,
                categoryId: input.categoryId ? toObjectId(input.categoryId) : null,
                sourceId: input.sourceId ? toObjectId(input.sourceId) : null,
                description: input.description,
                createdAt: input.createdAt,
                updatedAt: new Date(),
            };
            const result = await col.insertOne(doc);
            return toTransaction({ ...doc, _id: result.insertedId });
        },

        async list(userId, query = {}) {
            const userOid = toObjectId(userId);
            if (!userOid) return [];
            const filter: Filter<TransactionDoc> = { userId: userOid };
            if (query.type) filter.type = query.type;
            if (query.categoryId) filter.categoryId = toObjectId(query.categoryId);
            if (query.from || query.to) {
                const range: { $gte?: Date; $lt?: Date } = {};
                if (query.from) range.$gte = query.from;
                if (query.to) range.$lt = query.to;
                filter.createdAt = range;
            }
            const docs = await col.find(filter).sort({ createdAt: -1 }).toArray();
            return docs.map(toTransaction);
        },

        async countByCategory(userId, categoryId) {
            const userOid = toObjectId(userId);
            const categoryOid = toObjectId(categoryId);
            if (!userOid || !categoryOid) return 0;
            return col.countDocuments({ userId: userOid, categoryId: categoryOid });
        },
    };
};

const goalStore = (db: Db): GoalStore => {
    const col = db.collection<GoalDoc>(COLLECTIONS.goals);
    return {
        async listActive(userId) {
            const userOid = toObjectId(userId);
            if (!userOid) return [];
            const docs = await col.find({ userId: userOid, status: 'active' }).sort({ createdAt: 1 }).toArray();
            return docs.map(toGoal);
        },

        async create(input) {
            const doc: GoalDoc = { ...input, userId: requireObjectId(input.userId), currentAmount: 0, status: 'active' };
            const result = await col.insertOne(doc);
            return toGoal({ ...doc, _id: result.insertedId });
        },

        async addAmount(userId, id, amount) {
            const oid = toObjectId(id);
            const userOid = toObjectId(userId);
            if (!oid || !userOid) return null;
            const doc = await col.findOneAndUpdate(
                { _id: oid, userId: userOid, status: 'active' },
                { $inc: { currentAmount: amount } },
                { returnDocument: 'after' }
            );
            return doc ? toGoal(doc) : null;
        },

        async setStatus(userId, id, status) {
            const oid = toObjectId(id);
            const userOid = toObjectId(userId);
            if (!oid || !userOid) return false;
            const result = await col.updateOne({ _id: oid, userId: userOid }, { $set: { status } });
            return result.matchedCount > 0;
        },
    };
};

const sourceStore = (db: Db): SourceStore => {
    const col = db.collection<SourceDoc>(COLLECTIONS.sources);
    return {
        async listActive(userId) {
            const userOid = toObjectId(userId);
            if (!userOid) return [];
            const docs = await col.find({ userId: userOid, active: true }).sort({ createdAt: 1 }).toArray();
            return docs.map(toSource);
        },

        async create(userId, name) {
            const userOid = requireObjectId(userId);
            const key = nameKey(name);
            const existing = await col.findOne({ userId: userOid, nameKey: key, active: true });
            if (existing) return null;
            const doc: SourceDoc = { userId: userOid, name: name.trim(), nameKey: key, active: true, createdAt: new Date() };
            const result = await col.insertOne(doc);
            return toSource({ ...doc, _id: result.insertedId });
        },

        async rename(userId, id, name) {
            const oid = toObjectId(id);
            const userOid = toObjectId(userId);
            if (!oid || !userOid) return false;
            const result = await col.updateOne({ _id: oid, userId: userOid }, { $set: { name: name.trim(), nameKey: nameKey(name) } });
            return result.matchedCount > 0;
        },

        async deactivate(userId, id) {
            const oid = toObjectId(id);
            const userOid = toObjectId(userId);
            if (!oid || !userOid) return false;
            const result = await col.updateOne({ _id: oid, userId: userOid }, { $set: { active: false } });
            return result.matchedCount > 0;
        },
    };
};

export const defaultSettings = (userId: string, currency: CurrencyCode): UserSettings => ({
    userId,
    currency,
    language: 'ru',
    notifications: { reminders: true, goals: true, debts: true, budget: true, reports: true },
});

const settingsStore = (db: Db, defaultCurrency: CurrencyCode): SettingsStore => {
    const col = db.collection<SettingsDoc>(COLLECTIONS.settings);
    const get = async (userId: string): Promise<UserSettings> => {
        const userOid = toObjectId(userId);
        const base = defaultSettings(userId, defaultCurrency);
        if (!userOid) return base;
        const doc = await col.findOne({ userId: userOid });
        if (!doc) return base;
        return {
            userId,
            currency: doc.currency,
            language: doc.language,
            notifications: { ...base.notifications, ...doc.notifications },
        };
    };
    return {
        get,
        async update(userId, patch) {
            const current = await get(userId);
            const next: UserSettings = {
                ...current,
                currency: patch.currency ?? current.currency,
                language: patch.language ?? current.language,
                notifications: { ...current.notifications, ...patch.notifications },
            };
            await col.updateOne(
                { userId: requireObjectId(userId) },
                { $set: { currency: next.currency, language: next.language, notifications: next.notifications, updatedAt: new Date() } },
                { upsert: true }
            );
            return next;
        },
    };
};

const reminderStore = (db: Db): ReminderStore => {
    const col = db.collection<ReminderDoc>(COLLECTIONS.reminders);
    const setById = async (userId: string, id: string, set: Partial<ReminderDoc>) => {
        const oid = toObjectId(id);
        const userOid = toObjectId(userId);
        if (!oid || !userOid) return false;
        const result = await col.updateOne({ _id: oid, userId: userOid }, { $set: set });
        return result.matchedCount > 0;
    };
    return {
        async listActive(userId) {
            const userOid = toObjectId(userId);
            if (!userOid) return [];
            const docs = await col.find({ userId: userOid, status: 'active' }).sort({ remindAt: 1 }).toArray();
            return docs.map(toReminder);
        },

        async create(input) {
            const doc: ReminderDoc = { ...input, userId: requireObjectId(input.userId), status: 'active' };
            const result = await col.insertOne(doc);
            return toReminder({ ...doc, _id: result.insertedId });
        },

        reschedule: (userId, id, remindAt) => setById(userId, id, { remindAt }),

        complete: (userId, id) => setById(userId, id, { status: 'completed' }),

        async remove(userId, id) {
            const oid = toObjectId(id);
            const userOid = toObjectId(userId);
            if (!oid || !userOid) return false;
            const result = await col.deleteOne({ _id: oid, userId: userOid });
            return result.deletedCount > 0;
        },
    };
};

const debtStore = (db: Db): DebtStore => {
    const col = db.collection<DebtDoc>(COLLECTIONS.debts);
    return {
        async listOpen(userId, direction) {
            const userOid = toObjectId(userId);
            if (!userOid) return [];
            const filter: Filter<DebtDoc> = { userId: userOid, status: 'open' };
            if (direction) filter.direction = direction;
            const docs = await col.find(filter).sort({ createdAt: 1 }).toArray();
            return docs.map(toDebt);
        },

        async create(input) {
            const doc: DebtDoc = { ...input, userId: requireObjectId(input.userId), remaining: input.amount, status: 'open' };
            const result = await col.insertOne(doc);
            return toDebt({ ...doc, _id: result.insertedId });
        },

        // Pipeline update keeps the decrement and the close in one atomic step
        async applyPayment(userId, id, amount) {
            const oid = toObjectId(id);
            const userOid = toObjectId(userId);
            if (!oid || !userOid) return null;
            const doc = await col.findOneAndUpdate(
                { _id: oid, userId: userOid, status: 'open' },
                [
                    { $set: { remaining: { $max: [0, { $subtract: ['$remaining', amount] }] } } },
                    { $set: { status: { $cond: [{ $lte: ['$remaining', 0] }, 'closed', 'open'] } } },
                ],
                { returnDocument: 'after' }
            );
            return doc ? toDebt(doc) : null;
        },

        async close(userId, id) {
            const oid = toObjectId(id);
            const userOid = toObjectId(userId);
            if (!oid || !userOid) return false;
            const result = await col.updateOne({ _id: oid, userId: userOid }, { $set: { status: 'closed', remaining: 0 } });
            return result.matchedCount > 0;
        },
    };
};

const receiptStore = (db: Db): ReceiptStore => {
    const col = db.collection<ReceiptDoc>(COLLECTIONS.receipts);
    return {
        async create(input) {
            const doc: ReceiptDoc = { ...input, userId: requireObjectId(input.userId), createdAt: new Date() };
            const result = await col.insertOne(doc);
            return toReceipt({ ...doc, _id: result.insertedId });
        },

        async findInWindow(userId, from, to) {
            const userOid = toObjectId(userId);
            if (!userOid) return [];
            const docs = await col.find({ userId: userOid, timestamp: { $gte: from, $lte: to } }).sort({ timestamp: 1 }).toArray();
            return docs.map(toReceipt);
        },
    };
};

const voiceNoteStore = (db: Db): VoiceNoteStore => {
    const col = db.collection<VoiceNoteDoc>(COLLECTIONS.voiceNotes);
    return {
        async create(input) {
            const doc: VoiceNoteDoc = {
                ...input,
                userId: requireObjectId(input.userId),
                matchStatus: 'pending',
                matchAttempts: 0,
                createdAt: new Date(),
            };
            const result = await col.insertOne(doc);
            return toVoiceNote({ ...doc, _id: result.insertedId });
        },

        async get(userId, id) {
            const oid = toObjectId(id);
            const userOid = toObjectId(userId);
            if (!oid || !userOid) return null;
            const doc = await col.findOne({ _id: oid, userId: userOid });
            return doc ? toVoiceNote(doc) : null;
        },

        async reclaimStale(lockedBefore) {
            const result = await col.updateMany(
                { matchStatus: 'processing', matchLockedAt: { $lt: lockedBefore } },
                { $set: { matchStatus: 'pending' }, $unset: { matchLockedAt: '' } }
            );
            return result.modifiedCount;
        },

        async claimPending(limit, maxAttempts, now) {
            const batch = await col.find({ matchStatus: 'pending', matchAttempts: { $lt: maxAttempts } })
                .sort({ createdAt: 1 })
                .limit(limit)
                .toArray();
            if (!batch.length) return [];
            const ids = batch.map(d => d._id);
            await col.updateMany({ _id: { $in: ids }, matchStatus: 'pending' }, { $set: { matchStatus: 'processing', matchLockedAt: now } });
            return batch.map(toVoiceNote);
        },

        async markDone(id) {
            await col.updateOne(
                { _id: requireObjectId(id) },
                { $set: { matchStatus: 'done' }, $inc: { matchAttempts: 1 }, $unset: { matchLockedAt: '' } }
            );
        },

        async markRetry(id, maxAttempts) {
            await col.updateOne({ _id: requireObjectId(id) }, [
                { $set: { matchAttempts: { $add: ['$matchAttempts', 1] } } },
                { $set: { matchStatus: { $cond: [{ $gte: ['$matchAttempts', maxAttempts] }, 'failed', 'pending'] } } },
                { $unset: 'matchLockedAt' },
            ]);
        },

        async countByStatus() {
            const [pending, processing, done, failed] = await Promise.all(
                (['pending', 'processing', 'done', 'failed'] as const).map(status => col.countDocuments({ matchStatus: status }))
            );
            return { pending, processing, done, failed };
        },
    };
};

const matchStore = (db: Db): MatchStore => {
    const col = db.collection<MatchDoc>(COLLECTIONS.matches);
    return {
        async begin(voiceId, receiptId) {
            const now = new Date();
            try {
                await col.updateOne(
                    { voiceId, receiptId },
                    {
                        $setOnInsert: {
                            voiceId,
                            receiptId,
                            confidence: 0,
                            amountScore: 0,
                            itemConfidence: 0,
                            amountMatch: false,
                            pairs: [],
                            timeDifferenceMinutes: null,
                            status: 'processing',
                            createdAt: now,
                            updatedAt: now,
                        },
                    },
                    { upsert: true }
                );
            } catch (e) {
                // a concurrent upsert on the unique index already created it
                if (!isDuplicateKey(e)) throw e;
            }
        },

        async finish(result) {
            const set: Omit<MatchDoc, 'createdAt'> = {
                voiceId: result.voiceId,
                receiptId: result.receiptId,
                confidence: result.confidence,
                amountScore: result.amountScore,
                itemConfidence: result.itemConfidence,
                amountMatch: result.amountMatch,
                pairs: result.pairs,
                timeDifferenceMinutes: result.timeDifferenceMinutes,
                status: result.status,
                updatedAt: new Date(),
            };
            if (result.error !== undefined) set.error = result.error;
            await col.updateOne(
                { voiceId: result.voiceId, receiptId: result.receiptId },
                { $set: set, $setOnInsert: { createdAt: new Date() } },
                { upsert: true }
            );
        },

        async listForVoice(voiceId) {
            const docs = await col.find({ voiceId }).sort({ confidence: -1 }).toArray();
            return docs.map(toMatch);
        },
    };
};

export const createMongoStore = (db: Db, defaultCurrency: CurrencyCode = 'UZS'): AssistantStore => ({
    categories: categoryStore(db),
    transactions: transactionStore(db),
    goals: goalStore(db),
    sources: sourceStore(db),
    settings: settingsStore(db, defaultCurrency),
    reminders: reminderStore(db),
    debts: debtStore(db),
    receipts: receiptStore(db),
    voiceNotes: voiceNoteStore(db),
    matches: matchStore(db),
});
