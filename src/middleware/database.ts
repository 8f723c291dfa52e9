import { Db, MongoClient } from 'mongodb';
import dotenv from 'dotenv';
import { COLLECTIONS } from '../api/mongoStore';

dotenv.config();

const uri = process.env.MONGO_URI;
if (!uri) {
    throw new Error('MONGO_URI is not defined in environment');
}

const client = new MongoClient(uri);

let db: Db | null = null;

const warnMessage = (e: unknown) => (e instanceof Error ? e.message : String(e));

export const connectDB = async (): Promise<Db> => {
    try {
        await client.connect();
        const connected = client.db();
        db = connected;
        try {
            await connected.collection(COLLECTIONS.transactions).createIndex({ userId: 1, createdAt: -1 });
            await connected.collection(COLLECTIONS.transactions).createIndex({ userId: 1, categoryId: 1 });
            await connected.collection(COLLECTIONS.goals).createIndex({ userId: 1, status: 1 });
            await connected.collection(COLLECTIONS.sources).createIndex({ userId: 1, nameKey: 1 });
            await connected.collection(COLLECTIONS.reminders).createIndex({ userId: 1, status: 1, remindAt: 1 });
            await connected.collection(COLLECTIONS.debts).createIndex({ userId: 1, status: 1 });
            await connected.collection(COLLECTIONS.settings).createIndex({ userId: 1 }, { unique: true });
            try {
                await connected.collection(COLLECTIONS.categories).createIndex(
                    { userId: 1, nameKey: 1 },
                    { unique: true, name: 'uniq_category_name' }
                );
            } catch (ie) {
                console.warn('Category unique index creation warning:', warnMessage(ie));
            }
            try {
                await connected.collection(COLLECTIONS.receipts).createIndex({ userId: 1, timestamp: 1 });
                await connected.collection(COLLECTIONS.voiceNotes).createIndex({ matchStatus: 1, createdAt: 1 });
                await connected.collection(COLLECTIONS.matches).createIndex(
                    { voiceId: 1, receiptId: 1 },
                    { unique: true, name: 'uniq_voice_receipt' }
                );
            } catch (me) {
                console.warn('Matching indexes warning:', warnMessage(me));
            }
        } catch (e) {
            console.warn('Index creation warning:', warnMessage(e));
        }
        return connected;
    } catch (error) {
        console.error('MongoDB connection error:', error);
        throw error;
    }
};

export const getDB = (): Db => {
    if (!db) {
        throw new Error('Database not connected. Call connectDB first.');
    }
    return db;
};

export const closeDB = async () => {
    try {
        await client.close();
    } catch (error) {
        console.error('Error closing MongoDB connection:', error);
    }
};
