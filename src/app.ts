import 'dotenv/config';
import express from 'express';
import { connectDB } from './middleware/database';
import {
    corsMiddleware,
    jsonMiddleware,
    urlencodedMiddleware,
    errorHandler,
    notFoundHandler,
    requestLogger,
    securityHeaders,
    passport
} from './middleware/index';
import { createAssistantRoutes, createCategoryRoutes, createReceiptRoutes } from './routes';
import { createAssistantHandlers } from './api/assistant';
import { createCategoryHandlers } from './api/categories';
import { createReceiptHandlers } from './api/receipts';
import { createMongoStore } from './api/mongoStore';
import { isCurrencyCode } from './types';
import { FixedRateProvider } from './utils/currency';
import { getMetrics, snapshotMetrics } from './utils/assistantMetrics';
import { runMatchTick } from './utils/matchWorker';
import { AssistantService } from './utils/nlp/assistantService';
import { loadCategoryDictionary } from './utils/nlp/categoryMatcher';
import { DEFAULT_WINDOW_MINUTES } from './utils/nlp/receiptMatcher';

const app = express();
const PORT = Number(process.env.PORT) || 3001;
const BASE_CURRENCY = isCurrencyCode(process.env.ASSISTANT_BASE_CURRENCY) ? process.env.ASSISTANT_BASE_CURRENCY : 'UZS';
const WINDOW_MINUTES = Number(process.env.MATCH_WINDOW_MINUTES) || DEFAULT_WINDOW_MINUTES;

// Early lightweight ping (before DB) for diagnosing startup hangs
app.get('/__early', (_req: express.Request, res: express.Response) => { res.json({ ok: true }); });

async function bootstrap() {
    console.log('[BOOT] Connecting to Mongo...');
    const db = await connectDB();
    console.log('[BOOT] Mongo connected');

    const store = createMongoStore(db, BASE_CURRENCY);
    const dictionary = loadCategoryDictionary();
    const service = new AssistantService({ store, rates: new FixedRateProvider(), dictionary });
    console.log(`[BOOT] Assistant ready (base currency ${BASE_CURRENCY}, match window ${WINDOW_MINUTES} min)`);

    app.use(securityHeaders);
    app.use(corsMiddleware);
    app.use(jsonMiddleware);
    app.use(urlencodedMiddleware);
    app.use(requestLogger);
    app.use(passport.initialize());

    app.use('/api/assistant', createAssistantRoutes(createAssistantHandlers(service)));
    app.use('/api/assistant', createReceiptRoutes(createReceiptHandlers(store, { windowMinutes: WINDOW_MINUTES, dictionary })));
    app.use('/api/categories', createCategoryRoutes(createCategoryHandlers(store.categories, store.transactions, dictionary)));

    // Debug assistant status endpoint
    app.get('/api/debug/assistant/status', async (_req, res) => {
        try {
            const queue = await store.voiceNotes.countByStatus();
            res.json({ queue, metrics: getMetrics() });
        } catch (e) {
            res.status(500).json({ message: 'error', error: e instanceof Error ? e.message : String(e) });
        }
    });

    // SSE stream for assistant metrics
    app.get('/api/debug/assistant/stream', (req, res) => {
        res.setHeader('Content-Type', 'text/event-stream');
        res.setHeader('Cache-Control', 'no-cache');
        res.setHeader('Connection', 'keep-alive');
        res.flushHeaders();
        const send = () => {
            const snap = snapshotMetrics();
            res.write(`event: metrics\n`);
            res.write(`data: ${JSON.stringify(snap)}\n\n`);
        };
        const interval = setInterval(send, 5000);
        send();
        req.on('close', () => { clearInterval(interval); });
    });

    // Start the receipt-voice match worker (polling) if not disabled
    if (process.env.DISABLE_MATCH_WORKER !== '1') {
        const intervalMs = Number(process.env.MATCH_TICK_MS || 5000);
        console.log(`[MATCH] Worker enabled every ${intervalMs} ms`);
        setInterval(() => {
            runMatchTick(
                {
                    store,
                    onNotify: (voice, match) => console.log(`[MATCH] voice ${voice.id} matches receipt ${match.receiptId} (${match.confidence.toFixed(2)})`)
                },
                { windowMinutes: WINDOW_MINUTES }
            ).catch(e => console.warn('[MATCH] tick error', e instanceof Error ? e.message : e));
        }, intervalMs).unref();
    } else {
        console.log('[MATCH] Worker DISABLED via env');
    }

    app.get('/__ping', (_req: express.Request, res: express.Response) => { res.json({ ok: true, ts: Date.now() }); });

    app.use(notFoundHandler);
    app.use(errorHandler);

    app.listen(PORT, () => {
        console.log(`Server started on port ${PORT}`);
    });
}

bootstrap().catch(err => {
    console.error('[BOOT] Fatal error:', err);
    process.exit(1);
});
