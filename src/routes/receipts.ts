import { Router } from 'express';
import { authenticateJWT, requireUser } from '../middleware/auth';
import { ReceiptHandlers } from '../api/receipts';

export const createReceiptRoutes = (handlers: ReceiptHandlers): Router => {
    const router = Router();

    router.post('/receipts', authenticateJWT, requireUser, handlers.createReceipt);

    router.post('/voice-notes', authenticateJWT, requireUser, handlers.createVoiceNote);

    router.post('/voice-notes/:id/match', authenticateJWT, requireUser, handlers.matchNow);

    router.get('/voice-notes/:id/matches', authenticateJWT, requireUser, handlers.listMatches);

    return router;
};
