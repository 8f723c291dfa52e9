import { Router } from 'express';
import { authenticateJWT, requireUser } from '../middleware/auth';
import { rateLimitCommands } from '../middleware/validation';
import { AssistantHandlers } from '../api/assistant';

export const createAssistantRoutes = (handlers: AssistantHandlers): Router => {
    const router = Router();

    router.get('/commands/supported', authenticateJWT, requireUser, handlers.getSupportedCommands);

    router.post('/commands', authenticateJWT, requireUser, rateLimitCommands, handlers.handleCommand);

    router.post('/commands/parse', authenticateJWT, requireUser, rateLimitCommands, handlers.parseCommand);

    return router;
};
