import { Response } from 'express';
import { AuthenticatedRequest, isLanguage, Language } from '../types';
import { userIdOf } from '../middleware/auth';
import { parseUtteranceBody } from '../middleware/validation';
import { AssistantService } from '../utils/nlp/assistantService';

export interface AssistantHandlers {
    handleCommand(req: AuthenticatedRequest, res: Response): Promise<void>;
    parseCommand(req: AuthenticatedRequest, res: Response): Promise<void>;
    getSupportedCommands(req: AuthenticatedRequest, res: Response): void;
}

const languageFrom = (value: unknown, fallback: Language): Language => (isLanguage(value) ? value : fallback);

export const createAssistantHandlers = (service: AssistantService, now: () => Date = () => new Date()): AssistantHandlers => ({
    async handleCommand(req, res) {
        try {
            const parsed = parseUtteranceBody(req.body, now());
            if (!parsed.ok) {
                res.status(400).json({ message: parsed.message });
                return;
            }
            const outcome = await service.handleUtterance(parsed.value, userIdOf(req));
            res.json({ outcome });
        } catch (error) {
            console.error('Error handling assistant command:', error);
            res.status(500).json({ message: 'Internal Server Error' });
        }
    },

    async parseCommand(req, res) {
        try {
            const parsed = parseUtteranceBody(req.body, now());
            if (!parsed.ok) {
                res.status(400).json({ message: parsed.message });
                return;
            }
            const classification = await service.parse(parsed.value, userIdOf(req));
            res.json({ classification });
        } catch (error) {
            console.error('Error parsing assistant command:', error);
            res.status(500).json({ message: 'Internal Server Error' });
        }
    },

    getSupportedCommands(req, res) {
        const language = languageFrom(req.query.language, 'ru');
        res.json({ language, commands: service.describeCommands(language) });
    },
});
