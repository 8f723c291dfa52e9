import { Request, Response, NextFunction } from 'express';

const debugEnabled = () => process.env.ASSISTANT_DEBUG === 'true';

export const requestLogger = (req: Request, res: Response, next: NextFunction): void => {
    if (debugEnabled()) {
        const timestamp = new Date().toISOString();
        console.log(`[REQ] ${req.method} ${req.originalUrl} from ${req.ip ?? 'unknown'} @${timestamp}`);
        res.on('finish', () => {
            if (res.statusCode >= 400) {
                console.warn(`[RES] ${res.statusCode} ${req.method} ${req.originalUrl}`);
            }
        });
    }
    next();
};
