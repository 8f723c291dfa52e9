import express, { Request, Response, NextFunction } from 'express';
import { corsMiddleware } from './cors';
import { requestLogger } from './logger';
import passport from './passport';

export const jsonMiddleware = express.json({ limit: '1mb' });
export const urlencodedMiddleware = express.urlencoded({ extended: true });

export const securityHeaders = (_req: Request, res: Response, next: NextFunction): void => {
    res.setHeader('X-Content-Type-Options', 'nosniff');
    res.setHeader('X-Frame-Options', 'DENY');
    res.setHeader('Referrer-Policy', 'no-referrer');
    next();
};

export const notFoundHandler = (req: Request, res: Response): void => {
    res.status(404).json({ message: `Not Found: ${req.method} ${req.originalUrl}` });
};

export const errorHandler = (err: unknown, _req: Request, res: Response, _next: NextFunction): void => {
    console.error('Unhandled error:', err);
    if (res.headersSent) return;
    res.status(500).json({ message: 'Internal Server Error' });
};

export { corsMiddleware, requestLogger, passport };
