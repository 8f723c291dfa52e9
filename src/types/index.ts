import { Request } from 'express';

declare global {
    namespace Express {
        // filled in by the passport jwt strategy
        interface User {
            id: string;
            email: string;
        }
    }
}

export type AuthenticatedRequest = Request;

export * from './assistant';
export * from './store';
