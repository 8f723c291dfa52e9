import { Response, NextFunction } from 'express';
import passport from 'passport';
import { AuthenticatedRequest } from '../types';

export const authenticateJWT = passport.authenticate('jwt', { session: false });

/** Narrows the request to one carrying a user id; handlers mounted after it can rely on it. */
export const requireUser = (req: AuthenticatedRequest, res: Response, next: NextFunction): void => {
    if (!req.user?.id) {
        res.status(401).json({ message: 'Authentication required' });
        return;
    }
    next();
};

export const userIdOf = (req: AuthenticatedRequest): string => req.user?.id ?? '';
