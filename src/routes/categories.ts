import { Router } from 'express';
import { authenticateJWT, requireUser } from '../middleware/auth';
import { CategoryHandlers } from '../api/categories';

export const createCategoryRoutes = (handlers: CategoryHandlers): Router => {
    const router = Router();

    router.get('/', authenticateJWT, requireUser, handlers.getUserCategories);

    router.get('/suggestions', authenticateJWT, requireUser, handlers.getSuggestions);

    router.get('/keywords/:key', authenticateJWT, requireUser, handlers.getKeywords);

    router.post('/', authenticateJWT, requireUser, handlers.createCategory);

    router.put('/:id', authenticateJWT, requireUser, handlers.updateCategory);

    router.delete('/:id', authenticateJWT, requireUser, handlers.deleteCategory);

    return router;
};
