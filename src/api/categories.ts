import { Response } from 'express';
import { AuthenticatedRequest, CategoryStore, isLanguage, TransactionStore } from '../types';
import { userIdOf } from '../middleware/auth';
import { CategoryDictionary, CategoryMatcher } from '../utils/nlp/categoryMatcher';

export interface CategoryHandlers {
    getUserCategories(req: AuthenticatedRequest, res: Response): Promise<void>;
    createCategory(req: AuthenticatedRequest, res: Response): Promise<void>;
    updateCategory(req: AuthenticatedRequest, res: Response): Promise<void>;
    deleteCategory(req: AuthenticatedRequest, res: Response): Promise<void>;
    getSuggestions(req: AuthenticatedRequest, res: Response): Promise<void>;
    getKeywords(req: AuthenticatedRequest, res: Response): void;
}

const nameFrom = (body: unknown): string => {
    if (typeof body !== 'object' || body === null || !('name' in body)) return '';
    return typeof body.name === 'string' ? body.name.trim() : '';
};

const keywordsFrom = (body: unknown): string[] => {
    if (typeof body !== 'object' || body === null || !('keywords' in body) || !Array.isArray(body.keywords)) return [];
    return body.keywords.filter((k): k is string => typeof k === 'string' && k.trim().length > 0).map(k => k.trim().toLowerCase());
};

export const createCategoryHandlers = (
    categories: CategoryStore,
    transactions: TransactionStore,
    dictionary: CategoryDictionary
): CategoryHandlers => ({
    async getUserCategories(req, res) {
        try {
            const list = await categories.listByUser(userIdOf(req));
            res.json({ categories: list });
        } catch (error) {
            console.error('Error getting user categories:', error);
            res.status(500).json({ message: 'Internal Server Error' });
        }
    },

    async createCategory(req, res) {
        try {
            const name = nameFrom(req.body);
            if (!name) {
                res.status(400).json({ message: 'Name is required' });
                return;
            }
            const category = await categories.create(userIdOf(req), name, keywordsFrom(req.body));
            if (!category) {
                res.status(409).json({ message: 'Category already exists' });
                return;
            }
            res.status(201).json({ message: 'Category created successfully', category });
        } catch (error) {
            console.error('Error creating category:', error);
            res.status(500).json({ message: 'Internal Server Error' });
        }
    },

    async updateCategory(req, res) {
        try {
            const name = nameFrom(req.body);
            if (!name) {
                res.status(400).json({ message: 'Name is required' });
                return;
            }
            const updated = await categories.rename(userIdOf(req), req.params.id, name);
            if (!updated) {
                res.status(404).json({ message: 'Category not found, access denied or name taken' });
                return;
            }
            res.json({ message: 'Category updated successfully' });
        } catch (error) {
            console.error('Error updating category:', error);
            res.status(500).json({ message: 'Internal Server Error' });
        }
    },

    async deleteCategory(req, res) {
        try {
            const userId = userIdOf(req);
            const { id } = req.params;
            const used = await transactions.countByCategory(userId, id);
            const removed = await categories.remove(userId, id);
            if (!removed) {
                res.status(404).json({ message: 'Category not found or access denied' });
                return;
            }
            res.json({ message: 'Category deleted successfully', transactions: used });
        } catch (error) {
            console.error('Error deleting category:', error);
            res.status(500).json({ message: 'Internal Server Error' });
        }
    },

    async getSuggestions(req, res) {
        try {
            const language = isLanguage(req.query.language) ? req.query.language : 'ru';
            const limit = Math.min(Math.max(Number(req.query.limit) || 10, 1), 50);
            const matcher = new CategoryMatcher(dictionary, categories);
            const suggestions = await matcher.suggestCategories(userIdOf(req), language, limit);
            res.json({ language, suggestions });
        } catch (error) {
            console.error('Error suggesting categories:', error);
            res.status(500).json({ message: 'Internal Server Error' });
        }
    },

    getKeywords(req, res) {
        const matcher = new CategoryMatcher(dictionary, categories);
        const keywords = matcher.keywordsFor(req.params.key);
        if (!keywords.length) {
            res.status(404).json({ message: 'Unknown dictionary category' });
            return;
        }
        res.json({ key: req.params.key, keywords });
    },
});
