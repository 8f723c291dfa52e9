import { createAssistantRoutes } from './assistant';
import { createCategoryRoutes } from './categories';
import { createReceiptRoutes } from './receipts';

export {
    createAssistantRoutes,
    createCategoryRoutes,
    createReceiptRoutes
};
