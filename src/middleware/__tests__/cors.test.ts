import { describe, expect, it } from 'vitest';
import { parseOrigins } from '../cors';

describe('parseOrigins', () => {
    it('splits and trims a comma list', () => {
        expect(parseOrigins(' https://app.example.test , http://localhost:5173,')).toEqual(['https://app.example.test', 'http://localhost:5173']);
    });

    it('falls back to the dev clients', () => {
        expect(parseOrigins(undefined)).toEqual(['http://localhost:5173', 'http://localhost:8081', 'http://localhost:3001']);
        expect(parseOrigins(' , ')).toEqual(['http://localhost:5173', 'http://localhost:8081', 'http://localhost:3001']);
    });
});
