import cors, { CorsOptions } from 'cors';

// Web and mobile dev clients of the assistant
const defaultOrigins = ['http://localhost:5173', 'http://localhost:8081', 'http://localhost:3001'];

export function parseOrigins(raw: string | undefined): string[] {
    const list = raw?.split(',').map(o => o.trim()).filter(Boolean) || [];
    return list.length ? list : defaultOrigins;
}

export const corsOptions: CorsOptions = {
    origin: parseOrigins(process.env.CLIENT_URLS),
    credentials: true,
    methods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', 'Accept-Language']
};

export const corsMiddleware = cors(corsOptions);
