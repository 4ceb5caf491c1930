import { Response, Request, NextFunction, RequestHandler } from 'express';
import '../types/express';
import { appConfig } from '../config';
import Logger from '../utils/logger';

// Maintenance routes called by operators, not users
export const apiKeyAuth: RequestHandler = (
    req: Request,
    res: Response,
    next: NextFunction,
) => {
    const methodContext = 'ApiKeyAuth';
    const apiKey = req.headers['x-api-key'];

    if (!appConfig.adminApiKey || typeof apiKey !== 'string' || apiKey !== appConfig.adminApiKey) {
        Logger.warn('Invalid API key', methodContext);
        res.status(401).json({
            success: false,
            code: 'invalid_api_key',
            message: 'Invalid API key',
        });
        return;
    }

    next();
};

// Keeps the exact bytes the gateway signed
export const captureRawBody: RequestHandler = (req, _res, next) => {
    const body: unknown = req.body;
    req.rawBody = Buffer.isBuffer(body) ? body.toString('utf8') : '';
    next();
};
