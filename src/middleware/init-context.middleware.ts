import crypto from 'crypto';
import { Request, Response, NextFunction } from 'express';
import '../types/express';
import Logger from '../utils/logger';

export const initContextMiddleware = (
    req: Request,
    res: Response,
    next: NextFunction,
) => {
    const methodContext = 'InitContextMiddleware';
    const incoming = req.headers['x-request-id'];
    const requestId =
        typeof incoming === 'string' && incoming ? incoming : crypto.randomUUID();

    req.context = { requestId, startedAt: Date.now() };
    res.setHeader('x-request-id', requestId);

    res.on('finish', () => {
        Logger.info(`${req.method} ${req.originalUrl}`, methodContext, {
            requestId,
            status: res.statusCode,
            durationMs: Date.now() - (req.context?.startedAt ?? Date.now()),
        });
    });

    next();
};
