import { NextFunction, Request, Response } from 'express';
import multer from 'multer';
import { isApiError } from '../utils/errors';
import Logger from '../utils/logger';

export const respondWithError = (
    res: Response,
    error: unknown,
    methodContext: string,
) => {
    if (isApiError(error)) {
        Logger.warn(error.message, methodContext, { code: error.code });
        return res.status(error.statusCode).json({
            success: false,
            code: error.code,
            message: error.message,
        });
    }

    Logger.error('Unexpected error', methodContext, error);
    return res.status(500).json({
        success: false,
        code: 'internal_error',
        message: 'An unexpected error occurred.',
    });
};

const hasStatus = (error: unknown): error is { status: number; type?: string } =>
    typeof error === 'object' &&
    error !== null &&
    'status' in error &&
    typeof error.status === 'number';

// Errors thrown outside controller try/catch: body parsing, uploads
export const errorHandler = (
    error: unknown,
    _req: Request,
    res: Response,
    // eslint-disable-next-line @typescript-eslint/no-unused-vars
    _next: NextFunction,
) => {
    const methodContext = 'ErrorHandler';

    if (error instanceof multer.MulterError) {
        Logger.warn(error.message, methodContext, { code: error.code });
        return res.status(400).json({
            success: false,
            code: error.code.toLowerCase(),
            message: error.message,
        });
    }

    if (hasStatus(error) && error.status === 400) {
        Logger.warn('Malformed request body', methodContext);
        return res.status(400).json({
            success: false,
            code: 'invalid_body',
            message: 'Malformed request body',
        });
    }

    return respondWithError(res, error, methodContext);
};
