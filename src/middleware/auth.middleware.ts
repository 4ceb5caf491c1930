import { Response, Request, NextFunction } from 'express';
import jwt from 'jsonwebtoken';
import { verifyToken } from '../helpers/auth.helper';
import { UserType } from '../models/user.model';
import { isApiError } from '../utils/errors';
import Logger from '../utils/logger';

export const validateRequestBody = (requiredFields: string[]) => {
    const methodContext = 'ValidateRequestBody';
    return (req: Request, res: Response, next: NextFunction) => {
        const body: Record<string, unknown> =
            typeof req.body === 'object' && req.body !== null ? req.body : {};
        const missingFields = requiredFields.filter((field) => {
            const value = body[field];
            return value === undefined || value === null || value === '';
        });

        if (missingFields.length > 0) {
            Logger.error(
                'Validation failed',
                methodContext,
                `Missing fields: ${missingFields.join(', ')}`,
            );
            return res.status(400).json({
                error: 'Validation failed',
                message: `Missing required fields: ${missingFields.join(', ')}`,
                missingFields,
            });
        }

        next();
    };
};

export const authenticateUser = (
    req: Request,
    res: Response,
    next: NextFunction,
) => {
    const methodContext = 'AuthenticateUser';
    try {
        const authHeader = req.headers.authorization;
        if (!authHeader) {
            Logger.error('No authorization header found', methodContext);
            return res.status(401).json({
                error: 'Authentication required',
                message: 'No authorization header found',
            });
        }

        const [scheme, token] = authHeader.split(' ');

        if (scheme !== 'Bearer' || !token) {
            Logger.error('No token provided', methodContext);
            return res.status(401).json({
                error: 'Authentication required',
                message: 'No token provided',
            });
        }

        req.user = verifyToken(token, 'access');
        next();
    } catch (error) {
        if (error instanceof jwt.TokenExpiredError) {
            Logger.error('Token expired', methodContext, error);
            return res.status(401).json({
                error: 'Token expired',
                message: 'Your session has expired. Please sign in again.',
            });
        }

        if (error instanceof jwt.JsonWebTokenError) {
            Logger.error('Invalid token', methodContext, error);
            return res.status(401).json({
                error: 'Invalid token',
                message: 'Invalid authentication token',
            });
        }

        if (isApiError(error) && error.statusCode === 500) {
            Logger.error('Authentication is not configured', methodContext, error);
            return res.status(500).json({
                error: 'Server configuration error',
                message: 'Authentication is not properly configured',
            });
        }

        Logger.error('Authentication error', methodContext, error);
        return res.status(401).json({
            error: 'Authentication failed',
            message: 'Unable to authenticate request',
        });
    }
};

export const requireUserType = (...allowed: UserType[]) => {
    const methodContext = 'RequireUserType';
    return (req: Request, res: Response, next: NextFunction) => {
        if (!req.user || !allowed.includes(req.user.userType)) {
            Logger.warn('Forbidden user type', methodContext, {
                userType: req.user?.userType,
                allowed,
            });
            return res.status(403).json({
                success: false,
                code: 'forbidden',
                message: `Only ${allowed.join(', ')} accounts can do this`,
            });
        }
        next();
    };
};
