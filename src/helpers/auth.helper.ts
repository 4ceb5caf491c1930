import crypto from 'crypto';
import { Request } from 'express';
import jwt from 'jsonwebtoken';
import '../types/express';
import { appConfig } from '../config';
import { AuthenticatedUser, UserToken } from '../models/request.model';
import { USER_TYPES, UserType } from '../models/user.model';
import { ApiError, unauthorized } from '../utils/errors';

type TokenSubject = {
    id: string;
    email: string;
    user_type: UserType;
};

export type TokenPair = {
    access_token: string;
    refresh_token: string;
    expires_in: number;
};

const getSecret = (): string => {
    if (!appConfig.jwt.secret) {
        throw new ApiError(500, 'server_config_error', 'JWT_SECRET is not configured');
    }
    return appConfig.jwt.secret;
};

const signToken = (
    user: TokenSubject,
    tokenType: UserToken['tokenType'],
    expiresIn: number,
): string =>
    jwt.sign(
        {
            userId: user.id,
            email: user.email,
            userType: user.user_type,
            tokenType,
        },
        getSecret(),
        { expiresIn },
    );

export const generateTokenPair = (user: TokenSubject): TokenPair => ({
    access_token: signToken(user, 'access', appConfig.jwt.accessExpiresIn),
    refresh_token: signToken(user, 'refresh', appConfig.jwt.refreshExpiresIn),
    expires_in: appConfig.jwt.accessExpiresIn,
});

const isUserType = (value: unknown): value is UserType =>
    typeof value === 'string' && USER_TYPES.some((type) => type === value);

/**
 * Throws jsonwebtoken's own errors for expired or tampered tokens, and an
 * ApiError when the payload is not one of ours.
 */
export const verifyToken = (
    token: string,
    expectedType: UserToken['tokenType'],
): AuthenticatedUser => {
    const decoded = jwt.verify(token, getSecret());

    if (
        typeof decoded === 'string' ||
        typeof decoded.userId !== 'string' ||
        typeof decoded.email !== 'string' ||
        !isUserType(decoded.userType) ||
        decoded.tokenType !== expectedType
    ) {
        throw unauthorized('invalid_token', 'Invalid authentication token');
    }

    return {
        userId: decoded.userId,
        email: decoded.email,
        userType: decoded.userType,
    };
};

// Refresh tokens are stored as a digest, never in clear
export const hashToken = (token: string): string =>
    crypto.createHash('sha256').update(token).digest('hex');

export const getAuthUser = (req: Request): AuthenticatedUser => {
    if (!req.user) {
        throw unauthorized('authentication_required', 'Authentication required');
    }
    return req.user;
};
