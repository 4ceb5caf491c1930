import { Request, Response } from 'express';
import { getAuthUser } from '../helpers/auth.helper';
import { getBody, pickOption, readString } from '../helpers/request.helper';
import { respondWithError } from '../middleware/error.middleware';
import { USER_TYPES } from '../models/user.model';
import AuthService from '../services/auth.service';
import Logger from '../utils/logger';

class AuthController {
    private authService: AuthService;
    private context: string;

    constructor(authService: AuthService = new AuthService()) {
        this.authService = authService;
        this.context = 'AuthController';
        Logger.info('Initializing', this.context + ' - constructor');
    }

    public register = async (req: Request, res: Response) => {
        const methodContext = this.context + ' - register';
        try {
            const body = getBody(req);
            const result = await this.authService.register({
                email: (readString(body, 'email') ?? '').trim().toLowerCase(),
                password: readString(body, 'password') ?? '',
                phone_number: readString(body, 'phone_number') ?? '',
                first_name: (readString(body, 'first_name') ?? '').trim(),
                last_name: (readString(body, 'last_name') ?? '').trim(),
                user_type: pickOption(body.user_type, USER_TYPES) ?? 'tenant',
            });
            Logger.info('User registered', methodContext, { id: result.user.id });
            res.status(201).json({ success: true, data: result });
        } catch (error) {
            respondWithError(res, error, methodContext);
        }
    };

    public signinWithEmail = async (req: Request, res: Response) => {
        const methodContext = this.context + ' - signinWithEmail';
        try {
            const body = getBody(req);
            const result = await this.authService.login(
                (readString(body, 'email') ?? '').trim().toLowerCase(),
                readString(body, 'password') ?? '',
            );
            Logger.info('User signed in', methodContext, { id: result.user.id });
            res.status(200).json({ success: true, data: result });
        } catch (error) {
            respondWithError(res, error, methodContext);
        }
    };

    public refreshToken = async (req: Request, res: Response) => {
        const methodContext = this.context + ' - refreshToken';
        try {
            const body = getBody(req);
            const result = await this.authService.refresh(readString(body, 'refresh_token') ?? '');
            res.status(200).json({ success: true, data: result });
        } catch (error) {
            respondWithError(res, error, methodContext);
        }
    };

    public googleSignIn = async (req: Request, res: Response) => {
        const methodContext = this.context + ' - googleSignIn';
        try {
            const body = getBody(req);
            const result = await this.authService.googleSignIn(readString(body, 'idToken') ?? '');
            res.status(200).json({ success: true, data: result });
        } catch (error) {
            respondWithError(res, error, methodContext);
        }
    };

    public signout = async (req: Request, res: Response) => {
        const methodContext = this.context + ' - signout';
        try {
            const user = getAuthUser(req);
            await this.authService.signout(user.userId);
            res.status(200).json({ success: true, data: { message: 'Signed out' } });
        } catch (error) {
            respondWithError(res, error, methodContext);
        }
    };

    public changePassword = async (req: Request, res: Response) => {
        const methodContext = this.context + ' - changePassword';
        try {
            const user = getAuthUser(req);
            const body = getBody(req);
            await this.authService.changePassword(
                user.userId,
                readString(body, 'current_password') ?? '',
                readString(body, 'new_password') ?? '',
            );
            res.status(200).json({ success: true, data: { message: 'Password changed' } });
        } catch (error) {
            respondWithError(res, error, methodContext);
        }
    };

    public requestPasswordReset = async (req: Request, res: Response) => {
        const methodContext = this.context + ' - requestPasswordReset';
        try {
            const body = getBody(req);
            await this.authService.requestPasswordReset((readString(body, 'email') ?? '').trim().toLowerCase());
            res.status(200).json({
                success: true,
                data: { message: 'If an account exists for this email, a reset link has been sent' },
            });
        } catch (error) {
            respondWithError(res, error, methodContext);
        }
    };

    public validateResetToken = async (req: Request, res: Response) => {
        const methodContext = this.context + ' - validateResetToken';
        try {
            const body = getBody(req);
            const result = await this.authService.validateResetToken(readString(body, 'token') ?? '');
            res.status(200).json({ success: true, data: result });
        } catch (error) {
            respondWithError(res, error, methodContext);
        }
    };

    public confirmPasswordReset = async (req: Request, res: Response) => {
        const methodContext = this.context + ' - confirmPasswordReset';
        try {
            const body = getBody(req);
            await this.authService.confirmPasswordReset(
                readString(body, 'token') ?? '',
                readString(body, 'new_password') ?? '',
            );
            res.status(200).json({ success: true, data: { message: 'Password reset' } });
        } catch (error) {
            respondWithError(res, error, methodContext);
        }
    };
}

export default AuthController;
