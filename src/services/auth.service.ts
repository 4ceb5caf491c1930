import bcrypt from 'bcrypt';
import crypto from 'crypto';
import { addMinutes } from 'date-fns';
import { appConfig } from '../config';
import {
    generateTokenPair,
    hashToken,
    TokenPair,
    verifyToken,
} from '../helpers/auth.helper';
import { toPublicUser } from '../helpers/user.helper';
import { IPasswordResetToken, IUser, IUserPublic, SignupInput } from '../models/user.model';
import { BCRYPT_ROUNDS, MIN_PASSWORD_LENGTH } from '../utils/constants';
import { badRequest, conflict, forbidden, notFound, unauthorized } from '../utils/errors';
import Logger from '../utils/logger';
import {
    isValidCameroonPhone,
    isValidEmail,
    normalizeCameroonPhone,
} from '../utils/validations';
import { EmailService } from './email.service';
import GoogleService from './google.service';
import UserService from './user.service';

export type AuthResult = TokenPair & {
    user: IUserPublic;
};

class AuthService {
    private userService: UserService;
    private googleService: GoogleService;
    private emailService: EmailService;
    private context: string;

    constructor(
        userService: UserService = new UserService(),
        googleService: GoogleService = new GoogleService(),
        emailService: EmailService = new EmailService(),
    ) {
        this.context = 'AuthService';
        this.userService = userService;
        this.googleService = googleService;
        this.emailService = emailService;
        Logger.info('Initializing', this.context + ' - constructor');
    }

    public async hashPassword(password: string): Promise<string> {
        return bcrypt.hash(password, BCRYPT_ROUNDS);
    }

    public async validatePassword(password: string, hash: string): Promise<boolean> {
        return bcrypt.compare(password, hash);
    }

    private checkPasswordStrength(password: string): void {
        if (password.length < MIN_PASSWORD_LENGTH) {
            throw badRequest(
                'weak_password',
                `Password must be at least ${MIN_PASSWORD_LENGTH} characters`,
            );
        }
    }

    // Issues a token pair and stores the refresh token digest
    private async startSession(user: IUser): Promise<AuthResult> {
        const tokens = generateTokenPair(user);
        await this.userService.setRefreshTokenHash(user.id, hashToken(tokens.refresh_token));
        await this.userService.recordLogin(user.id);
        const profile = await this.userService.getProfile(user.id);
        return { ...tokens, user: toPublicUser(user, profile) };
    }

    public async register(input: SignupInput): Promise<AuthResult> {
        const methodContext = this.context + ' - register';
        Logger.info('Starting', methodContext, { email: input.email });

        if (!isValidEmail(input.email)) {
            throw badRequest('invalid_email', 'Invalid email address');
        }
        this.checkPasswordStrength(input.password);
        if (!isValidCameroonPhone(input.phone_number)) {
            throw badRequest('invalid_phone', 'Invalid Cameroonian phone number');
        }
        if (input.user_type === 'admin') {
            throw forbidden('invalid_user_type', 'Admin accounts cannot be self-registered');
        }

        const phone = normalizeCameroonPhone(input.phone_number);
        if (await this.userService.findUserByEmail(input.email)) {
            throw conflict('email_taken', 'An account with this email already exists');
        }
        if (await this.userService.findUserByPhone(phone)) {
            throw conflict('phone_taken', 'This phone number is already in use');
        }

        const user = await this.userService.createUser({
            email: input.email,
            hash_password: await this.hashPassword(input.password),
            phone_number: phone,
            first_name: input.first_name,
            last_name: input.last_name,
            user_type: input.user_type,
            google_id: null,
            is_verified: false,
        });

        Logger.info('User registered', methodContext, { id: user.id });
        return this.startSession(user);
    }

    public async login(email: string, password: string): Promise<AuthResult> {
        const methodContext = this.context + ' - login';
        Logger.info('Starting', methodContext, { email });

        const user = await this.userService.findUserByEmail(email);
        if (!user || !user.is_active) {
            throw unauthorized('invalid_credentials', 'Invalid email or password');
        }
        if (!user.hash_password) {
            throw badRequest(
                'email_login_failed_use_social_login',
                'User is signed in with social account',
            );
        }
        if (!(await this.validatePassword(password, user.hash_password))) {
            throw unauthorized('invalid_credentials', 'Invalid email or password');
        }

        return this.startSession(user);
    }

    public async refresh(refreshToken: string): Promise<AuthResult> {
        const methodContext = this.context + ' - refresh';
        Logger.info('Starting', methodContext);

        let userId: string;
        try {
            userId = verifyToken(refreshToken, 'refresh').userId;
        } catch (error) {
            Logger.warn('Invalid refresh token', methodContext, error);
            throw unauthorized('invalid_refresh_token', 'Invalid refresh token');
        }

        const user = await this.userService.findUserById(userId);
        if (!user || !user.is_active || user.refresh_token_hash !== hashToken(refreshToken)) {
            throw unauthorized('invalid_refresh_token', 'Invalid refresh token');
        }

        return this.startSession(user);
    }

    public async signout(userId: string): Promise<void> {
        const methodContext = this.context + ' - signout';
        Logger.info('Starting', methodContext, { userId });
        await this.userService.setRefreshTokenHash(userId, null);
    }

    public async changePassword(
        userId: string,
        currentPassword: string,
        newPassword: string,
    ): Promise<void> {
        const methodContext = this.context + ' - changePassword';
        Logger.info('Starting', methodContext, { userId });

        const user = await this.userService.findUserById(userId);
        if (!user) {
            throw notFound('user_not_found', 'User not found');
        }
        if (!user.hash_password) {
            throw badRequest(
                'password_not_set',
                'User is signed in with social account',
            );
        }
        if (!(await this.validatePassword(currentPassword, user.hash_password))) {
            throw badRequest('invalid_current_password', 'Current password is incorrect');
        }
        this.checkPasswordStrength(newPassword);

        await this.userService.updatePassword(userId, await this.hashPassword(newPassword));
        Logger.info('Password changed', methodContext, { userId });
    }

    /**
     * Emails a single-use reset link. Unknown or disabled accounts get the
     * same silent answer so the endpoint does not reveal who is registered.
     */
    public async requestPasswordReset(email: string): Promise<void> {
        const methodContext = this.context + ' - requestPasswordReset';
        Logger.info('Starting', methodContext, { email });

        const user = await this.userService.findUserByEmail(email);
        if (!user || !user.is_active) {
            Logger.info('No active account for reset request', methodContext);
            return;
        }

        const token = crypto.randomBytes(32).toString('hex');
        await this.userService.createPasswordResetToken(
            user.id,
            hashToken(token),
            addMinutes(new Date(), appConfig.passwordResetTtl),
        );

        const resetUrl = `${appConfig.urls.frontend}/reset-password?token=${token}`;
        try {
            await this.emailService.sendEmail({
                to: user.email,
                subject: 'Réinitialisation de votre mot de passe',
                html: `<p>Bonjour ${user.first_name},</p>
<p>Pour choisir un nouveau mot de passe, suivez ce lien : <a href="${resetUrl}">${resetUrl}</a></p>
<p>Il expire dans ${appConfig.passwordResetTtl} minutes. Si vous n'êtes pas à l'origine de cette demande, ignorez cet email.</p>`,
                text: `Pour choisir un nouveau mot de passe : ${resetUrl} (valable ${appConfig.passwordResetTtl} minutes)`,
            });
        } catch (error) {
            Logger.error('Could not send reset email', methodContext, error);
        }
    }

    private async findUsableResetToken(token: string): Promise<IPasswordResetToken> {
        const stored = token ? await this.userService.findPasswordResetToken(hashToken(token)) : null;
        if (!stored || stored.used_at || stored.expires_at.getTime() <= Date.now()) {
            throw badRequest('invalid_reset_token', 'Reset link is invalid or expired');
        }
        return stored;
    }

    public async validateResetToken(token: string): Promise<{ valid: true }> {
        await this.findUsableResetToken(token);
        return { valid: true };
    }

    public async confirmPasswordReset(token: string, newPassword: string): Promise<void> {
        const methodContext = this.context + ' - confirmPasswordReset';
        Logger.info('Starting', methodContext);

        const stored = await this.findUsableResetToken(token);
        this.checkPasswordStrength(newPassword);

        await this.userService.resetPassword(stored, await this.hashPassword(newPassword));
        Logger.info('Password reset', methodContext, { userId: stored.user_id });
    }

    /**
     * Finds the user by Google id, then by email (linking the account), and
     * creates a tenant otherwise.
     */
    public async googleSignIn(idToken: string): Promise<AuthResult> {
        const methodContext = this.context + ' - googleSignIn';
        Logger.info('Starting', methodContext);

        const identity = await this.googleService.verifyGoogleToken(idToken);

        let user = await this.userService.findUserByGoogleId(identity.google_id);
        if (!user) {
            const byEmail = await this.userService.findUserByEmail(identity.email);
            if (byEmail) {
                await this.userService.linkGoogleAccount(byEmail.id, identity.google_id);
                user = byEmail;
            } else {
                user = await this.userService.createUser({
                    email: identity.email,
                    hash_password: null,
                    phone_number: null,
                    first_name: identity.first_name,
                    last_name: identity.last_name,
                    user_type: 'tenant',
                    google_id: identity.google_id,
                    is_verified: true,
                });
            }
        }

        if (!user.is_active) {
            throw forbidden('account_disabled', 'This account is disabled');
        }
        return this.startSession(user);
    }
}

export default AuthService;
