import { Client, DatabaseClient, Queryable } from '../database';
import { toPasswordResetToken, toProfile, toPublicUser, toUser } from '../helpers/user.helper';
import {
    IPasswordResetToken,
    IProfile,
    IUser,
    IUserPublic,
    IUserUpdateInput,
    UserType,
} from '../models/user.model';
import { conflict, notFound } from '../utils/errors';
import Logger from '../utils/logger';
import { normalizeCameroonPhone } from '../utils/validations';

export type UserInsert = {
    email: string;
    hash_password: string | null;
    phone_number: string | null;
    first_name: string;
    last_name: string;
    user_type: UserType;
    google_id: string | null;
    is_verified: boolean;
};

class UserService {
    private client: DatabaseClient;
    private context: string;

    constructor(client: DatabaseClient = new Client()) {
        this.context = 'UserService';
        this.client = client;
        Logger.info('Initializing', this.context + ' - constructor');
    }

    private async findOneBy(column: 'id' | 'email' | 'phone_number' | 'google_id', value: string) {
        const result = await this.client.query(
            `SELECT * FROM users WHERE ${column} = $1`,
            [value],
        );
        const row = result.rows[0];
        return row ? toUser(row) : null;
    }

    public async findUserById(id: string): Promise<IUser | null> {
        return this.findOneBy('id', id);
    }

    public async findUserByEmail(email: string): Promise<IUser | null> {
        return this.findOneBy('email', email.trim().toLowerCase());
    }

    public async findUserByPhone(phone: string): Promise<IUser | null> {
        return this.findOneBy('phone_number', phone);
    }

    public async findUserByGoogleId(googleId: string): Promise<IUser | null> {
        return this.findOneBy('google_id', googleId);
    }

    public async createUser(input: UserInsert): Promise<IUser> {
        const methodContext = this.context + ' - createUser';
        Logger.info('Starting', methodContext, { email: input.email });

        const user = await this.client.transaction(async (tx: Queryable) => {
            const inserted = await tx.query(
                `INSERT INTO users (
                    email, hash_password, phone_number, first_name, last_name,
                    user_type, google_id, is_verified
                ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
                RETURNING *`,
                [
                    input.email.trim().toLowerCase(),
                    input.hash_password,
                    input.phone_number,
                    input.first_name,
                    input.last_name,
                    input.user_type,
                    input.google_id,
                    input.is_verified,
                ],
            );
            const created = toUser(inserted.rows[0]);
            await tx.query('INSERT INTO profiles (user_id) VALUES ($1)', [created.id]);
            return created;
        });

        Logger.info('User created successfully', methodContext, { id: user.id });
        return user;
    }

    public async getProfile(userId: string): Promise<IProfile | null> {
        const result = await this.client.query(
            'SELECT * FROM profiles WHERE user_id = $1',
            [userId],
        );
        const row = result.rows[0];
        return row ? toProfile(row) : null;
    }

    public async getPublicUser(userId: string): Promise<IUserPublic> {
        const methodContext = this.context + ' - getPublicUser';
        Logger.info('Starting', methodContext, { userId });

        const user = await this.findUserById(userId);
        if (!user) {
            throw notFound('user_not_found', 'User not found');
        }
        return toPublicUser(user, await this.getProfile(userId));
    }

    public async updateUser(userId: string, input: IUserUpdateInput): Promise<IUserPublic> {
        const methodContext = this.context + ' - updateUser';
        Logger.info('Starting', methodContext, { userId, fields: Object.keys(input) });

        const phone = input.phone_number ? normalizeCameroonPhone(input.phone_number) : undefined;
        if (phone) {
            const owner = await this.findUserByPhone(phone);
            if (owner && owner.id !== userId) {
                throw conflict('phone_taken', 'This phone number is already in use');
            }
        }

        await this.client.transaction(async (tx: Queryable) => {
            await tx.query(
                `UPDATE users
                 SET first_name = COALESCE($2, first_name),
                     last_name = COALESCE($3, last_name),
                     phone_number = COALESCE($4, phone_number),
                     updated_at = CURRENT_TIMESTAMP
                 WHERE id = $1`,
                [userId, input.first_name ?? null, input.last_name ?? null, phone ?? null],
            );
            await tx.query(
                `UPDATE profiles
                 SET bio = COALESCE($2, bio),
                     city = COALESCE($3, city)
                 WHERE user_id = $1`,
                [userId, input.bio ?? null, input.city ?? null],
            );
        });

        Logger.info('User updated successfully', methodContext, { userId });
        return this.getPublicUser(userId);
    }

    public async updateAvatar(userId: string, avatarUrl: string): Promise<void> {
        await this.client.query(
            'UPDATE profiles SET avatar_url = $2 WHERE user_id = $1',
            [userId, avatarUrl],
        );
    }

    public async setRefreshTokenHash(userId: string, hash: string | null): Promise<void> {
        await this.client.query(
            'UPDATE users SET refresh_token_hash = $2 WHERE id = $1',
            [userId, hash],
        );
    }

    // Changing the password also ends every open session
    public async updatePassword(userId: string, hashPassword: string, tx: Queryable = this.client): Promise<void> {
        await tx.query(
            `UPDATE users
             SET hash_password = $2, refresh_token_hash = NULL, updated_at = CURRENT_TIMESTAMP
             WHERE id = $1`,
            [userId, hashPassword],
        );
    }

    /**
     * Stores a new reset token digest and drops the user's earlier unused
     * ones, so only the latest emailed link works.
     */
    public async createPasswordResetToken(userId: string, tokenHash: string, expiresAt: Date): Promise<void> {
        await this.client.transaction(async (tx: Queryable) => {
            await tx.query(
                'DELETE FROM password_reset_tokens WHERE user_id = $1 AND used_at IS NULL',
                [userId],
            );
            await tx.query(
                `INSERT INTO password_reset_tokens (user_id, token_hash, expires_at)
                 VALUES ($1, $2, $3)`,
                [userId, tokenHash, expiresAt],
            );
        });
    }

    public async findPasswordResetToken(tokenHash: string): Promise<IPasswordResetToken | null> {
        const result = await this.client.query(
            'SELECT * FROM password_reset_tokens WHERE token_hash = $1',
            [tokenHash],
        );
        const row = result.rows[0];
        return row ? toPasswordResetToken(row) : null;
    }

    public async resetPassword(token: IPasswordResetToken, hashPassword: string): Promise<void> {
        await this.client.transaction(async (tx: Queryable) => {
            await this.updatePassword(token.user_id, hashPassword, tx);
            await tx.query(
                'UPDATE password_reset_tokens SET used_at = CURRENT_TIMESTAMP WHERE id = $1',
                [token.id],
            );
        });
    }

    public async recordLogin(userId: string): Promise<void> {
        await this.client.query(
            'UPDATE users SET last_login = CURRENT_TIMESTAMP WHERE id = $1',
            [userId],
        );
    }

    public async linkGoogleAccount(userId: string, googleId: string): Promise<void> {
        await this.client.query(
            'UPDATE users SET google_id = $2, is_verified = TRUE WHERE id = $1',
            [userId, googleId],
        );
    }

    // Owner rating is the average over reviews of all their properties
    public async refreshOwnerRating(ownerId: string): Promise<void> {
        const methodContext = this.context + ' - refreshOwnerRating';
        Logger.info('Starting', methodContext, { ownerId });
        await this.client.query(
            `UPDATE profiles
             SET avg_rating = stats.avg_rating, rating_count = stats.rating_count
             FROM (
                SELECT COALESCE(ROUND(AVG(r.rating)::numeric, 1), 0) AS avg_rating,
                       COUNT(r.id) AS rating_count
                FROM reviews r
                JOIN properties p ON p.id = r.property_id
                WHERE p.owner_id = $1 AND r.is_public = TRUE
             ) stats
             WHERE profiles.user_id = $1`,
            [ownerId],
        );
    }
}

export default UserService;
