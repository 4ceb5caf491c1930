import { Row } from '../database';
import {
    IPasswordResetToken,
    IProfile,
    IUser,
    IUserPublic,
    USER_TYPES,
    UserType,
} from '../models/user.model';
import {
    readBoolean,
    readDate,
    readNumber,
    readOptionalDate,
    readOptionalString,
    readString,
} from './row.helper';

export const toUserType = (value: unknown): UserType =>
    USER_TYPES.find((type) => type === value) ?? 'tenant';

export const toUser = (row: Row): IUser => ({
    id: readString(row, 'id'),
    email: readString(row, 'email'),
    phone_number: readOptionalString(row, 'phone_number'),
    first_name: readOptionalString(row, 'first_name') ?? '',
    last_name: readOptionalString(row, 'last_name') ?? '',
    user_type: toUserType(row.user_type),
    is_active: readBoolean(row, 'is_active'),
    is_verified: readBoolean(row, 'is_verified'),
    google_id: readOptionalString(row, 'google_id'),
    hash_password: readOptionalString(row, 'hash_password'),
    refresh_token_hash: readOptionalString(row, 'refresh_token_hash'),
    created_at: readDate(row, 'created_at'),
    last_login: readOptionalDate(row, 'last_login'),
});

export const toPasswordResetToken = (row: Row): IPasswordResetToken => ({
    id: readNumber(row, 'id'),
    user_id: readString(row, 'user_id'),
    expires_at: readDate(row, 'expires_at'),
    used_at: readOptionalDate(row, 'used_at'),
});

export const toProfile = (row: Row): IProfile => ({
    user_id: readString(row, 'user_id'),
    avatar_url: readOptionalString(row, 'avatar_url'),
    bio: readOptionalString(row, 'bio') ?? '',
    city: readOptionalString(row, 'city') ?? '',
    country: readOptionalString(row, 'country') ?? 'Cameroun',
    avg_rating: readNumber(row, 'avg_rating'),
    rating_count: readNumber(row, 'rating_count'),
});

export const toPublicUser = (user: IUser, profile: IProfile | null): IUserPublic => ({
    id: user.id,
    email: user.email,
    phone_number: user.phone_number,
    first_name: user.first_name,
    last_name: user.last_name,
    user_type: user.user_type,
    is_verified: user.is_verified,
    created_at: user.created_at,
    profile,
});
