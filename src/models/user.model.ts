export const USER_TYPES = ['tenant', 'owner', 'admin'] as const;

export type UserType = (typeof USER_TYPES)[number];

export type IUser = {
    id: string;
    email: string;
    phone_number: string | null;
    first_name: string;
    last_name: string;
    user_type: UserType;
    is_active: boolean;
    is_verified: boolean;
    google_id: string | null;
    hash_password: string | null;
    refresh_token_hash: string | null;
    created_at: Date;
    last_login: Date | null;
};

// Only the SHA-256 digest of the emailed token is stored
export type IPasswordResetToken = {
    id: number;
    user_id: string;
    expires_at: Date;
    used_at: Date | null;
};

export type IProfile = {
    user_id: string;
    avatar_url: string | null;
    bio: string;
    city: string;
    country: string;
    avg_rating: number;
    rating_count: number;
};

// What leaves the API: never the password or refresh token hash
export type IUserPublic = {
    id: string;
    email: string;
    phone_number: string | null;
    first_name: string;
    last_name: string;
    user_type: UserType;
    is_verified: boolean;
    created_at: Date;
    profile: IProfile | null;
};

export type SignupInput = {
    email: string;
    password: string;
    phone_number: string;
    first_name: string;
    last_name: string;
    user_type: UserType;
};

export type GoogleSignupInput = {
    email: string;
    google_id: string;
    first_name: string;
    last_name: string;
};

export type IUserUpdateInput = {
    first_name?: string;
    last_name?: string;
    phone_number?: string;
    bio?: string;
    city?: string;
};
