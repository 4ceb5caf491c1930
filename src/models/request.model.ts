import { UserType } from './user.model';

export type AuthenticatedUser = {
    userId: string;
    email: string;
    userType: UserType;
};

export type UserToken = AuthenticatedUser & {
    tokenType: 'access' | 'refresh';
    iat?: number;
    exp?: number;
};

export type Pagination = {
    page: number;
    limit: number;
    offset: number;
};
