export class ApiError extends Error {
    public readonly statusCode: number;
    public readonly code: string;

    constructor(statusCode: number, code: string, message: string) {
        super(message);
        this.name = 'ApiError';
        this.statusCode = statusCode;
        this.code = code;
    }
}

export const badRequest = (code: string, message: string) =>
    new ApiError(400, code, message);

export const unauthorized = (code: string, message: string) =>
    new ApiError(401, code, message);

export const forbidden = (code: string, message: string) =>
    new ApiError(403, code, message);

export const notFound = (code: string, message: string) =>
    new ApiError(404, code, message);

export const conflict = (code: string, message: string) =>
    new ApiError(409, code, message);

export const isApiError = (error: unknown): error is ApiError =>
    error instanceof ApiError;
