import { Request } from 'express';
import { badRequest } from '../utils/errors';
import { parseNumericParam } from './property.helper';

export type Body = Record<string, unknown>;

const isBody = (value: unknown): value is Body =>
    typeof value === 'object' && value !== null && !Array.isArray(value);

// Multipart requests carry the JSON fields in a `data` string
export const getBody = (req: Request): Body => {
    const body: unknown = req.body;
    if (!isBody(body)) return {};
    if (typeof body.data === 'string') {
        try {
            const parsed: unknown = JSON.parse(body.data);
            return isBody(parsed) ? parsed : body;
        } catch (error) {
            throw badRequest('invalid_body', `data is not valid JSON: ${String(error)}`);
        }
    }
    return body;
};

export const readParam = (req: Request, name: string): string => {
    const value = req.params[name];
    if (!value) {
        throw badRequest('missing_parameters', `${name} is required`);
    }
    return value;
};

export const readIntParam = (req: Request, name: string): number => {
    const value = parseNumericParam(readParam(req, name));
    if (value === undefined) {
        throw badRequest('invalid_parameter', `${name} must be a number`);
    }
    return value;
};

export const readQueryString = (req: Request, name: string): string | undefined => {
    const value = req.query[name];
    return typeof value === 'string' && value ? value : undefined;
};

export const readString = (body: Body, key: string): string | undefined => {
    const value = body[key];
    if (typeof value === 'string') return value;
    if (typeof value === 'number') return String(value);
    return undefined;
};

export const readNumber = (body: Body, key: string): number | undefined => {
    const value = body[key];
    if (typeof value === 'number') return isFinite(value) ? value : undefined;
    if (typeof value === 'string' && value.trim() !== '') {
        const parsed = Number(value);
        return isFinite(parsed) ? parsed : undefined;
    }
    return undefined;
};

// null clears an optional amount, undefined leaves it alone
export const readNullableNumber = (body: Body, key: string): number | null | undefined => {
    if (body[key] === null || body[key] === '') return null;
    return readNumber(body, key);
};

export const readBoolean = (body: Body, key: string): boolean | undefined => {
    const value = body[key];
    if (typeof value === 'boolean') return value;
    if (value === 'true') return true;
    if (value === 'false') return false;
    return undefined;
};

export const readNumberArray = (body: Body, key: string): number[] | undefined => {
    const value = body[key];
    if (!Array.isArray(value)) return undefined;
    return value
        .map((item) => (typeof item === 'number' ? item : Number(item)))
        .filter((item) => Number.isInteger(item));
};

export const readObjectArray = (body: Body, key: string): Body[] => {
    const value = body[key];
    return Array.isArray(value) ? value.filter(isBody) : [];
};

export const pickOption = <T extends string>(
    value: unknown,
    options: readonly T[],
): T | undefined => options.find((option) => option === value);
