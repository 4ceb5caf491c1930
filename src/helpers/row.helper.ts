import { Row } from '../database';

// pg hands NUMERIC back as strings and DATE/TIMESTAMP as Date objects;
// these readers turn a raw row into typed values.

export const readString = (row: Row, key: string): string => {
    const value = row[key];
    if (value === null || value === undefined) {
        throw new Error(`Column ${key} is missing`);
    }
    return value instanceof Date ? value.toISOString() : String(value);
};

export const readOptionalString = (row: Row, key: string): string | null => {
    const value = row[key];
    if (value === null || value === undefined) return null;
    return value instanceof Date ? value.toISOString() : String(value);
};

export const readNumber = (row: Row, key: string, fallback = 0): number => {
    const value = row[key];
    if (value === null || value === undefined || value === '') return fallback;
    const parsed = typeof value === 'number' ? value : Number(value);
    return isNaN(parsed) ? fallback : parsed;
};

export const readOptionalNumber = (row: Row, key: string): number | null => {
    const value = row[key];
    if (value === null || value === undefined || value === '') return null;
    const parsed = typeof value === 'number' ? value : Number(value);
    return isNaN(parsed) ? null : parsed;
};

export const readBoolean = (row: Row, key: string): boolean => {
    const value = row[key];
    return value === true || value === 't' || value === 'true' || value === 1;
};

export const readDate = (row: Row, key: string): Date => {
    const value = row[key];
    if (value instanceof Date) return value;
    if (typeof value === 'string' || typeof value === 'number') {
        return new Date(value);
    }
    throw new Error(`Column ${key} is not a date`);
};

export const readOptionalDate = (row: Row, key: string): Date | null => {
    const value = row[key];
    if (value === null || value === undefined) return null;
    return readDate(row, key);
};

/**
 * DATE columns come back as local-midnight Date objects; the API speaks
 * `yyyy-MM-dd` strings.
 */
export const readDay = (row: Row, key: string): string => {
    const value = row[key];
    if (typeof value === 'string') return value.slice(0, 10);
    const date = readDate(row, key);
    const month = String(date.getMonth() + 1).padStart(2, '0');
    const day = String(date.getDate()).padStart(2, '0');
    return `${date.getFullYear()}-${month}-${day}`;
};

export const readStringArray = (row: Row, key: string): string[] => {
    const value = row[key];
    if (!Array.isArray(value)) return [];
    return value.filter((item) => item !== null).map((item) => String(item));
};

export const readJson = (row: Row, key: string): unknown => {
    const value = row[key];
    if (typeof value === 'string') {
        try {
            return JSON.parse(value);
        } catch {
            return value;
        }
    }
    return value ?? null;
};
