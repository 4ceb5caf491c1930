import { isValid, parseISO } from 'date-fns';

// yyyy-MM-dd, and a real calendar day
export const isValidDate = (dateString: unknown): dateString is string => {
    if (typeof dateString !== 'string' || !/^\d{4}-\d{2}-\d{2}$/.test(dateString)) {
        return false;
    }
    const date = parseISO(dateString);
    return isValid(date) && date.getDate() === Number(dateString.slice(8, 10));
};

export const isValidEmail = (email: unknown): email is string =>
    typeof email === 'string' && /^[^\s@]+@[^\s@]+\.[^\s@]{2,}$/.test(email);

// Accepts 6XXXXXXXX / 2XXXXXXXX with or without the 237 country code
export const isValidCameroonPhone = (phone: unknown): phone is string => {
    if (typeof phone !== 'string') return false;
    const digits = phone.replace(/\D/g, '');
    return /^(237)?[26]\d{8}$/.test(digits);
};

export const normalizeCameroonPhone = (phone: string): string => {
    const digits = phone.replace(/\D/g, '');
    return digits.length === 9 ? `237${digits}` : digits;
};

export const isValidPercentage = (value: unknown): value is number =>
    typeof value === 'number' && !isNaN(value) && value > 0 && value <= 100;

export const isValidRating = (value: unknown): value is number =>
    typeof value === 'number' && Number.isInteger(value) && value >= 1 && value <= 5;

export const isPositiveInteger = (value: unknown): value is number =>
    typeof value === 'number' && Number.isInteger(value) && value > 0;
