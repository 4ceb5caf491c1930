import { parsePagination, periodsOverlap } from '../src/helpers/property.helper';
import { getBody, pickOption, readNumber, readNumberArray } from '../src/helpers/request.helper';
import { fillTemplate, generateCode } from '../src/utils/functions';
import {
    isValidCameroonPhone,
    isValidDate,
    isValidEmail,
    isValidRating,
    normalizeCameroonPhone,
} from '../src/utils/validations';
import { captureError } from './support/capture-error';
import { buildRequest } from './support/http';

describe('validations', () => {
    it.each([
        ['2025-07-01', true],
        ['2024-02-29', true],
        ['2025-02-30', false],
        ['2025-7-1', false],
        ['01/07/2025', false],
        [20250701, false],
    ])('isValidDate(%p) is %p', (input, expected) => {
        expect(isValidDate(input)).toBe(expected);
    });

    it.each([
        ['677123456', true],
        ['+237 677 12 34 56', true],
        ['237222123456', true],
        ['577123456', false],
        ['67712345', false],
    ])('isValidCameroonPhone(%p) is %p', (input, expected) => {
        expect(isValidCameroonPhone(input)).toBe(expected);
    });

    it('prefixes the country code on local numbers', () => {
        expect(normalizeCameroonPhone('677 12 34 56')).toBe('237677123456');
        expect(normalizeCameroonPhone('+237677123456')).toBe('237677123456');
    });

    it('checks emails and ratings', () => {
        expect(isValidEmail('awa@example.com')).toBe(true);
        expect(isValidEmail('awa@example')).toBe(false);
        expect(isValidRating(5)).toBe(true);
        expect(isValidRating(4.5)).toBe(false);
        expect(isValidRating(0)).toBe(false);
    });
});

describe('functions', () => {
    it('fills known placeholders and keeps unknown ones', () => {
        expect(fillTemplate('Facture {{ number }} pour {{name}} {{missing}}', { number: 'INV-1', name: 'Awa' })).toBe(
            'Facture INV-1 pour Awa {{missing}}',
        );
    });

    it('generates upper-case alphanumeric codes of the requested length', () => {
        const code = generateCode(8);
        expect(code).toHaveLength(8);
        expect(code).toMatch(/^[A-Z0-9]{8}$/);
    });
});

describe('property helpers', () => {
    it('clamps pagination', () => {
        expect(parsePagination({})).toEqual({ page: 1, limit: 20, offset: 0 });
        expect(parsePagination({ page: '3', limit: '10' })).toEqual({ page: 3, limit: 10, offset: 20 });
        expect(parsePagination({ page: '-2', limit: '500' })).toEqual({ page: 1, limit: 100, offset: 0 });
    });

    it('treats stays as half-open periods', () => {
        const period = { start_date: '2099-07-01', end_date: '2099-07-11' };
        expect(periodsOverlap(period, '2099-07-11', '2099-07-15')).toBe(false);
        expect(periodsOverlap(period, '2099-06-25', '2099-07-01')).toBe(false);
        expect(periodsOverlap(period, '2099-07-10', '2099-07-12')).toBe(true);
    });
});

describe('request helpers', () => {
    it('unwraps the JSON data field of multipart bodies', () => {
        const req = buildRequest({ body: { data: '{"title":"Studio Akwa","capacity":2}' } });
        expect(getBody(req)).toEqual({ title: 'Studio Akwa', capacity: 2 });
    });

    it('rejects a malformed data field', () => {
        const req = buildRequest({ body: { data: '{title' } });
        const error = captureError(() => getBody(req));
        expect(error).toMatchObject({ statusCode: 400, code: 'invalid_body' });
    });

    it('reads numbers and options leniently', () => {
        const body = { guests: '3', price: 'abc', amenities: ['1', 2, 'x'] };
        expect(readNumber(body, 'guests')).toBe(3);
        expect(readNumber(body, 'price')).toBeUndefined();
        expect(readNumberArray(body, 'amenities')).toEqual([1, 2]);
        expect(pickOption('strict', ['flexible', 'moderate', 'strict'] as const)).toBe('strict');
        expect(pickOption('lenient', ['flexible', 'moderate', 'strict'] as const)).toBeUndefined();
    });
});
