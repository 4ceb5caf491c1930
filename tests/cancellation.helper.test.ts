import {
    calculateRefund,
    isWithinGracePeriod,
    refundRateForPolicy,
    RefundBookingInput,
} from '../src/helpers/cancellation.helper';
import { CancellationPolicy } from '../src/models/property.model';

const cancelledAt = new Date(2025, 5, 1, 12, 0, 0);

const booking = (overrides: Partial<RefundBookingInput> = {}): RefundBookingInput => ({
    base_price: 100000,
    discount_amount: 0,
    cleaning_fee: 10000,
    security_deposit: 20000,
    payment_status: 'paid',
    check_in_date: '2025-06-10',
    created_at: new Date(2025, 4, 1, 10, 0, 0),
    ...overrides,
});

const refund = (policy: CancellationPolicy, overrides: Partial<RefundBookingInput> = {}) =>
    calculateRefund({
        booking: booking(overrides),
        policy,
        cancelledAt,
        gracePeriodMinutes: 30,
        ownerCommissionRate: 3,
    });

describe('refundRateForPolicy', () => {
    it.each([
        ['flexible', 1, 1],
        ['flexible', 0, 0.5],
        ['moderate', 5, 1],
        ['moderate', 4, 0.5],
        ['strict', 14, 1],
        ['strict', 7, 0.5],
        ['strict', 6, 0],
    ] as const)('%s policy %i days before check-in refunds %p', (policy, days, rate) => {
        expect(refundRateForPolicy(policy, days)).toBe(rate);
    });
});

describe('isWithinGracePeriod', () => {
    it('includes the last minute of the window', () => {
        const createdAt = new Date(2025, 5, 1, 11, 30, 0);
        expect(isWithinGracePeriod(createdAt, cancelledAt, 30)).toBe(true);
        expect(isWithinGracePeriod(createdAt, cancelledAt, 29)).toBe(false);
    });
});

describe('calculateRefund', () => {
    it('refunds everything but the service fee far from check-in', () => {
        expect(refund('moderate')).toEqual({
            daysUntilCheckIn: 9,
            withinGracePeriod: false,
            refundRate: 1,
            refundAmount: 130000,
            ownerCompensation: 0,
        });
    });

    it('refunds half and compensates the host close to check-in', () => {
        const result = refund('moderate', { check_in_date: '2025-06-03' });

        expect(result.refundRate).toBe(0.5);
        expect(result.refundAmount).toBe(75000);
        expect(result.ownerCompensation).toBe(48500);
    });

    it('returns only the deposit when nothing else is refundable', () => {
        const result = refund('strict', { check_in_date: '2025-06-05' });

        expect(result.refundRate).toBe(0);
        expect(result.refundAmount).toBe(20000);
        expect(result.ownerCompensation).toBe(97000);
    });

    it('refunds in full inside the grace period whatever the policy', () => {
        const result = refund('strict', {
            check_in_date: '2025-06-02',
            created_at: new Date(2025, 5, 1, 11, 50, 0),
        });

        expect(result.withinGracePeriod).toBe(true);
        expect(result.refundRate).toBe(1);
        expect(result.refundAmount).toBe(130000);
    });

    it('refunds nothing on an unpaid booking', () => {
        const result = refund('flexible', { payment_status: 'pending' });

        expect(result.refundAmount).toBe(0);
        expect(result.ownerCompensation).toBe(0);
    });
});
