import { addMinutes, differenceInCalendarDays, parseISO } from 'date-fns';
import { CancellationPolicy } from '../models/property.model';
import { roundFcfa } from './pricing.helper';

type PolicyRule = {
    // minimum days before check-in for a full refund
    fullRefundDays: number;
    // minimum days before check-in for the partial rate
    partialRefundDays: number;
    partialRate: number;
};

export const CANCELLATION_POLICY_RULES: Record<CancellationPolicy, PolicyRule> = {
    flexible: { fullRefundDays: 1, partialRefundDays: 0, partialRate: 0.5 },
    moderate: { fullRefundDays: 5, partialRefundDays: 0, partialRate: 0.5 },
    strict: { fullRefundDays: 14, partialRefundDays: 7, partialRate: 0.5 },
};

export type RefundBookingInput = {
    base_price: number;
    discount_amount: number;
    cleaning_fee: number;
    security_deposit: number;
    payment_status: string;
    check_in_date: string;
    created_at: Date;
};

export type RefundInput = {
    booking: RefundBookingInput;
    policy: CancellationPolicy;
    cancelledAt: Date;
    gracePeriodMinutes: number;
    ownerCommissionRate: number;
};

export type RefundComputation = {
    daysUntilCheckIn: number;
    withinGracePeriod: boolean;
    refundRate: number;
    refundAmount: number;
    ownerCompensation: number;
};

export const isWithinGracePeriod = (
    createdAt: Date,
    cancelledAt: Date,
    minutes: number,
): boolean => cancelledAt.getTime() <= addMinutes(createdAt, minutes).getTime();

export const daysUntil = (checkInDate: string, now: Date): number =>
    differenceInCalendarDays(parseISO(checkInDate), now);

export const refundRateForPolicy = (
    policy: CancellationPolicy,
    daysBeforeCheckIn: number,
): number => {
    const rule = CANCELLATION_POLICY_RULES[policy] ?? CANCELLATION_POLICY_RULES.moderate;
    if (daysBeforeCheckIn >= rule.fullRefundDays) return 1;
    if (daysBeforeCheckIn >= rule.partialRefundDays) return rule.partialRate;
    return 0;
};

/**
 * Service fee is never refunded; the security deposit always is once paid.
 * Nothing is refunded on an unpaid booking.
 */
export const calculateRefund = (input: RefundInput): RefundComputation => {
    const { booking, policy, cancelledAt } = input;
    const daysUntilCheckIn = daysUntil(booking.check_in_date, cancelledAt);
    const withinGracePeriod = isWithinGracePeriod(
        booking.created_at,
        cancelledAt,
        input.gracePeriodMinutes,
    );

    const refundRate = withinGracePeriod
        ? 1
        : refundRateForPolicy(policy, daysUntilCheckIn);

    const accommodation = booking.base_price - booking.discount_amount;
    const isPaid = booking.payment_status === 'paid';

    const refundAmount = isPaid
        ? roundFcfa((accommodation + booking.cleaning_fee) * refundRate) +
          booking.security_deposit
        : 0;

    const ownerCompensation =
        refundRate >= 1 || !isPaid
            ? 0
            : roundFcfa(
                  accommodation *
                      (1 - refundRate) *
                      (1 - input.ownerCommissionRate / 100),
              );

    return {
        daysUntilCheckIn,
        withinGracePeriod,
        refundRate,
        refundAmount,
        ownerCompensation,
    };
};
