import { roundFcfa } from './pricing.helper';

export type CommissionRates = {
    ownerRate: number;
    tenantRate: number;
};

export type CommissionBookingInput = {
    base_price: number;
    discount_amount: number;
    cleaning_fee: number;
    service_fee: number;
};

export type CommissionBreakdown = {
    ownerRate: number;
    tenantRate: number;
    ownerAmount: number;
    tenantAmount: number;
    totalAmount: number;
    ownerNetAmount: number;
};

/**
 * The guest side is the service fee already charged on the booking; the
 * host side is taken from the discounted accommodation price.
 */
export const calculateCommission = (
    booking: CommissionBookingInput,
    rates: CommissionRates,
): CommissionBreakdown => {
    const accommodation = booking.base_price - booking.discount_amount;
    const ownerAmount = roundFcfa((accommodation * rates.ownerRate) / 100);
    const tenantAmount = booking.service_fee;

    return {
        ownerRate: rates.ownerRate,
        tenantRate: rates.tenantRate,
        ownerAmount,
        tenantAmount,
        totalAmount: ownerAmount + tenantAmount,
        ownerNetAmount: accommodation + booking.cleaning_fee - ownerAmount,
    };
};
