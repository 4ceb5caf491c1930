import { differenceInCalendarDays, parseISO } from 'date-fns';
import { ILongStayDiscount, PriceRates } from '../models/property.model';

export const DEFAULT_TENANT_FEE_RATE = 7;

export type PriceInput = {
    rates: PriceRates;
    cleaningFee: number;
    securityDeposit: number;
    nights: number;
    longStayDiscounts?: ILongStayDiscount[];
    promoPercentage?: number;
    tenantFeeRate?: number;
};

export type PriceBreakdown = {
    nights: number;
    basePrice: number;
    cleaningFee: number;
    securityDeposit: number;
    longStayDiscount: number;
    promoDiscount: number;
    discountAmount: number;
    serviceFee: number;
    totalPrice: number;
};

// FCFA has no minor unit
export const roundFcfa = (amount: number): number => Math.round(amount);

export const nightsBetween = (checkIn: string, checkOut: string): number =>
    differenceInCalendarDays(parseISO(checkOut), parseISO(checkIn));

/**
 * Monthly rate wins from 30 nights, weekly from 7; leftover nights are
 * charged at the nightly rate.
 */
export const calculatePriceForDays = (rates: PriceRates, nights: number): number => {
    if (nights <= 0) return 0;

    if (nights >= 30 && rates.price_per_month) {
        const months = Math.floor(nights / 30);
        return months * rates.price_per_month + (nights % 30) * rates.price_per_night;
    }

    if (nights >= 7 && rates.price_per_week) {
        const weeks = Math.floor(nights / 7);
        return weeks * rates.price_per_week + (nights % 7) * rates.price_per_night;
    }

    return nights * rates.price_per_night;
};

export const findLongStayDiscount = (
    discounts: ILongStayDiscount[],
    nights: number,
): ILongStayDiscount | null => {
    let best: ILongStayDiscount | null = null;
    for (const discount of discounts) {
        if (discount.min_days <= nights && (!best || discount.min_days > best.min_days)) {
            best = discount;
        }
    }
    return best;
};

const clampPercentage = (value: number | undefined): number => {
    if (!value || value < 0) return 0;
    return Math.min(value, 100);
};

export const calculateBookingPrice = (input: PriceInput): PriceBreakdown => {
    const nights = input.nights;
    const basePrice = roundFcfa(calculatePriceForDays(input.rates, nights));

    const longStay = findLongStayDiscount(input.longStayDiscounts ?? [], nights);
    const longStayDiscount = roundFcfa(
        (basePrice * clampPercentage(longStay?.discount_percentage)) / 100,
    );

    const promoDiscount = roundFcfa(
        ((basePrice - longStayDiscount) * clampPercentage(input.promoPercentage)) / 100,
    );

    const discountAmount = longStayDiscount + promoDiscount;
    const feeRate = input.tenantFeeRate ?? DEFAULT_TENANT_FEE_RATE;
    const serviceFee = roundFcfa(((basePrice - discountAmount) * feeRate) / 100);

    const cleaningFee = roundFcfa(input.cleaningFee);
    const securityDeposit = roundFcfa(input.securityDeposit);

    return {
        nights,
        basePrice,
        cleaningFee,
        securityDeposit,
        longStayDiscount,
        promoDiscount,
        discountAmount,
        serviceFee,
        totalPrice:
            basePrice + cleaningFee + securityDeposit + serviceFee - discountAmount,
    };
};
