import {
    calculateBookingPrice,
    calculatePriceForDays,
    findLongStayDiscount,
    nightsBetween,
} from '../src/helpers/pricing.helper';
import { PriceRates } from '../src/models/property.model';

const rates: PriceRates = {
    price_per_night: 10000,
    price_per_week: 60000,
    price_per_month: 200000,
};

describe('calculatePriceForDays', () => {
    it('charges the nightly rate for short stays', () => {
        expect(calculatePriceForDays(rates, 3)).toBe(30000);
    });

    it('uses the weekly rate from 7 nights and bills leftover nights', () => {
        expect(calculatePriceForDays(rates, 10)).toBe(90000);
    });

    it('uses the monthly rate from 30 nights', () => {
        expect(calculatePriceForDays(rates, 35)).toBe(250000);
    });

    it('falls back to nightly pricing when no weekly rate is set', () => {
        expect(calculatePriceForDays({ ...rates, price_per_week: null }, 10)).toBe(100000);
    });

    it('returns 0 for an empty stay', () => {
        expect(calculatePriceForDays(rates, 0)).toBe(0);
    });
});

describe('nightsBetween', () => {
    it('counts calendar nights', () => {
        expect(nightsBetween('2025-06-01', '2025-06-11')).toBe(10);
    });
});

describe('findLongStayDiscount', () => {
    const discounts = [
        { min_days: 7, discount_percentage: 10 },
        { min_days: 30, discount_percentage: 20 },
    ];

    it('picks the largest threshold reached', () => {
        expect(findLongStayDiscount(discounts, 31)).toEqual({ min_days: 30, discount_percentage: 20 });
    });

    it('returns null below every threshold', () => {
        expect(findLongStayDiscount(discounts, 6)).toBeNull();
    });
});

describe('calculateBookingPrice', () => {
    it('applies the long-stay discount before the promo code', () => {
        const price = calculateBookingPrice({
            rates,
            nights: 10,
            cleaningFee: 5000,
            securityDeposit: 20000,
            longStayDiscounts: [
                { min_days: 7, discount_percentage: 10 },
                { min_days: 30, discount_percentage: 20 },
            ],
            promoPercentage: 10,
        });

        expect(price).toEqual({
            nights: 10,
            basePrice: 90000,
            cleaningFee: 5000,
            securityDeposit: 20000,
            longStayDiscount: 9000,
            promoDiscount: 8100,
            discountAmount: 17100,
            serviceFee: 5103,
            totalPrice: 103003,
        });
    });

    it('charges the 7% guest fee on the accommodation only', () => {
        const price = calculateBookingPrice({
            rates,
            nights: 2,
            cleaningFee: 3000,
            securityDeposit: 0,
        });

        expect(price.serviceFee).toBe(1400);
        expect(price.totalPrice).toBe(24400);
    });

    it('caps a promo percentage at 100', () => {
        const price = calculateBookingPrice({
            rates,
            nights: 1,
            cleaningFee: 0,
            securityDeposit: 0,
            promoPercentage: 150,
        });

        expect(price.promoDiscount).toBe(10000);
        expect(price.totalPrice).toBe(0);
    });
});
