import { validateStay } from '../src/services/booking.service';
import { captureError } from './support/capture-error';
import {
    CREATED_AT,
    bookingRow,
    buildServices,
    notificationRow,
    owner,
    propertyRow,
    stranger,
    tenant,
} from './support/fixtures';
import { ScriptedClient } from './support/scripted-client';

const promoRow = {
    id: 3,
    code: 'SUMMER10',
    property_id: 'property-1',
    tenant_id: 'tenant-1',
    discount_percentage: '10.00',
    is_active: true,
    expiry_date: new Date(2100, 0, 1),
    created_at: CREATED_AT,
    created_by: 'owner-1',
};

const insertedBooking = (params: unknown[]) => [
    bookingRow({
        property_id: params[0],
        tenant_id: params[1],
        check_in_date: params[2],
        check_out_date: params[3],
        guests_count: params[4],
        base_price: params[5],
        cleaning_fee: params[6],
        security_deposit: params[7],
        long_stay_discount: params[8],
        promo_code_id: params[9],
        discount_amount: params[10],
        service_fee: params[11],
        total_price: params[12],
        special_requests: params[13],
    }),
];

const bookingClient = () =>
    new ScriptedClient()
        .on(/FROM properties WHERE id = \$1 FOR UPDATE/, [propertyRow()])
        .on(/FROM promo_codes WHERE code/, [promoRow])
        .on(/FROM long_stay_discounts/, [{ min_days: 7, discount_percentage: '10.00' }])
        .on(/INSERT INTO bookings/, insertedBooking)
        .on(/INSERT INTO notifications/, (params) => [notificationRow(params)]);

const request = {
    property_id: 'property-1',
    check_in_date: '2099-07-01',
    check_out_date: '2099-07-11',
    guests_count: 2,
    promo_code: 'summer10',
};

describe('validateStay', () => {
    const stay = { check_in_date: '2025-06-01', check_out_date: '2025-06-04', guests_count: 2 };

    it('returns the number of nights', () => {
        expect(validateStay(stay, '2025-05-01')).toBe(3);
    });

    it('rejects a check-in in the past', () => {
        expect(captureError(() => validateStay(stay, '2025-06-02'))).toMatchObject({
            code: 'invalid_dates',
            message: 'check_in_date cannot be in the past',
        });
    });

    it('rejects a check-out before the check-in', () => {
        expect(
            captureError(() =>
                validateStay({ ...stay, check_out_date: '2025-06-01' }, '2025-05-01'),
            ),
        ).toMatchObject({ code: 'invalid_dates', message: 'check_out_date must be after check_in_date' });
    });

    it('rejects impossible calendar days', () => {
        expect(
            captureError(() => validateStay({ ...stay, check_in_date: '2025-02-30' }, '2025-01-01')),
        ).toMatchObject({ code: 'invalid_dates' });
    });

    it('rejects a zero guest count', () => {
        expect(captureError(() => validateStay({ ...stay, guests_count: 0 }, '2025-05-01'))).toMatchObject({
            code: 'invalid_guests',
        });
    });
});

describe('BookingService.createBooking', () => {
    it('prices the stay with both discounts and consumes the promo code', async () => {
        const client = bookingClient();
        const { bookingService } = buildServices(client);

        const booking = await bookingService.createBooking(tenant, request);

        expect(booking).toMatchObject({
            id: 'booking-1',
            base_price: 90000,
            long_stay_discount: 9000,
            discount_amount: 17100,
            service_fee: 5103,
            total_price: 103003,
            promo_code_id: 3,
            status: 'pending',
            payment_status: 'pending',
        });
        expect(client.transactions).toBe(1);
        expect(client.matching(/UPDATE promo_codes SET is_active/)[0].params).toEqual([3, false]);
        expect(client.matching(/INSERT INTO notifications/)[0].params.slice(0, 3)).toEqual([
            'owner-1',
            'booking',
            'Nouvelle réservation',
        ]);
    });

    it('looks the promo code up in upper case', async () => {
        const client = bookingClient();
        await buildServices(client).bookingService.createBooking(tenant, request);

        expect(client.matching(/FROM promo_codes WHERE code/)[0].params).toEqual(['SUMMER10']);
    });

    it('refuses dates blocked on the calendar', async () => {
        const client = bookingClient().on(/FROM unavailabilities/, [
            {
                id: 5,
                property_id: 'property-1',
                start_date: '2099-07-05',
                end_date: '2099-07-08',
                booking_type: 'external',
                created_at: CREATED_AT,
            },
        ]);

        await expect(buildServices(client).bookingService.createBooking(tenant, request)).rejects.toMatchObject({
            statusCode: 409,
            code: 'dates_unavailable',
        });
        expect(client.matching(/INSERT INTO bookings/)).toHaveLength(0);
    });

    it('refuses dates held by a paid booking', async () => {
        const client = bookingClient().on(/FROM unavailabilities/, [
            {
                source: 'booking',
                start_date: '2099-07-03',
                end_date: '2099-07-06',
                booking_type: 'booking',
                booking_id: 'booking-0',
            },
        ]);

        await expect(buildServices(client).bookingService.createBooking(tenant, request)).rejects.toMatchObject({
            code: 'dates_unavailable',
        });
        expect(client.matching(/FROM unavailabilities/)[0]?.text).toMatch(
            /payment_status IN \('authorized', 'paid'\)/,
        );
    });

    it('refuses a promo code issued to another tenant', async () => {
        const client = bookingClient();

        await expect(
            buildServices(client).bookingService.createBooking(stranger, request),
        ).rejects.toMatchObject({ code: 'invalid_promo_code', message: 'Ce code ne vous est pas destiné' });
    });

    it('refuses more guests than the property sleeps', async () => {
        const client = bookingClient();

        await expect(
            buildServices(client).bookingService.createBooking(tenant, { ...request, guests_count: 5 }),
        ).rejects.toMatchObject({ code: 'too_many_guests' });
    });

    it('refuses owners booking their own property', async () => {
        const client = bookingClient();

        await expect(
            buildServices(client).bookingService.createBooking(owner, request),
        ).rejects.toMatchObject({ code: 'own_property' });
    });
});

describe('BookingService.confirmBooking', () => {
    const confirmClient = (overrides = {}) =>
        new ScriptedClient()
            .on(/FROM bookings b\s+JOIN properties p/, [bookingRow({ payment_status: 'paid', ...overrides })])
            .on(/UPDATE bookings SET status = 'confirmed'/, [bookingRow({ status: 'confirmed', payment_status: 'paid' })])
            .on(/INSERT INTO notifications/, (params) => [notificationRow(params)]);

    it('blocks the dates once the owner confirms a paid booking', async () => {
        const client = confirmClient();

        const booking = await buildServices(client).bookingService.confirmBooking('booking-1', owner);

        expect(booking.status).toBe('confirmed');
        expect(client.matching(/INSERT INTO unavailabilities/)[0].params).toEqual([
            'property-1',
            '2099-07-01',
            '2099-07-11',
            'booking-1',
        ]);
    });

    it('requires payment first', async () => {
        const client = confirmClient({ payment_status: 'pending' });

        await expect(
            buildServices(client).bookingService.confirmBooking('booking-1', owner),
        ).rejects.toMatchObject({ code: 'payment_required' });
    });

    it('is reserved to the owner', async () => {
        const client = confirmClient();

        await expect(
            buildServices(client).bookingService.confirmBooking('booking-1', tenant),
        ).rejects.toMatchObject({ statusCode: 403, code: 'owner_only' });
    });

    it('hides the booking from strangers', async () => {
        const client = confirmClient();

        await expect(
            buildServices(client).bookingService.confirmBooking('booking-1', stranger),
        ).rejects.toMatchObject({ statusCode: 403, code: 'not_booking_party' });
    });
});

describe('BookingService.completeBooking', () => {
    const completeClient = (overrides = {}) =>
        new ScriptedClient()
            .on(/FROM bookings b\s+JOIN properties p/, [
                bookingRow({
                    status: 'confirmed',
                    payment_status: 'paid',
                    check_in_date: '2025-01-01',
                    check_out_date: '2025-01-11',
                    ...overrides,
                }),
            ])
            .on(/SET status = 'completed'/, [bookingRow({ status: 'completed', payment_status: 'paid' })])
            .on(/INSERT INTO notifications/, (params) => [notificationRow(params)]);

    it('completes a confirmed stay once the check-out date has passed', async () => {
        const client = completeClient();

        const booking = await buildServices(client).bookingService.completeBooking('booking-1', owner);

        expect(booking.status).toBe('completed');
        expect(client.matching(/SET status = 'completed'/)[0]?.params).toEqual(['booking-1']);
        expect(client.matching(/INSERT INTO notifications/)[0]?.params.slice(0, 2)).toEqual(['tenant-1', 'review']);
    });

    it('waits for the check-out date', async () => {
        const client = completeClient({ check_in_date: '2099-07-01', check_out_date: '2099-07-11' });

        await expect(
            buildServices(client).bookingService.completeBooking('booking-1', owner),
        ).rejects.toMatchObject({ statusCode: 400, code: 'stay_not_finished' });
        expect(client.matching(/SET status = 'completed'/)).toHaveLength(0);
    });

    it('only completes confirmed bookings', async () => {
        const client = completeClient({ status: 'pending' });

        await expect(
            buildServices(client).bookingService.completeBooking('booking-1', owner),
        ).rejects.toMatchObject({ statusCode: 409, code: 'invalid_status' });
    });

    it('is reserved to the owner', async () => {
        await expect(
            buildServices(completeClient()).bookingService.completeBooking('booking-1', tenant),
        ).rejects.toMatchObject({ statusCode: 403, code: 'owner_only' });
    });
});
