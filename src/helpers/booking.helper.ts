import { Row } from '../database';
import {
    BOOKING_PAYMENT_STATUSES,
    BOOKING_STATUSES,
    BookingPaymentStatus,
    BookingStatus,
    IBooking,
    IBookingWithProperty,
} from '../models/booking.model';
import { AuthenticatedUser } from '../models/request.model';
import {
    readDate,
    readDay,
    readNumber,
    readOptionalDate,
    readOptionalNumber,
    readOptionalString,
    readString,
} from './row.helper';

const toBookingStatus = (value: unknown): BookingStatus =>
    BOOKING_STATUSES.find((status) => status === value) ?? 'pending';

const toBookingPaymentStatus = (value: unknown): BookingPaymentStatus =>
    BOOKING_PAYMENT_STATUSES.find((status) => status === value) ?? 'pending';

export const toBooking = (row: Row): IBooking => ({
    id: readString(row, 'id'),
    property_id: readString(row, 'property_id'),
    tenant_id: readString(row, 'tenant_id'),
    check_in_date: readDay(row, 'check_in_date'),
    check_out_date: readDay(row, 'check_out_date'),
    guests_count: readNumber(row, 'guests_count', 1),
    base_price: readNumber(row, 'base_price'),
    cleaning_fee: readNumber(row, 'cleaning_fee'),
    security_deposit: readNumber(row, 'security_deposit'),
    long_stay_discount: readNumber(row, 'long_stay_discount'),
    promo_code_id: readOptionalNumber(row, 'promo_code_id'),
    discount_amount: readNumber(row, 'discount_amount'),
    service_fee: readNumber(row, 'service_fee'),
    total_price: readNumber(row, 'total_price'),
    status: toBookingStatus(row.status),
    payment_status: toBookingPaymentStatus(row.payment_status),
    special_requests: readOptionalString(row, 'special_requests') ?? '',
    notes: readOptionalString(row, 'notes') ?? '',
    created_at: readDate(row, 'created_at'),
    updated_at: readDate(row, 'updated_at'),
    cancelled_at: readOptionalDate(row, 'cancelled_at'),
    cancelled_by: readOptionalString(row, 'cancelled_by'),
});

export const toBookingWithProperty = (row: Row): IBookingWithProperty => ({
    ...toBooking(row),
    property_title: readOptionalString(row, 'property_title') ?? '',
    owner_id: readString(row, 'owner_id'),
    cancellation_policy: readOptionalString(row, 'cancellation_policy') ?? 'moderate',
});

export type BookingRole = 'tenant' | 'owner' | 'admin';

// Which side of the booking the user is on, or null for a stranger
export const getBookingRole = (
    booking: IBookingWithProperty,
    user: AuthenticatedUser,
): BookingRole | null => {
    if (booking.tenant_id === user.userId) return 'tenant';
    if (booking.owner_id === user.userId) return 'owner';
    if (user.userType === 'admin') return 'admin';
    return null;
};

export const appendNote = (notes: string, line: string): string =>
    notes ? `${notes}\n${line}` : line;
