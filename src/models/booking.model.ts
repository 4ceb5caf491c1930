export const BOOKING_STATUSES = [
    'pending',
    'confirmed',
    'cancelled',
    'completed',
] as const;

export type BookingStatus = (typeof BOOKING_STATUSES)[number];

export const BOOKING_PAYMENT_STATUSES = [
    'pending',
    'authorized',
    'paid',
    'refunded',
    'failed',
] as const;

export type BookingPaymentStatus = (typeof BOOKING_PAYMENT_STATUSES)[number];

export type IBooking = {
    id: string;
    property_id: string;
    tenant_id: string;
    check_in_date: string;
    check_out_date: string;
    guests_count: number;
    base_price: number;
    cleaning_fee: number;
    security_deposit: number;
    long_stay_discount: number;
    promo_code_id: number | null;
    discount_amount: number;
    service_fee: number;
    total_price: number;
    status: BookingStatus;
    payment_status: BookingPaymentStatus;
    special_requests: string;
    notes: string;
    created_at: Date;
    updated_at: Date;
    cancelled_at: Date | null;
    cancelled_by: string | null;
};

// Booking joined with the property fields most screens need
export type IBookingWithProperty = IBooking & {
    property_title: string;
    owner_id: string;
    cancellation_policy: string;
};

export type IBookingCreateInput = {
    property_id: string;
    check_in_date: string;
    check_out_date: string;
    guests_count: number;
    special_requests?: string;
    promo_code?: string;
};

export type IPromoCode = {
    id: number;
    code: string;
    property_id: string;
    tenant_id: string;
    discount_percentage: number;
    is_active: boolean;
    expiry_date: Date;
    created_at: Date;
    created_by: string | null;
};

export type IPromoCodeInput = {
    property_id: string;
    tenant_id: string;
    discount_percentage: number;
    expiry_date: string;
};

export type PromoCodeValidation = {
    valid: boolean;
    discount_percentage: number;
    reason?: string;
};
