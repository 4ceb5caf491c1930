import crypto from 'crypto';
import { BookingPaymentStatus } from '../models/booking.model';
import {
    MobileOperator,
    NotchPayChannel,
    NotchPayWebhookEvent,
    PaymentStatus,
} from '../models/payment.model';
import { badRequest } from '../utils/errors';

const GATEWAY_STATUS_MAP: Record<string, PaymentStatus> = {
    new: 'pending',
    pending: 'pending',
    processing: 'processing',
    success: 'completed',
    successful: 'completed',
    complete: 'completed',
    completed: 'completed',
    failed: 'failed',
    expired: 'failed',
    error: 'failed',
    canceled: 'cancelled',
    cancelled: 'cancelled',
    refunded: 'refunded',
};

export const convertGatewayStatus = (status: string | null | undefined): PaymentStatus => {
    if (!status) return 'pending';
    return GATEWAY_STATUS_MAP[status.toLowerCase()] ?? 'pending';
};

const OPERATOR_CHANNELS: Record<MobileOperator, NotchPayChannel> = {
    orange: 'cm.orange',
    mtn: 'cm.mtn',
    mobile_money: 'cm.mobile',
};

const isMobileOperator = (value: string): value is MobileOperator =>
    Object.prototype.hasOwnProperty.call(OPERATOR_CHANNELS, value);

export const getMobileOperatorChannel = (operator: string | null | undefined): NotchPayChannel => {
    const key = (operator || '').toLowerCase();
    return isMobileOperator(key) ? OPERATOR_CHANNELS[key] : 'cm.mobile';
};

/**
 * Normalises to the 12-digit `237XXXXXXXXX` form the gateway expects when
 * the input is a Cameroonian mobile number; other inputs come back as
 * digits only.
 */
export const formatPhoneNumber = (phoneNumber: string | null | undefined): string => {
    if (!phoneNumber) return '';

    const digits = phoneNumber.replace(/\D/g, '');
    if (digits.startsWith('6') && digits.length === 9) {
        return `237${digits}`;
    }
    return digits;
};

// A gateway attempt's status drives the booking's payment status
export const toBookingPaymentStatus = (status: PaymentStatus): BookingPaymentStatus => {
    switch (status) {
        case 'completed':
            return 'paid';
        case 'processing':
            return 'authorized';
        case 'refunded':
            return 'refunded';
        case 'failed':
        case 'cancelled':
            return 'failed';
        default:
            return 'pending';
    }
};

export const computeWebhookSignature = (payload: string, hashKey: string): string =>
    crypto.createHmac('sha256', hashKey).update(payload, 'utf8').digest('hex');

export const verifyWebhookSignature = (
    payload: string,
    signature: string | undefined,
    hashKey: string,
): boolean => {
    if (!signature || !hashKey) return false;

    const expected = Buffer.from(computeWebhookSignature(payload, hashKey), 'utf8');
    const received = Buffer.from(signature, 'utf8');
    if (expected.length !== received.length) return false;
    return crypto.timingSafeEqual(expected, received);
};

export const buildBookingPaymentReference = (bookingId: string, transactionId: string): string =>
    `booking-${bookingId}-${transactionId}`;

const isRecord = (value: unknown): value is Record<string, unknown> =>
    typeof value === 'object' && value !== null && !Array.isArray(value);

const optionalString = (value: unknown): string | undefined =>
    typeof value === 'string' && value ? value : undefined;

export const parseWebhookEvent = (rawBody: string): NotchPayWebhookEvent => {
    let parsed: unknown;
    try {
        parsed = JSON.parse(rawBody);
    } catch (error) {
        throw badRequest('invalid_payload', `Webhook body is not JSON: ${String(error)}`);
    }

    if (!isRecord(parsed) || typeof parsed.event !== 'string') {
        throw badRequest('invalid_payload', 'Webhook body has no event');
    }

    const data = isRecord(parsed.data) ? parsed.data : {};
    return {
        event: parsed.event,
        data: {
            reference: optionalString(data.reference),
            merchant_reference: optionalString(data.merchant_reference),
            status: optionalString(data.status),
            amount: typeof data.amount === 'number' ? data.amount : undefined,
            metadata: isRecord(data.metadata) ? data.metadata : undefined,
        },
    };
};
