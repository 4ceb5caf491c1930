import { Row } from '../database';
import {
    ICommission,
    IFinancialTransaction,
    IPaymentMethod,
    IPaymentTransaction,
    PAYMENT_METHOD_TYPES,
    PAYMENT_STATUSES,
    PaymentStatus,
    TRANSACTION_TYPES,
} from '../models/payment.model';
import {
    readBoolean,
    readDate,
    readJson,
    readNumber,
    readOptionalDate,
    readOptionalString,
    readString,
} from './row.helper';

const toPaymentStatus = (value: unknown): PaymentStatus =>
    PAYMENT_STATUSES.find((status) => status === value) ?? 'pending';

export const toPaymentTransaction = (row: Row): IPaymentTransaction => ({
    id: readString(row, 'id'),
    booking_id: readString(row, 'booking_id'),
    amount: readNumber(row, 'amount'),
    payment_method: readOptionalString(row, 'payment_method') ?? '',
    status: toPaymentStatus(row.status),
    reference: readOptionalString(row, 'reference'),
    gateway_reference: readOptionalString(row, 'gateway_reference'),
    payment_response: readJson(row, 'payment_response'),
    created_at: readDate(row, 'created_at'),
    updated_at: readDate(row, 'updated_at'),
});

export const toFinancialTransaction = (row: Row): IFinancialTransaction => ({
    id: readString(row, 'id'),
    user_id: readString(row, 'user_id'),
    transaction_type:
        TRANSACTION_TYPES.find((type) => type === row.transaction_type) ?? 'adjustment',
    status: toPaymentStatus(row.status),
    amount: readNumber(row, 'amount'),
    currency: readOptionalString(row, 'currency') ?? 'XAF',
    booking_id: readOptionalString(row, 'booking_id'),
    payment_transaction_id: readOptionalString(row, 'payment_transaction_id'),
    external_reference: readOptionalString(row, 'external_reference') ?? '',
    description: readOptionalString(row, 'description') ?? '',
    admin_notes: readOptionalString(row, 'admin_notes') ?? '',
    created_at: readDate(row, 'created_at'),
    processed_at: readOptionalDate(row, 'processed_at'),
});

export const toCommission = (row: Row): ICommission => ({
    booking_id: readString(row, 'booking_id'),
    owner_rate: readNumber(row, 'owner_rate'),
    tenant_rate: readNumber(row, 'tenant_rate'),
    owner_amount: readNumber(row, 'owner_amount'),
    tenant_amount: readNumber(row, 'tenant_amount'),
    total_amount: readNumber(row, 'total_amount'),
    owner_net_amount: readNumber(row, 'owner_net_amount'),
});

export const toPaymentMethod = (row: Row): IPaymentMethod => ({
    id: readString(row, 'id'),
    user_id: readString(row, 'user_id'),
    payment_type:
        PAYMENT_METHOD_TYPES.find((type) => type === row.payment_type) ?? 'mobile_money',
    is_default: readBoolean(row, 'is_default'),
    nickname: readOptionalString(row, 'nickname') ?? '',
    phone_number: readOptionalString(row, 'phone_number') ?? '',
    operator: readOptionalString(row, 'operator') ?? '',
    account_number: readOptionalString(row, 'account_number') ?? '',
    account_name: readOptionalString(row, 'account_name') ?? '',
    bank_name: readOptionalString(row, 'bank_name') ?? '',
    last_digits: readOptionalString(row, 'last_digits') ?? '',
    created_at: readDate(row, 'created_at'),
});

export const WEBHOOK_EVENT_STATUSES: Record<string, PaymentStatus> = {
    'payment.complete': 'completed',
    'payment.success': 'completed',
    'payment.failed': 'failed',
    'payment.pending': 'pending',
};

// Successful attempts are final except for a refund
export const canTransition = (from: PaymentStatus, to: PaymentStatus): boolean => {
    if (from === to) return false;
    if (from === 'completed') return to === 'refunded';
    if (from === 'refunded') return false;
    return true;
};
