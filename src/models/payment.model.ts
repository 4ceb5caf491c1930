export const PAYMENT_STATUSES = [
    'pending',
    'processing',
    'completed',
    'failed',
    'refunded',
    'cancelled',
] as const;

export type PaymentStatus = (typeof PAYMENT_STATUSES)[number];

export const TRANSACTION_TYPES = [
    'payment',
    'refund',
    'commission',
    'adjustment',
] as const;

export type TransactionType = (typeof TRANSACTION_TYPES)[number];

export const PAYMENT_METHOD_TYPES = [
    'mobile_money',
    'credit_card',
    'bank_account',
] as const;

export type PaymentMethodType = (typeof PAYMENT_METHOD_TYPES)[number];

export type MobileOperator = 'orange' | 'mtn' | 'mobile_money';

export type NotchPayChannel = 'cm.orange' | 'cm.mtn' | 'cm.mobile';

// One gateway attempt for a booking
export type IPaymentTransaction = {
    id: string;
    booking_id: string;
    amount: number;
    payment_method: string;
    status: PaymentStatus;
    reference: string | null;
    gateway_reference: string | null;
    payment_response: unknown;
    created_at: Date;
    updated_at: Date;
};

// Ledger entry: what money moved, for whom
export type IFinancialTransaction = {
    id: string;
    user_id: string;
    transaction_type: TransactionType;
    status: PaymentStatus;
    amount: number;
    currency: string;
    booking_id: string | null;
    payment_transaction_id: string | null;
    external_reference: string;
    description: string;
    admin_notes: string;
    created_at: Date;
    processed_at: Date | null;
};

export type ICommission = {
    booking_id: string;
    owner_rate: number;
    tenant_rate: number;
    owner_amount: number;
    tenant_amount: number;
    total_amount: number;
    owner_net_amount: number;
};

export type IPaymentMethod = {
    id: string;
    user_id: string;
    payment_type: PaymentMethodType;
    is_default: boolean;
    nickname: string;
    phone_number: string;
    operator: string;
    account_number: string;
    account_name: string;
    bank_name: string;
    last_digits: string;
    created_at: Date;
};

export type IPaymentMethodInput = {
    payment_type: PaymentMethodType;
    nickname?: string;
    phone_number?: string;
    operator?: string;
    account_number?: string;
    account_name?: string;
    bank_name?: string;
    is_default?: boolean;
};

export type TransactionSummary = {
    total_paid: number;
    total_refunded: number;
    pending_amount: number;
    count: number;
};

export type NotchPayCustomer = {
    email: string;
    phone: string;
    name: string;
};

export type NotchPayInitializeInput = {
    amount: number;
    currency?: string;
    description: string;
    reference: string;
    customer?: NotchPayCustomer;
    metadata?: Record<string, string>;
    callbackUrl?: string;
    successUrl?: string;
    cancelUrl?: string;
};

export type NotchPayTransaction = {
    reference: string;
    status: string;
    amount?: number;
    currency?: string;
    merchant_reference?: string;
};

export type NotchPayPaymentResponse = {
    status?: string;
    message?: string;
    authorization_url?: string;
    transaction: NotchPayTransaction;
};

export type NotchPayChannelInfo = {
    id: string;
    name: string;
    active: boolean;
    enabled: boolean;
};

export type NotchPayWebhookEvent = {
    event: string;
    data: {
        reference?: string;
        merchant_reference?: string;
        status?: string;
        amount?: number;
        metadata?: Record<string, unknown>;
    };
};
