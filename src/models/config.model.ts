export type ConfigKey =
    | 'TENANT_SERVICE_FEE_RATE'
    | 'OWNER_COMMISSION_RATE'
    | 'CANCELLATION_GRACE_PERIOD_MINUTES'
    | 'PROMO_CODE_LENGTH';

export type ConfigDefault = {
    value: string;
    description: string;
};

export type SystemConfiguration = {
    key: string;
    value: string;
    description: string;
    last_updated: Date;
};
