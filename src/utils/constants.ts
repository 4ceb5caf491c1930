import { ConfigDefault, ConfigKey } from '../models/config.model';

export const CURRENCY = 'XAF';

export const DEFAULT_PAGE_SIZE = 20;
export const MAX_PAGE_SIZE = 100;

export const MAX_PROPERTY_IMAGES = 10;
export const MAX_IMAGE_SIZE = 5 * 1024 * 1024;

export const BCRYPT_ROUNDS = 10;
export const MIN_PASSWORD_LENGTH = 8;

export const SYSTEM_CONFIG_DEFAULTS: Record<ConfigKey, ConfigDefault> = {
    TENANT_SERVICE_FEE_RATE: {
        value: '7',
        description: 'Service fee charged to the tenant, in percent of the accommodation price',
    },
    OWNER_COMMISSION_RATE: {
        value: '3',
        description: 'Commission taken from the owner, in percent of the accommodation price',
    },
    CANCELLATION_GRACE_PERIOD_MINUTES: {
        value: '30',
        description: 'Minutes after booking during which a cancellation is fully refunded',
    },
    PROMO_CODE_LENGTH: {
        value: '8',
        description: 'Number of characters in generated promo codes',
    },
};
