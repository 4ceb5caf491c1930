import dotenv from 'dotenv';

dotenv.config();

const env = process.env;

const toInt = (value: string | undefined, fallback: number): number => {
    const parsed = parseInt(value ?? '', 10);
    return isNaN(parsed) ? fallback : parsed;
};

export type AppConfig = {
    port: number;
    mode: 'development' | 'production' | 'test';
    jwt: {
        secret: string | undefined;
        // seconds
        accessExpiresIn: number;
        refreshExpiresIn: number;
    };
    // minutes
    passwordResetTtl: number;
    adminApiKey: string | undefined;
    googleClientId: string | undefined;
    database: {
        host: string | undefined;
        port: number;
        name: string | undefined;
        user: string | undefined;
        password: string | undefined;
    };
    minio: {
        endpoint: string | undefined;
        port: number;
        useSSL: boolean;
        accessKey: string | undefined;
        secretKey: string | undefined;
        bucket: string;
        publicEndpoint: string | undefined;
    };
    notchpay: {
        baseUrl: string;
        publicKey: string;
        privateKey: string;
        hashKey: string;
    };
    urls: {
        paymentCallbackBase: string;
        frontend: string;
    };
    smtp: {
        host: string | undefined;
        port: number;
        secure: boolean;
        user: string | undefined;
        password: string | undefined;
        from: string;
    };
    firebase: {
        projectId: string | undefined;
        clientEmail: string | undefined;
        privateKey: string | undefined;
    };
    templatesDir: string;
};

const resolveMode = (): AppConfig['mode'] => {
    if (env.NODE_ENV === 'production') return 'production';
    if (env.NODE_ENV === 'test') return 'test';
    return 'development';
};

export const appConfig: AppConfig = {
    port: toInt(env.PORT, 8082),
    mode: resolveMode(),
    jwt: {
        secret: env.JWT_SECRET,
        accessExpiresIn: toInt(env.JWT_ACCESS_EXPIRES_IN, 24 * 60 * 60),
        refreshExpiresIn: toInt(env.JWT_REFRESH_EXPIRES_IN, 7 * 24 * 60 * 60),
    },
    passwordResetTtl: toInt(env.PASSWORD_RESET_TTL_MINUTES, 60),
    adminApiKey: env.ADMIN_API_KEY,
    googleClientId: env.GOOGLE_CLIENT_ID,
    database: {
        host: env.DB_HOST,
        port: toInt(env.DB_PORT, 5432),
        name: env.DB_NAME,
        user: env.DB_USER,
        password: env.DB_PASSWORD,
    },
    minio: {
        endpoint: env.MINIO_ENDPOINT,
        port: toInt(env.MINIO_PORT, 9000),
        useSSL: env.MINIO_USE_SSL === 'true',
        accessKey: env.MINIO_ACCESS_KEY,
        secretKey: env.MINIO_SECRET_KEY,
        bucket: env.MINIO_BUCKET || 'cm-stays',
        publicEndpoint: env.MINIO_ENDPOINT_PUBLIC,
    },
    notchpay: {
        baseUrl: env.NOTCHPAY_BASE_URL || 'https://api.notchpay.co',
        publicKey: env.NOTCHPAY_PUBLIC_KEY || '',
        privateKey: env.NOTCHPAY_PRIVATE_KEY || '',
        hashKey: env.NOTCHPAY_HASH_KEY || '',
    },
    urls: {
        paymentCallbackBase:
            env.PAYMENT_CALLBACK_BASE_URL || 'http://localhost:8082',
        frontend: env.FRONTEND_URL || 'http://localhost:3000',
    },
    smtp: {
        host: env.SMTP_HOST,
        port: toInt(env.SMTP_PORT, 587),
        secure: env.SMTP_SECURE === 'true',
        user: env.SMTP_USER,
        password: env.SMTP_PASSWORD,
        from: env.EMAIL_FROM || env.SMTP_USER || 'no-reply@localhost',
    },
    firebase: {
        projectId: env.FIREBASE_PROJECT_ID,
        clientEmail: env.FIREBASE_CLIENT_EMAIL,
        privateKey: env.FIREBASE_PRIVATE_KEY?.replace(/\\n/g, '\n'),
    },
    templatesDir: env.TEMPLATES_DIR || 'templates',
};

export default appConfig;
