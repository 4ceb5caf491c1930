import axios, { AxiosError, AxiosInstance, InternalAxiosRequestConfig } from 'axios';
import { Row } from '../../src/database';
import { AuthenticatedUser } from '../../src/models/request.model';
import BookingService from '../../src/services/booking.service';
import ConfigService from '../../src/services/config.service';
import { EmailService } from '../../src/services/email.service';
import InvoiceService from '../../src/services/invoice.service';
import NotchPayService from '../../src/services/notchpay.service';
import NotificationService from '../../src/services/notification.service';
import PaymentService from '../../src/services/payment.service';
import PropertyService from '../../src/services/property.service';
import UserService from '../../src/services/user.service';
import { ScriptedClient } from './scripted-client';

export const CREATED_AT = new Date(2025, 4, 20, 9, 0, 0);

export const tenant: AuthenticatedUser = { userId: 'tenant-1', email: 'awa@example.com', userType: 'tenant' };
export const owner: AuthenticatedUser = { userId: 'owner-1', email: 'paul@example.com', userType: 'owner' };
export const stranger: AuthenticatedUser = { userId: 'user-9', email: 'eve@example.com', userType: 'tenant' };

export const propertyRow = (overrides: Row = {}): Row => ({
    id: 'property-1',
    owner_id: 'owner-1',
    title: 'Villa Bonapriso',
    description: 'Trois chambres près du marché',
    property_type: 'villa',
    capacity: 4,
    bedrooms: 3,
    bathrooms: 2,
    city_id: 1,
    neighborhood_id: 2,
    address: 'Rue 1.234',
    latitude: null,
    longitude: null,
    price_per_night: '10000',
    price_per_week: '60000',
    price_per_month: null,
    cleaning_fee: 5000,
    security_deposit: 20000,
    cancellation_policy: 'moderate',
    is_published: true,
    avg_rating: '0',
    rating_count: 0,
    created_at: CREATED_AT,
    updated_at: CREATED_AT,
    ...overrides,
});

// A ten-night stay with the 10% long-stay and 10% promo discounts applied
export const bookingRow = (overrides: Row = {}): Row => ({
    id: 'booking-1',
    property_id: 'property-1',
    tenant_id: 'tenant-1',
    check_in_date: '2099-07-01',
    check_out_date: '2099-07-11',
    guests_count: 2,
    base_price: 90000,
    cleaning_fee: 5000,
    security_deposit: 20000,
    long_stay_discount: 9000,
    promo_code_id: 3,
    discount_amount: 17100,
    service_fee: 5103,
    total_price: 103003,
    status: 'pending',
    payment_status: 'pending',
    special_requests: '',
    notes: '',
    created_at: CREATED_AT,
    updated_at: CREATED_AT,
    cancelled_at: null,
    cancelled_by: null,
    property_title: 'Villa Bonapriso',
    owner_id: 'owner-1',
    cancellation_policy: 'moderate',
    ...overrides,
});

export const paymentTransactionRow = (overrides: Row = {}): Row => ({
    id: 42,
    booking_id: 'booking-1',
    amount: 103003,
    payment_method: 'cm.mtn',
    status: 'pending',
    reference: 'booking-booking-1-42',
    gateway_reference: 'trx.test_1',
    payment_response: null,
    created_at: CREATED_AT,
    updated_at: CREATED_AT,
    ...overrides,
});

export const notificationRow = (params: unknown[]): Row => ({
    id: 1,
    recipient_id: params[0],
    notification_type: params[1],
    title: params[2],
    content: params[3],
    related_object_id: params[4],
    related_object_type: params[5],
    is_read: false,
    created_at: CREATED_AT,
});

export type GatewayCall = {
    method: string | undefined;
    url: string | undefined;
    body: unknown;
};

export type GatewayReply = {
    status?: number;
    data: unknown;
};

/**
 * An axios instance whose adapter answers in process. Replies are consumed
 * in order; a status of 400 or more is raised as an AxiosError.
 */
export const stubGateway = (replies: GatewayReply[]): { http: AxiosInstance; calls: GatewayCall[] } => {
    const calls: GatewayCall[] = [];
    const queue = [...replies];
    const http = axios.create({
        adapter: async (config: InternalAxiosRequestConfig) => {
            calls.push({
                method: config.method,
                url: config.url,
                body: typeof config.data === 'string' ? JSON.parse(config.data) : config.data,
            });
            const reply = queue.shift() ?? { status: 500, data: {} };
            const response = {
                data: reply.data,
                status: reply.status ?? 200,
                statusText: 'OK',
                headers: {},
                config,
            };
            if (response.status >= 400) {
                throw new AxiosError(
                    `Request failed with status code ${response.status}`,
                    AxiosError.ERR_BAD_RESPONSE,
                    config,
                    null,
                    response,
                );
            }
            return response;
        },
    });
    return { http, calls };
};

export type ServiceSet = {
    configService: ConfigService;
    notificationService: NotificationService;
    propertyService: PropertyService;
    bookingService: BookingService;
    paymentService: PaymentService;
    notchPayService: NotchPayService;
};

export const buildServices = (client: ScriptedClient, gateway: GatewayReply[] = []): ServiceSet & { calls: GatewayCall[] } => {
    const configService = new ConfigService(client);
    const notificationService = new NotificationService(client, null);
    const propertyService = new PropertyService(client);
    const bookingService = new BookingService(client, {
        propertyService,
        configService,
        notificationService,
        emailService: new EmailService(null),
        invoiceService: new InvoiceService(client, () => '<p>{{number}}</p>'),
    });
    const { http, calls } = stubGateway(gateway);
    const notchPayService = new NotchPayService(http, 'test-secret');
    const paymentService = new PaymentService(client, {
        notchPayService,
        bookingService,
        configService,
        notificationService,
        userService: new UserService(client),
    });
    return {
        configService,
        notificationService,
        propertyService,
        bookingService,
        paymentService,
        notchPayService,
        calls,
    };
};
