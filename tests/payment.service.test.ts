import { Row } from '../src/database';
import { toBookingWithProperty } from '../src/helpers/booking.helper';
import { computeWebhookSignature } from '../src/helpers/notchpay.helper';
import PaymentService from '../src/services/payment.service';
import {
    CREATED_AT,
    bookingRow,
    buildServices,
    notificationRow,
    owner,
    paymentTransactionRow,
    tenant,
} from './support/fixtures';
import { ScriptedClient } from './support/scripted-client';

const webhookBody = (event: string, status = 'complete') =>
    JSON.stringify({
        event,
        data: {
            reference: 'trx.test_1',
            merchant_reference: 'booking-booking-1-42',
            status,
        },
    });

const ledgerRow = (overrides: Row): Row => ({
    id: 7,
    user_id: 'tenant-1',
    transaction_type: 'refund',
    status: 'pending',
    amount: 75000,
    currency: 'XAF',
    booking_id: 'booking-1',
    payment_transaction_id: 42,
    external_reference: 'trx.test_1',
    description: 'Remboursement réservation Villa Bonapriso',
    admin_notes: '',
    created_at: CREATED_AT,
    processed_at: null,
    ...overrides,
});

const refundReply = (status: string) => ({ data: { transaction: { reference: 'trx.refund_1', status } } });

// Keeps the transaction status between calls, like the real table
const paymentClient = (bookingOverrides = {}, initialStatus = 'pending') => {
    let status = initialStatus;
    const client = new ScriptedClient()
        .on(/WHERE reference = ANY/, () => [paymentTransactionRow({ status })])
        .on(/payment_transactions WHERE id = \$1 FOR UPDATE/, () => [paymentTransactionRow({ status })])
        .on(/UPDATE payment_transactions\s+SET status = \$2/, (params) => {
            status = String(params[1]);
            return [paymentTransactionRow({ status })];
        })
        .on(/FROM bookings b\s+JOIN properties p/, [bookingRow(bookingOverrides)])
        .on(/VALUES \(\$1, 'refund'/, (params) => [ledgerRow({ amount: params[1], payment_transaction_id: params[4] })])
        .on(/UPDATE financial_transactions\s+SET status = \$2/, (params) => [
            ledgerRow({ amount: 103003, status: params[1], external_reference: params[2] }),
        ])
        .on(/INSERT INTO notifications/, (params) => [notificationRow(params)]);
    return client;
};

describe('PaymentService.handleWebhook', () => {
    it('marks the booking paid and records the ledger entries', async () => {
        const client = paymentClient();
        const { paymentService } = buildServices(client);
        const body = webhookBody('payment.complete');

        const result = await paymentService.handleWebhook(body, computeWebhookSignature(body, 'test-secret'));

        expect(result).toEqual({
            handled: true,
            event: 'payment.complete',
            transaction_id: '42',
            status: 'completed',
        });
        expect(client.matching(/SET payment_status = 'paid'/)[0].params).toEqual(['booking-1']);
        expect(client.matching(/INSERT INTO financial_transactions/)[0].params).toEqual([
            'tenant-1',
            103003,
            'XAF',
            'booking-1',
            '42',
            'trx.test_1',
            'Paiement réservation Villa Bonapriso',
        ]);
        expect(client.matching(/INSERT INTO commissions/)[0].params).toEqual([
            'booking-1',
            3,
            7,
            2187,
            5103,
            7290,
            75713,
        ]);
        expect(client.matching(/INSERT INTO notifications/).map((query) => query.params[0])).toEqual([
            'owner-1',
            'tenant-1',
        ]);
    });

    it('ignores a repeated delivery of the same event', async () => {
        const client = paymentClient();
        const { paymentService } = buildServices(client);
        const body = webhookBody('payment.complete');
        const signature = computeWebhookSignature(body, 'test-secret');

        await paymentService.handleWebhook(body, signature);
        const second = await paymentService.handleWebhook(body, signature);

        expect(second.status).toBe('completed');
        expect(client.matching(/INSERT INTO commissions/)).toHaveLength(1);
        expect(client.matching(/INSERT INTO notifications/)).toHaveLength(2);
    });

    it('mirrors a failed payment on the booking', async () => {
        const client = paymentClient();
        const body = webhookBody('payment.failed', 'failed');

        const result = await buildServices(client).paymentService.handleWebhook(body, undefined);

        expect(result.status).toBe('failed');
        expect(client.matching(/UPDATE bookings SET payment_status = \$2/)[0].params).toEqual([
            'booking-1',
            'failed',
        ]);
        expect(client.matching(/INSERT INTO commissions/)).toHaveLength(0);
    });

    it('refunds a payment completing after the booking was cancelled', async () => {
        const client = paymentClient({ status: 'cancelled' }, 'cancelled');
        const { paymentService, calls } = buildServices(client, [refundReply('complete')]);
        const body = webhookBody('payment.complete');

        const result = await paymentService.handleWebhook(body, computeWebhookSignature(body, 'test-secret'));

        expect(result.status).toBe('completed');
        expect(client.matching(/SET payment_status = 'paid'/)).toHaveLength(0);
        expect(client.matching(/INSERT INTO commissions/)).toHaveLength(0);
        expect(client.matching(/VALUES \(\$1, 'payment'/)).toHaveLength(1);
        expect(client.matching(/VALUES \(\$1, 'refund'/)[0]?.params).toEqual([
            'tenant-1',
            103003,
            'XAF',
            'booking-1',
            '42',
            'trx.test_1',
            'Remboursement réservation Villa Bonapriso',
            '',
        ]);
        expect(calls).toEqual([
            {
                method: 'post',
                url: '/payments/trx.test_1/refund',
                body: { amount: 103003, reason: 'Paiement non requis pour la réservation booking-1' },
            },
        ]);
        expect(client.matching(/SET payment_status = 'refunded'/)[0]?.params).toEqual(['booking-1']);
        expect(client.matching(/INSERT INTO notifications/).map((query) => query.params.slice(0, 3))).toEqual([
            ['tenant-1', 'payment', 'Paiement remboursé'],
        ]);
    });

    it('refunds a second payment on a booking already paid', async () => {
        const client = paymentClient({ payment_status: 'paid' });
        const { paymentService, calls } = buildServices(client, [refundReply('refunded')]);

        await paymentService.handleWebhook(webhookBody('payment.complete'), undefined);

        expect(calls).toHaveLength(1);
        expect(client.matching(/INSERT INTO commissions/)).toHaveLength(0);
        expect(client.matching(/UPDATE payment_transactions SET status = 'refunded'/)[0]?.params).toEqual(['42']);
        expect(client.matching(/SET payment_status = 'refunded'/)).toHaveLength(0);
    });

    it('rejects a wrong signature before touching the database', async () => {
        const client = paymentClient();
        const body = webhookBody('payment.complete');

        await expect(
            buildServices(client).paymentService.handleWebhook(body, computeWebhookSignature(body, 'other-secret')),
        ).rejects.toMatchObject({ statusCode: 400, code: 'invalid_signature' });
        expect(client.queries).toHaveLength(0);
    });

    it('acknowledges events it does not act on', async () => {
        const client = paymentClient();

        const result = await buildServices(client).paymentService.handleWebhook(
            webhookBody('payment.created'),
            undefined,
        );

        expect(result).toEqual({ handled: false, event: 'payment.created' });
    });

    it('acknowledges payments it cannot match', async () => {
        const client = new ScriptedClient();

        const result = await buildServices(client).paymentService.handleWebhook(
            webhookBody('payment.complete'),
            undefined,
        );

        expect(result).toEqual({ handled: false, event: 'payment.complete' });
        expect(client.matching(/WHERE reference = ANY/)[0].params).toEqual([
            ['booking-booking-1-42', 'trx.test_1'],
        ]);
    });
});

describe('PaymentService.initiateBookingPayment', () => {
    const initiationClient = (bookingOverrides = {}) =>
        new ScriptedClient()
            .on(/FROM bookings b\s+JOIN properties p/, [bookingRow(bookingOverrides)])
            .on(/SELECT \* FROM users WHERE id/, [])
            .on(/INSERT INTO payment_transactions/, [paymentTransactionRow({ reference: null, gateway_reference: null })]);

    it('opens a gateway payment for the booking total', async () => {
        const client = initiationClient();
        const { paymentService, calls } = buildServices(client, [
            {
                data: {
                    status: 'Accepted',
                    authorization_url: 'https://pay.example.test/checkout/trx.test_1',
                    transaction: { reference: 'trx.test_1', status: 'pending' },
                },
            },
        ]);

        const result = await paymentService.initiateBookingPayment('booking-1', tenant, {
            mobile_operator: 'mtn',
            phone_number: '677123456',
        });

        expect(result).toEqual({
            payment_url: 'https://pay.example.test/checkout/trx.test_1',
            transaction_id: '42',
            reference: 'booking-booking-1-42',
        });
        expect(client.matching(/INSERT INTO payment_transactions/)[0].params).toEqual([
            'booking-1',
            103003,
            'cm.mtn',
        ]);
        expect(calls[0]).toMatchObject({
            method: 'post',
            url: '/payments',
            body: {
                currency: 'XAF',
                amount: 103003,
                reference: 'booking-booking-1-42',
                customer: { email: 'awa@example.com', phone: '237677123456', name: '' },
                metadata: { booking_id: 'booking-1', transaction_id: '42', payment_method: 'cm.mtn' },
            },
        });
        expect(client.matching(/SET reference = \$2, gateway_reference = \$3/)[0].params.slice(0, 3)).toEqual([
            '42',
            'booking-booking-1-42',
            'trx.test_1',
        ]);
    });

    it('abandons earlier open attempts before opening a new one', async () => {
        const client = initiationClient().on(/status IN \('pending', 'processing'\)/, [
            paymentTransactionRow({ id: 41, gateway_reference: 'trx.old' }),
        ]);
        const { paymentService, calls } = buildServices(client, [
            { data: {} },
            { data: { status: 'Accepted', transaction: { reference: 'trx.test_1', status: 'pending' } } },
        ]);

        await paymentService.initiateBookingPayment('booking-1', tenant, {});

        expect(calls.map((call) => [call.method, call.url])).toEqual([
            ['delete', '/payments/trx.old'],
            ['post', '/payments'],
        ]);
        expect(client.matching(/SET status = 'cancelled', updated_at/)[0]?.params).toEqual(['41']);
    });

    it('marks the attempt failed when the gateway refuses', async () => {
        const client = initiationClient();
        const { paymentService } = buildServices(client, [{ status: 422, data: { message: 'Invalid' } }]);

        await expect(paymentService.initiateBookingPayment('booking-1', tenant, {})).rejects.toMatchObject({
            statusCode: 502,
            code: 'payment_gateway_error',
        });
        expect(client.matching(/SET status = 'failed'/)[0].params).toEqual(['42', 'booking-booking-1-42']);
    });

    it('refuses to charge a paid booking twice', async () => {
        const client = initiationClient({ payment_status: 'paid' });

        await expect(
            buildServices(client).paymentService.initiateBookingPayment('booking-1', tenant, {}),
        ).rejects.toMatchObject({ statusCode: 409, code: 'already_paid' });
    });

    it('only lets the tenant pay', async () => {
        const client = initiationClient();

        await expect(
            buildServices(client).paymentService.initiateBookingPayment('booking-1', owner, {}),
        ).rejects.toMatchObject({ statusCode: 403, code: 'tenant_only' });
    });

    it('validates the Mobile Money number', async () => {
        const client = initiationClient();

        await expect(
            buildServices(client).paymentService.initiateBookingPayment('booking-1', tenant, {
                phone_number: '12345',
            }),
        ).rejects.toMatchObject({ code: 'invalid_phone' });
    });
});

describe('PaymentService.applyTransactionStatus', () => {
    it('marks a paid booking refunded when its payment is refunded', async () => {
        const client = paymentClient({ payment_status: 'paid' }, 'completed');

        const transaction = await buildServices(client).paymentService.applyTransactionStatus('42', 'refunded', {});

        expect(transaction.status).toBe('refunded');
        expect(client.matching(/SET payment_status = 'refunded'/)[0]?.params).toEqual(['booking-1']);
    });

    it('keeps the booking paid while another payment covers it', async () => {
        const client = paymentClient({ payment_status: 'paid' }, 'completed').on(
            /status = 'completed' AND id <> \$2/,
            [{ id: 43 }],
        );

        await buildServices(client).paymentService.applyTransactionStatus('42', 'refunded', {});

        expect(client.matching(/status = 'completed' AND id <> \$2/)[0]?.params).toEqual(['booking-1', '42']);
        expect(client.matching(/SET payment_status = 'refunded'/)).toHaveLength(0);
    });
});

describe('PaymentService refunds', () => {
    const booking = toBookingWithProperty(bookingRow({ status: 'cancelled', payment_status: 'paid' }));

    const refundClient = () =>
        new ScriptedClient()
            .on(/WHERE booking_id = \$1 AND status = 'completed'/, [paymentTransactionRow({ status: 'completed' })])
            .on(/INSERT INTO financial_transactions/, [ledgerRow({})])
            .on(/UPDATE financial_transactions\s+SET status = \$2/, (params) => [
                ledgerRow({ status: params[1], external_reference: params[2] }),
            ])
            .on(/UPDATE financial_transactions SET admin_notes/, (params) => [
                ledgerRow({ admin_notes: params[1] }),
            ]);

    const refund = async (paymentService: PaymentService, client: ScriptedClient, settlesBooking = true) => {
        const pending = await client.transaction((tx) =>
            paymentService.recordRefund(tx, booking, 75000, { settlesBooking }),
        );
        return paymentService.requestRefund(pending, 'Annulation');
    };

    it('asks the gateway to refund the original payment and settles the booking', async () => {
        const client = refundClient();
        const { paymentService, calls } = buildServices(client, [refundReply('refunded')]);

        const outcome = await refund(paymentService, client);

        expect(calls).toEqual([
            { method: 'post', url: '/payments/trx.test_1/refund', body: { amount: 75000, reason: 'Annulation' } },
        ]);
        expect(outcome.gateway_requested).toBe(true);
        expect(outcome.transaction).toMatchObject({ status: 'completed', external_reference: 'trx.refund_1' });
        expect(client.matching(/UPDATE payment_transactions SET status = 'refunded'/)[0]?.params).toEqual(['42']);
        expect(client.matching(/SET payment_status = 'refunded'/)[0]?.params).toEqual(['booking-1']);
    });

    it('writes the pending row in the caller transaction', async () => {
        const client = refundClient();
        const { paymentService } = buildServices(client, [refundReply('refunded')]);

        await refund(paymentService, client);

        expect(client.matching(/INSERT INTO financial_transactions/)[0]?.inTransaction).toBe(true);
    });

    it('leaves the booking alone while the gateway is still processing', async () => {
        const client = refundClient();
        const { paymentService } = buildServices(client, [refundReply('processing')]);

        const outcome = await refund(paymentService, client);

        expect(outcome.transaction.status).toBe('processing');
        expect(client.matching(/SET status = 'refunded'/)).toHaveLength(0);
        expect(client.matching(/SET payment_status = 'refunded'/)).toHaveLength(0);
    });

    it('does not settle a booking another payment still covers', async () => {
        const client = refundClient();
        const { paymentService } = buildServices(client, [refundReply('refunded')]);

        await refund(paymentService, client, false);

        expect(client.matching(/UPDATE payment_transactions SET status = 'refunded'/)).toHaveLength(1);
        expect(client.matching(/SET payment_status = 'refunded'/)).toHaveLength(0);
    });

    it('keeps the refund pending when the gateway call fails', async () => {
        const client = refundClient();
        const { paymentService } = buildServices(client, [{ status: 500, data: {} }]);

        const outcome = await refund(paymentService, client);

        expect(outcome.gateway_requested).toBe(true);
        expect(outcome.transaction).toMatchObject({
            status: 'pending',
            admin_notes: 'Échec de la demande de remboursement auprès de NotchPay',
        });
        expect(client.matching(/SET status = 'refunded'/)).toHaveLength(0);
        expect(client.matching(/SET payment_status = 'refunded'/)).toHaveLength(0);
    });

    it('leaves the refund for an admin without a gateway reference', async () => {
        const client = new ScriptedClient().on(/INSERT INTO financial_transactions/, (params) => [
            ledgerRow({ external_reference: params[5], admin_notes: params[7], payment_transaction_id: params[4] }),
        ]);
        const { paymentService, calls } = buildServices(client);

        const outcome = await refund(paymentService, client);

        expect(calls).toHaveLength(0);
        expect(outcome).toMatchObject({
            gateway_requested: false,
            transaction: {
                status: 'pending',
                payment_transaction_id: null,
                admin_notes: 'Remboursement manuel requis : aucune référence de paiement',
            },
        });
    });
});

describe('PaymentService payment methods', () => {
    const methodRow = (overrides: Row = {}): Row => ({
        id: 'method-1',
        user_id: 'tenant-1',
        payment_type: 'mobile_money',
        is_default: false,
        nickname: 'MTN',
        phone_number: '237677123456',
        operator: 'mtn',
        created_at: CREATED_AT,
        ...overrides,
    });

    it('makes the first method the default', async () => {
        const client = new ScriptedClient().on(/INSERT INTO payment_methods/, (params) => [
            methodRow({ is_default: params[2] }),
        ]);

        const method = await buildServices(client).paymentService.addPaymentMethod('tenant-1', {
            payment_type: 'mobile_money',
            phone_number: '677123456',
            operator: 'mtn',
        });

        expect(method.is_default).toBe(true);
        expect(client.matching(/SET is_default = FALSE WHERE user_id/)[0]?.params).toEqual(['tenant-1']);
        expect(client.matching(/INSERT INTO payment_methods/)[0]?.params.slice(0, 6)).toEqual([
            'tenant-1',
            'mobile_money',
            true,
            '',
            '237677123456',
            'mtn',
        ]);
    });

    it('clears the other defaults before setting one', async () => {
        const client = new ScriptedClient()
            .on(/SELECT id FROM payment_methods/, [{ id: 'method-2' }])
            .on(/SET is_default = TRUE WHERE id = \$1/, [methodRow({ id: 'method-2', is_default: true })]);

        const method = await buildServices(client).paymentService.setDefaultPaymentMethod('tenant-1', 'method-2');

        expect(method).toMatchObject({ id: 'method-2', is_default: true });
        expect(client.matching(/payment_methods SET is_default/).map((query) => query.params)).toEqual([
            ['tenant-1'],
            ['method-2'],
        ]);
        expect(client.transactions).toBe(1);
    });

    it('refuses to default a method of another user', async () => {
        const client = new ScriptedClient();

        await expect(
            buildServices(client).paymentService.setDefaultPaymentMethod('tenant-1', 'method-9'),
        ).rejects.toMatchObject({ statusCode: 404, code: 'payment_method_not_found' });
        expect(client.matching(/SET is_default/)).toHaveLength(0);
    });

    it('promotes the most recent method when the default is deleted', async () => {
        const client = new ScriptedClient().on(/DELETE FROM payment_methods/, [methodRow({ is_default: true })]);

        await buildServices(client).paymentService.deletePaymentMethod('tenant-1', 'method-1');

        expect(client.matching(/DELETE FROM payment_methods/)[0]?.params).toEqual(['method-1', 'tenant-1']);
        expect(client.matching(/SET is_default = TRUE\s+WHERE id = \(SELECT id/)[0]?.params).toEqual(['tenant-1']);
    });

    it('leaves the default alone when another method is deleted', async () => {
        const client = new ScriptedClient().on(/DELETE FROM payment_methods/, [methodRow()]);

        await buildServices(client).paymentService.deletePaymentMethod('tenant-1', 'method-1');

        expect(client.matching(/SET is_default = TRUE/)).toHaveLength(0);
    });
});
