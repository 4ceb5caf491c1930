import NotchPayService from '../src/services/notchpay.service';
import { computeWebhookSignature } from '../src/helpers/notchpay.helper';
import { stubGateway } from './support/fixtures';

describe('NotchPayService', () => {
    it('initializes a payment with the gateway field names', async () => {
        const { http, calls } = stubGateway([
            {
                data: {
                    authorization_url: 'https://pay.example.test/checkout/trx.test_1',
                    transaction: { reference: 'trx.test_1', status: 'pending' },
                },
            },
        ]);
        const service = new NotchPayService(http, 'test-secret');

        const response = await service.initializePayment({
            amount: 5000,
            description: 'Réservation',
            reference: 'booking-b-1-42',
            callbackUrl: 'https://api.example.test/payments/webhook/notchpay',
            successUrl: 'https://app.example.test/ok',
        });

        expect(response.transaction.reference).toBe('trx.test_1');
        expect(calls).toEqual([
            {
                method: 'post',
                url: '/payments',
                body: {
                    currency: 'XAF',
                    amount: 5000,
                    reference: 'booking-b-1-42',
                    description: 'Réservation',
                    callback: 'https://api.example.test/payments/webhook/notchpay',
                    success_url: 'https://app.example.test/ok',
                },
            },
        ]);
    });

    it('verifies a payment by its encoded reference', async () => {
        const { http, calls } = stubGateway([
            { data: { transaction: { reference: 'trx/1', status: 'complete' } } },
        ]);

        const response = await new NotchPayService(http, 'test-secret').verifyPayment('trx/1');

        expect(response.transaction.status).toBe('complete');
        expect(calls[0]).toMatchObject({ method: 'get', url: '/payments/trx%2F1' });
    });

    it('turns gateway failures into a 502', async () => {
        const { http } = stubGateway([{ status: 401, data: { message: 'Unauthorized' } }]);

        await expect(new NotchPayService(http, 'test-secret').verifyPayment('trx.test_1')).rejects.toMatchObject({
            statusCode: 502,
            code: 'payment_gateway_error',
            message: 'Payment gateway request failed',
        });
    });

    it('rejects responses without a transaction', async () => {
        const { http } = stubGateway([{ data: { status: 'ok' } }]);

        await expect(new NotchPayService(http, 'test-secret').verifyPayment('trx.test_1')).rejects.toMatchObject({
            statusCode: 502,
            message: 'Unexpected payment gateway response',
        });
    });

    it('lists payment channels', async () => {
        const { http } = stubGateway([
            { data: { items: [{ id: 'cm.mtn', name: 'MTN Mobile Money', active: true, enabled: true }] } },
        ]);

        const channels = await new NotchPayService(http, 'test-secret').getPaymentChannels();

        expect(channels).toEqual([{ id: 'cm.mtn', name: 'MTN Mobile Money', active: true, enabled: true }]);
    });

    it('checks webhook signatures with its hash key', () => {
        const service = new NotchPayService(stubGateway([]).http, 'test-secret');
        const body = '{"event":"payment.complete"}';

        expect(service.verifyWebhookSignature(body, computeWebhookSignature(body, 'test-secret'))).toBe(true);
        expect(service.verifyWebhookSignature(body, computeWebhookSignature(body, 'other'))).toBe(false);
    });
});
