import axios, { AxiosInstance } from 'axios';
import { appConfig } from '../config';
import { verifyWebhookSignature } from '../helpers/notchpay.helper';
import {
    NotchPayChannelInfo,
    NotchPayInitializeInput,
    NotchPayPaymentResponse,
} from '../models/payment.model';
import { ApiError } from '../utils/errors';
import Logger from '../utils/logger';

// The gateway expects the public key as-is, without a Bearer prefix
export const createNotchPayHttpClient = (): AxiosInstance =>
    axios.create({
        baseURL: appConfig.notchpay.baseUrl,
        timeout: 15000,
        headers: {
            'Content-Type': 'application/json',
            Accept: 'application/json',
            Authorization: appConfig.notchpay.publicKey,
        },
    });

type ChannelsResponse = {
    items?: NotchPayChannelInfo[];
};

class NotchPayService {
    private http: AxiosInstance;
    private hashKey: string;
    private context: string;

    constructor(
        http: AxiosInstance = createNotchPayHttpClient(),
        hashKey: string = appConfig.notchpay.hashKey,
    ) {
        this.context = 'NotchPayService';
        this.http = http;
        this.hashKey = hashKey;
        Logger.info('Initializing', this.context + ' - constructor');
    }

    private toGatewayError(error: unknown, methodContext: string): ApiError {
        if (axios.isAxiosError(error)) {
            Logger.error('NotchPay request failed', methodContext, {
                status: error.response?.status,
                body: error.response?.data,
            });
            return new ApiError(502, 'payment_gateway_error', 'Payment gateway request failed');
        }
        Logger.error('NotchPay request failed', methodContext, error);
        return new ApiError(502, 'payment_gateway_error', 'Payment gateway request failed');
    }

    private assertTransaction(data: NotchPayPaymentResponse, methodContext: string) {
        if (!data || typeof data !== 'object' || !data.transaction) {
            Logger.error('Unexpected NotchPay response', methodContext, data);
            throw new ApiError(502, 'payment_gateway_error', 'Unexpected payment gateway response');
        }
        return data;
    }

    public async initializePayment(input: NotchPayInitializeInput): Promise<NotchPayPaymentResponse> {
        const methodContext = this.context + ' - initializePayment';
        Logger.info('Starting', methodContext, {
            amount: input.amount,
            reference: input.reference,
        });

        const payload: Record<string, unknown> = {
            currency: input.currency ?? 'XAF',
            amount: input.amount,
            reference: input.reference,
            description: input.description,
        };
        if (input.customer) payload.customer = input.customer;
        if (input.metadata) payload.metadata = input.metadata;
        if (input.callbackUrl) payload.callback = input.callbackUrl;
        if (input.successUrl) payload.success_url = input.successUrl;
        if (input.cancelUrl) payload.cancel_url = input.cancelUrl;

        let data: NotchPayPaymentResponse;
        try {
            const response = await this.http.post<NotchPayPaymentResponse>('/payments', payload);
            data = response.data;
        } catch (error) {
            throw this.toGatewayError(error, methodContext);
        }

        this.assertTransaction(data, methodContext);
        Logger.info('Payment initialized', methodContext, {
            reference: data.transaction.reference,
        });
        return data;
    }

    public async verifyPayment(reference: string): Promise<NotchPayPaymentResponse> {
        const methodContext = this.context + ' - verifyPayment';
        Logger.info('Starting', methodContext, { reference });

        let data: NotchPayPaymentResponse;
        try {
            const response = await this.http.get<NotchPayPaymentResponse>(
                `/payments/${encodeURIComponent(reference)}`,
            );
            data = response.data;
        } catch (error) {
            throw this.toGatewayError(error, methodContext);
        }

        return this.assertTransaction(data, methodContext);
    }

    public async cancelPayment(reference: string): Promise<void> {
        const methodContext = this.context + ' - cancelPayment';
        Logger.info('Starting', methodContext, { reference });
        try {
            await this.http.delete(`/payments/${encodeURIComponent(reference)}`);
        } catch (error) {
            throw this.toGatewayError(error, methodContext);
        }
    }

    public async refundPayment(
        reference: string,
        amount: number,
        reason: string,
    ): Promise<NotchPayPaymentResponse> {
        const methodContext = this.context + ' - refundPayment';
        Logger.info('Starting', methodContext, { reference, amount });

        let data: NotchPayPaymentResponse;
        try {
            const response = await this.http.post<NotchPayPaymentResponse>(
                `/payments/${encodeURIComponent(reference)}/refund`,
                { amount, reason },
            );
            data = response.data;
        } catch (error) {
            throw this.toGatewayError(error, methodContext);
        }
        return this.assertTransaction(data, methodContext);
    }

    public async getPaymentChannels(): Promise<NotchPayChannelInfo[]> {
        const methodContext = this.context + ' - getPaymentChannels';
        Logger.info('Starting', methodContext);
        try {
            const response = await this.http.get<ChannelsResponse>('/channels');
            return response.data.items ?? [];
        } catch (error) {
            throw this.toGatewayError(error, methodContext);
        }
    }

    public verifyWebhookSignature(rawBody: string, signature: string | undefined): boolean {
        return verifyWebhookSignature(rawBody, signature, this.hashKey);
    }
}

export default NotchPayService;
