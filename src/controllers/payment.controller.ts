import { Request, Response } from 'express';
import { getAuthUser } from '../helpers/auth.helper';
import { parsePagination } from '../helpers/property.helper';
import { getBody, pickOption, readBoolean, readParam, readString } from '../helpers/request.helper';
import { respondWithError } from '../middleware/error.middleware';
import { PAYMENT_METHOD_TYPES } from '../models/payment.model';
import PaymentService from '../services/payment.service';
import { badRequest } from '../utils/errors';
import Logger from '../utils/logger';

export const NOTCHPAY_SIGNATURE_HEADER = 'x-notch-signature';

class PaymentController {
    private service: PaymentService;
    private context: string;

    constructor(service: PaymentService = new PaymentService()) {
        this.context = 'PaymentController';
        this.service = service;
        Logger.info('Initializing', this.context + ' - constructor');
    }

    public notchPayWebhook = async (req: Request, res: Response) => {
        const methodContext = this.context + ' - notchPayWebhook';
        try {
            const rawBody = req.rawBody ?? '';
            const result = await this.service.handleWebhook(
                rawBody,
                req.header(NOTCHPAY_SIGNATURE_HEADER),
            );
            Logger.info('Webhook processed', methodContext, result);
            res.status(200).json({ success: true, data: result });
        } catch (error) {
            respondWithError(res, error, methodContext);
        }
    };

    public listTransactions = async (req: Request, res: Response) => {
        const methodContext = this.context + ' - listTransactions';
        try {
            const transactions = await this.service.listTransactions(
                getAuthUser(req).userId,
                parsePagination(req.query),
            );
            res.status(200).json({ success: true, data: transactions });
        } catch (error) {
            respondWithError(res, error, methodContext);
        }
    };

    public getSummary = async (req: Request, res: Response) => {
        const methodContext = this.context + ' - getSummary';
        try {
            const summary = await this.service.getSummary(getAuthUser(req).userId);
            res.status(200).json({ success: true, data: summary });
        } catch (error) {
            respondWithError(res, error, methodContext);
        }
    };

    public getCommission = async (req: Request, res: Response) => {
        const methodContext = this.context + ' - getCommission';
        try {
            const commission = await this.service.getCommission(
                readParam(req, 'bookingId'),
                getAuthUser(req),
            );
            res.status(200).json({ success: true, data: commission });
        } catch (error) {
            respondWithError(res, error, methodContext);
        }
    };

    public listMethods = async (req: Request, res: Response) => {
        const methodContext = this.context + ' - listMethods';
        try {
            const methods = await this.service.listPaymentMethods(getAuthUser(req).userId);
            res.status(200).json({ success: true, data: methods });
        } catch (error) {
            respondWithError(res, error, methodContext);
        }
    };

    public addMethod = async (req: Request, res: Response) => {
        const methodContext = this.context + ' - addMethod';
        try {
            const body = getBody(req);
            const paymentType = pickOption(body.payment_type, PAYMENT_METHOD_TYPES);
            if (!paymentType) {
                throw badRequest('invalid_payment_type', 'Unknown payment method type');
            }
            const method = await this.service.addPaymentMethod(getAuthUser(req).userId, {
                payment_type: paymentType,
                nickname: readString(body, 'nickname'),
                phone_number: readString(body, 'phone_number'),
                operator: readString(body, 'operator'),
                account_number: readString(body, 'account_number'),
                account_name: readString(body, 'account_name'),
                bank_name: readString(body, 'bank_name'),
                is_default: readBoolean(body, 'is_default'),
            });
            res.status(201).json({ success: true, data: method });
        } catch (error) {
            respondWithError(res, error, methodContext);
        }
    };

    public setDefaultMethod = async (req: Request, res: Response) => {
        const methodContext = this.context + ' - setDefaultMethod';
        try {
            const method = await this.service.setDefaultPaymentMethod(
                getAuthUser(req).userId,
                readParam(req, 'id'),
            );
            res.status(200).json({ success: true, data: method });
        } catch (error) {
            respondWithError(res, error, methodContext);
        }
    };

    public deleteMethod = async (req: Request, res: Response) => {
        const methodContext = this.context + ' - deleteMethod';
        try {
            await this.service.deletePaymentMethod(getAuthUser(req).userId, readParam(req, 'id'));
            res.status(200).json({ success: true, data: { message: 'Payment method deleted' } });
        } catch (error) {
            respondWithError(res, error, methodContext);
        }
    };
}

export default PaymentController;
