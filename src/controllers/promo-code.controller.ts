import { Request, Response } from 'express';
import { getAuthUser } from '../helpers/auth.helper';
import { getBody, readNumber, readQueryString, readString } from '../helpers/request.helper';
import { respondWithError } from '../middleware/error.middleware';
import PromoCodeService from '../services/promo-code.service';
import Logger from '../utils/logger';

class PromoCodeController {
    private service: PromoCodeService;
    private context: string;

    constructor(service: PromoCodeService = new PromoCodeService()) {
        this.context = 'PromoCodeController';
        this.service = service;
        Logger.info('Initializing', this.context + ' - constructor');
    }

    public create = async (req: Request, res: Response) => {
        const methodContext = this.context + ' - create';
        try {
            const body = getBody(req);
            const promo = await this.service.createPromoCode(getAuthUser(req), {
                property_id: readString(body, 'property_id') ?? '',
                tenant_id: readString(body, 'tenant_id') ?? '',
                discount_percentage: readNumber(body, 'discount_percentage') ?? 0,
                expiry_date: readString(body, 'expiry_date') ?? '',
            });
            res.status(201).json({ success: true, data: promo });
        } catch (error) {
            respondWithError(res, error, methodContext);
        }
    };

    public list = async (req: Request, res: Response) => {
        const methodContext = this.context + ' - list';
        try {
            const codes = await this.service.listPromoCodes(getAuthUser(req));
            res.status(200).json({ success: true, data: codes });
        } catch (error) {
            respondWithError(res, error, methodContext);
        }
    };

    public validate = async (req: Request, res: Response) => {
        const methodContext = this.context + ' - validate';
        try {
            const result = await this.service.validatePromoCode(
                readQueryString(req, 'code') ?? '',
                readQueryString(req, 'property_id') ?? '',
                getAuthUser(req).userId,
            );
            res.status(200).json({ success: true, data: result });
        } catch (error) {
            respondWithError(res, error, methodContext);
        }
    };
}

export default PromoCodeController;
