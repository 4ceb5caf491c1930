import express from 'express';
import PromoCodeController from '../controllers/promo-code.controller';
import { requireUserType, validateRequestBody } from '../middleware/auth.middleware';

const getPromoCodeRoutes = () => {
    const router = express.Router();
    const controller = new PromoCodeController();

    router.post(
        '/',
        requireUserType('owner', 'admin'),
        validateRequestBody(['property_id', 'tenant_id', 'discount_percentage', 'expiry_date']),
        controller.create,
    );
    router.get('/', controller.list);
    router.get('/validate', controller.validate);

    return router;
};

export default getPromoCodeRoutes;
