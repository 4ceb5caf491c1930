import express from 'express';
import PaymentController from '../controllers/payment.controller';
import { requireUserType, validateRequestBody } from '../middleware/auth.middleware';
import { captureRawBody } from '../middleware/pipeline.middleware';

// Mounted ahead of the JSON parser so the signature is checked on the raw bytes
export const getPaymentWebhookRoutes = () => {
    const router = express.Router();
    const controller = new PaymentController();

    router.post(
        '/notchpay',
        express.raw({ type: '*/*', limit: '1mb' }),
        captureRawBody,
        controller.notchPayWebhook,
    );

    return router;
};

const getPaymentRoutes = () => {
    const router = express.Router();
    const controller = new PaymentController();

    router.get('/transactions', controller.listTransactions);
    router.get('/summary', controller.getSummary);
    router.get('/commission/:bookingId', requireUserType('owner', 'admin'), controller.getCommission);

    router.get('/methods', controller.listMethods);
    router.post('/methods', validateRequestBody(['payment_type']), controller.addMethod);
    router.post('/methods/:id/default', controller.setDefaultMethod);
    router.delete('/methods/:id', controller.deleteMethod);

    return router;
};

export default getPaymentRoutes;
