import express from 'express';
import BookingController from '../controllers/booking.controller';
import { requireUserType, validateRequestBody } from '../middleware/auth.middleware';

const getBookingRoutes = () => {
    const router = express.Router();
    const controller = new BookingController();

    router.post(
        '/',
        requireUserType('tenant'),
        validateRequestBody(['property_id', 'check_in_date', 'check_out_date', 'guests_count']),
        controller.create,
    );
    router.get('/', controller.list);
    router.get('/:id', controller.getOne);
    router.post('/:id/confirm', requireUserType('owner', 'admin'), controller.confirm);
    router.post('/:id/complete', requireUserType('owner', 'admin'), controller.complete);
    router.post('/:id/cancel', controller.cancel);

    router.post('/:id/payment', requireUserType('tenant'), controller.initiatePayment);
    router.get('/:id/payment-status', controller.paymentStatus);
    router.get('/:id/invoice', controller.invoice);

    return router;
};

export default getBookingRoutes;
