import express from 'express';
import { authenticateUser, requireUserType } from '../middleware/auth.middleware';
import { apiKeyAuth } from '../middleware/pipeline.middleware';
import getAuthRoutes from './auth.route';
import getBookingRoutes from './booking.route';
import getConfigRoutes, { getAdminRoutes } from './config.route';
import getConversationRoutes from './conversation.route';
import getNotificationRoutes from './notification.route';
import getPaymentRoutes from './payment.route';
import getPromoCodeRoutes from './promo-code.route';
import getPropertyRoutes from './property.route';
import getReviewRoutes from './review.route';
import getUserRoutes from './users.route';

const getAPIRouter = () => {
    const router = express.Router();
    router.use('/auth', getAuthRoutes());
    router.use('/reviews', getReviewRoutes());
    router.use('/admin', [apiKeyAuth], getAdminRoutes());

    router.use('/user', [authenticateUser], getUserRoutes());
    router.use('/property', [authenticateUser], getPropertyRoutes());
    router.use('/bookings', [authenticateUser], getBookingRoutes());
    router.use('/promo-codes', [authenticateUser], getPromoCodeRoutes());
    router.use('/payments', [authenticateUser], getPaymentRoutes());
    router.use('/conversations', [authenticateUser], getConversationRoutes());
    router.use('/notifications', [authenticateUser], getNotificationRoutes());
    router.use('/config', [authenticateUser, requireUserType('admin')], getConfigRoutes());

    return router;
};

export default getAPIRouter;
