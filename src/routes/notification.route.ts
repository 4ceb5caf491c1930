import express from 'express';
import NotificationController from '../controllers/notification.controller';
import { validateRequestBody } from '../middleware/auth.middleware';

const getNotificationRoutes = () => {
    const router = express.Router();
    const controller = new NotificationController();

    router.get('/', controller.list);
    router.post('/read-all', controller.markAllAsRead);
    router.post('/devices', validateRequestBody(['token', 'platform']), controller.registerDevice);
    router.post('/:id/read', controller.markAsRead);

    return router;
};

export default getNotificationRoutes;
