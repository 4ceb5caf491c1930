import express from 'express';
import ConfigController from '../controllers/config.controller';
import { validateRequestBody } from '../middleware/auth.middleware';

const getConfigRoutes = () => {
    const router = express.Router();
    const controller = new ConfigController();

    router.get('/', controller.getAll);
    router.put('/:key', validateRequestBody(['value']), controller.update);

    return router;
};

export const getAdminRoutes = () => {
    const router = express.Router();
    const controller = new ConfigController();

    router.post('/config/init', controller.initializeDefaults);

    return router;
};

export default getConfigRoutes;
