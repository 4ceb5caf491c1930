import express from 'express';
import UserController from '../controllers/user.controller';
import { upload } from '../middleware/upload.middleware';

const getUserRoutes = () => {
    const router = express.Router();
    const controller = new UserController();

    router.get('/me', controller.getUser);
    router.put('/me', controller.updateUser);
    router.post('/me/avatar', upload.single('avatar'), controller.updateAvatar);

    return router;
};

export default getUserRoutes;
