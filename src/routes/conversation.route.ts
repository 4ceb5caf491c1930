import express from 'express';
import ConversationController from '../controllers/conversation.controller';
import { validateRequestBody } from '../middleware/auth.middleware';

const getConversationRoutes = () => {
    const router = express.Router();
    const controller = new ConversationController();

    router.get('/', controller.getConversations);
    router.post('/', validateRequestBody(['recipient_id']), controller.startConversation);
    router.get('/:id', controller.getConversation);
    router.get('/:id/messages', controller.getMessages);
    router.post('/:id/messages', validateRequestBody(['content']), controller.sendMessage);
    router.post('/:id/read', controller.markAsRead);

    return router;
};

export default getConversationRoutes;
