import express from 'express';
import ReviewController from '../controllers/review.controller';
import {
    authenticateUser,
    requireUserType,
    validateRequestBody,
} from '../middleware/auth.middleware';

const getReviewRoutes = () => {
    const router = express.Router();
    const controller = new ReviewController();

    // Public
    router.get('/property/:propertyId', controller.getPropertyReviews);

    router.post(
        '/',
        authenticateUser,
        requireUserType('tenant'),
        validateRequestBody(['property_id', 'rating', 'title', 'comment', 'stay_date']),
        controller.create,
    );
    router.post(
        '/:id/reply',
        authenticateUser,
        requireUserType('owner', 'admin'),
        validateRequestBody(['content']),
        controller.reply,
    );

    return router;
};

export default getReviewRoutes;
