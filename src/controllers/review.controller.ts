import { Request, Response } from 'express';
import { getAuthUser } from '../helpers/auth.helper';
import { getBody, readNumber, readParam, readString } from '../helpers/request.helper';
import { respondWithError } from '../middleware/error.middleware';
import ReviewService from '../services/review.service';
import Logger from '../utils/logger';

class ReviewController {
    private service: ReviewService;
    private context: string;

    constructor(service: ReviewService = new ReviewService()) {
        this.context = 'ReviewController';
        this.service = service;
        Logger.info('Initializing', this.context + ' - constructor');
    }

    public create = async (req: Request, res: Response) => {
        const methodContext = this.context + ' - create';
        try {
            const body = getBody(req);
            const review = await this.service.createReview(getAuthUser(req), {
                property_id: readString(body, 'property_id') ?? '',
                rating: readNumber(body, 'rating') ?? 0,
                cleanliness_rating: readNumber(body, 'cleanliness_rating'),
                location_rating: readNumber(body, 'location_rating'),
                value_rating: readNumber(body, 'value_rating'),
                communication_rating: readNumber(body, 'communication_rating'),
                title: readString(body, 'title') ?? '',
                comment: readString(body, 'comment') ?? '',
                stay_date: readString(body, 'stay_date') ?? '',
            });
            res.status(201).json({ success: true, data: review });
        } catch (error) {
            respondWithError(res, error, methodContext);
        }
    };

    public getPropertyReviews = async (req: Request, res: Response) => {
        const methodContext = this.context + ' - getPropertyReviews';
        try {
            const reviews = await this.service.getPropertyReviews(readParam(req, 'propertyId'));
            res.status(200).json({ success: true, data: reviews });
        } catch (error) {
            respondWithError(res, error, methodContext);
        }
    };

    public reply = async (req: Request, res: Response) => {
        const methodContext = this.context + ' - reply';
        try {
            const reply = await this.service.replyToReview(
                readParam(req, 'id'),
                getAuthUser(req),
                readString(getBody(req), 'content') ?? '',
            );
            res.status(201).json({ success: true, data: reply });
        } catch (error) {
            respondWithError(res, error, methodContext);
        }
    };
}

export default ReviewController;
