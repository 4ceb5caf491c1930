import { Client, DatabaseClient, Row } from '../database';
import { calculateAverageRating } from '../helpers/property.helper';
import {
    readBoolean,
    readDate,
    readDay,
    readOptionalNumber,
    readOptionalString,
    readString,
} from '../helpers/row.helper';
import { AuthenticatedUser } from '../models/request.model';
import {
    IReview,
    IReviewInput,
    IReviewReply,
    IReviewWithReply,
    PropertyReviews,
} from '../models/review.model';
import { badRequest, conflict, forbidden, notFound } from '../utils/errors';
import Logger from '../utils/logger';
import { isValidDate, isValidRating } from '../utils/validations';
import NotificationService from './notification.service';
import PropertyService from './property.service';
import UserService from './user.service';

const toReview = (row: Row): IReview => ({
    id: readString(row, 'id'),
    property_id: readString(row, 'property_id'),
    reviewer_id: readOptionalString(row, 'reviewer_id'),
    rating: readOptionalNumber(row, 'rating') ?? 0,
    cleanliness_rating: readOptionalNumber(row, 'cleanliness_rating'),
    location_rating: readOptionalNumber(row, 'location_rating'),
    value_rating: readOptionalNumber(row, 'value_rating'),
    communication_rating: readOptionalNumber(row, 'communication_rating'),
    title: readOptionalString(row, 'title') ?? '',
    comment: readOptionalString(row, 'comment') ?? '',
    stay_date: readDay(row, 'stay_date'),
    is_public: readBoolean(row, 'is_public'),
    is_verified_stay: readBoolean(row, 'is_verified_stay'),
    created_at: readDate(row, 'created_at'),
});

const toReviewWithReply = (row: Row): IReviewWithReply => {
    const replyContent = readOptionalString(row, 'reply_content');
    const reply: IReviewReply | null =
        replyContent === null
            ? null
            : {
                  review_id: readString(row, 'id'),
                  owner_id: readString(row, 'reply_owner_id'),
                  content: replyContent,
                  created_at: readDate(row, 'reply_created_at'),
              };
    return {
        ...toReview(row),
        reviewer_first_name: readOptionalString(row, 'reviewer_first_name'),
        reviewer_last_name: readOptionalString(row, 'reviewer_last_name'),
        reply,
    };
};

const SUB_RATINGS = [
    'cleanliness_rating',
    'location_rating',
    'value_rating',
    'communication_rating',
] as const;

export const validateReviewInput = (input: IReviewInput): void => {
    if (!isValidRating(input.rating)) {
        throw badRequest('invalid_rating', 'rating must be an integer between 1 and 5');
    }
    for (const key of SUB_RATINGS) {
        const value = input[key];
        if (value !== undefined && value !== null && !isValidRating(value)) {
            throw badRequest('invalid_rating', `${key} must be an integer between 1 and 5`);
        }
    }
    if (!input.title || !input.title.trim() || !input.comment || !input.comment.trim()) {
        throw badRequest('missing_fields', 'title and comment are required');
    }
    if (!isValidDate(input.stay_date)) {
        throw badRequest('invalid_dates', 'stay_date must use the yyyy-MM-dd format');
    }
};

class ReviewService {
    private client: DatabaseClient;
    private propertyService: PropertyService;
    private userService: UserService;
    private notificationService: NotificationService;
    private context: string;

    constructor(
        client: DatabaseClient = new Client(),
        propertyService: PropertyService = new PropertyService(client),
        userService: UserService = new UserService(client),
        notificationService: NotificationService = new NotificationService(client),
    ) {
        this.context = 'ReviewService';
        this.client = client;
        this.propertyService = propertyService;
        this.userService = userService;
        this.notificationService = notificationService;
        Logger.info('Initializing', this.context + ' - constructor');
    }

    public async createReview(user: AuthenticatedUser, input: IReviewInput): Promise<IReview> {
        const methodContext = this.context + ' - createReview';
        Logger.info('Starting', methodContext, { userId: user.userId, propertyId: input.property_id });

        validateReviewInput(input);
        const property = await this.propertyService.getPropertyOrThrow(input.property_id);
        if (property.owner_id === user.userId) {
            throw forbidden('own_property', 'You cannot review your own property');
        }

        const existing = await this.client.query(
            'SELECT id FROM reviews WHERE property_id = $1 AND reviewer_id = $2',
            [property.id, user.userId],
        );
        if (existing.rows[0]) {
            throw conflict('already_reviewed', 'You have already reviewed this property');
        }

        const stay = await this.client.query(
            `SELECT EXISTS (
                SELECT 1 FROM bookings
                WHERE property_id = $1 AND tenant_id = $2 AND status = 'completed'
            ) AS verified`,
            [property.id, user.userId],
        );
        const verified = stay.rows[0] ? readBoolean(stay.rows[0], 'verified') : false;

        const inserted = await this.client.query(
            `INSERT INTO reviews (
                property_id, reviewer_id, rating, cleanliness_rating, location_rating,
                value_rating, communication_rating, title, comment, stay_date, is_verified_stay
            ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11)
            RETURNING *`,
            [
                property.id,
                user.userId,
                input.rating,
                input.cleanliness_rating ?? null,
                input.location_rating ?? null,
                input.value_rating ?? null,
                input.communication_rating ?? null,
                input.title.trim(),
                input.comment.trim(),
                input.stay_date,
                verified,
            ],
        );
        const review = toReview(inserted.rows[0]);

        await this.propertyService.refreshRating(property.id);
        await this.userService.refreshOwnerRating(property.owner_id);

        try {
            await this.notificationService.notify({
                recipientId: property.owner_id,
                type: 'review',
                title: 'Nouvel avis',
                content: `« ${property.title} » a reçu un avis de ${review.rating}/5.`,
                relatedObjectId: review.id,
                relatedObjectType: 'review',
            });
        } catch (error) {
            Logger.error('Could not send notification', methodContext, error);
        }

        Logger.info('Review created', methodContext, { reviewId: review.id, verified });
        return review;
    }

    public async getPropertyReviews(propertyId: string): Promise<PropertyReviews> {
        const methodContext = this.context + ' - getPropertyReviews';
        Logger.info('Starting', methodContext, { propertyId });

        const result = await this.client.query(
            `SELECT r.*,
                    u.first_name AS reviewer_first_name, u.last_name AS reviewer_last_name,
                    rr.content AS reply_content, rr.owner_id AS reply_owner_id,
                    rr.created_at AS reply_created_at
             FROM reviews r
             LEFT JOIN users u ON u.id = r.reviewer_id
             LEFT JOIN review_replies rr ON rr.review_id = r.id
             WHERE r.property_id = $1 AND r.is_public = TRUE
             ORDER BY r.created_at DESC`,
            [propertyId],
        );
        const reviews = result.rows.map(toReviewWithReply);
        return {
            average_rating: calculateAverageRating(reviews),
            count: reviews.length,
            reviews,
        };
    }

    public async replyToReview(
        reviewId: string,
        user: AuthenticatedUser,
        content: string,
    ): Promise<IReviewReply> {
        const methodContext = this.context + ' - replyToReview';
        Logger.info('Starting', methodContext, { reviewId });

        const text = (content ?? '').trim();
        if (!text) {
            throw badRequest('missing_fields', 'content is required');
        }

        const found = await this.client.query(
            `SELECT r.id, p.owner_id,
                    EXISTS (SELECT 1 FROM review_replies rr WHERE rr.review_id = r.id) AS has_reply
             FROM reviews r JOIN properties p ON p.id = r.property_id
             WHERE r.id = $1`,
            [reviewId],
        );
        const row = found.rows[0];
        if (!row) {
            throw notFound('review_not_found', 'Review not found');
        }
        if (readString(row, 'owner_id') !== user.userId) {
            throw forbidden('owner_only', 'Only the property owner can reply');
        }
        if (readBoolean(row, 'has_reply')) {
            throw conflict('already_replied', 'This review already has a reply');
        }

        const inserted = await this.client.query(
            `INSERT INTO review_replies (review_id, owner_id, content)
             VALUES ($1, $2, $3) RETURNING *`,
            [reviewId, user.userId, text],
        );
        const reply = inserted.rows[0];
        return {
            review_id: readString(reply, 'review_id'),
            owner_id: readString(reply, 'owner_id'),
            content: readString(reply, 'content'),
            created_at: readDate(reply, 'created_at'),
        };
    }
}

export default ReviewService;
