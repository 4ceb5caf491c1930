export type IReview = {
    id: string;
    property_id: string;
    reviewer_id: string | null;
    rating: number;
    cleanliness_rating: number | null;
    location_rating: number | null;
    value_rating: number | null;
    communication_rating: number | null;
    title: string;
    comment: string;
    stay_date: string;
    is_public: boolean;
    is_verified_stay: boolean;
    created_at: Date;
};

export type IReviewReply = {
    review_id: string;
    owner_id: string;
    content: string;
    created_at: Date;
};

export type IReviewWithReply = IReview & {
    reviewer_first_name: string | null;
    reviewer_last_name: string | null;
    reply: IReviewReply | null;
};

export type IReviewInput = {
    property_id: string;
    rating: number;
    cleanliness_rating?: number;
    location_rating?: number;
    value_rating?: number;
    communication_rating?: number;
    title: string;
    comment: string;
    stay_date: string;
};

export type PropertyReviews = {
    average_rating: number;
    count: number;
    reviews: IReviewWithReply[];
};
