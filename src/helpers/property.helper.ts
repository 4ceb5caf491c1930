import { Row } from '../database';
import {
    AvailabilityConflict,
    CANCELLATION_POLICIES,
    CancellationPolicy,
    IAmenity,
    ILongStayDiscount,
    IProperty,
    IPropertyImage,
    IPropertyListItem,
    IUnavailability,
    PROPERTY_TYPES,
    PropertyType,
    UNAVAILABILITY_TYPES,
    UnavailabilityType,
} from '../models/property.model';
import { Pagination } from '../models/request.model';
import { DEFAULT_PAGE_SIZE, MAX_PAGE_SIZE } from '../utils/constants';
import {
    readBoolean,
    readDate,
    readDay,
    readNumber,
    readOptionalNumber,
    readOptionalString,
    readString,
} from './row.helper';

export const calculateAverageRating = (
    reviews: Array<{ rating: number }>,
): number => {
    if (!reviews.length) return 0;
    const sum = reviews.reduce((acc, review) => acc + review.rating, 0);
    return Number((sum / reviews.length).toFixed(1));
};

export const parseNumericParam = (
    value: unknown,
    ignoreZero = false,
): number | undefined => {
    if (typeof value !== 'string' && typeof value !== 'number') return undefined;

    const parsed = typeof value === 'number' ? Math.trunc(value) : parseInt(value, 10);

    if (isNaN(parsed) || (ignoreZero && parsed === 0)) {
        return undefined;
    }

    return parsed;
};

export const parsePagination = (query: { page?: unknown; limit?: unknown }): Pagination => {
    const page = Math.max(parseNumericParam(query.page, true) ?? 1, 1);
    const requested = parseNumericParam(query.limit, true) ?? DEFAULT_PAGE_SIZE;
    const limit = Math.min(Math.max(requested, 1), MAX_PAGE_SIZE);
    return { page, limit, offset: (page - 1) * limit };
};

export type AvailabilityPeriod = {
    start_date: string;
    end_date: string;
};

// Half-open stays: a check-out on the day another stay starts is no overlap
export const periodsOverlap = (
    period: AvailabilityPeriod,
    checkIn: string,
    checkOut: string,
): boolean => period.start_date < checkOut && period.end_date > checkIn;

export const toPropertyType = (value: unknown): PropertyType =>
    PROPERTY_TYPES.find((type) => type === value) ?? 'other';

export const toCancellationPolicy = (value: unknown): CancellationPolicy =>
    CANCELLATION_POLICIES.find((policy) => policy === value) ?? 'moderate';

const toUnavailabilityType = (value: unknown): UnavailabilityType =>
    UNAVAILABILITY_TYPES.find((type) => type === value) ?? 'blocked';

export const toProperty = (row: Row): IProperty => ({
    id: readString(row, 'id'),
    owner_id: readString(row, 'owner_id'),
    title: readString(row, 'title'),
    description: readOptionalString(row, 'description') ?? '',
    property_type: toPropertyType(row.property_type),
    capacity: readNumber(row, 'capacity', 1),
    bedrooms: readNumber(row, 'bedrooms'),
    bathrooms: readNumber(row, 'bathrooms'),
    city_id: readNumber(row, 'city_id'),
    neighborhood_id: readNumber(row, 'neighborhood_id'),
    address: readOptionalString(row, 'address') ?? '',
    latitude: readOptionalNumber(row, 'latitude'),
    longitude: readOptionalNumber(row, 'longitude'),
    price_per_night: readNumber(row, 'price_per_night'),
    price_per_week: readOptionalNumber(row, 'price_per_week'),
    price_per_month: readOptionalNumber(row, 'price_per_month'),
    cleaning_fee: readNumber(row, 'cleaning_fee'),
    security_deposit: readNumber(row, 'security_deposit'),
    cancellation_policy: toCancellationPolicy(row.cancellation_policy),
    is_published: readBoolean(row, 'is_published'),
    avg_rating: readNumber(row, 'avg_rating'),
    rating_count: readNumber(row, 'rating_count'),
    created_at: readDate(row, 'created_at'),
    updated_at: readDate(row, 'updated_at'),
});

export const toPropertyImage = (row: Row): IPropertyImage => ({
    id: readNumber(row, 'id'),
    property_id: readString(row, 'property_id'),
    url: readString(row, 'url'),
    is_main: readBoolean(row, 'is_main'),
    display_order: readNumber(row, 'display_order'),
    caption: readOptionalString(row, 'caption') ?? '',
});

export const toUnavailability = (row: Row): IUnavailability => ({
    id: readNumber(row, 'id'),
    property_id: readString(row, 'property_id'),
    start_date: readDay(row, 'start_date'),
    end_date: readDay(row, 'end_date'),
    booking_type: toUnavailabilityType(row.booking_type),
    booking_id: readOptionalString(row, 'booking_id'),
    external_client_name: readOptionalString(row, 'external_client_name') ?? '',
    notes: readOptionalString(row, 'notes') ?? '',
});

export const toAvailabilityConflict = (row: Row): AvailabilityConflict => ({
    source: row.source === 'booking' ? 'booking' : 'unavailability',
    start_date: readDay(row, 'start_date'),
    end_date: readDay(row, 'end_date'),
    booking_type: toUnavailabilityType(row.booking_type),
    booking_id: readOptionalString(row, 'booking_id'),
});

export const toLongStayDiscount = (row: Row): ILongStayDiscount => ({
    min_days: readNumber(row, 'min_days'),
    discount_percentage: readNumber(row, 'discount_percentage'),
});

export const toAmenity = (row: Row): IAmenity => ({
    id: readNumber(row, 'id'),
    name: readString(row, 'name'),
    icon: readOptionalString(row, 'icon') ?? '',
    category: readOptionalString(row, 'category') ?? '',
});

export const toListItem = (row: Row): IPropertyListItem => ({
    id: readString(row, 'id'),
    title: readString(row, 'title'),
    property_type: toPropertyType(row.property_type),
    city: readOptionalString(row, 'city') ?? '',
    neighborhood: readOptionalString(row, 'neighborhood') ?? '',
    price_per_night: readNumber(row, 'price_per_night'),
    capacity: readNumber(row, 'capacity', 1),
    avg_rating: readNumber(row, 'avg_rating'),
    rating_count: readNumber(row, 'rating_count'),
    main_image: readOptionalString(row, 'main_image'),
});
