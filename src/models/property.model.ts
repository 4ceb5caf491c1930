export const PROPERTY_TYPES = [
    'apartment',
    'house',
    'villa',
    'studio',
    'room',
    'other',
] as const;

export type PropertyType = (typeof PROPERTY_TYPES)[number];

export const CANCELLATION_POLICIES = ['flexible', 'moderate', 'strict'] as const;

export type CancellationPolicy = (typeof CANCELLATION_POLICIES)[number];

export const UNAVAILABILITY_TYPES = ['booking', 'external', 'blocked'] as const;

export type UnavailabilityType = (typeof UNAVAILABILITY_TYPES)[number];

export type ICity = {
    id: number;
    name: string;
};

export type INeighborhood = {
    id: number;
    city_id: number;
    name: string;
};

export type IAmenity = {
    id: number;
    name: string;
    icon: string;
    category: string;
};

export type PriceRates = {
    price_per_night: number;
    price_per_week: number | null;
    price_per_month: number | null;
};

export type IProperty = PriceRates & {
    id: string;
    owner_id: string;
    title: string;
    description: string;
    property_type: PropertyType;
    capacity: number;
    bedrooms: number;
    bathrooms: number;
    city_id: number;
    neighborhood_id: number;
    address: string;
    latitude: number | null;
    longitude: number | null;
    cleaning_fee: number;
    security_deposit: number;
    cancellation_policy: CancellationPolicy;
    is_published: boolean;
    avg_rating: number;
    rating_count: number;
    created_at: Date;
    updated_at: Date;
};

export type IPropertyImage = {
    id: number;
    property_id: string;
    url: string;
    is_main: boolean;
    display_order: number;
    caption: string;
};

export type IUnavailability = {
    id: number;
    property_id: string;
    start_date: string;
    end_date: string;
    booking_type: UnavailabilityType;
    booking_id: string | null;
    external_client_name: string;
    notes: string;
};

export type ILongStayDiscount = {
    min_days: number;
    discount_percentage: number;
};

export type IPropertyListItem = {
    id: string;
    title: string;
    property_type: PropertyType;
    city: string;
    neighborhood: string;
    price_per_night: number;
    capacity: number;
    avg_rating: number;
    rating_count: number;
    main_image: string | null;
};

export type IPropertyDetail = IProperty & {
    city: string;
    neighborhood: string;
    images: IPropertyImage[];
    amenities: IAmenity[];
    long_stay_discounts: ILongStayDiscount[];
    owner: {
        id: string;
        first_name: string;
        last_name: string;
        avatar_url: string | null;
    };
};

export type IPropertyInput = {
    title: string;
    description: string;
    property_type: PropertyType;
    capacity: number;
    bedrooms: number;
    bathrooms: number;
    city_id: number;
    neighborhood_id: number;
    address: string;
    latitude: number | null;
    longitude: number | null;
    price_per_night: number;
    price_per_week: number | null;
    price_per_month: number | null;
    cleaning_fee: number;
    security_deposit: number;
    cancellation_policy: CancellationPolicy;
    amenity_ids: number[];
};

export type IPropertyUpdateInput = Partial<IPropertyInput>;

export type IUnavailabilityInput = {
    start_date: string;
    end_date: string;
    booking_type: 'external' | 'blocked';
    external_client_name?: string;
    external_client_phone?: string;
    notes?: string;
};

// A calendar entry, or a pending booking whose payment holds the dates
export type AvailabilityConflict = {
    source: 'unavailability' | 'booking';
    start_date: string;
    end_date: string;
    booking_type: UnavailabilityType;
    booking_id: string | null;
};

export type AvailabilityResult = {
    available: boolean;
    conflicts: AvailabilityConflict[];
};
