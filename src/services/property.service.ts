import { Client, DatabaseClient, Queryable, Row } from '../database';
import { UploadableFile, assertImageFile, removeFileFromMinio, uploadFileToMinio } from '../helpers/minio.helper';
import {
    toAmenity,
    toAvailabilityConflict,
    toListItem,
    toLongStayDiscount,
    toProperty,
    toPropertyImage,
    toUnavailability,
} from '../helpers/property.helper';
import { readNumber, readOptionalString, readString } from '../helpers/row.helper';
import { AuthenticatedUser, Pagination } from '../models/request.model';
import {
    AvailabilityConflict,
    AvailabilityResult,
    CANCELLATION_POLICIES,
    IAmenity,
    ICity,
    ILongStayDiscount,
    INeighborhood,
    IProperty,
    IPropertyDetail,
    IPropertyImage,
    IPropertyInput,
    IPropertyListItem,
    IPropertyUpdateInput,
    IUnavailability,
    IUnavailabilityInput,
    PROPERTY_TYPES,
} from '../models/property.model';
import { MAX_PROPERTY_IMAGES } from '../utils/constants';
import { badRequest, conflict, forbidden, notFound } from '../utils/errors';
import Logger from '../utils/logger';
import { isValidDate } from '../utils/validations';

export type PropertyPage = {
    items: IPropertyListItem[];
    total: number;
    page: number;
    limit: number;
};

// Columns a partial update may touch, in a fixed order
const UPDATABLE_COLUMNS = [
    'title',
    'description',
    'property_type',
    'capacity',
    'bedrooms',
    'bathrooms',
    'city_id',
    'neighborhood_id',
    'address',
    'latitude',
    'longitude',
    'price_per_night',
    'price_per_week',
    'price_per_month',
    'cleaning_fee',
    'security_deposit',
    'cancellation_policy',
] as const;

const LIST_SELECT = `
    SELECT p.id, p.title, p.property_type, p.price_per_night, p.capacity,
           p.avg_rating, p.rating_count,
           c.name AS city, n.name AS neighborhood,
           (SELECT url FROM property_images pi
             WHERE pi.property_id = p.id AND pi.is_main = TRUE LIMIT 1) AS main_image
    FROM properties p
    LEFT JOIN cities c ON c.id = p.city_id
    LEFT JOIN neighborhoods n ON n.id = p.neighborhood_id`;

export const canManageProperty = (property: IProperty, user: AuthenticatedUser): boolean =>
    user.userType === 'admin' || property.owner_id === user.userId;

const validatePropertyInput = (input: IPropertyUpdateInput) => {
    if (input.property_type !== undefined && !PROPERTY_TYPES.includes(input.property_type)) {
        throw badRequest('invalid_property_type', 'Unknown property type');
    }
    if (
        input.cancellation_policy !== undefined &&
        !CANCELLATION_POLICIES.includes(input.cancellation_policy)
    ) {
        throw badRequest('invalid_cancellation_policy', 'Unknown cancellation policy');
    }
    if (input.price_per_night !== undefined && !(input.price_per_night > 0)) {
        throw badRequest('invalid_price', 'price_per_night must be greater than 0');
    }
    if (input.capacity !== undefined && !(input.capacity >= 1)) {
        throw badRequest('invalid_capacity', 'capacity must be at least 1');
    }
    for (const fee of [input.cleaning_fee, input.security_deposit, input.price_per_week, input.price_per_month]) {
        if (typeof fee === 'number' && fee < 0) {
            throw badRequest('invalid_price', 'Amounts cannot be negative');
        }
    }
};

class PropertyService {
    private client: DatabaseClient;
    private context: string;

    constructor(client: DatabaseClient = new Client()) {
        this.context = 'PropertyService';
        this.client = client;
        Logger.info('Initializing', this.context + ' - constructor');
    }

    public async getCities(): Promise<ICity[]> {
        const result = await this.client.query('SELECT id, name FROM cities ORDER BY name');
        return result.rows.map((row) => ({
            id: readNumber(row, 'id'),
            name: readString(row, 'name'),
        }));
    }

    public async getNeighborhoods(cityId: number): Promise<INeighborhood[]> {
        const result = await this.client.query(
            'SELECT id, city_id, name FROM neighborhoods WHERE city_id = $1 ORDER BY name',
            [cityId],
        );
        return result.rows.map((row) => ({
            id: readNumber(row, 'id'),
            city_id: readNumber(row, 'city_id'),
            name: readString(row, 'name'),
        }));
    }

    public async getAmenities(): Promise<IAmenity[]> {
        const result = await this.client.query(
            'SELECT id, name, icon, category FROM amenities ORDER BY category, name',
        );
        return result.rows.map(toAmenity);
    }

    public async getPublishedProperties(pagination: Pagination): Promise<PropertyPage> {
        const methodContext = this.context + ' - getPublishedProperties';
        Logger.info('Starting', methodContext, pagination);

        const [items, count] = await Promise.all([
            this.client.query(
                `${LIST_SELECT}
                 WHERE p.is_published = TRUE
                 ORDER BY p.created_at DESC
                 LIMIT $1 OFFSET $2`,
                [pagination.limit, pagination.offset],
            ),
            this.client.query(
                'SELECT COUNT(*) AS total FROM properties WHERE is_published = TRUE',
            ),
        ]);

        return {
            items: items.rows.map(toListItem),
            total: readNumber(count.rows[0] ?? {}, 'total'),
            page: pagination.page,
            limit: pagination.limit,
        };
    }

    public async getOwnerProperties(ownerId: string): Promise<IPropertyListItem[]> {
        const result = await this.client.query(
            `${LIST_SELECT}
             WHERE p.owner_id = $1
             ORDER BY p.created_at DESC`,
            [ownerId],
        );
        return result.rows.map(toListItem);
    }

    public async findPropertyById(id: string): Promise<IProperty | null> {
        const result = await this.client.query('SELECT * FROM properties WHERE id = $1', [id]);
        const row = result.rows[0];
        return row ? toProperty(row) : null;
    }

    public async getPropertyOrThrow(id: string): Promise<IProperty> {
        const property = await this.findPropertyById(id);
        if (!property) {
            throw notFound('property_not_found', 'Property not found');
        }
        return property;
    }

    private async getManagedProperty(id: string, user: AuthenticatedUser): Promise<IProperty> {
        const property = await this.getPropertyOrThrow(id);
        if (!canManageProperty(property, user)) {
            throw forbidden('not_property_owner', 'You do not manage this property');
        }
        return property;
    }

    public async getLongStayDiscounts(propertyId: string): Promise<ILongStayDiscount[]> {
        const result = await this.client.query(
            `SELECT min_days, discount_percentage FROM long_stay_discounts
             WHERE property_id = $1 ORDER BY min_days`,
            [propertyId],
        );
        return result.rows.map(toLongStayDiscount);
    }

    public async getImages(propertyId: string): Promise<IPropertyImage[]> {
        const result = await this.client.query(
            `SELECT * FROM property_images WHERE property_id = $1
             ORDER BY is_main DESC, display_order, id`,
            [propertyId],
        );
        return result.rows.map(toPropertyImage);
    }

    /**
     * Unpublished listings are only visible to their owner and admins.
     */
    public async getPropertyDetail(
        id: string,
        viewer: AuthenticatedUser,
    ): Promise<IPropertyDetail> {
        const methodContext = this.context + ' - getPropertyDetail';
        Logger.info('Starting', methodContext, { id });

        const property = await this.getPropertyOrThrow(id);
        if (!property.is_published && !canManageProperty(property, viewer)) {
            throw notFound('property_not_found', 'Property not found');
        }

        const [place, images, amenities, discounts, owner] = await Promise.all([
            this.client.query(
                `SELECT c.name AS city, n.name AS neighborhood FROM properties p
                 LEFT JOIN cities c ON c.id = p.city_id
                 LEFT JOIN neighborhoods n ON n.id = p.neighborhood_id
                 WHERE p.id = $1`,
                [id],
            ),
            this.getImages(id),
            this.client.query(
                `SELECT a.id, a.name, a.icon, a.category FROM amenities a
                 JOIN property_amenities pa ON pa.amenity_id = a.id
                 WHERE pa.property_id = $1 ORDER BY a.name`,
                [id],
            ),
            this.getLongStayDiscounts(id),
            this.client.query(
                `SELECT u.id, u.first_name, u.last_name, pr.avatar_url FROM users u
                 LEFT JOIN profiles pr ON pr.user_id = u.id
                 WHERE u.id = $1`,
                [property.owner_id],
            ),
        ]);

        const placeRow = place.rows[0] ?? {};
        const ownerRow = owner.rows[0] ?? {};
        return {
            ...property,
            city: readOptionalString(placeRow, 'city') ?? '',
            neighborhood: readOptionalString(placeRow, 'neighborhood') ?? '',
            images,
            amenities: amenities.rows.map(toAmenity),
            long_stay_discounts: discounts,
            owner: {
                id: property.owner_id,
                first_name: readOptionalString(ownerRow, 'first_name') ?? '',
                last_name: readOptionalString(ownerRow, 'last_name') ?? '',
                avatar_url: readOptionalString(ownerRow, 'avatar_url'),
            },
        };
    }

    private async replaceAmenities(tx: Queryable, propertyId: string, amenityIds: number[]) {
        await tx.query('DELETE FROM property_amenities WHERE property_id = $1', [propertyId]);
        for (const amenityId of new Set(amenityIds)) {
            await tx.query(
                'INSERT INTO property_amenities (property_id, amenity_id) VALUES ($1, $2)',
                [propertyId, amenityId],
            );
        }
    }

    public async createProperty(ownerId: string, input: IPropertyInput): Promise<IProperty> {
        const methodContext = this.context + ' - createProperty';
        Logger.info('Starting', methodContext, { ownerId, title: input.title });

        validatePropertyInput(input);

        const property = await this.client.transaction(async (tx) => {
            const inserted = await tx.query(
                `INSERT INTO properties (
                    owner_id, title, description, property_type, capacity, bedrooms,
                    bathrooms, city_id, neighborhood_id, address, latitude, longitude,
                    price_per_night, price_per_week, price_per_month, cleaning_fee,
                    security_deposit, cancellation_policy, is_published
                ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, $15, $16, $17, $18, FALSE)
                RETURNING *`,
                [
                    ownerId,
                    input.title,
                    input.description,
                    input.property_type,
                    input.capacity,
                    input.bedrooms,
                    input.bathrooms,
                    input.city_id,
                    input.neighborhood_id,
                    input.address,
                    input.latitude,
                    input.longitude,
                    input.price_per_night,
                    input.price_per_week,
                    input.price_per_month,
                    input.cleaning_fee,
                    input.security_deposit,
                    input.cancellation_policy,
                ],
            );
            const created = toProperty(inserted.rows[0]);
            await this.replaceAmenities(tx, created.id, input.amenity_ids);
            return created;
        });

        Logger.info('Property created successfully', methodContext, { id: property.id });
        return property;
    }

    public async updateProperty(
        id: string,
        user: AuthenticatedUser,
        input: IPropertyUpdateInput,
    ): Promise<IProperty> {
        const methodContext = this.context + ' - updateProperty';
        Logger.info('Starting', methodContext, { id, fields: Object.keys(input) });

        await this.getManagedProperty(id, user);
        validatePropertyInput(input);

        const assignments: string[] = [];
        const values: unknown[] = [];
        for (const column of UPDATABLE_COLUMNS) {
            const value = input[column];
            if (value !== undefined) {
                values.push(value);
                assignments.push(`${column} = $${values.length}`);
            }
        }

        const updated = await this.client.transaction(async (tx) => {
            let row: Row | undefined;
            if (assignments.length > 0) {
                values.push(id);
                const result = await tx.query(
                    `UPDATE properties
                     SET ${assignments.join(', ')}, updated_at = CURRENT_TIMESTAMP
                     WHERE id = $${values.length}
                     RETURNING *`,
                    values,
                );
                row = result.rows[0];
            }
            if (input.amenity_ids) {
                await this.replaceAmenities(tx, id, input.amenity_ids);
            }
            return row;
        });

        Logger.info('Property updated successfully', methodContext, { id });
        return updated ? toProperty(updated) : this.getPropertyOrThrow(id);
    }

    public async deleteProperty(id: string, user: AuthenticatedUser): Promise<void> {
        const methodContext = this.context + ' - deleteProperty';
        Logger.info('Starting', methodContext, { id });

        await this.getManagedProperty(id, user);

        const active = await this.client.query(
            `SELECT COUNT(*) AS total FROM bookings
             WHERE property_id = $1
               AND status IN ('pending', 'confirmed')
               AND check_out_date >= CURRENT_DATE`,
            [id],
        );
        if (readNumber(active.rows[0] ?? {}, 'total') > 0) {
            throw conflict('active_bookings', 'Property has active bookings');
        }

        const images = await this.getImages(id);
        await this.client.query('DELETE FROM properties WHERE id = $1', [id]);
        for (const image of images) {
            await removeFileFromMinio(image.url);
        }
        Logger.info('Property deleted', methodContext, { id });
    }

    public async addImages(
        id: string,
        user: AuthenticatedUser,
        files: UploadableFile[],
    ): Promise<IPropertyImage[]> {
        const methodContext = this.context + ' - addImages';
        Logger.info('Starting', methodContext, { id, count: files.length });

        await this.getManagedProperty(id, user);
        if (files.length === 0) {
            throw badRequest('no_images', 'No images provided');
        }
        files.forEach(assertImageFile);

        const existing = await this.getImages(id);
        if (existing.length + files.length > MAX_PROPERTY_IMAGES) {
            throw badRequest(
                'too_many_images',
                `A property can have at most ${MAX_PROPERTY_IMAGES} images`,
            );
        }

        let hasMain = existing.some((image) => image.is_main);
        let order = existing.reduce((max, image) => Math.max(max, image.display_order), -1);
        const created: IPropertyImage[] = [];

        for (const file of files) {
            const url = await uploadFileToMinio(file, `properties/${id}`);
            order += 1;
            const result = await this.client.query(
                `INSERT INTO property_images (property_id, url, is_main, display_order)
                 VALUES ($1, $2, $3, $4)
                 RETURNING *`,
                [id, url, !hasMain, order],
            );
            hasMain = true;
            created.push(toPropertyImage(result.rows[0]));
        }

        Logger.info('Images added', methodContext, { id, count: created.length });
        return created;
    }

    public async setMainImage(id: string, imageId: number, user: AuthenticatedUser): Promise<void> {
        const methodContext = this.context + ' - setMainImage';
        Logger.info('Starting', methodContext, { id, imageId });

        await this.getManagedProperty(id, user);
        const images = await this.getImages(id);
        if (!images.some((image) => image.id === imageId)) {
            throw notFound('image_not_found', 'Image not found');
        }

        await this.client.transaction(async (tx) => {
            await tx.query('UPDATE property_images SET is_main = FALSE WHERE property_id = $1', [id]);
            await tx.query('UPDATE property_images SET is_main = TRUE WHERE id = $1', [imageId]);
        });
    }

    // Removing the main image promotes the next one
    public async deleteImage(id: string, imageId: number, user: AuthenticatedUser): Promise<void> {
        const methodContext = this.context + ' - deleteImage';
        Logger.info('Starting', methodContext, { id, imageId });

        await this.getManagedProperty(id, user);
        const images = await this.getImages(id);
        const image = images.find((candidate) => candidate.id === imageId);
        if (!image) {
            throw notFound('image_not_found', 'Image not found');
        }

        const next = images.find((candidate) => candidate.id !== imageId);
        await this.client.transaction(async (tx) => {
            await tx.query('DELETE FROM property_images WHERE id = $1', [imageId]);
            if (image.is_main && next) {
                await tx.query('UPDATE property_images SET is_main = TRUE WHERE id = $1', [next.id]);
            }
        });
        await removeFileFromMinio(image.url);
    }

    public async setPublished(
        id: string,
        user: AuthenticatedUser,
        published: boolean,
    ): Promise<IProperty> {
        const methodContext = this.context + ' - setPublished';
        Logger.info('Starting', methodContext, { id, published });

        await this.getManagedProperty(id, user);
        if (published) {
            const images = await this.getImages(id);
            if (images.length === 0) {
                throw badRequest('images_required', 'Add at least one image before publishing');
            }
        }

        const result = await this.client.query(
            `UPDATE properties SET is_published = $2, updated_at = CURRENT_TIMESTAMP
             WHERE id = $1 RETURNING *`,
            [id, published],
        );
        return toProperty(result.rows[0]);
    }

    /**
     * Calendar entries overlapping the stay, plus pending bookings whose
     * payment is authorized or received. Confirmed bookings already hold
     * a `booking` calendar entry.
     */
    public async findConflicts(
        propertyId: string,
        checkIn: string,
        checkOut: string,
        tx: Queryable = this.client,
    ): Promise<AvailabilityConflict[]> {
        const result = await tx.query(
            `SELECT 'unavailability' AS source, start_date, end_date, booking_type, booking_id
             FROM unavailabilities
             WHERE property_id = $1 AND start_date < $3 AND end_date > $2
             UNION ALL
             SELECT 'booking' AS source, check_in_date, check_out_date, 'booking', id
             FROM bookings
             WHERE property_id = $1
               AND status = 'pending'
               AND payment_status IN ('authorized', 'paid')
               AND check_in_date < $3 AND check_out_date > $2
             ORDER BY start_date`,
            [propertyId, checkIn, checkOut],
        );
        return result.rows.map(toAvailabilityConflict);
    }

    public async checkAvailability(
        propertyId: string,
        checkIn: string,
        checkOut: string,
    ): Promise<AvailabilityResult> {
        const methodContext = this.context + ' - checkAvailability';
        Logger.info('Starting', methodContext, { propertyId, checkIn, checkOut });

        if (!isValidDate(checkIn) || !isValidDate(checkOut) || checkOut <= checkIn) {
            throw badRequest('invalid_dates', 'check_out must be after check_in');
        }
        await this.getPropertyOrThrow(propertyId);

        const conflicts = await this.findConflicts(propertyId, checkIn, checkOut);
        return { available: conflicts.length === 0, conflicts };
    }

    public async getUnavailabilities(propertyId: string): Promise<IUnavailability[]> {
        const result = await this.client.query(
            `SELECT * FROM unavailabilities WHERE property_id = $1 AND end_date >= CURRENT_DATE
             ORDER BY start_date`,
            [propertyId],
        );
        return result.rows.map(toUnavailability);
    }

    public async addUnavailability(
        id: string,
        user: AuthenticatedUser,
        input: IUnavailabilityInput,
    ): Promise<IUnavailability> {
        const methodContext = this.context + ' - addUnavailability';
        Logger.info('Starting', methodContext, { id, input });

        await this.getManagedProperty(id, user);
        if (!isValidDate(input.start_date) || !isValidDate(input.end_date) || input.end_date <= input.start_date) {
            throw badRequest('invalid_dates', 'end_date must be after start_date');
        }
        if (input.booking_type !== 'external' && input.booking_type !== 'blocked') {
            throw badRequest('invalid_booking_type', 'booking_type must be external or blocked');
        }

        const conflicts = await this.findConflicts(id, input.start_date, input.end_date);
        if (conflicts.length > 0) {
            throw conflict('dates_unavailable', 'These dates overlap an existing period');
        }

        const result = await this.client.query(
            `INSERT INTO unavailabilities (
                property_id, start_date, end_date, booking_type,
                external_client_name, external_client_phone, notes
            ) VALUES ($1, $2, $3, $4, $5, $6, $7)
            RETURNING *`,
            [
                id,
                input.start_date,
                input.end_date,
                input.booking_type,
                input.external_client_name ?? '',
                input.external_client_phone ?? '',
                input.notes ?? '',
            ],
        );
        return toUnavailability(result.rows[0]);
    }

    public async removeUnavailability(
        id: string,
        entryId: number,
        user: AuthenticatedUser,
    ): Promise<void> {
        const methodContext = this.context + ' - removeUnavailability';
        Logger.info('Starting', methodContext, { id, entryId });

        await this.getManagedProperty(id, user);
        const result = await this.client.query(
            'SELECT * FROM unavailabilities WHERE id = $1 AND property_id = $2',
            [entryId, id],
        );
        const row = result.rows[0];
        if (!row) {
            throw notFound('unavailability_not_found', 'Period not found');
        }
        if (toUnavailability(row).booking_type === 'booking') {
            throw badRequest(
                'booking_period',
                'Periods held by a booking are released by cancelling the booking',
            );
        }
        await this.client.query('DELETE FROM unavailabilities WHERE id = $1', [entryId]);
    }

    public async replaceDiscounts(
        id: string,
        user: AuthenticatedUser,
        discounts: ILongStayDiscount[],
    ): Promise<ILongStayDiscount[]> {
        const methodContext = this.context + ' - replaceDiscounts';
        Logger.info('Starting', methodContext, { id, count: discounts.length });

        await this.getManagedProperty(id, user);
        const seen = new Set<number>();
        for (const discount of discounts) {
            if (!Number.isInteger(discount.min_days) || discount.min_days < 1) {
                throw badRequest('invalid_discount', 'min_days must be a positive integer');
            }
            if (!(discount.discount_percentage > 0 && discount.discount_percentage <= 100)) {
                throw badRequest('invalid_discount', 'discount_percentage must be in (0, 100]');
            }
            if (seen.has(discount.min_days)) {
                throw badRequest('invalid_discount', 'min_days must be unique');
            }
            seen.add(discount.min_days);
        }

        await this.client.transaction(async (tx) => {
            await tx.query('DELETE FROM long_stay_discounts WHERE property_id = $1', [id]);
            for (const discount of discounts) {
                await tx.query(
                    `INSERT INTO long_stay_discounts (property_id, min_days, discount_percentage)
                     VALUES ($1, $2, $3)`,
                    [id, discount.min_days, discount.discount_percentage],
                );
            }
        });

        return [...discounts].sort((a, b) => a.min_days - b.min_days);
    }

    public async refreshRating(propertyId: string): Promise<void> {
        await this.client.query(
            `UPDATE properties
             SET avg_rating = stats.avg_rating, rating_count = stats.rating_count
             FROM (
                SELECT COALESCE(ROUND(AVG(rating)::numeric, 1), 0) AS avg_rating,
                       COUNT(id) AS rating_count
                FROM reviews WHERE property_id = $1 AND is_public = TRUE
             ) stats
             WHERE properties.id = $1`,
            [propertyId],
        );
    }
}

export default PropertyService;
