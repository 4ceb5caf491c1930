import { Request, Response } from 'express';
import { getAuthUser } from '../helpers/auth.helper';
import { UploadableFile } from '../helpers/minio.helper';
import { parsePagination } from '../helpers/property.helper';
import {
    Body,
    getBody,
    pickOption,
    readIntParam,
    readNullableNumber,
    readNumber,
    readNumberArray,
    readObjectArray,
    readParam,
    readQueryString,
    readString,
} from '../helpers/request.helper';
import { respondWithError } from '../middleware/error.middleware';
import {
    CANCELLATION_POLICIES,
    ILongStayDiscount,
    IPropertyInput,
    IPropertyUpdateInput,
    PROPERTY_TYPES,
} from '../models/property.model';
import BookingService from '../services/booking.service';
import PropertyService from '../services/property.service';
import { badRequest } from '../utils/errors';
import Logger from '../utils/logger';
import { isValidDate } from '../utils/validations';

const TEXT_FIELDS = ['title', 'description', 'address'] as const;
const COUNT_FIELDS = [
    'capacity',
    'bedrooms',
    'bathrooms',
    'city_id',
    'neighborhood_id',
    'price_per_night',
    'cleaning_fee',
    'security_deposit',
] as const;
const NULLABLE_FIELDS = ['latitude', 'longitude', 'price_per_week', 'price_per_month'] as const;

export const readPropertyUpdate = (body: Body): IPropertyUpdateInput => {
    const input: IPropertyUpdateInput = {};
    for (const field of TEXT_FIELDS) {
        const value = readString(body, field);
        if (value !== undefined) input[field] = value.trim();
    }
    for (const field of COUNT_FIELDS) {
        const value = readNumber(body, field);
        if (value !== undefined) input[field] = value;
    }
    for (const field of NULLABLE_FIELDS) {
        const value = readNullableNumber(body, field);
        if (value !== undefined) input[field] = value;
    }
    if (body.property_type !== undefined) {
        const type = pickOption(body.property_type, PROPERTY_TYPES);
        if (!type) throw badRequest('invalid_property_type', 'Unknown property type');
        input.property_type = type;
    }
    if (body.cancellation_policy !== undefined) {
        const policy = pickOption(body.cancellation_policy, CANCELLATION_POLICIES);
        if (!policy) throw badRequest('invalid_cancellation_policy', 'Unknown cancellation policy');
        input.cancellation_policy = policy;
    }
    const amenities = readNumberArray(body, 'amenity_ids');
    if (amenities) input.amenity_ids = amenities;
    return input;
};

const REQUIRED_FIELDS = [
    'title',
    'property_type',
    'capacity',
    'city_id',
    'neighborhood_id',
    'address',
    'price_per_night',
] as const;

export const readPropertyInput = (body: Body): IPropertyInput => {
    const input = readPropertyUpdate(body);
    const { title, property_type, capacity, city_id, neighborhood_id, address, price_per_night } =
        input;
    if (
        !title ||
        !property_type ||
        capacity === undefined ||
        city_id === undefined ||
        neighborhood_id === undefined ||
        !address ||
        price_per_night === undefined
    ) {
        const missing = REQUIRED_FIELDS.filter((field) => !input[field] && input[field] !== 0);
        throw badRequest('missing_fields', `Missing required fields: ${missing.join(', ')}`);
    }
    return {
        title,
        description: input.description ?? '',
        property_type,
        capacity,
        bedrooms: input.bedrooms ?? 0,
        bathrooms: input.bathrooms ?? 0,
        city_id,
        neighborhood_id,
        address,
        latitude: input.latitude ?? null,
        longitude: input.longitude ?? null,
        price_per_night,
        price_per_week: input.price_per_week ?? null,
        price_per_month: input.price_per_month ?? null,
        cleaning_fee: input.cleaning_fee ?? 0,
        security_deposit: input.security_deposit ?? 0,
        cancellation_policy: input.cancellation_policy ?? 'moderate',
        amenity_ids: input.amenity_ids ?? [],
    };
};

const readUploadedFiles = (req: Request): UploadableFile[] => {
    const files = req.files;
    if (!files) return [];
    return Array.isArray(files) ? files : Object.values(files).flat();
};

class PropertyController {
    private service: PropertyService;
    private bookingService: BookingService;
    private context: string;

    constructor(
        service: PropertyService = new PropertyService(),
        bookingService: BookingService = new BookingService(),
    ) {
        this.context = 'PropertyController';
        this.service = service;
        this.bookingService = bookingService;
        Logger.info('Initializing', this.context + ' - constructor');
    }

    public getCities = async (_req: Request, res: Response) => {
        const methodContext = this.context + ' - getCities';
        try {
            res.status(200).json({ success: true, data: await this.service.getCities() });
        } catch (error) {
            respondWithError(res, error, methodContext);
        }
    };

    public getNeighborhoods = async (req: Request, res: Response) => {
        const methodContext = this.context + ' - getNeighborhoods';
        try {
            const cityId = readIntParam(req, 'id');
            res.status(200).json({ success: true, data: await this.service.getNeighborhoods(cityId) });
        } catch (error) {
            respondWithError(res, error, methodContext);
        }
    };

    public getAmenities = async (_req: Request, res: Response) => {
        const methodContext = this.context + ' - getAmenities';
        try {
            res.status(200).json({ success: true, data: await this.service.getAmenities() });
        } catch (error) {
            respondWithError(res, error, methodContext);
        }
    };

    public getProperties = async (req: Request, res: Response) => {
        const methodContext = this.context + ' - getProperties';
        try {
            const pagination = parsePagination(req.query);
            Logger.info('Fetching published properties', methodContext, pagination);
            const page = await this.service.getPublishedProperties(pagination);
            res.status(200).json({ success: true, data: page });
        } catch (error) {
            respondWithError(res, error, methodContext);
        }
    };

    public getOwnerProperties = async (req: Request, res: Response) => {
        const methodContext = this.context + ' - getOwnerProperties';
        try {
            const { userId } = getAuthUser(req);
            res.status(200).json({
                success: true,
                data: await this.service.getOwnerProperties(userId),
            });
        } catch (error) {
            respondWithError(res, error, methodContext);
        }
    };

    public getPropertyDetails = async (req: Request, res: Response) => {
        const methodContext = this.context + ' - getPropertyDetails';
        try {
            const detail = await this.service.getPropertyDetail(readParam(req, 'id'), getAuthUser(req));
            res.status(200).json({ success: true, data: detail });
        } catch (error) {
            respondWithError(res, error, methodContext);
        }
    };

    public create = async (req: Request, res: Response) => {
        const methodContext = this.context + ' - create';
        try {
            const user = getAuthUser(req);
            const input = readPropertyInput(getBody(req));
            const property = await this.service.createProperty(user.userId, input);

            const files = readUploadedFiles(req);
            const images = files.length ? await this.service.addImages(property.id, user, files) : [];

            Logger.info('Property created', methodContext, { id: property.id, images: images.length });
            res.status(201).json({ success: true, data: { ...property, images } });
        } catch (error) {
            respondWithError(res, error, methodContext);
        }
    };

    public update = async (req: Request, res: Response) => {
        const methodContext = this.context + ' - update';
        try {
            const property = await this.service.updateProperty(
                readParam(req, 'id'),
                getAuthUser(req),
                readPropertyUpdate(getBody(req)),
            );
            res.status(200).json({ success: true, data: property });
        } catch (error) {
            respondWithError(res, error, methodContext);
        }
    };

    public deleteProperty = async (req: Request, res: Response) => {
        const methodContext = this.context + ' - deleteProperty';
        try {
            await this.service.deleteProperty(readParam(req, 'id'), getAuthUser(req));
            res.status(200).json({ success: true, data: { message: 'Property deleted' } });
        } catch (error) {
            respondWithError(res, error, methodContext);
        }
    };

    public addImages = async (req: Request, res: Response) => {
        const methodContext = this.context + ' - addImages';
        try {
            const files = readUploadedFiles(req);
            if (!files.length) {
                throw badRequest('missing_file', 'At least one image is required');
            }
            const images = await this.service.addImages(readParam(req, 'id'), getAuthUser(req), files);
            res.status(201).json({ success: true, data: images });
        } catch (error) {
            respondWithError(res, error, methodContext);
        }
    };

    public setMainImage = async (req: Request, res: Response) => {
        const methodContext = this.context + ' - setMainImage';
        try {
            await this.service.setMainImage(
                readParam(req, 'id'),
                readIntParam(req, 'imageId'),
                getAuthUser(req),
            );
            res.status(200).json({ success: true, data: { message: 'Main image updated' } });
        } catch (error) {
            respondWithError(res, error, methodContext);
        }
    };

    public deleteImage = async (req: Request, res: Response) => {
        const methodContext = this.context + ' - deleteImage';
        try {
            await this.service.deleteImage(
                readParam(req, 'id'),
                readIntParam(req, 'imageId'),
                getAuthUser(req),
            );
            res.status(200).json({ success: true, data: { message: 'Image deleted' } });
        } catch (error) {
            respondWithError(res, error, methodContext);
        }
    };

    public publish = async (req: Request, res: Response) => {
        const methodContext = this.context + ' - publish';
        try {
            const property = await this.service.setPublished(readParam(req, 'id'), getAuthUser(req), true);
            res.status(200).json({ success: true, data: property });
        } catch (error) {
            respondWithError(res, error, methodContext);
        }
    };

    public unpublish = async (req: Request, res: Response) => {
        const methodContext = this.context + ' - unpublish';
        try {
            const property = await this.service.setPublished(readParam(req, 'id'), getAuthUser(req), false);
            res.status(200).json({ success: true, data: property });
        } catch (error) {
            respondWithError(res, error, methodContext);
        }
    };

    public checkAvailability = async (req: Request, res: Response) => {
        const methodContext = this.context + ' - checkAvailability';
        try {
            const checkIn = readQueryString(req, 'check_in');
            const checkOut = readQueryString(req, 'check_out');
            if (!isValidDate(checkIn) || !isValidDate(checkOut) || checkOut <= checkIn) {
                throw badRequest('invalid_dates', 'check_in and check_out must be valid yyyy-MM-dd dates');
            }
            const result = await this.service.checkAvailability(readParam(req, 'id'), checkIn, checkOut);
            res.status(200).json({ success: true, data: result });
        } catch (error) {
            respondWithError(res, error, methodContext);
        }
    };

    public getUnavailabilities = async (req: Request, res: Response) => {
        const methodContext = this.context + ' - getUnavailabilities';
        try {
            const entries = await this.service.getUnavailabilities(readParam(req, 'id'));
            res.status(200).json({ success: true, data: entries });
        } catch (error) {
            respondWithError(res, error, methodContext);
        }
    };

    public addUnavailability = async (req: Request, res: Response) => {
        const methodContext = this.context + ' - addUnavailability';
        try {
            const body = getBody(req);
            const bookingType = pickOption(body.booking_type, ['external', 'blocked'] as const);
            if (!bookingType) {
                throw badRequest('invalid_booking_type', 'booking_type must be external or blocked');
            }
            const entry = await this.service.addUnavailability(readParam(req, 'id'), getAuthUser(req), {
                start_date: readString(body, 'start_date') ?? '',
                end_date: readString(body, 'end_date') ?? '',
                booking_type: bookingType,
                external_client_name: readString(body, 'external_client_name'),
                external_client_phone: readString(body, 'external_client_phone'),
                notes: readString(body, 'notes'),
            });
            res.status(201).json({ success: true, data: entry });
        } catch (error) {
            respondWithError(res, error, methodContext);
        }
    };

    public removeUnavailability = async (req: Request, res: Response) => {
        const methodContext = this.context + ' - removeUnavailability';
        try {
            await this.service.removeUnavailability(
                readParam(req, 'id'),
                readIntParam(req, 'entryId'),
                getAuthUser(req),
            );
            res.status(200).json({ success: true, data: { message: 'Period removed' } });
        } catch (error) {
            respondWithError(res, error, methodContext);
        }
    };

    public replaceDiscounts = async (req: Request, res: Response) => {
        const methodContext = this.context + ' - replaceDiscounts';
        try {
            const discounts: ILongStayDiscount[] = readObjectArray(getBody(req), 'discounts').map(
                (item) => ({
                    min_days: readNumber(item, 'min_days') ?? 0,
                    discount_percentage: readNumber(item, 'discount_percentage') ?? 0,
                }),
            );
            const saved = await this.service.replaceDiscounts(readParam(req, 'id'), getAuthUser(req), discounts);
            res.status(200).json({ success: true, data: saved });
        } catch (error) {
            respondWithError(res, error, methodContext);
        }
    };

    public getQuote = async (req: Request, res: Response) => {
        const methodContext = this.context + ' - getQuote';
        try {
            const user = getAuthUser(req);
            const quote = await this.bookingService.quote(
                readParam(req, 'id'),
                {
                    check_in_date: readQueryString(req, 'check_in') ?? '',
                    check_out_date: readQueryString(req, 'check_out') ?? '',
                    guests_count: readNumber(req.query, 'guests') ?? 1,
                },
                user.userId,
                readQueryString(req, 'promo_code'),
            );
            res.status(200).json({ success: true, data: quote });
        } catch (error) {
            respondWithError(res, error, methodContext);
        }
    };
}

export default PropertyController;
