import { format } from 'date-fns';
import { Client, DatabaseClient, Queryable } from '../database';
import {
    BookingRole,
    getBookingRole,
    toBooking,
    toBookingWithProperty,
} from '../helpers/booking.helper';
import { formatFcfa } from '../helpers/invoice.helper';
import { PriceBreakdown, calculateBookingPrice, nightsBetween } from '../helpers/pricing.helper';
import { toProperty } from '../helpers/property.helper';
import { IBooking, IBookingCreateInput, IBookingWithProperty } from '../models/booking.model';
import { NotificationInput } from '../models/notification.model';
import { IProperty } from '../models/property.model';
import { AuthenticatedUser } from '../models/request.model';
import { badRequest, conflict, forbidden, notFound } from '../utils/errors';
import Logger from '../utils/logger';
import { isPositiveInteger, isValidDate } from '../utils/validations';
import ConfigService from './config.service';
import { EmailService } from './email.service';
import InvoiceService from './invoice.service';
import NotificationService from './notification.service';
import PromoCodeService from './promo-code.service';
import PropertyService from './property.service';

export type BookingServiceDeps = {
    propertyService?: PropertyService;
    promoCodeService?: PromoCodeService;
    configService?: ConfigService;
    notificationService?: NotificationService;
    emailService?: EmailService;
    invoiceService?: InvoiceService;
};

export type StayRequest = {
    check_in_date: string;
    check_out_date: string;
    guests_count: number;
};

export type BookingQuote = PriceBreakdown & {
    property_id: string;
    check_in_date: string;
    check_out_date: string;
    guests_count: number;
    promo_code: string | null;
    promo_percentage: number;
    currency: 'XAF';
};

export type BookingView = {
    booking: IBookingWithProperty;
    role: BookingRole;
};

export const today = (): string => format(new Date(), 'yyyy-MM-dd');

/**
 * Dates are `yyyy-MM-dd`, check-out after check-in, check-in not in the
 * past. Returns the number of nights.
 */
export const validateStay = (stay: StayRequest, currentDay: string = today()): number => {
    if (!isValidDate(stay.check_in_date) || !isValidDate(stay.check_out_date)) {
        throw badRequest('invalid_dates', 'Dates must use the yyyy-MM-dd format');
    }
    const nights = nightsBetween(stay.check_in_date, stay.check_out_date);
    if (nights <= 0) {
        throw badRequest('invalid_dates', 'check_out_date must be after check_in_date');
    }
    if (stay.check_in_date < currentDay) {
        throw badRequest('invalid_dates', 'check_in_date cannot be in the past');
    }
    if (!isPositiveInteger(stay.guests_count)) {
        throw badRequest('invalid_guests', 'guests_count must be a positive integer');
    }
    return nights;
};

const BOOKING_SELECT = `
    SELECT b.*, p.title AS property_title, p.owner_id, p.cancellation_policy
    FROM bookings b
    JOIN properties p ON p.id = b.property_id`;

class BookingService {
    private client: DatabaseClient;
    private propertyService: PropertyService;
    private promoCodeService: PromoCodeService;
    private configService: ConfigService;
    private notificationService: NotificationService;
    private emailService: EmailService;
    private invoiceService: InvoiceService;
    private context: string;

    constructor(client: DatabaseClient = new Client(), deps: BookingServiceDeps = {}) {
        this.context = 'BookingService';
        this.client = client;
        this.propertyService = deps.propertyService ?? new PropertyService(client);
        this.configService = deps.configService ?? new ConfigService(client);
        this.promoCodeService =
            deps.promoCodeService ??
            new PromoCodeService(client, this.propertyService, this.configService);
        this.notificationService = deps.notificationService ?? new NotificationService(client);
        this.emailService = deps.emailService ?? new EmailService();
        this.invoiceService = deps.invoiceService ?? new InvoiceService(client);
        Logger.info('Initializing', this.context + ' - constructor');
    }

    private async priceStay(
        property: IProperty,
        nights: number,
        promoPercentage: number,
    ): Promise<PriceBreakdown> {
        const [longStayDiscounts, tenantFeeRate] = await Promise.all([
            this.propertyService.getLongStayDiscounts(property.id),
            this.configService.getNumber('TENANT_SERVICE_FEE_RATE'),
        ]);
        return calculateBookingPrice({
            rates: property,
            cleaningFee: property.cleaning_fee,
            securityDeposit: property.security_deposit,
            nights,
            longStayDiscounts,
            promoPercentage,
            tenantFeeRate,
        });
    }

    private assertBookable(property: IProperty, tenantId: string, guests: number) {
        if (!property.is_published) {
            throw badRequest('property_unavailable', 'This property is not open for booking');
        }
        if (property.owner_id === tenantId) {
            throw badRequest('own_property', 'You cannot book your own property');
        }
        if (guests > property.capacity) {
            throw badRequest(
                'too_many_guests',
                `This property accepts at most ${property.capacity} guests`,
            );
        }
    }

    private async notifySafely(input: NotificationInput): Promise<void> {
        try {
            await this.notificationService.notify(input);
        } catch (error) {
            Logger.error('Could not send notification', this.context + ' - notifySafely', error);
        }
    }

    public async quote(
        propertyId: string,
        stay: StayRequest,
        tenantId: string,
        promoCode?: string,
    ): Promise<BookingQuote> {
        const methodContext = this.context + ' - quote';
        Logger.info('Starting', methodContext, { propertyId, stay, promoCode });

        const nights = validateStay(stay);
        const property = await this.propertyService.getPropertyOrThrow(propertyId);
        this.assertBookable(property, tenantId, stay.guests_count);

        const promo = promoCode
            ? await this.promoCodeService.resolveForBooking(promoCode, propertyId, tenantId)
            : null;
        const promoPercentage = promo?.discount_percentage ?? 0;
        const price = await this.priceStay(property, nights, promoPercentage);

        return {
            ...price,
            property_id: propertyId,
            check_in_date: stay.check_in_date,
            check_out_date: stay.check_out_date,
            guests_count: stay.guests_count,
            promo_code: promo?.code ?? null,
            promo_percentage: promoPercentage,
            currency: 'XAF',
        };
    }

    public async createBooking(
        tenant: AuthenticatedUser,
        input: IBookingCreateInput,
    ): Promise<IBooking> {
        const methodContext = this.context + ' - createBooking';
        Logger.info('Starting', methodContext, {
            tenantId: tenant.userId,
            propertyId: input.property_id,
        });

        const nights = validateStay(input);

        const booking = await this.client.transaction(async (tx) => {
            // Row lock serialises concurrent bookings of the same property
            const locked = await tx.query('SELECT * FROM properties WHERE id = $1 FOR UPDATE', [
                input.property_id,
            ]);
            const propertyRow = locked.rows[0];
            if (!propertyRow) {
                throw notFound('property_not_found', 'Property not found');
            }
            const property = toProperty(propertyRow);
            this.assertBookable(property, tenant.userId, input.guests_count);

            const conflicts = await this.propertyService.findConflicts(
                property.id,
                input.check_in_date,
                input.check_out_date,
                tx,
            );
            if (conflicts.length > 0) {
                throw conflict('dates_unavailable', 'The property is not available for these dates');
            }

            const promo = input.promo_code
                ? await this.promoCodeService.resolveForBooking(
                      input.promo_code,
                      property.id,
                      tenant.userId,
                      tx,
                  )
                : null;

            const price = await this.priceStay(property, nights, promo?.discount_percentage ?? 0);

            const inserted = await tx.query(
                `INSERT INTO bookings (
                    property_id, tenant_id, check_in_date, check_out_date, guests_count,
                    base_price, cleaning_fee, security_deposit, long_stay_discount,
                    promo_code_id, discount_amount, service_fee, total_price,
                    status, payment_status, special_requests
                ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, 'pending', 'pending', $14)
                RETURNING *`,
                [
                    property.id,
                    tenant.userId,
                    input.check_in_date,
                    input.check_out_date,
                    input.guests_count,
                    price.basePrice,
                    price.cleaningFee,
                    price.securityDeposit,
                    price.longStayDiscount,
                    promo?.id ?? null,
                    price.discountAmount,
                    price.serviceFee,
                    price.totalPrice,
                    input.special_requests ?? '',
                ],
            );

            if (promo) {
                await this.promoCodeService.setActive(promo.id, false, tx);
            }

            return { created: toBooking(inserted.rows[0]), property };
        });

        Logger.info('Booking created successfully', methodContext, {
            id: booking.created.id,
            total: booking.created.total_price,
        });

        await this.notifySafely({
            recipientId: booking.property.owner_id,
            type: 'booking',
            title: 'Nouvelle réservation',
            content: `Nouvelle demande pour « ${booking.property.title} » du ${booking.created.check_in_date} au ${booking.created.check_out_date}.`,
            relatedObjectId: booking.created.id,
            relatedObjectType: 'booking',
        });

        return booking.created;
    }

    public async listBookings(
        user: AuthenticatedUser,
        role?: 'tenant' | 'owner',
    ): Promise<IBookingWithProperty[]> {
        const methodContext = this.context + ' - listBookings';
        const view = role ?? (user.userType === 'owner' ? 'owner' : 'tenant');
        Logger.info('Starting', methodContext, { userId: user.userId, view });

        const column = view === 'owner' ? 'p.owner_id' : 'b.tenant_id';
        const result = await this.client.query(
            `${BOOKING_SELECT}
             WHERE ${column} = $1
             ORDER BY b.created_at DESC`,
            [user.userId],
        );
        return result.rows.map(toBookingWithProperty);
    }

    public async findBookingById(
        id: string,
        tx: Queryable = this.client,
        lock = false,
    ): Promise<IBookingWithProperty | null> {
        const result = await tx.query(
            `${BOOKING_SELECT} WHERE b.id = $1${lock ? ' FOR UPDATE OF b' : ''}`,
            [id],
        );
        const row = result.rows[0];
        return row ? toBookingWithProperty(row) : null;
    }

    public async getBookingForUser(
        id: string,
        user: AuthenticatedUser,
        tx: Queryable = this.client,
        lock = false,
    ): Promise<BookingView> {
        const booking = await this.findBookingById(id, tx, lock);
        if (!booking) {
            throw notFound('booking_not_found', 'Booking not found');
        }
        const role = getBookingRole(booking, user);
        if (!role) {
            throw forbidden('not_booking_party', 'You cannot access this booking');
        }
        return { booking, role };
    }

    public async confirmBooking(id: string, user: AuthenticatedUser): Promise<IBooking> {
        const methodContext = this.context + ' - confirmBooking';
        Logger.info('Starting', methodContext, { id, userId: user.userId });

        const confirmed = await this.client.transaction(async (tx) => {
            const { booking, role } = await this.getBookingForUser(id, user, tx, true);
            if (role === 'tenant') {
                throw forbidden('owner_only', 'Only the owner can confirm a booking');
            }
            if (booking.status !== 'pending') {
                throw conflict('invalid_status', `A ${booking.status} booking cannot be confirmed`);
            }
            if (booking.payment_status !== 'paid') {
                throw badRequest('payment_required', 'The booking must be paid before confirmation');
            }

            const overlapping = await this.propertyService.findConflicts(
                booking.property_id,
                booking.check_in_date,
                booking.check_out_date,
                tx,
            );
            if (overlapping.some((entry) => entry.booking_id !== booking.id)) {
                throw conflict('dates_unavailable', 'The dates are no longer available');
            }

            const updated = await tx.query(
                `UPDATE bookings SET status = 'confirmed', updated_at = CURRENT_TIMESTAMP
                 WHERE id = $1 RETURNING *`,
                [id],
            );
            await tx.query(
                `INSERT INTO unavailabilities (property_id, start_date, end_date, booking_type, booking_id)
                 VALUES ($1, $2, $3, 'booking', $4)`,
                [booking.property_id, booking.check_in_date, booking.check_out_date, booking.id],
            );
            return { booking: toBooking(updated.rows[0]), title: booking.property_title };
        });

        Logger.info('Booking confirmed', methodContext, { id });

        await this.notifySafely({
            recipientId: confirmed.booking.tenant_id,
            type: 'booking',
            title: 'Réservation confirmée',
            content: `Votre séjour à « ${confirmed.title} » du ${confirmed.booking.check_in_date} au ${confirmed.booking.check_out_date} est confirmé.`,
            relatedObjectId: id,
            relatedObjectType: 'booking',
        });
        await this.sendConfirmationEmail(id);

        return confirmed.booking;
    }

    private async sendConfirmationEmail(bookingId: string): Promise<void> {
        const methodContext = this.context + ' - sendConfirmationEmail';
        try {
            const { invoice, html } = await this.invoiceService.renderForBooking(bookingId);
            if (!invoice.tenant.email) return;
            await this.emailService.sendEmail({
                to: invoice.tenant.email,
                subject: `Réservation confirmée - ${invoice.property.title}`,
                html,
                text: `Votre réservation ${invoice.number} est confirmée. Total : ${formatFcfa(invoice.total)}.`,
            });
        } catch (error) {
            Logger.error('Could not send confirmation email', methodContext, error);
        }
    }

    public async completeBooking(id: string, user: AuthenticatedUser): Promise<IBooking> {
        const methodContext = this.context + ' - completeBooking';
        Logger.info('Starting', methodContext, { id });

        const { booking, role } = await this.getBookingForUser(id, user);
        if (role === 'tenant') {
            throw forbidden('owner_only', 'Only the owner can complete a booking');
        }
        if (booking.status !== 'confirmed') {
            throw conflict('invalid_status', `A ${booking.status} booking cannot be completed`);
        }
        if (today() < booking.check_out_date) {
            throw badRequest('stay_not_finished', 'The stay has not ended yet');
        }

        const result = await this.client.query(
            `UPDATE bookings SET status = 'completed', updated_at = CURRENT_TIMESTAMP
             WHERE id = $1 RETURNING *`,
            [id],
        );
        const completed = toBooking(result.rows[0]);

        await this.notifySafely({
            recipientId: completed.tenant_id,
            type: 'review',
            title: 'Comment s’est passé votre séjour ?',
            content: `Laissez un avis sur « ${booking.property_title} ».`,
            relatedObjectId: booking.property_id,
            relatedObjectType: 'property',
        });
        return completed;
    }
}

export default BookingService;
