import { format } from 'date-fns';
import { Client, DatabaseClient } from '../database';
import { appendNote, toBooking } from '../helpers/booking.helper';
import { calculateRefund } from '../helpers/cancellation.helper';
import { toCancellationPolicy } from '../helpers/property.helper';
import { AuthenticatedUser } from '../models/request.model';
import { conflict } from '../utils/errors';
import Logger from '../utils/logger';
import BookingService from './booking.service';
import ConfigService from './config.service';
import NotificationService from './notification.service';
import PaymentService, { RefundOutcome } from './payment.service';
import PromoCodeService from './promo-code.service';

export type CancellationServiceDeps = {
    bookingService?: BookingService;
    paymentService?: PaymentService;
    promoCodeService?: PromoCodeService;
    configService?: ConfigService;
    notificationService?: NotificationService;
};

export type RefundInfo = {
    amount: number;
    rate: number;
    transaction_id: string;
    status: string;
    gateway_requested: boolean;
};

export type CancellationResult = {
    booking_id: string;
    status: 'cancelled';
    cancelled_at: Date;
    refund_info: RefundInfo | null;
    owner_compensation: number;
    grace_period: {
        applied: boolean;
        minutes: number;
    };
};

const ROLE_LABELS = {
    tenant: 'le locataire',
    owner: 'le propriétaire',
    admin: "l'administration",
} as const;

class CancellationService {
    private client: DatabaseClient;
    private bookingService: BookingService;
    private paymentService: PaymentService;
    private promoCodeService: PromoCodeService;
    private configService: ConfigService;
    private notificationService: NotificationService;
    private context: string;

    constructor(client: DatabaseClient = new Client(), deps: CancellationServiceDeps = {}) {
        this.context = 'CancellationService';
        this.client = client;
        this.configService = deps.configService ?? new ConfigService(client);
        this.notificationService = deps.notificationService ?? new NotificationService(client);
        this.bookingService =
            deps.bookingService ??
            new BookingService(client, {
                configService: this.configService,
                notificationService: this.notificationService,
            });
        this.promoCodeService = deps.promoCodeService ?? new PromoCodeService(client);
        this.paymentService =
            deps.paymentService ??
            new PaymentService(client, {
                bookingService: this.bookingService,
                configService: this.configService,
                notificationService: this.notificationService,
            });
        Logger.info('Initializing', this.context + ' - constructor');
    }

    public async cancelBooking(
        id: string,
        user: AuthenticatedUser,
        reason?: string,
        now: Date = new Date(),
    ): Promise<CancellationResult> {
        const methodContext = this.context + ' - cancelBooking';
        Logger.info('Starting', methodContext, { id, userId: user.userId });

        const [gracePeriodMinutes, ownerCommissionRate] = await Promise.all([
            this.configService.getNumber('CANCELLATION_GRACE_PERIOD_MINUTES'),
            this.configService.getNumber('OWNER_COMMISSION_RATE'),
        ]);

        const outcome = await this.client.transaction(async (tx) => {
            const { booking, role } = await this.bookingService.getBookingForUser(id, user, tx, true);
            if (booking.status !== 'pending' && booking.status !== 'confirmed') {
                throw conflict('invalid_status', `A ${booking.status} booking cannot be cancelled`);
            }
            if (format(now, 'yyyy-MM-dd') >= booking.check_in_date) {
                throw conflict('stay_started', 'A booking cannot be cancelled on or after check-in');
            }

            const refund = calculateRefund({
                booking,
                policy: toCancellationPolicy(booking.cancellation_policy),
                cancelledAt: now,
                gracePeriodMinutes,
                ownerCommissionRate,
            });

            let notes = appendNote(
                booking.notes,
                `Annulée par ${ROLE_LABELS[role]}${reason ? ` : ${reason}` : ''}`,
            );
            if (refund.withinGracePeriod) {
                notes = appendNote(
                    notes,
                    `Annulation dans le délai de grâce de ${gracePeriodMinutes} minutes : remboursement intégral`,
                );
            }

            const updated = await tx.query(
                `UPDATE bookings
                 SET status = 'cancelled', cancelled_at = $2, cancelled_by = $3, notes = $4,
                     updated_at = CURRENT_TIMESTAMP
                 WHERE id = $1 RETURNING *`,
                [id, now, user.userId, notes],
            );
            if (booking.promo_code_id !== null) {
                await this.promoCodeService.setActive(booking.promo_code_id, true, tx);
            }
            await tx.query(
                `DELETE FROM unavailabilities WHERE booking_id = $1 AND booking_type = 'booking'`,
                [id],
            );

            const pendingRefund =
                refund.refundAmount > 0
                    ? await this.paymentService.recordRefund(tx, booking, refund.refundAmount, {
                          settlesBooking: true,
                      })
                    : null;

            return { booking, role, refund, pendingRefund, cancelled: toBooking(updated.rows[0]) };
        });

        const { booking, role, refund, pendingRefund, cancelled } = outcome;
        Logger.info('Booking cancelled', methodContext, {
            id,
            refundAmount: refund.refundAmount,
            withinGracePeriod: refund.withinGracePeriod,
        });

        let refundInfo: RefundInfo | null = null;
        if (pendingRefund) {
            let issued: RefundOutcome = { transaction: pendingRefund.transaction, gateway_requested: false };
            try {
                issued = await this.paymentService.requestRefund(
                    pendingRefund,
                    reason || 'Annulation de la réservation',
                );
            } catch (error) {
                Logger.error('Refund request failed, left pending', methodContext, error);
            }
            refundInfo = {
                amount: refund.refundAmount,
                rate: refund.refundRate,
                transaction_id: issued.transaction.id,
                status: issued.transaction.status,
                gateway_requested: issued.gateway_requested,
            };
        } else if (booking.payment_status !== 'paid') {
            await this.paymentService.cancelPendingPayments(id);
        }

        const recipientId = role === 'tenant' ? booking.owner_id : booking.tenant_id;
        try {
            await this.notificationService.notify({
                recipientId,
                type: 'booking',
                title: 'Réservation annulée',
                content: `La réservation pour « ${booking.property_title} » du ${booking.check_in_date} au ${booking.check_out_date} a été annulée.`,
                relatedObjectId: id,
                relatedObjectType: 'booking',
            });
        } catch (error) {
            Logger.error('Could not send notification', methodContext, error);
        }

        return {
            booking_id: id,
            status: 'cancelled',
            cancelled_at: cancelled.cancelled_at ?? now,
            refund_info: refundInfo,
            owner_compensation: refund.ownerCompensation,
            grace_period: {
                applied: refund.withinGracePeriod,
                minutes: gracePeriodMinutes,
            },
        };
    }
}

export default CancellationService;
