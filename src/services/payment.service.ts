import { appConfig } from '../config';
import { Client, DatabaseClient, Queryable } from '../database';
import { calculateCommission } from '../helpers/commission.helper';
import {
    buildBookingPaymentReference,
    convertGatewayStatus,
    formatPhoneNumber,
    getMobileOperatorChannel,
    parseWebhookEvent,
    toBookingPaymentStatus,
} from '../helpers/notchpay.helper';
import {
    WEBHOOK_EVENT_STATUSES,
    canTransition,
    toCommission,
    toFinancialTransaction,
    toPaymentMethod,
    toPaymentTransaction,
} from '../helpers/payment.helper';
import { readNumber } from '../helpers/row.helper';
import { IBookingWithProperty } from '../models/booking.model';
import { NotificationInput } from '../models/notification.model';
import {
    ICommission,
    IFinancialTransaction,
    IPaymentMethod,
    IPaymentMethodInput,
    IPaymentTransaction,
    NotchPayPaymentResponse,
    PAYMENT_METHOD_TYPES,
    PaymentStatus,
    TransactionSummary,
} from '../models/payment.model';
import { AuthenticatedUser, Pagination } from '../models/request.model';
import { CURRENCY } from '../utils/constants';
import { badRequest, conflict, forbidden, notFound } from '../utils/errors';
import Logger from '../utils/logger';
import { isValidCameroonPhone } from '../utils/validations';
import BookingService from './booking.service';
import ConfigService from './config.service';
import NotchPayService from './notchpay.service';
import NotificationService from './notification.service';
import UserService from './user.service';

export type PaymentServiceDeps = {
    notchPayService?: NotchPayService;
    bookingService?: BookingService;
    configService?: ConfigService;
    notificationService?: NotificationService;
    userService?: UserService;
};

export type PaymentInitiation = {
    payment_url: string | null;
    transaction_id: string;
    reference: string;
};

export type PaymentStatusResult = {
    booking_id: string;
    payment_status: string;
    transaction: IPaymentTransaction | null;
};

export type WebhookResult = {
    handled: boolean;
    event: string;
    transaction_id?: string;
    status?: PaymentStatus;
};

export type PaymentRequest = {
    mobile_operator?: string;
    phone_number?: string;
};

export type RefundOutcome = {
    transaction: IFinancialTransaction;
    gateway_requested: boolean;
};

// A refund row written in the caller's transaction, not yet sent to the gateway
export type PendingRefund = {
    transaction: IFinancialTransaction;
    payment: IPaymentTransaction | null;
    bookingId: string;
    settlesBooking: boolean;
};

type AppliedStatus = {
    transaction: IPaymentTransaction;
    paidBooking: IBookingWithProperty | null;
    returnedPayment: { refund: PendingRefund; booking: IBookingWithProperty } | null;
};

class PaymentService {
    private client: DatabaseClient;
    private notchPayService: NotchPayService;
    private bookingService: BookingService;
    private configService: ConfigService;
    private notificationService: NotificationService;
    private userService: UserService;
    private context: string;

    constructor(client: DatabaseClient = new Client(), deps: PaymentServiceDeps = {}) {
        this.context = 'PaymentService';
        this.client = client;
        this.notchPayService = deps.notchPayService ?? new NotchPayService();
        this.configService = deps.configService ?? new ConfigService(client);
        this.notificationService = deps.notificationService ?? new NotificationService(client);
        this.bookingService =
            deps.bookingService ??
            new BookingService(client, {
                configService: this.configService,
                notificationService: this.notificationService,
            });
        this.userService = deps.userService ?? new UserService(client);
        Logger.info('Initializing', this.context + ' - constructor');
    }

    private async notifySafely(input: NotificationInput): Promise<void> {
        try {
            await this.notificationService.notify(input);
        } catch (error) {
            Logger.error('Could not send notification', this.context + ' - notifySafely', error);
        }
    }

    public async initiateBookingPayment(
        bookingId: string,
        user: AuthenticatedUser,
        request: PaymentRequest,
    ): Promise<PaymentInitiation> {
        const methodContext = this.context + ' - initiateBookingPayment';
        Logger.info('Starting', methodContext, { bookingId, request });

        const { booking, role } = await this.bookingService.getBookingForUser(bookingId, user);
        if (role !== 'tenant') {
            throw forbidden('tenant_only', 'Only the tenant can pay for this booking');
        }
        if (booking.status !== 'pending') {
            throw conflict('invalid_status', `A ${booking.status} booking cannot be paid`);
        }
        if (booking.payment_status === 'paid' || booking.payment_status === 'authorized') {
            throw conflict('already_paid', 'This booking is already paid');
        }
        if (request.phone_number && !isValidCameroonPhone(request.phone_number)) {
            throw badRequest('invalid_phone', 'Invalid Cameroonian phone number');
        }

        const tenant = await this.userService.findUserById(user.userId);
        const channel = getMobileOperatorChannel(request.mobile_operator);
        await this.cancelPendingPayments(booking.id);

        const inserted = await this.client.query(
            `INSERT INTO payment_transactions (booking_id, amount, payment_method, status)
             VALUES ($1, $2, $3, 'pending')
             RETURNING *`,
            [booking.id, booking.total_price, channel],
        );
        const transaction = toPaymentTransaction(inserted.rows[0]);
        const reference = buildBookingPaymentReference(booking.id, transaction.id);

        try {
            const response = await this.notchPayService.initializePayment({
                amount: booking.total_price,
                currency: CURRENCY,
                description: `Réservation ${booking.property_title} (${booking.check_in_date} - ${booking.check_out_date})`,
                reference,
                customer: {
                    email: tenant?.email ?? user.email,
                    phone: formatPhoneNumber(request.phone_number ?? tenant?.phone_number),
                    name: `${tenant?.first_name ?? ''} ${tenant?.last_name ?? ''}`.trim(),
                },
                metadata: {
                    booking_id: booking.id,
                    transaction_id: transaction.id,
                    payment_method: channel,
                },
                callbackUrl: `${appConfig.urls.paymentCallbackBase}/payments/webhook/notchpay`,
                successUrl: `${appConfig.urls.frontend}/bookings/${booking.id}/payment/success`,
                cancelUrl: `${appConfig.urls.frontend}/bookings/${booking.id}/payment/cancel`,
            });

            await this.client.query(
                `UPDATE payment_transactions
                 SET reference = $2, gateway_reference = $3, payment_response = $4,
                     updated_at = CURRENT_TIMESTAMP
                 WHERE id = $1`,
                [transaction.id, reference, response.transaction.reference, JSON.stringify(response)],
            );

            Logger.info('Payment initiated', methodContext, {
                bookingId,
                transactionId: transaction.id,
            });
            return {
                payment_url: response.authorization_url ?? null,
                transaction_id: transaction.id,
                reference,
            };
        } catch (error) {
            await this.client.query(
                `UPDATE payment_transactions
                 SET status = 'failed', reference = $2, updated_at = CURRENT_TIMESTAMP
                 WHERE id = $1`,
                [transaction.id, reference],
            );
            throw error;
        }
    }

    public async getLatestTransaction(bookingId: string): Promise<IPaymentTransaction | null> {
        const result = await this.client.query(
            `SELECT * FROM payment_transactions WHERE booking_id = $1
             ORDER BY created_at DESC LIMIT 1`,
            [bookingId],
        );
        const row = result.rows[0];
        return row ? toPaymentTransaction(row) : null;
    }

    public async checkPaymentStatus(
        bookingId: string,
        user: AuthenticatedUser,
    ): Promise<PaymentStatusResult> {
        const methodContext = this.context + ' - checkPaymentStatus';
        Logger.info('Starting', methodContext, { bookingId });

        const { booking } = await this.bookingService.getBookingForUser(bookingId, user);
        const latest = await this.getLatestTransaction(booking.id);
        if (!latest || !latest.gateway_reference) {
            return { booking_id: booking.id, payment_status: booking.payment_status, transaction: latest };
        }

        const response = await this.notchPayService.verifyPayment(latest.gateway_reference);
        const status = convertGatewayStatus(response.transaction.status);
        const updated = await this.applyTransactionStatus(latest.id, status, response);

        const refreshed = await this.bookingService.findBookingById(booking.id);
        return {
            booking_id: booking.id,
            payment_status: refreshed?.payment_status ?? booking.payment_status,
            transaction: updated,
        };
    }

    /**
     * Moves a gateway attempt to a new status and mirrors it on the
     * booking. Repeating the same status changes nothing.
     */
    public async applyTransactionStatus(
        transactionId: string,
        status: PaymentStatus,
        gatewayPayload: unknown,
    ): Promise<IPaymentTransaction> {
        const methodContext = this.context + ' - applyTransactionStatus';

        const outcome = await this.client.transaction(async (tx): Promise<AppliedStatus> => {
            const locked = await tx.query(
                'SELECT * FROM payment_transactions WHERE id = $1 FOR UPDATE',
                [transactionId],
            );
            const row = locked.rows[0];
            if (!row) {
                throw notFound('transaction_not_found', 'Payment transaction not found');
            }
            const current = toPaymentTransaction(row);
            if (!canTransition(current.status, status)) {
                Logger.info('Status unchanged', methodContext, {
                    transactionId,
                    current: current.status,
                    received: status,
                });
                return { transaction: current, paidBooking: null, returnedPayment: null };
            }

            const updated = await tx.query(
                `UPDATE payment_transactions
                 SET status = $2, payment_response = $3, updated_at = CURRENT_TIMESTAMP
                 WHERE id = $1 RETURNING *`,
                [transactionId, status, JSON.stringify(gatewayPayload ?? null)],
            );
            const transaction = toPaymentTransaction(updated.rows[0]);

            const booking = await this.bookingService.findBookingById(current.booking_id, tx, true);
            if (!booking) {
                return { transaction, paidBooking: null, returnedPayment: null };
            }

            if (status === 'completed') {
                // Money received for a cancelled or already paid booking goes back to the tenant
                if (booking.status === 'cancelled' || booking.payment_status === 'paid' || booking.payment_status === 'refunded') {
                    await this.recordPaymentEntry(tx, transaction, booking);
                    const refund = await this.recordRefund(tx, booking, transaction.amount, {
                        payment: transaction,
                        settlesBooking: booking.status === 'cancelled',
                    });
                    Logger.warn('Payment received for a closed booking, refund queued', methodContext, {
                        transactionId,
                        bookingId: booking.id,
                        bookingStatus: booking.status,
                    });
                    return { transaction, paidBooking: null, returnedPayment: { refund, booking } };
                }
                await this.recordPaymentSuccess(tx, transaction, booking);
                return { transaction, paidBooking: booking, returnedPayment: null };
            }

            if (status === 'refunded') {
                const otherPayment = await tx.query(
                    `SELECT id FROM payment_transactions
                     WHERE booking_id = $1 AND status = 'completed' AND id <> $2 LIMIT 1`,
                    [booking.id, transaction.id],
                );
                if (!otherPayment.rows[0]) {
                    await this.markBookingRefunded(tx, booking.id);
                }
            } else if (booking.payment_status !== 'paid' && booking.payment_status !== 'refunded') {
                await tx.query(
                    `UPDATE bookings SET payment_status = $2, updated_at = CURRENT_TIMESTAMP
                     WHERE id = $1`,
                    [booking.id, toBookingPaymentStatus(status)],
                );
            }
            return { transaction, paidBooking: null, returnedPayment: null };
        });

        Logger.info('Transaction status applied', methodContext, {
            transactionId,
            status: outcome.transaction.status,
        });

        if (outcome.paidBooking) {
            const booking = outcome.paidBooking;
            await this.notifySafely({
                recipientId: booking.owner_id,
                type: 'payment',
                title: 'Paiement reçu',
                content: `La réservation pour « ${booking.property_title} » du ${booking.check_in_date} a été payée. Vous pouvez la confirmer.`,
                relatedObjectId: booking.id,
                relatedObjectType: 'booking',
            });
            await this.notifySafely({
                recipientId: booking.tenant_id,
                type: 'payment',
                title: 'Paiement confirmé',
                content: `Votre paiement pour « ${booking.property_title} » a bien été reçu.`,
                relatedObjectId: booking.id,
                relatedObjectType: 'booking',
            });
        }

        if (outcome.returnedPayment) {
            const { refund, booking } = outcome.returnedPayment;
            await this.requestRefund(refund, `Paiement non requis pour la réservation ${booking.id}`);
            await this.notifySafely({
                recipientId: booking.tenant_id,
                type: 'payment',
                title: 'Paiement remboursé',
                content: `Votre paiement pour « ${booking.property_title} » n'était plus nécessaire et va vous être remboursé.`,
                relatedObjectId: booking.id,
                relatedObjectType: 'booking',
            });
        }

        return outcome.transaction;
    }

    private async recordPaymentSuccess(
        tx: Queryable,
        transaction: IPaymentTransaction,
        booking: IBookingWithProperty,
    ): Promise<void> {
        await tx.query(
            `UPDATE bookings SET payment_status = 'paid', updated_at = CURRENT_TIMESTAMP
             WHERE id = $1`,
            [booking.id],
        );
        await this.recordPaymentEntry(tx, transaction, booking);

        const [ownerRate, tenantRate] = await Promise.all([
            this.configService.getNumber('OWNER_COMMISSION_RATE'),
            this.configService.getNumber('TENANT_SERVICE_FEE_RATE'),
        ]);
        const commission = calculateCommission(booking, { ownerRate, tenantRate });
        await tx.query(
            `INSERT INTO commissions (
                booking_id, owner_rate, tenant_rate, owner_amount, tenant_amount,
                total_amount, owner_net_amount
            ) VALUES ($1, $2, $3, $4, $5, $6, $7)
            ON CONFLICT (booking_id) DO UPDATE
            SET owner_rate = EXCLUDED.owner_rate, tenant_rate = EXCLUDED.tenant_rate,
                owner_amount = EXCLUDED.owner_amount, tenant_amount = EXCLUDED.tenant_amount,
                total_amount = EXCLUDED.total_amount, owner_net_amount = EXCLUDED.owner_net_amount`,
            [
                booking.id,
                commission.ownerRate,
                commission.tenantRate,
                commission.ownerAmount,
                commission.tenantAmount,
                commission.totalAmount,
                commission.ownerNetAmount,
            ],
        );
    }

    private async recordPaymentEntry(
        tx: Queryable,
        transaction: IPaymentTransaction,
        booking: IBookingWithProperty,
    ): Promise<void> {
        await tx.query(
            `INSERT INTO financial_transactions (
                user_id, transaction_type, status, amount, currency, booking_id,
                payment_transaction_id, external_reference, description, processed_at
            ) VALUES ($1, 'payment', 'completed', $2, $3, $4, $5, $6, $7, CURRENT_TIMESTAMP)
            ON CONFLICT (payment_transaction_id, transaction_type) DO UPDATE
            SET status = 'completed', processed_at = CURRENT_TIMESTAMP`,
            [
                booking.tenant_id,
                transaction.amount,
                CURRENCY,
                booking.id,
                transaction.id,
                transaction.gateway_reference ?? transaction.reference ?? '',
                `Paiement réservation ${booking.property_title}`,
            ],
        );
    }

    private async markBookingRefunded(tx: Queryable, bookingId: string): Promise<void> {
        await tx.query(
            `UPDATE bookings SET payment_status = 'refunded', updated_at = CURRENT_TIMESTAMP
             WHERE id = $1`,
            [bookingId],
        );
    }

    private async findTransactionByReference(
        references: string[],
    ): Promise<IPaymentTransaction | null> {
        if (references.length === 0) return null;
        const result = await this.client.query(
            `SELECT * FROM payment_transactions
             WHERE reference = ANY($1) OR gateway_reference = ANY($1) OR id::text = ANY($1)
             ORDER BY created_at DESC LIMIT 1`,
            [references],
        );
        const row = result.rows[0];
        return row ? toPaymentTransaction(row) : null;
    }

    /**
     * A missing signature is tolerated; a wrong one is rejected.
     */
    public async handleWebhook(
        rawBody: string,
        signature: string | undefined,
    ): Promise<WebhookResult> {
        const methodContext = this.context + ' - handleWebhook';
        Logger.info('Starting', methodContext);

        if (signature && !this.notchPayService.verifyWebhookSignature(rawBody, signature)) {
            throw badRequest('invalid_signature', 'Invalid webhook signature');
        }
        if (!signature) {
            Logger.warn('Webhook received without signature', methodContext);
        }

        const event = parseWebhookEvent(rawBody);
        const status = WEBHOOK_EVENT_STATUSES[event.event];
        if (!status) {
            Logger.info('Ignoring webhook event', methodContext, { event: event.event });
            return { handled: false, event: event.event };
        }

        const metadataTransactionId = event.data.metadata?.transaction_id;
        const references = [
            event.data.merchant_reference,
            event.data.reference,
            typeof metadataTransactionId === 'string' ? metadataTransactionId : undefined,
        ].filter((value): value is string => Boolean(value));

        const transaction = await this.findTransactionByReference(references);
        if (!transaction) {
            Logger.warn('No transaction for webhook', methodContext, { references });
            return { handled: false, event: event.event };
        }

        const updated = await this.applyTransactionStatus(transaction.id, status, event);
        return {
            handled: true,
            event: event.event,
            transaction_id: updated.id,
            status: updated.status,
        };
    }

    // Open gateway attempts of a cancelled booking are abandoned
    public async cancelPendingPayments(bookingId: string): Promise<number> {
        const methodContext = this.context + ' - cancelPendingPayments';

        const open = await this.client.query(
            `SELECT * FROM payment_transactions
             WHERE booking_id = $1 AND status IN ('pending', 'processing')`,
            [bookingId],
        );
        const transactions = open.rows.map(toPaymentTransaction);
        for (const transaction of transactions) {
            if (transaction.gateway_reference) {
                try {
                    await this.notchPayService.cancelPayment(transaction.gateway_reference);
                } catch (error) {
                    Logger.error('Gateway cancellation failed', methodContext, error);
                }
            }
            await this.client.query(
                `UPDATE payment_transactions SET status = 'cancelled', updated_at = CURRENT_TIMESTAMP
                 WHERE id = $1`,
                [transaction.id],
            );
        }

        if (transactions.length) {
            Logger.info('Pending payments cancelled', methodContext, {
                bookingId,
                count: transactions.length,
            });
        }
        return transactions.length;
    }

    /**
     * Writes a pending refund row inside the caller's transaction. The
     * payment defaults to the booking's latest completed gateway attempt.
     */
    public async recordRefund(
        tx: Queryable,
        booking: IBookingWithProperty,
        amount: number,
        options: { payment?: IPaymentTransaction | null; settlesBooking: boolean },
    ): Promise<PendingRefund> {
        let payment = options.payment ?? null;
        if (options.payment === undefined) {
            const paid = await tx.query(
                `SELECT * FROM payment_transactions
                 WHERE booking_id = $1 AND status = 'completed'
                 ORDER BY updated_at DESC LIMIT 1`,
                [booking.id],
            );
            payment = paid.rows[0] ? toPaymentTransaction(paid.rows[0]) : null;
        }
        const gatewayReference = payment?.gateway_reference ?? null;

        const inserted = await tx.query(
            `INSERT INTO financial_transactions (
                user_id, transaction_type, status, amount, currency, booking_id,
                payment_transaction_id, external_reference, description, admin_notes
            ) VALUES ($1, 'refund', 'pending', $2, $3, $4, $5, $6, $7, $8)
            RETURNING *`,
            [
                booking.tenant_id,
                amount,
                CURRENCY,
                booking.id,
                payment?.id ?? null,
                gatewayReference ?? '',
                `Remboursement réservation ${booking.property_title}`,
                gatewayReference ? '' : 'Remboursement manuel requis : aucune référence de paiement',
            ],
        );
        return {
            transaction: toFinancialTransaction(inserted.rows[0]),
            payment,
            bookingId: booking.id,
            settlesBooking: options.settlesBooking,
        };
    }

    /**
     * Asks the gateway for a recorded refund. Without a gateway reference,
     * or when the gateway refuses, the refund stays pending for an admin.
     */
    public async requestRefund(pending: PendingRefund, reason: string): Promise<RefundOutcome> {
        const methodContext = this.context + ' - requestRefund';
        const { payment } = pending;
        let refund = pending.transaction;
        Logger.info('Starting', methodContext, { bookingId: pending.bookingId, amount: refund.amount });

        if (!payment || !payment.gateway_reference) {
            Logger.warn('No gateway reference, refund left pending', methodContext, {
                bookingId: pending.bookingId,
            });
            return { transaction: refund, gateway_requested: false };
        }

        let response: NotchPayPaymentResponse;
        try {
            response = await this.notchPayService.refundPayment(payment.gateway_reference, refund.amount, reason);
        } catch (error) {
            Logger.error('Gateway refund failed, left pending', methodContext, error);
            const updated = await this.client.query(
                `UPDATE financial_transactions SET admin_notes = $2 WHERE id = $1 RETURNING *`,
                [refund.id, 'Échec de la demande de remboursement auprès de NotchPay'],
            );
            return { transaction: toFinancialTransaction(updated.rows[0]), gateway_requested: true };
        }

        const status = convertGatewayStatus(response.transaction.status);
        const refundStatus: PaymentStatus =
            status === 'completed' || status === 'refunded' ? 'completed' : 'processing';
        const refundReference = response.transaction.reference;
        const paymentId = payment.id;
        const refundId = refund.id;
        refund = await this.client.transaction(async (tx) => {
            const updated = await tx.query(
                `UPDATE financial_transactions
                 SET status = $2, external_reference = $3,
                     processed_at = CASE WHEN $2 = 'completed' THEN CURRENT_TIMESTAMP ELSE processed_at END
                 WHERE id = $1 RETURNING *`,
                [refundId, refundStatus, refundReference],
            );
            if (refundStatus === 'completed') {
                await tx.query(
                    `UPDATE payment_transactions SET status = 'refunded', updated_at = CURRENT_TIMESTAMP
                     WHERE id = $1`,
                    [paymentId],
                );
                if (pending.settlesBooking) {
                    await this.markBookingRefunded(tx, pending.bookingId);
                }
            }
            return toFinancialTransaction(updated.rows[0]);
        });

        Logger.info('Refund requested', methodContext, { bookingId: pending.bookingId, status: refund.status });
        return { transaction: refund, gateway_requested: true };
    }

    public async listTransactions(
        userId: string,
        pagination: Pagination,
    ): Promise<IFinancialTransaction[]> {
        const result = await this.client.query(
            `SELECT * FROM financial_transactions WHERE user_id = $1
             ORDER BY created_at DESC LIMIT $2 OFFSET $3`,
            [userId, pagination.limit, pagination.offset],
        );
        return result.rows.map(toFinancialTransaction);
    }

    public async getSummary(userId: string): Promise<TransactionSummary> {
        const result = await this.client.query(
            `SELECT
                COALESCE(SUM(amount) FILTER (WHERE transaction_type = 'payment' AND status = 'completed'), 0) AS total_paid,
                COALESCE(SUM(amount) FILTER (WHERE transaction_type = 'refund' AND status = 'completed'), 0) AS total_refunded,
                COALESCE(SUM(amount) FILTER (WHERE status IN ('pending', 'processing')), 0) AS pending_amount,
                COUNT(*) AS count
             FROM financial_transactions WHERE user_id = $1`,
            [userId],
        );
        const row = result.rows[0] ?? {};
        return {
            total_paid: readNumber(row, 'total_paid'),
            total_refunded: readNumber(row, 'total_refunded'),
            pending_amount: readNumber(row, 'pending_amount'),
            count: readNumber(row, 'count'),
        };
    }

    public async getCommission(bookingId: string, user: AuthenticatedUser): Promise<ICommission> {
        const { role } = await this.bookingService.getBookingForUser(bookingId, user);
        if (role === 'tenant') {
            throw forbidden('owner_only', 'Only the owner can see the commission');
        }
        const result = await this.client.query('SELECT * FROM commissions WHERE booking_id = $1', [
            bookingId,
        ]);
        const row = result.rows[0];
        if (!row) {
            throw notFound('commission_not_found', 'No commission recorded for this booking');
        }
        return toCommission(row);
    }

    public async listPaymentMethods(userId: string): Promise<IPaymentMethod[]> {
        const result = await this.client.query(
            `SELECT * FROM payment_methods WHERE user_id = $1
             ORDER BY is_default DESC, created_at DESC`,
            [userId],
        );
        return result.rows.map(toPaymentMethod);
    }

    public async addPaymentMethod(
        userId: string,
        input: IPaymentMethodInput,
    ): Promise<IPaymentMethod> {
        const methodContext = this.context + ' - addPaymentMethod';
        Logger.info('Starting', methodContext, { userId, type: input.payment_type });

        if (!PAYMENT_METHOD_TYPES.includes(input.payment_type)) {
            throw badRequest('invalid_payment_type', 'Unknown payment method type');
        }
        if (input.payment_type === 'mobile_money') {
            if (!input.phone_number || !isValidCameroonPhone(input.phone_number)) {
                throw badRequest('invalid_phone', 'A valid phone number is required');
            }
            if (!input.operator) {
                throw badRequest('missing_operator', 'operator is required for mobile money');
            }
        } else if (!input.account_number) {
            throw badRequest('missing_account', 'account_number is required');
        }

        const existing = await this.listPaymentMethods(userId);
        const makeDefault = input.is_default === true || existing.length === 0;
        const accountNumber = input.account_number ?? '';

        return this.client.transaction(async (tx) => {
            if (makeDefault) {
                await tx.query('UPDATE payment_methods SET is_default = FALSE WHERE user_id = $1', [
                    userId,
                ]);
            }
            const result = await tx.query(
                `INSERT INTO payment_methods (
                    user_id, payment_type, is_default, nickname, phone_number, operator,
                    account_number, account_name, bank_name, last_digits
                ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)
                RETURNING *`,
                [
                    userId,
                    input.payment_type,
                    makeDefault,
                    input.nickname ?? '',
                    input.phone_number ? formatPhoneNumber(input.phone_number) : '',
                    input.operator ?? '',
                    accountNumber,
                    input.account_name ?? '',
                    input.bank_name ?? '',
                    accountNumber.slice(-4),
                ],
            );
            return toPaymentMethod(result.rows[0]);
        });
    }

    public async setDefaultPaymentMethod(userId: string, methodId: string): Promise<IPaymentMethod> {
        return this.client.transaction(async (tx) => {
            const found = await tx.query(
                'SELECT id FROM payment_methods WHERE id = $1 AND user_id = $2',
                [methodId, userId],
            );
            if (!found.rows[0]) {
                throw notFound('payment_method_not_found', 'Payment method not found');
            }
            await tx.query('UPDATE payment_methods SET is_default = FALSE WHERE user_id = $1', [
                userId,
            ]);
            const result = await tx.query(
                'UPDATE payment_methods SET is_default = TRUE WHERE id = $1 RETURNING *',
                [methodId],
            );
            return toPaymentMethod(result.rows[0]);
        });
    }

    // Deleting the default promotes the most recent remaining method
    public async deletePaymentMethod(userId: string, methodId: string): Promise<void> {
        await this.client.transaction(async (tx) => {
            const deleted = await tx.query(
                'DELETE FROM payment_methods WHERE id = $1 AND user_id = $2 RETURNING *',
                [methodId, userId],
            );
            const row = deleted.rows[0];
            if (!row) {
                throw notFound('payment_method_not_found', 'Payment method not found');
            }
            if (toPaymentMethod(row).is_default) {
                await tx.query(
                    `UPDATE payment_methods SET is_default = TRUE
                     WHERE id = (SELECT id FROM payment_methods WHERE user_id = $1
                                 ORDER BY created_at DESC LIMIT 1)`,
                    [userId],
                );
            }
        });
    }
}

export default PaymentService;
