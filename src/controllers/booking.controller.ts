import { Request, Response } from 'express';
import { getAuthUser } from '../helpers/auth.helper';
import {
    getBody,
    pickOption,
    readNumber,
    readParam,
    readQueryString,
    readString,
} from '../helpers/request.helper';
import { respondWithError } from '../middleware/error.middleware';
import BookingService from '../services/booking.service';
import CancellationService from '../services/cancellation.service';
import InvoiceService from '../services/invoice.service';
import PaymentService from '../services/payment.service';
import Logger from '../utils/logger';

export type BookingControllerDeps = {
    bookingService?: BookingService;
    cancellationService?: CancellationService;
    paymentService?: PaymentService;
    invoiceService?: InvoiceService;
};

class BookingController {
    private bookingService: BookingService;
    private cancellationService: CancellationService;
    private paymentService: PaymentService;
    private invoiceService: InvoiceService;
    private context: string;

    constructor(deps: BookingControllerDeps = {}) {
        this.context = 'BookingController';
        this.bookingService = deps.bookingService ?? new BookingService();
        this.paymentService =
            deps.paymentService ?? new PaymentService(undefined, { bookingService: this.bookingService });
        this.cancellationService =
            deps.cancellationService ??
            new CancellationService(undefined, {
                bookingService: this.bookingService,
                paymentService: this.paymentService,
            });
        this.invoiceService = deps.invoiceService ?? new InvoiceService();
        Logger.info('Initializing', this.context + ' - constructor');
    }

    public create = async (req: Request, res: Response) => {
        const methodContext = this.context + ' - create';
        try {
            const user = getAuthUser(req);
            const body = getBody(req);
            const booking = await this.bookingService.createBooking(user, {
                property_id: readString(body, 'property_id') ?? '',
                check_in_date: readString(body, 'check_in_date') ?? '',
                check_out_date: readString(body, 'check_out_date') ?? '',
                guests_count: readNumber(body, 'guests_count') ?? 0,
                special_requests: readString(body, 'special_requests'),
                promo_code: readString(body, 'promo_code') || undefined,
            });
            res.status(201).json({ success: true, data: booking });
        } catch (error) {
            respondWithError(res, error, methodContext);
        }
    };

    public list = async (req: Request, res: Response) => {
        const methodContext = this.context + ' - list';
        try {
            const role = pickOption(readQueryString(req, 'role'), ['tenant', 'owner'] as const);
            const bookings = await this.bookingService.listBookings(getAuthUser(req), role);
            res.status(200).json({ success: true, data: bookings });
        } catch (error) {
            respondWithError(res, error, methodContext);
        }
    };

    public getOne = async (req: Request, res: Response) => {
        const methodContext = this.context + ' - getOne';
        try {
            const { booking, role } = await this.bookingService.getBookingForUser(
                readParam(req, 'id'),
                getAuthUser(req),
            );
            res.status(200).json({ success: true, data: { ...booking, viewer_role: role } });
        } catch (error) {
            respondWithError(res, error, methodContext);
        }
    };

    public confirm = async (req: Request, res: Response) => {
        const methodContext = this.context + ' - confirm';
        try {
            const booking = await this.bookingService.confirmBooking(readParam(req, 'id'), getAuthUser(req));
            res.status(200).json({ success: true, data: booking });
        } catch (error) {
            respondWithError(res, error, methodContext);
        }
    };

    public complete = async (req: Request, res: Response) => {
        const methodContext = this.context + ' - complete';
        try {
            const booking = await this.bookingService.completeBooking(readParam(req, 'id'), getAuthUser(req));
            res.status(200).json({ success: true, data: booking });
        } catch (error) {
            respondWithError(res, error, methodContext);
        }
    };

    public cancel = async (req: Request, res: Response) => {
        const methodContext = this.context + ' - cancel';
        try {
            const reason = readString(getBody(req), 'reason')?.trim();
            const result = await this.cancellationService.cancelBooking(
                readParam(req, 'id'),
                getAuthUser(req),
                reason || undefined,
            );
            res.status(200).json({ success: true, data: result });
        } catch (error) {
            respondWithError(res, error, methodContext);
        }
    };

    public initiatePayment = async (req: Request, res: Response) => {
        const methodContext = this.context + ' - initiatePayment';
        try {
            const body = getBody(req);
            const result = await this.paymentService.initiateBookingPayment(
                readParam(req, 'id'),
                getAuthUser(req),
                {
                    mobile_operator: readString(body, 'mobile_operator'),
                    phone_number: readString(body, 'phone_number'),
                },
            );
            res.status(201).json({ success: true, data: result });
        } catch (error) {
            respondWithError(res, error, methodContext);
        }
    };

    public paymentStatus = async (req: Request, res: Response) => {
        const methodContext = this.context + ' - paymentStatus';
        try {
            const result = await this.paymentService.checkPaymentStatus(
                readParam(req, 'id'),
                getAuthUser(req),
            );
            res.status(200).json({ success: true, data: result });
        } catch (error) {
            respondWithError(res, error, methodContext);
        }
    };

    public invoice = async (req: Request, res: Response) => {
        const methodContext = this.context + ' - invoice';
        try {
            const { invoice, html } = await this.invoiceService.renderForBooking(
                readParam(req, 'id'),
                getAuthUser(req),
            );
            if (readQueryString(req, 'format') === 'json') {
                res.status(200).json({ success: true, data: invoice });
                return;
            }
            res.status(200).type('html').send(html);
        } catch (error) {
            respondWithError(res, error, methodContext);
        }
    };
}

export default BookingController;
