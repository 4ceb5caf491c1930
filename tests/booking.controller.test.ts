import BookingController from '../src/controllers/booking.controller';
import CancellationService from '../src/services/cancellation.service';
import InvoiceService from '../src/services/invoice.service';
import PromoCodeService from '../src/services/promo-code.service';
import { bookingRow, buildServices, owner, stranger, tenant } from './support/fixtures';
import { buildRequest, recordResponse } from './support/http';
import { ScriptedClient } from './support/scripted-client';

const TEMPLATE = '<h1>{{document_title}} {{number}}</h1><p>{{tenant_name}}</p>';

const buildController = (client: ScriptedClient): BookingController => {
    const services = buildServices(client);
    return new BookingController({
        bookingService: services.bookingService,
        paymentService: services.paymentService,
        cancellationService: new CancellationService(client, {
            bookingService: services.bookingService,
            paymentService: services.paymentService,
            configService: services.configService,
            notificationService: services.notificationService,
            promoCodeService: new PromoCodeService(client, services.propertyService, services.configService),
        }),
        invoiceService: new InvoiceService(client, () => TEMPLATE),
    });
};

const invoiceClient = () =>
    new ScriptedClient().on(/FROM bookings b\s+JOIN properties p/, [
        bookingRow({
            property_address: 'Rue Njo-Njo',
            property_city: 'Douala',
            tenant_first_name: 'Awa',
            tenant_last_name: 'Ngo',
            tenant_email: 'awa@example.com',
            owner_first_name: 'Paul',
            owner_last_name: 'Eto',
            owner_email: 'paul@example.com',
        }),
    ]);

describe('BookingController.invoice', () => {
    it('renders the invoice as HTML for the tenant', async () => {
        const { res, sent } = recordResponse();

        await buildController(invoiceClient()).invoice(
            buildRequest({ params: { id: 'booking-1' }, user: tenant }),
            res,
        );

        expect(sent()).toEqual({
            status: 200,
            contentType: 'html',
            body: '<h1>FACTURE INV-20250520-BOOKING-</h1><p>Awa Ngo</p>',
        });
    });

    it('returns the view model with format=json', async () => {
        const { res, sent } = recordResponse();

        await buildController(invoiceClient()).invoice(
            buildRequest({ params: { id: 'booking-1' }, query: { format: 'json' }, user: owner }),
            res,
        );

        const { status, body, contentType } = sent();
        expect(status).toBe(200);
        expect(contentType).toBe('json');
        expect(body).toMatchObject({
            success: true,
            data: {
                number: 'INV-20250520-BOOKING-',
                kind: 'invoice',
                booking_id: 'booking-1',
                total: 103003,
            },
        });
    });

    it('answers 403 to users outside the booking', async () => {
        const { res, sent } = recordResponse();

        await buildController(invoiceClient()).invoice(
            buildRequest({ params: { id: 'booking-1' }, user: stranger }),
            res,
        );

        expect(sent()).toEqual({
            status: 403,
            contentType: 'json',
            body: { success: false, code: 'not_booking_party', message: 'You cannot view this invoice' },
        });
    });

    it('answers 404 for an unknown booking', async () => {
        const { res, sent } = recordResponse();

        await buildController(new ScriptedClient()).invoice(
            buildRequest({ params: { id: 'booking-404' }, user: tenant }),
            res,
        );

        expect(sent().status).toBe(404);
        expect(sent().body).toEqual({ success: false, code: 'booking_not_found', message: 'Booking not found' });
    });
});
