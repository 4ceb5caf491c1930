import { Client, DatabaseClient, Row } from '../database';
import { toBooking } from '../helpers/booking.helper';
import {
    InvoicePartySource,
    buildInvoice,
    loadInvoiceTemplate,
    renderInvoiceHtml,
} from '../helpers/invoice.helper';
import { readOptionalString, readString } from '../helpers/row.helper';
import { Invoice } from '../models/invoice.model';
import { AuthenticatedUser } from '../models/request.model';
import { forbidden, notFound } from '../utils/errors';
import Logger from '../utils/logger';

const readParty = (row: Row, prefix: 'tenant' | 'owner'): InvoicePartySource => ({
    first_name: readOptionalString(row, `${prefix}_first_name`) ?? '',
    last_name: readOptionalString(row, `${prefix}_last_name`) ?? '',
    email: readOptionalString(row, `${prefix}_email`) ?? '',
    phone_number: readOptionalString(row, `${prefix}_phone`),
});

export type RenderedInvoice = {
    invoice: Invoice;
    html: string;
};

class InvoiceService {
    private client: DatabaseClient;
    private templateLoader: () => string;
    private context: string;

    constructor(
        client: DatabaseClient = new Client(),
        templateLoader: () => string = loadInvoiceTemplate,
    ) {
        this.context = 'InvoiceService';
        this.client = client;
        this.templateLoader = templateLoader;
        Logger.info('Initializing', this.context + ' - constructor');
    }

    private async loadSource(bookingId: string) {
        const result = await this.client.query(
            `SELECT b.*,
                    p.title AS property_title, p.address AS property_address, p.owner_id,
                    c.name AS property_city,
                    t.first_name AS tenant_first_name, t.last_name AS tenant_last_name,
                    t.email AS tenant_email, t.phone_number AS tenant_phone,
                    o.first_name AS owner_first_name, o.last_name AS owner_last_name,
                    o.email AS owner_email, o.phone_number AS owner_phone
             FROM bookings b
             JOIN properties p ON p.id = b.property_id
             LEFT JOIN cities c ON c.id = p.city_id
             JOIN users t ON t.id = b.tenant_id
             JOIN users o ON o.id = p.owner_id
             WHERE b.id = $1`,
            [bookingId],
        );
        const row = result.rows[0];
        if (!row) {
            throw notFound('booking_not_found', 'Booking not found');
        }
        return row;
    }

    public async buildForBooking(bookingId: string, viewer?: AuthenticatedUser): Promise<Invoice> {
        const methodContext = this.context + ' - buildForBooking';
        Logger.info('Starting', methodContext, { bookingId });

        const row = await this.loadSource(bookingId);
        const booking = toBooking(row);

        if (viewer) {
            const allowed =
                viewer.userType === 'admin' ||
                viewer.userId === booking.tenant_id ||
                viewer.userId === readString(row, 'owner_id');
            if (!allowed) {
                throw forbidden('not_booking_party', 'You cannot view this invoice');
            }
        }

        return buildInvoice(
            booking,
            {
                title: readOptionalString(row, 'property_title') ?? '',
                address: readOptionalString(row, 'property_address') ?? '',
                city: readOptionalString(row, 'property_city') ?? '',
            },
            readParty(row, 'tenant'),
            readParty(row, 'owner'),
        );
    }

    public renderHtml(invoice: Invoice): string {
        return renderInvoiceHtml(invoice, this.templateLoader());
    }

    public async renderForBooking(
        bookingId: string,
        viewer?: AuthenticatedUser,
    ): Promise<RenderedInvoice> {
        const invoice = await this.buildForBooking(bookingId, viewer);
        return { invoice, html: this.renderHtml(invoice) };
    }
}

export default InvoiceService;
