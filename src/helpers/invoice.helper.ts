import fs from 'fs';
import path from 'path';
import { format, parseISO } from 'date-fns';
import { appConfig } from '../config';
import { BookingPaymentStatus, IBooking } from '../models/booking.model';
import { Invoice, InvoiceLine, InvoiceParty } from '../models/invoice.model';
import { fillTemplate } from '../utils/functions';
import { nightsBetween } from './pricing.helper';

export type InvoicePartySource = {
    first_name: string;
    last_name: string;
    email: string;
    phone_number: string | null;
};

export type InvoicePropertySource = {
    title: string;
    address: string;
    city: string;
};

const PAYMENT_STATUS_LABELS: Record<BookingPaymentStatus, string> = {
    pending: 'En attente',
    authorized: 'Autorisé',
    paid: 'Payé',
    refunded: 'Remboursé',
    failed: 'Échoué',
};

const HTML_ESCAPES: Record<string, string> = {
    '&': '&amp;',
    '<': '&lt;',
    '>': '&gt;',
    '"': '&quot;',
    "'": '&#39;',
};

export const escapeHtml = (value: string): string =>
    value.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);

// 125000 -> "125 000 FCFA"
export const formatFcfa = (amount: number): string => {
    const rounded = Math.round(amount);
    const grouped = String(Math.abs(rounded)).replace(/\B(?=(\d{3})+(?!\d))/g, ' ');
    return `${rounded < 0 ? '-' : ''}${grouped} FCFA`;
};

export const buildInvoiceNumber = (bookingId: string, createdAt: Date): string =>
    `INV-${format(createdAt, 'yyyyMMdd')}-${bookingId.slice(0, 8).toUpperCase()}`;

const displayDay = (day: string): string => format(parseISO(day), 'dd/MM/yyyy');

const toParty = (source: InvoicePartySource): InvoiceParty => ({
    name: `${source.first_name} ${source.last_name}`.trim(),
    email: source.email,
    phone: source.phone_number ?? '',
});

const buildLines = (booking: IBooking, nights: number): InvoiceLine[] => {
    const nightlyAverage = nights > 0 ? Math.round(booking.base_price / nights) : 0;
    const promoDiscount = booking.discount_amount - booking.long_stay_discount;

    const lines: InvoiceLine[] = [
        {
            label: 'Hébergement',
            detail: `${nights} nuit(s) × ${formatFcfa(nightlyAverage)}`,
            amount: booking.base_price,
        },
    ];

    const optional: InvoiceLine[] = [
        { label: 'Frais de ménage', detail: '', amount: booking.cleaning_fee },
        { label: 'Dépôt de garantie', detail: 'Remboursable', amount: booking.security_deposit },
        { label: 'Réduction long séjour', detail: '', amount: -booking.long_stay_discount },
        { label: 'Code promo', detail: '', amount: -promoDiscount },
        { label: 'Frais de service', detail: '', amount: booking.service_fee },
    ];

    return lines.concat(optional.filter((line) => line.amount !== 0));
};

export const buildInvoice = (
    booking: IBooking,
    property: InvoicePropertySource,
    tenant: InvoicePartySource,
    owner: InvoicePartySource,
    issuedAt: Date = new Date(),
): Invoice => {
    const nights = nightsBetween(booking.check_in_date, booking.check_out_date);
    const settled =
        booking.payment_status === 'paid' || booking.payment_status === 'refunded';

    return {
        number: buildInvoiceNumber(booking.id, booking.created_at),
        kind: settled ? 'receipt' : 'invoice',
        issued_at: format(issuedAt, 'dd/MM/yyyy'),
        booking_id: booking.id,
        booking_status: booking.status,
        payment_status: booking.payment_status,
        property: {
            title: property.title,
            address: property.address,
            city: property.city,
        },
        tenant: toParty(tenant),
        owner: toParty(owner),
        stay: {
            check_in: booking.check_in_date,
            check_out: booking.check_out_date,
            nights,
            guests: booking.guests_count,
        },
        lines: buildLines(booking, nights),
        total: booking.total_price,
        currency: 'XAF',
    };
};

const renderLine = (line: InvoiceLine): string =>
    '<tr>' +
    `<td>${escapeHtml(line.label)}</td>` +
    `<td>${escapeHtml(line.detail)}</td>` +
    `<td class="amount">${escapeHtml(formatFcfa(line.amount))}</td>` +
    '</tr>';

export const renderInvoiceHtml = (invoice: Invoice, template: string): string => {
    const escaped: Record<string, string | number> = {
        document_title: invoice.kind === 'receipt' ? 'REÇU' : 'FACTURE',
        number: invoice.number,
        issued_at: invoice.issued_at,
        booking_id: invoice.booking_id,
        property_title: invoice.property.title,
        property_address: invoice.property.address,
        property_city: invoice.property.city,
        tenant_name: invoice.tenant.name,
        tenant_email: invoice.tenant.email,
        tenant_phone: invoice.tenant.phone,
        owner_name: invoice.owner.name,
        check_in: displayDay(invoice.stay.check_in),
        check_out: displayDay(invoice.stay.check_out),
        nights: invoice.stay.nights,
        guests: invoice.stay.guests,
        total: formatFcfa(invoice.total),
        payment_status: PAYMENT_STATUS_LABELS[invoice.payment_status],
    };

    const values: Record<string, string | number> = {};
    for (const [key, value] of Object.entries(escaped)) {
        values[key] = typeof value === 'string' ? escapeHtml(value) : value;
    }
    values.lines = invoice.lines.map(renderLine).join('\n');

    return fillTemplate(template, values);
};

let cachedTemplate: string | null = null;

export const loadInvoiceTemplate = (): string => {
    if (cachedTemplate === null) {
        const templatePath = path.resolve(
            process.cwd(),
            appConfig.templatesDir,
            'invoice.html',
        );
        cachedTemplate = fs.readFileSync(templatePath, 'utf8');
    }
    return cachedTemplate;
};
