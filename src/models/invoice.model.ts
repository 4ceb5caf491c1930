import { BookingPaymentStatus, BookingStatus } from './booking.model';

export type InvoiceKind = 'invoice' | 'receipt';

export type InvoiceLine = {
    label: string;
    detail: string;
    amount: number;
};

export type InvoiceParty = {
    name: string;
    email: string;
    phone: string;
};

export type Invoice = {
    number: string;
    kind: InvoiceKind;
    issued_at: string;
    booking_id: string;
    booking_status: BookingStatus;
    payment_status: BookingPaymentStatus;
    property: {
        title: string;
        address: string;
        city: string;
    };
    tenant: InvoiceParty;
    owner: InvoiceParty;
    stay: {
        check_in: string;
        check_out: string;
        nights: number;
        guests: number;
    };
    lines: InvoiceLine[];
    total: number;
    currency: 'XAF';
};
