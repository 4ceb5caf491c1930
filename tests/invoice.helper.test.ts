import {
    buildInvoice,
    escapeHtml,
    formatFcfa,
    renderInvoiceHtml,
} from '../src/helpers/invoice.helper';
import { IBooking } from '../src/models/booking.model';

const booking: IBooking = {
    id: 'a1b2c3d4-e5f6-4a7b-8c9d-0e1f2a3b4c5d',
    property_id: 'property-1',
    tenant_id: 'tenant-1',
    check_in_date: '2025-06-01',
    check_out_date: '2025-06-11',
    guests_count: 2,
    base_price: 90000,
    cleaning_fee: 5000,
    security_deposit: 20000,
    long_stay_discount: 9000,
    promo_code_id: 3,
    discount_amount: 17100,
    service_fee: 5103,
    total_price: 103003,
    status: 'confirmed',
    payment_status: 'paid',
    special_requests: '',
    notes: '',
    created_at: new Date(2025, 4, 20, 9, 0, 0),
    updated_at: new Date(2025, 4, 20, 9, 0, 0),
    cancelled_at: null,
    cancelled_by: null,
};

const property = { title: 'Villa <Bonapriso> & "Vue"', address: 'Rue 1.234', city: 'Douala' };
const tenant = { first_name: 'Awa', last_name: 'Ngo', email: 'awa@example.com', phone_number: '237677000001' };
const owner = { first_name: 'Paul', last_name: 'Ekane', email: 'paul@example.com', phone_number: null };

describe('formatFcfa', () => {
    it('groups thousands with spaces', () => {
        expect(formatFcfa(125000)).toBe('125 000 FCFA');
        expect(formatFcfa(1234567)).toBe('1 234 567 FCFA');
        expect(formatFcfa(999)).toBe('999 FCFA');
    });

    it('keeps the sign of negative amounts', () => {
        expect(formatFcfa(-9000)).toBe('-9 000 FCFA');
    });
});

describe('escapeHtml', () => {
    it('escapes markup characters', () => {
        expect(escapeHtml(`<a href="x">'&'</a>`)).toBe(
            '&lt;a href=&quot;x&quot;&gt;&#39;&amp;&#39;&lt;/a&gt;',
        );
    });
});

describe('buildInvoice', () => {
    const invoice = buildInvoice(booking, property, tenant, owner, new Date(2025, 5, 12));

    it('issues a receipt for a paid booking', () => {
        expect(invoice.number).toBe('INV-20250520-A1B2C3D4');
        expect(invoice.kind).toBe('receipt');
        expect(invoice.issued_at).toBe('12/06/2025');
        expect(invoice.owner).toEqual({ name: 'Paul Ekane', email: 'paul@example.com', phone: '' });
        expect(invoice.stay).toEqual({ check_in: '2025-06-01', check_out: '2025-06-11', nights: 10, guests: 2 });
    });

    it('lists every non-zero price component', () => {
        expect(invoice.lines).toEqual([
            { label: 'Hébergement', detail: '10 nuit(s) × 9 000 FCFA', amount: 90000 },
            { label: 'Frais de ménage', detail: '', amount: 5000 },
            { label: 'Dépôt de garantie', detail: 'Remboursable', amount: 20000 },
            { label: 'Réduction long séjour', detail: '', amount: -9000 },
            { label: 'Code promo', detail: '', amount: -8100 },
            { label: 'Frais de service', detail: '', amount: 5103 },
        ]);
        expect(invoice.total).toBe(103003);
    });

    it('issues an invoice while payment is pending', () => {
        const pending = buildInvoice({ ...booking, payment_status: 'pending' }, property, tenant, owner);
        expect(pending.kind).toBe('invoice');
    });
});

describe('renderInvoiceHtml', () => {
    const template =
        '<h1>{{document_title}}</h1><p>{{property_title}}</p><p>{{check_in}} - {{check_out}}</p>' +
        '<table>{{lines}}</table><p>{{total}}</p><p>{{payment_status}}</p>';

    it('fills the template with escaped values', () => {
        const invoice = buildInvoice(booking, property, tenant, owner, new Date(2025, 5, 12));
        const html = renderInvoiceHtml(invoice, template);

        expect(html.startsWith(
            '<h1>REÇU</h1><p>Villa &lt;Bonapriso&gt; &amp; &quot;Vue&quot;</p><p>01/06/2025 - 11/06/2025</p>',
        )).toBe(true);
        expect(html).toContain(
            '<tr><td>Hébergement</td><td>10 nuit(s) × 9 000 FCFA</td><td class="amount">90 000 FCFA</td></tr>',
        );
        expect(html).toContain('<tr><td>Code promo</td><td></td><td class="amount">-8 100 FCFA</td></tr>');
        expect(html.endsWith('</table><p>103 003 FCFA</p><p>Payé</p>')).toBe(true);
    });
});
