import { Client, DatabaseClient, Queryable, Row } from '../database';
import { readBoolean, readDate, readNumber, readOptionalString, readString } from '../helpers/row.helper';
import { IPromoCode, IPromoCodeInput, PromoCodeValidation } from '../models/booking.model';
import { AuthenticatedUser } from '../models/request.model';
import { badRequest, forbidden, notFound } from '../utils/errors';
import { generateCode } from '../utils/functions';
import Logger from '../utils/logger';
import { isValidPercentage } from '../utils/validations';
import ConfigService from './config.service';
import PropertyService, { canManageProperty } from './property.service';

const toPromoCode = (row: Row): IPromoCode => ({
    id: readNumber(row, 'id'),
    code: readString(row, 'code'),
    property_id: readString(row, 'property_id'),
    tenant_id: readString(row, 'tenant_id'),
    discount_percentage: readNumber(row, 'discount_percentage'),
    is_active: readBoolean(row, 'is_active'),
    expiry_date: readDate(row, 'expiry_date'),
    created_at: readDate(row, 'created_at'),
    created_by: readOptionalString(row, 'created_by'),
});

/**
 * Usable by this tenant on this property: active and not yet expired.
 */
export const checkPromoCode = (
    promo: IPromoCode | null,
    propertyId: string,
    tenantId: string,
    now: Date = new Date(),
): PromoCodeValidation => {
    const invalid = (reason: string): PromoCodeValidation => ({
        valid: false,
        discount_percentage: 0,
        reason,
    });

    if (!promo) return invalid('Code promo introuvable');
    if (promo.property_id !== propertyId) return invalid("Ce code n'est pas valable pour ce logement");
    if (promo.tenant_id !== tenantId) return invalid("Ce code ne vous est pas destiné");
    if (!promo.is_active) return invalid('Ce code a déjà été utilisé ou désactivé');
    if (now.getTime() >= promo.expiry_date.getTime()) return invalid('Ce code a expiré');

    return { valid: true, discount_percentage: promo.discount_percentage };
};

const MAX_CODE_ATTEMPTS = 5;

class PromoCodeService {
    private client: DatabaseClient;
    private propertyService: PropertyService;
    private configService: ConfigService;
    private context: string;

    constructor(
        client: DatabaseClient = new Client(),
        propertyService: PropertyService = new PropertyService(client),
        configService: ConfigService = new ConfigService(client),
    ) {
        this.context = 'PromoCodeService';
        this.client = client;
        this.propertyService = propertyService;
        this.configService = configService;
        Logger.info('Initializing', this.context + ' - constructor');
    }

    public async findByCode(code: string, tx: Queryable = this.client): Promise<IPromoCode | null> {
        const result = await tx.query('SELECT * FROM promo_codes WHERE code = $1', [
            code.trim().toUpperCase(),
        ]);
        const row = result.rows[0];
        return row ? toPromoCode(row) : null;
    }

    private async generateUniqueCode(): Promise<string> {
        const length = Math.max(4, Math.round(await this.configService.getNumber('PROMO_CODE_LENGTH')));
        for (let attempt = 0; attempt < MAX_CODE_ATTEMPTS; attempt++) {
            const code = generateCode(length);
            if (!(await this.findByCode(code))) return code;
        }
        throw new Error('Could not generate a unique promo code');
    }

    public async createPromoCode(
        user: AuthenticatedUser,
        input: IPromoCodeInput,
    ): Promise<IPromoCode> {
        const methodContext = this.context + ' - createPromoCode';
        Logger.info('Starting', methodContext, { userId: user.userId, input });

        const property = await this.propertyService.getPropertyOrThrow(input.property_id);
        if (!canManageProperty(property, user)) {
            throw forbidden('not_property_owner', 'You do not manage this property');
        }
        if (input.tenant_id === property.owner_id || input.tenant_id === user.userId) {
            throw badRequest('invalid_tenant', 'You cannot create a promo code for yourself');
        }
        if (!isValidPercentage(input.discount_percentage)) {
            throw badRequest('invalid_percentage', 'discount_percentage must be in (0, 100]');
        }
        const expiry = new Date(input.expiry_date);
        if (isNaN(expiry.getTime()) || expiry.getTime() <= Date.now()) {
            throw badRequest('invalid_expiry', 'expiry_date must be in the future');
        }

        const tenant = await this.client.query('SELECT id FROM users WHERE id = $1', [
            input.tenant_id,
        ]);
        if (!tenant.rows[0]) {
            throw notFound('tenant_not_found', 'Tenant not found');
        }

        const code = await this.generateUniqueCode();
        const result = await this.client.query(
            `INSERT INTO promo_codes (
                code, property_id, tenant_id, discount_percentage, is_active, expiry_date, created_by
            ) VALUES ($1, $2, $3, $4, TRUE, $5, $6)
            RETURNING *`,
            [code, input.property_id, input.tenant_id, input.discount_percentage, expiry, user.userId],
        );

        Logger.info('Promo code created', methodContext, { code });
        return toPromoCode(result.rows[0]);
    }

    public async listPromoCodes(user: AuthenticatedUser): Promise<IPromoCode[]> {
        const methodContext = this.context + ' - listPromoCodes';
        Logger.info('Starting', methodContext, { userId: user.userId });

        const column = user.userType === 'tenant' ? 'tenant_id' : 'created_by';
        const result = await this.client.query(
            `SELECT * FROM promo_codes WHERE ${column} = $1 ORDER BY created_at DESC`,
            [user.userId],
        );
        return result.rows.map(toPromoCode);
    }

    public async validatePromoCode(
        code: string,
        propertyId: string,
        tenantId: string,
    ): Promise<PromoCodeValidation> {
        const methodContext = this.context + ' - validatePromoCode';
        Logger.info('Starting', methodContext, { code, propertyId });

        if (!code || !propertyId) {
            throw badRequest('missing_parameters', 'code and property_id are required');
        }
        return checkPromoCode(await this.findByCode(code), propertyId, tenantId);
    }

    // Throws when the code cannot be applied to this booking
    public async resolveForBooking(
        code: string,
        propertyId: string,
        tenantId: string,
        tx: Queryable = this.client,
    ): Promise<IPromoCode> {
        const promo = await this.findByCode(code, tx);
        const validation = checkPromoCode(promo, propertyId, tenantId);
        if (!validation.valid || !promo) {
            throw badRequest('invalid_promo_code', validation.reason ?? 'Invalid promo code');
        }
        return promo;
    }

    public async setActive(id: number, active: boolean, tx: Queryable = this.client): Promise<void> {
        await tx.query('UPDATE promo_codes SET is_active = $2 WHERE id = $1', [id, active]);
    }
}

export default PromoCodeService;
