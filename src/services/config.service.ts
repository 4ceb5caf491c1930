import { Client, DatabaseClient, Row } from '../database';
import { readDate, readString } from '../helpers/row.helper';
import { ConfigKey, SystemConfiguration } from '../models/config.model';
import { SYSTEM_CONFIG_DEFAULTS } from '../utils/constants';
import { badRequest } from '../utils/errors';
import Logger from '../utils/logger';

const toConfiguration = (row: Row): SystemConfiguration => ({
    key: readString(row, 'key'),
    value: readString(row, 'value'),
    description: readString(row, 'description'),
    last_updated: readDate(row, 'last_updated'),
});

export const isConfigKey = (key: string): key is ConfigKey =>
    Object.prototype.hasOwnProperty.call(SYSTEM_CONFIG_DEFAULTS, key);

class ConfigService {
    private client: DatabaseClient;
    private context: string;

    constructor(client: DatabaseClient = new Client()) {
        this.context = 'ConfigService';
        this.client = client;
        Logger.info('Initializing', this.context + ' - constructor');
    }

    public async getAll(): Promise<SystemConfiguration[]> {
        const methodContext = this.context + ' - getAll';
        Logger.info('Starting', methodContext);
        const result = await this.client.query(
            'SELECT key, value, description, last_updated FROM system_configurations ORDER BY key',
        );
        return result.rows.map(toConfiguration);
    }

    public async getValue(key: ConfigKey): Promise<string | null> {
        const result = await this.client.query(
            'SELECT value FROM system_configurations WHERE key = $1',
            [key],
        );
        const row = result.rows[0];
        return row ? readString(row, 'value') : null;
    }

    /**
     * Falls back to the built-in default when the row is missing or does
     * not hold a number.
     */
    public async getNumber(key: ConfigKey): Promise<number> {
        const methodContext = this.context + ' - getNumber';
        const fallback = Number(SYSTEM_CONFIG_DEFAULTS[key].value);
        try {
            const value = await this.getValue(key);
            if (value === null) return fallback;
            const parsed = parseFloat(value);
            if (isNaN(parsed)) {
                Logger.warn('Non numeric configuration value', methodContext, { key, value });
                return fallback;
            }
            return parsed;
        } catch (error) {
            Logger.error('Error reading configuration, using default', methodContext, error);
            return fallback;
        }
    }

    public async setValue(
        key: string,
        value: string,
        description?: string,
    ): Promise<SystemConfiguration> {
        const methodContext = this.context + ' - setValue';
        Logger.info('Starting', methodContext, { key, value });

        if (!isConfigKey(key)) {
            throw badRequest('unknown_config_key', `Unknown configuration key ${key}`);
        }
        if (isNaN(parseFloat(value))) {
            throw badRequest('invalid_config_value', `${key} must be numeric`);
        }

        const result = await this.client.query(
            `INSERT INTO system_configurations (key, value, description, last_updated)
             VALUES ($1, $2, $3, CURRENT_TIMESTAMP)
             ON CONFLICT (key) DO UPDATE
             SET value = EXCLUDED.value,
                 description = COALESCE($4, system_configurations.description),
                 last_updated = CURRENT_TIMESTAMP
             RETURNING key, value, description, last_updated`,
            [key, value, description ?? SYSTEM_CONFIG_DEFAULTS[key].description, description ?? null],
        );

        Logger.info('Configuration updated', methodContext, { key });
        return toConfiguration(result.rows[0]);
    }

    // Seeds every missing default and returns the keys it created
    public async initializeDefaults(): Promise<string[]> {
        const methodContext = this.context + ' - initializeDefaults';
        Logger.info('Starting', methodContext);

        const created: string[] = [];
        for (const [key, entry] of Object.entries(SYSTEM_CONFIG_DEFAULTS)) {
            const result = await this.client.query(
                `INSERT INTO system_configurations (key, value, description, last_updated)
                 VALUES ($1, $2, $3, CURRENT_TIMESTAMP)
                 ON CONFLICT (key) DO NOTHING
                 RETURNING key`,
                [key, entry.value, entry.description],
            );
            if (result.rowCount > 0) {
                created.push(key);
            }
        }

        Logger.info('Defaults initialized', methodContext, { created });
        return created;
    }
}

export default ConfigService;
