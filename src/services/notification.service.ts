import * as admin from 'firebase-admin';
import { appConfig } from '../config';
import { Client, DatabaseClient, Queryable, Row } from '../database';
import { readBoolean, readDate, readNumber, readOptionalString, readString } from '../helpers/row.helper';
import {
    DevicePlatform,
    DeviceToken,
    NOTIFICATION_TYPES,
    Notification,
    NotificationInput,
    NotificationPayload,
    NotificationType,
} from '../models/notification.model';
import { Pagination } from '../models/request.model';
import { badRequest, notFound } from '../utils/errors';
import Logger from '../utils/logger';

/**
 * Delivers a push to the given device tokens and resolves with the tokens
 * the provider rejected.
 */
export type PushSender = (tokens: string[], payload: NotificationPayload) => Promise<string[]>;

const DEVICE_PLATFORMS: DevicePlatform[] = ['ios', 'android', 'web'];

const toNotificationType = (value: unknown): NotificationType =>
    NOTIFICATION_TYPES.find((type) => type === value) ?? 'system';

const toNotification = (row: Row): Notification => ({
    id: readString(row, 'id'),
    recipient_id: readString(row, 'recipient_id'),
    notification_type: toNotificationType(row.notification_type),
    title: readString(row, 'title'),
    content: readString(row, 'content'),
    related_object_id: readOptionalString(row, 'related_object_id') ?? '',
    related_object_type: readOptionalString(row, 'related_object_type') ?? '',
    is_read: readBoolean(row, 'is_read'),
    created_at: readDate(row, 'created_at'),
});

const toDeviceToken = (row: Row): DeviceToken => ({
    id: readNumber(row, 'id'),
    user_id: readString(row, 'user_id'),
    token: readString(row, 'token'),
    platform: DEVICE_PLATFORMS.find((platform) => platform === row.platform) ?? 'android',
    is_active: readBoolean(row, 'is_active'),
});

// Null when Firebase credentials are not configured
export const createFirebasePushSender = (): PushSender | null => {
    const methodContext = 'NotificationService - createFirebasePushSender';
    const { projectId, clientEmail, privateKey } = appConfig.firebase;
    if (!projectId || !clientEmail || !privateKey) {
        Logger.warn('Firebase not configured, push disabled', methodContext);
        return null;
    }

    if (admin.apps.length === 0) {
        admin.initializeApp({
            credential: admin.credential.cert({ projectId, clientEmail, privateKey }),
        });
        Logger.info('Firebase admin initialized successfully', methodContext);
    }

    return async (tokens, payload) => {
        const response = await admin.messaging().sendEachForMulticast({
            tokens,
            notification: {
                title: payload.title,
                body: payload.body,
                imageUrl: payload.imageUrl,
            },
            data: payload.data,
            android: { priority: 'high' },
            apns: { headers: { 'apns-priority': '10' } },
        });

        const failed: string[] = [];
        response.responses.forEach((resp, idx) => {
            const token = tokens[idx];
            if (!resp.success && token) {
                Logger.error('Token failed', methodContext, resp.error?.message);
                failed.push(token);
            }
        });
        return failed;
    };
};

class NotificationService {
    private client: DatabaseClient;
    private pushSender: PushSender | null;
    private context: string;

    constructor(
        client: DatabaseClient = new Client(),
        pushSender: PushSender | null = createFirebasePushSender(),
    ) {
        this.context = 'NotificationService';
        this.client = client;
        this.pushSender = pushSender;
        Logger.info('Initializing', this.context + ' - constructor');
    }

    /**
     * Stores the in-app notification, then pushes it. A failed push is
     * logged and does not fail the call.
     */
    public async notify(input: NotificationInput, tx: Queryable = this.client): Promise<Notification> {
        const methodContext = this.context + ' - notify';
        Logger.info('Starting', methodContext, {
            recipientId: input.recipientId,
            type: input.type,
        });

        const result = await tx.query(
            `INSERT INTO notifications (
                recipient_id, notification_type, title, content,
                related_object_id, related_object_type
            ) VALUES ($1, $2, $3, $4, $5, $6)
            RETURNING *`,
            [
                input.recipientId,
                input.type,
                input.title,
                input.content,
                input.relatedObjectId ?? null,
                input.relatedObjectType ?? null,
            ],
        );
        const notification = toNotification(result.rows[0]);

        try {
            await this.push(input.recipientId, {
                title: input.title,
                body: input.content,
                data: {
                    type: input.type,
                    notification_id: notification.id,
                    related_object_id: input.relatedObjectId ?? '',
                    related_object_type: input.relatedObjectType ?? '',
                },
            });
        } catch (error) {
            Logger.error('Error sending push notification', methodContext, error);
        }

        return notification;
    }

    private async push(userId: string, payload: NotificationPayload): Promise<void> {
        const methodContext = this.context + ' - push';
        if (!this.pushSender) return;

        const devices = await this.getActiveDevices(userId);
        if (devices.length === 0) return;

        const tokens = devices.map((device) => device.token);
        const failed = await this.pushSender(tokens, payload);
        Logger.info('Notification sent', methodContext, {
            success: tokens.length - failed.length,
            failure: failed.length,
        });
        if (failed.length > 0) {
            await this.deactivateTokens(failed);
        }
    }

    public async getActiveDevices(userId: string): Promise<DeviceToken[]> {
        const result = await this.client.query(
            'SELECT * FROM device_tokens WHERE user_id = $1 AND is_active = TRUE',
            [userId],
        );
        return result.rows.map(toDeviceToken);
    }

    public async deactivateTokens(tokens: string[]): Promise<void> {
        await this.client.query(
            'UPDATE device_tokens SET is_active = FALSE WHERE token = ANY($1)',
            [tokens],
        );
    }

    public async registerDevice(
        userId: string,
        token: string,
        platform: string,
    ): Promise<DeviceToken> {
        const methodContext = this.context + ' - registerDevice';
        Logger.info('Starting', methodContext, { userId, platform });

        const devicePlatform = DEVICE_PLATFORMS.find((candidate) => candidate === platform);
        if (!devicePlatform) {
            throw badRequest('invalid_platform', 'platform must be ios, android or web');
        }

        const result = await this.client.query(
            `INSERT INTO device_tokens (user_id, token, platform, is_active)
             VALUES ($1, $2, $3, TRUE)
             ON CONFLICT (token) DO UPDATE
             SET user_id = EXCLUDED.user_id, platform = EXCLUDED.platform, is_active = TRUE
             RETURNING *`,
            [userId, token, devicePlatform],
        );
        return toDeviceToken(result.rows[0]);
    }

    public async listNotifications(
        userId: string,
        pagination: Pagination,
        unreadOnly = false,
    ): Promise<Notification[]> {
        const result = await this.client.query(
            `SELECT * FROM notifications
             WHERE recipient_id = $1 ${unreadOnly ? 'AND is_read = FALSE' : ''}
             ORDER BY created_at DESC
             LIMIT $2 OFFSET $3`,
            [userId, pagination.limit, pagination.offset],
        );
        return result.rows.map(toNotification);
    }

    public async markAsRead(id: string, userId: string): Promise<void> {
        const result = await this.client.query(
            'UPDATE notifications SET is_read = TRUE WHERE id = $1 AND recipient_id = $2',
            [id, userId],
        );
        if (result.rowCount === 0) {
            throw notFound('notification_not_found', 'Notification not found');
        }
    }

    public async markAllAsRead(userId: string): Promise<number> {
        const result = await this.client.query(
            'UPDATE notifications SET is_read = TRUE WHERE recipient_id = $1 AND is_read = FALSE',
            [userId],
        );
        return result.rowCount;
    }
}

export default NotificationService;
