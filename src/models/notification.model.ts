export const NOTIFICATION_TYPES = [
    'message',
    'booking',
    'payment',
    'review',
    'system',
] as const;

export type NotificationType = (typeof NOTIFICATION_TYPES)[number];

export type Notification = {
    id: string;
    recipient_id: string;
    notification_type: NotificationType;
    title: string;
    content: string;
    related_object_id: string;
    related_object_type: string;
    is_read: boolean;
    created_at: Date;
};

export type NotificationInput = {
    recipientId: string;
    type: NotificationType;
    title: string;
    content: string;
    relatedObjectId?: string;
    relatedObjectType?: string;
};

export type NotificationPayload = {
    title: string;
    body: string;
    imageUrl?: string;
    data?: Record<string, string>;
};

export type DevicePlatform = 'ios' | 'android' | 'web';

export type DeviceToken = {
    id: number;
    user_id: string;
    token: string;
    platform: DevicePlatform;
    is_active: boolean;
};
