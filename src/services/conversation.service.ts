import { Client, DatabaseClient, Row } from '../database';
import {
    ANTI_DISINTERMEDIATION_WARNING,
    filterMessageContent,
} from '../helpers/message-filter.helper';
import {
    readBoolean,
    readDate,
    readNumber,
    readOptionalDate,
    readOptionalString,
    readString,
    readStringArray,
} from '../helpers/row.helper';
import {
    Conversation,
    ConversationWithDetails,
    MaskedCategory,
    Message,
} from '../models/conversation.model';
import { Pagination } from '../models/request.model';
import { badRequest, forbidden, notFound } from '../utils/errors';
import Logger from '../utils/logger';
import NotificationService from './notification.service';

const MASKED_CATEGORIES: readonly MaskedCategory[] = ['phone', 'email', 'whatsapp', 'social'];

const toConversation = (row: Row): Conversation => ({
    id: readString(row, 'id'),
    property_id: readOptionalString(row, 'property_id'),
    participant_ids: readStringArray(row, 'participant_ids'),
    is_active: readBoolean(row, 'is_active'),
    created_at: readDate(row, 'created_at'),
    updated_at: readDate(row, 'updated_at'),
});

const toConversationWithDetails = (row: Row): ConversationWithDetails => ({
    ...toConversation(row),
    property_title: readOptionalString(row, 'property_title'),
    other_user_id: readOptionalString(row, 'other_user_id'),
    other_user_first_name: readOptionalString(row, 'other_user_first_name'),
    other_user_last_name: readOptionalString(row, 'other_user_last_name'),
    last_message: readOptionalString(row, 'last_message'),
    last_message_time: readOptionalDate(row, 'last_message_time'),
    unread_count: readNumber(row, 'unread_count'),
});

const toMessage = (row: Row): Message => ({
    id: readString(row, 'id'),
    conversation_id: readString(row, 'conversation_id'),
    sender_id: readString(row, 'sender_id'),
    content: readString(row, 'content'),
    was_filtered: readBoolean(row, 'was_filtered'),
    masked_items: readStringArray(row, 'masked_items').flatMap((item) =>
        MASKED_CATEGORIES.filter((category) => category === item),
    ),
    created_at: readDate(row, 'created_at'),
    is_read: readBoolean(row, 'is_read'),
});

export type SentMessage = {
    message: Message;
    warning: string | null;
};

const DETAILS_SELECT = `
    SELECT c.*,
           p.title AS property_title,
           other.id AS other_user_id,
           other.first_name AS other_user_first_name,
           other.last_name AS other_user_last_name,
           (SELECT content FROM messages m WHERE m.conversation_id = c.id
            ORDER BY m.created_at DESC LIMIT 1) AS last_message,
           (SELECT created_at FROM messages m WHERE m.conversation_id = c.id
            ORDER BY m.created_at DESC LIMIT 1) AS last_message_time,
           (SELECT COUNT(*) FROM messages m WHERE m.conversation_id = c.id
            AND m.sender_id <> $1 AND m.is_read = FALSE) AS unread_count
    FROM conversations c
    LEFT JOIN properties p ON p.id = c.property_id
    LEFT JOIN users other ON other.id = (
        SELECT participant FROM unnest(c.participant_ids) AS participant
        WHERE participant <> $1 LIMIT 1
    )`;

class ConversationService {
    private client: DatabaseClient;
    private notificationService: NotificationService;
    private context: string;

    constructor(
        client: DatabaseClient = new Client(),
        notificationService: NotificationService = new NotificationService(client),
    ) {
        this.context = 'ConversationService';
        this.client = client;
        this.notificationService = notificationService;
        Logger.info('Initializing', this.context + ' - constructor');
    }

    public async findOrCreateConversation(
        userId: string,
        recipientId: string,
        propertyId?: string,
    ): Promise<Conversation> {
        const methodContext = this.context + ' - findOrCreateConversation';
        Logger.info('Starting', methodContext, { userId, recipientId, propertyId });

        if (!recipientId || recipientId === userId) {
            throw badRequest('invalid_recipient', 'A conversation needs another participant');
        }
        const recipient = await this.client.query('SELECT id FROM users WHERE id = $1', [
            recipientId,
        ]);
        if (!recipient.rows[0]) {
            throw notFound('user_not_found', 'Recipient not found');
        }
        if (propertyId) {
            const property = await this.client.query('SELECT id FROM properties WHERE id = $1', [
                propertyId,
            ]);
            if (!property.rows[0]) {
                throw notFound('property_not_found', 'Property not found');
            }
        }

        const existing = await this.client.query(
            `SELECT * FROM conversations
             WHERE participant_ids @> ARRAY[$1, $2]::uuid[]
               AND property_id IS NOT DISTINCT FROM $3
             ORDER BY created_at ASC LIMIT 1`,
            [userId, recipientId, propertyId ?? null],
        );
        if (existing.rows[0]) {
            return toConversation(existing.rows[0]);
        }

        const created = await this.client.query(
            `INSERT INTO conversations (property_id, participant_ids)
             VALUES ($1, ARRAY[$2, $3]::uuid[])
             RETURNING *`,
            [propertyId ?? null, userId, recipientId],
        );
        Logger.info('Conversation created', methodContext);
        return toConversation(created.rows[0]);
    }

    public async getConversations(userId: string): Promise<ConversationWithDetails[]> {
        const methodContext = this.context + ' - getConversations';
        Logger.info('Starting', methodContext, { userId });

        const result = await this.client.query(
            `${DETAILS_SELECT}
             WHERE $1 = ANY(c.participant_ids)
             ORDER BY last_message_time DESC NULLS LAST, c.updated_at DESC`,
            [userId],
        );
        return result.rows.map(toConversationWithDetails);
    }

    public async getConversation(
        conversationId: string,
        userId: string,
    ): Promise<ConversationWithDetails> {
        const result = await this.client.query(`${DETAILS_SELECT} WHERE c.id = $2`, [
            userId,
            conversationId,
        ]);
        const row = result.rows[0];
        if (!row) {
            throw notFound('conversation_not_found', 'Conversation not found');
        }
        const conversation = toConversationWithDetails(row);
        if (!conversation.participant_ids.includes(userId)) {
            throw forbidden('not_participant', 'You are not part of this conversation');
        }
        return conversation;
    }

    private async getParticipantConversation(
        conversationId: string,
        userId: string,
    ): Promise<Conversation> {
        const result = await this.client.query('SELECT * FROM conversations WHERE id = $1', [
            conversationId,
        ]);
        const row = result.rows[0];
        if (!row) {
            throw notFound('conversation_not_found', 'Conversation not found');
        }
        const conversation = toConversation(row);
        if (!conversation.participant_ids.includes(userId)) {
            throw forbidden('not_participant', 'You are not part of this conversation');
        }
        return conversation;
    }

    public async getMessages(
        conversationId: string,
        userId: string,
        pagination: Pagination,
    ): Promise<Message[]> {
        const methodContext = this.context + ' - getMessages';
        Logger.info('Starting', methodContext, { conversationId });

        await this.getParticipantConversation(conversationId, userId);
        const result = await this.client.query(
            `SELECT * FROM messages WHERE conversation_id = $1
             ORDER BY created_at ASC LIMIT $2 OFFSET $3`,
            [conversationId, pagination.limit, pagination.offset],
        );
        return result.rows.map(toMessage);
    }

    /**
     * Contact details are only shared once the two participants have a
     * confirmed and paid booking together (on the conversation's property
     * when it has one).
     */
    public async hasConfirmedBooking(conversation: Conversation): Promise<boolean> {
        const [first, second] = conversation.participant_ids;
        if (!first || !second) return false;

        const result = await this.client.query(
            `SELECT EXISTS (
                SELECT 1 FROM bookings b
                JOIN properties p ON p.id = b.property_id
                WHERE b.status = 'confirmed' AND b.payment_status = 'paid'
                  AND ($3::uuid IS NULL OR b.property_id = $3)
                  AND ((b.tenant_id = $1 AND p.owner_id = $2)
                    OR (b.tenant_id = $2 AND p.owner_id = $1))
            ) AS confirmed`,
            [first, second, conversation.property_id],
        );
        const row = result.rows[0];
        return row ? readBoolean(row, 'confirmed') : false;
    }

    public async sendMessage(
        conversationId: string,
        senderId: string,
        content: string,
    ): Promise<SentMessage> {
        const methodContext = this.context + ' - sendMessage';
        Logger.info('Starting', methodContext, { conversationId });

        const text = (content ?? '').trim();
        if (!text) {
            throw badRequest('empty_message', 'Message content is required');
        }

        const conversation = await this.getParticipantConversation(conversationId, senderId);
        const unlocked = await this.hasConfirmedBooking(conversation);
        const filtered = filterMessageContent(text, unlocked);
        const wasFiltered = filtered.maskedItems.length > 0;

        const inserted = await this.client.query(
            `INSERT INTO messages (conversation_id, sender_id, content, was_filtered, masked_items)
             VALUES ($1, $2, $3, $4, $5)
             RETURNING *`,
            [conversationId, senderId, filtered.content, wasFiltered, filtered.maskedItems],
        );
        await this.client.query(
            'UPDATE conversations SET updated_at = CURRENT_TIMESTAMP WHERE id = $1',
            [conversationId],
        );
        const message = toMessage(inserted.rows[0]);

        if (wasFiltered) {
            Logger.info('Message filtered', methodContext, { masked: filtered.maskedItems });
        }

        const recipients = conversation.participant_ids.filter((id) => id !== senderId);
        for (const recipientId of recipients) {
            try {
                await this.notificationService.notify({
                    recipientId,
                    type: 'message',
                    title: 'Nouveau message',
                    content: message.content.slice(0, 120),
                    relatedObjectId: conversationId,
                    relatedObjectType: 'conversation',
                });
            } catch (error) {
                Logger.error('Could not send notification', methodContext, error);
            }
        }

        return { message, warning: wasFiltered ? ANTI_DISINTERMEDIATION_WARNING : null };
    }

    public async markAsRead(conversationId: string, userId: string): Promise<number> {
        await this.getParticipantConversation(conversationId, userId);
        const result = await this.client.query(
            `UPDATE messages SET is_read = TRUE
             WHERE conversation_id = $1 AND sender_id <> $2 AND is_read = FALSE`,
            [conversationId, userId],
        );
        return result.rowCount;
    }
}

export default ConversationService;
