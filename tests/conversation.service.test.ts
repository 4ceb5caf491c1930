import { Row } from '../src/database';
import {
    ANTI_DISINTERMEDIATION_WARNING,
    MASK_PLACEHOLDERS,
} from '../src/helpers/message-filter.helper';
import ConversationService from '../src/services/conversation.service';
import NotificationService from '../src/services/notification.service';
import { ApiError } from '../src/utils/errors';
import { captureRejection } from './support/capture-error';
import { CREATED_AT, notificationRow } from './support/fixtures';
import { ScriptedClient } from './support/scripted-client';

const conversationRow = (overrides: Row = {}): Row => ({
    id: 'conv-1',
    property_id: 'property-1',
    participant_ids: ['tenant-1', 'owner-1'],
    is_active: true,
    created_at: CREATED_AT,
    updated_at: CREATED_AT,
    ...overrides,
});

const messageRow = (params: unknown[]): Row => ({
    id: 'msg-1',
    conversation_id: params[0],
    sender_id: params[1],
    content: params[2],
    was_filtered: params[3],
    masked_items: params[4],
    created_at: CREATED_AT,
    is_read: false,
});

const buildService = (client: ScriptedClient): ConversationService =>
    new ConversationService(client, new NotificationService(client, null));

describe('ConversationService.sendMessage', () => {
    const scripted = (confirmed: boolean): ScriptedClient =>
        new ScriptedClient()
            .on(/SELECT \* FROM conversations WHERE id = \$1/, [conversationRow()])
            .on(/AS confirmed/, [{ confirmed }])
            .on(/INSERT INTO messages/, (params) => [messageRow(params)])
            .on(/INSERT INTO notifications/, (params) => [notificationRow(params)]);

    it('masks a phone number before the booking is confirmed', async () => {
        const client = scripted(false);
        const sent = await buildService(client).sendMessage('conv-1', 'tenant-1', '  Appelle-moi au 677123456  ');

        const masked = `Appelle-moi au ${MASK_PLACEHOLDERS.phone}`;
        expect(sent.message.content).toBe(masked);
        expect(sent.message.was_filtered).toBe(true);
        expect(sent.message.masked_items).toEqual(['phone']);
        expect(sent.warning).toBe(ANTI_DISINTERMEDIATION_WARNING);

        expect(client.matching(/AS confirmed/)[0]?.params).toEqual(['tenant-1', 'owner-1', 'property-1']);
        expect(client.matching(/INSERT INTO messages/)[0]?.params).toEqual([
            'conv-1',
            'tenant-1',
            masked,
            true,
            ['phone'],
        ]);
        expect(client.matching(/UPDATE conversations SET updated_at/)[0]?.params).toEqual(['conv-1']);

        const notifications = client.matching(/INSERT INTO notifications/);
        expect(notifications).toHaveLength(1);
        expect(notifications[0]?.params).toEqual([
            'owner-1',
            'message',
            'Nouveau message',
            masked,
            'conv-1',
            'conversation',
        ]);
    });

    it('leaves contact details alone once a paid booking is confirmed', async () => {
        const client = scripted(true);
        const sent = await buildService(client).sendMessage('conv-1', 'owner-1', 'Mon numéro : 677123456');

        expect(sent.message.content).toBe('Mon numéro : 677123456');
        expect(sent.message.was_filtered).toBe(false);
        expect(sent.message.masked_items).toEqual([]);
        expect(sent.warning).toBeNull();
        expect(client.matching(/INSERT INTO notifications/)[0]?.params[0]).toBe('tenant-1');
    });

    it('rejects a blank message without touching the database', async () => {
        const client = scripted(false);
        const error = await captureRejection(() => buildService(client).sendMessage('conv-1', 'tenant-1', '   '));

        expect(error).toBeInstanceOf(ApiError);
        expect(error).toMatchObject({ statusCode: 400, code: 'empty_message' });
        expect(client.queries).toHaveLength(0);
    });

    it('refuses senders outside the conversation', async () => {
        const client = scripted(false);
        const error = await captureRejection(() => buildService(client).sendMessage('conv-1', 'user-9', 'Bonjour'));

        expect(error).toMatchObject({ statusCode: 403, code: 'not_participant' });
        expect(client.matching(/INSERT INTO messages/)).toHaveLength(0);
    });

    it('reports a missing conversation', async () => {
        const client = new ScriptedClient();
        const error = await captureRejection(() => buildService(client).sendMessage('conv-404', 'tenant-1', 'Bonjour'));

        expect(error).toMatchObject({ statusCode: 404, code: 'conversation_not_found' });
    });
});

describe('ConversationService.findOrCreateConversation', () => {
    it('refuses a conversation with oneself', async () => {
        const client = new ScriptedClient();
        const error = await captureRejection(() =>
            buildService(client).findOrCreateConversation('tenant-1', 'tenant-1'),
        );

        expect(error).toMatchObject({ statusCode: 400, code: 'invalid_recipient' });
        expect(client.queries).toHaveLength(0);
    });

    it('reports an unknown recipient', async () => {
        const client = new ScriptedClient();
        const error = await captureRejection(() =>
            buildService(client).findOrCreateConversation('tenant-1', 'owner-1'),
        );

        expect(error).toMatchObject({ statusCode: 404, code: 'user_not_found' });
    });

    it('returns the existing conversation for the same pair and property', async () => {
        const client = new ScriptedClient()
            .on(/SELECT id FROM users/, [{ id: 'owner-1' }])
            .on(/SELECT id FROM properties/, [{ id: 'property-1' }])
            .on(/participant_ids @>/, [conversationRow()]);

        const conversation = await buildService(client).findOrCreateConversation(
            'tenant-1',
            'owner-1',
            'property-1',
        );

        expect(conversation.id).toBe('conv-1');
        expect(client.matching(/participant_ids @>/)[0]?.params).toEqual(['tenant-1', 'owner-1', 'property-1']);
        expect(client.matching(/INSERT INTO conversations/)).toHaveLength(0);
    });

    it('opens a new conversation when none exists', async () => {
        const client = new ScriptedClient()
            .on(/SELECT id FROM users/, [{ id: 'owner-1' }])
            .on(/INSERT INTO conversations/, [
                conversationRow({ id: 'conv-2', property_id: null }),
            ]);

        const conversation = await buildService(client).findOrCreateConversation('tenant-1', 'owner-1');

        expect(conversation).toEqual({
            id: 'conv-2',
            property_id: null,
            participant_ids: ['tenant-1', 'owner-1'],
            is_active: true,
            created_at: CREATED_AT,
            updated_at: CREATED_AT,
        });
        expect(client.matching(/INSERT INTO conversations/)[0]?.params).toEqual([null, 'tenant-1', 'owner-1']);
    });
});

describe('ConversationService.markAsRead', () => {
    it('returns how many messages from the other side were marked', async () => {
        const client = new ScriptedClient()
            .on(/SELECT \* FROM conversations WHERE id = \$1/, [conversationRow()])
            .on(/UPDATE messages SET is_read/, [], 3);

        const marked = await buildService(client).markAsRead('conv-1', 'owner-1');

        expect(marked).toBe(3);
        expect(client.matching(/UPDATE messages SET is_read/)[0]?.params).toEqual(['conv-1', 'owner-1']);
    });
});
