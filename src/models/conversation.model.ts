export type Conversation = {
    id: string;
    property_id: string | null;
    participant_ids: string[];
    is_active: boolean;
    created_at: Date;
    updated_at: Date;
};

export type MaskedCategory = 'phone' | 'email' | 'whatsapp' | 'social';

export type Message = {
    id: string;
    conversation_id: string;
    sender_id: string;
    content: string;
    was_filtered: boolean;
    masked_items: MaskedCategory[];
    created_at: Date;
    is_read: boolean;
};

export type ConversationWithDetails = Conversation & {
    property_title: string | null;
    other_user_id: string | null;
    other_user_first_name: string | null;
    other_user_last_name: string | null;
    last_message: string | null;
    last_message_time: Date | null;
    unread_count: number;
};

export type FilterResult = {
    content: string;
    maskedItems: MaskedCategory[];
};
