import { FilterResult, MaskedCategory } from '../models/conversation.model';

// Cameroonian formats: +237 6XXXXXXXX, 6XXXXXXXX, 2XXXXXXXX, XXX XXX XXX, XX XX XX XXX
const PHONE_PATTERNS = [
    '\\+?237\\s?[2-9]\\d{7,8}',
    '\\b[69]\\d{8}\\b',
    '\\b2[2-9]\\d{7}\\b',
    '\\b\\d{3}\\s?\\d{3}\\s?\\d{3}\\b',
    '\\b\\d{2}\\s?\\d{2}\\s?\\d{2}\\s?\\d{3}\\b',
];

const EMAIL_PATTERNS = [
    '\\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\\.[A-Za-z]{2,}\\b',
    '\\b[A-Za-z0-9._%+-]+\\s+at\\s+[A-Za-z0-9.-]+\\s+dot\\s+[A-Za-z]{2,}\\b',
    '\\b[A-Za-z0-9._%+-]+\\[@\\][A-Za-z0-9.-]+\\[\\.\\][A-Za-z]{2,}\\b',
];

const MESSAGING_PATTERNS = [
    '\\bwhats\\s?app\\b',
    '\\bwa\\.me\\b',
    '\\bwatsap\\b',
    '\\btelegram\\b',
    '\\bviber\\b',
    '\\bimo\\b',
    '\\bmessenger\\b',
];

const SOCIAL_PATTERNS = [
    '\\bfacebook\\b',
    '\\bfb\\.com\\b',
    '\\bfb\\.me\\b',
    '\\binstagram\\b',
    '\\btwitter\\b',
    '\\btiktok\\b',
    '\\blinkedin\\b',
];

export const MASK_PLACEHOLDERS: Record<MaskedCategory, string> = {
    phone: '[📱 Numéro masqué - Disponible après confirmation]',
    email: '[📧 Email masqué - Disponible après confirmation]',
    whatsapp: '[💬 Contact WhatsApp masqué - Restez sur la plateforme]',
    social: '[📱 Réseau social masqué - Utilisez la messagerie de la plateforme]',
};

// One alternation per category, applied in this order, so a placeholder
// inserted by one pass is never matched again by a later one.
const FILTERS: Array<{ category: MaskedCategory; pattern: RegExp }> = [
    { category: 'phone', pattern: new RegExp(PHONE_PATTERNS.join('|'), 'gi') },
    { category: 'email', pattern: new RegExp(EMAIL_PATTERNS.join('|'), 'gi') },
    { category: 'whatsapp', pattern: new RegExp(MESSAGING_PATTERNS.join('|'), 'gi') },
    { category: 'social', pattern: new RegExp(SOCIAL_PATTERNS.join('|'), 'gi') },
];

export const ANTI_DISINTERMEDIATION_WARNING =
    '🔒 Pour votre sécurité et celle de tous les utilisateurs, restez sur la plateforme pour toutes vos communications. ' +
    'Les coordonnées seront disponibles après confirmation de votre réservation.';

export const filterMessageContent = (
    content: string,
    bookingConfirmed = false,
): FilterResult => {
    if (bookingConfirmed) {
        return { content, maskedItems: [] };
    }

    let filtered = content;
    const maskedItems: MaskedCategory[] = [];

    for (const { category, pattern } of FILTERS) {
        const replaced = filtered.replace(pattern, MASK_PLACEHOLDERS[category]);
        if (replaced !== filtered) {
            maskedItems.push(category);
            filtered = replaced;
        }
    }

    return { content: filtered, maskedItems };
};
