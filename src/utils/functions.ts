import crypto from 'crypto';

/**
 * Replaces every `{{key}}` in the input with its value. Unknown keys are
 * left in place.
 */
export function fillTemplate(
    input: string,
    replacements: Record<string, string | number>,
): string {
    return input.replace(/\{\{\s*(\w+)\s*\}\}/g, (match, key: string) =>
        Object.prototype.hasOwnProperty.call(replacements, key)
            ? String(replacements[key])
            : match,
    );
}

const CODE_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789';

export function generateCode(length: number): string {
    let code = '';
    for (let i = 0; i < length; i++) {
        code += CODE_ALPHABET[crypto.randomInt(CODE_ALPHABET.length)];
    }
    return code;
}
