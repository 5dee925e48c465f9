import { z } from 'zod';
import { PHONE_NUMBER_PATTERN } from '../constants/verification';

export const isValidPhoneNumber = (phone: string): boolean => PHONE_NUMBER_PATTERN.test(phone);

/**
 * Normalise a raw phone number to E.164.
 * Local numbers ("0712 345 678") get the default country code.
 * Returns null when the result is not a valid E.164 number.
 */
export function formatPhoneNumber(raw: string, defaultCountryCode = '+254'): string | null {
    const cleaned = raw.replace(/[^\d+]/g, '');

    let formatted: string;
    if (cleaned.startsWith('+')) {
        formatted = cleaned;
    } else if (cleaned.startsWith(defaultCountryCode.slice(1)) && cleaned.length >= 10) {
        formatted = `+${cleaned}`;
    } else if (cleaned.length >= 9) {
        formatted = defaultCountryCode + (cleaned.startsWith('0') ? cleaned.slice(1) : cleaned);
    } else {
        return null;
    }

    return isValidPhoneNumber(formatted) ? formatted : null;
}

/** "+254700000001" -> "+2547****0001" */
export function maskPhoneNumber(phone: string): string {
    if (phone.length <= 9) return `****${phone.slice(-2)}`;
    return `${phone.slice(0, 5)}${'*'.repeat(phone.length - 9)}${phone.slice(-4)}`;
}

/** Request field accepting local or international numbers, normalised to E.164 */
export const phoneNumberSchema = z.string().trim().transform((raw, ctx) => {
    const phone = formatPhoneNumber(raw);
    if (!phone) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Invalid phone number format' });
        return z.NEVER;
    }
    return phone;
});
