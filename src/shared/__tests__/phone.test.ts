import { describe, expect, it } from 'vitest';
import { formatPhoneNumber, isValidPhoneNumber, maskPhoneNumber, phoneNumberSchema } from '../utils/phone';

describe('phone utils', () => {
    describe('isValidPhoneNumber', () => {
        it('should accept E.164 numbers', () => {
            expect(isValidPhoneNumber('+254700000001')).toBe(true);
            expect(isValidPhoneNumber('+15005550006')).toBe(true);
        });

        it('should reject numbers without a plus, with a leading zero or too short', () => {
            expect(isValidPhoneNumber('254700000001')).toBe(false);
            expect(isValidPhoneNumber('+0700000001')).toBe(false);
            expect(isValidPhoneNumber('+2547000')).toBe(false);
        });
    });

    describe('formatPhoneNumber', () => {
        it.each([
            ['+254 700 000 001', '+254700000001'],
            ['0700000001', '+254700000001'],
            ['700000001', '+254700000001'],
            ['254700000001', '+254700000001'],
            ['(0700) 000-001', '+254700000001']
        ])('should normalise %s', (raw, expected) => {
            expect(formatPhoneNumber(raw)).toBe(expected);
        });

        it('should use the given default country code', () => {
            expect(formatPhoneNumber('0244000001', '+233')).toBe('+233244000001');
        });

        it('should return null for unusable input', () => {
            expect(formatPhoneNumber('12345')).toBeNull();
            expect(formatPhoneNumber('not a phone')).toBeNull();
        });
    });

    describe('maskPhoneNumber', () => {
        it('should keep the prefix and the last four digits', () => {
            expect(maskPhoneNumber('+254700000001')).toBe('+2547****0001');
        });

        it('should mask short values entirely but the last two characters', () => {
            expect(maskPhoneNumber('12345')).toBe('****45');
        });
    });

    describe('phoneNumberSchema', () => {
        it('should normalise valid input', () => {
            expect(phoneNumberSchema.parse(' 0700000001 ')).toBe('+254700000001');
        });

        it('should report invalid input', () => {
            const result = phoneNumberSchema.safeParse('12');
            expect(result.success).toBe(false);
            if (!result.success) {
                expect(result.error.issues[0].message).toBe('Invalid phone number format');
            }
        });
    });
});
