import { describe, it, expect } from '@jest/globals';
import crypto from 'crypto';
import { computeSignature, verifySignature } from '../web/signature.js';

const SECRET = 'test-secret';
const URL = 'https://bot.example.test/webhook';
const BODY = 'Body=London&From=whatsapp%3A%2B15550000001';

function mutateAt(text: string, index: number): string {
    const flipped = String.fromCharCode(text.charCodeAt(index) ^ 1);
    return text.slice(0, index) + flipped + text.slice(index + 1);
}

describe('computeSignature', () => {
    it('is the base64 HMAC-SHA1 of url followed by body', () => {
        const expected = crypto.createHmac('sha1', SECRET).update(URL + BODY).digest('base64');
        expect(computeSignature(URL, BODY, SECRET)).toBe(expected);
    });

    it('depends on the secret', () => {
        expect(computeSignature(URL, BODY, SECRET)).not.toBe(computeSignature(URL, BODY, 'other-secret'));
    });
});

describe('verifySignature', () => {
    const signature = computeSignature(URL, BODY, SECRET);

    it('accepts a correctly signed request', () => {
        expect(verifySignature({ url: URL, rawBody: BODY, signature, secret: SECRET })).toBe(true);
    });

    it('rejects a missing signature', () => {
        expect(verifySignature({ url: URL, rawBody: BODY, signature: undefined, secret: SECRET })).toBe(false);
        expect(verifySignature({ url: URL, rawBody: BODY, signature: '', secret: SECRET })).toBe(false);
    });

    it('rejects a signature made with another secret', () => {
        const forged = computeSignature(URL, BODY, 'other-secret');
        expect(verifySignature({ url: URL, rawBody: BODY, signature: forged, secret: SECRET })).toBe(false);
    });

    it('rejects signatures of a different length', () => {
        expect(verifySignature({ url: URL, rawBody: BODY, signature: signature.slice(1), secret: SECRET })).toBe(false);
        expect(verifySignature({ url: URL, rawBody: BODY, signature: `${signature}=`, secret: SECRET })).toBe(false);
    });

    it('rejects any single-byte change to the body', () => {
        for (let i = 0; i < BODY.length; i++) {
            const rawBody = mutateAt(BODY, i);
            expect(verifySignature({ url: URL, rawBody, signature, secret: SECRET })).toBe(false);
        }
    });

    it('rejects any single-byte change to the url', () => {
        for (let i = 0; i < URL.length; i++) {
            const url = mutateAt(URL, i);
            expect(verifySignature({ url, rawBody: BODY, signature, secret: SECRET })).toBe(false);
        }
    });

    it('rejects any single-byte change to the header', () => {
        for (let i = 0; i < signature.length; i++) {
            const tampered = mutateAt(signature, i);
            expect(verifySignature({ url: URL, rawBody: BODY, signature: tampered, secret: SECRET })).toBe(false);
        }
    });
});
