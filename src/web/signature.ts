/**
 * Webhook signature verification
 * Signature = base64(HMAC-SHA1(secret, callbackUrl + rawBody))
 */

import crypto from 'crypto';

export const SIGNATURE_ALGORITHM = 'sha1';

/**
 * Header names checked for the signature, in order
 */
export const SIGNATURE_HEADERS = ['x-twilio-signature', 'x-signature', 'x-webhook-signature'] as const;

export interface SignedRequest {
    url: string;
    rawBody: string;
    signature: string | undefined;
    secret: string;
}

export function computeSignature(url: string, rawBody: string, secret: string): string {
    return crypto
        .createHmac(SIGNATURE_ALGORITHM, secret)
        .update(Buffer.from(url + rawBody, 'utf8'))
        .digest('base64');
}

/**
 * Compare the supplied header with the expected signature in constant time
 */
export function verifySignature(request: SignedRequest): boolean {
    if (!request.signature) {
        return false;
    }

    const expected = Buffer.from(computeSignature(request.url, request.rawBody, request.secret), 'utf8');
    const provided = Buffer.from(request.signature, 'utf8');

    if (expected.length !== provided.length) {
        return false;
    }
    return crypto.timingSafeEqual(expected, provided);
}
