/**
 * Webhook request helpers
 * Captures the exact body bytes for signature checks and extracts the
 * values the verifier needs from an express request.
 */

import { IncomingMessage, ServerResponse } from 'http';
import { Request } from 'express';
import { SIGNATURE_HEADERS } from '../signature.js';

// Raw bodies keyed by request; entries go away with the request object
const rawBodies = new WeakMap<IncomingMessage, string>();

/**
 * body-parser `verify` hook. Must be installed on the parser that reads the
 * webhook body so the signature is computed over the bytes as sent.
 */
export function captureRawBody(
    req: IncomingMessage,
    _res: ServerResponse,
    buf: Buffer,
    encoding: string
): void {
    rawBodies.set(req, buf.toString(Buffer.isEncoding(encoding) ? encoding : 'utf8'));
}

export function getRawBody(req: Request): string {
    return rawBodies.get(req) ?? '';
}

/**
 * Extract signature from request headers
 */
export function extractSignature(req: Request): string | undefined {
    for (const header of SIGNATURE_HEADERS) {
        const value = req.get(header);
        if (value) {
            return value;
        }
    }
    return undefined;
}

/**
 * URL the platform signed: the configured public callback URL, or the one
 * this request arrived on
 */
export function resolveCallbackUrl(req: Request, publicUrl: string): string {
    if (publicUrl) {
        return publicUrl;
    }
    return `${req.protocol}://${req.get('host') ?? 'localhost'}${req.originalUrl}`;
}
