// src/core/content-address.ts

import crypto from 'crypto';

const FINGERPRINT_LENGTH = 16;

/**
 * Short, stable fingerprint of a blob: SHA-256, base64url, first 16 chars.
 *
 * Strings are hashed as their UTF-8 bytes.
 */
export function fingerprint(content: string | Buffer): string {
   return crypto
      .createHash('sha256')
      .update(content)
      .digest('base64url')
      .slice(0, FINGERPRINT_LENGTH);
}
