/**
 * @fileoverview Identifier helpers used for log correlation.
 *
 * This module must not import the logger: `requestContextService` depends on
 * it, and the logger depends on `requestContextService`.
 * @module src/utils/security/idGenerator
 */
import { randomUUID as cryptoRandomUUID, randomBytes } from 'node:crypto';

const REQUEST_ID_CHARSET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789';

/**
 * Generates a standard Version 4 UUID.
 */
export const generateUUID = (): string => {
  return cryptoRandomUUID();
};

/**
 * Draws `length` characters from `charset` using rejection sampling, so that
 * every character is equally likely.
 */
export const generateSecureRandomString = (
  length: number,
  charset: string = REQUEST_ID_CHARSET,
): string => {
  let result = '';
  const maxValidByteValue = Math.floor(256 / charset.length) * charset.length;

  while (result.length < length) {
    const byte = randomBytes(1)[0];
    if (byte !== undefined && byte < maxValidByteValue) {
      const char = charset[byte % charset.length];
      if (char) {
        result += char;
      }
    }
  }
  return result;
};

/**
 * Generates a short, readable request id such as `ABCDE-FGHIJ`.
 */
export const generateRequestContextId = (): string => {
  return `${generateSecureRandomString(5)}-${generateSecureRandomString(5)}`;
};
