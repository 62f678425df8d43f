/**
 * @fileoverview Tests for identifier generation.
 * @module tests/utils/security/idGenerator.test
 */
import { describe, expect, it } from 'vitest';

import {
  generateRequestContextId,
  generateSecureRandomString,
  generateUUID,
} from '../../../src/utils/security/idGenerator.js';

describe('idGenerator', () => {
  it('generates v4 UUIDs', () => {
    expect(generateUUID()).toMatch(
      /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/,
    );
  });

  it('draws characters only from the charset', () => {
    expect(generateSecureRandomString(32, 'ab')).toMatch(/^[ab]{32}$/);
  });

  it('generates readable request ids', () => {
    expect(generateRequestContextId()).toMatch(/^[A-Z0-9]{5}-[A-Z0-9]{5}$/);
  });
});
