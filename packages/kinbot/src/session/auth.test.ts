import { describe, expect, it } from 'vitest';

import { apiKeyMatches } from './auth.js';

describe('apiKeyMatches', () => {
  it('compares keys exactly', () => {
    expect(apiKeyMatches('test-secret', 'test-secret')).toBe(true);
    expect(apiKeyMatches('test-secret ', 'test-secret')).toBe(false);
    expect(apiKeyMatches(undefined, 'test-secret')).toBe(false);
  });

  it('never matches an empty configured key', () => {
    expect(apiKeyMatches('', '')).toBe(false);
  });
});
