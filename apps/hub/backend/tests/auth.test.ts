import { describe, it, expect } from 'vitest';
import { DEV_API_KEY, resolveApiKey } from '../src/middleware/auth.js';

describe('resolveApiKey', () => {
  it('prefers API_KEY over HUB_API_KEY', () => {
    expect(resolveApiKey({ API_KEY: 'test-key', HUB_API_KEY: 'other-key' })).toBe('test-key');
    expect(resolveApiKey({ HUB_API_KEY: 'other-key' })).toBe('other-key');
  });

  it('falls back to the development key outside production', () => {
    expect(resolveApiKey({ NODE_ENV: 'test' })).toBe(DEV_API_KEY);
    expect(resolveApiKey({ NODE_ENV: 'production' })).toBeUndefined();
  });
});
