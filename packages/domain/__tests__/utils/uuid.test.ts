import { describe, it, expect } from 'vitest';
import { uuidv7 } from '../../src/utils/uuid';

describe('uuidv7', () => {
  it('generates a valid UUID string', () => {
    expect(uuidv7()).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/);
  });

  it('sets version to 7 and RFC 4122 variant', () => {
    const chars = uuidv7().replace(/-/g, '');
    expect(chars[12]).toBe('7');
    expect(['8', '9', 'a', 'b']).toContain(chars[16]);
  });

  it('does not repeat', () => {
    expect(uuidv7()).not.toBe(uuidv7());
  });
});
