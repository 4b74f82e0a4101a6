import { describe, expect, it } from 'vitest';
import { SECRET_LENGTH, newSecret } from './secrets';

describe('newSecret', () => {
  it('draws 32 alphanumeric characters', () => {
    const secret = newSecret();
    expect(secret).toHaveLength(SECRET_LENGTH);
    expect(secret).toMatch(/^[A-Za-z0-9]{32}$/);
  });

  it('does not repeat itself', () => {
    const secrets = new Set(Array.from({ length: 50 }, () => newSecret()));
    expect(secrets.size).toBe(50);
  });
});
