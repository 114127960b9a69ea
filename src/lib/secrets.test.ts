import { describe, expect, it } from 'vitest';
import { decryptSecret, encryptSecret } from './secrets';

describe('stored secrets', () => {
  it('decrypts what it encrypted', () => {
    const stored = encryptSecret('test-secret');
    expect(stored.startsWith('v1:')).toBe(true);
    expect(stored).not.toContain('test-secret');
    expect(decryptSecret(stored)).toBe('test-secret');
  });

  it('leaves empty values empty', () => {
    expect(encryptSecret('')).toBe('');
    expect(decryptSecret('')).toBe('');
  });

  it('rejects malformed or tampered values', () => {
    expect(() => decryptSecret('plain-text')).toThrow('SECRET_FORMAT_INVALID');
    const [version, iv, tag, data] = encryptSecret('test-secret').split(':');
    const tampered = [version, iv, tag, Buffer.from('something else').toString('base64')].join(':');
    expect(() => decryptSecret(tampered)).toThrow();
  });
});
