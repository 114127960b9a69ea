import crypto from 'crypto';

const ALGORITHM = 'aes-256-gcm';
const VERSION = 'v1';

function loadKey(): Buffer {
  const raw = process.env.ENCRYPTION_KEY ?? '';
  if (!raw) {
    throw new Error('ENCRYPTION_KEY must be set before reading or writing stored credentials');
  }
  const key = /^[0-9a-fA-F]{64}$/.test(raw) ? Buffer.from(raw, 'hex') : Buffer.from(raw, 'base64');
  if (key.length !== 32) {
    throw new Error('ENCRYPTION_KEY must decode to 32 bytes (64 hex characters or base64)');
  }
  return key;
}

/**
 * Encrypts a credential for storage. Output: `v1:<iv>:<tag>:<ciphertext>`, base64 segments.
 * Empty input stays empty.
 */
export function encryptSecret(plain: string): string {
  if (!plain) return '';
  const iv = crypto.randomBytes(12);
  const cipher = crypto.createCipheriv(ALGORITHM, loadKey(), iv);
  const data = Buffer.concat([cipher.update(plain, 'utf8'), cipher.final()]);
  const tag = cipher.getAuthTag();
  return [VERSION, iv.toString('base64'), tag.toString('base64'), data.toString('base64')].join(':');
}

export function decryptSecret(stored: string): string {
  if (!stored) return '';
  const [version, iv, tag, data] = stored.split(':');
  if (version !== VERSION || !iv || !tag || !data) {
    throw new Error('SECRET_FORMAT_INVALID');
  }
  const decipher = crypto.createDecipheriv(ALGORITHM, loadKey(), Buffer.from(iv, 'base64'));
  decipher.setAuthTag(Buffer.from(tag, 'base64'));
  return Buffer.concat([decipher.update(Buffer.from(data, 'base64')), decipher.final()]).toString('utf8');
}
