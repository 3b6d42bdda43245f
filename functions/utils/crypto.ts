/**
 * Encryption Utility for persisted Dropbox tokens
 * Uses AES-256-GCM for encryption at rest
 *
 * The secret (ENCRYPTION_SECRET_KEY) must be at least 32 characters.
 */

import { webcrypto } from 'node:crypto';

const IV_LENGTH = 12;

/**
 * Get the encryption key as CryptoKey
 */
async function getKey(secret: string) {
  if (secret.length < 32) {
    throw new Error('ENCRYPTION_SECRET_KEY must be at least 32 characters');
  }

  return webcrypto.subtle.importKey(
    'raw',
    new TextEncoder().encode(secret.slice(0, 32)),
    { name: 'AES-GCM' },
    false,
    ['encrypt', 'decrypt'],
  );
}

/**
 * Encrypt a plaintext string
 * Returns base64 encoded string containing IV + ciphertext
 */
export async function encrypt(plaintext: string, secret: string): Promise<string> {
  if (!plaintext) return '';

  const key = await getKey(secret);
  const iv = webcrypto.getRandomValues(new Uint8Array(IV_LENGTH));
  const ciphertext = await webcrypto.subtle.encrypt(
    { name: 'AES-GCM', iv },
    key,
    new TextEncoder().encode(plaintext),
  );

  // Combine IV + ciphertext
  return Buffer.concat([Buffer.from(iv), Buffer.from(ciphertext)]).toString('base64');
}

/**
 * Decrypt a base64 string produced by `encrypt`
 */
export async function decrypt(encryptedBase64: string, secret: string): Promise<string> {
  if (!encryptedBase64) return '';

  const key = await getKey(secret);
  const combined = Buffer.from(encryptedBase64, 'base64');

  const decrypted = await webcrypto.subtle.decrypt(
    { name: 'AES-GCM', iv: combined.subarray(0, IV_LENGTH) },
    key,
    combined.subarray(IV_LENGTH),
  );

  return new TextDecoder().decode(decrypted);
}
