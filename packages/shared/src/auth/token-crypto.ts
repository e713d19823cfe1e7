import { CompactEncrypt } from 'jose';
import { createHash, createPublicKey, type KeyObject, type PublicKeyInput } from 'node:crypto';
import { SealingError, type TokenCrypto } from '@collab/domain';

const KEY_MANAGEMENT_ALG = 'RSA-OAEP-256';
const CONTENT_ENCRYPTION = 'A256GCM';
const MIN_MODULUS_LENGTH = 2048;

/**
 * Seals access tokens as compact JWE for a client-supplied RSA public key.
 *
 * The key arrives as base64url (or base64) DER, either SPKI or PKCS#1;
 * a PEM string is accepted as well.
 */
export class JoseTokenCrypto implements TokenCrypto {
  hashSecret(secret: string): string {
    return createHash('sha256').update(secret).digest('hex');
  }

  async seal(secret: string, publicKey: string): Promise<string> {
    const key = parsePublicKey(publicKey);
    try {
      return await new CompactEncrypt(new TextEncoder().encode(secret))
        .setProtectedHeader({ alg: KEY_MANAGEMENT_ALG, enc: CONTENT_ENCRYPTION })
        .encrypt(key);
    } catch (err) {
      throw new SealingError(
        'ENCRYPTION_FAILED',
        `Encryption failed: ${err instanceof Error ? err.name : 'unknown error'}`,
      );
    }
  }
}

export function parsePublicKey(encoded: string): KeyObject {
  const trimmed = encoded.trim();
  const key = trimmed.startsWith('-----BEGIN')
    ? tryCreatePublicKey({ key: trimmed, format: 'pem' })
    : parseDer(Buffer.from(trimmed, 'base64url'));

  if (!key) {
    throw new SealingError('INVALID_PUBLIC_KEY', 'Public key could not be parsed');
  }
  if (key.asymmetricKeyType !== 'rsa') {
    throw new SealingError('INVALID_PUBLIC_KEY', 'Public key must be an RSA key');
  }
  const modulusLength = key.asymmetricKeyDetails?.modulusLength ?? 0;
  if (modulusLength < MIN_MODULUS_LENGTH) {
    throw new SealingError(
      'INVALID_PUBLIC_KEY',
      `Public key must be at least ${MIN_MODULUS_LENGTH} bits`,
    );
  }
  return key;
}

function parseDer(der: Buffer): KeyObject | null {
  if (der.length === 0) return null;
  return (
    tryCreatePublicKey({ key: der, format: 'der', type: 'spki' }) ??
    tryCreatePublicKey({ key: der, format: 'der', type: 'pkcs1' })
  );
}

function tryCreatePublicKey(input: PublicKeyInput): KeyObject | null {
  try {
    return createPublicKey(input);
  } catch {
    return null;
  }
}
