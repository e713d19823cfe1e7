import { randomBytes } from 'node:crypto';
import { type RandomSource } from '@collab/domain';

export class CryptoRandomSource implements RandomSource {
  token(byteLength: number): string {
    return randomBytes(byteLength).toString('base64url');
  }
}
