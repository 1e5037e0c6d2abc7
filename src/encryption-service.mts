// @author lockerdb contributors
// @date 2026-10-19
import crypto from 'node:crypto';
import { AuthenticationFailureError, MalformedEnvelopeError } from './errors.mjs';

const ALGORITHM = 'aes-256-gcm';
export const KEY_SIZE = 32; // 256 bits
export const NONCE_SIZE = 12; // 96 bits, the GCM standard nonce
export const AUTH_TAG_SIZE = 16; // 128 bits

const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

/**
 * Authenticated encryption of opaque payloads under one collection key.
 *
 * Envelope format, base64 encoded for storage as a text file:
 * [NONCE (12 bytes)][CIPHERTEXT (variable)][AUTH_TAG (16 bytes)]
 */
export class EncryptionService {
  private readonly key: Buffer;

  private constructor(key: Buffer) {
    this.key = key;
  }

  /**
   * Binds a collection key. A key of the wrong length can never authenticate an envelope,
   * so it is rejected the same way a wrong key is.
   */
  static fromBuffer(key: Buffer): EncryptionService {
    if (key.length !== KEY_SIZE) {
      throw new AuthenticationFailureError(`Key must be ${KEY_SIZE} bytes, got ${key.length}`);
    }
    return new EncryptionService(Buffer.from(key));
  }

  /**
   * Generates a fresh random 256-bit collection key.
   */
  static generateKey(): Buffer {
    return crypto.randomBytes(KEY_SIZE);
  }

  /**
   * Encrypts with AES-256-GCM under a fresh random nonce.
   */
  encrypt(plaintext: Buffer): string {
    const nonce = crypto.randomBytes(NONCE_SIZE);
    const cipher = crypto.createCipheriv(ALGORITHM, this.key, nonce, { authTagLength: AUTH_TAG_SIZE });
    const ciphertext = Buffer.concat([cipher.update(plaintext), cipher.final()]);
    const authTag = cipher.getAuthTag();

    return Buffer.concat([nonce, ciphertext, authTag]).toString('base64');
  }

  /**
   * Reverses {@link encrypt}.
   * @throws {MalformedEnvelopeError} If the text is not base64 or decodes to less than one nonce.
   * @throws {AuthenticationFailureError} If the tag does not verify (wrong key, corruption, truncation).
   */
  decrypt(envelope: string): Buffer {
    const text = envelope.replace(/[\r\n]/g, '');
    if (!BASE64_PATTERN.test(text)) {
      throw new MalformedEnvelopeError('Envelope is not valid base64');
    }

    const data = Buffer.from(text, 'base64');
    if (data.length < NONCE_SIZE) {
      throw new MalformedEnvelopeError(`Envelope too short: ${data.length} bytes, nonce alone is ${NONCE_SIZE}`);
    }
    if (data.length < NONCE_SIZE + AUTH_TAG_SIZE) {
      throw new AuthenticationFailureError('Envelope is missing its authentication tag');
    }

    const nonce = data.subarray(0, NONCE_SIZE);
    const ciphertext = data.subarray(NONCE_SIZE, data.length - AUTH_TAG_SIZE);
    const authTag = data.subarray(data.length - AUTH_TAG_SIZE);

    const decipher = crypto.createDecipheriv(ALGORITHM, this.key, nonce, { authTagLength: AUTH_TAG_SIZE });
    decipher.setAuthTag(authTag);

    try {
      return Buffer.concat([decipher.update(ciphertext), decipher.final()]);
    } catch (error) {
      throw new AuthenticationFailureError('Decryption failed: authentication tag mismatch', { cause: error });
    }
  }
}

export function generateKey(): Buffer {
  return EncryptionService.generateKey();
}

export function encrypt(plaintext: Buffer, key: Buffer): string {
  return EncryptionService.fromBuffer(key).encrypt(plaintext);
}

export function decrypt(envelope: string, key: Buffer): Buffer {
  return EncryptionService.fromBuffer(key).decrypt(envelope);
}
