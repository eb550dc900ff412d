import { gcm } from '@noble/ciphers/aes';
import { secureRandomBytes, concatBytes } from './utils.js';
import { CryptoError, ok, err, type Result } from '../errors.js';
import type { FrameType } from '../codec/types.js';

/**
 * AES-GCM nonce size in bytes (96 bits = 12 bytes)
 */
export const NONCE_SIZE = 12;

/**
 * AES-GCM authentication tag size in bytes (128 bits = 16 bytes)
 */
export const TAG_SIZE = 16;

/**
 * Random part of each nonce; the remaining 8 bytes are the frame sequence
 */
export const NONCE_SALT_SIZE = 4;

/**
 * Bytes added by sealing: nonce prefix plus tag
 */
export const SEAL_OVERHEAD = NONCE_SIZE + TAG_SIZE;

export const KEY_SIZE = 32;

/**
 * Encrypt data using AES-256-GCM
 * @param key - 32-byte AES-256 key
 * @param nonce - 12-byte nonce, never reused with the same key
 * @returns Ciphertext with the auth tag appended
 */
export function encrypt(
  key: Uint8Array,
  nonce: Uint8Array,
  plaintext: Uint8Array,
  additionalData?: Uint8Array
): Uint8Array {
  if (key.length !== KEY_SIZE) {
    throw new Error('Invalid key length: expected 32 bytes for AES-256');
  }
  if (nonce.length !== NONCE_SIZE) {
    throw new Error(`Invalid nonce length: expected ${NONCE_SIZE} bytes`);
  }
  return gcm(key, nonce, additionalData).encrypt(plaintext);
}

/**
 * Decrypt data using AES-256-GCM
 * @throws Error if the tag does not verify (wrong key, corrupted or tampered data)
 */
export function decrypt(
  key: Uint8Array,
  nonce: Uint8Array,
  ciphertext: Uint8Array,
  additionalData?: Uint8Array
): Uint8Array {
  if (key.length !== KEY_SIZE) {
    throw new Error('Invalid key length: expected 32 bytes for AES-256');
  }
  if (nonce.length !== NONCE_SIZE) {
    throw new Error(`Invalid nonce length: expected ${NONCE_SIZE} bytes`);
  }
  return gcm(key, nonce, additionalData).decrypt(ciphertext);
}

/**
 * Additional authenticated data binding a payload to its frame: type(1) + sequence(8)
 */
export function frameAad(type: FrameType, sequence: number): Uint8Array {
  const aad = new Uint8Array(9);
  const view = new DataView(aad.buffer);
  view.setUint8(0, type);
  view.setBigUint64(1, BigInt(sequence));
  return aad;
}

function sequenceNonce(salt: Uint8Array, sequence: number): Uint8Array {
  const nonce = new Uint8Array(NONCE_SIZE);
  nonce.set(salt, 0);
  new DataView(nonce.buffer).setBigUint64(NONCE_SALT_SIZE, BigInt(sequence));
  return nonce;
}

/**
 * Authenticated encryption of frame payloads under one traffic key.
 *
 * Sealed layout: [nonce (12 bytes: salt(4) + sequence(8))][ciphertext+tag]
 *
 * Holds no session state: the caller decides when to seal and with which key.
 */
export class CryptoEnvelope {
  private readonly key: Uint8Array;

  constructor(key: Uint8Array) {
    if (key.length !== KEY_SIZE) {
      throw new Error('Invalid key length: expected 32 bytes for AES-256');
    }
    this.key = key.slice();
  }

  seal(plaintext: Uint8Array, sequence: number, additionalData?: Uint8Array): Uint8Array {
    const nonce = sequenceNonce(secureRandomBytes(NONCE_SALT_SIZE), sequence);
    return concatBytes(nonce, encrypt(this.key, nonce, plaintext, additionalData));
  }

  open(
    sealed: Uint8Array,
    sequence: number,
    additionalData?: Uint8Array
  ): Result<Uint8Array, CryptoError> {
    if (sealed.length < SEAL_OVERHEAD) {
      return err(new CryptoError('Sealed payload too short to contain nonce and tag'));
    }

    const nonce = sealed.subarray(0, NONCE_SIZE);
    const nonceSequence = new DataView(nonce.buffer, nonce.byteOffset, NONCE_SIZE).getBigUint64(
      NONCE_SALT_SIZE
    );
    if (nonceSequence !== BigInt(sequence)) {
      return err(new CryptoError(`Nonce sequence ${nonceSequence} does not match frame ${sequence}`));
    }

    try {
      return ok(decrypt(this.key, nonce, sealed.subarray(NONCE_SIZE), additionalData));
    } catch {
      return err(new CryptoError('Authentication failed'));
    }
  }
}
