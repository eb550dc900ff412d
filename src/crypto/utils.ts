import { randomBytes } from '@noble/ciphers/webcrypto';

/**
 * Domain separator for every derivation in the link protocol
 */
export const DOMAIN_SEPARATOR = 'rfcomm-link-v1';

const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder('utf-8', { fatal: true });

/**
 * Generate cryptographically secure random bytes
 */
export function secureRandomBytes(length: number): Uint8Array {
  return randomBytes(length);
}

/**
 * Concatenate multiple Uint8Arrays
 */
export function concatBytes(...arrays: Uint8Array[]): Uint8Array {
  const totalLength = arrays.reduce((acc, arr) => acc + arr.length, 0);
  const result = new Uint8Array(totalLength);
  let offset = 0;
  for (const arr of arrays) {
    result.set(arr, offset);
    offset += arr.length;
  }
  return result;
}

/**
 * Compare two byte arrays without an early exit on the first difference
 */
export function constantTimeEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) {
    return false;
  }
  let diff = 0;
  for (let i = 0; i < a.length; i++) {
    diff |= a[i] ^ b[i];
  }
  return diff === 0;
}

/**
 * Convert hex string to Uint8Array
 */
export function hexToBytes(hex: string): Uint8Array {
  const cleanHex = hex.startsWith('0x') ? hex.slice(2) : hex;
  if (cleanHex.length % 2 !== 0) {
    throw new Error('Invalid hex string length');
  }
  if (!/^[0-9a-fA-F]*$/.test(cleanHex)) {
    throw new Error('Invalid hex string');
  }
  const bytes = new Uint8Array(cleanHex.length / 2);
  for (let i = 0; i < bytes.length; i++) {
    bytes[i] = parseInt(cleanHex.slice(i * 2, i * 2 + 2), 16);
  }
  return bytes;
}

/**
 * Convert Uint8Array to hex string
 */
export function bytesToHex(bytes: Uint8Array): string {
  return Array.from(bytes)
    .map((b) => b.toString(16).padStart(2, '0'))
    .join('');
}

export function utf8Encode(text: string): Uint8Array {
  return textEncoder.encode(text);
}

/**
 * Decode UTF-8, throwing on invalid sequences
 */
export function utf8Decode(bytes: Uint8Array): string {
  return textDecoder.decode(bytes);
}

/**
 * Generate a unique transfer ID (8 bytes / 64 bits)
 */
export function generateTransferId(): Uint8Array {
  return secureRandomBytes(8);
}

/**
 * Convert transfer ID to string for display and map keys
 */
export function transferIdToString(id: Uint8Array): string {
  return bytesToHex(id);
}

/**
 * Convert string transfer ID back to bytes
 */
export function stringToTransferId(str: string): Uint8Array {
  const bytes = hexToBytes(str);
  if (bytes.length !== 8) {
    throw new Error('Invalid transfer ID length');
  }
  return bytes;
}
