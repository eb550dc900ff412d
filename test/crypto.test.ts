import { describe, it, expect } from 'vitest';
import {
  X25519Agreement,
  PreSharedKeyAgreement,
  keyId,
  deriveTrafficKeys,
  confirmationTag,
  handshakeTranscript,
  hexToBytes,
  bytesToHex,
  utf8Encode,
  utf8Decode,
  secureRandomBytes,
  constantTimeEqual,
  concatBytes,
  generateTransferId,
  transferIdToString,
  stringToTransferId,
  type KeyAgreement,
} from '../src/crypto/index.js';
import { encrypt, decrypt, frameAad, CryptoEnvelope, SEAL_OVERHEAD } from '../src/crypto/encryption.js';
import { FrameType } from '../src/codec/index.js';

function agree(agreement: KeyAgreement, other: KeyAgreement = agreement): [Uint8Array, Uint8Array] {
  const host = agreement.begin();
  const client = other.begin();
  const hostNonce = secureRandomBytes(16);
  const clientNonce = secureRandomBytes(16);
  const transcript = handshakeTranscript(host.publicPart, client.publicPart, hostNonce, clientNonce);
  return [host.derive(client.publicPart, transcript), client.derive(host.publicPart, transcript)];
}

describe('Crypto Utils', () => {
  describe('hexToBytes / bytesToHex', () => {
    it('should convert hex to bytes and back', () => {
      const hex = 'deadbeef0102030405060708090a0b0c0d0e0f';
      const bytes = hexToBytes(hex);
      expect(bytesToHex(bytes)).toBe(hex);
    });

    it('should handle 0x prefix', () => {
      const bytes = hexToBytes('0xdeadbeef');
      expect(bytesToHex(bytes)).toBe('deadbeef');
    });

    it('should throw on invalid hex length', () => {
      expect(() => hexToBytes('abc')).toThrow('Invalid hex string length');
    });

    it('should throw on non-hex characters', () => {
      expect(() => hexToBytes('zz')).toThrow('Invalid hex string');
    });
  });

  describe('utf8Encode / utf8Decode', () => {
    it('should round-trip multi-byte text', () => {
      expect(utf8Decode(utf8Encode('héllo ✓'))).toBe('héllo ✓');
    });

    it('should reject invalid UTF-8', () => {
      expect(() => utf8Decode(new Uint8Array([0xc3, 0x28]))).toThrow();
    });
  });

  describe('constantTimeEqual / concatBytes', () => {
    it('should compare contents and lengths', () => {
      expect(constantTimeEqual(hexToBytes('0102'), hexToBytes('0102'))).toBe(true);
      expect(constantTimeEqual(hexToBytes('0102'), hexToBytes('0103'))).toBe(false);
      expect(constantTimeEqual(hexToBytes('0102'), hexToBytes('010200'))).toBe(false);
    });

    it('should concatenate in order', () => {
      expect(bytesToHex(concatBytes(hexToBytes('01'), new Uint8Array(0), hexToBytes('0203')))).toBe('010203');
    });
  });

  describe('transfer IDs', () => {
    it('should generate 8-byte IDs', () => {
      expect(generateTransferId().length).toBe(8);
    });

    it('should convert to string and back', () => {
      const id = generateTransferId();
      const str = transferIdToString(id);
      expect(str.length).toBe(16);
      expect(bytesToHex(stringToTransferId(str))).toBe(str);
    });

    it('should reject IDs of the wrong length', () => {
      expect(() => stringToTransferId('0102')).toThrow('Invalid transfer ID length');
    });
  });
});

describe('Encryption', () => {
  const key = new Uint8Array(32).fill(7);
  const nonce = new Uint8Array(12).fill(1);

  describe('encrypt / decrypt', () => {
    it('should decrypt what it encrypts', () => {
      const ciphertext = encrypt(key, nonce, utf8Encode('secret'));
      expect(ciphertext.length).toBe(6 + 16);
      expect(utf8Decode(decrypt(key, nonce, ciphertext))).toBe('secret');
    });

    it('should reject a key of the wrong size', () => {
      expect(() => encrypt(new Uint8Array(16), nonce, new Uint8Array(1))).toThrow(
        'Invalid key length: expected 32 bytes for AES-256'
      );
    });

    it('should fail to decrypt with different additional data', () => {
      const ciphertext = encrypt(key, nonce, utf8Encode('secret'), hexToBytes('01'));
      expect(() => decrypt(key, nonce, ciphertext, hexToBytes('02'))).toThrow();
    });
  });

  describe('frameAad', () => {
    it('should bind frame type and sequence', () => {
      expect(bytesToHex(frameAad(FrameType.DATA_TEXT, 258))).toBe('100000000000000102');
    });
  });

  describe('CryptoEnvelope', () => {
    const envelope = new CryptoEnvelope(key);
    const aad = frameAad(FrameType.DATA_TEXT, 5);

    it('should seal with the sequence in the nonce', () => {
      const sealed = envelope.seal(utf8Encode('hello'), 5, aad);
      expect(sealed.length).toBe(5 + SEAL_OVERHEAD);
      expect(bytesToHex(sealed.subarray(4, 12))).toBe('0000000000000005');

      const opened = envelope.open(sealed, 5, aad);
      expect(opened.ok).toBe(true);
      if (opened.ok) {
        expect(utf8Decode(opened.value)).toBe('hello');
      }
    });

    it('should never reuse a nonce for the same sequence', () => {
      const a = envelope.seal(utf8Encode('x'), 1);
      const b = envelope.seal(utf8Encode('x'), 1);
      expect(bytesToHex(a)).not.toBe(bytesToHex(b));
    });

    it('should reject a payload sealed for another sequence', () => {
      const sealed = envelope.seal(utf8Encode('hello'), 5, aad);
      const opened = envelope.open(sealed, 6, aad);
      expect(opened.ok).toBe(false);
      if (!opened.ok) {
        expect(opened.error.message).toBe('Nonce sequence 5 does not match frame 6');
      }
    });

    it('should reject a payload bound to another frame type', () => {
      const sealed = envelope.seal(utf8Encode('hello'), 5, aad);
      const opened = envelope.open(sealed, 5, frameAad(FrameType.PING, 5));
      expect(opened.ok).toBe(false);
      if (!opened.ok) {
        expect(opened.error.kind).toBe('AuthFailure');
        expect(opened.error.message).toBe('Authentication failed');
      }
    });

    it('should reject tampered ciphertext', () => {
      const sealed = envelope.seal(utf8Encode('hello'), 5, aad);
      sealed[14] ^= 0x01;
      expect(envelope.open(sealed, 5, aad).ok).toBe(false);
    });

    it('should reject a payload opened with another key', () => {
      const sealed = envelope.seal(utf8Encode('hello'), 5, aad);
      const other = new CryptoEnvelope(new Uint8Array(32).fill(8));
      expect(other.open(sealed, 5, aad).ok).toBe(false);
    });

    it('should reject a payload too short to hold nonce and tag', () => {
      const opened = envelope.open(new Uint8Array(SEAL_OVERHEAD - 1), 0);
      expect(opened.ok).toBe(false);
      if (!opened.ok) {
        expect(opened.error.message).toBe('Sealed payload too short to contain nonce and tag');
      }
    });
  });
});

describe('Key Agreement', () => {
  describe('X25519Agreement', () => {
    it('should derive the same 32-byte key on both sides', () => {
      const [hostKey, clientKey] = agree(new X25519Agreement());
      expect(hostKey.length).toBe(32);
      expect(bytesToHex(hostKey)).toBe(bytesToHex(clientKey));
    });

    it('should derive a different key for every handshake', () => {
      const agreement = new X25519Agreement();
      const [first] = agree(agreement);
      const [second] = agree(agreement);
      expect(bytesToHex(first)).not.toBe(bytesToHex(second));
    });

    it('should reject a malformed peer contribution', () => {
      const state = new X25519Agreement().begin();
      expect(() => state.derive(new Uint8Array(31), new Uint8Array(0))).toThrow(
        'Invalid X25519 public key length: 31'
      );
    });
  });

  describe('PreSharedKeyAgreement', () => {
    it('should derive the same key from the same secret', () => {
      const [hostKey, clientKey] = agree(new PreSharedKeyAgreement('test-secret-value'));
      expect(bytesToHex(hostKey)).toBe(bytesToHex(clientKey));
    });

    it('should derive different keys from different secrets', () => {
      const [hostKey, clientKey] = agree(
        new PreSharedKeyAgreement('test-secret-value'),
        new PreSharedKeyAgreement('other-secret-value')
      );
      expect(bytesToHex(hostKey)).not.toBe(bytesToHex(clientKey));
    });

    it('should refuse a short secret', () => {
      expect(() => new PreSharedKeyAgreement('short')).toThrow('Pre-shared secret must be at least 16 bytes');
    });
  });

  describe('keyId', () => {
    it('should be 8 bytes and stable for a key', () => {
      const key = new Uint8Array(32).fill(3);
      expect(keyId(key).length).toBe(8);
      expect(bytesToHex(keyId(key))).toBe(bytesToHex(keyId(key.slice())));
      expect(bytesToHex(keyId(key))).not.toBe(bytesToHex(keyId(new Uint8Array(32).fill(4))));
    });
  });

  describe('deriveTrafficKeys', () => {
    it('should give each direction its own key', () => {
      const keys = deriveTrafficKeys(new Uint8Array(32).fill(9), new Uint8Array(16), new Uint8Array(16).fill(1));
      expect(keys.hostToClient.length).toBe(32);
      expect(bytesToHex(keys.hostToClient)).not.toBe(bytesToHex(keys.clientToHost));
    });

    it('should change with the handshake nonces', () => {
      const sessionKey = new Uint8Array(32).fill(9);
      const a = deriveTrafficKeys(sessionKey, new Uint8Array(16), new Uint8Array(16));
      const b = deriveTrafficKeys(sessionKey, new Uint8Array(16), new Uint8Array(16).fill(2));
      expect(bytesToHex(a.clientToHost)).not.toBe(bytesToHex(b.clientToHost));
    });
  });

  describe('confirmationTag', () => {
    it('should depend on the key and the flags', () => {
      const hostNonce = new Uint8Array(16).fill(1);
      const clientNonce = new Uint8Array(16).fill(2);
      const base = confirmationTag(new Uint8Array(32), hostNonce, clientNonce, 0);
      expect(base.length).toBe(32);
      expect(bytesToHex(confirmationTag(new Uint8Array(32), hostNonce, clientNonce, 0))).toBe(bytesToHex(base));
      expect(bytesToHex(confirmationTag(new Uint8Array(32).fill(1), hostNonce, clientNonce, 0))).not.toBe(
        bytesToHex(base)
      );
      expect(bytesToHex(confirmationTag(new Uint8Array(32), hostNonce, clientNonce, 1))).not.toBe(bytesToHex(base));
    });
  });
});
