import { x25519 } from '@noble/curves/ed25519';
import { hkdf } from '@noble/hashes/hkdf';
import { hmac } from '@noble/hashes/hmac';
import { sha256 } from '@noble/hashes/sha256';
import { DOMAIN_SEPARATOR, concatBytes, secureRandomBytes, utf8Encode } from './utils.js';
import { KEY_SIZE } from './encryption.js';
import { KEY_ID_SIZE } from '../codec/types.js';

/**
 * One side of a key agreement for a single handshake
 */
export interface KeyAgreementState {
  /** Contribution sent to the peer in HELLO / HELLO_ACK */
  readonly publicPart: Uint8Array;
  /**
   * Derive the 32-byte session key from the peer's contribution
   * @param transcript - Bytes both sides agree on (contributions and nonces)
   * @throws Error if the peer contribution is unusable
   */
  derive(peerPublicPart: Uint8Array, transcript: Uint8Array): Uint8Array;
}

/**
 * Pluggable key establishment. Any scheme producing the same 32 bytes on both
 * sides from the exchanged contributions fits.
 */
export interface KeyAgreement {
  readonly name: string;
  begin(): KeyAgreementState;
}

function deriveSessionKey(secret: Uint8Array, transcript: Uint8Array, label: string): Uint8Array {
  return hkdf(sha256, secret, transcript, utf8Encode(`${DOMAIN_SEPARATOR}-${label}`), KEY_SIZE);
}

/**
 * Ephemeral X25519 ECDH, expanded with HKDF-SHA256
 */
export class X25519Agreement implements KeyAgreement {
  readonly name = 'x25519';

  begin(): KeyAgreementState {
    const privateKey = x25519.utils.randomPrivateKey();
    const publicPart = x25519.getPublicKey(privateKey);

    return {
      publicPart,
      derive(peerPublicPart: Uint8Array, transcript: Uint8Array): Uint8Array {
        if (peerPublicPart.length !== 32) {
          throw new Error(`Invalid X25519 public key length: ${peerPublicPart.length}`);
        }
        const shared = x25519.getSharedSecret(privateKey, peerPublicPart);
        return deriveSessionKey(shared, transcript, 'session');
      },
    };
  }
}

/**
 * Pre-shared secret: each side contributes a random salt and the session key
 * is HKDF(psk, transcript). Peers with different secrets fail key confirmation.
 */
export class PreSharedKeyAgreement implements KeyAgreement {
  readonly name = 'psk';
  private readonly secret: Uint8Array;

  constructor(secret: Uint8Array | string) {
    this.secret = typeof secret === 'string' ? utf8Encode(secret) : secret.slice();
    if (this.secret.length < 16) {
      throw new Error('Pre-shared secret must be at least 16 bytes');
    }
  }

  begin(): KeyAgreementState {
    const secret = this.secret;
    return {
      publicPart: secureRandomBytes(32),
      derive(peerPublicPart: Uint8Array, transcript: Uint8Array): Uint8Array {
        if (peerPublicPart.length !== 32) {
          throw new Error(`Invalid PSK salt length: ${peerPublicPart.length}`);
        }
        return deriveSessionKey(secret, transcript, 'psk-session');
      },
    };
  }
}

/**
 * Short public identifier of a key, sent in the handshake to offer resumption
 */
export function keyId(key: Uint8Array): Uint8Array {
  return sha256(concatBytes(utf8Encode(`${DOMAIN_SEPARATOR}-key-id`), key)).slice(0, KEY_ID_SIZE);
}

export interface TrafficKeys {
  hostToClient: Uint8Array;
  clientToHost: Uint8Array;
}

/**
 * Per-connection, per-direction keys. Fresh handshake nonces on every
 * connection mean no (key, nonce) pair repeats even when sequences continue.
 */
export function deriveTrafficKeys(
  sessionKey: Uint8Array,
  hostNonce: Uint8Array,
  clientNonce: Uint8Array
): TrafficKeys {
  const salt = concatBytes(hostNonce, clientNonce);
  return {
    hostToClient: hkdf(sha256, sessionKey, salt, utf8Encode(`${DOMAIN_SEPARATOR}-host-to-client`), KEY_SIZE),
    clientToHost: hkdf(sha256, sessionKey, salt, utf8Encode(`${DOMAIN_SEPARATOR}-client-to-host`), KEY_SIZE),
  };
}

/**
 * Proof that the client holds the same session key as the host
 */
export function confirmationTag(
  sessionKey: Uint8Array,
  hostNonce: Uint8Array,
  clientNonce: Uint8Array,
  flags: number
): Uint8Array {
  return hmac(
    sha256,
    sessionKey,
    concatBytes(utf8Encode(`${DOMAIN_SEPARATOR}-confirm`), hostNonce, clientNonce, new Uint8Array([flags]))
  );
}

/**
 * Transcript for fresh key derivation: both contributions and both nonces
 */
export function handshakeTranscript(
  hostPart: Uint8Array,
  clientPart: Uint8Array,
  hostNonce: Uint8Array,
  clientNonce: Uint8Array
): Uint8Array {
  return concatBytes(hostPart, clientPart, hostNonce, clientNonce);
}
