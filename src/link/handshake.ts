import {
  PROTOCOL_VERSION,
  HELLO_FLAG_RESUME,
  HELLO_FLAG_WARM,
  HELLO_FLAG_ROTATE,
  HANDSHAKE_NONCE_SIZE,
  KEY_ID_SIZE,
  type HelloPayload,
  type HelloAckPayload,
} from '../codec/types.js';
import {
  keyId,
  deriveTrafficKeys,
  confirmationTag,
  handshakeTranscript,
  type KeyAgreement,
  type KeyAgreementState,
} from '../crypto/keys.js';
import { constantTimeEqual, secureRandomBytes } from '../crypto/utils.js';
import { HandshakeError, describeError } from '../errors.js';

/**
 * What one side brings to a handshake
 */
export interface HandshakeParams {
  agreement: KeyAgreement;
  /** Long-term key stored for this peer, if any */
  storedKey: Uint8Array | null;
  /** Sequence state from an earlier connection is still held */
  live: boolean;
  /** Our recvSeq: the peer's next sequence we expect */
  nextExpected: number;
}

export interface HandshakeResult {
  sessionKey: Uint8Array;
  /** A new long-term key was derived and must be persisted */
  fresh: boolean;
  /** Both sides keep their counters and replay their journals */
  warm: boolean;
  /** Peer's next expected sequence from us; meaningful only when warm */
  peerNextExpected: number;
  sendKey: Uint8Array;
  recvKey: Uint8Array;
}

const EMPTY = new Uint8Array(0);
const NO_KEY_ID = new Uint8Array(KEY_ID_SIZE);

function checkVersion(version: number): void {
  if (version !== PROTOCOL_VERSION) {
    throw new HandshakeError(
      'VersionMismatch',
      `Peer speaks protocol version ${version}, expected ${PROTOCOL_VERSION}`
    );
  }
}

function deriveFresh(
  state: KeyAgreementState,
  peerPart: Uint8Array,
  transcript: Uint8Array
): Uint8Array {
  try {
    return state.derive(peerPart, transcript);
  } catch (error) {
    throw new HandshakeError('Malformed', `Key agreement failed: ${describeError(error)}`);
  }
}

/**
 * HOST side. Construct to get the HELLO, then complete with the HELLO_ACK.
 */
export class HostHandshake {
  readonly hello: HelloPayload;
  private readonly kex: KeyAgreementState;

  constructor(
    private readonly params: HandshakeParams,
    rotate = false
  ) {
    this.kex = params.agreement.begin();
    const resume = params.storedKey !== null && !rotate;

    let flags = 0;
    if (resume) flags |= HELLO_FLAG_RESUME;
    if (resume && params.live) flags |= HELLO_FLAG_WARM;
    if (rotate) flags |= HELLO_FLAG_ROTATE;

    this.hello = {
      version: PROTOCOL_VERSION,
      flags,
      keyId: resume && params.storedKey ? keyId(params.storedKey) : NO_KEY_ID,
      nonce: secureRandomBytes(HANDSHAKE_NONCE_SIZE),
      nextExpected: params.nextExpected,
      keyExchange: this.kex.publicPart,
    };
  }

  /**
   * @throws HandshakeError when the client's answer does not check out
   */
  complete(ack: HelloAckPayload): HandshakeResult {
    checkVersion(ack.version);

    const resumed = (ack.flags & HELLO_FLAG_RESUME) !== 0;
    const warm = (ack.flags & HELLO_FLAG_WARM) !== 0;
    const offeredResume = (this.hello.flags & HELLO_FLAG_RESUME) !== 0;
    const offeredWarm = (this.hello.flags & HELLO_FLAG_WARM) !== 0;

    let sessionKey: Uint8Array;
    if (resumed) {
      if (!offeredResume || !this.params.storedKey) {
        throw new HandshakeError('KeyMismatch', 'Client resumed a key that was not offered');
      }
      sessionKey = this.params.storedKey;
    } else {
      if (ack.keyExchange.length === 0) {
        throw new HandshakeError('Malformed', 'Client sent no key exchange for a fresh key');
      }
      const transcript = handshakeTranscript(
        this.hello.keyExchange,
        ack.keyExchange,
        this.hello.nonce,
        ack.nonce
      );
      sessionKey = deriveFresh(this.kex, ack.keyExchange, transcript);
    }

    if (warm && (!resumed || !offeredWarm)) {
      throw new HandshakeError('Malformed', 'Client claimed a warm resume that was not offered');
    }
    if (!constantTimeEqual(keyId(sessionKey), ack.keyId)) {
      throw new HandshakeError('KeyMismatch', 'Client key id does not match');
    }
    const expected = confirmationTag(sessionKey, this.hello.nonce, ack.nonce, ack.flags);
    if (!constantTimeEqual(expected, ack.confirm)) {
      throw new HandshakeError('KeyMismatch', 'Key confirmation failed');
    }

    const traffic = deriveTrafficKeys(sessionKey, this.hello.nonce, ack.nonce);
    return {
      sessionKey,
      fresh: !resumed,
      warm,
      peerNextExpected: ack.nextExpected,
      sendKey: traffic.hostToClient,
      recvKey: traffic.clientToHost,
    };
  }
}

/**
 * CLIENT side: decide between resumption and a fresh key, and build the
 * HELLO_ACK that proves which key we hold.
 *
 * @throws HandshakeError on a version mismatch or an unusable key exchange
 */
export function answerHello(
  hello: HelloPayload,
  params: HandshakeParams
): { ack: HelloAckPayload; result: HandshakeResult } {
  checkVersion(hello.version);

  const storedKey = params.storedKey;
  const resume =
    storedKey !== null &&
    (hello.flags & HELLO_FLAG_RESUME) !== 0 &&
    (hello.flags & HELLO_FLAG_ROTATE) === 0 &&
    constantTimeEqual(keyId(storedKey), hello.keyId);
  const warm = resume && (hello.flags & HELLO_FLAG_WARM) !== 0 && params.live;

  const nonce = secureRandomBytes(HANDSHAKE_NONCE_SIZE);
  let sessionKey: Uint8Array;
  let keyExchange: Uint8Array = EMPTY;

  if (resume && storedKey) {
    sessionKey = storedKey;
  } else {
    if (hello.keyExchange.length === 0) {
      throw new HandshakeError('Malformed', 'Host sent no key exchange');
    }
    const kex = params.agreement.begin();
    keyExchange = kex.publicPart;
    const transcript = handshakeTranscript(hello.keyExchange, keyExchange, hello.nonce, nonce);
    sessionKey = deriveFresh(kex, hello.keyExchange, transcript);
  }

  const flags = (resume ? HELLO_FLAG_RESUME : 0) | (warm ? HELLO_FLAG_WARM : 0);
  const traffic = deriveTrafficKeys(sessionKey, hello.nonce, nonce);

  return {
    ack: {
      version: PROTOCOL_VERSION,
      flags,
      keyId: keyId(sessionKey),
      nonce,
      nextExpected: warm ? params.nextExpected : 0,
      keyExchange,
      confirm: confirmationTag(sessionKey, hello.nonce, nonce, flags),
    },
    result: {
      sessionKey,
      fresh: !resume,
      warm,
      peerNextExpected: hello.nextExpected,
      sendKey: traffic.clientToHost,
      recvKey: traffic.hostToClient,
    },
  };
}
