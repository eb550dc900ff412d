import { describe, it, expect } from 'vitest';
import { HostHandshake, answerHello, type HandshakeParams } from '../src/link/handshake.js';
import { X25519Agreement, PreSharedKeyAgreement, bytesToHex, keyId } from '../src/crypto/index.js';
import { HELLO_FLAG_RESUME, HELLO_FLAG_WARM, HELLO_FLAG_ROTATE } from '../src/codec/index.js';
import { HandshakeError, type HandshakeFailure } from '../src/errors.js';

const agreement = new X25519Agreement();
const storedKey = new Uint8Array(32).fill(0x42);

function params(overrides: Partial<HandshakeParams> = {}): HandshakeParams {
  return { agreement, storedKey: null, live: false, nextExpected: 0, ...overrides };
}

function failureOf(action: () => unknown): { reason: HandshakeFailure; message: string } {
  try {
    action();
  } catch (error) {
    if (error instanceof HandshakeError) {
      return { reason: error.reason, message: error.message };
    }
    throw error;
  }
  throw new Error('Expected a handshake failure');
}

describe('Handshake', () => {
  describe('fresh key', () => {
    it('should agree on a new key when neither side holds one', () => {
      const host = new HostHandshake(params());
      expect(host.hello.flags).toBe(0);
      expect(bytesToHex(host.hello.keyId)).toBe('0000000000000000');

      const { ack, result: client } = answerHello(host.hello, params());
      const hostResult = host.complete(ack);

      expect(client.fresh).toBe(true);
      expect(hostResult.fresh).toBe(true);
      expect(hostResult.warm).toBe(false);
      expect(bytesToHex(hostResult.sessionKey)).toBe(bytesToHex(client.sessionKey));
      expect(bytesToHex(hostResult.sendKey)).toBe(bytesToHex(client.recvKey));
      expect(bytesToHex(hostResult.recvKey)).toBe(bytesToHex(client.sendKey));
      expect(bytesToHex(hostResult.sendKey)).not.toBe(bytesToHex(hostResult.recvKey));
    });

    it('should fall back to a fresh key when the client holds a different one', () => {
      const host = new HostHandshake(params({ storedKey }));
      const { ack, result: client } = answerHello(host.hello, params({ storedKey: new Uint8Array(32) }));
      const hostResult = host.complete(ack);

      expect(ack.flags).toBe(0);
      expect(client.fresh).toBe(true);
      expect(hostResult.fresh).toBe(true);
      expect(bytesToHex(hostResult.sessionKey)).not.toBe(bytesToHex(storedKey));
    });

    it('should agree with matching pre-shared secrets', () => {
      const psk = new PreSharedKeyAgreement('test-secret-alpha');
      const host = new HostHandshake(params({ agreement: psk }));
      const { ack, result } = answerHello(host.hello, params({ agreement: new PreSharedKeyAgreement('test-secret-alpha') }));
      expect(bytesToHex(host.complete(ack).sessionKey)).toBe(bytesToHex(result.sessionKey));
    });

    it('should fail with KeyMismatch on different pre-shared secrets', () => {
      const host = new HostHandshake(params({ agreement: new PreSharedKeyAgreement('test-secret-alpha') }));
      const { ack } = answerHello(
        host.hello,
        params({ agreement: new PreSharedKeyAgreement('test-secret-bravo') })
      );

      expect(failureOf(() => host.complete(ack))).toEqual({
        reason: 'KeyMismatch',
        message: 'Client key id does not match',
      });
    });
  });

  describe('resumption', () => {
    it('should resume warm when both sides hold the key and live state', () => {
      const host = new HostHandshake(params({ storedKey, live: true, nextExpected: 3 }));
      expect(host.hello.flags).toBe(HELLO_FLAG_RESUME | HELLO_FLAG_WARM);
      expect(bytesToHex(host.hello.keyId)).toBe(bytesToHex(keyId(storedKey)));

      const { ack, result: client } = answerHello(host.hello, params({ storedKey, live: true, nextExpected: 5 }));
      expect(ack.keyExchange.length).toBe(0);
      expect(ack.nextExpected).toBe(5);

      const hostResult = host.complete(ack);
      expect(hostResult.warm).toBe(true);
      expect(hostResult.fresh).toBe(false);
      expect(hostResult.peerNextExpected).toBe(5);
      expect(client.warm).toBe(true);
      expect(client.peerNextExpected).toBe(3);
      expect(bytesToHex(hostResult.sessionKey)).toBe(bytesToHex(storedKey));
    });

    it('should derive new traffic keys on every resume', () => {
      const first = new HostHandshake(params({ storedKey }));
      const second = new HostHandshake(params({ storedKey }));
      const a = first.complete(answerHello(first.hello, params({ storedKey })).ack);
      const b = second.complete(answerHello(second.hello, params({ storedKey })).ack);
      expect(bytesToHex(a.sendKey)).not.toBe(bytesToHex(b.sendKey));
    });

    it('should resume cold when the client lost its sequence state', () => {
      const host = new HostHandshake(params({ storedKey, live: true, nextExpected: 3 }));
      const { ack, result: client } = answerHello(host.hello, params({ storedKey, live: false }));

      expect(ack.flags).toBe(HELLO_FLAG_RESUME);
      expect(ack.nextExpected).toBe(0);
      expect(client.warm).toBe(false);
      expect(host.complete(ack).warm).toBe(false);
    });

    it('should resume cold when the host lost its sequence state', () => {
      const host = new HostHandshake(params({ storedKey, live: false }));
      expect(host.hello.flags).toBe(HELLO_FLAG_RESUME);

      const { ack, result } = answerHello(host.hello, params({ storedKey, live: true, nextExpected: 9 }));
      expect(result.warm).toBe(false);
      expect(host.complete(ack).warm).toBe(false);
    });
  });

  describe('rotation', () => {
    it('should derive a fresh key even when both sides hold one', () => {
      const host = new HostHandshake(params({ storedKey, live: true }), true);
      expect(host.hello.flags).toBe(HELLO_FLAG_ROTATE);
      expect(bytesToHex(host.hello.keyId)).toBe('0000000000000000');

      const { ack, result: client } = answerHello(host.hello, params({ storedKey, live: true }));
      const hostResult = host.complete(ack);

      expect(client.fresh).toBe(true);
      expect(hostResult.fresh).toBe(true);
      expect(hostResult.warm).toBe(false);
      expect(bytesToHex(hostResult.sessionKey)).not.toBe(bytesToHex(storedKey));
    });
  });

  describe('failures', () => {
    it('should reject a different protocol version from the host', () => {
      const host = new HostHandshake(params());
      expect(failureOf(() => answerHello({ ...host.hello, version: 2 }, params())).reason).toBe('VersionMismatch');
    });

    it('should reject a different protocol version from the client', () => {
      const host = new HostHandshake(params());
      const { ack } = answerHello(host.hello, params());
      expect(failureOf(() => host.complete({ ...ack, version: 9 })).reason).toBe('VersionMismatch');
    });

    it('should reject a bad confirmation tag', () => {
      const host = new HostHandshake(params());
      const { ack } = answerHello(host.hello, params());
      const confirm = ack.confirm.slice();
      confirm[0] ^= 0xff;

      expect(failureOf(() => host.complete({ ...ack, confirm }))).toEqual({
        reason: 'KeyMismatch',
        message: 'Key confirmation failed',
      });
    });

    it('should reject a resume the host did not offer', () => {
      const host = new HostHandshake(params());
      const { ack } = answerHello(host.hello, params());
      expect(failureOf(() => host.complete({ ...ack, flags: HELLO_FLAG_RESUME }))).toEqual({
        reason: 'KeyMismatch',
        message: 'Client resumed a key that was not offered',
      });
    });

    it('should reject a warm resume the host did not offer', () => {
      const host = new HostHandshake(params({ storedKey, live: false }));
      const { ack } = answerHello(host.hello, params({ storedKey }));
      expect(failureOf(() => host.complete({ ...ack, flags: HELLO_FLAG_RESUME | HELLO_FLAG_WARM })).reason).toBe(
        'Malformed'
      );
    });

    it('should reject a fresh answer without a key exchange', () => {
      const host = new HostHandshake(params());
      const { ack } = answerHello(host.hello, params());
      expect(failureOf(() => host.complete({ ...ack, keyExchange: new Uint8Array(0) }))).toEqual({
        reason: 'Malformed',
        message: 'Client sent no key exchange for a fresh key',
      });
    });

    it('should reject a hello without a key exchange when a fresh key is needed', () => {
      const host = new HostHandshake(params());
      expect(failureOf(() => answerHello({ ...host.hello, keyExchange: new Uint8Array(0) }, params()))).toEqual({
        reason: 'Malformed',
        message: 'Host sent no key exchange',
      });
    });

    it('should report an unusable key exchange as malformed', () => {
      const host = new HostHandshake(params());
      const failure = failureOf(() => answerHello({ ...host.hello, keyExchange: new Uint8Array(5) }, params()));
      expect(failure.reason).toBe('Malformed');
      expect(failure.message).toBe('Key agreement failed: Invalid X25519 public key length: 5');
    });
  });
});
