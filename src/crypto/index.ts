export {
  DOMAIN_SEPARATOR,
  secureRandomBytes,
  concatBytes,
  constantTimeEqual,
  hexToBytes,
  bytesToHex,
  utf8Encode,
  utf8Decode,
  generateTransferId,
  transferIdToString,
  stringToTransferId,
} from './utils.js';

export {
  type KeyAgreement,
  type KeyAgreementState,
  type TrafficKeys,
  X25519Agreement,
  PreSharedKeyAgreement,
  keyId,
  deriveTrafficKeys,
  confirmationTag,
  handshakeTranscript,
} from './keys.js';

export {
  NONCE_SIZE,
  TAG_SIZE,
  NONCE_SALT_SIZE,
  SEAL_OVERHEAD,
  KEY_SIZE,
  encrypt,
  decrypt,
  frameAad,
  CryptoEnvelope,
} from './encryption.js';
