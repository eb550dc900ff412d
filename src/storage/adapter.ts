/**
 * Persisted key material for one peer
 */
export interface PeerKeyRecord {
  peerAddress: string;  // Stable transport address (e.g. Bluetooth MAC)
  key: Uint8Array;      // 32-byte long-term session key
  keyId: string;        // Hex key identifier offered during resumption
  createdAt: number;    // Unix timestamp in milliseconds
  updatedAt: number;
}

/**
 * Keyed mapping of peer address -> key bytes.
 * Implementations can use SQLite, an OS keychain, or anything else.
 */
export interface KeyStore {
  /**
   * Key for a peer, or null when none is stored
   */
  getKey(peerAddress: string): Promise<PeerKeyRecord | null>;

  /**
   * Store or replace a peer's key
   */
  saveKey(peerAddress: string, key: Uint8Array): Promise<PeerKeyRecord>;

  /**
   * Forget a peer's key (rotation or unpairing)
   */
  deleteKey(peerAddress: string): Promise<boolean>;

  /**
   * Addresses with stored keys
   */
  listPeers(): Promise<string[]>;

  close(): Promise<void>;
}
