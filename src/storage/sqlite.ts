import Database from 'better-sqlite3';
import { chmodSync, existsSync } from 'node:fs';
import type { KeyStore, PeerKeyRecord } from './adapter.js';
import { keyId } from '../crypto/keys.js';
import { bytesToHex } from '../crypto/utils.js';
import { KEY_SIZE } from '../crypto/encryption.js';

interface PeerKeyRow {
  peer_address: string;
  key: Buffer;
  key_id: string;
  created_at: number;
  updated_at: number;
}

/**
 * Owner read/write only
 */
const KEY_FILE_MODE = 0o600;

/**
 * SQLite key store. On-disk databases (and their WAL/SHM side files) are
 * restricted to the owning user.
 */
export class SQLiteKeyStore implements KeyStore {
  private db: Database.Database;
  private readonly dbPath: string;

  constructor(dbPath: string = ':memory:') {
    this.dbPath = dbPath;
    this.db = new Database(dbPath);
    this.initialize();
    this.restrictPermissions();
  }

  private initialize(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS peer_keys (
        peer_address  TEXT PRIMARY KEY,
        key           BLOB NOT NULL,
        key_id        TEXT NOT NULL,
        created_at    INTEGER NOT NULL,
        updated_at    INTEGER NOT NULL
      );
    `);
  }

  private restrictPermissions(): void {
    if (this.dbPath === ':memory:' || this.dbPath === '') {
      return;
    }
    for (const path of [this.dbPath, `${this.dbPath}-wal`, `${this.dbPath}-shm`]) {
      if (existsSync(path)) {
        chmodSync(path, KEY_FILE_MODE);
      }
    }
  }

  async getKey(peerAddress: string): Promise<PeerKeyRecord | null> {
    const row = this.db
      .prepare(
        `SELECT peer_address, key, key_id, created_at, updated_at
         FROM peer_keys
         WHERE peer_address = ?`
      )
      .get(peerAddress) as PeerKeyRow | undefined;

    return row ? toRecord(row) : null;
  }

  async saveKey(peerAddress: string, key: Uint8Array): Promise<PeerKeyRecord> {
    if (key.length !== KEY_SIZE) {
      throw new Error(`Invalid key length: expected ${KEY_SIZE} bytes, got ${key.length}`);
    }

    const now = Date.now();
    const id = bytesToHex(keyId(key));

    this.db
      .prepare(
        `INSERT INTO peer_keys (peer_address, key, key_id, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?)
         ON CONFLICT(peer_address) DO UPDATE SET
           key = excluded.key,
           key_id = excluded.key_id,
           updated_at = excluded.updated_at`
      )
      .run(peerAddress, Buffer.from(key), id, now, now);

    this.restrictPermissions();

    const stored = await this.getKey(peerAddress);
    if (!stored) {
      throw new Error(`Key for ${peerAddress} was not persisted`);
    }
    return stored;
  }

  async deleteKey(peerAddress: string): Promise<boolean> {
    const result = this.db.prepare('DELETE FROM peer_keys WHERE peer_address = ?').run(peerAddress);
    return result.changes > 0;
  }

  async listPeers(): Promise<string[]> {
    const rows = this.db
      .prepare('SELECT peer_address FROM peer_keys ORDER BY peer_address ASC')
      .all() as { peer_address: string }[];
    return rows.map((row) => row.peer_address);
  }

  async close(): Promise<void> {
    if (this.db.open) {
      this.db.close();
    }
  }
}

function toRecord(row: PeerKeyRow): PeerKeyRecord {
  return {
    peerAddress: row.peer_address,
    key: new Uint8Array(row.key),
    keyId: row.key_id,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}
