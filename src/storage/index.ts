export type { KeyStore, PeerKeyRecord } from './adapter.js';

export { SQLiteKeyStore } from './sqlite.js';
