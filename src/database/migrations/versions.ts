/**
 * Local store schema versions.
 *
 * Creates the device-store tables the messaging client persists its
 * session state in. Append-only: add a new version, never edit an old one.
 */
import type Database from "better-sqlite3";
import type { Migration } from "./types.js";

export const LOCAL_TABLES = [
  "_migration_history",
  "devices",
  "identity_keys",
  "pre_keys",
  "sessions",
  "sender_keys",
  "app_state_sync_keys",
  "app_state_versions",
  "app_state_mutation_macs",
  "contacts",
  "chat_settings",
  "message_secrets",
  "privacy_tokens",
  "lid_map",
] as const;

function hasColumn(db: Database.Database, table: string, column: string): boolean {
  const row = db
    .prepare<[string, string], { present: number }>(
      "SELECT COUNT(*) AS present FROM pragma_table_info(?) WHERE name = ?",
    )
    .get(table, column);
  return (row?.present ?? 0) > 0;
}

export const MIGRATIONS: readonly Migration[] = [
  {
    version: 1,
    name: "device_store",
    description: "Device, key and session tables",
    up: `
      CREATE TABLE IF NOT EXISTS _migration_history (
        version INTEGER PRIMARY KEY,
        name TEXT NOT NULL,
        duration_ms INTEGER,
        applied_at DATETIME DEFAULT CURRENT_TIMESTAMP
      );

      CREATE TABLE IF NOT EXISTS devices (
        jid TEXT PRIMARY KEY,
        lid TEXT,
        registration_id INTEGER NOT NULL CHECK (registration_id >= 0 AND registration_id < 4294967296),
        noise_key BLOB NOT NULL CHECK (length(noise_key) = 32),
        identity_key BLOB NOT NULL CHECK (length(identity_key) = 32),
        signed_pre_key BLOB NOT NULL CHECK (length(signed_pre_key) = 32),
        signed_pre_key_id INTEGER NOT NULL CHECK (signed_pre_key_id >= 0 AND signed_pre_key_id < 16777216),
        signed_pre_key_sig BLOB NOT NULL CHECK (length(signed_pre_key_sig) = 64),
        adv_key BLOB NOT NULL,
        adv_details BLOB NOT NULL,
        adv_account_sig BLOB NOT NULL CHECK (length(adv_account_sig) = 64),
        adv_account_sig_key BLOB CHECK (length(adv_account_sig_key) = 32),
        adv_device_sig BLOB NOT NULL CHECK (length(adv_device_sig) = 64),
        platform TEXT NOT NULL DEFAULT '',
        business_name TEXT NOT NULL DEFAULT '',
        push_name TEXT NOT NULL DEFAULT ''
      );

      CREATE TABLE IF NOT EXISTS identity_keys (
        our_jid TEXT,
        their_id TEXT,
        identity BLOB NOT NULL CHECK (length(identity) = 32),
        PRIMARY KEY (our_jid, their_id),
        FOREIGN KEY (our_jid) REFERENCES devices(jid) ON DELETE CASCADE ON UPDATE CASCADE
      );

      CREATE TABLE IF NOT EXISTS pre_keys (
        jid TEXT,
        key_id INTEGER CHECK (key_id >= 0 AND key_id < 16777216),
        key BLOB NOT NULL CHECK (length(key) = 32),
        uploaded BOOLEAN NOT NULL DEFAULT false,
        PRIMARY KEY (jid, key_id),
        FOREIGN KEY (jid) REFERENCES devices(jid) ON DELETE CASCADE ON UPDATE CASCADE
      );

      CREATE TABLE IF NOT EXISTS sessions (
        our_jid TEXT,
        their_id TEXT,
        session BLOB,
        PRIMARY KEY (our_jid, their_id),
        FOREIGN KEY (our_jid) REFERENCES devices(jid) ON DELETE CASCADE ON UPDATE CASCADE
      );

      CREATE TABLE IF NOT EXISTS sender_keys (
        our_jid TEXT,
        chat_id TEXT,
        sender_id TEXT,
        sender_key BLOB NOT NULL,
        PRIMARY KEY (our_jid, chat_id, sender_id),
        FOREIGN KEY (our_jid) REFERENCES devices(jid) ON DELETE CASCADE ON UPDATE CASCADE
      );

      CREATE TABLE IF NOT EXISTS app_state_sync_keys (
        jid TEXT,
        key_id BLOB,
        key_data BLOB NOT NULL,
        timestamp BIGINT NOT NULL,
        fingerprint BLOB NOT NULL,
        PRIMARY KEY (jid, key_id),
        FOREIGN KEY (jid) REFERENCES devices(jid) ON DELETE CASCADE ON UPDATE CASCADE
      );

      CREATE TABLE IF NOT EXISTS app_state_versions (
        jid TEXT,
        name TEXT,
        version BIGINT NOT NULL,
        hash BLOB NOT NULL CHECK (length(hash) = 128),
        PRIMARY KEY (jid, name),
        FOREIGN KEY (jid) REFERENCES devices(jid) ON DELETE CASCADE ON UPDATE CASCADE
      );

      CREATE TABLE IF NOT EXISTS app_state_mutation_macs (
        jid TEXT,
        name TEXT,
        version BIGINT,
        index_mac BLOB CHECK (length(index_mac) = 32),
        value_mac BLOB NOT NULL CHECK (length(value_mac) = 32),
        PRIMARY KEY (jid, name, version, index_mac),
        FOREIGN KEY (jid, name) REFERENCES app_state_versions(jid, name) ON DELETE CASCADE ON UPDATE CASCADE
      );

      CREATE TABLE IF NOT EXISTS contacts (
        our_jid TEXT,
        their_jid TEXT,
        first_name TEXT,
        full_name TEXT,
        push_name TEXT,
        business_name TEXT,
        PRIMARY KEY (our_jid, their_jid),
        FOREIGN KEY (our_jid) REFERENCES devices(jid) ON DELETE CASCADE ON UPDATE CASCADE
      );

      CREATE TABLE IF NOT EXISTS chat_settings (
        our_jid TEXT,
        chat_jid TEXT,
        muted_until BIGINT NOT NULL DEFAULT 0,
        pinned BOOLEAN NOT NULL DEFAULT false,
        archived BOOLEAN NOT NULL DEFAULT false,
        PRIMARY KEY (our_jid, chat_jid),
        FOREIGN KEY (our_jid) REFERENCES devices(jid) ON DELETE CASCADE ON UPDATE CASCADE
      );

      CREATE INDEX IF NOT EXISTS idx_identity_keys_our_jid ON identity_keys (our_jid);
      CREATE INDEX IF NOT EXISTS idx_sessions_our_jid ON sessions (our_jid);
      CREATE INDEX IF NOT EXISTS idx_contacts_our_jid ON contacts (our_jid);
    `,
  },
  {
    version: 2,
    name: "lid_and_privacy",
    description: "Message secrets, privacy tokens, LID map and device columns added upstream",
    up: `
      CREATE TABLE IF NOT EXISTS message_secrets (
        our_jid TEXT,
        chat_jid TEXT,
        sender_jid TEXT,
        message_id TEXT,
        key BLOB NOT NULL,
        PRIMARY KEY (our_jid, chat_jid, sender_jid, message_id),
        FOREIGN KEY (our_jid) REFERENCES devices(jid) ON DELETE CASCADE ON UPDATE CASCADE
      );

      CREATE TABLE IF NOT EXISTS privacy_tokens (
        our_jid TEXT,
        their_jid TEXT,
        token BLOB NOT NULL,
        timestamp BIGINT NOT NULL,
        PRIMARY KEY (our_jid, their_jid)
      );

      CREATE TABLE IF NOT EXISTS lid_map (
        lid TEXT PRIMARY KEY,
        pn TEXT UNIQUE NOT NULL
      );

      ALTER TABLE devices ADD COLUMN facebook_uuid TEXT;
      ALTER TABLE devices ADD COLUMN lid_migration_ts BIGINT NOT NULL DEFAULT 0;

      CREATE INDEX IF NOT EXISTS idx_privacy_tokens_our_jid ON privacy_tokens (our_jid);
    `,
    validate: (db) => hasColumn(db, "devices", "facebook_uuid") && hasColumn(db, "devices", "lid_migration_ts"),
  },
];
