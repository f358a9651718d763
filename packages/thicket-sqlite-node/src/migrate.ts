import type { Migration } from "./actor.js";

const MSGS_SCHEMA_SQL = `
CREATE TABLE rooms (
  room TEXT NOT NULL PRIMARY KEY,
  first_joined INTEGER NOT NULL,     -- unix seconds
  last_joined INTEGER NOT NULL
) STRICT;

CREATE TABLE msgs (
  room TEXT NOT NULL,
  id TEXT NOT NULL,
  parent TEXT,                       -- NULL for top-level messages
  time INTEGER NOT NULL,             -- unix seconds
  nick TEXT NOT NULL,
  content TEXT NOT NULL,
  PRIMARY KEY (room, id),
  FOREIGN KEY (room) REFERENCES rooms (room) ON DELETE CASCADE
) STRICT;

CREATE INDEX msgs_parent ON msgs (room, parent);
`;

const SEEN_SQL = `
ALTER TABLE msgs ADD COLUMN seen INTEGER NOT NULL DEFAULT 0;

CREATE INDEX msgs_time ON msgs (room, time, id);
CREATE INDEX msgs_unseen ON msgs (room, time, id) WHERE seen = 0;
`;

const TOMBSTONES_SQL = `
ALTER TABLE msgs ADD COLUMN edited INTEGER;
ALTER TABLE msgs ADD COLUMN deleted INTEGER;
`;

/** Forward-only. Never edit an entry once released, append a new one. */
export const MIGRATIONS: readonly Migration[] = [
  (db) => db.exec(MSGS_SCHEMA_SQL),
  (db) => db.exec(SEEN_SQL),
  (db) => db.exec(TOMBSTONES_SQL),
];
