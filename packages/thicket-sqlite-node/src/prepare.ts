import type Database from "better-sqlite3";

// A message is a root if it has no parent or its parent is not stored (yet).
const TREES_SQL = `
CREATE TEMPORARY TABLE trees (
  room TEXT NOT NULL,
  id TEXT NOT NULL,
  PRIMARY KEY (room, id)
) STRICT;

INSERT INTO trees (room, id)
SELECT room, id
FROM msgs AS m
WHERE parent IS NULL
   OR NOT EXISTS (SELECT 1 FROM msgs AS p WHERE p.room = m.room AND p.id = m.parent);

CREATE TEMPORARY TRIGGER trees_insert_msg
AFTER INSERT ON main.msgs
BEGIN
  INSERT OR IGNORE INTO trees (room, id)
  SELECT new.room, new.id
  WHERE new.parent IS NULL
     OR NOT EXISTS (SELECT 1 FROM msgs WHERE room = new.room AND id = new.parent);

  DELETE FROM trees
  WHERE room = new.room
    AND id IN (SELECT id FROM msgs WHERE room = new.room AND parent = new.id);
END;

CREATE TEMPORARY TRIGGER trees_delete_msg
AFTER DELETE ON main.msgs
BEGIN
  DELETE FROM trees WHERE room = old.room AND id = old.id;

  INSERT OR IGNORE INTO trees (room, id)
  SELECT room, id FROM msgs WHERE room = old.room AND parent = old.id;
END;
`;

/** Runs once per connection, after migrations and before any unit of work. */
export function prepare(db: Database.Database): void {
  db.exec(TREES_SQL);
}
