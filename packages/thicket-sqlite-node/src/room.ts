import type Database from "better-sqlite3";

import { NotFoundError, StoreError, Tree } from "@thicket/interface";
import type { Msg, MsgId, MsgStore, Path, Time } from "@thicket/interface";

import type { VaultActor } from "./actor.js";

export type StoredMsg = Msg & {
  seen: boolean;
  edited: Time | null;
  deleted: Time | null;
};

export type AddMsgsOptions = {
  /** Initial seen flag for messages that are not stored yet. */
  seen?: boolean;
};

type MsgRow = {
  id: string;
  parent: string | null;
  time: number;
  nick: string;
  content: string;
  seen: number;
  edited: number | null;
  deleted: number | null;
};

type RoomParams = { room: string };
type IdParams = { room: string; id: string };
type TimeIdParams = { room: string; time: number; id: string };

const MSG_COLUMNS = "msgs.id, msgs.parent, msgs.time, msgs.nick, msgs.content, msgs.seen, msgs.edited, msgs.deleted";

// Rows come out leaf first. Recursing on (id, parent) alone lets UNION end a cyclic chain.
const PATH_SQL = `
WITH RECURSIVE path (id, parent) AS (
  SELECT id, parent FROM msgs WHERE room = @room AND id = @id
  UNION
  SELECT msgs.id, msgs.parent
  FROM msgs JOIN path ON msgs.id = path.parent
  WHERE msgs.room = @room
)
SELECT id FROM path
`;

// Whether @id is among its own ancestors.
const CYCLE_SQL = `
WITH RECURSIVE ancestors (id) AS (
  SELECT parent FROM msgs WHERE room = @room AND id = @id
  UNION
  SELECT msgs.parent
  FROM msgs JOIN ancestors ON msgs.id = ancestors.id
  WHERE msgs.room = @room
)
SELECT count(*) FROM ancestors WHERE id = @id
`;

const TREE_SQL = `
WITH RECURSIVE tree (id) AS (
  SELECT @id
  UNION
  SELECT msgs.id FROM msgs JOIN tree ON msgs.parent = tree.id WHERE msgs.room = @room
)
SELECT ${MSG_COLUMNS}
FROM tree JOIN msgs ON msgs.room = @room AND msgs.id = tree.id
ORDER BY msgs.id ASC
`;

const UPSERT_MSG_SQL = `
INSERT INTO msgs (room, id, parent, time, nick, content, seen)
VALUES (@room, @id, @parent, @time, @nick, @content, @seen)
ON CONFLICT (room, id) DO UPDATE SET
  time = excluded.time,
  nick = excluded.nick,
  content = excluded.content
`;

const ENSURE_ROOM_SQL = `
INSERT INTO rooms (room, first_joined, last_joined)
VALUES (@room, @time, @time)
ON CONFLICT (room) DO NOTHING
`;

const JOIN_ROOM_SQL = `
INSERT INTO rooms (room, first_joined, last_joined)
VALUES (@room, @time, @time)
ON CONFLICT (room) DO UPDATE SET last_joined = excluded.last_joined
`;

function toStoredMsg(row: MsgRow): StoredMsg {
  return {
    id: row.id,
    parent: row.parent,
    time: row.time,
    nick: row.nick,
    content: row.content,
    seen: row.seen !== 0,
    edited: row.edited,
    deleted: row.deleted,
  };
}

function requirePath(leafFirst: string[], id: MsgId): Path {
  const [root, ...rest] = leafFirst.reverse();
  if (root === undefined) throw new NotFoundError(id);
  return [root, ...rest];
}

function earliestTime(msgs: readonly Msg[]): number {
  return msgs.reduce((min, msg) => Math.min(min, msg.time), Infinity);
}

function msgTime(db: Database.Database, room: string, id: MsgId): number {
  const time = db
    .prepare<IdParams, number>("SELECT time FROM msgs WHERE room = @room AND id = @id")
    .pluck()
    .get({ room, id });
  if (time === undefined) throw new NotFoundError(id);
  return time;
}

function neighbourId(
  db: Database.Database,
  room: string,
  id: MsgId,
  direction: "older" | "newer",
  unseenOnly: boolean
): MsgId | null {
  const time = msgTime(db, room, id);
  const cmp = direction === "older" ? "<" : ">";
  const order = direction === "older" ? "DESC" : "ASC";
  const unseen = unseenOnly ? "AND seen = 0" : "";
  const next = db
    .prepare<TimeIdParams, string>(
      `SELECT id FROM msgs
       WHERE room = @room AND (time, id) ${cmp} (@time, @id) ${unseen}
       ORDER BY time ${order}, id ${order}
       LIMIT 1`
    )
    .pluck()
    .get({ room, time, id });
  return next ?? null;
}

function newestId(db: Database.Database, room: string, unseenOnly: boolean): MsgId | null {
  const unseen = unseenOnly ? "AND seen = 0" : "";
  const id = db
    .prepare<RoomParams, string>(
      `SELECT id FROM msgs WHERE room = @room ${unseen} ORDER BY time DESC, id DESC LIMIT 1`
    )
    .pluck()
    .get({ room });
  return id ?? null;
}

/**
 * Message forest of one room, backed by the vault.
 *
 * Every call is a single unit of work, so a write followed by a read always observes the write.
 */
export class RoomVault implements MsgStore<StoredMsg> {
  constructor(
    private readonly actor: VaultActor,
    readonly room: string
  ) {}

  // Forest reads

  path(id: MsgId): Promise<Path> {
    return this.actor.execute((db) => this.pathSync(db, id));
  }

  tree(id: MsgId): Promise<Tree<StoredMsg>> {
    return this.actor.execute((db) => {
      const root = this.pathSync(db, id)[0];
      const rows = db.prepare<IdParams, MsgRow>(TREE_SQL).all({ room: this.room, id: root });
      return new Tree(root, rows.map(toStoredMsg));
    });
  }

  firstRootId(): Promise<MsgId | null> {
    return this.rootId("SELECT id FROM trees WHERE room = @room ORDER BY id ASC LIMIT 1");
  }

  lastRootId(): Promise<MsgId | null> {
    return this.rootId("SELECT id FROM trees WHERE room = @room ORDER BY id DESC LIMIT 1");
  }

  prevRootId(root: MsgId): Promise<MsgId | null> {
    return this.rootId("SELECT id FROM trees WHERE room = @room AND id < @id ORDER BY id DESC LIMIT 1", root);
  }

  nextRootId(root: MsgId): Promise<MsgId | null> {
    return this.rootId("SELECT id FROM trees WHERE room = @room AND id > @id ORDER BY id ASC LIMIT 1", root);
  }

  olderMsgId(id: MsgId): Promise<MsgId | null> {
    return this.actor.execute((db) => neighbourId(db, this.room, id, "older", false));
  }

  newerMsgId(id: MsgId): Promise<MsgId | null> {
    return this.actor.execute((db) => neighbourId(db, this.room, id, "newer", false));
  }

  newestMsgId(): Promise<MsgId | null> {
    return this.actor.execute((db) => newestId(db, this.room, false));
  }

  olderUnseenMsgId(id: MsgId): Promise<MsgId | null> {
    return this.actor.execute((db) => neighbourId(db, this.room, id, "older", true));
  }

  newerUnseenMsgId(id: MsgId): Promise<MsgId | null> {
    return this.actor.execute((db) => neighbourId(db, this.room, id, "newer", true));
  }

  newestUnseenMsgId(): Promise<MsgId | null> {
    return this.actor.execute((db) => newestId(db, this.room, true));
  }

  // Other reads

  msg(id: MsgId): Promise<StoredMsg | null> {
    return this.actor.execute((db) => {
      const row = db
        .prepare<IdParams, MsgRow>(`SELECT ${MSG_COLUMNS} FROM msgs WHERE room = @room AND id = @id`)
        .get({ room: this.room, id });
      return row ? toStoredMsg(row) : null;
    });
  }

  unseenMsgsCount(): Promise<number> {
    return this.actor.execute((db) =>
      db
        .prepare<RoomParams, number>("SELECT count(*) FROM msgs WHERE room = @room AND seen = 0")
        .pluck()
        .get({ room: this.room }) ?? 0
    );
  }

  // Writes

  join(time: Time): Promise<void> {
    return this.actor.execute((db) => {
      db.prepare<{ room: string; time: number }>(JOIN_ROOM_SQL).run({ room: this.room, time });
    });
  }

  addMsg(msg: Msg, opts: AddMsgsOptions = {}): Promise<void> {
    return this.addMsgs([msg], opts);
  }

  /**
   * Store messages arriving from the remote service. Already stored messages keep their seen flag.
   *
   * Rejects the whole batch with `StoreError` if a message would become its own ancestor.
   */
  addMsgs(msgs: Msg[], opts: AddMsgsOptions = {}): Promise<void> {
    const seen = opts.seen ? 1 : 0;
    return this.actor.execute((db) => {
      if (msgs.length === 0) return;
      const ensureRoom = db.prepare<{ room: string; time: number }>(ENSURE_ROOM_SQL);
      const upsert = db.prepare<{
        room: string;
        id: string;
        parent: string | null;
        time: number;
        nick: string;
        content: string;
        seen: number;
      }>(UPSERT_MSG_SQL);
      const inCycle = db.prepare<IdParams, number>(CYCLE_SQL).pluck();
      db.transaction(() => {
        ensureRoom.run({ room: this.room, time: earliestTime(msgs) });
        for (const msg of msgs) {
          upsert.run({
            room: this.room,
            id: msg.id,
            parent: msg.parent,
            time: msg.time,
            nick: msg.nick,
            content: msg.content,
            seen,
          });
          if (inCycle.get({ room: this.room, id: msg.id })) {
            throw new StoreError(`message ${msg.id} would be its own ancestor`);
          }
        }
      })();
    });
  }

  editMsg(id: MsgId, content: string, time: Time): Promise<void> {
    return this.actor.execute((db) => {
      const { changes } = db
        .prepare<{ room: string; id: string; content: string; time: number }>(
          "UPDATE msgs SET content = @content, edited = @time WHERE room = @room AND id = @id"
        )
        .run({ room: this.room, id, content, time });
      if (changes === 0) throw new NotFoundError(id);
    });
  }

  /** Tombstone a message. It keeps its place in the forest so replies stay attached. */
  deleteMsg(id: MsgId, time: Time): Promise<void> {
    return this.actor.execute((db) => {
      const { changes } = db
        .prepare<{ room: string; id: string; time: number }>(
          "UPDATE msgs SET deleted = @time WHERE room = @room AND id = @id"
        )
        .run({ room: this.room, id, time });
      if (changes === 0) throw new NotFoundError(id);
    });
  }

  setSeen(id: MsgId, seen: boolean): Promise<void> {
    return this.actor.execute((db) => {
      const { changes } = db
        .prepare<{ room: string; id: string; seen: number }>(
          "UPDATE msgs SET seen = @seen WHERE room = @room AND id = @id"
        )
        .run({ room: this.room, id, seen: seen ? 1 : 0 });
      if (changes === 0) throw new NotFoundError(id);
    });
  }

  /** Set the seen flag of `id` and of every message older than it. */
  setOlderSeen(id: MsgId, seen: boolean): Promise<void> {
    return this.actor.execute((db) => {
      const time = msgTime(db, this.room, id);
      db.prepare<{ room: string; id: string; time: number; seen: number }>(
        "UPDATE msgs SET seen = @seen WHERE room = @room AND (time, id) <= (@time, @id)"
      ).run({ room: this.room, id, time, seen: seen ? 1 : 0 });
    });
  }

  /** Returns the number of messages whose flag changed. */
  setAllSeen(seen: boolean): Promise<number> {
    return this.actor.execute(
      (db) =>
        db
          .prepare<{ room: string; seen: number }>(
            "UPDATE msgs SET seen = @seen WHERE room = @room AND seen != @seen"
          )
          .run({ room: this.room, seen: seen ? 1 : 0 }).changes
    );
  }

  /** Remove the room and everything stored for it. */
  delete(): Promise<void> {
    return this.actor.execute((db) => {
      db.transaction(() => {
        db.prepare<RoomParams>("DELETE FROM rooms WHERE room = @room").run({ room: this.room });
        db.prepare<RoomParams>("DELETE FROM trees WHERE room = @room").run({ room: this.room });
      })();
    });
  }

  private pathSync(db: Database.Database, id: MsgId): Path {
    const ids = db.prepare<IdParams, string>(PATH_SQL).pluck().all({ room: this.room, id });
    return requirePath(ids, id);
  }

  private rootId(sql: string, id?: MsgId): Promise<MsgId | null> {
    return this.actor.execute((db) => {
      const root =
        id === undefined
          ? db.prepare<RoomParams, string>(sql).pluck().get({ room: this.room })
          : db.prepare<IdParams, string>(sql).pluck().get({ room: this.room, id });
      return root ?? null;
    });
  }
}
