import { expect, test } from "vitest";

import { NotFoundError, StoreError, type Msg } from "@thicket/interface";

import { launchVaultInMemory, type RoomVault, type Vault } from "../src/index.js";

const quiet = { log: () => {} };

function msg(id: string, parent: string | null, time: number, nick = "alice"): Msg {
  return { id, parent, time, nick, content: `hello from ${id}` };
}

// a (1)          e (5)
// ├─ b (2)       └─ f (6)
// │  └─ d (4)
// └─ c (3)
const FOREST: Msg[] = [
  msg("f", "e", 6),
  msg("d", "b", 4),
  msg("a", null, 1),
  msg("c", "a", 3),
  msg("e", null, 5),
  msg("b", "a", 2),
];

async function openRoom(msgs: Msg[] = FOREST): Promise<{ vault: Vault; room: RoomVault }> {
  const vault = await launchVaultInMemory(quiet);
  const room = vault.room("test");
  await room.addMsgs(msgs);
  return { vault, room };
}

test("room: root sequence", async () => {
  const { vault, room } = await openRoom();
  expect(await room.firstRootId()).toBe("a");
  expect(await room.lastRootId()).toBe("e");
  expect(await room.nextRootId("a")).toBe("e");
  expect(await room.nextRootId("e")).toBe(null);
  expect(await room.prevRootId("e")).toBe("a");
  expect(await room.prevRootId("a")).toBe(null);
  await vault.close();
});

test("room: path and tree", async () => {
  const { vault, room } = await openRoom();
  expect(await room.path("d")).toEqual(["a", "b", "d"]);
  expect(await room.path("a")).toEqual(["a"]);

  const tree = await room.tree("d");
  expect(tree.root()).toBe("a");
  expect(tree.size()).toBe(4);
  expect(tree.children("a")).toEqual(["b", "c"]);
  expect(tree.children("b")).toEqual(["d"]);
  expect(tree.parent("d")).toBe("b");
  expect(tree.msg("c")?.content).toBe("hello from c");
  expect(tree.msg("c")?.seen).toBe(false);
  await vault.close();
});

test("room: unknown ids are not found", async () => {
  const { vault, room } = await openRoom();
  await expect(room.tree("zz")).rejects.toBeInstanceOf(NotFoundError);
  await expect(room.path("zz")).rejects.toThrow("message not found: zz");
  await expect(room.olderMsgId("zz")).rejects.toBeInstanceOf(NotFoundError);
  await expect(room.editMsg("zz", "x", 1)).rejects.toBeInstanceOf(NotFoundError);
  await expect(room.deleteMsg("zz", 1)).rejects.toBeInstanceOf(NotFoundError);
  await expect(room.setSeen("zz", true)).rejects.toBeInstanceOf(NotFoundError);
  expect(await room.msg("zz")).toBe(null);
  await vault.close();
});

test("room: every message's path ends at a parentless root", async () => {
  const { vault, room } = await openRoom();
  for (const m of FOREST) {
    const path = await room.path(m.id);
    expect(path[path.length - 1]).toBe(m.id);
    const tree = await room.tree(m.id);
    expect(tree.parent(path[0])).toBeUndefined();
    expect(path.length).toBe((tree.depth(m.id) ?? -1) + 1);
    for (let i = 1; i < path.length; i++) expect(tree.parent(path[i]!)).toBe(path[i - 1]);
  }
  await vault.close();
});

test("room: a reply to an unknown message is a root until its parent arrives", async () => {
  const { vault, room } = await openRoom([msg("y", "x", 2)]);
  expect(await room.firstRootId()).toBe("y");
  expect(await room.path("y")).toEqual(["y"]);

  await room.addMsg(msg("x", null, 1));
  expect(await room.firstRootId()).toBe("x");
  expect(await room.lastRootId()).toBe("x");
  expect(await room.path("y")).toEqual(["x", "y"]);
  expect((await room.tree("y")).children("x")).toEqual(["y"]);
  await vault.close();
});

test("room: a message cannot become its own ancestor", async () => {
  const { vault, room } = await openRoom([]);

  await expect(room.addMsg(msg("x", "x", 1))).rejects.toBeInstanceOf(StoreError);
  await expect(room.addMsg(msg("x", "x", 1))).rejects.toThrow("message x would be its own ancestor");
  expect(await room.msg("x")).toBe(null);

  await expect(room.addMsgs([msg("p", "q", 1), msg("q", "p", 2)])).rejects.toThrow(
    "message q would be its own ancestor"
  );
  expect(await room.msg("p")).toBe(null);

  await room.addMsg(msg("p", "q", 1));
  await expect(room.addMsg(msg("q", "p", 2))).rejects.toBeInstanceOf(StoreError);
  expect(await room.path("p")).toEqual(["p"]);
  expect(await room.firstRootId()).toBe("p");
  await vault.close();
});

test("room: paths end on cyclic chains already in the file", async () => {
  const { vault, room } = await openRoom([]);
  await room.join(1);
  await vault.execute((db) => {
    const insert = db.prepare<[string, string]>(
      "INSERT INTO msgs (room, id, parent, time, nick, content) VALUES ('test', ?, ?, 1, 'alice', 'hi')"
    );
    insert.run("x", "x");
    insert.run("a", "b");
    insert.run("b", "a");
  });

  expect(await room.path("x")).toEqual(["x"]);
  expect(await room.path("a")).toEqual(["b", "a"]);
  const tree = await room.tree("a");
  expect(tree.root()).toBe("b");
  expect(tree.children("b")).toEqual(["a"]);
  await vault.close();
});

test("room: large batches are stored in one go", async () => {
  const { vault, room } = await openRoom([]);
  const count = 300_000;
  const msgs = Array.from({ length: count }, (_, i) => msg(`m${i}`, null, count - i));
  await room.addMsgs(msgs);

  expect(await room.unseenMsgsCount()).toBe(count);
  const firstJoined = await vault.execute((db) =>
    db.prepare<[string], number>("SELECT first_joined FROM rooms WHERE room = ?").pluck().get("test")
  );
  expect(firstJoined).toBe(1);
  await vault.close();
}, 60_000);

test("room: chronological order follows time, not ids", async () => {
  const { vault, room } = await openRoom([msg("m1", null, 10), msg("m2", null, 5), msg("m3", "m2", 7)]);
  expect(await room.newestMsgId()).toBe("m1");
  expect(await room.olderMsgId("m1")).toBe("m3");
  expect(await room.olderMsgId("m3")).toBe("m2");
  expect(await room.olderMsgId("m2")).toBe(null);
  expect(await room.newerMsgId("m2")).toBe("m3");
  expect(await room.newerMsgId("m1")).toBe(null);
  await vault.close();
});

test("room: equal timestamps are ordered by id", async () => {
  const { vault, room } = await openRoom([msg("b", null, 1), msg("a", null, 1)]);
  expect(await room.newestMsgId()).toBe("b");
  expect(await room.olderMsgId("b")).toBe("a");
  expect(await room.newerMsgId("a")).toBe("b");
  await vault.close();
});

test("room: unseen navigation skips seen messages", async () => {
  const { vault, room } = await openRoom();
  expect(await room.unseenMsgsCount()).toBe(6);

  await room.setSeen("c", true);
  expect(await room.olderUnseenMsgId("d")).toBe("b");
  expect(await room.newerUnseenMsgId("b")).toBe("d");

  await room.setOlderSeen("d", true);
  expect(await room.unseenMsgsCount()).toBe(2);
  expect(await room.newestUnseenMsgId()).toBe("f");
  expect(await room.olderUnseenMsgId("f")).toBe("e");
  expect(await room.olderUnseenMsgId("e")).toBe(null);
  expect(await room.newerUnseenMsgId("f")).toBe(null);

  expect(await room.setAllSeen(true)).toBe(2);
  expect(await room.newestUnseenMsgId()).toBe(null);
  await vault.close();
});

test("room: a write is visible to a read submitted right after it", async () => {
  const { vault, room } = await openRoom();
  const write = room.setSeen("f", true);
  const read = room.newestUnseenMsgId();
  expect(await read).toBe("e");
  await write;
  await vault.close();
});

test("room: re-adding a message keeps its seen flag", async () => {
  const { vault, room } = await openRoom([]);
  await room.addMsg(msg("a", null, 1), { seen: true });
  await room.addMsg({ ...msg("a", null, 1), content: "updated" });
  const stored = await room.msg("a");
  expect(stored?.seen).toBe(true);
  expect(stored?.content).toBe("updated");
  await vault.close();
});

test("room: edits and tombstones", async () => {
  const { vault, room } = await openRoom();
  await room.editMsg("b", "edited", 100);
  await room.deleteMsg("c", 101);

  expect(await room.msg("b")).toEqual({
    id: "b",
    parent: "a",
    time: 2,
    nick: "alice",
    content: "edited",
    seen: false,
    edited: 100,
    deleted: null,
  });
  const tree = await room.tree("a");
  expect(tree.children("a")).toEqual(["b", "c"]);
  expect(tree.msg("c")?.deleted).toBe(101);
  await vault.close();
});

test("room: rooms are isolated and can be deleted", async () => {
  const { vault, room } = await openRoom();
  const other = vault.room("other");
  await other.addMsg(msg("a", null, 1));

  expect(await vault.rooms()).toEqual(["other", "test"]);
  expect((await other.tree("a")).size()).toBe(1);

  await room.delete();
  expect(await vault.rooms()).toEqual(["other"]);
  expect(await room.firstRootId()).toBe(null);
  await expect(room.tree("a")).rejects.toBeInstanceOf(NotFoundError);
  expect(await other.firstRootId()).toBe("a");
  await vault.close();
});

test("room: join records first and last join", async () => {
  const vault = await launchVaultInMemory(quiet);
  const room = vault.room("test");
  await room.join(10);
  await room.join(20);
  const row = await vault.execute((db) =>
    db
      .prepare<[string], { first_joined: number; last_joined: number }>(
        "SELECT first_joined, last_joined FROM rooms WHERE room = ?"
      )
      .get("test")
  );
  expect(row).toEqual({ first_joined: 10, last_joined: 20 });
  await vault.close();
});
