import { expect, expectTypeOf, test } from "vitest";
import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import Database from "better-sqlite3";

import { MigrationError, NotFoundError, StoreError } from "@thicket/interface";

import { VaultActor, schemaVersion, type Action, type Migration } from "../src/index.js";

const quiet = { log: () => {} };

const COUNTER_MIGRATIONS: Migration[] = [
  (db) => db.exec("CREATE TABLE counter (n INTEGER NOT NULL)"),
  (db) => db.exec("INSERT INTO counter (n) VALUES (0)"),
];

function launchCounter(filename = ":memory:"): VaultActor {
  return VaultActor.launchAndPrepare(new Database(filename), COUNTER_MIGRATIONS, () => {}, quiet);
}

function increment(db: Database.Database): void {
  db.exec("UPDATE counter SET n = n + 1");
}

function readCounter(db: Database.Database): number | undefined {
  return db.prepare<[], number>("SELECT n FROM counter").pluck().get();
}

test("actor: a read submitted after two writes observes both", async () => {
  const actor = launchCounter();
  const w1 = actor.execute(increment);
  const w2 = actor.execute(increment);
  const read = actor.execute(readCounter);
  expect(await read).toBe(2);
  await Promise.all([w1, w2]);
  await actor.stop();
});

test("actor: units complete in submission order", async () => {
  const actor = launchCounter();
  const order: number[] = [];
  const units = [1, 2, 3, 4, 5].map((n) => actor.execute(() => order.push(n)));
  expect(actor.pending).toBe(5);
  await Promise.all(units);
  expect(order).toEqual([1, 2, 3, 4, 5]);
  expect(actor.pending).toBe(0);
  await actor.stop();
});

test("actor: units run off the caller's stack", async () => {
  const actor = launchCounter();
  let ran = false;
  const unit = actor.execute(() => {
    ran = true;
  });
  expect(ran).toBe(false);
  await unit;
  expect(ran).toBe(true);
  await actor.stop();
});

test("actor: a failing unit only rejects its own caller", async () => {
  const actor = launchCounter();
  const before = actor.execute(increment);
  const failing = actor.execute((db) => db.prepare("SELECT * FROM missing_table").all());
  const after = actor.execute(increment);

  await expect(failing).rejects.toBeInstanceOf(StoreError);
  await expect(failing).rejects.toThrow("no such table: missing_table");
  await before;
  await after;
  expect(await actor.execute(readCounter)).toBe(2);
  await actor.stop();
});

test("actor: thrown domain errors reach the caller unchanged", async () => {
  const actor = launchCounter();
  const unit = actor.execute(() => {
    throw new NotFoundError("abc");
  });
  await expect(unit).rejects.toBeInstanceOf(NotFoundError);
  await expect(unit).rejects.toThrow("message not found: abc");
  await actor.stop();
});

test("actor: units of work cannot be asynchronous", () => {
  expectTypeOf<Action<number>>().returns.toEqualTypeOf<number>();
  expectTypeOf<Action<Promise<number>>>().returns.toEqualTypeOf<never>();
  expectTypeOf<Action<PromiseLike<void>>>().returns.toEqualTypeOf<never>();
});

test("actor: abandoned units still run", async () => {
  const actor = launchCounter();
  void actor.execute(increment).catch(() => {});
  expect(await actor.execute(readCounter)).toBe(1);
  await actor.stop();
});

test("actor: stop drains queued work, then rejects new work", async () => {
  const actor = launchCounter();
  const units = [actor.execute(increment), actor.execute(increment), actor.execute(readCounter)];
  const stopped = actor.stop();
  expect(actor.stopped).toBe(true);

  await expect(actor.execute(readCounter)).rejects.toThrow("vault is stopped");
  const results = await Promise.all(units);
  expect(results[2]).toBe(2);
  await stopped;
  expect(actor.stop()).toBe(stopped);
});

test("migrations: a second launch skips everything already applied", async () => {
  const dir = mkdtempSync(join(tmpdir(), "thicket-actor-"));
  const filename = join(dir, "vault.db");
  try {
    {
      const actor = launchCounter(filename);
      await actor.execute(increment);
      expect(await actor.execute(schemaVersion)).toBe(2);
      await actor.stop();
    }
    {
      // Reapplying the second migration would add another row.
      const actor = launchCounter(filename);
      expect(await actor.execute(schemaVersion)).toBe(2);
      expect(await actor.execute((db) => db.prepare<[], number>("SELECT count(*) FROM counter").pluck().get())).toBe(1);
      expect(await actor.execute(readCounter)).toBe(1);
      await actor.stop();
    }
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
});

test("migrations: a failing migration aborts startup and leaves nothing half-applied", () => {
  const dir = mkdtempSync(join(tmpdir(), "thicket-actor-"));
  const filename = join(dir, "vault.db");
  const broken: Migration[] = [
    COUNTER_MIGRATIONS[0]!,
    (db) => {
      db.exec("CREATE TABLE half (x INTEGER)");
      db.exec("INSERT INTO nope VALUES (1)");
    },
  ];
  try {
    let caught: unknown;
    try {
      VaultActor.launchAndPrepare(new Database(filename), broken, () => {}, quiet);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(MigrationError);
    expect(caught instanceof MigrationError ? caught.version : null).toBe(2);

    const db = new Database(filename);
    expect(schemaVersion(db)).toBe(1);
    const tables = db.prepare<[], string>("SELECT name FROM sqlite_master WHERE type = 'table'").pluck().all();
    expect(tables).toEqual(["counter"]);
    db.close();
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
});

test("migrations: a schema newer than the code is rejected", () => {
  const db = new Database(":memory:");
  db.pragma("user_version = 7");
  expect(() => VaultActor.launchAndPrepare(db, COUNTER_MIGRATIONS, () => {}, quiet)).toThrow(
    "vault schema version 7 is newer than the supported version 2"
  );
  expect(db.open).toBe(false);
});

test("prepare: a failing preparation aborts startup", () => {
  const db = new Database(":memory:");
  expect(() =>
    VaultActor.launchAndPrepare(
      db,
      COUNTER_MIGRATIONS,
      (conn) => {
        conn.exec("CREATE INDEX broken ON missing_table (x)");
      },
      quiet
    )
  ).toThrow(StoreError);
  expect(db.open).toBe(false);
});
