import fs from "node:fs/promises";
import path from "node:path";

import Database from "better-sqlite3";

import { StoreError, errorMessage } from "@thicket/interface";

import { VaultActor, type Action } from "./actor.js";
import { MIGRATIONS } from "./migrate.js";
import { prepare } from "./prepare.js";
import { RoomVault } from "./room.js";

export type VaultOptions = {
  log?: (line: string) => void;
};

/**
 * Process-wide handle to the local replica.
 *
 * Create it once at startup with `launchVault` or `launchVaultInMemory`, hand it to every
 * consumer and `close()` it on shutdown.
 */
export class Vault {
  constructor(
    private readonly actor: VaultActor,
    readonly ephemeral: boolean,
    private readonly log: (line: string) => void
  ) {}

  /** Submit an arbitrary unit of work. */
  execute<T>(action: Action<T>): Promise<T> {
    return this.actor.execute(action);
  }

  room(name: string): RoomVault {
    return new RoomVault(this.actor, name);
  }

  rooms(): Promise<string[]> {
    return this.actor.execute((db) =>
      db.prepare<[], string>("SELECT room FROM rooms ORDER BY room ASC").pluck().all()
    );
  }

  /** Reclaim space and refresh planner statistics. Blocks all other work while it runs. */
  async gc(): Promise<void> {
    const started = Date.now();
    await this.actor.execute((db) => {
      db.exec("ANALYZE; VACUUM;");
    });
    this.log(`Vault gc took ${Date.now() - started}ms`);
  }

  /** Finish all queued work, then close the connection. */
  close(): Promise<void> {
    return this.actor.stop();
  }
}

function openDatabase(filename: string): Database.Database {
  try {
    return new Database(filename);
  } catch (err) {
    throw new StoreError(`opening vault ${filename} failed: ${errorMessage(err)}`, { cause: err });
  }
}

function launchFromConnection(db: Database.Database, ephemeral: boolean, opts: VaultOptions): Vault {
  const log = opts.log ?? ((line) => console.debug(line));
  try {
    db.pragma("foreign_keys = ON");
    db.pragma("trusted_schema = OFF");
  } catch (err) {
    db.close();
    throw new StoreError(`configuring vault failed: ${errorMessage(err)}`, { cause: err });
  }

  log("Opening vault");
  const actor = VaultActor.launchAndPrepare(db, MIGRATIONS, prepare, { log });
  return new Vault(actor, ephemeral, log);
}

export async function launchVault(filename: string, opts: VaultOptions = {}): Promise<Vault> {
  await fs.mkdir(path.dirname(path.resolve(filename)), { recursive: true });
  const db = openDatabase(filename);

  // Locking mode goes first so that switching to WAL takes the exclusive lock right away and
  // no shared-memory file is needed.
  try {
    db.pragma("locking_mode = exclusive");
    db.pragma("journal_mode = wal");
  } catch (err) {
    db.close();
    throw new StoreError(`locking vault ${filename} failed: ${errorMessage(err)}`, { cause: err });
  }

  return launchFromConnection(db, false, opts);
}

export async function launchVaultInMemory(opts: VaultOptions = {}): Promise<Vault> {
  return launchFromConnection(openDatabase(":memory:"), true, opts);
}
